import { ok, err, type Result } from 'neverthrow';
import { ConfigError, type RankingInputError } from '../types/errors.js';
import type { MetricConfigRecord } from '../types/metric.js';
import type { RankingBatch, SampleWeight } from '../types/ranking.js';
import { planSampleWeight, prepareBatch } from '../batch/prepare.js';
import { toRankedList } from '../ordering/rank-order.js';
import { RankingMetric } from './ranking-metric.js';

/**
 * Several metrics fed from the same batches, reported by name.
 */
export class MetricSuite {
  private constructor(private readonly metrics: readonly RankingMetric[]) {}

  /** Build a suite; metric names must be unique. */
  static fromMetrics(metrics: readonly RankingMetric[]): Result<MetricSuite, ConfigError> {
    const seen = new Set<string>();
    for (const metric of metrics) {
      if (seen.has(metric.name)) {
        return err(new ConfigError(`Duplicate metric name: ${metric.name}`));
      }
      seen.add(metric.name);
    }
    return ok(new MetricSuite(metrics));
  }

  static fromConfigs(configs: readonly unknown[]): Result<MetricSuite, ConfigError> {
    const metrics: RankingMetric[] = [];
    for (const config of configs) {
      const created = RankingMetric.fromConfig(config);
      if (created.isErr()) return err(created.error);
      metrics.push(created.value);
    }
    return MetricSuite.fromMetrics(metrics);
  }

  get names(): string[] {
    return this.metrics.map((metric) => metric.name);
  }

  /**
   * Update every metric with one batch; returns the batch-local values.
   * The batch is checked against every metric first, so a rejected batch
   * updates none of them. Each list is validated and sorted once; only
   * seeded metrics rank it again, with their own generator.
   */
  update(batch: RankingBatch, sampleWeight?: SampleWeight): Result<Record<string, number>, RankingInputError> {
    for (const metric of this.metrics) {
      const checked = metric.requireFields(batch);
      if (checked.isErr()) return err(checked.error);
    }

    const plan = planSampleWeight(batch, sampleWeight);
    if (plan.isErr()) return err(plan.error);

    const prepared = prepareBatch(batch, plan.value.itemFactors);
    if (prepared.isErr()) return err(prepared.error);

    const shared = prepared.value.map((list) => toRankedList(list, undefined));

    const values: Record<string, number> = {};
    for (const metric of this.metrics) {
      values[metric.name] = metric.accumulatePrepared(prepared.value, plan.value.listFactors, shared);
    }
    return ok(values);
  }

  result(): Record<string, number> {
    const values: Record<string, number> = {};
    for (const metric of this.metrics) {
      values[metric.name] = metric.result();
    }
    return values;
  }

  reset(): void {
    for (const metric of this.metrics) metric.reset();
  }

  getConfigs(): MetricConfigRecord[] {
    return this.metrics.map((metric) => metric.getConfig());
  }
}
