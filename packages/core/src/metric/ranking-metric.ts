/**
 * A metric bound to its hyperparameters and a running weighted mean.
 *
 * One instance is created per metric, updated once per batch during an
 * evaluation pass and reset between passes. Updates on one instance must
 * not interleave; the aggregate is not synchronised.
 */

import { ok, err, type Result } from 'neverthrow';
import { WeightedMean, type AggregateTotals } from '../aggregate/weighted-mean.js';
import { planSampleWeight, prepareBatch } from '../batch/prepare.js';
import { defaultGain, defaultRankDiscount, identityGain } from '../metrics/gain-discount.js';
import { scoreRankedList, scorerFor, type ListScorer } from '../metrics/scorers.js';
import { SeededRng } from '../ordering/seed-rng.js';
import { toRankedList, withCutoff } from '../ordering/rank-order.js';
import { RankingInputError, type ConfigError } from '../types/errors.js';
import {
  SUBTOPIC_METRIC_KEYS,
  type MetricConfigRecord,
  type MetricOptions,
  type RankingMetricKey,
  type ResolvedMetricOptions,
  type ScoringOptions,
} from '../types/metric.js';
import type {
  ListScore,
  PreparedList,
  RankedList,
  RankingBatch,
  SampleWeight,
} from '../types/ranking.js';
import {
  parseMetricConfigRecord,
  resolveMetricOptions,
  toConfigRecord,
} from './metric-config.js';

export class RankingMetric {
  private readonly aggregate = new WeightedMean();
  private readonly scorer: ListScorer;
  private readonly scoring: ScoringOptions;
  private rng: SeededRng | undefined;

  private constructor(private readonly options: ResolvedMetricOptions) {
    this.scorer = scorerFor(options.key);
    this.scoring = {
      gainFn: options.gainFn ?? (options.key === 'alpha_dcg' ? identityGain : defaultGain),
      rankDiscountFn: options.rankDiscountFn ?? defaultRankDiscount,
      alpha: options.alpha,
    };
    this.rng = options.seed !== undefined ? new SeededRng(options.seed) : undefined;
  }

  /** Validate options and build a metric. */
  static create(options: MetricOptions): Result<RankingMetric, ConfigError> {
    return resolveMetricOptions(options).map((resolved) => new RankingMetric(resolved));
  }

  /** Rebuild a metric from a record produced by {@link getConfig}. */
  static fromConfig(record: unknown): Result<RankingMetric, ConfigError> {
    return parseMetricConfigRecord(record).andThen((parsed) => RankingMetric.create(parsed));
  }

  get key(): RankingMetricKey {
    return this.options.key;
  }

  get name(): string {
    return this.options.name;
  }

  getConfig(): MetricConfigRecord {
    return toConfigRecord(this.options);
  }

  /**
   * Score every list of a batch without touching the running mean.
   * Draws from the tie-break generator like an update does.
   */
  scoreLists(batch: RankingBatch): Result<ListScore[], RankingInputError> {
    const fields = this.requireFields(batch);
    if (fields.isErr()) return err(fields.error);

    return prepareBatch(batch).map((lists) => lists.map((list) => this.scoreList(this.rank(list))));
  }

  /**
   * Score a batch and fold it into the running mean.
   *
   * The whole batch is validated first; on error the running mean is
   * unchanged. Returns the weighted mean of this batch alone.
   */
  update(batch: RankingBatch, sampleWeight?: SampleWeight): Result<number, RankingInputError> {
    const fields = this.requireFields(batch);
    if (fields.isErr()) return err(fields.error);

    const plan = planSampleWeight(batch, sampleWeight);
    if (plan.isErr()) return err(plan.error);

    const prepared = prepareBatch(batch, plan.value.itemFactors);
    if (prepared.isErr()) return err(prepared.error);

    return ok(this.accumulatePrepared(prepared.value, plan.value.listFactors));
  }

  /** Check a batch against this metric without scoring it. */
  validate(batch: RankingBatch, sampleWeight?: SampleWeight): Result<void, RankingInputError> {
    return this.requireFields(batch)
      .andThen(() => planSampleWeight(batch, sampleWeight))
      .andThen((plan) => prepareBatch(batch, plan.itemFactors))
      .map(() => undefined);
  }

  /** Fail when the metric reads a field some list of the batch lacks. */
  requireFields(batch: RankingBatch): Result<void, RankingInputError> {
    if (!SUBTOPIC_METRIC_KEYS.includes(this.options.key)) return ok(undefined);

    const listIndex = batch.findIndex((list) => list.subtopics === undefined);
    if (listIndex >= 0) {
      return err(new RankingInputError(
        'missing_field',
        `List ${listIndex}: metric ${this.options.key} needs subtopics`,
      ));
    }
    return ok(undefined);
  }

  /**
   * Fold in lists that already passed {@link validate}; returns their mean.
   *
   * `shared` holds uncut input-order rankings of the same lists. A metric
   * without a seed scores those instead of sorting again; a seeded one
   * always ranks with its own generator.
   */
  accumulatePrepared(
    lists: readonly PreparedList[],
    listFactors: readonly number[],
    shared?: readonly RankedList[],
  ): number {
    const ranked = this.rng === undefined && shared !== undefined
      ? shared.map((list) => withCutoff(list, this.options.topn))
      : lists.map((list) => this.rank(list));
    return this.aggregate.accumulate(ranked.map((list) => this.scoreList(list)), listFactors);
  }

  /** Running weighted mean; 0 until some weight has been accumulated. */
  result(): number {
    return this.aggregate.result();
  }

  get totals(): AggregateTotals {
    return this.aggregate.totals;
  }

  /** Fold in totals from another instance of the same metric. */
  merge(totals: AggregateTotals): void {
    this.aggregate.merge(totals);
  }

  /** Clear the running mean and restart tie-breaking from the seed. */
  reset(): void {
    this.aggregate.reset();
    this.rng = this.options.seed !== undefined ? new SeededRng(this.options.seed) : undefined;
  }

  // Tie keys are only drawn here, after the whole batch has been validated
  private rank(list: PreparedList): RankedList {
    return toRankedList(list, this.options.topn, this.rng);
  }

  private scoreList(list: RankedList): ListScore {
    return scoreRankedList(this.scorer, list, this.scoring);
  }
}
