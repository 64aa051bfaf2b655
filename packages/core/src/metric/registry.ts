/**
 * Metric lookup by key and the default metric set.
 */

import { ok, err, type Result } from 'neverthrow';
import { ConfigError } from '../types/errors.js';
import type { MetricConfigRecord, MetricOptions, RankingMetricKey } from '../types/metric.js';
import { RankingMetric } from './ranking-metric.js';

/** One-line description of every metric kind. */
export const METRIC_DESCRIPTIONS: Readonly<Record<RankingMetricKey, string>> = {
  mrr: 'Mean reciprocal rank of the first relevant item',
  arp: 'Average relevance position (lower is better)',
  precision: 'Weighted share of relevant items in the top n',
  recall: 'Weighted share of relevant items retrieved in the top n',
  map: 'Mean average precision',
  dcg: 'Discounted cumulative gain',
  ndcg: 'Normalized discounted cumulative gain',
  alpha_dcg: 'Novelty-discounted DCG over subtopics',
  precision_ia: 'Intent-aware precision over subtopics',
  ordered_pair_accuracy: 'Share of differently-labelled pairs ordered correctly',
};

/**
 * Build a metric by key.
 *
 * @example
 *   getMetric('mrr', { topn: 2 }) // MRR@2
 */
export function getMetric(
  key: string,
  options: Omit<MetricOptions, 'key'> = {},
): Result<RankingMetric, ConfigError> {
  return RankingMetric.create({ ...options, key });
}

/** Cutoffs of the NDCG entries in the default set. */
const DEFAULT_NDCG_CUTOFFS = [1, 3, 5, 10];

/** Configuration records of the default metric set. */
export function defaultMetricConfigs(): MetricConfigRecord[] {
  return [
    ...DEFAULT_NDCG_CUTOFFS.map((topn): MetricConfigRecord => ({
      key: 'ndcg',
      topn,
      name: `metric/ndcg_${topn}`,
    })),
    { key: 'arp', name: 'metric/arp' },
    { key: 'ordered_pair_accuracy', name: 'metric/ordered_pair_accuracy' },
    { key: 'mrr', name: 'metric/mrr' },
    { key: 'precision', name: 'metric/precision' },
    { key: 'map', name: 'metric/map' },
    { key: 'dcg', name: 'metric/dcg' },
    { key: 'ndcg', name: 'metric/ndcg' },
  ];
}

/** Fresh instances of the default metric set. */
export function defaultMetrics(): RankingMetric[] {
  const metrics: RankingMetric[] = [];
  for (const config of defaultMetricConfigs()) {
    const created = RankingMetric.fromConfig(config);
    // Default records are static and always valid
    if (created.isErr()) throw created.error;
    metrics.push(created.value);
  }
  return metrics;
}

/** Parsed form of a compact metric spec. */
export interface MetricSpec {
  readonly key: string;
  readonly topn?: number;
}

const METRIC_SPEC_PATTERN = /^([a-z_]+)(?:@(\d+))?$/;

/**
 * Parse a compact `key` or `key@topn` spec, e.g. `ndcg@10`.
 */
export function parseMetricSpec(spec: string): Result<MetricSpec, ConfigError> {
  const match = METRIC_SPEC_PATTERN.exec(spec.trim());
  const key = match?.[1];
  if (match === null || key === undefined) {
    return err(new ConfigError(`Invalid metric spec "${spec}". Expected <key> or <key>@<topn>`));
  }
  const topn = match[2];
  return ok({
    key,
    ...(topn !== undefined ? { topn: Number.parseInt(topn, 10) } : {}),
  });
}
