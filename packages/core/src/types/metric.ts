/** Every metric kind the engine can compute. */
export const RANKING_METRIC_KEYS = [
  'mrr',
  'arp',
  'precision',
  'recall',
  'map',
  'dcg',
  'ndcg',
  'alpha_dcg',
  'precision_ia',
  'ordered_pair_accuracy',
] as const;

export type RankingMetricKey = (typeof RANKING_METRIC_KEYS)[number];

/** Metric kinds that read per-item subtopic coverage. */
export const SUBTOPIC_METRIC_KEYS: readonly RankingMetricKey[] = ['alpha_dcg', 'precision_ia'];

/** Metric kinds that score the whole valid list and take no cutoff. */
export const UNCUT_METRIC_KEYS: readonly RankingMetricKey[] = ['arp', 'ordered_pair_accuracy'];

export function isRankingMetricKey(value: string): value is RankingMetricKey {
  return RANKING_METRIC_KEYS.some((key) => key === value);
}

/** Maps a relevance label to a reward. */
export type GainFn = (label: number) => number;

/** Maps a 1-based rank to a multiplicative decay factor. */
export type RankDiscountFn = (rank: number) => number;

/**
 * Plain configuration record of a metric, suitable for checkpointing.
 * Functions are not part of it.
 */
export interface MetricConfigRecord {
  readonly key: RankingMetricKey;
  readonly name: string;
  readonly topn?: number;
  readonly alpha?: number;
  readonly seed?: number;
}

/** Construction options for a metric. */
export interface MetricOptions {
  readonly key: string;
  readonly name?: string;
  readonly topn?: number;
  /** Redundancy penalty for alpha-DCG, in [0, 1]. Defaults to 0.5. */
  readonly alpha?: number;
  /** Seed for reproducible tie-breaking. Unset breaks ties by input order. */
  readonly seed?: number;
  readonly gainFn?: GainFn;
  readonly rankDiscountFn?: RankDiscountFn;
}

/** Options after validation and defaulting. */
export interface ResolvedMetricOptions {
  readonly key: RankingMetricKey;
  readonly name: string;
  readonly topn: number | undefined;
  readonly alpha: number;
  readonly seed: number | undefined;
  readonly gainFn: GainFn | undefined;
  readonly rankDiscountFn: RankDiscountFn | undefined;
}

/** Hyperparameters handed to a per-list scorer. */
export interface ScoringOptions {
  readonly gainFn: GainFn;
  readonly rankDiscountFn: RankDiscountFn;
  readonly alpha: number;
}
