// @rankeval/core: ranking metric engine

// Types
export type {
  RankingList,
  DenseBatch,
  RankingBatch,
  SampleWeight,
  PreparedList,
  RankedList,
  ListScore,
} from './types/index.js';
export type {
  RankingMetricKey,
  GainFn,
  RankDiscountFn,
  MetricConfigRecord,
  MetricOptions,
  ResolvedMetricOptions,
  ScoringOptions,
  RankingInputErrorKind,
} from './types/index.js';
export {
  PADDING_LABEL,
  RANKING_METRIC_KEYS,
  SUBTOPIC_METRIC_KEYS,
  UNCUT_METRIC_KEYS,
  isRankingMetricKey,
  ConfigError,
  RankingInputError,
} from './types/index.js';

// Ordering
export { SeededRng } from './ordering/seed-rng.js';
export { rankOrder, resolveCutoff, toRankedList, withCutoff } from './ordering/rank-order.js';

// Per-list algorithms
export { defaultGain, defaultRankDiscount, identityGain } from './metrics/gain-discount.js';
export { reciprocalRank, precision, recall, averagePrecision } from './metrics/binary-metrics.js';
export { dcg, ndcg } from './metrics/gain-metrics.js';
export { averageRelevancePosition, orderedPairAccuracy } from './metrics/position-metrics.js';
export { alphaDcg, precisionIA } from './metrics/diversity-metrics.js';
export { DEGENERATE, perListWeight } from './metrics/list-weights.js';
export { scorerFor, scoreRankedList, MIN_VALID_ITEMS } from './metrics/scorers.js';
export type { ListScorer } from './metrics/scorers.js';

// Aggregation
export { WeightedMean } from './aggregate/weighted-mean.js';
export type { AggregateTotals } from './aggregate/weighted-mean.js';

// Batches
export { prepareList, prepareBatch, planSampleWeight, fromDenseBatch } from './batch/prepare.js';
export type { SampleWeightPlan } from './batch/prepare.js';
export { rankingListSchema, denseBatchSchema, parseRankingInput } from './batch/schema.js';

// Metric objects
export { RankingMetric } from './metric/ranking-metric.js';
export { MetricSuite } from './metric/metric-suite.js';
export {
  DEFAULT_ALPHA,
  metricConfigRecordSchema,
  parseMetricConfigRecord,
  resolveMetricOptions,
  defaultMetricName,
  toConfigRecord,
  formatZodErrors,
} from './metric/metric-config.js';
export {
  METRIC_DESCRIPTIONS,
  getMetric,
  defaultMetrics,
  defaultMetricConfigs,
  parseMetricSpec,
} from './metric/registry.js';
export type { MetricSpec } from './metric/registry.js';

// Configuration
export {
  CONFIG_FILE_NAME,
  loadEvalConfig,
  parseEvalConfig,
  defaultEvalConfig,
  interpolateEnvVars,
} from './config/eval-config.js';
export type { EvalConfig } from './config/eval-config.js';
