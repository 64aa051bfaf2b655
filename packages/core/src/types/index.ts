export type {
  RankingList,
  DenseBatch,
  RankingBatch,
  SampleWeight,
  PreparedList,
  RankedList,
  ListScore,
} from './ranking.js';
export { PADDING_LABEL } from './ranking.js';
export type {
  RankingMetricKey,
  GainFn,
  RankDiscountFn,
  MetricConfigRecord,
  MetricOptions,
  ResolvedMetricOptions,
  ScoringOptions,
} from './metric.js';
export {
  RANKING_METRIC_KEYS,
  SUBTOPIC_METRIC_KEYS,
  UNCUT_METRIC_KEYS,
  isRankingMetricKey,
} from './metric.js';
export type { RankingInputErrorKind } from './errors.js';
export { ConfigError, RankingInputError } from './errors.js';
