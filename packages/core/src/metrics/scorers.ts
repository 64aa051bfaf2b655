import type { ListScore, RankedList } from '../types/ranking.js';
import type { RankingMetricKey, ScoringOptions } from '../types/metric.js';
import { averagePrecision, precision, recall, reciprocalRank } from './binary-metrics.js';
import { dcg, ndcg } from './gain-metrics.js';
import { averageRelevancePosition, orderedPairAccuracy } from './position-metrics.js';
import { alphaDcg, precisionIA } from './diversity-metrics.js';
import { DEGENERATE } from './list-weights.js';

/** Scores the ranked valid items of one list. */
export type ListScorer = (list: RankedList, options: ScoringOptions) => ListScore;

export function scorerFor(key: RankingMetricKey): ListScorer {
  switch (key) {
    case 'mrr':
      return reciprocalRank;
    case 'arp':
      return averageRelevancePosition;
    case 'precision':
      return precision;
    case 'recall':
      return recall;
    case 'map':
      return averagePrecision;
    case 'dcg':
      return dcg;
    case 'ndcg':
      return ndcg;
    case 'alpha_dcg':
      return alphaDcg;
    case 'precision_ia':
      return precisionIA;
    case 'ordered_pair_accuracy':
      return orderedPairAccuracy;
    default: {
      const unreachable: never = key;
      throw new Error(`Unhandled metric key: ${String(unreachable)}`);
    }
  }
}

/** Lists with fewer than two valid items carry no ranking signal. */
export const MIN_VALID_ITEMS = 2;

/** Score one ranked list, treating short lists as degenerate. */
export function scoreRankedList(
  scorer: ListScorer,
  list: RankedList,
  options: ScoringOptions,
): ListScore {
  if (list.labels.length < MIN_VALID_ITEMS) return DEGENERATE;
  return scorer(list, options);
}
