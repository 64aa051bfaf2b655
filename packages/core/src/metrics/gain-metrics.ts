/**
 * Cumulative-gain metrics.
 *
 * DCG@k  = sum(gain(label_i) * weight_i * discount(i)) for ranks i in 1..k
 * NDCG@k = DCG@k / IDCG@k
 *
 * IDCG@k orders the same items by descending label, each keeping its
 * weight; equal labels go heavier first. With uneven weights a ranking can
 * therefore beat the ideal one and score above 1.
 */

import type { ListScore, RankedList } from '../types/ranking.js';
import type { ScoringOptions } from '../types/metric.js';
import { DEGENERATE, binaryRelevance, perListWeight, sum } from './list-weights.js';

function discountedCumulativeGain(
  gains: readonly number[],
  weights: readonly number[],
  cutoff: number,
  options: ScoringOptions,
): number {
  let dcg = 0;
  for (let i = 0; i < cutoff; i++) {
    dcg += (gains[i] ?? 0) * (weights[i] ?? 0) * options.rankDiscountFn(i + 1);
  }
  return dcg;
}

/**
 * DCG normalised by the list weight, so that the weighted running mean
 * recovers the weighted gain sum.
 */
export function dcg(list: RankedList, options: ScoringOptions): ListScore {
  if (sum(binaryRelevance(list.labels)) === 0) return DEGENERATE;

  const gains = list.labels.map(options.gainFn);
  const weight = perListWeight(list.weights, gains);
  if (weight === 0) return DEGENERATE;

  const value = discountedCumulativeGain(gains, list.weights, list.cutoff, options) / weight;
  return { value, weight };
}

export function ndcg(list: RankedList, options: ScoringOptions): ListScore {
  if (sum(binaryRelevance(list.labels)) === 0) return DEGENERATE;

  const gains = list.labels.map(options.gainFn);
  const weight = perListWeight(list.weights, gains);

  const actual = discountedCumulativeGain(gains, list.weights, list.cutoff, options);

  const ideal = gains
    .map((gain, i) => ({ label: list.labels[i] ?? 0, gain, weight: list.weights[i] ?? 0 }))
    .sort((a, b) => b.label - a.label || b.gain * b.weight - a.gain * a.weight);
  const idcg = discountedCumulativeGain(
    ideal.map((item) => item.gain),
    ideal.map((item) => item.weight),
    list.cutoff,
    options,
  );

  return { value: idcg > 0 ? actual / idcg : 0, weight };
}
