import type { ListScore, RankedList } from '../types/ranking.js';
import { DEGENERATE } from './list-weights.js';

/**
 * Average relevance position: weighted mean 1-based rank of the relevant
 * items over the whole valid ranking. List weight is the total weight of
 * the relevant items.
 */
export function averageRelevancePosition(list: RankedList): ListScore {
  let positionSum = 0;
  let relevantWeight = 0;

  for (let i = 0; i < list.labels.length; i++) {
    if ((list.labels[i] ?? 0) <= 0) continue;
    const w = list.weights[i] ?? 0;
    positionSum += w * (i + 1);
    relevantWeight += w;
  }

  if (relevantWeight === 0) return DEGENERATE;
  return { value: positionSum / relevantWeight, weight: relevantWeight };
}

/**
 * Ordered pair accuracy over every pair of valid items with different
 * labels. A pair counts as correct when the higher-labelled item scores at
 * least as high as the other; it is weighted by the higher-labelled item.
 */
export function orderedPairAccuracy(list: RankedList): ListScore {
  let correct = 0;
  let total = 0;

  for (let i = 0; i < list.labels.length; i++) {
    const labelI = list.labels[i] ?? 0;
    const scoreI = list.scores[i] ?? 0;
    const w = list.weights[i] ?? 0;

    for (let j = 0; j < list.labels.length; j++) {
      if (labelI <= (list.labels[j] ?? 0)) continue;
      total += w;
      if (scoreI >= (list.scores[j] ?? 0)) correct += w;
    }
  }

  if (total === 0) return DEGENERATE;
  return { value: correct / total, weight: total };
}
