/**
 * Metrics over binary relevance (label > 0 counts as relevant).
 *
 * Each takes the ranked valid items of one list and returns the list's
 * value and weight. Lists without a relevant item are degenerate.
 */

import type { ListScore, RankedList } from '../types/ranking.js';
import { DEGENERATE, binaryRelevance, perListWeight, sum } from './list-weights.js';

/**
 * Reciprocal rank of the first relevant item within the cutoff.
 * 0 when none appears there.
 */
export function reciprocalRank(list: RankedList): ListScore {
  const relevance = binaryRelevance(list.labels);
  if (sum(relevance) === 0) return DEGENERATE;

  let value = 0;
  for (let i = 0; i < list.cutoff; i++) {
    if (relevance[i] === 1) {
      value = 1 / (i + 1);
      break;
    }
  }

  return { value, weight: perListWeight(list.weights, relevance) };
}

/**
 * Precision@k: weight of relevant items in the top k over the weight of
 * all items in the top k.
 */
export function precision(list: RankedList): ListScore {
  const relevance = binaryRelevance(list.labels);
  if (sum(relevance) === 0) return DEGENERATE;

  let hits = 0;
  let considered = 0;
  for (let i = 0; i < list.cutoff; i++) {
    const w = list.weights[i] ?? 0;
    hits += w * (relevance[i] ?? 0);
    considered += w;
  }

  return {
    value: considered > 0 ? hits / considered : 0,
    weight: perListWeight(list.weights, relevance),
  };
}

/**
 * Recall@k: weight of relevant items in the top k over the weight of every
 * relevant item in the list.
 */
export function recall(list: RankedList): ListScore {
  const relevance = binaryRelevance(list.labels);
  if (sum(relevance) === 0) return DEGENERATE;

  let hits = 0;
  let relevantTotal = 0;
  for (let i = 0; i < relevance.length; i++) {
    const w = (list.weights[i] ?? 0) * (relevance[i] ?? 0);
    relevantTotal += w;
    if (i < list.cutoff) hits += w;
  }

  return {
    value: relevantTotal > 0 ? hits / relevantTotal : 0,
    weight: perListWeight(list.weights, relevance),
  };
}

/**
 * Average precision: precision at the rank of each relevant item within
 * the cutoff, weighted by the item, over the weight of all relevant items.
 */
export function averagePrecision(list: RankedList): ListScore {
  const relevance = binaryRelevance(list.labels);
  if (sum(relevance) === 0) return DEGENERATE;

  let relevantFound = 0;
  let precisionSum = 0;
  let relevantTotal = 0;
  for (let i = 0; i < relevance.length; i++) {
    const r = relevance[i] ?? 0;
    const w = list.weights[i] ?? 0;
    relevantTotal += w * r;
    if (i < list.cutoff && r === 1) {
      relevantFound++;
      // Precision at rank i + 1
      precisionSum += w * (relevantFound / (i + 1));
    }
  }

  return {
    value: relevantTotal > 0 ? precisionSum / relevantTotal : 0,
    weight: perListWeight(list.weights, relevance),
  };
}
