/**
 * Subtopic-aware metrics. An item is relevant to a subtopic when it lists
 * that subtopic id; labels only decide which items are valid.
 */

import type { ListScore, RankedList } from '../types/ranking.js';
import type { ScoringOptions } from '../types/metric.js';
import { DEGENERATE, perListWeight } from './list-weights.js';

function coverage(list: RankedList): Set<number>[] {
  return list.labels.map((_, i) => new Set(list.subtopics?.[i] ?? []));
}

function coversAny(covered: readonly Set<number>[]): number[] {
  return covered.map((set) => (set.size > 0 ? 1 : 0));
}

/**
 * Alpha-DCG.
 *
 * The novelty gain of the item at rank r is
 *   sum over its subtopics s of (1 - alpha)^c_s
 * where c_s counts the higher-ranked items that already cover s. The gain
 * function (identity unless overridden) is applied to that sum, then the
 * rank discount and the item weight. Normalised by the list weight.
 */
export function alphaDcg(list: RankedList, options: ScoringOptions): ListScore {
  const covered = coverage(list);
  const relevance = coversAny(covered);
  const weight = perListWeight(list.weights, relevance);
  if (weight === 0) return DEGENERATE;

  const seen = new Map<number, number>();
  let total = 0;
  for (let i = 0; i < list.cutoff; i++) {
    const subtopics = covered[i] ?? new Set<number>();
    let novelty = 0;
    for (const s of subtopics) {
      const count = seen.get(s) ?? 0;
      novelty += Math.pow(1 - options.alpha, count);
      seen.set(s, count + 1);
    }
    total += options.gainFn(novelty) * (list.weights[i] ?? 0) * options.rankDiscountFn(i + 1);
  }

  return { value: total / weight, weight };
}

/**
 * Intent-aware precision: precision@k per subtopic, averaged uniformly
 * over the subtopics covered anywhere in the valid list.
 */
export function precisionIA(list: RankedList): ListScore {
  const covered = coverage(list);
  const subtopics = new Set<number>();
  for (const set of covered) {
    for (const s of set) subtopics.add(s);
  }
  if (subtopics.size === 0 || list.cutoff === 0) return DEGENERATE;

  let hits = 0;
  for (let i = 0; i < list.cutoff; i++) {
    hits += covered[i]?.size ?? 0;
  }

  return {
    value: hits / (list.cutoff * subtopics.size),
    weight: perListWeight(list.weights, coversAny(covered)),
  };
}
