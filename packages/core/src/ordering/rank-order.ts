/**
 * Ordering and masking shared by every metric.
 *
 * A list is sorted once; the resulting permutation is applied to labels,
 * weights and subtopics so each algorithm only walks a ranked view.
 */

import type { PreparedList, RankedList } from '../types/ranking.js';
import type { SeededRng } from './seed-rng.js';

/**
 * Permutation of item indices by descending score.
 *
 * Invalid items follow all valid items, in input order, whatever their
 * score. Ties between valid items are broken by a key drawn from `rng`
 * when given, otherwise by input order.
 */
export function rankOrder(
  scores: readonly number[],
  mask: readonly boolean[],
  rng?: SeededRng,
): number[] {
  const tieKeys = rng?.drawKeys(scores.length);
  const indices = Array.from({ length: scores.length }, (_, i) => i);

  return indices.sort((a, b) => {
    const validA = mask[a] === true;
    const validB = mask[b] === true;
    if (validA !== validB) return validA ? -1 : 1;
    if (!validA) return a - b;

    const diff = (scores[b] ?? 0) - (scores[a] ?? 0);
    if (diff !== 0) return diff;

    if (tieKeys) {
      const keyDiff = (tieKeys[a] ?? 0) - (tieKeys[b] ?? 0);
      if (keyDiff !== 0) return keyDiff;
    }
    return a - b;
  });
}

/**
 * Resolve the number of leading positions a metric looks at.
 * Unset or oversized cutoffs fall back to the valid length.
 */
export function resolveCutoff(topn: number | undefined, validCount: number): number {
  if (topn === undefined) return validCount;
  return Math.min(topn, validCount);
}

/** The same ranked view with the cutoff resolved for another `topn`. */
export function withCutoff(list: RankedList, topn: number | undefined): RankedList {
  return { ...list, cutoff: resolveCutoff(topn, list.labels.length) };
}

/** Rank a prepared list and keep only its valid items. */
export function toRankedList(
  list: PreparedList,
  topn: number | undefined,
  rng?: SeededRng,
): RankedList {
  const order = rankOrder(list.scores, list.mask, rng);
  const valid = order.filter((index) => list.mask[index] === true);

  const labels: number[] = [];
  const scores: number[] = [];
  const weights: number[] = [];
  const subtopics: (readonly number[])[] = [];

  for (const index of valid) {
    labels.push(list.labels[index] ?? 0);
    scores.push(list.scores[index] ?? 0);
    weights.push(list.weights[index] ?? 0);
    if (list.subtopics) {
      subtopics.push(list.subtopics[index] ?? []);
    }
  }

  return {
    labels,
    scores,
    weights,
    subtopics: list.subtopics ? subtopics : undefined,
    cutoff: resolveCutoff(topn, valid.length),
  };
}
