import type { ListScore } from '../types/ranking.js';

/** Result for lists that cannot be scored; it leaves the running mean untouched. */
export const DEGENERATE: ListScore = { value: 0, weight: 0 };

/** Binary relevance: 1 for a positive label, 0 otherwise. */
export function binaryRelevance(labels: readonly number[]): number[] {
  return labels.map((label) => (label > 0 ? 1 : 0));
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

/**
 * Collapse item weights into one list weight: the relevance-weighted mean
 * of the item weights. 0 when nothing in the list is relevant.
 */
export function perListWeight(
  weights: readonly number[],
  relevance: readonly number[],
): number {
  let weighted = 0;
  let total = 0;
  for (let i = 0; i < relevance.length; i++) {
    const r = relevance[i] ?? 0;
    weighted += (weights[i] ?? 0) * r;
    total += r;
  }
  return total > 0 ? weighted / total : 0;
}
