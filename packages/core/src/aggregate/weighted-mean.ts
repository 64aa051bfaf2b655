import type { ListScore } from '../types/ranking.js';

/** Running totals of a weighted mean. */
export interface AggregateTotals {
  readonly totalWeightedValue: number;
  readonly totalWeight: number;
}

/**
 * Streaming weighted mean over per-list scores.
 *
 * Keeps two numbers whatever the number of updates. Not synchronised:
 * callers that share one instance must serialise their updates.
 */
export class WeightedMean {
  private totalWeightedValue = 0;
  private totalWeight = 0;

  /**
   * Add a batch of scores, each weight optionally scaled by a factor.
   * Returns the weighted mean of this batch alone (0 if it weighs nothing).
   */
  accumulate(scores: readonly ListScore[], factors?: readonly number[]): number {
    let batchWeightedValue = 0;
    let batchWeight = 0;

    for (let i = 0; i < scores.length; i++) {
      const score = scores[i];
      if (score === undefined) continue;
      const weight = score.weight * (factors?.[i] ?? 1);
      batchWeightedValue += score.value * weight;
      batchWeight += weight;
    }

    this.totalWeightedValue += batchWeightedValue;
    this.totalWeight += batchWeight;

    return batchWeight > 0 ? batchWeightedValue / batchWeight : 0;
  }

  /** Fold in totals gathered elsewhere, e.g. by another shard. */
  merge(other: AggregateTotals): void {
    this.totalWeightedValue += other.totalWeightedValue;
    this.totalWeight += other.totalWeight;
  }

  /** Weighted mean of everything accumulated; 0 before any weight arrives. */
  result(): number {
    return this.totalWeight > 0 ? this.totalWeightedValue / this.totalWeight : 0;
  }

  reset(): void {
    this.totalWeightedValue = 0;
    this.totalWeight = 0;
  }

  get totals(): AggregateTotals {
    return {
      totalWeightedValue: this.totalWeightedValue,
      totalWeight: this.totalWeight,
    };
  }
}
