/**
 * Label value used to pad short lists inside a dense batch.
 * Any negative label marks its item as invalid.
 */
export const PADDING_LABEL = -1;

/**
 * One query's candidate items with their relevance judgments and
 * predicted scores. All present arrays are parallel.
 */
export interface RankingList {
  /** Relevance judgments; higher is more relevant, negative means padding. */
  readonly labels: readonly number[];
  /** Predicted scores; higher ranks earlier. */
  readonly scores: readonly number[];
  /** Non-negative item weights. Defaults to 1 for every item. */
  readonly weights?: readonly number[];
  /**
   * Explicit validity flags. When absent, an item is valid iff its label
   * is finite and non-negative.
   */
  readonly mask?: readonly boolean[];
  /** Subtopic ids covered by each item (diversity metrics only). */
  readonly subtopics?: readonly (readonly number[])[];
}

/**
 * Rectangular batch, one row per list. Short lists are padded with
 * {@link PADDING_LABEL} so that every row shares one length.
 */
export interface DenseBatch {
  readonly labels: readonly (readonly number[])[];
  readonly scores: readonly (readonly number[])[];
  /** Per-item weight matrix, or one weight per list. */
  readonly weights?: readonly (readonly number[])[] | readonly number[];
  readonly mask?: readonly (readonly boolean[])[];
  readonly subtopics?: readonly (readonly (readonly number[])[])[];
}

/** An ordered sequence of lists; lengths may differ between lists. */
export type RankingBatch = readonly RankingList[];

/**
 * External weight applied on top of the per-list metric weight.
 *
 * - a scalar scales every list
 * - a vector holds one factor per list
 * - a matrix holds one factor per item and is folded into item weights
 */
export type SampleWeight =
  | number
  | readonly number[]
  | readonly (readonly number[])[];

/** A list after validation: validity resolved, weights filled in. */
export interface PreparedList {
  readonly labels: readonly number[];
  readonly scores: readonly number[];
  readonly weights: readonly number[];
  readonly mask: readonly boolean[];
  readonly subtopics: readonly (readonly number[])[] | undefined;
}

/**
 * Valid items of a list in ranked order. Invalid items are dropped, so
 * index `i` holds the item at rank `i + 1`.
 */
export interface RankedList {
  readonly labels: readonly number[];
  readonly scores: readonly number[];
  readonly weights: readonly number[];
  readonly subtopics: readonly (readonly number[])[] | undefined;
  /** Number of leading positions the metric considers. */
  readonly cutoff: number;
}

/** The value a metric assigns to one list, and that list's weight. */
export interface ListScore {
  readonly value: number;
  readonly weight: number;
}
