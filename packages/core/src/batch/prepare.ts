/**
 * Batch validation and normalisation.
 *
 * Every check runs before a metric touches its running totals, so a
 * malformed batch never leaves a partial update behind.
 */

import { ok, err, type Result } from 'neverthrow';
import { RankingInputError } from '../types/errors.js';
import type {
  DenseBatch,
  PreparedList,
  RankingBatch,
  RankingList,
  SampleWeight,
} from '../types/ranking.js';

function lengthMismatch(listIndex: number, field: string, expected: number, actual: number): RankingInputError {
  return new RankingInputError(
    'shape_mismatch',
    `List ${listIndex}: ${field} has length ${actual}, expected ${expected}`,
  );
}

/**
 * Validate one list and resolve its validity mask and item weights.
 *
 * `itemFactors`, when given, are multiplied into the item weights.
 */
export function prepareList(
  list: RankingList,
  listIndex: number,
  itemFactors?: readonly number[],
): Result<PreparedList, RankingInputError> {
  const size = list.labels.length;

  if (list.scores.length !== size) {
    return err(lengthMismatch(listIndex, 'scores', size, list.scores.length));
  }
  if (list.weights !== undefined && list.weights.length !== size) {
    return err(lengthMismatch(listIndex, 'weights', size, list.weights.length));
  }
  if (list.mask !== undefined && list.mask.length !== size) {
    return err(lengthMismatch(listIndex, 'mask', size, list.mask.length));
  }
  if (list.subtopics !== undefined && list.subtopics.length !== size) {
    return err(lengthMismatch(listIndex, 'subtopics', size, list.subtopics.length));
  }
  if (itemFactors !== undefined && itemFactors.length !== size) {
    return err(lengthMismatch(listIndex, 'sample weight', size, itemFactors.length));
  }

  const mask: boolean[] = [];
  const weights: number[] = [];

  for (let i = 0; i < size; i++) {
    const label = list.labels[i] ?? Number.NaN;
    const score = list.scores[i] ?? Number.NaN;
    const valid = list.mask !== undefined
      ? list.mask[i] === true
      : Number.isFinite(label) && label >= 0;

    if (valid) {
      if (!Number.isFinite(label) || label < 0) {
        return err(new RankingInputError(
          'invalid_value',
          `List ${listIndex}: item ${i} is marked valid but has label ${label}`,
        ));
      }
      if (!Number.isFinite(score)) {
        return err(new RankingInputError(
          'invalid_value',
          `List ${listIndex}: item ${i} has non-finite score ${score}`,
        ));
      }
    }

    const weight = (list.weights?.[i] ?? 1) * (itemFactors?.[i] ?? 1);
    if (!Number.isFinite(weight) || weight < 0) {
      return err(new RankingInputError(
        'invalid_value',
        `List ${listIndex}: item ${i} has invalid weight ${weight}`,
      ));
    }

    mask.push(valid);
    weights.push(weight);
  }

  return ok({
    labels: list.labels,
    scores: list.scores,
    weights,
    mask,
    subtopics: list.subtopics,
  });
}

/** Validate every list of a batch; the first failing list is reported. */
export function prepareBatch(
  batch: RankingBatch,
  itemFactors?: readonly (readonly number[])[],
): Result<PreparedList[], RankingInputError> {
  const prepared: PreparedList[] = [];
  for (const [listIndex, list] of batch.entries()) {
    const result = prepareList(list, listIndex, itemFactors?.[listIndex]);
    if (result.isErr()) return err(result.error);
    prepared.push(result.value);
  }
  return ok(prepared);
}

/** How an external sample weight applies to a batch. */
export interface SampleWeightPlan {
  /** One factor per list, multiplied into the list weight. */
  readonly listFactors: readonly number[];
  /** One factor per item, multiplied into item weights before scoring. */
  readonly itemFactors: readonly (readonly number[])[] | undefined;
}

function isMatrix(value: readonly unknown[]): value is readonly (readonly number[])[] {
  return value.every((row) => Array.isArray(row));
}

function isVector(value: readonly unknown[]): value is readonly number[] {
  return value.every((entry) => typeof entry === 'number');
}

function checkFactor(value: number): RankingInputError | null {
  if (!Number.isFinite(value) || value < 0) {
    return new RankingInputError('invalid_value', `Sample weight must be finite and non-negative, got ${value}`);
  }
  return null;
}

/**
 * Broadcast an external sample weight against a batch.
 *
 * A scalar applies to every list, a vector of the batch length to each
 * list in turn, a matrix row-for-row to each list's items.
 */
export function planSampleWeight(
  batch: RankingBatch,
  sampleWeight: SampleWeight | undefined,
): Result<SampleWeightPlan, RankingInputError> {
  if (sampleWeight === undefined) {
    return ok({ listFactors: batch.map(() => 1), itemFactors: undefined });
  }

  if (typeof sampleWeight === 'number') {
    const invalid = checkFactor(sampleWeight);
    if (invalid) return err(invalid);
    return ok({ listFactors: batch.map(() => sampleWeight), itemFactors: undefined });
  }

  if (sampleWeight.length !== batch.length) {
    return err(new RankingInputError(
      'shape_mismatch',
      `Sample weight has ${sampleWeight.length} rows for a batch of ${batch.length} lists`,
    ));
  }

  if (isVector(sampleWeight)) {
    for (const factor of sampleWeight) {
      const invalid = checkFactor(factor);
      if (invalid) return err(invalid);
    }
    return ok({ listFactors: sampleWeight, itemFactors: undefined });
  }

  if (isMatrix(sampleWeight)) {
    for (const row of sampleWeight) {
      for (const factor of row) {
        const invalid = checkFactor(factor);
        if (invalid) return err(invalid);
      }
    }
    return ok({ listFactors: batch.map(() => 1), itemFactors: sampleWeight });
  }

  return err(new RankingInputError(
    'shape_mismatch',
    'Sample weight mixes per-list and per-item entries',
  ));
}

function checkRowLengths(
  field: string,
  rows: readonly (readonly unknown[])[],
  batchSize: number,
  listSize: number,
): RankingInputError | null {
  if (rows.length !== batchSize) {
    return new RankingInputError(
      'shape_mismatch',
      `Dense batch: ${field} has ${rows.length} rows, expected ${batchSize}`,
    );
  }
  for (let row = 0; row < rows.length; row++) {
    const length = rows[row]?.length ?? 0;
    if (length !== listSize) {
      return new RankingInputError(
        'shape_mismatch',
        `Dense batch: ${field} row ${row} has length ${length}, expected ${listSize}; pad short lists instead of truncating`,
      );
    }
  }
  return null;
}

/**
 * Split a rectangular batch into lists. Every row must share one length;
 * padded positions carry a negative label.
 */
export function fromDenseBatch(batch: DenseBatch): Result<RankingList[], RankingInputError> {
  const batchSize = batch.labels.length;
  const listSize = batch.labels[0]?.length ?? 0;

  const labelsError = checkRowLengths('labels', batch.labels, batchSize, listSize);
  if (labelsError) return err(labelsError);
  const scoresError = checkRowLengths('scores', batch.scores, batchSize, listSize);
  if (scoresError) return err(scoresError);
  if (batch.mask) {
    const maskError = checkRowLengths('mask', batch.mask, batchSize, listSize);
    if (maskError) return err(maskError);
  }
  if (batch.subtopics) {
    const subtopicsError = checkRowLengths('subtopics', batch.subtopics, batchSize, listSize);
    if (subtopicsError) return err(subtopicsError);
  }

  let perListWeights: readonly number[] | undefined;
  let perItemWeights: readonly (readonly number[])[] | undefined;
  if (batch.weights) {
    if (isMatrix(batch.weights)) {
      const weightsError = checkRowLengths('weights', batch.weights, batchSize, listSize);
      if (weightsError) return err(weightsError);
      perItemWeights = batch.weights;
    } else if (isVector(batch.weights)) {
      if (batch.weights.length !== batchSize) {
        return err(new RankingInputError(
          'shape_mismatch',
          `Dense batch: weights has ${batch.weights.length} entries, expected ${batchSize}`,
        ));
      }
      perListWeights = batch.weights;
    } else {
      return err(new RankingInputError('shape_mismatch', 'Dense batch: weights mixes rows and scalars'));
    }
  }

  const lists: RankingList[] = [];
  for (let row = 0; row < batchSize; row++) {
    const listWeight = perListWeights?.[row];
    const weights = perItemWeights?.[row]
      ?? (listWeight !== undefined ? Array.from({ length: listSize }, () => listWeight) : undefined);
    const mask = batch.mask?.[row];
    const subtopics = batch.subtopics?.[row];

    lists.push({
      labels: batch.labels[row] ?? [],
      scores: batch.scores[row] ?? [],
      ...(weights !== undefined ? { weights } : {}),
      ...(mask !== undefined ? { mask } : {}),
      ...(subtopics !== undefined ? { subtopics } : {}),
    });
  }

  return ok(lists);
}
