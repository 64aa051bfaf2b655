/**
 * Schemas for lists read from untrusted sources such as JSON files.
 * Shapes are checked here; lengths and values by {@link prepareList}.
 */

import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { RankingInputError } from '../types/errors.js';
import type { RankingList } from '../types/ranking.js';
import { fromDenseBatch } from './prepare.js';
import { formatZodErrors } from '../metric/metric-config.js';

const numberRow = z.array(z.number());
const subtopicRow = z.array(z.array(z.number().int()));

export const rankingListSchema = z.object({
  labels: numberRow,
  scores: numberRow,
  weights: numberRow.optional(),
  mask: z.array(z.boolean()).optional(),
  subtopics: subtopicRow.optional(),
});

export const denseBatchSchema = z.object({
  labels: z.array(numberRow),
  scores: z.array(numberRow),
  weights: z.union([z.array(numberRow), numberRow]).optional(),
  mask: z.array(z.array(z.boolean())).optional(),
  subtopics: z.array(subtopicRow).optional(),
});

/**
 * Accept either an array of lists or a dense batch object.
 */
export function parseRankingInput(input: unknown): Result<RankingList[], RankingInputError> {
  if (Array.isArray(input)) {
    const parsed = z.array(rankingListSchema).safeParse(input);
    if (!parsed.success) {
      return err(new RankingInputError('invalid_value', `Invalid lists: ${formatZodErrors(parsed.error)}`));
    }
    return ok(parsed.data);
  }

  const parsed = denseBatchSchema.safeParse(input);
  if (!parsed.success) {
    return err(new RankingInputError('invalid_value', `Invalid dense batch: ${formatZodErrors(parsed.error)}`));
  }
  return fromDenseBatch(parsed.data);
}
