import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { ConfigError } from '../types/errors.js';
import {
  RANKING_METRIC_KEYS,
  UNCUT_METRIC_KEYS,
  isRankingMetricKey,
  type MetricConfigRecord,
  type MetricOptions,
  type RankingMetricKey,
  type ResolvedMetricOptions,
} from '../types/metric.js';

/** alpha-DCG redundancy penalty when none is given. */
export const DEFAULT_ALPHA = 0.5;

/** Metric kinds that accept custom gain and discount functions. */
const GAIN_METRIC_KEYS: readonly RankingMetricKey[] = ['dcg', 'ndcg', 'alpha_dcg'];

// --- Zod Schemas ---

export const metricConfigRecordSchema = z.object({
  key: z.enum(RANKING_METRIC_KEYS),
  name: z.string().min(1, 'Metric name must not be empty').optional(),
  topn: z.number().int('topn must be an integer').positive('topn must be positive').optional(),
  alpha: z.number().min(0, 'alpha must be between 0 and 1').max(1, 'alpha must be between 0 and 1').optional(),
  seed: z.number().int('seed must be an integer').optional(),
});

export type MetricConfigInput = z.infer<typeof metricConfigRecordSchema>;

// --- Helpers ---

/** One `field.path: message` entry per issue; top-level issues read `root`. */
export function formatZodErrors(error: z.ZodError): string {
  return error.issues.map(({ path, message }) => `${path.join('.') || 'root'}: ${message}`).join('; ');
}

/** Default display name: the key, suffixed with the cutoff when there is one. */
export function defaultMetricName(key: RankingMetricKey, topn?: number): string {
  return topn !== undefined ? `${key}_${topn}` : key;
}

/**
 * Validate a plain configuration record, e.g. one restored from a
 * checkpoint or read from YAML.
 */
export function parseMetricConfigRecord(input: unknown): Result<MetricConfigInput, ConfigError> {
  if (input === null || typeof input !== 'object') {
    return err(new ConfigError('Metric config must be an object'));
  }

  const key = 'key' in input ? input.key : undefined;
  if (typeof key !== 'string') {
    return err(new ConfigError('Metric key must be a string'));
  }
  if (!isRankingMetricKey(key)) {
    return err(new ConfigError(`Unsupported metric: ${key}`));
  }

  const parsed = metricConfigRecordSchema.safeParse(input);
  if (!parsed.success) {
    return err(new ConfigError(`Invalid config for metric ${key}: ${formatZodErrors(parsed.error)}`));
  }

  const record = parsed.data;
  if (record.topn !== undefined && UNCUT_METRIC_KEYS.includes(record.key)) {
    return err(new ConfigError(`Metric ${record.key} scores the whole list and takes no topn`));
  }
  if (record.alpha !== undefined && record.key !== 'alpha_dcg') {
    return err(new ConfigError(`alpha only applies to alpha_dcg, not ${record.key}`));
  }

  return ok(record);
}

/** Validate construction options once and fill in defaults. */
export function resolveMetricOptions(options: MetricOptions): Result<ResolvedMetricOptions, ConfigError> {
  const { gainFn, rankDiscountFn, ...fields } = options;

  return parseMetricConfigRecord(fields).andThen((record): Result<ResolvedMetricOptions, ConfigError> => {
    if ((gainFn !== undefined || rankDiscountFn !== undefined) && !GAIN_METRIC_KEYS.includes(record.key)) {
      return err(new ConfigError(`Metric ${record.key} does not use gain or discount functions`));
    }

    return ok({
      key: record.key,
      name: record.name ?? defaultMetricName(record.key, record.topn),
      topn: record.topn,
      alpha: record.alpha ?? DEFAULT_ALPHA,
      seed: record.seed,
      gainFn,
      rankDiscountFn,
    });
  });
}

/** Plain record of resolved options, without functions. */
export function toConfigRecord(options: ResolvedMetricOptions): MetricConfigRecord {
  return {
    key: options.key,
    name: options.name,
    ...(options.topn !== undefined ? { topn: options.topn } : {}),
    ...(options.key === 'alpha_dcg' ? { alpha: options.alpha } : {}),
    ...(options.seed !== undefined ? { seed: options.seed } : {}),
  };
}
