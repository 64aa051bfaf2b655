import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ok, err } from 'neverthrow';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../types/errors.js';
import type { MetricConfigRecord } from '../types/metric.js';
import { formatZodErrors, parseMetricConfigRecord, defaultMetricName } from '../metric/metric-config.js';
import { defaultMetricConfigs } from '../metric/registry.js';

export const CONFIG_FILE_NAME = '.rankeval.yaml';

export interface EvalConfig {
  version: string;
  /** Lists fed to the metrics per update. */
  batchSize: number;
  metrics: MetricConfigRecord[];
}

// --- Zod Schemas ---

const evalConfigSchema = z.object({
  version: z.string().min(1, 'Version must not be empty'),
  batchSize: z.number().int('batchSize must be an integer').positive('batchSize must be positive'),
  metrics: z.array(z.unknown()).min(1, 'At least one metric is required'),
});

// --- Defaults ---

export function defaultEvalConfig(): EvalConfig {
  return {
    version: '1',
    batchSize: 32,
    metrics: defaultMetricConfigs(),
  };
}

// --- Environment variable interpolation ---

const ENV_REFERENCE = /\$\{([^}]+)\}/g;

/** Fields that take a number, so a value supplied through `${NAME}` is read as one. */
const NUMERIC_FIELDS: ReadonlySet<string> = new Set(['batchSize', 'topn', 'alpha', 'seed']);

function resolveString(value: string, field: string | undefined, missing: Set<string>): string | number {
  let substituted = false;
  const resolved = value.replace(ENV_REFERENCE, (reference, name: string) => {
    const envValue = process.env[name];
    if (envValue === undefined) {
      missing.add(name);
      return reference;
    }
    substituted = true;
    return envValue;
  });

  if (substituted && field !== undefined && NUMERIC_FIELDS.has(field) && resolved.trim() !== '') {
    const asNumber = Number(resolved);
    if (Number.isFinite(asNumber)) return asNumber;
  }
  return resolved;
}

function resolveNode(node: unknown, field: string | undefined, missing: Set<string>): unknown {
  if (typeof node === 'string') return resolveString(node, field, missing);
  if (Array.isArray(node)) return node.map((item) => resolveNode(item, undefined, missing));
  if (node !== null && typeof node === 'object') {
    return Object.fromEntries(
      Object.entries(node).map(([key, value]) => [key, resolveNode(value, key, missing)]),
    );
  }
  return node;
}

/**
 * Replace `${NAME}` references in every string of a parsed YAML document.
 * Under `batchSize`, `topn`, `alpha` and `seed` a substituted value that
 * reads as a number becomes one. Every unset name is reported at once.
 */
export function interpolateEnvVars(document: unknown): Result<unknown, ConfigError> {
  const missing = new Set<string>();
  const resolved = resolveNode(document, undefined, missing);
  if (missing.size > 0) {
    return err(new ConfigError(`Missing environment variable(s): ${[...missing].join(', ')}`));
  }
  return ok(resolved);
}

// --- Helpers ---

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function applyDefaults(partial: Record<string, unknown>): Record<string, unknown> {
  const defaults = defaultEvalConfig();
  return {
    version: partial['version'] ?? defaults.version,
    batchSize: partial['batchSize'] ?? defaults.batchSize,
    metrics: partial['metrics'] ?? defaults.metrics,
  };
}

/**
 * Validate a parsed config document. Metric entries get a default name
 * when none is given.
 */
export function parseEvalConfig(document: unknown): Result<EvalConfig, ConfigError> {
  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const interpolated = interpolateEnvVars(document);
  if (interpolated.isErr()) {
    return err(interpolated.error);
  }
  if (interpolated.value === null || typeof interpolated.value !== 'object') {
    return err(new ConfigError('Config file is empty or not a valid YAML object'));
  }

  const validation = evalConfigSchema.safeParse(applyDefaults(Object.fromEntries(Object.entries(interpolated.value))));
  if (!validation.success) {
    return err(new ConfigError(`Config validation failed: ${formatZodErrors(validation.error)}`));
  }

  const metrics: MetricConfigRecord[] = [];
  for (const [index, entry] of validation.data.metrics.entries()) {
    const record = parseMetricConfigRecord(entry);
    if (record.isErr()) {
      return err(new ConfigError(`Config validation failed: metrics.${index}: ${record.error.message}`));
    }
    const { name, ...rest } = record.value;
    metrics.push({ ...rest, name: name ?? defaultMetricName(rest.key, rest.topn) });
  }

  return ok({
    version: validation.data.version,
    batchSize: validation.data.batchSize,
    metrics,
  });
}

// --- Main ---

/**
 * Load `.rankeval.yaml` from `rootDir`. A missing file yields the default
 * configuration; an unreadable or invalid one is an error.
 */
export async function loadEvalConfig(rootDir: string): Promise<Result<EvalConfig, ConfigError>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return ok(defaultEvalConfig());
    }
    const message = error instanceof Error ? error.message : String(error);
    return err(new ConfigError(`Cannot read config file ${configPath}: ${message}`));
  }

  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    return err(new ConfigError(`Invalid YAML in config file: ${message}`));
  }

  return parseEvalConfig(parsed);
}
