/**
 * CLI command: rankeval evaluate <file>
 *
 * Reads ranked lists from a JSON file (an array of lists or a dense
 * batch) or a JSON Lines file (one list per line), feeds them to the
 * configured metrics in batches and prints the aggregated values.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  MetricSuite,
  RankingInputError,
  getMetric,
  loadEvalConfig,
  parseMetricSpec,
  parseRankingInput,
  type ConfigError,
  type EvalConfig,
  type RankingMetric,
  type RankingList,
} from '@rankeval/core';

/** Aggregated values of one evaluation run. */
export interface EvaluationReport {
  readonly listCount: number;
  readonly batchCount: number;
  readonly metrics: Readonly<Record<string, number>>;
}

function parseJsonLines(content: string): Result<unknown[], RankingInputError> {
  const rows: unknown[] = [];
  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim() ?? '';
    if (line === '') continue;
    try {
      rows.push(JSON.parse(line));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new RankingInputError('invalid_value', `Line ${i + 1}: ${message}`));
    }
  }
  return ok(rows);
}

/**
 * Parse the content of a lists file. `.jsonl` content holds one list per
 * line; anything else is read as a single JSON document.
 */
export function parseListsContent(content: string, filePath: string): Result<RankingList[], RankingInputError> {
  if (extname(filePath) === '.jsonl') {
    return parseJsonLines(content).andThen(parseRankingInput);
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new RankingInputError('invalid_value', `Invalid JSON in ${filePath}: ${message}`));
  }
  return parseRankingInput(document);
}

/** Read and parse a lists file. Read failures reject. */
export async function loadListsFile(filePath: string): Promise<Result<RankingList[], RankingInputError>> {
  const content = await readFile(filePath, 'utf-8');
  return parseListsContent(content, filePath);
}

/**
 * Build the metric suite: `--metric` specs when given, otherwise the
 * metrics of the loaded config.
 */
export function buildSuite(config: EvalConfig, specs: readonly string[]): Result<MetricSuite, ConfigError> {
  if (specs.length === 0) {
    return MetricSuite.fromConfigs(config.metrics);
  }

  const metrics: RankingMetric[] = [];
  for (const spec of specs) {
    const metric = parseMetricSpec(spec).andThen(({ key, topn }) =>
      getMetric(key, topn !== undefined ? { topn } : {}),
    );
    if (metric.isErr()) return err(metric.error);
    metrics.push(metric.value);
  }
  return MetricSuite.fromMetrics(metrics);
}

/**
 * Reset the suite, then feed it `lists` in batches of `batchSize`.
 * Stops at the first rejected batch.
 */
export function evaluateLists(
  suite: MetricSuite,
  lists: readonly RankingList[],
  batchSize: number,
): Result<EvaluationReport, RankingInputError> {
  suite.reset();

  let batchCount = 0;
  for (let start = 0; start < lists.length; start += batchSize) {
    const updated = suite.update(lists.slice(start, start + batchSize));
    if (updated.isErr()) {
      return err(new RankingInputError(
        updated.error.kind,
        `Batch ${batchCount + 1} (lists ${start}-${Math.min(start + batchSize, lists.length) - 1}): ${updated.error.message}`,
      ));
    }
    batchCount++;
  }

  return ok({
    listCount: lists.length,
    batchCount,
    metrics: suite.result(),
  });
}

/**
 * Format a report for the terminal.
 */
export function formatReport(report: EvaluationReport): string {
  const lines: string[] = [];
  const names = Object.keys(report.metrics);
  const width = Math.max(0, ...names.map((name) => name.length));

  lines.push(chalk.bold('Ranking Evaluation'));
  lines.push('');
  lines.push(`  Lists:   ${chalk.cyan(String(report.listCount))}`);
  lines.push(`  Batches: ${chalk.cyan(String(report.batchCount))}`);
  lines.push('');

  for (const name of names) {
    const value = report.metrics[name] ?? 0;
    lines.push(`  ${name.padEnd(width)}  ${chalk.green(value.toFixed(4))}`);
  }

  return lines.join('\n');
}

export function formatReportJSON(report: EvaluationReport): string {
  return JSON.stringify(report, null, 2);
}

function collectSpec(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Compute ranking metrics over lists read from a JSON or JSON Lines file')
    .argument('<file>', 'Lists file (.json or .jsonl)')
    .option('-c, --config <dir>', 'Directory holding .rankeval.yaml', process.cwd())
    .option('-m, --metric <spec>', 'Metric as <key> or <key>@<topn>; repeatable', collectSpec, [])
    .option('--json', 'Output in JSON format')
    .action(async (file: string, options: { config: string; metric: string[]; json?: boolean }) => {
      try {
        const configResult = await loadEvalConfig(resolve(options.config));
        if (configResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Config error:'), configResult.error.message);
          process.exit(1);
        }
        const config = configResult.value;

        const suiteResult = buildSuite(config, options.metric);
        if (suiteResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Metric error:'), suiteResult.error.message);
          process.exit(1);
        }

        const listsResult = await loadListsFile(resolve(file));
        if (listsResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Input error:'), listsResult.error.message);
          process.exit(1);
        }

        const reportResult = evaluateLists(suiteResult.value, listsResult.value, config.batchSize);
        if (reportResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(`Evaluation failed [${reportResult.error.kind}]:`), reportResult.error.message);
          process.exit(1);
        }

        if (options.json) {
          // eslint-disable-next-line no-console
          console.log(formatReportJSON(reportResult.value));
        } else {
          // eslint-disable-next-line no-console
          console.log(formatReport(reportResult.value));
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Evaluation failed:'), message);
        process.exit(1);
      }
    });
}
