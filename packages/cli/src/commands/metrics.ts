import { Command } from 'commander';
import chalk from 'chalk';
import {
  METRIC_DESCRIPTIONS,
  RANKING_METRIC_KEYS,
  SUBTOPIC_METRIC_KEYS,
  UNCUT_METRIC_KEYS,
  type RankingMetricKey,
} from '@rankeval/core';

export interface MetricInfo {
  readonly key: RankingMetricKey;
  readonly description: string;
  readonly acceptsTopn: boolean;
  readonly needsSubtopics: boolean;
}

export function listMetrics(): MetricInfo[] {
  return RANKING_METRIC_KEYS.map((key) => ({
    key,
    description: METRIC_DESCRIPTIONS[key],
    acceptsTopn: !UNCUT_METRIC_KEYS.includes(key),
    needsSubtopics: SUBTOPIC_METRIC_KEYS.includes(key),
  }));
}

/**
 * One line per metric: key, description, then tags such as `@topn`.
 */
export function formatMetricList(metrics: readonly MetricInfo[]): string {
  const width = Math.max(0, ...metrics.map((metric) => metric.key.length));
  const lines: string[] = [chalk.bold('Available metrics'), ''];

  for (const metric of metrics) {
    const tags: string[] = [];
    if (metric.acceptsTopn) tags.push('@topn');
    if (metric.needsSubtopics) tags.push('subtopics');
    const suffix = tags.length > 0 ? ` ${chalk.dim(`[${tags.join(', ')}]`)}` : '';
    lines.push(`  ${chalk.cyan(metric.key.padEnd(width))}  ${metric.description}${suffix}`);
  }

  return lines.join('\n');
}

export function registerMetricsCommand(program: Command): void {
  program
    .command('metrics')
    .description('List the available ranking metrics')
    .option('--json', 'Output in JSON format')
    .action((options: { json?: boolean }) => {
      const metrics = listMetrics();
      if (options.json) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(metrics, null, 2));
      } else {
        // eslint-disable-next-line no-console
        console.log(formatMetricList(metrics));
      }
    });
}
