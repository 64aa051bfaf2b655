import { describe, it, expect, beforeEach } from 'vitest';
import { Command } from 'commander';
import { registerEvaluateCommand } from './commands/evaluate.js';
import { registerMetricsCommand } from './commands/metrics.js';

// --- Program Setup Tests ---

describe('CLI program setup', () => {
  let program: Command;

  beforeEach(() => {
    program = new Command();
    program
      .name('rankeval')
      .description('Ranking quality metrics for scored lists')
      .version('0.1.0');

    registerEvaluateCommand(program);
    registerMetricsCommand(program);
  });

  it('should create program with correct name and version', () => {
    expect(program.name()).toBe('rankeval');
    expect(program.version()).toBe('0.1.0');
  });

  it('should register both commands', () => {
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['evaluate', 'metrics']);
  });

  it('evaluate command should accept a file argument', () => {
    const evaluateCmd = program.commands.find((c) => c.name() === 'evaluate');
    expect(evaluateCmd?.registeredArguments[0]?.name()).toBe('file');
  });

  it('evaluate command should have --config, --metric and --json options', () => {
    const evaluateCmd = program.commands.find((c) => c.name() === 'evaluate');
    const opts = evaluateCmd?.options.map((o) => o.long) ?? [];
    expect(opts).toContain('--config');
    expect(opts).toContain('--metric');
    expect(opts).toContain('--json');
  });

  it('metrics command should have --json option', () => {
    const metricsCmd = program.commands.find((c) => c.name() === 'metrics');
    expect(metricsCmd?.options.map((o) => o.long)).toEqual(['--json']);
  });

  it('should collect repeated --metric values', () => {
    program.exitOverride();
    const evaluateCmd = program.commands.find((c) => c.name() === 'evaluate');
    evaluateCmd?.action(() => undefined);

    program.parse(['evaluate', 'lists.json', '-m', 'mrr', '--metric', 'ndcg@5'], { from: 'user' });

    expect(evaluateCmd?.opts()['metric']).toEqual(['mrr', 'ndcg@5']);
  });
});
