#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerEvaluateCommand } from './commands/evaluate.js';
import { registerMetricsCommand } from './commands/metrics.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();
program
  .name('rankeval')
  .description('Ranking quality metrics for scored lists')
  .version(pkg.version);

registerEvaluateCommand(program);
registerMetricsCommand(program);

program.parse();
