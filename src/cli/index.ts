#!/usr/bin/env node
import { Command } from 'commander';
import { logger } from '@telemetry/index';
import { registerAnalyze } from './commands/analyze';
import { registerServe } from './commands/serve';

const program = new Command();
program.name('storesense').description('Route uploads to the storage that fits them');

registerAnalyze(program);
registerServe(program);

program.parseAsync(process.argv).catch((err) => {
  logger.error({ err }, 'Command failed');
  process.exit(1);
});
