import { Command } from 'commander';
import config from '@config';
import { startServer } from '../../server';

type ServeCommandOptions = {
  port: string;
};

export function registerServe(program: Command) {
  program
    .command('serve')
    .description('Start the upload API against PostgreSQL')
    .option('-p, --port <port>', 'Port to listen on', String(config.port))
    .action(async (options: ServeCommandOptions) => {
      await startServer({ port: Number(options.port) });
    });
}
