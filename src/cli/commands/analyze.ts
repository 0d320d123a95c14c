import fs from 'fs';
import path from 'path';
import ora from 'ora';
import { Command } from 'commander';
import { toRecords } from '@analyzer/structure';
import { StorageDecisionEngine } from '@decision/engine';
import { InvalidJsonError } from '@errors/index';

type AnalyzeCommandOptions = {
  schema?: boolean;
};

/** Decision for a JSON file, as printed by `analyze`. No backend is touched. */
export const analyzeFile = (file: string, engine = new StorageDecisionEngine()) => {
  const raw = fs.readFileSync(file, 'utf-8');
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    throw new InvalidJsonError(path.basename(file), err);
  }
  const { records, isArrayRoot } = toRecords(payload);
  const descriptor = engine.analyze(records, isArrayRoot);
  return { descriptor, decision: engine.decideFromDescriptor(descriptor) };
};

export function registerAnalyze(program: Command) {
  program
    .command('analyze <file>')
    .description('Print the storage decision for a JSON file without writing anything')
    .option('--schema', 'Include the generated schema in the output')
    .action((file: string, options: AnalyzeCommandOptions) => {
      const resolved = path.resolve(process.cwd(), file);
      const spinner = ora(`Analyzing ${path.basename(resolved)}...`).start();
      try {
        const { descriptor, decision } = analyzeFile(resolved);
        spinner.succeed(`${decision.storageType.toUpperCase()} -> ${decision.schemaName}`);
        const output = {
          storageType: decision.storageType,
          schemaName: decision.schemaName,
          reasoning: decision.reasoning,
          policy: decision.policy,
          records: descriptor.recordCount,
          topLevelFields: descriptor.topLevelFields,
          ...(options.schema ? { schema: decision.schema } : {}),
        };
        process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
      } catch (err) {
        spinner.fail(err instanceof Error ? err.message : String(err));
        process.exitCode = 1;
      }
    });
}
