import fs from 'fs';
import os from 'os';
import path from 'path';
import { Command } from 'commander';
import { analyzeFile, registerAnalyze } from '../../src/cli/commands/analyze';
import { InvalidJsonError } from '@errors/index';

describe('analyze command', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'storesense-cli-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  const cli = () => {
    const program = new Command().exitOverride();
    registerAnalyze(program);
    return program;
  };

  const write = (name: string, content: string) => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  };

  it('decides storage for a JSON file', () => {
    const file = write('people.json', JSON.stringify([{ id: 1, name: 'a' }, { id: 2, name: 'b' }]));
    const { descriptor, decision } = analyzeFile(file);
    expect(descriptor.recordCount).toBe(2);
    expect(decision.storageType).toBe('sql');
    expect(decision.reasoning).toEqual({ consistency: 1, nestingDepth: 1, fieldCount: 2 });
  });

  it('treats a single object as one record', () => {
    const file = write('user.json', JSON.stringify({ user: { id: 1, tags: ['x', 'y'] } }));
    const { descriptor, decision } = analyzeFile(file);
    expect(descriptor.isArrayRoot).toBe(false);
    expect(decision.reasoning.nestingDepth).toBe(2);
  });

  it('rejects invalid JSON', () => {
    const file = write('broken.json', '{"a":');
    expect(() => analyzeFile(file)).toThrow(InvalidJsonError);
  });

  it('prints the decision and sets a failing exit code on errors', async () => {
    const writes: string[] = [];
    const spy = jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });
    try {
      await cli().parseAsync(['node', 'storesense', 'analyze', write('one.json', '[{"a":1}]')]);
      const printed = JSON.parse(writes.filter((chunk) => chunk.startsWith('{')).join(''));
      expect(printed).toMatchObject({ storageType: 'sql', records: 1, topLevelFields: ['a'] });
      expect(printed.schema).toBeUndefined();

      await cli().parseAsync(['node', 'storesense', 'analyze', write('bad.json', 'nope')]);
      expect(process.exitCode).toBe(1);
    } finally {
      spy.mockRestore();
    }
  });
});
