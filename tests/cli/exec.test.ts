/**
 * sylt CLI Tests: execution pipeline
 */

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import {
  compileToFile,
  executeFile,
  type ExecOptions,
} from '../../src/cli-exec.js';
import { formatValue } from '../../src/index.js';

describe('sylt execution pipeline', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sylt-exec-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function writeSource(name: string, content: string): Promise<string> {
    const file = path.join(tempDir, name);
    await fs.writeFile(file, content);
    return file;
  }

  function options(printed: string[], overrides: Partial<ExecOptions> = {}): ExecOptions {
    return {
      extension: 'sy',
      binary: false,
      verbosity: 0,
      typecheck: true,
      log: () => undefined,
      onPrint: (value) => printed.push(formatValue(value)),
      ...overrides,
    };
  }

  it('compiles, checks and runs a file', async () => {
    const file = await writeSource('simple.sy', 'print 1 + 2');
    const printed: string[] = [];
    const outcome = await executeFile(file, options(printed));
    expect(outcome.success).toBe(true);
    expect(printed).toEqual(['3']);
  });

  it('loads modules beside the entry file', async () => {
    await writeSource('shapes.sy', 'side := 4\narea := fn -> int {\n  ret side * side\n}');
    const file = await writeSource('uses.sy', 'use shapes\nprint shapes.area()');
    const printed: string[] = [];
    await executeFile(file, options(printed));
    expect(printed).toEqual(['16']);
  });

  it('reports missing modules as compile errors', async () => {
    const file = await writeSource('missing.sy', 'use nothing');
    const outcome = await executeFile(file, options([]));
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.stage).toBe('compile');
      expect(outcome.errors[0]?.errorId).toBe('SYLT-C016');
      expect(outcome.errors[0]?.format()).toBe(
        `${file}:1: Cannot find module 'nothing' at ${path.join(tempDir, 'nothing.sy')}`
      );
    }
  });

  it('stops at typecheck errors unless the pass is disabled', async () => {
    const file = await writeSource('typed.sy', 'a := 1\na = "x"\nprint a');
    const outcome = await executeFile(file, options([]));
    expect(outcome.success === false && outcome.stage).toBe('typecheck');

    const printed: string[] = [];
    const unchecked = await executeFile(file, options(printed, { typecheck: false }));
    expect(unchecked.success).toBe(true);
    expect(printed).toEqual(['x']);
  });

  it('reports runtime errors with their stage', async () => {
    const file = await writeSource('crash.sy', 'print 1 / 0');
    const outcome = await executeFile(file, options([]));
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.stage).toBe('runtime');
      expect(outcome.errors[0]?.format()).toBe(`${file}:1: Division by zero`);
    }
  });

  it('logs the listing and a trace when verbose', async () => {
    const file = await writeSource('verbose.sy', 'print 1');
    const logged: string[] = [];
    await executeFile(file, options([], { verbosity: 2, log: (line) => logged.push(line) }));
    expect(logged[0]?.split('\n')[0]).toBe('== 0 /preamble : fn -> void ==');
    expect(logged.slice(1)).toEqual([
      '/preamble 0000 [1] Constant      1 (1)',
      '/preamble 0001 [2] Print',
      '/preamble 0002 [1] Constant      0 (nil)',
      '/preamble 0003 [2] Return',
    ]);
  });

  it('runs a compiled program written by compileToFile', async () => {
    const file = await writeSource('binary.sy', 'f := fn n: int -> int {\n  ret n * 2\n}\nprint f(21)');
    const target = path.join(tempDir, 'binary.syc');
    const built = await compileToFile(file, target, { extension: 'sy', binary: false });
    expect(built.success).toBe(true);

    const printed: string[] = [];
    const outcome = await executeFile(target, options(printed, { binary: true }));
    expect(outcome.success).toBe(true);
    expect(printed).toEqual(['42']);
  });

  it('throws for a missing entry file', async () => {
    await expect(executeFile('/nonexistent.sy', options([]))).rejects.toThrow(
      'File not found: /nonexistent.sy'
    );
  });
});
