#!/usr/bin/env node
/**
 * CLI Entry Point for the sylt-time binary
 *
 * Compiles a program, runs it once to surface errors, then runs it
 * repeatedly and prints each run's duration in microseconds, one per line.
 * Progress goes to stderr so stdout holds only the timings.
 */

import * as path from 'path';
import { buildProgram } from './cli-exec.js';
import { formatError, formatErrors } from './cli-shared.js';
import { DEFAULT_CONFIG, loadConfig } from './config.js';
import type { Program } from './compiler/index.js';
import { VM } from './runtime/index.js';

export type ParsedTimeArgs =
  | {
      mode: 'time';
      file: string;
      /** Stop after this many runs */
      maxRuns: number | undefined;
      /** Stop starting runs once this many seconds have passed */
      maxSeconds: number | undefined;
    }
  | { mode: 'help' };

export const TIME_USAGE = `Usage:
  sylt-time [options] <file>   Run a program repeatedly and print per-run microseconds

Options:
  -r, --runs <n>    Run at most <n> times
  -t, --time <s>    Stop starting runs after <s> seconds
  -h, --help        Show this help message`;

function count(flag: string, text: string | undefined): number {
  const n = Number(text);
  if (text === undefined || !Number.isInteger(n) || n < 0) {
    throw new Error(`${flag} expects a non-negative integer`);
  }
  return n;
}

export function parseTimeArgs(argv: string[]): ParsedTimeArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }

  let file: string | undefined;
  let maxRuns: number | undefined;
  let maxSeconds: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    switch (arg) {
      case '-r':
      case '--runs':
        maxRuns = count(arg, argv[++i]);
        break;
      case '-t':
      case '--time':
        maxSeconds = count(arg, argv[++i]);
        break;
      default:
        if (arg.startsWith('-')) throw new Error(`Unknown option: ${arg}`);
        if (file !== undefined) throw new Error(`Unexpected argument: ${arg}`);
        file = arg;
    }
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  return { mode: 'time', file, maxRuns, maxSeconds };
}

/**
 * Time repeated runs. Without limits this runs until interrupted.
 *
 * @returns Microseconds per run
 */
export function timeRuns(
  program: Program,
  limits: { maxRuns?: number | undefined; maxSeconds?: number | undefined },
  now: () => number = () => performance.now()
): number[] {
  const quiet = { callbacks: { onPrint: () => undefined } };
  const runtimes: number[] = [];
  const outerStart = now();

  for (;;) {
    if (limits.maxRuns !== undefined && runtimes.length >= limits.maxRuns) break;
    if (limits.maxSeconds !== undefined && now() - outerStart >= limits.maxSeconds * 1000) break;

    const start = now();
    const result = new VM(program, quiet).run();
    const elapsed = now() - start;
    if (!result.success) throw result.errors[0] ?? new Error('run failed');
    runtimes.push(Math.round(elapsed * 1000));
  }
  return runtimes;
}

/**
 * Run the CLI with the given arguments.
 *
 * @returns Process exit code
 */
export async function main(argv: string[]): Promise<number> {
  try {
    const parsed = parseTimeArgs(argv);
    if (parsed.mode === 'help') {
      console.error(TIME_USAGE);
      return 0;
    }

    const config = loadConfig(path.dirname(parsed.file)) ?? DEFAULT_CONFIG;

    console.error('Compiling');
    const built = await buildProgram(parsed.file, {
      extension: config.extension,
      binary: false,
    });
    if (!built.success) {
      console.error(formatErrors(built.errors));
      return 1;
    }

    console.error('Running once');
    const once = new VM(built.program).run();
    if (!once.success) {
      console.error('Runtime error(s):');
      console.error(formatErrors(once.errors));
      return 1;
    }

    console.error('Starting runs');
    for (const runtime of timeRuns(built.program, parsed)) {
      console.log(runtime);
    }
    return 0;
  } catch (err) {
    console.error(formatError(err));
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
