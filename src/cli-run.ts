#!/usr/bin/env node
/**
 * CLI Entry Point for the sylt binary
 *
 * Compiles, typechecks and runs a program, or writes the compiled program
 * to a file with -c. Settings come from .sylt.yaml beside the entry file;
 * flags override them.
 */

import * as path from 'path';
import { compileToFile, executeFile } from './cli-exec.js';
import { formatError, formatErrors, readVersion } from './cli-shared.js';
import { DEFAULT_CONFIG, loadConfig, type Verbosity } from './config.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'run';
      file: string;
      /** The file is a compiled program */
      binary: boolean;
      /** Write the compiled program here instead of running it */
      compileTarget: string | undefined;
      verbosity: Verbosity | undefined;
      typecheck: boolean | undefined;
    }
  | { mode: 'help' | 'version' };

export const USAGE = `Usage:
  sylt [options] <file>       Compile, typecheck and run a program

Options:
  -c, --compile <out>   Write the compiled program to <out> instead of running it
  -r, --run-compiled    <file> is a compiled program
  -v, -vv               Print the bytecode listing; -vv also traces execution
  --no-typecheck        Skip the typecheck pass
  -h, --help            Show this help message
  --version             Show version information`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  let file: string | undefined;
  let binary = false;
  let compileTarget: string | undefined;
  let verbosity: Verbosity | undefined;
  let typecheck: boolean | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    switch (arg) {
      case '-c':
      case '--compile': {
        const target = argv[i + 1];
        if (target === undefined || target.startsWith('-')) {
          throw new Error(`Missing output file after ${arg}`);
        }
        compileTarget = target;
        i++;
        break;
      }
      case '-r':
      case '--run-compiled':
        binary = true;
        break;
      case '-v':
        verbosity = verbosity === undefined ? 1 : 2;
        break;
      case '-vv':
        verbosity = 2;
        break;
      case '--no-typecheck':
        typecheck = false;
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
  if (binary && compileTarget !== undefined) {
    throw new Error('Cannot combine -r and -c');
  }

  return { mode: 'run', file, binary, compileTarget, verbosity, typecheck };
}

/**
 * Run the CLI with the given arguments.
 *
 * @returns Process exit code
 */
export async function main(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(await readVersion());
        return 0;

      case 'run': {
        const config = loadConfig(path.dirname(parsed.file)) ?? DEFAULT_CONFIG;
        const build = { extension: config.extension, binary: parsed.binary };

        if (parsed.compileTarget !== undefined) {
          const built = await compileToFile(parsed.file, parsed.compileTarget, build);
          if (built.success) return 0;
          console.error(formatErrors(built.errors));
          return 1;
        }

        const outcome = await executeFile(parsed.file, {
          ...build,
          verbosity: parsed.verbosity ?? config.verbosity,
          typecheck: parsed.typecheck ?? config.typecheck,
          log: (line) => console.error(line),
        });
        if (outcome.success) return 0;
        console.error(formatErrors(outcome.errors));
        return 1;
      }
    }
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
