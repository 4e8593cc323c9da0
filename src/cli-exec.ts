/**
 * CLI Execution Pipeline
 *
 * Load, compile, typecheck and run a program for the sylt and sylt-time
 * binaries. Every stage reports its errors instead of throwing; only a
 * missing entry file throws.
 */

import * as fs from 'fs/promises';
import { loadProgram } from './cli-module-loader.js';
import { traceObserver } from './cli-shared.js';
import {
  compile,
  deserializeProgram,
  disassemble,
  serializeProgram,
  type Program,
} from './compiler/index.js';
import type { Verbosity } from './config.js';
import {
  STANDARD_EXTERNS,
  VM,
  type ExternFunction,
  type RuntimeOptions,
  type Value,
} from './runtime/index.js';
import type { SyltError } from './types.js';

export interface BuildOptions {
  readonly extension: string;
  /** The file holds a serialized program instead of source */
  readonly binary: boolean;
  readonly externs?: readonly ExternFunction[];
}

export interface ExecOptions extends BuildOptions {
  readonly verbosity: Verbosity;
  readonly typecheck: boolean;
  /** Destination for listings and traces (stderr in the CLI) */
  readonly log: (line: string) => void;
  readonly onPrint?: (value: Value) => void;
}

export type Stage = 'compile' | 'typecheck' | 'runtime';

export type ExecOutcome =
  | { readonly success: true; readonly value: Value }
  | { readonly success: false; readonly stage: Stage; readonly errors: SyltError[] };

export type BuildOutcome =
  | { readonly success: true; readonly program: Program }
  | { readonly success: false; readonly errors: SyltError[] };

/**
 * Produce a program from source (loading every used module) or from a
 * serialized program file.
 *
 * @throws Error if the entry file does not exist
 */
export async function buildProgram(file: string, options: BuildOptions): Promise<BuildOutcome> {
  const externs = options.externs ?? STANDARD_EXTERNS;

  if (options.binary) {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch {
      throw new Error(`File not found: ${file}`);
    }
    return deserializeProgram(text, externs);
  }

  const loaded = await loadProgram(file, { extension: options.extension });
  if (loaded.errors.length > 0) return { success: false, errors: loaded.errors };
  return compile(loaded.program, { externs });
}

/** Compile `file` and write the serialized program to `target` */
export async function compileToFile(
  file: string,
  target: string,
  options: BuildOptions
): Promise<BuildOutcome> {
  const built = await buildProgram(file, options);
  if (built.success) await fs.writeFile(target, serializeProgram(built.program), 'utf-8');
  return built;
}

/** Typecheck (unless disabled) and run an already built program */
export function executeProgram(program: Program, options: ExecOptions): ExecOutcome {
  if (options.verbosity >= 1) options.log(disassemble(program));

  const runtime: RuntimeOptions = {
    ...(options.onPrint ? { callbacks: { onPrint: options.onPrint } } : {}),
    ...(options.verbosity >= 2 ? { observability: traceObserver(program, options.log) } : {}),
  };

  if (options.typecheck) {
    const checked = new VM(program).typecheck();
    if (!checked.success) {
      return { success: false, stage: 'typecheck', errors: checked.errors };
    }
  }

  const result = new VM(program, runtime).run();
  if (!result.success) return { success: false, stage: 'runtime', errors: result.errors };
  return { success: true, value: result.value };
}

/** The whole pipeline for one entry file */
export async function executeFile(file: string, options: ExecOptions): Promise<ExecOutcome> {
  const built = await buildProgram(file, options);
  if (!built.success) return { success: false, stage: 'compile', errors: built.errors };
  return executeProgram(built.program, options);
}
