/**
 * sylt Compiler
 * Main entry point and re-exports
 */

import type { ProgramNode } from '../types.js';
import { STANDARD_EXTERNS } from '../runtime/ext/builtins.js';
import { Compiler, type CompileOptions, type CompileResult } from './compiler.js';

// Import extension modules to register prototype methods on Compiler.
// These must be imported AFTER compiler.js to ensure the class is defined.
import './compiler-statements.js';
import './compiler-expr.js';

/**
 * Compile a parsed program. `prog.modules[0]` is the entry module.
 *
 * Returns either the program or every compile error, never both. Each
 * statement reports at most one error.
 *
 * @example
 * ```typescript
 * const result = compile({ type: 'Program', modules: [parsed.ast] });
 * if (result.success) run(result.program);
 * ```
 */
export function compile(prog: ProgramNode, options: CompileOptions = {}): CompileResult {
  const compiler = new Compiler(options.externs ?? STANDARD_EXTERNS);
  return compiler.compileProgram(prog);
}

// ============================================================
// RE-EXPORTS
// ============================================================

export type { CompileOptions, CompileResult, Name, Namespace } from './compiler.js';
export { moduleKey } from './compiler.js';
export type { Op, OpName, NullaryOpName } from './opcodes.js';
export type { Block, Program, UpvalueDescriptor } from './program.js';
export { disassemble, formatOp } from './disassemble.js';
export {
  PROGRAM_FORMAT,
  PROGRAM_VERSION,
  deserializeProgram,
  serializeProgram,
} from './serialize.js';
