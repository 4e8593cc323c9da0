/**
 * sylt Runtime
 *
 * Public API for executing compiled programs.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Callbacks, options and results
 *   - values.ts: Value representation, equality, hashing, placeholders
 *   - value-types.ts: Types, unions and the fits relation
 *   - operators.ts: Operator semantics shared by run and typecheck
 *   - upvalue.ts: Captured variable cells
 *   - extern.ts: Host function definitions and overload matching
 *   - vm.ts: The stack machine
 * - ext/: Extern functions linked by default
 */

import type { Program } from '../compiler/program.js';
import type { RunResult, RuntimeOptions, TypecheckResult } from './core/types.js';
import { VM } from './core/vm.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExternCallEvent,
  FunctionCallEvent,
  InstructionEvent,
  ObservabilityCallbacks,
  RunResult,
  RuntimeCallbacks,
  RuntimeOptions,
  TypecheckResult,
} from './core/types.js';

// ============================================================
// VALUES AND TYPES
// ============================================================

export type { Value, ValueOf, ValueTag } from './core/values.js';

export {
  FALSE,
  NIL,
  TRUE,
  UNKNOWN,
  ValueIterator,
  ValueMap,
  ValueSet,
  bool,
  dict,
  float,
  formatValue,
  int,
  iter,
  list,
  set,
  shapeOf,
  str,
  tuple,
  typeOf,
  typeToValue,
  valueFits,
  valuesEqual,
} from './core/values.js';

export type { BlobShape, Type, TypeKind } from './core/value-types.js';

export {
  BOOL,
  FLOAT,
  INT,
  STRING,
  UNKNOWN_TYPE,
  VOID,
  dictOf,
  formatType,
  functionOf,
  iterOf,
  listOf,
  setOf,
  tupleOf,
  typeEquals,
  typeFits,
  unionOf,
} from './core/value-types.js';

// ============================================================
// EXTERN FUNCTIONS
// ============================================================

export type { ExternFunction, ExternOverload, ParamPattern } from './core/extern.js';

export { defineExtern } from './core/extern.js';

export { STANDARD_EXTERNS } from './ext/builtins.js';

// ============================================================
// EXECUTION
// ============================================================

export { VM } from './core/vm.js';

/** Run a compiled program on a fresh VM */
export function run(program: Program, options: RuntimeOptions = {}): RunResult {
  return new VM(program, options).run();
}

/** Typecheck a compiled program on a fresh VM */
export function typecheck(program: Program, options: RuntimeOptions = {}): TypecheckResult {
  return new VM(program, options).typecheck();
}
