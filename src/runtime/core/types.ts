/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { Op } from '../../compiler/opcodes.js';
import type { RuntimeError, SyltError } from '../../types.js';
import type { Value } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when `print` runs; defaults to console.log of the formatted value */
  onPrint: (value: Value) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before a sylt function is entered */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called before an extern function is invoked */
  onExternCall?: (event: ExternCallEvent) => void;
  /** Called before each op executes */
  onInstruction?: (event: InstructionEvent) => void;
  /** Called when a run fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a sylt function call */
export interface FunctionCallEvent {
  /** Name of the callee's block */
  name: string;
  args: Value[];
}

/** Event emitted before an extern call */
export interface ExternCallEvent {
  name: string;
  args: Value[];
}

/** Event emitted before each op */
export interface InstructionEvent {
  /** Index of the executing block */
  block: number;
  ip: number;
  op: Op;
  /** Operand stack height before the op */
  depth: number;
}

/** Event emitted when an error occurs */
export interface ErrorEvent {
  error: SyltError;
}

/** Options for run and typecheck */
export interface RuntimeOptions {
  callbacks?: Partial<RuntimeCallbacks>;
  observability?: ObservabilityCallbacks;
}

export type RunResult =
  | { readonly success: true; readonly value: Value }
  | { readonly success: false; readonly errors: RuntimeError[] };

export interface TypecheckResult {
  readonly success: boolean;
  /** One entry per block whose check failed */
  readonly errors: SyltError[];
}
