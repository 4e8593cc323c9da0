/**
 * Virtual Machine
 *
 * Executes compiled blocks on one operand stack. A call frame owns a
 * window of the stack starting at its base: slot 0 holds the callee,
 * parameters and locals follow. Globals are the entry frame's slots 1..n.
 *
 * The same bytecode runs in two modes:
 * - run: the real execution.
 * - typecheck: every block runs once, top to bottom. Jumps are not taken,
 *   calls produce a placeholder of the callee's return type instead of
 *   entering it, and function blocks are checked one after another as
 *   their closures are first created.
 */

import type { Block, Program } from '../../compiler/program.js';
import type { Op } from '../../compiler/opcodes.js';
import {
  ExternError,
  ExternTypeMismatchError,
  RuntimeError,
  SyltError,
  TypeCheckError,
  type ErrorSite,
} from '../../error-classes.js';
import type { ExternFunction } from './extern.js';
import {
  arithmetic,
  assignIndex,
  compare,
  contains,
  equal,
  getIndex,
  logic,
  negate,
  not,
  unionValue,
} from './operators.js';
import type {
  ObservabilityCallbacks,
  RunResult,
  RuntimeOptions,
  TypecheckResult,
} from './types.js';
import { Upvalue, closedUpvalue } from './upvalue.js';
import { VOID, formatType, typeFits, type Type } from './value-types.js';
import {
  NIL,
  UNKNOWN,
  dict,
  formatValue,
  list,
  set,
  tuple,
  typeOf,
  typeToValue,
  type Value,
  type ValueOf,
} from './values.js';

type FunctionValue = ValueOf<'Function'>;

interface CallFrame {
  readonly blockIndex: number;
  readonly block: Block;
  readonly base: number;
  readonly callee: FunctionValue;
  ip: number;
}

/** Rebuild an error with the site of the op that raised it */
function withSite(error: SyltError, site: ErrorSite): SyltError {
  if (error.site) return error;
  if (error instanceof ExternTypeMismatchError) {
    return new ExternTypeMismatchError(error.functionName, error.argumentTypes, site);
  }
  if (error instanceof ExternError) {
    return new ExternError(error.functionName, error.detail, site);
  }
  if (error instanceof TypeCheckError) {
    return new TypeCheckError(error.errorId, error.context ?? {}, site);
  }
  if (error instanceof RuntimeError) {
    return new RuntimeError(error.errorId, error.context ?? {}, site);
  }
  return error;
}

function asTypeError(error: SyltError): TypeCheckError {
  if (error instanceof TypeCheckError) return error;
  return new TypeCheckError(
    'SYLT-T007',
    { message: error.message, cause: error.errorId },
    error.site
  );
}

function mismatch(errorId: string, context: Record<string, string | number>): TypeCheckError {
  return new TypeCheckError(errorId, context);
}

function isBoolLike(value: Value): boolean {
  if (value.type === 'Union') return value.variants.every(isBoolLike);
  return value.type === 'Bool' || value.type === 'Unknown';
}

function defaultPrint(value: Value): void {
  console.log(formatValue(value));
}

// ============================================================
// VM
// ============================================================

export class VM {
  private readonly stack: Value[] = [];
  private readonly frames: CallFrame[] = [];
  private openUpvalues: Upvalue[] = [];
  private checking = false;
  private busy = false;

  /** Function blocks waiting to be typechecked, in discovery order */
  private pending: { block: number; fn: FunctionValue }[] = [];
  private queued = new Set<number>();

  private readonly onPrint: (value: Value) => void;
  private readonly observability: ObservabilityCallbacks;

  constructor(
    readonly program: Program,
    options: RuntimeOptions = {}
  ) {
    this.onPrint = options.callbacks?.onPrint ?? defaultPrint;
    this.observability = options.observability ?? {};
  }

  /** Execute the entry block to completion or to the first runtime error */
  run(): RunResult {
    if (this.busy) return { success: false, errors: [this.fault('the VM is already running')] };
    this.busy = true;
    this.checking = false;
    try {
      this.reset();
      this.enterEntry();
      return { success: true, value: this.execute() };
    } catch (err) {
      if (!(err instanceof RuntimeError)) throw err;
      this.observability.onError?.({ error: err });
      return { success: false, errors: [err] };
    } finally {
      this.busy = false;
    }
  }

  /**
   * Check the entry block, then every function block reachable through a
   * closure. The first error in a block ends that block's check.
   */
  typecheck(): TypecheckResult {
    if (this.busy) return { success: false, errors: [this.fault('the VM is already running')] };
    this.busy = true;
    this.checking = true;
    const errors: TypeCheckError[] = [];
    try {
      this.pending = [];
      this.queued = new Set([0]);
      this.reset();
      this.enterEntry();
      this.checkFrame(errors);

      const globals: Value[] = [];
      for (let slot = 0; slot <= this.program.globals; slot++) {
        globals.push(this.stack[slot] ?? NIL);
      }

      for (let i = 0; i < this.pending.length; i++) {
        const next = this.pending[i];
        const block = next ? this.program.blocks[next.block] : undefined;
        if (!next || !block) continue;
        this.reset();
        this.stack.push(...globals);
        const base = this.stack.length;
        this.stack.push(next.fn);
        const params = block.ty.kind === 'Function' ? block.ty.params : [];
        for (const param of params) {
          this.stack.push(typeToValue(param, this.program.blobs));
        }
        this.frames.push({ blockIndex: next.block, block, base, callee: next.fn, ip: 0 });
        this.checkFrame(errors);
      }
      return { success: errors.length === 0, errors };
    } finally {
      this.busy = false;
      this.checking = false;
    }
  }

  // ============================================================
  // FRAMES
  // ============================================================

  private reset(): void {
    this.stack.length = 0;
    this.frames.length = 0;
    this.openUpvalues = [];
  }

  private enterEntry(): void {
    const block = this.program.blocks[0];
    if (!block) throw this.fault('the program has no entry block');
    const entry: FunctionValue = { type: 'Function', upvalues: [], ty: block.ty, block: 0 };
    this.stack.push(entry);
    this.frames.push({ blockIndex: 0, block, base: 0, callee: entry, ip: 0 });
  }

  private get frame(): CallFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw this.fault('no active call frame');
    return frame;
  }

  private fault(detail: string): RuntimeError {
    return new RuntimeError('SYLT-R900', { detail });
  }

  private siteOf(frame: CallFrame, ip: number): ErrorSite {
    return { file: frame.block.files[ip], line: frame.block.lines[ip] ?? 0 };
  }

  // ============================================================
  // DISPATCH LOOPS
  // ============================================================

  private execute(): Value {
    for (;;) {
      const frame = this.frame;
      const ip = frame.ip;
      const op = frame.block.ops[ip];
      if (!op) throw this.fault(`ran past the end of block '${frame.block.name}'`);
      this.observability.onInstruction?.({
        block: frame.blockIndex,
        ip,
        op,
        depth: this.stack.length,
      });
      frame.ip = ip + 1;
      let result: Value | undefined;
      try {
        result = this.step(op, frame);
      } catch (err) {
        throw err instanceof SyltError ? withSite(err, this.siteOf(frame, ip)) : err;
      }
      if (result !== undefined) return result;
    }
  }

  /** Typecheck the current frame's block straight through */
  private checkFrame(errors: TypeCheckError[]): void {
    const frame = this.frame;
    try {
      for (;;) {
        const ip = frame.ip;
        const op = frame.block.ops[ip];
        if (!op) return;
        frame.ip = ip + 1;
        try {
          this.step(op, frame);
        } catch (err) {
          throw err instanceof SyltError ? withSite(err, this.siteOf(frame, ip)) : err;
        }
      }
    } catch (err) {
      if (!(err instanceof SyltError)) throw err;
      const error = asTypeError(err);
      errors.push(error);
      this.observability.onError?.({ error });
    }
  }

  // ============================================================
  // STACK
  // ============================================================

  private push(value: Value): void {
    this.stack.push(value);
  }

  private pop(): Value {
    const value = this.stack.pop();
    if (value === undefined) throw this.fault('stack underflow');
    return value;
  }

  private peek(depth = 0): Value {
    const value = this.stack[this.stack.length - 1 - depth];
    if (value === undefined) throw this.fault('stack underflow');
    return value;
  }

  /** Remove and return the top `count` values, bottom first */
  private popMany(count: number): Value[] {
    if (count > this.stack.length) throw this.fault('stack underflow');
    return this.stack.splice(this.stack.length - count, count);
  }

  private slot(index: number): Value {
    const value = this.stack[index];
    if (value === undefined) throw this.fault(`stack slot ${index} is empty`);
    return value;
  }

  // ============================================================
  // UPVALUES
  // ============================================================

  private upvalue(frame: CallFrame, index: number): Upvalue {
    const upvalue = frame.callee.upvalues[index];
    if (!upvalue) throw this.fault(`upvalue ${index} does not exist`);
    return upvalue;
  }

  /** Reuse the open cell for a slot so every closure shares it */
  private captureSlot(slot: number): Upvalue {
    const open = this.openUpvalues.find((upvalue) => upvalue.slot === slot);
    if (open) return open;
    const upvalue = new Upvalue(this.stack, slot);
    this.openUpvalues.push(upvalue);
    return upvalue;
  }

  /** Close every open cell at or above `from` */
  private closeUpvalues(from: number): void {
    this.openUpvalues = this.openUpvalues.filter((upvalue) => {
      const slot = upvalue.slot;
      if (slot === undefined || slot < from) return true;
      upvalue.close();
      return false;
    });
  }

  // ============================================================
  // TYPE CHECKS
  // ============================================================

  /** Stored values keep their type; nil and unknown accept anything */
  private checkAssign(old: Value | undefined, value: Value): void {
    if (!this.checking || !old || old.type === 'Nil' || old.type === 'Unknown') return;
    this.checkFits('SYLT-T002', typeOf(old), value);
  }

  private checkFits(
    errorId: string,
    expected: Type,
    value: Value,
    context: Record<string, string | number> = {}
  ): void {
    const actual = typeOf(value);
    if (typeFits(expected, actual)) return;
    throw mismatch(errorId, {
      ...context,
      expected: formatType(expected),
      actual: formatType(actual),
    });
  }

  // ============================================================
  // OPS
  // ============================================================

  /** Execute one op; returns the program result when the entry frame returns */
  private step(op: Op, frame: CallFrame): Value | undefined {
    switch (op.op) {
      case 'Constant': {
        const value = this.program.constants[op.index];
        if (!value) throw this.fault(`constant ${op.index} does not exist`);
        this.push(value);
        return undefined;
      }
      case 'Pop':
        this.pop();
        return undefined;
      case 'Copy':
        for (const value of this.stack.slice(this.stack.length - op.count)) {
          this.push(value);
        }
        return undefined;

      case 'ReadLocal':
        this.push(this.slot(frame.base + op.slot));
        return undefined;
      case 'AssignLocal': {
        const value = this.pop();
        const slot = frame.base + op.slot;
        this.checkAssign(this.stack[slot], value);
        this.stack[slot] = value;
        return undefined;
      }
      case 'ReadUpvalue':
        this.push(this.upvalue(frame, op.slot).get());
        return undefined;
      case 'AssignUpvalue': {
        const value = this.pop();
        const upvalue = this.upvalue(frame, op.slot);
        this.checkAssign(upvalue.get(), value);
        upvalue.set(value);
        return undefined;
      }
      case 'ReadGlobal':
        this.push(this.slot(op.slot));
        return undefined;
      case 'AssignGlobal': {
        const value = this.pop();
        this.checkAssign(this.stack[op.slot], value);
        this.stack[op.slot] = value;
        return undefined;
      }

      case 'Add':
      case 'Sub':
      case 'Mul':
      case 'Div': {
        const b = this.pop();
        const a = this.pop();
        this.push(arithmetic(op.op, a, b, this.checking));
        return undefined;
      }
      case 'Neg':
        this.push(negate(this.pop(), this.checking));
        return undefined;
      case 'Not':
        this.push(not(this.pop(), this.checking));
        return undefined;
      case 'Equal': {
        const b = this.pop();
        const a = this.pop();
        this.push(equal(a, b));
        return undefined;
      }
      case 'Less':
      case 'Greater': {
        const b = this.pop();
        const a = this.pop();
        this.push(compare(op.op, a, b, this.checking));
        return undefined;
      }
      case 'And':
      case 'Or': {
        const b = this.pop();
        const a = this.pop();
        this.push(logic(op.op, a, b, this.checking));
        return undefined;
      }
      case 'Contains': {
        const container = this.pop();
        const item = this.pop();
        this.push(contains(item, container, this.checking));
        return undefined;
      }
      case 'Assert': {
        const value = this.peek();
        if (!this.checking && value.type === 'Bool' && !value.value) {
          throw new RuntimeError('SYLT-R008', {});
        }
        return undefined;
      }

      case 'Tuple':
        this.push(tuple(this.popMany(op.count)));
        return undefined;
      case 'List':
        this.push(list(this.popMany(op.count)));
        return undefined;
      case 'Set':
        this.push(set(this.popMany(op.count)));
        return undefined;
      case 'Dict': {
        const flat = this.popMany(op.count);
        const pairs: [Value, Value][] = [];
        for (let i = 0; i + 1 < flat.length; i += 2) {
          const key = flat[i];
          const value = flat[i + 1];
          if (key && value) pairs.push([key, value]);
        }
        this.push(dict(pairs));
        return undefined;
      }
      case 'Instance':
        this.instantiate(op.count);
        return undefined;

      case 'GetIndex': {
        const index = this.pop();
        const target = this.pop();
        this.push(getIndex(target, index, this.checking));
        return undefined;
      }
      case 'AssignIndex': {
        const value = this.pop();
        const index = this.pop();
        const target = this.pop();
        const expected = assignIndex(target, index, value, this.checking);
        if (expected) this.checkFits('SYLT-T002', expected, value);
        return undefined;
      }
      case 'GetField':
        this.push(this.getField(this.pop(), this.fieldName(op.field)));
        return undefined;
      case 'AssignField': {
        const value = this.pop();
        this.assignField(this.pop(), this.fieldName(op.field), value);
        return undefined;
      }

      case 'Print': {
        const value = this.pop();
        if (!this.checking) this.onPrint(value);
        return undefined;
      }
      case 'Define': {
        if (!this.checking) return undefined;
        this.checkFits('SYLT-T001', op.ty, this.peek(), { name: op.name });
        this.stack[this.stack.length - 1] = typeToValue(op.ty, this.program.blobs);
        return undefined;
      }

      case 'Jump':
        if (!this.checking) frame.ip = op.target;
        return undefined;
      case 'JumpIfFalse': {
        const condition = this.pop();
        if (this.checking ? !isBoolLike(condition) : condition.type !== 'Bool') {
          throw new RuntimeError('SYLT-R013', { type: formatType(typeOf(condition)) });
        }
        if (!this.checking && condition.type === 'Bool' && !condition.value) {
          frame.ip = op.target;
        }
        return undefined;
      }
      case 'Unwind':
        if (this.checking) return undefined;
        this.closeUpvalues(this.stack.length - op.count);
        this.stack.length -= op.count;
        frame.ip = op.target;
        return undefined;

      case 'Closure':
        this.push(this.closure(op.block, frame));
        return undefined;
      case 'CloseUpvalue':
        this.closeUpvalues(this.stack.length - 1);
        this.pop();
        return undefined;
      case 'Call':
        if (this.checking) {
          const args = this.popMany(op.args);
          this.push(this.describeCall(this.pop(), args));
        } else {
          this.call(op.args);
        }
        return undefined;
      case 'Return':
        return this.checking ? this.checkReturn(frame) : this.leave(frame);
    }
  }

  // ============================================================
  // CALLS
  // ============================================================

  private call(argc: number): void {
    const callee = this.peek(argc);
    switch (callee.type) {
      case 'Function': {
        const block = this.program.blocks[callee.block];
        if (!block) throw this.fault(`block ${callee.block} does not exist`);
        const expected = block.ty.kind === 'Function' ? block.ty.params.length : 0;
        if (expected !== argc) {
          throw new RuntimeError('SYLT-R007', { expected, actual: argc });
        }
        const base = this.stack.length - argc - 1;
        this.observability.onFunctionCall?.({
          name: block.name,
          args: this.stack.slice(base + 1),
        });
        this.frames.push({ blockIndex: callee.block, block, base, callee, ip: 0 });
        return;
      }
      case 'ExternFunction': {
        const extern = this.extern(callee.index);
        const args = this.popMany(argc);
        this.pop();
        this.observability.onExternCall?.({ name: extern.name, args });
        this.push(this.invokeExtern(extern, args));
        return;
      }
      default:
        throw new RuntimeError('SYLT-R006', { type: formatType(typeOf(callee)) });
    }
  }

  private extern(index: number): ExternFunction {
    const extern = this.program.externs[index];
    if (!extern) throw this.fault(`extern ${index} is not linked`);
    return extern;
  }

  /** Host exceptions that aren't sylt errors become ExternError */
  private invokeExtern(extern: ExternFunction, args: Value[]): Value {
    try {
      return extern.invoke(args);
    } catch (err) {
      if (err instanceof SyltError) throw err;
      throw new ExternError(extern.name, err instanceof Error ? err.message : String(err));
    }
  }

  /** Typecheck a call: verify arguments, produce a placeholder result */
  private describeCall(callee: Value, args: Value[]): Value {
    switch (callee.type) {
      case 'Function': {
        const ty = callee.ty;
        if (ty.kind !== 'Function') return UNKNOWN;
        if (ty.params.length !== args.length) {
          throw new RuntimeError('SYLT-R007', {
            expected: ty.params.length,
            actual: args.length,
          });
        }
        ty.params.forEach((param, i) => {
          const arg = args[i];
          if (arg) this.checkFits('SYLT-T003', param, arg, { index: i + 1 });
        });
        return typeToValue(ty.ret, this.program.blobs);
      }
      case 'ExternFunction': {
        const extern = this.extern(callee.index);
        return typeToValue(extern.describeResult(args.map(typeOf)), this.program.blobs);
      }
      case 'Unknown':
        return UNKNOWN;
      case 'Union':
        return unionValue(callee.variants.map((variant) => this.describeCall(variant, args)));
      default:
        throw new RuntimeError('SYLT-R006', { type: formatType(typeOf(callee)) });
    }
  }

  /** Pop the frame; the result replaces the callee slot */
  private leave(frame: CallFrame): Value | undefined {
    const value = this.pop();
    this.closeUpvalues(frame.base);
    this.stack.length = frame.base;
    this.frames.pop();
    if (this.frames.length === 0) return value;
    this.push(value);
    return undefined;
  }

  /**
   * The implicit `Constant(nil), Return` closing a block is only checked
   * when the block has no explicit return.
   */
  private checkReturn(frame: CallFrame): undefined {
    const value = this.pop();
    const { ops, ty } = frame.block;
    const terminal = frame.ip === ops.length;
    if (terminal && ops.slice(0, -1).some((op) => op.op === 'Return')) return undefined;
    const expected = ty.kind === 'Function' ? ty.ret : VOID;
    this.checkFits('SYLT-T004', expected, value);
    return undefined;
  }

  private closure(index: number, frame: CallFrame): FunctionValue {
    const block = this.program.blocks[index];
    if (!block) throw this.fault(`block ${index} does not exist`);

    const upvalues = block.upvalues.map((descriptor) => {
      if (!descriptor.isLocal) return this.upvalue(frame, descriptor.index);
      const slot = frame.base + descriptor.index;
      // Typecheck closures run after their definer, so capture a snapshot
      if (this.checking) return closedUpvalue(this.stack[slot] ?? UNKNOWN);
      return this.captureSlot(slot);
    });

    const fn: FunctionValue = { type: 'Function', upvalues, ty: block.ty, block: index };
    if (this.checking && !this.queued.has(index)) {
      this.queued.add(index);
      this.pending.push({ block: index, fn });
    }
    return fn;
  }

  // ============================================================
  // BLOBS
  // ============================================================

  private fieldName(index: number): string {
    const name = this.program.strings[index];
    if (name === undefined) throw this.fault(`string ${index} does not exist`);
    return name;
  }

  /** blob (Field value){count} -> instance; omitted fields start as nil */
  private instantiate(count: number): void {
    const pairs = this.popMany(count * 2);
    const blob = this.pop();
    if (this.checking && blob.type === 'Unknown') {
      this.push(UNKNOWN);
      return;
    }
    if (blob.type !== 'Blob') {
      throw new RuntimeError('SYLT-R014', { type: formatType(typeOf(blob)) });
    }
    const shape = this.program.blobs[blob.blob];
    if (!shape) throw this.fault(`blob ${blob.blob} does not exist`);

    const given = new Map<string, Value>();
    for (let i = 0; i + 1 < pairs.length; i += 2) {
      const field = pairs[i];
      const value = pairs[i + 1];
      if (field?.type !== 'Field' || !value) throw this.fault('malformed instance fields');
      const declared = shape.fields.find((candidate) => candidate.name === field.name);
      if (!declared) {
        throw new RuntimeError('SYLT-R005', { blob: shape.name, field: field.name });
      }
      if (this.checking) {
        this.checkFits('SYLT-T005', declared.type, value, {
          field: field.name,
          blob: shape.name,
        });
      }
      given.set(field.name, value);
    }

    const fields = new Map<string, Value>();
    for (const declared of shape.fields) {
      const value = given.get(declared.name);
      if (value === undefined && this.checking && !typeFits(declared.type, VOID)) {
        throw mismatch('SYLT-T006', { blob: shape.name, field: declared.name });
      }
      fields.set(declared.name, value ?? NIL);
    }
    this.push({ type: 'Instance', blob: blob.blob, name: shape.name, fields });
  }

  private getField(target: Value, name: string): Value {
    switch (target.type) {
      case 'Instance': {
        const value = target.fields.get(name);
        if (value === undefined) {
          throw new RuntimeError('SYLT-R005', { blob: target.name, field: name });
        }
        return value;
      }
      case 'Union':
        return unionValue(target.variants.map((variant) => this.getField(variant, name)));
      case 'Unknown':
        if (this.checking) return UNKNOWN;
        break;
      default:
        break;
    }
    throw new RuntimeError('SYLT-R015', { field: name, type: formatType(typeOf(target)) });
  }

  private assignField(target: Value, name: string, value: Value): void {
    if (target.type === 'Instance') {
      const declared = this.program.blobs[target.blob]?.fields.find(
        (field) => field.name === name
      );
      if (!declared) throw new RuntimeError('SYLT-R005', { blob: target.name, field: name });
      if (this.checking) {
        this.checkFits('SYLT-T005', declared.type, value, { field: name, blob: target.name });
        return;
      }
      target.fields.set(name, value);
      return;
    }
    if (this.checking && (target.type === 'Unknown' || target.type === 'Union')) return;
    throw new RuntimeError('SYLT-R015', { field: name, type: formatType(typeOf(target)) });
  }
}
