/**
 * Compiler Class - Core
 *
 * Lowers a parsed program to bytecode. Methods are added via prototype
 * extension from separate modules:
 * - compiler-statements.ts: Definitions, assignments, control flow, blocks
 * - compiler-expr.ts: Expressions, assignables, function literals
 *
 * Compilation runs in two passes. Pass 1 walks the top level of every
 * module and assigns global slots, namespace aliases and blob ids, so code
 * may refer to globals defined further down or in other modules. Pass 2
 * emits the entry block: one nil per global, then every module's top-level
 * statements (imported modules first), then `Constant(nil), Return`.
 */

import { basename, extname } from 'node:path';
import type {
  BlobDefinitionNode,
  ModuleNode,
  ProgramNode,
  SourceSpan,
  TypeNode,
} from '../types.js';
import { CompileError, type ErrorSite } from '../types.js';
import type { ExternFunction } from '../runtime/core/extern.js';
import {
  BOOL,
  FLOAT,
  INT,
  STRING,
  UNKNOWN_TYPE,
  VOID,
  dictOf,
  functionOf,
  listOf,
  setOf,
  tupleOf,
  unionOf,
  type BlobShape,
  type Type,
} from '../runtime/core/value-types.js';
import { ConstantPool, StringTable } from './constants.js';
import type { Op } from './opcodes.js';
import type { Block, Program, UpvalueDescriptor } from './program.js';

// ============================================================
// TYPES
// ============================================================

export interface CompileOptions {
  /** Extern functions linked into the program, in index order */
  readonly externs?: readonly ExternFunction[] | undefined;
}

export type CompileResult =
  | { readonly success: true; readonly program: Program }
  | { readonly success: false; readonly errors: CompileError[] };

/** What a top-level identifier of a module refers to */
export type Name =
  | { readonly kind: 'Global'; readonly slot: number; readonly constant: boolean }
  | { readonly kind: 'Namespace'; readonly module: number }
  | { readonly kind: 'Blob'; readonly blob: number };

export interface Namespace {
  /** File stem; the alias other modules `use` */
  readonly key: string;
  readonly file: string;
  readonly names: Map<string, Name>;
  /** Modules imported by this one */
  readonly uses: number[];
}

interface Local {
  readonly name: string;
  readonly depth: number;
  readonly constant: boolean;
  captured: boolean;
}

interface Capture {
  readonly descriptor: UpvalueDescriptor;
  readonly name: string;
  readonly constant: boolean;
}

interface LoopContext {
  /** Scope depth outside the loop body */
  readonly depth: number;
  /** Unwind ops to patch with the loop exit */
  readonly breaks: number[];
}

/** Compile state of one function being emitted */
export interface FunctionFrame {
  readonly block: Block;
  readonly locals: Local[];
  readonly captures: Capture[];
  depth: number;
  readonly loops: LoopContext[];
}

/** Result of looking up an identifier from the current position */
export type Resolution =
  | Name
  | { readonly kind: 'Local'; readonly slot: number; readonly constant: boolean }
  | { readonly kind: 'Upvalue'; readonly slot: number; readonly constant: boolean }
  | { readonly kind: 'Extern'; readonly index: number; readonly name: string };

const ORIGIN: SourceSpan = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
};

const PRIMITIVE_TYPES: Record<string, Type> = {
  int: INT,
  float: FLOAT,
  bool: BOOL,
  str: STRING,
  void: VOID,
  unknown: UNKNOWN_TYPE,
};

/** Namespace key of a module: the file name without directory or extension */
export function moduleKey(file: string): string {
  return basename(file, extname(file));
}

// ============================================================
// COMPILER
// ============================================================

export class Compiler {
  readonly constants = new ConstantPool();
  readonly strings = new StringTable();
  readonly blocks: Block[] = [];
  readonly blobs: BlobShape[] = [];
  readonly namespaces: Namespace[] = [];
  readonly frames: FunctionFrame[] = [];
  readonly errors: CompileError[] = [];

  /** Index of the module whose code is being compiled */
  module = 0;
  /** Set by the first error of a statement; cleared at the next statement */
  panic = false;
  globals = 0;

  private readonly externIndex = new Map<string, number>();
  private modules: ModuleNode[] = [];

  constructor(readonly externs: readonly ExternFunction[]) {}

  compileProgram(prog: ProgramNode): CompileResult {
    this.modules = prog.modules;
    this.registerExterns();
    const pendingBlobs = this.extractGlobals();
    this.resolveBlobs(pendingBlobs);

    const entry = this.newBlock('/preamble', functionOf([], VOID));
    const locals: Local[] = [];
    for (let slot = 0; slot <= this.globals; slot++) {
      locals.push({ name: '', depth: 0, constant: true, captured: false });
    }
    this.frames.push({ block: entry, locals, captures: [], depth: 0, loops: [] });

    this.module = 0;
    const entrySpan = this.modules[0]?.span ?? ORIGIN;
    for (let slot = 1; slot <= this.globals; slot++) {
      this.emit({ op: 'Constant', index: 0 }, entrySpan);
    }
    for (const index of this.moduleOrder()) {
      this.module = index;
      for (const statement of this.modules[index]?.statements ?? []) {
        this.compileStatement(statement);
      }
    }
    this.module = 0;
    const end: SourceSpan = { start: entrySpan.end, end: entrySpan.end };
    this.emit({ op: 'Constant', index: 0 }, end);
    this.emit({ op: 'Return' }, end);
    this.frames.pop();

    if (this.errors.length > 0) {
      return { success: false, errors: this.errors };
    }
    return {
      success: true,
      program: {
        blocks: this.blocks,
        constants: this.constants.values,
        strings: this.strings.strings,
        blobs: this.blobs,
        externs: this.externs,
        globals: this.globals,
      },
    };
  }

  // ============================================================
  // ERRORS
  // ============================================================

  get file(): string {
    return this.namespaces[this.module]?.file ?? '<input>';
  }

  siteOf(span: SourceSpan): ErrorSite {
    return { file: this.file, line: span.start.line, column: span.start.column };
  }

  /** Record an error unless the current statement already reported one */
  error(errorId: string, context: Record<string, unknown>, span: SourceSpan): void {
    if (this.panic) return;
    this.panic = true;
    this.errors.push(new CompileError(errorId, context, this.siteOf(span)));
  }

  // ============================================================
  // PASS 1: GLOBALS
  // ============================================================

  private registerExterns(): void {
    this.externs.forEach((extern, index) => {
      if (this.externIndex.has(extern.name)) {
        this.errors.push(new CompileError('SYLT-C011', { name: extern.name }));
        return;
      }
      this.externIndex.set(extern.name, index);
    });
  }

  /** Assign namespaces, global slots, aliases and blob ids */
  private extractGlobals(): { blob: number; module: number; node: BlobDefinitionNode }[] {
    const byKey = new Map<string, number>();
    this.modules.forEach((module, index) => {
      const key = moduleKey(module.file);
      this.namespaces.push({ key, file: module.file, names: new Map(), uses: [] });
      if (byKey.has(key)) {
        this.module = index;
        this.panic = false;
        this.error('SYLT-C003', { name: key }, module.span);
        return;
      }
      byKey.set(key, index);
    });

    const pendingBlobs: { blob: number; module: number; node: BlobDefinitionNode }[] = [];
    this.modules.forEach((module, index) => {
      this.module = index;
      const namespace = this.namespaces[index];
      if (!namespace) return;

      for (const statement of module.statements) {
        this.panic = false;
        const declare = (name: string, entry: Name): void => {
          if (namespace.names.has(name)) {
            this.error('SYLT-C002', { name }, statement.span);
            return;
          }
          namespace.names.set(name, entry);
        };

        switch (statement.type) {
          case 'Definition':
            if (namespace.names.has(statement.name)) {
              this.error('SYLT-C002', { name: statement.name }, statement.span);
              break;
            }
            this.globals++;
            declare(statement.name, {
              kind: 'Global',
              slot: this.globals,
              constant: statement.constant,
            });
            break;
          case 'Use': {
            const target = byKey.get(statement.module);
            if (target === undefined) {
              this.error('SYLT-C004', { name: statement.module }, statement.span);
              break;
            }
            declare(statement.module, { kind: 'Namespace', module: target });
            namespace.uses.push(target);
            break;
          }
          case 'BlobDefinition': {
            if (namespace.names.has(statement.name)) {
              this.error('SYLT-C002', { name: statement.name }, statement.span);
              break;
            }
            const blob = this.blobs.length;
            this.blobs.push({ name: statement.name, file: module.file, fields: [] });
            declare(statement.name, { kind: 'Blob', blob });
            pendingBlobs.push({ blob, module: index, node: statement });
            break;
          }
          default:
            break;
        }
      }
    });
    return pendingBlobs;
  }

  /** Field types may name blobs declared anywhere, so they resolve after pass 1 */
  private resolveBlobs(
    pending: readonly { blob: number; module: number; node: BlobDefinitionNode }[]
  ): void {
    for (const { blob, module, node } of pending) {
      this.module = module;
      this.panic = false;
      const fields: { name: string; type: Type }[] = [];
      for (const field of node.fields) {
        if (fields.some((existing) => existing.name === field.name)) {
          this.error('SYLT-C014', { field: field.name, blob: node.name }, field.span);
          continue;
        }
        fields.push({ name: field.name, type: this.resolveType(field.annotation) });
      }
      this.blobs[blob] = { name: node.name, file: this.file, fields };
    }
  }

  /** Imported modules before their importers, the entry module last */
  private moduleOrder(): number[] {
    const order: number[] = [];
    const visited = new Set<number>();
    const visit = (index: number): void => {
      if (visited.has(index)) return;
      visited.add(index);
      for (const used of this.namespaces[index]?.uses ?? []) visit(used);
      order.push(index);
    };
    for (let index = 1; index < this.modules.length; index++) visit(index);
    if (this.modules.length > 0) visit(0);
    return order;
  }

  // ============================================================
  // TYPES
  // ============================================================

  resolveType(node: TypeNode): Type {
    switch (node.type) {
      case 'PrimitiveType':
        return PRIMITIVE_TYPES[node.name] ?? UNKNOWN_TYPE;
      case 'NamedType':
        return this.resolveTypeName(node.path, node.span);
      case 'TupleType':
        return tupleOf(node.elements.map((element) => this.resolveType(element)));
      case 'ListType':
        return listOf(this.resolveType(node.element));
      case 'SetType':
        return setOf(this.resolveType(node.element));
      case 'DictType':
        return dictOf(this.resolveType(node.key), this.resolveType(node.value));
      case 'FunctionType':
        return functionOf(
          node.params.map((param) => this.resolveType(param)),
          this.resolveType(node.ret)
        );
      case 'UnionType':
        return unionOf(node.variants.map((variant) => this.resolveType(variant)));
    }
  }

  private resolveTypeName(path: readonly string[], span: SourceSpan): Type {
    let names = this.namespaces[this.module]?.names;
    for (const [i, part] of path.entries()) {
      const name = names?.get(part);
      const last = i === path.length - 1;
      if (last && name?.kind === 'Blob') {
        const shape = this.blobs[name.blob];
        return { kind: 'Instance', blob: name.blob, name: shape?.name ?? part };
      }
      if (last || name?.kind !== 'Namespace') break;
      names = this.namespaces[name.module]?.names;
    }
    this.error('SYLT-C007', { name: path.join('.') }, span);
    return UNKNOWN_TYPE;
  }

  // ============================================================
  // CODE BUFFER
  // ============================================================

  get frame(): FunctionFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new Error('No function is being compiled');
    return frame;
  }

  /** True while compiling module-level statements outside any block */
  get atTopLevel(): boolean {
    return this.frames.length === 1 && this.frame.depth === 0;
  }

  newBlock(name: string, ty: Type): Block {
    const block: Block = { name, ops: [], lines: [], files: [], upvalues: [], ty };
    this.blocks.push(block);
    return block;
  }

  emit(op: Op, span: SourceSpan): number {
    const { block } = this.frame;
    block.ops.push(op);
    block.lines.push(span.start.line);
    block.files.push(this.file);
    return block.ops.length - 1;
  }

  emitVariable(
    access: 'Read' | 'Assign',
    kind: 'Local' | 'Upvalue' | 'Global',
    slot: number,
    span: SourceSpan
  ): void {
    const read = access === 'Read';
    switch (kind) {
      case 'Local':
        this.emit(read ? { op: 'ReadLocal', slot } : { op: 'AssignLocal', slot }, span);
        return;
      case 'Upvalue':
        this.emit(read ? { op: 'ReadUpvalue', slot } : { op: 'AssignUpvalue', slot }, span);
        return;
      case 'Global':
        this.emit(read ? { op: 'ReadGlobal', slot } : { op: 'AssignGlobal', slot }, span);
        return;
    }
  }

  /** Point a forward jump at the next op to be emitted */
  patchJump(at: number): void {
    const { ops } = this.frame.block;
    const target = ops.length;
    const op = ops[at];
    if (op?.op === 'Jump') ops[at] = { op: 'Jump', target };
    else if (op?.op === 'JumpIfFalse') ops[at] = { op: 'JumpIfFalse', target };
    else if (op?.op === 'Unwind') ops[at] = { op: 'Unwind', count: op.count, target };
  }

  // ============================================================
  // SCOPES
  // ============================================================

  beginScope(): void {
    this.frame.depth++;
  }

  endScope(span: SourceSpan): void {
    const frame = this.frame;
    frame.depth--;
    for (;;) {
      const local = frame.locals[frame.locals.length - 1];
      if (!local || local.depth <= frame.depth) break;
      this.emit({ op: local.captured ? 'CloseUpvalue' : 'Pop' }, span);
      frame.locals.pop();
    }
  }

  /** Add a local in the current scope; its slot is the next stack position */
  declareLocal(name: string, constant: boolean, span: SourceSpan): number {
    const frame = this.frame;
    const clash = frame.locals.some(
      (local) => local.name === name && local.depth === frame.depth
    );
    if (clash) this.error('SYLT-C010', { name }, span);
    frame.locals.push({ name, depth: frame.depth, constant, captured: false });
    return frame.locals.length - 1;
  }

  /** Number of locals declared deeper than `depth` in the current frame */
  localsAbove(depth: number): number {
    return this.frame.locals.filter((local) => local.depth > depth).length;
  }

  // ============================================================
  // NAME RESOLUTION
  // ============================================================

  /** Locals, then enclosing functions, then module globals, then externs */
  lookup(name: string): Resolution | undefined {
    const top = this.frames.length - 1;
    const frame = this.frame;
    const slot = findLocal(frame, name);
    if (slot !== undefined) {
      const local = frame.locals[slot];
      return { kind: 'Local', slot, constant: local?.constant ?? false };
    }
    const upvalue = this.resolveUpvalue(top, name);
    if (upvalue) return { kind: 'Upvalue', ...upvalue };

    const global = this.namespaces[this.module]?.names.get(name);
    if (global) return global;

    const index = this.externIndex.get(name);
    if (index !== undefined) return { kind: 'Extern', index, name };
    return undefined;
  }

  private resolveUpvalue(
    frameIndex: number,
    name: string
  ): { slot: number; constant: boolean } | undefined {
    const frame = this.frames[frameIndex];
    const enclosing = this.frames[frameIndex - 1];
    if (!frame || !enclosing) return undefined;

    const slot = findLocal(enclosing, name);
    if (slot !== undefined) {
      const local = enclosing.locals[slot];
      if (!local) return undefined;
      local.captured = true;
      return addCapture(frame, { isLocal: true, index: slot }, name, local.constant);
    }

    const outer = this.resolveUpvalue(frameIndex - 1, name);
    if (!outer) return undefined;
    return addCapture(frame, { isLocal: false, index: outer.slot }, name, outer.constant);
  }
}

function findLocal(frame: FunctionFrame, name: string): number | undefined {
  for (let slot = frame.locals.length - 1; slot >= 0; slot--) {
    if (frame.locals[slot]?.name === name) return slot;
  }
  return undefined;
}

function addCapture(
  frame: FunctionFrame,
  descriptor: UpvalueDescriptor,
  name: string,
  constant: boolean
): { slot: number; constant: boolean } {
  const existing = frame.captures.findIndex(
    (capture) =>
      capture.descriptor.isLocal === descriptor.isLocal &&
      capture.descriptor.index === descriptor.index
  );
  if (existing >= 0) return { slot: existing, constant };
  frame.captures.push({ descriptor, name, constant });
  return { slot: frame.captures.length - 1, constant };
}
