/**
 * Compiler Extension: Expressions
 * Operators, literals, assignables and function literals
 */

import { Compiler, type Resolution } from './compiler.js';
import type {
  AssignableNode,
  BinaryOp,
  ExpressionNode,
  FunctionLiteralNode,
  SourceSpan,
} from '../types.js';
import { functionOf } from '../runtime/core/value-types.js';
import { NIL, bool, float, int, str, type Value } from '../runtime/core/values.js';
import type { NullaryOpName } from './opcodes.js';

// Declaration merging to add methods to Compiler interface
declare module './compiler.js' {
  interface Compiler {
    compileExpression(expr: ExpressionNode, name?: string): void;
    compileAssignable(node: AssignableNode): void;
    compileFunction(node: FunctionLiteralNode, name?: string): void;
    namespaceOf(node: AssignableNode): number | undefined;
    emitConstant(value: Value, span: SourceSpan): void;
    emitResolution(resolved: Resolution, label: string, span: SourceSpan): void;
  }
}

/** Comparisons without an opcode of their own are the opposite plus Not */
const BINARY_OPS: Record<BinaryOp, readonly NullaryOpName[]> = {
  Add: ['Add'],
  Sub: ['Sub'],
  Mul: ['Mul'],
  Div: ['Div'],
  Eq: ['Equal'],
  Neq: ['Equal', 'Not'],
  Lt: ['Less'],
  Gt: ['Greater'],
  Lteq: ['Greater', 'Not'],
  Gteq: ['Less', 'Not'],
  And: ['And'],
  Or: ['Or'],
  AssertEq: ['Equal', 'Assert'],
  In: ['Contains'],
};

// ============================================================
// EXPRESSIONS
// ============================================================

/** `name` labels a function literal's block when it is being defined */
Compiler.prototype.compileExpression = function (
  this: Compiler,
  expr: ExpressionNode,
  name?: string
): void {
  switch (expr.type) {
    case 'IntLiteral':
      this.emitConstant(int(expr.value), expr.span);
      return;
    case 'FloatLiteral':
      if (!Number.isFinite(expr.value)) {
        this.error('SYLT-C008', { text: expr.text }, expr.span);
        this.emitConstant(NIL, expr.span);
        return;
      }
      this.emitConstant(float(expr.value), expr.span);
      return;
    case 'StringLiteral':
      this.emitConstant(str(expr.value), expr.span);
      return;
    case 'BoolLiteral':
      this.emitConstant(bool(expr.value), expr.span);
      return;
    case 'NilLiteral':
      this.emitConstant(NIL, expr.span);
      return;

    case 'BinaryExpr':
      this.compileExpression(expr.left);
      this.compileExpression(expr.right);
      for (const op of BINARY_OPS[expr.op]) {
        this.emit({ op }, expr.span);
      }
      return;
    case 'UnaryExpr':
      this.compileExpression(expr.operand);
      this.emit({ op: expr.op }, expr.span);
      return;

    case 'TupleLiteral':
      expr.elements.forEach((element) => this.compileExpression(element));
      this.emit({ op: 'Tuple', count: expr.elements.length }, expr.span);
      return;
    case 'ListLiteral':
      expr.elements.forEach((element) => this.compileExpression(element));
      this.emit({ op: 'List', count: expr.elements.length }, expr.span);
      return;
    case 'SetLiteral':
      expr.elements.forEach((element) => this.compileExpression(element));
      this.emit({ op: 'Set', count: expr.elements.length }, expr.span);
      return;
    case 'DictLiteral':
      for (const entry of expr.entries) {
        this.compileExpression(entry.key);
        this.compileExpression(entry.value);
      }
      this.emit({ op: 'Dict', count: expr.entries.length * 2 }, expr.span);
      return;

    case 'FunctionLiteral':
      this.compileFunction(expr, name);
      return;

    case 'BlobInstance':
      this.compileAssignable(expr.blob);
      for (const field of expr.fields) {
        this.emitConstant({ type: 'Field', name: field.name }, field.span);
        this.compileExpression(field.value);
      }
      this.emit({ op: 'Instance', count: expr.fields.length }, expr.span);
      return;

    case 'Get':
      this.compileAssignable(expr.assignable);
      return;
  }
};

Compiler.prototype.emitConstant = function (
  this: Compiler,
  value: Value,
  span: SourceSpan
): void {
  this.emit({ op: 'Constant', index: this.constants.add(value) }, span);
};

// ============================================================
// ASSIGNABLES
// ============================================================

/** Compile an assignable for its value */
Compiler.prototype.compileAssignable = function (
  this: Compiler,
  node: AssignableNode
): void {
  switch (node.type) {
    case 'Read': {
      const resolved = this.lookup(node.name);
      if (!resolved) {
        this.error('SYLT-C001', { name: node.name }, node.span);
        this.emitConstant(NIL, node.span);
        return;
      }
      this.emitResolution(resolved, node.name, node.span);
      return;
    }

    case 'Call':
      this.compileAssignable(node.callee);
      node.args.forEach((arg) => this.compileExpression(arg));
      this.emit({ op: 'Call', args: node.args.length }, node.span);
      return;

    case 'Access': {
      const module = this.namespaceOf(node.target);
      if (module === undefined) {
        this.compileAssignable(node.target);
        this.emit({ op: 'GetField', field: this.strings.intern(node.field) }, node.span);
        return;
      }
      const namespace = this.namespaces[module];
      const label = `${namespace?.key ?? ''}.${node.field}`;
      const name = namespace?.names.get(node.field);
      if (!name) {
        this.error('SYLT-C001', { name: label }, node.span);
        this.emitConstant(NIL, node.span);
        return;
      }
      this.emitResolution(name, label, node.span);
      return;
    }

    case 'Index':
      this.compileAssignable(node.target);
      this.compileExpression(node.index);
      this.emit({ op: 'GetIndex' }, node.span);
      return;
  }
};

Compiler.prototype.emitResolution = function (
  this: Compiler,
  resolved: Resolution,
  label: string,
  span: SourceSpan
): void {
  switch (resolved.kind) {
    case 'Local':
    case 'Upvalue':
    case 'Global':
      this.emitVariable('Read', resolved.kind, resolved.slot, span);
      return;
    case 'Blob': {
      const shape = this.blobs[resolved.blob];
      this.emitConstant(
        { type: 'Blob', blob: resolved.blob, name: shape?.name ?? label },
        span
      );
      return;
    }
    case 'Extern':
      this.emitConstant(
        { type: 'ExternFunction', index: resolved.index, name: resolved.name },
        span
      );
      return;
    case 'Namespace':
      this.error('SYLT-C013', { name: label }, span);
      this.emitConstant(NIL, span);
      return;
  }
};

/**
 * Module index when the assignable names an imported module (`alias` or
 * `alias.inner`); a local or global of the same name shadows the alias.
 */
Compiler.prototype.namespaceOf = function (
  this: Compiler,
  node: AssignableNode
): number | undefined {
  if (node.type === 'Read') {
    const resolved = this.lookup(node.name);
    return resolved?.kind === 'Namespace' ? resolved.module : undefined;
  }
  if (node.type === 'Access') {
    const outer = this.namespaceOf(node.target);
    if (outer === undefined) return undefined;
    const name = this.namespaces[outer]?.names.get(node.field);
    return name?.kind === 'Namespace' ? name.module : undefined;
  }
  return undefined;
};

// ============================================================
// FUNCTIONS
// ============================================================

/**
 * Compile the body into a new block, then emit `Closure` in the enclosing
 * code. Slot 0 of the new frame holds the callee, parameters follow.
 */
Compiler.prototype.compileFunction = function (
  this: Compiler,
  node: FunctionLiteralNode,
  name?: string
): void {
  const params = node.params.map((param) => this.resolveType(param.annotation));
  const ty = functionOf(params, this.resolveType(node.ret));
  const index = this.blocks.length;
  const block = this.newBlock(name ?? `fn@${node.span.start.line}`, ty);

  this.frames.push({
    block,
    locals: [{ name: '', depth: 1, constant: true, captured: false }],
    captures: [],
    depth: 1,
    loops: [],
  });
  for (const param of node.params) {
    this.declareLocal(param.name, false, param.span);
  }
  for (const statement of node.body.statements) {
    this.compileStatement(statement);
  }
  const end = { start: node.body.span.end, end: node.body.span.end };
  this.emitConstant(NIL, end);
  this.emit({ op: 'Return' }, end);

  const frame = this.frames.pop();
  for (const capture of frame?.captures ?? []) {
    block.upvalues.push(capture.descriptor);
  }
  this.emit({ op: 'Closure', block: index }, node.span);
};
