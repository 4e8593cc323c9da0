/**
 * Compiler Extension: Statements
 * Definitions, assignments, control flow and blocks
 */

import { Compiler } from './compiler.js';
import type {
  AssignmentNode,
  BlockStatementNode,
  DefinitionNode,
  IfNode,
  LoopNode,
  StatementNode,
} from '../types.js';
import type { NullaryOpName } from './opcodes.js';

// Declaration merging to add methods to Compiler interface
declare module './compiler.js' {
  interface Compiler {
    compileStatement(statement: StatementNode): void;
    compileDefinition(node: DefinitionNode): void;
    compileAssignment(node: AssignmentNode): void;
    compileIf(node: IfNode): void;
    compileLoop(node: LoopNode): void;
    compileBlock(node: BlockStatementNode): void;
  }
}

const ASSIGNMENT_OPS: Record<AssignmentNode['op'], NullaryOpName | null> = {
  Assign: null,
  Add: 'Add',
  Sub: 'Sub',
  Mul: 'Mul',
  Div: 'Div',
};

// ============================================================
// DISPATCH
// ============================================================

/** Every statement gets its own chance to report an error */
Compiler.prototype.compileStatement = function (
  this: Compiler,
  statement: StatementNode
): void {
  this.panic = false;

  switch (statement.type) {
    case 'Definition':
      this.compileDefinition(statement);
      return;
    case 'Assignment':
      this.compileAssignment(statement);
      return;
    case 'Print':
      this.compileExpression(statement.value);
      this.emit({ op: 'Print' }, statement.span);
      return;
    case 'ExpressionStatement':
      this.compileExpression(statement.value);
      this.emit({ op: 'Pop' }, statement.span);
      return;
    case 'Use':
    case 'BlobDefinition':
      // Registered in pass 1
      if (!this.atTopLevel) {
        this.error(
          'SYLT-C009',
          {
            statement: statement.type === 'Use' ? 'use' : 'blob',
            where: 'at the top level of a module',
          },
          statement.span
        );
      }
      return;
    case 'If':
      this.compileIf(statement);
      return;
    case 'Loop':
      this.compileLoop(statement);
      return;
    case 'Ret':
      if (this.frames.length === 1) {
        this.error('SYLT-C009', { statement: 'ret', where: 'inside a function' }, statement.span);
        return;
      }
      if (statement.value) {
        this.compileExpression(statement.value);
      } else {
        this.emit({ op: 'Constant', index: 0 }, statement.span);
      }
      this.emit({ op: 'Return' }, statement.span);
      return;
    case 'Break': {
      const loop = this.frame.loops[this.frame.loops.length - 1];
      if (!loop) {
        this.error('SYLT-C009', { statement: 'break', where: 'inside a loop' }, statement.span);
        return;
      }
      const count = this.localsAbove(loop.depth);
      loop.breaks.push(this.emit({ op: 'Unwind', count, target: -1 }, statement.span));
      return;
    }
    case 'Block':
      this.compileBlock(statement);
      return;
    case 'EmptyStatement':
      return;
    case 'RecoveryError':
      this.error('SYLT-C015', {}, statement.span);
      return;
  }
};

// ============================================================
// DEFINITIONS AND ASSIGNMENTS
// ============================================================

/**
 * Module-level definitions store into their global slot. Anywhere else the
 * value stays on the stack as a new local; a local function is declared
 * before its body compiles so it can call itself.
 */
Compiler.prototype.compileDefinition = function (
  this: Compiler,
  node: DefinitionNode
): void {
  const declared = node.annotation ? this.resolveType(node.annotation) : undefined;
  const define = (): void => {
    if (declared) this.emit({ op: 'Define', name: node.name, ty: declared }, node.span);
  };

  if (this.atTopLevel) {
    const name = this.namespaces[this.module]?.names.get(node.name);
    this.compileExpression(node.value, node.name);
    define();
    if (name?.kind === 'Global') {
      this.emit({ op: 'AssignGlobal', slot: name.slot }, node.span);
    }
    return;
  }

  if (node.value.type === 'FunctionLiteral') {
    this.declareLocal(node.name, node.constant, node.span);
    this.compileExpression(node.value, node.name);
  } else {
    this.compileExpression(node.value, node.name);
    this.declareLocal(node.name, node.constant, node.span);
  }
  define();
};

Compiler.prototype.compileAssignment = function (
  this: Compiler,
  node: AssignmentNode
): void {
  const operator = ASSIGNMENT_OPS[node.op];
  const { target } = node;

  const value = (): void => {
    this.compileExpression(node.value);
    if (operator) this.emit({ op: operator }, node.span);
  };

  switch (target.type) {
    case 'Call':
      this.error('SYLT-C005', {}, target.span);
      return;

    case 'Index':
      this.compileAssignable(target.target);
      this.compileExpression(target.index);
      if (operator) {
        this.emit({ op: 'Copy', count: 2 }, node.span);
        this.emit({ op: 'GetIndex' }, node.span);
      }
      value();
      this.emit({ op: 'AssignIndex' }, node.span);
      return;

    case 'Access': {
      const module = this.namespaceOf(target.target);
      if (module === undefined) {
        const field = this.strings.intern(target.field);
        this.compileAssignable(target.target);
        if (operator) {
          this.emit({ op: 'Copy', count: 1 }, node.span);
          this.emit({ op: 'GetField', field }, node.span);
        }
        value();
        this.emit({ op: 'AssignField', field }, node.span);
        return;
      }
      const name = this.namespaces[module]?.names.get(target.field);
      const label = `${this.namespaces[module]?.key ?? ''}.${target.field}`;
      if (!name) {
        this.error('SYLT-C001', { name: label }, target.span);
        return;
      }
      if (name.kind !== 'Global' || name.constant) {
        this.error('SYLT-C006', { name: label }, target.span);
        return;
      }
      if (operator) this.emitVariable('Read', 'Global', name.slot, node.span);
      value();
      this.emitVariable('Assign', 'Global', name.slot, node.span);
      return;
    }

    case 'Read': {
      const resolved = this.lookup(target.name);
      if (!resolved) {
        this.error('SYLT-C001', { name: target.name }, target.span);
        return;
      }
      switch (resolved.kind) {
        case 'Local':
        case 'Upvalue':
        case 'Global': {
          if (resolved.constant) {
            this.error('SYLT-C006', { name: target.name }, target.span);
            return;
          }
          if (operator) this.emitVariable('Read', resolved.kind, resolved.slot, node.span);
          value();
          this.emitVariable('Assign', resolved.kind, resolved.slot, node.span);
          return;
        }
        default:
          this.error('SYLT-C006', { name: target.name }, target.span);
          return;
      }
    }
  }
};

// ============================================================
// CONTROL FLOW
// ============================================================

Compiler.prototype.compileIf = function (this: Compiler, node: IfNode): void {
  this.compileExpression(node.condition);
  const skipThen = this.emit({ op: 'JumpIfFalse', target: -1 }, node.span);
  this.compileBlock(node.then);

  if (!node.otherwise) {
    this.patchJump(skipThen);
    return;
  }
  const skipElse = this.emit({ op: 'Jump', target: -1 }, node.span);
  this.patchJump(skipThen);
  if (node.otherwise.type === 'If') {
    this.compileIf(node.otherwise);
  } else {
    this.compileBlock(node.otherwise);
  }
  this.patchJump(skipElse);
};

Compiler.prototype.compileLoop = function (this: Compiler, node: LoopNode): void {
  const start = this.frame.block.ops.length;
  let exit: number | undefined;
  if (node.condition) {
    this.compileExpression(node.condition);
    exit = this.emit({ op: 'JumpIfFalse', target: -1 }, node.span);
  }

  const breaks: number[] = [];
  const loop = { depth: this.frame.depth, breaks };
  this.frame.loops.push(loop);
  this.compileBlock(node.body);
  this.frame.loops.pop();

  this.emit({ op: 'Jump', target: start }, node.body.span);
  if (exit !== undefined) this.patchJump(exit);
  for (const at of loop.breaks) this.patchJump(at);
};

Compiler.prototype.compileBlock = function (
  this: Compiler,
  node: BlockStatementNode
): void {
  this.beginScope();
  for (const statement of node.statements) {
    this.compileStatement(statement);
  }
  const end = { start: node.span.end, end: node.span.end };
  this.endScope(end);
};
