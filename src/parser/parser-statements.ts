/**
 * Parser Extension: Statement Parsing
 * Definitions, assignments, imports, blobs, control flow and blocks
 */

import { Parser } from './parser.js';
import type {
  BlobDefinitionNode,
  BlobFieldNode,
  BlockStatementNode,
  DefinitionNode,
  ExpressionNode,
  IfNode,
  LoopNode,
  SourceLocation,
  StatementNode,
  TypeNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { ASSIGNMENT_OPS } from './helpers.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  peek,
  skipNewlines,
  spanFrom,
  syntaxError,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseStatement(): StatementNode;
    parseDefinition(): DefinitionNode;
    parseBlobDefinition(): BlobDefinitionNode;
    parseIf(): IfNode;
    parseLoop(): LoopNode;
    parseBlock(): BlockStatementNode;
    parseCondition(): ExpressionNode;
    parseExpressionOrAssignment(start: SourceLocation): StatementNode;
  }
}

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);
  const start = token.span.start;

  switch (token.type) {
    case TOKEN_TYPES.NEWLINE:
    case TOKEN_TYPES.EOF:
      return { type: 'EmptyStatement', span: token.span };

    case TOKEN_TYPES.USE: {
      advance(this.state);
      const name = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        "Expected a module name after 'use'"
      );
      return { type: 'Use', module: name.value, span: spanFrom(this.state, start) };
    }

    case TOKEN_TYPES.BLOB:
      return this.parseBlobDefinition();

    case TOKEN_TYPES.PRINT: {
      advance(this.state);
      const value = this.parseExpression();
      return { type: 'Print', value, span: spanFrom(this.state, start) };
    }

    case TOKEN_TYPES.IF:
      return this.parseIf();

    case TOKEN_TYPES.LOOP:
      return this.parseLoop();

    case TOKEN_TYPES.RET: {
      advance(this.state);
      const value = check(
        this.state,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.RBRACE,
        TOKEN_TYPES.EOF
      )
        ? null
        : this.parseExpression();
      return { type: 'Ret', value, span: spanFrom(this.state, start) };
    }

    case TOKEN_TYPES.BREAK:
      advance(this.state);
      return { type: 'Break', span: token.span };

    case TOKEN_TYPES.LBRACE:
      return this.parseBlock();

    case TOKEN_TYPES.IDENTIFIER: {
      const next = peek(this.state, 1).type;
      if (
        next === TOKEN_TYPES.COLON_ASSIGN ||
        next === TOKEN_TYPES.DOUBLE_COLON ||
        next === TOKEN_TYPES.COLON
      ) {
        return this.parseDefinition();
      }
      return this.parseExpressionOrAssignment(start);
    }

    default:
      return this.parseExpressionOrAssignment(start);
  }
};

// ============================================================
// DEFINITIONS AND ASSIGNMENTS
// ============================================================

/** `a := 1`, `a :: 1`, `a: int = 1` or `a: int : 1` */
Parser.prototype.parseDefinition = function (this: Parser): DefinitionNode {
  const nameToken = advance(this.state);
  const start = nameToken.span.start;
  const op = advance(this.state);

  let constant: boolean;
  let annotation: TypeNode | null = null;
  if (op.type === TOKEN_TYPES.COLON) {
    annotation = this.parseType();
    if (check(this.state, TOKEN_TYPES.ASSIGN)) {
      constant = false;
    } else if (check(this.state, TOKEN_TYPES.COLON)) {
      constant = true;
    } else {
      throw syntaxError(
        this.state,
        `Expected '=' or ':' after the type of '${nameToken.value}'`,
        current(this.state),
        'SYLT-P002'
      );
    }
    advance(this.state);
  } else {
    constant = op.type === TOKEN_TYPES.DOUBLE_COLON;
  }

  const value = this.parseExpression();
  return {
    type: 'Definition',
    name: nameToken.value,
    constant,
    annotation,
    value,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseExpressionOrAssignment = function (
  this: Parser,
  start: SourceLocation
): StatementNode {
  const value = this.parseExpression();

  const op = ASSIGNMENT_OPS[current(this.state).type];
  if (op === undefined) {
    return { type: 'ExpressionStatement', value, span: spanFrom(this.state, start) };
  }

  const opToken = advance(this.state);
  if (value.type !== 'Get') {
    throw syntaxError(
      this.state,
      `Cannot assign to an expression with '${opToken.value}'`,
      opToken
    );
  }
  const rhs = this.parseExpression();
  return {
    type: 'Assignment',
    op,
    target: value.assignable,
    value: rhs,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// BLOB DEFINITIONS
// ============================================================

/** `blob Name { field: Type, ... }`; fields end at `,` or a newline */
Parser.prototype.parseBlobDefinition = function (
  this: Parser
): BlobDefinitionNode {
  const start = advance(this.state).span.start; // consume 'blob'
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "Expected a name after 'blob'"
  );
  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after blob name");

  const fields: BlobFieldNode[] = [];
  skipNewlines(this.state);
  while (!check(this.state, TOKEN_TYPES.RBRACE)) {
    const field = expect(
      this.state,
      TOKEN_TYPES.IDENTIFIER,
      'Expected a field name in blob definition'
    );
    expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after field name");
    const annotation = this.parseType();
    fields.push({
      type: 'BlobField',
      name: field.value,
      annotation,
      span: spanFrom(this.state, field.span.start),
    });

    if (!check(this.state, TOKEN_TYPES.COMMA, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.RBRACE)) {
      throw syntaxError(this.state, "Expected a delimiter: newline or ','");
    }
    if (check(this.state, TOKEN_TYPES.COMMA)) advance(this.state);
    skipNewlines(this.state);
  }
  advance(this.state); // consume }

  return {
    type: 'BlobDefinition',
    name: name.value,
    fields,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// CONTROL FLOW
// ============================================================

/** Conditions stop at `{`, so `if a { ... }` is not a blob literal */
Parser.prototype.parseCondition = function (this: Parser): ExpressionNode {
  const saved = this.state.noBlobLiteral;
  this.state.noBlobLiteral = true;
  try {
    return this.parseExpression();
  } finally {
    this.state.noBlobLiteral = saved;
  }
};

/** `if cond { ... } else if cond { ... } else { ... }` */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = advance(this.state).span.start; // consume 'if'
  const condition = this.parseCondition();
  const then = this.parseBlock();

  let otherwise: IfNode | BlockStatementNode | null = null;
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    advance(this.state);
    otherwise = check(this.state, TOKEN_TYPES.IF) ? this.parseIf() : this.parseBlock();
  }

  return {
    type: 'If',
    condition,
    then,
    otherwise,
    span: spanFrom(this.state, start),
  };
};

/** `loop cond { ... }` or `loop { ... }` */
Parser.prototype.parseLoop = function (this: Parser): LoopNode {
  const start = advance(this.state).span.start; // consume 'loop'
  const condition = check(this.state, TOKEN_TYPES.LBRACE)
    ? null
    : this.parseCondition();
  const body = this.parseBlock();
  return { type: 'Loop', condition, body, span: spanFrom(this.state, start) };
};

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockStatementNode {
  const start = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'").span.start;

  // Conditions end at the brace; the body is a fresh context
  const saved = this.state.noBlobLiteral;
  this.state.noBlobLiteral = false;

  const statements: StatementNode[] = [];
  try {
    skipNewlines(this.state);
    while (!check(this.state, TOKEN_TYPES.RBRACE)) {
      if (isAtEnd(this.state)) {
        throw syntaxError(this.state, "Expected '}' to close the block");
      }
      statements.push(this.parseStatementOrRecover(true));
      skipNewlines(this.state);
    }
    advance(this.state); // consume }
  } finally {
    this.state.noBlobLiteral = saved;
  }

  return { type: 'Block', statements, span: spanFrom(this.state, start) };
};
