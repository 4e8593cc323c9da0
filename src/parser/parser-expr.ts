/**
 * Parser Extension: Expression Parsing
 * Precedence climbing over prefix and infix operators
 */

import { Parser } from './parser.js';
import type { ExpressionNode, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { BINARY_OPS, PREC, type Prec, nextPrec, precedence } from './helpers.js';
import {
  advance,
  attempt,
  check,
  current,
  describeToken,
  spanFrom,
  syntaxError,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parsePrecedence(min: Prec): ExpressionNode;
    parsePrefix(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parseInfix(left: ExpressionNode): ExpressionNode;
    parseIdentifierExpression(): ExpressionNode;
  }
}

// ============================================================
// ENTRY POINT
// ============================================================

/** A function literal, or an operator expression */
Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.FN)) {
    return this.parseFunction();
  }
  return this.parsePrecedence(PREC.No);
};

/**
 * Parse a prefix expression, then fold in infix operators binding at
 * least as strongly as `min`. Right operands parse one level stronger,
 * which makes every operator left associative.
 */
Parser.prototype.parsePrecedence = function (
  this: Parser,
  min: Prec
): ExpressionNode {
  let expr = this.parsePrefix();
  for (;;) {
    const prec = precedence(current(this.state).type);
    if (prec === PREC.No || prec < min) break;
    expr = this.parseInfix(expr);
  }
  return expr;
};

// ============================================================
// PREFIX
// ============================================================

Parser.prototype.parsePrefix = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  switch (token.type) {
    case TOKEN_TYPES.LPAREN:
      return this.parseGroupingOrTuple();
    case TOKEN_TYPES.LBRACKET:
      return this.parseList();
    case TOKEN_TYPES.LBRACE:
      return this.parseSetOrDict();
    case TOKEN_TYPES.INT:
    case TOKEN_TYPES.FLOAT:
    case TOKEN_TYPES.BOOL:
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.NIL:
      return this.parseValue();
    case TOKEN_TYPES.MINUS:
    case TOKEN_TYPES.BANG:
      return this.parseUnary();
    case TOKEN_TYPES.IDENTIFIER:
      return this.parseIdentifierExpression();
    case TOKEN_TYPES.FN:
      return this.parseFunction();
    default:
      throw syntaxError(
        this.state,
        `No valid expression starts with ${describeToken(token)}`
      );
  }
};

/**
 * An assignable, or a blob literal `Name { ... }` when a brace follows a
 * plain or qualified name. The literal is parsed speculatively; on failure
 * the name stands alone.
 */
Parser.prototype.parseIdentifierExpression = function (
  this: Parser
): ExpressionNode {
  const start = current(this.state).span.start;
  const assignable = this.parseAssignable();

  if (
    !this.state.noBlobLiteral &&
    check(this.state, TOKEN_TYPES.LBRACE) &&
    (assignable.type === 'Read' || assignable.type === 'Access')
  ) {
    const blob = attempt(this.state, () =>
      this.parseBlobInstance(assignable, start)
    );
    if (blob) return blob;
  }

  return { type: 'Get', assignable, span: spanFrom(this.state, start) };
};

/** `-e` and `!e` bind their operand at factor strength */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const op = advance(this.state);
  const operand = this.parsePrecedence(PREC.Factor);
  return {
    type: 'UnaryExpr',
    op: op.type === TOKEN_TYPES.MINUS ? 'Neg' : 'Not',
    operand,
    span: spanFrom(this.state, op.span.start),
  };
};

// ============================================================
// INFIX
// ============================================================

Parser.prototype.parseInfix = function (
  this: Parser,
  left: ExpressionNode
): ExpressionNode {
  const op: Token = advance(this.state);
  const right = this.parsePrecedence(nextPrec(precedence(op.type)));
  const span = { start: left.span.start, end: right.span.end };

  // `a -> f(b)` is `f(a, b)`
  if (op.type === TOKEN_TYPES.ARROW) {
    if (right.type !== 'Get' || right.assignable.type !== 'Call') {
      throw syntaxError(this.state, '', op, 'SYLT-P004');
    }
    const call = right.assignable;
    return {
      type: 'Get',
      assignable: {
        type: 'Call',
        callee: call.callee,
        args: [left, ...call.args],
        span: call.span,
      },
      span,
    };
  }

  const binary = BINARY_OPS[op.type];
  if (binary === undefined) {
    throw syntaxError(this.state, `Unknown infix operator '${op.value}'`, op);
  }
  return { type: 'BinaryExpr', op: binary, left, right, span };
};
