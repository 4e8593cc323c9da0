/**
 * Parser Extension: Module Parsing
 * Top-level statement loop and error recovery
 */

import { Parser } from './parser.js';
import type {
  ModuleNode,
  RecoveryErrorNode,
  SourceLocation,
  StatementNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  isAtEnd,
  makeSpan,
  spanFrom,
  syntaxError,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseModule(): ModuleNode;
    parseStatementOrRecover(insideBlock: boolean): StatementNode;
    expectStatementEnd(): void;
    recoverToNextStatement(
      start: SourceLocation,
      error: ParseError,
      insideBlock: boolean
    ): RecoveryErrorNode;
  }
}

// ============================================================
// MODULE PARSING
// ============================================================

Parser.prototype.parseModule = function (this: Parser): ModuleNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    // A `}` with no open block can't start or end anything
    if (check(this.state, TOKEN_TYPES.RBRACE)) {
      const token = advance(this.state);
      const error = syntaxError(this.state, "Unexpected '}'", token);
      this.state.errors.push(error);
      statements.push({
        type: 'RecoveryError',
        message: error.message,
        span: token.span,
      });
      continue;
    }
    statements.push(this.parseStatementOrRecover(false));
  }

  return {
    type: 'Module',
    file: this.state.file,
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Parse one statement including its terminator. A syntax error is recorded
 * and the tokens up to the next statement boundary are skipped.
 */
Parser.prototype.parseStatementOrRecover = function (
  this: Parser,
  insideBlock: boolean
): StatementNode {
  const start = current(this.state).span.start;
  try {
    const statement = this.parseStatement();
    this.expectStatementEnd();
    return statement;
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    this.state.errors.push(err);
    return this.recoverToNextStatement(start, err, insideBlock);
  }
};

/** Statements end at a newline (consumed), a closing `}` or EOF */
Parser.prototype.expectStatementEnd = function (this: Parser): void {
  if (check(this.state, TOKEN_TYPES.NEWLINE)) {
    advance(this.state);
    return;
  }
  if (check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) return;
  throw syntaxError(
    this.state,
    'Expected newline after statement',
    current(this.state),
    'SYLT-P007'
  );
};

/**
 * Skip to the end of the broken statement: a newline outside any brackets
 * opened since the statement began, or the `}` closing the enclosing block.
 */
Parser.prototype.recoverToNextStatement = function (
  this: Parser,
  start: SourceLocation,
  error: ParseError,
  insideBlock: boolean
): RecoveryErrorNode {
  let depth = 0;
  while (!isAtEnd(this.state)) {
    const token = current(this.state);
    if (token.type === TOKEN_TYPES.NEWLINE && depth === 0) {
      advance(this.state);
      break;
    }
    if (
      token.type === TOKEN_TYPES.LPAREN ||
      token.type === TOKEN_TYPES.LBRACKET ||
      token.type === TOKEN_TYPES.LBRACE
    ) {
      depth++;
    } else if (
      token.type === TOKEN_TYPES.RPAREN ||
      token.type === TOKEN_TYPES.RBRACKET ||
      token.type === TOKEN_TYPES.RBRACE
    ) {
      if (depth === 0) {
        if (token.type === TOKEN_TYPES.RBRACE && insideBlock) break;
        // Stray closer: drop it with the rest of the statement
      } else {
        depth--;
      }
    }
    advance(this.state);
  }

  return {
    type: 'RecoveryError',
    message: error.message,
    span: spanFrom(this.state, start),
  };
};
