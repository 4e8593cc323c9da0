/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { ErrorSite, SourceLocation, SourceSpan, Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  /** Source file, attached to every syntax error */
  readonly file: string;
  pos: number;
  /** Errors collected while recovering from malformed statements */
  readonly errors: ParseError[];
  /** Set while parsing `if`/`loop` conditions, where `name {` opens the body */
  noBlobLiteral: boolean;
}

export function createParserState(tokens: Token[], file: string): ParserState {
  return {
    tokens,
    file,
    pos: 0,
    errors: [],
    noBlobLiteral: false,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** @internal */
export function expect(
  state: ParserState,
  type: string,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  throw syntaxError(
    state,
    `${message}, found ${describeToken(token)}`,
    token,
    'SYLT-P002'
  );
}

/** @internal */
export function skipNewlines(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE)) advance(state);
}

/**
 * Run a sub-parse speculatively. On a syntax error the position and the
 * error list are rolled back and undefined is returned.
 * @internal
 */
export function attempt<T>(state: ParserState, parse: () => T): T | undefined {
  const pos = state.pos;
  const errorCount = state.errors.length;
  try {
    return parse();
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    state.pos = pos;
    state.errors.length = errorCount;
    return undefined;
  }
}

// ============================================================
// ERRORS
// ============================================================

/** @internal */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of file';
    case TOKEN_TYPES.NEWLINE:
      return 'newline';
    case TOKEN_TYPES.STRING:
      return JSON.stringify(token.value);
    default:
      return `'${token.value}'`;
  }
}

/** @internal */
export function siteOf(state: ParserState, token: Token): ErrorSite {
  return {
    file: state.file,
    line: token.span.start.line,
    column: token.span.start.column,
  };
}

/**
 * Build a syntax error at a token (the current one by default).
 * @internal
 */
export function syntaxError(
  state: ParserState,
  message: string,
  token: Token = current(state),
  errorId = 'SYLT-P001'
): ParseError {
  return new ParseError(errorId, message, siteOf(state, token), {
    token: token.value,
  });
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/**
 * Span from a start location to the end of the last consumed token.
 * @internal
 */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  const last = state.tokens[state.pos - 1];
  return makeSpan(start, last ? last.span.end : start);
}
