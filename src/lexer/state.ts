/**
 * Lexer State
 *
 * A cursor over the source text. `markToken` records where the token being
 * read begins; `emit` closes it at the cursor.
 */

import type { ErrorSite, SourceLocation, Token, TokenType } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** File the source came from, attached to lexer errors */
  readonly file: string;
  pos: number;
  line: number;
  column: number;
  /** Start of the token being read */
  mark: SourceLocation;
}

export function createLexerState(source: string, file = '<input>'): LexerState {
  return {
    source,
    file,
    pos: 0,
    line: 1,
    column: 1,
    mark: { line: 1, column: 1, offset: 0 },
  };
}

export function location(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function markToken(state: LexerState): SourceLocation {
  state.mark = location(state);
  return state.mark;
}

export function emit(state: LexerState, type: TokenType, value: string): Token {
  return { type, value, span: { start: state.mark, end: location(state) } };
}

export function errorSite(state: LexerState, at: SourceLocation = state.mark): ErrorSite {
  return { file: state.file, line: at.line, column: at.column };
}

// ============================================================
// CURSOR
// ============================================================

export function atEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Character `offset` places ahead; empty past the end */
export function charAt(state: LexerState, offset = 0): string {
  return state.source.charAt(state.pos + offset);
}

export function take(state: LexerState): string {
  const ch = state.source.charAt(state.pos);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Consume characters while `test` holds; returns them */
export function takeWhile(state: LexerState, test: (ch: string) => boolean): string {
  let text = '';
  while (!atEnd(state) && test(charAt(state))) {
    text += take(state);
  }
  return text;
}
