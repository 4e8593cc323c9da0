/**
 * Tokenizer
 * Produces one token at a time; newlines are tokens, other whitespace and
 * `//` comments are skipped.
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import { LONGEST_OPERATOR, OPERATORS } from './operators.js';
import { isDigit, isIdentifierStart, readIdentifier, readNumber, readString } from './readers.js';
import {
  atEnd,
  charAt,
  createLexerState,
  emit,
  errorSite,
  markToken,
  take,
  takeWhile,
  type LexerState,
} from './state.js';

const BLANK = /^[ \t\r]$/;

function skipTrivia(state: LexerState): void {
  for (;;) {
    const ch = charAt(state);
    if (BLANK.test(ch)) {
      take(state);
    } else if (ch === '/' && charAt(state, 1) === '/') {
      takeWhile(state, (c) => c !== '\n');
    } else {
      return;
    }
  }
}

function readOperator(state: LexerState): Token | undefined {
  for (let length = LONGEST_OPERATOR; length > 0; length--) {
    const text = state.source.slice(state.pos, state.pos + length);
    const type = OPERATORS.get(text);
    if (type === undefined) continue;
    for (let i = 0; i < text.length; i++) take(state);
    return emit(state, type, text);
  }
  return undefined;
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);
  markToken(state);

  if (atEnd(state)) return emit(state, TOKEN_TYPES.EOF, '');

  const ch = charAt(state);
  if (ch === '\n') {
    take(state);
    return emit(state, TOKEN_TYPES.NEWLINE, '\n');
  }
  if (ch === '"') return readString(state);
  // A leading minus is an operator; the parser negates
  if (isDigit(ch)) return readNumber(state);
  if (isIdentifierStart(ch)) return readIdentifier(state);

  const operator = readOperator(state);
  if (operator) return operator;

  throw new LexerError('SYLT-L002', { char: ch }, errorSite(state));
}

/**
 * Tokenize a whole source file.
 * The last token is always EOF.
 *
 * @throws LexerError on the first malformed token
 */
export function tokenize(source: string, file = '<input>'): Token[] {
  const state = createLexerState(source, file);
  const tokens: Token[] = [];
  for (;;) {
    const token = nextToken(state);
    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) return tokens;
  }
}
