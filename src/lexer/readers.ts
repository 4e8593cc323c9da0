/**
 * Token Readers
 * Strings, numbers and identifiers
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import { KEYWORDS } from './operators.js';
import {
  atEnd,
  charAt,
  emit,
  errorSite,
  location,
  take,
  takeWhile,
  type LexerState,
} from './state.js';

const DIGIT = /^[0-9]$/;
const IDENTIFIER_START = /^[A-Za-z_]$/;
const IDENTIFIER_PART = /^[A-Za-z0-9_]$/;

export const isDigit = (ch: string): boolean => DIGIT.test(ch);
export const isIdentifierStart = (ch: string): boolean => IDENTIFIER_START.test(ch);

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  '"': '"',
};

/** Strings end on the line they start on */
export function readString(state: LexerState): Token {
  take(state); // opening "

  let value = '';
  while (charAt(state) !== '"') {
    if (atEnd(state) || charAt(state) === '\n') {
      throw new LexerError('SYLT-L001', {}, errorSite(state));
    }
    const ch = take(state);
    if (ch !== '\\') {
      value += ch;
      continue;
    }
    const at = location(state);
    const escaped = take(state);
    const replacement = ESCAPES[escaped];
    if (replacement === undefined) {
      throw new LexerError('SYLT-L003', { char: escaped }, errorSite(state, at));
    }
    value += replacement;
  }

  take(state); // closing "
  return emit(state, TOKEN_TYPES.STRING, value);
}

/** `12` is an INT, `1.5` a FLOAT; in `1.` the dot is left for the parser */
export function readNumber(state: LexerState): Token {
  const whole = takeWhile(state, isDigit);
  if (charAt(state) !== '.' || !isDigit(charAt(state, 1))) {
    return emit(state, TOKEN_TYPES.INT, whole);
  }
  take(state);
  const fraction = takeWhile(state, isDigit);
  return emit(state, TOKEN_TYPES.FLOAT, `${whole}.${fraction}`);
}

export function readIdentifier(state: LexerState): Token {
  const word = takeWhile(state, (ch) => IDENTIFIER_PART.test(ch));
  return emit(state, KEYWORDS.get(word) ?? TOKEN_TYPES.IDENTIFIER, word);
}
