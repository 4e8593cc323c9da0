/**
 * Operator and Keyword Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Every operator; the tokenizer tries the longest spelling first */
export const OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ['<=>', TOKEN_TYPES.ASSERT_EQ],

  ['->', TOKEN_TYPES.ARROW],
  [':=', TOKEN_TYPES.COLON_ASSIGN],
  ['::', TOKEN_TYPES.DOUBLE_COLON],
  ['&&', TOKEN_TYPES.AND],
  ['||', TOKEN_TYPES.OR],
  ['==', TOKEN_TYPES.EQ],
  ['!=', TOKEN_TYPES.NE],
  ['<=', TOKEN_TYPES.LE],
  ['>=', TOKEN_TYPES.GE],
  ['+=', TOKEN_TYPES.PLUS_ASSIGN],
  ['-=', TOKEN_TYPES.MINUS_ASSIGN],
  ['*=', TOKEN_TYPES.STAR_ASSIGN],
  ['/=', TOKEN_TYPES.SLASH_ASSIGN],

  ['.', TOKEN_TYPES.DOT],
  [':', TOKEN_TYPES.COLON],
  [',', TOKEN_TYPES.COMMA],
  ['!', TOKEN_TYPES.BANG],
  ['=', TOKEN_TYPES.ASSIGN],
  ['<', TOKEN_TYPES.LT],
  ['>', TOKEN_TYPES.GT],
  ['(', TOKEN_TYPES.LPAREN],
  [')', TOKEN_TYPES.RPAREN],
  ['{', TOKEN_TYPES.LBRACE],
  ['}', TOKEN_TYPES.RBRACE],
  ['[', TOKEN_TYPES.LBRACKET],
  [']', TOKEN_TYPES.RBRACKET],
  ['|', TOKEN_TYPES.PIPE_BAR],
  ['+', TOKEN_TYPES.PLUS],
  ['-', TOKEN_TYPES.MINUS],
  ['*', TOKEN_TYPES.STAR],
  ['/', TOKEN_TYPES.SLASH],
]);

export const LONGEST_OPERATOR = Math.max(...[...OPERATORS.keys()].map((op) => op.length));

/** `true` and `false` share the BOOL token */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['true', TOKEN_TYPES.BOOL],
  ['false', TOKEN_TYPES.BOOL],
  ['nil', TOKEN_TYPES.NIL],
  ['fn', TOKEN_TYPES.FN],
  ['use', TOKEN_TYPES.USE],
  ['print', TOKEN_TYPES.PRINT],
  ['blob', TOKEN_TYPES.BLOB],
  ['if', TOKEN_TYPES.IF],
  ['else', TOKEN_TYPES.ELSE],
  ['loop', TOKEN_TYPES.LOOP],
  ['ret', TOKEN_TYPES.RET],
  ['break', TOKEN_TYPES.BREAK],
  ['in', TOKEN_TYPES.IN],
]);
