/**
 * Parser Helpers
 * Precedence table and lookahead predicates
 * @internal This module contains internal parser utilities
 */

import type { AssignmentOp, BinaryOp, PrimitiveTypeName, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

// ============================================================
// PRECEDENCE
// ============================================================

/**
 * Binding strength of infix operators, weakest first.
 * @internal
 */
export const PREC = {
  No: 0,
  Arrow: 1,
  Assert: 2,
  BoolOr: 3,
  BoolAnd: 4,
  Comp: 5,
  Term: 6,
  Factor: 7,
  Index: 8,
} as const;

export type Prec = (typeof PREC)[keyof typeof PREC];

/** @internal */
export function precedence(type: TokenType): Prec {
  switch (type) {
    case TOKEN_TYPES.STAR:
    case TOKEN_TYPES.SLASH:
      return PREC.Factor;
    case TOKEN_TYPES.PLUS:
    case TOKEN_TYPES.MINUS:
      return PREC.Term;
    case TOKEN_TYPES.EQ:
    case TOKEN_TYPES.NE:
    case TOKEN_TYPES.LT:
    case TOKEN_TYPES.GT:
    case TOKEN_TYPES.LE:
    case TOKEN_TYPES.GE:
      return PREC.Comp;
    case TOKEN_TYPES.AND:
      return PREC.BoolAnd;
    case TOKEN_TYPES.OR:
      return PREC.BoolOr;
    case TOKEN_TYPES.IN:
      return PREC.Index;
    case TOKEN_TYPES.ASSERT_EQ:
      return PREC.Assert;
    case TOKEN_TYPES.ARROW:
      return PREC.Arrow;
    default:
      return PREC.No;
  }
}

/** The next-stronger precedence, used for right operands */
export function nextPrec(prec: Prec): Prec {
  switch (prec) {
    case PREC.No:
      return PREC.Arrow;
    case PREC.Arrow:
      return PREC.Assert;
    case PREC.Assert:
      return PREC.BoolOr;
    case PREC.BoolOr:
      return PREC.BoolAnd;
    case PREC.BoolAnd:
      return PREC.Comp;
    case PREC.Comp:
      return PREC.Term;
    case PREC.Term:
      return PREC.Factor;
    default:
      return PREC.Index;
  }
}

// ============================================================
// OPERATOR MAPPING
// ============================================================

/** Infix tokens, except `->` which is rewritten into a call */
export const BINARY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: 'Add',
  [TOKEN_TYPES.MINUS]: 'Sub',
  [TOKEN_TYPES.STAR]: 'Mul',
  [TOKEN_TYPES.SLASH]: 'Div',
  [TOKEN_TYPES.EQ]: 'Eq',
  [TOKEN_TYPES.NE]: 'Neq',
  [TOKEN_TYPES.LT]: 'Lt',
  [TOKEN_TYPES.GT]: 'Gt',
  [TOKEN_TYPES.LE]: 'Lteq',
  [TOKEN_TYPES.GE]: 'Gteq',
  [TOKEN_TYPES.AND]: 'And',
  [TOKEN_TYPES.OR]: 'Or',
  [TOKEN_TYPES.ASSERT_EQ]: 'AssertEq',
  [TOKEN_TYPES.IN]: 'In',
};

export const ASSIGNMENT_OPS: Partial<Record<TokenType, AssignmentOp>> = {
  [TOKEN_TYPES.ASSIGN]: 'Assign',
  [TOKEN_TYPES.PLUS_ASSIGN]: 'Add',
  [TOKEN_TYPES.MINUS_ASSIGN]: 'Sub',
  [TOKEN_TYPES.STAR_ASSIGN]: 'Mul',
  [TOKEN_TYPES.SLASH_ASSIGN]: 'Div',
};

// ============================================================
// TYPE NAMES
// ============================================================

export const PRIMITIVE_TYPE_NAMES: Record<string, PrimitiveTypeName> = {
  int: 'int',
  float: 'float',
  bool: 'bool',
  str: 'str',
  void: 'void',
};
