/**
 * Parser Extension: Type Annotations
 */

import { Parser } from './parser.js';
import type { TypeNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { PRIMITIVE_TYPE_NAMES } from './helpers.js';
import {
  advance,
  check,
  current,
  describeToken,
  expect,
  spanFrom,
  syntaxError,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseType(): TypeNode;
    parseSingleType(): TypeNode;
    canStartType(): boolean;
  }
}

/** `A | B | C`, or a single type */
Parser.prototype.parseType = function (this: Parser): TypeNode {
  const start = current(this.state).span.start;
  const first = this.parseSingleType();
  if (!check(this.state, TOKEN_TYPES.PIPE_BAR)) return first;

  const variants = [first];
  while (check(this.state, TOKEN_TYPES.PIPE_BAR)) {
    advance(this.state);
    variants.push(this.parseSingleType());
  }
  return { type: 'UnionType', variants, span: spanFrom(this.state, start) };
};

Parser.prototype.canStartType = function (this: Parser): boolean {
  return check(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    TOKEN_TYPES.STAR,
    TOKEN_TYPES.LPAREN,
    TOKEN_TYPES.LBRACKET,
    TOKEN_TYPES.LBRACE,
    TOKEN_TYPES.FN
  );
};

Parser.prototype.parseSingleType = function (this: Parser): TypeNode {
  const token = current(this.state);
  const start = token.span.start;

  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER: {
      advance(this.state);
      const primitive = PRIMITIVE_TYPE_NAMES[token.value];
      if (primitive) {
        return { type: 'PrimitiveType', name: primitive, span: token.span };
      }
      const path = [token.value];
      while (check(this.state, TOKEN_TYPES.DOT)) {
        advance(this.state);
        path.push(
          expect(this.state, TOKEN_TYPES.IDENTIFIER, "Expected a name after '.'")
            .value
        );
      }
      return { type: 'NamedType', path, span: spanFrom(this.state, start) };
    }

    case TOKEN_TYPES.STAR:
      advance(this.state);
      return { type: 'PrimitiveType', name: 'unknown', span: token.span };

    // `(int)` is int, `(int,)` and `(int, str)` are tuples, `()` is empty
    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      let isTuple = check(this.state, TOKEN_TYPES.COMMA, TOKEN_TYPES.RPAREN);
      if (check(this.state, TOKEN_TYPES.COMMA)) advance(this.state);
      const elements: TypeNode[] = [];
      while (!check(this.state, TOKEN_TYPES.RPAREN)) {
        elements.push(this.parseType());
        if (check(this.state, TOKEN_TYPES.COMMA)) {
          isTuple = true;
          advance(this.state);
        } else if (!check(this.state, TOKEN_TYPES.RPAREN)) {
          throw syntaxError(this.state, "Expected ',' or ')' in tuple type");
        }
      }
      advance(this.state); // consume )
      const [only] = elements;
      if (!isTuple && only) return only;
      return { type: 'TupleType', elements, span: spanFrom(this.state, start) };
    }

    case TOKEN_TYPES.LBRACKET: {
      advance(this.state);
      const element = this.parseType();
      expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after list type");
      return { type: 'ListType', element, span: spanFrom(this.state, start) };
    }

    // `{T}` is a set, `{K: V}` a dict
    case TOKEN_TYPES.LBRACE: {
      advance(this.state);
      const key = this.parseType();
      if (check(this.state, TOKEN_TYPES.COLON)) {
        advance(this.state);
        const value = this.parseType();
        expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after dict type");
        return { type: 'DictType', key, value, span: spanFrom(this.state, start) };
      }
      expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after set type");
      return { type: 'SetType', element: key, span: spanFrom(this.state, start) };
    }

    // `fn A, B -> R`; no arrow means void
    case TOKEN_TYPES.FN: {
      advance(this.state);
      const params: TypeNode[] = [];
      if (!check(this.state, TOKEN_TYPES.ARROW) && this.canStartType()) {
        params.push(this.parseType());
        while (check(this.state, TOKEN_TYPES.COMMA)) {
          advance(this.state);
          params.push(this.parseType());
        }
      }
      let ret: TypeNode = { type: 'PrimitiveType', name: 'void', span: token.span };
      if (check(this.state, TOKEN_TYPES.ARROW)) {
        advance(this.state);
        ret = this.parseType();
      }
      return { type: 'FunctionType', params, ret, span: spanFrom(this.state, start) };
    }

    default:
      throw syntaxError(this.state, `Expected a type, found ${describeToken(token)}`);
  }
};
