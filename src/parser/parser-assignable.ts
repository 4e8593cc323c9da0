/**
 * Parser Extension: Assignables
 * Names followed by any chain of calls, field accesses and indexing
 */

import { Parser } from './parser.js';
import type { AssignableNode, ExpressionNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  expect,
  skipNewlines,
  spanFrom,
  syntaxError,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseAssignable(): AssignableNode;
    parseArgumentList(): ExpressionNode[];
  }
}

/** `a`, `a.b`, `a(1)`, `a[0]`, `a.b(1)[2].c` */
Parser.prototype.parseAssignable = function (this: Parser): AssignableNode {
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected an identifier');
  const start = name.span.start;
  let node: AssignableNode = { type: 'Read', name: name.value, span: name.span };

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN)) {
      const args = this.parseArgumentList();
      node = { type: 'Call', callee: node, args, span: spanFrom(this.state, start) };
    } else if (check(this.state, TOKEN_TYPES.DOT)) {
      advance(this.state);
      const field = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        "Expected a field name after '.'"
      );
      node = {
        type: 'Access',
        target: node,
        field: field.value,
        span: spanFrom(this.state, start),
      };
    } else if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      const index = this.parseNested(() => {
        skipNewlines(this.state);
        const expr = this.parseExpression();
        skipNewlines(this.state);
        return expr;
      });
      expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after index");
      node = { type: 'Index', target: node, index, span: spanFrom(this.state, start) };
    } else {
      return node;
    }
  }
};

/** `(a, b, c)`; arguments may span lines */
Parser.prototype.parseArgumentList = function (this: Parser): ExpressionNode[] {
  advance(this.state); // consume (

  return this.parseNested(() => {
    const args: ExpressionNode[] = [];
    skipNewlines(this.state);
    while (!check(this.state, TOKEN_TYPES.RPAREN)) {
      args.push(this.parseExpression());
      skipNewlines(this.state);
      if (check(this.state, TOKEN_TYPES.COMMA)) {
        advance(this.state);
        skipNewlines(this.state);
      } else if (!check(this.state, TOKEN_TYPES.RPAREN)) {
        throw syntaxError(
          this.state,
          "Expected ',' or ')' after argument",
          undefined,
          'SYLT-P002'
        );
      }
    }
    advance(this.state); // consume )
    return args;
  });
};
