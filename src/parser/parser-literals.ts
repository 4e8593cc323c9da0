/**
 * Parser Extension: Literal Parsing
 * Values, tuples, lists, sets, dicts, function literals and blob instances
 */

import { Parser } from './parser.js';
import type {
  AccessNode,
  BlobFieldInitNode,
  BlobInstanceNode,
  DictEntryNode,
  ExpressionNode,
  FunctionLiteralNode,
  ParamNode,
  ReadNode,
  SourceLocation,
  TypeNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  attempt,
  check,
  current,
  describeToken,
  expect,
  skipNewlines,
  spanFrom,
  syntaxError,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseValue(): ExpressionNode;
    parseGroupingOrTuple(): ExpressionNode;
    parseList(): ExpressionNode;
    parseSetOrDict(): ExpressionNode;
    parseFunction(): FunctionLiteralNode;
    parseBlobInstance(
      blob: ReadNode | AccessNode,
      start: SourceLocation
    ): BlobInstanceNode;
    parseNested<T>(parse: () => T): T;
  }
}

// ============================================================
// VALUES
// ============================================================

Parser.prototype.parseValue = function (this: Parser): ExpressionNode {
  const token = advance(this.state);
  const span = token.span;

  switch (token.type) {
    case TOKEN_TYPES.INT: {
      const value = Number(token.value);
      if (!Number.isSafeInteger(value)) {
        throw syntaxError(
          this.state,
          `Integer literal '${token.value}' is out of range`,
          token,
          'SYLT-P003'
        );
      }
      return { type: 'IntLiteral', value, span };
    }
    case TOKEN_TYPES.FLOAT:
      return {
        type: 'FloatLiteral',
        value: Number(token.value),
        text: token.value,
        span,
      };
    case TOKEN_TYPES.BOOL:
      return { type: 'BoolLiteral', value: token.value === 'true', span };
    case TOKEN_TYPES.STRING:
      return { type: 'StringLiteral', value: token.value, span };
    case TOKEN_TYPES.NIL:
      return { type: 'NilLiteral', span };
    default:
      throw syntaxError(
        this.state,
        `Cannot parse value, ${describeToken(token)} is not a valid value`,
        token,
        'SYLT-P003'
      );
  }
};

/**
 * Brackets open a fresh context: blob literals are allowed again and
 * newlines are insignificant.
 */
Parser.prototype.parseNested = function <T>(this: Parser, parse: () => T): T {
  const saved = this.state.noBlobLiteral;
  this.state.noBlobLiteral = false;
  try {
    return parse();
  } finally {
    this.state.noBlobLiteral = saved;
  }
};

/** Elements are separated by `,`; the closer may follow a trailing comma */
function expectSeparator(parser: Parser, closer: string, what: string): void {
  skipNewlines(parser.state);
  if (check(parser.state, TOKEN_TYPES.COMMA)) {
    advance(parser.state);
    skipNewlines(parser.state);
    return;
  }
  if (!check(parser.state, closer)) {
    throw syntaxError(
      parser.state,
      `Expected ',' or the end of the ${what}, found ${describeToken(current(parser.state))}`,
      current(parser.state),
      'SYLT-P002'
    );
  }
}

// ============================================================
// TUPLES AND GROUPING
// ============================================================

/**
 * `(e)` is a grouping and yields `e` itself. Empty parens, a comma
 * anywhere, or a leading comma make a tuple: `()`, `(,)`, `(1,)`, `(1, 2)`.
 */
Parser.prototype.parseGroupingOrTuple = function (this: Parser): ExpressionNode {
  const start = advance(this.state).span.start; // consume (

  return this.parseNested(() => {
    skipNewlines(this.state);
    let isTuple = check(this.state, TOKEN_TYPES.COMMA, TOKEN_TYPES.RPAREN);
    if (check(this.state, TOKEN_TYPES.COMMA)) {
      advance(this.state);
      skipNewlines(this.state);
    }

    const elements: ExpressionNode[] = [];
    while (!check(this.state, TOKEN_TYPES.RPAREN)) {
      elements.push(this.parseExpression());
      skipNewlines(this.state);
      if (check(this.state, TOKEN_TYPES.COMMA)) isTuple = true;
      expectSeparator(this, TOKEN_TYPES.RPAREN, 'tuple');
    }
    expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')'");

    const [only] = elements;
    if (!isTuple && only) return only;
    return { type: 'TupleLiteral', elements, span: spanFrom(this.state, start) };
  });
};

// ============================================================
// LISTS, SETS AND DICTS
// ============================================================

Parser.prototype.parseList = function (this: Parser): ExpressionNode {
  const start = advance(this.state).span.start; // consume [

  return this.parseNested(() => {
    skipNewlines(this.state);
    const elements: ExpressionNode[] = [];
    while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
      elements.push(this.parseExpression());
      expectSeparator(this, TOKEN_TYPES.RBRACKET, 'list');
    }
    expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']'");
    return { type: 'ListLiteral', elements, span: spanFrom(this.state, start) };
  });
};

/**
 * `{}` is the empty set and `{:}` the empty dict. The first entry decides
 * the kind; an undecided literal is a set.
 */
Parser.prototype.parseSetOrDict = function (this: Parser): ExpressionNode {
  const start = advance(this.state).span.start; // consume {

  return this.parseNested(() => {
    const elements: ExpressionNode[] = [];
    const entries: DictEntryNode[] = [];
    let isDict: boolean | undefined;

    skipNewlines(this.state);
    while (!check(this.state, TOKEN_TYPES.RBRACE)) {
      // Free-standing colon: the empty dict pair
      if (check(this.state, TOKEN_TYPES.COLON)) {
        if (isDict !== undefined) {
          throw syntaxError(
            this.state,
            `Empty dict pair is invalid in a ${isDict ? 'dict' : 'set'}`,
            current(this.state),
            'SYLT-P005'
          );
        }
        isDict = true;
        advance(this.state);
        expectSeparator(this, TOKEN_TYPES.RBRACE, 'dict');
        continue;
      }

      const key = this.parseExpression();
      isDict ??= check(this.state, TOKEN_TYPES.COLON);
      if (isDict) {
        if (!check(this.state, TOKEN_TYPES.COLON)) {
          throw syntaxError(
            this.state,
            "Expected ':' for dict pair",
            current(this.state),
            'SYLT-P005'
          );
        }
        advance(this.state);
        skipNewlines(this.state);
        const value = this.parseExpression();
        entries.push({
          type: 'DictEntry',
          key,
          value,
          span: { start: key.span.start, end: value.span.end },
        });
      } else {
        if (check(this.state, TOKEN_TYPES.COLON)) {
          throw syntaxError(
            this.state,
            'Empty dict pair is invalid in a set',
            current(this.state),
            'SYLT-P005'
          );
        }
        elements.push(key);
      }
      expectSeparator(this, TOKEN_TYPES.RBRACE, isDict ? 'dict' : 'set');
    }
    expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}'");

    const span = spanFrom(this.state, start);
    return isDict === true
      ? { type: 'DictLiteral', entries, span }
      : { type: 'SetLiteral', elements, span };
  });
};

// ============================================================
// FUNCTION LITERALS
// ============================================================

/**
 * `fn a: int, b: str -> bool { ... }`
 * Without `->`, or when no type follows it, the function returns void.
 */
Parser.prototype.parseFunction = function (this: Parser): FunctionLiteralNode {
  const start = expect(
    this.state,
    TOKEN_TYPES.FN,
    "Expected 'fn' for function expression"
  ).span.start;

  const params: ParamNode[] = [];
  let ret: TypeNode | undefined;
  while (ret === undefined) {
    const token = current(this.state);
    const voidType: TypeNode = {
      type: 'PrimitiveType',
      name: 'void',
      span: token.span,
    };

    switch (token.type) {
      case TOKEN_TYPES.IDENTIFIER: {
        advance(this.state);
        expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after parameter name");
        const annotation = this.parseType();
        params.push({
          type: 'Param',
          name: token.value,
          annotation,
          span: spanFrom(this.state, token.span.start),
        });
        if (check(this.state, TOKEN_TYPES.COMMA)) {
          advance(this.state);
        } else if (!check(this.state, TOKEN_TYPES.ARROW, TOKEN_TYPES.LBRACE)) {
          throw syntaxError(
            this.state,
            "Expected ',' '{' or '->' after type parameter"
          );
        }
        break;
      }

      case TOKEN_TYPES.ARROW:
        advance(this.state);
        ret = attempt(this.state, () => this.parseType()) ?? voidType;
        break;

      case TOKEN_TYPES.LBRACE:
        ret = voidType;
        break;

      default:
        throw syntaxError(
          this.state,
          `Didn't expect ${describeToken(token)} in function`
        );
    }
  }

  const body = this.parseBlock();
  return {
    type: 'FunctionLiteral',
    params,
    ret,
    body,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// BLOB INSTANCES
// ============================================================

/**
 * Fields of `Name { a: 1, b: 2 }` after the name has been parsed.
 * Fields end at `,`, a newline or the closing brace.
 */
Parser.prototype.parseBlobInstance = function (
  this: Parser,
  blob: ReadNode | AccessNode,
  start: SourceLocation
): BlobInstanceNode {
  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after blob name");

  const fields = this.parseNested(() => {
    const inits: BlobFieldInitNode[] = [];
    for (;;) {
      const token = current(this.state);
      if (token.type === TOKEN_TYPES.NEWLINE) {
        advance(this.state);
        continue;
      }
      if (token.type === TOKEN_TYPES.RBRACE || token.type === TOKEN_TYPES.EOF) {
        break;
      }
      if (token.type !== TOKEN_TYPES.IDENTIFIER) {
        throw syntaxError(
          this.state,
          `Unexpected token ${describeToken(token)} in blob initializer`
        );
      }

      advance(this.state);
      expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after field name");
      const value = this.parseExpression();
      if (
        !check(this.state, TOKEN_TYPES.COMMA, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.RBRACE)
      ) {
        throw syntaxError(this.state, "Expected a delimiter: newline or ','");
      }
      if (check(this.state, TOKEN_TYPES.COMMA)) advance(this.state);

      inits.push({
        type: 'BlobFieldInit',
        name: token.value,
        value,
        span: { start: token.span.start, end: value.span.end },
      });
    }
    return inits;
  });

  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}' after blob initializer");
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    throw syntaxError(this.state, '', current(this.state), 'SYLT-P006');
  }

  return {
    type: 'BlobInstance',
    blob,
    fields,
    span: spanFrom(this.state, start),
  };
};
