/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ModuleNode, Token } from '../types.js';
import { ParseError } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts the tokens of one source file into a module.
 *
 * Methods are organized across multiple files:
 * - parser-module.ts: Module, statement loop, error recovery
 * - parser-statements.ts: Definitions, assignments, control flow, blocks
 * - parser-expr.ts: Precedence climbing, prefix and infix operators
 * - parser-literals.ts: Values, tuples, lists, sets, dicts, functions, blobs
 * - parser-assignable.ts: Names, calls, field access, indexing
 * - parser-types.ts: Type annotations
 *
 * Syntax errors never escape `parse()`: each malformed statement is
 * recorded in `errors` and replaced by a RecoveryError node.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, 'main.sy');
 * const module = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: Token[], file: string) {
    this.state = createParserState(tokens, file);
  }

  parse(): ModuleNode {
    return this.parseModule();
  }

  get errors(): ParseError[] {
    return this.state.errors;
  }
}
