/**
 * sylt Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ModuleNode, Token } from '../types.js';
import { LexerError, type ParseError } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-module.js';
import './parser-statements.js';
import './parser-expr.js';
import './parser-literals.js';
import './parser-assignable.js';
import './parser-types.js';

export interface ParseResult {
  /** The module; statements that failed to parse are RecoveryError nodes */
  readonly ast: ModuleNode;
  /** Syntax errors (and a lexer error, when tokenizing failed) */
  readonly errors: (ParseError | LexerError)[];
  readonly success: boolean;
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse the tokens of one source file.
 *
 * Never throws on malformed input: every broken statement adds an error
 * and parsing resumes at the next statement.
 *
 * @example
 * ```typescript
 * const result = parse(tokenize(source, 'main.sy'), 'main.sy');
 * if (!result.success) {
 *   console.log('Errors:', result.errors);
 * }
 * ```
 */
export function parse(tokens: Token[], file: string): ParseResult {
  const parser = new Parser(tokens, file);
  const ast = parser.parse();
  return {
    ast,
    errors: parser.errors,
    success: parser.errors.length === 0,
  };
}

/** Tokenize and parse; a lexer error becomes the only reported error */
export function parseSource(source: string, file = '<input>'): ParseResult {
  let tokens: Token[];
  try {
    tokens = tokenize(source, file);
  } catch (err) {
    if (!(err instanceof LexerError)) throw err;
    const start = { line: err.site.line, column: err.site.column ?? 1, offset: 0 };
    return {
      ast: {
        type: 'Module',
        file,
        statements: [],
        span: { start, end: start },
      },
      errors: [err],
      success: false,
    };
  }
  return parse(tokens, file);
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
