/**
 * sylt Module
 * Exports lexer, parser, compiler, runtime and AST types
 */

export { nextToken, tokenize } from './lexer/index.js';
export { parse, parseSource, type ParseResult } from './parser/index.js';

// ============================================================
// COMPILER
// ============================================================
export {
  type Block,
  type CompileOptions,
  type CompileResult,
  compile,
  deserializeProgram,
  disassemble,
  formatOp,
  moduleKey,
  type Op,
  type OpName,
  PROGRAM_FORMAT,
  PROGRAM_VERSION,
  type Program,
  serializeProgram,
  type UpvalueDescriptor,
} from './compiler/index.js';

// ============================================================
// RUNTIME
// ============================================================
export * from './runtime/index.js';

// ============================================================
// CONFIGURATION AND MODULE LOADING
// ============================================================
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  type SyltConfig,
  type Verbosity,
} from './config.js';
export { loadProgram, type LoadOptions, type LoadResult } from './cli-module-loader.js';

export * from './types.js';
