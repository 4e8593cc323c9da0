/**
 * sylt Error Classes
 * Structured error types with registry-based error codes
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';
import { formatType, type Type } from './runtime/core/value-types.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Where an error happened: the source file and line, column when known */
export interface ErrorSite {
  readonly file?: string | undefined;
  readonly line: number;
  readonly column?: number | undefined;
}

/** Structured error data for host applications */
export interface SyltErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly site?: ErrorSite | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

function lookupTemplate(errorId: string, category: ErrorCategory): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition.messageTemplate;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all sylt errors.
 * Provides structured data for host applications to format as needed.
 */
export class SyltError extends Error {
  readonly errorId: string;
  readonly site: ErrorSite | undefined;
  readonly context: Record<string, unknown> | undefined;

  constructor(data: SyltErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'SyltError';
    this.errorId = data.errorId;
    this.site = data.site;
    this.context = data.context;
  }

  get file(): string | undefined {
    return this.site?.file;
  }

  get line(): number | undefined {
    return this.site?.line;
  }

  /** Get structured error data for custom formatting */
  toData(): SyltErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      site: this.site,
      context: this.context,
    };
  }

  /** Format error for display: `file:line: message` (can be overridden by host) */
  format(formatter?: (data: SyltErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    if (!this.site) return this.message;
    const file = this.site.file ?? '<unknown>';
    return `${file}:${this.site.line}: ${this.message}`;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Tokenization errors */
export class LexerError extends SyltError {
  override readonly site: ErrorSite;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    site: ErrorSite
  ) {
    const template = lookupTemplate(errorId, 'lexer');
    super({
      errorId,
      message: renderMessage(template, context),
      site,
      context,
    });
    this.name = 'LexerError';
    this.site = site;
  }
}

/** Syntax errors: the offending token, file and line */
export class ParseError extends SyltError {
  override readonly site: ErrorSite;

  constructor(
    errorId: string,
    message: string,
    site: ErrorSite,
    context?: Record<string, unknown>
  ) {
    const template = lookupTemplate(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(template, { ...context, message }),
      site,
      context,
    });
    this.name = 'ParseError';
    this.site = site;
  }
}

/** Name resolution, duplicate definition and structural compile failures */
export class CompileError extends SyltError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    site?: ErrorSite
  ) {
    const template = lookupTemplate(errorId, 'compile');
    super({
      errorId,
      message: renderMessage(template, context),
      site,
      context,
    });
    this.name = 'CompileError';
  }
}

/** Shape mismatches found by the typecheck pass */
export class TypeCheckError extends SyltError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    site?: ErrorSite
  ) {
    const template = lookupTemplate(errorId, 'typecheck');
    super({
      errorId,
      message: renderMessage(template, context),
      site,
      context,
    });
    this.name = 'TypeCheckError';
  }
}

/** Runtime execution errors */
export class RuntimeError extends SyltError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    site?: ErrorSite
  ) {
    const template = lookupTemplate(errorId, 'runtime');
    super({
      errorId,
      message: renderMessage(template, context),
      site,
      context,
    });
    this.name = 'RuntimeError';
  }
}

/** An extern function was called with arguments of the wrong count or shape */
export class ExternTypeMismatchError extends RuntimeError {
  readonly functionName: string;
  readonly argumentTypes: readonly Type[];

  constructor(
    functionName: string,
    argumentTypes: readonly Type[],
    site?: ErrorSite
  ) {
    super(
      'SYLT-R009',
      {
        name: functionName,
        types: argumentTypes.map((ty) => formatType(ty)).join(', '),
      },
      site
    );
    this.name = 'ExternTypeMismatchError';
    this.functionName = functionName;
    this.argumentTypes = argumentTypes;
  }
}

/** A host-reported failure inside an extern function */
export class ExternError extends RuntimeError {
  readonly functionName: string;
  readonly detail: string;

  constructor(functionName: string, detail: string, site?: ErrorSite) {
    super('SYLT-R010', { name: functionName, message: detail }, site);
    this.name = 'ExternError';
    this.functionName = functionName;
    this.detail = detail;
  }
}
