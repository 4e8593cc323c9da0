/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'compile' | 'typecheck' | 'runtime';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SYLT-{category letter}{3-digit} (e.g., SYLT-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (SYLT-L0xx)
  {
    errorId: 'SYLT-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
  },
  {
    errorId: 'SYLT-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: 'Unexpected character: {char}',
  },
  {
    errorId: 'SYLT-L003',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{char}',
  },

  // Parse Errors (SYLT-P0xx)
  {
    errorId: 'SYLT-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: '{message}',
  },
  {
    errorId: 'SYLT-P002',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: '{message}',
  },
  {
    errorId: 'SYLT-P003',
    category: 'parse',
    description: 'Invalid literal',
    messageTemplate: '{message}',
  },
  {
    errorId: 'SYLT-P004',
    category: 'parse',
    description: 'Arrow without call',
    messageTemplate: "Expected a call-expression after '->'",
  },
  {
    errorId: 'SYLT-P005',
    category: 'parse',
    description: 'Mixed set and dict entries',
    messageTemplate: '{message}',
  },
  {
    errorId: 'SYLT-P006',
    category: 'parse',
    description: 'Blob literal followed by else',
    messageTemplate: 'Parsed a blob instance not an if-statement',
  },
  {
    errorId: 'SYLT-P007',
    category: 'parse',
    description: 'Missing statement terminator',
    messageTemplate: 'Expected newline after statement',
  },

  // Compile Errors (SYLT-C0xx)
  {
    errorId: 'SYLT-C001',
    category: 'compile',
    description: 'Unknown variable',
    messageTemplate: "No active variable called '{name}' could be found",
  },
  {
    errorId: 'SYLT-C002',
    category: 'compile',
    description: 'Duplicate global',
    messageTemplate: "A global variable with the name '{name}' already exists",
  },
  {
    errorId: 'SYLT-C003',
    category: 'compile',
    description: 'Duplicate module',
    messageTemplate: "Reading module '{name}' twice",
  },
  {
    errorId: 'SYLT-C004',
    category: 'compile',
    description: 'Unknown module',
    messageTemplate: "Unknown module '{name}'",
  },
  {
    errorId: 'SYLT-C005',
    category: 'compile',
    description: 'Assignment to call',
    messageTemplate: 'Cannot assign to result from function call',
  },
  {
    errorId: 'SYLT-C006',
    category: 'compile',
    description: 'Assignment to constant',
    messageTemplate: "Cannot assign to constant '{name}'",
  },
  {
    errorId: 'SYLT-C007',
    category: 'compile',
    description: 'Unknown type',
    messageTemplate: "Unknown type '{name}'",
  },
  {
    errorId: 'SYLT-C008',
    category: 'compile',
    description: 'Non-finite float literal',
    messageTemplate: "Float literal '{text}' is not finite",
  },
  {
    errorId: 'SYLT-C009',
    category: 'compile',
    description: 'Misplaced statement',
    messageTemplate: "'{statement}' is only allowed {where}",
  },
  {
    errorId: 'SYLT-C010',
    category: 'compile',
    description: 'Duplicate local',
    messageTemplate:
      "A variable called '{name}' is already defined in this scope",
  },
  {
    errorId: 'SYLT-C011',
    category: 'compile',
    description: 'Duplicate extern',
    messageTemplate: "Extern function '{name}' is registered twice",
  },
  {
    errorId: 'SYLT-C012',
    category: 'compile',
    description: 'Unlinkable extern',
    messageTemplate: "Cannot link extern function '{name}'",
  },
  {
    errorId: 'SYLT-C013',
    category: 'compile',
    description: 'Module used as value',
    messageTemplate: "'{name}' is a module, not a value",
  },
  {
    errorId: 'SYLT-C014',
    category: 'compile',
    description: 'Duplicate blob field',
    messageTemplate: "Field '{field}' is declared twice in blob '{blob}'",
  },
  {
    errorId: 'SYLT-C015',
    category: 'compile',
    description: 'Statement failed to parse',
    messageTemplate: 'Cannot compile a statement that failed to parse',
  },
  {
    errorId: 'SYLT-C016',
    category: 'compile',
    description: 'Module file missing',
    messageTemplate: "Cannot find module '{name}' at {path}",
  },
  {
    errorId: 'SYLT-C017',
    category: 'compile',
    description: 'Invalid program file',
    messageTemplate: 'Invalid compiled program: {reason}',
  },

  // Typecheck Errors (SYLT-T0xx)
  {
    errorId: 'SYLT-T001',
    category: 'typecheck',
    description: 'Definition type mismatch',
    messageTemplate: "Cannot define '{name}' of type {expected} as {actual}",
  },
  {
    errorId: 'SYLT-T002',
    category: 'typecheck',
    description: 'Assignment type mismatch',
    messageTemplate: 'Cannot assign {actual} where {expected} is stored',
  },
  {
    errorId: 'SYLT-T003',
    category: 'typecheck',
    description: 'Argument type mismatch',
    messageTemplate: 'Argument {index} has type {actual}, expected {expected}',
  },
  {
    errorId: 'SYLT-T004',
    category: 'typecheck',
    description: 'Return type mismatch',
    messageTemplate: 'Function returns {actual}, declared {expected}',
  },
  {
    errorId: 'SYLT-T005',
    category: 'typecheck',
    description: 'Field type mismatch',
    messageTemplate:
      "Field '{field}' of blob '{blob}' expects {expected}, got {actual}",
  },
  {
    errorId: 'SYLT-T006',
    category: 'typecheck',
    description: 'Missing blob field',
    messageTemplate: "Blob '{blob}' is missing field '{field}'",
  },
  {
    errorId: 'SYLT-T007',
    category: 'typecheck',
    description: 'Operation type error',
    messageTemplate: '{message}',
  },

  // Runtime Errors (SYLT-R0xx)
  {
    errorId: 'SYLT-R001',
    category: 'runtime',
    description: 'Operator type error',
    messageTemplate: "Cannot apply '{op}' to {types}",
  },
  {
    errorId: 'SYLT-R002',
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: 'Division by zero',
  },
  {
    errorId: 'SYLT-R003',
    category: 'runtime',
    description: 'Index out of range',
    messageTemplate:
      'Index {index} is out of range for a {kind} of length {length}',
  },
  {
    errorId: 'SYLT-R004',
    category: 'runtime',
    description: 'Missing dict key',
    messageTemplate: 'Key {key} is not in the dict',
  },
  {
    errorId: 'SYLT-R005',
    category: 'runtime',
    description: 'Unknown blob field',
    messageTemplate: "Blob '{blob}' has no field '{field}'",
  },
  {
    errorId: 'SYLT-R006',
    category: 'runtime',
    description: 'Value not callable',
    messageTemplate: 'Cannot call a value of type {type}',
  },
  {
    errorId: 'SYLT-R007',
    category: 'runtime',
    description: 'Wrong number of arguments',
    messageTemplate: 'Function expects {expected} arguments, got {actual}',
  },
  {
    errorId: 'SYLT-R008',
    category: 'runtime',
    description: 'Assertion failed',
    messageTemplate: 'Assertion failed',
  },
  {
    errorId: 'SYLT-R009',
    category: 'runtime',
    description: 'Extern argument mismatch',
    messageTemplate: "Extern function '{name}' cannot take arguments ({types})",
  },
  {
    errorId: 'SYLT-R010',
    category: 'runtime',
    description: 'Extern failure',
    messageTemplate: "Extern function '{name}' failed: {message}",
  },
  {
    errorId: 'SYLT-R011',
    category: 'runtime',
    description: 'Unhashable value',
    messageTemplate: 'Cannot hash non-finite float {value}',
  },
  {
    errorId: 'SYLT-R012',
    category: 'runtime',
    description: 'Invalid index',
    messageTemplate: 'Cannot index {target} with {index}',
  },
  {
    errorId: 'SYLT-R013',
    category: 'runtime',
    description: 'Condition not bool',
    messageTemplate: 'Expected a bool condition, got {type}',
  },
  {
    errorId: 'SYLT-R014',
    category: 'runtime',
    description: 'Not a blob',
    messageTemplate: 'Cannot instantiate a value of type {type}',
  },
  {
    errorId: 'SYLT-R015',
    category: 'runtime',
    description: 'Field access on non-instance',
    messageTemplate: "Cannot access field '{field}' on {type}",
  },
  {
    errorId: 'SYLT-R016',
    category: 'runtime',
    description: 'Integer overflow',
    messageTemplate: 'Integer overflow: {value} is outside the int range',
  },
  {
    errorId: 'SYLT-R900',
    category: 'runtime',
    description: 'Internal VM fault',
    messageTemplate: 'Internal VM fault: {detail}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "int", actual: "str"})
 * // Returns: "Expected int, got str"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      // Unclosed brace
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
