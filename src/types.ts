/**
 * sylt AST Types
 * Source locations, tokens and the syntax tree shared by parser and compiler
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

export {
  SyltError,
  LexerError,
  ParseError,
  CompileError,
  TypeCheckError,
  RuntimeError,
  ExternTypeMismatchError,
  ExternError,
  type ErrorSite,
  type SyltErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INT: 'INT',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  BOOL: 'BOOL',
  NIL: 'NIL',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // * (also the unknown type)
  SLASH: 'SLASH', // /

  // Assignment
  ASSIGN: 'ASSIGN', // =
  PLUS_ASSIGN: 'PLUS_ASSIGN', // +=
  MINUS_ASSIGN: 'MINUS_ASSIGN', // -=
  STAR_ASSIGN: 'STAR_ASSIGN', // *=
  SLASH_ASSIGN: 'SLASH_ASSIGN', // /=
  COLON_ASSIGN: 'COLON_ASSIGN', // :=
  DOUBLE_COLON: 'DOUBLE_COLON', // ::

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=
  ASSERT_EQ: 'ASSERT_EQ', // <=>

  // Boolean operators
  BANG: 'BANG', // !
  AND: 'AND', // &&
  OR: 'OR', // ||

  // Punctuation
  ARROW: 'ARROW', // ->
  COLON: 'COLON', // :
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  PIPE_BAR: 'PIPE_BAR', // | (type unions)

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]

  // Keywords
  FN: 'FN',
  USE: 'USE',
  PRINT: 'PRINT',
  BLOB: 'BLOB',
  IF: 'IF',
  ELSE: 'ELSE',
  LOOP: 'LOOP',
  RET: 'RET',
  BREAK: 'BREAK',
  IN: 'IN',

  // Special
  NEWLINE: 'NEWLINE',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODE TYPES
// ============================================================

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM STRUCTURE
// ============================================================

/** One or more modules; the first one is the entry point. */
export interface ProgramNode {
  readonly type: 'Program';
  readonly modules: ModuleNode[];
}

export interface ModuleNode extends BaseNode {
  readonly type: 'Module';
  /** Path of the source file, used for the namespace key and error reports */
  readonly file: string;
  readonly statements: StatementNode[];
}

// ============================================================
// TYPE ANNOTATIONS
// ============================================================

export type PrimitiveTypeName =
  | 'int'
  | 'float'
  | 'bool'
  | 'str'
  | 'void'
  | 'unknown';

export interface PrimitiveTypeNode extends BaseNode {
  readonly type: 'PrimitiveType';
  readonly name: PrimitiveTypeName;
}

/** A blob name, optionally qualified through an imported module: `mod.Name` */
export interface NamedTypeNode extends BaseNode {
  readonly type: 'NamedType';
  readonly path: string[];
}

export interface TupleTypeNode extends BaseNode {
  readonly type: 'TupleType';
  readonly elements: TypeNode[];
}

export interface ListTypeNode extends BaseNode {
  readonly type: 'ListType';
  readonly element: TypeNode;
}

export interface SetTypeNode extends BaseNode {
  readonly type: 'SetType';
  readonly element: TypeNode;
}

export interface DictTypeNode extends BaseNode {
  readonly type: 'DictType';
  readonly key: TypeNode;
  readonly value: TypeNode;
}

export interface FunctionTypeNode extends BaseNode {
  readonly type: 'FunctionType';
  readonly params: TypeNode[];
  readonly ret: TypeNode;
}

export interface UnionTypeNode extends BaseNode {
  readonly type: 'UnionType';
  readonly variants: TypeNode[];
}

export type TypeNode =
  | PrimitiveTypeNode
  | NamedTypeNode
  | TupleTypeNode
  | ListTypeNode
  | SetTypeNode
  | DictTypeNode
  | FunctionTypeNode
  | UnionTypeNode;

// ============================================================
// ASSIGNABLES
// ============================================================

export interface ReadNode extends BaseNode {
  readonly type: 'Read';
  readonly name: string;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: AssignableNode;
  readonly args: ExpressionNode[];
}

/** Field access `a.b`, also used for qualified module access */
export interface AccessNode extends BaseNode {
  readonly type: 'Access';
  readonly target: AssignableNode;
  readonly field: string;
}

export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly target: AssignableNode;
  readonly index: ExpressionNode;
}

export type AssignableNode = ReadNode | CallNode | AccessNode | IndexNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export interface IntLiteralNode extends BaseNode {
  readonly type: 'IntLiteral';
  readonly value: number;
}

export interface FloatLiteralNode extends BaseNode {
  readonly type: 'FloatLiteral';
  readonly value: number;
  /** Source text, kept for error messages about non-finite literals */
  readonly text: string;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface NilLiteralNode extends BaseNode {
  readonly type: 'NilLiteral';
}

export type BinaryOp =
  | 'Add'
  | 'Sub'
  | 'Mul'
  | 'Div'
  | 'Eq'
  | 'Neq'
  | 'Lt'
  | 'Gt'
  | 'Lteq'
  | 'Gteq'
  | 'And'
  | 'Or'
  | 'AssertEq'
  | 'In';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: 'Neg' | 'Not';
  readonly operand: ExpressionNode;
}

export interface TupleLiteralNode extends BaseNode {
  readonly type: 'TupleLiteral';
  readonly elements: ExpressionNode[];
}

export interface ListLiteralNode extends BaseNode {
  readonly type: 'ListLiteral';
  readonly elements: ExpressionNode[];
}

export interface SetLiteralNode extends BaseNode {
  readonly type: 'SetLiteral';
  readonly elements: ExpressionNode[];
}

export interface DictEntryNode extends BaseNode {
  readonly type: 'DictEntry';
  readonly key: ExpressionNode;
  readonly value: ExpressionNode;
}

export interface DictLiteralNode extends BaseNode {
  readonly type: 'DictLiteral';
  readonly entries: DictEntryNode[];
}

export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly name: string;
  readonly annotation: TypeNode;
}

/** `fn a: int, b: str -> bool { ... }` */
export interface FunctionLiteralNode extends BaseNode {
  readonly type: 'FunctionLiteral';
  readonly params: ParamNode[];
  readonly ret: TypeNode;
  readonly body: BlockStatementNode;
}

export interface BlobFieldInitNode extends BaseNode {
  readonly type: 'BlobFieldInit';
  readonly name: string;
  readonly value: ExpressionNode;
}

/** `Name { field: expr, ... }` */
export interface BlobInstanceNode extends BaseNode {
  readonly type: 'BlobInstance';
  readonly blob: ReadNode | AccessNode;
  readonly fields: BlobFieldInitNode[];
}

/** An assignable used as a value */
export interface GetNode extends BaseNode {
  readonly type: 'Get';
  readonly assignable: AssignableNode;
}

export type ExpressionNode =
  | IntLiteralNode
  | FloatLiteralNode
  | StringLiteralNode
  | BoolLiteralNode
  | NilLiteralNode
  | BinaryExprNode
  | UnaryExprNode
  | TupleLiteralNode
  | ListLiteralNode
  | SetLiteralNode
  | DictLiteralNode
  | FunctionLiteralNode
  | BlobInstanceNode
  | GetNode;

// ============================================================
// STATEMENTS
// ============================================================

/**
 * Definition: `a := 1`, `a :: 1`, `a: int = 1`, `a: int : 1`.
 * `constant` definitions cannot be assigned afterwards.
 */
export interface DefinitionNode extends BaseNode {
  readonly type: 'Definition';
  readonly name: string;
  readonly constant: boolean;
  readonly annotation: TypeNode | null;
  readonly value: ExpressionNode;
}

export type AssignmentOp = 'Assign' | 'Add' | 'Sub' | 'Mul' | 'Div';

export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly op: AssignmentOp;
  readonly target: AssignableNode;
  readonly value: ExpressionNode;
}

export interface PrintNode extends BaseNode {
  readonly type: 'Print';
  readonly value: ExpressionNode;
}

export interface UseNode extends BaseNode {
  readonly type: 'Use';
  /** Module name; resolves to a sibling file and becomes the alias */
  readonly module: string;
}

export interface BlobFieldNode extends BaseNode {
  readonly type: 'BlobField';
  readonly name: string;
  readonly annotation: TypeNode;
}

export interface BlobDefinitionNode extends BaseNode {
  readonly type: 'BlobDefinition';
  readonly name: string;
  readonly fields: BlobFieldNode[];
}

export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly then: BlockStatementNode;
  readonly otherwise: BlockStatementNode | IfNode | null;
}

/** `loop cond { ... }` or the unconditional `loop { ... }` */
export interface LoopNode extends BaseNode {
  readonly type: 'Loop';
  readonly condition: ExpressionNode | null;
  readonly body: BlockStatementNode;
}

export interface RetNode extends BaseNode {
  readonly type: 'Ret';
  readonly value: ExpressionNode | null;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface BlockStatementNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly value: ExpressionNode;
}

export interface EmptyStatementNode extends BaseNode {
  readonly type: 'EmptyStatement';
}

/**
 * Placeholder for a statement that failed to parse.
 * Only present in results that also carry syntax errors.
 */
export interface RecoveryErrorNode extends BaseNode {
  readonly type: 'RecoveryError';
  readonly message: string;
}

export type StatementNode =
  | DefinitionNode
  | AssignmentNode
  | PrintNode
  | UseNode
  | BlobDefinitionNode
  | IfNode
  | LoopNode
  | RetNode
  | BreakNode
  | BlockStatementNode
  | ExpressionStatementNode
  | EmptyStatementNode
  | RecoveryErrorNode;
