/**
 * Sable AST Types
 * Source locations, errors, tokens, and the expression tree
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

/** Error codes for programmatic handling */
export const SABLE_ERROR_CODES = {
  // Lexer errors
  LEX_UNEXPECTED_CHARACTER: 'LEX_UNEXPECTED_CHARACTER',
  LEX_UNTERMINATED: 'LEX_UNTERMINATED',
  LEX_INVALID_ESCAPE: 'LEX_INVALID_ESCAPE',
  LEX_INVALID_CHAR: 'LEX_INVALID_CHAR',

  // Parse errors
  PARSE_UNEXPECTED_TOKEN: 'PARSE_UNEXPECTED_TOKEN',
  PARSE_UNEXPECTED_EOF: 'PARSE_UNEXPECTED_EOF',
  PARSE_INVALID_SYNTAX: 'PARSE_INVALID_SYNTAX',
  PARSE_INVALID_TYPE: 'PARSE_INVALID_TYPE',
  PARSE_INVALID_OPERATOR: 'PARSE_INVALID_OPERATOR',

  // Type errors
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  TYPE_INVALID_OPERAND: 'TYPE_INVALID_OPERAND',
  TYPE_UNDEFINED_VARIABLE: 'TYPE_UNDEFINED_VARIABLE',
  TYPE_UNDEFINED_FUNCTION: 'TYPE_UNDEFINED_FUNCTION',
  TYPE_REDECLARATION: 'TYPE_REDECLARATION',
  TYPE_ANNOTATION_REQUIRED: 'TYPE_ANNOTATION_REQUIRED',
  TYPE_ARITY_MISMATCH: 'TYPE_ARITY_MISMATCH',
  TYPE_ARGUMENT_MISMATCH: 'TYPE_ARGUMENT_MISMATCH',
  TYPE_RETURN_MISMATCH: 'TYPE_RETURN_MISMATCH',
  TYPE_INVALID_ASSIGNMENT: 'TYPE_INVALID_ASSIGNMENT',

  // Internal invariant violations
  INTERNAL_INVARIANT: 'INTERNAL_INVARIANT',

  // Configuration
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type SableErrorCode =
  (typeof SABLE_ERROR_CODES)[keyof typeof SABLE_ERROR_CODES];

/** Structured error data for host applications */
export interface SableErrorData {
  readonly code: SableErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all Sable errors.
 * Provides structured data for host applications to format as needed.
 */
export class SableError extends Error {
  readonly code: SableErrorCode;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: SableErrorData) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'SableError';
    this.code = data.code;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): SableErrorData {
    return {
      code: this.code,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: SableErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Parse-time errors */
export class ParseError extends SableError {
  override readonly location: SourceLocation;

  constructor(
    code: SableErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Static type errors */
export class TypeCheckError extends SableError {
  override readonly location: SourceLocation;

  constructor(
    code: SableErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'TypeCheckError';
    this.location = location;
  }

  /** Create from an AST node */
  static fromNode(
    code: SableErrorCode,
    message: string,
    node: { location: SourceLocation },
    context?: Record<string, unknown>
  ): TypeCheckError {
    return new TypeCheckError(code, message, node.location, context);
  }
}

/**
 * Broken internal invariant. Never produced by a well-formed tree coming
 * out of the parser.
 */
export class InternalError extends SableError {
  constructor(message: string, location?: SourceLocation) {
    super({ code: SABLE_ERROR_CODES.INTERNAL_INVARIANT, message, location });
    this.name = 'InternalError';
  }
}

/** Invalid configuration file or options */
export class ConfigError extends SableError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({ code: SABLE_ERROR_CODES.CONFIG_INVALID, message, context });
    this.name = 'ConfigError';
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INT: 'INT',
  FLOAT: 'FLOAT',
  BOOL: 'BOOL',
  CHAR: 'CHAR',
  STRING: 'STRING',

  // Names
  IDENTIFIER: 'IDENTIFIER',
  KEYWORD: 'KEYWORD', // if else while for let fun
  TYPE_NAME: 'TYPE_NAME', // int float bool char string unit

  // Operators (value holds the symbol)
  OPERATOR: 'OPERATOR',

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  COMMA: 'COMMA', // ,
  SEMICOLON: 'SEMICOLON', // ;
  COLON: 'COLON', // :

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// TYPES, LITERALS, OPERATORS
// ============================================================

/**
 * Static types. `any` only ever appears as the return type of an
 * unannotated function that has not been checked yet.
 */
export type TypeName =
  | 'int'
  | 'float'
  | 'bool'
  | 'char'
  | 'string'
  | 'unit'
  | 'any';

export type LiteralValue =
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'char'; readonly value: string }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'unit' };

export type UnaryOp = '-' | '!';

export type BinaryOp =
  | '*'
  | '/'
  | '%'
  | '+'
  | '-'
  | '<'
  | '>'
  | '<='
  | '>='
  | '=='
  | '!='
  | '&&'
  | '||'
  | '='
  | '+='
  | '-=';

export type Operator = BinaryOp | UnaryOp;

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'BinaryExpr'
  | 'UnaryExpr'
  | 'Literal'
  | 'Variable'
  | 'Let'
  | 'Conditional'
  | 'WhileLoop'
  | 'ForLoop'
  | 'Block'
  | 'FunctionCall'
  | 'FunctionDecl';

interface BaseNode {
  readonly type: NodeType;
  readonly location: SourceLocation;
}

/** Binary operation. Location is the operator token. */
export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly left: ExpressionNode;
  readonly op: BinaryOp;
  readonly right: ExpressionNode;
}

/** Unary operation. Location is the operator token. */
export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly literal: LiteralValue;
}

export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: string;
}

/** let name = value */
export interface LetNode extends BaseNode {
  readonly type: 'Let';
  readonly name: string;
  readonly value: ExpressionNode;
}

/** if (condition) thenBranch [else elseBranch] */
export interface ConditionalNode extends BaseNode {
  readonly type: 'Conditional';
  readonly condition: ExpressionNode;
  readonly thenBranch: ExpressionNode;
  readonly elseBranch: ExpressionNode | null;
}

export interface WhileLoopNode extends BaseNode {
  readonly type: 'WhileLoop';
  readonly condition: ExpressionNode;
  readonly body: ExpressionNode;
}

/**
 * Desugared for loop: init runs once, condition guards each iteration,
 * increment runs after the body.
 */
export interface ForLoopNode extends BaseNode {
  readonly type: 'ForLoop';
  readonly init: LetNode;
  readonly condition: ExpressionNode;
  readonly increment: ExpressionNode;
  readonly body: ExpressionNode;
}

/** Function declared directly in a block */
export interface BlockFunction {
  readonly name: string;
  readonly definition: FunctionDefinition;
}

/**
 * Statement sequence with its own scope.
 * `functions` holds the bodies; `statements` holds a FunctionDecl
 * placeholder for each at its textual position.
 */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: readonly ExpressionNode[];
  readonly functions: readonly BlockFunction[];
}

export interface FunctionCallNode extends BaseNode {
  readonly type: 'FunctionCall';
  readonly name: string;
  readonly args: readonly ExpressionNode[];
}

export interface FunctionDeclNode extends BaseNode {
  readonly type: 'FunctionDecl';
  readonly name: string;
}

/**
 * Function body and signature. `returnType` starts as `any` when the
 * source has no annotation and is written once by the checker.
 */
export interface FunctionDefinition {
  readonly params: readonly string[];
  readonly paramTypes: readonly TypeName[];
  returnType: TypeName;
  readonly body: ExpressionNode;
  readonly location: SourceLocation;
}

export type ExpressionNode =
  | BinaryExprNode
  | UnaryExprNode
  | LiteralNode
  | VariableNode
  | LetNode
  | ConditionalNode
  | WhileLoopNode
  | ForLoopNode
  | BlockNode
  | FunctionCallNode
  | FunctionDeclNode;

// ============================================================
// PARSER OPTIONS
// ============================================================

/**
 * How operators of the same precedence tier group.
 * - right: split at the first operator of the tier, `a - b - c` is `a - (b - c)`
 * - left: split at the last operator of the tier, `a - b - c` is `(a - b) - c`
 */
export type Associativity = 'right' | 'left';

export interface ParseOptions {
  /** Grouping for same-tier operators (default: right) */
  readonly associativity?: Associativity | undefined;
}
