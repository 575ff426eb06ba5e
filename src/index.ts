/**
 * Sable Module
 * Exports lexer, parser, type checker, and AST types
 */

export { LexerError, tokenize } from './lexer/index.js';
export { Parser, parse, parseTokens } from './parser/index.js';
export {
  Environment,
  TypeChecker,
  typeCheck,
  type CheckErrorEvent,
  type CheckObservability,
  type CheckOptions,
  type Closure,
  type ClosureState,
  type FunctionCheckEvent,
  type ScopeEvent,
} from './checker/index.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  loadConfig,
  parseConfig,
  type OutputFormat,
  type SableConfig,
} from './config.js';
export {
  checkSource,
  formatError,
  type CheckSourceOptions,
  type CheckSourceResult,
} from './cli-shared.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ConfigError,
  InternalError,
  ParseError,
  SABLE_ERROR_CODES,
  SableError,
  TypeCheckError,
  type SableErrorCode,
  type SableErrorData,
} from './types.js';

// ============================================================
// AST TYPES
// ============================================================
export type {
  Associativity,
  BinaryExprNode,
  BinaryOp,
  BlockFunction,
  BlockNode,
  ConditionalNode,
  ExpressionNode,
  ForLoopNode,
  FunctionCallNode,
  FunctionDeclNode,
  FunctionDefinition,
  LetNode,
  LiteralNode,
  LiteralValue,
  NodeType,
  Operator,
  ParseOptions,
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
  TypeName,
  UnaryExprNode,
  UnaryOp,
  VariableNode,
  WhileLoopNode,
} from './types.js';
export { TOKEN_TYPES } from './types.js';
