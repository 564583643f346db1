/**
 * FHIRPath Engine
 * Exports lexer, parser, runtime, type inference and AST types
 */

export { tokenize } from './lexer/index.js';
export {
  formatTypeSpecifier,
  parse,
  parseTypeName,
} from './parser/index.js';
export * from './runtime/index.js';
export * from './inference/index.js';

// ============================================================
// AST TYPES
// ============================================================

export type {
  BinaryExprNode,
  BinaryOp,
  ExpressionNode,
  ExternalConstantNode,
  FunctionCallNode,
  IndexerNode,
  InvocationNode,
  LiteralNode,
  LiteralValue,
  MemberNode,
  NodeType,
  ParenthesizedNode,
  PolarityNode,
  SourceLocation,
  SourceSpan,
  Token,
  TokenType,
  TypeExprNode,
  TypeSpecifier,
} from './types.js';

// ============================================================
// ERRORS
// ============================================================

export {
  ERROR_REGISTRY,
  EvaluationError,
  FhirPathError,
  LexerError,
  ParseError,
  createError,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  type FhirPathErrorData,
} from './types.js';
