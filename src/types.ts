/**
 * FHIRPath Core Types
 * Tokens, AST nodes and source locations shared by the lexer, parser,
 * evaluator and type inference.
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
// TOKENS
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  NUMBER: 'NUMBER',
  LONG_NUMBER: 'LONG_NUMBER',
  DATE: 'DATE',
  DATETIME: 'DATETIME',
  TIME: 'TIME',
  TRUE: 'TRUE',
  FALSE: 'FALSE',

  // Names
  IDENTIFIER: 'IDENTIFIER',
  DELIMITED_IDENTIFIER: 'DELIMITED_IDENTIFIER',
  EXTERNAL_CONSTANT: 'EXTERNAL_CONSTANT',
  THIS: 'THIS',
  INDEX: 'INDEX',
  TOTAL: 'TOTAL',

  // Keyword operators
  AND: 'AND',
  OR: 'OR',
  XOR: 'XOR',
  IMPLIES: 'IMPLIES',
  IN: 'IN',
  CONTAINS: 'CONTAINS',
  IS: 'IS',
  AS: 'AS',
  DIV: 'DIV',
  MOD: 'MOD',

  // Symbol operators
  EQ: 'EQ',
  NE: 'NE',
  EQUIVALENT: 'EQUIVALENT',
  NOT_EQUIVALENT: 'NOT_EQUIVALENT',
  LT: 'LT',
  LE: 'LE',
  GT: 'GT',
  GE: 'GE',
  PIPE: 'PIPE',
  PLUS: 'PLUS',
  MINUS: 'MINUS',
  STAR: 'STAR',
  SLASH: 'SLASH',
  AMPERSAND: 'AMPERSAND',

  // Delimiters
  DOT: 'DOT',
  COMMA: 'COMMA',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODES
// ============================================================

interface BaseNode {
  readonly span: SourceSpan;
}

export type LiteralValue =
  | { readonly kind: 'empty' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: bigint }
  | { readonly kind: 'long'; readonly value: bigint }
  /** Decimal text as written, to keep its scale */
  | { readonly kind: 'decimal'; readonly value: string }
  | { readonly kind: 'date'; readonly value: string }
  | { readonly kind: 'dateTime'; readonly value: string }
  | { readonly kind: 'time'; readonly value: string }
  | {
      readonly kind: 'quantity';
      readonly value: string;
      readonly unit: string;
      /** Unit written as a calendar word (`4 days`) rather than a string */
      readonly calendar: boolean;
    };

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly literal: LiteralValue;
}

export interface ExternalConstantNode extends BaseNode {
  readonly type: 'ExternalConstant';
  readonly name: string;
}

export interface ParenthesizedNode extends BaseNode {
  readonly type: 'Parenthesized';
  readonly expression: ExpressionNode;
}

export interface MemberNode extends BaseNode {
  readonly type: 'Member';
  readonly name: string;
}

export interface FunctionCallNode extends BaseNode {
  readonly type: 'FunctionCall';
  readonly name: string;
  /** Unevaluated arguments; functions decide when and against what focus */
  readonly args: readonly ExpressionNode[];
}

export interface ThisNode extends BaseNode {
  readonly type: 'This';
}

export interface IndexNode extends BaseNode {
  readonly type: 'Index';
}

export interface TotalNode extends BaseNode {
  readonly type: 'Total';
}

/** Invocations usable both as a path head and after `.` */
export type InvocationTermNode =
  | MemberNode
  | FunctionCallNode
  | ThisNode
  | IndexNode
  | TotalNode;

export type TermNode =
  | LiteralNode
  | ExternalConstantNode
  | ParenthesizedNode
  | InvocationTermNode;

export interface InvocationNode extends BaseNode {
  readonly type: 'Invocation';
  readonly target: ExpressionNode;
  readonly invocation: InvocationTermNode;
}

export interface IndexerNode extends BaseNode {
  readonly type: 'Indexer';
  readonly target: ExpressionNode;
  readonly index: ExpressionNode;
}

export interface PolarityNode extends BaseNode {
  readonly type: 'Polarity';
  readonly op: '+' | '-';
  readonly operand: ExpressionNode;
}

export type MultiplicativeOp = '*' | '/' | 'div' | 'mod';
export type AdditiveOp = '+' | '-' | '&';
export type InequalityOp = '<' | '<=' | '>' | '>=';
export type EqualityOp = '=' | '!=' | '~' | '!~';
export type MembershipOp = 'in' | 'contains';
export type LogicalOp = 'and' | 'or' | 'xor' | 'implies';

export type BinaryOp =
  | MultiplicativeOp
  | AdditiveOp
  | InequalityOp
  | EqualityOp
  | MembershipOp
  | LogicalOp
  | '|';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface TypeSpecifier {
  readonly namespace?: string | undefined;
  readonly name: string;
}

export interface TypeExprNode extends BaseNode {
  readonly type: 'TypeExpr';
  readonly op: 'is' | 'as';
  readonly operand: ExpressionNode;
  readonly typeSpecifier: TypeSpecifier;
}

export type ExpressionNode =
  | TermNode
  | InvocationNode
  | IndexerNode
  | PolarityNode
  | BinaryExprNode
  | TypeExprNode;

export type NodeType = ExpressionNode['type'];

// ============================================================
// ERRORS (re-exported for convenience)
// ============================================================

export {
  FhirPathError,
  LexerError,
  ParseError,
  EvaluationError,
  createError,
  evaluationError,
  type FhirPathErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
