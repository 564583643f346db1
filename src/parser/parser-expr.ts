/**
 * Parser Extension: Expression Parsing
 * Precedence chain from union (lowest) down to unary polarity
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  TokenType,
  TypeExprNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, check, current, makeSpan } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseUnion(): ExpressionNode;
    parseImplies(): ExpressionNode;
    parseOr(): ExpressionNode;
    parseAnd(): ExpressionNode;
    parseMembership(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseInequality(): ExpressionNode;
    parseTypeExpression(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parsePolarity(): ExpressionNode;
    parseBinaryLevel(
      operators: Partial<Record<TokenType, BinaryOp>>,
      next: () => ExpressionNode
    ): ExpressionNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const UNION_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PIPE]: '|',
};

const IMPLIES_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.IMPLIES]: 'implies',
};

const OR_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.OR]: 'or',
  [TOKEN_TYPES.XOR]: 'xor',
};

const AND_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.AND]: 'and',
};

const MEMBERSHIP_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.IN]: 'in',
  [TOKEN_TYPES.CONTAINS]: 'contains',
};

const EQUALITY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.EQ]: '=',
  [TOKEN_TYPES.NE]: '!=',
  [TOKEN_TYPES.EQUIVALENT]: '~',
  [TOKEN_TYPES.NOT_EQUIVALENT]: '!~',
};

const INEQUALITY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
};

const ADDITIVE_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.AMPERSAND]: '&',
};

const MULTIPLICATIVE_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.DIV]: 'div',
  [TOKEN_TYPES.MOD]: 'mod',
};

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseUnion();
};

/**
 * Left-associative loop shared by every binary level.
 */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: Partial<Record<TokenType, BinaryOp>>,
  next: () => ExpressionNode
): ExpressionNode {
  const start = current(this.state).span.start;
  let left = next();

  for (;;) {
    const op = operators[current(this.state).type];
    if (op === undefined) break;
    advance(this.state);
    const right = next();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseUnion = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(UNION_OPS, () => this.parseImplies());
};

Parser.prototype.parseImplies = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(IMPLIES_OPS, () => this.parseOr());
};

Parser.prototype.parseOr = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(OR_OPS, () => this.parseAnd());
};

Parser.prototype.parseAnd = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(AND_OPS, () => this.parseMembership());
};

Parser.prototype.parseMembership = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(MEMBERSHIP_OPS, () => this.parseEquality());
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseInequality());
};

Parser.prototype.parseInequality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(INEQUALITY_OPS, () =>
    this.parseTypeExpression()
  );
};

/**
 * Type operators take a type specifier, not an expression, on the right.
 */
Parser.prototype.parseTypeExpression = function (
  this: Parser
): ExpressionNode {
  const start = current(this.state).span.start;
  let operand = this.parseAdditive();

  while (check(this.state, TOKEN_TYPES.IS, TOKEN_TYPES.AS)) {
    const opToken = advance(this.state);
    const typeSpecifier = this.parseTypeSpecifier();
    const node: TypeExprNode = {
      type: 'TypeExpr',
      op: opToken.type === TOKEN_TYPES.IS ? 'is' : 'as',
      operand,
      typeSpecifier,
      span: makeSpan(start, current(this.state).span.start),
    };
    operand = node;
  }

  return operand;
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(ADDITIVE_OPS, () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  return this.parseBinaryLevel(MULTIPLICATIVE_OPS, () =>
    this.parsePolarity()
  );
};

Parser.prototype.parsePolarity = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.PLUS, TOKEN_TYPES.MINUS)) {
    const opToken = advance(this.state);
    const operand = this.parsePolarity();
    return {
      type: 'Polarity',
      op: opToken.type === TOKEN_TYPES.PLUS ? '+' : '-',
      operand,
      span: makeSpan(opToken.span.start, operand.span.end),
    };
  }

  return this.parsePostfix();
};
