/**
 * Parser Helpers
 * Lookahead predicates and AST utilities
 * @internal This module contains internal parser utilities
 */

import type {
  ExpressionNode,
  Token,
  TokenType,
  TypeSpecifier,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { type ParserState, current } from './state.js';

// ============================================================
// TOKEN SETS
// ============================================================

/**
 * Keywords that double as function or member names after `.`
 * (`.contains('x')`, `.is(Quantity)`, `` `div` `` aside).
 * @internal
 */
export const KEYWORD_NAME_TOKENS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.AND,
  TOKEN_TYPES.OR,
  TOKEN_TYPES.XOR,
  TOKEN_TYPES.IMPLIES,
  TOKEN_TYPES.IN,
  TOKEN_TYPES.CONTAINS,
  TOKEN_TYPES.IS,
  TOKEN_TYPES.AS,
  TOKEN_TYPES.DIV,
  TOKEN_TYPES.MOD,
]);

/**
 * Calendar duration keywords accepted as quantity units.
 * @internal
 */
export const CALENDAR_UNITS: ReadonlySet<string> = new Set([
  'year',
  'years',
  'month',
  'months',
  'week',
  'weeks',
  'day',
  'days',
  'hour',
  'hours',
  'minute',
  'minutes',
  'second',
  'seconds',
  'millisecond',
  'milliseconds',
]);

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/** @internal */
export function isNameToken(token: Token, allowKeywords: boolean): boolean {
  if (
    token.type === TOKEN_TYPES.IDENTIFIER ||
    token.type === TOKEN_TYPES.DELIMITED_IDENTIFIER
  ) {
    return true;
  }
  if (!allowKeywords) return false;
  return (
    KEYWORD_NAME_TOKENS.has(token.type) ||
    token.type === TOKEN_TYPES.TRUE ||
    token.type === TOKEN_TYPES.FALSE
  );
}

/** @internal */
export function isLiteralStart(state: ParserState): boolean {
  switch (current(state).type) {
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.LONG_NUMBER:
    case TOKEN_TYPES.DATE:
    case TOKEN_TYPES.DATETIME:
    case TOKEN_TYPES.TIME:
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
    case TOKEN_TYPES.LBRACE:
      return true;
    default:
      return false;
  }
}

// ============================================================
// AST UTILITIES
// ============================================================

/**
 * Read a type specifier out of a function argument such as the one in
 * `ofType(FHIR.Quantity)`, which the parser keeps as a plain path.
 * Returns undefined when the argument is not a bare (qualified) name.
 */
export function typeSpecifierFromExpression(
  node: ExpressionNode
): TypeSpecifier | undefined {
  if (node.type === 'Member') {
    return { name: node.name };
  }
  if (
    node.type === 'Invocation' &&
    node.target.type === 'Member' &&
    node.invocation.type === 'Member'
  ) {
    return { namespace: node.target.name, name: node.invocation.name };
  }
  if (node.type === 'Literal' && node.literal.kind === 'string') {
    return parseTypeName(node.literal.value);
  }
  return undefined;
}

/** Split `Namespace.Name` text into a specifier */
export function parseTypeName(text: string): TypeSpecifier {
  const dot = text.indexOf('.');
  if (dot === -1) return { name: text };
  return { namespace: text.slice(0, dot), name: text.slice(dot + 1) };
}

/** Render a specifier back to text */
export function formatTypeSpecifier(spec: TypeSpecifier): string {
  return spec.namespace ? `${spec.namespace}.${spec.name}` : spec.name;
}
