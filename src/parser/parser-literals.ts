/**
 * Parser Extension: Literal Parsing
 * Booleans, strings, numbers, quantities, temporal literals, `{}` and
 * type specifiers
 */

import { Parser } from './parser.js';
import type { LiteralNode, LiteralValue, TypeSpecifier } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { advance, check, current, expect, makeSpan } from './state.js';
import { CALENDAR_UNITS, isNameToken } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseLiteral(): LiteralNode;
    parseNumberLiteral(): LiteralNode;
    parseTypeSpecifier(): TypeSpecifier;
  }
}

Parser.prototype.parseLiteral = function (this: Parser): LiteralNode {
  const token = current(this.state);

  const simple = (literal: LiteralValue): LiteralNode => {
    advance(this.state);
    return { type: 'Literal', literal, span: token.span };
  };

  switch (token.type) {
    case TOKEN_TYPES.TRUE:
      return simple({ kind: 'boolean', value: true });
    case TOKEN_TYPES.FALSE:
      return simple({ kind: 'boolean', value: false });
    case TOKEN_TYPES.STRING:
      return simple({ kind: 'string', value: token.value });
    case TOKEN_TYPES.DATE:
      return simple({ kind: 'date', value: token.value });
    case TOKEN_TYPES.DATETIME:
      return simple({ kind: 'dateTime', value: token.value });
    case TOKEN_TYPES.TIME:
      return simple({ kind: 'time', value: token.value });
    case TOKEN_TYPES.LONG_NUMBER:
      return simple({ kind: 'long', value: BigInt(token.value) });
    case TOKEN_TYPES.NUMBER:
      return this.parseNumberLiteral();
    case TOKEN_TYPES.LBRACE: {
      advance(this.state);
      const close = expect(this.state, TOKEN_TYPES.RBRACE, "'}'");
      return {
        type: 'Literal',
        literal: { kind: 'empty' },
        span: makeSpan(token.span.start, close.span.end),
      };
    }
    default:
      throw new ParseError(
        'FP-P005',
        `Invalid literal: ${token.value}`,
        token.span.start,
        { text: token.value }
      );
  }
};

/**
 * Integer, decimal or quantity (`5 'mg'`, `3 days`).
 */
Parser.prototype.parseNumberLiteral = function (this: Parser): LiteralNode {
  const token = advance(this.state);
  const next = current(this.state);

  if (next.type === TOKEN_TYPES.STRING) {
    advance(this.state);
    return {
      type: 'Literal',
      literal: {
        kind: 'quantity',
        value: token.value,
        unit: next.value,
        calendar: false,
      },
      span: makeSpan(token.span.start, next.span.end),
    };
  }

  if (next.type === TOKEN_TYPES.IDENTIFIER && CALENDAR_UNITS.has(next.value)) {
    advance(this.state);
    return {
      type: 'Literal',
      literal: {
        kind: 'quantity',
        value: token.value,
        unit: next.value,
        calendar: true,
      },
      span: makeSpan(token.span.start, next.span.end),
    };
  }

  const literal: LiteralValue = token.value.includes('.')
    ? { kind: 'decimal', value: token.value }
    : { kind: 'integer', value: BigInt(token.value) };
  return { type: 'Literal', literal, span: token.span };
};

/**
 * Name or Namespace.Name after `is` / `as`.
 */
Parser.prototype.parseTypeSpecifier = function (this: Parser): TypeSpecifier {
  const first = current(this.state);
  if (!isNameToken(first, false)) {
    throw new ParseError(
      'FP-P004',
      `Invalid type specifier: ${first.value || 'end of expression'}`,
      first.span.start,
      { text: first.value }
    );
  }
  advance(this.state);

  if (check(this.state, TOKEN_TYPES.DOT)) {
    advance(this.state);
    const second = current(this.state);
    if (!isNameToken(second, false)) {
      throw new ParseError(
        'FP-P004',
        `Invalid type specifier: ${first.value}.${second.value}`,
        second.span.start,
        { text: `${first.value}.${second.value}` }
      );
    }
    advance(this.state);
    return { namespace: first.value, name: second.value };
  }

  return { name: first.value };
};
