/**
 * Parser Extension: Terms and Invocation Chains
 * Path heads, `.member` / `.function(...)` chains and indexers
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  InvocationTermNode,
  TermNode,
  Token,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  peek,
  unexpectedToken,
} from './state.js';
import { isLiteralStart, isNameToken, KEYWORD_NAME_TOKENS } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parsePostfix(): ExpressionNode;
    parseTerm(): TermNode;
    parseInvocationTerm(allowKeywords: boolean): InvocationTermNode;
    parseArguments(): ExpressionNode[];
  }
}

/**
 * Term followed by any number of `.invocation` and `[index]` suffixes.
 */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  let node: ExpressionNode = this.parseTerm();

  for (;;) {
    if (check(this.state, TOKEN_TYPES.DOT)) {
      advance(this.state);
      const invocation = this.parseInvocationTerm(true);
      node = {
        type: 'Invocation',
        target: node,
        invocation,
        span: makeSpan(start, invocation.span.end),
      };
      continue;
    }

    if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      const index = this.parseExpression();
      const close = expect(this.state, TOKEN_TYPES.RBRACKET, "']'");
      node = {
        type: 'Indexer',
        target: node,
        index,
        span: makeSpan(start, close.span.end),
      };
      continue;
    }

    return node;
  }
};

Parser.prototype.parseTerm = function (this: Parser): TermNode {
  const token = current(this.state);

  if (isLiteralStart(this.state)) {
    return this.parseLiteral();
  }

  switch (token.type) {
    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const expression = this.parseExpression();
      const close = expect(this.state, TOKEN_TYPES.RPAREN, "')'");
      return {
        type: 'Parenthesized',
        expression,
        span: makeSpan(token.span.start, close.span.end),
      };
    }

    case TOKEN_TYPES.EXTERNAL_CONSTANT:
      advance(this.state);
      return {
        type: 'ExternalConstant',
        name: token.value,
        span: token.span,
      };

    default:
      break;
  }

  // Keyword-named functions at the head only when called: is(T), as(T)
  const allowKeyword =
    KEYWORD_NAME_TOKENS.has(token.type) &&
    peek(this.state, 1).type === TOKEN_TYPES.LPAREN;
  if (
    isNameToken(token, false) ||
    allowKeyword ||
    check(this.state, TOKEN_TYPES.THIS, TOKEN_TYPES.INDEX, TOKEN_TYPES.TOTAL)
  ) {
    return this.parseInvocationTerm(allowKeyword);
  }

  throw unexpectedToken(this.state);
};

/**
 * member | function(args) | $this | $index | $total
 */
Parser.prototype.parseInvocationTerm = function (
  this: Parser,
  allowKeywords: boolean
): InvocationTermNode {
  const token: Token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.THIS:
      advance(this.state);
      return { type: 'This', span: token.span };
    case TOKEN_TYPES.INDEX:
      advance(this.state);
      return { type: 'Index', span: token.span };
    case TOKEN_TYPES.TOTAL:
      advance(this.state);
      return { type: 'Total', span: token.span };
    default:
      break;
  }

  if (!isNameToken(token, allowKeywords)) {
    throw unexpectedToken(this.state, 'identifier or function call');
  }
  advance(this.state);

  if (
    check(this.state, TOKEN_TYPES.LPAREN) &&
    token.type !== TOKEN_TYPES.DELIMITED_IDENTIFIER
  ) {
    const args = this.parseArguments();
    const close = peek(this.state, -1);
    return {
      type: 'FunctionCall',
      name: token.value,
      args,
      span: makeSpan(token.span.start, close.span.end),
    };
  }

  return { type: 'Member', name: token.value, span: token.span };
};

/**
 * ( expr, expr, ... ) with the opening paren as current token.
 */
Parser.prototype.parseArguments = function (this: Parser): ExpressionNode[] {
  expect(this.state, TOKEN_TYPES.LPAREN, "'('");
  const args: ExpressionNode[] = [];

  if (check(this.state, TOKEN_TYPES.RPAREN)) {
    advance(this.state);
    return args;
  }

  for (;;) {
    args.push(this.parseExpression());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "')'");
  return args;
};
