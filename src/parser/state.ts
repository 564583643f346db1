/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Original expression text (for error messages) */
  readonly source: string;
}

export interface ParserStateOptions {
  source?: string;
}

export function createParserState(
  tokens: Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    source: options.source ?? '',
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: string[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** @internal */
export function expect(
  state: ParserState,
  type: string,
  description: string
): Token {
  if (check(state, type)) return advance(state);
  throw unexpectedToken(state, description, type);
}

/**
 * Build the error for the current token.
 * @internal
 */
export function unexpectedToken(
  state: ParserState,
  expected?: string,
  expectedType?: string
): ParseError {
  const token = current(state);
  if (token.type === TOKEN_TYPES.EOF) {
    const base = expected
      ? `Expected ${expected} but reached end of expression`
      : 'Unexpected end of expression';
    const hint = expectedType ? generateHint(expectedType, token) : null;
    return new ParseError(
      expected ? 'FP-P003' : 'FP-P002',
      hint ? `${base}. ${hint}` : base,
      token.span.start,
      { expected }
    );
  }

  const base = expected
    ? `Expected ${expected}, got '${token.value}'`
    : `Unexpected token: '${token.value}'`;
  const hint = generateHint(expectedType ?? '', token, previous(state));
  return new ParseError(
    expected ? 'FP-P003' : 'FP-P001',
    hint ? `${base}. ${hint}` : base,
    token.span.start,
    { token: token.value, expected }
  );
}

function previous(state: ParserState): Token | undefined {
  return state.pos > 0 ? state.tokens[state.pos - 1] : undefined;
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(
  expectedType: string,
  actualToken: Token,
  previousToken?: Token
): string | null {
  const actual = actualToken.type;

  if (expectedType === TOKEN_TYPES.RPAREN && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expectedType === TOKEN_TYPES.RBRACKET && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed bracket';
  }

  // Operators borrowed from other languages
  if (previousToken?.type === actual) {
    if (actual === TOKEN_TYPES.EQ) {
      return "Hint: Use '=' for equality, not '=='";
    }
    if (actual === TOKEN_TYPES.AMPERSAND) {
      return "Hint: Use 'and' instead of '&&'";
    }
    if (actual === TOKEN_TYPES.PIPE) {
      return "Hint: Use 'or' instead of '||'";
    }
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
