/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import {
  readDateTime,
  readDelimitedIdentifier,
  readExternalConstant,
  readIdentifier,
  readNumber,
  readSpecialVariable,
  readString,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Skip whitespace and comments; returns when the next char is significant */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    if (isWhitespace(peek(state))) {
      advance(state);
      continue;
    }

    const two = peekString(state, 2);
    if (two === '//') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
      continue;
    }

    if (two === '/*') {
      const start = currentLocation(state);
      advance(state);
      advance(state);
      while (!isAtEnd(state) && peekString(state, 2) !== '*/') {
        advance(state);
      }
      if (isAtEnd(state)) {
        throw new LexerError('FP-L004', 'Unterminated block comment', start);
      }
      advance(state);
      advance(state);
      continue;
    }

    return;
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === "'") {
    return readString(state);
  }

  if (ch === '`') {
    return readDelimitedIdentifier(state);
  }

  // Number (positive only - polarity handled by parser)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  if (ch === '@') {
    return readDateTime(state);
  }

  if (ch === '$') {
    return readSpecialVariable(state);
  }

  if (ch === '%') {
    return readExternalConstant(state);
  }

  // Two-character operators (lookup table)
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  // Single-character operators (lookup table)
  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw new LexerError('FP-L002', `Unexpected character: ${ch}`, start, {
    char: ch,
  });
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
