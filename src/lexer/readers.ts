/**
 * Token Readers
 * Functions to read specific token types from expression text
 */

import type { Token } from '../types.js';
import { LexerError, TOKEN_TYPES } from '../types.js';
import {
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { KEYWORDS, SPECIAL_VARIABLES } from './operators.js';
import {
  advance,
  advanceBy,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  rest,
} from './state.js';

const DATE_TIME_PATTERN =
  /^(\d{4}(?:-\d{2}(?:-\d{2})?)?)(T(\d{2}(?::\d{2}(?::\d{2}(?:\.\d+)?)?)?)?(Z|[+-]\d{2}:\d{2})?)?/;

const TIME_PATTERN = /^T(\d{2}(?::\d{2}(?::\d{2}(?:\.\d+)?)?)?)/;

/** Process escape sequence and return the unescaped character */
function processEscape(state: LexerState): string {
  const location = currentLocation(state);
  const escaped = advance(state);
  switch (escaped) {
    case "'":
    case '"':
    case '`':
    case '\\':
    case '/':
      return escaped;
    case 'f':
      return '\f';
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case 'u': {
      let hex = '';
      while (hex.length < 4 && isHexDigit(peek(state))) {
        hex += advance(state);
      }
      if (hex.length !== 4) {
        throw new LexerError(
          'FP-L003',
          `Invalid escape sequence: \\u${hex}`,
          location,
          { char: `u${hex}` }
        );
      }
      return String.fromCharCode(parseInt(hex, 16));
    }
    default:
      throw new LexerError(
        'FP-L003',
        `Invalid escape sequence: \\${escaped}`,
        location,
        { char: escaped }
      );
  }
}

/** Read text between matching delimiters, applying escapes */
function readDelimited(state: LexerState, delimiter: string): string {
  const start = currentLocation(state);
  advance(state); // consume opening delimiter

  let value = '';
  while (!isAtEnd(state) && peek(state) !== delimiter) {
    if (peek(state) === '\\') {
      advance(state); // consume backslash
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }

  if (isAtEnd(state)) {
    throw new LexerError('FP-L001', 'Unterminated string literal', start);
  }
  advance(state); // consume closing delimiter
  return value;
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readDelimited(state, "'");
  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/** Backtick-quoted identifier: never treated as a keyword */
export function readDelimitedIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readDelimited(state, '`');
  return makeToken(
    TOKEN_TYPES.DELIMITED_IDENTIFIER,
    value,
    start,
    currentLocation(state)
  );
}

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    while (!isAtEnd(state) && isDigit(peek(state))) {
      value += advance(state);
    }
    return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
  }

  // Long suffix: 10L
  if (peek(state) === 'L' && !isIdentifierChar(peek(state, 1))) {
    advance(state);
    return makeToken(
      TOKEN_TYPES.LONG_NUMBER,
      value,
      start,
      currentLocation(state)
    );
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = Object.hasOwn(KEYWORDS, value)
    ? KEYWORDS[value]
    : TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}

/** $this, $index, $total */
export function readSpecialVariable(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume $

  let name = '';
  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    name += advance(state);
  }

  const type = Object.hasOwn(SPECIAL_VARIABLES, name)
    ? SPECIAL_VARIABLES[name]
    : undefined;
  if (!type) {
    throw new LexerError('FP-L006', `Unknown special variable: $${name}`, start, {
      name,
    });
  }
  return makeToken(type, `$${name}`, start, currentLocation(state));
}

/** %name, %`name` or %'name' */
export function readExternalConstant(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume %

  let name: string;
  const ch = peek(state);
  if (ch === '`') {
    name = readDelimited(state, '`');
  } else if (ch === "'") {
    name = readDelimited(state, "'");
  } else if (isIdentifierStart(ch)) {
    name = '';
    while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
      name += advance(state);
    }
  } else {
    throw new LexerError('FP-L002', `Unexpected character: %`, start, {
      char: '%',
    });
  }

  return makeToken(
    TOKEN_TYPES.EXTERNAL_CONSTANT,
    name,
    start,
    currentLocation(state)
  );
}

function inRange(text: string | undefined, min: number, max: number): boolean {
  if (text === undefined) return true;
  const n = Number(text);
  return n >= min && n <= max;
}

/** Range-check the numeric components of a date/time literal */
function isPlausibleTemporal(date: string | undefined, time: string | undefined): boolean {
  if (date !== undefined) {
    const [, month, day] = date.split('-');
    if (!inRange(month, 1, 12) || !inRange(day, 1, 31)) return false;
  }
  if (time !== undefined) {
    const [hour, minute, second] = time.split(':');
    if (!inRange(hour, 0, 23) || !inRange(minute, 0, 59)) return false;
    if (second !== undefined && Number(second) >= 60) return false;
  }
  return true;
}

/**
 * Read an @-prefixed temporal literal.
 * Token value excludes the @ (and the T prefix for times).
 */
export function readDateTime(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume @
  const text = rest(state);

  const timeMatch = TIME_PATTERN.exec(text);
  if (timeMatch) {
    const time = timeMatch[1] ?? '';
    if (!isPlausibleTemporal(undefined, time)) {
      throw new LexerError('FP-L005', `Invalid date/time literal: @${timeMatch[0]}`, start, {
        text: timeMatch[0],
      });
    }
    advanceBy(state, timeMatch[0].length);
    return makeToken(TOKEN_TYPES.TIME, time, start, currentLocation(state));
  }

  const match = DATE_TIME_PATTERN.exec(text);
  if (!match) {
    const shown = text.slice(0, 10);
    throw new LexerError('FP-L005', `Invalid date/time literal: @${shown}`, start, {
      text: shown,
    });
  }

  const [whole, date, timePart, time, zone] = match;
  if (!isPlausibleTemporal(date, time) || (zone !== undefined && time === undefined)) {
    throw new LexerError('FP-L005', `Invalid date/time literal: @${whole}`, start, {
      text: whole,
    });
  }
  advanceBy(state, whole.length);

  if (timePart === undefined) {
    return makeToken(TOKEN_TYPES.DATE, whole, start, currentLocation(state));
  }

  // @2015T is a DateTime at date precision
  const value = time === undefined ? (date ?? '') : whole;
  return makeToken(TOKEN_TYPES.DATETIME, value, start, currentLocation(state));
}
