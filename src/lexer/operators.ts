/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '!=': TOKEN_TYPES.NE,
  '!~': TOKEN_TYPES.NOT_EQUIVALENT,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '.': TOKEN_TYPES.DOT,
  ',': TOKEN_TYPES.COMMA,
  '=': TOKEN_TYPES.EQ,
  '~': TOKEN_TYPES.EQUIVALENT,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  '|': TOKEN_TYPES.PIPE,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '&': TOKEN_TYPES.AMPERSAND,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  xor: TOKEN_TYPES.XOR,
  implies: TOKEN_TYPES.IMPLIES,
  in: TOKEN_TYPES.IN,
  contains: TOKEN_TYPES.CONTAINS,
  is: TOKEN_TYPES.IS,
  as: TOKEN_TYPES.AS,
  div: TOKEN_TYPES.DIV,
  mod: TOKEN_TYPES.MOD,
};

/** Special `$` variables */
export const SPECIAL_VARIABLES: Record<string, TokenType> = {
  this: TOKEN_TYPES.THIS,
  index: TOKEN_TYPES.INDEX,
  total: TOKEN_TYPES.TOTAL,
};
