/**
 * FHIRPath Lexer
 * Converts expression text into tokens
 */

export { tokenize, nextToken } from './tokenizer.js';
export { createLexerState, type LexerState } from './state.js';
export { KEYWORDS } from './operators.js';
