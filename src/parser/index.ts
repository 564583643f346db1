/**
 * FHIRPath Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ExpressionNode } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-expr.js';
import './parser-invocation.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse expression text into an AST.
 *
 * Throws LexerError or ParseError on the first syntax error.
 *
 * @example
 * ```typescript
 * const ast = parse("Patient.name.where(use = 'official').given");
 * ```
 */
export function parse(source: string): ExpressionNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, { source });
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
export {
  formatTypeSpecifier,
  parseTypeName,
  typeSpecifierFromExpression,
} from './helpers.js';
