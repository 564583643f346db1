/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ExpressionNode, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { type ParserState, check, createParserState, unexpectedToken } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-expr.ts: Precedence chain (union down to polarity)
 * - parser-invocation.ts: Terms, invocation chains, indexers, function calls
 * - parser-literals.ts: Literal terms, quantities, type specifiers
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, { source: text });
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens and position */
  state: ParserState;

  constructor(tokens: Token[], options?: { source?: string }) {
    this.state = createParserState(tokens, {
      source: options?.source ?? '',
    });
  }

  /**
   * Parse tokens into a complete expression; all input must be consumed.
   */
  parse(): ExpressionNode {
    const expression = this.parseExpression();
    if (!check(this.state, TOKEN_TYPES.EOF)) {
      throw unexpectedToken(this.state);
    }
    return expression;
  }
}
