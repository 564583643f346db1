/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: FP-{category}{3-digit} (e.g., FP-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (FP-L0xx)
  {
    errorId: 'FP-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a quote but never closed before end of input.',
    resolution: "Add the closing quote. Use \\' to embed a quote.",
    examples: [{ description: 'Missing closing quote', code: "name = 'Jim" }],
  },
  {
    errorId: 'FP-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of the expression syntax.',
    resolution:
      'Remove or replace the character. Double quotes are not string delimiters.',
    examples: [{ description: 'Double-quoted string', code: 'name = "Jim"' }],
  },
  {
    errorId: 'FP-L003',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{char}',
    cause: 'Backslash followed by a character with no escape meaning.',
    resolution:
      "Valid escapes: \\' \\\" \\` \\\\ \\/ \\f \\n \\r \\t and \\uXXXX.",
  },
  {
    errorId: 'FP-L004',
    category: 'lexer',
    description: 'Unterminated comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'Block comment opened with /* but never closed.',
    resolution: 'Close the comment with */.',
  },
  {
    errorId: 'FP-L005',
    category: 'lexer',
    description: 'Invalid date/time literal',
    messageTemplate: 'Invalid date/time literal: @{text}',
    cause: 'Text after @ is not a date, date-time or time in ISO 8601 form.',
    resolution: 'Use @YYYY[-MM[-DD]][Thh[:mm[:ss[.fff]]][tz]] or @Thh[:mm...].',
    examples: [{ description: 'Month out of range', code: '@2020-13' }],
  },
  {
    errorId: 'FP-L006',
    category: 'lexer',
    description: 'Unknown special variable',
    messageTemplate: 'Unknown special variable: ${name}',
    cause: 'Only $this, $index and $total exist.',
    resolution: 'Use %name for user variables.',
  },

  // Parse Errors (FP-P0xx)
  {
    errorId: 'FP-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token: {token}',
    cause: 'Token does not fit the grammar at this position.',
    resolution: 'Check operator placement and balanced parentheses.',
    examples: [{ description: 'Dangling operator', code: 'a.b +' }],
  },
  {
    errorId: 'FP-P002',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'Unexpected end of expression',
    cause: 'Expression ended while more input was required.',
    resolution: 'Complete the expression.',
  },
  {
    errorId: 'FP-P003',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: 'Expected {expected}',
    cause: 'A required delimiter or name was missing.',
    resolution: 'Insert the expected token.',
  },
  {
    errorId: 'FP-P004',
    category: 'parse',
    description: 'Invalid type specifier',
    messageTemplate: 'Invalid type specifier: {text}',
    cause: 'is/as/ofType need an identifier or Namespace.Identifier.',
    resolution: 'Write a type name such as Quantity or System.String.',
  },
  {
    errorId: 'FP-P005',
    category: 'parse',
    description: 'Invalid literal',
    messageTemplate: 'Invalid literal: {text}',
    cause: 'A numeric or quantity literal could not be read.',
    resolution: 'Check the literal form.',
  },

  // Runtime Errors (FP-R0xx)
  {
    errorId: 'FP-R001',
    category: 'runtime',
    description: 'Evaluation failed',
    messageTemplate: '{message}',
  },
  {
    errorId: 'FP-R002',
    category: 'runtime',
    description: 'Type error',
    messageTemplate: '{operation} cannot be applied to {actual}',
    cause: 'An operator or function received a value of an unsupported kind.',
    resolution: 'Convert the operand first (toInteger, toString, ...).',
    examples: [{ description: 'String plus integer', code: "'a' + 1" }],
  },
  {
    errorId: 'FP-R003',
    category: 'runtime',
    description: 'Wrong number of arguments',
    messageTemplate: '{name}() expects {expected} arguments, got {actual}',
    cause: 'Function called with too few or too many arguments.',
    resolution: 'Match the documented signature.',
  },
  {
    errorId: 'FP-R004',
    category: 'runtime',
    description: 'Singleton required',
    messageTemplate: '{operation} requires a single item, got {count}',
    cause: 'A collection with several items was used where one is required.',
    resolution: 'Select one item with first(), single() or an indexer.',
    examples: [{ description: 'Comparing a list', code: "name.given = 'A'" }],
  },
  {
    errorId: 'FP-R005',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: 'Variable %{name} is not defined',
    cause: 'An external constant was referenced but never set.',
    resolution: 'Pass the variable in the evaluation options.',
  },
  {
    errorId: 'FP-R006',
    category: 'runtime',
    description: 'Unknown member',
    messageTemplate: 'Unknown member {name} on {type}',
    cause: 'Strict mode rejects navigation to absent members.',
    resolution: 'Disable strict mode or correct the path.',
  },
  {
    errorId: 'FP-R007',
    category: 'runtime',
    description: 'Unknown function',
    messageTemplate: 'Unknown function: {name}()',
    cause: 'No built-in function with this name exists.',
    resolution: 'Check the function name spelling.',
  },
  {
    errorId: 'FP-R008',
    category: 'runtime',
    description: 'Invalid index',
    messageTemplate: 'Invalid index: {index}',
    cause: 'Indexer requires a non-negative integer.',
    resolution: 'Use an integer expression inside [ ].',
  },
  {
    errorId: 'FP-R009',
    category: 'runtime',
    description: 'Invalid argument',
    messageTemplate: '{name}(): {reason}',
    cause:
      'An argument is malformed, such as an invalid regular expression or format.',
    resolution: 'Correct the argument value.',
  },
  {
    errorId: 'FP-R010',
    category: 'runtime',
    description: 'Unordered collection',
    messageTemplate: '{name} requires an ordered collection',
    cause:
      'Ordered-function checking is on and the input ordering is undefined.',
    resolution: 'Sort the collection first or disable the check.',
  },
  {
    errorId: 'FP-R011',
    category: 'runtime',
    description: 'Reserved or duplicate variable',
    messageTemplate: 'Cannot define variable %{name}: {reason}',
    cause: 'System variables cannot be overridden and names cannot be reused.',
    resolution: 'Choose a different variable name.',
  },
  {
    errorId: 'FP-R012',
    category: 'runtime',
    description: 'Terminology service unavailable',
    messageTemplate: '{name}() requires a terminology service',
    cause: 'A terminology function was called without a configured service.',
    resolution: 'Pass a TerminologyService in the evaluation options.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}. Missing context values render as empty
 * string; non-string values are coerced via String(). Unclosed braces leave
 * the template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "1", actual: "2"})
 * // Returns: "Expected 1, got 2"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        return template;
      }
      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        result += String(value);
      }
      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
