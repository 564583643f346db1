/**
 * CLI Shared Utilities
 * Formatting and file loading for CLI tools
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import { toJson } from './runtime/index.js';
import type { FhirPathValue } from './runtime/index.js';
import { EvaluationError, LexerError, ParseError } from './types.js';

/**
 * Convert an evaluation result to pretty-printed JSON
 */
export function formatOutput(value: FhirPathValue): string {
  return JSON.stringify(toJson(value), null, 2);
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  const baseMessage = err.message.replace(/ at \d+:\d+$/, '');

  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${err.errorId}: ${baseMessage}`;
  }

  if (err instanceof ParseError) {
    const location = err.location;
    if (location) {
      return `Parse error at line ${location.line}: ${err.errorId}: ${baseMessage}`;
    }
    return `Parse error: ${err.errorId}: ${baseMessage}`;
  }

  if (err instanceof EvaluationError) {
    const location = err.location;
    if (location) {
      return `Runtime error at line ${location.line}: ${err.errorId}: ${baseMessage}`;
    }
    return `Runtime error: ${err.errorId}: ${baseMessage}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Read a JSON or YAML document. YAML is a superset of JSON, so one parser
 * serves both.
 *
 * @throws Error when the file is missing or does not parse
 */
export function readDataFile(file: string): unknown {
  const text = fs.readFileSync(file, 'utf-8');
  try {
    return yaml.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot parse ${file}: ${reason}`);
  }
}

function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

/** Package version from package.json */
export const VERSION = readVersion();
