/**
 * FHIRPath CLI Tests: shared formatting and file loading
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  VERSION,
  formatError,
  formatOutput,
  readDataFile,
} from '../../src/cli-shared.js';
import {
  EMPTY,
  EvaluationError,
  ParseError,
  collection,
  integer,
  parse,
  str,
} from '../../src/index.js';

function parseFailure(text: string): Error {
  try {
    parse(text);
  } catch (error) {
    if (error instanceof Error) return error;
  }
  throw new Error(`expected ${text} to fail`);
}

describe('cli-shared', () => {
  describe('formatOutput', () => {
    it('prints values as indented JSON', () => {
      expect(formatOutput(str('a'))).toBe('"a"');
      expect(formatOutput(EMPTY)).toBe('[]');
      expect(formatOutput(collection([integer(1n), integer(2n)]))).toBe(
        '[\n  1,\n  2\n]'
      );
    });
  });

  describe('formatError', () => {
    it('formats lexer errors with their line', () => {
      expect(formatError(parseFailure("'abc"))).toBe(
        'Lexer error at line 1: FP-L001: Unterminated string literal'
      );
    });

    it('formats parse errors with their line', () => {
      const error = new ParseError('FP-P003', "Expected ')'", {
        line: 2,
        column: 3,
        offset: 10,
      });
      expect(formatError(error)).toBe(
        "Parse error at line 2: FP-P003: Expected ')'"
      );
    });

    it('formats runtime errors with and without a location', () => {
      const located = new EvaluationError(
        'FP-R005',
        'Variable %x is not defined',
        { line: 1, column: 1, offset: 0 }
      );
      expect(formatError(located)).toBe(
        'Runtime error at line 1: FP-R005: Variable %x is not defined'
      );
      expect(
        formatError(new EvaluationError('FP-R007', 'Unknown function: foo()'))
      ).toBe('Runtime error: FP-R007: Unknown function: foo()');
    });

    it('formats a missing file', () => {
      const error = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: '/data/patient.json',
      });
      expect(formatError(error)).toBe('File not found: /data/patient.json');
    });

    it('passes other errors through', () => {
      expect(formatError(new Error('config: expected a mapping'))).toBe(
        'config: expected a mapping'
      );
    });
  });

  describe('readDataFile', () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fhirpath-shared-test-'));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true });
    });

    it('reads JSON', async () => {
      const file = path.join(tempDir, 'a.json');
      await fs.writeFile(file, '{"resourceType": "Patient", "id": "p1"}');
      expect(readDataFile(file)).toEqual({ resourceType: 'Patient', id: 'p1' });
    });

    it('reads YAML', async () => {
      const file = path.join(tempDir, 'a.yaml');
      await fs.writeFile(file, 'strict: true\nvariables:\n  limit: 5\n');
      expect(readDataFile(file)).toEqual({
        strict: true,
        variables: { limit: 5 },
      });
    });

    it('wraps parse failures with the file name', async () => {
      const file = path.join(tempDir, 'bad.yaml');
      await fs.writeFile(file, 'a: [1\n');
      expect(() => readDataFile(file)).toThrow(`Cannot parse ${file}: `);
    });
  });

  describe('VERSION', () => {
    it('comes from package.json', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+/);
    });
  });
});
