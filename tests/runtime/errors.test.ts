/**
 * FHIRPath Runtime Tests: Error Taxonomy
 * Registry, error classes, the factory and structured data
 */

import { describe, expect, it } from 'vitest';

import {
  createError,
  ERROR_REGISTRY,
  EvaluationError,
  FhirPathError,
  LexerError,
  ParseError,
  type SourceLocation,
} from '../../src/index.js';

const AT_1_5: SourceLocation = { line: 1, column: 5, offset: 4 };

describe('FHIRPath Runtime: Error Taxonomy', () => {
  describe('registry', () => {
    it('holds every lexer, parse and runtime error', () => {
      expect(ERROR_REGISTRY.size).toBe(23);
      expect(ERROR_REGISTRY.has('FP-L001')).toBe(true);
      expect(ERROR_REGISTRY.has('FP-P005')).toBe(true);
      expect(ERROR_REGISTRY.has('FP-R012')).toBe(true);
      expect(ERROR_REGISTRY.has('FP-R013')).toBe(false);
    });

    it('returns the definition by id', () => {
      const definition = ERROR_REGISTRY.get('FP-R005');
      expect(definition?.category).toBe('runtime');
      expect(definition?.messageTemplate).toBe('Variable %{name} is not defined');
    });

    it('ids carry the prefix of their category', () => {
      const prefixes = { lexer: 'FP-L', parse: 'FP-P', runtime: 'FP-R' };
      for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
        expect(errorId.startsWith(prefixes[definition.category])).toBe(true);
        expect(errorId).toMatch(/^FP-[LPR]\d{3}$/);
      }
    });
  });

  describe('FhirPathError', () => {
    it('appends the location to the message', () => {
      const error = new FhirPathError({
        errorId: 'FP-R001',
        message: 'boom',
        location: AT_1_5,
      });
      expect(error.message).toBe('boom at 1:5');
      expect(error.name).toBe('FhirPathError');
    });

    it('toData strips the location suffix', () => {
      const error = new FhirPathError({
        errorId: 'FP-R001',
        message: 'boom',
        location: AT_1_5,
      });
      expect(error.toData()).toEqual({
        errorId: 'FP-R001',
        message: 'boom',
        location: AT_1_5,
        context: undefined,
      });
    });

    it('format uses the host formatter when given', () => {
      const error = new FhirPathError({ errorId: 'FP-R001', message: 'boom' });
      expect(error.format()).toBe('boom');
      expect(error.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
        '[FP-R001] boom'
      );
    });

    it('rejects an unknown id', () => {
      expect(
        () => new FhirPathError({ errorId: 'FP-X999', message: 'x' })
      ).toThrow('Unknown error ID: FP-X999');
    });
  });

  describe('specialized classes', () => {
    it('LexerError takes lexer ids only', () => {
      const error = new LexerError('FP-L001', 'Unterminated string literal', AT_1_5);
      expect(error.name).toBe('LexerError');
      expect(error.location).toEqual(AT_1_5);
      expect(() => new LexerError('FP-R001', 'x', AT_1_5)).toThrow(
        'Expected lexer error ID, got: FP-R001'
      );
    });

    it('ParseError takes parse ids only', () => {
      expect(new ParseError('FP-P002', 'x', AT_1_5)).toBeInstanceOf(
        FhirPathError
      );
      expect(() => new ParseError('FP-L001', 'x', AT_1_5)).toThrow(
        'Expected parse error ID, got: FP-L001'
      );
    });

    it('EvaluationError may omit the location', () => {
      const error = new EvaluationError('FP-R007', 'Unknown function: foo()');
      expect(error.message).toBe('Unknown function: foo()');
      expect(error.location).toBeUndefined();
      expect(() => new EvaluationError('FP-P001', 'x')).toThrow(
        'Expected runtime error ID, got: FP-P001'
      );
    });

    it('fromNode reads the start of the span', () => {
      const error = EvaluationError.fromNode('FP-R001', 'boom', {
        span: { start: AT_1_5, end: { line: 1, column: 9, offset: 8 } },
      });
      expect(error.location).toEqual(AT_1_5);
    });
  });

  describe('createError', () => {
    it('renders the template into an EvaluationError', () => {
      const error = createError('FP-R005', { name: 'weight' }, AT_1_5);
      expect(error).toBeInstanceOf(EvaluationError);
      expect(error.message).toBe('Variable %weight is not defined at 1:5');
      expect(error.context).toEqual({ name: 'weight' });
    });

    it('builds lexer and parse errors when located', () => {
      expect(createError('FP-L002', { char: '"' }, AT_1_5)).toBeInstanceOf(
        LexerError
      );
      expect(createError('FP-P003', { expected: ')' }, AT_1_5)).toBeInstanceOf(
        ParseError
      );
    });

    it('falls back to the base class without a location', () => {
      const error = createError('FP-P004', { text: '1' });
      expect(error).not.toBeInstanceOf(ParseError);
      expect(error.message).toBe('Invalid type specifier: 1');
    });

    it('rejects an unknown id', () => {
      expect(() => createError('FP-R999', {})).toThrow(
        'Unknown error ID: FP-R999'
      );
    });
  });
});
