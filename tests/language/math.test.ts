/**
 * FHIRPath Runtime Tests: Math
 * abs, rounding, roots, logarithms and powers
 */

import { describe, expect, it } from 'vitest';

import { EvaluationError } from '../../src/index.js';
import { run, runFailure } from '../helpers/runtime.js';

function messageOf(error: unknown): string {
  return error instanceof EvaluationError ? error.toData().message : '';
}

describe('FHIRPath Runtime: Math', () => {
  describe('abs()', () => {
    it('works on integers and decimals', () => {
      expect(run('(-5).abs()')).toBe(5);
      expect(run('(-5.5).abs()')).toBe(5.5);
    });

    it('keeps the unit of a quantity', () => {
      expect(run("(-5.5 'mg').abs()")).toEqual({ value: 5.5, unit: 'mg' });
    });

    it('rejects a string', () => {
      const error = runFailure("'a'.abs()");
      expect(error).toMatchObject({ errorId: 'FP-R002' });
      expect(messageOf(error)).toBe(
        'abs() expecting Integer or Decimal cannot be applied to string'
      );
    });
  });

  describe('ceiling() / floor() / truncate()', () => {
    it('return integers', () => {
      expect(run('1.1.ceiling()')).toBe(2);
      expect(run('(-1.1).ceiling()')).toBe(-1);
      expect(run('(-1.1).floor()')).toBe(-2);
      expect(run('1.9.truncate()')).toBe(1);
      expect(run('1.1.ceiling() is Integer')).toBe(true);
    });
  });

  describe('round()', () => {
    it('rounds half away from zero', () => {
      expect(run('2.5.round()')).toBe(3);
      expect(run('(-2.5).round()')).toBe(-3);
    });

    it('takes a precision', () => {
      expect(run('3.14159.round(2)')).toBe(3.14);
    });

    it('rounds a quantity', () => {
      expect(run("(2.5 'mg').round()")).toEqual({ value: 3, unit: 'mg' });
    });

    it('rejects a negative precision', () => {
      const error = runFailure('3.14159.round(-1)');
      expect(error).toMatchObject({ errorId: 'FP-R009' });
      expect(messageOf(error)).toBe('round(): precision must be >= 0');
    });
  });

  describe('sqrt() / exp() / ln() / log()', () => {
    it('sqrt', () => {
      expect(run('16.sqrt()')).toBe(4);
      expect(run('(-1).sqrt()')).toEqual([]);
    });

    it('exp and ln', () => {
      expect(run('0.exp()')).toBe(1);
      expect(run('1.ln()')).toBe(0);
      expect(run('0.ln()')).toEqual([]);
    });

    it('log rejects a non-positive input or a base of one', () => {
      expect(run('0.log(10)')).toEqual([]);
      expect(run('8.log(1)')).toEqual([]);
    });
  });

  describe('power()', () => {
    it('keeps integer powers as integers', () => {
      expect(run('2.power(10)')).toBe(1024);
      expect(run('2.power(10) is Integer')).toBe(true);
    });

    it('gives a decimal for a negative exponent', () => {
      expect(run('2.power(-1)')).toBe(0.5);
    });

    it('is Empty when the result is not a real number', () => {
      expect(run('(-8).power(0.5)')).toEqual([]);
      expect(run('0.power(-1)')).toEqual([]);
    });

    it('is Empty past the integer range', () => {
      expect(run('2.power(64)')).toEqual([]);
    });

    it('rejects a quantity', () => {
      expect(messageOf(runFailure("(5 'mg').power(2)"))).toBe(
        'power() expecting Integer or Decimal cannot be applied to quantity'
      );
    });
  });

  it('keeps Empty', () => {
    expect(run('{}.abs()')).toEqual([]);
  });
});
