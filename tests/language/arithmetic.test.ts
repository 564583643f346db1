/**
 * FHIRPath Runtime Tests: Arithmetic
 * Numbers, strings, quantities and date/time arithmetic
 */

import { describe, expect, it } from 'vitest';

import { EvaluationError } from '../../src/index.js';
import { OBSERVATION, run, runFailure } from '../helpers/runtime.js';

function messageOf(error: unknown): string {
  return error instanceof EvaluationError ? error.toData().message : '';
}

describe('FHIRPath Runtime: Arithmetic', () => {
  describe('integers and decimals', () => {
    it('follows precedence and associativity', () => {
      expect(run('1 + 2 * 3')).toBe(7);
      expect(run('10 - 4 - 3')).toBe(3);
    });

    it('keeps integer results as integers', () => {
      expect(run('(2 * 3) is Integer')).toBe(true);
    });

    it('always divides to a decimal', () => {
      expect(run('10 / 4')).toBe(2.5);
      expect(run('(6 / 3) is Decimal')).toBe(true);
    });

    it('div truncates and mod keeps the remainder', () => {
      expect(run('7 div 2')).toBe(3);
      expect(run('7 mod 2')).toBe(1);
      expect(run('7.5 div 2')).toBe(3);
      expect(run('7.5 mod 2')).toBe(1.5);
    });

    it('division by zero is Empty', () => {
      expect(run('1 / 0')).toEqual([]);
      expect(run('5 div 0')).toEqual([]);
      expect(run('5 mod 0')).toEqual([]);
    });

    it('adds decimals exactly', () => {
      expect(run('0.1 + 0.2 = 0.3')).toBe(true);
    });

    it('keeps every digit of long decimals', () => {
      expect(run('1234567890123456789.12 + 0.01')).toBe(
        '1234567890123456789.13'
      );
      expect(run('1234567890123456789.12 + 0.01 = 1234567890123456789.13')).toBe(
        true
      );
      expect(run('123456789012345.123456789 * 1')).toBe(
        '123456789012345.123456789'
      );
      expect(run('(1234567890123456789.5 | 0.25).sum()')).toBe(
        '1234567890123456789.75'
      );
    });

    it('divides to 34 significant digits', () => {
      expect(run('1 / 3')).toBe('0.' + '3'.repeat(34));
    });

    it('applies unary minus before addition', () => {
      expect(run('-3 + 1')).toBe(-2);
    });

    it('leaves the 64-bit range as Empty', () => {
      expect(run('9223372036854775807 + 1')).toEqual([]);
    });
  });

  describe('strings', () => {
    it('+ joins two strings', () => {
      expect(run("'a' + 'b'")).toBe('ab');
    });

    it('& requires strings', () => {
      const error = runFailure("'a' & 1");
      expect(error).toMatchObject({ errorId: 'FP-R002' });
      expect(messageOf(error)).toBe("'&' cannot be applied to integer");
    });

    it('rejects string plus integer', () => {
      expect(messageOf(runFailure("'a' + 1"))).toBe(
        "'+' cannot be applied to string and integer"
      );
    });

    it('rejects negating a string', () => {
      expect(messageOf(runFailure("-'a'"))).toBe(
        "unary '-' cannot be applied to string"
      );
    });
  });

  describe('quantities', () => {
    it('adds quantities in the same unit', () => {
      expect(run("5 'mg' + 3 'mg'")).toEqual({ value: 8, unit: 'mg' });
    });

    it('converts the right operand to the left unit', () => {
      expect(run("1 'g' + 500 'mg'")).toEqual({ value: 1.5, unit: 'g' });
    });

    it('cancels matching units on division', () => {
      expect(run("4 'g' / 2 'g'")).toEqual({ value: 2, unit: '1' });
    });

    it('scales by a number', () => {
      expect(run("2 'cm' * 3")).toEqual({ value: 6, unit: 'cm' });
    });

    it('multiplies units', () => {
      expect(run("2 'm' * 3 'm'")).toEqual({ value: 6, unit: 'm.m' });
    });

    it('negates a quantity', () => {
      expect(run("-(5 'mg')")).toEqual({ value: -5, unit: 'mg' });
    });

    it('compares across convertible units', () => {
      expect(run("1 'm' = 100 'cm'")).toBe(true);
      expect(run("1 'm' > 50 'cm'")).toBe(true);
    });

    it('unconvertible units compare as unknown', () => {
      expect(run("1 'kg' = 1 'm'")).toEqual([]);
      expect(run("1 'kg' ~ 1 'm'")).toBe(false);
    });

    it('rejects adding a plain number', () => {
      expect(messageOf(runFailure("5 'mg' + 1"))).toBe(
        "'+' cannot be applied to quantity and integer"
      );
    });

    it('reads a document Quantity', () => {
      expect(run("Observation.value > 70 'kg'", { resource: OBSERVATION })).toBe(
        true
      );
      expect(
        run("Observation.value + 500 'g'", { resource: OBSERVATION })
      ).toEqual({ value: 73, unit: 'kg' });
    });
  });

  describe('dates and times', () => {
    it('adds days', () => {
      expect(run('@2020-01-15 + 1 day')).toBe('2020-01-16');
    });

    it('clamps to the end of a shorter month', () => {
      expect(run('@2020-01-31 + 1 month')).toBe('2020-02-29');
    });

    it('subtracts across a leap day', () => {
      expect(run('@2020-03-01 - 1 day')).toBe('2020-02-29');
    });

    it('adds whole years to a year-precision date', () => {
      expect(run('@2019 + 13 months')).toBe('2020');
    });

    it('adds minutes to a time', () => {
      expect(run('@T10:00 + 90 minutes')).toBe('11:30');
    });

    it('rolls a date-time over midnight', () => {
      expect(run('@2020-01-01T23:30:00Z + 1 hour')).toBe(
        '2020-01-02T00:30:00Z'
      );
    });

    it('leaves the year range as Empty', () => {
      expect(run('@9999-12-31 + 1 day')).toEqual([]);
    });

    it('rejects a non-time unit', () => {
      expect(messageOf(runFailure("@2020-01-01 + 1 'mg'"))).toBe(
        "'+' cannot be applied to date and quantity"
      );
    });
  });

  describe('date and time comparison', () => {
    it('orders dates', () => {
      expect(run('@2020-01-01 > @2019-12-31')).toBe(true);
      expect(run('@2020-01 < @2020-02-15')).toBe(true);
    });

    it('is unknown when precisions differ over equal parts', () => {
      expect(run('@2020-01 = @2020-01-15')).toEqual([]);
    });

    it('normalizes time zones', () => {
      expect(
        run('@2020-01-01T10:00:00Z = @2020-01-01T11:00:00+01:00')
      ).toBe(true);
    });

    it('reads a string operand as a date', () => {
      expect(run("@2020-01-01 = '2020-01-01'")).toBe(true);
    });
  });
});
