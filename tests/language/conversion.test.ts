/**
 * FHIRPath Runtime Tests: Conversion
 * iif() and the toX / convertsToX functions
 */

import { describe, expect, it } from 'vitest';

import { EvaluationError } from '../../src/index.js';
import { run, runFailure } from '../helpers/runtime.js';

describe('FHIRPath Runtime: Conversion', () => {
  describe('iif()', () => {
    it('picks a branch', () => {
      expect(run("iif(true, 'a', 'b')")).toBe('a');
      expect(run("iif(false, 'a', 'b')")).toBe('b');
    });

    it('treats an Empty criterion as false', () => {
      expect(run("iif({}, 'a', 'b')")).toBe('b');
    });

    it('is Empty without an otherwise branch', () => {
      expect(run("iif(false, 'a')")).toEqual([]);
    });

    it('binds $this to the receiver when chained', () => {
      expect(run("5.iif($this > 3, 'big', 'small')")).toBe('big');
    });
  });

  describe('toBoolean()', () => {
    it('reads words and digits', () => {
      expect(run("'Yes'.toBoolean()")).toBe(true);
      expect(run("'0.0'.toBoolean()")).toBe(false);
      expect(run('1.toBoolean()')).toBe(true);
    });

    it('is Empty for anything else', () => {
      expect(run("'maybe'.toBoolean()")).toEqual([]);
      expect(run('2.toBoolean()')).toEqual([]);
      expect(run("'maybe'.convertsToBoolean()")).toBe(false);
    });
  });

  describe('toInteger() / toLong()', () => {
    it('parses whole numbers', () => {
      expect(run("'42'.toInteger()")).toBe(42);
      expect(run("'42'.convertsToInteger()")).toBe(true);
      expect(run("'42'.toLong()")).toBe(42);
    });

    it('rejects fractions', () => {
      expect(run("'4.2'.toInteger()")).toEqual([]);
    });

    it('maps booleans to 0 and 1', () => {
      expect(run('true.toInteger()')).toBe(1);
    });
  });

  describe('toDecimal()', () => {
    it('parses decimal text', () => {
      expect(run("'3.14'.toDecimal()")).toBe(3.14);
      expect(run('5.toDecimal() is Decimal')).toBe(true);
    });

    it('gives booleans one decimal place', () => {
      expect(run('true.toDecimal().toString()')).toBe('1.0');
    });
  });

  describe('toString()', () => {
    it('keeps the written decimal places', () => {
      expect(run('1.50.toString()')).toBe('1.50');
    });

    it('formats quantities and booleans', () => {
      expect(run("(5 'mg').toString()")).toBe("5 'mg'");
      expect(run('true.toString()')).toBe('true');
    });

    it('formats dates without the @ prefix', () => {
      expect(run('@2020-01-15.toString()')).toBe('2020-01-15');
    });

    it('rejects several items', () => {
      const error = runFailure('(1 | 2).toString()');
      expect(error).toMatchObject({ errorId: 'FP-R004' });
      expect(
        error instanceof EvaluationError ? error.toData().message : ''
      ).toBe('toString() requires a single item, got 2');
    });
  });

  describe('toDate() / toDateTime() / toTime()', () => {
    it('cuts a date-time down to the day', () => {
      expect(run("'2020-01-15T10:00:00Z'.toDate()")).toBe('2020-01-15');
      expect(run('@2020-01-15T10:00:00Z.toDate()')).toBe('2020-01-15');
    });

    it('parses date-time and time text', () => {
      expect(run("'2020-01-15T10:00:00Z'.toDateTime()")).toBe(
        '2020-01-15T10:00:00Z'
      );
      expect(run("'10:30'.toTime()")).toBe('10:30');
    });

    it('is Empty for malformed text', () => {
      expect(run("'not a date'.toDate()")).toEqual([]);
      expect(run("'not a date'.convertsToDate()")).toBe(false);
    });
  });

  describe('toQuantity()', () => {
    it('parses a quoted unit', () => {
      expect(run("'5 \\'mg\\''.toQuantity()")).toEqual({
        value: 5,
        unit: 'mg',
      });
    });

    it('accepts calendar words', () => {
      expect(run("'2 days'.toQuantity()")).toEqual({ value: 2, unit: 'days' });
    });

    it('rejects other bare words', () => {
      expect(run("'1 g'.toQuantity()")).toEqual([]);
      expect(run("'abc'.convertsToQuantity()")).toBe(false);
    });

    it('gives numbers the unit 1', () => {
      expect(run('5.toQuantity()')).toEqual({ value: 5, unit: '1' });
    });

    it('converts to a requested unit', () => {
      expect(run("'1000 \\'mg\\''.toQuantity('g')")).toEqual({
        value: 1,
        unit: 'g',
      });
    });
  });
});
