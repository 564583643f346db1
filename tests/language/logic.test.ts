/**
 * FHIRPath Runtime Tests: Logic and Empty Propagation
 * Three-valued and/or/xor/implies, equality, equivalence and membership
 */

import { describe, expect, it } from 'vitest';

import { EvaluationError } from '../../src/index.js';
import { run, runFailure } from '../helpers/runtime.js';

describe('FHIRPath Runtime: Logic', () => {
  describe('and / or', () => {
    it('true and Empty is Empty', () => {
      expect(run('true and {}')).toEqual([]);
    });

    it('false and Empty is false', () => {
      expect(run('false and {}')).toBe(false);
    });

    it('Empty or true is true', () => {
      expect(run('{} or true')).toBe(true);
    });

    it('Empty or false is Empty', () => {
      expect(run('{} or false')).toEqual([]);
    });

    it('xor needs both sides', () => {
      expect(run('true xor false')).toBe(true);
      expect(run('true xor true')).toBe(false);
      expect(run('true xor {}')).toEqual([]);
    });
  });

  describe('implies', () => {
    it('false implies anything', () => {
      expect(run('false implies {}')).toBe(true);
    });

    it('true implies the right side', () => {
      expect(run('true implies false')).toBe(false);
      expect(run('true implies {}')).toEqual([]);
    });

    it('Empty implies true is true', () => {
      expect(run('{} implies true')).toBe(true);
      expect(run('{} implies false')).toEqual([]);
    });
  });

  describe('truthiness', () => {
    it('reads integer 0 as false under R4', () => {
      expect(run('0 and true')).toBe(false);
    });

    it('reads any integer as true under R5', () => {
      expect(run('0 and true', { fhirVersion: 'R5' })).toBe(true);
    });

    it('reads a single string as true', () => {
      expect(run("'x' and true")).toBe(true);
    });

    it('rejects several items', () => {
      const error = runFailure('(true | false) and true');
      expect(error).toBeInstanceOf(EvaluationError);
      expect(error).toMatchObject({ errorId: 'FP-R004' });
      expect(
        error instanceof EvaluationError ? error.toData().message : ''
      ).toBe("'and' requires a single item, got 2");
    });
  });

  describe('not()', () => {
    it('negates a single boolean', () => {
      expect(run('true.not()')).toBe(false);
    });

    it('keeps Empty', () => {
      expect(run('{}.not()')).toEqual([]);
    });

    it('rejects a two-item input', () => {
      expect(runFailure('(true | false).not()')).toMatchObject({
        errorId: 'FP-R004',
      });
    });
  });
});

describe('FHIRPath Runtime: Empty Propagation', () => {
  it('arithmetic with Empty is Empty', () => {
    expect(run('{} + 1')).toEqual([]);
  });

  it('equality with Empty is Empty', () => {
    expect(run('1 = {}')).toEqual([]);
    expect(run('{} != {}')).toEqual([]);
  });

  it('Empty is equivalent to Empty', () => {
    expect(run('{} ~ {}')).toBe(true);
  });

  it('existence functions still answer', () => {
    expect(run('{}.count()')).toBe(0);
    expect(run('{}.empty()')).toBe(true);
    expect(run('{}.exists()')).toBe(false);
  });

  it('string concatenation reads Empty as blank', () => {
    expect(run("{} & 'a'")).toBe('a');
  });

  it('membership of Empty is Empty', () => {
    expect(run('{} in (1 | 2)')).toEqual([]);
  });
});

describe('FHIRPath Runtime: Equality', () => {
  it('compares integers with decimals by value', () => {
    expect(run('1 = 1.0')).toBe(true);
  });

  it('compares strings exactly', () => {
    expect(run("'ABC' = 'abc'")).toBe(false);
    expect(run("'abc' != 'abd'")).toBe(true);
  });

  it('compares collections item by item in order', () => {
    expect(run('(1 | 2) = (1 | 2)')).toBe(true);
    expect(run('(1 | 2) = (2 | 1)')).toBe(false);
  });

  it('treats different kinds as unequal', () => {
    expect(run("1 = 'a'")).toBe(false);
  });

  describe('equivalence', () => {
    it('ignores case and whitespace', () => {
      expect(run("'a  b' ~ ' A B '")).toBe(true);
      expect(run("'ab' !~ 'AB'")).toBe(false);
    });

    it('compares decimals at the lesser precision', () => {
      expect(run('1.0 ~ 1.04')).toBe(true);
    });

    it('ignores order', () => {
      expect(run('(1 | 2) ~ (2 | 1)')).toBe(true);
    });
  });

  describe('membership', () => {
    it('in and contains', () => {
      expect(run('2 in (1 | 2 | 3)')).toBe(true);
      expect(run('(1 | 2 | 3) contains 4')).toBe(false);
    });

    it('nothing is in Empty', () => {
      expect(run('1 in {}')).toBe(false);
    });
  });

  describe('ordering', () => {
    it('orders strings', () => {
      expect(run("'a' < 'b'")).toBe(true);
    });

    it('rejects mixed kinds', () => {
      const error = runFailure("'a' < 1");
      expect(error).toMatchObject({ errorId: 'FP-R002' });
      expect(
        error instanceof EvaluationError ? error.toData().message : ''
      ).toBe("'<' cannot be applied to string and integer");
    });
  });
});
