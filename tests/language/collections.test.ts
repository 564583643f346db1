/**
 * FHIRPath Runtime Tests: Collections
 * Indexing, filtering, subsetting, combining and existence
 */

import { describe, expect, it } from 'vitest';

import { EvaluationError } from '../../src/index.js';
import { PATIENT, run, runFailure } from '../helpers/runtime.js';

function messageOf(error: unknown): string {
  return error instanceof EvaluationError ? error.toData().message : '';
}

describe('FHIRPath Runtime: Collections', () => {
  describe('indexer', () => {
    it('selects by zero-based position', () => {
      expect(run('(1 | 2 | 3)[1]')).toBe(2);
      expect(run('Patient.name[1].given', { resource: PATIENT })).toBe('Jim');
    });

    it('is Empty past the end', () => {
      expect(run('(1 | 2)[5]')).toEqual([]);
    });

    it('rejects a negative index', () => {
      const error = runFailure('(1 | 2)[-1]');
      expect(error).toMatchObject({ errorId: 'FP-R008' });
      expect(messageOf(error)).toBe('Invalid index: -1');
    });

    it('rejects a non-integer index', () => {
      expect(messageOf(runFailure("(1 | 2)['a']"))).toBe(
        'Invalid index: string'
      );
    });
  });

  describe('where() / select()', () => {
    it('filters by criteria', () => {
      expect(
        run("Patient.telecom.where(system = 'email').value", {
          resource: PATIENT,
        })
      ).toBe('peter@example.org');
    });

    it('projects and flattens', () => {
      expect(
        run('Patient.name.select(given.first())', { resource: PATIENT })
      ).toEqual(['Peter', 'Jim']);
    });

    it('exposes $index', () => {
      expect(run("('a' | 'b').select($index)")).toEqual([0, 1]);
    });
  });

  describe('subsetting', () => {
    it('first, last and tail', () => {
      expect(run('(1 | 2 | 3).first()')).toBe(1);
      expect(run('(1 | 2 | 3).last()')).toBe(3);
      expect(run('(1 | 2 | 3).tail()')).toEqual([2, 3]);
    });

    it('skip and take', () => {
      expect(run('(1 | 2 | 3).skip(1)')).toEqual([2, 3]);
      expect(run('(1 | 2 | 3).take(2)')).toEqual([1, 2]);
      expect(run('(1 | 2 | 3).take(0)')).toEqual([]);
    });

    it('single rejects several items', () => {
      const error = runFailure('(1 | 2).single()');
      expect(error).toMatchObject({ errorId: 'FP-R004' });
      expect(messageOf(error)).toBe('single() requires a single item, got 2');
    });

    it('intersect and exclude', () => {
      expect(run('(1 | 2 | 3).intersect(2 | 3 | 4)')).toEqual([2, 3]);
      expect(run('(1 | 2 | 3).exclude(2)')).toEqual([1, 3]);
    });
  });

  describe('ordered-function checks', () => {
    it('position functions accept unordered input by default', () => {
      expect(run('(1 | 2).distinct().first()')).toBe(1);
    });

    it('rejects first() on unordered input when enabled', () => {
      const error = runFailure('(1 | 2).distinct().first()', {
        checkOrderedFunctions: true,
      });
      expect(error).toMatchObject({ errorId: 'FP-R010' });
      expect(messageOf(error)).toBe('first() requires an ordered collection');
    });

    it('rejects indexing unordered input when enabled', () => {
      expect(
        messageOf(
          runFailure('(1 | 2).distinct()[0]', { checkOrderedFunctions: true })
        )
      ).toBe('indexer requires an ordered collection');
    });
  });

  describe('combining', () => {
    it('union removes duplicates', () => {
      expect(run('(1 | 2) | (2 | 3)')).toEqual([1, 2, 3]);
      expect(run('(1 | 2).union(2 | 3)')).toEqual([1, 2, 3]);
    });

    it('combine keeps duplicates', () => {
      expect(run('(1 | 2).combine(2 | 3)')).toEqual([1, 2, 2, 3]);
    });
  });

  describe('existence', () => {
    it('exists with criteria', () => {
      expect(run('(1 | 2).exists($this > 1)')).toBe(true);
      expect(run('(1 | 2).exists($this > 5)')).toBe(false);
    });

    it('all is true for Empty', () => {
      expect(run('{}.all(false)')).toBe(true);
      expect(
        run('Patient.telecom.all(system.exists())', { resource: PATIENT })
      ).toBe(true);
    });

    it('allTrue and anyTrue', () => {
      expect(run('(true | false).allTrue()')).toBe(false);
      expect(run('(true | false).anyTrue()')).toBe(true);
      expect(run('{}.allTrue()')).toBe(true);
    });

    it('allTrue rejects non-booleans', () => {
      expect(messageOf(runFailure('(1 | 2).allTrue()'))).toBe(
        'allTrue() expecting Boolean cannot be applied to integer'
      );
    });

    it('subsetOf and supersetOf', () => {
      expect(run('(1 | 2).subsetOf(1 | 2 | 3)')).toBe(true);
      expect(run('(1 | 2 | 3).supersetOf(4)')).toBe(false);
    });

    it('count, distinct and isDistinct', () => {
      expect(run('Patient.name.given.count()', { resource: PATIENT })).toBe(3);
      expect(run('1.combine(1).count()')).toBe(2);
      expect(run('1.combine(1).combine(2).distinct()')).toEqual([1, 2]);
      expect(run('1.combine(1).isDistinct()')).toBe(false);
    });
  });

  describe('tree navigation', () => {
    it('children', () => {
      expect(
        run('Patient.managingOrganization.children()', { resource: PATIENT })
      ).toBe('Organization/org-1');
    });

    it('descendants walks every level', () => {
      expect(
        run('Patient.name[0].descendants()', { resource: PATIENT })
      ).toEqual(['official', 'Chalmers', 'Peter', 'James']);
    });
  });
});
