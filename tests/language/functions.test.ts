/**
 * FHIRPath Runtime Tests: Utility and Aggregate Functions
 * aggregate, sum/min/max/avg, sort, defineVariable, repeat, trace, coalesce
 */

import { describe, expect, it } from 'vitest';

import {
  EvaluationError,
  collection,
  createEvaluationContext,
  evaluate,
  object,
  parse,
  str,
  toJson,
} from '../../src/index.js';
import type { FhirPathValue } from '../../src/index.js';
import { PATIENT, run, runFailure, runFull } from '../helpers/runtime.js';

function messageOf(error: unknown): string {
  return error instanceof EvaluationError ? error.toData().message : '';
}

describe('FHIRPath Runtime: Aggregates', () => {
  describe('aggregate()', () => {
    it('folds with an initial value', () => {
      expect(run('(1 | 2 | 3).aggregate($this + $total, 0)')).toBe(6);
    });

    it('seeds $total from the first item without one', () => {
      expect(run('(1 | 2 | 3).aggregate($total + $this)')).toBe(6);
    });

    it('returns the initial value for Empty input', () => {
      expect(run('{}.aggregate($total + $this, 0)')).toBe(0);
    });

    it('can compute a maximum', () => {
      expect(
        run(
          '(2 | 5 | 3).aggregate(iif($total.empty(), $this, iif($this > $total, $this, $total)), {})'
        )
      ).toBe(5);
    });
  });

  describe('sum() / avg()', () => {
    it('keeps integer sums integral', () => {
      expect(run('(1 | 2 | 3).sum()')).toBe(6);
      expect(run('(1 | 2 | 3).sum() is Integer')).toBe(true);
    });

    it('widens to decimal', () => {
      expect(run('(1 | 2.5).sum()')).toBe(3.5);
      expect(run('(1 | 2 | 3 | 4).avg()')).toBe(2.5);
    });

    it('sums quantities in the first unit', () => {
      expect(run("(5 'mg' | 1 'g').sum()")).toEqual({
        value: 1005,
        unit: 'mg',
      });
    });

    it('is Empty for Empty input', () => {
      expect(run('{}.sum()')).toEqual([]);
    });
  });

  describe('min() / max()', () => {
    it('orders numbers and strings', () => {
      expect(run('(3 | 1 | 2).min()')).toBe(1);
      expect(run('(3 | 1 | 2).max()')).toBe(3);
      expect(run("('b' | 'a').max()")).toBe('b');
    });

    it('rejects mixed kinds', () => {
      const error = runFailure("(1 | 'a').max()");
      expect(error).toMatchObject({ errorId: 'FP-R002' });
      expect(messageOf(error)).toBe(
        'max() cannot be applied to string and integer'
      );
    });
  });
});

describe('FHIRPath Runtime: Utility Functions', () => {
  describe('sort()', () => {
    it('sorts by natural order', () => {
      expect(run('(3 | 1 | 2).sort()')).toEqual([1, 2, 3]);
      expect(run("('b' | 'a').sort()")).toEqual(['a', 'b']);
    });

    it('sorts descending on a negated key', () => {
      expect(run('(3 | 1 | 2).sort(-$this)')).toEqual([3, 2, 1]);
    });

    it('puts Empty keys first', () => {
      expect(
        run('Patient.name.sort(family).use', { resource: PATIENT })
      ).toEqual(['usual', 'official']);
    });

    it('rejects keys of different kinds', () => {
      expect(runFailure("(1 | 'a').sort()")).toMatchObject({
        errorId: 'FP-R002',
      });
    });
  });

  describe('defineVariable()', () => {
    it('binds for the rest of the chain', () => {
      expect(
        run("(1 | 2).defineVariable('n', 10).select($this * %n)")
      ).toEqual([10, 20]);
    });

    it('binds the input without a value', () => {
      expect(
        run("(1 | 2).defineVariable('xs').select(%xs.count())")
      ).toEqual([2, 2]);
    });

    it('rejects redefining a name', () => {
      const error = runFailure(
        "defineVariable('a', 1).defineVariable('a', 2)"
      );
      expect(error).toMatchObject({ errorId: 'FP-R011' });
      expect(messageOf(error)).toBe(
        'Cannot define variable %a: already defined'
      );
    });

    it('rejects system variable names', () => {
      expect(messageOf(runFailure("defineVariable('context', 1)"))).toBe(
        'Cannot define variable %context: system variables cannot be overridden'
      );
    });
  });

  describe('repeat() / repeatAll()', () => {
    it('repeat stops at items already seen', () => {
      expect(run("'A'.repeat(iif($this = 'A', 'B', 'A'))")).toEqual([
        'B',
        'A',
      ]);
    });

    it('repeat terminates on objects that reference each other', () => {
      // a.next holds b and a structurally equal copy of b; b.next is a
      const aFields = new Map<string, FhirPathValue>([['id', str('a')]]);
      const a = object(aFields);
      const b = object(
        new Map<string, FhirPathValue>([
          ['id', str('b')],
          ['next', a],
        ])
      );
      const bCopy = object(
        new Map<string, FhirPathValue>([
          ['id', str('b')],
          ['next', a],
        ])
      );
      aFields.set('next', collection([b, bCopy]));

      const ctx = createEvaluationContext();
      expect(toJson(evaluate(parse('repeat(next).id'), ctx, a))).toEqual([
        'b',
        'a',
      ]);
      expect(toJson(evaluate(parse('repeat(next).count()'), ctx, a))).toBe(2);
    });

    it('repeatAll outputs revisited items once more', () => {
      expect(run("'A'.repeatAll(iif($this = 'A', 'B', 'A'))")).toEqual([
        'B',
        'A',
        'B',
      ]);
    });
  });

  describe('trace()', () => {
    it('records the input and passes it through', () => {
      const { value, ctx } = runFull("(1 | 2).trace('nums').count()");
      expect(toJson(value)).toBe(2);
      expect(ctx.engine.trace.size).toBe(1);
      const [entry] = ctx.engine.trace.entries;
      expect(entry?.label).toBe('nums');
      expect(entry === undefined ? null : toJson(entry.value)).toEqual([1, 2]);
    });

    it('records a projection when given one', () => {
      const { ctx } = runFull("Patient.name.trace('family', family)", {
        resource: PATIENT,
      });
      const [entry] = ctx.engine.trace.entries;
      expect(entry === undefined ? null : toJson(entry.value)).toBe(
        'Chalmers'
      );
    });

    it('calls the host onTrace callback', () => {
      const seen: [string, FhirPathValue][] = [];
      run("'x'.trace('label')", {
        callbacks: { onTrace: (label, value) => seen.push([label, value]) },
      });
      expect(seen.map(([label, value]) => [label, toJson(value)])).toEqual([
        ['label', 'x'],
      ]);
    });
  });

  describe('coalesce()', () => {
    it('returns the first non-empty argument', () => {
      expect(run("coalesce({}, 'b', 'c')")).toBe('b');
      expect(run('coalesce({}, {})')).toEqual([]);
    });
  });

  describe('clock functions', () => {
    it('are stable within an evaluation', () => {
      expect(run('now() = now()')).toBe(true);
      expect(run('today() is Date')).toBe(true);
      expect(run('now() is DateTime')).toBe(true);
    });

    it('today() has day precision', () => {
      expect(run('today().toString().length()')).toBe(10);
    });
  });
});
