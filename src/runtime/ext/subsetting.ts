/**
 * Subsetting Functions
 *
 * single, first, last, tail, skip, take, intersect and exclude.
 * Position-based functions check the input's ordering when the engine
 * asks for it.
 */

import { equalItems } from '../core/equals.js';
import type { FhirPathValue } from '../core/values.js';
import { EMPTY, collection, isOrdered, toItems } from '../core/values.js';
import { distinctItems } from './existence.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type SubsettingFunctionId =
  | 'single'
  | 'first'
  | 'last'
  | 'tail'
  | 'skip'
  | 'take'
  | 'intersect'
  | 'exclude';

function slice(call: FunctionCall, start: number, end?: number): FhirPathValue {
  call.requireOrdered();
  return collection(toItems(call.input).slice(start, end), isOrdered(call.input));
}

function inOther(
  call: FunctionCall,
  item: FhirPathValue,
  other: readonly FhirPathValue[]
): boolean {
  const units = call.engine.units;
  return other.some((candidate) => equalItems(item, candidate, units) === true);
}

export const SUBSETTING_FUNCTIONS: Record<
  SubsettingFunctionId,
  FunctionDefinition
> = {
  single: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => call.singleInput() ?? EMPTY,
  },

  first: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => slice(call, 0, 1),
  },

  last: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => slice(call, -1),
  },

  tail: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => slice(call, 1),
  },

  skip: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const n = call.integerArg(0);
      if (n === undefined) return EMPTY;
      return slice(call, Math.max(n, 0));
    },
  },

  take: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const n = call.integerArg(0);
      if (n === undefined || n <= 0) return EMPTY;
      return slice(call, 0, n);
    },
  },

  intersect: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const other = toItems(call.arg(0));
      const shared = toItems(call.input).filter((item) =>
        inOther(call, item, other)
      );
      return collection(distinctItems(call, shared), false);
    },
  },

  exclude: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const other = toItems(call.arg(0));
      return collection(
        toItems(call.input).filter((item) => !inOther(call, item, other)),
        isOrdered(call.input)
      );
    },
  },
};
