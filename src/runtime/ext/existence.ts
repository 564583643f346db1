/**
 * Existence Functions
 *
 * empty, exists, all, the allTrue family, subsetOf / supersetOf, count
 * and distinct. These answer with a Boolean or Integer even for Empty
 * input.
 */

import { equalItems } from '../core/equals.js';
import type { Truth } from '../core/logic.js';
import { toBooleanForLogic } from '../core/logic.js';
import type { FhirPathValue } from '../core/values.js';
import { bool, collection, integer, toItems } from '../core/values.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type ExistenceFunctionId =
  | 'empty'
  | 'exists'
  | 'all'
  | 'allTrue'
  | 'anyTrue'
  | 'allFalse'
  | 'anyFalse'
  | 'subsetOf'
  | 'supersetOf'
  | 'count'
  | 'distinct'
  | 'isDistinct';

/** Truth of a criteria result for one item */
export function criteriaTruth(call: FunctionCall, value: FhirPathValue): Truth {
  return toBooleanForLogic(
    value,
    call.engine.fhirVersion,
    `${call.name}() criteria`,
    call.location
  );
}

/** Items with duplicates (by `=`) removed, first occurrence kept */
export function distinctItems(
  call: FunctionCall,
  items: readonly FhirPathValue[]
): FhirPathValue[] {
  const units = call.engine.units;
  const result: FhirPathValue[] = [];
  for (const item of items) {
    if (!result.some((seen) => equalItems(seen, item, units) === true)) {
      result.push(item);
    }
  }
  return result;
}

/** True when every item of `subset` has an equal item in `superset` */
function containsAll(
  call: FunctionCall,
  superset: FhirPathValue,
  subset: FhirPathValue
): boolean {
  const units = call.engine.units;
  const pool = toItems(superset);
  return toItems(subset).every((item) =>
    pool.some((candidate) => equalItems(item, candidate, units) === true)
  );
}

function booleanItems(call: FunctionCall): boolean[] {
  return toItems(call.input).map((item) => {
    if (item.kind !== 'boolean') throw call.typeError(item, 'Boolean');
    return item.value;
  });
}

export const EXISTENCE_FUNCTIONS: Record<
  ExistenceFunctionId,
  FunctionDefinition
> = {
  empty: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => bool(call.input.kind === 'empty'),
  },

  exists: {
    minArgs: 0,
    maxArgs: 1,
    evaluate: (call) => {
      const items = toItems(call.input);
      if (!call.hasArg(0)) return bool(items.length > 0);
      return bool(
        items.some(
          (item, i) => criteriaTruth(call, call.argFor(0, item, i)) === true
        )
      );
    },
  },

  all: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) =>
      bool(
        toItems(call.input).every(
          (item, i) => criteriaTruth(call, call.argFor(0, item, i)) === true
        )
      ),
  },

  allTrue: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => bool(booleanItems(call).every((value) => value)),
  },

  anyTrue: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => bool(booleanItems(call).some((value) => value)),
  },

  allFalse: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => bool(booleanItems(call).every((value) => !value)),
  },

  anyFalse: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => bool(booleanItems(call).some((value) => !value)),
  },

  subsetOf: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => bool(containsAll(call, call.arg(0), call.input)),
  },

  supersetOf: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => bool(containsAll(call, call.input, call.arg(0))),
  },

  count: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => integer(BigInt(toItems(call.input).length)),
  },

  distinct: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) =>
      collection(distinctItems(call, toItems(call.input)), false),
  },

  isDistinct: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const items = toItems(call.input);
      return bool(distinctItems(call, items).length === items.length);
    },
  },
};
