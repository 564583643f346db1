/**
 * Combining Functions
 *
 * union() removes duplicates like the `|` operator; combine() keeps them.
 */

import { equalItems, unionValues } from '../core/equals.js';
import { collection, isOrdered, toItems } from '../core/values.js';
import type { FunctionDefinition } from './types.js';

export type CombiningFunctionId = 'union' | 'combine';

export const COMBINING_FUNCTIONS: Record<
  CombiningFunctionId,
  FunctionDefinition
> = {
  union: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const units = call.engine.units;
      return unionValues(
        call.input,
        call.arg(0),
        (a, b) => equalItems(a, b, units) === true
      );
    },
  },

  combine: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const other = call.arg(0);
      return collection(
        [...toItems(call.input), ...toItems(other)],
        isOrdered(call.input) && isOrdered(other)
      );
    },
  },
};
