/**
 * Filtering and Projection Functions
 *
 * where, select, repeat, repeatAll and ofType. repeat() walks breadth
 * first over an explicit frontier so cyclic structures terminate.
 */

import { fingerprint } from '../core/equals.js';
import { isOfType } from '../core/introspection.js';
import type { FhirPathValue } from '../core/values.js';
import { EMPTY, collection, isOrdered, toItems } from '../core/values.js';
import { criteriaTruth } from './existence.js';
import type { FunctionDefinition } from './types.js';

export type FilteringFunctionId =
  | 'where'
  | 'select'
  | 'repeat'
  | 'repeatAll'
  | 'ofType';

/**
 * Breadth-first closure of `step` over the input. Items already expanded
 * are not expanded again; with `unique`, they are not output again either.
 * The input items themselves are output only when a step reaches them.
 */
export function expandBreadthFirst(
  input: FhirPathValue,
  step: (item: FhirPathValue, position: number) => FhirPathValue,
  unique: boolean
): FhirPathValue {
  const expanded = new Set<string>();
  const output: FhirPathValue[] = [];
  let frontier = toItems(input);

  while (frontier.length > 0) {
    const next: FhirPathValue[] = [];
    for (const [position, item] of frontier.entries()) {
      for (const produced of toItems(step(item, position))) {
        const key = fingerprint(produced);
        if (expanded.has(key)) {
          if (!unique) output.push(produced);
          continue;
        }
        expanded.add(key);
        output.push(produced);
        next.push(produced);
      }
    }
    frontier = next;
  }
  return collection(output, false);
}

export const FILTERING_FUNCTIONS: Record<
  FilteringFunctionId,
  FunctionDefinition
> = {
  where: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) =>
      collection(
        toItems(call.input).filter(
          (item, i) => criteriaTruth(call, call.argFor(0, item, i)) === true
        ),
        isOrdered(call.input)
      ),
  },

  select: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) =>
      collection(
        toItems(call.input).map((item, i) => call.argFor(0, item, i)),
        isOrdered(call.input)
      ),
  },

  repeat: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) =>
      expandBreadthFirst(
        call.input,
        (item, i) => call.argFor(0, item, i),
        true
      ),
  },

  repeatAll: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) =>
      expandBreadthFirst(
        call.input,
        (item, i) => call.argFor(0, item, i),
        false
      ),
  },

  ofType: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const spec = call.typeArg(0);
      if (!spec) return EMPTY;
      const types = call.engine.types;
      return collection(
        toItems(call.input).filter((item) => isOfType(item, spec, types)),
        isOrdered(call.input)
      );
    },
  },
};
