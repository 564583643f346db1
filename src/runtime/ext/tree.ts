/**
 * Tree Navigation Functions
 */

import type { FhirPathValue } from '../core/values.js';
import { collection, toItems } from '../core/values.js';
import { expandBreadthFirst } from './filtering.js';
import type { FunctionDefinition } from './types.js';

export type TreeFunctionId = 'children' | 'descendants';

/** Every field value of every object item, in field order */
export function childrenOf(value: FhirPathValue): FhirPathValue {
  const result: FhirPathValue[] = [];
  for (const item of toItems(value)) {
    if (item.kind === 'object') result.push(...item.fields.values());
  }
  return collection(result, false);
}

export const TREE_FUNCTIONS: Record<TreeFunctionId, FunctionDefinition> = {
  children: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => childrenOf(call.input),
  },

  descendants: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => expandBreadthFirst(call.input, childrenOf, true),
  },
};
