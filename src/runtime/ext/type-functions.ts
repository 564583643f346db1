/**
 * Type Functions
 *
 * Function forms of `is` and `as`, plus type(). Unlike the operator,
 * as() maps over a multi-item input.
 */

import { asType, isOfType, typeInfoValue } from '../core/introspection.js';
import { EMPTY, bool, collection, isOrdered, toItems } from '../core/values.js';
import type { FunctionDefinition } from './types.js';

export type TypeFunctionId = 'is' | 'as' | 'type';

export const TYPE_FUNCTIONS: Record<TypeFunctionId, FunctionDefinition> = {
  is: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const item = call.singleInput();
      const spec = call.typeArg(0);
      if (item === undefined || spec === undefined) return EMPTY;
      return bool(isOfType(item, spec, call.engine.types));
    },
  },

  as: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const spec = call.typeArg(0);
      if (spec === undefined) return EMPTY;
      const types = call.engine.types;
      return collection(
        toItems(call.input).map((item) => asType(item, spec, types)),
        isOrdered(call.input)
      );
    },
  },

  type: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) =>
      collection(toItems(call.input).map(typeInfoValue), isOrdered(call.input)),
  },
};
