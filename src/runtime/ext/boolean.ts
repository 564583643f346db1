/**
 * Boolean Functions
 */

import { not, toBooleanForLogic } from '../core/logic.js';
import { boolOrEmpty } from '../core/values.js';
import type { FunctionDefinition } from './types.js';

export type BooleanFunctionId = 'not';

export const BOOLEAN_FUNCTIONS: Record<BooleanFunctionId, FunctionDefinition> =
  {
    // A two-item input is a cardinality error, not a per-item negation
    not: {
      minArgs: 0,
      maxArgs: 0,
      evaluate: (call) =>
        boolOrEmpty(
          not(
            toBooleanForLogic(
              call.input,
              call.engine.fhirVersion,
              'not()',
              call.location
            )
          )
        ),
    },
  };
