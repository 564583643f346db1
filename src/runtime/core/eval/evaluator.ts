/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per engine.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Shared utilities and dispatch placeholders
 * 2. CoreMixin - Expression dispatch and invocation chains
 * 3. LiteralsMixin - Literal values
 * 4. VariablesMixin - External constants and user variables
 * 5. NavigationMixin - Member access, choice elements, indexers
 * 6. OperatorsMixin - Arithmetic, comparison, equality, union
 * 7. LogicMixin - Three-valued boolean operators
 * 8. FunctionsMixin - Built-in function invocation
 * 9. TypesMixin - `is` / `as` operators (outermost)
 *
 * Every cross-mixin call goes through a placeholder declared on
 * EvaluatorBase, so the order only matters for readability.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CoreMixin } from './mixins/core.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';
import { NavigationMixin } from './mixins/navigation.js';
import { OperatorsMixin } from './mixins/operators.js';
import { LogicMixin } from './mixins/logic.js';
import { FunctionsMixin } from './mixins/functions.js';
import { TypesMixin } from './mixins/types.js';
import type { EngineSettings } from '../types.js';

/**
 * Complete Evaluator class composed from all mixins.
 */
export const Evaluator = TypesMixin(
  FunctionsMixin(
    LogicMixin(
      OperatorsMixin(
        NavigationMixin(VariablesMixin(LiteralsMixin(CoreMixin(EvaluatorBase))))
      )
    )
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * WeakMap cache for evaluator instances.
 *
 * Key: EngineSettings object reference (shared by every scope of one
 * evaluation)
 * Value: Evaluator instance for those settings
 */
const evaluatorCache = new WeakMap<EngineSettings, Evaluator>();

/**
 * Get or create the evaluator for an engine.
 *
 * @internal
 */
export function getEvaluator(engine: EngineSettings): Evaluator {
  let evaluator = evaluatorCache.get(engine);
  if (!evaluator) {
    evaluator = new Evaluator(engine);
    evaluatorCache.set(engine, evaluator);
  }
  return evaluator;
}
