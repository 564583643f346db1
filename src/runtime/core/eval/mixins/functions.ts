/**
 * FunctionsMixin: Function Invocation
 *
 * Looks up built-in functions, checks arity and runs them. Calls on the
 * `%terminologies` handle dispatch to the terminology table instead.
 *
 * Observability:
 * - onFunctionCall before, onFunctionReturn (with duration) after
 *
 * Error Handling:
 * - Unknown functions throw EvaluationError(FP-R007)
 * - Wrong argument counts throw EvaluationError(FP-R003)
 *
 * @internal
 */

import type { FunctionCallNode } from '../../../../types.js';
import { evaluationError } from '../../../../types.js';
import {
  FUNCTION_TABLE,
  TERMINOLOGY_FUNCTIONS,
  isFunctionId,
  isTerminologyFunctionId,
} from '../../../ext/builtins.js';
import type { FunctionDefinition } from '../../../ext/types.js';
import { FunctionCall } from '../../../ext/types.js';
import { defineVariable } from '../../context.js';
import type { EvaluationContext } from '../../types.js';
import type { FhirPathValue } from '../../values.js';
import type { EvaluatorConstructor, ScopedResult } from '../types.js';
import type { EvaluatorBase } from '../base.js';
import { isTerminologiesHandle } from './variables.js';

function describeArity(definition: FunctionDefinition): string {
  const { minArgs, maxArgs } = definition;
  if (minArgs === maxArgs) return String(minArgs);
  if (maxArgs === Number.POSITIVE_INFINITY) return `at least ${minArgs}`;
  return `${minArgs} to ${maxArgs}`;
}

function createFunctionsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class FunctionsEvaluator extends Base {
    override invokeFunction(
      node: FunctionCallNode,
      input: FhirPathValue,
      ctx: EvaluationContext,
      chained: boolean
    ): ScopedResult {
      const definition = this.lookupFunction(node, input, chained);
      const argCount = node.args.length;
      if (argCount < definition.minArgs || argCount > definition.maxArgs) {
        throw evaluationError(
          'FP-R003',
          {
            name: node.name,
            expected: describeArity(definition),
            actual: argCount,
          },
          this.getNodeLocation(node)
        );
      }

      const { onFunctionCall, onFunctionReturn } = this.engine.observability;
      onFunctionCall?.({ name: node.name, input, argCount });
      const startTime = performance.now();

      const call = new FunctionCall(node, input, ctx, chained, this);
      const value = definition.evaluate(call);

      onFunctionReturn?.({
        name: node.name,
        value,
        durationMs: performance.now() - startTime,
      });

      let scope = ctx;
      for (const [name, bound] of call.boundVariables) {
        scope = defineVariable(scope, name, bound);
      }
      return { value, ctx: scope };
    }

    lookupFunction(
      node: FunctionCallNode,
      input: FhirPathValue,
      chained: boolean
    ): FunctionDefinition {
      const name = node.name;
      if (chained && isTerminologiesHandle(input)) {
        if (isTerminologyFunctionId(name)) return TERMINOLOGY_FUNCTIONS[name];
      } else if (isFunctionId(name)) {
        return FUNCTION_TABLE[name];
      }
      throw evaluationError(
        'FP-R007',
        { name },
        this.getNodeLocation(node)
      );
    }
  };
}

export const FunctionsMixin = createFunctionsMixin;
