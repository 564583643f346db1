/**
 * Expression Evaluation
 *
 * Entry points that run a parsed expression against a context, plus the
 * one-shot `evaluateExpression` used by hosts that only have text.
 */

import { parse } from '../../parser/index.js';
import type { ExpressionNode } from '../../types.js';
import { FhirPathError, evaluationError } from '../../types.js';
import { createEvaluationContext, withFocus } from './context.js';
import { getEvaluator } from './eval/evaluator.js';
import type {
  EvaluationContext,
  EvaluationOptions,
  EvaluationOutcome,
} from './types.js';
import type { FhirPathValue } from './values.js';
import { toItems } from './values.js';

/**
 * Evaluate a parsed expression.
 * With `focus`, `$this` and `%context` both refer to it; otherwise the
 * root resources are the focus.
 *
 * @throws FhirPathError on any evaluation failure (after onError fires)
 */
export function evaluate(
  expr: ExpressionNode,
  ctx: EvaluationContext,
  focus?: FhirPathValue
): FhirPathValue {
  const scope = focus === undefined ? ctx : withFocus(ctx, focus);
  try {
    return getEvaluator(ctx.engine).evaluateNode(expr, scope);
  } catch (error) {
    if (error instanceof Error) {
      ctx.engine.observability.onError?.({
        error,
        location: error instanceof FhirPathError ? error.location : undefined,
      });
    }
    throw error;
  }
}

function describeError(error: unknown): string {
  if (error instanceof FhirPathError) {
    return `${error.errorId}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse and evaluate in one step. Failures are returned, not thrown.
 */
export function evaluateExpression(
  text: string,
  options: EvaluationOptions = {}
): EvaluationOutcome {
  try {
    const ctx = createEvaluationContext(options);
    const value = evaluate(parse(text), ctx);
    return { success: true, value, traces: ctx.engine.trace.entries };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
      message: describeError(error),
    };
  }
}

/**
 * Evaluate a constraint against `focus`.
 * Empty is false; a single Boolean is its value.
 *
 * @throws EvaluationError FP-R004 for several items, FP-R002 for a
 * non-Boolean item
 */
export function evaluateBoolean(
  text: string,
  focus: FhirPathValue,
  ctx: EvaluationContext
): boolean {
  const result = evaluate(parse(text), ctx, focus);
  const items = toItems(result);
  if (items.length > 1) {
    throw evaluationError('FP-R004', {
      operation: 'constraint',
      count: items.length,
    });
  }
  const item = items[0];
  if (item === undefined) return false;
  if (item.kind !== 'boolean') {
    throw evaluationError('FP-R002', {
      operation: 'constraint',
      expected: 'Boolean',
      actual: item.kind,
    });
  }
  return item.value;
}
