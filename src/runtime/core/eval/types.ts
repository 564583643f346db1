/**
 * Evaluator Mixin Types
 *
 * @internal
 */

import type { FhirPathValue } from '../values.js';
import type { EvaluationContext } from '../types.js';

/**
 * Constructor type for mixin composition.
 * TypeScript requires `any[]` for the rest parameter of a mixin base.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<T = object> = new (...args: any[]) => T;

/**
 * Result of evaluating a step of an invocation chain. The scope may carry
 * variables introduced by defineVariable() for the steps that follow.
 */
export interface ScopedResult {
  readonly value: FhirPathValue;
  readonly ctx: EvaluationContext;
}
