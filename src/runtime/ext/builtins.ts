/**
 * Built-in Function Table
 *
 * Every function the engine knows, keyed by name. Functions invoked on
 * `%terminologies` live in a table of their own so that
 * `%terminologies.subsumes()` and `Coding.subsumes()` do not collide.
 */

import { AGGREGATE_FUNCTIONS, type AggregateFunctionId } from './aggregate.js';
import { BOOLEAN_FUNCTIONS, type BooleanFunctionId } from './boolean.js';
import { BOUNDARY_FUNCTIONS, type BoundaryFunctionId } from './boundary.js';
import { COMBINING_FUNCTIONS, type CombiningFunctionId } from './combining.js';
import {
  CONVERSION_FUNCTIONS,
  type ConversionFunctionId,
} from './conversion.js';
import { DATETIME_FUNCTIONS, type DateTimeFunctionId } from './datetime.js';
import { EXISTENCE_FUNCTIONS, type ExistenceFunctionId } from './existence.js';
import { FHIR_FUNCTIONS, type FhirFunctionId } from './fhir.js';
import { FILTERING_FUNCTIONS, type FilteringFunctionId } from './filtering.js';
import { MATH_FUNCTIONS, type MathFunctionId } from './math.js';
import { STRING_FUNCTIONS, type StringFunctionId } from './strings.js';
import {
  SUBSETTING_FUNCTIONS,
  type SubsettingFunctionId,
} from './subsetting.js';
import {
  TERMINOLOGY_FUNCTIONS,
  type TerminologyFunctionId,
} from './terminology.js';
import { TREE_FUNCTIONS, type TreeFunctionId } from './tree.js';
import { TYPE_FUNCTIONS, type TypeFunctionId } from './type-functions.js';
import type { FunctionDefinition } from './types.js';
import { UTILITY_FUNCTIONS, type UtilityFunctionId } from './utility.js';

export type FunctionId =
  | ExistenceFunctionId
  | FilteringFunctionId
  | SubsettingFunctionId
  | CombiningFunctionId
  | BooleanFunctionId
  | ConversionFunctionId
  | StringFunctionId
  | MathFunctionId
  | TreeFunctionId
  | UtilityFunctionId
  | AggregateFunctionId
  | DateTimeFunctionId
  | TypeFunctionId
  | BoundaryFunctionId
  | FhirFunctionId;

export const FUNCTION_TABLE: Record<FunctionId, FunctionDefinition> = {
  ...EXISTENCE_FUNCTIONS,
  ...FILTERING_FUNCTIONS,
  ...SUBSETTING_FUNCTIONS,
  ...COMBINING_FUNCTIONS,
  ...BOOLEAN_FUNCTIONS,
  ...CONVERSION_FUNCTIONS,
  ...STRING_FUNCTIONS,
  ...MATH_FUNCTIONS,
  ...TREE_FUNCTIONS,
  ...UTILITY_FUNCTIONS,
  ...AGGREGATE_FUNCTIONS,
  ...DATETIME_FUNCTIONS,
  ...TYPE_FUNCTIONS,
  ...BOUNDARY_FUNCTIONS,
  ...FHIR_FUNCTIONS,
};

export { TERMINOLOGY_FUNCTIONS };
export type { TerminologyFunctionId };

export function isFunctionId(name: string): name is FunctionId {
  return Object.hasOwn(FUNCTION_TABLE, name);
}

export function isTerminologyFunctionId(
  name: string
): name is TerminologyFunctionId {
  return Object.hasOwn(TERMINOLOGY_FUNCTIONS, name);
}

/** Names of all built-in functions, sorted */
export function builtinFunctionNames(): string[] {
  return Object.keys(FUNCTION_TABLE).sort();
}
