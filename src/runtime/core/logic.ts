/**
 * Three-Valued Logic
 *
 * Booleans here are `boolean | undefined`, where undefined is the unknown
 * (Empty) state.
 */

import type { SourceLocation } from '../../types.js';
import { evaluationError } from '../../types.js';
import type { FhirVersion } from './types.js';
import type { FhirPathValue } from './values.js';
import { toItems } from './values.js';

export type Truth = boolean | undefined;

export function and(a: Truth, b: Truth): Truth {
  if (a === false || b === false) return false;
  if (a === undefined || b === undefined) return undefined;
  return true;
}

export function or(a: Truth, b: Truth): Truth {
  if (a === true || b === true) return true;
  if (a === undefined || b === undefined) return undefined;
  return false;
}

export function xor(a: Truth, b: Truth): Truth {
  if (a === undefined || b === undefined) return undefined;
  return a !== b;
}

export function implies(a: Truth, b: Truth): Truth {
  if (a === false) return true;
  if (a === true) return b;
  return b === true ? true : undefined;
}

export function not(a: Truth): Truth {
  return a === undefined ? undefined : !a;
}

/**
 * Read a value as a truth value. Integers are C-like under R4 and R4B
 * (`0` is false); any other single item is true.
 * @throws EvaluationError FP-R004 for two or more items
 */
export function toBooleanForLogic(
  value: FhirPathValue,
  fhirVersion: FhirVersion,
  operation: string,
  location?: SourceLocation
): Truth {
  const items = toItems(value);
  if (items.length > 1) {
    throw evaluationError(
      'FP-R004',
      { operation, count: items.length },
      location
    );
  }
  const item = items[0];
  if (item === undefined) return undefined;
  switch (item.kind) {
    case 'boolean':
      return item.value;
    case 'integer':
      return fhirVersion === 'R5' ? true : item.value !== 0n;
    default:
      return true;
  }
}
