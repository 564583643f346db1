/**
 * Value Equality, Equivalence and Ordering
 *
 * `=` is structural and may be unknown (partial-precision temporals,
 * unconvertible units). `~` is total: it never yields unknown. Ordering
 * reports unknown and incomparable separately so the caller can choose
 * between Empty and a type error.
 */

import type { UnitService } from '../services/units.js';
import { asQuantity, compareQuantities } from './quantity.js';
import {
  comparableKinds,
  compareTemporal,
  parseDate,
  parseDateTime,
  parseTime,
} from './temporal.js';
import type {
  FhirPathValue,
  ObjectValue,
  TemporalValue,
} from './values.js';
import {
  collection,
  formatTypeInfo,
  isNumeric,
  isOrdered,
  isTemporal,
  toDecimal,
  toItems,
} from './values.js';

export type ComparisonResult = -1 | 0 | 1 | 'unknown' | 'incomparable';

function sign(n: number): -1 | 0 | 1 {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/** Read a string as the temporal kind of `like`, if it parses */
export function stringAsTemporal(
  text: string,
  like: TemporalValue
): TemporalValue | undefined {
  switch (like.kind) {
    case 'date':
      return parseDate(text) ?? parseDateTime(text);
    case 'dateTime':
      return parseDateTime(text);
    case 'time':
      return parseTime(text);
  }
}

function isQuantityObject(value: FhirPathValue): value is ObjectValue {
  return value.kind === 'object' && asQuantity(value) !== undefined;
}

// ============================================================
// ORDERING
// ============================================================

/**
 * Order two single items.
 */
export function compareItems(
  a: FhirPathValue,
  b: FhirPathValue,
  units: UnitService
): ComparisonResult {
  if (isNumeric(a) && isNumeric(b)) {
    return sign(toDecimal(a).comparedTo(toDecimal(b)));
  }
  if (a.kind === 'string' && b.kind === 'string') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }

  if (isTemporal(a) || isTemporal(b)) {
    const left = a.kind === 'string' && isTemporal(b) ? stringAsTemporal(a.value, b) : a;
    const right = b.kind === 'string' && isTemporal(a) ? stringAsTemporal(b.value, a) : b;
    if (!left || !right) return 'unknown';
    if (!isTemporal(left) || !isTemporal(right)) return 'incomparable';
    if (!comparableKinds(left, right)) return 'incomparable';
    const result = compareTemporal(left, right);
    return result === undefined ? 'unknown' : sign(result);
  }

  const qa = a.kind === 'quantity' || isQuantityObject(a) ? asQuantity(a) : undefined;
  const qb = b.kind === 'quantity' || isQuantityObject(b) ? asQuantity(b) : undefined;
  if (qa && qb && (a.kind === 'quantity' || b.kind === 'quantity')) {
    const result = compareQuantities(qa, qb, units);
    return result === undefined ? 'unknown' : sign(result);
  }

  return 'incomparable';
}

// ============================================================
// EQUALITY
// ============================================================

function sameTypeTag(a: FhirPathValue, b: FhirPathValue): boolean {
  if (a.kind === 'empty' || b.kind === 'empty') return true;
  if (!a.type || !b.type) return true;
  return formatTypeInfo(a.type) === formatTypeInfo(b.type);
}

function equalObjects(
  a: ObjectValue,
  b: ObjectValue,
  units: UnitService
): boolean {
  if (!sameTypeTag(a, b)) return false;
  if (a.fields.size !== b.fields.size) return false;
  for (const [key, value] of a.fields) {
    const other = b.fields.get(key);
    if (!other) return false;
    if (equalValues(value, other, units) !== true) return false;
  }
  return true;
}

/**
 * `=` on single items; undefined when the answer is unknown.
 */
export function equalItems(
  a: FhirPathValue,
  b: FhirPathValue,
  units: UnitService
): boolean | undefined {
  if (isNumeric(a) && isNumeric(b)) {
    return toDecimal(a).equals(toDecimal(b));
  }
  if (a.kind === 'boolean' && b.kind === 'boolean') return a.value === b.value;
  if (a.kind === 'string' && b.kind === 'string') return a.value === b.value;

  if (isTemporal(a) || isTemporal(b) || a.kind === 'quantity' || b.kind === 'quantity') {
    const order = compareItems(a, b, units);
    if (order === 'incomparable') return false;
    if (order === 'unknown') return undefined;
    return order === 0;
  }

  if (a.kind === 'object' && b.kind === 'object') {
    return equalObjects(a, b, units);
  }
  return false;
}

/**
 * `=` on whole values: same length and item-wise equal in order.
 * Empty on either side is the caller's concern.
 */
export function equalValues(
  a: FhirPathValue,
  b: FhirPathValue,
  units: UnitService
): boolean | undefined {
  const left = toItems(a);
  const right = toItems(b);
  if (left.length !== right.length) return false;
  let unknown = false;
  for (const [i, item] of left.entries()) {
    const other = right[i];
    if (!other) return false;
    const result = equalItems(item, other, units);
    if (result === false) return false;
    if (result === undefined) unknown = true;
  }
  return unknown ? undefined : true;
}

// ============================================================
// EQUIVALENCE
// ============================================================

function normalizeString(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

function scaleOf(value: FhirPathValue): number {
  return value.kind === 'decimal' || value.kind === 'quantity' ? value.scale : 0;
}

/**
 * `~` on single items: strings ignore case and whitespace, decimals
 * compare at the precision of the less precise operand.
 */
export function equivalentItems(
  a: FhirPathValue,
  b: FhirPathValue,
  units: UnitService
): boolean {
  if (isNumeric(a) && isNumeric(b)) {
    const places = Math.min(scaleOf(a), scaleOf(b));
    return toDecimal(a)
      .toDecimalPlaces(places)
      .equals(toDecimal(b).toDecimalPlaces(places));
  }
  if (a.kind === 'string' && b.kind === 'string') {
    return normalizeString(a.value) === normalizeString(b.value);
  }
  if (a.kind === 'quantity' || b.kind === 'quantity') {
    const qa = asQuantity(a);
    const qb = asQuantity(b);
    if (!qa || !qb || !units.compatible(qa.unit, qb.unit)) return false;
    const converted = units.convert(qb.value, qb.unit, qa.unit);
    if (converted === undefined) return false;
    const places = Math.min(qa.scale, qb.scale);
    return qa.value
      .toDecimalPlaces(places)
      .equals(converted.toDecimalPlaces(places));
  }
  if (a.kind === 'object' && b.kind === 'object') {
    if (a.fields.size !== b.fields.size) return false;
    for (const [key, value] of a.fields) {
      const other = b.fields.get(key);
      if (!other || !equivalentValues(value, other, units)) return false;
    }
    return true;
  }
  return equalItems(a, b, units) === true;
}

/**
 * `~` on whole values: same size and every item has an equivalent
 * partner, regardless of order. Empty ~ Empty is true.
 */
export function equivalentValues(
  a: FhirPathValue,
  b: FhirPathValue,
  units: UnitService
): boolean {
  const left = toItems(a);
  const right = [...toItems(b)];
  if (left.length !== right.length) return false;
  for (const item of left) {
    const index = right.findIndex((other) => equivalentItems(item, other, units));
    if (index === -1) return false;
    right.splice(index, 1);
  }
  return true;
}

// ============================================================
// UNION
// ============================================================

/** Union of two values, keeping the first of each set of equal items */
export function unionValues(
  left: FhirPathValue,
  right: FhirPathValue,
  equal: (a: FhirPathValue, b: FhirPathValue) => boolean
): FhirPathValue {
  const result: FhirPathValue[] = [];
  for (const item of [...toItems(left), ...toItems(right)]) {
    if (!result.some((seen) => equal(seen, item))) result.push(item);
  }
  return collection(result, isOrdered(left) && isOrdered(right));
}

// ============================================================
// FINGERPRINT
// ============================================================

/**
 * Canonical text of a value. Values that are `=` (and structurally equal
 * objects) share a fingerprint; used for de-duplication. An object met
 * again below itself prints as `^`, so cyclic graphs still terminate.
 */
export function fingerprint(value: FhirPathValue): string {
  return fingerprintWithin(value, new Set());
}

function fingerprintWithin(
  value: FhirPathValue,
  ancestors: Set<ObjectValue>
): string {
  switch (value.kind) {
    case 'empty':
      return '{}';
    case 'boolean':
      return value.value ? 'b:true' : 'b:false';
    case 'integer':
    case 'decimal':
      return `n:${toDecimal(value).toFixed()}`;
    case 'string':
      return `s:${JSON.stringify(value.value)}`;
    case 'date':
    case 'dateTime':
    case 'time':
      return `${value.kind}:${value.value}`;
    case 'quantity':
      return `q:${value.value.toFixed()} ${value.unit}`;
    case 'object': {
      if (ancestors.has(value)) return '^';
      ancestors.add(value);
      const keys = [...value.fields.keys()].sort();
      const body = keys
        .map((key) => {
          const field = value.fields.get(key);
          return `${JSON.stringify(key)}=${field ? fingerprintWithin(field, ancestors) : ''}`;
        })
        .join(',');
      ancestors.delete(value);
      const tag = value.type ? formatTypeInfo(value.type) : '';
      return `o:${tag}{${body}}`;
    }
    case 'collection':
      return `[${value.items.map((item) => fingerprintWithin(item, ancestors)).join(',')}]`;
  }
}
