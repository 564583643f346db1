/**
 * Value Model
 *
 * Every runtime datum is a FhirPathValue: a discriminated union on `kind`.
 * Collections never nest and never hold Empty; the constructors here keep
 * that shape so the rest of the runtime can rely on it.
 */

import { Decimal } from './decimal.js';

// ============================================================
// TYPE TAGS
// ============================================================

/** Type tag carried by values: `System.String`, `FHIR.Patient`, ... */
export interface TypeInfo {
  readonly namespace: string;
  readonly name: string;
}

export type TemporalPrecision =
  | 'year'
  | 'month'
  | 'day'
  | 'hour'
  | 'minute'
  | 'second'
  | 'millisecond';

export const SYSTEM_LONG: TypeInfo = { namespace: 'System', name: 'Long' };
export const TYPE_INFO_TYPE: TypeInfo = {
  namespace: 'System',
  name: 'TypeInfo',
};

// ============================================================
// VALUE VARIANTS
// ============================================================

interface Tagged {
  readonly type?: TypeInfo | undefined;
}

/**
 * Primitives read from a document may carry the `_field` sibling
 * (id, extension) of the primitive they came from.
 */
interface PrimitiveBase extends Tagged {
  readonly element?: ObjectValue | undefined;
}

export interface EmptyValue {
  readonly kind: 'empty';
}

export interface BooleanValue extends PrimitiveBase {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface IntegerValue extends PrimitiveBase {
  readonly kind: 'integer';
  readonly value: bigint;
}

export interface DecimalValue extends PrimitiveBase {
  readonly kind: 'decimal';
  readonly value: Decimal;
  /** Decimal places as written; only precision() and boundaries read it */
  readonly scale: number;
}

export interface StringValue extends PrimitiveBase {
  readonly kind: 'string';
  readonly value: string;
}

export interface DateValue extends PrimitiveBase {
  readonly kind: 'date';
  /** ISO text without the `@` */
  readonly value: string;
  readonly precision: TemporalPrecision;
}

export interface DateTimeValue extends PrimitiveBase {
  readonly kind: 'dateTime';
  readonly value: string;
  readonly precision: TemporalPrecision;
}

export interface TimeValue extends PrimitiveBase {
  readonly kind: 'time';
  /** Text without the leading `T` */
  readonly value: string;
  readonly precision: TemporalPrecision;
}

export interface QuantityValue extends Tagged {
  readonly kind: 'quantity';
  readonly value: Decimal;
  readonly unit: string;
  readonly scale: number;
}

export interface ObjectValue extends Tagged {
  readonly kind: 'object';
  readonly fields: ReadonlyMap<string, FhirPathValue>;
}

export interface CollectionValue extends Tagged {
  readonly kind: 'collection';
  /** Two or more items, none of them collections or Empty */
  readonly items: readonly FhirPathValue[];
  /** False once a set-style operation has made ordering meaningless */
  readonly ordered: boolean;
}

export type TemporalValue = DateValue | DateTimeValue | TimeValue;

export type FhirPathValue =
  | EmptyValue
  | BooleanValue
  | IntegerValue
  | DecimalValue
  | StringValue
  | DateValue
  | DateTimeValue
  | TimeValue
  | QuantityValue
  | ObjectValue
  | CollectionValue;

export type ValueKind = FhirPathValue['kind'];

// ============================================================
// CONSTRUCTORS
// ============================================================

export const EMPTY: EmptyValue = Object.freeze({ kind: 'empty' });
export const TRUE: BooleanValue = Object.freeze({
  kind: 'boolean',
  value: true,
});
export const FALSE: BooleanValue = Object.freeze({
  kind: 'boolean',
  value: false,
});

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function bool(value: boolean): BooleanValue {
  return value ? TRUE : FALSE;
}

/** Boolean or Empty for an unknown three-valued result */
export function boolOrEmpty(value: boolean | undefined): FhirPathValue {
  return value === undefined ? EMPTY : bool(value);
}

/** Integer, or Empty when the value leaves the signed 64-bit range */
export function integer(value: bigint, type?: TypeInfo): FhirPathValue {
  if (value < INT64_MIN || value > INT64_MAX) return EMPTY;
  return type ? { kind: 'integer', value, type } : { kind: 'integer', value };
}

export function decimal(value: Decimal, scale?: number): DecimalValue {
  return {
    kind: 'decimal',
    value,
    scale: scale ?? Math.max(value.decimalPlaces(), 0),
  };
}

/** Decimal from source text, keeping the written scale */
export function decimalFromText(text: string): DecimalValue {
  const dot = text.indexOf('.');
  return decimal(new Decimal(text), dot === -1 ? 0 : text.length - dot - 1);
}

export function str(value: string): StringValue {
  return { kind: 'string', value };
}

export function quantity(value: Decimal, unit: string): QuantityValue {
  return {
    kind: 'quantity',
    value,
    unit,
    scale: Math.max(value.decimalPlaces(), 0),
  };
}

export function object(
  fields: ReadonlyMap<string, FhirPathValue>,
  type?: TypeInfo
): ObjectValue {
  return type ? { kind: 'object', fields, type } : { kind: 'object', fields };
}

/**
 * Build a collection from items, flattening nested collections and
 * dropping Empty. Zero items yield Empty and one item yields the item.
 */
export function collection(
  items: readonly FhirPathValue[],
  ordered = true
): FhirPathValue {
  const flat: FhirPathValue[] = [];
  let isOrdered = ordered;
  for (const item of items) {
    if (item.kind === 'empty') continue;
    if (item.kind === 'collection') {
      flat.push(...item.items);
      if (!item.ordered) isOrdered = false;
    } else {
      flat.push(item);
    }
  }
  if (flat.length === 0) return EMPTY;
  if (flat.length === 1 && flat[0]) return flat[0];
  return { kind: 'collection', items: flat, ordered: isOrdered };
}

// ============================================================
// ACCESSORS
// ============================================================

/** Items of a value: [] for Empty, the members of a collection, else [v] */
export function toItems(value: FhirPathValue): readonly FhirPathValue[] {
  switch (value.kind) {
    case 'empty':
      return [];
    case 'collection':
      return value.items;
    default:
      return [value];
  }
}

export function count(value: FhirPathValue): number {
  return toItems(value).length;
}

export function isEmpty(value: FhirPathValue): boolean {
  return value.kind === 'empty';
}

/** Ordering flag; single items and Empty count as ordered */
export function isOrdered(value: FhirPathValue): boolean {
  return value.kind !== 'collection' || value.ordered;
}

export function isTemporal(value: FhirPathValue): value is TemporalValue {
  return (
    value.kind === 'date' || value.kind === 'dateTime' || value.kind === 'time'
  );
}

export function isNumeric(
  value: FhirPathValue
): value is IntegerValue | DecimalValue {
  return value.kind === 'integer' || value.kind === 'decimal';
}

/** Integer or decimal as a Decimal */
export function toDecimal(value: IntegerValue | DecimalValue): Decimal {
  return value.kind === 'integer'
    ? new Decimal(value.value.toString())
    : value.value;
}

/** Copy of a value carrying a type tag */
export function withType<T extends FhirPathValue>(
  value: T,
  type: TypeInfo
): T | EmptyValue {
  if (value.kind === 'empty') return value;
  return { ...value, type };
}

export function formatTypeInfo(type: TypeInfo): string {
  return `${type.namespace}.${type.name}`;
}

// ============================================================
// DISPLAY
// ============================================================

const CALENDAR_WORDS = new Set([
  'year',
  'years',
  'month',
  'months',
  'week',
  'weeks',
  'day',
  'days',
  'hour',
  'hours',
  'minute',
  'minutes',
  'second',
  'seconds',
  'millisecond',
  'milliseconds',
]);

export function isCalendarWord(unit: string): boolean {
  return CALENDAR_WORDS.has(unit);
}

export function formatQuantity(value: QuantityValue): string {
  const number = value.value.toFixed();
  return isCalendarWord(value.unit)
    ? `${number} ${value.unit}`
    : `${number} '${value.unit}'`;
}

/**
 * Render a value for display.
 * Strings print raw at the top level and quoted inside collections.
 */
export function formatValue(value: FhirPathValue): string {
  return formatInner(value, true);
}

function formatInner(value: FhirPathValue, topLevel: boolean): string {
  switch (value.kind) {
    case 'empty':
      return '{}';
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'integer':
      return value.value.toString();
    case 'decimal':
      return value.value.toFixed();
    case 'string':
      return topLevel ? value.value : `'${value.value}'`;
    case 'date':
    case 'dateTime':
      return `@${value.value}`;
    case 'time':
      return `@T${value.value}`;
    case 'quantity':
      return formatQuantity(value);
    case 'object':
      return JSON.stringify(toJson(value));
    case 'collection':
      return `[${value.items.map((item) => formatInner(item, false)).join(', ')}]`;
  }
}

// ============================================================
// JSON CONVERSION
// ============================================================

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Decimal as a JSON number when exactly representable, else a string */
function decimalToJson(value: Decimal): number | string {
  const asNumber = value.toNumber();
  return new Decimal(asNumber).equals(value) ? asNumber : value.toFixed();
}

/**
 * Convert a value to plain JSON: Empty is [], collections are arrays,
 * temporals are ISO strings and quantities are `{ value, unit }`.
 */
export function toJson(value: FhirPathValue): JsonValue {
  switch (value.kind) {
    case 'empty':
      return [];
    case 'boolean':
      return value.value;
    case 'integer':
      return value.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
        value.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value.value)
        : value.value.toString();
    case 'decimal':
      return decimalToJson(value.value);
    case 'string':
    case 'date':
    case 'dateTime':
    case 'time':
      return value.value;
    case 'quantity':
      return { value: decimalToJson(value.value), unit: value.unit };
    case 'object':
      // fromEntries keeps a `__proto__` field as an ordinary key
      return Object.fromEntries(
        [...value.fields].map(([key, field]): [string, JsonValue] => [
          key,
          toJson(field),
        ])
      );
    case 'collection':
      return value.items.map(toJson);
  }
}
