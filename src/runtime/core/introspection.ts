/**
 * Type Introspection
 *
 * Runtime types of values and the `is` / `as` / `type()` rules.
 *
 * Untagged primitives have System types. A FHIR-tagged primitive
 * (`FHIR.code`) also answers to the System type of its underlying kind,
 * so `code is String` holds. FHIR types match their ancestors in the
 * type hierarchy.
 */

import type { TypeSpecifier } from '../../types.js';
import type { TypeHierarchy } from '../services/type-hierarchy.js';
import { parseDate, parseDateTime, parseTime } from './temporal.js';
import type { FhirPathValue, TypeInfo } from './values.js';
import {
  EMPTY,
  SYSTEM_LONG,
  TYPE_INFO_TYPE,
  decimal,
  object,
  str,
  toDecimal,
} from './values.js';

const SYSTEM_NAMES: Readonly<Record<string, string>> = {
  boolean: 'Boolean',
  integer: 'Integer',
  decimal: 'Decimal',
  string: 'String',
  date: 'Date',
  dateTime: 'DateTime',
  time: 'Time',
  quantity: 'Quantity',
};

/** System type name of a value's kind; undefined for objects */
export function systemTypeName(value: FhirPathValue): string | undefined {
  if (
    value.kind === 'integer' &&
    value.type?.namespace === SYSTEM_LONG.namespace &&
    value.type.name === SYSTEM_LONG.name
  ) {
    return SYSTEM_LONG.name;
  }
  return SYSTEM_NAMES[value.kind];
}

/** Declared or implied type of a single item */
export function runtimeType(value: FhirPathValue): TypeInfo | undefined {
  if (value.kind === 'empty') return undefined;
  if (value.type) return value.type;
  const name = systemTypeName(value);
  return name ? { namespace: 'System', name } : undefined;
}

/**
 * `value is spec` for a single item.
 */
export function isOfType(
  value: FhirPathValue,
  spec: TypeSpecifier,
  types: TypeHierarchy
): boolean {
  if (value.kind === 'empty' || value.kind === 'collection') return false;
  const tag = value.type;
  const systemName = systemTypeName(value);

  if (spec.namespace === 'System') {
    if (tag && tag.namespace === 'System') return tag.name === spec.name;
    return systemName === spec.name;
  }
  if (spec.namespace === 'FHIR') {
    return (
      tag?.namespace === 'FHIR' && types.isSubtypeOf(tag.name, spec.name)
    );
  }
  if (spec.namespace !== undefined) {
    return tag?.namespace === spec.namespace && tag.name === spec.name;
  }

  if (tag) {
    if (tag.name === spec.name) return true;
    if (tag.namespace === 'FHIR' && types.isSubtypeOf(tag.name, spec.name)) {
      return true;
    }
  }
  return systemName === spec.name;
}

/**
 * `value as spec` for a single item: the value when it is of the type,
 * a conversion to a System primitive when one applies, else Empty.
 */
export function asType(
  value: FhirPathValue,
  spec: TypeSpecifier,
  types: TypeHierarchy
): FhirPathValue {
  if (isOfType(value, spec, types)) return value;
  if (spec.namespace !== undefined && spec.namespace !== 'System') {
    return EMPTY;
  }
  switch (spec.name) {
    case 'Date':
      return value.kind === 'string' ? (parseDate(value.value) ?? EMPTY) : EMPTY;
    case 'DateTime':
      return value.kind === 'string'
        ? (parseDateTime(value.value) ?? EMPTY)
        : EMPTY;
    case 'Time':
      return value.kind === 'string' ? (parseTime(value.value) ?? EMPTY) : EMPTY;
    case 'Decimal':
      return value.kind === 'integer' ? decimal(toDecimal(value)) : EMPTY;
    default:
      return EMPTY;
  }
}

/** `type()` of a single item: `{ namespace, name }` tagged System.TypeInfo */
export function typeInfoValue(value: FhirPathValue): FhirPathValue {
  const type = runtimeType(value);
  if (!type) return EMPTY;
  return object(
    new Map([
      ['namespace', str(type.namespace)],
      ['name', str(type.name)],
    ]),
    TYPE_INFO_TYPE
  );
}
