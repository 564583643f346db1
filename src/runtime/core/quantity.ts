/**
 * Quantity Arithmetic
 *
 * Unit-aware operations on quantities. Unit knowledge lives entirely in
 * the UnitService; these helpers only decide which conversion to ask for.
 */

import type { Decimal } from './decimal.js';
import type { UnitService } from '../services/units.js';
import type { FhirPathValue, ObjectValue, QuantityValue } from './values.js';
import { quantity, toDecimal } from './values.js';

export const UCUM_SYSTEM = 'http://unitsofmeasure.org';

/**
 * Read a document Quantity (`{ value, unit, system, code }`) as a quantity.
 * The UCUM code wins over the display unit when the system is UCUM.
 */
export function quantityFromObject(obj: ObjectValue): QuantityValue | undefined {
  const value = obj.fields.get('value');
  if (!value || (value.kind !== 'integer' && value.kind !== 'decimal')) {
    return undefined;
  }
  const text = (name: string): string | undefined => {
    const field = obj.fields.get(name);
    return field?.kind === 'string' ? field.value : undefined;
  };
  const system = text('system');
  const code = text('code');
  const unit =
    (system === UCUM_SYSTEM ? code : undefined) ?? text('unit') ?? code ?? '1';
  return {
    kind: 'quantity',
    value: toDecimal(value),
    unit,
    scale: value.kind === 'decimal' ? value.scale : 0,
  };
}

/** Quantity view of a value, if it has one */
export function asQuantity(value: FhirPathValue): QuantityValue | undefined {
  if (value.kind === 'quantity') return value;
  if (value.kind === 'object') return quantityFromObject(value);
  return undefined;
}

/** Right operand expressed in the left operand's unit */
export function alignUnits(
  left: QuantityValue,
  right: QuantityValue,
  units: UnitService
): Decimal | undefined {
  if (!units.compatible(left.unit, right.unit)) return undefined;
  return units.convert(right.value, right.unit, left.unit);
}

export function addQuantities(
  left: QuantityValue,
  right: QuantityValue,
  sign: 1 | -1,
  units: UnitService
): QuantityValue | undefined {
  const aligned = alignUnits(left, right, units);
  if (aligned === undefined) return undefined;
  const value =
    sign === 1 ? left.value.plus(aligned) : left.value.minus(aligned);
  return quantity(value, left.unit);
}

export function multiplyQuantities(
  left: QuantityValue,
  right: QuantityValue,
  units: UnitService
): QuantityValue | undefined {
  const unit = units.multiply(left.unit, right.unit);
  if (unit === undefined) return undefined;
  return quantity(left.value.times(right.value), unit);
}

/**
 * Divide quantities. Compatible units cancel to `'1'`; division by zero
 * yields undefined.
 */
export function divideQuantities(
  left: QuantityValue,
  right: QuantityValue,
  units: UnitService
): QuantityValue | undefined {
  if (right.value.isZero()) return undefined;
  const aligned = alignUnits(left, right, units);
  if (aligned !== undefined) {
    if (aligned.isZero()) return undefined;
    return quantity(left.value.dividedBy(aligned), '1');
  }
  const unit = units.divide(left.unit, right.unit);
  if (unit === undefined) return undefined;
  return quantity(left.value.dividedBy(right.value), unit);
}

/** Scale a quantity by a plain number */
export function scaleQuantity(
  value: QuantityValue,
  factor: Decimal,
  mode: 'times' | 'div'
): QuantityValue | undefined {
  if (mode === 'div') {
    if (factor.isZero()) return undefined;
    return quantity(value.value.dividedBy(factor), value.unit);
  }
  return quantity(value.value.times(factor), value.unit);
}

/** Sign of left - right, undefined when the units do not convert */
export function compareQuantities(
  left: QuantityValue,
  right: QuantityValue,
  units: UnitService
): number | undefined {
  const aligned = alignUnits(left, right, units);
  if (aligned === undefined) return undefined;
  return left.value.comparedTo(aligned);
}

export function negateQuantity(value: QuantityValue): QuantityValue {
  return quantity(value.value.negated(), value.unit);
}
