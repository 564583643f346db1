/**
 * Boundary Functions
 *
 * lowBoundary() and highBoundary() give the least and greatest values an
 * imprecise value could stand for, at an output precision given in
 * digits. precision() reports the precision of the input and
 * comparable() whether two quantities share a dimension.
 */

import { Decimal } from '../core/decimal.js';
import { asQuantity } from '../core/quantity.js';
import {
  daysInMonth,
  makeTemporal,
  partsOf,
  precisionDigits,
  precisionIndex,
} from '../core/temporal.js';
import type {
  FhirPathValue,
  TemporalPrecision,
  TemporalValue,
} from '../core/values.js';
import {
  EMPTY,
  bool,
  decimal,
  integer,
  isTemporal,
  quantity,
  toDecimal,
} from '../core/values.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type BoundaryFunctionId =
  | 'lowBoundary'
  | 'highBoundary'
  | 'precision'
  | 'comparable';

type Side = 'low' | 'high';

const MAX_DECIMAL_PRECISION = 28;

const DATE_DIGITS = new Map<number, TemporalPrecision>([
  [4, 'year'],
  [6, 'month'],
  [8, 'day'],
]);

const DATETIME_DIGITS = new Map<number, TemporalPrecision>([
  ...DATE_DIGITS,
  [10, 'hour'],
  [12, 'minute'],
  [14, 'second'],
  [17, 'millisecond'],
]);

const TIME_DIGITS = new Map<number, TemporalPrecision>([
  [2, 'hour'],
  [4, 'minute'],
  [6, 'second'],
  [9, 'millisecond'],
]);

const DEFAULT_DIGITS: Readonly<Record<TemporalValue['kind'], number>> = {
  date: 8,
  dateTime: 17,
  time: 9,
};

/** Offsets that put an unzoned date-time at its earliest and latest */
const ZONE_EXTREMES: Readonly<Record<Side, string>> = {
  low: '+14:00',
  high: '-12:00',
};

/**
 * Boundary of a decimal with `scale` written places. Undefined when the
 * output precision is out of range.
 */
export function decimalBoundary(
  value: Decimal,
  scale: number,
  precision: number,
  side: Side
): Decimal | undefined {
  if (precision < 0 || precision > MAX_DECIMAL_PRECISION) return undefined;
  if (scale < precision) {
    const half = new Decimal(10).pow(-scale).dividedBy(2);
    return side === 'low' ? value.minus(half) : value.plus(half);
  }
  return value.toDecimalPlaces(
    precision,
    side === 'low' ? Decimal.ROUND_FLOOR : Decimal.ROUND_CEIL
  );
}

/**
 * Boundary of a temporal value at `digits` output precision. Undefined
 * when the digit count names no precision of the value's kind.
 */
export function temporalBoundary(
  value: TemporalValue,
  digits: number,
  side: Side
): TemporalValue | undefined {
  const table =
    value.kind === 'date'
      ? DATE_DIGITS
      : value.kind === 'dateTime'
        ? DATETIME_DIGITS
        : TIME_DIGITS;
  const target = table.get(digits);
  if (target === undefined) return undefined;

  const parts = partsOf(value);
  const level = precisionIndex(value.precision);
  if (side === 'high') {
    if (level < 1) parts.month = 12;
    if (level < 2) parts.day = daysInMonth(parts.year, parts.month);
    if (level < 3) parts.hour = 23;
    if (level < 4) parts.minute = 59;
    if (level < 5) parts.second = 59;
    if (level < 6) parts.millisecond = 999;
  }
  if (value.kind === 'dateTime' && parts.zone === undefined) {
    parts.zone = ZONE_EXTREMES[side];
  }
  return makeTemporal(value.kind, parts, target);
}

function boundary(side: Side): FunctionDefinition {
  return {
    minArgs: 0,
    maxArgs: 1,
    evaluate: (call) => {
      const item = call.singleInput();
      if (item === undefined) return EMPTY;
      const digits = call.integerArg(0);

      if (isTemporal(item)) {
        return (
          temporalBoundary(item, digits ?? DEFAULT_DIGITS[item.kind], side) ??
          EMPTY
        );
      }

      const precision = digits ?? 8;
      if (item.kind === 'integer' || item.kind === 'decimal') {
        const scale = item.kind === 'decimal' ? item.scale : 0;
        const bound = decimalBoundary(toDecimal(item), scale, precision, side);
        return bound === undefined ? EMPTY : decimal(bound, precision);
      }
      const amount = asQuantity(item);
      if (amount) {
        const bound = decimalBoundary(
          amount.value,
          amount.scale,
          precision,
          side
        );
        if (bound === undefined) return EMPTY;
        return { ...quantity(bound, amount.unit), scale: precision };
      }
      throw call.typeError(item, 'Decimal, Quantity, Date, DateTime or Time');
    },
  };
}

function precisionOf(item: FhirPathValue): FhirPathValue {
  if (isTemporal(item)) return integer(BigInt(precisionDigits(item)));
  switch (item.kind) {
    case 'decimal':
    case 'quantity':
      return integer(BigInt(item.scale));
    case 'integer':
      return integer(0n);
    default:
      return EMPTY;
  }
}

export const BOUNDARY_FUNCTIONS: Record<
  BoundaryFunctionId,
  FunctionDefinition
> = {
  lowBoundary: boundary('low'),
  highBoundary: boundary('high'),

  precision: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const item = call.singleInput();
      return item === undefined ? EMPTY : precisionOf(item);
    },
  },

  comparable: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const item = call.singleInput();
      const other = call.singleArg(0);
      if (item === undefined || other === undefined) return EMPTY;
      const left = asQuantity(item);
      const right = asQuantity(other);
      if (!left) throw call.typeError(item, 'Quantity');
      if (!right) throw call.typeError(other, 'Quantity');
      return bool(call.engine.units.compatible(left.unit, right.unit));
    },
  },
};
