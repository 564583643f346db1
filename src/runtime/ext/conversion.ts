/**
 * Conversion Functions
 *
 * iif() and the toX / convertsToX pairs. Each converter maps one item to
 * the target kind or to Empty; convertsToX reports whether it would
 * succeed. Multi-item input is a cardinality error.
 */

import { Decimal } from '../core/decimal.js';
import { toBooleanForLogic } from '../core/logic.js';
import { asQuantity } from '../core/quantity.js';
import {
  makeTemporal,
  parseDate,
  parseDateTime,
  parseTime,
  partsOf,
} from '../core/temporal.js';
import type { FhirPathValue, QuantityValue } from '../core/values.js';
import {
  EMPTY,
  FALSE,
  SYSTEM_LONG,
  TRUE,
  bool,
  decimal,
  decimalFromText,
  formatQuantity,
  integer,
  isCalendarWord,
  quantity,
  str,
  toDecimal,
} from '../core/values.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type ConversionFunctionId =
  | 'iif'
  | 'toBoolean'
  | 'convertsToBoolean'
  | 'toInteger'
  | 'convertsToInteger'
  | 'toLong'
  | 'convertsToLong'
  | 'toDecimal'
  | 'convertsToDecimal'
  | 'toString'
  | 'convertsToString'
  | 'toDate'
  | 'convertsToDate'
  | 'toDateTime'
  | 'convertsToDateTime'
  | 'toTime'
  | 'convertsToTime'
  | 'toQuantity'
  | 'convertsToQuantity';

type Converter = (item: FhirPathValue, call: FunctionCall) => FhirPathValue;

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?\d+(?:\.\d+)?$/;
const QUANTITY_TEXT = /^([+-]?\d+(?:\.\d+)?)\s*(?:'([^']*)'|([a-z]+))?$/;

const TRUE_WORDS = new Set(['true', 't', 'yes', 'y', '1', '1.0']);
const FALSE_WORDS = new Set(['false', 'f', 'no', 'n', '0', '0.0']);

/** Decimal text with at least its written number of places */
export function decimalText(value: Decimal, scale: number): string {
  return value.toFixed(Math.max(scale, value.decimalPlaces()));
}

function toBooleanValue(item: FhirPathValue): FhirPathValue {
  switch (item.kind) {
    case 'boolean':
      return item;
    case 'integer':
      if (item.value === 1n) return TRUE;
      return item.value === 0n ? FALSE : EMPTY;
    case 'decimal':
      if (item.value.equals(1)) return TRUE;
      return item.value.isZero() ? FALSE : EMPTY;
    case 'string': {
      const word = item.value.toLowerCase();
      if (TRUE_WORDS.has(word)) return TRUE;
      return FALSE_WORDS.has(word) ? FALSE : EMPTY;
    }
    default:
      return EMPTY;
  }
}

function toIntegerValue(item: FhirPathValue): FhirPathValue {
  switch (item.kind) {
    case 'integer':
      return item.type === undefined ? item : integer(item.value);
    case 'boolean':
      return integer(item.value ? 1n : 0n);
    case 'string':
      return INTEGER_TEXT.test(item.value)
        ? integer(BigInt(item.value))
        : EMPTY;
    default:
      return EMPTY;
  }
}

function toLongValue(item: FhirPathValue): FhirPathValue {
  const value = toIntegerValue(item);
  return value.kind === 'integer' ? integer(value.value, SYSTEM_LONG) : EMPTY;
}

function toDecimalValue(item: FhirPathValue): FhirPathValue {
  switch (item.kind) {
    case 'decimal':
      return item;
    case 'integer':
      return decimal(toDecimal(item));
    case 'boolean':
      return decimal(new Decimal(item.value ? 1 : 0), 1);
    case 'string':
      return DECIMAL_TEXT.test(item.value)
        ? decimalFromText(item.value)
        : EMPTY;
    default:
      return EMPTY;
  }
}

function toStringValue(item: FhirPathValue): FhirPathValue {
  switch (item.kind) {
    case 'string':
      return item;
    case 'boolean':
      return str(item.value ? 'true' : 'false');
    case 'integer':
      return str(item.value.toString());
    case 'decimal':
      return str(decimalText(item.value, item.scale));
    case 'date':
    case 'dateTime':
    case 'time':
      return str(item.value);
    case 'quantity':
      return str(formatQuantity(item));
    default:
      return EMPTY;
  }
}

function toDateValue(item: FhirPathValue): FhirPathValue {
  switch (item.kind) {
    case 'date':
      return item;
    case 'dateTime':
      return makeTemporal('date', partsOf(item), item.precision);
    case 'string': {
      const date = parseDate(item.value);
      if (date) return date;
      const dateTime = parseDateTime(item.value);
      return dateTime
        ? makeTemporal('date', partsOf(dateTime), dateTime.precision)
        : EMPTY;
    }
    default:
      return EMPTY;
  }
}

function toDateTimeValue(item: FhirPathValue): FhirPathValue {
  switch (item.kind) {
    case 'dateTime':
      return item;
    case 'date':
      return { kind: 'dateTime', value: item.value, precision: item.precision };
    case 'string':
      return parseDateTime(item.value) ?? EMPTY;
    default:
      return EMPTY;
  }
}

function toTimeValue(item: FhirPathValue): FhirPathValue {
  switch (item.kind) {
    case 'time':
      return item;
    case 'string':
      return parseTime(item.value) ?? EMPTY;
    default:
      return EMPTY;
  }
}

/** Quantity view of a primitive, before any unit conversion */
function quantityOf(item: FhirPathValue): QuantityValue | undefined {
  switch (item.kind) {
    case 'integer':
    case 'decimal':
      return {
        ...quantity(toDecimal(item), '1'),
        scale: item.kind === 'decimal' ? item.scale : 0,
      };
    case 'boolean':
      return { ...quantity(new Decimal(item.value ? 1 : 0), '1'), scale: 1 };
    case 'string': {
      const match = QUANTITY_TEXT.exec(item.value.trim());
      if (!match) return undefined;
      const [, amount = '0', quoted, word] = match;
      if (word !== undefined && !isCalendarWord(word)) return undefined;
      const number = decimalFromText(amount);
      return {
        ...quantity(number.value, quoted ?? word ?? '1'),
        scale: number.scale,
      };
    }
    default:
      return asQuantity(item);
  }
}

function toQuantityValue(item: FhirPathValue, call: FunctionCall): FhirPathValue {
  const value = quantityOf(item);
  if (!value) return EMPTY;
  const unit = call.stringArg(0);
  if (unit === undefined || unit === value.unit) return value;
  const converted = call.engine.units.convert(value.value, value.unit, unit);
  return converted === undefined ? EMPTY : quantity(converted, unit);
}

function convertTo(converter: Converter): FunctionDefinition {
  return {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const item = call.singleInput();
      return item === undefined ? EMPTY : converter(item, call);
    },
  };
}

function convertsTo(converter: Converter): FunctionDefinition {
  return {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const item = call.singleInput();
      if (item === undefined) return EMPTY;
      return bool(converter(item, call).kind !== 'empty');
    },
  };
}

export const CONVERSION_FUNCTIONS: Record<
  ConversionFunctionId,
  FunctionDefinition
> = {
  // Chained, the branches see the receiver as $this
  iif: {
    minArgs: 2,
    maxArgs: 3,
    evaluate: (call) => {
      if (call.chained) call.singleInput();
      const branch = (index: number): FhirPathValue =>
        call.chained ? call.argFor(index, call.input, 0) : call.arg(index);
      const criterion = toBooleanForLogic(
        branch(0),
        call.engine.fhirVersion,
        'iif() criterion',
        call.location
      );
      if (criterion === true) return branch(1);
      return call.hasArg(2) ? branch(2) : EMPTY;
    },
  },

  toBoolean: convertTo(toBooleanValue),
  convertsToBoolean: convertsTo(toBooleanValue),
  toInteger: convertTo(toIntegerValue),
  convertsToInteger: convertsTo(toIntegerValue),
  toLong: convertTo(toLongValue),
  convertsToLong: convertsTo(toLongValue),
  toDecimal: convertTo(toDecimalValue),
  convertsToDecimal: convertsTo(toDecimalValue),
  toString: convertTo(toStringValue),
  convertsToString: convertsTo(toStringValue),
  toDate: convertTo(toDateValue),
  convertsToDate: convertsTo(toDateValue),
  toDateTime: convertTo(toDateTimeValue),
  convertsToDateTime: convertsTo(toDateTimeValue),
  toTime: convertTo(toTimeValue),
  convertsToTime: convertsTo(toTimeValue),
  toQuantity: { ...convertTo(toQuantityValue), maxArgs: 1 },
  convertsToQuantity: { ...convertsTo(toQuantityValue), maxArgs: 1 },
};
