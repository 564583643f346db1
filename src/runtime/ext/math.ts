/**
 * Math Functions
 *
 * Single numeric input (quantities for abs, ceiling, floor, round and
 * truncate as well). Results that are not real numbers are Empty.
 */

import { Decimal } from '../core/decimal.js';
import type { FhirPathValue, QuantityValue } from '../core/values.js';
import {
  EMPTY,
  decimal,
  integer,
  isNumeric,
  quantity,
  toDecimal,
} from '../core/values.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type MathFunctionId =
  | 'abs'
  | 'ceiling'
  | 'exp'
  | 'floor'
  | 'ln'
  | 'log'
  | 'power'
  | 'round'
  | 'sqrt'
  | 'truncate';

type Numeric = Extract<FhirPathValue, { kind: 'integer' | 'decimal' }>;

function numericInput(call: FunctionCall): Numeric | QuantityValue | undefined {
  const item = call.singleInput();
  if (item === undefined) return undefined;
  if (isNumeric(item) || item.kind === 'quantity') return item;
  throw call.typeError(item, 'Integer or Decimal');
}

function numericArg(call: FunctionCall, index: number): Decimal | undefined {
  const item = call.singleArg(index);
  if (item === undefined) return undefined;
  if (!isNumeric(item)) throw call.typeError(item, 'Integer or Decimal');
  return toDecimal(item);
}

/** Decimal result, Empty when it is not finite */
function finite(value: Decimal): FhirPathValue {
  return value.isFinite() ? decimal(value) : EMPTY;
}

function wholeNumber(value: Decimal): FhirPathValue {
  return integer(BigInt(value.toFixed(0)));
}

/**
 * Apply `fn` to the number, or to a quantity's value keeping its unit.
 */
function mapNumber(
  call: FunctionCall,
  fn: (value: Decimal, input: Numeric | undefined) => FhirPathValue
): FhirPathValue {
  const input = numericInput(call);
  if (input === undefined) return EMPTY;
  if (input.kind === 'quantity') {
    const result = fn(input.value, undefined);
    if (result.kind === 'integer' || result.kind === 'decimal') {
      return quantity(toDecimal(result), input.unit);
    }
    return EMPTY;
  }
  return fn(toDecimal(input), input);
}

/** Function of a plain number only; quantities are a type error */
function numberOnly(
  argCount: number,
  fn: (value: Decimal, args: Decimal[]) => FhirPathValue
): FunctionDefinition {
  return {
    minArgs: argCount,
    maxArgs: argCount,
    evaluate: (call) => {
      const input = numericInput(call);
      if (input === undefined) return EMPTY;
      if (input.kind === 'quantity') {
        throw call.typeError(input, 'Integer or Decimal');
      }
      const args: Decimal[] = [];
      for (let i = 0; i < argCount; i++) {
        const arg = numericArg(call, i);
        if (arg === undefined) return EMPTY;
        args.push(arg);
      }
      return fn(toDecimal(input), args);
    },
  };
}

export const MATH_FUNCTIONS: Record<MathFunctionId, FunctionDefinition> = {
  abs: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) =>
      mapNumber(call, (value, input) =>
        input?.kind === 'integer'
          ? integer(input.value < 0n ? -input.value : input.value)
          : decimal(value.abs())
      ),
  },

  ceiling: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => mapNumber(call, (value) => wholeNumber(value.ceil())),
  },

  floor: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => mapNumber(call, (value) => wholeNumber(value.floor())),
  },

  truncate: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => mapNumber(call, (value) => wholeNumber(value.trunc())),
  },

  round: {
    minArgs: 0,
    maxArgs: 1,
    evaluate: (call) => {
      const precision = call.integerArg(0) ?? 0;
      if (precision < 0) throw call.invalidArgument('precision must be >= 0');
      return mapNumber(call, (value) =>
        decimal(
          value.toDecimalPlaces(precision, Decimal.ROUND_HALF_UP),
          precision
        )
      );
    },
  },

  exp: numberOnly(0, (value) => finite(Decimal.exp(value))),

  ln: numberOnly(0, (value) =>
    value.greaterThan(0) ? finite(Decimal.ln(value)) : EMPTY
  ),

  log: numberOnly(1, (value, [base = new Decimal(10)]) => {
    if (!value.greaterThan(0) || !base.greaterThan(0) || base.equals(1)) {
      return EMPTY;
    }
    return finite(Decimal.log(value, base));
  }),

  // Integer to a non-negative integer power stays an integer
  power: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const input = numericInput(call);
      const exponent = call.singleArg(0);
      if (input === undefined || exponent === undefined) return EMPTY;
      if (input.kind === 'quantity') {
        throw call.typeError(input, 'Integer or Decimal');
      }
      if (!isNumeric(exponent)) {
        throw call.typeError(exponent, 'Integer or Decimal');
      }
      if (
        input.kind === 'integer' &&
        exponent.kind === 'integer' &&
        exponent.value >= 0n
      ) {
        const magnitude = input.value < 0n ? -input.value : input.value;
        if (magnitude > 1n && exponent.value > 63n) return EMPTY;
        return integer(input.value ** exponent.value);
      }
      const base = toDecimal(input);
      const power = toDecimal(exponent);
      if (base.isNegative() && !power.isInteger()) return EMPTY;
      if (base.isZero() && power.isNegative()) return EMPTY;
      return finite(Decimal.pow(base, power));
    },
  },

  sqrt: numberOnly(0, (value) =>
    value.isNegative() ? EMPTY : finite(Decimal.sqrt(value))
  ),
};
