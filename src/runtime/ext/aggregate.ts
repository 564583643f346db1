/**
 * Aggregate Functions
 *
 * aggregate() folds an expression over the input with `$total` as the
 * accumulator. sum, min, max and avg work over numbers or quantities.
 */

import { Decimal } from '../core/decimal.js';
import { compareItems } from '../core/equals.js';
import { addQuantities, scaleQuantity } from '../core/quantity.js';
import type { FhirPathValue, QuantityValue } from '../core/values.js';
import {
  EMPTY,
  decimal,
  integer,
  isNumeric,
  toDecimal,
  toItems,
} from '../core/values.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type AggregateFunctionId = 'aggregate' | 'sum' | 'min' | 'max' | 'avg';

type Totals =
  | {
      readonly kind: 'number';
      readonly sum: Decimal;
      readonly integral: boolean;
    }
  | { readonly kind: 'quantity'; readonly sum: QuantityValue | undefined };

/**
 * Sum the input items. Numbers and quantities cannot be mixed; quantities
 * in incompatible units sum to undefined.
 */
function totals(call: FunctionCall, items: readonly FhirPathValue[]): Totals {
  const units = call.engine.units;
  const first = items[0];
  if (first?.kind === 'quantity') {
    let sum: QuantityValue | undefined = first;
    for (const item of items.slice(1)) {
      if (item.kind !== 'quantity') throw call.typeError(item, 'Quantity');
      sum = sum && addQuantities(sum, item, 1, units);
    }
    return { kind: 'quantity', sum };
  }

  let sum = new Decimal(0);
  let integral = true;
  for (const item of items) {
    if (!isNumeric(item)) throw call.typeError(item, 'Integer or Decimal');
    if (item.kind === 'decimal') integral = false;
    sum = sum.plus(toDecimal(item));
  }
  return { kind: 'number', sum, integral };
}

function extreme(call: FunctionCall, direction: 1 | -1): FhirPathValue {
  const items = toItems(call.input);
  let best = items[0];
  if (best === undefined) return EMPTY;
  for (const item of items.slice(1)) {
    const order = compareItems(item, best, call.engine.units);
    if (order === 'incomparable') {
      throw call.error('FP-R002', {
        operation: `${call.name}()`,
        actual: `${item.kind} and ${best.kind}`,
      });
    }
    if (order === 'unknown') return EMPTY;
    if (order === direction) best = item;
  }
  return best;
}

export const AGGREGATE_FUNCTIONS: Record<
  AggregateFunctionId,
  FunctionDefinition
> = {
  // Without init the first item seeds $total and is not visited
  aggregate: {
    minArgs: 1,
    maxArgs: 2,
    evaluate: (call) => {
      const items = toItems(call.input);
      const seeded = !call.hasArg(1);
      let total = seeded ? (items[0] ?? EMPTY) : call.arg(1);
      for (let i = seeded ? 1 : 0; i < items.length; i++) {
        const item = items[i] ?? EMPTY;
        total = call.argFor(0, item, i, total);
      }
      return total;
    },
  },

  sum: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const items = toItems(call.input);
      if (items.length === 0) return EMPTY;
      const result = totals(call, items);
      if (result.kind === 'quantity') return result.sum ?? EMPTY;
      return result.integral
        ? integer(BigInt(result.sum.toFixed(0)))
        : decimal(result.sum);
    },
  },

  min: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => extreme(call, -1),
  },

  max: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => extreme(call, 1),
  },

  avg: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const items = toItems(call.input);
      if (items.length === 0) return EMPTY;
      const result = totals(call, items);
      const count = new Decimal(items.length);
      if (result.kind === 'quantity') {
        if (!result.sum) return EMPTY;
        return scaleQuantity(result.sum, count, 'div') ?? EMPTY;
      }
      return decimal(result.sum.dividedBy(count));
    },
  },
};
