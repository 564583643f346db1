/**
 * Utility Functions
 *
 * trace, the clock functions, defineVariable, sort and coalesce.
 *
 * now(), today() and timeOfDay() read the engine's evaluation timestamp,
 * so every call within one evaluation sees the same instant.
 */

import type { ExpressionNode } from '../../types.js';
import { compareItems } from '../core/equals.js';
import { localParts, makeTemporal } from '../core/temporal.js';
import type { FhirPathValue } from '../core/values.js';
import { EMPTY, collection, toItems } from '../core/values.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type UtilityFunctionId =
  | 'trace'
  | 'now'
  | 'timeOfDay'
  | 'today'
  | 'defineVariable'
  | 'sort'
  | 'coalesce';

interface SortKey {
  readonly node: ExpressionNode;
  readonly descending: boolean;
}

/** A leading unary minus on a key expression sorts that key descending */
function sortKey(node: ExpressionNode): SortKey {
  return node.type === 'Polarity' && node.op === '-'
    ? { node: node.operand, descending: true }
    : { node, descending: false };
}

function compareKeys(
  call: FunctionCall,
  a: FhirPathValue,
  b: FhirPathValue
): number {
  const left = call.singleValue(a, 'sort() key');
  const right = call.singleValue(b, 'sort() key');
  if (left === undefined || right === undefined) {
    if (left === right) return 0;
    return left === undefined ? -1 : 1;
  }
  const order = compareItems(left, right, call.engine.units);
  if (order === 'incomparable') {
    throw call.error('FP-R002', {
      operation: 'sort()',
      actual: `${left.kind} and ${right.kind}`,
    });
  }
  return order === 'unknown' ? 0 : order;
}

function sortItems(call: FunctionCall): FhirPathValue {
  const items = toItems(call.input);
  const keys = call.args.map(sortKey);
  if (keys.length === 0) {
    return collection(
      [...items].sort((a, b) => compareKeys(call, a, b)),
      true
    );
  }

  const rows = items.map((item, position) => ({
    item,
    values: keys.map((key) => call.evaluateFor(key.node, item, position)),
  }));
  rows.sort((a, b) => {
    for (const [i, key] of keys.entries()) {
      const left = a.values[i] ?? EMPTY;
      const right = b.values[i] ?? EMPTY;
      const order = compareKeys(call, left, right);
      if (order !== 0) return key.descending ? -order : order;
    }
    return 0;
  });
  return collection(
    rows.map((row) => row.item),
    true
  );
}

export const UTILITY_FUNCTIONS: Record<UtilityFunctionId, FunctionDefinition> =
  {
    trace: {
      minArgs: 1,
      maxArgs: 2,
      evaluate: (call) => {
        const label = call.stringArg(0) ?? '';
        const value = call.hasArg(1)
          ? collection(
              toItems(call.input).map((item, i) => call.argFor(1, item, i))
            )
          : call.input;
        call.engine.trace.append(label, value);
        call.engine.callbacks.onTrace(label, value);
        return call.input;
      },
    },

    now: {
      minArgs: 0,
      maxArgs: 0,
      evaluate: (call) =>
        makeTemporal('dateTime', localParts(call.engine.now), 'millisecond'),
    },

    timeOfDay: {
      minArgs: 0,
      maxArgs: 0,
      evaluate: (call) =>
        makeTemporal('time', localParts(call.engine.now), 'millisecond'),
    },

    today: {
      minArgs: 0,
      maxArgs: 0,
      evaluate: (call) =>
        makeTemporal('date', localParts(call.engine.now), 'day'),
    },

    // Evaluated with the input as $this; the binding takes effect for the
    // rest of the invocation chain
    defineVariable: {
      minArgs: 1,
      maxArgs: 2,
      evaluate: (call) => {
        const name = call.stringArg(0);
        if (name === undefined) {
          throw call.invalidArgument('variable name must be a string');
        }
        const value = call.hasArg(1) ? call.argFor(1, call.input, 0) : call.input;
        call.bind(name, value);
        return call.input;
      },
    },

    sort: {
      minArgs: 0,
      maxArgs: Number.POSITIVE_INFINITY,
      evaluate: sortItems,
    },

    coalesce: {
      minArgs: 1,
      maxArgs: Number.POSITIVE_INFINITY,
      evaluate: (call) => {
        for (let i = 0; i < call.args.length; i++) {
          const value = call.arg(i);
          if (value.kind !== 'empty') return value;
        }
        return EMPTY;
      },
    },
  };
