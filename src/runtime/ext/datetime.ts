/**
 * Date and Time Functions
 *
 * Component extraction (`yearOf()` … `timezoneOffsetOf()`), `dateOf()`,
 * `timeOf()` and the `duration()` / `difference()` pair. A component
 * finer than the value's precision is Empty.
 */

import { Decimal } from '../core/decimal.js';
import { stringAsTemporal } from '../core/equals.js';
import type { TemporalParts } from '../core/temporal.js';
import {
  comparableKinds,
  makeTemporal,
  partsOf,
  precisionIndex,
  temporalDistance,
  zoneOffsetMinutes,
} from '../core/temporal.js';
import type { FhirPathValue, TemporalValue } from '../core/values.js';
import { EMPTY, decimal, integer, isTemporal } from '../core/values.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type DateTimeFunctionId =
  | 'yearOf'
  | 'monthOf'
  | 'dayOf'
  | 'hourOf'
  | 'minuteOf'
  | 'secondOf'
  | 'millisecondOf'
  | 'timezoneOffsetOf'
  | 'dateOf'
  | 'timeOf'
  | 'duration'
  | 'difference';

type Component = keyof Omit<TemporalParts, 'zone'>;

function temporalInput(call: FunctionCall): TemporalValue | undefined {
  const item = call.singleInput();
  if (item === undefined) return undefined;
  if (!isTemporal(item)) throw call.typeError(item, 'Date, DateTime or Time');
  return item;
}

function component(name: Component, level: number): FunctionDefinition {
  return {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const value = temporalInput(call);
      if (value === undefined) return EMPTY;
      if (value.kind === 'time' && level < 3) return EMPTY;
      if (precisionIndex(value.precision) < level) return EMPTY;
      return integer(BigInt(partsOf(value)[name]));
    },
  };
}

function distance(mode: 'duration' | 'difference'): FunctionDefinition {
  return {
    minArgs: 2,
    maxArgs: 2,
    evaluate: (call) => {
      const start = temporalInput(call);
      const other = call.singleArg(0);
      const unit = call.stringArg(1);
      if (start === undefined || other === undefined || unit === undefined) {
        return EMPTY;
      }
      const end: FhirPathValue | undefined =
        other.kind === 'string' ? stringAsTemporal(other.value, start) : other;
      if (end === undefined) return EMPTY;
      if (!isTemporal(end) || !comparableKinds(start, end)) {
        throw call.typeError(end, start.kind);
      }
      const result = temporalDistance(start, end, unit, mode);
      return result === undefined ? EMPTY : integer(BigInt(result));
    },
  };
}

export const DATETIME_FUNCTIONS: Record<
  DateTimeFunctionId,
  FunctionDefinition
> = {
  yearOf: component('year', 0),
  monthOf: component('month', 1),
  dayOf: component('day', 2),
  hourOf: component('hour', 3),
  minuteOf: component('minute', 4),
  secondOf: component('second', 5),
  millisecondOf: component('millisecond', 6),

  // Offset in hours, e.g. -5.5 for -05:30
  timezoneOffsetOf: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const value = temporalInput(call);
      if (value?.kind !== 'dateTime') return EMPTY;
      const zone = partsOf(value).zone;
      if (zone === undefined) return EMPTY;
      return decimal(new Decimal(zoneOffsetMinutes(zone)).dividedBy(60));
    },
  },

  dateOf: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const value = temporalInput(call);
      if (value === undefined || value.kind === 'time') return EMPTY;
      if (value.kind === 'date') return value;
      return makeTemporal('date', partsOf(value), value.precision);
    },
  },

  timeOf: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const value = temporalInput(call);
      if (value === undefined || value.kind === 'date') return EMPTY;
      if (value.kind === 'time') return value;
      if (precisionIndex(value.precision) < 3) return EMPTY;
      return makeTemporal('time', partsOf(value), value.precision);
    },
  },

  duration: distance('duration'),
  difference: distance('difference'),
};
