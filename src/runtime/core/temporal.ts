/**
 * Partial-Precision Temporal Values
 *
 * Dates, date-times and times are kept as ISO text plus a precision.
 * This module parses them into components, compares them over their
 * common precision and performs calendar arithmetic.
 */

import type { Decimal } from './decimal.js';
import type {
  DateTimeValue,
  DateValue,
  TemporalPrecision,
  TemporalValue,
  TimeValue,
} from './values.js';

// ============================================================
// COMPONENTS
// ============================================================

export interface TemporalParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  /** `Z` or `±hh:mm`; undefined when the value has no zone */
  zone?: string | undefined;
}

export const PRECISIONS: readonly TemporalPrecision[] = [
  'year',
  'month',
  'day',
  'hour',
  'minute',
  'second',
  'millisecond',
];

export function precisionIndex(precision: TemporalPrecision): number {
  return PRECISIONS.indexOf(precision);
}

const DATE_RE = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;
const TIME_RE = /^(\d{2})(?::(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?$/;
const DATETIME_RE =
  /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?(?:T(?:(\d{2})(?::(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?)?)?(Z|[+-]\d{2}:\d{2})?$/;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function emptyParts(): TemporalParts {
  return {
    year: 1970,
    month: 1,
    day: 1,
    hour: 0,
    minute: 0,
    second: 0,
    millisecond: 0,
  };
}

interface Parsed {
  parts: TemporalParts;
  precision: TemporalPrecision;
}

/**
 * Fill parts from regex groups starting at `first` (year) or a time group.
 * Returns the finest precision present, or undefined when a component is
 * out of range.
 */
function readGroups(
  groups: readonly (string | undefined)[],
  fields: readonly (keyof Omit<TemporalParts, 'zone' | 'millisecond'>)[],
  fraction: string | undefined,
  parts: TemporalParts
): TemporalPrecision | undefined {
  let precision: TemporalPrecision | undefined;
  for (const [i, field] of fields.entries()) {
    const text = groups[i];
    if (text === undefined) break;
    parts[field] = Number(text);
    precision = field;
  }
  if (fraction !== undefined) {
    parts.millisecond = Number(fraction.padEnd(3, '0').slice(0, 3));
    precision = 'millisecond';
  }
  return validParts(parts) ? precision : undefined;
}

function validParts(parts: TemporalParts): boolean {
  return (
    parts.month >= 1 &&
    parts.month <= 12 &&
    parts.day >= 1 &&
    parts.day <= daysInMonth(parts.year, parts.month) &&
    parts.hour <= 23 &&
    parts.minute <= 59 &&
    parts.second <= 59
  );
}

function validZone(zone: string): boolean {
  if (zone === 'Z') return true;
  const hours = Number(zone.slice(1, 3));
  const minutes = Number(zone.slice(4, 6));
  return hours <= 14 && minutes <= 59;
}

function parseDateText(text: string): Parsed | undefined {
  const match = DATE_RE.exec(text);
  if (!match) return undefined;
  const parts = emptyParts();
  const precision = readGroups(
    [match[1], match[2], match[3]],
    ['year', 'month', 'day'],
    undefined,
    parts
  );
  return precision ? { parts, precision } : undefined;
}

function parseDateTimeText(text: string): Parsed | undefined {
  const match = DATETIME_RE.exec(text);
  if (!match) return undefined;
  const zone = match[8];
  if (zone !== undefined && (match[4] === undefined || !validZone(zone))) {
    return undefined;
  }
  const parts = emptyParts();
  const precision = readGroups(
    [match[1], match[2], match[3], match[4], match[5], match[6]],
    ['year', 'month', 'day', 'hour', 'minute', 'second'],
    match[7],
    parts
  );
  if (!precision) return undefined;
  // A time part needs the full date in front of it
  if (precisionIndex(precision) >= 3 && match[3] === undefined) {
    return undefined;
  }
  parts.zone = zone;
  return { parts, precision };
}

function parseTimeText(text: string): Parsed | undefined {
  const match = TIME_RE.exec(text);
  if (!match) return undefined;
  const parts = emptyParts();
  const precision = readGroups(
    [match[1], match[2], match[3]],
    ['hour', 'minute', 'second'],
    match[4],
    parts
  );
  return precision ? { parts, precision } : undefined;
}

export function parseDate(text: string): DateValue | undefined {
  const parsed = parseDateText(text);
  if (!parsed) return undefined;
  return { kind: 'date', value: text, precision: parsed.precision };
}

/**
 * Accepts full and partial date-times, with or without a trailing `T`.
 */
export function parseDateTime(text: string): DateTimeValue | undefined {
  const parsed = parseDateTimeText(text);
  if (!parsed) return undefined;
  const value = text.endsWith('T') ? text.slice(0, -1) : text;
  return { kind: 'dateTime', value, precision: parsed.precision };
}

/** Accepts `hh:mm:ss.fff` with or without a leading `T` */
export function parseTime(text: string): TimeValue | undefined {
  const body = text.startsWith('T') ? text.slice(1) : text;
  const parsed = parseTimeText(body);
  if (!parsed) return undefined;
  return { kind: 'time', value: body, precision: parsed.precision };
}

/** Components of a temporal value; unset components hold their minimum */
export function partsOf(value: TemporalValue): TemporalParts {
  const parsed =
    value.kind === 'date'
      ? parseDateText(value.value)
      : value.kind === 'dateTime'
        ? parseDateTimeText(value.value)
        : parseTimeText(value.value);
  return parsed ? parsed.parts : emptyParts();
}

// ============================================================
// FORMATTING
// ============================================================

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function formatDatePart(parts: TemporalParts, precision: number): string {
  let text = pad(parts.year, 4);
  if (precision >= 1) text += `-${pad(parts.month, 2)}`;
  if (precision >= 2) text += `-${pad(parts.day, 2)}`;
  return text;
}

function formatTimePart(parts: TemporalParts, precision: number): string {
  let text = pad(parts.hour, 2);
  if (precision >= 4) text += `:${pad(parts.minute, 2)}`;
  if (precision >= 5) text += `:${pad(parts.second, 2)}`;
  if (precision >= 6) text += `.${pad(parts.millisecond, 3)}`;
  return text;
}

/** Build a temporal value of the given kind from components */
export function makeTemporal(
  kind: 'date',
  parts: TemporalParts,
  precision: TemporalPrecision
): DateValue;
export function makeTemporal(
  kind: 'dateTime',
  parts: TemporalParts,
  precision: TemporalPrecision
): DateTimeValue;
export function makeTemporal(
  kind: 'time',
  parts: TemporalParts,
  precision: TemporalPrecision
): TimeValue;
export function makeTemporal(
  kind: TemporalValue['kind'],
  parts: TemporalParts,
  precision: TemporalPrecision
): TemporalValue;
export function makeTemporal(
  kind: TemporalValue['kind'],
  parts: TemporalParts,
  precision: TemporalPrecision
): TemporalValue {
  const index = precisionIndex(precision);
  switch (kind) {
    case 'date': {
      const clamped = Math.min(index, 2);
      return {
        kind,
        value: formatDatePart(parts, clamped),
        precision: PRECISIONS[clamped] ?? 'day',
      };
    }
    case 'dateTime': {
      let value = formatDatePart(parts, index);
      if (index >= 3) {
        value += `T${formatTimePart(parts, index)}${parts.zone ?? ''}`;
      }
      return { kind, value, precision };
    }
    case 'time': {
      const clamped = Math.max(index, 3);
      return {
        kind,
        value: formatTimePart(parts, clamped),
        precision: PRECISIONS[clamped] ?? 'hour',
      };
    }
  }
}

// ============================================================
// EPOCH CONVERSION
// ============================================================

/** Zone offset in minutes east of UTC */
export function zoneOffsetMinutes(zone: string): number {
  if (zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  return sign * (Number(zone.slice(1, 3)) * 60 + Number(zone.slice(4, 6)));
}

export function formatZone(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60), 2)}:${pad(abs % 60, 2)}`;
}

/** Milliseconds since the epoch, reading the components as UTC */
export function toEpoch(parts: TemporalParts): number {
  const date = new Date(0);
  date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
  date.setUTCHours(parts.hour, parts.minute, parts.second, parts.millisecond);
  return date.getTime();
}

export function fromEpoch(epoch: number, zone?: string): TemporalParts {
  const date = new Date(epoch);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    millisecond: date.getUTCMilliseconds(),
    zone,
  };
}

function toUtc(parts: TemporalParts): TemporalParts {
  if (parts.zone === undefined) return parts;
  const epoch = toEpoch(parts) - zoneOffsetMinutes(parts.zone) * 60_000;
  return fromEpoch(epoch, 'Z');
}

// ============================================================
// COMPARISON
// ============================================================

/** Seconds and milliseconds compare as one level */
function comparisonLevel(precision: TemporalPrecision): number {
  return Math.min(precisionIndex(precision), 5);
}

function levelValues(parts: TemporalParts): number[] {
  return [
    parts.year,
    parts.month,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second * 1000 + parts.millisecond,
  ];
}

/**
 * Compare two temporal values of compatible kinds (a Date may be compared
 * with a DateTime). Returns a sign, or undefined when the values agree on
 * their common precision but that precision differs.
 */
export function compareTemporal(
  a: TemporalValue,
  b: TemporalValue
): number | undefined {
  let left = partsOf(a);
  let right = partsOf(b);
  if (left.zone !== undefined && right.zone !== undefined) {
    left = toUtc(left);
    right = toUtc(right);
  }

  const levelA = comparisonLevel(a.precision);
  const levelB = comparisonLevel(b.precision);
  const start = a.kind === 'time' ? 3 : 0;
  const valuesA = levelValues(left);
  const valuesB = levelValues(right);

  for (let level = start; level <= Math.min(levelA, levelB); level++) {
    const x = valuesA[level] ?? 0;
    const y = valuesB[level] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return levelA === levelB ? 0 : undefined;
}

/** True when the pair may be compared at all */
export function comparableKinds(a: TemporalValue, b: TemporalValue): boolean {
  if (a.kind === 'time' || b.kind === 'time') return a.kind === b.kind;
  return true;
}

// ============================================================
// ARITHMETIC
// ============================================================

export type TemporalUnit =
  | 'year'
  | 'month'
  | 'week'
  | 'day'
  | 'hour'
  | 'minute'
  | 'second'
  | 'millisecond';

const TEMPORAL_UNITS: Readonly<Record<string, TemporalUnit>> = {
  year: 'year',
  years: 'year',
  a: 'year',
  month: 'month',
  months: 'month',
  mo: 'month',
  week: 'week',
  weeks: 'week',
  wk: 'week',
  day: 'day',
  days: 'day',
  d: 'day',
  hour: 'hour',
  hours: 'hour',
  h: 'hour',
  minute: 'minute',
  minutes: 'minute',
  min: 'minute',
  second: 'second',
  seconds: 'second',
  s: 'second',
  millisecond: 'millisecond',
  milliseconds: 'millisecond',
  ms: 'millisecond',
};

const UNIT_MS: Readonly<Record<Exclude<TemporalUnit, 'year' | 'month'>, number>> =
  {
    week: 604_800_000,
    day: 86_400_000,
    hour: 3_600_000,
    minute: 60_000,
    second: 1_000,
    millisecond: 1,
  };

const DAYS_PER_YEAR = 365;
const DAYS_PER_MONTH = 30;

export function temporalUnit(unit: string): TemporalUnit | undefined {
  return Object.hasOwn(TEMPORAL_UNITS, unit) ? TEMPORAL_UNITS[unit] : undefined;
}

export type TemporalResult =
  | { readonly ok: true; readonly value: TemporalValue }
  | { readonly ok: false; readonly reason: 'unit' | 'range' };

function addMonths(parts: TemporalParts, months: number): void {
  const total = parts.year * 12 + (parts.month - 1) + months;
  parts.year = Math.floor(total / 12);
  parts.month = (total % 12 + 12) % 12 + 1;
  parts.day = Math.min(parts.day, daysInMonth(parts.year, parts.month));
}

function truncated(value: Decimal): number {
  return value.trunc().toNumber();
}

/**
 * Add a signed duration to a temporal value. Calendar units (year, month,
 * week, day) are truncated to whole numbers; amounts finer than the value's
 * precision are converted to that precision and truncated.
 */
export function addDuration(
  value: TemporalValue,
  amount: Decimal,
  unitText: string
): TemporalResult {
  const unit = temporalUnit(unitText);
  if (!unit) return { ok: false, reason: 'unit' };
  if (
    value.kind === 'time' &&
    (unit === 'year' || unit === 'month' || unit === 'week' || unit === 'day')
  ) {
    return { ok: false, reason: 'unit' };
  }

  const parts = partsOf(value);
  const precision = value.precision;
  const calendar =
    unit === 'year' || unit === 'month' || unit === 'week' || unit === 'day';
  const whole = calendar ? amount.trunc() : amount;

  if (unit === 'year' || unit === 'month') {
    const months = truncated(whole) * (unit === 'year' ? 12 : 1);
    if (precision === 'year') {
      parts.year += Math.trunc(months / 12);
    } else {
      addMonths(parts, months);
    }
  } else {
    const ms = whole.times(UNIT_MS[unit]);
    if (precision === 'year') {
      parts.year += truncated(ms.dividedBy(UNIT_MS.day * DAYS_PER_YEAR));
    } else if (precision === 'month') {
      addMonths(parts, truncated(ms.dividedBy(UNIT_MS.day * DAYS_PER_MONTH)));
    } else {
      const step = UNIT_MS[precision];
      const shifted =
        toEpoch(parts) + truncated(ms.dividedBy(step)) * step;
      const next = fromEpoch(shifted, parts.zone);
      Object.assign(parts, next);
    }
  }

  if (parts.year < 1 || parts.year > 9999) return { ok: false, reason: 'range' };
  return { ok: true, value: makeTemporal(value.kind, parts, precision) };
}

// ============================================================
// DURATION AND DIFFERENCE
// ============================================================

/**
 * Whole units elapsed from `a` to `b` (`duration`), or the number of unit
 * boundaries crossed (`difference`). Undefined when either value is less
 * precise than the unit.
 */
export function temporalDistance(
  a: TemporalValue,
  b: TemporalValue,
  unitText: string,
  mode: 'duration' | 'difference'
): number | undefined {
  const unit = temporalUnit(unitText);
  if (!unit) return undefined;
  const needed = unit === 'week' ? 2 : precisionIndex(unit);
  const start = a.kind === 'time' ? 3 : 0;
  if (
    needed < start ||
    precisionIndex(a.precision) < needed ||
    precisionIndex(b.precision) < needed
  ) {
    return undefined;
  }

  let left = partsOf(a);
  let right = partsOf(b);
  if (left.zone !== undefined && right.zone !== undefined) {
    left = toUtc(left);
    right = toUtc(right);
  }

  if (unit === 'year' || unit === 'month') {
    const perUnit = unit === 'year' ? 12 : 1;
    const monthsA = left.year * 12 + left.month - 1;
    const monthsB = right.year * 12 + right.month - 1;
    if (mode === 'difference') {
      return unit === 'year'
        ? right.year - left.year
        : monthsB - monthsA;
    }
    let months = monthsB - monthsA;
    // An incomplete last month does not count
    const restA = toEpoch({ ...left, year: 2000, month: 1 });
    const restB = toEpoch({ ...right, year: 2000, month: 1 });
    if (months > 0 && restB < restA) months -= 1;
    if (months < 0 && restB > restA) months += 1;
    return Math.trunc(months / perUnit);
  }

  const step = UNIT_MS[unit];
  const epochA = toEpoch(left);
  const epochB = toEpoch(right);
  if (mode === 'difference') {
    return Math.floor(epochB / step) - Math.floor(epochA / step);
  }
  return Math.trunc((epochB - epochA) / step);
}

// ============================================================
// CLOCK
// ============================================================

/** Components of a wall-clock instant in the host's local zone */
export function localParts(now: Date): TemporalParts {
  return {
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
    hour: now.getHours(),
    minute: now.getMinutes(),
    second: now.getSeconds(),
    millisecond: now.getMilliseconds(),
    zone: formatZone(-now.getTimezoneOffset()),
  };
}

/** Number of digits a temporal value's precision represents */
export function precisionDigits(value: TemporalValue): number {
  const dateDigits = [4, 6, 8, 10, 12, 14, 17];
  const timeDigits = [0, 0, 0, 2, 4, 6, 9];
  const index = precisionIndex(value.precision);
  const table = value.kind === 'time' ? timeDigits : dateDigits;
  return table[index] ?? 0;
}
