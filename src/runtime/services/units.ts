/**
 * Unit Service
 *
 * Unit compatibility and conversion for quantities. The engine only talks
 * to the UnitService interface; TableUnitService is the bundled
 * implementation, driven by data/units.json. It understands UCUM products
 * (`.`), quotients (`/`), integer exponents, parentheses, metric prefixes
 * and `{annotations}`, which covers the units clinical data uses day to
 * day. Calendar words (`days`, `year`) map to their UCUM codes first.
 */

import { readFileSync } from 'node:fs';
import { Decimal } from '../core/decimal.js';

// ============================================================
// SERVICE CONTRACT
// ============================================================

export interface UnitService {
  /** Canonical code for a unit (calendar words become UCUM codes) */
  normalize(unit: string): string;
  /** True when values in `a` can be converted to `b` */
  compatible(a: string, b: string): boolean;
  /** Convert a value; undefined when the units are not compatible */
  convert(value: Decimal, from: string, to: string): Decimal | undefined;
  /** Unit of a product, undefined when it cannot be formed */
  multiply(a: string, b: string): string | undefined;
  /** Unit of a quotient, undefined when it cannot be formed */
  divide(a: string, b: string): string | undefined;
}

// ============================================================
// UNIT TABLE
// ============================================================

type Dimension = ReadonlyMap<string, number>;

interface UnitDefinition {
  readonly dim: Dimension;
  readonly factor: Decimal;
  readonly offset?: Decimal | undefined;
  readonly prefixable: boolean;
}

export interface UnitTable {
  readonly prefixes: ReadonlyMap<string, Decimal>;
  readonly units: ReadonlyMap<string, UnitDefinition>;
  readonly calendar: ReadonlyMap<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringMap(value: unknown, section: string): Map<string, string> {
  if (!isRecord(value)) throw new Error(`units table: ${section} missing`);
  const result = new Map<string, string>();
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new Error(`units table: ${section}.${key} must be a string`);
    }
    result.set(key, entry);
  }
  return result;
}

function readDefinition(code: string, value: unknown): UnitDefinition {
  if (
    !isRecord(value) ||
    !isRecord(value['dim']) ||
    typeof value['factor'] !== 'string'
  ) {
    throw new Error(`units table: invalid entry for '${code}'`);
  }
  const dim = new Map<string, number>();
  for (const [base, power] of Object.entries(value['dim'])) {
    if (typeof power !== 'number') {
      throw new Error(`units table: invalid dimension for '${code}'`);
    }
    dim.set(base, power);
  }
  const offset = value['offset'];
  return {
    dim,
    factor: new Decimal(value['factor']),
    offset: typeof offset === 'string' ? new Decimal(offset) : undefined,
    prefixable: value['prefixable'] === true,
  };
}

/**
 * Build a unit table from its JSON form.
 * @throws Error when the document is malformed
 */
export function parseUnitTable(json: unknown): UnitTable {
  if (!isRecord(json) || !isRecord(json['units'])) {
    throw new Error('units table: expected an object with units');
  }
  const prefixes = new Map<string, Decimal>();
  for (const [prefix, factor] of readStringMap(json['prefixes'], 'prefixes')) {
    prefixes.set(prefix, new Decimal(factor));
  }
  const units = new Map<string, UnitDefinition>();
  for (const [code, entry] of Object.entries(json['units'])) {
    units.set(code, readDefinition(code, entry));
  }
  return {
    prefixes,
    units,
    calendar: readStringMap(json['calendar'], 'calendar'),
  };
}

const BUNDLED_TABLE: UnitTable = parseUnitTable(
  JSON.parse(
    readFileSync(new URL('../../../data/units.json', import.meta.url), 'utf-8')
  )
);

/** The table shipped in data/units.json */
export function loadUnitTable(): UnitTable {
  return BUNDLED_TABLE;
}

// ============================================================
// UNIT ANALYSIS
// ============================================================

interface Analysis {
  readonly dim: Map<string, number>;
  readonly factor: Decimal;
  /** Only for a bare offset unit such as `Cel` */
  readonly offset?: Decimal | undefined;
}

function combine(
  left: Analysis,
  right: Analysis,
  sign: 1 | -1
): Analysis {
  const dim = new Map(left.dim);
  for (const [base, power] of right.dim) {
    const next = (dim.get(base) ?? 0) + sign * power;
    if (next === 0) dim.delete(base);
    else dim.set(base, next);
  }
  const factor =
    sign === 1 ? left.factor.times(right.factor) : left.factor.dividedBy(right.factor);
  return { dim, factor };
}

function power(analysis: Analysis, exponent: number): Analysis {
  if (exponent === 1) return analysis;
  const dim = new Map<string, number>();
  for (const [base, p] of analysis.dim) dim.set(base, p * exponent);
  return { dim, factor: analysis.factor.pow(exponent) };
}

/**
 * Recursive-descent reader for UCUM unit expressions.
 */
class UnitExpressionReader {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly table: UnitTable
  ) {}

  read(): Analysis | undefined {
    const result = this.term();
    return result && this.pos === this.text.length ? result : undefined;
  }

  private term(): Analysis | undefined {
    let result: Analysis | undefined;
    if (this.text[this.pos] === '/') {
      this.pos++;
      const first = this.component();
      if (!first) return undefined;
      result = combine({ dim: new Map(), factor: new Decimal(1) }, first, -1);
    } else {
      result = this.component();
    }

    while (result && (this.text[this.pos] === '.' || this.text[this.pos] === '/')) {
      const op = this.text[this.pos];
      this.pos++;
      const next = this.component();
      if (!next) return undefined;
      result = combine(result, next, op === '.' ? 1 : -1);
    }
    return result;
  }

  private component(): Analysis | undefined {
    if (this.text[this.pos] === '(') {
      this.pos++;
      const inner = this.term();
      if (!inner || this.text[this.pos] !== ')') return undefined;
      this.pos++;
      return power(inner, this.exponent());
    }

    const start = this.pos;
    while (this.pos < this.text.length && !'./()'.includes(this.text[this.pos] ?? '')) {
      if (this.text[this.pos] === '[') {
        const close = this.text.indexOf(']', this.pos);
        if (close === -1) return undefined;
        this.pos = close + 1;
      } else {
        this.pos++;
      }
    }
    return this.atom(this.text.slice(start, this.pos));
  }

  private exponent(): number {
    const match = /^-?\d+/.exec(this.text.slice(this.pos));
    if (!match) return 1;
    this.pos += match[0].length;
    return Number(match[0]);
  }

  /** Symbol with an optional trailing exponent: `m2`, `s-1`, `mm[Hg]` */
  private atom(text: string): Analysis | undefined {
    if (/^\d+$/.test(text)) {
      return { dim: new Map(), factor: new Decimal(text) };
    }
    const match = /^(.*?[^\d-])(-?\d+)?$/.exec(text);
    if (!match || match[1] === undefined) return undefined;
    const base = this.symbol(match[1]);
    if (!base) return undefined;
    return power(base, match[2] === undefined ? 1 : Number(match[2]));
  }

  private symbol(symbol: string): Analysis | undefined {
    const direct = this.table.units.get(symbol);
    if (direct) {
      return { dim: new Map(direct.dim), factor: direct.factor, offset: direct.offset };
    }
    for (const [prefix, scale] of this.table.prefixes) {
      if (!symbol.startsWith(prefix)) continue;
      const unit = this.table.units.get(symbol.slice(prefix.length));
      if (unit?.prefixable) {
        return { dim: new Map(unit.dim), factor: unit.factor.times(scale) };
      }
    }
    return undefined;
  }
}

function sameDimension(a: Dimension, b: Dimension): boolean {
  if (a.size !== b.size) return false;
  for (const [base, p] of a) {
    if (b.get(base) !== p) return false;
  }
  return true;
}

// ============================================================
// TABLE-DRIVEN SERVICE
// ============================================================

export class TableUnitService implements UnitService {
  private readonly cache = new Map<string, Analysis | undefined>();

  constructor(private readonly table: UnitTable = loadUnitTable()) {}

  normalize(unit: string): string {
    return this.table.calendar.get(unit) ?? unit;
  }

  /** Dimension and scale of a unit, undefined when it is not understood */
  private analyse(unit: string): Analysis | undefined {
    const code = this.normalize(unit);
    if (this.cache.has(code)) return this.cache.get(code);
    const bare = code.replace(/\{[^}]*\}/g, '');
    const analysis =
      bare === '' || bare === '1'
        ? { dim: new Map<string, number>(), factor: new Decimal(1) }
        : new UnitExpressionReader(bare, this.table).read();
    this.cache.set(code, analysis);
    return analysis;
  }

  compatible(a: string, b: string): boolean {
    if (this.normalize(a) === this.normalize(b)) return true;
    const left = this.analyse(a);
    const right = this.analyse(b);
    return left !== undefined && right !== undefined && sameDimension(left.dim, right.dim);
  }

  convert(value: Decimal, from: string, to: string): Decimal | undefined {
    if (this.normalize(from) === this.normalize(to)) return value;
    const source = this.analyse(from);
    const target = this.analyse(to);
    if (!source || !target || !sameDimension(source.dim, target.dim)) {
      return undefined;
    }
    const base = value.times(source.factor).plus(source.offset ?? 0);
    return base.minus(target.offset ?? 0).dividedBy(target.factor);
  }

  multiply(a: string, b: string): string | undefined {
    const left = this.normalize(a);
    const right = this.normalize(b);
    if (left === '1') return right;
    if (right === '1') return left;
    return `${left}.${right}`;
  }

  divide(a: string, b: string): string | undefined {
    const left = this.normalize(a);
    const right = this.normalize(b);
    if (left === right) return '1';
    if (right === '1') return left;
    const divisor = /[./]/.test(right) ? `(${right})` : right;
    return left === '1' ? `/${divisor}` : `${left}/${divisor}`;
  }
}
