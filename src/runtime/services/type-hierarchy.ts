/**
 * FHIR Type Hierarchy
 *
 * Child → parent relations, FHIR primitive types, per-type choice
 * elements and declared element names, read from data/fhir-types.json
 * when this module loads and shared read-only by every evaluation.
 */

import { readFileSync } from 'node:fs';

export interface TypeTable {
  /** FHIR primitive type → System type name (`code` → `String`) */
  readonly primitives: ReadonlyMap<string, string>;
  /** Type → direct parent */
  readonly parents: ReadonlyMap<string, string>;
  /** Type → element names declared as `name[x]` */
  readonly choiceElements: ReadonlyMap<string, readonly string[]>;
  /** Type → element names it declares itself, ancestors excluded */
  readonly elements: ReadonlyMap<string, readonly string[]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStrings(value: unknown, section: string): Map<string, string> {
  if (!isRecord(value)) throw new Error(`type table: ${section} missing`);
  const result = new Map<string, string>();
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new Error(`type table: ${section}.${key} must be a string`);
    }
    result.set(key, entry);
  }
  return result;
}

/**
 * Build a type table from its JSON form.
 * @throws Error when the document is malformed
 */
export function parseTypeTable(json: unknown): TypeTable {
  if (!isRecord(json)) throw new Error('type table: expected an object');
  return {
    primitives: readStrings(json['primitives'], 'primitives'),
    parents: readStrings(json['parents'], 'parents'),
    choiceElements: readLists(json['choiceElements'], 'choiceElements'),
    elements: readLists(json['elements'], 'elements'),
  };
}

/** Optional section of type → names; absent reads as empty */
function readLists(
  value: unknown,
  section: string
): Map<string, readonly string[]> {
  const result = new Map<string, readonly string[]>();
  if (!isRecord(value)) return result;
  for (const [type, names] of Object.entries(value)) {
    if (!Array.isArray(names)) {
      throw new Error(`type table: ${section}.${type} must be a list`);
    }
    result.set(
      type,
      names.filter((name): name is string => typeof name === 'string')
    );
  }
  return result;
}

const BUNDLED_TABLE: TypeTable = parseTypeTable(
  JSON.parse(
    readFileSync(
      new URL('../../../data/fhir-types.json', import.meta.url),
      'utf-8'
    )
  )
);

/** The table shipped in data/fhir-types.json */
export function loadTypeTable(): TypeTable {
  return BUNDLED_TABLE;
}

export class TypeHierarchy {
  constructor(private readonly table: TypeTable = loadTypeTable()) {}

  /** True for any FHIR type the table knows */
  isKnown(name: string): boolean {
    return this.table.parents.has(name) || this.table.primitives.has(name);
  }

  isPrimitive(name: string): boolean {
    return this.table.primitives.has(name);
  }

  /** System type behind a FHIR primitive (`dateTime` → `DateTime`) */
  systemTypeOf(name: string): string | undefined {
    return this.table.primitives.get(name);
  }

  parentOf(name: string): string | undefined {
    return this.table.parents.get(name);
  }

  /** `name` itself followed by its ancestors, nearest first */
  lineage(name: string): string[] {
    const result = [name];
    const seen = new Set(result);
    let current = this.parentOf(name);
    while (current !== undefined && !seen.has(current)) {
      result.push(current);
      seen.add(current);
      current = this.parentOf(current);
    }
    return result;
  }

  isSubtypeOf(name: string, ancestor: string): boolean {
    return this.lineage(name).includes(ancestor);
  }

  /**
   * FHIR type named by a choice suffix: `Quantity` → `Quantity`,
   * `DateTime` → `dateTime`. Undefined for anything that is not a data
   * type.
   */
  choiceTypeForSuffix(suffix: string): string | undefined {
    if (suffix === '') return undefined;
    const lowered = suffix.charAt(0).toLowerCase() + suffix.slice(1);
    if (this.isPrimitive(lowered)) return lowered;
    if (this.isSubtypeOf(suffix, 'Element')) return suffix;
    return undefined;
  }

  choiceElements(typeName: string): readonly string[] | undefined {
    return this.table.choiceElements.get(typeName);
  }

  /**
   * Whether `typeName` or one of its ancestors declares `name`, as a plain
   * or a choice element. Undefined when the table lists no elements for
   * `typeName` itself.
   */
  declaresElement(typeName: string, name: string): boolean | undefined {
    if (!this.table.elements.has(typeName)) return undefined;
    return this.lineage(typeName).some(
      (type) =>
        (this.table.elements.get(type)?.includes(name) ?? false) ||
        (this.table.choiceElements.get(type)?.includes(name) ?? false)
    );
  }
}
