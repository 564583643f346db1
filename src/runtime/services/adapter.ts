/**
 * Resource Adapter
 *
 * The engine never inspects documents directly. A ResourceAdapter turns
 * them into values and tells polymorphic resolution which elements of a
 * type are choice elements. JsonResourceAdapter handles FHIR JSON.
 */

import { Decimal } from '../core/decimal.js';
import type { FhirPathValue, ObjectValue, TypeInfo } from '../core/values.js';
import {
  EMPTY,
  bool,
  collection,
  decimal,
  integer,
  object,
  str,
} from '../core/values.js';
import { TypeHierarchy } from './type-hierarchy.js';

export interface ResourceAdapter {
  /** Convert a document (or any fragment of one) into a value */
  toValue(resource: unknown): FhirPathValue;
  /** Elements of a type that appear as `name[x]` */
  choiceElements(typeName: string): readonly string[] | undefined;
  /** Whether a type declares `name`; undefined when the type is not listed */
  declaresElement(typeName: string, name: string): boolean | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class JsonResourceAdapter implements ResourceAdapter {
  constructor(private readonly types: TypeHierarchy = new TypeHierarchy()) {}

  toValue(resource: unknown): FhirPathValue {
    return this.convert(resource, undefined);
  }

  choiceElements(typeName: string): readonly string[] | undefined {
    return this.types.choiceElements(typeName);
  }

  declaresElement(typeName: string, name: string): boolean | undefined {
    return this.types.declaresElement(typeName, name);
  }

  private convert(json: unknown, element: unknown): FhirPathValue {
    if (json === null || json === undefined) return EMPTY;
    if (Array.isArray(json)) {
      const siblings = Array.isArray(element) ? element : [];
      return collection(
        json.map((item, i) => this.convert(item, siblings[i]))
      );
    }

    const meta = this.elementOf(element);
    switch (typeof json) {
      case 'boolean':
        return meta ? { ...bool(json), element: meta } : bool(json);
      case 'number': {
        if (Number.isInteger(json)) {
          const value = integer(BigInt(json));
          return meta && value.kind === 'integer'
            ? { ...value, element: meta }
            : value;
        }
        const value = decimal(new Decimal(json));
        return meta ? { ...value, element: meta } : value;
      }
      case 'string':
        return meta ? { ...str(json), element: meta } : str(json);
      default:
        break;
    }

    if (!isRecord(json)) return EMPTY;
    return this.convertObject(json);
  }

  private convertObject(json: Record<string, unknown>): ObjectValue {
    const fields = new Map<string, FhirPathValue>();
    for (const [key, raw] of Object.entries(json)) {
      // `_field` siblings ride along on the primitive they describe
      if (key.startsWith('_')) continue;
      const value = this.convert(raw, json[`_${key}`]);
      if (value.kind !== 'empty') fields.set(key, value);
    }
    const resourceType = json['resourceType'];
    const type: TypeInfo | undefined =
      typeof resourceType === 'string'
        ? { namespace: 'FHIR', name: resourceType }
        : undefined;
    return object(fields, type);
  }

  private elementOf(element: unknown): ObjectValue | undefined {
    return isRecord(element) ? this.convertObject(element) : undefined;
  }
}
