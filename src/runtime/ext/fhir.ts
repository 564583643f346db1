/**
 * FHIR-Specific Functions
 *
 * extension(), primitive value access, reference resolution against the
 * evaluation's root resources, narrative checking and the code functions
 * that defer to the terminology service.
 */

import type { RootScope } from '../core/types.js';
import type { FhirPathValue, ObjectValue } from '../core/values.js';
import {
  EMPTY,
  bool,
  boolOrEmpty,
  collection,
  isOrdered,
  str,
  toItems,
} from '../core/values.js';
import type { Coding, TerminologyService } from '../services/terminology.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type FhirFunctionId =
  | 'extension'
  | 'hasValue'
  | 'getValue'
  | 'resolve'
  | 'getReferenceKey'
  | 'getResourceKey'
  | 'htmlChecks'
  | 'memberOf'
  | 'subsumes'
  | 'subsumedBy';

// ============================================================
// FIELD ACCESS
// ============================================================

function stringField(value: ObjectValue, name: string): string | undefined {
  const field = value.fields.get(name);
  return field?.kind === 'string' ? field.value : undefined;
}

function resourceTypeOf(value: ObjectValue): string | undefined {
  if (value.type?.namespace === 'FHIR') return value.type.name;
  return stringField(value, 'resourceType');
}

/** The object itself, or the `_field` element of a primitive */
function extensionHost(item: FhirPathValue): ObjectValue | undefined {
  switch (item.kind) {
    case 'object':
      return item;
    case 'empty':
    case 'collection':
    case 'quantity':
      return undefined;
    default:
      return item.element;
  }
}

function isPrimitive(item: FhirPathValue): boolean {
  switch (item.kind) {
    case 'boolean':
    case 'integer':
    case 'decimal':
    case 'string':
    case 'date':
    case 'dateTime':
    case 'time':
      return true;
    default:
      return false;
  }
}

// ============================================================
// CODINGS
// ============================================================

/**
 * Codings carried by an item: a bare code string, a Coding, or every
 * coding of a CodeableConcept.
 */
export function codingsOf(item: FhirPathValue): Coding[] {
  if (item.kind === 'string') return [{ code: item.value }];
  if (item.kind !== 'object') return [];
  const code = stringField(item, 'code');
  if (code !== undefined) {
    return [
      {
        system: stringField(item, 'system'),
        code,
        display: stringField(item, 'display'),
      },
    ];
  }
  return toItems(item.fields.get('coding') ?? EMPTY).flatMap(codingsOf);
}

export function requireTerminology(call: FunctionCall): TerminologyService {
  const service = call.engine.terminology;
  if (!service) throw call.error('FP-R012', { name: call.name });
  return service;
}

function subsumption(
  call: FunctionCall,
  accepted: readonly string[]
): FhirPathValue {
  const service = requireTerminology(call);
  const item = call.singleInput();
  const other = call.singleArg(0);
  if (item === undefined || other === undefined) return EMPTY;
  const [left] = codingsOf(item);
  const [right] = codingsOf(other);
  if (!left || !right) return EMPTY;
  const system = left.system ?? right.system;
  if (system === undefined) return EMPTY;
  const outcome = service.subsumes(system, left.code, right.code);
  return outcome === undefined ? EMPTY : bool(accepted.includes(outcome));
}

// ============================================================
// REFERENCES
// ============================================================

const REFERENCE_PATTERN =
  /(?:^|\/)([A-Z][A-Za-z]+)\/([A-Za-z0-9\-.]{1,64})(?:\/_history\/[^/]+)?$/;

interface ReferenceKey {
  readonly type: string;
  readonly id: string;
}

export function parseReference(reference: string): ReferenceKey | undefined {
  const match = REFERENCE_PATTERN.exec(reference);
  if (!match) return undefined;
  const [, type = '', id = ''] = match;
  return { type, id };
}

function referenceText(item: FhirPathValue): string | undefined {
  if (item.kind === 'string') return item.value;
  if (item.kind === 'object') return stringField(item, 'reference');
  return undefined;
}

interface Candidate {
  readonly resource: ObjectValue;
  readonly fullUrl?: string | undefined;
  readonly contained: boolean;
}

/** Root resources, their contained resources and Bundle entries */
function candidates(root: RootScope): Candidate[] {
  const result: Candidate[] = [];
  for (const resource of root.resources) {
    if (resource.kind !== 'object') continue;
    result.push({ resource, contained: false });
    for (const inner of toItems(resource.fields.get('contained') ?? EMPTY)) {
      if (inner.kind === 'object') {
        result.push({ resource: inner, contained: true });
      }
    }
    for (const entry of toItems(resource.fields.get('entry') ?? EMPTY)) {
      if (entry.kind !== 'object') continue;
      const inner = entry.fields.get('resource');
      if (inner?.kind === 'object') {
        result.push({
          resource: inner,
          fullUrl: stringField(entry, 'fullUrl'),
          contained: false,
        });
      }
    }
  }
  return result;
}

function resolveReference(
  root: RootScope,
  reference: string
): ObjectValue | undefined {
  const pool = candidates(root);
  if (reference.startsWith('#')) {
    const id = reference.slice(1);
    return pool.find(
      (c) => c.contained && stringField(c.resource, 'id') === id
    )?.resource;
  }
  const byUrl = pool.find((c) => c.fullUrl === reference);
  if (byUrl) return byUrl.resource;
  const key = parseReference(reference);
  if (!key) return undefined;
  return pool.find(
    (c) =>
      !c.contained &&
      resourceTypeOf(c.resource) === key.type &&
      stringField(c.resource, 'id') === key.id
  )?.resource;
}

// ============================================================
// NARRATIVE
// ============================================================

const XHTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';

const ALLOWED_TAGS = new Set(
  (
    'div p span br hr h1 h2 h3 h4 h5 h6 b i u em strong small big sub sup ' +
    'tt code pre blockquote q cite dfn samp kbd var ul ol li dl dt dd ' +
    'table thead tbody tfoot tr th td caption colgroup col a img'
  ).split(' ')
);

const COMMON_ATTRIBUTES = new Set([
  'id',
  'class',
  'title',
  'lang',
  'dir',
  'style',
  'xml:lang',
  'xmlns',
]);

const TAG_ATTRIBUTES: Readonly<Record<string, readonly string[]>> = {
  a: ['href', 'name'],
  img: ['src', 'alt', 'title'],
  td: ['colspan', 'rowspan'],
  th: ['colspan', 'rowspan'],
};

const TAG_PATTERN =
  /<(\/?)([A-Za-z][A-Za-z0-9]*)((?:\s+[A-Za-z_:][-A-Za-z0-9_:.]*\s*=\s*(?:"[^"]*"|'[^']*'))*)\s*(\/?)>/g;
const ATTRIBUTE_PATTERN =
  /([A-Za-z_:][-A-Za-z0-9_:.]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

function attributesOf(text: string): Map<string, string> {
  const result = new Map<string, string>();
  for (const match of text.matchAll(ATTRIBUTE_PATTERN)) {
    result.set(match[1] ?? '', match[2] ?? match[3] ?? '');
  }
  return result;
}

function allowedAttribute(tag: string, name: string): boolean {
  return (
    COMMON_ATTRIBUTES.has(name) || (TAG_ATTRIBUTES[tag] ?? []).includes(name)
  );
}

/**
 * Narrative rules: one root `div` in the XHTML namespace, only the
 * permitted tags and attributes, no comments or processing instructions,
 * and some text or an image inside.
 */
export function checkNarrative(html: string): boolean {
  const source = html.trim();
  if (source.includes('<!') || source.includes('<?')) return false;

  const open: string[] = [];
  let text = '';
  let hasImage = false;
  let rootClosed = false;
  let last = 0;

  for (const match of source.matchAll(TAG_PATTERN)) {
    const between = source.slice(last, match.index);
    if (between.includes('<')) return false;
    if (open.length === 0 && between.trim() !== '') return false;
    if (rootClosed) return false;
    text += between;
    last = (match.index ?? 0) + match[0].length;

    const [, closing = '', tag = '', attributeText = '', selfClosing = ''] =
      match;
    if (!ALLOWED_TAGS.has(tag)) return false;

    if (closing) {
      if (open.pop() !== tag) return false;
      if (open.length === 0) rootClosed = true;
      continue;
    }

    const attributes = attributesOf(attributeText);
    for (const name of attributes.keys()) {
      if (!allowedAttribute(tag, name)) return false;
    }
    if (open.length === 0) {
      if (tag !== 'div') return false;
      if (attributes.get('xmlns') !== XHTML_NAMESPACE) return false;
    }
    if (tag === 'img') hasImage = true;
    if (selfClosing) {
      if (open.length === 0) rootClosed = true;
    } else {
      open.push(tag);
    }
  }

  const tail = source.slice(last);
  if (tail.trim() !== '') return false;
  return rootClosed && open.length === 0 && (text.trim() !== '' || hasImage);
}

// ============================================================
// DEFINITIONS
// ============================================================

export const FHIR_FUNCTIONS: Record<FhirFunctionId, FunctionDefinition> = {
  extension: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const url = call.stringArg(0);
      if (url === undefined) return EMPTY;
      const result: FhirPathValue[] = [];
      for (const item of toItems(call.input)) {
        const host = extensionHost(item);
        if (!host) continue;
        const extensions = toItems(host.fields.get('extension') ?? EMPTY);
        for (const extension of extensions) {
          if (
            extension.kind === 'object' &&
            stringField(extension, 'url') === url
          ) {
            result.push(extension);
          }
        }
      }
      return collection(result, isOrdered(call.input));
    },
  },

  hasValue: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const items = toItems(call.input);
      const [item] = items;
      return bool(
        items.length === 1 && item !== undefined && isPrimitive(item)
      );
    },
  },

  getValue: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const items = toItems(call.input);
      const [item] = items;
      return items.length === 1 && item !== undefined && isPrimitive(item)
        ? item
        : EMPTY;
    },
  },

  resolve: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const result: FhirPathValue[] = [];
      for (const item of toItems(call.input)) {
        const reference = referenceText(item);
        if (reference === undefined) continue;
        const resource = resolveReference(call.ctx.root, reference);
        if (resource) result.push(resource);
      }
      return collection(result, isOrdered(call.input));
    },
  },

  getReferenceKey: {
    minArgs: 0,
    maxArgs: 1,
    evaluate: (call) => {
      const filter = call.typeArg(0);
      const result: FhirPathValue[] = [];
      for (const item of toItems(call.input)) {
        const reference = referenceText(item);
        if (reference === undefined) continue;
        const key = parseReference(reference);
        if (!key) continue;
        if (filter && filter.name !== key.type) continue;
        result.push(str(key.id));
      }
      return collection(result, isOrdered(call.input));
    },
  },

  getResourceKey: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const result: FhirPathValue[] = [];
      for (const item of toItems(call.input)) {
        if (item.kind !== 'object' || resourceTypeOf(item) === undefined) {
          continue;
        }
        const id = stringField(item, 'id');
        if (id !== undefined) result.push(str(id));
      }
      return collection(result, isOrdered(call.input));
    },
  },

  htmlChecks: {
    minArgs: 0,
    maxArgs: 0,
    evaluate: (call) => {
      const item = call.singleInput();
      if (item === undefined) return EMPTY;
      return bool(item.kind === 'string' && checkNarrative(item.value));
    },
  },

  memberOf: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const service = requireTerminology(call);
      const item = call.singleInput();
      const valueSet = call.stringArg(0);
      if (item === undefined || valueSet === undefined) return EMPTY;
      let unknown = false;
      for (const coding of codingsOf(item)) {
        const member = service.memberOf(coding, valueSet);
        if (member === true) return bool(true);
        if (member === undefined) unknown = true;
      }
      return boolOrEmpty(unknown ? undefined : false);
    },
  },

  subsumes: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => subsumption(call, ['subsumes', 'equivalent']),
  },

  subsumedBy: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => subsumption(call, ['subsumed-by', 'equivalent']),
  },
};
