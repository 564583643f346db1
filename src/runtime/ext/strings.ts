/**
 * String Functions
 *
 * Every function here takes a single String input; Empty input or an
 * Empty argument yields Empty. Regular expressions use the JavaScript
 * dialect with `.` matching newlines.
 *
 * Error Handling:
 * - Non-string input throws EvaluationError(FP-R002)
 * - A malformed regular expression throws EvaluationError(FP-R009)
 */

import type { FhirPathValue } from '../core/values.js';
import {
  EMPTY,
  bool,
  collection,
  integer,
  str,
  toItems,
} from '../core/values.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type StringFunctionId =
  | 'indexOf'
  | 'lastIndexOf'
  | 'substring'
  | 'startsWith'
  | 'endsWith'
  | 'contains'
  | 'upper'
  | 'lower'
  | 'replace'
  | 'matches'
  | 'matchesFull'
  | 'replaceMatches'
  | 'length'
  | 'toChars'
  | 'split'
  | 'join'
  | 'trim'
  | 'encode'
  | 'decode'
  | 'escape'
  | 'unescape';

/** Offset in code points of a UTF-16 offset; -1 stays -1 */
function codePointOffset(text: string, index: number): number {
  return index < 0 ? -1 : [...text.slice(0, index)].length;
}

/** Single string input, undefined for Empty */
function stringInput(call: FunctionCall): string | undefined {
  const item = call.singleInput();
  if (item === undefined) return undefined;
  if (item.kind !== 'string') throw call.typeError(item, 'String');
  return item.value;
}

/**
 * Define a function over the string input and its string arguments.
 * Empty input or any Empty argument short-circuits to Empty.
 */
function stringFunction(
  argCount: number,
  body: (input: string, args: string[], call: FunctionCall) => FhirPathValue
): FunctionDefinition {
  return {
    minArgs: argCount,
    maxArgs: argCount,
    evaluate: (call) => {
      const input = stringInput(call);
      if (input === undefined) return EMPTY;
      const args: string[] = [];
      for (let i = 0; i < argCount; i++) {
        const value = call.stringArg(i);
        if (value === undefined) return EMPTY;
        args.push(value);
      }
      return body(input, args, call);
    },
  };
}

function compileRegex(call: FunctionCall, source: string, flags = 's'): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw call.invalidArgument(`invalid regular expression: ${reason}`);
  }
}

// ============================================================
// ENCODING
// ============================================================

type Format = 'hex' | 'base64' | 'urlbase64';

function readFormat(call: FunctionCall, name: string): Format {
  if (name === 'hex' || name === 'base64' || name === 'urlbase64') return name;
  throw call.invalidArgument(`unknown format '${name}'`);
}

function encode(text: string, format: Format): string {
  const bytes = Buffer.from(text, 'utf8');
  switch (format) {
    case 'hex':
      return bytes.toString('hex');
    case 'base64':
      return bytes.toString('base64');
    case 'urlbase64':
      return bytes.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
  }
}

const HEX_TEXT = /^(?:[0-9a-fA-F]{2})*$/;
const BASE64_TEXT = /^[A-Za-z0-9+/]*={0,2}$/;
const URL_BASE64_TEXT = /^[A-Za-z0-9_-]*={0,2}$/;

function decode(text: string, format: Format): string | undefined {
  switch (format) {
    case 'hex':
      return HEX_TEXT.test(text)
        ? Buffer.from(text, 'hex').toString('utf8')
        : undefined;
    case 'base64':
      return BASE64_TEXT.test(text)
        ? Buffer.from(text, 'base64').toString('utf8')
        : undefined;
    case 'urlbase64':
      return URL_BASE64_TEXT.test(text)
        ? Buffer.from(
            text.replace(/-/g, '+').replace(/_/g, '/'),
            'base64'
          ).toString('utf8')
        : undefined;
  }
}

// ============================================================
// ESCAPING
// ============================================================

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

const HTML_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const JSON_ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
};

const JSON_UNESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
};

function escape(text: string, target: 'html' | 'json'): string {
  if (target === 'html') {
    return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
  }
  return text.replace(/["\\\n\r\t\b\f]/g, (ch) => JSON_ESCAPES[ch] ?? ch);
}

/** Character for a numeric entity; undefined outside Unicode or for a surrogate */
function fromCodePoint(code: number): string | undefined {
  if (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) return undefined;
  return String.fromCodePoint(code);
}

function unescape(text: string, target: 'html' | 'json'): string {
  if (target === 'html') {
    return text.replace(
      /&(#x[0-9a-fA-F]+|#\d+|[a-z]+);/g,
      (whole, entity: string) => {
        if (entity.startsWith('#x')) {
          return fromCodePoint(parseInt(entity.slice(2), 16)) ?? whole;
        }
        if (entity.startsWith('#')) {
          return fromCodePoint(parseInt(entity.slice(1), 10)) ?? whole;
        }
        return Object.hasOwn(HTML_ENTITIES, entity)
          ? (HTML_ENTITIES[entity] ?? whole)
          : whole;
      }
    );
  }
  return text.replace(
    /\\(u[0-9a-fA-F]{4}|["\\/nrtbf])/g,
    (whole, sequence: string) =>
      sequence.startsWith('u')
        ? String.fromCharCode(parseInt(sequence.slice(1), 16))
        : (JSON_UNESCAPES[sequence] ?? whole)
  );
}

function readTarget(call: FunctionCall, name: string): 'html' | 'json' {
  if (name === 'html' || name === 'json') return name;
  throw call.invalidArgument(`unknown escape target '${name}'`);
}

// ============================================================
// DEFINITIONS
// ============================================================

export const STRING_FUNCTIONS: Record<StringFunctionId, FunctionDefinition> = {
  indexOf: stringFunction(1, (input, [needle = '']) =>
    integer(BigInt(codePointOffset(input, input.indexOf(needle))))
  ),

  lastIndexOf: stringFunction(1, (input, [needle = '']) =>
    integer(BigInt(codePointOffset(input, input.lastIndexOf(needle))))
  ),

  substring: {
    minArgs: 1,
    maxArgs: 2,
    evaluate: (call) => {
      const input = stringInput(call);
      const start = call.integerArg(0);
      if (input === undefined || start === undefined) return EMPTY;
      const chars = [...input];
      if (start < 0 || start >= chars.length) return EMPTY;
      const length = call.integerArg(1);
      if (length === undefined) return str(chars.slice(start).join(''));
      return str(chars.slice(start, start + Math.max(length, 0)).join(''));
    },
  },

  startsWith: stringFunction(1, (input, [prefix = '']) =>
    bool(input.startsWith(prefix))
  ),

  endsWith: stringFunction(1, (input, [suffix = '']) =>
    bool(input.endsWith(suffix))
  ),

  contains: stringFunction(1, (input, [needle = '']) =>
    bool(input.includes(needle))
  ),

  upper: stringFunction(0, (input) => str(input.toUpperCase())),

  lower: stringFunction(0, (input) => str(input.toLowerCase())),

  // An empty pattern inserts the substitution around every character
  replace: stringFunction(2, (input, [pattern = '', substitution = '']) =>
    pattern === ''
      ? str(substitution + [...input].join(substitution) + substitution)
      : str(input.split(pattern).join(substitution))
  ),

  matches: stringFunction(1, (input, [regex = ''], call) =>
    bool(compileRegex(call, regex).test(input))
  ),

  matchesFull: stringFunction(1, (input, [regex = ''], call) =>
    bool(compileRegex(call, `^(?:${regex})$`).test(input))
  ),

  replaceMatches: stringFunction(
    2,
    (input, [regex = '', substitution = ''], call) =>
      regex === ''
        ? str(input)
        : str(input.replace(compileRegex(call, regex, 'gs'), substitution))
  ),

  length: stringFunction(0, (input) => integer(BigInt([...input].length))),

  toChars: stringFunction(0, (input) => collection([...input].map(str))),

  split: stringFunction(1, (input, [separator = '']) =>
    collection(input.split(separator).map(str))
  ),

  join: {
    minArgs: 0,
    maxArgs: 1,
    evaluate: (call) => {
      if (call.input.kind === 'empty') return EMPTY;
      const separator = call.stringArg(0) ?? '';
      const parts = toItems(call.input).map((item) => {
        if (item.kind !== 'string') throw call.typeError(item, 'String');
        return item.value;
      });
      return str(parts.join(separator));
    },
  },

  trim: stringFunction(0, (input) => str(input.trim())),

  encode: stringFunction(1, (input, [format = ''], call) =>
    str(encode(input, readFormat(call, format)))
  ),

  decode: stringFunction(1, (input, [format = ''], call) => {
    const text = decode(input, readFormat(call, format));
    return text === undefined ? EMPTY : str(text);
  }),

  escape: stringFunction(1, (input, [target = ''], call) =>
    str(escape(input, readTarget(call, target)))
  ),

  unescape: stringFunction(1, (input, [target = ''], call) =>
    str(unescape(input, readTarget(call, target)))
  ),
};
