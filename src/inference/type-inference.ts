/**
 * Static Type Inference
 *
 * Walks an expression without evaluating it and reports the type it would
 * produce. Used by tooling (debug trees, the CLI); the evaluator never
 * consults it. Member access is only typed when the environment supplies
 * an element table, so most paths over resources come back unknown.
 */

import { readFileSync } from 'node:fs';
import type {
  BinaryExprNode,
  ExpressionNode,
  FunctionCallNode,
  InvocationTermNode,
  LiteralValue,
  TypeSpecifier,
} from '../types.js';
import { typeSpecifierFromExpression } from '../parser/helpers.js';

// ============================================================
// TYPES
// ============================================================

export interface InferredType {
  readonly namespace: string;
  readonly name: string;
  readonly collection: boolean;
}

/** Element name → type, per owning type name */
export type ElementTable = Readonly<
  Record<string, Readonly<Record<string, InferredType>>>
>;

export interface InferenceEnvironment {
  /** Type of the root focus (`$this` at the top, `%resource`) */
  readonly rootType?: InferredType | undefined;
  /** Types of `%name` variables */
  readonly variables?: Readonly<Record<string, InferredType>> | undefined;
  readonly elements?: ElementTable | undefined;
}

const SYSTEM_TYPES: ReadonlySet<string> = new Set([
  'Boolean',
  'String',
  'Integer',
  'Long',
  'Decimal',
  'Date',
  'DateTime',
  'Time',
  'Quantity',
]);

export function systemType(name: string, collection = false): InferredType {
  return { namespace: 'System', name, collection };
}

export function single(type: InferredType): InferredType {
  return type.collection ? { ...type, collection: false } : type;
}

function many(type: InferredType): InferredType {
  return type.collection ? type : { ...type, collection: true };
}

function sameType(a: InferredType, b: InferredType): boolean {
  return a.namespace === b.namespace && a.name === b.name;
}

/** `System.String[]` style display text */
export function formatInferredType(type: InferredType): string {
  return `${type.namespace}.${type.name}${type.collection ? '[]' : ''}`;
}

/** Resolve a written type name; unqualified system names are System */
export function typeFromSpecifier(spec: TypeSpecifier): InferredType {
  if (spec.namespace !== undefined) {
    return { namespace: spec.namespace, name: spec.name, collection: false };
  }
  return SYSTEM_TYPES.has(spec.name)
    ? systemType(spec.name)
    : { namespace: 'FHIR', name: spec.name, collection: false };
}

// ============================================================
// FUNCTION RETURN TABLE
// ============================================================

/**
 * How a function's result type is found: a fixed `Namespace.Name[]`
 * text, or one of the relations to its input and arguments.
 */
type ReturnRule =
  | { readonly kind: 'fixed'; readonly type: InferredType }
  | {
      readonly kind:
        | 'input'
        | 'item'
        | 'projection'
        | 'typeArgument'
        | 'branch'
        | 'firstArgument'
        | 'unknown';
    };

type Relation = Exclude<ReturnRule['kind'], 'fixed'>;

const RELATIONS: ReadonlySet<string> = new Set<Relation>([
  'input',
  'item',
  'projection',
  'typeArgument',
  'branch',
  'firstArgument',
  'unknown',
]);

function isRelation(text: string): text is Relation {
  return RELATIONS.has(text);
}

function parseReturnRule(text: string): ReturnRule {
  if (isRelation(text)) return { kind: text };
  const collection = text.endsWith('[]');
  const name = collection ? text.slice(0, -2) : text;
  const dot = name.indexOf('.');
  if (dot === -1) throw new Error(`function types: invalid type '${text}'`);
  return {
    kind: 'fixed',
    type: {
      namespace: name.slice(0, dot),
      name: name.slice(dot + 1),
      collection,
    },
  };
}

function readReturnRules(): ReadonlyMap<string, ReturnRule> {
  const url = new URL('../../data/function-types.json', import.meta.url);
  const json: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  if (
    typeof json !== 'object' ||
    json === null ||
    !('returns' in json) ||
    typeof json.returns !== 'object' ||
    json.returns === null
  ) {
    throw new Error('function types: expected an object with returns');
  }
  const rules = new Map<string, ReturnRule>();
  for (const [name, text] of Object.entries(json.returns)) {
    if (typeof text !== 'string') {
      throw new Error(`function types: ${name} must be a string`);
    }
    rules.set(name, parseReturnRule(text));
  }
  return rules;
}

/** Return rules from data/function-types.json, read when this module loads */
const RETURN_RULES = readReturnRules();

// ============================================================
// INFERENCE
// ============================================================

interface Scope {
  readonly env: InferenceEnvironment;
  /** Type of `$this` where the expression is evaluated */
  readonly focus: InferredType | undefined;
}

/**
 * Infer the result type of an expression.
 * Undefined when the type cannot be known statically.
 */
export function inferType(
  expr: ExpressionNode,
  env: InferenceEnvironment = {}
): InferredType | undefined {
  return infer(expr, { env, focus: env.rootType });
}

/** As inferType, with `$this` typed as `focus` instead of the root */
export function inferTypeWithFocus(
  expr: ExpressionNode,
  env: InferenceEnvironment,
  focus: InferredType | undefined
): InferredType | undefined {
  return infer(expr, { env, focus });
}

function infer(node: ExpressionNode, scope: Scope): InferredType | undefined {
  switch (node.type) {
    case 'Literal':
      return literalType(node.literal);

    case 'ExternalConstant':
      return constantType(node.name, scope.env);

    case 'Parenthesized':
      return infer(node.expression, scope);

    case 'This':
      return scope.focus;

    case 'Index':
      return systemType('Integer');

    case 'Total':
      return undefined;

    case 'Member':
      return memberType(scope.focus, node.name, scope.env, true);

    case 'FunctionCall':
      return functionType(node, scope.focus, scope);

    case 'Invocation':
      return invocationType(
        node.invocation,
        infer(node.target, scope),
        scope
      );

    case 'Indexer': {
      const target = infer(node.target, scope);
      return target && single(target);
    }

    case 'Polarity':
      return infer(node.operand, scope);

    case 'BinaryExpr':
      return binaryType(node, scope);

    case 'TypeExpr':
      return node.op === 'is'
        ? systemType('Boolean')
        : typeFromSpecifier(node.typeSpecifier);
  }
}

function invocationType(
  invocation: InvocationTermNode,
  target: InferredType | undefined,
  scope: Scope
): InferredType | undefined {
  switch (invocation.type) {
    case 'Member':
      return memberType(target, invocation.name, scope.env, false);
    case 'FunctionCall':
      return functionType(invocation, target, scope);
    case 'This':
      return target;
    case 'Index':
      return systemType('Integer');
    case 'Total':
      return undefined;
  }
}

function literalType(literal: LiteralValue): InferredType | undefined {
  switch (literal.kind) {
    case 'empty':
      return undefined;
    case 'boolean':
      return systemType('Boolean');
    case 'string':
      return systemType('String');
    case 'integer':
      return systemType('Integer');
    case 'long':
      return systemType('Long');
    case 'decimal':
      return systemType('Decimal');
    case 'date':
      return systemType('Date');
    case 'dateTime':
      return systemType('DateTime');
    case 'time':
      return systemType('Time');
    case 'quantity':
      return systemType('Quantity');
  }
}

function constantType(
  name: string,
  env: InferenceEnvironment
): InferredType | undefined {
  switch (name) {
    case 'resource':
    case 'rootResource':
    case 'context':
      return env.rootType;
    case 'ucum':
    case 'sct':
    case 'loinc':
      return systemType('String');
    default:
      return env.variables && Object.hasOwn(env.variables, name)
        ? env.variables[name]
        : undefined;
  }
}

function memberType(
  owner: InferredType | undefined,
  name: string,
  env: InferenceEnvironment,
  head: boolean
): InferredType | undefined {
  if (!owner) return undefined;
  // `Patient.name` evaluated against a Patient starts with the type name
  if (head && owner.name === name) return owner;
  const elements =
    env.elements && Object.hasOwn(env.elements, owner.name)
      ? env.elements[owner.name]
      : undefined;
  const element =
    elements && Object.hasOwn(elements, name) ? elements[name] : undefined;
  if (!element) return undefined;
  return owner.collection ? many(element) : element;
}

function functionType(
  node: FunctionCallNode,
  input: InferredType | undefined,
  scope: Scope
): InferredType | undefined {
  const rule = RETURN_RULES.get(node.name);
  if (!rule) return undefined;
  switch (rule.kind) {
    case 'fixed':
      return rule.type;
    case 'input':
      return input;
    case 'item':
      return input && single(input);
    case 'projection': {
      const body = node.args[0];
      if (!body) return undefined;
      const result = infer(body, {
        env: scope.env,
        focus: input && single(input),
      });
      return result && many(result);
    }
    case 'typeArgument': {
      const arg = node.args[0];
      const spec = arg && typeSpecifierFromExpression(arg);
      return spec && typeFromSpecifier(spec);
    }
    case 'branch': {
      const branch = node.args[1];
      return branch && infer(branch, scope);
    }
    case 'firstArgument': {
      const first = node.args[0];
      return first && infer(first, scope);
    }
    case 'unknown':
      return undefined;
  }
}

const BOOLEAN_OPS: ReadonlySet<BinaryExprNode['op']> = new Set([
  '<',
  '<=',
  '>',
  '>=',
  '=',
  '!=',
  '~',
  '!~',
  'in',
  'contains',
  'and',
  'or',
  'xor',
  'implies',
]);

const TEMPORAL_TYPES: ReadonlySet<string> = new Set([
  'Date',
  'DateTime',
  'Time',
]);

function binaryType(
  node: BinaryExprNode,
  scope: Scope
): InferredType | undefined {
  if (BOOLEAN_OPS.has(node.op)) return systemType('Boolean');
  if (node.op === '&') return systemType('String');

  const left = infer(node.left, scope);
  const right = infer(node.right, scope);

  if (node.op === '|') {
    if (left && right) {
      return sameType(left, right) ? many(left) : undefined;
    }
    const known = left ?? right;
    return known && many(known);
  }

  if (!left || !right) return left ?? right;
  if (TEMPORAL_TYPES.has(left.name)) return single(left);
  const names = new Set([left.name, right.name]);
  if (names.has('Quantity')) return systemType('Quantity');
  if (names.has('String')) return systemType('String');
  if (node.op === '/') return systemType('Decimal');
  if (names.has('Decimal')) return systemType('Decimal');
  if (names.has('Long')) return systemType('Long');
  return single(left);
}
