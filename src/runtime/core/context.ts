/**
 * Evaluation Context Factory
 *
 * Creates and configures the context for expression evaluation.
 * Public API for host applications.
 */

import { evaluationError } from '../../types.js';
import { JsonResourceAdapter } from '../services/adapter.js';
import { TypeHierarchy } from '../services/type-hierarchy.js';
import { TableUnitService } from '../services/units.js';
import { TraceLog } from './trace.js';
import type {
  EngineSettings,
  EvaluationCallbacks,
  EvaluationContext,
  EvaluationOptions,
} from './types.js';
import { collection, formatValue, type FhirPathValue } from './values.js';

const defaultCallbacks: EvaluationCallbacks = {
  onTrace: (label, value) => {
    console.log(`${label}: ${formatValue(value)}`);
  },
};

/** Names the engine defines itself; `%name` for these cannot be set */
export const SYSTEM_VARIABLES: ReadonlySet<string> = new Set([
  'context',
  'resource',
  'rootResource',
  'ucum',
  'sct',
  'loinc',
  'terminologies',
  'this',
  'index',
  'total',
  'factory',
  'server',
]);

/** Bundled type table; read-only, so every context may share it */
const BUNDLED_TYPES = new TypeHierarchy();

/**
 * Create an evaluation context.
 * This is the main entry point for configuring the engine.
 */
export function createEvaluationContext(
  options: EvaluationOptions = {}
): EvaluationContext {
  const types = options.types ?? BUNDLED_TYPES;
  const adapter = options.adapter ?? new JsonResourceAdapter(types);

  const engine: EngineSettings = {
    strict: options.strict ?? false,
    fhirVersion: options.fhirVersion ?? 'R4',
    checkOrderedFunctions: options.checkOrderedFunctions ?? false,
    trace: options.trace ?? new TraceLog(),
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    adapter,
    units: options.units ?? new TableUnitService(),
    terminology: options.terminology,
    types,
    now: options.now ?? new Date(),
  };

  const resources = (options.resources ?? []).map((resource) =>
    adapter.toValue(resource)
  );
  const focus = collection(resources);

  const ctx: EvaluationContext = {
    variables: new Map(),
    focus,
    root: { resources, context: focus },
    engine,
  };

  for (const [name, value] of Object.entries(options.variables ?? {})) {
    setVariable(ctx, name, value);
  }
  return ctx;
}

/**
 * Scope for a lambda body: new focus, fresh variables, same root.
 */
export function createChildContext(
  parent: EvaluationContext,
  focus: FhirPathValue,
  index?: number,
  total?: FhirPathValue,
  indexOrdered?: boolean
): EvaluationContext {
  return {
    parent,
    variables: new Map(),
    focus,
    index,
    indexOrdered,
    total,
    root: parent.root,
    engine: parent.engine,
  };
}

/**
 * Scope for evaluating with an explicit focus: `$this` and `%context`
 * both become `focus`.
 */
export function withFocus(
  ctx: EvaluationContext,
  focus: FhirPathValue
): EvaluationContext {
  return {
    parent: ctx,
    variables: new Map(),
    focus,
    root: { ...ctx.root, context: focus },
    engine: ctx.engine,
  };
}

/** Look a variable up through the scope chain */
export function getVariable(
  ctx: EvaluationContext,
  name: string
): FhirPathValue | undefined {
  for (
    let scope: EvaluationContext | undefined = ctx;
    scope;
    scope = scope.parent
  ) {
    const value = scope.variables.get(name);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Bind a variable in this scope.
 * @throws EvaluationError FP-R011 for engine-defined names
 */
export function setVariable(
  ctx: EvaluationContext,
  name: string,
  value: FhirPathValue
): void {
  if (SYSTEM_VARIABLES.has(name)) {
    throw evaluationError('FP-R011', {
      name,
      reason: 'system variables cannot be overridden',
    });
  }
  ctx.variables.set(name, value);
}

/**
 * Scope that adds one variable for the rest of an invocation chain.
 * @throws EvaluationError FP-R011 when the name is taken or reserved
 */
export function defineVariable(
  ctx: EvaluationContext,
  name: string,
  value: FhirPathValue
): EvaluationContext {
  if (SYSTEM_VARIABLES.has(name)) {
    throw evaluationError('FP-R011', {
      name,
      reason: 'system variables cannot be overridden',
    });
  }
  if (getVariable(ctx, name) !== undefined) {
    throw evaluationError('FP-R011', { name, reason: 'already defined' });
  }
  return {
    parent: ctx,
    variables: new Map([[name, value]]),
    focus: ctx.focus,
    index: ctx.index,
    indexOrdered: ctx.indexOrdered,
    total: ctx.total,
    root: ctx.root,
    engine: ctx.engine,
  };
}
