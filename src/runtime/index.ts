/**
 * FHIRPath Runtime
 *
 * Public API for evaluating parsed expressions.
 *
 * Module Structure:
 * - core/: Evaluation engine
 *   - types.ts: Public types (EvaluationContext, EvaluationOptions, etc.)
 *   - values.ts: FhirPathValue and value utilities
 *   - context.ts: Evaluation context factory and variables
 *   - evaluate.ts: evaluate, evaluateExpression, evaluateBoolean
 *   - equals.ts: Equality, equivalence, ordering, fingerprints
 *   - temporal.ts / quantity.ts / logic.ts: Value semantics
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Built-in function library
 * - services/: Resource adapter, units, terminology, type hierarchy
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  EngineSettings,
  ErrorEvent,
  EvaluationCallbacks,
  EvaluationContext,
  EvaluationOptions,
  EvaluationOutcome,
  FhirVersion,
  FunctionCallEvent,
  FunctionReturnEvent,
  ObservabilityCallbacks,
  RootScope,
} from './core/types.js';
export { FHIR_VERSIONS } from './core/types.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type {
  BooleanValue,
  CollectionValue,
  DateTimeValue,
  DateValue,
  DecimalValue,
  EmptyValue,
  FhirPathValue,
  IntegerValue,
  JsonValue,
  ObjectValue,
  QuantityValue,
  StringValue,
  TemporalPrecision,
  TemporalValue,
  TimeValue,
  TypeInfo,
  ValueKind,
} from './core/values.js';

export {
  EMPTY,
  FALSE,
  TRUE,
  bool,
  collection,
  count,
  decimal,
  decimalFromText,
  formatTypeInfo,
  formatValue,
  integer,
  isEmpty,
  isNumeric,
  isOrdered,
  isTemporal,
  object,
  quantity,
  str,
  toItems,
  toJson,
} from './core/values.js';
export { Decimal } from './core/decimal.js';

export { parseDate, parseDateTime, parseTime } from './core/temporal.js';
export { equalValues, equivalentValues, fingerprint } from './core/equals.js';

// ============================================================
// CONTEXT AND EVALUATION
// ============================================================

export {
  SYSTEM_VARIABLES,
  createEvaluationContext,
  getVariable,
  setVariable,
} from './core/context.js';
export {
  evaluate,
  evaluateBoolean,
  evaluateExpression,
} from './core/evaluate.js';
export { TraceLog, type TraceEntry } from './core/trace.js';

// ============================================================
// FUNCTION LIBRARY
// ============================================================

export { builtinFunctionNames } from './ext/builtins.js';

// ============================================================
// SERVICES
// ============================================================

export {
  JsonResourceAdapter,
  type ResourceAdapter,
} from './services/adapter.js';
export {
  TableUnitService,
  loadUnitTable,
  parseUnitTable,
  type UnitService,
  type UnitTable,
} from './services/units.js';
export {
  InMemoryTerminologyService,
  type Coding,
  type ConceptMapping,
  type InMemoryTerminologyOptions,
  type LookupResult,
  type SubsumptionOutcome,
  type TerminologyService,
} from './services/terminology.js';
export {
  TypeHierarchy,
  loadTypeTable,
  parseTypeTable,
  type TypeTable,
} from './services/type-hierarchy.js';
