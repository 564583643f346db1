/**
 * Runtime Types
 *
 * Public types for evaluation configuration and results.
 * These types are the primary interface for host applications.
 */

import type { SourceLocation } from '../../types.js';
import type { ResourceAdapter } from '../services/adapter.js';
import type { TerminologyService } from '../services/terminology.js';
import type { TypeHierarchy } from '../services/type-hierarchy.js';
import type { UnitService } from '../services/units.js';
import type { TraceEntry, TraceLog } from './trace.js';
import type { FhirPathValue } from './values.js';

/** Document version; R4 and R4B give integers C-like truthiness */
export type FhirVersion = 'R4' | 'R4B' | 'R5';

export const FHIR_VERSIONS: readonly FhirVersion[] = ['R4', 'R4B', 'R5'];

/** I/O callbacks for runtime operations */
export interface EvaluationCallbacks {
  /** Called when trace() is invoked */
  onTrace: (label: string, value: FhirPathValue) => void;
}

/** Observability callbacks for monitoring evaluation */
export interface ObservabilityCallbacks {
  /** Called before a function is invoked */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called after a function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when an error occurs */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a function call */
export interface FunctionCallEvent {
  /** Function name */
  name: string;
  /** Input collection */
  input: FhirPathValue;
  /** Number of arguments written in the call */
  argCount: number;
}

/** Event emitted after a function returns */
export interface FunctionReturnEvent {
  /** Function name */
  name: string;
  /** Return value */
  value: FhirPathValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Source location, when the error carries one */
  location?: SourceLocation | undefined;
}

/**
 * Settings shared by every scope of one evaluation.
 */
export interface EngineSettings {
  /** Unknown members raise FP-R006 instead of yielding Empty */
  readonly strict: boolean;
  readonly fhirVersion: FhirVersion;
  /** Ordered-only functions reject collections without defined order */
  readonly checkOrderedFunctions: boolean;
  /** Caller-owned trace sink */
  readonly trace: TraceLog;
  readonly callbacks: EvaluationCallbacks;
  readonly observability: ObservabilityCallbacks;
  readonly adapter: ResourceAdapter;
  readonly units: UnitService;
  readonly terminology: TerminologyService | undefined;
  readonly types: TypeHierarchy;
  /** Evaluation timestamp; now(), today() and timeOfDay() read it */
  readonly now: Date;
}

/** Values fixed for a whole evaluation: `%resource`, `%context` */
export interface RootScope {
  readonly resources: readonly FhirPathValue[];
  readonly context: FhirPathValue;
}

/**
 * Evaluation scope. Child scopes are created for lambda bodies and for
 * `defineVariable`; lookups walk outward through `parent`.
 */
export interface EvaluationContext {
  /** Parent scope for variable lookup (undefined = root scope) */
  readonly parent?: EvaluationContext | undefined;
  /** Variables (%name) local to this scope */
  readonly variables: Map<string, FhirPathValue>;
  /** Current focus ($this) */
  readonly focus: FhirPathValue;
  /** $index inside iterating functions */
  readonly index?: number | undefined;
  /** False when the collection being iterated has no defined order */
  readonly indexOrdered?: boolean | undefined;
  /** $total inside aggregate() */
  readonly total?: FhirPathValue | undefined;
  readonly root: RootScope;
  readonly engine: EngineSettings;
}

/** Options for creating an evaluation context */
export interface EvaluationOptions {
  /** Root documents, converted by the adapter */
  resources?: readonly unknown[];
  /** Initial variables */
  variables?: Record<string, FhirPathValue>;
  strict?: boolean;
  fhirVersion?: FhirVersion;
  checkOrderedFunctions?: boolean;
  /** Trace sink to append to; a fresh one is created when omitted */
  trace?: TraceLog;
  /** I/O callbacks */
  callbacks?: Partial<EvaluationCallbacks>;
  /** Observability callbacks for monitoring evaluation */
  observability?: ObservabilityCallbacks;
  adapter?: ResourceAdapter;
  units?: UnitService;
  terminology?: TerminologyService;
  types?: TypeHierarchy;
  now?: Date;
}

/** Result of evaluateExpression */
export type EvaluationOutcome =
  | {
      readonly success: true;
      readonly value: FhirPathValue;
      readonly traces: readonly TraceEntry[];
    }
  | {
      readonly success: false;
      readonly error: Error;
      /** Descriptive message, prefixed with the error id when there is one */
      readonly message: string;
    };
