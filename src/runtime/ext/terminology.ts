/**
 * Terminology Functions
 *
 * Functions invoked on `%terminologies`. Each delegates to the engine's
 * TerminologyService; an unknown value set, code system or map gives
 * Empty.
 *
 * Error Handling:
 * - No terminology service configured throws EvaluationError(FP-R012)
 */

import type { FhirPathValue } from '../core/values.js';
import { EMPTY, bool, collection, object, str } from '../core/values.js';
import type { Coding } from '../services/terminology.js';
import { codingsOf, requireTerminology } from './fhir.js';
import type { FunctionCall, FunctionDefinition } from './types.js';

export type TerminologyFunctionId =
  | 'expand'
  | 'lookup'
  | 'validateVS'
  | 'validateCS'
  | 'subsumes'
  | 'translate';

const CODING_TYPE = { namespace: 'FHIR', name: 'Coding' };
const PARAMETERS_TYPE = { namespace: 'FHIR', name: 'Parameters' };

function codingValue(coding: Coding): FhirPathValue {
  const fields = new Map<string, FhirPathValue>();
  if (coding.system !== undefined) fields.set('system', str(coding.system));
  fields.set('code', str(coding.code));
  if (coding.display !== undefined) fields.set('display', str(coding.display));
  return object(fields, CODING_TYPE);
}

function codingArg(call: FunctionCall, index: number): Coding | undefined {
  const item = call.singleArg(index);
  return item === undefined ? undefined : codingsOf(item)[0];
}

export const TERMINOLOGY_FUNCTIONS: Record<
  TerminologyFunctionId,
  FunctionDefinition
> = {
  expand: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const service = requireTerminology(call);
      const valueSet = call.stringArg(0);
      if (valueSet === undefined) return EMPTY;
      const codings = service.expand(valueSet);
      return codings ? collection(codings.map(codingValue)) : EMPTY;
    },
  },

  lookup: {
    minArgs: 1,
    maxArgs: 1,
    evaluate: (call) => {
      const service = requireTerminology(call);
      const coding = codingArg(call, 0);
      if (!coding) return EMPTY;
      const result = service.lookup(coding);
      if (!result) return EMPTY;
      const fields = new Map<string, FhirPathValue>();
      if (result.name !== undefined) fields.set('name', str(result.name));
      if (result.display !== undefined) {
        fields.set('display', str(result.display));
      }
      return object(fields, PARAMETERS_TYPE);
    },
  },

  validateVS: {
    minArgs: 2,
    maxArgs: 2,
    evaluate: (call) => {
      const service = requireTerminology(call);
      const valueSet = call.stringArg(0);
      const coding = codingArg(call, 1);
      if (valueSet === undefined || !coding) return EMPTY;
      const valid = service.validateVS(valueSet, coding);
      return valid === undefined ? EMPTY : bool(valid);
    },
  },

  validateCS: {
    minArgs: 2,
    maxArgs: 2,
    evaluate: (call) => {
      const service = requireTerminology(call);
      const codeSystem = call.stringArg(0);
      const coding = codingArg(call, 1);
      if (codeSystem === undefined || !coding) return EMPTY;
      const valid = service.validateCS(codeSystem, coding);
      return valid === undefined ? EMPTY : bool(valid);
    },
  },

  // Returns the outcome code: equivalent, subsumes, subsumed-by or
  // not-subsumed
  subsumes: {
    minArgs: 3,
    maxArgs: 3,
    evaluate: (call) => {
      const service = requireTerminology(call);
      const system = call.stringArg(0);
      const codeA = codingArg(call, 1);
      const codeB = codingArg(call, 2);
      if (system === undefined || !codeA || !codeB) return EMPTY;
      const outcome = service.subsumes(system, codeA.code, codeB.code);
      return outcome === undefined ? EMPTY : str(outcome);
    },
  },

  translate: {
    minArgs: 2,
    maxArgs: 2,
    evaluate: (call) => {
      const service = requireTerminology(call);
      const conceptMap = call.stringArg(0);
      const coding = codingArg(call, 1);
      if (conceptMap === undefined || !coding) return EMPTY;
      const targets = service.translate(conceptMap, coding);
      return targets ? collection(targets.map(codingValue)) : EMPTY;
    },
  },
};
