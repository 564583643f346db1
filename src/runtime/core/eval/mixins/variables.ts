/**
 * VariablesMixin: External Constants
 *
 * Resolves `%name` references: the engine-defined constants (%context,
 * %resource, %ucum, %vs-*, ...) first, then user variables through the
 * scope chain.
 *
 * Error Handling:
 * - Undefined variables throw EvaluationError(FP-R005)
 *
 * @internal
 */

import type { ExternalConstantNode } from '../../../../types.js';
import { evaluationError } from '../../../../types.js';
import { getVariable } from '../../context.js';
import { UCUM_SYSTEM } from '../../quantity.js';
import type { EvaluationContext } from '../../types.js';
import type { FhirPathValue, TypeInfo } from '../../values.js';
import { collection, object, str } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

export const SNOMED_SYSTEM = 'http://snomed.info/sct';
export const LOINC_SYSTEM = 'http://loinc.org';
const VALUE_SET_BASE = 'http://hl7.org/fhir/ValueSet/';
const EXTENSION_BASE = 'http://hl7.org/fhir/StructureDefinition/';

/** Type tag of the `%terminologies` handle */
export const TERMINOLOGIES_TYPE: TypeInfo = {
  namespace: 'System',
  name: 'Terminologies',
};

export function isTerminologiesHandle(value: FhirPathValue): boolean {
  return (
    value.kind === 'object' &&
    value.type?.namespace === TERMINOLOGIES_TYPE.namespace &&
    value.type.name === TERMINOLOGIES_TYPE.name
  );
}

function createVariablesMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class VariablesEvaluator extends Base {
    override evaluateExternalConstant(
      node: ExternalConstantNode,
      ctx: EvaluationContext
    ): FhirPathValue {
      const builtin = this.builtinConstant(node.name, ctx);
      if (builtin !== undefined) return builtin;

      const value = getVariable(ctx, node.name);
      if (value === undefined) {
        throw evaluationError(
          'FP-R005',
          { name: node.name },
          this.getNodeLocation(node)
        );
      }
      return value;
    }

    builtinConstant(
      name: string,
      ctx: EvaluationContext
    ): FhirPathValue | undefined {
      switch (name) {
        case 'context':
          return ctx.root.context;
        case 'resource':
          return collection(ctx.root.resources);
        case 'rootResource':
          return collection(ctx.root.resources.slice(0, 1));
        case 'ucum':
          return str(UCUM_SYSTEM);
        case 'sct':
          return str(SNOMED_SYSTEM);
        case 'loinc':
          return str(LOINC_SYSTEM);
        case 'terminologies':
          return object(new Map(), TERMINOLOGIES_TYPE);
        default:
          break;
      }
      if (name.startsWith('vs-')) {
        return str(`${VALUE_SET_BASE}${name.slice(3)}`);
      }
      if (name.startsWith('ext-')) {
        return str(`${EXTENSION_BASE}${name.slice(4)}`);
      }
      return undefined;
    }
  };
}

export const VariablesMixin = createVariablesMixin;
