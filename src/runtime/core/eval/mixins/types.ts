/**
 * TypesMixin: Type Operators
 *
 * Handles the `is` and `as` operators. Both take a single operand;
 * Empty yields Empty.
 *
 * Error Handling:
 * - Multi-item operands throw EvaluationError(FP-R004)
 *
 * @internal
 */

import type { TypeExprNode } from '../../../../types.js';
import { asType, isOfType } from '../../introspection.js';
import type { EvaluationContext } from '../../types.js';
import type { FhirPathValue } from '../../values.js';
import { EMPTY, bool } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createTypesMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class TypesEvaluator extends Base {
    override evaluateTypeExpr(
      node: TypeExprNode,
      ctx: EvaluationContext
    ): FhirPathValue {
      const operand = this.requireSingleton(
        this.evaluateNode(node.operand, ctx),
        `'${node.op}'`,
        node
      );
      if (operand === undefined) return EMPTY;
      const types = this.engine.types;
      return node.op === 'is'
        ? bool(isOfType(operand, node.typeSpecifier, types))
        : asType(operand, node.typeSpecifier, types);
    }
  };
}

export const TypesMixin = createTypesMixin;
