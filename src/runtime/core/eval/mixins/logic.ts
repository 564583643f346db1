/**
 * LogicMixin: Three-Valued Boolean Operators
 *
 * `and`, `or`, `xor` and `implies` over true / false / Empty. The right
 * operand is skipped when the left one already decides the result.
 *
 * @internal
 */

import type { BinaryExprNode, ExpressionNode } from '../../../../types.js';
import type { Truth } from '../../logic.js';
import { and, implies, or, toBooleanForLogic, xor } from '../../logic.js';
import type { EvaluationContext } from '../../types.js';
import type { FhirPathValue } from '../../values.js';
import { FALSE, TRUE, boolOrEmpty } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createLogicMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class LogicEvaluator extends Base {
    override evaluateLogic(
      node: BinaryExprNode,
      ctx: EvaluationContext
    ): FhirPathValue {
      const left = this.truthOf(node.left, node.op, ctx);
      switch (node.op) {
        case 'and':
          if (left === false) return FALSE;
          return boolOrEmpty(and(left, this.truthOf(node.right, node.op, ctx)));
        case 'or':
          if (left === true) return TRUE;
          return boolOrEmpty(or(left, this.truthOf(node.right, node.op, ctx)));
        case 'implies':
          if (left === false) return TRUE;
          return boolOrEmpty(
            implies(left, this.truthOf(node.right, node.op, ctx))
          );
        default:
          return boolOrEmpty(xor(left, this.truthOf(node.right, node.op, ctx)));
      }
    }

    truthOf(
      node: ExpressionNode,
      operation: string,
      ctx: EvaluationContext
    ): Truth {
      return toBooleanForLogic(
        this.evaluateNode(node, ctx),
        this.engine.fhirVersion,
        `'${operation}'`,
        this.getNodeLocation(node)
      );
    }
  };
}

export const LogicMixin = createLogicMixin;
