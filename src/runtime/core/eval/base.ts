/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and settings access for all mixins, and
 * placeholders for the dispatch methods later mixins supply so that each
 * mixin can call across the stack with full typing.
 *
 * @internal
 */

import type {
  ExpressionNode,
  FunctionCallNode,
  LiteralNode,
  SourceLocation,
  SourceSpan,
  TypeExprNode,
  BinaryExprNode,
  ExternalConstantNode,
  IndexerNode,
  PolarityNode,
} from '../../../types.js';
import { evaluationError } from '../../../types.js';
import type { EngineSettings, EvaluationContext } from '../types.js';
import type { FhirPathValue } from '../values.js';
import { isOrdered, toItems } from '../values.js';
import type { ScopedResult } from './types.js';

function missing(method: string, mixin: string): Error {
  return new Error(`${method} requires full Evaluator composition with ${mixin}`);
}

/**
 * Base class for the evaluator.
 * Instances hold only engine settings; every method takes the scope it
 * evaluates in, so one evaluator serves all scopes of an evaluation.
 */
export class EvaluatorBase {
  constructor(readonly engine: EngineSettings) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  getNodeLocation(node?: { span: SourceSpan }): SourceLocation | undefined {
    return node?.span.start;
  }

  /**
   * Single item of a value, undefined for Empty.
   * @throws EvaluationError FP-R004 for two or more items
   */
  requireSingleton(
    value: FhirPathValue,
    operation: string,
    node?: { span: SourceSpan }
  ): FhirPathValue | undefined {
    const items = toItems(value);
    if (items.length > 1) {
      throw evaluationError(
        'FP-R004',
        { operation, count: items.length },
        this.getNodeLocation(node)
      );
    }
    return items[0];
  }

  /**
   * @throws EvaluationError FP-R010 when ordered-function checks are on and
   * the value's ordering is undefined
   */
  requireOrdered(
    value: FhirPathValue,
    name: string,
    node?: { span: SourceSpan }
  ): void {
    if (this.engine.checkOrderedFunctions && !isOrdered(value)) {
      throw evaluationError('FP-R010', { name }, this.getNodeLocation(node));
    }
  }

  // ============================================================
  // DISPATCH PLACEHOLDERS (supplied by mixins)
  // ============================================================

  evaluateNode(_node: ExpressionNode, _ctx: EvaluationContext): FhirPathValue {
    throw missing('evaluateNode', 'CoreMixin');
  }

  evaluateScoped(_node: ExpressionNode, _ctx: EvaluationContext): ScopedResult {
    throw missing('evaluateScoped', 'CoreMixin');
  }

  evaluateLiteral(_node: LiteralNode): FhirPathValue {
    throw missing('evaluateLiteral', 'LiteralsMixin');
  }

  evaluateExternalConstant(
    _node: ExternalConstantNode,
    _ctx: EvaluationContext
  ): FhirPathValue {
    throw missing('evaluateExternalConstant', 'VariablesMixin');
  }

  evaluateMember(
    _input: FhirPathValue,
    _name: string,
    _node: { span: SourceSpan },
    _ctx: EvaluationContext
  ): FhirPathValue {
    throw missing('evaluateMember', 'NavigationMixin');
  }

  evaluateHeadMember(
    _name: string,
    _node: { span: SourceSpan },
    _ctx: EvaluationContext
  ): FhirPathValue {
    throw missing('evaluateHeadMember', 'NavigationMixin');
  }

  evaluateIndexer(_node: IndexerNode, _ctx: EvaluationContext): FhirPathValue {
    throw missing('evaluateIndexer', 'NavigationMixin');
  }

  evaluateBinary(_node: BinaryExprNode, _ctx: EvaluationContext): FhirPathValue {
    throw missing('evaluateBinary', 'OperatorsMixin');
  }

  evaluatePolarity(_node: PolarityNode, _ctx: EvaluationContext): FhirPathValue {
    throw missing('evaluatePolarity', 'OperatorsMixin');
  }

  evaluateLogic(_node: BinaryExprNode, _ctx: EvaluationContext): FhirPathValue {
    throw missing('evaluateLogic', 'LogicMixin');
  }

  evaluateTypeExpr(_node: TypeExprNode, _ctx: EvaluationContext): FhirPathValue {
    throw missing('evaluateTypeExpr', 'TypesMixin');
  }

  invokeFunction(
    _node: FunctionCallNode,
    _input: FhirPathValue,
    _ctx: EvaluationContext,
    _chained: boolean
  ): ScopedResult {
    throw missing('invokeFunction', 'FunctionsMixin');
  }
}
