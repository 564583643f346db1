/**
 * CoreMixin: Main Expression Dispatch
 *
 * Provides the main entry points for expression evaluation and dispatches
 * to specialized evaluators based on AST node type.
 *
 * Invocation chains (`a.b.f().g`) are evaluated through evaluateScoped(),
 * which threads the scope along the chain so that variables introduced by
 * defineVariable() stay visible to the later steps.
 *
 * Depends on:
 * - LiteralsMixin: evaluateLiteral()
 * - VariablesMixin: evaluateExternalConstant()
 * - NavigationMixin: evaluateMember(), evaluateHeadMember(), evaluateIndexer()
 * - OperatorsMixin: evaluateBinary(), evaluatePolarity()
 * - LogicMixin: evaluateLogic()
 * - TypesMixin: evaluateTypeExpr()
 * - FunctionsMixin: invokeFunction()
 *
 * @internal
 */

import type { ExpressionNode } from '../../../../types.js';
import { evaluationError } from '../../../../types.js';
import type { EvaluationContext } from '../../types.js';
import type { FhirPathValue } from '../../values.js';
import { EMPTY, integer } from '../../values.js';
import type { EvaluatorConstructor, ScopedResult } from '../types.js';
import type { EvaluatorBase } from '../base.js';

const LOGIC_OPS = new Set(['and', 'or', 'xor', 'implies']);

function createCoreMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class CoreEvaluator extends Base {
    /**
     * Evaluate any expression node against the scope's focus.
     */
    override evaluateNode(
      node: ExpressionNode,
      ctx: EvaluationContext
    ): FhirPathValue {
      switch (node.type) {
        case 'Literal':
          return this.evaluateLiteral(node);
        case 'ExternalConstant':
          return this.evaluateExternalConstant(node, ctx);
        case 'Parenthesized':
          return this.evaluateNode(node.expression, ctx);
        case 'Member':
          return this.evaluateHeadMember(node.name, node, ctx);
        case 'FunctionCall':
        case 'Invocation':
          return this.evaluateScoped(node, ctx).value;
        case 'This':
          return ctx.focus;
        case 'Index':
          if (ctx.index === undefined) return EMPTY;
          if (this.engine.checkOrderedFunctions && ctx.indexOrdered === false) {
            throw evaluationError(
              'FP-R010',
              { name: '$index' },
              this.getNodeLocation(node)
            );
          }
          return integer(BigInt(ctx.index));
        case 'Total':
          return ctx.total ?? EMPTY;
        case 'Indexer':
          return this.evaluateIndexer(node, ctx);
        case 'Polarity':
          return this.evaluatePolarity(node, ctx);
        case 'BinaryExpr':
          return LOGIC_OPS.has(node.op)
            ? this.evaluateLogic(node, ctx)
            : this.evaluateBinary(node, ctx);
        case 'TypeExpr':
          return this.evaluateTypeExpr(node, ctx);
      }
    }

    /**
     * Evaluate one step of an invocation chain, returning the scope the
     * next step runs in.
     */
    override evaluateScoped(
      node: ExpressionNode,
      ctx: EvaluationContext
    ): ScopedResult {
      if (node.type === 'FunctionCall') {
        return this.invokeFunction(node, ctx.focus, ctx, false);
      }
      if (node.type !== 'Invocation') {
        return { value: this.evaluateNode(node, ctx), ctx };
      }

      const target = this.evaluateScoped(node.target, ctx);
      const invocation = node.invocation;
      switch (invocation.type) {
        case 'Member':
          return {
            value: this.evaluateMember(
              target.value,
              invocation.name,
              invocation,
              target.ctx
            ),
            ctx: target.ctx,
          };
        case 'FunctionCall':
          return this.invokeFunction(
            invocation,
            target.value,
            target.ctx,
            true
          );
        case 'This':
          return target;
        case 'Index':
        case 'Total':
          return {
            value: this.evaluateNode(invocation, target.ctx),
            ctx: target.ctx,
          };
      }
    }
  };
}

export const CoreMixin = createCoreMixin;
