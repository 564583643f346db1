/**
 * Debug Trees
 *
 * Renders a parsed expression as the nested node form tooling displays:
 * every node names its kind, its operator or member, its operands and the
 * type inference gives it. Invocations take their target as the first
 * argument; a path head gets an implicit `builtin.that` target.
 */

import type {
  ExpressionNode,
  InvocationTermNode,
  LiteralValue,
} from '../types.js';
import { formatTypeSpecifier } from '../parser/helpers.js';
import {
  formatInferredType,
  inferTypeWithFocus,
  single,
  type InferenceEnvironment,
  type InferredType,
} from './type-inference.js';

export interface DebugTreeNode {
  readonly ExpressionType: string;
  readonly Name: string;
  readonly Arguments?: readonly DebugTreeNode[] | undefined;
  readonly ReturnType?: string | undefined;
}

/** Functions whose arguments are evaluated once per input item */
const ITEM_FOCUS_FUNCTIONS: ReadonlySet<string> = new Set([
  'where',
  'select',
  'repeat',
  'repeatAll',
  'all',
  'exists',
  'aggregate',
  'sort',
  'trace',
]);

interface TreeScope {
  readonly env: InferenceEnvironment;
  readonly focus: InferredType | undefined;
}

/** Build the debug tree of an expression */
export function toDebugTree(
  expr: ExpressionNode,
  env: InferenceEnvironment = {}
): DebugTreeNode {
  return build(expr, { env, focus: env.rootType });
}

function typed(
  node: DebugTreeNode,
  expr: ExpressionNode,
  scope: TreeScope
): DebugTreeNode {
  const type = inferTypeWithFocus(expr, scope.env, scope.focus);
  return type ? { ...node, ReturnType: formatInferredType(type) } : node;
}

function build(expr: ExpressionNode, scope: TreeScope): DebugTreeNode {
  switch (expr.type) {
    case 'Literal':
      return typed(
        {
          ExpressionType: 'ConstantExpression',
          Name: literalText(expr.literal),
        },
        expr,
        scope
      );

    case 'ExternalConstant':
      return typed(
        { ExpressionType: 'VariableRefExpression', Name: expr.name },
        expr,
        scope
      );

    case 'Parenthesized':
      return build(expr.expression, scope);

    case 'Member':
    case 'FunctionCall':
    case 'This':
    case 'Index':
    case 'Total': {
      const node = invocationNode(expr, scope.focus, scope);
      if (expr.type !== 'Member') return typed(node, expr, scope);
      const that: DebugTreeNode = {
        ExpressionType: 'AxisExpression',
        Name: 'builtin.that',
        ReturnType: scope.focus ? formatInferredType(scope.focus) : 'Any',
      };
      return typed(
        { ...node, Arguments: [that, ...(node.Arguments ?? [])] },
        expr,
        scope
      );
    }

    case 'Invocation': {
      const target = inferTypeWithFocus(expr.target, scope.env, scope.focus);
      const node = invocationNode(expr.invocation, target, scope);
      return typed(
        {
          ...node,
          Arguments: [build(expr.target, scope), ...(node.Arguments ?? [])],
        },
        expr,
        scope
      );
    }

    case 'Indexer':
      return typed(
        {
          ExpressionType: 'IndexerExpression',
          Name: '[]',
          Arguments: [build(expr.target, scope), build(expr.index, scope)],
        },
        expr,
        scope
      );

    case 'Polarity':
      return typed(
        {
          ExpressionType: 'UnaryExpression',
          Name: expr.op,
          Arguments: [build(expr.operand, scope)],
        },
        expr,
        scope
      );

    case 'BinaryExpr':
      return typed(
        {
          ExpressionType: 'BinaryExpression',
          Name: expr.op,
          Arguments: [build(expr.left, scope), build(expr.right, scope)],
        },
        expr,
        scope
      );

    case 'TypeExpr':
      return typed(
        {
          ExpressionType: 'TypeExpression',
          Name: expr.op,
          Arguments: [
            build(expr.operand, scope),
            {
              ExpressionType: 'TypeSpecifier',
              Name: formatTypeSpecifier(expr.typeSpecifier),
            },
          ],
        },
        expr,
        scope
      );
  }
}

/** Node for an invocation, without its target */
function invocationNode(
  invocation: InvocationTermNode,
  input: InferredType | undefined,
  scope: TreeScope
): DebugTreeNode {
  switch (invocation.type) {
    case 'Member':
      return {
        ExpressionType: 'ChildExpression',
        Name: invocation.name,
        Arguments: [],
      };
    case 'FunctionCall': {
      const argScope: TreeScope = ITEM_FOCUS_FUNCTIONS.has(invocation.name)
        ? { env: scope.env, focus: input && single(input) }
        : scope;
      return {
        ExpressionType: 'FunctionCallExpression',
        Name: invocation.name,
        Arguments: invocation.args.map((arg) => build(arg, argScope)),
      };
    }
    case 'This':
      return { ExpressionType: 'AxisExpression', Name: 'builtin.this' };
    case 'Index':
      return { ExpressionType: 'AxisExpression', Name: 'builtin.index' };
    case 'Total':
      return { ExpressionType: 'AxisExpression', Name: 'builtin.total' };
  }
}

function literalText(literal: LiteralValue): string {
  switch (literal.kind) {
    case 'empty':
      return '{}';
    case 'boolean':
      return String(literal.value);
    case 'string':
    case 'decimal':
      return literal.value;
    case 'integer':
      return literal.value.toString();
    case 'long':
      return `${literal.value.toString()}L`;
    case 'date':
    case 'dateTime':
      return `@${literal.value}`;
    case 'time':
      return `@T${literal.value}`;
    case 'quantity':
      return literal.calendar
        ? `${literal.value} ${literal.unit}`
        : `${literal.value} '${literal.unit}'`;
  }
}

/**
 * Indented text form of a debug tree, one node per line:
 * `Kind Name : ReturnType`.
 */
export function formatDebugTree(node: DebugTreeNode, depth = 0): string {
  const type = node.ReturnType === undefined ? '' : ` : ${node.ReturnType}`;
  const lines = [`${'  '.repeat(depth)}${node.ExpressionType} ${node.Name}${type}`];
  for (const child of node.Arguments ?? []) {
    lines.push(formatDebugTree(child, depth + 1));
  }
  return lines.join('\n');
}
