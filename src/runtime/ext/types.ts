/**
 * Function Library Types
 *
 * A built-in function receives a FunctionCall: its input collection, its
 * unevaluated argument expressions and helpers to evaluate them either
 * against the caller's focus or per input item.
 */

import type {
  EvaluationError,
  ExpressionNode,
  FunctionCallNode,
  SourceLocation,
  TypeSpecifier,
} from '../../types.js';
import { evaluationError } from '../../types.js';
import { parseTypeName, typeSpecifierFromExpression } from '../../parser/index.js';
import { createChildContext } from '../core/context.js';
import type { EngineSettings, EvaluationContext } from '../core/types.js';
import type { FhirPathValue } from '../core/values.js';
import { EMPTY, isOrdered, toItems } from '../core/values.js';

/** The part of the evaluator a function call needs */
export interface ExpressionEvaluator {
  evaluateNode(node: ExpressionNode, ctx: EvaluationContext): FhirPathValue;
}

export interface FunctionDefinition {
  readonly minArgs: number;
  readonly maxArgs: number;
  evaluate(call: FunctionCall): FhirPathValue;
}

/**
 * One invocation of a built-in function.
 */
export class FunctionCall {
  private readonly bindings: [string, FhirPathValue][] = [];

  constructor(
    readonly node: FunctionCallNode,
    readonly input: FhirPathValue,
    readonly ctx: EvaluationContext,
    /** True when invoked after `.` rather than at the head of a path */
    readonly chained: boolean,
    private readonly evaluator: ExpressionEvaluator
  ) {}

  get name(): string {
    return this.node.name;
  }

  get args(): readonly ExpressionNode[] {
    return this.node.args;
  }

  get engine(): EngineSettings {
    return this.ctx.engine;
  }

  get location(): SourceLocation {
    return this.node.span.start;
  }

  /** Variables recorded by bind(), in order */
  get boundVariables(): readonly (readonly [string, FhirPathValue])[] {
    return this.bindings;
  }

  hasArg(index: number): boolean {
    return index < this.node.args.length;
  }

  /** Evaluate an argument against the caller's focus; Empty when absent */
  arg(index: number): FhirPathValue {
    const node = this.node.args[index];
    return node ? this.evaluator.evaluateNode(node, this.ctx) : EMPTY;
  }

  /**
   * Evaluate an argument with `item` as `$this`, plus `$index` and, for
   * aggregate(), `$total`.
   */
  argFor(
    index: number,
    item: FhirPathValue,
    position: number,
    total?: FhirPathValue
  ): FhirPathValue {
    const node = this.node.args[index];
    return node ? this.evaluateFor(node, item, position, total) : EMPTY;
  }

  /** Evaluate any expression (usually part of an argument) per item */
  evaluateFor(
    node: ExpressionNode,
    item: FhirPathValue,
    position: number,
    total?: FhirPathValue
  ): FhirPathValue {
    const scope = createChildContext(
      this.ctx,
      item,
      position,
      total,
      isOrdered(this.input)
    );
    return this.evaluator.evaluateNode(node, scope);
  }

  /**
   * @throws EvaluationError FP-R010 when ordered-function checks are on and
   * the input has no defined order
   */
  requireOrdered(): void {
    if (this.engine.checkOrderedFunctions && !isOrdered(this.input)) {
      throw this.error('FP-R010', { name: `${this.name}()` });
    }
  }

  /**
   * Single input item, undefined for Empty.
   * @throws EvaluationError FP-R004 for two or more items
   */
  singleInput(): FhirPathValue | undefined {
    return this.singleValue(this.input, `${this.name}()`);
  }

  /** Single item of an argument, undefined for Empty */
  singleArg(index: number): FhirPathValue | undefined {
    return this.singleValue(
      this.arg(index),
      `${this.name}() argument ${index + 1}`
    );
  }

  /**
   * String argument, undefined when the argument is absent or Empty.
   * @throws EvaluationError FP-R002 for any other kind
   */
  stringArg(index: number): string | undefined {
    const value = this.singleArg(index);
    if (value === undefined) return undefined;
    if (value.kind !== 'string') throw this.typeError(value, 'String');
    return value.value;
  }

  /**
   * Integer argument as a number, undefined when absent or Empty.
   * @throws EvaluationError FP-R002 for any other kind
   */
  integerArg(index: number): number | undefined {
    const value = this.singleArg(index);
    if (value === undefined) return undefined;
    if (value.kind !== 'integer') throw this.typeError(value, 'Integer');
    return Number(value.value);
  }

  /**
   * Type specifier argument: a bare name (`Quantity`, `FHIR.Patient`) or a
   * string holding one.
   */
  typeArg(index: number): TypeSpecifier | undefined {
    const node = this.node.args[index];
    if (!node) return undefined;
    const spec = typeSpecifierFromExpression(node);
    if (spec) return spec;
    const text = this.stringArg(index);
    return text === undefined ? undefined : parseTypeName(text);
  }

  /** Make `%name` visible to the rest of the invocation chain */
  bind(name: string, value: FhirPathValue): void {
    this.bindings.push([name, value]);
  }

  /** Registry error located at this call */
  error(errorId: string, context: Record<string, unknown>): EvaluationError {
    return evaluationError(errorId, context, this.location);
  }

  /** FP-R009 for a malformed argument */
  invalidArgument(reason: string): EvaluationError {
    return this.error('FP-R009', { name: this.name, reason });
  }

  typeError(value: FhirPathValue, expected: string): EvaluationError {
    return this.error('FP-R002', {
      operation: `${this.name}() expecting ${expected}`,
      actual: value.kind,
    });
  }

  /**
   * Single item of any value, undefined for Empty.
   * @throws EvaluationError FP-R004 for two or more items
   */
  singleValue(
    value: FhirPathValue,
    operation: string
  ): FhirPathValue | undefined {
    const items = toItems(value);
    if (items.length > 1) {
      throw this.error('FP-R004', { operation, count: items.length });
    }
    return items[0];
  }
}
