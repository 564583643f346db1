/**
 * OperatorsMixin: Arithmetic, Comparison, Equality, Membership, Union
 *
 * Arithmetic and comparison take singleton operands and propagate Empty.
 * Equality compares whole collections item-wise; equivalence ignores
 * order; union removes duplicates; `&` reads Empty as ''.
 *
 * Error Handling:
 * - Multi-item operands throw EvaluationError(FP-R004)
 * - Unsupported operand kinds throw EvaluationError(FP-R002)
 *
 * @internal
 */

import type { BinaryExprNode, PolarityNode } from '../../../../types.js';
import { evaluationError } from '../../../../types.js';
import {
  compareItems,
  equalItems,
  equalValues,
  equivalentValues,
  unionValues,
} from '../../equals.js';
import {
  addQuantities,
  asQuantity,
  divideQuantities,
  multiplyQuantities,
  negateQuantity,
  scaleQuantity,
} from '../../quantity.js';
import { addDuration } from '../../temporal.js';
import type { EvaluationContext } from '../../types.js';
import type { FhirPathValue, QuantityValue } from '../../values.js';
import {
  EMPTY,
  bool,
  boolOrEmpty,
  decimal,
  integer,
  isNumeric,
  isTemporal,
  str,
  toDecimal,
  toItems,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

type ArithmeticOp = '+' | '-' | '*' | '/' | 'div' | 'mod';

function isArithmetic(op: string): op is ArithmeticOp {
  return ['+', '-', '*', '/', 'div', 'mod'].includes(op);
}

function createOperatorsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class OperatorsEvaluator extends Base {
    override evaluateBinary(
      node: BinaryExprNode,
      ctx: EvaluationContext
    ): FhirPathValue {
      const left = this.evaluateNode(node.left, ctx);
      const right = this.evaluateNode(node.right, ctx);
      const units = this.engine.units;

      switch (node.op) {
        case '|':
          return unionValues(
            left,
            right,
            (a, b) => equalItems(a, b, units) === true
          );
        case '=':
          if (left.kind === 'empty' || right.kind === 'empty') return EMPTY;
          return boolOrEmpty(equalValues(left, right, units));
        case '!=': {
          if (left.kind === 'empty' || right.kind === 'empty') return EMPTY;
          const equal = equalValues(left, right, units);
          return boolOrEmpty(equal === undefined ? undefined : !equal);
        }
        case '~':
          return bool(equivalentValues(left, right, units));
        case '!~':
          return bool(!equivalentValues(left, right, units));
        case 'in':
          return this.membership(left, right, node);
        case 'contains':
          return this.membership(right, left, node);
        case '&':
          return this.concatenate(left, right, node);
        case '<':
        case '<=':
        case '>':
        case '>=':
          return this.compare(node.op, left, right, node);
        default:
          break;
      }

      if (isArithmetic(node.op)) {
        const a = this.requireSingleton(left, `'${node.op}'`, node.left);
        const b = this.requireSingleton(right, `'${node.op}'`, node.right);
        if (a === undefined || b === undefined) return EMPTY;
        return this.arithmetic(node.op, a, b, node);
      }
      throw evaluationError(
        'FP-R001',
        { message: `Unsupported operator: ${node.op}` },
        this.getNodeLocation(node)
      );
    }

    override evaluatePolarity(
      node: PolarityNode,
      ctx: EvaluationContext
    ): FhirPathValue {
      const operand = this.requireSingleton(
        this.evaluateNode(node.operand, ctx),
        `unary '${node.op}'`,
        node
      );
      if (operand === undefined) return EMPTY;
      if (node.op === '+') {
        if (isNumeric(operand) || operand.kind === 'quantity') return operand;
      } else {
        switch (operand.kind) {
          case 'integer':
            return integer(-operand.value);
          case 'decimal':
            return decimal(operand.value.negated(), operand.scale);
          case 'quantity':
            return negateQuantity(operand);
          default:
            break;
        }
      }
      throw evaluationError(
        'FP-R002',
        { operation: `unary '${node.op}'`, actual: operand.kind },
        this.getNodeLocation(node)
      );
    }

    /** `item in collection`; Empty item is Empty, empty collection false */
    membership(
      item: FhirPathValue,
      container: FhirPathValue,
      node: BinaryExprNode
    ): FhirPathValue {
      const needle = this.requireSingleton(item, `'${node.op}'`, node);
      if (needle === undefined) return EMPTY;
      const units = this.engine.units;
      return bool(
        toItems(container).some(
          (candidate) => equalItems(needle, candidate, units) === true
        )
      );
    }

    concatenate(
      left: FhirPathValue,
      right: FhirPathValue,
      node: BinaryExprNode
    ): FhirPathValue {
      const text = (value: FhirPathValue, side: BinaryExprNode['left']) => {
        const item = this.requireSingleton(value, "'&'", side);
        if (item === undefined) return '';
        if (item.kind !== 'string') {
          throw evaluationError(
            'FP-R002',
            { operation: "'&'", actual: item.kind },
            this.getNodeLocation(side)
          );
        }
        return item.value;
      };
      return str(text(left, node.left) + text(right, node.right));
    }

    compare(
      op: '<' | '<=' | '>' | '>=',
      left: FhirPathValue,
      right: FhirPathValue,
      node: BinaryExprNode
    ): FhirPathValue {
      const a = this.requireSingleton(left, `'${op}'`, node.left);
      const b = this.requireSingleton(right, `'${op}'`, node.right);
      if (a === undefined || b === undefined) return EMPTY;

      const order = compareItems(a, b, this.engine.units);
      if (order === 'unknown') return EMPTY;
      if (order === 'incomparable') {
        throw evaluationError(
          'FP-R002',
          { operation: `'${op}'`, actual: `${a.kind} and ${b.kind}` },
          this.getNodeLocation(node)
        );
      }
      switch (op) {
        case '<':
          return bool(order < 0);
        case '<=':
          return bool(order <= 0);
        case '>':
          return bool(order > 0);
        case '>=':
          return bool(order >= 0);
      }
    }

    arithmetic(
      op: ArithmeticOp,
      a: FhirPathValue,
      b: FhirPathValue,
      node: BinaryExprNode
    ): FhirPathValue {
      if (isNumeric(a) && isNumeric(b)) {
        return this.numeric(op, a, b);
      }
      if (op === '+' && a.kind === 'string' && b.kind === 'string') {
        return str(a.value + b.value);
      }
      if ((op === '+' || op === '-') && isTemporal(a)) {
        const amount = asQuantity(b);
        if (amount) {
          const delta = op === '+' ? amount.value : amount.value.negated();
          const result = addDuration(a, delta, amount.unit);
          if (result.ok) return result.value;
          if (result.reason === 'range') return EMPTY;
        }
      }

      const qa = asQuantity(a);
      const qb = asQuantity(b);
      if (qa || qb) {
        const result = this.quantityArithmetic(op, a, b, qa, qb);
        if (result !== undefined) return result;
      }

      throw evaluationError(
        'FP-R002',
        { operation: `'${op}'`, actual: `${a.kind} and ${b.kind}` },
        this.getNodeLocation(node)
      );
    }

    /**
     * Integer results stay integers (Empty on overflow); any decimal
     * operand, and `/`, give a decimal. Division by zero is Empty.
     */
    numeric(
      op: ArithmeticOp,
      a: Extract<FhirPathValue, { kind: 'integer' | 'decimal' }>,
      b: Extract<FhirPathValue, { kind: 'integer' | 'decimal' }>
    ): FhirPathValue {
      if (a.kind === 'integer' && b.kind === 'integer' && op !== '/') {
        const x = a.value;
        const y = b.value;
        switch (op) {
          case '+':
            return integer(x + y);
          case '-':
            return integer(x - y);
          case '*':
            return integer(x * y);
          case 'div':
            return y === 0n ? EMPTY : integer(x / y);
          case 'mod':
            return y === 0n ? EMPTY : integer(x % y);
        }
      }

      const x = toDecimal(a);
      const y = toDecimal(b);
      switch (op) {
        case '+':
          return decimal(x.plus(y));
        case '-':
          return decimal(x.minus(y));
        case '*':
          return decimal(x.times(y));
        case '/':
          return y.isZero() ? EMPTY : decimal(x.dividedBy(y));
        case 'div':
          return y.isZero()
            ? EMPTY
            : integer(BigInt(x.dividedBy(y).trunc().toFixed()));
        case 'mod':
          return y.isZero() ? EMPTY : decimal(x.mod(y));
      }
    }

    quantityArithmetic(
      op: ArithmeticOp,
      a: FhirPathValue,
      b: FhirPathValue,
      qa: QuantityValue | undefined,
      qb: QuantityValue | undefined
    ): FhirPathValue | undefined {
      const units = this.engine.units;
      const orEmpty = (value: QuantityValue | undefined): FhirPathValue =>
        value ?? EMPTY;

      if (qa && qb) {
        switch (op) {
          case '+':
            return orEmpty(addQuantities(qa, qb, 1, units));
          case '-':
            return orEmpty(addQuantities(qa, qb, -1, units));
          case '*':
            return orEmpty(multiplyQuantities(qa, qb, units));
          case '/':
            return orEmpty(divideQuantities(qa, qb, units));
          default:
            return undefined;
        }
      }
      if (qa && isNumeric(b)) {
        if (op === '*') return orEmpty(scaleQuantity(qa, toDecimal(b), 'times'));
        if (op === '/') return orEmpty(scaleQuantity(qa, toDecimal(b), 'div'));
      }
      if (qb && isNumeric(a) && op === '*') {
        return orEmpty(scaleQuantity(qb, toDecimal(a), 'times'));
      }
      return undefined;
    }
  };
}

export const OperatorsMixin = createOperatorsMixin;
