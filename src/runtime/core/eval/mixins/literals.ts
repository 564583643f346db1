/**
 * LiteralsMixin: Literal Values
 *
 * Turns literal nodes into runtime values. Decimal and quantity literals
 * keep the scale written in the source; date and time literals are parsed
 * into partial-precision values.
 *
 * @internal
 */

import type { LiteralNode } from '../../../../types.js';
import { EvaluationError } from '../../../../types.js';
import { parseDate, parseDateTime, parseTime } from '../../temporal.js';
import type { FhirPathValue } from '../../values.js';
import {
  EMPTY,
  SYSTEM_LONG,
  bool,
  decimalFromText,
  integer,
  quantity,
  str,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

function createLiteralsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class LiteralsEvaluator extends Base {
    override evaluateLiteral(node: LiteralNode): FhirPathValue {
      const literal = node.literal;
      switch (literal.kind) {
        case 'empty':
          return EMPTY;
        case 'boolean':
          return bool(literal.value);
        case 'string':
          return str(literal.value);
        case 'integer':
          return integer(literal.value);
        case 'long':
          return integer(literal.value, SYSTEM_LONG);
        case 'decimal':
          return decimalFromText(literal.value);
        case 'date':
          return this.temporalLiteral(parseDate(literal.value), node);
        case 'dateTime':
          return this.temporalLiteral(parseDateTime(literal.value), node);
        case 'time':
          return this.temporalLiteral(parseTime(literal.value), node);
        case 'quantity': {
          const amount = decimalFromText(literal.value);
          return {
            ...quantity(amount.value, literal.unit),
            scale: amount.scale,
          };
        }
      }
    }

    /** The lexer validates date literals; a miss here is a defect */
    temporalLiteral(
      value: FhirPathValue | undefined,
      node: LiteralNode
    ): FhirPathValue {
      if (value) return value;
      throw EvaluationError.fromNode(
        'FP-R001',
        'Malformed date/time literal',
        node
      );
    }
  };
}

export const LiteralsMixin = createLiteralsMixin;
