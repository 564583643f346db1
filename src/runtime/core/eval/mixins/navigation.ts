/**
 * NavigationMixin: Member Access and Indexing
 *
 * Member access maps over the focus and flattens. On objects the literal
 * field wins; otherwise a choice element (`value` for `valueQuantity`) is
 * resolved through the type table and the adapter's choice-element list.
 * Primitives carrying a `_field` sibling expose its members (id,
 * extension).
 *
 * Error Handling:
 * - Unknown members in strict mode throw EvaluationError(FP-R006)
 * - Negative or non-integer indexes throw EvaluationError(FP-R008)
 *
 * @internal
 */

import type { IndexerNode, SourceSpan } from '../../../../types.js';
import { evaluationError } from '../../../../types.js';
import { parseDate, parseDateTime, parseTime } from '../../temporal.js';
import type { EvaluationContext } from '../../types.js';
import type { FhirPathValue, ObjectValue, TypeInfo } from '../../values.js';
import {
  EMPTY,
  collection,
  formatTypeInfo,
  isOrdered,
  toItems,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { EvaluatorBase } from '../base.js';

interface ChoiceMatch {
  readonly value: FhirPathValue;
  readonly fhirType: string;
}

/**
 * Tag resolved choice content with its FHIR type. Date and time strings
 * become temporal values so they compare as such.
 */
function tagChoice(value: FhirPathValue, fhirType: string): FhirPathValue {
  const type: TypeInfo = { namespace: 'FHIR', name: fhirType };
  return collection(
    toItems(value).map((item): FhirPathValue => {
      if (item.kind === 'empty' || item.kind === 'collection') return item;
      if (item.type) return item;
      if (item.kind === 'string') {
        const parsed =
          fhirType === 'date'
            ? parseDate(item.value)
            : fhirType === 'dateTime' || fhirType === 'instant'
              ? parseDateTime(item.value)
              : fhirType === 'time'
                ? parseTime(item.value)
                : undefined;
        if (parsed) return { ...parsed, element: item.element, type };
      }
      return { ...item, type };
    })
  );
}

function createNavigationMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class NavigationEvaluator extends Base {
    /**
     * `name` at the head of a path. A type name matching the focus
     * filters the focus (`Patient.name` evaluated on a Patient).
     */
    override evaluateHeadMember(
      name: string,
      node: { span: SourceSpan },
      ctx: EvaluationContext
    ): FhirPathValue {
      const types = this.engine.types;
      if (/^[A-Z]/.test(name) && types.isKnown(name)) {
        const items = toItems(ctx.focus);
        const matching = items.filter(
          (item) =>
            item.kind === 'object' &&
            item.type?.namespace === 'FHIR' &&
            types.isSubtypeOf(item.type.name, name)
        );
        if (matching.length > 0) return collection(matching);
        const hasField = items.some(
          (item) => item.kind === 'object' && item.fields.has(name)
        );
        if (!hasField) return EMPTY;
      }
      return this.evaluateMember(ctx.focus, name, node, ctx);
    }

    override evaluateMember(
      input: FhirPathValue,
      name: string,
      node: { span: SourceSpan },
      _ctx: EvaluationContext
    ): FhirPathValue {
      const results: FhirPathValue[] = [];
      for (const item of toItems(input)) {
        if (item.kind === 'object') {
          results.push(this.memberOf(item, name, node));
        } else if (item.kind !== 'quantity' && item.kind !== 'empty') {
          // Primitive: members come from its `_field` sibling
          const element = item.kind === 'collection' ? undefined : item.element;
          if (element) results.push(element.fields.get(name) ?? EMPTY);
        }
      }
      return collection(results, isOrdered(input));
    }

    memberOf(
      obj: ObjectValue,
      name: string,
      node: { span: SourceSpan }
    ): FhirPathValue {
      const field = obj.fields.get(name);
      if (field !== undefined) return field;

      const choice = this.resolveChoice(obj, name);
      if (choice) return tagChoice(choice.value, choice.fhirType);

      // Only a listed FHIR type can tell an unknown name from an absent one
      if (
        this.engine.strict &&
        obj.type?.namespace === 'FHIR' &&
        this.engine.adapter.declaresElement(obj.type.name, name) === false
      ) {
        throw evaluationError(
          'FP-R006',
          { name, type: formatTypeInfo(obj.type) },
          this.getNodeLocation(node)
        );
      }
      return EMPTY;
    }

    /**
     * Find `name + Suffix` where the suffix names a data type. When the
     * object's type is known to the adapter, `name` must be one of its
     * choice elements.
     */
    resolveChoice(obj: ObjectValue, name: string): ChoiceMatch | undefined {
      if (name.startsWith('_')) return undefined;
      if (obj.type?.namespace === 'FHIR') {
        const allowed = this.engine.adapter.choiceElements(obj.type.name);
        if (allowed && !allowed.includes(name)) return undefined;
      }
      for (const [key, value] of obj.fields) {
        if (key.length <= name.length || !key.startsWith(name)) continue;
        const suffix = key.slice(name.length);
        if (!/^[A-Z]/.test(suffix)) continue;
        const fhirType = this.engine.types.choiceTypeForSuffix(suffix);
        if (fhirType !== undefined) return { value, fhirType };
      }
      return undefined;
    }

    override evaluateIndexer(
      node: IndexerNode,
      ctx: EvaluationContext
    ): FhirPathValue {
      const target = this.evaluateNode(node.target, ctx);
      const index = this.requireSingleton(
        this.evaluateNode(node.index, ctx),
        'indexer',
        node.index
      );
      if (index === undefined) return EMPTY;
      if (index.kind !== 'integer' || index.value < 0n) {
        throw evaluationError(
          'FP-R008',
          { index: index.kind === 'integer' ? index.value.toString() : index.kind },
          this.getNodeLocation(node.index)
        );
      }
      this.requireOrdered(target, 'indexer', node);
      const items = toItems(target);
      return index.value < BigInt(items.length)
        ? (items[Number(index.value)] ?? EMPTY)
        : EMPTY;
    }
  };
}

export const NavigationMixin = createNavigationMixin;
