/**
 * ExpressionsMixin: Unary Operators and Subscripts
 *
 * Error Handling:
 * - Negating a non-number throws RuntimeError(SKIFF-R004)
 * - Subscripting a non-sequence, or with a non-integer, throws SKIFF-R004
 * - Index outside the sequence throws RuntimeError(SKIFF-R007)
 *
 * @internal
 */

import type { SubscriptNode, UnaryNode } from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import type { SkiffValue } from '../../values.js';
import { indexError, isSequence, isTruthy, typeName } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

/**
 * ExpressionsMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: getNodeLocation()
 * - CoreMixin: evaluateExpression()
 */
export function ExpressionsMixin(Base: EvaluatorConstructor) {
  return class ExpressionsEvaluator extends Base {
    protected override async evaluateUnary(
      node: UnaryNode
    ): Promise<SkiffValue> {
      const operand = await this.evaluateExpression(node.operand);

      if (node.op === 'not') {
        return !isTruthy(operand);
      }

      if (typeof operand !== 'number') {
        throw RuntimeError.fromNode(
          'SKIFF-R004',
          `Bad operand type for unary -: ${typeName(operand)}`,
          node,
          { op: node.op, type: typeName(operand) }
        );
      }
      return -operand;
    }

    /** `object[index]`; negative indexes count from the end */
    protected override async evaluateSubscript(
      node: SubscriptNode
    ): Promise<SkiffValue> {
      const object = await this.evaluateExpression(node.object);
      const index = await this.evaluateExpression(node.index);

      if (!isSequence(object)) {
        throw RuntimeError.fromNode(
          'SKIFF-R004',
          `${typeName(object)} is not subscriptable`,
          node,
          { type: typeName(object) }
        );
      }
      if (typeof index === 'number' && !Number.isInteger(index)) {
        throw RuntimeError.fromNode(
          'SKIFF-R004',
          `${object.kind} index ${index} is not an integer`,
          node,
          { type: 'number', index }
        );
      }
      if (typeof index !== 'number') {
        throw RuntimeError.fromNode(
          'SKIFF-R004',
          `${object.kind} indices must be integers, not ${typeName(index)}`,
          node,
          { type: typeName(index) }
        );
      }

      const value = object.get(index);
      if (value === undefined) {
        throw indexError(index, object, this.getNodeLocation(node));
      }
      return value;
    }
  };
}
