/**
 * VariablesMixin: Name Lookup and Assignment
 *
 * Names live in one flat global map on the runtime context.
 *
 * Error Handling:
 * - Unbound name throws RuntimeError(SKIFF-R002)
 *
 * @internal
 */

import type { AssignmentNode, IdentifierNode } from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import type { SkiffValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

/**
 * VariablesMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: ctx
 * - CoreMixin: evaluateExpression()
 */
export function VariablesMixin(Base: EvaluatorConstructor) {
  return class VariablesEvaluator extends Base {
    protected override evaluateIdentifier(node: IdentifierNode): SkiffValue {
      const value = this.ctx.variables.get(node.name);
      if (value === undefined) {
        throw RuntimeError.fromNode(
          'SKIFF-R002',
          `Variable ${node.name} is not defined`,
          node,
          { name: node.name }
        );
      }
      return value;
    }

    /** Binds the name; the statement's value is the assigned value */
    protected override async evaluateAssignment(
      node: AssignmentNode
    ): Promise<SkiffValue> {
      const value = await this.evaluateExpression(node.value);
      this.ctx.variables.set(node.target, value);
      return value;
    }
  };
}
