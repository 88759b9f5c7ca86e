/**
 * CoreMixin: Main Expression Dispatch
 *
 * Entry points for expression evaluation and statement execution.
 * Dispatches on node type to the specialized mixins.
 *
 * Error Handling:
 * - Aborted execution throws AbortError before any node is evaluated
 *
 * @internal
 */

import type { ExpressionNode, StatementNode } from '../../../../types.js';
import { unreachableNode } from '../../../../types.js';
import type { SkiffValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

/**
 * CoreMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: checkAborted()
 * - LiteralsMixin: evaluateSequenceLiteral(), evaluateLiteral()
 * - VariablesMixin: evaluateIdentifier(), evaluateAssignment()
 * - CallsMixin: evaluateCall()
 * - ExpressionsMixin: evaluateSubscript(), evaluateUnary()
 */
export function CoreMixin(Base: EvaluatorConstructor) {
  return class CoreEvaluator extends Base {
    override async evaluateExpression(
      node: ExpressionNode
    ): Promise<SkiffValue> {
      this.checkAborted(node);

      switch (node.type) {
        case 'SequenceLiteral':
          return this.evaluateSequenceLiteral(node);
        case 'NumberLiteral':
        case 'StringLiteral':
        case 'BoolLiteral':
        case 'NoneLiteral':
          return this.evaluateLiteral(node);
        case 'Identifier':
          return this.evaluateIdentifier(node);
        case 'Call':
          return this.evaluateCall(node);
        case 'Subscript':
          return this.evaluateSubscript(node);
        case 'Unary':
          return this.evaluateUnary(node);
        default:
          return unreachableNode(node);
      }
    }

    override async executeStatement(node: StatementNode): Promise<SkiffValue> {
      this.checkAborted(node);

      switch (node.type) {
        case 'ExpressionStatement':
          return this.evaluateExpression(node.expression);
        case 'Assignment':
          return this.evaluateAssignment(node);
        default:
          return unreachableNode(node);
      }
    }
  };
}
