/**
 * CallsMixin: Function Invocation
 *
 * Calls builtins and host functions by name. Arguments are evaluated
 * left to right before the call.
 *
 * Error Handling:
 * - Unknown function throws RuntimeError(SKIFF-R003)
 * - Slow host functions throw TimeoutError(SKIFF-R008) when a timeout is set
 * - An abort during a pending call throws AbortError(SKIFF-R005)
 *
 * @internal
 */

import type { CallNode } from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import type { SkiffValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

/**
 * CallsMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: ctx, getNodeLocation(), withTimeout(), withAbort()
 * - CoreMixin: evaluateExpression()
 */
export function CallsMixin(Base: EvaluatorConstructor) {
  return class CallsEvaluator extends Base {
    protected override async evaluateCall(node: CallNode): Promise<SkiffValue> {
      const fn = this.ctx.functions.get(node.callee);
      if (!fn) {
        throw RuntimeError.fromNode(
          'SKIFF-R003',
          `Function ${node.callee} is not defined`,
          node,
          { name: node.callee }
        );
      }

      const args: SkiffValue[] = [];
      for (const arg of node.args) {
        args.push(await this.evaluateExpression(arg));
      }

      this.ctx.observability.onHostCall?.({ name: node.callee, args });

      const startTime = Date.now();
      const result = fn(args, this.ctx, this.getNodeLocation(node));
      const value =
        result instanceof Promise
          ? await this.withAbort(
              this.withTimeout(result, this.ctx.timeout, node.callee, node),
              node
            )
          : result;

      this.ctx.observability.onFunctionReturn?.({
        name: node.callee,
        value,
        durationMs: Date.now() - startTime,
      });

      return value;
    }
  };
}
