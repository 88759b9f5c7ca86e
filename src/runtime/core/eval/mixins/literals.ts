/**
 * LiteralsMixin: Sequence and Scalar Literal Evaluation
 *
 * List and tuple displays evaluate their elements strictly left to right
 * into a fresh buffer. Each evaluation produces a distinct value.
 *
 * Error Handling:
 * - Empty element slot throws RuntimeError(SKIFF-R001)
 * - Element evaluation errors (including AbortError) propagate unchanged
 *
 * @internal
 */

import type {
  LiteralNode,
  SequenceLiteralNode,
} from '../../../../types.js';
import { RuntimeError } from '../../../../types.js';
import { toDiagnosticString } from '../../../../printer/pretty-print.js';
import type { SkiffValue } from '../../values.js';
import { SkiffList, SkiffTuple } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

/**
 * LiteralsMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: ctx, checkAborted()
 * - CoreMixin: evaluateExpression()
 */
export function LiteralsMixin(Base: EvaluatorConstructor) {
  return class LiteralsEvaluator extends Base {
    protected override async evaluateSequenceLiteral(
      node: SequenceLiteralNode
    ): Promise<SkiffValue> {
      const count = node.elements.length;
      const buffer: SkiffValue[] = new Array<SkiffValue>(count);

      for (let i = 0; i < count; i++) {
        this.checkAborted(node);

        // Host-built trees may leave holes; parsed trees never do
        const element = node.elements[i];
        if (element === undefined || element === null) {
          const literal = toDiagnosticString(node, this.ctx.diagnostics);
          throw RuntimeError.fromNode(
            'SKIFF-R001',
            `Missing element expression in ${literal}`,
            node,
            { literal, index: i }
          );
        }

        buffer[i] = await this.evaluateExpression(element);
      }

      if (node.kind === 'tuple') {
        return SkiffTuple.adopt(buffer);
      }
      return new SkiffList(buffer, this.ctx.mutability);
    }

    protected override evaluateLiteral(node: LiteralNode): SkiffValue {
      switch (node.type) {
        case 'NumberLiteral':
        case 'StringLiteral':
        case 'BoolLiteral':
          return node.value;
        case 'NoneLiteral':
          return null;
      }
    }
  };
}
