/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and context access for all mixins.
 *
 * @internal
 */

import type {
  ASTNode,
  AssignmentNode,
  CallNode,
  ExpressionNode,
  IdentifierNode,
  LiteralNode,
  SequenceLiteralNode,
  SourceLocation,
  StatementNode,
  SubscriptNode,
  UnaryNode,
} from '../../../types.js';
import { AbortError, isSyntheticSpan, TimeoutError } from '../../../types.js';
import type { RuntimeContext } from '../types.js';
import type { SkiffValue } from '../values.js';

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins, plus the entry points
 * each mixin fills in. The stubs throw until the full composition is
 * in place.
 */
export class EvaluatorBase {
  constructor(readonly ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Synthetic spans (trees built by hosts) have no location.
   */
  protected getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    if (!node || isSyntheticSpan(node.span)) return undefined;
    return node.span.start;
  }

  /**
   * Check if execution has been aborted via AbortSignal.
   * Throws AbortError if signal is aborted.
   */
  protected checkAborted(node?: ASTNode): void {
    if (this.ctx.signal?.aborted) {
      throw new AbortError(this.getNodeLocation(node));
    }
  }

  /**
   * Wrap a promise with a timeout.
   * Returns original promise if no timeout configured.
   */
  protected async withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number | undefined,
    functionName: string,
    node?: ASTNode
  ): Promise<T> {
    if (timeoutMs === undefined) {
      return promise;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      return await Promise.race([
        promise,
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            reject(
              new TimeoutError(
                functionName,
                timeoutMs,
                this.getNodeLocation(node)
              )
            );
          }, timeoutMs);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Reject with AbortError as soon as the signal fires, even while a
   * host function is still pending.
   */
  protected async withAbort<T>(promise: Promise<T>, node?: ASTNode): Promise<T> {
    const signal = this.ctx.signal;
    if (!signal) {
      return promise;
    }

    let onAbort: (() => void) | undefined;
    try {
      return await Promise.race([
        promise,
        new Promise<never>((_, reject) => {
          onAbort = () => reject(new AbortError(this.getNodeLocation(node)));
          // Host functions may abort before returning their promise
          if (signal.aborted) {
            onAbort();
            return;
          }
          signal.addEventListener('abort', onAbort, { once: true });
        }),
      ]);
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }
  }

  // ============================================================
  // MIXIN ENTRY POINTS
  // ============================================================

  /** Evaluate any expression node (CoreMixin) */
  evaluateExpression(_node: ExpressionNode): Promise<SkiffValue> {
    return this.requireComposition('evaluateExpression');
  }

  /** Execute one statement, returning its value (CoreMixin) */
  executeStatement(_node: StatementNode): Promise<SkiffValue> {
    return this.requireComposition('executeStatement');
  }

  /** LiteralsMixin */
  protected evaluateSequenceLiteral(
    _node: SequenceLiteralNode
  ): Promise<SkiffValue> {
    return this.requireComposition('evaluateSequenceLiteral');
  }

  /** LiteralsMixin */
  protected evaluateLiteral(_node: LiteralNode): SkiffValue {
    throw new Error(
      'evaluateLiteral requires full Evaluator composition with LiteralsMixin'
    );
  }

  /** VariablesMixin */
  protected evaluateIdentifier(_node: IdentifierNode): SkiffValue {
    throw new Error(
      'evaluateIdentifier requires full Evaluator composition with VariablesMixin'
    );
  }

  /** VariablesMixin */
  protected evaluateAssignment(_node: AssignmentNode): Promise<SkiffValue> {
    return this.requireComposition('evaluateAssignment');
  }

  /** CallsMixin */
  protected evaluateCall(_node: CallNode): Promise<SkiffValue> {
    return this.requireComposition('evaluateCall');
  }

  /** ExpressionsMixin */
  protected evaluateSubscript(_node: SubscriptNode): Promise<SkiffValue> {
    return this.requireComposition('evaluateSubscript');
  }

  /** ExpressionsMixin */
  protected evaluateUnary(_node: UnaryNode): Promise<SkiffValue> {
    return this.requireComposition('evaluateUnary');
  }

  private requireComposition(method: string): Promise<never> {
    return Promise.reject(
      new Error(`${method} requires full Evaluator composition`)
    );
  }
}
