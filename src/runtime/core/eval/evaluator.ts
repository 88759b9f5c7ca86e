/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Shared utilities and entry-point stubs
 * 2. CoreMixin - Expression and statement dispatch
 * 3. LiteralsMixin - List, tuple and scalar literals
 * 4. VariablesMixin - Name lookup and assignment
 * 5. CallsMixin - Builtin and host function calls
 * 6. ExpressionsMixin - Unary operators and subscripts
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { CoreMixin } from './mixins/core.js';
import { LiteralsMixin } from './mixins/literals.js';
import { VariablesMixin } from './mixins/variables.js';
import { CallsMixin } from './mixins/calls.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import type { RuntimeContext } from '../types.js';

export class Evaluator extends ExpressionsMixin(
  CallsMixin(VariablesMixin(LiteralsMixin(CoreMixin(EvaluatorBase))))
) {}

/**
 * Evaluator instances per context. Entries go away with their context.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create the evaluator for a given RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
