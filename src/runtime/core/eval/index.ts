/**
 * Evaluator
 *
 * @internal
 */

export { Evaluator, getEvaluator } from './evaluator.js';
export { EvaluatorBase } from './base.js';
export type { EvaluatorConstructor } from './types.js';
