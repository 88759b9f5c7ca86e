/**
 * Type Infrastructure for Evaluator Mixins
 *
 * Mixins receive a base constructor and return an extended constructor.
 *
 * @internal
 */

import type { EvaluatorBase } from './base.js';

/**
 * Constructor type for EvaluatorBase or any class extending it.
 *
 * `any[]` is required for constructor args because mixins don't know
 * what parameters the base constructor accepts. This is the standard
 * TypeScript mixin pattern.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> =
  new (...args: any[]) => TBase;
