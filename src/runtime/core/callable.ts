/**
 * Host Function Types
 *
 * Functions the host exposes to scripts, and the builtins, share one
 * calling convention: evaluated arguments in, a value (or promise) out.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import type { RuntimeContext } from './types.js';
import type { SkiffValue } from './values.js';
import { typeName } from './values.js';

/**
 * Host function signature.
 * `location` points at the call site, for errors raised by the function.
 */
export type CallableFn = (
  args: SkiffValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => SkiffValue | Promise<SkiffValue>;

/**
 * Check argument count for a function with fixed arity.
 * @throws RuntimeError SKIFF-R004 on mismatch
 */
export function expectArity(
  name: string,
  args: SkiffValue[],
  arity: number,
  location?: SourceLocation
): void {
  if (args.length !== arity) {
    throw new RuntimeError(
      'SKIFF-R004',
      `${name}() takes ${arity} argument${arity === 1 ? '' : 's'} (${args.length} given)`,
      location,
      { function: name, expected: arity, actual: args.length }
    );
  }
}

/** Error for an argument of the wrong type */
export function argumentTypeError(
  name: string,
  expected: string,
  actual: SkiffValue,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    'SKIFF-R004',
    `${name}() expects ${expected}, got ${typeName(actual)}`,
    location,
    { function: name, expected, actual: typeName(actual) }
  );
}
