/**
 * Built-in Functions
 *
 * Minimal set of built-in operations. Host applications provide
 * domain-specific functions via RuntimeOptions.functions.
 *
 * @internal - Not part of public API
 */

import type { SourceLocation } from '../../types.js';
import type { CallableFn } from '../core/callable.js';
import { argumentTypeError, expectArity } from '../core/callable.js';
import {
  isList,
  isSequence,
  SkiffList,
  SkiffTuple,
  type SkiffValue,
} from '../core/values.js';

/** Elements of a sequence or characters of a string, for conversions */
function iterableOf(
  name: string,
  value: SkiffValue,
  location?: SourceLocation
): Iterable<SkiffValue> {
  if (isSequence(value)) return value;
  if (typeof value === 'string') return [...value];
  throw argumentTypeError(name, 'a list, tuple or string', value, location);
}

export const BUILTIN_FUNCTIONS: Record<string, CallableFn> = {
  /** Number of elements in a sequence, or characters in a string */
  len: (args, _ctx, location) => {
    expectArity('len', args, 1, location);
    const value = args[0] ?? null;
    if (isSequence(value) || typeof value === 'string') {
      return value.length;
    }
    throw argumentTypeError('len', 'a list, tuple or string', value, location);
  },

  /** Append in place; every alias of the list sees the new element */
  append: (args, _ctx, location) => {
    expectArity('append', args, 2, location);
    const target = args[0] ?? null;
    if (!isList(target)) {
      throw argumentTypeError('append', 'a list', target, location);
    }
    target.append(args[1] ?? null, location);
    return null;
  },

  /** Append every element of a sequence in place */
  extend: (args, _ctx, location) => {
    expectArity('extend', args, 2, location);
    const target = args[0] ?? null;
    if (!isList(target)) {
      throw argumentTypeError('extend', 'a list', target, location);
    }
    target.extend(iterableOf('extend', args[1] ?? null, location), location);
    return null;
  },

  /** New list owned by the current context; `list()` is empty */
  list: (args, ctx, location) => {
    if (args.length === 0) return new SkiffList([], ctx.mutability);
    expectArity('list', args, 1, location);
    return new SkiffList(
      iterableOf('list', args[0] ?? null, location),
      ctx.mutability
    );
  },

  /** Tuple of the elements; a tuple argument is returned as is */
  tuple: (args, _ctx, location) => {
    if (args.length === 0) return SkiffTuple.of();
    expectArity('tuple', args, 1, location);
    const value = args[0] ?? null;
    if (value instanceof SkiffTuple) return value;
    return SkiffTuple.copyOf(iterableOf('tuple', value, location));
  },

  /** Log a value through onLog and return None */
  print: (args, ctx) => {
    for (const value of args) {
      ctx.callbacks.onLog(value);
    }
    return null;
  },
};
