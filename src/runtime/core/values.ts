/**
 * Skiff Value Types and Utilities
 *
 * Core value types that flow through Skiff programs.
 * Public API for host applications.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError } from '../../types.js';
import { quoteString } from '../../printer/quote.js';

/** Any value that can flow through Skiff; `null` is None */
export type SkiffValue =
  | string
  | number
  | boolean
  | null
  | SkiffList
  | SkiffTuple;

export type SkiffTypeName =
  | 'NoneType'
  | 'bool'
  | 'number'
  | 'string'
  | 'list'
  | 'tuple';

// ============================================================
// MUTABILITY
// ============================================================

/**
 * Ownership domain for mutable values.
 *
 * Each runtime context owns one. Lists created while evaluating in that
 * context point back at it, and refuse mutation once it is frozen.
 */
export class Mutability {
  private frozen = false;

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** One-way: there is no thaw */
  freeze(): void {
    this.frozen = true;
  }
}

// ============================================================
// SEQUENCES
// ============================================================

/** Read access shared by lists and tuples */
export interface SequenceValue extends Iterable<SkiffValue> {
  readonly kind: 'list' | 'tuple';
  readonly length: number;
  /** Element at `index`; negative indexes count from the end */
  get(index: number): SkiffValue | undefined;
  /** Fresh array of the elements */
  toArray(): SkiffValue[];
}

function normalizeIndex(index: number, length: number): number | undefined {
  if (!Number.isInteger(index)) return undefined;
  const resolved = index < 0 ? length + index : index;
  return resolved >= 0 && resolved < length ? resolved : undefined;
}

/**
 * Mutable, resizable list.
 *
 * Aliases share one instance, so a mutation through any reference is
 * visible through all of them.
 */
export class SkiffList implements SequenceValue {
  readonly kind = 'list' as const;
  private readonly items: SkiffValue[];

  constructor(
    items: Iterable<SkiffValue>,
    readonly mutability: Mutability
  ) {
    this.items = [...items];
  }

  get length(): number {
    return this.items.length;
  }

  get isFrozen(): boolean {
    return this.mutability.isFrozen;
  }

  get(index: number): SkiffValue | undefined {
    const resolved = normalizeIndex(index, this.items.length);
    return resolved === undefined ? undefined : this.items[resolved];
  }

  toArray(): SkiffValue[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<SkiffValue> {
    return this.items[Symbol.iterator]();
  }

  append(value: SkiffValue, location?: SourceLocation): void {
    this.checkMutable(location);
    this.items.push(value);
  }

  extend(values: Iterable<SkiffValue>, location?: SourceLocation): void {
    this.checkMutable(location);
    // Snapshot first: extending a list with itself must not loop
    this.items.push(...[...values]);
  }

  set(index: number, value: SkiffValue, location?: SourceLocation): void {
    this.checkMutable(location);
    const resolved = this.requireIndex(index, location);
    this.items[resolved] = value;
  }

  /** Remove and return the element at `index` (default: last) */
  pop(index = -1, location?: SourceLocation): SkiffValue {
    this.checkMutable(location);
    const resolved = this.requireIndex(index, location);
    const [removed] = this.items.splice(resolved, 1);
    return removed ?? null;
  }

  private checkMutable(location?: SourceLocation): void {
    if (this.mutability.isFrozen) {
      throw new RuntimeError(
        'SKIFF-R006',
        'Cannot mutate frozen list',
        location,
        { type: 'list' }
      );
    }
  }

  private requireIndex(index: number, location?: SourceLocation): number {
    const resolved = normalizeIndex(index, this.items.length);
    if (resolved === undefined) {
      throw indexError(index, this, location);
    }
    return resolved;
  }
}

/**
 * Immutable, fixed-size tuple. Safe to share without copying.
 */
export class SkiffTuple implements SequenceValue {
  readonly kind = 'tuple' as const;

  private constructor(private readonly items: readonly SkiffValue[]) {}

  /**
   * Take ownership of `buffer` without copying. The caller must not
   * touch the buffer afterwards; it is frozen in place.
   */
  static adopt(buffer: SkiffValue[]): SkiffTuple {
    return new SkiffTuple(Object.freeze(buffer));
  }

  static of(...values: SkiffValue[]): SkiffTuple {
    return SkiffTuple.adopt(values);
  }

  static copyOf(values: Iterable<SkiffValue>): SkiffTuple {
    return SkiffTuple.adopt([...values]);
  }

  get length(): number {
    return this.items.length;
  }

  get(index: number): SkiffValue | undefined {
    const resolved = normalizeIndex(index, this.items.length);
    return resolved === undefined ? undefined : this.items[resolved];
  }

  toArray(): SkiffValue[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<SkiffValue> {
    return this.items[Symbol.iterator]();
  }
}

/** Error for an index outside a sequence */
export function indexError(
  index: number,
  sequence: SequenceValue,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    'SKIFF-R007',
    `Index ${index} out of range for ${sequence.kind} of length ${sequence.length}`,
    location,
    { index, type: sequence.kind, length: sequence.length }
  );
}

// ============================================================
// TYPE GUARDS
// ============================================================

export function isList(value: SkiffValue): value is SkiffList {
  return value instanceof SkiffList;
}

export function isTuple(value: SkiffValue): value is SkiffTuple {
  return value instanceof SkiffTuple;
}

export function isSequence(value: SkiffValue): value is SkiffList | SkiffTuple {
  return isList(value) || isTuple(value);
}

/** Infer the Skiff type name of a runtime value */
export function typeName(value: SkiffValue): SkiffTypeName {
  if (value === null) return 'NoneType';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  return value.kind;
}

/** Truthiness: None, False, 0, "" and empty sequences are false */
export function isTruthy(value: SkiffValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  return value.length > 0;
}

// ============================================================
// FORMATTING AND EQUALITY
// ============================================================

/**
 * Source-like representation of a value.
 * A list that contains itself prints the inner reference as `[...]`.
 */
export function formatValue(value: SkiffValue): string {
  return formatWithSeen(value, new Set());
}

function formatWithSeen(value: SkiffValue, seen: Set<SequenceValue>): string {
  if (value === null) return 'None';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return quoteString(value);

  const tuple = value.kind === 'tuple';
  if (seen.has(value)) return tuple ? '(...)' : '[...]';

  seen.add(value);
  const parts = value.toArray().map((item) => formatWithSeen(item, seen));
  seen.delete(value);

  if (tuple) {
    return parts.length === 1 ? `(${parts[0]},)` : `(${parts.join(', ')})`;
  }
  return `[${parts.join(', ')}]`;
}

/**
 * Structural equality. Lists equal lists and tuples equal tuples with
 * equal elements; a list never equals a tuple. A pair met again while
 * it is still being compared counts as equal, so self-containing lists
 * compare by shape.
 */
export function deepEquals(a: SkiffValue, b: SkiffValue): boolean {
  return equalsWithSeen(a, b, new Map());
}

function equalsWithSeen(
  a: SkiffValue,
  b: SkiffValue,
  comparing: Map<SequenceValue, Set<SequenceValue>>
): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return false;
  if (a.kind !== b.kind || a.length !== b.length) return false;

  let partners = comparing.get(a);
  if (partners?.has(b)) return true;
  if (!partners) {
    partners = new Set();
    comparing.set(a, partners);
  }
  partners.add(b);

  const left = a.toArray();
  const right = b.toArray();
  const equal = left.every((item, i) => {
    const other = right[i];
    return other !== undefined && equalsWithSeen(item, other, comparing);
  });

  partners.delete(b);
  return equal;
}
