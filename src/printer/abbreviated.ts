/**
 * Abbreviated List Printing
 *
 * Single-line summaries of sequences for error messages, where printing
 * every element of a long literal would bury the message.
 */

// ============================================================
// LIMITS
// ============================================================

/** Truncation thresholds for diagnostic summaries */
export interface DiagnosticLimits {
  /** Most elements listed before the ellipsis marker */
  readonly maxElements: number;
  /** Most characters in the whole summary, brackets included */
  readonly maxLength: number;
}

export const DEFAULT_DIAGNOSTIC_LIMITS: DiagnosticLimits = {
  maxElements: 4,
  maxLength: 32,
};

/** Marker appended in place of the elements left out */
export const ELLIPSIS = '...';

// ============================================================
// FORMATTER
// ============================================================

/**
 * Render already-printed elements as `[a, b]` or `(a, b)`, truncating
 * to at most `maxElements` items and `maxLength` characters.
 *
 * Truncated output ends with `...` as its final item: `[1, 2, 3, 4, ...]`.
 * The summary never shrinks below `[...]`, so a `maxLength` under five
 * characters cannot be met once truncation starts. A one-element tuple
 * keeps its trailing comma only when nothing was cut.
 *
 * @example
 * printAbbreviatedList(['1', '2', '3', '4', '5', '6'], false, 4, 32)
 * // Returns: "[1, 2, 3, 4, ...]"
 */
export function printAbbreviatedList(
  items: readonly string[],
  isTuple: boolean,
  maxElements: number,
  maxLength: number
): string {
  const open = isTuple ? '(' : '[';
  const close = isTuple ? ')' : ']';

  const full = items.join(', ');
  const singletonComma = isTuple && items.length === 1 ? ',' : '';
  const untruncated = `${open}${full}${singletonComma}${close}`;
  if (items.length <= maxElements && untruncated.length <= maxLength) {
    return untruncated;
  }

  const kept = items.slice(0, Math.max(0, maxElements));
  const render = (): string =>
    `${open}${[...kept, ELLIPSIS].join(', ')}${close}`;

  let summary = render();
  while (summary.length > maxLength && kept.length > 0) {
    kept.pop();
    summary = render();
  }
  return summary;
}
