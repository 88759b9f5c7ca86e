// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

const SYNTHETIC_LOCATION: SourceLocation = { line: 0, column: 0, offset: 0 };

/**
 * Span given to nodes built by a host or a rewrite pass rather than parsed.
 * Line 0 never occurs in parsed source.
 */
export const SYNTHETIC_SPAN: SourceSpan = {
  start: SYNTHETIC_LOCATION,
  end: SYNTHETIC_LOCATION,
};

export function isSyntheticSpan(span: SourceSpan): boolean {
  return span.start.line === 0;
}
