// ============================================================
// SOURCE LOCATION
// ============================================================

/** 1-based line and column, 0-based offset into the template source. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Render a location as `line:column`. */
export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}
