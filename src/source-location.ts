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

/** Order two locations by line, then column */
export function compareLocations(a: SourceLocation, b: SourceLocation): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.column - b.column;
}
