/**
 * Source location tracking for constraint text
 */

export interface Position {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column number */
  column: number;
  /** 0-indexed character offset */
  offset: number;
}

export interface SourceSpan {
  file: string;
  start: Position;
  end: Position;
}

export function position(line: number, column: number, offset: number): Position {
  return { line, column, offset };
}

export function span(file: string, start: Position, end: Position): SourceSpan {
  return { file, start, end };
}

export function formatSpan(s: SourceSpan): string {
  return `${s.file}:${s.start.line}:${s.start.column}`;
}
