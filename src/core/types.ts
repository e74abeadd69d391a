/**
 * Core type definitions shared by every pipeline stage
 */

// ============================================================================
// Source Positions
// ============================================================================

export interface Position {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
  /** 0-based character offset */
  offset: number;
}

/**
 * Source range attached to every syntax node and diagnostic.
 */
export interface Span {
  start: Position;
  end: Position;
}

export function span(start: Position, end: Position): Span {
  return { start: { ...start }, end: { ...end } };
}

/** A span for a single line, used by the line-oriented dialects. */
export function lineSpan(line: number, length: number, offset = 0): Span {
  return {
    start: { line, column: 1, offset },
    end: { line, column: length + 1, offset: offset + length },
  };
}

export function formatSpan(s: Span): string {
  return `${s.start.line}:${s.start.column}`;
}

/** Orders spans by start line, then start column. */
export function compareSpans(a: Span, b: Span): number {
  return a.start.line - b.start.line || a.start.column - b.start.column;
}

// ============================================================================
// Dialects and Issue Taxonomy
// ============================================================================

export type Dialect = "shell" | "makefile" | "dockerfile";

export const ISSUE_CATEGORIES = [
  "determinism",
  "idempotency",
  "security",
  "portability",
  "parallel-safety",
  "performance",
  "error-handling",
  "reproducibility",
] as const;

export type IssueCategory = typeof ISSUE_CATEGORIES[number];

export type Severity = "error" | "warning" | "info" | "hint";

/**
 * Position reached after reading `count` characters of `text` from `origin`.
 */
export function advancePosition(origin: Position, text: string, count = text.length): Position {
  let line = origin.line;
  let column = origin.column;
  const end = Math.min(count, text.length);
  for (let i = 0; i < end; i++) {
    if (text[i] === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { line, column, offset: origin.offset + end };
}

export const START_POSITION: Position = { line: 1, column: 1, offset: 0 };
