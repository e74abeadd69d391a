/**
 * Purifier error types with actionable messages
 */

import type { Span } from "./types.ts";

export type ErrorCode =
  | "PARSE_ERROR"
  | "CONFIG_ERROR"
  | "INVARIANT_VIOLATION"
  | "UNSUPPORTED_DIALECT";

export interface ErrorDetails {
  file?: string;
  line?: number;
  column?: number;
  expected?: string;
  context?: string;
  dialect?: string;
  issues?: string[];
}

export class PurifyError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = "PurifyError";
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Fatal syntax error. Purification never proceeds on input that raised one.
 */
export class ParseError extends PurifyError {
  readonly file: string;
  readonly reason: string;
  readonly line: number;
  readonly column: number;
  readonly expected: string;
  readonly context?: string;

  constructor(
    message: string,
    location: { line: number; column: number },
    options: { file?: string; expected?: string; context?: string } = {},
  ) {
    const file = options.file ?? "<input>";
    const expected = options.expected ?? message;
    const text = `Parse error at ${file}:${location.line}:${location.column}: ${message}` +
      (options.context ? `\n  ${options.context}` : "");
    super(
      "PARSE_ERROR",
      text,
      {
        file,
        line: location.line,
        column: location.column,
        expected,
        context: options.context,
      },
    );
    this.name = "ParseError";
    this.file = file;
    this.reason = message;
    this.line = location.line;
    this.column = location.column;
    this.expected = expected;
    this.context = options.context;
  }

  /** Returns a copy attributed to the given file name. */
  withFile(file: string): ParseError {
    return new ParseError(this.reason, { line: this.line, column: this.column }, {
      file,
      expected: this.expected,
      context: this.context,
    });
  }
}

// Factory functions for common errors

export function parseError(
  message: string,
  at: Span | { line: number; column: number },
  options?: { file?: string; expected?: string; context?: string },
): ParseError {
  const location = "start" in at ? at.start : at;
  return new ParseError(message, { line: location.line, column: location.column }, options);
}

export function configError(message: string, issues?: string[]): PurifyError {
  return new PurifyError(
    "CONFIG_ERROR",
    message,
    issues ? { issues } : undefined,
    "Check the option names and value types passed to purify()",
  );
}

export function invariantViolation(message: string): PurifyError {
  return new PurifyError(
    "INVARIANT_VIOLATION",
    `Invariant violated: ${message}`,
    undefined,
    "This is a defect in the purifier; please report it with the input that triggered it",
  );
}

export function unsupportedDialect(dialect: string): PurifyError {
  return new PurifyError(
    "UNSUPPORTED_DIALECT",
    `Unsupported dialect '${dialect}'`,
    { dialect },
    "Use one of: shell, makefile, dockerfile",
  );
}
