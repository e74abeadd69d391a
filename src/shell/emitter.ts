/**
 * Output Emitter
 *
 * Builds rendered shell text from logical lines. A logical line owns its
 * indentation depth and the here-document bodies that must follow it.
 */

export const INDENT_UNIT = "    ";

export interface HeredocText {
  /** Body as written, every line ending in a newline */
  content: string;
  delimiter: string;
}

export interface Line {
  depth: number;
  text: string;
  heredocs: HeredocText[];
}

// =============================================================================
// Line helpers
// =============================================================================

export function line(depth: number, text: string, heredocs: HeredocText[] = []): Line {
  return { depth, text, heredocs };
}

/** Glue `right` onto the end of `left` with `separator` in between */
export function joinLines(left: Line[], separator: string, right: Line[]): Line[] {
  const last = left[left.length - 1];
  const first = right[0];
  if (!last) return right;
  if (!first) return left;

  const merged: Line = {
    depth: last.depth,
    text: last.text + separator + first.text,
    heredocs: [...last.heredocs, ...first.heredocs],
  };
  return [...left.slice(0, -1), merged, ...right.slice(1)];
}

export function prefixLines(prefix: string, lines: Line[]): Line[] {
  const [first, ...rest] = lines;
  if (!first) return lines;
  return [{ ...first, text: prefix + first.text }, ...rest];
}

export function suffixLines(lines: Line[], suffix: string, heredocs: HeredocText[] = []): Line[] {
  const last = lines[lines.length - 1];
  if (!last) return lines;
  return [...lines.slice(0, -1), { ...last, text: last.text + suffix, heredocs: [...last.heredocs, ...heredocs] }];
}

export function hasHeredocs(lines: readonly Line[]): boolean {
  return lines.some((entry) => entry.heredocs.length > 0);
}

// =============================================================================
// Output Emitter
// =============================================================================

export class OutputEmitter {
  private readonly lines: string[] = [];

  constructor(private readonly indentUnit = INDENT_UNIT) {}

  /** Emit a logical line with its indentation, followed by its here-documents */
  emit(entry: Line): void {
    if (entry.text === "") {
      this.lines.push("");
    } else {
      this.lines.push(this.indentUnit.repeat(entry.depth) + entry.text);
    }
    for (const heredoc of entry.heredocs) {
      this.emitRaw(heredoc.content + heredoc.delimiter);
    }
  }

  emitLines(entries: readonly Line[]): void {
    for (const entry of entries) {
      this.emit(entry);
    }
  }

  /** Emit raw text without indentation */
  emitRaw(text: string): void {
    this.lines.push(text);
  }

  emitBlank(): void {
    this.lines.push("");
  }

  getLines(): string[] {
    return [...this.lines];
  }

  /** Rendered text; non-empty output always ends in a newline */
  toString(): string {
    return this.lines.length === 0 ? "" : this.lines.join("\n") + "\n";
  }
}
