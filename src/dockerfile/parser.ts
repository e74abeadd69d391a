/**
 * Dockerfile Parser
 *
 * Parser directives are only recognized above the first instruction or
 * comment. Lines ending in the escape character continue onto the next
 * one; comment lines inside a continuation are dropped, as Docker does.
 */

import { parseError } from "../core/errors.ts";
import { IdGenerator } from "../core/node-id.ts";
import type { Position, Span } from "../core/types.ts";
import type * as AST from "./ast.ts";

export interface DockerfileParserOptions {
  source?: string;
  ids?: IdGenerator;
}

/** Instructions that may legally appear with nothing after the keyword */
const BARE_KEYWORDS: ReadonlySet<string> = new Set(["HEALTHCHECK"]);

const KNOWN_KEYWORDS: ReadonlySet<string> = new Set([
  "ADD",
  "ARG",
  "CMD",
  "COPY",
  "ENTRYPOINT",
  "ENV",
  "EXPOSE",
  "FROM",
  "HEALTHCHECK",
  "LABEL",
  "MAINTAINER",
  "ONBUILD",
  "RUN",
  "SHELL",
  "STOPSIGNAL",
  "USER",
  "VOLUME",
  "WORKDIR",
]);

const DIRECTIVE = /^#\s*([A-Za-z]+)\s*=\s*(\S+)\s*$/;

const INSTRUCTION = /^([A-Za-z]+)(?:\s+(.*))?$/;

// =============================================================================
// Parser Class
// =============================================================================

export class DockerfileParser {
  private readonly lines: string[];
  private readonly lineOffsets: number[];
  private readonly ids: IdGenerator;
  private escape = "\\";
  private pos = 0;

  constructor(input: string, private readonly options: DockerfileParserOptions = {}) {
    this.lines = input.split("\n").map((line) => line.replace(/\r$/, ""));
    if (this.lines[this.lines.length - 1] === "") this.lines.pop();
    this.ids = options.ids ?? new IdGenerator();

    this.lineOffsets = [];
    let offset = 0;
    for (const line of this.lines) {
      this.lineOffsets.push(offset);
      offset += line.length + 1;
    }
  }

  parse(): AST.Dockerfile {
    const started = performance.now();
    const items: AST.DockerItem[] = [];
    let directivesAllowed = true;
    let blankLines = 0;

    while (this.pos < this.lines.length) {
      const text = this.lines[this.pos] ?? "";
      const trimmed = text.trim();

      if (trimmed === "") {
        blankLines++;
        this.pos++;
        continue;
      }

      let item: AST.DockerItem;
      const directive = directivesAllowed ? trimmed.match(DIRECTIVE) : null;
      if (directive?.[1] && directive[2]) {
        item = this.directive(directive[1].toLowerCase(), directive[2]);
      } else if (trimmed.startsWith("#")) {
        directivesAllowed = false;
        item = {
          type: "Comment",
          span: this.spanOf(this.pos, this.pos),
          id: this.ids.next(),
          text: trimmed.slice(1),
        };
        this.pos++;
      } else {
        directivesAllowed = false;
        item = this.instruction();
      }

      if (blankLines > 0) item.blankLinesBefore = blankLines;
      blankLines = 0;
      items.push(item);
    }

    return {
      type: "Dockerfile",
      items,
      metadata: {
        source: this.options.source,
        lineCount: this.lines.length,
        parseDurationMs: performance.now() - started,
        escape: this.escape,
      },
    };
  }

  private directive(name: string, value: string): AST.ParserDirective {
    if (name === "escape") {
      if (value !== "\\" && value !== "`") {
        throw parseError(`invalid escape character '${value}'`, this.spanOf(this.pos, this.pos), {
          file: this.options.source,
          expected: "'\\' or '`'",
        });
      }
      this.escape = value;
    }
    const item: AST.ParserDirective = {
      type: "ParserDirective",
      span: this.spanOf(this.pos, this.pos),
      id: this.ids.next(),
      name,
      value,
    };
    this.pos++;
    return item;
  }

  // ===========================================================================
  // Instructions
  // ===========================================================================

  private instruction(): AST.Instruction {
    const first = this.pos;
    const physical: string[] = [];
    let text = "";

    while (this.pos < this.lines.length) {
      const line = this.lines[this.pos] ?? "";
      this.pos++;

      if (physical.length > 0 && line.trim().startsWith("#")) {
        physical.push(line);
        continue;
      }
      physical.push(line);

      const piece = line.trim();
      const continued = this.endsWithEscape(piece);
      const body = continued ? piece.slice(0, -1).trimEnd() : piece;
      text = text === "" ? body : body === "" ? text : `${text} ${body}`;
      if (!continued) break;
    }

    const last = this.pos - 1;
    const span = this.spanOf(first, last);
    const match = text.match(INSTRUCTION);
    const keywordText = match?.[1];
    if (!match || !keywordText) {
      throw parseError(`invalid instruction '${text}'`, span, {
        file: this.options.source,
        expected: "an instruction keyword such as FROM or RUN",
      });
    }

    const keyword = keywordText.toUpperCase();
    const { flags, rest } = splitFlags(match[2] ?? "");

    if (rest === "" && KNOWN_KEYWORDS.has(keyword) && !BARE_KEYWORDS.has(keyword)) {
      throw parseError(`${keyword} requires at least one argument`, span, {
        file: this.options.source,
        expected: `arguments after ${keyword}`,
      });
    }

    const instruction: AST.Instruction = {
      type: "Instruction",
      span,
      id: this.ids.next(),
      keyword,
      keywordText,
      flags,
      arguments: rest,
    };
    if (physical.length > 1) instruction.continuationLines = physical;
    return instruction;
  }

  private endsWithEscape(text: string): boolean {
    return text.endsWith(this.escape);
  }

  private spanOf(firstLine: number, lastLine: number): Span {
    const start: Position = { line: firstLine + 1, column: 1, offset: this.lineOffsets[firstLine] ?? 0 };
    const lastText = this.lines[lastLine] ?? "";
    const end: Position = {
      line: lastLine + 1,
      column: lastText.length + 1,
      offset: (this.lineOffsets[lastLine] ?? 0) + lastText.length,
    };
    return { start, end };
  }
}

/** Leading `--flag` / `--flag=value` words */
export function splitFlags(text: string): { flags: string[]; rest: string } {
  const flags: string[] = [];
  let rest = text.trim();
  while (rest.startsWith("--")) {
    const end = rest.search(/\s/);
    if (end === -1) {
      flags.push(rest);
      rest = "";
      break;
    }
    flags.push(rest.slice(0, end));
    rest = rest.slice(end).trimStart();
  }
  return { flags, rest };
}

// =============================================================================
// Convenience Function
// =============================================================================

export function parseDockerfile(input: string, options: DockerfileParserOptions = {}): AST.Dockerfile {
  return new DockerfileParser(input, options).parse();
}
