/**
 * Word parser
 *
 * Splits the raw text of a word token into quoted and expanded parts.
 * Command substitution bodies are handed back to the statement parser
 * through `parseNested`, so `$(...)` contents become real statements.
 */

import type { IdGenerator } from "../core/node-id.ts";
import { advancePosition, type Position, type Span } from "../core/types.ts";
import { tryParseArithmetic } from "./arithmetic-parser.ts";
import type * as AST from "./ast.ts";
import {
  skipAnsiC,
  skipArithmetic,
  skipBacktick,
  skipCommandSubstitution,
  skipDoubleQuoted,
  skipParameter,
  skipSingleQuoted,
} from "./scan.ts";

export interface WordParserOptions {
  ids: IdGenerator;
  /** Parses the statements of a `$(...)`, backtick or process substitution body */
  parseNested: (source: string, origin: Position) => AST.Statement[];
}

/** Modifiers in match order: two-character forms first */
const PARAMETER_MODIFIERS: readonly AST.ParameterModifier[] = [
  ":-",
  ":=",
  ":?",
  ":+",
  "##",
  "%%",
  "^^",
  ",,",
  "//",
  "/#",
  "/%",
  "-",
  "=",
  "?",
  "+",
  "#",
  "%",
  "^",
  ",",
  "/",
  ":",
];

const SPECIAL_PARAMETERS = /^[@*#?$!\-0-9]/;

type Mode = "unquoted" | "double" | "heredoc";

export class WordParser {
  constructor(private readonly options: WordParserOptions) {}

  /**
   * Parse the raw text of one word.
   */
  parse(raw: string, origin: Position): AST.Word {
    const parts = this.parseParts(raw, origin, 0, raw.length, "unquoted");
    return {
      type: "Word",
      span: { start: origin, end: advancePosition(origin, raw) },
      id: this.options.ids.next(),
      parts,
    };
  }

  /**
   * Parse an unquoted here-document body: expansions are live, quotes are
   * plain characters.
   */
  parseHeredoc(content: string, origin: Position): AST.Word {
    const parts = this.parseParts(content, origin, 0, content.length, "heredoc").filter(isDoubleQuotedPart);
    return {
      type: "Word",
      span: { start: origin, end: advancePosition(origin, content) },
      id: this.options.ids.next(),
      parts,
    };
  }

  /**
   * Parse `${...}` text into a parameter expansion node.
   */
  parseParameter(text: string, origin: Position): AST.ParameterExpansion {
    const node: AST.ParameterExpansion = {
      type: "ParameterExpansion",
      span: { start: origin, end: advancePosition(origin, text) },
      id: this.options.ids.next(),
      parameter: "",
      braced: true,
      length: false,
      indirect: false,
      subscript: null,
      modifier: null,
      argument: null,
    };

    const content = text.slice(2, -1);
    let pos = 0;

    if (content[0] === "#" && content.length > 1 && /[A-Za-z_0-9@*]/.test(content[1] ?? "")) {
      node.length = true;
      pos = 1;
    } else if (content[0] === "!" && content.length > 1 && /[A-Za-z_]/.test(content[1] ?? "")) {
      node.indirect = true;
      pos = 1;
    }

    const name = content.slice(pos).match(/^(?:[A-Za-z_][A-Za-z0-9_]*|[0-9]+)/);
    if (name) {
      node.parameter = name[0];
      pos += name[0].length;
    } else if (SPECIAL_PARAMETERS.test(content.slice(pos))) {
      node.parameter = content[pos] ?? "";
      pos++;
    }

    if (content[pos] === "[" && node.parameter !== "") {
      let depth = 0;
      let i = pos;
      for (; i < content.length; i++) {
        if (content[i] === "[") depth++;
        else if (content[i] === "]" && --depth === 0) break;
      }
      if (i < content.length) {
        node.subscript = content.slice(pos + 1, i);
        pos = i + 1;
      }
    }

    const rest = content.slice(pos);
    if (rest === "") {
      if (node.parameter === "") node.parameter = content;
      return node;
    }

    const modifier = PARAMETER_MODIFIERS.find((m) => rest.startsWith(m));
    if (modifier === undefined || node.parameter === "") {
      // Outside the modeled forms; keep the text so it renders unchanged
      node.parameter = content;
      node.length = false;
      node.indirect = false;
      node.subscript = null;
      return node;
    }

    node.modifier = modifier;
    const argument = rest.slice(modifier.length);
    if (argument !== "") {
      const argStart = 2 + pos + modifier.length;
      node.argument = this.parse(argument, advancePosition(origin, text, argStart));
    }
    return node;
  }

  // ===========================================================================
  // Parts
  // ===========================================================================

  private parseParts(
    raw: string,
    origin: Position,
    from: number,
    to: number,
    mode: Mode,
  ): AST.WordPart[] {
    const parts: AST.WordPart[] = [];
    let literalStart = from;
    let i = from;

    const at = (index: number): Position => advancePosition(origin, raw, index);
    const spanOf = (start: number, end: number): Span => ({ start: at(start), end: at(end) });
    const flush = (end: number): void => {
      if (end > literalStart) {
        parts.push({
          type: "Literal",
          span: spanOf(literalStart, end),
          id: this.options.ids.next(),
          value: raw.slice(literalStart, end),
        });
      }
    };
    const push = (part: AST.WordPart, end: number): void => {
      parts.push(part);
      i = end;
      literalStart = end;
    };

    while (i < to) {
      const c = raw[i];

      if (c === "\\") {
        i += 2;
        continue;
      }

      if (mode === "unquoted" && c === "'") {
        const end = clamp(skipSingleQuoted(raw, i), to);
        flush(i);
        push({
          type: "SingleQuoted",
          span: spanOf(i, end),
          id: this.options.ids.next(),
          value: raw.slice(i + 1, end - 1),
        }, end);
        continue;
      }

      if (mode === "unquoted" && c === '"') {
        const end = clamp(skipDoubleQuoted(raw, i), to);
        flush(i);
        const inner = this.parseParts(raw, origin, i + 1, end - 1, "double").filter(isDoubleQuotedPart);
        push({
          type: "DoubleQuoted",
          span: spanOf(i, end),
          id: this.options.ids.next(),
          parts: inner,
        }, end);
        continue;
      }

      if (c === "`") {
        const end = clamp(skipBacktick(raw, i), to);
        flush(i);
        const body = raw.slice(i + 1, end - 1).replace(/\\([\\`$])/g, "$1");
        push({
          type: "CommandSubstitution",
          span: spanOf(i, end),
          id: this.options.ids.next(),
          body: this.options.parseNested(body, at(i + 1)),
          backtick: true,
        }, end);
        continue;
      }

      if (mode === "unquoted" && (c === "<" || c === ">") && raw[i + 1] === "(") {
        const end = clamp(skipCommandSubstitution(raw, i + 1), to);
        flush(i);
        push({
          type: "ProcessSubstitution",
          span: spanOf(i, end),
          id: this.options.ids.next(),
          direction: c,
          body: this.options.parseNested(raw.slice(i + 2, end - 1), at(i + 2)),
        }, end);
        continue;
      }

      if (c === "$") {
        const expansion = this.parseDollar(raw, i, to, mode, origin);
        if (expansion) {
          flush(i);
          push(expansion.part, expansion.end);
          continue;
        }
      }

      i++;
    }

    flush(to);
    return parts;
  }

  private parseDollar(
    raw: string,
    i: number,
    to: number,
    mode: Mode,
    origin: Position,
  ): { part: AST.WordPart; end: number } | null {
    const at = (index: number): Position => advancePosition(origin, raw, index);
    const spanOf = (start: number, end: number): Span => ({ start: at(start), end: at(end) });
    const next = raw[i + 1] ?? "";

    if (next === "'" && mode === "unquoted") {
      const end = clamp(skipAnsiC(raw, i), to);
      return {
        part: {
          type: "AnsiCQuoted",
          span: spanOf(i, end),
          id: this.options.ids.next(),
          value: raw.slice(i + 2, end - 1),
        },
        end,
      };
    }

    if (next === "(" && raw[i + 2] === "(") {
      const end = clamp(skipArithmetic(raw, i + 1), to);
      const text = raw.slice(i + 3, end - 2);
      return {
        part: {
          type: "ArithmeticExpansion",
          span: spanOf(i, end),
          id: this.options.ids.next(),
          expression: tryParseArithmetic(text, {
            ids: this.options.ids,
            origin: at(i + 3),
            parseParameter: (t, o) => this.parseParameter(t, o),
          }),
          raw: text,
        },
        end,
      };
    }

    if (next === "(") {
      const end = clamp(skipCommandSubstitution(raw, i + 1), to);
      return {
        part: {
          type: "CommandSubstitution",
          span: spanOf(i, end),
          id: this.options.ids.next(),
          body: this.options.parseNested(raw.slice(i + 2, end - 1), at(i + 2)),
          backtick: false,
        },
        end,
      };
    }

    if (next === "{") {
      const end = clamp(skipParameter(raw, i), to);
      return { part: this.parseParameter(raw.slice(i, end), at(i)), end };
    }

    const name = raw.slice(i + 1, to).match(/^(?:[A-Za-z_][A-Za-z0-9_]*|[0-9@*#?$!\-])/);
    if (name) {
      const end = i + 1 + name[0].length;
      return {
        part: {
          type: "ParameterExpansion",
          span: spanOf(i, end),
          id: this.options.ids.next(),
          parameter: name[0],
          braced: false,
          length: false,
          indirect: false,
          subscript: null,
          modifier: null,
          argument: null,
        },
        end,
      };
    }

    return null;
  }
}

function isDoubleQuotedPart(part: AST.WordPart): part is AST.DoubleQuotedPart {
  return part.type === "Literal" || part.type === "ParameterExpansion" ||
    part.type === "CommandSubstitution" || part.type === "ArithmeticExpansion";
}

/** The lexer has already rejected unterminated constructs; stay in range. */
function clamp(end: number, to: number): number {
  return end === -1 || end > to ? to : end;
}
