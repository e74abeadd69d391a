/**
 * Makefile Parser
 *
 * Line-oriented: backslash continuations are first joined into logical
 * lines, then each logical line is classified as a comment, directive,
 * variable assignment, rule or recipe line. Conditionals are parsed
 * recursively up to their `endif`.
 */

import { IdGenerator } from "../core/node-id.ts";
import { type ParseError, parseError } from "../core/errors.ts";
import type { Position, Span } from "../core/types.ts";
import type * as AST from "./ast.ts";
import { flattenItems } from "./ast.ts";

export interface MakefileParserOptions {
  source?: string;
  ids?: IdGenerator;
}

/** One logical line after continuation joining */
interface LogicalLine {
  text: string;
  /** Source lines that were joined, as written */
  physical: string[];
  start: Position;
  end: Position;
}

type ItemTerminator = (line: LogicalLine) => boolean;

const VARIABLE_ASSIGNMENT = /^([^:#=\s][^:#=]*?)\s*(:::=|::=|:=|\?=|\+=|!=|=)\s*(.*)$/;

const FLAVOR_BY_OPERATOR: Readonly<Record<string, AST.VariableFlavor>> = {
  "=": "recursive",
  ":=": "simple",
  "::=": "simple",
  ":::=": "simple",
  "?=": "conditional",
  "+=": "append",
  "!=": "shell",
};

const CONDITIONAL_START = /^(ifeq|ifneq|ifdef|ifndef)(?:\s+(.*))?$/;

const INCLUDE = /^(include|-include|sinclude)\s+(.*)$/;

const DEFINE = /^define\s+(\S+)(?:\s+(\S+))?\s*$/;

// =============================================================================
// Line preprocessing
// =============================================================================

/**
 * Join backslash-continued lines. Each continuation collapses to a single
 * space, keeping the physical lines for rendering as written.
 */
export function joinContinuations(input: string): LogicalLine[] {
  const physical = input.split("\n").map((line) => line.replace(/\r$/, ""));
  if (physical[physical.length - 1] === "") physical.pop();

  const lines: LogicalLine[] = [];
  let offset = 0;
  let i = 0;

  while (i < physical.length) {
    const first = physical[i] ?? "";
    const start: Position = { line: i + 1, column: 1, offset };
    const parts = [first];
    let text = first;
    offset += first.length + 1;
    i++;

    while (/\\\s*$/.test(text) && i < physical.length) {
      const next = physical[i] ?? "";
      text = text.replace(/\s*\\\s*$/, "") + " " + next.trimStart();
      parts.push(next);
      offset += next.length + 1;
      i++;
    }

    const last = parts[parts.length - 1] ?? "";
    lines.push({
      text,
      physical: parts,
      start,
      end: { line: start.line + parts.length - 1, column: last.length + 1, offset: offset - 1 },
    });
  }

  return lines;
}

// =============================================================================
// Parser Class
// =============================================================================

export class MakefileParser {
  private readonly lines: LogicalLine[];
  private pos = 0;
  private readonly ids: IdGenerator;
  private readonly physicalLineCount: number;

  constructor(input: string, private readonly options: MakefileParserOptions = {}) {
    this.lines = joinContinuations(input);
    this.ids = options.ids ?? new IdGenerator();
    this.physicalLineCount = this.lines.reduce((count, line) => count + line.physical.length, 0);
  }

  parse(): AST.Makefile {
    const started = performance.now();
    const items = this.parseItems(() => false);
    markPhonyTargets(items);
    return {
      type: "Makefile",
      items,
      metadata: {
        source: this.options.source,
        lineCount: this.physicalLineCount,
        parseDurationMs: performance.now() - started,
      },
    };
  }

  // ===========================================================================
  // Items
  // ===========================================================================

  private parseItems(isTerminator: ItemTerminator): AST.MakeItem[] {
    const items: AST.MakeItem[] = [];
    let blankLines = 0;

    while (this.pos < this.lines.length) {
      const line = this.current();
      if (line.text.trim() === "") {
        blankLines++;
        this.pos++;
        continue;
      }
      if (isTerminator(line)) break;

      const item = this.parseItem(line);
      if (blankLines > 0) item.blankLinesBefore = blankLines;
      blankLines = 0;
      items.push(item);
    }

    return items;
  }

  private parseItem(line: LogicalLine): AST.MakeItem {
    const text = line.text;
    const trimmed = text.trim();

    if (text.startsWith("\t")) {
      // A recipe line with no rule above it; kept as written.
      this.pos++;
      return this.raw(line);
    }

    if (trimmed.startsWith("#")) {
      this.pos++;
      return { type: "Comment", span: this.spanOf(line), id: this.ids.next(), text: trimmed.slice(1) };
    }

    const directive = trimmed.split(/\s+/, 1)[0] ?? "";

    if (CONDITIONAL_START.test(trimmed)) {
      return this.parseConditional(line, trimmed, false);
    }
    if (directive === "else" || directive === "endif") {
      throw this.error(`'${directive}' without a matching conditional`, line, "ifeq, ifneq, ifdef or ifndef");
    }
    if (directive === "endef") {
      throw this.error("'endef' without a matching 'define'", line, "define");
    }

    const define = DEFINE.exec(trimmed);
    if (define) {
      return this.parseDefine(line, define[1] ?? "", define[2] ?? null);
    }

    const include = INCLUDE.exec(trimmed);
    if (include) {
      this.pos++;
      const keyword = include[1] === "-include" ? "-include" : include[1] === "sinclude" ? "sinclude" : "include";
      return {
        type: "Include",
        span: this.spanOf(line),
        id: this.ids.next(),
        path: (include[2] ?? "").trim(),
        optional: keyword !== "include",
        keyword,
      };
    }

    const variable = this.tryParseVariable(line, trimmed);
    if (variable) {
      this.pos++;
      return variable;
    }

    if (/^(?:::?=|:::=|\?=|\+=|!=|=)/.test(trimmed)) {
      throw this.error("empty variable name", line, "variable name");
    }

    const colon = findRuleColon(trimmed);
    if (colon >= 0) {
      return this.parseRule(line, trimmed, colon);
    }

    this.pos++;
    return this.raw(line);
  }

  private tryParseVariable(line: LogicalLine, trimmed: string): AST.Variable | null {
    let rest = trimmed;
    let exported = false;
    let override = false;

    for (;;) {
      const prefix = /^(export|override)\s+/.exec(rest);
      if (!prefix) break;
      if (prefix[1] === "export") exported = true;
      else override = true;
      rest = rest.slice(prefix[0].length);
    }

    const match = VARIABLE_ASSIGNMENT.exec(rest);
    if (!match) return null;

    const name = (match[1] ?? "").trim();
    const flavor = FLAVOR_BY_OPERATOR[match[2] ?? "="] ?? "recursive";
    const variable: AST.Variable = {
      type: "Variable",
      span: this.spanOf(line),
      id: this.ids.next(),
      name,
      value: (match[3] ?? "").trim(),
      flavor,
      exported,
      override,
    };
    if (line.physical.length > 1) variable.physicalLines = [...line.physical];
    return variable;
  }

  private parseRule(line: LogicalLine, trimmed: string, colon: number): AST.MakeItem {
    const name = trimmed.slice(0, colon).trim();
    if (name === "") {
      throw this.error("empty target name", line, "target name");
    }

    const doubleColon = trimmed[colon + 1] === ":";
    let rest = trimmed.slice(colon + (doubleColon ? 2 : 1));

    // target-specific variable (`target: VAR = value`) is kept verbatim
    if (VARIABLE_ASSIGNMENT.test(rest.trim()) && !rest.includes(";")) {
      this.pos++;
      return this.raw(line);
    }

    const recipe: AST.RecipeLine[] = [];
    const semicolon = findOutside(rest, ";");
    if (semicolon >= 0) {
      recipe.push({ text: rest.slice(semicolon + 1).trim(), span: this.spanOf(line), inline: true });
      rest = rest.slice(0, semicolon);
    }

    const bar = findOutside(rest, "|");
    const prerequisites = splitWords(bar >= 0 ? rest.slice(0, bar) : rest);
    const orderOnly = bar >= 0 ? splitWords(rest.slice(bar + 1)) : [];

    this.pos++;
    recipe.push(...this.parseRecipe());

    const physicalLines = line.physical.length > 1 ? [...line.physical] : undefined;

    if (name.includes("%")) {
      return {
        type: "PatternRule",
        span: this.spanOf(line),
        id: this.ids.next(),
        targetPattern: name,
        prerequisites,
        orderOnly,
        recipe,
        doubleColon,
        ...(physicalLines ? { physicalLines } : {}),
      };
    }

    return {
      type: "Target",
      span: this.spanOf(line),
      id: this.ids.next(),
      name,
      prerequisites,
      orderOnly,
      recipe,
      phony: false,
      doubleColon,
      ...(physicalLines ? { physicalLines } : {}),
    };
  }

  /** Tab-indented lines after a rule; blank lines between them are skipped. */
  private parseRecipe(): AST.RecipeLine[] {
    const recipe: AST.RecipeLine[] = [];

    while (this.pos < this.lines.length) {
      const line = this.current();
      if (line.text.startsWith("\t")) {
        const entry: AST.RecipeLine = { text: line.text.slice(1), span: this.spanOf(line) };
        if (line.physical.length > 1) entry.physicalLines = [...line.physical];
        recipe.push(entry);
        this.pos++;
        continue;
      }
      if (line.text.trim() === "" && this.nextNonBlankIsRecipe()) {
        this.pos++;
        continue;
      }
      break;
    }

    return recipe;
  }

  private nextNonBlankIsRecipe(): boolean {
    for (let i = this.pos; i < this.lines.length; i++) {
      const text = this.lines[i]?.text ?? "";
      if (text.trim() !== "") return text.startsWith("\t");
    }
    return false;
  }

  private parseConditional(line: LogicalLine, header: string, chained: boolean): AST.Conditional {
    const match = CONDITIONAL_START.exec(header);
    const directive = toDirective(match?.[1]);
    const condition = (match?.[2] ?? "").trim();
    const context = `in '${directive}' conditional started at line ${line.start.line}`;

    let args: string[];
    if (directive === "ifeq" || directive === "ifneq") {
      const parsed = parseConditionArguments(condition);
      if (!parsed) {
        throw this.error(`${directive} requires two arguments`, line, "(arg1,arg2)", context);
      }
      args = parsed;
    } else {
      if (condition === "") {
        throw this.error(`${directive} requires a variable name`, line, "variable name", context);
      }
      args = [condition];
    }

    this.pos++;
    const atElseOrEndif: ItemTerminator = (next) => /^(else|endif)\b/.test(next.text.trim());
    const thenItems = this.parseItems(atElseOrEndif);
    let elseItems: AST.MakeItem[] | null = null;

    const closing = this.lines[this.pos];
    if (!closing) {
      throw this.error("missing 'endif'", this.lastLine(), "endif", context);
    }

    const closingText = closing.text.trim();
    if (closingText.startsWith("else")) {
      const rest = closingText.slice(4).trim();
      if (rest !== "" && CONDITIONAL_START.test(rest)) {
        elseItems = [this.parseConditional(closing, rest, true)];
      } else {
        this.pos++;
        elseItems = this.parseItems((next) => /^endif\b/.test(next.text.trim()));
        if (this.pos >= this.lines.length) {
          throw this.error("missing 'endif'", this.lastLine(), "endif", context);
        }
        this.pos++;
      }
    } else {
      this.pos++;
    }

    return {
      type: "Conditional",
      span: { start: line.start, end: this.previousLine().end },
      id: this.ids.next(),
      directive,
      arguments: args,
      condition,
      thenItems,
      elseItems,
      chained,
    };
  }

  private parseDefine(line: LogicalLine, name: string, operator: string | null): AST.Define {
    const body: string[] = [];
    this.pos++;

    while (this.pos < this.lines.length) {
      const next = this.current();
      if (next.text.trim() === "endef") {
        this.pos++;
        return {
          type: "Define",
          span: { start: line.start, end: next.end },
          id: this.ids.next(),
          name,
          operator,
          lines: body,
        };
      }
      body.push(...next.physical);
      this.pos++;
    }

    throw this.error("missing 'endef'", this.lastLine(), "endef", `in 'define ${name}' started at line ${line.start.line}`);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private current(): LogicalLine {
    const line = this.lines[this.pos];
    if (!line) throw this.error("unexpected end of input", this.lastLine(), "a line");
    return line;
  }

  private previousLine(): LogicalLine {
    return this.lines[this.pos - 1] ?? this.lastLine();
  }

  private lastLine(): LogicalLine {
    const last = this.lines[this.lines.length - 1];
    if (last) return last;
    const origin = { line: 1, column: 1, offset: 0 };
    return { text: "", physical: [""], start: origin, end: origin };
  }

  private spanOf(line: LogicalLine): Span {
    return { start: line.start, end: line.end };
  }

  private raw(line: LogicalLine): AST.Raw {
    return { type: "Raw", span: this.spanOf(line), id: this.ids.next(), text: line.physical.join("\n") };
  }

  private error(message: string, line: LogicalLine, expected: string, context?: string): ParseError {
    return parseError(message, { line: line.start.line, column: 1 }, {
      file: this.options.source,
      expected,
      context,
    });
  }
}

// =============================================================================
// Text helpers
// =============================================================================

function toDirective(value: string | undefined): AST.ConditionalDirective {
  switch (value) {
    case "ifneq":
      return "ifneq";
    case "ifdef":
      return "ifdef";
    case "ifndef":
      return "ifndef";
    default:
      return "ifeq";
  }
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word !== "");
}

/**
 * Index of `char` outside `$(...)` and `${...}` references, or -1.
 */
export function findOutside(text: string, char: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === "$" && (text[i + 1] === "(" || text[i + 1] === "{")) {
      depth++;
      i++;
    } else if ((c === "(" || c === "{") && depth > 0) {
      depth++;
    } else if ((c === ")" || c === "}") && depth > 0) {
      depth--;
    } else if (c === char && depth === 0) {
      return i;
    }
  }
  return -1;
}

/** Index of the rule colon; -1 for `:=` and `::=` assignments. */
function findRuleColon(text: string): number {
  const colon = findOutside(text, ":");
  if (colon < 0) return -1;
  if (text.slice(colon).startsWith("::=") || text.slice(colon).startsWith(":=")) return -1;
  return colon;
}

/**
 * `(a,b)`, `"a" "b"` or `'a' 'b'`; null when there are not two arguments.
 */
export function parseConditionArguments(condition: string): [string, string] | null {
  if (condition.startsWith("(") && condition.endsWith(")")) {
    const inner = condition.slice(1, -1);
    const comma = findOutside(inner, ",");
    if (comma < 0) return null;
    return [inner.slice(0, comma), inner.slice(comma + 1)];
  }

  const quoted = /^(["'])(.*?)\1\s+(["'])(.*?)\3$/.exec(condition);
  if (quoted) return [quoted[2] ?? "", quoted[4] ?? ""];
  return null;
}

function markPhonyTargets(items: AST.MakeItem[]): void {
  const all = flattenItems(items);
  const phony = new Set<string>();
  for (const item of all) {
    if (item.type === "Target" && item.name === ".PHONY") {
      for (const name of item.prerequisites) phony.add(name);
    }
  }
  for (const item of all) {
    if (item.type === "Target" && item.name !== ".PHONY") {
      item.phony = splitWords(item.name).some((name) => phony.has(name));
    }
  }
}

// =============================================================================
// Convenience Function
// =============================================================================

export function parseMakefile(input: string, options: MakefileParserOptions = {}): AST.Makefile {
  return new MakefileParser(input, options).parse();
}
