/**
 * Makefile Code Generator
 *
 * Renders items one logical line each. Recipe lines always start with a
 * tab. Items that still hold their physical lines are written exactly as
 * parsed when continuations are kept.
 */

import type { FormatOptions } from "../core/config.ts";
import * as AST from "./ast.ts";

const CONTINUATION_INDENT = "    ";

export class MakefileCodeGenerator {
  private readonly keepBlankLines: boolean;
  private readonly keepContinuations: boolean;
  private readonly maxLineLength: number | undefined;

  constructor(options: Partial<FormatOptions> = {}) {
    const preserve = options.preserveFormatting ?? false;
    this.keepBlankLines = preserve || (options.skipBlankLineRemoval ?? false);
    this.keepContinuations = preserve || (options.skipConsolidation ?? false);
    this.maxLineLength = preserve ? undefined : options.maxLineLength;
  }

  generate(makefile: AST.Makefile): string {
    const lines = this.items(makefile.items);
    return lines.length === 0 ? "" : lines.join("\n") + "\n";
  }

  private items(items: readonly AST.MakeItem[]): string[] {
    const out: string[] = [];
    for (const item of items) {
      const blanks = item.blankLinesBefore ?? 0;
      const count = this.keepBlankLines ? blanks : out.length === 0 ? 0 : Math.min(blanks, 1);
      for (let i = 0; i < count; i++) out.push("");
      out.push(...this.item(item));
    }
    return out;
  }

  private item(item: AST.MakeItem): string[] {
    switch (item.type) {
      case "Variable":
        return this.variable(item);
      case "Target":
      case "PatternRule":
        return this.rule(item);
      case "Include":
        return [`${item.keyword} ${item.path}`];
      case "Conditional":
        return this.conditional(item);
      case "Define":
        return [
          item.operator ? `define ${item.name} ${item.operator}` : `define ${item.name}`,
          ...item.lines,
          "endef",
        ];
      case "Comment":
        return [`#${item.text}`];
      case "Raw":
        return item.text.split("\n");
    }
  }

  private variable(item: AST.Variable): string[] {
    if (this.keepContinuations && item.physicalLines) return [...item.physicalLines];

    const prefix = (item.exported ? "export " : "") + (item.override ? "override " : "");
    const head = `${prefix}${item.name} ${AST.FLAVOR_OPERATORS[item.flavor]}`;
    if (item.value === "") return [head];
    return this.wrap(head, splitTokens(item.value), CONTINUATION_INDENT);
  }

  private rule(item: AST.Rule): string[] {
    if (this.keepContinuations && item.physicalLines) {
      return [...item.physicalLines, ...this.recipe(item.recipe.filter((line) => !line.inline))];
    }

    let header = `${AST.ruleName(item)}${item.doubleColon ? "::" : ":"}`;
    if (item.prerequisites.length > 0) header += ` ${item.prerequisites.join(" ")}`;
    if (item.orderOnly.length > 0) header += ` | ${item.orderOnly.join(" ")}`;

    const inline = item.recipe.find((line) => line.inline);
    if (inline) header += ` ; ${inline.text}`;

    return [header, ...this.recipe(item.recipe.filter((line) => !line.inline))];
  }

  private recipe(lines: readonly AST.RecipeLine[]): string[] {
    return lines.flatMap((line) => {
      if (this.keepContinuations && line.physicalLines) return [...line.physicalLines];
      return this.wrap(`\t${line.text}`, [], `\t${CONTINUATION_INDENT}`);
    });
  }

  private conditional(item: AST.Conditional): string[] {
    const lines = [`${item.directive} ${item.condition}`, ...this.items(item.thenItems)];
    const [chained] = item.elseItems ?? [];

    if (item.elseItems === null) {
      lines.push("endif");
    } else if (item.elseItems.length === 1 && chained?.type === "Conditional" && chained.chained) {
      const [header = "", ...rest] = this.conditional(chained);
      lines.push(`else ${header}`, ...rest);
    } else {
      lines.push("else", ...this.items(item.elseItems), "endif");
    }
    return lines;
  }

  /**
   * Break `head tokens...` over continuation lines when it is longer than
   * the maximum line length. With no tokens, breaks the head at spaces.
   */
  private wrap(head: string, tokens: readonly string[], indent: string): string[] {
    const full = tokens.length > 0 ? `${head} ${tokens.join(" ")}` : head;
    const limit = this.maxLineLength;
    if (limit === undefined || full.length <= limit) return [full];

    const words = tokens.length > 0 ? [head, ...tokens] : splitHead(head);
    const lines: string[] = [];
    let current = "";
    for (const word of words) {
      const candidate = current === "" ? word : `${current} ${word}`;
      if (current !== "" && candidate.length + 2 > limit) {
        lines.push(`${current} \\`);
        current = `${indent}${word}`;
      } else {
        current = candidate;
      }
    }
    lines.push(current);
    return lines;
  }
}

/** Split on spaces outside `$(...)` so references stay on one line */
function splitTokens(text: string): string[] {
  const tokens: string[] = [];
  let depth = 0;
  let current = "";
  for (let i = 0; i < text.length; i++) {
    const c = text[i] ?? "";
    if (c === "$" && (text[i + 1] === "(" || text[i + 1] === "{")) {
      depth++;
      current += c + (text[i + 1] ?? "");
      i++;
      continue;
    }
    if ((c === ")" || c === "}") && depth > 0) depth--;
    if (/\s/.test(c) && depth === 0) {
      if (current !== "") tokens.push(current);
      current = "";
      continue;
    }
    current += c;
  }
  if (current !== "") tokens.push(current);
  return tokens;
}

/** A tab-prefixed recipe line split into words, the tab kept on the first */
function splitHead(head: string): string[] {
  const tab = head.startsWith("\t");
  const [first = "", ...rest] = splitTokens(head);
  return [tab ? `\t${first}` : first, ...rest];
}

export function renderMakefile(makefile: AST.Makefile, options: Partial<FormatOptions> = {}): string {
  return new MakefileCodeGenerator(options).generate(makefile);
}
