/**
 * Dockerfile Code Generator
 */

import type { FormatOptions } from "../core/config.ts";
import type * as AST from "./ast.ts";

const CONTINUATION_INDENT = "    ";

export class DockerfileCodeGenerator {
  private readonly keepBlankLines: boolean;
  private readonly keepContinuations: boolean;
  private readonly maxLineLength: number | undefined;

  constructor(options: Partial<FormatOptions> = {}) {
    const preserve = options.preserveFormatting ?? false;
    this.keepBlankLines = preserve || (options.skipBlankLineRemoval ?? false);
    this.keepContinuations = preserve || (options.skipConsolidation ?? false);
    this.maxLineLength = preserve ? undefined : options.maxLineLength;
  }

  generate(file: AST.Dockerfile): string {
    const out: string[] = [];
    for (const item of file.items) {
      const blanks = item.blankLinesBefore ?? 0;
      const count = this.keepBlankLines ? blanks : out.length === 0 ? 0 : Math.min(blanks, 1);
      for (let i = 0; i < count; i++) out.push("");
      out.push(...this.item(item, file.metadata.escape));
    }
    return out.length === 0 ? "" : out.join("\n") + "\n";
  }

  private item(item: AST.DockerItem, escape: string): string[] {
    switch (item.type) {
      case "ParserDirective":
        return [`# ${item.name}=${item.value}`];
      case "Comment":
        return [`#${item.text}`];
      case "Instruction":
        return this.instruction(item, escape);
    }
  }

  private instruction(item: AST.Instruction, escape: string): string[] {
    if (this.keepContinuations && item.continuationLines) return [...item.continuationLines];

    const words = [item.keywordText, ...item.flags];
    if (item.arguments !== "") words.push(item.arguments);
    const text = words.join(" ");

    const limit = this.maxLineLength;
    if (limit === undefined || text.length <= limit) return [text];
    return wrapWords(text, limit, escape);
  }
}

/**
 * Greedy wrap at spaces. `&&` chains break before the operator so each
 * command in a RUN starts its own line.
 */
function wrapWords(text: string, limit: number, escape: string): string[] {
  const words = text.split(" ").filter((word) => word !== "");
  const lines: string[] = [];
  let current = "";
  for (const word of words) {
    const candidate = current === "" ? word : `${current} ${word}`;
    const breakBefore = word === "&&" || word === "||";
    if (current !== "" && (candidate.length + 2 > limit || breakBefore)) {
      lines.push(`${current} ${escape}`);
      current = `${CONTINUATION_INDENT}${word}`;
    } else {
      current = candidate;
    }
  }
  lines.push(current);
  return lines;
}

export function renderDockerfile(file: AST.Dockerfile, options: Partial<FormatOptions> = {}): string {
  return new DockerfileCodeGenerator(options).generate(file);
}
