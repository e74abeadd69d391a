/**
 * Dockerfile AST Types
 *
 * One item per logical line. Arguments stay text: RUN bodies are shell, but
 * the Dockerfile rules only need to match command patterns in them.
 */

import type { NodeId } from "../core/node-id.ts";
import type { Span } from "../core/types.ts";

export interface DockerBase {
  span: Span;
  id: NodeId;
  /** Blank source lines directly above this item */
  blankLinesBefore?: number;
}

export interface Instruction extends DockerBase {
  type: "Instruction";
  /** Upper-cased instruction keyword */
  keyword: string;
  /** Keyword as written, for rendering */
  keywordText: string;
  /** Leading `--name=value` options (`COPY --from=build`, `RUN --mount=...`) */
  flags: string[];
  /** Everything after the flags, continuations joined */
  arguments: string;
  /** Physical source lines when the instruction spanned several */
  continuationLines?: string[];
}

export interface Comment extends DockerBase {
  type: "Comment";
  /** Text after the `#` */
  text: string;
}

/** `# syntax=...` or `# escape=...` before the first instruction */
export interface ParserDirective extends DockerBase {
  type: "ParserDirective";
  name: string;
  value: string;
}

export type DockerItem = Instruction | Comment | ParserDirective;

export interface DockerMetadata {
  source?: string;
  lineCount: number;
  parseDurationMs: number;
  /** Line continuation character, `\` unless an escape directive changes it */
  escape: string;
}

export interface Dockerfile {
  type: "Dockerfile";
  items: DockerItem[];
  metadata: DockerMetadata;
}

export function instructions(file: Dockerfile, keyword?: string): Instruction[] {
  return file.items.filter((item): item is Instruction =>
    item.type === "Instruction" && (keyword === undefined || item.keyword === keyword)
  );
}
