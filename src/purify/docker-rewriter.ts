/**
 * Dockerfile rewriter
 */

import type * as AST from "../dockerfile/ast.ts";
import type { RewriteResult } from "./shell-rewriter.ts";
import {
  advisory,
  applied,
  downgraded,
  type SafeTransformation,
  type Transformation,
  type TransformationOutcome,
} from "./transformation.ts";

export class DockerfileRewriter {
  private readonly tree: AST.Dockerfile;
  private readonly items: Map<AST.DockerItem["id"], AST.DockerItem>;

  constructor(dockerfile: AST.Dockerfile) {
    this.tree = structuredClone(dockerfile);
    this.items = new Map(this.tree.items.map((item) => [item.id, item] as const));
  }

  apply(transformations: readonly Transformation[]): RewriteResult<AST.Dockerfile> {
    const outcomes = transformations.map((t) => (t.safe ? this.applySafe(t) : advisory(t)));
    return { tree: this.tree, outcomes };
  }

  private applySafe(t: SafeTransformation): TransformationOutcome {
    const item = t.target === undefined ? undefined : this.items.get(t.target);
    if (item?.type !== "Instruction") return downgraded(t, "target instruction no longer exists");

    switch (t.kind) {
      case "ReplaceKeyword": {
        if (item.keyword !== t.from) return downgraded(t, `instruction is no longer ${t.from}`);
        item.keyword = t.to;
        item.keywordText = item.keywordText === item.keywordText.toLowerCase() ? t.to.toLowerCase() : t.to;
        break;
      }

      case "InsertText": {
        const at = item.arguments.indexOf(t.after);
        if (at === -1) return downgraded(t, `'${t.after.trim()}' not found`);
        if (item.arguments.includes(t.text.trim())) return downgraded(t, `'${t.text.trim()}' is already present`);
        const end = at + t.after.length;
        item.arguments = item.arguments.slice(0, end) + t.text + item.arguments.slice(end);
        break;
      }

      case "AppendCommand": {
        if (item.arguments.includes(t.command)) return downgraded(t, "command is already present");
        item.arguments = `${item.arguments} && ${t.command}`;
        break;
      }

      case "AddFlag":
      case "ExtendFlag":
      case "AppendSort":
      case "WrapSort":
        return downgraded(t, `${t.kind} does not apply to Dockerfiles`);
    }

    delete item.continuationLines;
    return applied(t);
  }
}

export function applyDockerfile(
  dockerfile: AST.Dockerfile,
  transformations: readonly Transformation[],
): RewriteResult<AST.Dockerfile> {
  return new DockerfileRewriter(dockerfile).apply(transformations);
}
