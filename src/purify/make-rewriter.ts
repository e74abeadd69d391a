/**
 * Makefile rewriter
 *
 * Wraps unordered list functions with `$(sort ...)`. Calls are located by
 * depth-tracked parenthesis matching, so a call nested inside `$(filter`,
 * `$(foreach` or another function is wrapped without touching its parent.
 */

import { closingParen, unsortedCalls } from "../analysis/rules/make-rules.ts";
import * as AST from "../make/ast.ts";
import type { RewriteResult } from "./shell-rewriter.ts";
import {
  advisory,
  applied,
  downgraded,
  type SafeTransformation,
  type Transformation,
  type TransformationOutcome,
} from "./transformation.ts";

const UNSORTED_FIND = /^\$\(shell\s+find\b/;

/**
 * Wrap every unsorted `$(call ...)` in `text` with `$(sort ...)`. For
 * `shell`, only `find` invocations that are not already piped to sort.
 */
export function wrapWithSort(text: string, call: "wildcard" | "shell"): string {
  let result = text;
  // Right to left, so earlier indexes stay valid.
  for (const start of unsortedCalls(text, call).reverse()) {
    const end = closingParen(result, start + 1);
    if (end === -1) continue;
    const expression = result.slice(start, end);
    if (call === "shell" && (!UNSORTED_FIND.test(expression) || /\|\s*sort\b/.test(expression))) continue;
    result = `${result.slice(0, start)}$(sort ${expression})${result.slice(end)}`;
  }
  return result;
}

export class MakefileRewriter {
  private readonly tree: AST.Makefile;
  private readonly items: Map<AST.MakeItem["id"], AST.MakeItem>;

  constructor(makefile: AST.Makefile) {
    this.tree = structuredClone(makefile);
    this.items = new Map(AST.flattenItems(this.tree.items).map((item) => [item.id, item] as const));
  }

  apply(transformations: readonly Transformation[]): RewriteResult<AST.Makefile> {
    const outcomes = transformations.map((t) => (t.safe ? this.applySafe(t) : advisory(t)));
    return { tree: this.tree, outcomes };
  }

  private applySafe(t: SafeTransformation): TransformationOutcome {
    const item = t.target === undefined ? undefined : this.items.get(t.target);
    if (!item) return downgraded(t, "target item no longer exists");

    if (t.kind !== "WrapSort") return downgraded(t, `${t.kind} does not apply to Makefiles`);
    if (item.type !== "Variable") return downgraded(t, "target is not a variable");

    const value = wrapWithSort(item.value, t.call);
    if (value === item.value) return downgraded(t, `no unsorted $(${t.call} ...) left to wrap`);
    item.value = value;
    delete item.physicalLines;
    return applied(t);
  }
}

export function applyMakefile(makefile: AST.Makefile, transformations: readonly Transformation[]): RewriteResult<AST.Makefile> {
  return new MakefileRewriter(makefile).apply(transformations);
}
