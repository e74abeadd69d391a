/**
 * Shell tree rewriter
 *
 * Works on a structured clone of the parsed program. Targets are found by
 * node id; every change is local to the target node. A transformation whose
 * target is gone or no longer matches is downgraded, not dropped.
 */

import { IdGenerator } from "../core/node-id.ts";
import type { Span } from "../core/types.ts";
import type * as AST from "../shell/ast.ts";
import { NodeIndex } from "../shell/node-index.ts";
import { isLiteral, staticText } from "../shell/words.ts";
import {
  advisory,
  applied,
  downgraded,
  type SafeTransformation,
  type Transformation,
  type TransformationOutcome,
} from "./transformation.ts";

export interface RewriteResult<Tree> {
  tree: Tree;
  outcomes: TransformationOutcome[];
}

export class ShellRewriter {
  private readonly tree: AST.Program;
  private readonly index: NodeIndex;
  private readonly ids: IdGenerator;

  constructor(program: AST.Program) {
    this.tree = structuredClone(program);
    this.index = new NodeIndex(this.tree);
    let max = 0;
    for (const [id] of this.index.entries()) max = Math.max(max, id);
    this.ids = new IdGenerator(max + 1);
  }

  apply(transformations: readonly Transformation[]): RewriteResult<AST.Program> {
    const outcomes = transformations.map((t) => (t.safe ? this.applySafe(t) : advisory(t)));
    return { tree: this.tree, outcomes };
  }

  private applySafe(t: SafeTransformation): TransformationOutcome {
    const node = t.target === undefined ? undefined : this.index.get(t.target);
    if (!node) return downgraded(t, "target node no longer exists");

    switch (t.kind) {
      case "AddFlag": {
        if (node.type !== "Command") return downgraded(t, "target is not a simple command");
        if (node.args.some((arg) => staticText(arg) === t.flag)) return downgraded(t, `${t.flag} is already present`);
        node.args.unshift(this.literalWord(t.flag, node.name?.span ?? node.span));
        const continuations = node.layout?.continuations;
        if (continuations && node.layout) node.layout.continuations = continuations.map((i) => i + 1);
        this.index.rebuild(this.tree);
        return applied(t);
      }

      case "ExtendFlag": {
        if (node.type !== "Command") return downgraded(t, "target is not a simple command");
        const arg = node.args.find((word) => isLiteral(word) && staticText(word) === t.from);
        if (!arg) return downgraded(t, `${t.from} is no longer an argument`);
        arg.parts = [this.literal(t.to, arg.span)];
        this.index.rebuild(this.tree);
        return applied(t);
      }

      case "AppendSort": {
        if (node.type !== "CommandSubstitution") return downgraded(t, "target is not a command substitution");
        const [only] = node.body;
        if (node.body.length !== 1 || only?.type !== "Command") {
          return downgraded(t, "substitution no longer holds a single command");
        }
        node.body = [this.sortPipeline(only)];
        this.index.rebuild(this.tree);
        return applied(t);
      }

      case "WrapSort":
      case "ReplaceKeyword":
      case "InsertText":
      case "AppendCommand":
        return downgraded(t, `${t.kind} does not apply to shell scripts`);
    }
  }

  private sortPipeline(command: AST.Command): AST.Pipeline {
    const sort: AST.Command = {
      type: "Command",
      span: command.span,
      id: this.ids.next(),
      name: this.literalWord("sort", command.span),
      args: [],
      redirects: [],
      assignments: [],
    };
    return {
      type: "Pipeline",
      span: command.span,
      id: this.ids.next(),
      commands: [command, sort],
      operators: ["|"],
    };
  }

  private literalWord(value: string, at: Span): AST.Word {
    return { type: "Word", span: at, id: this.ids.next(), parts: [this.literal(value, at)] };
  }

  private literal(value: string, at: Span): AST.Literal {
    return { type: "Literal", span: at, id: this.ids.next(), value };
  }
}

/**
 * Apply transformations to a copy of `program`; the input is not modified.
 */
export function applyShell(program: AST.Program, transformations: readonly Transformation[]): RewriteResult<AST.Program> {
  return new ShellRewriter(program).apply(transformations);
}
