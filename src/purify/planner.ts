/**
 * Transformation planner
 *
 * Maps each issue to at most one transformation through a catalog keyed by
 * rule code. Rules without a template get an advisory; rules listed as
 * report-only get nothing. Transformations keep the issues' order, which
 * is source order.
 */

import type { NodeId } from "../core/node-id.ts";
import type { SemanticIssue } from "../analysis/issue.ts";
import { cacheCleanup } from "../analysis/rules/dockerfile-rules.ts";
import type * as DockerAST from "../dockerfile/ast.ts";
import * as MakeAST from "../make/ast.ts";
import type * as ShellAST from "../shell/ast.ts";
import { NodeIndex } from "../shell/node-index.ts";
import { staticText } from "../shell/words.ts";
import type { Advisory, SafeTransformation, Transformation } from "./transformation.ts";

export type PurifiableTree = ShellAST.Program | MakeAST.Makefile | DockerAST.Dockerfile;

type Base = Omit<Advisory, "kind" | "safe" | "description">;

function baseOf(issue: SemanticIssue): Base {
  const base: Base = {
    rule: issue.rule,
    category: issue.category,
    severity: issue.severity,
    span: issue.span,
  };
  if (issue.target !== undefined) base.target = issue.target;
  if (issue.suggestion !== undefined) base.suggestion = issue.suggestion;
  return base;
}

/** Builds a safe transformation, or null when the issue's target does not fit */
type Template<Lookup> = (issue: SemanticIssue, lookup: Lookup) => SafeTransformation | null;

/** Rules reported as issues only */
const REPORT_ONLY: ReadonlySet<string> = new Set(["SIDE001"]);

// =============================================================================
// Shell
// =============================================================================

const SYMLINK_CLUSTER = /^-[A-Za-z]*s[A-Za-z]*$/;

function shellCommand(index: NodeIndex, id: NodeId | undefined): ShellAST.Command | null {
  const node = id === undefined ? undefined : index.get(id);
  return node?.type === "Command" ? node : null;
}

const SHELL_TEMPLATES: Readonly<Record<string, Template<NodeIndex>>> = {
  IDEM001: (issue) => ({
    ...baseOf(issue),
    kind: "AddFlag",
    safe: true,
    flag: "-p",
    description: "Added -p to mkdir",
  }),
  IDEM002: (issue) => ({
    ...baseOf(issue),
    kind: "AddFlag",
    safe: true,
    flag: "-f",
    description: "Added -f to rm",
  }),
  IDEM003: (issue, index) => {
    const command = shellCommand(index, issue.target);
    if (!command) return null;
    const cluster = command.args.map(staticText).find((arg) => arg !== null && SYMLINK_CLUSTER.test(arg));
    if (cluster === undefined || cluster === null) {
      return { ...baseOf(issue), kind: "AddFlag", safe: true, flag: "-f", description: "Added -f to ln" };
    }
    return {
      ...baseOf(issue),
      kind: "ExtendFlag",
      safe: true,
      from: cluster,
      to: `${cluster}f`,
      description: `Changed ln ${cluster} to ln ${cluster}f`,
    };
  },
  DET006: (issue) => ({
    ...baseOf(issue),
    kind: "AppendSort",
    safe: true,
    description: "Piped the listing through sort",
  }),
};

// =============================================================================
// Makefile
// =============================================================================

type MakeLookup = ReadonlyMap<NodeId, MakeAST.MakeItem>;

function makeVariable(lookup: MakeLookup, id: NodeId | undefined): MakeAST.Variable | null {
  const item = id === undefined ? undefined : lookup.get(id);
  return item?.type === "Variable" ? item : null;
}

const MAKE_TEMPLATES: Readonly<Record<string, Template<MakeLookup>>> = {
  NO_WILDCARD: (issue, lookup) => {
    const variable = makeVariable(lookup, issue.target);
    if (!variable) return null;
    return {
      ...baseOf(issue),
      kind: "WrapSort",
      safe: true,
      call: "wildcard",
      description: `Wrapped $(wildcard in variable '${variable.name}' with $(sort ...)`,
    };
  },
  NO_UNORDERED_FIND: (issue, lookup) => {
    const variable = makeVariable(lookup, issue.target);
    if (!variable) return null;
    return {
      ...baseOf(issue),
      kind: "WrapSort",
      safe: true,
      call: "shell",
      description: `Wrapped $(shell find in variable '${variable.name}' with $(sort ...)`,
    };
  },
};

function makeSubject(lookup: MakeLookup, id: NodeId | undefined): string | null {
  const item = id === undefined ? undefined : lookup.get(id);
  switch (item?.type) {
    case "Variable":
      return `variable '${item.name}'`;
    case "Target":
    case "PatternRule":
      return `target '${MakeAST.ruleName(item)}'`;
    default:
      return null;
  }
}

// =============================================================================
// Dockerfile
// =============================================================================

type DockerLookup = ReadonlyMap<NodeId, DockerAST.DockerItem>;

function dockerInstruction(lookup: DockerLookup, id: NodeId | undefined): DockerAST.Instruction | null {
  const item = id === undefined ? undefined : lookup.get(id);
  return item?.type === "Instruction" ? item : null;
}

const DOCKER_TEMPLATES: Readonly<Record<string, Template<DockerLookup>>> = {
  DOCKER003: (issue, lookup) => {
    const run = dockerInstruction(lookup, issue.target);
    const cleanup = run ? cacheCleanup(run.arguments) : null;
    if (cleanup === null) return null;
    return {
      ...baseOf(issue),
      kind: "AppendCommand",
      safe: true,
      command: cleanup,
      description: `Appended cache cleanup: ${cleanup}`,
    };
  },
  DOCKER005: (issue, lookup) => {
    const run = dockerInstruction(lookup, issue.target);
    if (!run) return null;
    const after = run.arguments.includes("apt-get install -y ") ? "apt-get install -y " : "apt-get install ";
    if (!run.arguments.includes(after)) return null;
    return {
      ...baseOf(issue),
      kind: "InsertText",
      safe: true,
      after,
      text: "--no-install-recommends ",
      description: "Added --no-install-recommends to apt-get install",
    };
  },
  DOCKER006: (issue) => ({
    ...baseOf(issue),
    kind: "ReplaceKeyword",
    safe: true,
    from: "ADD",
    to: "COPY",
    description: "Replaced ADD with COPY",
  }),
};

// =============================================================================
// Planning
// =============================================================================

function planWith<Lookup>(
  issues: readonly SemanticIssue[],
  templates: Readonly<Record<string, Template<Lookup>>>,
  lookup: Lookup,
  describe: (issue: SemanticIssue) => string,
): Transformation[] {
  const planned: Transformation[] = [];
  for (const issue of issues) {
    if (REPORT_ONLY.has(issue.rule)) continue;
    const template = templates[issue.rule];
    const safe = template ? template(issue, lookup) : null;
    planned.push(safe ?? { ...baseOf(issue), kind: "Advisory", safe: false, description: describe(issue) });
  }
  return planned;
}

/**
 * Plan transformations for the issues found in `tree`.
 */
export function plan(tree: PurifiableTree, issues: readonly SemanticIssue[]): Transformation[] {
  switch (tree.type) {
    case "Program":
      return planWith(issues, SHELL_TEMPLATES, new NodeIndex(tree), (issue) => issue.message);
    case "Makefile": {
      const lookup = new Map(MakeAST.flattenItems(tree.items).map((item) => [item.id, item] as const));
      return planWith(issues, MAKE_TEMPLATES, lookup, (issue) => {
        const subject = makeSubject(lookup, issue.target);
        return subject ? `Manual fix needed for ${subject}: ${issue.rule}` : `Manual fix needed: ${issue.rule}`;
      });
    }
    case "Dockerfile": {
      const lookup = new Map(tree.items.map((item) => [item.id, item] as const));
      return planWith(issues, DOCKER_TEMPLATES, lookup, (issue) => issue.message);
    }
  }
}
