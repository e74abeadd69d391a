/**
 * Purification result
 *
 * Owns the rewritten tree, the issues it answers and each transformation's
 * outcome. Built once per purification call and frozen.
 */

import type { SemanticIssue } from "../analysis/issue.ts";
import type { TypeCheckResult } from "../analysis/type-check.ts";
import type { Dialect } from "../core/types.ts";
import { flattenItems } from "../make/ast.ts";
import { statementLists } from "../shell/walk.ts";
import type { PurifiableTree } from "./planner.ts";
import type { Transformation, TransformationOutcome } from "./transformation.ts";

export interface PurificationCounts {
  /** Every planned transformation, safe or advisory */
  transformationsApplied: number;
  /** Safe transformations that changed the tree */
  issuesFixed: number;
  /** Advisories plus downgraded safe transformations */
  manualFixesNeeded: number;
}

export class PurificationResult {
  readonly dialect: Dialect;
  readonly tree: PurifiableTree;
  readonly issues: readonly SemanticIssue[];
  readonly outcomes: readonly TransformationOutcome[];
  readonly typeCheck: TypeCheckResult | null;

  constructor(
    dialect: Dialect,
    tree: PurifiableTree,
    issues: readonly SemanticIssue[],
    outcomes: readonly TransformationOutcome[],
    typeCheck: TypeCheckResult | null = null,
  ) {
    this.dialect = dialect;
    this.tree = tree;
    this.issues = Object.freeze([...issues]);
    this.outcomes = Object.freeze([...outcomes]);
    this.typeCheck = typeCheck;
    Object.freeze(this);
  }

  get transformations(): Transformation[] {
    return this.outcomes.map((outcome) => outcome.transformation);
  }

  get counts(): PurificationCounts {
    let issuesFixed = 0;
    let manualFixesNeeded = 0;
    for (const outcome of this.outcomes) {
      if (outcome.status === "applied") issuesFixed++;
      else manualFixesNeeded++;
    }
    return { transformationsApplied: this.outcomes.length, issuesFixed, manualFixesNeeded };
  }

  /**
   * Statements in the purified tree, comments excluded. For shell scripts
   * every statement list is counted, nested ones included; for Makefiles
   * every item, conditional branches included; for Dockerfiles every
   * instruction.
   */
  statementCount(): number {
    const tree = this.tree;
    switch (tree.type) {
      case "Program":
        return statementLists(tree)
          .flat()
          .filter((statement) => statement.type !== "Comment").length;
      case "Makefile":
        return flattenItems(tree.items).filter((item) => item.type !== "Comment").length;
      case "Dockerfile":
        return tree.items.filter((item) => item.type === "Instruction").length;
    }
  }
}
