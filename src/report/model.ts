/**
 * Purification report model
 */

import { compareIssues, type SemanticIssue } from "../analysis/issue.ts";
import type { TypeDiagnostic } from "../analysis/type-check.ts";
import type { Dialect, IssueCategory, Severity, Span } from "../core/types.ts";
import type { PurificationResult } from "../purify/result.ts";
import type { TransformationOutcome } from "../purify/transformation.ts";

/** One line per planned transformation */
export interface ReportLine {
  rule: string;
  category: IssueCategory;
  severity: Severity;
  safe: boolean;
  applied: boolean;
  downgraded: boolean;
  span: Span;
  message: string;
  suggestion?: string;
  /** Why a safe transformation was downgraded */
  reason?: string;
}

export interface PurificationReport {
  dialect: Dialect;
  transformationsApplied: number;
  issuesFixed: number;
  manualFixesNeeded: number;
  lines: ReportLine[];
  typeDiagnostics: TypeDiagnostic[];
  /** Issues from other producers, merged in for display only */
  externalIssues: SemanticIssue[];
}

export type LineStatus = "fixed" | "manual" | "downgraded";

export function lineStatus(line: ReportLine): LineStatus {
  if (line.applied) return "fixed";
  return line.downgraded ? "downgraded" : "manual";
}

export const DIALECT_TITLES: Readonly<Record<Dialect, string>> = {
  shell: "Shell Script",
  makefile: "Makefile",
  dockerfile: "Dockerfile",
};

function reportLine(outcome: TransformationOutcome): ReportLine {
  const t = outcome.transformation;
  const line: ReportLine = {
    rule: t.rule,
    category: t.category,
    severity: t.severity,
    safe: t.safe,
    applied: outcome.status === "applied",
    downgraded: outcome.status === "downgraded",
    span: t.span,
    message: t.description,
  };
  if (t.suggestion !== undefined) line.suggestion = t.suggestion;
  if (outcome.reason !== undefined) line.reason = outcome.reason;
  return line;
}

export function buildReport(result: PurificationResult): PurificationReport {
  const counts = result.counts;
  return {
    dialect: result.dialect,
    transformationsApplied: counts.transformationsApplied,
    issuesFixed: counts.issuesFixed,
    manualFixesNeeded: counts.manualFixesNeeded,
    lines: result.outcomes.map(reportLine),
    typeDiagnostics: result.typeCheck ? [...result.typeCheck.diagnostics] : [],
    externalIssues: [],
  };
}

/**
 * Copy of `report` with issues from an external producer added. They are
 * shown by every formatter but never change the counts.
 */
export function mergeExternalIssues(
  report: PurificationReport,
  issues: readonly SemanticIssue[],
  source?: string,
): PurificationReport {
  const incoming = issues.map((issue) =>
    source !== undefined && issue.source === undefined ? { ...issue, source } : { ...issue }
  );
  return {
    ...report,
    externalIssues: [...report.externalIssues, ...incoming].sort(compareIssues),
  };
}
