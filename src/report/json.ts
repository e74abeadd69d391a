/**
 * JSON report. Keys are snake_case and always in the same order.
 */

import type { SemanticIssue } from "../analysis/issue.ts";
import type { TypeDiagnostic } from "../analysis/type-check.ts";
import { lineStatus, type PurificationReport, type ReportLine } from "./model.ts";

interface JsonLocation {
  line: number;
  column: number;
  end_line: number;
  end_column: number;
}

function location(span: ReportLine["span"]): JsonLocation {
  return {
    line: span.start.line,
    column: span.start.column,
    end_line: span.end.line,
    end_column: span.end.column,
  };
}

function lineJson(line: ReportLine, index: number) {
  return {
    index: index + 1,
    status: lineStatus(line),
    rule: line.rule,
    category: line.category,
    severity: line.severity,
    safe: line.safe,
    location: location(line.span),
    message: line.message,
    suggestion: line.suggestion ?? null,
    reason: line.reason ?? null,
  };
}

function diagnosticJson(diagnostic: TypeDiagnostic) {
  return {
    kind: diagnostic.kind,
    variable: diagnostic.variable,
    severity: diagnostic.severity,
    location: location(diagnostic.span),
    message: diagnostic.message,
  };
}

function issueJson(issue: SemanticIssue) {
  return {
    rule: issue.rule,
    category: issue.category,
    severity: issue.severity,
    location: location(issue.span),
    message: issue.message,
    suggestion: issue.suggestion ?? null,
    source: issue.source ?? null,
  };
}

export function toJson(report: PurificationReport) {
  return {
    dialect: report.dialect,
    transformations_applied: report.transformationsApplied,
    issues_fixed: report.issuesFixed,
    manual_fixes_needed: report.manualFixesNeeded,
    report: report.lines.map(lineJson),
    type_diagnostics: report.typeDiagnostics.map(diagnosticJson),
    external_issues: report.externalIssues.map(issueJson),
  };
}

export function formatJson(report: PurificationReport): string {
  return JSON.stringify(toJson(report), null, 2) + "\n";
}
