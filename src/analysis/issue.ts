/**
 * Semantic issues
 *
 * Every rule reports through this one shape, and so do external lint
 * engines whose findings are merged into a report.
 */

import type { NodeId } from "../core/node-id.ts";
import { compareSpans, type Dialect, formatSpan, type IssueCategory, type Severity, type Span } from "../core/types.ts";

/**
 * A detected risk pattern.
 */
export interface SemanticIssue {
  /** Stable rule code, e.g. `IDEM001` or `NO_WILDCARD` */
  rule: string;
  category: IssueCategory;
  severity: Severity;
  span: Span;
  message: string;
  /** Suggested manual fix */
  suggestion?: string;
  /** Node the issue is about, when it came from this engine's tree */
  target?: NodeId;
  dialect?: Dialect;
  /** Name of the producer for issues merged from outside */
  source?: string;
}

export interface IssueOptions {
  suggestion?: string;
  target?: NodeId;
  dialect?: Dialect;
}

export function createIssue(
  rule: string,
  category: IssueCategory,
  severity: Severity,
  message: string,
  span: Span,
  options: IssueOptions = {},
): SemanticIssue {
  const issue: SemanticIssue = { rule, category, severity, span, message };
  if (options.suggestion !== undefined) issue.suggestion = options.suggestion;
  if (options.target !== undefined) issue.target = options.target;
  if (options.dialect !== undefined) issue.dialect = options.dialect;
  return issue;
}

/**
 * Report order: by position, then rule code, then message.
 */
export function compareIssues(a: SemanticIssue, b: SemanticIssue): number {
  return compareSpans(a.span, b.span) ||
    compareText(a.rule, b.rule) ||
    compareText(a.message, b.message);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Format an issue for display.
 */
export function formatIssue(issue: SemanticIssue): string {
  let result = `${issue.severity.toUpperCase()} [${issue.rule}] ${formatSpan(issue.span)}: ${issue.message}`;
  if (issue.suggestion) {
    result += `\n  Suggestion: ${issue.suggestion}`;
  }
  return result;
}
