/**
 * Issue Collector
 *
 * Accumulates issues from independent rules. A rule may reach the same
 * node through several paths; the collector keeps one issue per rule and
 * span.
 */

import { compareIssues, type SemanticIssue } from "./issue.ts";

export class IssueCollector {
  private _issues: SemanticIssue[] = [];
  private seen = new Set<string>();

  add(issue: SemanticIssue): void {
    const key = `${issue.rule}@${issue.span.start.offset}:${issue.span.end.offset}:${issue.message}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this._issues.push(issue);
  }

  addAll(issues: Iterable<SemanticIssue>): void {
    for (const issue of issues) this.add(issue);
  }

  /** Issues sorted by position, then rule code. */
  sorted(): SemanticIssue[] {
    return [...this._issues].sort(compareIssues);
  }

  /** Issues of one severity, in report order. */
  withSeverity(severity: SemanticIssue["severity"]): SemanticIssue[] {
    return this.sorted().filter((issue) => issue.severity === severity);
  }

  hasErrors(): boolean {
    return this._issues.some((issue) => issue.severity === "error");
  }

  get count(): number {
    return this._issues.length;
  }

  clear(): void {
    this._issues = [];
    this.seen.clear();
  }
}
