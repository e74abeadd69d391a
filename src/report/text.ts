/**
 * Human-readable report
 */

import { Chalk, type ChalkInstance } from "chalk";
import { formatSpan } from "../core/types.ts";
import { DIALECT_TITLES, type PurificationReport, type ReportLine } from "./model.ts";

export interface TextFormatOptions {
  /** ANSI colors; off by default so the text can be compared and logged */
  color?: boolean;
}

function describe(line: ReportLine): string {
  const where = `(${line.category}, ${formatSpan(line.span)})`;
  if (line.applied) return `✅ ${line.message} ${where}`;
  if (line.downgraded) return `⚠️  Not applied: ${line.message} ${where}`;
  return `⚠️  ${line.message} ${where}`;
}

export function formatText(report: PurificationReport, options: TextFormatOptions = {}): string {
  const c: ChalkInstance = new Chalk({ level: options.color ? 1 : 0 });
  const title = `${DIALECT_TITLES[report.dialect]} Purification Report`;
  const out: string[] = [
    c.bold(title),
    c.bold("=".repeat(title.length)),
    `Transformations Applied: ${report.transformationsApplied}`,
    `Issues Fixed: ${c.green(String(report.issuesFixed))}`,
    `Manual Fixes Needed: ${c.yellow(String(report.manualFixesNeeded))}`,
  ];

  if (report.lines.length > 0) out.push("");
  report.lines.forEach((line, i) => {
    const text = `${i + 1}: ${describe(line)}`;
    out.push(line.applied ? c.green(text) : c.yellow(text));
    if (line.reason) out.push(c.dim(`   reason: ${line.reason}`));
    if (line.suggestion && !line.applied) out.push(c.dim(`   suggestion: ${line.suggestion}`));
  });

  if (report.typeDiagnostics.length > 0) {
    out.push("", c.bold(`Type Diagnostics (${report.typeDiagnostics.length}):`));
    for (const diagnostic of report.typeDiagnostics) {
      out.push(`  ${formatSpan(diagnostic.span)} ${diagnostic.severity}: ${diagnostic.message}`);
    }
  }

  if (report.externalIssues.length > 0) {
    out.push("", c.bold(`External Issues (${report.externalIssues.length}):`));
    for (const issue of report.externalIssues) {
      const origin = issue.source ? ` ${c.dim(`[${issue.source}]`)}` : "";
      out.push(`  ${formatSpan(issue.span)} ${issue.severity} ${c.cyan(issue.rule)}: ${issue.message}${origin}`);
      if (issue.suggestion) out.push(c.dim(`    suggestion: ${issue.suggestion}`));
    }
  }

  return out.join("\n") + "\n";
}
