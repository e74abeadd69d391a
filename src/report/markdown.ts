/**
 * Markdown report
 */

import { formatSpan } from "../core/types.ts";
import { DIALECT_TITLES, lineStatus, type PurificationReport } from "./model.ts";

function cell(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}

function row(cells: readonly string[]): string {
  return `| ${cells.join(" | ")} |`;
}

const HEADER = ["#", "Status", "Category", "Rule", "Location", "Message"];

export function formatMarkdown(report: PurificationReport): string {
  const out: string[] = [
    `# ${DIALECT_TITLES[report.dialect]} Purification Report`,
    "",
    `**Transformations**: ${report.transformationsApplied}`,
    `**Issues Fixed**: ${report.issuesFixed}`,
    `**Manual Fixes Needed**: ${report.manualFixesNeeded}`,
  ];

  const rows = [
    ...report.lines.map((line) => [lineStatus(line), line.category, line.rule, formatSpan(line.span), line.message]),
    ...report.externalIssues.map((issue) => ["external", issue.category, issue.rule, formatSpan(issue.span), issue.message]),
  ];

  if (rows.length > 0) {
    out.push("", row(HEADER), row(HEADER.map(() => "---")));
    rows.forEach((cells, i) => out.push(row([String(i + 1), ...cells.map(cell)])));
  }

  if (report.typeDiagnostics.length > 0) {
    out.push("", "## Type Diagnostics", "");
    for (const diagnostic of report.typeDiagnostics) {
      out.push(`- ${formatSpan(diagnostic.span)} **${diagnostic.severity}**: ${diagnostic.message}`);
    }
  }

  return out.join("\n") + "\n";
}
