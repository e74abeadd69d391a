import { describe, expect, it } from "vitest";
import { createIssue } from "../analysis/issue.ts";
import { lineSpan } from "../core/types.ts";
import { purify } from "../purify/purifier.ts";
import { formatJson, toJson } from "./json.ts";
import { formatMarkdown } from "./markdown.ts";
import { mergeExternalIssues, type PurificationReport } from "./model.ts";
import { formatText } from "./text.ts";

const RANDOM_SUGGESTION = 'Derive the value from an input or a fixed seed, e.g. SEED="${SEED:-42}"';

const mixed = () => purify("mkdir /tmp/dir\necho $RANDOM\n").report;

function downgradedReport(): PurificationReport {
  return {
    dialect: "shell",
    transformationsApplied: 1,
    issuesFixed: 0,
    manualFixesNeeded: 1,
    lines: [{
      rule: "IDEM001",
      category: "idempotency",
      severity: "warning",
      safe: true,
      applied: false,
      downgraded: true,
      span: lineSpan(1, 7),
      message: "Added -p to mkdir",
      suggestion: "Use mkdir -p",
      reason: "-p is already present",
    }],
    typeDiagnostics: [],
    externalIssues: [],
  };
}

// =============================================================================
// Text
// =============================================================================

describe("Report - text", () => {
  it("lists fixed and manual lines", () => {
    expect(formatText(mixed())).toBe(
      [
        "Shell Script Purification Report",
        "================================",
        "Transformations Applied: 2",
        "Issues Fixed: 1",
        "Manual Fixes Needed: 1",
        "",
        "1: ✅ Added -p to mkdir (idempotency, 1:1)",
        "2: ⚠️  Non-deterministic $RANDOM (determinism, 2:6)",
        `   suggestion: ${RANDOM_SUGGESTION}`,
        "",
      ].join("\n"),
    );
  });

  it("shows why a line was not applied", () => {
    expect(formatText(downgradedReport()).split("\n").slice(6, 9)).toEqual([
      "1: ⚠️  Not applied: Added -p to mkdir (idempotency, 1:1)",
      "   reason: -p is already present",
      "   suggestion: Use mkdir -p",
    ]);
  });

  it("lists type diagnostics", () => {
    const { report } = purify("# @type count: int\ncount=many\n", { options: { typeCheck: true } });
    expect(formatText(report)).toBe(
      [
        "Shell Script Purification Report",
        "================================",
        "Transformations Applied: 0",
        "Issues Fixed: 0",
        "Manual Fixes Needed: 0",
        "",
        "Type Diagnostics (1):",
        "  2:1 error: Type mismatch: 'count' is int but is assigned 'many'",
        "",
      ].join("\n"),
    );
  });

  it("uses ANSI colors only when asked", () => {
    expect(formatText(mixed())).not.toContain("\u001b[");
    expect(formatText(mixed(), { color: true }).startsWith("\u001b[1m")).toBe(true);
  });
});

// =============================================================================
// JSON
// =============================================================================

describe("Report - json", () => {
  it("uses snake_case keys in a fixed order", () => {
    expect(Object.keys(toJson(mixed()))).toEqual([
      "dialect",
      "transformations_applied",
      "issues_fixed",
      "manual_fixes_needed",
      "report",
      "type_diagnostics",
      "external_issues",
    ]);
  });

  it("describes each line", () => {
    const json = toJson(mixed());
    expect(json.report[1]).toMatchObject({
      index: 2,
      status: "manual",
      rule: "DET001",
      category: "determinism",
      safe: false,
      message: "Non-deterministic $RANDOM",
      suggestion: RANDOM_SUGGESTION,
      reason: null,
    });
    expect(json.report[1]?.location).toMatchObject({ line: 2, column: 6 });
  });

  it("marks downgraded lines", () => {
    const [line] = toJson(downgradedReport()).report;
    expect(line?.status).toBe("downgraded");
    expect(line?.reason).toBe("-p is already present");
    expect(line?.location).toEqual({ line: 1, column: 1, end_line: 1, end_column: 8 });
  });

  it("ends with a newline and parses back", () => {
    const text = formatJson(mixed());
    expect(text.endsWith("}\n")).toBe(true);
    expect(JSON.parse(text)).toEqual(toJson(mixed()));
  });
});

// =============================================================================
// Markdown
// =============================================================================

describe("Report - markdown", () => {
  it("renders a table of lines", () => {
    expect(formatMarkdown(mixed())).toBe(
      [
        "# Shell Script Purification Report",
        "",
        "**Transformations**: 2",
        "**Issues Fixed**: 1",
        "**Manual Fixes Needed**: 1",
        "",
        "| # | Status | Category | Rule | Location | Message |",
        "| --- | --- | --- | --- | --- | --- |",
        "| 1 | fixed | idempotency | IDEM001 | 1:1 | Added -p to mkdir |",
        "| 2 | manual | determinism | DET001 | 2:6 | Non-deterministic $RANDOM |",
        "",
      ].join("\n"),
    );
  });

  it("escapes pipes in cells", () => {
    const report = mergeExternalIssues(downgradedReport(), [
      createIssue("X1", "security", "info", "a|b", lineSpan(3, 2)),
    ]);
    expect(formatMarkdown(report).split("\n").at(-2)).toBe("| 2 | external | security | X1 | 3:1 | a\\|b |");
  });
});

// =============================================================================
// External issues
// =============================================================================

describe("Report - external issues", () => {
  const external = [
    createIssue("SC2086", "security", "warning", "Double quote to prevent globbing", lineSpan(2, 5)),
    createIssue("SC2034", "portability", "info", "unused variable", lineSpan(1, 5)),
  ];

  it("merges sorted issues without touching the counts", () => {
    const report = mixed();
    const merged = mergeExternalIssues(report, external, "shellcheck");

    expect(merged.externalIssues.map((issue) => [issue.rule, issue.source])).toEqual([
      ["SC2034", "shellcheck"],
      ["SC2086", "shellcheck"],
    ]);
    expect(merged.issuesFixed).toBe(report.issuesFixed);
    expect(report.externalIssues).toEqual([]);
    expect(external[0]?.source).toBeUndefined();
  });

  it("shows them in the text report", () => {
    const text = formatText(mergeExternalIssues(downgradedReport(), external.slice(0, 1), "shellcheck"));
    expect(text.endsWith(
      "External Issues (1):\n  2:1 warning SC2086: Double quote to prevent globbing [shellcheck]\n",
    )).toBe(true);
  });
});
