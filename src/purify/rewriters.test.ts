import { describe, expect, it } from "vitest";
import { analyzeShell } from "../analysis/analyzer.ts";
import { createNodeId } from "../core/node-id.ts";
import { renderDockerfile } from "../dockerfile/codegen.ts";
import { parseDockerfile } from "../dockerfile/parser.ts";
import { parseMakefile } from "../make/parser.ts";
import { renderShell } from "../shell/codegen.ts";
import { parseShell } from "../shell/parser.ts";
import { applyDockerfile } from "./docker-rewriter.ts";
import { applyMakefile, wrapWithSort } from "./make-rewriter.ts";
import { plan } from "./planner.ts";
import { applyShell } from "./shell-rewriter.ts";
import type { Transformation } from "./transformation.ts";

const base = {
  rule: "TEST",
  category: "idempotency",
  severity: "warning",
  span: { start: { line: 1, column: 1, offset: 0 }, end: { line: 1, column: 2, offset: 1 } },
  description: "test change",
} as const;

// =============================================================================
// Shell
// =============================================================================

describe("Shell rewriter", () => {
  it("rewrites a copy and leaves the input tree alone", () => {
    const program = parseShell("mkdir a\n");
    const { tree, outcomes } = applyShell(program, plan(program, analyzeShell(program)));
    expect(outcomes.map((outcome) => outcome.status)).toEqual(["applied"]);
    expect(renderShell(tree)).toBe("mkdir -p a\n");
    expect(renderShell(program)).toBe("mkdir a\n");
  });

  it("downgrades a flag that is already there", () => {
    const program = parseShell("mkdir a\n");
    const [command] = program.body;
    const addFlag: Transformation = { ...base, kind: "AddFlag", safe: true, flag: "-p", target: command?.id };
    const { tree, outcomes } = applyShell(program, [addFlag, addFlag]);
    expect(outcomes.map((outcome) => [outcome.status, outcome.reason])).toEqual([
      ["applied", undefined],
      ["downgraded", "-p is already present"],
    ]);
    expect(renderShell(tree)).toBe("mkdir -p a\n");
  });

  it("downgrades missing targets and foreign kinds", () => {
    const program = parseShell("x=$(ls)\n");
    const missing: Transformation = { ...base, kind: "AppendSort", safe: true, target: createNodeId(999) };
    const foreign: Transformation = { ...base, kind: "WrapSort", safe: true, call: "wildcard", target: program.body[0]?.id };
    expect(applyShell(program, [missing, foreign]).outcomes.map((outcome) => outcome.reason)).toEqual([
      "target node no longer exists",
      "WrapSort does not apply to shell scripts",
    ]);
  });

  it("passes advisories through untouched", () => {
    const program = parseShell("echo hi\n");
    const note: Transformation = { ...base, kind: "Advisory", safe: false };
    const { tree, outcomes } = applyShell(program, [note]);
    expect(outcomes[0]?.status).toBe("advisory");
    expect(renderShell(tree)).toBe("echo hi\n");
  });
});

// =============================================================================
// Makefile
// =============================================================================

describe("Makefile rewriter", () => {
  it("wraps unsorted calls, nested ones included", () => {
    expect(wrapWithSort("$(wildcard a) $(sort $(wildcard b))", "wildcard")).toBe(
      "$(sort $(wildcard a)) $(sort $(wildcard b))",
    );
    expect(wrapWithSort("$(filter %.c,$(wildcard src/*))", "wildcard")).toBe("$(filter %.c,$(sort $(wildcard src/*)))");
  });

  it("wraps only unsorted find calls", () => {
    expect(wrapWithSort("$(shell find . -type f)", "shell")).toBe("$(sort $(shell find . -type f))");
    expect(wrapWithSort("$(shell find . | sort)", "shell")).toBe("$(shell find . | sort)");
    expect(wrapWithSort("$(shell ls)", "shell")).toBe("$(shell ls)");
  });

  it("downgrades transformations that no longer fit", () => {
    const makefile = parseMakefile("X := $(sort $(wildcard *.c))\nall:\n\techo\n");
    const [variable, target] = makefile.items;
    const outcomes = applyMakefile(makefile, [
      { ...base, kind: "WrapSort", safe: true, call: "wildcard", target: variable?.id },
      { ...base, kind: "WrapSort", safe: true, call: "wildcard", target: target?.id },
      { ...base, kind: "ReplaceKeyword", safe: true, from: "A", to: "B", target: variable?.id },
    ]).outcomes;
    expect(outcomes.map((outcome) => outcome.reason)).toEqual([
      "no unsorted $(wildcard ...) left to wrap",
      "target is not a variable",
      "ReplaceKeyword does not apply to Makefiles",
    ]);
  });
});

// =============================================================================
// Dockerfile
// =============================================================================

describe("Dockerfile rewriter", () => {
  it("keeps the keyword's case when replacing it", () => {
    const dockerfile = parseDockerfile("from alpine:3.19\nadd app.conf /etc/\n");
    const add = dockerfile.items[1];
    const { tree } = applyDockerfile(dockerfile, [
      { ...base, kind: "ReplaceKeyword", safe: true, from: "ADD", to: "COPY", target: add?.id },
    ]);
    expect(renderDockerfile(tree)).toBe("from alpine:3.19\ncopy app.conf /etc/\n");
    expect(renderDockerfile(dockerfile)).toBe("from alpine:3.19\nadd app.conf /etc/\n");
  });

  it("downgrades edits that are already in place", () => {
    const dockerfile = parseDockerfile("RUN apt-get install -y --no-install-recommends x && rm -rf /var/lib/apt/lists/*\n");
    const run = dockerfile.items[0];
    const outcomes = applyDockerfile(dockerfile, [
      { ...base, kind: "InsertText", safe: true, after: "apt-get install -y ", text: "--no-install-recommends ", target: run?.id },
      { ...base, kind: "AppendCommand", safe: true, command: "rm -rf /var/lib/apt/lists/*", target: run?.id },
      { ...base, kind: "InsertText", safe: true, after: "apk add ", text: "--no-cache ", target: run?.id },
    ]).outcomes;
    expect(outcomes.map((outcome) => outcome.reason)).toEqual([
      "'--no-install-recommends' is already present",
      "command is already present",
      "'apk add' not found",
    ]);
  });
});
