import { describe, expect, it } from "vitest";
import { analyzeDockerfile, analyzeMakefile, analyzeShell } from "../analysis/analyzer.ts";
import { createIssue } from "../analysis/issue.ts";
import { lineSpan } from "../core/types.ts";
import { parseDockerfile } from "../dockerfile/parser.ts";
import { parseMakefile } from "../make/parser.ts";
import { parseShell } from "../shell/parser.ts";
import { plan } from "./planner.ts";

const planShell = (source: string) => {
  const program = parseShell(source);
  return plan(program, analyzeShell(program));
};

// =============================================================================
// Shell
// =============================================================================

describe("Planner - shell", () => {
  it("maps each issue to one transformation and skips side effects", () => {
    const planned = planShell("mkdir a\ntouch b\necho $RANDOM\n");
    expect(planned.map((t) => [t.rule, t.kind, t.safe])).toEqual([
      ["IDEM001", "AddFlag", true],
      ["DET001", "Advisory", false],
    ]);
    expect(planned[1]?.description).toBe("Non-deterministic $RANDOM");
  });

  it("extends an ln flag cluster", () => {
    const [transformation] = planShell("ln -sv a b\n");
    expect(transformation).toMatchObject({ kind: "ExtendFlag", from: "-sv", to: "-svf", description: "Changed ln -sv to ln -svf" });
  });

  it("adds -f when ln uses the long option", () => {
    const [transformation] = planShell("ln --symbolic a b\n");
    expect(transformation).toMatchObject({ kind: "AddFlag", flag: "-f", description: "Added -f to ln" });
  });

  it("keeps the issue's target and suggestion", () => {
    const program = parseShell("mkdir a\n");
    const [command] = program.body;
    const [transformation] = plan(program, analyzeShell(program));
    expect(transformation?.target).toBe(command?.id);
    expect(transformation?.suggestion).toBe("Use mkdir -p");
  });
});

// =============================================================================
// Makefile and Dockerfile
// =============================================================================

describe("Planner - makefile", () => {
  it("describes advisories by their subject", () => {
    const makefile = parseMakefile("all:\n\techo hi\n");
    const [transformation] = plan(makefile, analyzeMakefile(makefile));
    expect(transformation?.kind).toBe("Advisory");
    expect(transformation?.description).toBe("Manual fix needed for target 'all': AUTO_PHONY");
  });

  it("falls back to an advisory when the target is missing", () => {
    const makefile = parseMakefile("X := 1\n");
    const issue = createIssue("NO_WILDCARD", "determinism", "warning", "unsorted", lineSpan(1, 6));
    expect(plan(makefile, [issue]).map((t) => [t.kind, t.description])).toEqual([
      ["Advisory", "Manual fix needed: NO_WILDCARD"],
    ]);
  });
});

describe("Planner - dockerfile", () => {
  it("inserts --no-install-recommends after the install verb", () => {
    const dockerfile = parseDockerfile("FROM debian:12\nRUN apt-get install curl && rm -rf /var/lib/apt/lists/*\n");
    const planned = plan(dockerfile, analyzeDockerfile(dockerfile));
    expect(planned).toHaveLength(1);
    expect(planned[0]).toMatchObject({ kind: "InsertText", after: "apt-get install ", text: "--no-install-recommends " });
  });
});
