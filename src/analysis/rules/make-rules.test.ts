import { describe, expect, it } from "vitest";
import { type CategoryFlags, mergeOptions, STANDARD_PRESET } from "../../core/config.ts";
import { ISSUE_CATEGORIES, type IssueCategory } from "../../core/types.ts";
import { parseMakefile } from "../../make/parser.ts";
import { analyzeMakefile } from "../analyzer.ts";
import { closingParen, unsortedCalls } from "./make-rules.ts";

/** Analyze with a single category enabled */
function analyze(source: string, category: IssueCategory) {
  const categories: Partial<CategoryFlags> = {};
  for (const c of ISSUE_CATEGORIES) categories[c] = c === category;
  return analyzeMakefile(parseMakefile(source), mergeOptions(STANDARD_PRESET, { categories }));
}

const rules = (source: string, category: IssueCategory) => analyze(source, category).map((issue) => issue.rule);
const messages = (source: string, category: IssueCategory) => analyze(source, category).map((issue) => issue.message);

// =============================================================================
// Determinism
// =============================================================================

describe("Makefile rules - determinism", () => {
  it("flags unsorted wildcards", () => {
    const [issue, ...rest] = analyze("SRCS = $(wildcard *.c)\n", "determinism");
    expect(rest).toEqual([]);
    expect(issue?.rule).toBe("NO_WILDCARD");
    expect(issue?.suggestion).toBe("SRCS = $(sort $(wildcard ...))");
    expect(rules("SRCS := $(sort $(wildcard *.c))\n", "determinism")).toEqual([]);
  });

  it("leaves wildcards alone anywhere inside a sort", () => {
    expect(rules("SRCS := $(sort $(wildcard a/*.c) $(wildcard b/*.c))\n", "determinism")).toEqual([]);
    expect(rules("SRCS := $(sort $(filter %.c,$(wildcard *)))\n", "determinism")).toEqual([]);
  });

  it("flags unsorted find calls", () => {
    expect(rules("FILES := $(shell find . -name '*.c')\n", "determinism")).toEqual(["NO_UNORDERED_FIND"]);
    expect(rules("FILES := $(shell find . -name '*.c' | sort)\n", "determinism")).toEqual([]);
  });

  it("flags build timestamps and random values", () => {
    expect(messages("BUILT := $(shell date +%s)\nSEED := $$RANDOM\n", "determinism")).toEqual([
      "Variable 'BUILT' captures the build time",
      "Variable 'SEED' takes a random value",
    ]);
  });
});

// =============================================================================
// Reproducibility
// =============================================================================

describe("Makefile rules - reproducibility", () => {
  it("suggests .PHONY for well-known targets", () => {
    const [issue] = analyze("all:\n\techo hi\n", "reproducibility");
    expect(issue?.message).toBe("Target 'all' does not create a file but is not declared .PHONY");
    expect(issue?.severity).toBe("info");
    expect(rules(".PHONY: all\nall:\n\techo hi\n", "reproducibility")).toEqual([]);
  });

  it("flags timestamps, random values and process ids in recipes", () => {
    expect(messages("out:\n\tdate > stamp\n\techo $$RANDOM > seed\n\ttouch /tmp/x.$$$$\n", "reproducibility")).toEqual([
      "Recipe of target 'out' captures the build time",
      "Recipe of target 'out' uses a random value",
      "Recipe of target 'out' uses the shell's process id",
    ]);
  });

  it("accepts dates derived from SOURCE_DATE_EPOCH", () => {
    expect(rules("out:\n\tdate -u -d @$(SOURCE_DATE_EPOCH) > stamp\n", "reproducibility")).toEqual([]);
  });

  it("flags host-dependent variables and mktemp", () => {
    expect(messages("HOST := $(shell hostname)\nout:\n\tmktemp\n", "reproducibility")).toEqual([
      "Variable 'HOST' depends on the build host",
      "Recipe of target 'out' creates a randomly named temporary file",
    ]);
  });
});

// =============================================================================
// Parallel safety
// =============================================================================

describe("Makefile rules - parallel safety", () => {
  it("flags one output written by several targets", () => {
    const issues = analyze("a:\n\techo a > out.txt\nb:\n\techo b > out.txt\n", "parallel-safety");
    expect(issues.map((issue) => [issue.rule, issue.span.start.line])).toEqual([
      ["MAKE_NOTPARALLEL", 1],
      ["MAKE_RACE", 4],
    ]);
    expect(issues[1]?.message).toBe("Output 'out.txt' is written by several targets: a, b");
  });

  it("flags reading another target's output without depending on it", () => {
    const source = "gen:\n\techo x > data.txt\nuse:\n\tcat data.txt\n";
    expect(messages(source, "parallel-safety")).toEqual([
      "Parallel-safety issues found and .NOTPARALLEL is not set",
      "Target 'use' reads 'data.txt' written by 'gen' without depending on it",
    ]);
    expect(rules("gen:\n\techo x > data.txt\nuse: gen\n\tcat data.txt\n", "parallel-safety")).toEqual([]);
  });

  it("flags directories created by several targets", () => {
    expect(rules(".NOTPARALLEL:\na:\n\tmkdir build\nb:\n\tmkdir build\n", "parallel-safety")).toEqual(["MAKE_DIR_RACE"]);
  });

  it("flags recursive make with a directory", () => {
    expect(messages(".NOTPARALLEL:\nsub:\n\t$(MAKE) -C lib\n", "parallel-safety")).toEqual([
      "Recursive make into 'lib' has no ordering against sibling targets",
    ]);
  });
});

// =============================================================================
// Performance
// =============================================================================

describe("Makefile rules - performance", () => {
  it("suggests := for constant recursive variables", () => {
    const issues = analyze("CC = gcc\n", "performance");
    expect(issues.map((issue) => issue.rule)).toEqual(["MAKE_SIMPLE_EXPANSION", "MAKE_SUFFIXES"]);
    expect(issues[0]?.suggestion).toBe("CC := gcc");
  });

  it("leaves recursive variables with references alone", () => {
    expect(rules("FLAGS = $(BASE) -O2\n", "performance")).toEqual([]);
  });

  it("suggests a pattern rule for repeated object targets", () => {
    const source = "a.o: a.c\n\t$(CC) -c a.c\nb.o: b.c\n\t$(CC) -c b.c\nc.o: c.c\n\t$(CC) -c c.c\n";
    expect(messages(source, "performance")).toEqual([
      "3 object targets repeat the same compile recipe",
      "Built-in suffix rules are searched for every target",
    ]);
  });

  it("flags recipes that start many shells", () => {
    expect(messages(".SUFFIXES:\nclean:\n\trm a\n\trm b\n", "performance")).toEqual([
      "Recipe of target 'clean' starts a shell for each of 2 lines",
    ]);
  });
});

// =============================================================================
// Error handling
// =============================================================================

describe("Makefile rules - error handling", () => {
  it("flags commands without error handling", () => {
    const issues = analyze("build:\n\tmkdir out\n", "error-handling");
    expect(issues.map((issue) => issue.rule)).toEqual(["MAKE_DELETE_ON_ERROR", "MAKE_NO_ERROR_HANDLING"]);
    expect(issues[1]?.message).toBe("'mkdir' in target 'build' has no error handling");
    expect(issues[1]?.suggestion).toBe("mkdir out || exit 1");
  });

  it("accepts commands whose failure is handled", () => {
    expect(rules("build:\n\t-mkdir out\n\tcp a b || true\n", "error-handling")).toEqual([]);
  });

  it("flags silenced commands, cd across lines, bash -c and loops", () => {
    const source = ".DELETE_ON_ERROR:\nx:\n\t@rm f\n\tcd src\n\tcd lib\n\tbash -c 'make all'\n\tfor d in a b; do make -C $$d; done\n";
    expect(rules(source, "error-handling")).toEqual([
      "MAKE_SILENT_FAILURE",
      "MAKE_ONESHELL",
      "MAKE_NO_SET_E",
      "MAKE_LOOP_ERRORS",
    ]);
  });

  it("does not flag @echo", () => {
    expect(rules("x:\n\t@echo building\n", "error-handling")).toEqual([]);
  });
});

// =============================================================================
// Portability
// =============================================================================

describe("Makefile rules - portability", () => {
  it("flags shell- and platform-specific recipe lines", () => {
    const source = "t:\n\t[[ -f x ]] && echo y\n\tuname -s\n\tsource env.sh\n\tsed -i s/a/b/ f\n\techo -n hi\n";
    expect(rules(source, "portability")).toEqual([
      "MAKE_BASHISM",
      "MAKE_PLATFORM",
      "MAKE_SHELL_SPECIFIC",
      "MAKE_NONPORTABLE_FLAG",
      "MAKE_NONPORTABLE_ECHO",
    ]);
  });
});

// =============================================================================
// Text helpers
// =============================================================================

describe("Makefile rule helpers", () => {
  it("finds calls not already wrapped in sort", () => {
    expect(unsortedCalls("$(wildcard a) $(sort $(wildcard b))", "wildcard")).toEqual([0]);
  });

  it("treats every call nested under sort as sorted", () => {
    expect(unsortedCalls("$(sort $(wildcard a) $(wildcard b)) $(wildcard c)", "wildcard")).toEqual([36]);
    expect(unsortedCalls("$(filter %.c,$(wildcard *)) ${X} $(wildcard d)", "wildcard")).toEqual([13, 33]);
  });

  it("finds the closing parenthesis of a call", () => {
    expect(closingParen("$(a $(b)) c", 1)).toBe(9);
    expect(closingParen("$(a", 1)).toBe(-1);
  });
});
