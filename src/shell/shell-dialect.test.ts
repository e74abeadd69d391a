import { describe, expect, it } from "vitest";
import {
  detectShell,
  detectShellFromDirective,
  detectShellFromShebang,
  getCapabilities,
  getDefaultShell,
  parseShellName,
  Shell,
  SHELL_CAPABILITIES,
} from "./shell-dialect.ts";

// =============================================================================
// Names
// =============================================================================

describe("parseShellName", () => {
  it("maps names and paths to dialects", () => {
    expect(parseShellName("bash")).toBe(Shell.Bash);
    expect(parseShellName("/usr/bin/zsh")).toBe(Shell.Zsh);
    expect(parseShellName("Dash")).toBe(Shell.Dash);
    expect(parseShellName("ksh93")).toBe(Shell.Ksh);
    expect(parseShellName("mksh")).toBe(Shell.Ksh);
  });

  it("returns null for other interpreters", () => {
    expect(parseShellName("python3")).toBeNull();
    expect(parseShellName("")).toBeNull();
  });
});

// =============================================================================
// Detection
// =============================================================================

describe("detectShellFromShebang", () => {
  it("reads a direct interpreter path", () => {
    expect(detectShellFromShebang("#!/bin/bash")).toBe(Shell.Bash);
    expect(detectShellFromShebang("#! /bin/sh -e")).toBe(Shell.Sh);
  });

  it("reads the program after env", () => {
    expect(detectShellFromShebang("#!/usr/bin/env bash")).toBe(Shell.Bash);
    expect(detectShellFromShebang("#!/usr/bin/env -S zsh -f")).toBe(Shell.Zsh);
    expect(detectShellFromShebang("#!/usr/bin/env")).toBeNull();
  });

  it("ignores lines that are not shebangs", () => {
    expect(detectShellFromShebang("# /bin/bash")).toBeNull();
    expect(detectShellFromShebang("#!/usr/bin/python")).toBeNull();
  });
});

describe("detectShellFromDirective", () => {
  it("reads shell and shelltype comments", () => {
    expect(detectShellFromDirective("# shell: zsh")).toBe(Shell.Zsh);
    expect(detectShellFromDirective("#shelltype:ksh")).toBe(Shell.Ksh);
    expect(detectShellFromDirective("# Shell : dash")).toBe(Shell.Dash);
  });

  it("returns null without a directive", () => {
    expect(detectShellFromDirective("# shells are fun")).toBeNull();
    expect(detectShellFromDirective("echo shell: bash")).toBeNull();
  });
});

describe("detectShell", () => {
  it("prefers the shebang over a directive", () => {
    expect(detectShell("#!/bin/bash\n# shell: zsh\n")).toBe(Shell.Bash);
  });

  it("falls back to a directive in the first lines", () => {
    expect(detectShell("set -e\n# shell: dash\necho hi\n")).toBe(Shell.Dash);
    expect(detectShell("a\nb\n# shell: zsh\n", 2)).toBeNull();
  });

  it("returns null when nothing names a dialect", () => {
    expect(detectShell("echo hi\n")).toBeNull();
    expect(detectShell("")).toBeNull();
  });
});

// =============================================================================
// Capabilities
// =============================================================================

describe("Shell capabilities", () => {
  it("defaults to POSIX sh", () => {
    expect(getDefaultShell()).toBe(Shell.Sh);
  });

  it("lists a capability table for every dialect", () => {
    for (const shell of Object.values(Shell)) {
      expect(getCapabilities(shell)).toBe(SHELL_CAPABILITIES[shell]);
    }
  });

  it("gives POSIX sh none of the extensions", () => {
    expect(Object.values(getCapabilities(Shell.Sh)).every((value) => value === false)).toBe(true);
  });

  it("separates dash and ksh from bash", () => {
    expect(getCapabilities(Shell.Dash).hasAnsiCQuoting).toBe(true);
    expect(getCapabilities(Shell.Dash).hasArrays).toBe(false);
    expect(getCapabilities(Shell.Ksh).hasSource).toBe(false);
    expect(getCapabilities(Shell.Bash).hasSource).toBe(true);
  });
});
