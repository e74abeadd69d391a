/**
 * Shell dialects and the constructs each one supports.
 *
 * Portability rules consult these capabilities: a construct is only flagged
 * when the script's dialect lacks it.
 */
export enum Shell {
  /** Bourne Again Shell */
  Bash = "bash",
  /** POSIX shell */
  Sh = "sh",
  /** Debian Almquist Shell */
  Dash = "dash",
  /** Korn Shell */
  Ksh = "ksh",
  /** Z Shell */
  Zsh = "zsh",
}

export interface ShellCapabilities {
  /** Indexed arrays (arr[0], arr=(a b)) */
  hasArrays: boolean;
  /** Associative arrays (declare -A) */
  hasAssociativeArrays: boolean;
  /** Process substitution <() and >() */
  hasProcessSubstitution: boolean;
  /** [[ ]] test command */
  hasDoubleSquareBracket: boolean;
  /** coproc keyword */
  hasCoproc: boolean;
  /** $'' ANSI-C quoting */
  hasAnsiCQuoting: boolean;
  /** `function name` declarations */
  hasFunctionKeyword: boolean;
  /** `source` builtin */
  hasSource: boolean;
  /** `select` menus */
  hasSelect: boolean;
  /** echo understands -e and -n */
  hasEchoFlags: boolean;
}

export const SHELL_CAPABILITIES: Readonly<Record<Shell, ShellCapabilities>> = {
  [Shell.Bash]: {
    hasArrays: true,
    hasAssociativeArrays: true,
    hasProcessSubstitution: true,
    hasDoubleSquareBracket: true,
    hasCoproc: true,
    hasAnsiCQuoting: true,
    hasFunctionKeyword: true,
    hasSource: true,
    hasSelect: true,
    hasEchoFlags: true,
  },
  [Shell.Sh]: {
    hasArrays: false,
    hasAssociativeArrays: false,
    hasProcessSubstitution: false,
    hasDoubleSquareBracket: false,
    hasCoproc: false,
    hasAnsiCQuoting: false,
    hasFunctionKeyword: false,
    hasSource: false,
    hasSelect: false,
    hasEchoFlags: false,
  },
  [Shell.Dash]: {
    hasArrays: false,
    hasAssociativeArrays: false,
    hasProcessSubstitution: false,
    hasDoubleSquareBracket: false,
    hasCoproc: false,
    hasAnsiCQuoting: true, // dash supports $''
    hasFunctionKeyword: false,
    hasSource: false,
    hasSelect: false,
    hasEchoFlags: false,
  },
  [Shell.Ksh]: {
    hasArrays: true,
    hasAssociativeArrays: true,
    hasProcessSubstitution: true,
    hasDoubleSquareBracket: true,
    hasCoproc: true,
    hasAnsiCQuoting: true,
    hasFunctionKeyword: true,
    hasSource: false,
    hasSelect: true,
    hasEchoFlags: false,
  },
  [Shell.Zsh]: {
    hasArrays: true,
    hasAssociativeArrays: true,
    hasProcessSubstitution: true,
    hasDoubleSquareBracket: true,
    hasCoproc: true,
    hasAnsiCQuoting: true,
    hasFunctionKeyword: true,
    hasSource: true,
    hasSelect: true,
    hasEchoFlags: true,
  },
};

export function getCapabilities(shell: Shell): ShellCapabilities {
  return SHELL_CAPABILITIES[shell];
}

/**
 * Dialect assumed when a script names none: plain POSIX sh.
 */
export function getDefaultShell(): Shell {
  return Shell.Sh;
}

const SHELL_NAMES: Readonly<Record<string, Shell>> = {
  bash: Shell.Bash,
  sh: Shell.Sh,
  dash: Shell.Dash,
  ksh: Shell.Ksh,
  ksh93: Shell.Ksh,
  mksh: Shell.Ksh,
  zsh: Shell.Zsh,
};

/**
 * Map an interpreter name or path (`bash`, `/usr/bin/zsh`) to a dialect.
 */
export function parseShellName(name: string): Shell | null {
  const base = name.slice(name.lastIndexOf("/") + 1).toLowerCase().replace(/[^a-z0-9]/g, "");
  return SHELL_NAMES[base] ?? null;
}

/**
 * Dialect named by a `#!` line: `#!/bin/bash`, `#!/usr/bin/env bash`,
 * `#!/usr/bin/env -S bash -e`.
 */
export function detectShellFromShebang(line: string): Shell | null {
  if (!line.startsWith("#!")) return null;

  const [interpreter = "", ...rest] = line.slice(2).trim().split(/\s+/);
  if (!interpreter.endsWith("/env")) return parseShellName(interpreter);

  const program = rest.find((word) => !word.startsWith("-"));
  return program ? parseShellName(program) : null;
}

/** `# shell: bash` or `# shelltype: bash` */
export function detectShellFromDirective(line: string): Shell | null {
  const match = /^#\s*shell(?:type)?\s*:\s*(\w+)/i.exec(line);
  return match?.[1] ? parseShellName(match[1]) : null;
}

/**
 * Dialect of a script: its shebang, else a directive comment in the first
 * `maxLines` lines, else null.
 */
export function detectShell(content: string, maxLines = 10): Shell | null {
  const lines = content.split("\n", maxLines);
  const fromShebang = detectShellFromShebang(lines[0] ?? "");
  if (fromShebang) return fromShebang;

  for (const line of lines) {
    const fromDirective = detectShellFromDirective(line);
    if (fromDirective) return fromDirective;
  }
  return null;
}
