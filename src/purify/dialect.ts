/**
 * Dialect detection from a file name, falling back to the content
 */

import { basename } from "node:path";
import type { Dialect } from "../core/types.ts";

export const DIALECTS: readonly Dialect[] = ["shell", "makefile", "dockerfile"];

export function isDialect(value: string): value is Dialect {
  return (DIALECTS as readonly string[]).includes(value);
}

const MAKEFILE_NAMES = new Set(["makefile", "gnumakefile", "bsdmakefile"]);
const DOCKERFILE_NAMES = new Set(["dockerfile", "containerfile"]);
const SHELL_EXTENSIONS = new Set([".sh", ".bash", ".dash", ".ksh", ".zsh"]);

const FROM_LINE = /^\s*FROM\s+\S/i;
const RULE_LINE = /^[^\s#:=][^:=]*::?(?!=)/;

function fromName(fileName: string): Dialect | null {
  const name = basename(fileName).toLowerCase();
  if (name === "") return null;
  if (MAKEFILE_NAMES.has(name) || name.endsWith(".mk") || name.endsWith(".mak")) return "makefile";
  if (DOCKERFILE_NAMES.has(name) || name.startsWith("dockerfile.") || name.endsWith(".dockerfile")) {
    return "dockerfile";
  }
  const dot = name.lastIndexOf(".");
  if (dot !== -1 && SHELL_EXTENSIONS.has(name.slice(dot))) return "shell";
  return null;
}

function fromContent(source: string): Dialect {
  if (source.startsWith("#!")) return "shell";
  const lines = source.split("\n");
  const first = lines.find((line) => line.trim() !== "" && !line.trimStart().startsWith("#"));
  if (first !== undefined && FROM_LINE.test(first)) return "dockerfile";
  const hasRecipe = lines.some((line, i) => i > 0 && line.startsWith("\t") && RULE_LINE.test(lines[i - 1] ?? ""));
  return hasRecipe ? "makefile" : "shell";
}

/**
 * Dialect of a source file. Well-known names and extensions win; otherwise
 * a shebang means shell, a leading `FROM` a Dockerfile, and a tab-indented
 * recipe under a rule header a Makefile. Shell is the default.
 */
export function detectDialect(fileName: string, source: string): Dialect {
  return fromName(fileName) ?? fromContent(source);
}
