/**
 * Gradual type checking for shell variables
 *
 * Types come from `# @type name: int` annotations and from `declare -i`,
 * `declare -a` and `declare -A`. Unannotated variables are never checked.
 * Optionally produces POSIX runtime guards to emit after annotated
 * assignments.
 */

import type { NodeId } from "../core/node-id.ts";
import type { Severity, Span } from "../core/types.ts";
import type * as AST from "../shell/ast.ts";
import { structurallyEqual } from "../shell/equality.ts";
import { parseShell } from "../shell/parser.ts";
import { collect, statementLists, walk } from "../shell/walk.ts";
import { commandName, staticText } from "../shell/words.ts";

export const SHELL_TYPES = ["int", "str", "path", "bool", "array"] as const;

export type ShellType = typeof SHELL_TYPES[number];

export type TypeDiagnosticKind = "mismatch" | "string-arithmetic" | "unknown-type";

export interface TypeDiagnostic {
  kind: TypeDiagnosticKind;
  variable: string;
  severity: Severity;
  span: Span;
  message: string;
}

export interface TypeCheckResult {
  /** Declared type of each variable, last declaration wins */
  types: Map<string, ShellType>;
  diagnostics: TypeDiagnostic[];
  /** Guard text to emit after each annotated assignment statement */
  guards: Map<NodeId, string>;
}

const ANNOTATION = /^\s*@type\s+([A-Za-z_][A-Za-z0-9_]*)\s*:\s*([A-Za-z]+)\s*$/;

const INTEGER = /^-?[0-9]+$/;

function isShellType(value: string): value is ShellType {
  return (SHELL_TYPES as readonly string[]).includes(value);
}

/**
 * POSIX guard that exits when `name` does not hold a value of `type`,
 * laid out the way the code generator renders it. Null for types with no
 * runtime check.
 */
export function guardFor(name: string, type: ShellType): string | null {
  const fail = (what: string) => [`echo "type error: ${name} must be ${what}" >&2`, "exit 1"];
  switch (type) {
    case "int":
      return [
        `case "$${name}" in`,
        "    *[!0-9]*)",
        ...fail("integer").map((text) => `        ${text}`),
        "        ;;",
        "esac",
      ].join("\n");
    case "path":
      return [
        `case "$${name}" in`,
        "    /* | ./* | ../*)",
        "        ;;",
        "    *)",
        ...fail("a path").map((text) => `        ${text}`),
        "        ;;",
        "esac",
      ].join("\n");
    case "str":
      return [
        `if [ -z "$${name}" ]; then`,
        ...fail("non-empty string").map((text) => `    ${text}`),
        "fi",
      ].join("\n");
    case "bool":
    case "array":
      return null;
  }
}

// =============================================================================
// Checker
// =============================================================================

export class TypeChecker {
  private readonly types = new Map<string, ShellType>();
  private readonly diagnostics: TypeDiagnostic[] = [];
  private readonly guards = new Map<NodeId, string>();
  private readonly following = new Map<AST.Statement, AST.Statement>();

  constructor(private readonly program: AST.Program) {
    for (const list of statementLists(program)) {
      list.forEach((statement, i) => {
        const next = list[i + 1];
        if (next) this.following.set(statement, next);
      });
    }
  }

  check(): TypeCheckResult {
    walk(this.program, (node, parent) => {
      switch (node.type) {
        case "Comment":
          this.annotation(node);
          break;
        case "Command":
          this.declaration(node);
          break;
        case "VariableAssignment":
          this.assignment(node, parent?.type !== "Command");
          break;
        case "ArithmeticExpansion":
        case "ArithmeticCommand":
          this.arithmetic(node);
          break;
      }
    });
    return { types: this.types, diagnostics: this.diagnostics, guards: this.guards };
  }

  private annotation(comment: AST.Comment): void {
    const match = comment.text.match(ANNOTATION);
    const name = match?.[1];
    const type = match?.[2];
    if (!name || !type) return;
    if (!isShellType(type)) {
      this.report("unknown-type", name, "warning", comment.span, `Unknown type '${type}' for '${name}'; expected one of ${SHELL_TYPES.join(", ")}`);
      return;
    }
    this.types.set(name, type);
  }

  private declaration(command: AST.Command): void {
    const name = commandName(command);
    if (name !== "declare" && name !== "typeset" && name !== "local") return;

    let type: ShellType | null = null;
    for (const arg of command.args) {
      const text = staticText(arg);
      if (text === null) continue;
      if (text.startsWith("-")) {
        if (text.includes("a") || text.includes("A")) type = "array";
        else if (text.includes("i")) type = "int";
        continue;
      }
      if (type === null) continue;

      const eq = text.indexOf("=");
      const variable = eq === -1 ? text : text.slice(0, eq);
      this.types.set(variable, type);
      if (type === "int" && eq !== -1) {
        const value = text.slice(eq + 1);
        if (!INTEGER.test(value)) this.mismatch(variable, type, value, arg.span);
      }
    }
  }

  private assignment(node: AST.VariableAssignment, statement: boolean): void {
    const type = this.types.get(node.name);
    if (!type) return;

    if (node.value.type === "ArrayLiteral") {
      if (type !== "array") this.mismatch(node.name, type, "an array", node.span);
    } else if (type === "array") {
      if (node.index === null) this.mismatch(node.name, type, "a scalar", node.span);
    } else {
      const value = staticText(node.value);
      if (value !== null && !matchesType(value, type)) this.mismatch(node.name, type, value, node.span);
    }

    if (!statement) return;
    const guard = guardFor(node.name, type);
    if (guard !== null && !this.alreadyGuarded(node, guard)) {
      this.guards.set(node.id, guard);
    }
  }

  /** The statement after the assignment is this exact guard already */
  private alreadyGuarded(node: AST.VariableAssignment, guard: string): boolean {
    const next = this.following.get(node);
    if (!next) return false;
    const [expected] = parseShell(guard).body;
    return expected !== undefined && structurallyEqual(next, expected);
  }

  private arithmetic(node: AST.ArithmeticExpansion | AST.ArithmeticCommand): void {
    if (!node.expression) return;
    const names = [
      ...collect(node.expression, "VariableReference").map((ref) => ({ name: ref.name, span: ref.span })),
      ...collect(node.expression, "ParameterExpansion").map((exp) => ({ name: exp.parameter, span: exp.span })),
    ];
    for (const { name, span } of names) {
      if (this.types.get(name) !== "str") continue;
      this.report("string-arithmetic", name, "warning", span, `String variable '${name}' is used in arithmetic`);
    }
  }

  private mismatch(name: string, type: ShellType, value: string, span: Span): void {
    this.report("mismatch", name, "error", span, `Type mismatch: '${name}' is ${type} but is assigned '${value}'`);
  }

  private report(kind: TypeDiagnosticKind, variable: string, severity: Severity, span: Span, message: string): void {
    this.diagnostics.push({ kind, variable, severity, span, message });
  }
}

function matchesType(value: string, type: Exclude<ShellType, "array">): boolean {
  switch (type) {
    case "int":
      return INTEGER.test(value);
    case "bool":
      return value === "true" || value === "false";
    case "path":
    case "str":
      return true;
  }
}

export function typeCheck(program: AST.Program): TypeCheckResult {
  return new TypeChecker(program).check();
}
