/**
 * Unit tests for the shell parser
 */

import { describe, expect, it } from "vitest";
import { ParseError } from "../core/errors.ts";
import type * as AST from "./ast.ts";
import { parseShell } from "./parser.ts";
import { Shell } from "./shell-dialect.ts";
import { staticText } from "./words.ts";

function first(source: string): AST.Statement {
  const [statement] = parseShell(source).body;
  if (!statement) throw new Error("no statement parsed");
  return statement;
}

function firstOf<T extends AST.Statement["type"]>(source: string, type: T): Extract<AST.Statement, { type: T }> {
  const statement = first(source);
  if (statement.type !== type) throw new Error(`expected ${type}, got ${statement.type}`);
  return statement as Extract<AST.Statement, { type: T }>;
}

const texts = (words: readonly AST.Word[]) => words.map(staticText);

// =============================================================================
// Simple commands
// =============================================================================

describe("Parser - simple commands", () => {
  it("parses a command with arguments", () => {
    const command = firstOf("echo hello world\n", "Command");
    expect(command.name && staticText(command.name)).toBe("echo");
    expect(texts(command.args)).toEqual(["hello", "world"]);
  });

  it("parses a standalone assignment", () => {
    const assignment = firstOf("X=1\n", "VariableAssignment");
    expect(assignment.name).toBe("X");
    expect(assignment.value.type === "Word" && staticText(assignment.value)).toBe("1");
    expect(assignment.exported).toBe(false);
  });

  it("parses export NAME=value as an exported assignment", () => {
    const assignment = firstOf("export PATH=/usr/local/bin\n", "VariableAssignment");
    expect(assignment.exported).toBe(true);
    expect(assignment.name).toBe("PATH");
  });

  it("parses array, indexed and appending assignments", () => {
    const array = firstOf("arr+=(a 'b c')\n", "VariableAssignment");
    expect(array.append).toBe(true);
    expect(array.value.type === "ArrayLiteral" && texts(array.value.elements)).toEqual(["a", "b c"]);

    expect(firstOf("a[2]=x\n", "VariableAssignment").index).toBe("2");
  });

  it("keeps prefix assignments on the command", () => {
    const command = firstOf("LANG=C sort data.txt\n", "Command");
    expect(command.assignments.map((assignment) => assignment.name)).toEqual(["LANG"]);
    expect(command.name && staticText(command.name)).toBe("sort");
  });

  it("parses return and exit with at most one argument", () => {
    const exit = firstOf("exit 3\n", "ReturnStatement");
    expect(exit.keyword).toBe("exit");
    expect(exit.code && staticText(exit.code)).toBe("3");
    expect(firstOf("return\n", "ReturnStatement").code).toBeNull();
    expect(first("exit 1 2\n").type).toBe("Command");
  });

  it("parses redirections with file descriptors", () => {
    const command = firstOf("make >build.log 2>&1\n", "Command");
    expect(command.redirects.map((redirect) => [redirect.fd, redirect.operator, staticText(redirect.target)])).toEqual([
      [null, ">", "build.log"],
      [2, ">&", "1"],
    ]);
  });

  it("parses here-documents with expansions in the body", () => {
    const command = firstOf("cat <<EOF\nhello $USER\nEOF\n", "Command");
    const heredoc = command.redirects[0]?.heredoc;
    expect(heredoc?.content).toBe("hello $USER\n");
    expect(heredoc?.body?.parts.map((part) => part.type)).toEqual(["Literal", "ParameterExpansion", "Literal"]);
  });

  it("keeps a quoted here-document body literal", () => {
    const command = firstOf("cat <<'EOF'\n$HOME\nEOF\n", "Command");
    expect(command.redirects[0]?.heredoc?.quoted).toBe(true);
    expect(command.redirects[0]?.heredoc?.body).toBeNull();
  });
});

// =============================================================================
// Words
// =============================================================================

describe("Parser - words", () => {
  const parts = (source: string) => {
    const command = firstOf(source, "Command");
    const [arg] = command.args;
    if (!arg) throw new Error("no argument");
    return arg.parts;
  };

  it("splits quoted and unquoted parts", () => {
    expect(parts(`echo pre'single'"double $x"\n`).map((part) => part.type)).toEqual([
      "Literal",
      "SingleQuoted",
      "DoubleQuoted",
    ]);
  });

  it("parses parameter expansion modifiers", () => {
    const [expansion] = parts("echo ${name:-default}\n");
    expect(expansion?.type).toBe("ParameterExpansion");
    if (expansion?.type === "ParameterExpansion") {
      expect(expansion.parameter).toBe("name");
      expect(expansion.modifier).toBe(":-");
      expect(expansion.argument && staticText(expansion.argument)).toBe("default");
    }
  });

  it("parses length and indirect expansions", () => {
    const [length] = parts("echo ${#items}\n");
    const [indirect] = parts("echo ${!ref}\n");
    expect(length?.type === "ParameterExpansion" && length.length).toBe(true);
    expect(indirect?.type === "ParameterExpansion" && indirect.indirect).toBe(true);
  });

  it("parses command substitution bodies as statements", () => {
    const [substitution] = parts("echo $(date +%s)\n");
    expect(substitution?.type).toBe("CommandSubstitution");
    if (substitution?.type === "CommandSubstitution") {
      const [inner] = substitution.body;
      expect(inner?.type === "Command" && inner.name && staticText(inner.name)).toBe("date");
      expect(substitution.backtick).toBe(false);
    }
  });

  it("parses arithmetic expansions", () => {
    const [arithmetic] = parts("echo $((a + 1))\n");
    expect(arithmetic?.type === "ArithmeticExpansion" && arithmetic.expression?.type).toBe("BinaryArithmeticExpression");
  });

  it("resolves escapes and quotes in static text", () => {
    const command = firstOf(`echo a\\ b "c\\$d"\n`, "Command");
    expect(texts(command.args)).toEqual(["a b", "c$d"]);
  });
});

// =============================================================================
// Lists and pipelines
// =============================================================================

describe("Parser - lists", () => {
  it("parses pipelines", () => {
    const pipeline = firstOf("ps aux | grep x |& tee out\n", "Pipeline");
    expect(pipeline.commands).toHaveLength(3);
    expect(pipeline.operators).toEqual(["|", "|&"]);
  });

  it("groups && and || from the left", () => {
    const list = firstOf("a && b || c\n", "AndOrList");
    expect(list.operator).toBe("||");
    expect(list.left.type === "AndOrList" && list.left.operator).toBe("&&");
  });

  it("parses background and negated commands", () => {
    expect(first("sleep 1 &\n").type).toBe("Background");
    expect(first("! grep -q x file\n").type).toBe("NegatedCommand");
  });

  it("splits statements on ; and newlines", () => {
    expect(parseShell("a; b\nc\n").body).toHaveLength(3);
  });
});

// =============================================================================
// Compound commands
// =============================================================================

describe("Parser - compound commands", () => {
  it("parses if / elif / else", () => {
    const node = firstOf("if a; then b; elif c; then d; else e; fi\n", "IfStatement");
    expect(node.test).toHaveLength(1);
    expect(node.consequent).toHaveLength(1);
    const elif = node.alternate;
    expect(elif !== null && !Array.isArray(elif) && elif.elif).toBe(true);
    if (elif !== null && !Array.isArray(elif)) {
      expect(Array.isArray(elif.alternate) && elif.alternate.length).toBe(1);
    }
  });

  it("parses for loops with and without a word list", () => {
    const loop = firstOf("for f in a b; do echo $f; done\n", "ForStatement");
    expect(loop.variable).toBe("f");
    expect(loop.items && texts(loop.items)).toEqual(["a", "b"]);
    expect(firstOf("for arg; do echo $arg; done\n", "ForStatement").items).toBeNull();
  });

  it("parses C-style for loops", () => {
    const loop = firstOf("for ((i = 0; i < 3; i++)); do echo $i; done\n", "CStyleForStatement");
    expect([loop.init, loop.test, loop.update]).toEqual(["i = 0", "i < 3", "i++"]);
  });

  it("parses while and until loops", () => {
    expect(firstOf("while read line; do echo $line; done < input\n", "WhileStatement").redirects).toHaveLength(1);
    expect(firstOf("until false; do :; done\n", "UntilStatement").body).toHaveLength(1);
  });

  it("parses case clauses with alternatives and terminators", () => {
    const node = firstOf("case $x in\n  a|b) echo ab;;\n  c) echo c;&\n  *) echo other\nesac\n", "CaseStatement");
    expect(node.clauses.map((clause) => texts(clause.patterns))).toEqual([["a", "b"], ["c"], ["*"]]);
    expect(node.clauses.map((clause) => clause.terminator)).toEqual([";;", ";&", ";;"]);
  });

  it("parses select loops", () => {
    const node = firstOf("select opt in x y; do echo $opt; done\n", "SelectStatement");
    expect(node.variable).toBe("opt");
    expect(node.items && texts(node.items)).toEqual(["x", "y"]);
  });

  it("parses functions in both forms", () => {
    const plain = firstOf("greet() { echo hi; }\n", "FunctionDeclaration");
    expect(plain.name).toBe("greet");
    expect(plain.keyword).toBe(false);
    expect(plain.body.type).toBe("Group");

    expect(firstOf("function cleanup { :; }\n", "FunctionDeclaration").keyword).toBe(true);
  });

  it("tells subshells from brace groups", () => {
    expect(firstOf("(cd /tmp && ls)\n", "Group").subshell).toBe(true);
    expect(firstOf("{ a; b; }\n", "Group").subshell).toBe(false);
  });

  it("parses [[ ]] expressions", () => {
    const node = firstOf("[[ -f $file && $mode == fast ]]\n", "TestCommand");
    const expression = node.expression;
    expect(expression.type).toBe("LogicalTest");
    if (expression.type === "LogicalTest") {
      expect(expression.left.type === "UnaryTest" && expression.left.operator).toBe("-f");
      expect(expression.right.type === "BinaryTest" && expression.right.operator).toBe("==");
    }
  });

  it("reads a =~ pattern up to ]]", () => {
    const node = firstOf("[[ $x =~ ^(a|b)$ ]]\n", "TestCommand");
    const expression = node.expression;
    expect(expression.type === "BinaryTest" && staticText(expression.right)).toBe("^(a|b)$");
  });

  it("parses arithmetic commands", () => {
    const node = firstOf("((count += 2))\n", "ArithmeticCommand");
    expect(node.raw).toBe("count += 2");
    expect(node.expression?.type).toBe("AssignmentExpression");
  });
});

// =============================================================================
// Layout and metadata
// =============================================================================

describe("Parser - layout", () => {
  it("records blank lines and trailing comments", () => {
    const program = parseShell("a\n\n\nb # note\n");
    const [, b, note] = program.body;
    expect(b?.layout?.blankLinesBefore).toBe(2);
    expect(note?.type).toBe("Comment");
    expect(note?.layout?.sameLine).toBe(true);
  });

  it("records where arguments were continued", () => {
    expect(firstOf("cmd a \\\n  b\n", "Command").layout?.continuations).toEqual([1]);
  });

  it("counts lines and detects the dialect", () => {
    expect(parseShell("").metadata.lineCount).toBe(0);
    expect(parseShell("a\nb\n").metadata.lineCount).toBe(2);
    expect(parseShell("#!/usr/bin/env bash\necho\n").metadata.dialect).toBe(Shell.Bash);
    expect(parseShell("echo\n").metadata.dialect).toBe(Shell.Sh);
    expect(parseShell("echo\n", { dialect: Shell.Zsh }).metadata.dialect).toBe(Shell.Zsh);
  });

  it("gives every node a distinct id", () => {
    const program = parseShell("if a; then b c; fi\n");
    const node = program.body[0];
    const ids = new Set([program.id, node?.id]);
    expect(ids.size).toBe(2);
  });
});

// =============================================================================
// Errors
// =============================================================================

describe("Parser - errors", () => {
  it("reports a missing fi with the enclosing construct", () => {
    try {
      parseShell("if true; then\n  echo hi\n", { source: "deploy.sh" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.reason).toBe("expected 'fi', found end of input");
        expect(error.context).toBe("in 'if' statement started at line 1");
        expect(error.file).toBe("deploy.sh");
        expect(error.line).toBe(3);
      }
    }
  });

  it("reports a stray closing keyword", () => {
    expect(() => parseShell("done\n")).toThrow("syntax error near unexpected token 'done'");
  });

  it("reports a missing separator", () => {
    expect(() => parseShell("echo )\n")).toThrow("expected ';' or newline, found ')'");
  });

  it("reports a bad loop variable", () => {
    expect(() => parseShell("for 1 in a; do :; done\n")).toThrow("expected loop variable name, found '1'");
  });

  it("reports a function body that is not compound", () => {
    expect(() => parseShell("f() echo hi\n")).toThrow("function body must be a compound command");
  });

  it("reports a missing done inside a for loop", () => {
    expect(() => parseShell("for f in a; do\n  echo\n")).toThrow("in 'for' loop (variable: f) started at line 1");
  });
});
