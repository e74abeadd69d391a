/**
 * Shell Code Generator
 *
 * Renders a Program back to shell text. parse(render(tree)) is structurally
 * equal to the tree, except for `select`, which is lowered to a POSIX menu
 * loop.
 */

import type { FormatOptions } from "../core/config.ts";
import { invariantViolation } from "../core/errors.ts";
import type { NodeId } from "../core/node-id.ts";
import type * as AST from "./ast.ts";
import {
  type HeredocText,
  hasHeredocs,
  INDENT_UNIT,
  joinLines,
  type Line,
  line,
  OutputEmitter,
  prefixLines,
  suffixLines,
} from "./emitter.ts";
import { RESERVED_WORDS } from "./operators.ts";

export interface RenderOptions extends Partial<FormatOptions> {
  /** Text emitted directly after the statement with the given id */
  guards?: ReadonlyMap<NodeId, string>;
}

type WordContext = "argument" | "value" | "operand";

const LINE_CONTINUATION = " \\";

// =============================================================================
// Code Generator
// =============================================================================

export class ShellCodeGenerator {
  private readonly keepBlankLines: boolean;
  private readonly keepContinuations: boolean;
  private readonly maxLineLength: number | undefined;
  private readonly guards: ReadonlyMap<NodeId, string>;

  constructor(options: RenderOptions = {}) {
    const preserve = options.preserveFormatting ?? false;
    this.keepBlankLines = preserve || (options.skipBlankLineRemoval ?? false);
    this.keepContinuations = preserve || (options.skipConsolidation ?? false);
    this.maxLineLength = preserve ? undefined : options.maxLineLength;
    this.guards = options.guards ?? new Map();
  }

  generate(program: AST.Program): string {
    const emitter = new OutputEmitter(INDENT_UNIT);
    emitter.emitLines(this.statementList(program.body, 0));
    return emitter.toString();
  }

  // ===========================================================================
  // Statement lists
  // ===========================================================================

  /** One statement per line, with blank lines and trailing comments */
  private statementList(statements: readonly AST.Statement[], depth: number): Line[] {
    let out: Line[] = [];

    for (const statement of statements) {
      const layout = statement.layout;

      if (statement.type === "Comment" && layout?.sameLine && out.length > 0) {
        out = suffixLines(out, ` #${statement.text}`);
        continue;
      }

      const blanks = layout?.blankLinesBefore ?? 0;
      const count = this.keepBlankLines ? blanks : out.length === 0 ? 0 : Math.min(blanks, 1);
      for (let i = 0; i < count; i++) {
        out.push(line(0, ""));
      }

      out.push(...this.statement(statement, depth));

      const guard = this.guards.get(statement.id);
      if (guard !== undefined) {
        out.push(...guard.split("\n").map((text) => line(depth, text)));
      }
    }

    return out;
  }

  /**
   * Statements on as few lines as possible, for `if`/`while` tests and
   * substitutions. A comment forces the next statement onto a new line.
   */
  private sequence(statements: readonly AST.Statement[], depth: number): Line[] {
    let out: Line[] = [];
    let previous: AST.Statement | null = null;

    for (const statement of statements) {
      const lines = this.statement(statement, depth);
      if (!previous) {
        out = lines;
      } else if (previous.type === "Comment") {
        out = [...out, ...lines];
      } else {
        out = joinLines(out, this.separatorAfter(previous, statement), lines);
      }
      previous = statement;
    }

    return out;
  }

  private separatorAfter(previous: AST.Statement, next: AST.Statement): string {
    if (next.type === "Comment" || previous.type === "Background") return " ";
    return "; ";
  }

  /** Close a sequence with a keyword such as `then` or `do` */
  private terminate(statements: readonly AST.Statement[], lines: Line[], keyword: string, depth: number): Line[] {
    const last = statements[statements.length - 1];
    if (!last) return suffixLines(lines, ` ${keyword}`);
    if (last.type === "Comment") return [...lines, line(depth, keyword)];
    return suffixLines(lines, last.type === "Background" ? ` ${keyword}` : `; ${keyword}`);
  }

  private block(statements: readonly AST.Statement[], depth: number): Line[] {
    return this.statementList(statements, depth + 1);
  }

  // ===========================================================================
  // Statements
  // ===========================================================================

  private statement(node: AST.Statement, depth: number): Line[] {
    switch (node.type) {
      case "Command":
        return this.command(node, depth);
      case "Pipeline":
        return this.pipeline(node, depth);
      case "AndOrList":
        return joinLines(this.statement(node.left, depth), ` ${node.operator} `, this.statement(node.right, depth));
      case "Background":
        return suffixLines(this.statement(node.command, depth), " &");
      case "NegatedCommand":
        return prefixLines("! ", this.statement(node.command, depth));
      case "Coproc":
        return prefixLines(node.name ? `coproc ${node.name} ` : "coproc ", this.statement(node.body, depth));
      case "IfStatement":
        return this.withRedirects(this.ifStatement(node, depth, "if"), node.redirects);
      case "WhileStatement":
        return this.withRedirects(this.loop("while", node.test, node.body, depth), node.redirects);
      case "UntilStatement":
        return this.withRedirects(this.loop("until", node.test, node.body, depth), node.redirects);
      case "ForStatement":
        return this.withRedirects(
          this.doGroup(`for ${node.variable}${this.loopItems(node.items)}; do`, node.body, depth),
          node.redirects,
        );
      case "CStyleForStatement":
        return this.withRedirects(
          this.doGroup(`for ((${node.init}; ${node.test}; ${node.update})); do`, node.body, depth),
          node.redirects,
        );
      case "CaseStatement":
        return this.withRedirects(this.caseStatement(node, depth), node.redirects);
      case "SelectStatement":
        return this.withRedirects(this.selectLoop(node, depth), node.redirects);
      case "FunctionDeclaration":
        return prefixLines(node.keyword ? `function ${node.name}() ` : `${node.name}() `, this.statement(node.body, depth));
      case "Group":
        return this.withRedirects(this.group(node, depth), node.redirects);
      case "ReturnStatement":
        return [line(depth, node.code ? `${node.keyword} ${this.word(node.code, "argument")}` : node.keyword)];
      case "VariableAssignment":
        return [line(depth, (node.exported ? "export " : "") + this.assignment(node))];
      case "TestCommand":
        return this.withRedirects([line(depth, `[[ ${this.test(node.expression)} ]]`)], node.redirects);
      case "ArithmeticCommand":
        return this.withRedirects([line(depth, `((${node.raw}))`)], node.redirects);
      case "Comment":
        return [line(depth, `#${node.text}`)];
      default:
        return unreachable(node);
    }
  }

  private command(node: AST.Command, depth: number): Line[] {
    const head = [
      ...node.assignments.map((assignment) => this.assignment(assignment)),
      ...(node.name ? [this.word(node.name, "operand")] : []),
    ];
    const args = node.args.map((arg) => this.word(arg, "argument"));
    const redirects = node.redirects.map((redirect) => this.redirection(redirect));
    const heredocs = this.heredocsOf(node.redirects);

    const breaks = this.keepContinuations ? new Set(node.layout?.continuations ?? []) : new Set<number>();
    if (breaks.size > 0) {
      const lines: Line[] = [];
      let current = [...head];
      args.forEach((arg, i) => {
        if (breaks.has(i) && current.length > 0) {
          lines.push(line(lines.length === 0 ? depth : depth + 1, current.join(" ") + LINE_CONTINUATION));
          current = [];
        }
        current.push(arg);
      });
      current.push(...redirects);
      lines.push(line(lines.length === 0 ? depth : depth + 1, current.join(" "), heredocs));
      return lines;
    }

    const tokens = [...head, ...args, ...redirects];
    return this.wrap(tokens, depth, heredocs);
  }

  /** Break a command over several lines when it exceeds the line length */
  private wrap(tokens: readonly string[], depth: number, heredocs: HeredocText[]): Line[] {
    const text = tokens.join(" ");
    const limit = this.maxLineLength;
    const indent = INDENT_UNIT.length * depth;
    if (limit === undefined || indent + text.length <= limit || tokens.some((token) => token.includes("\n"))) {
      return [line(depth, text, heredocs)];
    }

    const lines: Line[] = [];
    let current: string[] = [];
    let width = indent;
    for (const token of tokens) {
      const added = current.length === 0 ? token.length : token.length + 1;
      if (current.length > 0 && width + added + LINE_CONTINUATION.length > limit) {
        lines.push(line(lines.length === 0 ? depth : depth + 1, current.join(" ") + LINE_CONTINUATION));
        current = [];
        width = INDENT_UNIT.length * (depth + 1);
      }
      width += current.length === 0 ? token.length : token.length + 1;
      current.push(token);
    }
    lines.push(line(lines.length === 0 ? depth : depth + 1, current.join(" "), heredocs));
    return lines;
  }

  private pipeline(node: AST.Pipeline, depth: number): Line[] {
    let out: Line[] = [];
    node.commands.forEach((command, i) => {
      const lines = this.statement(command, depth);
      if (i === 0) {
        out = lines;
        return;
      }
      const operator = node.operators[i - 1] ?? "|";
      out = joinLines(out, ` ${operator} `, lines);
    });
    return out;
  }

  private ifStatement(node: AST.IfStatement, depth: number, keyword: "if" | "elif"): Line[] {
    const header = this.terminate(node.test, prefixLines(`${keyword} `, this.sequence(node.test, depth)), "then", depth);
    const lines = [...header, ...this.block(node.consequent, depth)];

    if (node.alternate === null) {
      lines.push(line(depth, "fi"));
    } else if (Array.isArray(node.alternate)) {
      lines.push(line(depth, "else"), ...this.block(node.alternate, depth), line(depth, "fi"));
    } else {
      lines.push(...this.ifStatement(node.alternate, depth, "elif"));
    }
    return lines;
  }

  private loop(keyword: string, test: readonly AST.Statement[], body: readonly AST.Statement[], depth: number): Line[] {
    const header = this.terminate(test, prefixLines(`${keyword} `, this.sequence(test, depth)), "do", depth);
    return [...header, ...this.block(body, depth), line(depth, "done")];
  }

  private doGroup(header: string, body: readonly AST.Statement[], depth: number): Line[] {
    return [line(depth, header), ...this.block(body, depth), line(depth, "done")];
  }

  private loopItems(items: readonly AST.Word[] | null): string {
    if (items === null) return "";
    return [" in", ...items.map((item) => this.word(item, "argument"))].join(" ");
  }

  private caseStatement(node: AST.CaseStatement, depth: number): Line[] {
    const lines = [line(depth, `case ${this.word(node.word, "argument")} in`)];
    for (const clause of node.clauses) {
      const patterns = clause.patterns.map((pattern) => this.word(pattern, "argument")).join(" | ");
      lines.push(
        line(depth + 1, `${patterns})`),
        ...this.statementList(clause.body, depth + 2),
        line(depth + 2, clause.terminator),
      );
    }
    lines.push(line(depth, "esac"));
    return lines;
  }

  /**
   * `select` has no POSIX form: print the menu, read a reply, map it back to
   * the chosen item, then run the body.
   */
  private selectLoop(node: AST.SelectStatement, depth: number): Line[] {
    const items = node.items === null ? `"$@"` : node.items.map((item) => this.word(item, "argument")).join(" ");
    const inner = depth + 1;
    const nested = depth + 2;
    return [
      line(depth, "while true; do"),
      line(inner, "_select_index=1"),
      line(inner, `for _select_item in ${items}; do`),
      line(nested, `printf '%s) %s\\n' "$_select_index" "$_select_item" >&2`),
      line(nested, "_select_index=$((_select_index + 1))"),
      line(inner, "done"),
      line(inner, `printf '%s' "\${PS3:-#? }" >&2`),
      line(inner, "IFS= read -r REPLY || break"),
      line(inner, `${node.variable}=`),
      line(inner, "_select_index=1"),
      line(inner, `for _select_item in ${items}; do`),
      line(nested, `if [ "$_select_index" = "$REPLY" ]; then`),
      line(nested + 1, `${node.variable}=$_select_item`),
      line(nested, "fi"),
      line(nested, "_select_index=$((_select_index + 1))"),
      line(inner, "done"),
      ...this.block(node.body, depth),
      line(depth, "done"),
    ];
  }

  private group(node: AST.Group, depth: number): Line[] {
    const [open, close] = node.subshell ? ["(", ")"] : ["{", "}"];
    return [line(depth, open), ...this.block(node.body, depth), line(depth, close)];
  }

  private withRedirects(lines: Line[], redirects: readonly AST.Redirection[]): Line[] {
    if (redirects.length === 0) return lines;
    const text = redirects.map((redirect) => this.redirection(redirect)).join(" ");
    return suffixLines(lines, ` ${text}`, this.heredocsOf(redirects));
  }

  // ===========================================================================
  // Assignments and redirections
  // ===========================================================================

  private assignment(node: AST.VariableAssignment): string {
    const target = node.index === null ? node.name : `${node.name}[${node.index}]`;
    const value = node.value.type === "ArrayLiteral"
      ? `(${node.value.elements.map((element) => this.word(element, "operand")).join(" ")})`
      : this.word(node.value, "value");
    return `${target}${node.append ? "+=" : "="}${value}`;
  }

  private redirection(node: AST.Redirection): string {
    const fd = node.fd === null ? "" : String(node.fd);
    return `${fd}${node.operator}${this.word(node.target, "operand")}`;
  }

  private heredocsOf(redirects: readonly AST.Redirection[]): HeredocText[] {
    const heredocs: HeredocText[] = [];
    for (const redirect of redirects) {
      if (redirect.heredoc) {
        heredocs.push({ content: redirect.heredoc.content, delimiter: redirect.heredoc.delimiter });
      }
    }
    return heredocs;
  }

  // ===========================================================================
  // Words
  // ===========================================================================

  /**
   * Render a word. Arguments that spell a reserved word are quoted, and an
   * empty word renders as `''` everywhere except assignment values.
   */
  word(node: AST.Word, context: WordContext = "argument"): string {
    const [only] = node.parts;
    if (node.parts.length === 0) {
      return context === "value" ? "" : "''";
    }
    if (context === "argument" && node.parts.length === 1 && only?.type === "Literal" && RESERVED_WORDS.has(only.value)) {
      return `'${only.value}'`;
    }
    return node.parts.map((part) => this.wordPart(part)).join("");
  }

  private wordPart(part: AST.WordPart): string {
    switch (part.type) {
      case "Literal":
        return part.value;
      case "SingleQuoted":
        return `'${part.value}'`;
      case "DoubleQuoted":
        return `"${part.parts.map((inner) => this.wordPart(inner)).join("")}"`;
      case "AnsiCQuoted":
        return `$'${part.value}'`;
      case "ParameterExpansion":
        return this.parameter(part);
      case "CommandSubstitution":
        return this.commandSubstitution(part);
      case "ArithmeticExpansion":
        return `$((${part.raw}))`;
      case "ProcessSubstitution":
        return `${part.direction}(${this.substitutionBody(part.body)})`;
      default:
        return unreachable(part);
    }
  }

  private parameter(node: AST.ParameterExpansion): string {
    if (!node.braced) return `$${node.parameter}`;
    const argument = node.argument ? node.argument.parts.map((part) => this.wordPart(part)).join("") : "";
    return [
      "${",
      node.length ? "#" : "",
      node.indirect ? "!" : "",
      node.parameter,
      node.subscript === null ? "" : `[${node.subscript}]`,
      node.modifier ?? "",
      argument,
      "}",
    ].join("");
  }

  private commandSubstitution(node: AST.CommandSubstitution): string {
    const body = this.substitutionBody(node.body);
    if (node.backtick) return `\`${body}\``;
    // `$((` would read as arithmetic
    return body.startsWith("(") ? `$( ${body})` : `$(${body})`;
  }

  private substitutionBody(body: readonly AST.Statement[]): string {
    const last = body[body.length - 1];
    const compact = this.sequence(body, 0);
    const [single] = compact;
    if (compact.length === 1 && single && !hasHeredocs(compact) && last?.type !== "Comment") {
      return single.text;
    }

    const emitter = new OutputEmitter(INDENT_UNIT);
    emitter.emitLines(this.statementList(body, 0));
    return `\n${emitter.toString()}`;
  }

  // ===========================================================================
  // [[ ]] expressions
  // ===========================================================================

  private test(node: AST.TestExpression): string {
    switch (node.type) {
      case "UnaryTest":
        return `${node.operator} ${this.word(node.operand, "operand")}`;
      case "BinaryTest":
        return `${this.word(node.left, "operand")} ${node.operator} ${this.word(node.right, "operand")}`;
      case "LogicalTest":
        return `${this.test(node.left)} ${node.operator} ${this.test(node.right)}`;
      case "NotTest":
        return `! ${this.test(node.expression)}`;
      case "GroupedTest":
        return `( ${this.test(node.expression)} )`;
      case "WordTest":
        return this.word(node.word, "operand");
      default:
        return unreachable(node);
    }
  }
}

function unreachable(node: never): never {
  const value: unknown = node;
  const kind = typeof value === "object" && value !== null && "type" in value ? String(value.type) : String(value);
  throw invariantViolation(`code generator cannot render node of type '${kind}'`);
}

// =============================================================================
// Convenience Functions
// =============================================================================

export function renderShell(program: AST.Program, options: RenderOptions = {}): string {
  return new ShellCodeGenerator(options).generate(program);
}

/** Render a single word the way it appears as a command argument */
export function renderWord(word: AST.Word): string {
  return new ShellCodeGenerator().word(word, "argument");
}
