/**
 * Shell Parser
 *
 * Recursive descent parser that converts tokens from the lexer into an AST.
 * Handles pipelines, and-or lists, every compound command, functions,
 * redirections with here-documents, and `[[ ]]` test expressions.
 *
 * Word contents (quotes, expansions, command substitutions) are parsed by
 * the WordParser, which calls back into a nested Parser for `$(...)` bodies.
 */

import { IdGenerator } from "../core/node-id.ts";
import { type ParseError, parseError } from "../core/errors.ts";
import { advancePosition, START_POSITION, type Position, type Span } from "../core/types.ts";
import { tryParseArithmetic } from "./arithmetic-parser.ts";
import type * as AST from "./ast.ts";
import { Lexer, type Token, TokenType } from "./lexer.ts";
import {
  CASE_TERMINATORS,
  CLOSING_WORDS,
  getBinaryTestOperator,
  getRedirectionOperator,
  isRedirectionStart,
  isUnaryTestOperator,
  RESERVED_WORDS,
} from "./operators.ts";
import { skipBalanced } from "./scan.ts";
import { detectShell, getDefaultShell, type Shell } from "./shell-dialect.ts";
import { WordParser } from "./word-parser.ts";

// =============================================================================
// Parser Context (for better error messages)
// =============================================================================

type ParserContext =
  | { type: "if" | "while" | "until" | "case" | "select" | "subshell" | "brace_group"; startLine: number }
  | { type: "for"; variable: string; startLine: number }
  | { type: "function"; name: string; startLine: number };

export interface ParserOptions {
  /** Position of the input's first character, for nested sources */
  origin?: Position;
  /** Shared id generator, so nested parses keep ids unique in one tree */
  ids?: IdGenerator;
  /** File name recorded in the program metadata and in parse errors */
  source?: string;
  /** Overrides dialect detection */
  dialect?: Shell;
}

type TokenPredicate = (token: Token) => boolean;

const ASSIGNMENT_WORD = /^([A-Za-z_][A-Za-z0-9_]*)(?:\[([^\]]*)\])?(\+?)=/;

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const FUNCTION_NAME = /^[^\s$'"`\\|&;<>()]+$/;

// =============================================================================
// Parser Class
// =============================================================================

export class Parser {
  private tokens: Token[];
  private pos = 0;
  private contextStack: ParserContext[] = [];
  private readonly ids: IdGenerator;
  private readonly words: WordParser;
  private readonly origin: Position;

  constructor(private readonly input: string, private readonly options: ParserOptions = {}) {
    this.origin = options.origin ?? START_POSITION;
    this.ids = options.ids ?? new IdGenerator();
    this.words = new WordParser({
      ids: this.ids,
      parseNested: (source, origin) =>
        new Parser(source, { origin, ids: this.ids, source: options.source }).parseNested(),
    });
    this.tokens = new Lexer(input, this.origin).tokenize();
  }

  /**
   * Parse a complete script.
   */
  parse(): AST.Program {
    const started = performance.now();
    const body = this.parseStatementList(() => false);
    this.expectEnd();
    const end = this.current().end;
    return {
      type: "Program",
      span: { start: this.origin, end },
      id: this.ids.next(),
      body,
      metadata: {
        source: this.options.source,
        dialect: this.options.dialect ?? detectShell(this.input) ?? getDefaultShell(),
        lineCount: this.input === "" ? 0 : this.input.replace(/\n$/, "").split("\n").length,
        parseDurationMs: performance.now() - started,
      },
    };
  }

  /**
   * Parse the body of a command substitution.
   */
  parseNested(): AST.Statement[] {
    const body = this.parseStatementList(() => false);
    this.expectEnd();
    return body;
  }

  // ===========================================================================
  // Token Management
  // ===========================================================================

  private current(): Token {
    return this.tokens[this.pos] ?? this.eof();
  }

  private peek(offset = 1): Token {
    return this.tokens[this.pos + offset] ?? this.eof();
  }

  private previous(): Token {
    return this.tokens[this.pos - 1] ?? this.current();
  }

  private eof(): Token {
    const last = this.tokens[this.tokens.length - 1];
    const at = last ? last.end : this.origin;
    return { type: TokenType.EOF, value: "", start: at, end: at, continued: false };
  }

  private advance(): Token {
    const token = this.current();
    if (token.type !== TokenType.EOF) this.pos++;
    return token;
  }

  private is(type: TokenType): boolean {
    return this.current().type === type;
  }

  private isWord(value: string, token: Token = this.current()): boolean {
    return token.type === TokenType.WORD && token.value === value;
  }

  private expect(type: TokenType, expected: string): Token {
    if (!this.is(type)) {
      throw this.unexpected(expected);
    }
    return this.advance();
  }

  private expectWord(value: string): Token {
    if (!this.isWord(value)) {
      throw this.unexpected(`'${value}'`);
    }
    return this.advance();
  }

  private expectEnd(): void {
    if (!this.is(TokenType.EOF)) {
      throw this.unexpected("end of input");
    }
  }

  /** Count and consume newline tokens. */
  private skipNewlines(): number {
    let count = 0;
    while (this.is(TokenType.NEWLINE)) {
      this.advance();
      count++;
    }
    return count;
  }

  /** Consume newlines and comments where the grammar has no room for statements. */
  private skipLinebreaks(): void {
    while (this.is(TokenType.NEWLINE) || this.is(TokenType.COMMENT)) {
      this.advance();
    }
  }

  private spanFrom(start: Token | Position): Span {
    const startPosition = "start" in start ? start.start : start;
    return { start: startPosition, end: this.previous().end };
  }

  // ===========================================================================
  // Errors
  // ===========================================================================

  private unexpected(expected: string): ParseError {
    const token = this.current();
    const found = token.type === TokenType.EOF
      ? "end of input"
      : token.type === TokenType.NEWLINE
      ? "newline"
      : `'${token.value}'`;
    return this.error(`expected ${expected}, found ${found}`, token.start, expected);
  }

  private error(message: string, at: Position, expected: string): ParseError {
    return parseError(message, at, {
      file: this.options.source,
      expected,
      context: this.getContextInfo() ?? undefined,
    });
  }

  private getContextInfo(): string | null {
    const context = this.contextStack[this.contextStack.length - 1];
    if (!context) return null;

    switch (context.type) {
      case "for":
        return `in 'for' loop (variable: ${context.variable}) started at line ${context.startLine}`;
      case "function":
        return `in function '${context.name}' started at line ${context.startLine}`;
      case "while":
      case "until":
      case "select":
        return `in '${context.type}' loop started at line ${context.startLine}`;
      case "subshell":
        return `in subshell started at line ${context.startLine}`;
      case "brace_group":
        return `in '{' group started at line ${context.startLine}`;
      default:
        return `in '${context.type}' statement started at line ${context.startLine}`;
    }
  }

  private withContext<T>(context: ParserContext, parse: () => T): T {
    this.contextStack.push(context);
    try {
      return parse();
    } finally {
      this.contextStack.pop();
    }
  }

  // ===========================================================================
  // Statement Lists
  // ===========================================================================

  /**
   * Parse statements separated by newlines, `;` or `&` until EOF or a token
   * accepted by `isTerminator`.
   */
  private parseStatementList(isTerminator: TokenPredicate): AST.Statement[] {
    const statements: AST.Statement[] = [];
    let atProgramStart = this.pos === 0;

    while (true) {
      const newlines = this.skipNewlines();
      const token = this.current();
      if (token.type === TokenType.EOF || isTerminator(token)) break;

      const blankLines = atProgramStart ? newlines : Math.max(0, newlines - 1);
      const sameLine = newlines === 0 && statements.length > 0;
      atProgramStart = false;

      let statement: AST.Statement;
      if (token.type === TokenType.COMMENT) {
        this.advance();
        statement = {
          type: "Comment",
          span: this.spanFrom(token),
          id: this.ids.next(),
          text: token.value,
        };
      } else {
        statement = this.parseAndOr();
        if (this.is(TokenType.AMP)) {
          this.advance();
          statement = {
            type: "Background",
            span: this.spanFrom(statement.span.start),
            id: this.ids.next(),
            command: statement,
          };
        } else if (this.is(TokenType.SEMICOLON)) {
          this.advance();
        } else {
          const next = this.current();
          const ended = next.type === TokenType.NEWLINE ||
            next.type === TokenType.EOF ||
            next.type === TokenType.COMMENT ||
            isTerminator(next);
          if (!ended) {
            throw this.unexpected("';' or newline");
          }
        }
      }

      if (blankLines > 0 || (sameLine && statement.type === "Comment")) {
        statement.layout = {
          ...statement.layout,
          ...(blankLines > 0 ? { blankLinesBefore: blankLines } : {}),
          ...(sameLine && statement.type === "Comment" ? { sameLine: true } : {}),
        };
      }
      statements.push(statement);
    }

    return statements;
  }

  private parseAndOr(): AST.Statement {
    let left = this.parsePipeline();

    while (this.is(TokenType.AND_AND) || this.is(TokenType.OR_OR)) {
      const operator = this.advance().type === TokenType.AND_AND ? "&&" : "||";
      this.skipLinebreaks();
      const right = this.parsePipeline();
      left = {
        type: "AndOrList",
        span: { start: left.span.start, end: right.span.end },
        id: this.ids.next(),
        left,
        operator,
        right,
      };
    }

    return left;
  }

  private parsePipeline(): AST.Statement {
    const start = this.current();
    const negated = this.isWord("!");
    if (negated) this.advance();

    const commands: AST.Statement[] = [this.parseCommand()];
    const operators: AST.PipeOperator[] = [];

    while (this.is(TokenType.PIPE) || this.is(TokenType.PIPE_AMP)) {
      operators.push(this.advance().type === TokenType.PIPE ? "|" : "|&");
      this.skipLinebreaks();
      commands.push(this.parseCommand());
    }

    let node: AST.Statement;
    const first = commands[0];
    if (commands.length === 1 && first) {
      node = first;
    } else {
      node = {
        type: "Pipeline",
        span: { start: first?.span.start ?? start.start, end: this.previous().end },
        id: this.ids.next(),
        commands,
        operators,
      };
    }

    if (negated) {
      return {
        type: "NegatedCommand",
        span: this.spanFrom(start),
        id: this.ids.next(),
        command: node,
      };
    }
    return node;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  private parseCommand(): AST.Statement {
    const token = this.current();

    if (token.type === TokenType.DPAREN) {
      return this.parseArithmeticCommand();
    }
    if (token.type === TokenType.LPAREN) {
      return this.parseSubshell();
    }

    if (token.type === TokenType.WORD) {
      switch (token.value) {
        case "if":
          return this.parseIf();
        case "while":
        case "until":
          return this.parseWhileUntil(token.value);
        case "for":
          return this.parseFor();
        case "select":
          return this.parseSelect();
        case "case":
          return this.parseCase();
        case "function":
          return this.parseFunction();
        case "{":
          return this.parseBraceGroup();
        case "[[":
          return this.parseTestCommand();
        case "coproc":
          return this.parseCoproc();
      }

      if (CLOSING_WORDS.has(token.value)) {
        throw this.error(`syntax error near unexpected token '${token.value}'`, token.start, "a command");
      }

      if (
        this.peek().type === TokenType.LPAREN &&
        this.peek(2).type === TokenType.RPAREN &&
        FUNCTION_NAME.test(token.value) &&
        !RESERVED_WORDS.has(token.value)
      ) {
        return this.parseFunction();
      }
    }

    if (token.type === TokenType.WORD || isRedirectionStart(token.type)) {
      return this.parseSimpleCommand();
    }

    throw this.error(
      token.type === TokenType.EOF
        ? "unexpected end of input"
        : `syntax error near unexpected token '${token.value}'`,
      token.start,
      "a command",
    );
  }

  private parseSimpleCommand(): AST.Statement {
    const start = this.current();
    const assignments: AST.VariableAssignment[] = [];
    const words: AST.Word[] = [];
    const raws: string[] = [];
    const redirects: AST.Redirection[] = [];
    const continuations: number[] = [];

    while (true) {
      const token = this.current();
      if (isRedirectionStart(token.type)) {
        redirects.push(this.parseRedirection());
      } else if (token.type === TokenType.WORD) {
        this.advance();
        if (words.length === 0 && ASSIGNMENT_WORD.test(token.value)) {
          assignments.push(this.parseAssignment(token, false));
        } else {
          if (token.continued && words.length > 0) {
            continuations.push(words.length - 1);
          }
          words.push(this.parseWord(token));
          raws.push(token.value);
        }
      } else {
        break;
      }
    }

    const span = this.spanFrom(start);
    const [name, ...args] = words;

    if (!name) {
      const only = assignments[0];
      if (assignments.length === 1 && redirects.length === 0 && only) {
        return only;
      }
      return { type: "Command", span, id: this.ids.next(), name: null, args: [], redirects, assignments };
    }

    const simple = assignments.length === 0 && redirects.length === 0;
    const nameText = raws[0];

    // export NAME=value
    const exportedRaw = raws[1];
    if (simple && nameText === "export" && raws.length === 2 && exportedRaw && ASSIGNMENT_WORD.test(exportedRaw)) {
      const target = this.previous();
      const assignment = this.parseAssignment(target, true);
      assignment.span = span;
      return assignment;
    }

    if (simple && (nameText === "return" || nameText === "exit") && args.length <= 1) {
      return {
        type: "ReturnStatement",
        span,
        id: this.ids.next(),
        keyword: nameText,
        code: args[0] ?? null,
      };
    }

    const command: AST.Command = {
      type: "Command",
      span,
      id: this.ids.next(),
      name,
      args,
      redirects,
      assignments,
    };
    if (continuations.length > 0) {
      command.layout = { continuations };
    }
    return command;
  }

  private parseWord(token: Token): AST.Word {
    return this.words.parse(token.value, token.start);
  }

  private parseAssignment(token: Token, exported: boolean): AST.VariableAssignment {
    const match = token.value.match(ASSIGNMENT_WORD);
    const name = match?.[1];
    if (!match || !name) {
      throw this.error(`invalid assignment '${token.value}'`, token.start, "NAME=value");
    }
    const valueText = token.value.slice(match[0].length);
    const valueStart = advancePosition(token.start, token.value, match[0].length);

    let value: AST.Word | AST.ArrayLiteral;
    if (valueText.startsWith("(") && skipBalanced(valueText, 0) === valueText.length) {
      const inner = valueText.slice(1, -1);
      const innerStart = advancePosition(valueStart, valueText, 1);
      const elements = new Lexer(inner, innerStart)
        .tokenize()
        .filter((t) => t.type === TokenType.WORD)
        .map((t) => this.parseWord(t));
      value = {
        type: "ArrayLiteral",
        span: { start: valueStart, end: token.end },
        id: this.ids.next(),
        elements,
      };
    } else {
      value = this.words.parse(valueText, valueStart);
    }

    return {
      type: "VariableAssignment",
      span: { start: token.start, end: token.end },
      id: this.ids.next(),
      name,
      index: match[2] ?? null,
      value,
      append: match[3] === "+",
      exported,
    };
  }

  // ===========================================================================
  // Redirections
  // ===========================================================================

  private parseRedirection(): AST.Redirection {
    const start = this.current();
    let fd: number | null = null;
    if (start.type === TokenType.IO_NUMBER) {
      fd = Number(this.advance().value);
    }

    const opToken = this.advance();
    const operator = getRedirectionOperator(opToken.type);
    if (!operator) {
      throw this.error(`expected redirection operator after '${start.value}'`, opToken.start, "redirection operator");
    }

    const targetToken = this.expect(TokenType.WORD, "redirection target");
    const target = this.parseWord(targetToken);

    let heredoc: AST.HereDocument | null = null;
    if (operator === "<<" || operator === "<<-") {
      const body = opToken.heredoc;
      if (!body) {
        throw this.error("missing here-document body", opToken.start, `here-document body`);
      }
      heredoc = {
        delimiter: body.delimiter,
        quoted: body.quoted,
        stripTabs: operator === "<<-",
        content: body.content,
        body: body.quoted ? null : this.words.parseHeredoc(body.content, body.start),
      };
    }

    return {
      type: "Redirection",
      span: this.spanFrom(start),
      id: this.ids.next(),
      operator,
      fd,
      target,
      heredoc,
    };
  }

  private parseTrailingRedirections(): AST.Redirection[] {
    const redirects: AST.Redirection[] = [];
    while (isRedirectionStart(this.current().type)) {
      redirects.push(this.parseRedirection());
    }
    return redirects;
  }

  // ===========================================================================
  // Compound Commands
  // ===========================================================================

  private parseIf(): AST.IfStatement {
    const start = this.current();
    const node = this.withContext(
      { type: "if", startLine: start.start.line },
      () => this.parseIfClause(false),
    );
    node.redirects = this.parseTrailingRedirections();
    node.span = this.spanFrom(start);
    return node;
  }

  /** Parses from `if`/`elif` through the shared `fi`. */
  private parseIfClause(elif: boolean): AST.IfStatement {
    const start = this.advance();
    const test = this.parseStatementList((t) => this.isWord("then", t));
    this.expectWord("then");
    const consequent = this.parseStatementList(
      (t) => this.isWord("elif", t) || this.isWord("else", t) || this.isWord("fi", t),
    );

    let alternate: AST.Statement[] | AST.IfStatement | null = null;
    if (this.isWord("elif")) {
      alternate = this.parseIfClause(true);
    } else {
      if (this.isWord("else")) {
        this.advance();
        alternate = this.parseStatementList((t) => this.isWord("fi", t));
      }
      this.expectWord("fi");
    }

    return {
      type: "IfStatement",
      span: this.spanFrom(start),
      id: this.ids.next(),
      test,
      consequent,
      alternate,
      elif,
      redirects: [],
    };
  }

  private parseWhileUntil(keyword: "while" | "until"): AST.WhileStatement | AST.UntilStatement {
    const start = this.advance();
    return this.withContext({ type: keyword, startLine: start.start.line }, () => {
      const test = this.parseStatementList((t) => this.isWord("do", t));
      const body = this.parseDoGroup();
      const redirects = this.parseTrailingRedirections();
      return {
        type: keyword === "while" ? "WhileStatement" : "UntilStatement",
        span: this.spanFrom(start),
        id: this.ids.next(),
        test,
        body,
        redirects,
      };
    });
  }

  private parseDoGroup(): AST.Statement[] {
    this.expectWord("do");
    const body = this.parseStatementList((t) => this.isWord("done", t));
    this.expectWord("done");
    return body;
  }

  private parseFor(): AST.ForStatement | AST.CStyleForStatement {
    const start = this.advance();

    if (this.is(TokenType.DPAREN)) {
      return this.parseCStyleFor(start);
    }

    const variable = this.parseLoopVariable();
    return this.withContext({ type: "for", variable, startLine: start.start.line }, () => {
      const items = this.parseLoopItems();
      const body = this.parseDoGroup();
      const redirects = this.parseTrailingRedirections();
      return {
        type: "ForStatement",
        span: this.spanFrom(start),
        id: this.ids.next(),
        variable,
        items,
        body,
        redirects,
      };
    });
  }

  private parseCStyleFor(start: Token): AST.CStyleForStatement {
    const header = this.advance();
    const clauses = header.value.split(";");
    const [init, test, update] = clauses;
    if (clauses.length !== 3 || init === undefined || test === undefined || update === undefined) {
      throw this.error(
        `invalid C-style for clause '((${header.value}))'`,
        header.start,
        "three ';'-separated clauses",
      );
    }

    return this.withContext({ type: "for", variable: "((...))", startLine: start.start.line }, () => {
      if (this.is(TokenType.SEMICOLON)) this.advance();
      this.skipLinebreaks();
      const body = this.parseDoGroup();
      const redirects = this.parseTrailingRedirections();
      return {
        type: "CStyleForStatement",
        span: this.spanFrom(start),
        id: this.ids.next(),
        init: init.trim(),
        test: test.trim(),
        update: update.trim(),
        body,
        redirects,
      };
    });
  }

  private parseSelect(): AST.SelectStatement {
    const start = this.advance();
    const variable = this.parseLoopVariable();
    return this.withContext({ type: "select", startLine: start.start.line }, () => {
      const items = this.parseLoopItems();
      const body = this.parseDoGroup();
      const redirects = this.parseTrailingRedirections();
      return {
        type: "SelectStatement",
        span: this.spanFrom(start),
        id: this.ids.next(),
        variable,
        items,
        body,
        redirects,
      };
    });
  }

  private parseLoopVariable(): string {
    const token = this.current();
    if (token.type !== TokenType.WORD || !VARIABLE_NAME.test(token.value)) {
      throw this.unexpected("loop variable name");
    }
    this.advance();
    return token.value;
  }

  /** `in words... ;`, or nothing (iterates "$@"). */
  private parseLoopItems(): AST.Word[] | null {
    let items: AST.Word[] | null = null;
    this.skipLinebreaks();
    if (this.isWord("in")) {
      this.advance();
      items = [];
      while (this.is(TokenType.WORD)) {
        items.push(this.parseWord(this.advance()));
      }
      if (this.is(TokenType.SEMICOLON) || this.is(TokenType.NEWLINE)) {
        this.advance();
      } else if (!this.is(TokenType.COMMENT)) {
        throw this.unexpected("';' or newline after loop items");
      }
    } else if (this.is(TokenType.SEMICOLON)) {
      this.advance();
    }
    this.skipLinebreaks();
    return items;
  }

  private parseCase(): AST.CaseStatement {
    const start = this.advance();
    return this.withContext({ type: "case", startLine: start.start.line }, () => {
      const word = this.parseWord(this.expect(TokenType.WORD, "word after 'case'"));
      this.skipLinebreaks();
      this.expectWord("in");

      const clauses: AST.CaseClause[] = [];
      while (true) {
        this.skipLinebreaks();
        if (this.isWord("esac")) {
          this.advance();
          break;
        }
        if (this.is(TokenType.EOF)) {
          throw this.unexpected("'esac'");
        }
        clauses.push(this.parseCaseClause());
      }

      const redirects = this.parseTrailingRedirections();
      return {
        type: "CaseStatement",
        span: this.spanFrom(start),
        id: this.ids.next(),
        word,
        clauses,
        redirects,
      };
    });
  }

  private parseCaseClause(): AST.CaseClause {
    const start = this.current();
    if (this.is(TokenType.LPAREN)) this.advance();

    const patterns: AST.Word[] = [this.parseWord(this.expect(TokenType.WORD, "case pattern"))];
    while (this.is(TokenType.PIPE)) {
      this.advance();
      patterns.push(this.parseWord(this.expect(TokenType.WORD, "case pattern")));
    }
    this.expect(TokenType.RPAREN, "')' after case pattern");

    const body = this.parseStatementList(
      (t) => CASE_TERMINATORS[t.type] !== undefined || this.isWord("esac", t),
    );

    let terminator: AST.CaseTerminator = ";;";
    const explicit = CASE_TERMINATORS[this.current().type];
    if (explicit !== undefined) {
      terminator = explicit;
      this.advance();
    } else if (!this.isWord("esac")) {
      throw this.unexpected("';;' or 'esac'");
    }

    return {
      type: "CaseClause",
      span: this.spanFrom(start),
      id: this.ids.next(),
      patterns,
      body,
      terminator,
    };
  }

  private parseFunction(): AST.FunctionDeclaration {
    const start = this.current();
    const keyword = this.isWord("function");
    if (keyword) this.advance();

    const nameToken = this.expect(TokenType.WORD, "function name");
    if (this.is(TokenType.LPAREN)) {
      this.advance();
      this.expect(TokenType.RPAREN, "')' in function definition");
    }
    this.skipLinebreaks();

    return this.withContext({ type: "function", name: nameToken.value, startLine: start.start.line }, () => {
      const bodyStart = this.current();
      const body = this.parseCommand();
      if (body.type === "Command" || body.type === "VariableAssignment" || body.type === "ReturnStatement") {
        throw this.error("function body must be a compound command", bodyStart.start, "'{' or '('");
      }
      return {
        type: "FunctionDeclaration",
        span: this.spanFrom(start),
        id: this.ids.next(),
        name: nameToken.value,
        body,
        keyword,
      };
    });
  }

  private parseBraceGroup(): AST.Group {
    const start = this.advance();
    return this.withContext({ type: "brace_group", startLine: start.start.line }, () => {
      const body = this.parseStatementList((t) => this.isWord("}", t));
      this.expectWord("}");
      const redirects = this.parseTrailingRedirections();
      return {
        type: "Group",
        span: this.spanFrom(start),
        id: this.ids.next(),
        body,
        subshell: false,
        redirects,
      };
    });
  }

  private parseSubshell(): AST.Group {
    const start = this.advance();
    return this.withContext({ type: "subshell", startLine: start.start.line }, () => {
      const body = this.parseStatementList((t) => t.type === TokenType.RPAREN);
      this.expect(TokenType.RPAREN, "')'");
      const redirects = this.parseTrailingRedirections();
      return {
        type: "Group",
        span: this.spanFrom(start),
        id: this.ids.next(),
        body,
        subshell: true,
        redirects,
      };
    });
  }

  private parseCoproc(): AST.Coproc {
    const start = this.advance();
    let name: string | null = null;
    const next = this.peek();
    if (
      this.is(TokenType.WORD) &&
      VARIABLE_NAME.test(this.current().value) &&
      (this.isWord("{", next) || next.type === TokenType.LPAREN)
    ) {
      name = this.advance().value;
    }
    const body = this.parseCommand();
    return {
      type: "Coproc",
      span: this.spanFrom(start),
      id: this.ids.next(),
      name,
      body,
    };
  }

  private parseArithmeticCommand(): AST.ArithmeticCommand {
    const token = this.advance();
    const expression = tryParseArithmetic(token.value, {
      ids: this.ids,
      origin: advancePosition(token.start, "(("),
      parseParameter: (text, origin) => this.words.parseParameter(text, origin),
    });
    const redirects = this.parseTrailingRedirections();
    return {
      type: "ArithmeticCommand",
      span: this.spanFrom(token),
      id: this.ids.next(),
      expression,
      raw: token.value,
      redirects,
    };
  }

  // ===========================================================================
  // [[ ]] Test Expressions
  // ===========================================================================

  private parseTestCommand(): AST.TestCommand {
    const start = this.advance();
    const expression = this.parseTestOr();
    this.expectWord("]]");
    const redirects = this.parseTrailingRedirections();
    return {
      type: "TestCommand",
      span: this.spanFrom(start),
      id: this.ids.next(),
      expression,
      redirects,
    };
  }

  private parseTestOr(): AST.TestExpression {
    let left = this.parseTestAnd();
    while (this.is(TokenType.OR_OR)) {
      this.advance();
      this.skipLinebreaks();
      const right = this.parseTestAnd();
      left = {
        type: "LogicalTest",
        span: { start: left.span.start, end: right.span.end },
        id: this.ids.next(),
        operator: "||",
        left,
        right,
      };
    }
    return left;
  }

  private parseTestAnd(): AST.TestExpression {
    let left = this.parseTestNot();
    while (this.is(TokenType.AND_AND)) {
      this.advance();
      this.skipLinebreaks();
      const right = this.parseTestNot();
      left = {
        type: "LogicalTest",
        span: { start: left.span.start, end: right.span.end },
        id: this.ids.next(),
        operator: "&&",
        left,
        right,
      };
    }
    return left;
  }

  private parseTestNot(): AST.TestExpression {
    if (this.isWord("!")) {
      const start = this.advance();
      const expression = this.parseTestNot();
      return { type: "NotTest", span: this.spanFrom(start), id: this.ids.next(), expression };
    }
    return this.parseTestPrimary();
  }

  private parseTestPrimary(): AST.TestExpression {
    const start = this.current();

    if (start.type === TokenType.LPAREN) {
      this.advance();
      const expression = this.parseTestOr();
      this.expect(TokenType.RPAREN, "')' in test expression");
      return { type: "GroupedTest", span: this.spanFrom(start), id: this.ids.next(), expression };
    }

    if (start.type !== TokenType.WORD || start.value === "]]") {
      throw this.unexpected("test operand");
    }

    const next = this.peek();
    if (isUnaryTestOperator(start.value) && next.type === TokenType.WORD && next.value !== "]]") {
      this.advance();
      const operand = this.parseWord(this.advance());
      return {
        type: "UnaryTest",
        span: this.spanFrom(start),
        id: this.ids.next(),
        operator: start.value,
        operand,
      };
    }

    const left = this.parseWord(this.advance());
    const opToken = this.current();
    const operator = opToken.type === TokenType.LESS
      ? "<"
      : opToken.type === TokenType.GREAT
      ? ">"
      : opToken.type === TokenType.WORD
      ? getBinaryTestOperator(opToken.value)
      : undefined;

    if (operator === undefined) {
      return { type: "WordTest", span: left.span, id: this.ids.next(), word: left };
    }

    this.advance();
    const right = operator === "=~"
      ? this.parseRegexOperand()
      : this.parseWord(this.expect(TokenType.WORD, "right-hand test operand"));

    return {
      type: "BinaryTest",
      span: this.spanFrom(start),
      id: this.ids.next(),
      operator,
      left,
      right,
    };
  }

  /**
   * The right side of `=~` may contain `(`, `|` and other operator
   * characters; it runs to `]]`, `&&` or `||` outside parentheses.
   */
  private parseRegexOperand(): AST.Word {
    const first = this.current();
    let last: Token | null = null;
    let depth = 0;

    while (true) {
      const token = this.current();
      if (token.type === TokenType.EOF || token.type === TokenType.NEWLINE) break;
      if (depth === 0) {
        if (this.isWord("]]", token)) break;
        if (token.type === TokenType.AND_AND || token.type === TokenType.OR_OR) break;
        if (token.type === TokenType.RPAREN) break;
      }
      if (token.type === TokenType.LPAREN) depth++;
      if (token.type === TokenType.RPAREN) depth--;
      last = this.advance();
    }

    if (!last) {
      throw this.unexpected("regular expression");
    }

    const from = first.start.offset - this.origin.offset;
    const to = last.end.offset - this.origin.offset;
    return this.words.parse(this.input.slice(from, to), first.start);
  }
}

// =============================================================================
// Convenience Function
// =============================================================================

/**
 * Parse a shell script into a Program.
 */
export function parseShell(input: string, options: ParserOptions = {}): AST.Program {
  return new Parser(input, options).parse();
}
