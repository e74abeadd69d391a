/**
 * Shell Lexer
 *
 * Tokenizer for POSIX sh and bash scripts.
 *
 * Handles:
 * - Operators and delimiters (|, ||, &&, ;, &, ;;, ;&, ;;&)
 * - Redirections (<, >, >>, <<, <<-, <<<, <&, >&, <>, >|, &>, &>>)
 * - Words with quoting rules (single, double, $'...', backticks), kept raw
 * - Nested $(...), $((...)), ${...}, <(...), array literals and extglob groups
 * - Comments (# at the start of a word)
 * - Here-documents, whose bodies are attached to their `<<` token
 * - `((...))` arithmetic commands, read as raw text
 *
 * Reserved words are not token types: whether `if` or `done` is a keyword
 * depends on its position, which only the parser knows.
 */

import { parseError } from "../core/errors.ts";
import { START_POSITION, type Position } from "../core/types.ts";
import {
  skipArithmetic,
  skipBacktick,
  skipBalanced,
  skipCommandSubstitution,
  skipDollar,
  skipDoubleQuoted,
  skipSingleQuoted,
} from "./scan.ts";

// =============================================================================
// Token Types
// =============================================================================

export enum TokenType {
  // End of input
  EOF = "EOF",

  // Newlines and separators
  NEWLINE = "NEWLINE",
  SEMICOLON = "SEMICOLON",
  AMP = "AMP", // &

  // Operators
  PIPE = "PIPE", // |
  PIPE_AMP = "PIPE_AMP", // |&
  AND_AND = "AND_AND", // &&
  OR_OR = "OR_OR", // ||

  // Redirections
  LESS = "LESS", // <
  GREAT = "GREAT", // >
  DLESS = "DLESS", // <<
  DGREAT = "DGREAT", // >>
  LESSAND = "LESSAND", // <&
  GREATAND = "GREATAND", // >&
  LESSGREAT = "LESSGREAT", // <>
  DLESSDASH = "DLESSDASH", // <<-
  CLOBBER = "CLOBBER", // >|
  TLESS = "TLESS", // <<<
  AND_GREAT = "AND_GREAT", // &>
  AND_DGREAT = "AND_DGREAT", // &>>

  // Grouping
  LPAREN = "LPAREN", // (
  RPAREN = "RPAREN", // )

  // Case terminators
  DSEMI = "DSEMI", // ;;
  SEMI_AND = "SEMI_AND", // ;&
  SEMI_SEMI_AND = "SEMI_SEMI_AND", // ;;&

  // ((...)), value is the text between the parens
  DPAREN = "DPAREN",

  WORD = "WORD",
  /** File descriptor directly before a redirection (2>) */
  IO_NUMBER = "IO_NUMBER",
  COMMENT = "COMMENT",
}

// =============================================================================
// Token Interface
// =============================================================================

export interface HeredocBody {
  /** Body text without the closing delimiter line */
  content: string;
  start: Position;
  delimiter: string;
  quoted: boolean;
}

export interface Token {
  type: TokenType;
  /** Raw text; for COMMENT the text after `#` */
  value: string;
  start: Position;
  end: Position;
  /** A backslash-newline was skipped directly before this token */
  continued: boolean;
  /** Filled for DLESS / DLESSDASH once the body lines have been read */
  heredoc?: HeredocBody;
}

// =============================================================================
// Operator Tables
// =============================================================================

const THREE_CHAR_OPS: Record<string, TokenType> = {
  ";;&": TokenType.SEMI_SEMI_AND,
  "<<<": TokenType.TLESS,
  "&>>": TokenType.AND_DGREAT,
  "<<-": TokenType.DLESSDASH,
};

const TWO_CHAR_OPS: Record<string, TokenType> = {
  "&&": TokenType.AND_AND,
  "||": TokenType.OR_OR,
  ";;": TokenType.DSEMI,
  ";&": TokenType.SEMI_AND,
  "|&": TokenType.PIPE_AMP,
  ">>": TokenType.DGREAT,
  "<&": TokenType.LESSAND,
  ">&": TokenType.GREATAND,
  "<>": TokenType.LESSGREAT,
  ">|": TokenType.CLOBBER,
  "&>": TokenType.AND_GREAT,
  "<<": TokenType.DLESS,
};

const SINGLE_CHAR_OPS: Record<string, TokenType> = {
  "|": TokenType.PIPE,
  "&": TokenType.AMP,
  ";": TokenType.SEMICOLON,
  "(": TokenType.LPAREN,
  ")": TokenType.RPAREN,
  "<": TokenType.LESS,
  ">": TokenType.GREAT,
};

const METACHARS = new Set([" ", "\t", "\n", ";", "&", "|", "<", ">", "(", ")"]);

const ASSIGNMENT_PREFIX = /^[A-Za-z_][A-Za-z0-9_]*(\[[^\]]*\])?\+?=$/;

const EXTGLOB_PREFIX = new Set(["@", "!", "*", "+", "?"]);

// =============================================================================
// Lexer Class
// =============================================================================

interface PendingHeredoc {
  token: Token;
  delimiter: string;
  stripTabs: boolean;
  quoted: boolean;
}

export class Lexer {
  private pos = 0;
  private line: number;
  private column: number;
  private tokens: Token[] = [];
  private pendingHeredocs: PendingHeredoc[] = [];

  /**
   * @param origin - position of the input's first character, for input that
   *   was cut out of a larger source
   */
  constructor(private readonly input: string, private readonly origin: Position = START_POSITION) {
    this.line = origin.line;
    this.column = origin.column;
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Tokenize the entire input and return all tokens
   */
  tokenize(): Token[] {
    while (true) {
      const continued = this.skipWhitespace();
      if (this.isAtEnd()) break;

      const token = this.nextToken(continued);
      this.tokens.push(token);

      if (token.type === TokenType.NEWLINE && this.pendingHeredocs.length > 0) {
        this.readHeredocBodies();
      }
    }

    const unread = this.pendingHeredocs[0];
    if (unread) {
      throw parseError(`unterminated here-document (expected '${unread.delimiter}')`, unread.token.start, {
        expected: `here-document delimiter '${unread.delimiter}'`,
      });
    }

    const end = this.getPosition();
    this.tokens.push({ type: TokenType.EOF, value: "", start: end, end, continued: false });
    return this.tokens;
  }

  getPosition(): Position {
    return { line: this.line, column: this.column, offset: this.origin.offset + this.pos };
  }

  isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private peek(offset = 0): string {
    return this.input[this.pos + offset] ?? "";
  }

  private advance(): string {
    const char = this.input[this.pos] ?? "";
    this.pos++;
    if (char === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private advanceTo(index: number): void {
    while (this.pos < index) this.advance();
  }

  /**
   * Skip blanks and backslash-newline pairs. Returns whether a continuation
   * was crossed.
   */
  private skipWhitespace(): boolean {
    let continued = false;
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === " " || char === "\t" || (char === "\r" && this.peek(1) === "\n")) {
        this.advance();
      } else if (char === "\\" && this.peek(1) === "\n") {
        this.advance();
        this.advance();
        continued = true;
      } else {
        break;
      }
    }
    return continued;
  }

  private makeToken(type: TokenType, value: string, start: Position, continued: boolean): Token {
    return { type, value, start, end: this.getPosition(), continued };
  }

  private nextToken(continued: boolean): Token {
    const start = this.getPosition();
    const c0 = this.peek();
    const c1 = this.peek(1);
    const c2 = this.peek(2);

    if (c0 === "#") {
      this.advance();
      let text = "";
      while (!this.isAtEnd() && this.peek() !== "\n") {
        text += this.advance();
      }
      return this.makeToken(TokenType.COMMENT, text.replace(/\r$/, ""), start, continued);
    }

    if (c0 === "\n") {
      this.advance();
      return this.makeToken(TokenType.NEWLINE, "\n", start, continued);
    }

    if (c0 === "(" && c1 === "(") {
      const end = skipArithmetic(this.input, this.pos);
      if (end === -1) {
        throw parseError("unterminated '((' arithmetic command", start, { expected: "'))'" });
      }
      const inner = this.input.slice(this.pos + 2, end - 2);
      this.advanceTo(end);
      return this.makeToken(TokenType.DPAREN, inner, start, continued);
    }

    // <(...) and >(...) are words
    if ((c0 === "<" || c0 === ">") && c1 === "(") {
      return this.readWord(start, continued);
    }

    const three = THREE_CHAR_OPS[c0 + c1 + c2];
    if (three !== undefined) {
      this.advanceTo(this.pos + 3);
      const token = this.makeToken(three, c0 + c1 + c2, start, continued);
      if (three === TokenType.DLESSDASH) this.registerHeredoc(token, true);
      return token;
    }

    const two = TWO_CHAR_OPS[c0 + c1];
    if (two !== undefined) {
      this.advanceTo(this.pos + 2);
      const token = this.makeToken(two, c0 + c1, start, continued);
      if (two === TokenType.DLESS) this.registerHeredoc(token, false);
      return token;
    }

    const single = SINGLE_CHAR_OPS[c0];
    if (single !== undefined) {
      this.advance();
      return this.makeToken(single, c0, start, continued);
    }

    // File descriptor prefix: 2>file, 0<&3
    const fd = this.input.slice(this.pos).match(/^[0-9]+(?=[<>])/);
    if (fd) {
      this.advanceTo(this.pos + fd[0].length);
      return this.makeToken(TokenType.IO_NUMBER, fd[0], start, continued);
    }

    return this.readWord(start, continued);
  }

  private readWord(start: Position, continued: boolean): Token {
    const input = this.input;
    const begin = this.pos;
    let i = this.pos;

    const fail = (what: string, expected: string): never => {
      throw parseError(`unterminated ${what}`, this.positionAfter(i), { expected });
    };

    while (i < input.length) {
      const c = input[i] ?? "";

      if (c === "(") {
        const soFar = input.slice(begin, i);
        const prev = input[i - 1] ?? "";
        if (ASSIGNMENT_PREFIX.test(soFar) || (i > begin && EXTGLOB_PREFIX.has(prev))) {
          const end = skipBalanced(input, i);
          if (end === -1) fail("parenthesis", "')'");
          i = end;
          continue;
        }
        if (i === begin) break;
      }

      if ((c === "<" || c === ">") && i === begin && input[i + 1] === "(") {
        const end = skipCommandSubstitution(input, i + 1);
        if (end === -1) fail("process substitution", "')'");
        i = end;
        continue;
      }

      if (METACHARS.has(c)) break;

      if (c === "\\") {
        if (input[i + 1] === "\n") break;
        i += 2;
        continue;
      }

      if (c === "'") {
        const end = skipSingleQuoted(input, i);
        if (end === -1) fail("single quote", "closing \"'\"");
        i = end;
        continue;
      }

      if (c === '"') {
        const end = skipDoubleQuoted(input, i);
        if (end === -1) fail("double quote", "closing '\"'");
        i = end;
        continue;
      }

      if (c === "`") {
        const end = skipBacktick(input, i);
        if (end === -1) fail("backtick command substitution", "closing '`'");
        i = end;
        continue;
      }

      if (c === "$") {
        const end = skipDollar(input, i);
        if (end === -1) {
          const next = input[i + 1];
          fail(
            next === "{" ? "parameter expansion" : next === "'" ? "ANSI-C quote" : "command substitution",
            next === "{" ? "'}'" : next === "'" ? "closing \"'\"" : "')'",
          );
        }
        i = end;
        continue;
      }

      i++;
    }

    const value = input.slice(begin, Math.min(i, input.length));
    this.advanceTo(begin + value.length);
    return this.makeToken(TokenType.WORD, value, start, continued);
  }

  private positionAfter(index: number): Position {
    // Errors point at the start of the unterminated construct's word
    let line = this.line;
    let column = this.column;
    for (let i = this.pos; i < index && i < this.input.length; i++) {
      if (this.input[i] === "\n") {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    return { line, column, offset: this.origin.offset + index };
  }

  // ===========================================================================
  // Here-documents
  // ===========================================================================

  /**
   * Peek at the delimiter word after `<<` so the body can be read at the
   * next newline. The word itself is still lexed as the redirection target.
   */
  private registerHeredoc(token: Token, stripTabs: boolean): void {
    let i = this.pos;
    while (this.input[i] === " " || this.input[i] === "\t") i++;
    let raw = "";
    while (i < this.input.length && !METACHARS.has(this.input[i] ?? "")) {
      const c = this.input[i] ?? "";
      if (c === "'" || c === '"') {
        const end = c === "'" ? skipSingleQuoted(this.input, i) : skipDoubleQuoted(this.input, i);
        if (end === -1) break;
        raw += this.input.slice(i, end);
        i = end;
        continue;
      }
      raw += c;
      i++;
    }
    if (raw === "") {
      throw parseError("missing here-document delimiter", token.start, { expected: "delimiter word" });
    }
    const quoted = /['"\\]/.test(raw);
    const delimiter = raw.replace(/\\(.)/g, "$1").replace(/['"]/g, "");
    this.pendingHeredocs.push({ token, delimiter, stripTabs, quoted });
  }

  private readHeredocBodies(): void {
    const pending = this.pendingHeredocs;
    this.pendingHeredocs = [];

    for (const heredoc of pending) {
      const start = this.getPosition();
      let content = "";
      let closed = false;

      while (!this.isAtEnd()) {
        let line = "";
        while (!this.isAtEnd() && this.peek() !== "\n") {
          line += this.advance();
        }
        if (!this.isAtEnd()) this.advance();

        const candidate = (heredoc.stripTabs ? line.replace(/^\t+/, "") : line).replace(/\r$/, "");
        if (candidate === heredoc.delimiter) {
          closed = true;
          break;
        }
        content += line + "\n";
      }

      if (!closed) {
        throw parseError(`unterminated here-document (expected '${heredoc.delimiter}')`, heredoc.token.start, {
          expected: `here-document delimiter '${heredoc.delimiter}'`,
        });
      }

      heredoc.token.heredoc = {
        content,
        start,
        delimiter: heredoc.delimiter,
        quoted: heredoc.quoted,
      };
    }
  }
}

export function tokenize(input: string, origin?: Position): Token[] {
  return new Lexer(input, origin).tokenize();
}
