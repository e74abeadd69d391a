/**
 * Pratt Parser for Shell Arithmetic Expressions
 *
 * Implements a top-down operator precedence parser (Pratt parser) for
 * arithmetic expressions used in $((...)) and ((...)).
 *
 * Handles:
 * - Binary operators with proper precedence
 * - Unary prefix operators (-, +, !, ~, ++, --)
 * - Postfix operators (++, --)
 * - Ternary conditional (? :)
 * - Assignment operators (=, +=, -=, etc.)
 * - Parenthesized expressions
 * - Variable references ($x, x, $1) and numeric literals
 *
 * Anything outside this grammar (command substitutions, nested $((...)),
 * unknown characters) throws; callers keep the raw text instead.
 */

import type { IdGenerator } from "../core/node-id.ts";
import { advancePosition, type Position, type Span } from "../core/types.ts";
import type * as AST from "./ast.ts";

// =============================================================================
// Token Types for Arithmetic Lexer
// =============================================================================

enum ArithTokenType {
  NUMBER,
  IDENTIFIER,
  DOLLAR_NAME, // $x, $1
  PARAM_EXPANSION, // ${...}
  PLUS,
  MINUS,
  STAR,
  SLASH,
  PERCENT,
  POWER, // **
  LSHIFT, // <<
  RSHIFT, // >>
  LT, // <
  GT, // >
  LE, // <=
  GE, // >=
  EQ, // ==
  NE, // !=
  AMP, // &
  CARET, // ^
  PIPE, // |
  AND, // &&
  OR, // ||
  BANG, // !
  TILDE, // ~
  QUESTION, // ?
  COLON, // :
  COMMA, // ,
  ASSIGN, // =
  PLUS_ASSIGN, // +=
  MINUS_ASSIGN, // -=
  STAR_ASSIGN, // *=
  SLASH_ASSIGN, // /=
  PERCENT_ASSIGN, // %=
  LSHIFT_ASSIGN, // <<=
  RSHIFT_ASSIGN, // >>=
  AMP_ASSIGN, // &=
  PIPE_ASSIGN, // |=
  CARET_ASSIGN, // ^=
  INC, // ++
  DEC, // --
  LPAREN,
  RPAREN,
  EOF,
}

interface ArithToken {
  type: ArithTokenType;
  value: string;
  pos: number;
  end: number;
}

export class ArithmeticSyntaxError extends Error {
  constructor(message: string, public readonly position: number) {
    super(message);
    this.name = "ArithmeticSyntaxError";
  }
}

// =============================================================================
// Binding Powers (Precedence)
// =============================================================================

// Higher number = tighter binding
const PRECEDENCE = {
  COMMA: 1,
  ASSIGNMENT: 2,
  TERNARY: 3,
  OR: 4,
  AND: 5,
  BIT_OR: 6,
  BIT_XOR: 7,
  BIT_AND: 8,
  EQUALITY: 9,
  COMPARISON: 10,
  SHIFT: 11,
  ADDITIVE: 12,
  MULTIPLICATIVE: 13,
  POWER: 14, // Right-associative
  PREFIX: 15,
  POSTFIX: 16,
} as const;

const TWO_CHAR_OPS: Record<string, ArithTokenType> = {
  "**": ArithTokenType.POWER,
  "<<": ArithTokenType.LSHIFT,
  ">>": ArithTokenType.RSHIFT,
  "<=": ArithTokenType.LE,
  ">=": ArithTokenType.GE,
  "==": ArithTokenType.EQ,
  "!=": ArithTokenType.NE,
  "&&": ArithTokenType.AND,
  "||": ArithTokenType.OR,
  "++": ArithTokenType.INC,
  "--": ArithTokenType.DEC,
  "+=": ArithTokenType.PLUS_ASSIGN,
  "-=": ArithTokenType.MINUS_ASSIGN,
  "*=": ArithTokenType.STAR_ASSIGN,
  "/=": ArithTokenType.SLASH_ASSIGN,
  "%=": ArithTokenType.PERCENT_ASSIGN,
  "&=": ArithTokenType.AMP_ASSIGN,
  "|=": ArithTokenType.PIPE_ASSIGN,
  "^=": ArithTokenType.CARET_ASSIGN,
};

const SINGLE_CHAR_OPS: Record<string, ArithTokenType> = {
  "+": ArithTokenType.PLUS,
  "-": ArithTokenType.MINUS,
  "*": ArithTokenType.STAR,
  "/": ArithTokenType.SLASH,
  "%": ArithTokenType.PERCENT,
  "<": ArithTokenType.LT,
  ">": ArithTokenType.GT,
  "&": ArithTokenType.AMP,
  "^": ArithTokenType.CARET,
  "|": ArithTokenType.PIPE,
  "!": ArithTokenType.BANG,
  "~": ArithTokenType.TILDE,
  "?": ArithTokenType.QUESTION,
  ":": ArithTokenType.COLON,
  ",": ArithTokenType.COMMA,
  "=": ArithTokenType.ASSIGN,
  "(": ArithTokenType.LPAREN,
  ")": ArithTokenType.RPAREN,
};

const ASSIGNMENT_OPS: Partial<Record<ArithTokenType, AST.AssignmentOperator>> = {
  [ArithTokenType.ASSIGN]: "=",
  [ArithTokenType.PLUS_ASSIGN]: "+=",
  [ArithTokenType.MINUS_ASSIGN]: "-=",
  [ArithTokenType.STAR_ASSIGN]: "*=",
  [ArithTokenType.SLASH_ASSIGN]: "/=",
  [ArithTokenType.PERCENT_ASSIGN]: "%=",
  [ArithTokenType.LSHIFT_ASSIGN]: "<<=",
  [ArithTokenType.RSHIFT_ASSIGN]: ">>=",
  [ArithTokenType.AMP_ASSIGN]: "&=",
  [ArithTokenType.PIPE_ASSIGN]: "|=",
  [ArithTokenType.CARET_ASSIGN]: "^=",
};

const BINARY_OPS: Partial<Record<ArithTokenType, AST.BinaryArithmeticOperator>> = {
  [ArithTokenType.PLUS]: "+",
  [ArithTokenType.MINUS]: "-",
  [ArithTokenType.STAR]: "*",
  [ArithTokenType.SLASH]: "/",
  [ArithTokenType.PERCENT]: "%",
  [ArithTokenType.POWER]: "**",
  [ArithTokenType.LSHIFT]: "<<",
  [ArithTokenType.RSHIFT]: ">>",
  [ArithTokenType.LT]: "<",
  [ArithTokenType.GT]: ">",
  [ArithTokenType.LE]: "<=",
  [ArithTokenType.GE]: ">=",
  [ArithTokenType.EQ]: "==",
  [ArithTokenType.NE]: "!=",
  [ArithTokenType.AMP]: "&",
  [ArithTokenType.CARET]: "^",
  [ArithTokenType.PIPE]: "|",
  [ArithTokenType.AND]: "&&",
  [ArithTokenType.OR]: "||",
  [ArithTokenType.COMMA]: ",",
};

const PREFIX_OPS: Partial<Record<ArithTokenType, AST.UnaryArithmeticExpression["operator"]>> = {
  [ArithTokenType.PLUS]: "+",
  [ArithTokenType.MINUS]: "-",
  [ArithTokenType.BANG]: "!",
  [ArithTokenType.TILDE]: "~",
  [ArithTokenType.INC]: "++",
  [ArithTokenType.DEC]: "--",
};

// =============================================================================
// Arithmetic Lexer
// =============================================================================

class ArithmeticLexer {
  private pos = 0;

  constructor(private readonly input: string) {}

  private peek(offset = 0): string {
    return this.input[this.pos + offset] ?? "";
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.peek())) {
      this.pos++;
    }
  }

  private token(type: ArithTokenType, start: number): ArithToken {
    return { type, value: this.input.slice(start, this.pos), pos: start, end: this.pos };
  }

  next(): ArithToken {
    this.skipWhitespace();

    const start = this.pos;
    if (start >= this.input.length) {
      return { type: ArithTokenType.EOF, value: "", pos: start, end: start };
    }

    const c = this.peek();
    const c2 = this.peek(1);
    const c3 = this.peek(2);

    if (c === "<" && c2 === "<" && c3 === "=") {
      this.pos += 3;
      return this.token(ArithTokenType.LSHIFT_ASSIGN, start);
    }
    if (c === ">" && c2 === ">" && c3 === "=") {
      this.pos += 3;
      return this.token(ArithTokenType.RSHIFT_ASSIGN, start);
    }

    const twoChar = TWO_CHAR_OPS[c + c2];
    if (twoChar !== undefined) {
      this.pos += 2;
      return this.token(twoChar, start);
    }

    const singleChar = SINGLE_CHAR_OPS[c];
    if (singleChar !== undefined) {
      this.pos++;
      return this.token(singleChar, start);
    }

    if (c === "$") {
      if (c2 === "{") {
        let depth = 0;
        while (this.pos < this.input.length) {
          const ch = this.input[this.pos++];
          if (ch === "{") depth++;
          else if (ch === "}" && --depth === 0) {
            return this.token(ArithTokenType.PARAM_EXPANSION, start);
          }
        }
        throw new ArithmeticSyntaxError("unterminated ${", start);
      }
      if (/[a-zA-Z_]/.test(c2)) {
        this.pos++;
        while (/[a-zA-Z0-9_]/.test(this.peek())) this.pos++;
        return this.token(ArithTokenType.DOLLAR_NAME, start);
      }
      if (/[0-9#?]/.test(c2)) {
        this.pos += 2;
        return this.token(ArithTokenType.DOLLAR_NAME, start);
      }
      throw new ArithmeticSyntaxError(`unsupported expansion '$${c2}'`, start);
    }

    // Numbers (decimal, octal, hex, base#digits)
    if (/[0-9]/.test(c)) {
      if (c === "0" && (c2 === "x" || c2 === "X")) {
        this.pos += 2;
        while (/[0-9a-fA-F]/.test(this.peek())) this.pos++;
      } else {
        while (/[0-9]/.test(this.peek())) this.pos++;
        if (this.peek() === "#") {
          this.pos++;
          while (/[0-9a-zA-Z@_]/.test(this.peek())) this.pos++;
        }
      }
      return this.token(ArithTokenType.NUMBER, start);
    }

    if (/[a-zA-Z_]/.test(c)) {
      while (/[a-zA-Z0-9_]/.test(this.peek())) this.pos++;
      return this.token(ArithTokenType.IDENTIFIER, start);
    }

    throw new ArithmeticSyntaxError(`unexpected character '${c}'`, start);
  }

  tokenize(): ArithToken[] {
    const tokens: ArithToken[] = [];
    let token: ArithToken;
    do {
      token = this.next();
      tokens.push(token);
    } while (token.type !== ArithTokenType.EOF);
    return tokens;
  }
}

// =============================================================================
// Pratt Parser
// =============================================================================

export interface ArithmeticParserOptions {
  ids: IdGenerator;
  /** Position of the first character of the input */
  origin: Position;
  /** Parses a `${...}` token into a node */
  parseParameter: (text: string, origin: Position) => AST.ParameterExpansion;
}

export class ArithmeticParser {
  private tokens: ArithToken[];
  private pos = 0;

  constructor(private readonly input: string, private readonly options: ArithmeticParserOptions) {
    this.tokens = new ArithmeticLexer(input).tokenize();
  }

  private current(): ArithToken {
    return this.tokens[this.pos] ??
      { type: ArithTokenType.EOF, value: "", pos: this.input.length, end: this.input.length };
  }

  private advance(): ArithToken {
    const token = this.current();
    this.pos++;
    return token;
  }

  private expect(type: ArithTokenType): ArithToken {
    const token = this.current();
    if (token.type !== type) {
      throw new ArithmeticSyntaxError(
        `Expected ${ArithTokenType[type]}, got ${ArithTokenType[token.type]}`,
        token.pos,
      );
    }
    return this.advance();
  }

  private positionAt(index: number): Position {
    return advancePosition(this.options.origin, this.input, index);
  }

  private spanOf(start: number, end: number): Span {
    return { start: this.positionAt(start), end: this.positionAt(end) };
  }

  private startOf(node: AST.ArithmeticExpression): number {
    return node.span.start.offset - this.options.origin.offset;
  }

  parse(): AST.ArithmeticExpression {
    const result = this.parseExpression(0);
    const rest = this.current();
    if (rest.type !== ArithTokenType.EOF) {
      throw new ArithmeticSyntaxError(`Unexpected token: ${rest.value}`, rest.pos);
    }
    return result;
  }

  private parseExpression(minPrecedence: number): AST.ArithmeticExpression {
    let left = this.parsePrefix();

    while (true) {
      const token = this.current();
      const precedence = this.getInfixPrecedence(token.type);

      if (precedence === null || precedence < minPrecedence) {
        break;
      }

      left = this.parseInfix(left, token, precedence);
    }

    return left;
  }

  private variable(token: ArithToken): AST.VariableReference {
    const dollar = token.type === ArithTokenType.DOLLAR_NAME;
    return {
      type: "VariableReference",
      span: this.spanOf(token.pos, token.end),
      id: this.options.ids.next(),
      name: dollar ? token.value.slice(1) : token.value,
      dollar,
    };
  }

  private parsePrefix(): AST.ArithmeticExpression {
    const token = this.current();

    switch (token.type) {
      case ArithTokenType.NUMBER: {
        this.advance();
        return {
          type: "NumberLiteral",
          span: this.spanOf(token.pos, token.end),
          id: this.options.ids.next(),
          value: parseNumber(token.value),
          raw: token.value,
        };
      }

      case ArithTokenType.IDENTIFIER:
      case ArithTokenType.DOLLAR_NAME: {
        this.advance();
        const ref = this.variable(token);
        const next = this.current();
        if (next.type === ArithTokenType.INC || next.type === ArithTokenType.DEC) {
          this.advance();
          return {
            type: "UnaryArithmeticExpression",
            span: this.spanOf(token.pos, next.end),
            id: this.options.ids.next(),
            operator: next.type === ArithTokenType.INC ? "++" : "--",
            argument: ref,
            prefix: false,
          };
        }
        return ref;
      }

      case ArithTokenType.PARAM_EXPANSION: {
        this.advance();
        return this.options.parseParameter(token.value, this.positionAt(token.pos));
      }

      case ArithTokenType.LPAREN: {
        this.advance();
        const expression = this.parseExpression(0);
        const close = this.expect(ArithTokenType.RPAREN);
        return {
          type: "GroupedArithmeticExpression",
          span: this.spanOf(token.pos, close.end),
          id: this.options.ids.next(),
          expression,
        };
      }

      default: {
        const operator = PREFIX_OPS[token.type];
        if (operator === undefined) {
          throw new ArithmeticSyntaxError(
            `Unexpected token in arithmetic expression: ${ArithTokenType[token.type]} (${token.value})`,
            token.pos,
          );
        }
        this.advance();
        const argument = this.parseExpression(PRECEDENCE.PREFIX);
        return {
          type: "UnaryArithmeticExpression",
          span: this.spanOf(token.pos, argument.span.end.offset - this.options.origin.offset),
          id: this.options.ids.next(),
          operator,
          argument,
          prefix: true,
        };
      }
    }
  }

  private parseInfix(
    left: AST.ArithmeticExpression,
    token: ArithToken,
    precedence: number,
  ): AST.ArithmeticExpression {
    this.advance();
    const start = this.startOf(left);

    if (token.type === ArithTokenType.QUESTION) {
      const consequent = this.parseExpression(0);
      this.expect(ArithTokenType.COLON);
      const alternate = this.parseExpression(PRECEDENCE.TERNARY);
      return {
        type: "ConditionalArithmeticExpression",
        span: { start: left.span.start, end: alternate.span.end },
        id: this.options.ids.next(),
        test: left,
        consequent,
        alternate,
      };
    }

    const assignment = ASSIGNMENT_OPS[token.type];
    if (assignment !== undefined) {
      if (left.type !== "VariableReference") {
        throw new ArithmeticSyntaxError("Invalid left-hand side of assignment", token.pos);
      }
      // Right-associative
      const right = this.parseExpression(precedence);
      return {
        type: "AssignmentExpression",
        span: this.spanOf(start, right.span.end.offset - this.options.origin.offset),
        id: this.options.ids.next(),
        operator: assignment,
        left,
        right,
      };
    }

    const operator = BINARY_OPS[token.type];
    if (operator !== undefined) {
      // Right-associative for **
      const rightPrec = token.type === ArithTokenType.POWER ? precedence : precedence + 1;
      const right = this.parseExpression(rightPrec);
      return {
        type: "BinaryArithmeticExpression",
        span: { start: left.span.start, end: right.span.end },
        id: this.options.ids.next(),
        operator,
        left,
        right,
      };
    }

    throw new ArithmeticSyntaxError(`Unknown infix operator: ${token.value}`, token.pos);
  }

  private getInfixPrecedence(type: ArithTokenType): number | null {
    switch (type) {
      case ArithTokenType.COMMA:
        return PRECEDENCE.COMMA;
      case ArithTokenType.QUESTION:
        return PRECEDENCE.TERNARY;
      case ArithTokenType.OR:
        return PRECEDENCE.OR;
      case ArithTokenType.AND:
        return PRECEDENCE.AND;
      case ArithTokenType.PIPE:
        return PRECEDENCE.BIT_OR;
      case ArithTokenType.CARET:
        return PRECEDENCE.BIT_XOR;
      case ArithTokenType.AMP:
        return PRECEDENCE.BIT_AND;
      case ArithTokenType.EQ:
      case ArithTokenType.NE:
        return PRECEDENCE.EQUALITY;
      case ArithTokenType.LT:
      case ArithTokenType.GT:
      case ArithTokenType.LE:
      case ArithTokenType.GE:
        return PRECEDENCE.COMPARISON;
      case ArithTokenType.LSHIFT:
      case ArithTokenType.RSHIFT:
        return PRECEDENCE.SHIFT;
      case ArithTokenType.PLUS:
      case ArithTokenType.MINUS:
        return PRECEDENCE.ADDITIVE;
      case ArithTokenType.STAR:
      case ArithTokenType.SLASH:
      case ArithTokenType.PERCENT:
        return PRECEDENCE.MULTIPLICATIVE;
      case ArithTokenType.POWER:
        return PRECEDENCE.POWER;
      default:
        return ASSIGNMENT_OPS[type] !== undefined ? PRECEDENCE.ASSIGNMENT : null;
    }
  }
}

function parseNumber(value: string): number {
  if (value.startsWith("0x") || value.startsWith("0X")) {
    return parseInt(value, 16);
  }
  const based = value.match(/^(\d+)#([0-9a-zA-Z]+)$/);
  if (based && based[1] && based[2]) {
    return parseInt(based[2], Number(based[1]));
  }
  if (value.startsWith("0") && value.length > 1 && /^[0-7]+$/.test(value)) {
    return parseInt(value, 8);
  }
  return parseInt(value, 10);
}

// =============================================================================
// Convenience Function
// =============================================================================

/**
 * Parse arithmetic text, or return null when it is outside the supported
 * grammar.
 */
export function tryParseArithmetic(
  input: string,
  options: ArithmeticParserOptions,
): AST.ArithmeticExpression | null {
  if (input.trim() === "") return null;
  try {
    return new ArithmeticParser(input, options).parse();
  } catch (error) {
    if (error instanceof ArithmeticSyntaxError) return null;
    throw error;
  }
}
