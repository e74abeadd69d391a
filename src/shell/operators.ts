/**
 * Centralized Operator Definitions
 *
 * Single source of truth for the operator and keyword tables shared by the
 * parser and the code generator.
 */

import { TokenType } from "./lexer.ts";
import type * as AST from "./ast.ts";

// =============================================================================
// Reserved Words
// =============================================================================

/**
 * Words the parser treats as keywords when they start a command. The code
 * generator quotes a bare literal argument equal to one of these.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "if",
  "then",
  "else",
  "elif",
  "fi",
  "for",
  "while",
  "until",
  "do",
  "done",
  "case",
  "esac",
  "in",
  "function",
  "select",
  "time",
  "coproc",
]);

/** Keywords that close or continue an enclosing construct */
export const CLOSING_WORDS: ReadonlySet<string> = new Set([
  "then",
  "else",
  "elif",
  "fi",
  "do",
  "done",
  "esac",
  "}",
]);

// =============================================================================
// Test Operators (for [[ ... ]] expressions)
// =============================================================================

export const UNARY_TEST_OPERATORS: readonly AST.UnaryTestOperator[] = [
  // File existence and type tests
  "-a", "-e", "-f", "-d", "-L", "-h", "-b", "-c", "-p", "-S", "-t",
  // File permission tests
  "-r", "-w", "-x", "-s", "-g", "-u", "-k", "-O", "-G", "-N",
  // String and variable tests
  "-z", "-n", "-o", "-v", "-R",
] as const;

export const BINARY_TEST_OPERATORS: Readonly<Record<string, AST.BinaryTestOperator>> = {
  // String comparison
  "=": "=",
  "==": "==",
  "!=": "!=",
  "<": "<",
  ">": ">",
  // Numeric comparison
  "-eq": "-eq",
  "-ne": "-ne",
  "-lt": "-lt",
  "-le": "-le",
  "-gt": "-gt",
  "-ge": "-ge",
  // File comparison
  "-nt": "-nt",
  "-ot": "-ot",
  "-ef": "-ef",
  // Regex matching
  "=~": "=~",
} as const;

// =============================================================================
// Redirection Operators
// =============================================================================

export const REDIRECTION_OPERATOR_MAP: Readonly<Partial<Record<TokenType, AST.RedirectionOperator>>> = {
  [TokenType.LESS]: "<",
  [TokenType.GREAT]: ">",
  [TokenType.DGREAT]: ">>",
  [TokenType.LESSAND]: "<&",
  [TokenType.GREATAND]: ">&",
  [TokenType.LESSGREAT]: "<>",
  [TokenType.CLOBBER]: ">|",
  [TokenType.DLESS]: "<<",
  [TokenType.DLESSDASH]: "<<-",
  [TokenType.TLESS]: "<<<",
  [TokenType.AND_GREAT]: "&>",
  [TokenType.AND_DGREAT]: "&>>",
} as const;

export const CASE_TERMINATORS: Readonly<Partial<Record<TokenType, AST.CaseTerminator>>> = {
  [TokenType.DSEMI]: ";;",
  [TokenType.SEMI_AND]: ";&",
  [TokenType.SEMI_SEMI_AND]: ";;&",
};

// =============================================================================
// Helper Functions
// =============================================================================

export function isUnaryTestOperator(value: string): value is AST.UnaryTestOperator {
  return (UNARY_TEST_OPERATORS as readonly string[]).includes(value);
}

export function getBinaryTestOperator(value: string): AST.BinaryTestOperator | undefined {
  return BINARY_TEST_OPERATORS[value];
}

export function getRedirectionOperator(type: TokenType): AST.RedirectionOperator | undefined {
  return REDIRECTION_OPERATOR_MAP[type];
}

export function isRedirectionStart(type: TokenType): boolean {
  return type === TokenType.IO_NUMBER || REDIRECTION_OPERATOR_MAP[type] !== undefined;
}
