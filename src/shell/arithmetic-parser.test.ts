import { describe, expect, it } from "vitest";
import { IdGenerator } from "../core/node-id.ts";
import { START_POSITION } from "../core/types.ts";
import { tryParseArithmetic } from "./arithmetic-parser.ts";
import type * as AST from "./ast.ts";
import { WordParser } from "./word-parser.ts";

function parse(text: string): AST.ArithmeticExpression | null {
  const ids = new IdGenerator();
  const words = new WordParser({ ids, parseNested: () => [] });
  return tryParseArithmetic(text, {
    ids,
    origin: START_POSITION,
    parseParameter: (raw, origin) => words.parseParameter(raw, origin),
  });
}

/** Fully parenthesized rendering, to check grouping */
function show(node: AST.ArithmeticExpression | null): string {
  if (node === null) return "null";
  switch (node.type) {
    case "NumberLiteral":
      return String(node.value);
    case "VariableReference":
      return node.dollar ? `$${node.name}` : node.name;
    case "ParameterExpansion":
      return `\${${node.parameter}}`;
    case "BinaryArithmeticExpression":
      return `(${show(node.left)} ${node.operator} ${show(node.right)})`;
    case "UnaryArithmeticExpression":
      return node.prefix ? `(${node.operator}${show(node.argument)})` : `(${show(node.argument)}${node.operator})`;
    case "ConditionalArithmeticExpression":
      return `(${show(node.test)} ? ${show(node.consequent)} : ${show(node.alternate)})`;
    case "AssignmentExpression":
      return `(${show(node.left)} ${node.operator} ${show(node.right)})`;
    case "GroupedArithmeticExpression":
      return `[${show(node.expression)}]`;
  }
}

// =============================================================================
// Precedence and associativity
// =============================================================================

describe("Arithmetic parser - precedence", () => {
  it("binds * tighter than +", () => {
    expect(show(parse("1 + 2 * 3"))).toBe("(1 + (2 * 3))");
  });

  it("makes ** right-associative", () => {
    expect(show(parse("2 ** 3 ** 2"))).toBe("(2 ** (3 ** 2))");
  });

  it("makes assignment right-associative", () => {
    expect(show(parse("x = y += 1"))).toBe("(x = (y += 1))");
  });

  it("parses the ternary operator below ||", () => {
    expect(show(parse("a || b ? 1 : 0"))).toBe("((a || b) ? 1 : 0)");
  });

  it("keeps parentheses as groups", () => {
    expect(show(parse("(1 + 2) * 3"))).toBe("([(1 + 2)] * 3)");
  });

  it("parses prefix and postfix operators", () => {
    expect(show(parse("-x + i++"))).toBe("((-x) + (i++))");
    expect(show(parse("!--n"))).toBe("(!(--n))");
  });
});

// =============================================================================
// Operands
// =============================================================================

describe("Arithmetic parser - operands", () => {
  it("reads hex, octal and based numbers", () => {
    expect(show(parse("0x1F"))).toBe("31");
    expect(show(parse("010"))).toBe("8");
    expect(show(parse("2#101"))).toBe("5");
  });

  it("reads $name and ${...} operands", () => {
    expect(show(parse("$count + ${step}"))).toBe("($count + ${step})");
  });

  it("reports spans relative to the origin", () => {
    const node = parse("a + bb");
    expect(node?.type === "BinaryArithmeticExpression" && node.right.span).toEqual({
      start: { line: 1, column: 5, offset: 4 },
      end: { line: 1, column: 7, offset: 6 },
    });
  });
});

// =============================================================================
// Unsupported input
// =============================================================================

describe("Arithmetic parser - unsupported input", () => {
  it("returns null outside the grammar", () => {
    expect(parse("")).toBeNull();
    expect(parse("1 +")).toBeNull();
    expect(parse("$(date)")).toBeNull();
    expect(parse("1 = 2")).toBeNull();
    expect(parse("a @ b")).toBeNull();
  });
});
