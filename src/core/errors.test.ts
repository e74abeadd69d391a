import { describe, expect, it } from "vitest";
import { configError, invariantViolation, ParseError, parseError, PurifyError, unsupportedDialect } from "./errors.ts";

// =============================================================================
// ParseError
// =============================================================================

describe("ParseError", () => {
  it("formats the location into the message", () => {
    const error = new ParseError("expected 'fi', found end of input", { line: 3, column: 5 });
    expect(error.message).toBe("Parse error at <input>:3:5: expected 'fi', found end of input");
    expect(error.file).toBe("<input>");
    expect(error.reason).toBe("expected 'fi', found end of input");
    expect(error.code).toBe("PARSE_ERROR");
    expect(error).toBeInstanceOf(PurifyError);
  });

  it("appends the context on its own line", () => {
    const error = new ParseError("unexpected ')'", { line: 1, column: 9 }, { context: "in subshell started at line 1" });
    expect(error.message).toBe("Parse error at <input>:1:9: unexpected ')'\n  in subshell started at line 1");
    expect(error.details?.context).toBe("in subshell started at line 1");
  });

  it("attributes a copy to a file", () => {
    const error = new ParseError("bad", { line: 2, column: 1 }, { expected: "a word" }).withFile("build.sh");
    expect(error).toBeInstanceOf(ParseError);
    expect(error.message).toBe("Parse error at build.sh:2:1: bad");
    expect(error.expected).toBe("a word");
    expect(error.details?.file).toBe("build.sh");
  });

  it("takes the start of a span", () => {
    const error = parseError("oops", {
      start: { line: 4, column: 2, offset: 30 },
      end: { line: 4, column: 6, offset: 34 },
    });
    expect(error.line).toBe(4);
    expect(error.column).toBe(2);
  });
});

// =============================================================================
// Factories
// =============================================================================

describe("error factories", () => {
  it("builds an unsupported dialect error", () => {
    const error = unsupportedDialect("cmake");
    expect(error.code).toBe("UNSUPPORTED_DIALECT");
    expect(error.message).toBe("Unsupported dialect 'cmake'");
    expect(error.toJSON()).toEqual({
      code: "UNSUPPORTED_DIALECT",
      message: "Unsupported dialect 'cmake'",
      details: { dialect: "cmake" },
      suggestion: "Use one of: shell, makefile, dockerfile",
    });
  });

  it("builds configuration errors with or without issues", () => {
    expect(configError("bad options").details).toBeUndefined();
    expect(configError("bad options", ["a: wrong"]).details).toEqual({ issues: ["a: wrong"] });
  });

  it("prefixes invariant violations", () => {
    expect(invariantViolation("ids diverged").message).toBe("Invariant violated: ids diverged");
  });
});
