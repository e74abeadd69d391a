import { describe, expect, it } from "vitest";
import { ParseError } from "../core/errors.ts";
import { instructions } from "./ast.ts";
import { parseDockerfile, splitFlags } from "./parser.ts";

// =============================================================================
// Instructions
// =============================================================================

describe("Dockerfile parser - instructions", () => {
  it("reads keywords and arguments", () => {
    const file = parseDockerfile("FROM node:20 AS build\nRUN npm ci\n");
    expect(instructions(file).map((item) => [item.keyword, item.arguments])).toEqual([
      ["FROM", "node:20 AS build"],
      ["RUN", "npm ci"],
    ]);
  });

  it("upper-cases the keyword and keeps the written form", () => {
    const [run] = instructions(parseDockerfile("run echo hi\n"));
    expect(run?.keyword).toBe("RUN");
    expect(run?.keywordText).toBe("run");
  });

  it("separates leading flags from the arguments", () => {
    const [copy] = instructions(parseDockerfile("COPY --from=build --chown=app /out /app\n"));
    expect(copy?.flags).toEqual(["--from=build", "--chown=app"]);
    expect(copy?.arguments).toBe("/out /app");
  });

  it("joins continuation lines with a space", () => {
    const file = parseDockerfile("RUN apt-get update \\\n    && apt-get install -y curl\n");
    const [run] = instructions(file);
    expect(run?.arguments).toBe("apt-get update && apt-get install -y curl");
    expect(run?.continuationLines).toEqual(["RUN apt-get update \\", "    && apt-get install -y curl"]);
    expect(run?.span.start.line).toBe(1);
    expect(run?.span.end.line).toBe(2);
  });

  it("drops comment lines inside a continuation", () => {
    const [run] = instructions(parseDockerfile("RUN make \\\n# build everything\n    install\n"));
    expect(run?.arguments).toBe("make install");
  });

  it("filters instructions by keyword", () => {
    const file = parseDockerfile("FROM a\nRUN b\nRUN c\n");
    expect(instructions(file, "RUN").map((item) => item.arguments)).toEqual(["b", "c"]);
  });

  it("accepts HEALTHCHECK without arguments", () => {
    expect(instructions(parseDockerfile("HEALTHCHECK\n"))[0]?.arguments).toBe("");
  });

  it("rejects RUN without arguments", () => {
    expect(() => parseDockerfile("FROM a\nRUN\n")).toThrow(ParseError);
    expect(() => parseDockerfile("FROM a\nRUN\n")).toThrow("RUN requires at least one argument");
  });

  it("rejects a line that is not an instruction", () => {
    expect(() => parseDockerfile("123 go\n")).toThrow("invalid instruction '123 go'");
  });
});

// =============================================================================
// Directives, comments and metadata
// =============================================================================

describe("Dockerfile parser - directives", () => {
  it("reads parser directives above the first instruction", () => {
    const file = parseDockerfile("# syntax=docker/dockerfile:1\nFROM alpine\n");
    expect(file.items[0]).toMatchObject({ type: "ParserDirective", name: "syntax", value: "docker/dockerfile:1" });
  });

  it("treats a directive after an instruction as a comment", () => {
    const file = parseDockerfile("FROM alpine\n# escape=`\n");
    expect(file.items[1]).toMatchObject({ type: "Comment", text: " escape=`" });
    expect(file.metadata.escape).toBe("\\");
  });

  it("continues lines with the escape character it names", () => {
    const file = parseDockerfile("# escape=`\nFROM windows\nRUN dir `\n  c:\\\n");
    expect(file.metadata.escape).toBe("`");
    expect(instructions(file, "RUN")[0]?.arguments).toBe("dir c:\\");
  });

  it("rejects an unknown escape character", () => {
    expect(() => parseDockerfile("# escape=x\nFROM a\n")).toThrow("invalid escape character 'x'");
  });

  it("records blank lines and the line count", () => {
    const file = parseDockerfile("FROM a\n\n\nRUN b\n");
    expect(file.items[1]?.blankLinesBefore).toBe(2);
    expect(file.metadata.lineCount).toBe(4);
  });

  it("splits flags", () => {
    expect(splitFlags("--rm")).toEqual({ flags: ["--rm"], rest: "" });
    expect(splitFlags("  --mount=type=cache  make  ")).toEqual({ flags: ["--mount=type=cache"], rest: "make" });
  });
});
