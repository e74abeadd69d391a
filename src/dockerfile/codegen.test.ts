import { describe, expect, it } from "vitest";
import { renderDockerfile } from "./codegen.ts";
import { parseDockerfile } from "./parser.ts";

describe("Dockerfile codegen", () => {
  it("renders directives, comments and instructions", () => {
    const source = "# syntax=docker/dockerfile:1\n# base image\nFROM alpine\nCOPY --from=build /out /app\n";
    expect(renderDockerfile(parseDockerfile(source))).toBe(source);
  });

  it("keeps the keyword as written", () => {
    expect(renderDockerfile(parseDockerfile("from alpine\nrun echo hi\n"))).toBe("from alpine\nrun echo hi\n");
  });

  it("collapses blank lines unless asked to keep them", () => {
    const file = parseDockerfile("FROM a\n\n\nRUN b\n");
    expect(renderDockerfile(file)).toBe("FROM a\n\nRUN b\n");
    expect(renderDockerfile(file, { skipBlankLineRemoval: true })).toBe("FROM a\n\n\nRUN b\n");
  });

  it("consolidates continuations unless asked to keep them", () => {
    const source = "RUN apt-get update \\\n    && apt-get install -y curl\n";
    const file = parseDockerfile(source);
    expect(renderDockerfile(file)).toBe("RUN apt-get update && apt-get install -y curl\n");
    expect(renderDockerfile(file, { skipConsolidation: true })).toBe(source);
  });

  it("wraps long instructions before each && at the maximum line length", () => {
    const file = parseDockerfile("RUN apt-get update && apt-get install -y curl\n");
    expect(renderDockerfile(file, { maxLineLength: 30 })).toBe(
      "RUN apt-get update \\\n    && apt-get install -y \\\n    curl\n",
    );
  });

  it("wraps with the escape character the file declares", () => {
    const file = parseDockerfile("# escape=`\nRUN one two three\n");
    expect(renderDockerfile(file, { maxLineLength: 12 })).toBe("# escape=`\nRUN one `\n    two `\n    three\n");
  });

  it("renders an empty file as empty text", () => {
    expect(renderDockerfile(parseDockerfile(""))).toBe("");
  });
});
