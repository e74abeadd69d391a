import { describe, expect, it } from "vitest";
import { detectDialect, isDialect } from "./dialect.ts";

describe("detectDialect", () => {
  it("recognizes well-known file names", () => {
    expect(detectDialect("Makefile", "")).toBe("makefile");
    expect(detectDialect("build/rules.mk", "")).toBe("makefile");
    expect(detectDialect("GNUmakefile", "")).toBe("makefile");
    expect(detectDialect("Dockerfile", "")).toBe("dockerfile");
    expect(detectDialect("Dockerfile.dev", "")).toBe("dockerfile");
    expect(detectDialect("app.dockerfile", "")).toBe("dockerfile");
    expect(detectDialect("Containerfile", "")).toBe("dockerfile");
    expect(detectDialect("scripts/install.sh", "")).toBe("shell");
    expect(detectDialect("setup.bash", "")).toBe("shell");
  });

  it("lets the name win over the content", () => {
    expect(detectDialect("Makefile", "#!/bin/sh\n")).toBe("makefile");
  });

  it("falls back to the content", () => {
    expect(detectDialect("", "#!/bin/sh\necho hi\n")).toBe("shell");
    expect(detectDialect("", "# syntax=docker/dockerfile:1\nFROM alpine\n")).toBe("dockerfile");
    expect(detectDialect("build", "all: app\n\tgcc -o app main.c\n")).toBe("makefile");
  });

  it("defaults to shell", () => {
    expect(detectDialect("", "echo hi\n")).toBe("shell");
    expect(detectDialect("", "A := 1\n")).toBe("shell");
    expect(detectDialect("", "")).toBe("shell");
  });
});

describe("isDialect", () => {
  it("accepts the three dialect names only", () => {
    expect(isDialect("makefile")).toBe(true);
    expect(isDialect("cmake")).toBe(false);
  });
});
