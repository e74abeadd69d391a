import { describe, expect, it } from "vitest";
import { parseDockerfile } from "../../dockerfile/parser.ts";
import { analyzeDockerfile } from "../analyzer.ts";
import { cacheCleanup, needsAdd, parseImageReference } from "./dockerfile-rules.ts";

const analyze = (source: string) => analyzeDockerfile(parseDockerfile(source));
const rules = (source: string) => analyze(source).map((issue) => issue.rule);

// =============================================================================
// Base images and users
// =============================================================================

describe("Dockerfile rules - base images", () => {
  it("flags an untagged image and a root CMD", () => {
    const issues = analyze('FROM ubuntu\nCMD ["app"]\n');
    expect(issues.map((issue) => [issue.rule, issue.message])).toEqual([
      ["DOCKER002", "Base image 'ubuntu' has no version tag"],
      ["DOCKER001", "CMD runs as root: no USER instruction in the final stage"],
    ]);
    expect(issues[0]?.suggestion).toBe("FROM ubuntu:22.04");
    expect(issues[0]?.dialect).toBe("dockerfile");
  });

  it("flags the latest tag and keeps the stage alias in the suggestion", () => {
    const [issue] = analyze("FROM node:latest AS build\n");
    expect(issue?.message).toBe("Base image 'node' uses the moving 'latest' tag");
    expect(issue?.suggestion).toBe("FROM node:20-alpine AS build");
  });

  it("suggests a placeholder tag for unknown images", () => {
    const [issue] = analyze("FROM registry.example.com:5000/team/app\n");
    expect(issue?.suggestion).toBe("FROM registry.example.com:5000/team/app:<version>");
  });

  it("accepts pinned, digest, scratch and stage references", () => {
    expect(rules("FROM alpine:3.19\nUSER app\nCMD x\n")).toEqual([]);
    expect(rules("FROM ubuntu@sha256:abc\n")).toEqual([]);
    expect(rules('FROM scratch\nCMD ["/app"]\n')).toEqual([]);
    expect(rules("FROM golang:1.22 AS build\nFROM build\nUSER app\nCMD x\n")).toEqual([]);
  });

  it("splits image references", () => {
    expect(parseImageReference("localhost:5000/app:1.0@sha256:abc AS base")).toEqual({
      registry: "localhost:5000",
      repository: "app",
      tag: "1.0",
      digest: "sha256:abc",
      alias: "base",
    });
    expect(parseImageReference("library/redis")).toEqual({
      registry: null,
      repository: "library/redis",
      tag: null,
      digest: null,
      alias: null,
    });
  });
});

// =============================================================================
// RUN and ADD
// =============================================================================

describe("Dockerfile rules - instructions", () => {
  it("flags package caches and recommended packages", () => {
    const issues = analyze("FROM debian:12\nRUN apt-get update && apt-get install -y curl\n");
    expect(issues.map((issue) => issue.rule)).toEqual(["DOCKER003", "DOCKER005"]);
    expect(issues[0]?.suggestion).toBe("Append && rm -rf /var/lib/apt/lists/*");
  });

  it("accepts apk add --no-cache", () => {
    expect(rules("FROM alpine:3.19\nRUN apk add --no-cache curl\n")).toEqual([]);
    expect(analyze("FROM alpine:3.19\nRUN apk add curl\n")[0]?.suggestion).toBe("Append && rm -rf /var/cache/apk/*");
  });

  it("flags downloads piped to a shell", () => {
    expect(rules("FROM debian:12\nRUN curl -fsSL https://example.com/x.sh | sh\n")).toEqual(["DOCKER004"]);
  });

  it("suggests COPY for local ADD sources", () => {
    const issues = analyze(
      "FROM debian:12\nADD app.py /app/\nADD https://example.com/a.tgz /tmp/\nADD vendor.tar.gz /opt/\n",
    );
    expect(issues.map((issue) => [issue.rule, issue.span.start.line, issue.suggestion])).toEqual([
      ["DOCKER006", 2, "COPY app.py /app/"],
    ]);
  });

  it("decides cache cleanup and ADD needs from the text", () => {
    expect(cacheCleanup("apt-get install -y x && rm -rf /var/lib/apt/lists/*")).toBeNull();
    expect(cacheCleanup("make install")).toBeNull();
    expect(needsAdd("src/ /app/")).toBe(false);
    expect(needsAdd("/only")).toBe(true);
    expect(needsAdd('["a b", "/c"]')).toBe(true);
  });
});
