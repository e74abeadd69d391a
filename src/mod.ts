/**
 * Shell purifier
 *
 * Rewrites shell scripts, Makefiles and Dockerfiles into deterministic,
 * idempotent and portable equivalents, and reports what it changed and
 * what needs a manual fix.
 *
 * @example
 * ```ts
 * import { formatText, purify } from "shell-purifier";
 *
 * const { text, report } = purify("FILES := $(wildcard *.c)\n", { dialect: "makefile" });
 * // text === "FILES := $(sort $(wildcard *.c))\n"
 * console.log(formatText(report));
 * ```
 *
 * @module
 */

// Core types, errors and configuration
export * from "./core/types.ts";
export * from "./core/errors.ts";
export * from "./core/config.ts";
export { createLogger } from "./core/logger.ts";
export type { NodeId } from "./core/node-id.ts";

// Parsers
export type * as ShellAST from "./shell/ast.ts";
export type * as MakeAST from "./make/ast.ts";
export type * as DockerAST from "./dockerfile/ast.ts";
export { parseShell, type ParserOptions } from "./shell/parser.ts";
export { parseMakefile } from "./make/parser.ts";
export { parseDockerfile } from "./dockerfile/parser.ts";
export { detectShell, getCapabilities, Shell, type ShellCapabilities } from "./shell/shell-dialect.ts";

// Code generators
export { renderShell, type RenderOptions } from "./shell/codegen.ts";
export { renderMakefile } from "./make/codegen.ts";
export { renderDockerfile } from "./dockerfile/codegen.ts";
export { structurallyEqual } from "./shell/equality.ts";

// Analysis
export { analyzeDockerfile, analyzeMakefile, analyzeShell, ruleCodes } from "./analysis/analyzer.ts";
export { compareIssues, createIssue, formatIssue, type SemanticIssue } from "./analysis/issue.ts";
export { type ShellType, type TypeCheckResult, type TypeDiagnostic, typeCheck } from "./analysis/type-check.ts";

// Purification
export { plan, type PurifiableTree } from "./purify/planner.ts";
export { applyShell, type RewriteResult } from "./purify/shell-rewriter.ts";
export { applyMakefile } from "./purify/make-rewriter.ts";
export { applyDockerfile } from "./purify/docker-rewriter.ts";
export type { SafeTransformation, Transformation, TransformationOutcome, TransformationStatus } from "./purify/transformation.ts";
export { PurificationResult } from "./purify/result.ts";
export { detectDialect } from "./purify/dialect.ts";
export { purify, type PurifyOutput, type PurifyRequest } from "./purify/purifier.ts";

// Reports
export * from "./report/mod.ts";
