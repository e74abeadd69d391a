/**
 * Purification pipeline
 *
 * parse -> analyze -> plan -> apply -> render -> report. Every stage is a
 * pure function of its inputs; the caller's source and options are never
 * modified, and nothing is shared between calls.
 *
 * @example
 * ```ts
 * const { text, report } = purify("mkdir /tmp/build\n");
 * // text === "mkdir -p /tmp/build\n"
 * // report.issuesFixed === 1
 * ```
 */

import { analyzeDockerfile, analyzeMakefile, analyzeShell } from "../analysis/analyzer.ts";
import type { SemanticIssue } from "../analysis/issue.ts";
import { type TypeCheckResult, typeCheck } from "../analysis/type-check.ts";
import {
  checkOptions,
  type FormatOptions,
  formatOptionsOf,
  mergeOptions,
  type PurifyOptions,
  type PurifyOptionsOverride,
  STANDARD_PRESET,
} from "../core/config.ts";
import { unsupportedDialect } from "../core/errors.ts";
import { createLogger } from "../core/logger.ts";
import type { Dialect } from "../core/types.ts";
import type * as DockerAST from "../dockerfile/ast.ts";
import { renderDockerfile } from "../dockerfile/codegen.ts";
import { parseDockerfile } from "../dockerfile/parser.ts";
import type * as MakeAST from "../make/ast.ts";
import { renderMakefile } from "../make/codegen.ts";
import { parseMakefile } from "../make/parser.ts";
import { buildReport, type PurificationReport } from "../report/model.ts";
import type * as ShellAST from "../shell/ast.ts";
import { renderShell } from "../shell/codegen.ts";
import { parseShell } from "../shell/parser.ts";
import { detectDialect } from "./dialect.ts";
import { applyDockerfile } from "./docker-rewriter.ts";
import { applyMakefile } from "./make-rewriter.ts";
import { type PurifiableTree, plan } from "./planner.ts";
import { PurificationResult } from "./result.ts";
import { applyShell, type RewriteResult } from "./shell-rewriter.ts";
import type { Transformation } from "./transformation.ts";

const log = createLogger("purify");

export interface PurifyRequest {
  /** Detected from `file` and the content when absent */
  dialect?: Dialect;
  /** Overrides on top of the standard preset */
  options?: PurifyOptionsOverride;
  /** Name used in parse errors and for dialect detection */
  file?: string;
}

export interface PurifyOutput {
  text: string;
  report: PurificationReport;
  result: PurificationResult;
}

interface Stages<Tree extends PurifiableTree> {
  parse(source: string, file: string | undefined): Tree;
  analyze(tree: Tree, options: PurifyOptions): SemanticIssue[];
  apply(tree: Tree, transformations: readonly Transformation[]): RewriteResult<Tree>;
  render(tree: Tree, format: FormatOptions, types: TypeCheckResult | null): string;
  /** Gradual type checking; shell only */
  check?(tree: Tree): TypeCheckResult;
}

const SHELL: Stages<ShellAST.Program> = {
  parse: (source, file) => parseShell(source, { source: file }),
  analyze: analyzeShell,
  apply: applyShell,
  render: (tree, format, types) => renderShell(tree, { ...format, guards: types?.guards }),
  check: typeCheck,
};

const MAKEFILE: Stages<MakeAST.Makefile> = {
  parse: (source, file) => parseMakefile(source, { source: file }),
  analyze: analyzeMakefile,
  apply: applyMakefile,
  render: (tree, format) => renderMakefile(tree, format),
};

const DOCKERFILE: Stages<DockerAST.Dockerfile> = {
  parse: (source, file) => parseDockerfile(source, { source: file }),
  analyze: analyzeDockerfile,
  apply: applyDockerfile,
  render: (tree, format) => renderDockerfile(tree, format),
};

function run<Tree extends PurifiableTree>(
  stages: Stages<Tree>,
  dialect: Dialect,
  source: string,
  options: PurifyOptions,
  file: string | undefined,
): PurifyOutput {
  const tree = stages.parse(source, file);
  log.debug({ dialect, file, lines: tree.metadata.lineCount }, "parsed");

  const issues = stages.analyze(tree, options);
  log.debug({ dialect, issues: issues.length }, "analyzed");

  const transformations = plan(tree, issues);
  log.debug({ transformations: transformations.length }, "planned");

  const rewrite = stages.apply(tree, transformations);
  const downgradedCount = rewrite.outcomes.filter((o) => o.status === "downgraded").length;
  log.debug({ outcomes: rewrite.outcomes.length, downgraded: downgradedCount }, "applied");

  const types = options.typeCheck && stages.check ? stages.check(rewrite.tree) : null;
  const guards = options.emitGuards ? types : null;
  const text = stages.render(rewrite.tree, formatOptionsOf(options), guards);
  log.debug({ bytes: text.length }, "rendered");

  const result = new PurificationResult(dialect, rewrite.tree, issues, rewrite.outcomes, types);
  return { text, report: buildReport(result), result };
}

/**
 * Purify one source text.
 *
 * @throws ParseError when the source cannot be parsed; nothing is returned
 * for partially parsed input.
 * @throws PurifyError with code CONFIG_ERROR when the options are invalid.
 */
export function purify(source: string, request: PurifyRequest = {}): PurifyOutput {
  const options = checkOptions(mergeOptions(STANDARD_PRESET, request.options));
  const dialect = request.dialect ?? detectDialect(request.file ?? "", source);

  switch (dialect) {
    case "shell":
      return run(SHELL, dialect, source, options, request.file);
    case "makefile":
      return run(MAKEFILE, dialect, source, options, request.file);
    case "dockerfile":
      return run(DOCKERFILE, dialect, source, options, request.file);
    default:
      throw unsupportedDialect(String(dialect));
  }
}
