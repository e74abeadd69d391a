/**
 * Semantic analysis entry points
 *
 * Runs every enabled rule of a dialect's catalog over a tree. Read-only;
 * the returned issues are sorted by position, then rule code.
 */

import { isCategoryEnabled, type PurifyOptions, STANDARD_PRESET } from "../core/config.ts";
import { createLogger } from "../core/logger.ts";
import type { Dialect } from "../core/types.ts";
import type * as DockerAST from "../dockerfile/ast.ts";
import type * as MakeAST from "../make/ast.ts";
import type * as ShellAST from "../shell/ast.ts";
import { IssueCollector } from "./collector.ts";
import { createIssue, type SemanticIssue } from "./issue.ts";
import type { Rule, RuleCatalog } from "./rule.ts";
import { createDockerContext, DOCKER_RULES } from "./rules/dockerfile-rules.ts";
import { createMakeContext, MAKE_RULES } from "./rules/make-rules.ts";
import { createShellContext, SHELL_RULES, SIDE_EFFECT_RULES } from "./rules/shell-rules.ts";

const log = createLogger("analyze");

function runCatalog<Context>(
  catalog: RuleCatalog<Context>,
  context: Context,
  dialect: Dialect,
  enabled: (rule: Rule<Context>) => boolean,
): SemanticIssue[] {
  const collector = new IssueCollector();

  for (const rule of catalog.values()) {
    if (!enabled(rule)) continue;
    try {
      const issues = [...rule.check(context)].map((match) =>
        createIssue(rule.code, rule.category, rule.severity, match.message, match.span, {
          suggestion: match.suggestion,
          target: match.target,
          dialect,
        })
      );
      collector.addAll(issues);
    } catch (error) {
      // A rule that cannot decide stays silent.
      log.debug({ rule: rule.code, error: String(error) }, "rule failed; no issues reported");
    }
  }

  const issues = collector.sorted();
  log.debug({ dialect, issues: issues.length }, "analysis complete");
  return issues;
}

export function analyzeShell(program: ShellAST.Program, options: PurifyOptions = STANDARD_PRESET): SemanticIssue[] {
  return runCatalog(SHELL_RULES, createShellContext(program), "shell", (rule) => {
    if (SIDE_EFFECT_RULES.has(rule.code)) return options.trackSideEffects;
    return isCategoryEnabled(options, rule.category);
  });
}

export function analyzeMakefile(makefile: MakeAST.Makefile, options: PurifyOptions = STANDARD_PRESET): SemanticIssue[] {
  return runCatalog(MAKE_RULES, createMakeContext(makefile), "makefile", (rule) => isCategoryEnabled(options, rule.category));
}

export function analyzeDockerfile(dockerfile: DockerAST.Dockerfile, options: PurifyOptions = STANDARD_PRESET): SemanticIssue[] {
  return runCatalog(DOCKER_RULES, createDockerContext(dockerfile), "dockerfile", (rule) => isCategoryEnabled(options, rule.category));
}

/** Every rule code of a dialect, in catalog order */
export function ruleCodes(dialect: Dialect): string[] {
  switch (dialect) {
    case "shell":
      return [...SHELL_RULES.keys()];
    case "makefile":
      return [...MAKE_RULES.keys()];
    case "dockerfile":
      return [...DOCKER_RULES.keys()];
  }
}
