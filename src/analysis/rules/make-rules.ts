/**
 * Makefile rule catalog
 *
 * Variable values and recipe lines are matched as text. The "umbrella"
 * rules (.NOTPARALLEL, .SUFFIXES, .DELETE_ON_ERROR) only fire when their
 * family already found something, so a clean Makefile gets no advice.
 */

import * as AST from "../../make/ast.ts";
import { catalogOf, type Rule, type RuleCatalog, type RuleMatch } from "../rule.ts";

export interface RecipeEntry {
  rule: AST.Rule;
  line: AST.RecipeLine;
  /** Command text without make's `@`, `-` and `+` prefixes */
  command: string;
}

export interface MakeRuleContext {
  makefile: AST.Makefile;
  variables: AST.Variable[];
  rules: AST.Rule[];
  targets: AST.Target[];
  recipes: RecipeEntry[];
}

export function createMakeContext(makefile: AST.Makefile): MakeRuleContext {
  const items = AST.flattenItems(makefile.items);
  const rules = items.filter((item): item is AST.Rule => item.type === "Target" || item.type === "PatternRule");
  return {
    makefile,
    variables: items.filter((item): item is AST.Variable => item.type === "Variable"),
    rules,
    targets: rules.filter((rule): rule is AST.Target => rule.type === "Target"),
    recipes: rules.flatMap((rule) =>
      rule.recipe.map((line) => ({ rule, line, command: line.text.replace(/^[@+\-\s]+/, "") }))
    ),
  };
}

// =============================================================================
// Text helpers
// =============================================================================

const CALL_NAME = /^[A-Za-z][\w-]*/;

/**
 * Start indexes of `$(name ` calls in `text` that no enclosing call already
 * passes through `$(sort `.
 */
export function unsortedCalls(text: string, name: string): number[] {
  const found: number[] = [];
  const call = `$(${name} `;
  // Names of the open calls; "" for `${` and bare parentheses.
  const open: string[] = [];
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === "$" && text[i + 1] === "(") {
      if (text.startsWith(call, i) && !open.includes("sort")) found.push(i);
      open.push(CALL_NAME.exec(text.slice(i + 2))?.[0] ?? "");
      i++;
    } else if (c === "(" || c === "{") {
      open.push("");
    } else if (c === ")" || c === "}") {
      open.pop();
    }
  }
  return found;
}

/**
 * Index just past the `)` closing the call that starts at `start`, tracking
 * nested `$(` and `${`. -1 when unbalanced.
 */
export function closingParen(text: string, start: number): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (c === "(" || c === "{") depth++;
    else if (c === ")" || c === "}") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function hasTarget(context: MakeRuleContext, name: string): boolean {
  return context.targets.some((target) => target.name.split(/\s+/).includes(name));
}

const OUTPUT = /(?:>\s*|\s-o\s+)([^\s;|&<>()]+)/g;

function outputsOf(command: string): string[] {
  const outputs: string[] = [];
  for (const match of command.matchAll(OUTPUT)) {
    const file = match[1];
    if (file === undefined || file.startsWith("&") || file.includes("$@") || file.startsWith("/dev/")) continue;
    outputs.push(file);
  }
  return outputs;
}

/** Files written by more than one target, with the writers in order */
function sharedWrites(context: MakeRuleContext, extract: (command: string) => string[]): Map<string, RecipeEntry[]> {
  const writers = new Map<string, RecipeEntry[]>();
  for (const entry of context.recipes) {
    if (entry.rule.type !== "Target") continue;
    for (const file of extract(entry.command)) {
      const list = writers.get(file) ?? [];
      if (!list.some((other) => other.rule === entry.rule)) list.push(entry);
      writers.set(file, list);
    }
  }
  return new Map([...writers].filter(([, list]) => list.length > 1));
}

function recipeMatch(entry: RecipeEntry, message: string, suggestion?: string): RuleMatch {
  const match: RuleMatch = { span: entry.line.span, message, target: entry.rule.id };
  if (suggestion !== undefined) match.suggestion = suggestion;
  return match;
}

function recipeRule(
  code: string,
  category: Rule<MakeRuleContext>["category"],
  summary: string,
  test: (command: string) => boolean,
  message: (entry: RecipeEntry) => string,
  suggestion: string,
): Rule<MakeRuleContext> {
  return {
    code,
    category,
    severity: "warning",
    summary,
    *check(context) {
      for (const entry of context.recipes) {
        if (test(entry.command)) yield recipeMatch(entry, message(entry), suggestion);
      }
    },
  };
}

function subject(rule: AST.Rule): string {
  return `target '${AST.ruleName(rule)}'`;
}

// =============================================================================
// Determinism and reproducibility of variables
// =============================================================================

const NO_WILDCARD: Rule<MakeRuleContext> = {
  code: "NO_WILDCARD",
  category: "determinism",
  severity: "warning",
  summary: "unsorted $(wildcard ...)",
  *check(context) {
    for (const variable of context.variables) {
      if (unsortedCalls(variable.value, "wildcard").length === 0) continue;
      yield {
        span: variable.span,
        message: `Variable '${variable.name}' uses $(wildcard ...), whose order depends on the filesystem`,
        suggestion: `${variable.name} ${AST.FLAVOR_OPERATORS[variable.flavor]} $(sort $(wildcard ...))`,
        target: variable.id,
      };
    }
  },
};

const NO_UNORDERED_FIND: Rule<MakeRuleContext> = {
  code: "NO_UNORDERED_FIND",
  category: "determinism",
  severity: "warning",
  summary: "unsorted $(shell find ...)",
  *check(context) {
    for (const variable of context.variables) {
      const calls = unsortedCalls(variable.value, "shell").filter((index) => {
        const end = closingParen(variable.value, index + 1);
        const body = variable.value.slice(index, end === -1 ? undefined : end);
        return /^\$\(shell\s+find\b/.test(body) && !/\|\s*sort\b/.test(body);
      });
      if (calls.length === 0) continue;
      yield {
        span: variable.span,
        message: `Variable '${variable.name}' uses $(shell find ...), whose order depends on the filesystem`,
        suggestion: `${variable.name} ${AST.FLAVOR_OPERATORS[variable.flavor]} $(sort $(shell find ...))`,
        target: variable.id,
      };
    }
  },
};

const NO_TIMESTAMPS: Rule<MakeRuleContext> = {
  code: "NO_TIMESTAMPS",
  category: "determinism",
  severity: "warning",
  summary: "$(shell date) in variables",
  *check(context) {
    for (const variable of context.variables) {
      if (!/\$\(shell\s+date\b/.test(variable.value)) continue;
      yield {
        span: variable.span,
        message: `Variable '${variable.name}' captures the build time`,
        suggestion: `${variable.name} := 1.0.0`,
        target: variable.id,
      };
    }
  },
};

const RANDOM_REFERENCE = /\$\$?RANDOM|\$\$?\{RANDOM\}|\/dev\/u?random|\bshuf\b/;

const NO_RANDOM: Rule<MakeRuleContext> = {
  code: "NO_RANDOM",
  category: "determinism",
  severity: "warning",
  summary: "random values in variables",
  *check(context) {
    for (const variable of context.variables) {
      if (!RANDOM_REFERENCE.test(variable.value)) continue;
      yield {
        span: variable.span,
        message: `Variable '${variable.name}' takes a random value`,
        suggestion: `${variable.name} := 42`,
        target: variable.id,
      };
    }
  },
};

const COMMON_PHONY = new Set([
  "all",
  "build",
  "check",
  "clean",
  "deploy",
  "distclean",
  "format",
  "help",
  "install",
  "lint",
  "run",
  "test",
]);

const AUTO_PHONY: Rule<MakeRuleContext> = {
  code: "AUTO_PHONY",
  category: "reproducibility",
  severity: "info",
  summary: "non-file targets not declared .PHONY",
  *check(context) {
    for (const target of context.targets) {
      if (target.phony || !COMMON_PHONY.has(target.name)) continue;
      yield {
        span: target.span,
        message: `Target '${target.name}' does not create a file but is not declared .PHONY`,
        suggestion: `.PHONY: ${target.name}`,
        target: target.id,
      };
    }
  },
};

// =============================================================================
// Parallel safety
// =============================================================================

function* outputConflicts(context: MakeRuleContext): Generator<RuleMatch> {
  for (const [file, writers] of sharedWrites(context, outputsOf)) {
    const names = writers.map((entry) => AST.ruleName(entry.rule)).join(", ");
    for (const entry of writers.slice(1)) {
      yield recipeMatch(
        entry,
        `Output '${file}' is written by several targets: ${names}`,
        "Give each target its own output file, or make one depend on the other",
      );
    }
  }
}

function* missingDependencies(context: MakeRuleContext): Generator<RuleMatch> {
  const writers = new Map<string, AST.Target>();
  for (const entry of context.recipes) {
    if (entry.rule.type !== "Target") continue;
    for (const file of outputsOf(entry.command)) {
      if (!writers.has(file)) writers.set(file, entry.rule);
    }
  }

  for (const entry of context.recipes) {
    if (entry.rule.type !== "Target") continue;
    for (const match of entry.command.matchAll(/\bcat\s+([^\s;|&<>]+)/g)) {
      const file = match[1];
      const provider = file === undefined ? undefined : writers.get(file);
      if (!provider || provider === entry.rule) continue;
      const depends = entry.rule.prerequisites.includes(provider.name) || entry.rule.prerequisites.includes(file ?? "");
      if (depends) continue;
      yield recipeMatch(
        entry,
        `Target '${entry.rule.name}' reads '${file ?? ""}' written by '${provider.name}' without depending on it`,
        `${entry.rule.name}: ${provider.name}`,
      );
    }
  }
}

function* recursiveMakes(context: MakeRuleContext): Generator<RuleMatch> {
  for (const entry of context.recipes) {
    if (!/\$[({]MAKE[)}]/.test(entry.command)) continue;
    const dir = entry.command.match(/-C\s+(\S+)/)?.[1];
    if (dir === undefined) continue;
    yield recipeMatch(
      entry,
      `Recursive make into '${dir}' has no ordering against sibling targets`,
      "Declare the sub-make's dependencies as prerequisites of this target",
    );
  }
}

function mkdirArguments(command: string): string[] {
  const dirs: string[] = [];
  for (const match of command.matchAll(/\bmkdir\s+(?!-p\b)([^\s;|&<>-][^\s;|&<>]*)/g)) {
    if (match[1] !== undefined) dirs.push(match[1]);
  }
  return dirs;
}

function* directoryRaces(context: MakeRuleContext): Generator<RuleMatch> {
  for (const [dir, writers] of sharedWrites(context, mkdirArguments)) {
    for (const entry of writers.slice(1)) {
      yield recipeMatch(entry, `Directory '${dir}' is created by several targets`, `mkdir -p ${dir}`);
    }
  }
}

function parallelRule(
  code: string,
  summary: string,
  detect: (context: MakeRuleContext) => Iterable<RuleMatch>,
): Rule<MakeRuleContext> {
  return { code, category: "parallel-safety", severity: "warning", summary, check: detect };
}

const MAKE_RACE = parallelRule("MAKE_RACE", "same output written by several targets", outputConflicts);
const MAKE_MISSING_DEP = parallelRule("MAKE_MISSING_DEP", "missing prerequisite edges", missingDependencies);
const MAKE_RECURSIVE = parallelRule("MAKE_RECURSIVE", "recursive sub-make without ordering", recursiveMakes);
const MAKE_DIR_RACE = parallelRule("MAKE_DIR_RACE", "directory creation races", directoryRaces);

const MAKE_NOTPARALLEL: Rule<MakeRuleContext> = {
  code: "MAKE_NOTPARALLEL",
  category: "parallel-safety",
  severity: "info",
  summary: ".NOTPARALLEL advice when parallel issues exist",
  *check(context) {
    const first = context.targets[0];
    if (!first || hasTarget(context, ".NOTPARALLEL")) return;
    const others = [MAKE_RACE, MAKE_MISSING_DEP, MAKE_RECURSIVE, MAKE_DIR_RACE];
    if (!others.some((rule) => !isEmpty(rule.check(context)))) return;
    yield {
      span: first.span,
      message: "Parallel-safety issues found and .NOTPARALLEL is not set",
      suggestion: ".NOTPARALLEL:",
      target: first.id,
    };
  },
};

function isEmpty(matches: Iterable<RuleMatch>): boolean {
  for (const _ of matches) return false;
  return true;
}

// =============================================================================
// Reproducibility of recipes
// =============================================================================

const MAKE_TIMESTAMP = recipeRule(
  "MAKE_TIMESTAMP",
  "reproducibility",
  "timestamps in recipes",
  (command) => /(^|[\s;|&(`])date\b/.test(command) && !command.includes("SOURCE_DATE_EPOCH"),
  (entry) => `Recipe of ${subject(entry.rule)} captures the build time`,
  "Use SOURCE_DATE_EPOCH: date -u -d @$(SOURCE_DATE_EPOCH)",
);

const MAKE_RANDOM = recipeRule(
  "MAKE_RANDOM",
  "reproducibility",
  "random values in recipes",
  (command) => RANDOM_REFERENCE.test(command),
  (entry) => `Recipe of ${subject(entry.rule)} uses a random value`,
  "Use a fixed seed or a value derived from the inputs",
);

const MAKE_PID = recipeRule(
  "MAKE_PID",
  "reproducibility",
  "process ids in recipes",
  (command) => command.includes("$$$$"),
  (entry) => `Recipe of ${subject(entry.rule)} uses the shell's process id`,
  "Use a fixed name derived from $@",
);

const GIT_DATE = /git\s+log\b.*(%[acd]d|%[ac]t|--date)/;

const MAKE_NONDET_CMD: Rule<MakeRuleContext> = {
  code: "MAKE_NONDET_CMD",
  category: "reproducibility",
  severity: "warning",
  summary: "hostname, git log dates and mktemp",
  *check(context) {
    for (const variable of context.variables) {
      const hostname = /\$\(shell\s+hostname\b/.test(variable.value);
      if (!hostname && !GIT_DATE.test(variable.value)) continue;
      yield {
        span: variable.span,
        message: `Variable '${variable.name}' depends on ${hostname ? "the build host" : "commit dates"}`,
        suggestion: hostname ? `${variable.name} := build-host` : `${variable.name} := $(SOURCE_DATE_EPOCH)`,
        target: variable.id,
      };
    }
    for (const entry of context.recipes) {
      if (!/\bmktemp\b/.test(entry.command)) continue;
      yield recipeMatch(
        entry,
        `Recipe of ${subject(entry.rule)} creates a randomly named temporary file`,
        "Use a fixed path under the build directory",
      );
    }
  },
};

// =============================================================================
// Performance
// =============================================================================

function* simpleExpansion(context: MakeRuleContext): Generator<RuleMatch> {
  for (const variable of context.variables) {
    if (variable.flavor !== "recursive" || variable.value === "") continue;
    const shell = variable.value.includes("$(shell");
    const plain = !variable.value.includes("$(") && !variable.value.includes("${");
    if (!shell && !plain) continue;
    yield {
      span: variable.span,
      message: shell
        ? `Variable '${variable.name}' re-runs its $(shell ...) on every expansion`
        : `Variable '${variable.name}' is recursively expanded but references nothing`,
      suggestion: `${variable.name} := ${variable.value}`,
      target: variable.id,
    };
  }
}

function* combinableRecipes(context: MakeRuleContext): Generator<RuleMatch> {
  for (const rule of context.rules) {
    const lines = rule.recipe.filter((line) => !line.inline);
    const first = lines[0];
    if (!first) continue;
    const unchained = lines.length >= 3 && lines.every((line) => !line.text.includes("&&") && !line.text.includes(";"));
    const removals = lines.filter((line) => /^[@\-+]*rm\s/.test(line.text)).length >= 2;
    if (!unchained && !removals) continue;
    yield {
      span: first.span,
      message: `Recipe of ${subject(rule)} starts a shell for each of ${lines.length} lines`,
      suggestion: removals ? "rm -f file1 file2 file3" : "Join the commands with && in one line",
      target: rule.id,
    };
  }
}

function* patternCandidates(context: MakeRuleContext): Generator<RuleMatch> {
  const objects = context.targets.filter((target) =>
    target.name.endsWith(".o") && target.recipe.some((line) => /\s-c\b/.test(line.text))
  );
  const first = objects[0];
  if (objects.length < 3 || !first) return;
  yield {
    span: first.span,
    message: `${objects.length} object targets repeat the same compile recipe`,
    suggestion: "%.o: %.c\n\t$(CC) $(CFLAGS) -c $< -o $@",
    target: first.id,
  };
}

function performanceRule(
  code: string,
  summary: string,
  detect: (context: MakeRuleContext) => Iterable<RuleMatch>,
): Rule<MakeRuleContext> {
  return { code, category: "performance", severity: "info", summary, check: detect };
}

const MAKE_SIMPLE_EXPANSION = performanceRule("MAKE_SIMPLE_EXPANSION", "recursive variables that could be :=", simpleExpansion);
const MAKE_COMBINE_RECIPES = performanceRule("MAKE_COMBINE_RECIPES", "recipes with many small shells", combinableRecipes);
const MAKE_PATTERN_RULE = performanceRule("MAKE_PATTERN_RULE", "repeated object rules", patternCandidates);

const MAKE_SUFFIXES: Rule<MakeRuleContext> = performanceRule(
  "MAKE_SUFFIXES",
  ".SUFFIXES advice when performance issues exist",
  function* (context) {
    const first = context.rules[0] ?? context.variables[0];
    if (!first || hasTarget(context, ".SUFFIXES")) return;
    const others = [MAKE_SIMPLE_EXPANSION, MAKE_COMBINE_RECIPES, MAKE_PATTERN_RULE];
    if (!others.some((rule) => !isEmpty(rule.check(context)))) return;
    yield {
      span: first.span,
      message: "Built-in suffix rules are searched for every target",
      suggestion: ".SUFFIXES:",
      target: first.id,
    };
  },
);

// =============================================================================
// Error handling
// =============================================================================

function* unhandledCommands(context: MakeRuleContext): Generator<RuleMatch> {
  for (const entry of context.recipes) {
    const text = entry.line.text.trimStart();
    if (text.startsWith("-")) continue;
    if (!/^(mkdir|gcc|cp|mv)\b/.test(entry.command)) continue;
    if (entry.command.includes("||") || entry.command.includes("&&")) continue;
    yield recipeMatch(
      entry,
      `'${entry.command.split(/\s/)[0] ?? ""}' in ${subject(entry.rule)} has no error handling`,
      `${entry.command} || exit 1`,
    );
  }
}

function* silentFailures(context: MakeRuleContext): Generator<RuleMatch> {
  for (const entry of context.recipes) {
    const text = entry.line.text.trimStart();
    if (!text.startsWith("@") || /^@\s*echo\b/.test(text)) continue;
    yield recipeMatch(
      entry,
      `Recipe line in ${subject(entry.rule)} is silenced with @`,
      "Keep commands visible, or echo what runs before silencing it",
    );
  }
}

function* separateShells(context: MakeRuleContext): Generator<RuleMatch> {
  for (const rule of context.rules) {
    const changes = rule.recipe.filter((line) =>
      /(^|[@\-+\s])cd\s/.test(line.text) && !line.text.includes("&&") && !line.text.includes(";")
    );
    const first = changes[0];
    if (changes.length < 2 || !first) continue;
    yield {
      span: first.span,
      message: `'cd' in ${subject(rule)} does not carry over to the next recipe line`,
      suggestion: ".ONESHELL:",
      target: rule.id,
    };
  }
}

function* missingSetE(context: MakeRuleContext): Generator<RuleMatch> {
  for (const entry of context.recipes) {
    if (!entry.command.includes("bash -c") || entry.command.includes("set -e")) continue;
    yield recipeMatch(
      entry,
      `'bash -c' in ${subject(entry.rule)} continues after a failing command`,
      "bash -c 'set -e; ...'",
    );
  }
}

function* loopErrors(context: MakeRuleContext): Generator<RuleMatch> {
  for (const entry of context.recipes) {
    const command = entry.command;
    if (!command.includes("for ") || !command.includes("do ")) continue;
    if (command.includes("|| exit") || command.includes("|| return")) continue;
    yield recipeMatch(
      entry,
      `Loop in ${subject(entry.rule)} ignores failures of all but the last iteration`,
      "Add || exit 1 to the loop body",
    );
  }
}

function errorRule(
  code: string,
  summary: string,
  detect: (context: MakeRuleContext) => Iterable<RuleMatch>,
): Rule<MakeRuleContext> {
  return { code, category: "error-handling", severity: "warning", summary, check: detect };
}

const MAKE_NO_ERROR_HANDLING = errorRule("MAKE_NO_ERROR_HANDLING", "commands without error handling", unhandledCommands);
const MAKE_SILENT_FAILURE = errorRule("MAKE_SILENT_FAILURE", "@-silenced commands", silentFailures);
const MAKE_ONESHELL = errorRule("MAKE_ONESHELL", "cd across recipe lines", separateShells);
const MAKE_NO_SET_E = errorRule("MAKE_NO_SET_E", "bash -c without set -e", missingSetE);
const MAKE_LOOP_ERRORS = errorRule("MAKE_LOOP_ERRORS", "loops that hide failures", loopErrors);

const MAKE_DELETE_ON_ERROR: Rule<MakeRuleContext> = errorRule(
  "MAKE_DELETE_ON_ERROR",
  ".DELETE_ON_ERROR advice when error-handling issues exist",
  function* (context) {
    const first = context.rules[0];
    if (!first || hasTarget(context, ".DELETE_ON_ERROR")) return;
    const others = [MAKE_NO_ERROR_HANDLING, MAKE_SILENT_FAILURE, MAKE_ONESHELL, MAKE_NO_SET_E, MAKE_LOOP_ERRORS];
    if (!others.some((rule) => !isEmpty(rule.check(context)))) return;
    yield {
      span: first.span,
      message: "Targets may be left half-written when a recipe fails",
      suggestion: ".DELETE_ON_ERROR:",
      target: first.id,
    };
  },
);

// =============================================================================
// Portability
// =============================================================================

const MAKE_BASHISM = recipeRule(
  "MAKE_BASHISM",
  "portability",
  "bash-only syntax in recipes",
  (command) => command.includes("[[") || command.includes("$(("),
  (entry) => `Recipe of ${subject(entry.rule)} uses bash-only syntax`,
  "Use [ ] and expr, or set SHELL := /bin/bash",
);

const MAKE_PLATFORM = recipeRule(
  "MAKE_PLATFORM",
  "portability",
  "platform-specific commands",
  (command) => /\buname\b|\/proc\/|\bifconfig\b/.test(command),
  (entry) => `Recipe of ${subject(entry.rule)} depends on the build platform`,
  "Detect the platform once in a variable and branch on it",
);

const MAKE_SHELL_SPECIFIC = recipeRule(
  "MAKE_SHELL_SPECIFIC",
  "portability",
  "shell-specific builtins",
  (command) => /(^|[\s;&|])source\s/.test(command) || /\bdeclare\b/.test(command),
  (entry) => `Recipe of ${subject(entry.rule)} uses a shell-specific builtin`,
  "Use . instead of source and plain assignments instead of declare",
);

const MAKE_NONPORTABLE_FLAG = recipeRule(
  "MAKE_NONPORTABLE_FLAG",
  "portability",
  "GNU-only command flags",
  (command) => command.includes("--preserve") || command.includes("--color") || /\bsed\s+-i\b/.test(command),
  (entry) => `Recipe of ${subject(entry.rule)} uses a flag that is not portable`,
  "Use POSIX flags (cp -p, sed to a temporary file)",
);

const MAKE_NONPORTABLE_ECHO = recipeRule(
  "MAKE_NONPORTABLE_ECHO",
  "portability",
  "echo -e / echo -n",
  (command) => /\becho\s+-[en]\b/.test(command),
  (entry) => `Recipe of ${subject(entry.rule)} uses echo flags that differ between shells`,
  "Use printf",
);

// =============================================================================
// Catalog
// =============================================================================

export const MAKE_RULES: RuleCatalog<MakeRuleContext> = catalogOf([
  NO_WILDCARD,
  NO_UNORDERED_FIND,
  NO_TIMESTAMPS,
  NO_RANDOM,
  AUTO_PHONY,
  MAKE_RACE,
  MAKE_MISSING_DEP,
  MAKE_RECURSIVE,
  MAKE_DIR_RACE,
  MAKE_NOTPARALLEL,
  MAKE_TIMESTAMP,
  MAKE_RANDOM,
  MAKE_PID,
  MAKE_NONDET_CMD,
  MAKE_SIMPLE_EXPANSION,
  MAKE_COMBINE_RECIPES,
  MAKE_PATTERN_RULE,
  MAKE_SUFFIXES,
  MAKE_NO_ERROR_HANDLING,
  MAKE_SILENT_FAILURE,
  MAKE_ONESHELL,
  MAKE_NO_SET_E,
  MAKE_LOOP_ERRORS,
  MAKE_DELETE_ON_ERROR,
  MAKE_BASHISM,
  MAKE_PLATFORM,
  MAKE_SHELL_SPECIFIC,
  MAKE_NONPORTABLE_FLAG,
  MAKE_NONPORTABLE_ECHO,
]);
