/**
 * Shell rule catalog
 *
 * Detection is structural and local: a rule looks at one node (and, for
 * variables assigned from a flagged value, the statements after the
 * assignment in the same list). No data flow across functions or files.
 */

import type * as AST from "../../shell/ast.ts";
import { type ShellCapabilities, getCapabilities, Shell } from "../../shell/shell-dialect.ts";
import { collect, statementLists, walk } from "../../shell/walk.ts";
import { commandName, hasUnquotedExpansion, parameterExpansions, staticText } from "../../shell/words.ts";
import { catalogOf, type Rule, type RuleCatalog, type RuleMatch } from "../rule.ts";

export interface ShellRuleContext {
  program: AST.Program;
  shell: Shell;
  capabilities: ShellCapabilities;
  /** Every simple command, substitutions included, in source order */
  commands: AST.Command[];
}

export function createShellContext(program: AST.Program): ShellRuleContext {
  const shell = program.metadata.dialect;
  return {
    program,
    shell,
    capabilities: getCapabilities(shell),
    commands: collect(program, "Command"),
  };
}

// =============================================================================
// Helpers
// =============================================================================

interface NameUse {
  name: string;
  node: AST.ParameterExpansion | AST.VariableReference;
}

/** Parameter expansions and arithmetic variable references under `root` */
function nameUses(root: AST.Node): NameUse[] {
  const uses: NameUse[] = [];
  walk(root, (node) => {
    if (node.type === "ParameterExpansion") uses.push({ name: node.parameter, node });
    else if (node.type === "VariableReference") uses.push({ name: node.name, node });
  });
  return uses;
}

function usesOf(context: ShellRuleContext, names: ReadonlySet<string>): NameUse[] {
  return nameUses(context.program).filter((use) => names.has(use.name));
}

function commandsNamed(context: ShellRuleContext, ...names: string[]): Array<{ command: AST.Command; args: Array<string | null> }> {
  const wanted = new Set(names);
  const found: Array<{ command: AST.Command; args: Array<string | null> }> = [];
  for (const command of context.commands) {
    const name = commandName(command);
    if (name !== null && wanted.has(name)) {
      found.push({ command, args: command.args.map(staticText) });
    }
  }
  return found;
}

/** Short options of a command, clusters expanded (`-sfn` gives s, f, n) */
function shortOptions(args: ReadonlyArray<string | null>): Set<string> {
  const options = new Set<string>();
  for (const arg of args) {
    if (arg === "--") break;
    if (arg === null || !/^-[A-Za-z]/.test(arg)) continue;
    for (const c of arg.slice(1)) options.add(c);
  }
  return options;
}

function hasLongOption(args: ReadonlyArray<string | null>, option: string): boolean {
  return args.some((arg) => arg === option || arg?.startsWith(`${option}=`));
}

const SHELLS = new Set(["sh", "bash", "dash", "zsh", "ksh", "ash"]);

function pipesIntoShell(pipeline: AST.Pipeline): { download: AST.Command; shell: AST.Command } | null {
  let download: AST.Command | null = null;
  for (const stage of pipeline.commands) {
    if (stage.type !== "Command") continue;
    const name = commandName(stage);
    if (name === "curl" || name === "wget") {
      download = stage;
      continue;
    }
    if (!download || name === null) continue;
    const first = stage.args[0];
    const runner = name === "sudo" ? (first ? staticText(first) : null) : name;
    if (runner !== null && SHELLS.has(runner)) return { download, shell: stage };
  }
  return null;
}

// =============================================================================
// Determinism
// =============================================================================

/**
 * Uses of variables that hold a flagged value: assigned, earlier in the same
 * statement list, from a value containing one of `matches` or another such
 * variable.
 */
function* derivedUses(
  context: ShellRuleContext,
  matches: readonly RuleMatch[],
  source: string,
  suggestion: string,
): Generator<RuleMatch> {
  const sources = new Set(matches.map((match) => match.target));
  if (sources.size === 0) return;
  for (const list of statementLists(context.program)) {
    const derived = new Set<string>();
    for (const statement of list) {
      const uses = nameUses(statement);
      for (const use of uses) {
        if (!derived.has(use.name)) continue;
        yield {
          span: use.node.span,
          message: `Variable '${use.name}' holds a value derived from ${source}`,
          suggestion,
          target: use.node.id,
        };
      }
      if (statement.type !== "VariableAssignment") continue;
      let flagged = uses.some((use) => derived.has(use.name));
      walk(statement, (node) => {
        if (sources.has(node.id)) flagged = true;
        return !flagged;
      });
      if (flagged) derived.add(statement.name);
    }
  }
}

const RANDOM_SUGGESTION = 'Derive the value from an input or a fixed seed, e.g. SEED="${SEED:-42}"';

const DET001: Rule<ShellRuleContext> = {
  code: "DET001",
  category: "determinism",
  severity: "warning",
  summary: "$RANDOM and values derived from it",
  *check(context) {
    const matches: RuleMatch[] = usesOf(context, new Set(["RANDOM"])).map(({ node }) => ({
      span: node.span,
      message: "Non-deterministic $RANDOM",
      suggestion: RANDOM_SUGGESTION,
      target: node.id,
    }));
    yield* matches;
    yield* derivedUses(context, matches, "$RANDOM", RANDOM_SUGGESTION);
  },
};

const TIME_VARIABLES = new Set(["SECONDS", "EPOCHSECONDS", "EPOCHREALTIME"]);
const TIME_SUGGESTION = "Use SOURCE_DATE_EPOCH or a value passed in by the caller";

const DET002: Rule<ShellRuleContext> = {
  code: "DET002",
  category: "determinism",
  severity: "warning",
  summary: "timestamps from date or $SECONDS, and values derived from them",
  *check(context) {
    const matches: RuleMatch[] = [];
    for (const { command, args } of commandsNamed(context, "date")) {
      const fixed = args.some((arg) =>
        arg !== null && (/^-[a-zA-Z]*[dr]/.test(arg) || arg.startsWith("--date") || arg.startsWith("--reference"))
      );
      if (fixed) continue;
      matches.push({
        span: command.span,
        message: "Non-deterministic timestamp from 'date'",
        suggestion: 'Use a fixed epoch: date -d "@${SOURCE_DATE_EPOCH}"',
        target: command.id,
      });
    }
    for (const { name, node } of usesOf(context, TIME_VARIABLES)) {
      matches.push({
        span: node.span,
        message: `Non-deterministic timestamp from $${name}`,
        suggestion: TIME_SUGGESTION,
        target: node.id,
      });
    }
    yield* matches;
    yield* derivedUses(context, matches, "a timestamp", TIME_SUGGESTION);
  },
};

const PID_SUGGESTION = "Use a fixed name or an identifier passed in by the caller";

const DET003: Rule<ShellRuleContext> = {
  code: "DET003",
  category: "determinism",
  severity: "warning",
  summary: "process ids and values derived from them",
  *check(context) {
    const matches: RuleMatch[] = usesOf(context, new Set(["$", "BASHPID", "PPID"])).map(({ name, node }) => ({
      span: node.span,
      message: `Non-deterministic process id $${name}`,
      suggestion: PID_SUGGESTION,
      target: node.id,
    }));
    yield* matches;
    yield* derivedUses(context, matches, "a process id", PID_SUGGESTION);
  },
};

const HOST_SUGGESTION = "Pass the host name in as a parameter";

const DET004: Rule<ShellRuleContext> = {
  code: "DET004",
  category: "determinism",
  severity: "warning",
  summary: "host identity and values derived from it",
  *check(context) {
    const matches: RuleMatch[] = [];
    for (const { command } of commandsNamed(context, "hostname")) {
      matches.push({
        span: command.span,
        message: "Host-dependent value from 'hostname'",
        suggestion: HOST_SUGGESTION,
        target: command.id,
      });
    }
    for (const { node } of usesOf(context, new Set(["HOSTNAME"]))) {
      matches.push({
        span: node.span,
        message: "Host-dependent value from $HOSTNAME",
        suggestion: HOST_SUGGESTION,
        target: node.id,
      });
    }
    yield* matches;
    yield* derivedUses(context, matches, "the host name", HOST_SUGGESTION);
  },
};

const TEMP_SUGGESTION = "Use a fixed path under a directory the script owns and remove it with trap";

const DET005: Rule<ShellRuleContext> = {
  code: "DET005",
  category: "determinism",
  severity: "warning",
  summary: "mktemp and paths derived from it",
  *check(context) {
    const matches: RuleMatch[] = commandsNamed(context, "mktemp").map(({ command }) => ({
      span: command.span,
      message: "Non-deterministic temporary path from 'mktemp'",
      suggestion: TEMP_SUGGESTION,
      target: command.id,
    }));
    yield* matches;
    yield* derivedUses(context, matches, "mktemp", TEMP_SUGGESTION);
  },
};

const DET006: Rule<ShellRuleContext> = {
  code: "DET006",
  category: "determinism",
  severity: "warning",
  summary: "unsorted find/ls output",
  *check(context) {
    for (const substitution of collect(context.program, "CommandSubstitution")) {
      const [only] = substitution.body;
      if (substitution.body.length !== 1 || only?.type !== "Command") continue;
      const name = commandName(only);
      if (name !== "find" && name !== "ls") continue;
      yield {
        span: substitution.span,
        message: `Output order of '${name}' depends on the filesystem`,
        suggestion: `Pipe through sort: $(${name} ... | sort)`,
        target: substitution.id,
      };
    }
  },
};

// =============================================================================
// Idempotency
// =============================================================================

const IDEM001: Rule<ShellRuleContext> = {
  code: "IDEM001",
  category: "idempotency",
  severity: "warning",
  summary: "mkdir without -p",
  *check(context) {
    for (const { command, args } of commandsNamed(context, "mkdir")) {
      if (shortOptions(args).has("p") || hasLongOption(args, "--parents")) continue;
      yield {
        span: command.span,
        message: "'mkdir' fails if the directory already exists",
        suggestion: "Use mkdir -p",
        target: command.id,
      };
    }
  },
};

const IDEM002: Rule<ShellRuleContext> = {
  code: "IDEM002",
  category: "idempotency",
  severity: "warning",
  summary: "rm without -f",
  *check(context) {
    for (const { command, args } of commandsNamed(context, "rm")) {
      if (shortOptions(args).has("f") || hasLongOption(args, "--force")) continue;
      yield {
        span: command.span,
        message: "'rm' fails if the file is already gone",
        suggestion: "Use rm -f",
        target: command.id,
      };
    }
  },
};

const IDEM003: Rule<ShellRuleContext> = {
  code: "IDEM003",
  category: "idempotency",
  severity: "warning",
  summary: "ln -s without -f",
  *check(context) {
    for (const { command, args } of commandsNamed(context, "ln")) {
      const options = shortOptions(args);
      if (!options.has("s") && !hasLongOption(args, "--symbolic")) continue;
      if (options.has("f") || hasLongOption(args, "--force")) continue;
      yield {
        span: command.span,
        message: "'ln -s' fails if the link already exists",
        suggestion: "Use ln -sf",
        target: command.id,
      };
    }
  },
};

const DEVICE_PATH = /^\/dev\//;

const IDEM004: Rule<ShellRuleContext> = {
  code: "IDEM004",
  category: "idempotency",
  severity: "info",
  summary: "appending to files",
  *check(context) {
    for (const redirect of collect(context.program, "Redirection")) {
      if (redirect.operator !== ">>" && redirect.operator !== "&>>") continue;
      const target = staticText(redirect.target);
      if (target !== null && DEVICE_PATH.test(target)) continue;
      yield {
        span: redirect.span,
        message: `Appending to '${target ?? "file"}' adds the content again on every run`,
        suggestion: "Write the whole file with >, or append only when the line is missing (grep -qxF ... || echo ... >>)",
        target: redirect.id,
      };
    }
  },
};

const IDEM005: Rule<ShellRuleContext> = {
  code: "IDEM005",
  category: "idempotency",
  severity: "warning",
  summary: "commands that fail on re-run",
  *check(context) {
    for (const { command, args } of commandsNamed(context, "git")) {
      if (args[0] !== "clone") continue;
      yield {
        span: command.span,
        message: "'git clone' fails if the destination exists",
        suggestion: "Guard it: [ -d dir ] || git clone ...",
        target: command.id,
      };
    }
    for (const { command, args } of commandsNamed(context, "useradd", "groupadd")) {
      const tool = commandName(command) ?? "";
      const name = args[args.length - 1] ?? "name";
      const lookup = tool === "useradd" ? `id -u ${name}` : `getent group ${name}`;
      yield {
        span: command.span,
        message: `'${tool}' fails if '${name}' already exists`,
        suggestion: `Guard it: ${lookup} >/dev/null 2>&1 || ${tool} ...`,
        target: command.id,
      };
    }
  },
};

// =============================================================================
// Security
// =============================================================================

const SEC001: Rule<ShellRuleContext> = {
  code: "SEC001",
  category: "security",
  severity: "error",
  summary: "eval of expanded input",
  *check(context) {
    for (const { command } of commandsNamed(context, "eval")) {
      const expands = command.args.some((arg) =>
        parameterExpansions(arg).length > 0 || arg.parts.some((part) => part.type === "CommandSubstitution") ||
        arg.parts.some((part) => part.type === "DoubleQuoted" && part.parts.some((p) => p.type === "CommandSubstitution"))
      );
      if (!expands) continue;
      yield {
        span: command.span,
        message: "'eval' executes expanded input as code",
        suggestion: "Call the command directly, or validate the input against a fixed list",
        target: command.id,
      };
    }
  },
};

const SEC002: Rule<ShellRuleContext> = {
  code: "SEC002",
  category: "security",
  severity: "error",
  summary: "downloads piped to a shell",
  *check(context) {
    for (const pipeline of collect(context.program, "Pipeline")) {
      const found = pipesIntoShell(pipeline);
      if (!found) continue;
      yield {
        span: pipeline.span,
        message: `Downloaded content from '${commandName(found.download) ?? ""}' is executed by a shell`,
        suggestion: "Download to a file, verify its checksum, then run it",
        target: pipeline.id,
      };
    }
  },
};

const DESTRUCTIVE = ["rm", "rmdir", "mv", "cp", "ln", "chmod", "chown", "chgrp"];

const SEC003: Rule<ShellRuleContext> = {
  code: "SEC003",
  category: "security",
  severity: "warning",
  summary: "unquoted expansions in destructive commands",
  *check(context) {
    for (const { command } of commandsNamed(context, ...DESTRUCTIVE)) {
      for (const arg of command.args) {
        if (!hasUnquotedExpansion(arg)) continue;
        yield {
          span: arg.span,
          message: `Unquoted expansion in '${commandName(command) ?? ""}' argument is subject to word splitting and globbing`,
          suggestion: "Quote the expansion: \"$var\"",
          target: arg.id,
        };
      }
    }
  },
};

const WORLD_WRITABLE_NUMERIC = /^[0-7]?[0-7]{2}[2367]$/;
const WORLD_WRITABLE_SYMBOLIC = /(^|,)[ugo]*[ao][ugo]*[+=][rwxXst]*w/;

const SEC004: Rule<ShellRuleContext> = {
  code: "SEC004",
  category: "security",
  severity: "warning",
  summary: "world-writable permissions",
  *check(context) {
    for (const { command, args } of commandsNamed(context, "chmod")) {
      const mode = args.find((arg) => arg !== null && !arg.startsWith("-"));
      if (mode === undefined || mode === null) continue;
      if (!WORLD_WRITABLE_NUMERIC.test(mode) && !WORLD_WRITABLE_SYMBOLIC.test(mode)) continue;
      yield {
        span: command.span,
        message: `'chmod ${mode}' makes files writable by every user`,
        suggestion: "Grant the narrowest mode that works, e.g. 755 or 644",
        target: command.id,
      };
    }
  },
};

// =============================================================================
// Portability
// =============================================================================

function dialectName(shell: Shell): string {
  return shell === Shell.Sh ? "POSIX sh" : shell;
}

const PORT001: Rule<ShellRuleContext> = {
  code: "PORT001",
  category: "portability",
  severity: "warning",
  summary: "[[ ]] tests",
  *check(context) {
    if (context.capabilities.hasDoubleSquareBracket) return;
    for (const test of collect(context.program, "TestCommand")) {
      yield {
        span: test.span,
        message: `[[ ]] is not available in ${dialectName(context.shell)}`,
        suggestion: "Use [ ] with quoted operands",
        target: test.id,
      };
    }
  },
};

const PORT002: Rule<ShellRuleContext> = {
  code: "PORT002",
  category: "portability",
  severity: "warning",
  summary: "the function keyword",
  *check(context) {
    if (context.capabilities.hasFunctionKeyword) return;
    for (const fn of collect(context.program, "FunctionDeclaration")) {
      if (!fn.keyword) continue;
      yield {
        span: fn.span,
        message: `The 'function' keyword is not available in ${dialectName(context.shell)}`,
        suggestion: `Declare it as ${fn.name}() { ...; }`,
        target: fn.id,
      };
    }
  },
};

const PORT003: Rule<ShellRuleContext> = {
  code: "PORT003",
  category: "portability",
  severity: "warning",
  summary: "source",
  *check(context) {
    if (context.capabilities.hasSource) return;
    for (const { command } of commandsNamed(context, "source")) {
      yield {
        span: command.span,
        message: `'source' is not available in ${dialectName(context.shell)}`,
        suggestion: "Use . file",
        target: command.id,
      };
    }
  },
};

const PORT004: Rule<ShellRuleContext> = {
  code: "PORT004",
  category: "portability",
  severity: "warning",
  summary: "echo -e / echo -n",
  *check(context) {
    if (context.capabilities.hasEchoFlags) return;
    for (const { command, args } of commandsNamed(context, "echo")) {
      const flag = args[0];
      if (flag === undefined || flag === null || !/^-[neE]+$/.test(flag)) continue;
      yield {
        span: command.span,
        message: `'echo ${flag}' behaves differently across shells`,
        suggestion: "Use printf",
        target: command.id,
      };
    }
  },
};

const PORT005: Rule<ShellRuleContext> = {
  code: "PORT005",
  category: "portability",
  severity: "warning",
  summary: "arrays",
  *check(context) {
    if (context.capabilities.hasArrays) return;
    const message = `Arrays are not available in ${dialectName(context.shell)}`;
    const suggestion = "Use positional parameters (set -- a b c) or a delimited string";

    for (const assignment of collect(context.program, "VariableAssignment")) {
      if (assignment.value.type === "ArrayLiteral" || assignment.index !== null) {
        yield { span: assignment.span, message, suggestion, target: assignment.id };
      }
    }
    for (const expansion of collect(context.program, "ParameterExpansion")) {
      if (expansion.subscript !== null) {
        yield { span: expansion.span, message, suggestion, target: expansion.id };
      }
    }
    for (const { command, args } of commandsNamed(context, "declare", "typeset", "local", "readarray", "mapfile")) {
      const name = commandName(command);
      const options = shortOptions(args);
      if (name === "readarray" || name === "mapfile" || options.has("a") || options.has("A")) {
        yield { span: command.span, message, suggestion, target: command.id };
      }
    }
  },
};

const PORT006: Rule<ShellRuleContext> = {
  code: "PORT006",
  category: "portability",
  severity: "info",
  summary: "select menus",
  *check(context) {
    if (context.capabilities.hasSelect) return;
    for (const select of collect(context.program, "SelectStatement")) {
      yield {
        span: select.span,
        message: `'select' is not available in ${dialectName(context.shell)}; it is rendered as a while/read menu loop`,
        suggestion: "Check the generated menu loop reads input the way the script expects",
        target: select.id,
      };
    }
  },
};

const PORT007: Rule<ShellRuleContext> = {
  code: "PORT007",
  category: "portability",
  severity: "warning",
  summary: "process substitution",
  *check(context) {
    if (context.capabilities.hasProcessSubstitution) return;
    for (const substitution of collect(context.program, "ProcessSubstitution")) {
      yield {
        span: substitution.span,
        message: `Process substitution is not available in ${dialectName(context.shell)}`,
        suggestion: "Write to a temporary file or use a pipe",
        target: substitution.id,
      };
    }
  },
};

const PORT008: Rule<ShellRuleContext> = {
  code: "PORT008",
  category: "portability",
  severity: "warning",
  summary: "$'...' quoting",
  *check(context) {
    if (context.capabilities.hasAnsiCQuoting) return;
    for (const quoted of collect(context.program, "AnsiCQuoted")) {
      yield {
        span: quoted.span,
        message: `$'...' quoting is not available in ${dialectName(context.shell)}`,
        suggestion: "Use printf to produce escape sequences",
        target: quoted.id,
      };
    }
  },
};

// =============================================================================
// Side effects
// =============================================================================

const STATE_CHANGING = [
  "mkdir",
  "rm",
  "rmdir",
  "mv",
  "cp",
  "ln",
  "touch",
  "chmod",
  "chown",
  "chgrp",
  "install",
  "tee",
  "truncate",
  "useradd",
  "groupadd",
  "userdel",
  "usermod",
];

const WRITE_OPERATORS: ReadonlySet<AST.RedirectionOperator> = new Set([">", ">>", ">|", "&>", "&>>"]);

const SIDE001: Rule<ShellRuleContext> = {
  code: "SIDE001",
  category: "idempotency",
  severity: "info",
  summary: "state-changing commands",
  *check(context) {
    for (const { command } of commandsNamed(context, ...STATE_CHANGING)) {
      yield {
        span: command.span,
        message: `Side effect: '${commandName(command) ?? ""}' changes system state`,
        target: command.id,
      };
    }
    for (const redirect of collect(context.program, "Redirection")) {
      if (!WRITE_OPERATORS.has(redirect.operator)) continue;
      const target = staticText(redirect.target);
      if (target !== null && DEVICE_PATH.test(target)) continue;
      yield {
        span: redirect.span,
        message: `Side effect: writes to '${target ?? "file"}'`,
        target: redirect.id,
      };
    }
  },
};

// =============================================================================
// Catalog
// =============================================================================

export const SHELL_RULES: RuleCatalog<ShellRuleContext> = catalogOf([
  DET001,
  DET002,
  DET003,
  DET004,
  DET005,
  DET006,
  IDEM001,
  IDEM002,
  IDEM003,
  IDEM004,
  IDEM005,
  SEC001,
  SEC002,
  SEC003,
  SEC004,
  PORT001,
  PORT002,
  PORT003,
  PORT004,
  PORT005,
  PORT006,
  PORT007,
  PORT008,
  SIDE001,
]);

/** Rules that only run when side effects are tracked */
export const SIDE_EFFECT_RULES: ReadonlySet<string> = new Set(["SIDE001"]);
