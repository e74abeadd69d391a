/**
 * Dockerfile rule catalog
 */

import * as AST from "../../dockerfile/ast.ts";
import { catalogOf, type Rule, type RuleCatalog } from "../rule.ts";

export interface DockerRuleContext {
  dockerfile: AST.Dockerfile;
  instructions: AST.Instruction[];
}

export function createDockerContext(dockerfile: AST.Dockerfile): DockerRuleContext {
  return { dockerfile, instructions: AST.instructions(dockerfile) };
}

// =============================================================================
// Base images
// =============================================================================

export interface ImageReference {
  /** Registry host, when the reference names one */
  registry: string | null;
  repository: string;
  tag: string | null;
  digest: string | null;
  /** `AS name` stage alias */
  alias: string | null;
}

/**
 * Split a FROM argument into its parts. A first path segment containing a
 * dot or a colon, or equal to `localhost`, is a registry host.
 */
export function parseImageReference(argument: string): ImageReference {
  const [image = "", ...rest] = argument.trim().split(/\s+/);
  const aliasIndex = rest.findIndex((word) => word.toUpperCase() === "AS");
  const alias = aliasIndex === -1 ? null : rest[aliasIndex + 1] ?? null;

  let remainder = image;
  let digest: string | null = null;
  const at = remainder.indexOf("@");
  if (at !== -1) {
    digest = remainder.slice(at + 1);
    remainder = remainder.slice(0, at);
  }

  let registry: string | null = null;
  const slash = remainder.indexOf("/");
  if (slash !== -1) {
    const host = remainder.slice(0, slash);
    if (host.includes(".") || host.includes(":") || host === "localhost") {
      registry = host;
      remainder = remainder.slice(slash + 1);
    }
  }

  let tag: string | null = null;
  const colon = remainder.lastIndexOf(":");
  if (colon !== -1) {
    tag = remainder.slice(colon + 1);
    remainder = remainder.slice(0, colon);
  }

  return { registry, repository: remainder, tag, digest, alias };
}

/** Pinned tags suggested for common unpinned base images */
export const PINNED_TAGS: Readonly<Record<string, string>> = {
  ubuntu: "22.04",
  debian: "12-slim",
  alpine: "3.19",
  node: "20-alpine",
  python: "3.11-slim",
  rust: "1.75-alpine",
  nginx: "1.25-alpine",
  postgres: "16-alpine",
  redis: "7-alpine",
};

function pinnedReference(reference: ImageReference): string {
  const name = reference.repository.split("/").pop() ?? reference.repository;
  const tag = PINNED_TAGS[name] ?? "<version>";
  const image = `${reference.registry ? `${reference.registry}/` : ""}${reference.repository}:${tag}`;
  return reference.alias ? `${image} AS ${reference.alias}` : image;
}

/** Names given to earlier stages with `FROM ... AS name` */
function stageNames(context: DockerRuleContext): Set<string> {
  const names = new Set<string>();
  for (const from of context.instructions) {
    if (from.keyword !== "FROM") continue;
    const alias = parseImageReference(from.arguments).alias;
    if (alias) names.add(alias.toLowerCase());
  }
  return names;
}

// =============================================================================
// RUN commands
// =============================================================================

export const APT_INSTALL = /\bapt-get\s+install\b|\bapt\s+install\b/;
export const APK_ADD = /\bapk\s+add\b/;
export const APT_CLEANUP = "rm -rf /var/lib/apt/lists/*";
export const APK_CLEANUP = "rm -rf /var/cache/apk/*";

export function cacheCleanup(command: string): string | null {
  if (APT_INSTALL.test(command)) {
    return command.includes("/var/lib/apt/lists") ? null : APT_CLEANUP;
  }
  if (APK_ADD.test(command)) {
    if (command.includes("--no-cache") || command.includes("/var/cache/apk")) return null;
    return APK_CLEANUP;
  }
  return null;
}

const ARCHIVE = /\.(tar|tar\.gz|tgz|tar\.bz2|tar\.xz|tar\.Z)$/;

/** ADD sources that COPY cannot replace: URLs and local archives (auto-extracted) */
export function needsAdd(argument: string): boolean {
  const words = argument.trim().split(/\s+/);
  const sources = words.slice(0, -1);
  if (sources.length === 0 || argument.trim().startsWith("[")) return true;
  return sources.some((source) => /^https?:\/\//.test(source) || ARCHIVE.test(source));
}

// =============================================================================
// Rules
// =============================================================================

const DOCKER001: Rule<DockerRuleContext> = {
  code: "DOCKER001",
  category: "security",
  severity: "warning",
  summary: "container runs as root",
  *check(context) {
    const lastFrom = [...context.instructions].reverse().find((i) => i.keyword === "FROM");
    if (!lastFrom) return;
    const finalStage = context.instructions.slice(context.instructions.indexOf(lastFrom));
    if (parseImageReference(lastFrom.arguments).repository === "scratch") return;
    if (finalStage.some((i) => i.keyword === "USER")) return;
    const entry = finalStage.find((i) => i.keyword === "CMD" || i.keyword === "ENTRYPOINT");
    if (!entry) return;
    yield {
      span: entry.span,
      message: `${entry.keyword} runs as root: no USER instruction in the final stage`,
      suggestion: "RUN groupadd -r appuser && useradd -r -g appuser appuser\nUSER appuser",
      target: entry.id,
    };
  },
};

const DOCKER002: Rule<DockerRuleContext> = {
  code: "DOCKER002",
  category: "reproducibility",
  severity: "warning",
  summary: "unpinned base images",
  *check(context) {
    const stages = stageNames(context);
    for (const from of context.instructions) {
      if (from.keyword !== "FROM") continue;
      const reference = parseImageReference(from.arguments);
      if (reference.digest !== null || reference.repository === "scratch") continue;
      if (reference.repository.startsWith("$") || stages.has(reference.repository.toLowerCase())) continue;
      if (reference.tag !== null && reference.tag !== "latest") continue;
      yield {
        span: from.span,
        message: reference.tag === "latest"
          ? `Base image '${reference.repository}' uses the moving 'latest' tag`
          : `Base image '${reference.repository}' has no version tag`,
        suggestion: `FROM ${pinnedReference(reference)}`,
        target: from.id,
      };
    }
  },
};

const DOCKER003: Rule<DockerRuleContext> = {
  code: "DOCKER003",
  category: "performance",
  severity: "warning",
  summary: "package manager caches left in the image",
  *check(context) {
    for (const run of context.instructions) {
      if (run.keyword !== "RUN") continue;
      const cleanup = cacheCleanup(run.arguments);
      if (cleanup === null) continue;
      yield {
        span: run.span,
        message: "Package manager cache is left in the image layer",
        suggestion: `Append && ${cleanup}`,
        target: run.id,
      };
    }
  },
};

const DOCKER004: Rule<DockerRuleContext> = {
  code: "DOCKER004",
  category: "security",
  severity: "error",
  summary: "downloads piped to a shell",
  *check(context) {
    for (const run of context.instructions) {
      if (run.keyword !== "RUN") continue;
      if (!/\b(curl|wget)\b[^|]*\|\s*(sudo\s+)?(sh|bash|dash|zsh|ash)\b/.test(run.arguments)) continue;
      yield {
        span: run.span,
        message: "Downloaded content is executed by a shell",
        suggestion: "Download to a file, verify its checksum, then run it",
        target: run.id,
      };
    }
  },
};

const DOCKER005: Rule<DockerRuleContext> = {
  code: "DOCKER005",
  category: "reproducibility",
  severity: "info",
  summary: "apt-get install without --no-install-recommends",
  *check(context) {
    for (const run of context.instructions) {
      if (run.keyword !== "RUN") continue;
      if (!/\bapt-get\s+install\b/.test(run.arguments) || run.arguments.includes("--no-install-recommends")) continue;
      yield {
        span: run.span,
        message: "'apt-get install' pulls in recommended packages",
        suggestion: "apt-get install -y --no-install-recommends ...",
        target: run.id,
      };
    }
  },
};

const DOCKER006: Rule<DockerRuleContext> = {
  code: "DOCKER006",
  category: "security",
  severity: "info",
  summary: "ADD of a local file",
  *check(context) {
    for (const add of context.instructions) {
      if (add.keyword !== "ADD" || needsAdd(add.arguments)) continue;
      yield {
        span: add.span,
        message: "ADD of a local file; COPY does the same without URL fetching or extraction",
        suggestion: `COPY ${add.arguments}`,
        target: add.id,
      };
    }
  },
};

export const DOCKER_RULES: RuleCatalog<DockerRuleContext> = catalogOf([
  DOCKER001,
  DOCKER002,
  DOCKER003,
  DOCKER004,
  DOCKER005,
  DOCKER006,
]);
