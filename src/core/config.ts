/**
 * Purification options
 *
 * Options come from:
 * 1. Built-in defaults (STANDARD_PRESET)
 * 2. A preset chosen by the caller
 * 3. Caller overrides, in either snake_case or camelCase
 *
 * Later values override earlier ones. Category flags merge key by key.
 */

import { z } from "zod";
import { configError } from "./errors.ts";
import { createLogger } from "./logger.ts";
import { ISSUE_CATEGORIES, type IssueCategory } from "./types.ts";

const log = createLogger("config");

export type CategoryFlags = Record<IssueCategory, boolean>;

export interface PurifyOptions {
  /** Enables the idempotency rules (mkdir -p, rm -f, ln -sf, ...) */
  strictIdempotency: boolean;
  /** Enables the determinism rules ($RANDOM, timestamps, unordered listings, ...) */
  removeNonDeterministic: boolean;
  /** Records every state-changing command as an informational issue */
  trackSideEffects: boolean;
  /** Runs the gradual type checker over `# @type` annotations */
  typeCheck: boolean;
  /** Emits runtime guards after annotated assignments (implies typeCheck) */
  emitGuards: boolean;
  /** Keeps blank lines, continuations and long lines exactly as parsed */
  preserveFormatting: boolean;
  /** Wraps rendered lines longer than this with backslash continuations */
  maxLineLength?: number;
  skipBlankLineRemoval: boolean;
  skipConsolidation: boolean;
  categories: CategoryFlags;
}

/** Formatting subset consumed by the code generators. */
export interface FormatOptions {
  preserveFormatting: boolean;
  maxLineLength?: number;
  skipBlankLineRemoval: boolean;
  skipConsolidation: boolean;
}

function allCategories(enabled: boolean): CategoryFlags {
  return {
    "determinism": enabled,
    "idempotency": enabled,
    "security": enabled,
    "portability": enabled,
    "parallel-safety": enabled,
    "performance": enabled,
    "error-handling": enabled,
    "reproducibility": enabled,
  };
}

// ============================================================================
// Presets
// ============================================================================

/**
 * Standard preset - every detection category on, formatting normalized
 */
export const STANDARD_PRESET: PurifyOptions = {
  strictIdempotency: true,
  removeNonDeterministic: true,
  trackSideEffects: true,
  typeCheck: false,
  emitGuards: false,
  preserveFormatting: false,
  skipBlankLineRemoval: false,
  skipConsolidation: false,
  categories: allCategories(true),
};

/**
 * Strict preset - standard plus type checking with runtime guards
 */
export const STRICT_PRESET: PurifyOptions = {
  ...STANDARD_PRESET,
  typeCheck: true,
  emitGuards: true,
  categories: allCategories(true),
};

/**
 * Lenient preset - only the rules whose fixes are mechanical, source layout kept
 */
export const LENIENT_PRESET: PurifyOptions = {
  ...STANDARD_PRESET,
  trackSideEffects: false,
  preserveFormatting: true,
  categories: {
    ...allCategories(false),
    determinism: true,
    idempotency: true,
  },
};

export type PresetName = "standard" | "strict" | "lenient";

export function getPreset(name: PresetName): PurifyOptions {
  switch (name) {
    case "strict":
      return cloneOptions(STRICT_PRESET);
    case "lenient":
      return cloneOptions(LENIENT_PRESET);
    case "standard":
      return cloneOptions(STANDARD_PRESET);
  }
}

function cloneOptions(options: PurifyOptions): PurifyOptions {
  return { ...options, categories: { ...options.categories } };
}

// ============================================================================
// Merging
// ============================================================================

export type PurifyOptionsOverride = Partial<Omit<PurifyOptions, "categories">> & {
  categories?: Partial<CategoryFlags>;
};

export function mergeOptions(
  base: PurifyOptions,
  override: PurifyOptionsOverride = {},
): PurifyOptions {
  const merged: PurifyOptions = {
    ...base,
    categories: { ...base.categories },
  };
  const { categories, ...rest } = override;
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  if (categories) {
    for (const category of ISSUE_CATEGORIES) {
      const flag = categories[category];
      if (flag !== undefined) {
        merged.categories[category] = flag;
      }
    }
  }
  if (merged.emitGuards) {
    merged.typeCheck = true;
  }
  return merged;
}

// ============================================================================
// External Input
// ============================================================================

const categoriesSchema = z
  .object({
    "determinism": z.boolean().optional(),
    "idempotency": z.boolean().optional(),
    "security": z.boolean().optional(),
    "portability": z.boolean().optional(),
    "parallel-safety": z.boolean().optional(),
    "performance": z.boolean().optional(),
    "error-handling": z.boolean().optional(),
    "reproducibility": z.boolean().optional(),
  })
  .passthrough();

const lineLength = z.number().int().positive().nullable().optional();

/**
 * Accepts the documented snake_case keys and their camelCase equivalents.
 */
const externalOptionsSchema = z
  .object({
    preset: z.enum(["standard", "strict", "lenient"]).optional(),
    strict_idempotency: z.boolean().optional(),
    strictIdempotency: z.boolean().optional(),
    remove_non_deterministic: z.boolean().optional(),
    removeNonDeterministic: z.boolean().optional(),
    track_side_effects: z.boolean().optional(),
    trackSideEffects: z.boolean().optional(),
    type_check: z.boolean().optional(),
    typeCheck: z.boolean().optional(),
    emit_guards: z.boolean().optional(),
    emitGuards: z.boolean().optional(),
    preserve_formatting: z.boolean().optional(),
    preserveFormatting: z.boolean().optional(),
    max_line_length: lineLength,
    maxLineLength: lineLength,
    skip_blank_line_removal: z.boolean().optional(),
    skipBlankLineRemoval: z.boolean().optional(),
    skip_consolidation: z.boolean().optional(),
    skipConsolidation: z.boolean().optional(),
    categories: categoriesSchema.optional(),
  })
  .passthrough();

type ExternalOptions = z.infer<typeof externalOptionsSchema>;

const KNOWN_KEYS = new Set(Object.keys(externalOptionsSchema.shape));
const KNOWN_CATEGORIES = new Set<string>(ISSUE_CATEGORIES);

function pick<T>(a: T | undefined, b: T | undefined): T | undefined {
  return a !== undefined ? a : b;
}

function toOverride(input: ExternalOptions): PurifyOptionsOverride {
  const maxLineLength = pick(input.maxLineLength, input.max_line_length);
  return {
    strictIdempotency: pick(input.strictIdempotency, input.strict_idempotency),
    removeNonDeterministic: pick(input.removeNonDeterministic, input.remove_non_deterministic),
    trackSideEffects: pick(input.trackSideEffects, input.track_side_effects),
    typeCheck: pick(input.typeCheck, input.type_check),
    emitGuards: pick(input.emitGuards, input.emit_guards),
    preserveFormatting: pick(input.preserveFormatting, input.preserve_formatting),
    maxLineLength: maxLineLength === null ? undefined : maxLineLength,
    skipBlankLineRemoval: pick(input.skipBlankLineRemoval, input.skip_blank_line_removal),
    skipConsolidation: pick(input.skipConsolidation, input.skip_consolidation),
    categories: input.categories,
  };
}

/**
 * Validate caller-supplied options and resolve them against the defaults.
 * Unknown keys are ignored with a warning; wrongly typed values throw.
 */
export function parseOptions(input: unknown = {}): PurifyOptions {
  const parsed = externalOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw configError(`Invalid purification options:\n${issues.join("\n")}`, issues);
  }

  const unknown = Object.keys(parsed.data).filter((key) => !KNOWN_KEYS.has(key));
  if (unknown.length > 0) {
    log.warn({ keys: unknown }, "ignoring unknown purification options");
  }
  const unknownCategories = Object.keys(parsed.data.categories ?? {}).filter((key) => !KNOWN_CATEGORIES.has(key));
  if (unknownCategories.length > 0) {
    log.warn({ categories: unknownCategories }, "ignoring unknown issue categories");
  }

  const base = getPreset(parsed.data.preset ?? "standard");
  return checkOptions(mergeOptions(base, toOverride(parsed.data)));
}

/**
 * Throw on invalid resolved options and log their warnings.
 *
 * @throws PurifyError with code CONFIG_ERROR
 */
export function checkOptions(options: PurifyOptions): PurifyOptions {
  const validation = validateOptions(options);
  if (validation.errors.length > 0) {
    throw configError(
      `Option validation failed:\n${validation.errors.join("\n")}`,
      validation.errors,
    );
  }
  if (validation.warnings.length > 0) {
    log.warn({ warnings: validation.warnings }, "option warnings");
  }
  return options;
}

// ============================================================================
// Validation
// ============================================================================

export interface OptionsValidation {
  errors: string[];
  warnings: string[];
}

export const MIN_LINE_LENGTH = 20;

export function validateOptions(options: PurifyOptions): OptionsValidation {
  const result: OptionsValidation = { errors: [], warnings: [] };

  if (options.maxLineLength !== undefined && options.maxLineLength < MIN_LINE_LENGTH) {
    result.errors.push(
      `maxLineLength: ${options.maxLineLength} is below the minimum of ${MIN_LINE_LENGTH}`,
    );
  }

  if (options.preserveFormatting && options.maxLineLength !== undefined) {
    result.warnings.push(
      "maxLineLength is ignored while preserveFormatting is set",
    );
  }

  if (ISSUE_CATEGORIES.every((c) => !isCategoryEnabled(options, c))) {
    result.warnings.push("every issue category is disabled; purification will change nothing");
  }

  return result;
}

/**
 * Whether rules of a category run under these options.
 */
export function isCategoryEnabled(options: PurifyOptions, category: IssueCategory): boolean {
  if (!options.categories[category]) return false;
  if (category === "idempotency") return options.strictIdempotency;
  if (category === "determinism") return options.removeNonDeterministic;
  return true;
}

export function formatOptionsOf(options: PurifyOptions): FormatOptions {
  return {
    preserveFormatting: options.preserveFormatting,
    maxLineLength: options.preserveFormatting ? undefined : options.maxLineLength,
    skipBlankLineRemoval: options.skipBlankLineRemoval,
    skipConsolidation: options.skipConsolidation,
  };
}
