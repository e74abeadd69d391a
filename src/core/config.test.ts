/**
 * Unit tests for config.ts
 *
 * Covers presets, merging, external option parsing and validation.
 */

import { describe, expect, it } from "vitest";
import {
  checkOptions,
  formatOptionsOf,
  getPreset,
  isCategoryEnabled,
  mergeOptions,
  parseOptions,
  STANDARD_PRESET,
  validateOptions,
} from "./config.ts";
import { PurifyError } from "./errors.ts";

// =============================================================================
// Presets
// =============================================================================

describe("config - presets", () => {
  it("standard enables every category without type checking", () => {
    const options = getPreset("standard");
    expect(Object.values(options.categories).every(Boolean)).toBe(true);
    expect(options.typeCheck).toBe(false);
    expect(options.emitGuards).toBe(false);
  });

  it("strict adds type checking and guards", () => {
    const options = getPreset("strict");
    expect(options.typeCheck).toBe(true);
    expect(options.emitGuards).toBe(true);
  });

  it("lenient keeps only determinism and idempotency", () => {
    const options = getPreset("lenient");
    const enabled = Object.entries(options.categories).filter(([, on]) => on).map(([name]) => name);
    expect(enabled).toEqual(["determinism", "idempotency"]);
    expect(options.preserveFormatting).toBe(true);
    expect(options.trackSideEffects).toBe(false);
  });

  it("returns copies that callers may modify", () => {
    const options = getPreset("standard");
    options.categories.security = false;
    expect(STANDARD_PRESET.categories.security).toBe(true);
  });
});

// =============================================================================
// Merging
// =============================================================================

describe("config - mergeOptions", () => {
  it("overrides scalar options and merges categories key by key", () => {
    const merged = mergeOptions(STANDARD_PRESET, {
      trackSideEffects: false,
      categories: { security: false },
    });
    expect(merged.trackSideEffects).toBe(false);
    expect(merged.categories.security).toBe(false);
    expect(merged.categories.portability).toBe(true);
    expect(STANDARD_PRESET.trackSideEffects).toBe(true);
  });

  it("ignores undefined overrides", () => {
    const merged = mergeOptions(STANDARD_PRESET, { strictIdempotency: undefined });
    expect(merged.strictIdempotency).toBe(true);
  });

  it("turns type checking on when guards are requested", () => {
    const merged = mergeOptions(STANDARD_PRESET, { emitGuards: true, typeCheck: false });
    expect(merged.typeCheck).toBe(true);
  });
});

// =============================================================================
// External input
// =============================================================================

describe("config - parseOptions", () => {
  it("defaults to the standard preset", () => {
    expect(parseOptions()).toEqual(STANDARD_PRESET);
    expect(parseOptions(null)).toEqual(STANDARD_PRESET);
  });

  it("accepts snake_case and camelCase keys", () => {
    const options = parseOptions({ strict_idempotency: false, maxLineLength: 100 });
    expect(options.strictIdempotency).toBe(false);
    expect(options.maxLineLength).toBe(100);
  });

  it("prefers the camelCase key when both are given", () => {
    const options = parseOptions({ type_check: false, typeCheck: true });
    expect(options.typeCheck).toBe(true);
  });

  it("starts from a named preset", () => {
    const options = parseOptions({ preset: "lenient", categories: { security: true } });
    expect(options.categories.security).toBe(true);
    expect(options.categories.portability).toBe(false);
    expect(options.preserveFormatting).toBe(true);
  });

  it("treats a null line length as no limit", () => {
    expect(parseOptions({ max_line_length: null }).maxLineLength).toBeUndefined();
  });

  it("ignores unknown keys", () => {
    expect(parseOptions({ colour: "always" })).toEqual(STANDARD_PRESET);
  });

  it("rejects wrongly typed values", () => {
    expect(() => parseOptions({ strict_idempotency: "yes" })).toThrow(PurifyError);
    expect(() => parseOptions({ strict_idempotency: "yes" })).toThrow(/^Invalid purification options:\nstrict_idempotency: /);
  });

  it("ignores unknown categories", () => {
    expect(parseOptions({ categories: { speed: true, security: false } }).categories).toEqual({
      ...STANDARD_PRESET.categories,
      security: false,
    });
  });

  it("rejects a wrongly typed category flag", () => {
    expect(() => parseOptions({ categories: { security: "off" } })).toThrow(/^Invalid purification options:\ncategories\.security: /);
  });

  it("reports a line length below the minimum", () => {
    try {
      parseOptions({ max_line_length: 10 });
      expect.unreachable("parseOptions should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(PurifyError);
      if (error instanceof PurifyError) {
        expect(error.code).toBe("CONFIG_ERROR");
        expect(error.details?.issues).toEqual(["maxLineLength: 10 is below the minimum of 20"]);
      }
    }
  });
});

// =============================================================================
// Validation and derived views
// =============================================================================

describe("config - validation", () => {
  it("warns when preserveFormatting overrides a line length", () => {
    const result = validateOptions(mergeOptions(STANDARD_PRESET, { preserveFormatting: true, maxLineLength: 80 }));
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(["maxLineLength is ignored while preserveFormatting is set"]);
  });

  it("has nothing to say about guards once they are merged", () => {
    expect(validateOptions(mergeOptions(STANDARD_PRESET, { emitGuards: true })).warnings).toEqual([]);
  });

  it("checks resolved options the way parseOptions does", () => {
    const options = mergeOptions(STANDARD_PRESET, { maxLineLength: 100 });
    expect(checkOptions(options)).toBe(options);
    expect(() => checkOptions(mergeOptions(STANDARD_PRESET, { maxLineLength: 19 }))).toThrow(
      "maxLineLength: 19 is below the minimum of 20",
    );
  });

  it("warns when every category is off", () => {
    const options = getPreset("standard");
    for (const key of Object.keys(options.categories)) {
      Object.assign(options.categories, { [key]: false });
    }
    expect(validateOptions(options).warnings).toEqual([
      "every issue category is disabled; purification will change nothing",
    ]);
  });

  it("gates idempotency and determinism on their switches", () => {
    const options = mergeOptions(STANDARD_PRESET, { strictIdempotency: false, removeNonDeterministic: false });
    expect(isCategoryEnabled(options, "idempotency")).toBe(false);
    expect(isCategoryEnabled(options, "determinism")).toBe(false);
    expect(isCategoryEnabled(options, "security")).toBe(true);
  });

  it("drops the line length from format options while preserving formatting", () => {
    const options = mergeOptions(STANDARD_PRESET, { preserveFormatting: true, maxLineLength: 80 });
    expect(formatOptionsOf(options)).toEqual({
      preserveFormatting: true,
      maxLineLength: undefined,
      skipBlankLineRemoval: false,
      skipConsolidation: false,
    });
  });
});
