/**
 * Structural equality for syntax trees.
 *
 * Spans, ids, layout and metadata are ignored. Words compare by meaning of
 * their plain text: `'if'` and `if` are the same word, and adjacent plain
 * pieces merge (`a'b'c` equals `abc`).
 */

import type { WordPart } from "./ast.ts";

const IGNORED_KEYS = new Set(["span", "id", "layout", "metadata"]);

/** Single-quoted content that reads the same without quotes */
const PLAIN_TEXT = /^[A-Za-z0-9_.,:\/@%+=-]*$/;

interface PlainText {
  type: "PlainText";
  value: string;
}

type NormalizedPart = WordPart | PlainText;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isWordPart(value: unknown): value is WordPart {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case "Literal":
    case "SingleQuoted":
    case "DoubleQuoted":
    case "AnsiCQuoted":
    case "ParameterExpansion":
    case "CommandSubstitution":
    case "ArithmeticExpansion":
    case "ProcessSubstitution":
      return true;
    default:
      return false;
  }
}

function plainTextOf(part: WordPart): string | null {
  if (part.type === "Literal") return part.value;
  if (part.type === "SingleQuoted" && PLAIN_TEXT.test(part.value)) return part.value;
  return null;
}

export function normalizeWordParts(parts: readonly WordPart[]): NormalizedPart[] {
  const result: NormalizedPart[] = [];
  let pending: string | null = null;

  for (const part of parts) {
    const text = plainTextOf(part);
    if (text !== null) {
      pending = (pending ?? "") + text;
      continue;
    }
    if (pending) result.push({ type: "PlainText", value: pending });
    pending = null;
    result.push(part);
  }
  if (pending) result.push({ type: "PlainText", value: pending });
  return result;
}

function wordParts(value: Record<string, unknown>): NormalizedPart[] | null {
  if (value.type !== "Word" || !Array.isArray(value.parts)) return null;
  const parts = value.parts.filter(isWordPart);
  return parts.length === value.parts.length ? normalizeWordParts(parts) : null;
}

function equalArrays(a: readonly unknown[], b: readonly unknown[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((item, i) => structurallyEqual(item, b[i]));
}

/**
 * Compare two trees (or any sub-nodes) for structural equality.
 */
export function structurallyEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) return Array.isArray(b) && equalArrays(a, b);
  if (!isRecord(a) || !isRecord(b)) return false;

  const partsA = wordParts(a);
  const partsB = wordParts(b);
  if (partsA && partsB) return equalArrays(partsA, partsB);

  const keysA = Object.keys(a).filter((key) => !IGNORED_KEYS.has(key) && a[key] !== undefined);
  const keysB = Object.keys(b).filter((key) => !IGNORED_KEYS.has(key) && b[key] !== undefined);
  if (keysA.length !== keysB.length) return false;

  return keysA.every((key) => key in b && structurallyEqual(a[key], b[key]));
}
