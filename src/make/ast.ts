/**
 * Makefile AST Types
 *
 * A Makefile is a flat list of items; conditionals nest their branches.
 * Values and recipe lines stay text: Makefile expansion syntax is scanned by
 * the rules that need it, not parsed into a tree.
 */

import type { NodeId } from "../core/node-id.ts";
import type { Span } from "../core/types.ts";

export interface MakeBase {
  span: Span;
  id: NodeId;
  /** Blank source lines directly above this item */
  blankLinesBefore?: number;
}

/**
 * Physical source lines of an item written with backslash continuations.
 * Dropped by the rewriter when the item's text changes.
 */
export type PhysicalLines = string[];

export type VariableFlavor = "recursive" | "simple" | "conditional" | "append" | "shell";

export const FLAVOR_OPERATORS: Readonly<Record<VariableFlavor, string>> = {
  recursive: "=",
  simple: ":=",
  conditional: "?=",
  append: "+=",
  shell: "!=",
};

export interface Variable extends MakeBase {
  type: "Variable";
  name: string;
  value: string;
  flavor: VariableFlavor;
  /** Written with an `export` prefix */
  exported: boolean;
  /** Written with an `override` prefix */
  override: boolean;
  physicalLines?: PhysicalLines;
}

export interface RecipeLine {
  /** Command text without the leading tab */
  text: string;
  span: Span;
  /** Written after `;` on the rule line */
  inline?: boolean;
  physicalLines?: PhysicalLines;
}

export interface Target extends MakeBase {
  type: "Target";
  /** Target names as written, space-separated when there are several */
  name: string;
  prerequisites: string[];
  /** Prerequisites after `|` */
  orderOnly: string[];
  recipe: RecipeLine[];
  phony: boolean;
  /** `::` rule */
  doubleColon: boolean;
  physicalLines?: PhysicalLines;
}

export interface PatternRule extends MakeBase {
  type: "PatternRule";
  targetPattern: string;
  prerequisites: string[];
  orderOnly: string[];
  recipe: RecipeLine[];
  doubleColon: boolean;
  physicalLines?: PhysicalLines;
}

export interface Include extends MakeBase {
  type: "Include";
  path: string;
  /** `-include` or `sinclude` */
  optional: boolean;
  keyword: "include" | "-include" | "sinclude";
}

export type ConditionalDirective = "ifeq" | "ifneq" | "ifdef" | "ifndef";

export interface Conditional extends MakeBase {
  type: "Conditional";
  directive: ConditionalDirective;
  /** Two for ifeq/ifneq, one variable name for ifdef/ifndef */
  arguments: string[];
  /** Condition text after the directive, as written */
  condition: string;
  thenItems: MakeItem[];
  /** A chained `else ifeq ...` is a single Conditional here with `chained` set */
  elseItems: MakeItem[] | null;
  chained: boolean;
}

export interface Define extends MakeBase {
  type: "Define";
  name: string;
  /** Operator after the name, if any (`define X :=`) */
  operator: string | null;
  lines: string[];
}

export interface Comment extends MakeBase {
  type: "Comment";
  /** Text after the `#` */
  text: string;
}

/** A line kept verbatim (`vpath`, `$(error ...)`, `unexport`, ...) */
export interface Raw extends MakeBase {
  type: "Raw";
  text: string;
}

export type MakeItem =
  | Variable
  | Target
  | PatternRule
  | Include
  | Conditional
  | Define
  | Comment
  | Raw;

export interface MakeMetadata {
  source?: string;
  lineCount: number;
  parseDurationMs: number;
}

export interface Makefile {
  type: "Makefile";
  items: MakeItem[];
  metadata: MakeMetadata;
}

/** Items with recipes */
export type Rule = Target | PatternRule;

export function ruleName(rule: Rule): string {
  return rule.type === "Target" ? rule.name : rule.targetPattern;
}

/** Every item, conditionals' branches included, in source order */
export function flattenItems(items: readonly MakeItem[]): MakeItem[] {
  const result: MakeItem[] = [];
  for (const item of items) {
    result.push(item);
    if (item.type === "Conditional") {
      result.push(...flattenItems(item.thenItems));
      if (item.elseItems) result.push(...flattenItems(item.elseItems));
    }
  }
  return result;
}
