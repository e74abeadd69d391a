/**
 * Rule catalog entries
 *
 * A rule is data plus one pure check function, keyed by its code. Checks
 * return matches; the analyzer turns them into issues and stamps the
 * rule's code, category and severity on each.
 */

import type { NodeId } from "../core/node-id.ts";
import type { IssueCategory, Severity, Span } from "../core/types.ts";

export interface RuleMatch {
  span: Span;
  message: string;
  suggestion?: string;
  target?: NodeId;
}

export interface Rule<Context> {
  code: string;
  category: IssueCategory;
  severity: Severity;
  /** One-line description for catalogs and documentation */
  summary: string;
  check(context: Context): Iterable<RuleMatch>;
}

/** Rules of one dialect keyed by code, in catalog order. */
export type RuleCatalog<Context> = ReadonlyMap<string, Rule<Context>>;

export function catalogOf<Context>(rules: readonly Rule<Context>[]): RuleCatalog<Context> {
  return new Map(rules.map((rule) => [rule.code, rule] as const));
}
