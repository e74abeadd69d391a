/**
 * Transformations
 *
 * What the planner decided to do about one issue. Safe variants carry
 * everything the rewriter needs to find and change their target; advisories
 * only document the issue and its suggested manual fix.
 */

import type { NodeId } from "../core/node-id.ts";
import type { IssueCategory, Severity, Span } from "../core/types.ts";

interface TransformationBase {
  /** Code of the rule whose issue this answers */
  rule: string;
  category: IssueCategory;
  severity: Severity;
  span: Span;
  /** Node to change; absent for advisories about nothing in this tree */
  target?: NodeId;
  /** Report text describing the change */
  description: string;
  suggestion?: string;
}

/** Insert a flag as the command's first argument (`mkdir -p`) */
export interface AddFlag extends TransformationBase {
  kind: "AddFlag";
  safe: true;
  flag: string;
}

/** Replace a flag argument with a longer cluster (`-s` to `-sf`) */
export interface ExtendFlag extends TransformationBase {
  kind: "ExtendFlag";
  safe: true;
  from: string;
  to: string;
}

/** Pipe a command substitution's only command through `sort` */
export interface AppendSort extends TransformationBase {
  kind: "AppendSort";
  safe: true;
}

/** Wrap `$(wildcard ...)` or `$(shell find ...)` calls in a variable with `$(sort ...)` */
export interface WrapSort extends TransformationBase {
  kind: "WrapSort";
  safe: true;
  call: "wildcard" | "shell";
}

/** Change an instruction keyword (`ADD` to `COPY`) */
export interface ReplaceKeyword extends TransformationBase {
  kind: "ReplaceKeyword";
  safe: true;
  from: string;
  to: string;
}

/** Insert text into an instruction's arguments right after the first `after` */
export interface InsertText extends TransformationBase {
  kind: "InsertText";
  safe: true;
  after: string;
  text: string;
}

/** Append `&& command` to a RUN instruction */
export interface AppendCommand extends TransformationBase {
  kind: "AppendCommand";
  safe: true;
  command: string;
}

export interface Advisory extends TransformationBase {
  kind: "Advisory";
  safe: false;
}

export type SafeTransformation =
  | AddFlag
  | ExtendFlag
  | AppendSort
  | WrapSort
  | ReplaceKeyword
  | InsertText
  | AppendCommand;

export type Transformation = SafeTransformation | Advisory;

export type TransformationStatus = "applied" | "advisory" | "downgraded";

/**
 * Outcome of one transformation. A safe transformation whose target is
 * gone or whose precondition no longer holds is downgraded to an advisory.
 */
export interface TransformationOutcome {
  transformation: Transformation;
  status: TransformationStatus;
  /** Why a downgraded transformation was not applied */
  reason?: string;
}

export function isSafe(transformation: Transformation): transformation is SafeTransformation {
  return transformation.safe;
}

export function applied(transformation: Transformation): TransformationOutcome {
  return { transformation, status: "applied" };
}

export function advisory(transformation: Transformation): TransformationOutcome {
  return { transformation, status: "advisory" };
}

export function downgraded(transformation: Transformation, reason: string): TransformationOutcome {
  return { transformation, status: "downgraded", reason };
}
