/**
 * Word classification helpers shared by the analyzer and the rewriter.
 */

import type * as AST from "./ast.ts";

const GLOB_CHARS = /(?<!\\)[*?[]/;

/**
 * Text of a word that contains no expansions, with quotes removed and
 * backslash escapes resolved. Null when any part expands at run time.
 */
export function staticText(word: AST.Word): string | null {
  let text = "";
  for (const part of word.parts) {
    switch (part.type) {
      case "Literal":
        text += part.value.replace(/\\(.)/gs, "$1");
        break;
      case "SingleQuoted":
        text += part.value;
        break;
      case "DoubleQuoted":
        for (const inner of part.parts) {
          if (inner.type !== "Literal") return null;
          text += inner.value.replace(/\\([$`"\\])/g, "$1");
        }
        break;
      default:
        return null;
    }
  }
  return text;
}

/** A word made of one unquoted literal */
export function isLiteral(word: AST.Word): boolean {
  const [only] = word.parts;
  return word.parts.length === 1 && only?.type === "Literal";
}

/** The variable name when the word is exactly `$name`, `${name}` or `"$name"` */
export function variableReference(word: AST.Word): string | null {
  const [only] = word.parts;
  if (word.parts.length !== 1 || !only) return null;

  const expansion = only.type === "DoubleQuoted" && only.parts.length === 1 ? only.parts[0] : only;
  if (expansion?.type !== "ParameterExpansion") return null;
  if (expansion.modifier !== null || expansion.length || expansion.indirect) return null;
  return expansion.parameter;
}

/** Unquoted glob characters outside expansions */
export function isGlob(word: AST.Word): boolean {
  return word.parts.some((part) => part.type === "Literal" && GLOB_CHARS.test(part.value));
}

export function hasCommandSubstitution(word: AST.Word): boolean {
  return word.parts.some((part) =>
    part.type === "CommandSubstitution" ||
    (part.type === "DoubleQuoted" && part.parts.some((inner) => inner.type === "CommandSubstitution"))
  );
}

/**
 * Parameter expansions written directly in the word (not inside nested
 * substitutions), with whether each one is inside double quotes.
 */
export function parameterExpansions(
  word: AST.Word,
): Array<{ expansion: AST.ParameterExpansion; quoted: boolean }> {
  const found: Array<{ expansion: AST.ParameterExpansion; quoted: boolean }> = [];
  for (const part of word.parts) {
    if (part.type === "ParameterExpansion") {
      found.push({ expansion: part, quoted: false });
    } else if (part.type === "DoubleQuoted") {
      for (const inner of part.parts) {
        if (inner.type === "ParameterExpansion") found.push({ expansion: inner, quoted: true });
      }
    }
  }
  return found;
}

/** True when some part of the word is subject to word splitting */
export function hasUnquotedExpansion(word: AST.Word): boolean {
  return word.parts.some((part) =>
    part.type === "ParameterExpansion" || part.type === "CommandSubstitution" || part.type === "ArithmeticExpansion"
  );
}

/** Command name of a simple command, when it is static text */
export function commandName(command: AST.Command): string | null {
  return command.name ? staticText(command.name) : null;
}

/** Static texts of a command's arguments; null entries expand at run time */
export function argumentTexts(command: AST.Command): Array<string | null> {
  return command.args.map(staticText);
}
