/**
 * Delimiter matching for quoted and nested shell constructs.
 *
 * Each function takes the index of the construct's opening character and
 * returns the index just past its end, or -1 when the input ends first.
 * The lexer and the word parser share these so that both agree on where
 * a `$(...)`, `${...}` or quoted string stops.
 */

const WORD_BOUNDARY = /[\s;&|()<>]/;

const PLAIN_WORD_CHAR = /[^\s;&|()<>'"`$\\]/;

/** Words after which the next word is still in command position */
const COMMAND_PREFIX_WORDS = new Set(["then", "do", "else", "elif", "if", "while", "until", "{", "!", "time"]);

/** `'...'`: no escapes inside. */
export function skipSingleQuoted(text: string, start: number): number {
  const end = text.indexOf("'", start + 1);
  return end === -1 ? -1 : end + 1;
}

/** `$'...'`: backslash escapes the next character. */
export function skipAnsiC(text: string, start: number): number {
  for (let i = start + 2; i < text.length; i++) {
    const c = text[i];
    if (c === "\\") i++;
    else if (c === "'") return i + 1;
  }
  return -1;
}

/** `"..."`, including nested expansions. */
export function skipDoubleQuoted(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    const c = text[i];
    if (c === "\\") {
      i += 2;
    } else if (c === '"') {
      return i + 1;
    } else if (c === "$") {
      const end = skipDollar(text, i);
      if (end === -1) return -1;
      i = end;
    } else if (c === "`") {
      const end = skipBacktick(text, i);
      if (end === -1) return -1;
      i = end;
    } else {
      i++;
    }
  }
  return -1;
}

/** `` `...` `` */
export function skipBacktick(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    const c = text[i];
    if (c === "\\") i++;
    else if (c === "`") return i + 1;
  }
  return -1;
}

/**
 * Any `$` construct. Returns start + 1 for a `$` that begins no expansion.
 */
export function skipDollar(text: string, start: number): number {
  const next = text[start + 1];
  if (next === "(") {
    if (text[start + 2] === "(") return skipArithmetic(text, start + 1);
    return skipCommandSubstitution(text, start + 1);
  }
  if (next === "{") return skipParameter(text, start);
  if (next === "'") return skipAnsiC(text, start);
  return start + 1;
}

/**
 * `((...))`; `start` is the index of the first `(`.
 */
export function skipArithmetic(text: string, start: number): number {
  let depth = 0;
  let i = start + 2;
  while (i < text.length) {
    const c = text[i];
    if (c === "(") {
      depth++;
    } else if (c === ")") {
      if (depth === 0) {
        return text[i + 1] === ")" ? i + 2 : -1;
      }
      depth--;
    } else if (c === "$" && text[i + 1] !== "(") {
      const end = skipDollar(text, i);
      if (end === -1) return -1;
      i = end;
      continue;
    } else if (c === "'" || c === '"') {
      const end = c === "'" ? skipSingleQuoted(text, i) : skipDoubleQuoted(text, i);
      if (end === -1) return -1;
      i = end;
      continue;
    }
    i++;
  }
  return -1;
}

/** `${...}`; `start` is the index of the `$`. */
export function skipParameter(text: string, start: number): number {
  let depth = 0;
  let i = start + 1;
  while (i < text.length) {
    const c = text[i];
    if (c === "\\") {
      i += 2;
      continue;
    }
    if (c === "'" || c === '"' || c === "`") {
      const end = c === "'"
        ? skipSingleQuoted(text, i)
        : c === '"'
        ? skipDoubleQuoted(text, i)
        : skipBacktick(text, i);
      if (end === -1) return -1;
      i = end;
      continue;
    }
    if (c === "$" && text[i + 1] === "(") {
      const end = skipDollar(text, i);
      if (end === -1) return -1;
      i = end;
      continue;
    }
    if (c === "{") depth++;
    else if (c === "}" && --depth === 0) return i + 1;
    i++;
  }
  return -1;
}

/**
 * A parenthesized command list: `$(...)`, `<(...)`, `>(...)`.
 * `start` is the index of the `(`.
 *
 * A `)` that closes a case pattern is not a closing paren: inside an open
 * `case`, a `)` at the nesting depth where the `case` began belongs to a
 * pattern.
 */
export function skipCommandSubstitution(text: string, start: number): number {
  let depth = 1;
  const caseDepths: number[] = [];
  let i = start + 1;
  let atWordStart = true;
  let commandStart = true;

  while (i < text.length) {
    const c = text[i] ?? "";

    if (c === "\\") {
      i += 2;
      atWordStart = false;
      commandStart = false;
      continue;
    }
    if (c === "'" || c === '"' || c === "`" || c === "$") {
      const end = c === "'"
        ? skipSingleQuoted(text, i)
        : c === '"'
        ? skipDoubleQuoted(text, i)
        : c === "`"
        ? skipBacktick(text, i)
        : skipDollar(text, i);
      if (end === -1) return -1;
      i = end;
      atWordStart = false;
      commandStart = false;
      continue;
    }
    if (c === "#" && atWordStart) {
      while (i < text.length && text[i] !== "\n") i++;
      continue;
    }
    if (atWordStart && /[a-z{!]/.test(c)) {
      let j = i;
      while (j < text.length && PLAIN_WORD_CHAR.test(text[j] ?? "")) j++;
      const word = text.slice(i, j);
      if (commandStart && word === "case") caseDepths.push(depth);
      else if (commandStart && word === "esac") caseDepths.pop();
      commandStart = commandStart && COMMAND_PREFIX_WORDS.has(word);
      i = j;
      atWordStart = false;
      continue;
    }
    if (c === "(") {
      depth++;
    } else if (c === ")") {
      if (caseDepths.length > 0 && caseDepths[caseDepths.length - 1] === depth) {
        // closes a case pattern; the arm body starts here
        commandStart = true;
      } else if (--depth === 0) {
        return i + 1;
      }
    }
    if (/[;&|(\n]/.test(c)) commandStart = true;
    else if (!/[ \t]/.test(c) && c !== ")") commandStart = false;
    atWordStart = WORD_BOUNDARY.test(c);
    i++;
  }
  return -1;
}

/**
 * Generic balanced parens (array literals, extglob groups); `start` is the
 * index of the `(`.
 */
export function skipBalanced(text: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < text.length) {
    const c = text[i];
    if (c === "\\") {
      i += 2;
      continue;
    }
    if (c === "'" || c === '"' || c === "`" || c === "$") {
      const end = c === "'"
        ? skipSingleQuoted(text, i)
        : c === '"'
        ? skipDoubleQuoted(text, i)
        : c === "`"
        ? skipBacktick(text, i)
        : skipDollar(text, i);
      if (end === -1) return -1;
      i = end;
      continue;
    }
    if (c === "(") depth++;
    else if (c === ")" && --depth === 0) return i + 1;
    i++;
  }
  return -1;
}
