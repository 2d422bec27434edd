/**
 * Cursor Primitives
 * Position-advancing scans over a regex source. Each takes the position
 * just after its trigger and returns the position just after the construct,
 * clamped to the pattern length when the terminator is missing.
 */

/** `pos` is at a backslash. Steps over the escape, or a whole `\Q...\E` run. */
export function skipEscape(pattern: string, pos: number): number {
  if (pattern.charAt(pos + 1) === "Q") {
    return skipQuotedLiteral(pattern, pos + 2);
  }
  return Math.min(pos + 2, pattern.length);
}

/** `pos` is just after `\Q`. Returns the position just after the next `\E`. */
export function skipQuotedLiteral(pattern: string, pos: number): number {
  let i = pos;
  while (i < pattern.length) {
    if (pattern.charAt(i) === "\\") {
      if (pattern.charAt(i + 1) === "E") return i + 2;
      i += 2;
      continue;
    }
    i++;
  }
  return pattern.length;
}

/** `pos` is just after `[`. Nested classes are balanced. */
export function skipBracketClass(pattern: string, pos: number): number {
  let depth = 0;
  let i = pos;
  while (i < pattern.length) {
    const char = pattern.charAt(i);
    if (char === "\\") {
      i = skipEscape(pattern, i);
    } else if (char === "[") {
      depth++;
      i++;
    } else if (char === "]") {
      if (depth === 0) return i + 1;
      depth--;
      i++;
    } else {
      i++;
    }
  }
  return pattern.length;
}

/** `pos` is just after `(`. Returns the position just after its `)`. */
export function matchingParenEnd(pattern: string, pos: number): number {
  let depth = 0;
  let i = pos;
  while (i < pattern.length) {
    const char = pattern.charAt(i);
    if (char === "\\") {
      i = skipEscape(pattern, i);
    } else if (char === "[") {
      i = skipBracketClass(pattern, i + 1);
    } else if (char === "(") {
      depth++;
      i++;
    } else if (char === ")") {
      if (depth === 0) return i + 1;
      depth--;
      i++;
    } else {
      i++;
    }
  }
  return pattern.length;
}
