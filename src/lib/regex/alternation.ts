/**
 * Alternation Lookahead
 * Does the current group body (or the pattern remainder) branch at its own level?
 */

import { matchingParenEnd, skipBracketClass, skipEscape } from "./cursor.ts";

/**
 * Scan from `from` toward `bound`. Nested groups, classes and escapes are
 * skipped whole. True at the first `|` at this level, false at an unmatched
 * `)` or at `bound`.
 */
export function hasTopLevelAlternation(pattern: string, from: number, bound: number): boolean {
  const limit = Math.min(bound, pattern.length);
  let i = from;

  while (i < limit) {
    switch (pattern.charAt(i)) {
      case "\\":
        i = skipEscape(pattern, i);
        break;
      case "[":
        i = skipBracketClass(pattern, i + 1);
        break;
      case "(":
        i = matchingParenEnd(pattern, i + 1);
        break;
      case "|":
        return true;
      case ")":
        return false;
      default:
        i++;
    }
  }

  return false;
}
