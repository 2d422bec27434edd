/**
 * Group Classifier
 * Decides what an opening parenthesis starts and whether its group may be skipped
 */

/**
 * `pos` is just after `(`.
 * - `(x`      capturing
 * - `(?<name` named capturing
 * - `(?<=`, `(?<!` lookbehind
 * - `(?:`, `(?=`, `(?!`, ... non-capturing
 */
export function isCapturing(pattern: string, pos: number): boolean {
  if (pattern.charAt(pos) !== "?") return true;
  if (pattern.charAt(pos + 1) !== "<") return false;

  const next = pattern.charAt(pos + 2);
  return next !== "=" && next !== "!";
}

/**
 * `pos` is just after `)`. True for `?`, `*` and `{0...}`.
 * Only the first digit of a brace quantifier is inspected, so `{0,abc}` counts.
 */
export function hasZeroOccurrenceQuantifier(pattern: string, pos: number, bound: number): boolean {
  if (pos >= bound) return false;

  switch (pattern.charAt(pos)) {
    case "?":
    case "*":
      return true;
    case "{":
      return pattern.charAt(pos + 1) === "0";
    default:
      return false;
  }
}

/** Name of a `(?<name>...)` group whose `(` is just before `pos`, or undefined */
export function inlineGroupName(pattern: string, pos: number): string | undefined {
  if (!pattern.startsWith("?<", pos)) return undefined;

  const close = pattern.indexOf(">", pos + 2);
  if (close === -1) return undefined;
  return pattern.slice(pos + 2, close);
}
