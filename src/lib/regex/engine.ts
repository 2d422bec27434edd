/**
 * Engine Adapter - the JavaScript RegExp engine behind a narrow interface
 *
 * Covers:
 * - Validation with the engine's own diagnostics
 * - The engine's capturing-group count, used to cross-check the scanner
 * - Per-mode compiled variants (full match, prefix, find)
 */

import { skipBracketClass, skipEscape } from "./cursor.ts";
import { PatternSyntaxError } from "./errors.ts";
import type { MatchMode } from "./types.ts";

/** Flags managed by the adapter itself */
const INTERNAL_FLAGS = new Set(["g", "y", "d"]);

export interface CompiledPattern {
  readonly source: string;
  /** User flags, normalized (sorted, no duplicates, no g/y/d) */
  readonly flags: string;
  readonly variants: Readonly<Record<MatchMode | "global", RegExp>>;
}

// =============================================================================
// VALIDATION
// =============================================================================

/** Sort and dedupe flags, dropping the ones this adapter sets itself */
export function normalizeFlags(flags: string): string {
  return [...new Set(flags)]
    .filter((f) => !INTERNAL_FLAGS.has(f))
    .sort()
    .join("");
}

/**
 * Compile once to validate. A failure becomes a PatternSyntaxError carrying
 * the engine message verbatim.
 */
export function validatePattern(source: string, flags = ""): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new PatternSyntaxError(source, error.message, locateSyntaxDefect(source));
    }
    throw error;
  }
}

/**
 * Best-effort offset of a structural defect, for engines that report none.
 * - trailing `\` or unterminated `[` -> pattern length
 * - unmatched `)` -> its index
 * - unclosed `(` -> pattern length
 */
export function locateSyntaxDefect(source: string): number | null {
  let depth = 0;
  let i = 0;

  while (i < source.length) {
    const char = source.charAt(i);

    if (char === "\\") {
      if (i === source.length - 1) return source.length;
      i = skipEscape(source, i);
    } else if (char === "[") {
      const end = skipBracketClass(source, i + 1);
      if (end === source.length && source.charAt(end - 1) !== "]") return source.length;
      i = end;
    } else if (char === "(") {
      depth++;
      i++;
    } else if (char === ")") {
      if (depth === 0) return i;
      depth--;
      i++;
    } else {
      i++;
    }
  }

  return depth > 0 ? source.length : null;
}

export interface UnsupportedConstruct {
  readonly offset: number;
  readonly reason: string;
}

/**
 * First construct the scanner reads differently from the engine:
 * - `\Q`, which the engine takes as a literal `Q` (and rejects in unicode mode)
 * - `[` inside a class without `v`, which the engine takes as a class member
 */
export function findUnsupportedConstruct(source: string, flags = ""): UnsupportedConstruct | null {
  const nestedClasses = flags.includes("v");
  let classDepth = 0;
  let i = 0;

  while (i < source.length) {
    const char = source.charAt(i);

    if (char === "\\") {
      if (source.charAt(i + 1) === "Q") {
        return { offset: i, reason: `\\Q at offset ${i} is a literal Q to the engine, not a quoted run` };
      }
      i += 2;
    } else if (char === "[") {
      if (classDepth > 0 && !nestedClasses) {
        return { offset: i, reason: `[ at offset ${i} is a class member to the engine, not a nested class` };
      }
      classDepth++;
      i++;
    } else if (char === "]" && classDepth > 0) {
      classDepth--;
      i++;
    } else {
      i++;
    }
  }

  return null;
}

// =============================================================================
// INTROSPECTION
// =============================================================================

/**
 * Number of capturing groups the engine itself sees.
 * An empty alternative guarantees a match against "" so the result array
 * has one slot per group.
 */
export function engineGroupCount(source: string, flags = ""): number {
  const probe = new RegExp(`${source}|`, normalizeFlags(flags)).exec("");
  return probe === null ? 0 : probe.length - 1;
}

// =============================================================================
// COMPILATION
// =============================================================================

/**
 * Build the per-mode variants. All carry `d` so group spans are available.
 * - full: sticky, and nothing may follow the match (independent of `m`)
 * - prefix: sticky
 * - find / global: searched from lastIndex
 */
export function compilePattern(source: string, flags = ""): CompiledPattern {
  const normalized = normalizeFlags(flags);
  validatePattern(source, normalized);

  return {
    source,
    flags: normalized,
    variants: {
      full: new RegExp(`(?:${source})(?![\\s\\S])`, `${normalized}dy`),
      prefix: new RegExp(source, `${normalized}dy`),
      find: new RegExp(source, `${normalized}d`),
      global: new RegExp(source, `${normalized}dg`),
    },
  };
}

/** Fresh engine state for one operation. Variants themselves are never executed. */
export function instantiate(compiled: CompiledPattern, mode: MatchMode | "global"): RegExp {
  return new RegExp(compiled.variants[mode]);
}
