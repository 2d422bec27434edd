/**
 * Structure Analyzer
 * Derives a pattern's Schema in one left-to-right pass.
 *
 * State is a single counter, `optionalityDepth`:
 * - 0: a group opened here is reached whenever the pattern matches
 * - >0: we are inside a construct that may be skipped, so any group opened
 *   here is optional no matter its own quantifier
 *
 * Every `)` lowers the counter by one, floored at zero. Leaving one optional
 * context is all the close needs to know, so no stack is kept.
 */

import { hasTopLevelAlternation } from "./alternation.ts";
import { matchingParenEnd, skipBracketClass, skipEscape } from "./cursor.ts";
import { engineGroupCount, findUnsupportedConstruct, validatePattern } from "./engine.ts";
import { UnsupportedPatternError } from "./errors.ts";
import { hasZeroOccurrenceQuantifier, inlineGroupName, isCapturing } from "./groups.ts";
import type { Schema, Slot, SlotKind } from "./types.ts";

/**
 * Validate `source` with the engine, then derive its Schema.
 * Throws PatternSyntaxError for invalid patterns and UnsupportedPatternError
 * for syntax the scanner and the engine read differently, or when they
 * disagree on the group count.
 */
export function analyzePattern(source: string, flags = ""): Schema {
  validatePattern(source, flags);

  const construct = findUnsupportedConstruct(source, flags);
  if (construct) {
    throw new UnsupportedPatternError(source, construct.reason, construct.offset);
  }

  const schema = scanStructure(source);
  const actual = engineGroupCount(source, flags);
  if (schema.count !== actual) {
    throw new UnsupportedPatternError(
      source,
      `scanner found ${schema.count} capturing group(s), engine reports ${actual}`,
    );
  }

  return schema;
}

/** The pass itself. No validation; callers that skip it get a best-effort result. */
export function scanStructure(source: string): Schema {
  const length = source.length;
  const slots: Slot[] = [];
  let optionalityDepth = hasTopLevelAlternation(source, 0, length) ? 1 : 0;
  let pos = 0;

  const addSlot = (kind: SlotKind, openAt: number): void => {
    const name = inlineGroupName(source, openAt + 1);
    const slot: Slot =
      name === undefined
        ? { ordinal: slots.length + 1, kind }
        : { ordinal: slots.length + 1, kind, name };
    slots.push(Object.freeze(slot));
  };

  while (pos < length) {
    const char = source.charAt(pos);

    if (char === "\\") {
      pos = skipEscape(source, pos);
      continue;
    }

    if (char === "[") {
      pos = skipBracketClass(source, pos + 1);
      continue;
    }

    if (char === ")") {
      optionalityDepth = Math.max(0, optionalityDepth - 1);
      pos++;
      continue;
    }

    if (char === "(") {
      const capturing = isCapturing(source, pos + 1);

      if (optionalityDepth === 0) {
        const end = matchingParenEnd(source, pos + 1);

        if (hasZeroOccurrenceQuantifier(source, end, length)) {
          if (capturing) addSlot("optional", pos);
          optionalityDepth = 1;
        } else {
          if (capturing) addSlot("required", pos);
          optionalityDepth = hasTopLevelAlternation(source, pos + 1, length) ? 1 : 0;
        }
      } else {
        if (capturing) addSlot("optional", pos);
        optionalityDepth++;
      }

      // Only the `(` is consumed; the body is scanned next
      pos++;
      continue;
    }

    pos++;
  }

  return Object.freeze({ count: slots.length, slots: Object.freeze(slots) });
}

/** Ordinals of the required slots */
export function requiredOrdinals(schema: Schema): number[] {
  return schema.slots.filter((s) => s.kind === "required").map((s) => s.ordinal);
}

/** Compact notation: `R` per required slot, `O` per optional, e.g. "ROO" */
export function describeSchema(schema: Schema): string {
  return schema.slots.map((s) => (s.kind === "required" ? "R" : "O")).join("");
}
