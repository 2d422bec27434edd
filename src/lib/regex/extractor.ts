/**
 * Schema-Checked Extractor
 * Turns the raw group values of one match into a tuple shaped by the Schema.
 */

import { type ContractViolation, RequiredGroupAbsent, ShapeMismatch } from "./errors.ts";
import type { ExtractionResult, GroupTuple, RawGroups, Schema } from "./types.ts";

/** Engine values to extraction values: a non-participating group becomes null */
export function toGroupTuple(raw: RawGroups): Array<string | null> {
  return raw.map((value) => value ?? null);
}

/**
 * First disagreement between `values` and `schema`, or null.
 * Arity is checked before any slot.
 */
export function findViolation(
  schema: Schema,
  values: ReadonlyArray<string | null | undefined>,
): ContractViolation | null {
  if (values.length !== schema.count) {
    return new ShapeMismatch(schema.count, values.length);
  }

  for (const slot of schema.slots) {
    const value = values[slot.ordinal - 1];
    if (slot.kind === "required" && (value === null || value === undefined)) {
      return new RequiredGroupAbsent(slot.ordinal);
    }
  }

  return null;
}

/** Check `raw` against `schema` and return the tuple or the violation */
export function extractGroups(schema: Schema, raw: RawGroups): ExtractionResult {
  const violation = findViolation(schema, raw);
  if (violation) {
    return { ok: false, error: violation };
  }
  return { ok: true, value: toGroupTuple(raw) };
}

/**
 * Narrow `values` to the tuple type `G` that `schema` describes.
 * Throws the ContractViolation when they disagree.
 */
export function assertGroups<G extends GroupTuple>(
  schema: Schema,
  values: GroupTuple,
): asserts values is G {
  const violation = findViolation(schema, values);
  if (violation) {
    throw violation;
  }
}
