/**
 * Regex Shape Types
 * Slots, schemas and extraction results shared by the analyzer and extractor
 */

import type { ContractViolation } from "./errors.ts";

// =============================================================================
// SCHEMA
// =============================================================================

/** Whether a capturing group is guaranteed to participate in a successful match */
export type SlotKind = "required" | "optional";

/** Classification of one capturing group */
export interface Slot {
  /** 1-based, same numbering the engine uses for `match[ordinal]` */
  readonly ordinal: number;
  readonly kind: SlotKind;
  /** Inline name from `(?<name>...)`, when the group has one */
  readonly name?: string;
}

/** Ordered slots of a pattern. `count === slots.length` */
export interface Schema {
  readonly count: number;
  readonly slots: readonly Slot[];
}

// =============================================================================
// EXTRACTION
// =============================================================================

/** Raw per-ordinal values as the engine reports them (index 0 is group 1) */
export type RawGroups = ReadonlyArray<string | undefined>;

/**
 * Extracted group values. A required slot yields `string`,
 * an optional slot yields `string | null`.
 */
export type GroupTuple = ReadonlyArray<string | null>;

export type ExtractionResult<G extends GroupTuple = GroupTuple> =
  | { readonly ok: true; readonly value: G }
  | { readonly ok: false; readonly error: ContractViolation };

// =============================================================================
// MATCHING
// =============================================================================

/**
 * How a match attempt is anchored:
 * - full: the whole input must match
 * - prefix: the match must start at index 0
 * - find: the first match anywhere
 */
export type MatchMode = "full" | "prefix" | "find";
