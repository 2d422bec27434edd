/**
 * Group name resolution
 *
 * Two sources of names:
 * - inline, from `(?<name>...)` in the pattern
 * - declared by the caller, by ordinal (index 0 names group 1)
 *
 * A name is resolved among inline names first, then among declared names,
 * so both names of a group work. Declared names past the group count are ignored.
 */

import { UnknownGroupNameError } from "./errors.ts";
import type { Schema } from "./types.ts";

export class GroupNames {
  private readonly byName = new Map<string, number>();
  private readonly declaredByName = new Map<string, number>();
  private readonly ordinalNames: ReadonlyArray<string | null>;

  constructor(schema: Schema, declared: readonly string[] = []) {
    const names: Array<string | null> = [];

    for (const slot of schema.slots) {
      if (slot.name !== undefined) {
        this.byName.set(slot.name, slot.ordinal);
      }
      const fallback = declared[slot.ordinal - 1];
      if (fallback !== undefined && !this.declaredByName.has(fallback)) {
        this.declaredByName.set(fallback, slot.ordinal);
      }
      names.push(slot.name ?? fallback ?? null);
    }

    this.ordinalNames = names;
  }

  /** Ordinal for `name`, or null when no group carries it */
  resolve(name: string): number | null {
    return this.byName.get(name) ?? this.declaredByName.get(name) ?? null;
  }

  /** Ordinal for `name`. Throws UnknownGroupNameError. */
  ordinalOf(name: string): number {
    const ordinal = this.resolve(name);
    if (ordinal === null) {
      throw new UnknownGroupNameError(name);
    }
    return ordinal;
  }

  /** Preferred name of a group: inline, then declared */
  nameOf(ordinal: number): string | null {
    return this.ordinalNames[ordinal - 1] ?? null;
  }

  /** Every resolvable name */
  names(): string[] {
    return [...new Set([...this.byName.keys(), ...this.declaredByName.keys()])];
  }
}
