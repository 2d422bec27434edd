/**
 * Match data for one successful match attempt
 */

import type { CompiledPattern } from "./engine.ts";
import type { GroupNames } from "./names.ts";
import type { RawGroups } from "./types.ts";

type Span = readonly [start: number, end: number];

/** Group reference: 0 for the whole match, an ordinal, or a group name */
export type GroupRef = number | string;

export class Match {
  /** Text the match was found in */
  readonly input: string;
  readonly start: number;
  readonly end: number;
  readonly matched: string;
  readonly groupCount: number;
  readonly names: GroupNames;
  /** Compiled pattern that produced this match */
  readonly origin: CompiledPattern;

  // Index 0 is the whole match
  private readonly values: ReadonlyArray<string | undefined>;
  private readonly spans: ReadonlyArray<Span | undefined>;

  constructor(input: string, exec: RegExpExecArray, names: GroupNames, origin: CompiledPattern) {
    this.input = input;
    this.start = exec.index;
    this.matched = exec[0];
    this.end = exec.index + exec[0].length;
    this.groupCount = exec.length - 1;
    this.names = names;
    this.origin = origin;
    this.values = Array.from(exec);
    this.spans = exec.indices ? Array.from(exec.indices) : [];
  }

  /** Substring for a group, or null when the group did not participate */
  group(ref: GroupRef = 0): string | null {
    return this.values[this.ordinalOf(ref)] ?? null;
  }

  /** [start, end) of a group, or null when the group did not participate */
  span(ref: GroupRef = 0): Span | null {
    const ordinal = this.ordinalOf(ref);
    if (ordinal === 0) return [this.start, this.end];
    return this.spans[ordinal] ?? null;
  }

  /** Engine values for groups 1..groupCount */
  rawGroups(): RawGroups {
    return this.values.slice(1);
  }

  /** Text before the match */
  before(): string {
    return this.input.slice(0, this.start);
  }

  /** Text after the match */
  after(): string {
    return this.input.slice(this.end);
  }

  toString(): string {
    return this.matched;
  }

  private ordinalOf(ref: GroupRef): number {
    const ordinal = typeof ref === "string" ? this.names.ordinalOf(ref) : ref;
    if (!Number.isInteger(ordinal) || ordinal < 0 || ordinal > this.groupCount) {
      throw new RangeError(`No group ${ordinal}`);
    }
    return ordinal;
  }
}
