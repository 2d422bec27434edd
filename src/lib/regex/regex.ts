/**
 * Regex - a compiled pattern with a Schema for its capturing groups
 *
 * Registration compiles the pattern once and derives its Schema once (through
 * the schema cache). `extract` then hands back the group values as a tuple
 * whose shape the Schema guarantees: `string` for required groups,
 * `string | null` for optional ones.
 *
 * `Regex.compile` on a string literal also types that tuple:
 *   Regex.compile("(\\d+)(?:\\.(\\d+))?")  // Regex<[string, string | null]>
 */

import { z } from "zod";
import { schemaCache } from "../schema-cache.ts";
import { type CompiledPattern, compilePattern, instantiate } from "./engine.ts";
import { assertGroups, toGroupTuple } from "./extractor.ts";
import { Match } from "./match.ts";
import { MatchIterator } from "./match-iterator.ts";
import { GroupNames } from "./names.ts";
import type { GroupsOf } from "./pattern-types.ts";
import { quote, quoteReplacement } from "./quote.ts";
import type { GroupTuple, MatchMode, RawGroups, Schema } from "./types.ts";

export const RegexOptionsSchema = z.object({
  flags: z
    .string()
    .regex(/^[imsuv]*$/, "Supported flags are i, m, s, u and v; g, y and d are managed internally")
    .default(""),
  groupNames: z.array(z.string().min(1)).default([]),
  unanchored: z.boolean().default(false),
});

export type RegexOptions = z.input<typeof RegexOptionsSchema>;

export class Regex<G extends GroupTuple = GroupTuple> {
  readonly source: string;
  /** Normalized user flags */
  readonly flags: string;
  readonly schema: Schema;
  readonly names: GroupNames;
  /** When true, `extract` and `matches` search instead of matching the whole input */
  readonly isUnanchored: boolean;

  private readonly compiled: CompiledPattern;
  private readonly declaredNames: readonly string[];

  constructor(source: string, options: RegexOptions = {}) {
    const parsed = RegexOptionsSchema.parse(options);

    this.compiled = compilePattern(source, parsed.flags);
    this.source = source;
    this.flags = this.compiled.flags;
    this.schema = schemaCache.get(source, this.flags);
    this.declaredNames = parsed.groupNames;
    this.names = new GroupNames(this.schema, parsed.groupNames);
    this.isUnanchored = parsed.unanchored;
  }

  /** Like the constructor, with the extraction tuple typed from the literal */
  static compile<R extends string>(source: R, options?: RegexOptions): Regex<GroupsOf<R>> {
    return new Regex<GroupsOf<R>>(source, options);
  }

  static quote = quote;
  static quoteReplacement = quoteReplacement;

  /** All group values of a match, or null when the pattern has no groups */
  static groups(match: Match): Array<string | null> | null {
    if (match.groupCount === 0) return null;
    return toGroupTuple(match.rawGroups());
  }

  // ===========================================================================
  // EXTRACTION
  // ===========================================================================

  /**
   * Group values when `input` matches (the whole input, or anywhere when
   * unanchored), null otherwise.
   * Throws a ContractViolation if the match disagrees with the schema.
   */
  extract(input: string): G | null {
    const match = this.run(this.isUnanchored ? "find" : "full", input);
    return match ? this.shape(match.rawGroups()) : null;
  }

  /**
   * Group values of an existing match. A match from this same pattern is
   * read directly; any other match has its matched text re-checked.
   */
  extractMatch(match: Match): G | null {
    if (match.origin.source === this.source && match.origin.flags === this.flags) {
      return this.shape(match.rawGroups());
    }
    return this.extract(match.matched);
  }

  // ===========================================================================
  // MATCHING
  // ===========================================================================

  matches(input: string): boolean {
    return this.run(this.isUnanchored ? "find" : "full", input) !== null;
  }

  findFirstIn(input: string): string | null {
    return this.run("find", input)?.matched ?? null;
  }

  findFirstMatchIn(input: string): Match | null {
    return this.run("find", input);
  }

  /** Matched text when the pattern matches at the start of `input` */
  findPrefixOf(input: string): string | null {
    return this.run("prefix", input)?.matched ?? null;
  }

  findPrefixMatchOf(input: string): Match | null {
    return this.run("prefix", input);
  }

  findAllIn(input: string): MatchIterator {
    return new MatchIterator(input, this.compiled, this.names);
  }

  findAllMatchIn(input: string): IterableIterator<Match> {
    return this.findAllIn(input).matchData();
  }

  // ===========================================================================
  // REPLACING & SPLITTING
  // ===========================================================================

  /**
   * Replace every match. A string uses the engine's replacement syntax
   * (`$1`, `$<name>`, `$&`, `$$`); a function's result is inserted as is.
   */
  replaceAllIn(target: string, replacement: string | ((match: Match) => string)): string {
    if (typeof replacement === "string") {
      return target.replace(instantiate(this.compiled, "global"), replacement);
    }
    return this.replaceSomeIn(target, replacement);
  }

  /** Replace the matches for which `replacer` returns a string; keep the rest */
  replaceSomeIn(target: string, replacer: (match: Match) => string | null): string {
    const parts: string[] = [];
    let last = 0;

    for (const match of this.findAllMatchIn(target)) {
      parts.push(target.slice(last, match.start), replacer(match) ?? match.matched);
      last = match.end;
    }

    parts.push(target.slice(last));
    return parts.join("");
  }

  replaceFirstIn(target: string, replacement: string): string {
    return target.replace(instantiate(this.compiled, "find"), replacement);
  }

  /**
   * Pieces of `input` between matches. Group values are not included.
   * A zero-width match at index 0 yields no leading empty piece and
   * trailing empty pieces are dropped. When no match splits the input, the
   * result is [input], even for an empty input.
   */
  split(input: string): string[] {
    const pieces: string[] = [];
    let last = 0;

    for (const match of this.findAllMatchIn(input)) {
      if (match.end === 0) continue;
      pieces.push(input.slice(last, match.start));
      last = match.end;
    }

    if (pieces.length === 0) return [input];

    pieces.push(input.slice(last));
    while (pieces.length > 0 && pieces[pieces.length - 1] === "") {
      pieces.pop();
    }
    return pieces;
  }

  // ===========================================================================
  // ANCHORING
  // ===========================================================================

  /** Same pattern; `extract` and `matches` find a match anywhere */
  unanchored(): Regex<G> {
    if (this.isUnanchored) return this;
    return new Regex<G>(this.source, this.optionsWith(true));
  }

  /** Same pattern; `extract` and `matches` require the whole input */
  anchored(): Regex<G> {
    if (!this.isUnanchored) return this;
    return new Regex<G>(this.source, this.optionsWith(false));
  }

  toString(): string {
    return this.source;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private run(mode: MatchMode, input: string): Match | null {
    const exec = instantiate(this.compiled, mode).exec(input);
    return exec ? new Match(input, exec, this.names, this.compiled) : null;
  }

  private shape(raw: RawGroups): G {
    const values = toGroupTuple(raw);
    assertGroups<G>(this.schema, values);
    return values;
  }

  private optionsWith(unanchored: boolean): RegexOptions {
    return { flags: this.flags, groupNames: [...this.declaredNames], unanchored };
  }
}
