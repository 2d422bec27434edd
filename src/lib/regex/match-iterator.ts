/**
 * Iteration over successive non-overlapping matches
 *
 * The iterator owns its own global RegExp, so several iterators over one
 * Regex never share `lastIndex`. Group data refers to the most recent match:
 * after `next()`, or after a `hasNext()` that found one.
 */

import { type CompiledPattern, instantiate } from "./engine.ts";
import { NoMatchDataError, NoMoreMatchesError } from "./errors.ts";
import { type GroupRef, Match } from "./match.ts";
import type { GroupNames } from "./names.ts";

type IteratorState =
  | "pending" // nothing looked up since the last next()
  | "found" // a match is waiting to be returned by next()
  | "consumed" // next() returned the current match
  | "done";

export class MatchIterator implements IterableIterator<string> {
  private readonly engine: RegExp;
  private state: IteratorState = "pending";
  private current: Match | null = null;

  constructor(
    readonly input: string,
    private readonly compiled: CompiledPattern,
    private readonly names: GroupNames,
  ) {
    this.engine = instantiate(compiled, "global");
  }

  hasNext(): boolean {
    if (this.state === "pending" || this.state === "consumed") {
      this.advance();
    }
    return this.state === "found";
  }

  /** Matched text of the next match */
  next(): IteratorResult<string> {
    if (!this.hasNext() || this.current === null) {
      return { done: true, value: undefined };
    }
    this.state = "consumed";
    return { done: false, value: this.current.matched };
  }

  /** Like next(), but throws NoMoreMatchesError at the end */
  nextMatched(): string {
    const result = this.next();
    if (result.done) {
      throw new NoMoreMatchesError();
    }
    return result.value;
  }

  [Symbol.iterator](): IterableIterator<string> {
    return this;
  }

  // ---------------------------------------------------------------------------
  // Current match data
  // ---------------------------------------------------------------------------

  get start(): number {
    return this.ensure().start;
  }

  get end(): number {
    return this.ensure().end;
  }

  get groupCount(): number {
    return this.ensure().groupCount;
  }

  group(ref: GroupRef = 0): string | null {
    return this.ensure().group(ref);
  }

  span(ref: GroupRef = 0): readonly [number, number] | null {
    return this.ensure().span(ref);
  }

  /** Remaining matches as Match objects */
  *matchData(): IterableIterator<Match> {
    while (this.hasNext()) {
      this.state = "consumed";
      if (this.current !== null) {
        yield this.current;
      }
    }
  }

  private ensure(): Match {
    if (this.state === "pending") {
      this.advance();
    }
    if (this.state === "done" || this.current === null) {
      throw new NoMatchDataError();
    }
    return this.current;
  }

  private advance(): void {
    const exec = this.engine.exec(this.input);

    if (exec === null) {
      this.state = "done";
      this.current = null;
      return;
    }

    // Step past empty matches so the scan always moves forward
    if (exec[0].length === 0) {
      this.engine.lastIndex = nextIndex(this.input, exec.index, this.compiled.flags);
    }

    this.current = new Match(this.input, exec, this.names, this.compiled);
    this.state = "found";
  }
}

/** Index after `index`, stepping over a surrogate pair in unicode mode */
export function nextIndex(input: string, index: number, flags: string): number {
  const unicode = flags.includes("u") || flags.includes("v");
  if (unicode && index < input.length - 1) {
    const code = input.charCodeAt(index);
    if (code >= 0xd800 && code <= 0xdbff) {
      const low = input.charCodeAt(index + 1);
      if (low >= 0xdc00 && low <= 0xdfff) return index + 2;
    }
  }
  return index + 1;
}
