// ---------------------------------------------------------------------------
// regex-slots error classes
// ---------------------------------------------------------------------------

/** Base class for every error raised by this library. */
export class RegexSlotsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegexSlotsError";
  }
}

/**
 * The pattern is not a valid regular expression.
 * `message` is the engine's own diagnostic, unchanged.
 * `offset` is null when no position could be located.
 */
export class PatternSyntaxError extends RegexSlotsError {
  readonly pattern: string;
  readonly offset: number | null;

  constructor(pattern: string, message: string, offset: number | null) {
    super(message);
    this.name = "PatternSyntaxError";
    this.pattern = pattern;
    this.offset = offset;
  }
}

/**
 * The pattern compiles, but uses syntax the scanner reads differently from
 * the engine. `offset` points at the construct when one was found; a bare
 * group-count disagreement has none.
 */
export class UnsupportedPatternError extends RegexSlotsError {
  readonly pattern: string;
  readonly reason: string;
  readonly offset: number | null;

  constructor(pattern: string, reason: string, offset: number | null = null) {
    super(`Unsupported pattern /${pattern}/: ${reason}`);
    this.name = "UnsupportedPatternError";
    this.pattern = pattern;
    this.reason = reason;
    this.offset = offset;
  }
}

/** A match disagreed with its schema. Always a defect, never user error. */
export abstract class ContractViolation extends RegexSlotsError {}

/** The engine returned a different number of group values than the schema holds. */
export class ShapeMismatch extends ContractViolation {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Unexpected number of capturing groups: schema has ${expected}, match has ${actual}`);
    this.name = "ShapeMismatch";
    this.expected = expected;
    this.actual = actual;
  }
}

/** A group classified as required did not participate in the match. */
export class RequiredGroupAbsent extends ContractViolation {
  readonly ordinal: number;

  constructor(ordinal: number) {
    super(`Required capturing group ${ordinal} did not participate in the match`);
    this.name = "RequiredGroupAbsent";
    this.ordinal = ordinal;
  }
}

export class UnknownGroupNameError extends RegexSlotsError {
  readonly groupName: string;

  constructor(groupName: string) {
    super(`No group with name <${groupName}>`);
    this.name = "UnknownGroupNameError";
    this.groupName = groupName;
  }
}

/** Match data was requested from an iterator with no current match. */
export class NoMatchDataError extends RegexSlotsError {
  constructor() {
    super("No match available");
    this.name = "NoMatchDataError";
  }
}

/** `next()` was called on an exhausted iterator. */
export class NoMoreMatchesError extends RegexSlotsError {
  constructor() {
    super("No more matches");
    this.name = "NoMoreMatchesError";
  }
}
