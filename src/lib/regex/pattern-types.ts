/**
 * Type-level Schema
 *
 * The same scan as analyzer.ts, run by the compiler over a string literal.
 * Each helper consumes a suffix of the pattern instead of a position, and
 * counters are tuples. `GroupsOf<"(\\d+)(?:\\.(\\d+))?">` is
 * `[string, string | null]`; a non-literal `string` falls back to GroupTuple.
 *
 * Every recursive call sits in tail position, so patterns up to the
 * compiler's tail-recursion limit (1000 steps) are supported.
 */

import type { GroupTuple } from "./types.ts";

type Inc<N extends unknown[]> = [...N, unknown];
type Dec<N extends unknown[]> = N extends [unknown, ...infer Rest extends unknown[]] ? Rest : [];

/** Suffix after the first character */
type Tail<S> = S extends `${infer _Head}${infer Rest}` ? Rest : "";

// =============================================================================
// CURSOR PRIMITIVES
// =============================================================================

/** S starts just after `\Q` */
type SkipQuoted<S> = S extends `\\E${infer Rest}`
  ? Rest
  : S extends `\\${infer Rest}`
    ? SkipQuoted<Tail<Rest>>
    : S extends `${infer _Head}${infer Rest}`
      ? SkipQuoted<Rest>
      : "";

/** S starts just after a backslash */
type SkipEscape<S> = S extends `Q${infer Rest}` ? SkipQuoted<Rest> : Tail<S>;

/** S starts just after `[` */
type SkipBracket<S, Depth extends unknown[] = []> = S extends `\\${infer Rest}`
  ? SkipBracket<SkipEscape<Rest>, Depth>
  : S extends `[${infer Rest}`
    ? SkipBracket<Rest, Inc<Depth>>
    : S extends `]${infer Rest}`
      ? Depth extends []
        ? Rest
        : SkipBracket<Rest, Dec<Depth>>
      : S extends `${infer _Head}${infer Rest}`
        ? SkipBracket<Rest, Depth>
        : "";

/** S starts just after `(` */
type SkipParen<S, Depth extends unknown[] = []> = S extends `\\${infer Rest}`
  ? SkipParen<SkipEscape<Rest>, Depth>
  : S extends `[${infer Rest}`
    ? SkipParen<SkipBracket<Rest>, Depth>
    : S extends `(${infer Rest}`
      ? SkipParen<Rest, Inc<Depth>>
      : S extends `)${infer Rest}`
        ? Depth extends []
          ? Rest
          : SkipParen<Rest, Dec<Depth>>
        : S extends `${infer _Head}${infer Rest}`
          ? SkipParen<Rest, Depth>
          : "";

// =============================================================================
// LOOKAHEAD & CLASSIFICATION
// =============================================================================

type HasAlternation<S> = S extends `\\${infer Rest}`
  ? HasAlternation<SkipEscape<Rest>>
  : S extends `[${infer Rest}`
    ? HasAlternation<SkipBracket<Rest>>
    : S extends `(${infer Rest}`
      ? HasAlternation<SkipParen<Rest>>
      : S extends `|${string}`
        ? true
        : S extends `)${string}`
          ? false
          : S extends `${infer _Head}${infer Rest}`
            ? HasAlternation<Rest>
            : false;

/** S starts just after `(` */
type IsCapturing<S> = S extends `?<=${string}` | `?<!${string}`
  ? false
  : S extends `?<${string}`
    ? true
    : S extends `?${string}`
      ? false
      : true;

/** S starts just after `)` */
type IsZeroQuantified<S> = S extends `?${string}` | `*${string}` | `{0${string}`
  ? true
  : false;

type Fields = Array<string | null>;

type Push<Acc extends Fields, Capturing, Field extends string | null> = Capturing extends true
  ? [...Acc, Field]
  : Acc;

type DepthFor<Flag> = Flag extends true ? [unknown] : [];

// =============================================================================
// STRUCTURE ANALYZER
// =============================================================================

type Analyze<S, Depth extends unknown[], Acc extends Fields> = S extends `\\${infer Rest}`
  ? Analyze<SkipEscape<Rest>, Depth, Acc>
  : S extends `[${infer Rest}`
    ? Analyze<SkipBracket<Rest>, Depth, Acc>
    : S extends `)${infer Rest}`
      ? Analyze<Rest, Dec<Depth>, Acc>
      : S extends `(${infer Rest}`
        ? Depth extends []
          ? IsZeroQuantified<SkipParen<Rest>> extends true
            ? Analyze<Rest, [unknown], Push<Acc, IsCapturing<Rest>, string | null>>
            : Analyze<Rest, DepthFor<HasAlternation<Rest>>, Push<Acc, IsCapturing<Rest>, string>>
          : Analyze<Rest, Inc<Depth>, Push<Acc, IsCapturing<Rest>, string | null>>
        : S extends `${infer _Head}${infer Rest}`
          ? Analyze<Rest, Depth, Acc>
          : Acc;

/** Extraction tuple for pattern source `R` */
export type GroupsOf<R extends string> = string extends R
  ? GroupTuple
  : Analyze<R, DepthFor<HasAlternation<R>>, []> extends infer G extends GroupTuple
    ? G
    : GroupTuple;
