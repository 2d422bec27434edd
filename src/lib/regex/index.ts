/**
 * Regex module barrel export
 * Re-exports the analyzer, extractor, engine adapter and the Regex API
 */

export * from "./alternation.ts";
export * from "./analyzer.ts";
export * from "./cursor.ts";
export * from "./engine.ts";
export * from "./errors.ts";
export * from "./extractor.ts";
export * from "./groups.ts";
export * from "./match.ts";
export * from "./match-iterator.ts";
export * from "./names.ts";
export * from "./pattern-types.ts";
export * from "./quote.ts";
export * from "./regex.ts";
export * from "./types.ts";
