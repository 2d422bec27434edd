import { PatternSyntaxError, RegexSlotsError, UnsupportedPatternError } from "../lib/regex/errors.ts";
import type { Schema } from "../lib/regex/types.ts";
import type { GroupNames } from "../lib/regex/names.ts";

/** Display a group value: quoted text, or (absent) */
export function formatValue(value: string | null): string {
  return value === null ? "(absent)" : JSON.stringify(value);
}

/** Markdown table of a schema's slots, optionally with one value per slot */
export function formatSlotTable(
  schema: Schema,
  names: GroupNames,
  values?: ReadonlyArray<string | null>,
): string[] {
  const lines = values !== undefined
    ? ["| # | Name | Kind | Value |", "|---|------|------|-------|"]
    : ["| # | Name | Kind |", "|---|------|------|"];

  for (const slot of schema.slots) {
    const name = names.nameOf(slot.ordinal) ?? "-";
    const row = `| ${slot.ordinal} | ${name} | ${slot.kind} |`;
    lines.push(values !== undefined ? `${row} ${formatValue(values[slot.ordinal - 1] ?? null)} |` : row);
  }

  return lines;
}

/**
 * Readable reply for a library error. Anything that is not a library error
 * is rethrown for FastMCP to report.
 */
export function formatError(error: unknown): string {
  if (error instanceof PatternSyntaxError) {
    const where = error.offset === null ? "" : ` (offset ${error.offset})`;
    return `**Invalid pattern**: ${error.message}${where}`;
  }
  if (error instanceof UnsupportedPatternError) {
    return `**Unsupported pattern**: ${error.reason}`;
  }
  if (error instanceof RegexSlotsError) {
    return `**${error.name}**: ${error.message}`;
  }
  throw error;
}
