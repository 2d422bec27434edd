import { z } from "zod";
import { Regex } from "../lib/regex/regex.ts";
import { FlagsParameter } from "./analyze.ts";
import type { ToolContext } from "./context.ts";
import { formatError, formatSlotTable } from "./format.ts";

/**
 * Match one input and return its groups checked against the schema
 */
export const extractGroupsTool = {
  name: "extract_groups",
  description: `Match a regular expression against an input and return the capturing groups,
each marked required or optional. Absent optional groups are shown as (absent).

mode "full" requires the whole input to match; "find" takes the first match anywhere.`,

  parameters: z.object({
    pattern: z.string().describe("Regular expression source, without delimiters"),
    input: z.string().describe("Text to match"),
    flags: FlagsParameter,
    mode: z.enum(["full", "find"]).default("full").describe("Whole-input match or first match"),
  }),

  execute: async (
    args: { pattern: string; input: string; flags?: string; mode?: "full" | "find" },
    { log }: ToolContext,
  ): Promise<string> => {
    const mode = args.mode ?? "full";

    try {
      const regex = new Regex(args.pattern, { flags: args.flags ?? "", unanchored: mode === "find" });
      const values = regex.extract(args.input);

      if (values === null) {
        log.info(`extract_groups: no ${mode} match`);
        return "No match.";
      }

      const lines = [`**Match** (${mode}) of \`/${regex.source}/${regex.flags}\``];
      if (regex.schema.count === 0) {
        lines.push("- No capturing groups");
      } else {
        lines.push("", ...formatSlotTable(regex.schema, regex.names, values));
      }
      return lines.join("\n");
    } catch (error) {
      log.warn(`extract_groups failed for /${args.pattern}/`);
      return formatError(error);
    }
  },
};
