import { z } from "zod";
import { describeSchema, requiredOrdinals } from "../lib/regex/analyzer.ts";
import { Regex } from "../lib/regex/regex.ts";
import type { ToolContext } from "./context.ts";
import { formatError, formatSlotTable } from "./format.ts";

export const FlagsParameter = z
  .string()
  .regex(/^[imsuv]*$/)
  .default("")
  .describe("Pattern flags: any of i, m, s, u, v");

/**
 * Derive the group schema of a pattern without matching anything
 */
export const analyzePatternTool = {
  name: "analyze_pattern",
  description: `Report the capturing groups of a regular expression and whether each is
required (always present when the pattern matches) or optional (may be absent).

Optional groups sit in an alternation branch or inside a construct quantified with
?, * or {0,...}. Invalid patterns are reported with the engine's own message.`,

  parameters: z.object({
    pattern: z.string().describe("Regular expression source, without delimiters"),
    flags: FlagsParameter,
    group_names: z
      .array(z.string().min(1))
      .optional()
      .describe("Names for groups by position, used where the pattern has no inline name"),
  }),

  execute: async (
    args: { pattern: string; flags?: string; group_names?: string[] },
    { log }: ToolContext,
  ): Promise<string> => {
    log.debug(`analyze_pattern /${args.pattern}/${args.flags ?? ""}`);

    let regex: Regex;
    try {
      regex = new Regex(args.pattern, { flags: args.flags ?? "", groupNames: args.group_names ?? [] });
    } catch (error) {
      log.warn(`analyze_pattern rejected /${args.pattern}/`);
      return formatError(error);
    }

    const { schema } = regex;
    const required = requiredOrdinals(schema).length;

    const lines = [
      `**Schema** for \`/${regex.source}/${regex.flags}\``,
      `- Groups: ${schema.count} (${required} required, ${schema.count - required} optional)`,
      `- Shape: ${describeSchema(schema) || "(none)"}`,
    ];

    if (schema.count > 0) {
      lines.push("", ...formatSlotTable(schema, regex.names));
    }

    return lines.join("\n");
  },
};
