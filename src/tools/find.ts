import { z } from "zod";
import { Regex } from "../lib/regex/regex.ts";
import { FlagsParameter } from "./analyze.ts";
import type { ToolContext } from "./context.ts";
import { formatError, formatValue } from "./format.ts";

/**
 * List successive matches of a pattern in an input
 */
export const findAllTool = {
  name: "find_all",
  description: "List the non-overlapping matches of a regular expression in an input, with their spans and groups",

  parameters: z.object({
    pattern: z.string().describe("Regular expression source, without delimiters"),
    input: z.string().describe("Text to search"),
    flags: FlagsParameter,
    limit: z.number().int().min(1).max(1000).default(20).describe("Maximum number of matches listed"),
  }),

  execute: async (
    args: { pattern: string; input: string; flags?: string; limit?: number },
    { log }: ToolContext,
  ): Promise<string> => {
    const limit = args.limit ?? 20;

    let regex: Regex;
    try {
      regex = new Regex(args.pattern, { flags: args.flags ?? "" });
    } catch (error) {
      log.warn(`find_all rejected /${args.pattern}/`);
      return formatError(error);
    }

    const lines: string[] = [];
    let truncated = false;

    for (const match of regex.findAllMatchIn(args.input)) {
      if (lines.length === limit) {
        truncated = true;
        break;
      }
      const groups = Regex.groups(match);
      const suffix = groups === null ? "" : ` groups: ${groups.map(formatValue).join(", ")}`;
      lines.push(`- [${match.start}, ${match.end}) ${JSON.stringify(match.matched)}${suffix}`);
    }

    if (lines.length === 0) {
      return "No matches.";
    }

    log.debug(`find_all listed ${lines.length} match(es)`);
    const header = `**Matches** (${lines.length}${truncated ? `, limited to ${limit}` : ""})`;
    return [header, ...lines].join("\n");
  },
};
