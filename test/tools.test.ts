/**
 * MCP Tool Tests
 *
 * Tools are called directly with a stand-in for FastMCP's per-call context.
 * Schema compliance checks that every parameter schema converts to a JSON
 * Schema with type "object" at its root, as MCP clients require.
 */

import { describe, expect, test, vi } from "vitest";
import { z } from "zod";
import type { ToolContext } from "../src/tools/context.ts";
import { analyzePatternTool, extractGroupsTool, findAllTool } from "../src/tools/index.ts";

// ============================================================================
// HELPERS
// ============================================================================

function createContext() {
  const log = { debug: vi.fn(), error: vi.fn(), info: vi.fn(), warn: vi.fn() };
  const context: ToolContext = { log };
  return { context, log };
}

// ============================================================================
// SCHEMA COMPLIANCE
// ============================================================================

const tools = [
  { name: "analyze_pattern", schema: analyzePatternTool.parameters },
  { name: "extract_groups", schema: extractGroupsTool.parameters },
  { name: "find_all", schema: findAllTool.parameters },
] as const;

describe("MCP Schema Compliance", () => {
  for (const { name, schema } of tools) {
    describe(`${name} tool`, () => {
      test('schema has type="object" at root', () => {
        expect(z.toJSONSchema(schema).type).toBe("object");
      });

      test("schema has no oneOf/anyOf/allOf at root", () => {
        const jsonSchema = z.toJSONSchema(schema);
        expect(jsonSchema.oneOf).toBeUndefined();
        expect(jsonSchema.anyOf).toBeUndefined();
        expect(jsonSchema.allOf).toBeUndefined();
      });

      test("pattern is a required property", () => {
        const jsonSchema = z.toJSONSchema(schema);
        expect(Object.keys(jsonSchema.properties ?? {})).toContain("pattern");
        expect(jsonSchema.required).toContain("pattern");
      });
    });
  }

  test("tool names are unique", () => {
    const names = [analyzePatternTool.name, extractGroupsTool.name, findAllTool.name];
    expect(new Set(names).size).toBe(names.length);
  });

  test("parameter defaults", () => {
    expect(extractGroupsTool.parameters.parse({ pattern: "a", input: "a" })).toEqual({
      pattern: "a",
      input: "a",
      flags: "",
      mode: "full",
    });
    expect(findAllTool.parameters.parse({ pattern: "a", input: "a" }).limit).toBe(20);
    expect(() => findAllTool.parameters.parse({ pattern: "a", input: "a", limit: 0 })).toThrow();
    expect(() => analyzePatternTool.parameters.parse({ pattern: "a", flags: "g" })).toThrow();
  });
});

// ============================================================================
// analyze_pattern
// ============================================================================

describe("analyze_pattern", () => {
  test("reports each slot", async () => {
    const { context, log } = createContext();
    const result = await analyzePatternTool.execute({ pattern: "(\\d+)(?:\\.(\\d+))?" }, context);

    expect(result).toBe(
      [
        "**Schema** for `/(\\d+)(?:\\.(\\d+))?/`",
        "- Groups: 2 (1 required, 1 optional)",
        "- Shape: RO",
        "",
        "| # | Name | Kind |",
        "|---|------|------|",
        "| 1 | - | required |",
        "| 2 | - | optional |",
      ].join("\n"),
    );
    expect(log.debug).toHaveBeenCalledTimes(1);
  });

  test("shows inline and declared names", async () => {
    const { context } = createContext();
    const result = await analyzePatternTool.execute(
      { pattern: "(?<year>\\d{4})-(\\d{2})", flags: "i", group_names: ["y", "month"] },
      context,
    );

    expect(result).toBe(
      [
        "**Schema** for `/(?<year>\\d{4})-(\\d{2})/i`",
        "- Groups: 2 (2 required, 0 optional)",
        "- Shape: RR",
        "",
        "| # | Name | Kind |",
        "|---|------|------|",
        "| 1 | year | required |",
        "| 2 | month | required |",
      ].join("\n"),
    );
  });

  test("a pattern without groups has no table", async () => {
    const { context } = createContext();
    const result = await analyzePatternTool.execute({ pattern: "abc" }, context);
    expect(result).toBe(
      ["**Schema** for `/abc/`", "- Groups: 0 (0 required, 0 optional)", "- Shape: (none)"].join("\n"),
    );
  });

  test("invalid patterns are reported with their offset", async () => {
    const { context, log } = createContext();
    const result = await analyzePatternTool.execute({ pattern: "(" }, context);
    expect(result).toMatch(/^\*\*Invalid pattern\*\*: .*Unterminated group \(offset 1\)$/);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  test("unsupported patterns are reported", async () => {
    const { context } = createContext();
    const result = await analyzePatternTool.execute({ pattern: "\\Q(a)\\E" }, context);
    expect(result).toBe(
      "**Unsupported pattern**: \\Q at offset 0 is a literal Q to the engine, not a quoted run",
    );
  });
});

// ============================================================================
// extract_groups
// ============================================================================

describe("extract_groups", () => {
  test("full match with values", async () => {
    const { context } = createContext();
    const result = await extractGroupsTool.execute(
      { pattern: "(?<year>\\d{4})-(\\d{2})", input: "2024-05" },
      context,
    );

    expect(result).toBe(
      [
        "**Match** (full) of `/(?<year>\\d{4})-(\\d{2})/`",
        "",
        "| # | Name | Kind | Value |",
        "|---|------|------|-------|",
        '| 1 | year | required | "2024" |',
        '| 2 | - | required | "05" |',
      ].join("\n"),
    );
  });

  test("absent optional groups", async () => {
    const { context } = createContext();
    const result = await extractGroupsTool.execute(
      { pattern: "(\\d+)(?:\\.(\\d+))?", input: "3" },
      context,
    );
    expect(result.split("\n").slice(-2)).toEqual([
      '| 1 | - | required | "3" |',
      "| 2 | - | optional | (absent) |",
    ]);
  });

  test("find mode searches the input", async () => {
    const { context, log } = createContext();
    const full = await extractGroupsTool.execute({ pattern: "(\\d+)", input: "id 42" }, context);
    expect(full).toBe("No match.");
    expect(log.info).toHaveBeenCalledWith("extract_groups: no full match");

    const found = await extractGroupsTool.execute(
      { pattern: "(\\d+)", input: "id 42", mode: "find" },
      context,
    );
    expect(found.split("\n").at(-1)).toBe('| 1 | - | required | "42" |');
  });

  test("a pattern without groups", async () => {
    const { context } = createContext();
    const result = await extractGroupsTool.execute({ pattern: "a+", input: "aaa" }, context);
    expect(result).toBe(["**Match** (full) of `/a+/`", "- No capturing groups"].join("\n"));
  });

  test("contract violations are reported by name", async () => {
    const { context, log } = createContext();
    const result = await extractGroupsTool.execute({ pattern: "(?!(a))b", input: "b" }, context);
    expect(result).toBe(
      "**RequiredGroupAbsent**: Required capturing group 1 did not participate in the match",
    );
    expect(log.warn).toHaveBeenCalledTimes(1);
  });
});

// ============================================================================
// find_all
// ============================================================================

describe("find_all", () => {
  test("lists matches with spans and groups", async () => {
    const { context } = createContext();
    const result = await findAllTool.execute({ pattern: "(\\d)(x)?", input: "1x 2" }, context);
    expect(result).toBe(
      ["**Matches** (2)", '- [0, 2) "1x" groups: "1", "x"', '- [3, 4) "2" groups: "2", (absent)'].join(
        "\n",
      ),
    );
  });

  test("respects the limit", async () => {
    const { context } = createContext();
    const result = await findAllTool.execute({ pattern: "\\d", input: "123", limit: 2 }, context);
    expect(result).toBe(["**Matches** (2, limited to 2)", '- [0, 1) "1"', '- [1, 2) "2"'].join("\n"));
  });

  test("no matches", async () => {
    const { context } = createContext();
    expect(await findAllTool.execute({ pattern: "\\d", input: "abc" }, context)).toBe("No matches.");
  });

  test("invalid patterns", async () => {
    const { context } = createContext();
    const result = await findAllTool.execute({ pattern: "a)", input: "a" }, context);
    expect(result).toMatch(/^\*\*Invalid pattern\*\*: .*Unmatched '\)' \(offset 1\)$/);
  });
});
