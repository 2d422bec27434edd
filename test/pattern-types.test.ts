/**
 * Type-level Schema Tests
 *
 * These assertions are checked by the compiler; at run time they only
 * confirm the runtime schema agrees with the inferred tuple.
 */

import { describe, expect, expectTypeOf, test } from "vitest";
import { describeSchema, type GroupsOf, type GroupTuple, Regex } from "../src/lib/regex/index.ts";

describe("GroupsOf", () => {
  test("required groups are strings", () => {
    expectTypeOf<GroupsOf<"(\\d{4})-(\\d{2})-(\\d{2})">>().toEqualTypeOf<[string, string, string]>();
  });

  test("optional groups may be null", () => {
    expectTypeOf<GroupsOf<"(\\d+)(?:\\.(\\d+))?">>().toEqualTypeOf<[string, string | null]>();
    expectTypeOf<GroupsOf<"(a)|(b)">>().toEqualTypeOf<[string | null, string | null]>();
    expectTypeOf<GroupsOf<"((foo)|(bar))*">>().toEqualTypeOf<
      [string | null, string | null, string | null]
    >();
  });

  test("non-capturing groups, lookarounds and escapes add nothing", () => {
    expectTypeOf<GroupsOf<"(?:a)(?=b)(?<!c)\\(x\\)">>().toEqualTypeOf<[]>();
    expectTypeOf<GroupsOf<"[(](a)[)]">>().toEqualTypeOf<[string]>();
  });

  test("named groups count", () => {
    expectTypeOf<GroupsOf<"(?<year>\\d{4})-(\\d{2})?">>().toEqualTypeOf<[string, string | null]>();
  });

  test("alternation inside a group", () => {
    expectTypeOf<GroupsOf<"(a|b)(c)">>().toEqualTypeOf<[string, string]>();
    expectTypeOf<GroupsOf<"(bc+d$|ef*g.|h?i(j|k))">>().toEqualTypeOf<[string, string | null]>();
  });

  test("a non-literal source falls back to the general tuple", () => {
    expectTypeOf<GroupsOf<string>>().toEqualTypeOf<GroupTuple>();
  });
});

describe("Regex.compile", () => {
  test("types extract from the literal", () => {
    const decimal = Regex.compile("(\\d+)(?:\\.(\\d+))?");
    const values = decimal.extract("2.5");
    expectTypeOf(values).toEqualTypeOf<[string, string | null] | null>();

    expect(describeSchema(decimal.schema)).toBe("RO");
    if (values !== null) {
      const [whole, fraction] = values;
      expect(whole.length + (fraction?.length ?? 0)).toBe(2);
    }
  });

  test("the constructor keeps the general tuple", () => {
    const regex = new Regex("(a)");
    expectTypeOf(regex.extract("a")).toEqualTypeOf<GroupTuple | null>();
  });
});
