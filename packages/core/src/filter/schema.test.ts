import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { actor, and, eq, related } from "./expr.js";
import { parseFilter } from "./schema.js";

describe("parseFilter", () => {
  it("accepts filters written as data", () => {
    const expr = and(eq("owner_id", actor("id")), related("author", eq("org_id", "o1")));
    expect(parseFilter(JSON.parse(JSON.stringify(expr)))).toEqual(expr);
  });

  it("rejects unknown operators and empty paths", () => {
    expect(() => parseFilter({ op: "compare", field: "a", cmp: "like", value: "x" })).toThrow(ZodError);
    const rootless = { op: "related", path: [], where: { op: "const", value: true } };
    expect(() => parseFilter(rootless)).toThrow(ZodError);
    expect(() => parseFilter({ op: "xor", args: [] })).toThrow(ZodError);
  });
});
