import { describe, expect, it } from "vitest";
import { and, eq, gt, isIn, isNil, lte, neq, not, or, related } from "./expr.js";
import { evaluateFilter, truthAnd, truthOr } from "./evaluate.js";

const post = {
  id: "p1",
  owner_id: "u1",
  score: 10,
  status: "published",
  deleted_at: null,
  created_at: new Date("2024-05-01T00:00:00.000Z"),
  author: { id: "u1", org_id: "o1" },
  tags: [{ name: "ts" }, { name: "node" }],
  editor: null,
};

describe("evaluateFilter", () => {
  it("compares scalars", () => {
    expect(evaluateFilter(eq("owner_id", "u1"), post)).toBe(true);
    expect(evaluateFilter(neq("owner_id", "u1"), post)).toBe(false);
    expect(evaluateFilter(gt("score", 5), post)).toBe(true);
    expect(evaluateFilter(lte("status", "draft"), post)).toBe(false);
    expect(evaluateFilter(gt("score", "5"), post)).toBe(false);
    expect(evaluateFilter(isIn("status", ["draft", "published"]), post)).toBe(true);
    expect(evaluateFilter(gt("created_at", "2024-01-01"), post)).toBe(true);
  });

  it("treats comparisons with a null column as unknown", () => {
    expect(evaluateFilter(eq("deleted_at", "x"), post)).toBe("unknown");
    expect(evaluateFilter(neq("deleted_at", "x"), post)).toBe("unknown");
    expect(evaluateFilter(gt("deleted_at", 1), post)).toBe("unknown");
    expect(evaluateFilter(isIn("deleted_at", ["x"]), post)).toBe("unknown");
    expect(evaluateFilter(not(eq("deleted_at", "x")), post)).toBe("unknown");
    expect(evaluateFilter(isNil("deleted_at"), post)).toBe(true);
    expect(evaluateFilter(isNil("owner_id", false), post)).toBe(true);
  });

  it("never matches a null or empty operand", () => {
    expect(evaluateFilter(eq("deleted_at", null), post)).toBe(false);
    expect(evaluateFilter(eq("owner_id", null), post)).toBe(false);
    expect(evaluateFilter(isIn("deleted_at", []), post)).toBe(false);
    expect(evaluateFilter(isIn("owner_id", [null]), post)).toBe(false);
  });

  it("is unknown when the record lacks the field", () => {
    expect(evaluateFilter(eq("org_id", "o1"), post)).toBe("unknown");
    expect(evaluateFilter(and(eq("org_id", "o1"), eq("owner_id", "u2")), post)).toBe(false);
    expect(evaluateFilter(or(eq("org_id", "o1"), eq("owner_id", "u1")), post)).toBe(true);
    expect(evaluateFilter(not(eq("org_id", "o1")), post)).toBe("unknown");
  });

  it("walks to-one and to-many relationships", () => {
    expect(evaluateFilter(related("author", eq("org_id", "o1")), post)).toBe(true);
    expect(evaluateFilter(related("tags", eq("name", "node")), post)).toBe(true);
    expect(evaluateFilter(related("tags", eq("name", "go")), post)).toBe(false);
    expect(evaluateFilter(related("editor", eq("id", "u1")), post)).toBe(false);
    expect(evaluateFilter(related("reviewer", eq("id", "u1")), post)).toBe("unknown");
  });

  it("answers relationships two-valued once related records are loaded", () => {
    const labelled = { tags: [{ name: null }] };
    expect(evaluateFilter(related("tags", eq("name", "ts")), labelled)).toBe(false);
    expect(evaluateFilter(not(related("tags", eq("name", "ts"))), labelled)).toBe(true);
    expect(evaluateFilter(related("tags", eq("slug", "ts")), labelled)).toBe("unknown");
  });
});

describe("three-valued connectives", () => {
  it("short-circuits", () => {
    let calls = 0;
    const counted = (v: boolean | "unknown") => () => {
      calls += 1;
      return v;
    };
    expect(truthAnd([counted("unknown"), counted(false), counted(true)])).toBe(false);
    expect(calls).toBe(2);
    expect(truthOr([counted("unknown"), counted(false)])).toBe("unknown");
    expect(truthOr([])).toBe(false);
    expect(truthAnd([])).toBe(true);
  });
});
