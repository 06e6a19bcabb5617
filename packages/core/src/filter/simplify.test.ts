import { describe, expect, it } from "vitest";
import { FALSE, TRUE, and, eq, gt, isIn, not, or, related } from "./expr.js";
import { simplify } from "./simplify.js";

describe("simplify", () => {
  it("folds constants through connectives", () => {
    expect(simplify(and(TRUE, eq("a", 1)))).toEqual(eq("a", 1));
    expect(simplify(and(eq("a", 1), FALSE))).toEqual(FALSE);
    expect(simplify(or(eq("a", 1), TRUE))).toEqual(TRUE);
    expect(simplify(or())).toEqual(FALSE);
    expect(simplify(not(not(gt("a", 1))))).toEqual(gt("a", 1));
    expect(simplify(not(TRUE))).toEqual(FALSE);
    expect(simplify(related("author", and(eq("a", 1), FALSE)))).toEqual(FALSE);
  });

  it("flattens and dedupes", () => {
    expect(simplify(and(gt("a", 1), and(gt("b", 2), gt("a", 1))))).toEqual(and(gt("a", 1), gt("b", 2)));
  });

  it("merges equalities on one field", () => {
    expect(simplify(or(eq("status", "draft"), eq("status", "published")))).toEqual(
      isIn("status", ["draft", "published"]),
    );
    expect(simplify(and(isIn("status", ["draft", "published"]), eq("status", "draft")))).toEqual(
      eq("status", "draft"),
    );
    expect(simplify(and(eq("owner_id", "u1"), eq("owner_id", "u2")))).toEqual(FALSE);
  });

  it("keeps conflicting equalities under negation", () => {
    const conflict = and(eq("owner_id", "u1"), eq("owner_id", "u2"));
    expect(simplify(not(conflict))).toEqual(not(conflict));
    expect(simplify(not(not(conflict)))).toEqual(FALSE);
    expect(simplify(not(related("author", conflict)))).toEqual(TRUE);
  });

  it("leaves null equalities alone", () => {
    expect(simplify(and(eq("owner_id", null), eq("owner_id", "u1")))).toEqual(
      and(eq("owner_id", null), eq("owner_id", "u1")),
    );
  });

  it("normalizes membership lists", () => {
    expect(simplify(isIn("id", []))).toEqual(FALSE);
    expect(simplify(isIn("id", ["p1"]))).toEqual(eq("id", "p1"));
  });
});
