import { describe, it, expect } from "vitest";
import { always, never } from "./checks.js";
import {
  authorizeIf,
  authorizeUnless,
  forbidIf,
  forbidUnless,
  isAuthorizeRule,
  isNegated,
  policy,
} from "./policy.js";

describe("authz/policy", () => {
  it("builds frozen policies from a single condition or a list", () => {
    const single = policy({ description: "one", condition: always(), rules: [authorizeIf(always())] });
    const none = policy({ description: "none", rules: [forbidIf(never())] });
    expect(single.condition).toHaveLength(1);
    expect(none.condition).toEqual([]);
    expect(Object.isFrozen(single)).toBe(true);
    expect(Object.isFrozen(single.rules)).toBe(true);
  });

  it("classifies access types", () => {
    expect([authorizeIf, authorizeUnless, forbidIf, forbidUnless].map((r) => r(always()).access)).toEqual([
      "authorize_if",
      "authorize_unless",
      "forbid_if",
      "forbid_unless",
    ]);
    expect(isAuthorizeRule("authorize_unless")).toBe(true);
    expect(isAuthorizeRule("forbid_if")).toBe(false);
    expect(isNegated("forbid_unless")).toBe(true);
    expect(isNegated("authorize_if")).toBe(false);
  });
});
