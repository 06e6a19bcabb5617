import { describe, expect, it } from "vitest";
import { eq } from "../filter/expr.js";
import { always, filterCheck, manualCheck, never } from "./checks.js";
import { assertMatchesAction, computePolicySetHash, definePolicySet } from "./compile.js";
import { ConfigError } from "./errors.js";
import { authorizeIf, forbidIf, policy } from "./policy.js";
import type { Policy, PolicySetDefinition } from "./types.js";

describe("definePolicySet", () => {
  const policies: Policy[] = [
    policy({ description: "everyone", rules: [authorizeIf(always())] }),
    policy({ description: "nobody", rules: [forbidIf(never())] }),
  ];

  it("fills in the id and a stable hash", () => {
    const first = definePolicySet({ resource: "post", action: "read", policies });
    const second = definePolicySet({ resource: "post", action: "read", policies });
    expect(first.id).toBe("post:read");
    expect(first.hash).toHaveLength(64);
    expect(second.hash).toBe(first.hash);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.policies)).toBe(true);
  });

  it("changes the hash when policies, order or base filter change", () => {
    const base = definePolicySet({ resource: "post", action: "read", policies }).hash;
    const reordered = definePolicySet({
      resource: "post",
      action: "read",
      policies: [...policies].reverse(),
    }).hash;
    const scoped = definePolicySet({
      resource: "post",
      action: "read",
      policies,
      baseFilter: eq("org_id", "org-1"),
    }).hash;
    expect(reordered).not.toBe(base);
    expect(scoped).not.toBe(base);
    expect(computePolicySetHash("post", "read", policies)).toBe(base);
  });

  it("hashes the filter behind a filter check", () => {
    const owned = (owner: string) =>
      definePolicySet({
        resource: "post",
        action: "read",
        policies: [
          policy({ description: "owner", rules: [authorizeIf(filterCheck(eq("owner_id", owner), "owner"))] }),
        ],
      }).hash;
    expect(owned("u1")).not.toBe(owned("u2"));
    expect(owned("u1")).toBe(owned("u1"));
  });

  it("keeps an explicit id and read mode", () => {
    const set = definePolicySet({
      id: "posts",
      resource: "post",
      action: "read",
      policies,
      forbiddenRead: "error",
    });
    expect(set.id).toBe("posts");
    expect(set.forbiddenRead).toBe("error");
  });

  it("rejects a policy without rules", () => {
    const empty = policy({ description: "empty", rules: [] });
    expect(() => definePolicySet({ resource: "post", action: "read", policies: [empty] })).toThrow(
      "Invalid policy set post:read: policies.0.rules: Policy has no rules",
    );
  });

  it("rejects values that are not checks", () => {
    const definition = {
      resource: "post",
      action: "read",
      policies: [
        {
          description: "bogus",
          condition: [],
          rules: [{ access: "authorize_if", check: { id: "x" } }],
        },
      ],
    };
    let caught: unknown;
    try {
      // Deliberately malformed input, as it would arrive from untyped configuration.
      definePolicySet(definition as unknown as PolicySetDefinition);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: "INVALID_POLICY_SET" });
  });

  it("rejects a manual check with a non-positive timeout", () => {
    const check = manualCheck("slow", () => true, { timeoutMs: 0 });
    expect(() =>
      definePolicySet({
        resource: "post",
        action: "read",
        policies: [policy({ description: "slow", rules: [authorizeIf(check)] })],
      }),
    ).toThrow(/Manual check slow needs a positive timeout/);
  });
});

describe("assertMatchesAction", () => {
  it("throws for a different resource or action", () => {
    const set = definePolicySet({ resource: "post", action: "read", policies: [] });
    expect(() => assertMatchesAction(set, { resource: "post", name: "read", type: "read" })).not.toThrow();
    expect(() => assertMatchesAction(set, { resource: "post", name: "update", type: "update" })).toThrow(
      "Policy set post:read governs post:read, not post:update",
    );
  });
});
