import { describe, expect, it } from "vitest";
import { seedPosts } from "@arbiter/testkit-fixtures";
import { actor, eq } from "../filter/expr.js";
import { createMemoryExecutor } from "../storage/memory.js";
import { always, filterCheck } from "./checks.js";
import { definePolicySet } from "./compile.js";
import { ConfigError } from "./errors.js";
import { authorizeIf, policy } from "./policy.js";
import { createPolicyEngine } from "./policy-engine.js";
import { createPolicyRegistry } from "./registry.js";
import type { AuthorizationRequest } from "./types.js";

const readPosts = definePolicySet({
  resource: "post",
  action: "read",
  policies: [
    policy({ description: "owners", rules: [authorizeIf(filterCheck(eq("owner_id", actor("id"))))] }),
  ],
});
const createPosts = definePolicySet({
  resource: "post",
  action: "create",
  policies: [policy({ description: "anyone", rules: [authorizeIf(always())] })],
});

const read: AuthorizationRequest = {
  actor: { id: "u2" },
  action: { resource: "post", name: "read", type: "read" },
  subject: { kind: "query" },
};

describe("createPolicyRegistry", () => {
  it("looks sets up by resource and action", () => {
    const registry = createPolicyRegistry([readPosts, createPosts]);
    expect(registry.get("post", "read")).toBe(readPosts);
    expect(registry.resolve(read.action)).toBe(readPosts);
    expect(registry.keys()).toEqual(["post:read", "post:create"]);
  });

  it("rejects two sets for the same action", () => {
    const again = definePolicySet({ id: "posts-again", resource: "post", action: "read", policies: [] });
    expect(() => createPolicyRegistry([readPosts, again])).toThrow(ConfigError);
    expect(() => createPolicyRegistry([readPosts, again])).toThrow(
      "Policy sets post:read and posts-again both govern post:read",
    );
  });

  it("resolves unknown actions to an empty set", () => {
    const registry = createPolicyRegistry([readPosts]);
    const fallback = registry.resolve({ resource: "comment", name: "read", type: "read" });
    expect(fallback.policies).toEqual([]);
    expect(registry.resolve({ resource: "comment", name: "read", type: "read" })).toBe(fallback);
    expect(registry.get("comment", "read")).toBeUndefined();
  });
});

describe("createPolicyEngine", () => {
  const engine = createPolicyEngine({
    registry: createPolicyRegistry([readPosts, createPosts]),
    logDecisions: false,
  });

  it("authorizes through the registry", async () => {
    await expect(engine.authorize(null, read)).resolves.toEqual({
      kind: "filterRequired",
      filter: { op: "compare", field: "owner_id", cmp: "eq", value: "u2" },
    });
    await expect(
      engine.authorize(null, { ...read, action: { resource: "comment", name: "read", type: "read" } }),
    ).resolves.toEqual({ kind: "forbidden", reason: "NO_POLICIES" });
  });

  it("reads and writes with bound options", async () => {
    const executor = createMemoryExecutor(seedPosts());
    const result = await engine.authorizeRead({ request: read, executor, query: executor.query() });
    expect(result.records.map((p) => p.id)).toEqual(["p2"]);

    await expect(
      engine.authorizeWrite({
        request: {
          actor: { id: "u2" },
          action: { resource: "post", name: "create", type: "create" },
          subject: { kind: "changeset", data: { title: "Hello" } },
        },
      }),
    ).resolves.toEqual({ kind: "authorized" });
  });

  it("needs a set when it has no registry", async () => {
    const bare = createPolicyEngine({ logDecisions: false });
    await expect(bare.filterFor(null, read)).rejects.toMatchObject({ code: "NO_REGISTRY" });
    await expect(bare.filterFor(readPosts, read)).resolves.toEqual({
      op: "compare",
      field: "owner_id",
      cmp: "eq",
      value: "u2",
    });
  });
});
