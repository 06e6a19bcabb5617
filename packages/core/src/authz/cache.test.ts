import { describe, expect, it, vi } from "vitest";
import { actor, eq } from "../filter/expr.js";
import { canonicalHash } from "../internal/canonical.js";
import { actorAttributeEquals, always, filterCheck, manualCheck, simpleCheck } from "./checks.js";
import { cachedAuthorize, createVerdictCache, verdictCacheKey } from "./cache.js";
import { definePolicySet } from "./compile.js";
import { authorizeIf, forbidIf, policy } from "./policy.js";
import type { AuthorizationRequest } from "./types.js";

const quiet = { logDecisions: false };
const request = (id: string, context: Record<string, unknown> = {}): AuthorizationRequest => ({
  actor: { id },
  action: { resource: "post", name: "read", type: "read" },
  subject: { kind: "query" },
  context,
});

describe("verdict cache", () => {
  it("evicts the least recently used entry", () => {
    const cache = createVerdictCache({ maxEntries: 2 });
    cache.set("a", { kind: "authorized" });
    cache.set("b", { kind: "authorized" });
    expect(cache.get("a")).toEqual({ kind: "authorized" });
    cache.set("c", { kind: "authorized" });
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBeDefined();
    expect(cache.size()).toBe(2);
  });

  it("keys on policy set, actor and request shape", () => {
    const set = definePolicySet({ resource: "post", action: "read", policies: [] });
    const key = verdictCacheKey(set, request("u1"));
    expect(key.startsWith(`${set.hash}:${canonicalHash({ id: "u1" })}:`)).toBe(true);
    expect(verdictCacheKey(set, request("u1"))).toBe(key);
    expect(verdictCacheKey(set, request("u2"))).not.toBe(key);
    expect(verdictCacheKey(set, request("u1", { tenant: "a" }))).not.toBe(key);
    expect(verdictCacheKey(set, request("u1"), "session-7").startsWith(`${set.hash}:session-7:`)).toBe(true);
    expect(verdictCacheKey(set, request("u1"), undefined, { manualTimeout: "defer" })).not.toBe(key);
  });

  it("tells apart requests that differ only in a date", () => {
    const set = definePolicySet({ resource: "post", action: "read", policies: [] });
    const early = verdictCacheKey(set, request("u1", { now: new Date("2020-01-01T00:00:00.000Z") }));
    const late = verdictCacheKey(set, request("u1", { now: new Date("2030-01-01T00:00:00.000Z") }));
    expect(early).not.toBe(late);
  });

  it("does not reuse a verdict once another actor attribute changes", async () => {
    const set = definePolicySet({
      resource: "post",
      action: "read",
      policies: [
        policy({
          description: "members",
          rules: [forbidIf(actorAttributeEquals("banned", true)), authorizeIf(always())],
        }),
      ],
    });
    const cache = createVerdictCache();
    const read = (banned: boolean): AuthorizationRequest => ({
      ...request("u1"),
      actor: { id: "u1", banned },
    });
    await expect(cachedAuthorize(cache, set, read(false), undefined, quiet)).resolves.toEqual({
      kind: "authorized",
    });
    await expect(cachedAuthorize(cache, set, read(true), undefined, quiet)).resolves.toMatchObject({
      kind: "forbidden",
      reason: "FORBID_CHECK",
    });
  });

  it("keys on provider context", async () => {
    let tenant = "a";
    const set = definePolicySet({
      resource: "post",
      action: "read",
      policies: [
        policy({
          description: "tenant a",
          rules: [authorizeIf(simpleCheck("tenant a", (input) => input.context.tenant === "a"))],
        }),
      ],
    });
    const cache = createVerdictCache();
    const options = { ...quiet, contextProvider: { load: () => ({ tenant }) } };
    await expect(cachedAuthorize(cache, set, request("u1"), undefined, options)).resolves.toEqual({
      kind: "authorized",
    });
    tenant = "b";
    await expect(cachedAuthorize(cache, set, request("u1"), undefined, options)).resolves.toMatchObject({
      kind: "forbidden",
      reason: "NO_AUTHORIZING_POLICY",
    });
    expect(cache.size()).toBe(2);
  });

  it("reuses decided verdicts and drops them on invalidate", async () => {
    const evaluate = vi.fn(() => true);
    const counted = definePolicySet({
      resource: "post",
      action: "read",
      policies: [
        policy({
          description: "counted",
          rules: [authorizeIf({ kind: "simple", id: "counted", description: "counted", evaluate })],
        }),
      ],
    });
    const cache = createVerdictCache();
    await cachedAuthorize(cache, counted, request("u1"), undefined, quiet);
    await cachedAuthorize(cache, counted, request("u1"), undefined, quiet);
    expect(evaluate).toHaveBeenCalledTimes(1);

    cache.invalidate(counted.hash);
    expect(cache.size()).toBe(0);
    await cachedAuthorize(cache, counted, request("u1"), undefined, quiet);
    expect(evaluate).toHaveBeenCalledTimes(2);
  });

  it("caches filter verdicts but not undecided ones", async () => {
    const cache = createVerdictCache();
    const owners = definePolicySet({
      resource: "post",
      action: "read",
      policies: [
        policy({
          description: "owners",
          rules: [authorizeIf(filterCheck(eq("owner_id", actor("id"))))],
        }),
      ],
    });
    const perRecord = definePolicySet({
      resource: "post",
      action: "read",
      policies: [
        policy({
          description: "all",
          condition: always(),
          rules: [authorizeIf(manualCheck("per record", () => true))],
        }),
      ],
    });
    await cachedAuthorize(cache, owners, request("u1"), undefined, quiet);
    expect(cache.size()).toBe(1);
    await expect(cachedAuthorize(cache, perRecord, request("u1"), undefined, quiet)).resolves.toMatchObject({
      kind: "undecided",
    });
    expect(cache.size()).toBe(1);
  });
});
