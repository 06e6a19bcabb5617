import { canonicalHash } from "../internal/canonical.js";
import { authorize } from "./engine.js";
import type { EngineOptions } from "./options.js";
import type { AuthorizationRequest, PolicySet, Verdict } from "./types.js";

export type VerdictCache = {
  get(key: string): Verdict | undefined;
  set(key: string, verdict: Verdict): void;
  /** Drops every entry computed from the policy set with this hash. */
  invalidate(policySetHash: string): void;
  clear(): void;
  size(): number;
};

/** Least-recently-used map of verdicts. Callers own it; the engine never caches on its own. */
export function createVerdictCache(opts: { maxEntries?: number } = {}): VerdictCache {
  const maxEntries = Math.max(1, opts.maxEntries ?? 1_000);
  const entries = new Map<string, Verdict>();

  return {
    get(key) {
      const cached = entries.get(key);
      if (cached === undefined) return undefined;
      entries.delete(key);
      entries.set(key, cached);
      return cached;
    },
    set(key, verdict) {
      entries.delete(key);
      entries.set(key, verdict);
      while (entries.size > maxEntries) {
        const oldest = entries.keys().next();
        if (oldest.done) break;
        entries.delete(oldest.value);
      }
    },
    invalidate(policySetHash) {
      const prefix = `${policySetHash}:`;
      for (const key of Array.from(entries.keys())) {
        if (key.startsWith(prefix)) entries.delete(key);
      }
    },
    clear() {
      entries.clear();
    },
    size() {
      return entries.size;
    },
  };
}

/**
 * `(policy set hash, actor identity, request shape, engine options)`. The identity defaults to a
 * hash of the whole actor; pass `identity` only when it changes whenever any actor attribute a
 * check reads changes (a session version, for instance).
 */
export function verdictCacheKey(
  policySet: PolicySet,
  request: AuthorizationRequest,
  identity?: string,
  options: EngineOptions = {},
): string {
  const who = identity ?? canonicalHash(request.actor ?? null);
  const shape = canonicalHash({
    action: request.action,
    subject: request.subject,
    context: request.context ?? {},
    arguments: request.arguments ?? {},
    options: {
      checkTimeoutMs: options.checkTimeoutMs ?? null,
      manualTimeout: options.manualTimeout ?? null,
      unknownCondition: options.unknownCondition ?? null,
      onCheckError: options.onCheckError ?? null,
      translator: options.translator?.name ?? null,
    },
  });
  return `${policySet.hash}:${who}:${shape}`;
}

/**
 * Provider context is loaded before the lookup and folded into the request, so the key sees it
 * and the engine does not load it a second time.
 */
export async function cachedAuthorize(
  cache: VerdictCache,
  policySet: PolicySet,
  request: AuthorizationRequest,
  identity?: string,
  options: EngineOptions = {},
): Promise<Verdict> {
  const { contextProvider, ...rest } = options;
  const extra = contextProvider ? await contextProvider.load(request) : {};
  const effective: AuthorizationRequest = contextProvider
    ? { ...request, context: { ...(request.context ?? {}), ...extra } }
    : request;
  const key = verdictCacheKey(policySet, effective, identity, rest);
  const cached = cache.get(key);
  if (cached) return cached;
  const verdict = await authorize(policySet, effective, rest);
  // Undecided verdicts depend on records not yet seen.
  if (verdict.kind !== "undecided") cache.set(key, verdict);
  return verdict;
}
