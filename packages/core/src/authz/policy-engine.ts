import type { RecordLike } from "../filter/evaluate.js";
import type { FilterExpr } from "../filter/expr.js";
import type { StorageFilterExecutor } from "../storage/types.js";
import { authorizeRead, authorizeWrite, type ReadResult } from "./apply.js";
import { authorize, filterFor } from "./engine.js";
import { ConfigError } from "./errors.js";
import type { EngineOptions } from "./options.js";
import { recheck, type RecheckResult } from "./recheck.js";
import type { PolicyRegistry } from "./registry.js";
import type { AuthorizationRequest, PolicySet, Verdict } from "./types.js";

export type PolicyEngineOptions = EngineOptions & {
  /** Lets calls omit the policy set; it is looked up from the request's action. */
  registry?: PolicyRegistry;
};

/** A policy set, or null to look it up in the engine's registry. */
export type SetArg = PolicySet | null;

export type PolicyEngine = {
  authorize(policySet: SetArg, request: AuthorizationRequest): Promise<Verdict>;
  filterFor(policySet: SetArg, request: AuthorizationRequest): Promise<FilterExpr | null>;
  recheck<T extends RecordLike>(
    policySet: SetArg,
    request: AuthorizationRequest,
    verdict: Verdict,
    records: readonly T[],
  ): Promise<RecheckResult<T>>;
  authorizeRead<TQuery, TRecord extends RecordLike>(params: {
    policySet?: PolicySet;
    request: AuthorizationRequest;
    executor: StorageFilterExecutor<TQuery, TRecord>;
    query: TQuery;
  }): Promise<ReadResult<TRecord>>;
  authorizeWrite(params: {
    policySet?: PolicySet;
    request: AuthorizationRequest;
  }): Promise<Verdict>;
};

export function createPolicyEngine(options: PolicyEngineOptions = {}): PolicyEngine {
  const { registry, ...engineOptions } = options;

  const setFor = (
    policySet: PolicySet | null | undefined,
    request: AuthorizationRequest,
  ): PolicySet => {
    if (policySet) return policySet;
    if (!registry) {
      throw new ConfigError("NO_REGISTRY", "No policy set given and the engine has no registry");
    }
    return registry.resolve(request.action);
  };

  return {
    async authorize(policySet, request) {
      return authorize(setFor(policySet, request), request, engineOptions);
    },
    async filterFor(policySet, request) {
      return filterFor(setFor(policySet, request), request, engineOptions);
    },
    async recheck(policySet, request, verdict, records) {
      return recheck(setFor(policySet, request), request, verdict, records, engineOptions);
    },
    async authorizeRead(params) {
      return authorizeRead({
        ...params,
        policySet: setFor(params.policySet, params.request),
        options: engineOptions,
      });
    },
    async authorizeWrite(params) {
      return authorizeWrite({
        policySet: setFor(params.policySet, params.request),
        request: params.request,
        options: engineOptions,
      });
    },
  };
}
