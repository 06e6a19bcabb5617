import type { RecordLike } from "../filter/evaluate.js";
import { and, TRUE, type FilterExpr } from "../filter/expr.js";
import { simplify } from "../filter/simplify.js";
import { resolveTemplates } from "../filter/template.js";
import type { StorageFilterExecutor } from "../storage/types.js";
import { materializedRecord } from "./context.js";
import { decide, verdictFilter } from "./engine.js";
import { ForbiddenError } from "./errors.js";
import { resolveEngineOptions, type EngineOptions } from "./options.js";
import { recheckRecords, type RecheckDenial } from "./recheck.js";
import type { AuthorizationRequest, CheckInput, PolicySet, Verdict } from "./types.js";

export type ReadParams<TQuery, TRecord extends RecordLike> = {
  policySet: PolicySet;
  request: AuthorizationRequest;
  executor: StorageFilterExecutor<TQuery, TRecord>;
  query: TQuery;
  options?: EngineOptions;
};

export type ReadResult<TRecord> = {
  verdict: Verdict;
  records: TRecord[];
  /** Fetched records removed by recheck. Empty unless the verdict was undecided. */
  denied: RecheckDenial<TRecord>[];
};

export type WriteParams = {
  policySet: PolicySet;
  request: AuthorizationRequest;
  options?: EngineOptions;
};

/**
 * Reads through a policy set: scopes the query with the set's base filter and the verdict's filter,
 * fetches, and rechecks fetched records when the verdict is undecided.
 */
export async function authorizeRead<TQuery, TRecord extends RecordLike>(
  params: ReadParams<TQuery, TRecord>,
): Promise<ReadResult<TRecord>> {
  const { policySet, request, executor } = params;
  const opts = resolveEngineOptions({ translator: executor.translator, ...params.options });
  const { verdict, input } = await decide(policySet, request, opts);

  if (verdict.kind === "forbidden") {
    if ((policySet.forbiddenRead ?? opts.forbiddenRead) === "error") {
      throw new ForbiddenError(
        verdict.reason,
        `Not allowed to ${policySet.action} ${policySet.resource}`,
        { policySet: policySet.id, policy: verdict.policy, check: verdict.check },
      );
    }
    return { verdict, records: [], denied: [] };
  }

  const authzFilter =
    verdictFilter(verdict) ?? (verdict.kind === "undecided" ? verdict.prefilter : TRUE);
  const filter = simplify(and(baseScope(policySet, input), authzFilter));
  if (filter.op === "const" && !filter.value) {
    return { verdict, records: [], denied: [] };
  }

  const query = await executor.applyFilter(params.query, filter);
  const fetched = await executor.fetch(query);
  if (verdict.kind !== "undecided") {
    return { verdict, records: fetched, denied: [] };
  }

  const { authorized, denied } = await recheckRecords(
    policySet,
    input,
    verdict,
    fetched,
    opts,
    request.signal,
  );
  return { verdict, records: authorized, denied };
}

function baseScope(policySet: PolicySet, input: CheckInput): FilterExpr {
  if (!policySet.baseFilter) return TRUE;
  return resolveTemplates(policySet.baseFilter, {
    actor: input.actor,
    context: input.context,
    arguments: input.arguments,
  });
}

/**
 * Authorizes a create, update or destroy. The changeset's record settles whatever the strict pass
 * left open; anything short of authorized throws `ForbiddenError`.
 */
export async function authorizeWrite(params: WriteParams): Promise<Verdict> {
  const { policySet, request } = params;
  const opts = resolveEngineOptions(params.options);
  const { verdict, input } = await decide(policySet, request, opts);

  switch (verdict.kind) {
    case "authorized":
      return verdict;
    case "forbidden":
      throw new ForbiddenError(verdict.reason, notAllowed(policySet), {
        policySet: policySet.id,
        policy: verdict.policy,
        check: verdict.check,
      });
    case "filterRequired":
    case "undecided":
      break;
  }

  const record = materializedRecord(request);
  if (!record) {
    throw new ForbiddenError("UNRESOLVED", notAllowed(policySet), {
      policySet: policySet.id,
      verdict: verdict.kind,
    });
  }
  const { denied } = await recheckRecords(
    policySet,
    input,
    verdict,
    [record],
    opts,
    request.signal,
  );
  const denial = denied[0];
  if (denial) {
    throw new ForbiddenError(denial.reason, notAllowed(policySet), {
      policySet: policySet.id,
      check: denial.check,
    });
  }
  return verdict;
}

function notAllowed(policySet: PolicySet): string {
  return `Not allowed to ${policySet.action} ${policySet.resource}`;
}
