import { FALSE, TRUE, type FilterExpr } from "../filter/expr.js";
import { translatorSupports } from "../filter/translate.js";
import { recordAuthzCheckError, recordAuthzDecision } from "../observability/metrics.js";
import { assertMatchesAction } from "./compile.js";
import { buildCheckInput } from "./context.js";
import { actorIdOf, logDecision } from "./decisionLog.js";
import type { CheckEvaluationError } from "./errors.js";
import { evaluateCheck, type CheckEvaluationOptions, type CheckPhase } from "./evaluate-check.js";
import { resolveEngineOptions, type EngineOptions, type ResolvedEngineOptions } from "./options.js";
import { isAuthorizeRule, isNegated } from "./policy.js";
import {
  R_TRUE,
  hasPending,
  isFalse,
  isTrue,
  necessaryFilter,
  pendingAtoms,
  rAnd,
  rConst,
  rFilter,
  rNot,
  rOr,
  rPending,
  residualToFilter,
} from "./residual.js";
import type {
  AccessType,
  AuthorizationRequest,
  Check,
  CheckInput,
  Policy,
  PolicySet,
  Residual,
  Verdict,
} from "./types.js";

type Term =
  | { ok: true; residual: Residual }
  | { ok: false; error: CheckEvaluationError; check: Check };

type SolveResult = { verdict: Verdict; checksEvaluated: number };

/** Loads provider context once and builds the input every check of this pass sees. */
export async function prepareInput(
  request: AuthorizationRequest,
  opts: ResolvedEngineOptions,
): Promise<CheckInput> {
  const extra = opts.contextProvider ? await opts.contextProvider.load(request) : {};
  return buildCheckInput(request, extra);
}

export function evaluationOptions(
  opts: ResolvedEngineOptions,
  phase: CheckPhase,
  signal?: AbortSignal,
): CheckEvaluationOptions {
  const translator = opts.translator;
  return {
    phase,
    timeoutMs: opts.checkTimeoutMs,
    manualTimeout: opts.manualTimeout,
    supportsFilter: translator ? (expr) => translatorSupports(translator, expr) : undefined,
    signal,
  };
}

/** Reports a failed check and applies the configured error policy. */
export function reportCheckError(
  policySet: PolicySet,
  check: Check,
  error: CheckEvaluationError,
  phase: CheckPhase,
  opts: ResolvedEngineOptions,
) {
  recordAuthzCheckError({
    policySetId: policySet.id,
    checkId: check.id,
    checkKind: check.kind,
    reason: error.reason,
    phase,
  });
  opts.logger.warn(
    { err: error, policySet: policySet.id, checkId: check.id, reason: error.reason, phase },
    "Policy check failed",
  );
  if (opts.onCheckError === "throw") throw error;
}

async function term(
  check: Check,
  policy: Policy,
  role: AccessType | "condition",
  input: CheckInput,
  evalOpts: CheckEvaluationOptions,
  opts: ResolvedEngineOptions,
): Promise<Term> {
  const outcome = await evaluateCheck(check, input, evalOpts);
  switch (outcome.status) {
    case "known":
      return { ok: true, residual: rConst(outcome.value) };
    case "filter":
      if (role === "condition" && opts.unknownCondition === "recheck") {
        return {
          ok: true,
          residual: rPending({ check, policy: policy.description, role, filter: outcome.expr }),
        };
      }
      return { ok: true, residual: rFilter(outcome.expr) };
    case "pending":
      return {
        ok: true,
        residual: rPending({
          check,
          policy: policy.description,
          role,
          ...(outcome.filter ? { filter: outcome.filter } : {}),
        }),
      };
    case "failed":
      return { ok: false, error: outcome.error, check };
  }
}

async function solve(
  policySet: PolicySet,
  input: CheckInput,
  opts: ResolvedEngineOptions,
  signal?: AbortSignal,
): Promise<SolveResult> {
  if (policySet.policies.length === 0) {
    return { verdict: { kind: "forbidden", reason: "NO_POLICIES" }, checksEvaluated: 0 };
  }
  const evalOpts = evaluationOptions(opts, "strict", signal);
  const allow: Residual[] = [];
  const deny: Residual[] = [];
  let checksEvaluated = 0;

  const failed = (policy: Policy, t: Extract<Term, { ok: false }>): SolveResult => {
    reportCheckError(policySet, t.check, t.error, "strict", opts);
    return {
      verdict: {
        kind: "forbidden",
        reason: "CHECK_ERROR",
        policy: policy.description,
        check: t.check.id,
      },
      checksEvaluated,
    };
  };

  for (const policy of policySet.policies) {
    let applies = R_TRUE;
    for (const check of policy.condition) {
      checksEvaluated += 1;
      const t = await term(check, policy, "condition", input, evalOpts, opts);
      if (!t.ok) return failed(policy, t);
      applies = rAnd(applies, t.residual);
      if (isFalse(applies)) break;
    }
    if (isFalse(applies)) continue;

    let reach = applies;
    for (const rule of policy.rules) {
      checksEvaluated += 1;
      const t = await term(rule.check, policy, rule.access, input, evalOpts, opts);
      if (!t.ok) return failed(policy, t);
      const fires = isNegated(rule.access) ? rNot(t.residual) : t.residual;
      const contribution = rAnd(reach, fires);
      if (isAuthorizeRule(rule.access)) {
        allow.push(contribution);
      } else {
        if (isTrue(contribution)) {
          return {
            verdict: {
              kind: "forbidden",
              reason: "FORBID_CHECK",
              policy: policy.description,
              check: rule.check.id,
            },
            checksEvaluated,
          };
        }
        deny.push(contribution);
      }
      reach = rAnd(reach, rNot(fires));
      if (isFalse(reach)) break;
    }
  }

  return { verdict: toVerdict(rAnd(rOr(...allow), rNot(rOr(...deny)))), checksEvaluated };
}

function toVerdict(decision: Residual): Verdict {
  if (isTrue(decision)) return { kind: "authorized" };
  if (isFalse(decision)) return { kind: "forbidden", reason: "NO_AUTHORIZING_POLICY" };
  if (!hasPending(decision)) {
    const filter = residualToFilter(decision) ?? FALSE;
    if (filter.op === "const") {
      if (filter.value) return { kind: "authorized" };
      return { kind: "forbidden", reason: "NO_AUTHORIZING_POLICY" };
    }
    return { kind: "filterRequired", filter };
  }
  return { kind: "undecided", residual: decision, prefilter: necessaryFilter(decision) };
}

export type Decision = { verdict: Verdict; input: CheckInput };

/** `authorize` with resolved options, also returning the check input the pass used. */
export async function decide(
  policySet: PolicySet,
  request: AuthorizationRequest,
  opts: ResolvedEngineOptions,
): Promise<Decision> {
  assertMatchesAction(policySet, request.action);
  const started = Date.now();
  const input = await prepareInput(request, opts);
  const { verdict, checksEvaluated } = await solve(policySet, input, opts, request.signal);
  const durationMs = Date.now() - started;

  const reason = verdict.kind === "forbidden" ? verdict.reason : undefined;
  recordAuthzDecision({
    policySetId: policySet.id,
    resource: policySet.resource,
    action: policySet.action,
    verdict: verdict.kind,
    reason,
    durationMs,
    checksEvaluated,
  });
  if (opts.logDecisions) {
    logDecision(
      {
        verdict: verdict.kind,
        policySetId: policySet.id,
        resource: policySet.resource,
        action: policySet.action,
        reason,
        policy: verdict.kind === "forbidden" ? verdict.policy : undefined,
        check: verdict.kind === "forbidden" ? verdict.check : undefined,
        actorId: actorIdOf(input.actor),
        pendingChecks:
          verdict.kind === "undecided"
            ? pendingAtoms(verdict.residual).map((a) => a.check.id)
            : undefined,
        durationMs,
      },
      opts.logger,
    );
  }
  return { verdict, input };
}

/**
 * Strictly evaluates a policy set for one request. Nothing is fetched; checks that need data come
 * back as a filter (`filterRequired`) or as a residual to recheck per record (`undecided`).
 */
export async function authorize(
  policySet: PolicySet,
  request: AuthorizationRequest,
  options: EngineOptions = {},
): Promise<Verdict> {
  const { verdict } = await decide(policySet, request, resolveEngineOptions(options));
  return verdict;
}

/** The verdict as a single storage filter, or null when records must be rechecked. */
export function verdictFilter(verdict: Verdict): FilterExpr | null {
  switch (verdict.kind) {
    case "authorized":
      return TRUE;
    case "forbidden":
      return FALSE;
    case "filterRequired":
      return verdict.filter;
    case "undecided":
      return null;
  }
}

export async function filterFor(
  policySet: PolicySet,
  request: AuthorizationRequest,
  options: EngineOptions = {},
): Promise<FilterExpr | null> {
  return verdictFilter(await authorize(policySet, request, options));
}
