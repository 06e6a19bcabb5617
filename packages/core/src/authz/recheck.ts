import { evaluateFilter, truthNot, type RecordLike, type Truth } from "../filter/evaluate.js";
import { createLimiter } from "../internal/limiter.js";
import { createRecheckLogger } from "../observability/logger.js";
import { recordAuthzRecheck } from "../observability/metrics.js";
import { assertMatchesAction } from "./compile.js";
import { buildCheckInput, withRecord } from "./context.js";
import { evaluationOptions, prepareInput, reportCheckError } from "./engine.js";
import type { CheckEvaluationError } from "./errors.js";
import { evaluateCheck, type CheckEvaluationOptions } from "./evaluate-check.js";
import { resolveEngineOptions, type EngineOptions, type ResolvedEngineOptions } from "./options.js";
import type {
  AuthorizationRequest,
  CheckInput,
  PendingAtom,
  PolicySet,
  Residual,
  Verdict,
} from "./types.js";

export type RecheckDenialReason = "NOT_AUTHORIZED" | "UNRESOLVED" | "CHECK_ERROR";

export type RecheckDenial<T> = {
  record: T;
  reason: RecheckDenialReason;
  check?: string;
};

export type RecheckResult<T> = {
  authorized: T[];
  denied: RecheckDenial<T>[];
};

type RecordScope = {
  input: CheckInput;
  evalOpts: CheckEvaluationOptions;
  atoms: Map<PendingAtom, Truth>;
};

const log = createRecheckLogger();

/**
 * Resolves a verdict against fetched records. Each record is authorized only when the verdict's
 * open part evaluates to true with the record materialized; records keep their fetch order.
 */
export async function recheck<T extends RecordLike>(
  policySet: PolicySet,
  request: AuthorizationRequest,
  verdict: Verdict,
  records: readonly T[],
  options: EngineOptions = {},
): Promise<RecheckResult<T>> {
  assertMatchesAction(policySet, request.action);
  const opts = resolveEngineOptions(options);
  const input =
    verdict.kind === "undecided" ? await prepareInput(request, opts) : buildCheckInput(request);
  return recheckRecords(policySet, input, verdict, records, opts, request.signal);
}

/** `recheck` against an already prepared check input. */
export async function recheckRecords<T extends RecordLike>(
  policySet: PolicySet,
  input: CheckInput,
  verdict: Verdict,
  records: readonly T[],
  opts: ResolvedEngineOptions,
  signal?: AbortSignal,
): Promise<RecheckResult<T>> {
  const started = Date.now();
  const outcomes = await resolveRecords(policySet, input, verdict, records, opts, signal);

  const result: RecheckResult<T> = { authorized: [], denied: [] };
  outcomes.forEach((outcome, i) => {
    const record = records[i];
    if (record === undefined) return;
    if (outcome.kind === "allow") result.authorized.push(record);
    else {
      const check = outcome.check ? { check: outcome.check } : {};
      result.denied.push({ record, reason: outcome.reason, ...check });
    }
  });

  const durationMs = Date.now() - started;
  recordAuthzRecheck({
    policySetId: policySet.id,
    authorized: result.authorized.length,
    denied: result.denied.length,
    durationMs,
  });
  log.debug(
    {
      policySet: policySet.id,
      verdict: verdict.kind,
      authorized: result.authorized.length,
      denied: result.denied.length,
      durationMs,
    },
    "Recheck complete",
  );
  return result;
}

type RecordOutcome =
  | { kind: "allow" }
  | { kind: "deny"; reason: RecheckDenialReason; check?: string };

async function resolveRecords<T extends RecordLike>(
  policySet: PolicySet,
  input: CheckInput,
  verdict: Verdict,
  records: readonly T[],
  opts: ResolvedEngineOptions,
  signal?: AbortSignal,
): Promise<RecordOutcome[]> {
  switch (verdict.kind) {
    case "authorized":
      return records.map((): RecordOutcome => ({ kind: "allow" }));
    case "forbidden":
      return records.map((): RecordOutcome => ({ kind: "deny", reason: "NOT_AUTHORIZED" }));
    case "filterRequired": {
      const filter = verdict.filter;
      return records.map((record) => fromTruth(evaluateFilter(filter, record)));
    }
    case "undecided":
      break;
  }

  const residual = verdict.residual;
  const evalOpts = evaluationOptions(opts, "recheck", signal);
  const limiter = createLimiter(opts.recheckConcurrency);

  return Promise.all(
    records.map((record) =>
      limiter.run(async (): Promise<RecordOutcome> => {
        const scope: RecordScope = { input: withRecord(input, record), evalOpts, atoms: new Map() };
        try {
          return fromTruth(await evaluateResidual(residual, scope));
        } catch (err) {
          if (!(err instanceof AtomFailure)) throw err;
          reportCheckError(policySet, err.atom.check, err.error, "recheck", opts);
          return { kind: "deny", reason: "CHECK_ERROR", check: err.atom.check.id };
        }
      }),
    ),
  );
}

function fromTruth(value: Truth): RecordOutcome {
  if (value === true) return { kind: "allow" };
  return { kind: "deny", reason: value === false ? "NOT_AUTHORIZED" : "UNRESOLVED" };
}

class AtomFailure extends Error {
  constructor(
    readonly atom: PendingAtom,
    readonly error: CheckEvaluationError,
  ) {
    super(error.message);
    this.name = "AtomFailure";
  }
}

/** Kleene evaluation of a residual for one record; junctions stop at their absorbing value. */
async function evaluateResidual(r: Residual, scope: RecordScope): Promise<Truth> {
  switch (r.kind) {
    case "const":
      return r.value;
    case "filter":
      return scope.input.record ? evaluateFilter(r.expr, scope.input.record) : "unknown";
    case "pending":
      return evaluateAtom(r.atom, scope);
    case "not":
      return truthNot(await evaluateResidual(r.arg, scope));
    case "and":
    case "or": {
      const absorbing = r.kind === "or";
      let acc: Truth = !absorbing;
      for (const arg of r.args) {
        const value = await evaluateResidual(arg, scope);
        if (value === absorbing) return absorbing;
        if (value === "unknown") acc = "unknown";
      }
      return acc;
    }
  }
}

async function evaluateAtom(atom: PendingAtom, scope: RecordScope): Promise<Truth> {
  const cached = scope.atoms.get(atom);
  if (cached !== undefined) return cached;
  let value: Truth;
  if (atom.filter && scope.input.record) {
    value = evaluateFilter(atom.filter, scope.input.record);
  } else {
    const outcome = await evaluateCheck(atom.check, scope.input, scope.evalOpts);
    if (outcome.status === "failed") throw new AtomFailure(atom, outcome.error);
    value = outcome.status === "known" ? outcome.value : "unknown";
  }
  scope.atoms.set(atom, value);
  return value;
}
