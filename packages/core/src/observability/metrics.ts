import { metrics, type Attributes, type Counter, type Histogram } from "@opentelemetry/api";
import type { ForbiddenReason, VerdictKind } from "../authz/types.js";
import type { CheckFailureReason } from "../authz/errors.js";

export type AuthzDecisionMetric = {
  policySetId: string;
  resource: string;
  action: string;
  verdict: VerdictKind;
  reason?: ForbiddenReason;
  durationMs?: number;
  checksEvaluated?: number;
};

export type AuthzCheckErrorMetric = {
  policySetId: string;
  checkId: string;
  checkKind: "simple" | "filter" | "manual";
  reason: CheckFailureReason;
  phase: "strict" | "recheck";
};

export type AuthzRecheckMetric = {
  policySetId: string;
  authorized: number;
  denied: number;
  durationMs?: number;
};

const METER_NAME = "arbiter-authz";

type AuthzMetricsState = {
  decisionCounter: Counter;
  decisionDuration: Histogram;
  checkErrorCounter: Counter;
  recheckCounter: Counter;
  recheckDuration: Histogram;
};

let state: AuthzMetricsState | null = null;

// Instruments bind to whatever meter provider is global at first use; until the host registers one
// the API hands back no-op instruments.
function instruments(): AuthzMetricsState {
  if (state) return state;
  const meter = metrics.getMeter(METER_NAME);
  state = {
    decisionCounter: meter.createCounter("authz_decision_total", {
      description: "Total number of authorization verdicts produced by the engine.",
    }),
    decisionDuration: meter.createHistogram("authz_decision_duration_ms", {
      description: "Latency of strict policy evaluation in milliseconds.",
      unit: "ms",
    }),
    checkErrorCounter: meter.createCounter("authz_check_error_total", {
      description: "Checks that raised, timed out or were cancelled.",
    }),
    recheckCounter: meter.createCounter("authz_recheck_records_total", {
      description: "Records evaluated during per-record recheck, by outcome.",
    }),
    recheckDuration: meter.createHistogram("authz_recheck_duration_ms", {
      description: "Duration of a recheck pass in milliseconds.",
      unit: "ms",
    }),
  };
  return state;
}

export function resetAuthzMetrics() {
  state = null;
}

export function recordAuthzDecision(metric: AuthzDecisionMetric) {
  const { decisionCounter, decisionDuration } = instruments();
  const attrs = sanitizeAttributes({
    policy_set: metric.policySetId,
    resource: metric.resource,
    action: metric.action,
    verdict: metric.verdict,
    reason: metric.reason,
  });
  decisionCounter.add(1, attrs);
  if (metric.durationMs != null) {
    decisionDuration.record(metric.durationMs, {
      ...attrs,
      ...sanitizeAttributes({ checks_evaluated: metric.checksEvaluated }),
    });
  }
}

export function recordAuthzCheckError(metric: AuthzCheckErrorMetric) {
  instruments().checkErrorCounter.add(
    1,
    sanitizeAttributes({
      policy_set: metric.policySetId,
      check_id: metric.checkId,
      check_kind: metric.checkKind,
      reason: metric.reason,
      phase: metric.phase,
    }),
  );
}

export function recordAuthzRecheck(metric: AuthzRecheckMetric) {
  const { recheckCounter, recheckDuration } = instruments();
  if (metric.authorized > 0) {
    recheckCounter.add(metric.authorized, {
      policy_set: metric.policySetId,
      outcome: "authorized",
    });
  }
  if (metric.denied > 0) {
    recheckCounter.add(metric.denied, { policy_set: metric.policySetId, outcome: "denied" });
  }
  if (metric.durationMs != null) {
    recheckDuration.record(metric.durationMs, { policy_set: metric.policySetId });
  }
}

function sanitizeAttributes(
  input: Record<string, string | number | boolean | undefined>,
): Attributes {
  const attrs: Attributes = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined && value !== null) {
      attrs[key] = value;
    }
  }
  return attrs;
}
