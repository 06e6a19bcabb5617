// Structured decision logging. One line per verdict, shaped for log-based audit queries.

import { createAuthzLogger, type Logger } from "../observability/logger.js";
import type { ForbiddenReason, VerdictKind } from "./types.js";

export type DecisionEvent = {
  verdict: VerdictKind;
  policySetId: string;
  resource: string;
  action: string;
  reason?: ForbiddenReason;
  policy?: string;
  check?: string;
  actorId?: string;
  pendingChecks?: string[];
  durationMs?: number;
};

export function logDecision(ev: DecisionEvent, log: Logger = createAuthzLogger()) {
  log.info({ kind: "authz_decision", ...ev }, "Authorization decision");
}

export function actorIdOf(actor: Readonly<Record<string, unknown>> | null): string | undefined {
  const id = actor?.id;
  if (typeof id === "string") return id;
  if (typeof id === "number") return String(id);
  return undefined;
}
