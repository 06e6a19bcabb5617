import type { RecordLike } from "../filter/evaluate.js";
import type { AuthorizationRequest, CheckInput } from "./types.js";

/**
 * Supplies request-scoped values to checks (tenant, feature flags, clock). Called once per
 * authorization pass; the result is merged over `request.context`.
 */
export interface ContextProvider {
  load(request: AuthorizationRequest): ProvidedContext | Promise<ProvidedContext>;
}

export type ProvidedContext = Readonly<Record<string, unknown>>;

/**
 * The record a write is judged against before data is fetched: the existing record for updates and
 * destroys, the changeset data for creates. Reads have none.
 */
export function materializedRecord(request: AuthorizationRequest): RecordLike | undefined {
  const subject = request.subject;
  if (subject.kind !== "changeset") return undefined;
  if (request.action.type === "create") return subject.record ?? subject.data;
  return subject.record;
}

export function buildCheckInput(
  request: AuthorizationRequest,
  extraContext: Readonly<Record<string, unknown>> = {},
  record: RecordLike | undefined = materializedRecord(request),
): CheckInput {
  return {
    actor: request.actor ?? null,
    action: request.action,
    subject: request.subject,
    context: { ...(request.context ?? {}), ...extraContext },
    arguments: request.arguments ?? {},
    ...(record ? { record } : {}),
  };
}

export function withRecord(input: CheckInput, record: RecordLike): CheckInput {
  return { ...input, record };
}
