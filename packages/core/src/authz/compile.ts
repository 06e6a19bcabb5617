import { z } from "zod";
import { canonicalHash } from "../internal/canonical.js";
import { FilterExprSchema } from "../filter/schema.js";
import { isCheck } from "./checks.js";
import { ConfigError } from "./errors.js";
import type { ActionRef, Check, Policy, PolicySet, PolicySetDefinition } from "./types.js";

const CheckSchema = z
  .custom<Check>(isCheck, {
    message: "Expected a check built with simpleCheck, filterCheckFrom or manualCheck",
  })
  .superRefine((check, ctx) => {
    if (check.kind === "manual" && check.timeoutMs != null && !(check.timeoutMs > 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Manual check ${check.id} needs a positive timeout`,
      });
    }
  });

const PolicySchema = z.object({
  description: z.string().min(1, "Policy description is required"),
  condition: z.array(CheckSchema),
  rules: z
    .array(
      z.object({
        access: z.enum(["authorize_if", "forbid_if", "authorize_unless", "forbid_unless"]),
        check: CheckSchema,
      }),
    )
    .min(1, "Policy has no rules"),
});

const PolicySetSchema = z.object({
  id: z.string().min(1).optional(),
  resource: z.string().min(1, "resource is required"),
  action: z.string().min(1, "action is required"),
  policies: z.array(PolicySchema),
  baseFilter: FilterExprSchema.optional(),
  forbiddenRead: z.enum(["filter", "error"]).optional(),
});

/**
 * Validate a policy set definition once at startup. The returned set is frozen; a malformed
 * definition throws `ConfigError` here rather than surfacing at request time.
 */
export function definePolicySet(definition: PolicySetDefinition): PolicySet {
  const parsed = PolicySetSchema.safeParse(definition);
  if (!parsed.success) {
    const msg = parsed.error.issues
      .map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join(", ");
    const label = `${String(definition?.resource ?? "?")}:${String(definition?.action ?? "?")}`;
    throw new ConfigError("INVALID_POLICY_SET", `Invalid policy set ${label}: ${msg}`, {
      issues: parsed.error.issues,
    });
  }
  const def = parsed.data;
  const policies: Policy[] = def.policies.map((p) =>
    Object.freeze({
      description: p.description,
      condition: Object.freeze([...p.condition]),
      rules: Object.freeze(p.rules.map((r) => Object.freeze({ access: r.access, check: r.check }))),
    }),
  );
  return Object.freeze({
    id: def.id ?? `${def.resource}:${def.action}`,
    hash: computePolicySetHash(def.resource, def.action, policies, def.baseFilter),
    resource: def.resource,
    action: def.action,
    policies: Object.freeze(policies),
    ...(def.baseFilter ? { baseFilter: def.baseFilter } : {}),
    ...(def.forbiddenRead ? { forbiddenRead: def.forbiddenRead } : {}),
  });
}

export function computePolicySetHash(
  resource: string,
  action: string,
  policies: readonly Policy[],
  baseFilter?: unknown,
): string {
  const describeCheck = (c: Check) => ({
    id: c.id,
    kind: c.kind,
    description: c.description,
    template: c.kind === "filter" ? (c.template ?? null) : null,
  });
  return canonicalHash({
    resource,
    action,
    baseFilter: baseFilter ?? null,
    policies: policies.map((p) => ({
      description: p.description,
      condition: p.condition.map(describeCheck),
      rules: p.rules.map((r) => ({ access: r.access, check: describeCheck(r.check) })),
    })),
  });
}

export function assertMatchesAction(policySet: PolicySet, action: ActionRef) {
  if (policySet.resource !== action.resource || policySet.action !== action.name) {
    throw new ConfigError(
      "ACTION_MISMATCH",
      `Policy set ${policySet.id} governs ${policySet.resource}:${policySet.action}, ` +
        `not ${action.resource}:${action.name}`,
    );
  }
}
