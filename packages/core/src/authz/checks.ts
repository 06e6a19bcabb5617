import { actor, compare, related, type FilterExpr, type FilterValue } from "../filter/expr.js";
import type { Truth } from "../filter/evaluate.js";
import { readPath } from "../filter/template.js";
import type {
  ActionType,
  Check,
  CheckInput,
  FilterCheck,
  ManualCheck,
  SimpleCheck,
} from "./types.js";

function slug(description: string): string {
  return description
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function simpleCheck(
  description: string,
  evaluate: (input: CheckInput) => Truth,
  opts: { id?: string } = {},
): SimpleCheck {
  return Object.freeze({
    kind: "simple" as const,
    id: opts.id ?? slug(description),
    description,
    evaluate,
  });
}

export function filterCheckFrom(
  description: string,
  filter: (input: CheckInput) => FilterExpr,
  opts: { id?: string; strict?: (input: CheckInput) => Truth; template?: FilterExpr } = {},
): FilterCheck {
  return Object.freeze({
    kind: "filter" as const,
    id: opts.id ?? slug(description),
    description,
    filter,
    ...(opts.strict ? { strict: opts.strict } : {}),
    ...(opts.template ? { template: opts.template } : {}),
  });
}

export function manualCheck(
  description: string,
  run: ManualCheck["run"],
  opts: { id?: string; requiresRecord?: boolean; timeoutMs?: number } = {},
): ManualCheck {
  return Object.freeze({
    kind: "manual" as const,
    id: opts.id ?? slug(description),
    description,
    requiresRecord: opts.requiresRecord ?? true,
    ...(opts.timeoutMs != null ? { timeoutMs: opts.timeoutMs } : {}),
    run,
  });
}

export function isCheck(value: unknown): value is Check {
  if (!value || typeof value !== "object") return false;
  const field = (key: string): unknown => Reflect.get(value, key);
  if (typeof field("id") !== "string" || typeof field("description") !== "string") return false;
  switch (field("kind")) {
    case "simple":
      return typeof field("evaluate") === "function";
    case "filter":
      return typeof field("filter") === "function";
    case "manual":
      return typeof field("run") === "function" && typeof field("requiresRecord") === "boolean";
    default:
      return false;
  }
}

// Built-in checks

export const always = (): SimpleCheck => simpleCheck("always", () => true, { id: "always" });

export const never = (): SimpleCheck => simpleCheck("never", () => false, { id: "never" });

export const actorPresent = (): SimpleCheck =>
  simpleCheck("actor is present", (input) => input.actor !== null && input.actor !== undefined, {
    id: "actor_present",
  });

export function actorAttributeEquals(path: string, value: unknown): SimpleCheck {
  const segments = path.split(".");
  return simpleCheck(
    `actor.${path} == ${JSON.stringify(value)}`,
    (input) => input.actor !== null && readPath(input.actor, segments) === value,
    { id: `actor_attribute_equals:${path}` },
  );
}

export function actionType(...types: ActionType[]): SimpleCheck {
  return simpleCheck(
    `action type is ${types.join(" or ")}`,
    (input) => types.includes(input.action.type),
    { id: `action_type:${types.join(",")}` },
  );
}

/** True when the changeset writes any of the given attributes; always false for queries. */
export function changingAttributes(...names: string[]): SimpleCheck {
  return simpleCheck(
    `changing ${names.join(", ")}`,
    (input) => {
      const subject = input.subject;
      if (subject.kind !== "changeset") return false;
      const data = subject.data;
      return names.some((n) => n in data);
    },
    { id: `changing_attributes:${names.join(",")}` },
  );
}

/** Wrap a (possibly templated) filter as a check. */
export function filterCheck(expr: FilterExpr, description?: string): FilterCheck {
  return filterCheckFrom(description ?? "filter", () => expr, {
    id: description ? slug(description) : `filter:${JSON.stringify(expr)}`,
    template: expr,
  });
}

/**
 * The record is related to the actor through `path`: the last segment is compared with
 * `actor.<actorField>`. `relatesToActorVia("owner_id")` compares the record's own attribute;
 * `relatesToActorVia("team.members.id")` walks relationships first.
 */
export function relatesToActorVia(path: string, opts: { actorField?: string } = {}): FilterCheck {
  const segments = path.split(".");
  const field = segments[segments.length - 1] ?? path;
  const relationship = segments.slice(0, -1);
  const actorRef: FilterValue = actor(...(opts.actorField ?? "id").split("."));
  const comparison = compare(field, "eq", actorRef);
  const expr = relationship.length ? related(relationship, comparison) : comparison;
  return filterCheckFrom(`relates to actor via ${path}`, () => expr, {
    id: `relates_to_actor_via:${path}`,
    template: expr,
    // No actor: nothing relates to it.
    strict: (input) => (input.actor === null ? false : "unknown"),
  });
}
