import {
  isTemplateRef,
  type FilterExpr,
  type FilterValue,
  type Scalar,
  type TemplateRef,
} from "./expr.js";

export type TemplateScope = {
  actor: unknown;
  context?: unknown;
  arguments?: unknown;
};

/**
 * Replace every `actor(...)`, `context(...)` and `arg(...)` reference with the value it points at.
 * Missing values resolve to `null`; non-scalar values resolve to `null` as well since they cannot
 * be compared by a storage backend.
 */
export function resolveTemplates(expr: FilterExpr, scope: TemplateScope): FilterExpr {
  switch (expr.op) {
    case "const":
      return expr;
    case "and":
    case "or":
      return { op: expr.op, args: expr.args.map((a) => resolveTemplates(a, scope)) };
    case "not":
      return { op: "not", arg: resolveTemplates(expr.arg, scope) };
    case "related":
      return { op: "related", path: expr.path, where: resolveTemplates(expr.where, scope) };
    case "compare":
      if (!isTemplateRef(expr.value)) return expr;
      return { ...expr, value: resolveRef(expr.value, scope) };
  }
}

export function hasTemplates(expr: FilterExpr): boolean {
  switch (expr.op) {
    case "const":
      return false;
    case "and":
    case "or":
      return expr.args.some(hasTemplates);
    case "not":
      return hasTemplates(expr.arg);
    case "related":
      return hasTemplates(expr.where);
    case "compare":
      return isTemplateRef(expr.value);
  }
}

export function readPath(source: unknown, path: readonly string[]): unknown {
  let current: unknown = source;
  for (const segment of path) {
    if (current === null || current === undefined) return undefined;
    if (typeof current !== "object") return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

function resolveRef(ref: TemplateRef, scope: TemplateScope): FilterValue {
  const root =
    ref.$ref === "actor" ? scope.actor : ref.$ref === "context" ? scope.context : scope.arguments;
  return toFilterValue(readPath(root, ref.path));
}

function toFilterValue(value: unknown): Scalar | Scalar[] {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) {
    return value.map((v) => toScalar(v));
  }
  return toScalar(value);
}

function toScalar(value: unknown): Scalar {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return null;
}
