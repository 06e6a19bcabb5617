import { canonicalStringify } from "../internal/canonical.js";
import { FALSE, TRUE, isConst, isTemplateRef, type FilterExpr, type Scalar } from "./expr.js";

/**
 * Normalize a filter: fold constants, flatten nested and/or, drop duplicates and merge equality
 * comparisons on the same field. The result is equivalent to the input for every record.
 */
export function simplify(expr: FilterExpr): FilterExpr {
  return simplifyAt(expr, false);
}

// `negated`: the expression sits under an odd number of `not`s, where unknown and false differ.
function simplifyAt(expr: FilterExpr, negated: boolean): FilterExpr {
  switch (expr.op) {
    case "const":
      return expr;
    case "not": {
      const inner = simplifyAt(expr.arg, !negated);
      if (inner.op === "const") return inner.value ? FALSE : TRUE;
      if (inner.op === "not") return inner.arg;
      return { op: "not", arg: inner };
    }
    case "related": {
      const where = simplifyAt(expr.where, false);
      if (isConst(where, false)) return FALSE;
      return { op: "related", path: expr.path, where };
    }
    case "compare":
      if (expr.cmp === "in" && Array.isArray(expr.value)) {
        if (expr.value.length === 0) return FALSE;
        if (expr.value.length === 1) return { ...expr, cmp: "eq", value: expr.value[0] ?? null };
      }
      return expr;
    case "and":
    case "or":
      return simplifyJunction(expr.op, expr.args, negated);
  }
}

function simplifyJunction(op: "and" | "or", args: FilterExpr[], negated: boolean): FilterExpr {
  // identity: true for and, false for or; absorbing element is the opposite
  const identity = op === "and";
  const flat: FilterExpr[] = [];
  const seen = new Set<string>();
  const pending = args.map((a) => simplifyAt(a, negated));
  while (pending.length) {
    const next = pending.shift();
    if (!next) break;
    if (next.op === op) {
      pending.unshift(...next.args);
      continue;
    }
    if (next.op === "const") {
      if (next.value === identity) continue;
      return next;
    }
    const key = canonicalStringify(next);
    if (seen.has(key)) continue;
    seen.add(key);
    flat.push(next);
  }
  const merged = op === "and" ? mergeConjunction(flat, negated) : mergeDisjunction(flat);
  if (merged.some((m) => isConst(m, !identity))) return identity ? FALSE : TRUE;
  const remaining = merged.filter((m) => !isConst(m, identity));
  if (remaining.length === 0) return identity ? TRUE : FALSE;
  if (remaining.length === 1) return remaining[0] ?? (identity ? TRUE : FALSE);
  return { op, args: remaining };
}

type EqualityGroup = { index: number; field: string; values: Scalar[]; members: FilterExpr[] };

/** Literal, non-null values an `eq`/`in` comparison accepts, or null when it is not mergeable. */
function acceptedValues(expr: FilterExpr): { field: string; values: Scalar[] } | null {
  if (expr.op !== "compare") return null;
  if (isTemplateRef(expr.value)) return null;
  if (expr.cmp === "eq" && !Array.isArray(expr.value) && expr.value !== null) {
    return { field: expr.field, values: [expr.value] };
  }
  if (expr.cmp === "in" && Array.isArray(expr.value) && !expr.value.includes(null)) {
    return { field: expr.field, values: expr.value };
  }
  return null;
}

function groupEqualities(
  args: FilterExpr[],
  combine: (current: Scalar[], incoming: Scalar[]) => Scalar[],
  keepConflicts = false,
): FilterExpr[] {
  const groups = new Map<string, EqualityGroup>();
  const out: (FilterExpr | null)[] = [];
  args.forEach((arg) => {
    const accepted = acceptedValues(arg);
    if (!accepted) {
      out.push(arg);
      return;
    }
    const group = groups.get(accepted.field);
    if (!group) {
      groups.set(accepted.field, {
        index: out.length,
        field: accepted.field,
        values: [...accepted.values],
        members: [arg],
      });
      out.push(null);
      return;
    }
    group.values = combine(group.values, accepted.values);
    group.members.push(arg);
  });
  const replaced = new Map<number, FilterExpr[]>();
  for (const group of groups.values()) {
    // `a = 1 and a = 2` is unknown, not false, on a null `a`; only negation tells them apart.
    const conflict = group.values.length === 0 && group.members.length > 1;
    const merged =
      conflict && keepConflicts ? group.members : [equalityFor(group.field, group.values)];
    replaced.set(group.index, merged);
  }
  return out.flatMap((e, i) => (e === null ? (replaced.get(i) ?? []) : [e]));
}

function mergeConjunction(args: FilterExpr[], negated: boolean): FilterExpr[] {
  const intersect = (current: Scalar[], incoming: Scalar[]) =>
    current.filter((v) => incoming.includes(v));
  return groupEqualities(args, intersect, negated);
}

function mergeDisjunction(args: FilterExpr[]): FilterExpr[] {
  return groupEqualities(args, (current, incoming) => [
    ...current,
    ...incoming.filter((v) => !current.includes(v)),
  ]);
}

function equalityFor(field: string, values: Scalar[]): FilterExpr {
  if (values.length === 0) return FALSE;
  if (values.length === 1) return { op: "compare", field, cmp: "eq", value: values[0] ?? null };
  return { op: "compare", field, cmp: "in", value: values };
}
