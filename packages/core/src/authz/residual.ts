import { FALSE, TRUE, type FilterExpr } from "../filter/expr.js";
import { simplify } from "../filter/simplify.js";
import type { PendingAtom, Residual } from "./types.js";

export const R_TRUE: Residual = { kind: "const", value: true };
export const R_FALSE: Residual = { kind: "const", value: false };

export function rConst(value: boolean): Residual {
  return value ? R_TRUE : R_FALSE;
}

export function rFilter(expr: FilterExpr): Residual {
  return expr.op === "const" ? rConst(expr.value) : { kind: "filter", expr };
}

export function rPending(atom: PendingAtom): Residual {
  return { kind: "pending", atom };
}

export function isTrue(r: Residual): boolean {
  return r.kind === "const" && r.value;
}

export function isFalse(r: Residual): boolean {
  return r.kind === "const" && !r.value;
}

export function rAnd(...args: Residual[]): Residual {
  return junction("and", args);
}

export function rOr(...args: Residual[]): Residual {
  return junction("or", args);
}

export function rNot(arg: Residual): Residual {
  if (arg.kind === "const") return rConst(!arg.value);
  if (arg.kind === "not") return arg.arg;
  return { kind: "not", arg };
}

function junction(kind: "and" | "or", args: Residual[]): Residual {
  const identity = kind === "and";
  const out: Residual[] = [];
  for (const arg of args) {
    if (arg.kind === "const") {
      if (arg.value === identity) continue;
      return arg;
    }
    if (arg.kind === kind) out.push(...arg.args);
    else out.push(arg);
  }
  if (out.length === 0) return rConst(identity);
  if (out.length === 1) return out[0] ?? rConst(identity);
  return { kind, args: out };
}

export function hasPending(r: Residual): boolean {
  switch (r.kind) {
    case "const":
    case "filter":
      return false;
    case "pending":
      return true;
    case "and":
    case "or":
      return r.args.some(hasPending);
    case "not":
      return hasPending(r.arg);
  }
}

/** The residual as a single filter; null while any part still needs a record. */
export function residualToFilter(r: Residual): FilterExpr | null {
  if (hasPending(r)) return null;
  return simplify(toFilterUnchecked(r));
}

function toFilterUnchecked(r: Residual): FilterExpr {
  switch (r.kind) {
    case "const":
      return r.value ? TRUE : FALSE;
    case "filter":
      return r.expr;
    case "pending":
      return TRUE;
    case "and":
    case "or":
      return { op: r.kind, args: r.args.map(toFilterUnchecked) };
    case "not":
      return { op: "not", arg: toFilterUnchecked(r.arg) };
  }
}

/**
 * A filter implied by the residual: every record the residual authorizes satisfies it. Pending
 * parts widen to `true`, so the result narrows a fetch without ever dropping an authorized record.
 */
export function necessaryFilter(r: Residual): FilterExpr {
  return simplify(necessary(r));
}

function necessary(r: Residual): FilterExpr {
  switch (r.kind) {
    case "const":
      return r.value ? TRUE : FALSE;
    case "filter":
      return r.expr;
    case "pending":
      return TRUE;
    case "and":
    case "or":
      return { op: r.kind, args: r.args.map(necessary) };
    case "not":
      return hasPending(r.arg) ? TRUE : { op: "not", arg: toFilterUnchecked(r.arg) };
  }
}

export function pendingAtoms(r: Residual): PendingAtom[] {
  switch (r.kind) {
    case "const":
    case "filter":
      return [];
    case "pending":
      return [r.atom];
    case "and":
    case "or":
      return r.args.flatMap(pendingAtoms);
    case "not":
      return pendingAtoms(r.arg);
  }
}
