import { isTemplateRef, type CompareExpr, type FilterExpr, type Scalar } from "./expr.js";

/**
 * Three-valued truth, as SQL evaluates a `WHERE` clause: `"unknown"` when the record does not carry
 * the data the filter reads, or when a comparison meets a null column.
 */
export type Truth = boolean | "unknown";

export type RecordLike = Readonly<Record<string, unknown>>;

export function evaluateFilter(expr: FilterExpr, record: RecordLike): Truth {
  switch (expr.op) {
    case "const":
      return expr.value;
    case "and":
      return truthAnd(expr.args.map((a) => () => evaluateFilter(a, record)));
    case "or":
      return truthOr(expr.args.map((a) => () => evaluateFilter(a, record)));
    case "not":
      return truthNot(evaluateFilter(expr.arg, record));
    case "compare":
      return evaluateCompare(expr, record);
    case "related":
      return evaluateRelated(expr.path, expr.where, record);
  }
}

export function truthNot(value: Truth): Truth {
  return value === "unknown" ? "unknown" : !value;
}

/** Kleene conjunction; stops at the first false operand. */
export function truthAnd(operands: Iterable<() => Truth>): Truth {
  let sawUnknown = false;
  for (const operand of operands) {
    const value = operand();
    if (value === false) return false;
    if (value === "unknown") sawUnknown = true;
  }
  return sawUnknown ? "unknown" : true;
}

/** Kleene disjunction; stops at the first true operand. */
export function truthOr(operands: Iterable<() => Truth>): Truth {
  let sawUnknown = false;
  for (const operand of operands) {
    const value = operand();
    if (value === true) return true;
    if (value === "unknown") sawUnknown = true;
  }
  return sawUnknown ? "unknown" : false;
}

function evaluateRelated(path: string[], where: FilterExpr, record: RecordLike): Truth {
  const [head, ...rest] = path;
  if (head === undefined) {
    const value = evaluateFilter(where, record);
    // Relation filters run as EXISTS: a loaded related record either matches or it does not.
    return value === "unknown" && loaded(where, record) ? false : value;
  }
  if (!(head in record)) return "unknown";
  const value = record[head];
  if (value === null || value === undefined) return false;
  const targets = Array.isArray(value) ? value : [value];
  return truthOr(
    targets.map((target) => () => {
      if (!isRecord(target)) return "unknown";
      return evaluateRelated(rest, where, target);
    }),
  );
}

function evaluateCompare(expr: CompareExpr, record: RecordLike): Truth {
  if (!(expr.field in record)) return "unknown";
  if (isTemplateRef(expr.value)) return "unknown";
  const actual = normalize(record[expr.field]);
  const expected = expr.value;

  if (expr.cmp === "isNil") {
    return (actual === null) === (expected === true);
  }
  if (expr.cmp === "in") {
    const candidates = Array.isArray(expected) ? expected.filter((c) => c !== null) : [];
    if (candidates.length === 0) return false;
    if (actual === null) return "unknown";
    return candidates.includes(actual);
  }
  // A null or list operand never matches; storage backends render it as a false constant.
  if (expected === null || Array.isArray(expected)) return false;
  if (actual === null) return "unknown";

  switch (expr.cmp) {
    case "eq":
      return actual === expected;
    case "neq":
      return actual !== expected;
    case "lt":
    case "lte":
    case "gt":
    case "gte":
      return ordered(expr.cmp, actual, expected);
  }
}

function ordered(cmp: "lt" | "lte" | "gt" | "gte", actual: Scalar, expected: Scalar): boolean {
  let sign: number;
  if (typeof actual === "number" && typeof expected === "number") {
    sign = Math.sign(actual - expected);
  } else if (typeof actual === "string" && typeof expected === "string") {
    sign = actual < expected ? -1 : actual > expected ? 1 : 0;
  } else {
    return false;
  }
  switch (cmp) {
    case "lt":
      return sign < 0;
    case "lte":
      return sign <= 0;
    case "gt":
      return sign > 0;
    case "gte":
      return sign >= 0;
  }
}

/** Whether the record carries every field `expr` reads, through loaded relationships. */
function loaded(expr: FilterExpr, record: RecordLike): boolean {
  switch (expr.op) {
    case "const":
      return true;
    case "and":
    case "or":
      return expr.args.every((a) => loaded(a, record));
    case "not":
      return loaded(expr.arg, record);
    case "compare":
      return expr.field in record && !isTemplateRef(expr.value);
    case "related": {
      const [head, ...rest] = expr.path;
      if (head === undefined) return loaded(expr.where, record);
      if (!(head in record)) return false;
      const value = record[head];
      if (value === null || value === undefined) return true;
      const targets: unknown[] = Array.isArray(value) ? value : [value];
      const inner: FilterExpr = { op: "related", path: rest, where: expr.where };
      return targets.every((target) => isRecord(target) && loaded(inner, target));
    }
  }
}

function normalize(value: unknown): Scalar {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return null;
}

function isRecord(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
