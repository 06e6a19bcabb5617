export type CompareOp = "eq" | "neq" | "lt" | "lte" | "gt" | "gte" | "in" | "isNil";

export type Scalar = string | number | boolean | null;

export type TemplateSource = "actor" | "context" | "arg";

/** Placeholder filled from the request before a filter leaves the engine. */
export type TemplateRef = { $ref: TemplateSource; path: string[] };

export type FilterValue = Scalar | Scalar[] | TemplateRef;

export type FilterExpr =
  | { op: "const"; value: boolean }
  | { op: "and"; args: FilterExpr[] }
  | { op: "or"; args: FilterExpr[] }
  | { op: "not"; arg: FilterExpr }
  | { op: "compare"; field: string; cmp: CompareOp; value: FilterValue }
  | { op: "related"; path: string[]; where: FilterExpr };

export type CompareExpr = Extract<FilterExpr, { op: "compare" }>;

export const TRUE: FilterExpr = { op: "const", value: true };
export const FALSE: FilterExpr = { op: "const", value: false };

export function literal(value: boolean): FilterExpr {
  return value ? TRUE : FALSE;
}

export function and(...args: FilterExpr[]): FilterExpr {
  return { op: "and", args };
}

export function or(...args: FilterExpr[]): FilterExpr {
  return { op: "or", args };
}

export function not(arg: FilterExpr): FilterExpr {
  return { op: "not", arg };
}

export function compare(field: string, cmp: CompareOp, value: FilterValue): FilterExpr {
  return { op: "compare", field, cmp, value };
}

export const eq = (field: string, value: FilterValue) => compare(field, "eq", value);
export const neq = (field: string, value: FilterValue) => compare(field, "neq", value);
export const lt = (field: string, value: FilterValue) => compare(field, "lt", value);
export const lte = (field: string, value: FilterValue) => compare(field, "lte", value);
export const gt = (field: string, value: FilterValue) => compare(field, "gt", value);
export const gte = (field: string, value: FilterValue) => compare(field, "gte", value);
export const isIn = (field: string, values: Scalar[] | TemplateRef) => compare(field, "in", values);
export const isNil = (field: string, nil = true) => compare(field, "isNil", nil);

/**
 * Constrain records through a relationship path. The condition holds when any related record
 * (for to-many) or the related record (for to-one) matches `where`.
 */
export function related(path: string | string[], where: FilterExpr): FilterExpr {
  return { op: "related", path: Array.isArray(path) ? path : path.split("."), where };
}

export function actor(...path: string[]): TemplateRef {
  return { $ref: "actor", path };
}

export function context(...path: string[]): TemplateRef {
  return { $ref: "context", path };
}

export function arg(...path: string[]): TemplateRef {
  return { $ref: "arg", path };
}

export function isTemplateRef(value: unknown): value is TemplateRef {
  if (!value || typeof value !== "object" || Array.isArray(value)) return false;
  const ref: unknown = Reflect.get(value, "$ref");
  const path: unknown = Reflect.get(value, "path");
  return (ref === "actor" || ref === "context" || ref === "arg") && Array.isArray(path);
}

export function isConst(
  expr: FilterExpr,
  value?: boolean,
): expr is { op: "const"; value: boolean } {
  return expr.op === "const" && (value === undefined || expr.value === value);
}

/** Human-readable rendering, used in logs and error messages. */
export function describeFilter(expr: FilterExpr): string {
  switch (expr.op) {
    case "const":
      return String(expr.value);
    case "and":
      return expr.args.length ? `(${expr.args.map(describeFilter).join(" and ")})` : "true";
    case "or":
      return expr.args.length ? `(${expr.args.map(describeFilter).join(" or ")})` : "false";
    case "not":
      return `not ${describeFilter(expr.arg)}`;
    case "compare":
      return `${expr.field} ${expr.cmp} ${describeValue(expr.value)}`;
    case "related":
      return `${expr.path.join(".")}[${describeFilter(expr.where)}]`;
  }
}

function describeValue(value: FilterValue): string {
  if (isTemplateRef(value)) return `${value.$ref}(${value.path.join(".")})`;
  return JSON.stringify(value);
}
