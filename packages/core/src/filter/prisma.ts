import { UnsupportedFilterError } from "../authz/errors.js";
import { isTemplateRef, type CompareExpr, type CompareOp, type FilterExpr } from "./expr.js";
import type { FilterTranslator } from "./translate.js";

export type PrismaWhere = Record<string, unknown>;

export type PrismaTranslatorOptions = {
  /** Cardinality of a relationship, by dotted path from the root model. Defaults to "many". */
  cardinality?: (path: string) => "one" | "many";
  /** Comparison operators the target model supports. Defaults to all of them. */
  operators?: readonly CompareOp[];
};

// Prisma treats an empty OR as "no rows" and an empty object as "all rows".
const MATCH_NONE: PrismaWhere = { OR: [] };
const MATCH_ALL: PrismaWhere = {};

const RANGE_KEYS = { lt: "lt", lte: "lte", gt: "gt", gte: "gte" } as const;

/**
 * Builds Prisma `where` inputs from filter expressions. The database answers each input under SQL's
 * three-valued logic, which is how `evaluateFilter` answers the same expression in memory.
 */
export function createPrismaWhereTranslator(
  options: PrismaTranslatorOptions = {},
): FilterTranslator<PrismaWhere> {
  const cardinality = options.cardinality ?? (() => "many");
  const operators = options.operators ? new Set<CompareOp>(options.operators) : null;

  function translateAt(expr: FilterExpr, prefix: string[]): PrismaWhere {
    switch (expr.op) {
      case "const":
        return expr.value ? MATCH_ALL : MATCH_NONE;
      case "and":
        return { AND: expr.args.map((a) => translateAt(a, prefix)) };
      case "or":
        return { OR: expr.args.map((a) => translateAt(a, prefix)) };
      case "not":
        return { NOT: translateAt(expr.arg, prefix) };
      case "compare":
        return translateCompare(expr);
      case "related":
        return translateRelated(expr.path, expr.where, prefix);
    }
  }

  function translateRelated(path: string[], where: FilterExpr, prefix: string[]): PrismaWhere {
    const [head, ...rest] = path;
    if (head === undefined) return translateAt(where, prefix);
    const full = [...prefix, head];
    const inner = translateRelated(rest, where, full);
    const key = cardinality(full.join(".")) === "one" ? "is" : "some";
    return { [head]: { [key]: inner } };
  }

  function translateCompare(expr: CompareExpr): PrismaWhere {
    if (operators && !operators.has(expr.cmp)) {
      throw new UnsupportedFilterError(
        "UNSUPPORTED_OPERATOR",
        `Operator ${expr.cmp} is not supported on ${expr.field}`,
        { field: expr.field, cmp: expr.cmp },
      );
    }
    const value = expr.value;
    if (isTemplateRef(value)) {
      throw new UnsupportedFilterError(
        "UNRESOLVED_TEMPLATE",
        `Filter on ${expr.field} still references ${value.$ref}(${value.path.join(".")})`,
      );
    }
    if (expr.cmp === "isNil") {
      return value === true ? { [expr.field]: null } : { NOT: { [expr.field]: null } };
    }
    if (expr.cmp === "in") {
      const list = Array.isArray(value) ? value.filter((v) => v !== null) : [];
      return { [expr.field]: { in: list } };
    }
    // `field = null` never matches; Prisma's `equals: null` would match nulls.
    if (value === null || Array.isArray(value)) return MATCH_NONE;
    if (expr.cmp === "eq") return { [expr.field]: { equals: value } };
    // Prisma renders `not` as `<>`, which is unknown on NULL, like every other comparison.
    if (expr.cmp === "neq") return { [expr.field]: { not: value } };
    return { [expr.field]: { [RANGE_KEYS[expr.cmp]]: value } };
  }

  return {
    name: "prisma",
    translate: (expr) => translateAt(expr, []),
  };
}
