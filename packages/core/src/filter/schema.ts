import { z } from "zod";
import type { FilterExpr, Scalar, TemplateRef } from "./expr.js";

const ScalarSchema: z.ZodType<Scalar> = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const TemplateRefSchema: z.ZodType<TemplateRef> = z.object({
  $ref: z.enum(["actor", "context", "arg"]),
  path: z.array(z.string().min(1)).min(1),
});

const CompareSchema = z.object({
  op: z.literal("compare"),
  field: z.string().min(1),
  cmp: z.enum(["eq", "neq", "lt", "lte", "gt", "gte", "in", "isNil"]),
  value: z.union([TemplateRefSchema, z.array(ScalarSchema), ScalarSchema]),
});

/** Structural validation for filters that arrive as data (configuration files, JSON). */
export const FilterExprSchema: z.ZodType<FilterExpr> = z.lazy(() =>
  z.union([
    z.object({ op: z.literal("const"), value: z.boolean() }),
    z.object({ op: z.literal("and"), args: z.array(FilterExprSchema) }),
    z.object({ op: z.literal("or"), args: z.array(FilterExprSchema) }),
    z.object({ op: z.literal("not"), arg: FilterExprSchema }),
    CompareSchema,
    z.object({
      op: z.literal("related"),
      path: z.array(z.string().min(1)).min(1),
      where: FilterExprSchema,
    }),
  ]),
);

export function parseFilter(input: unknown): FilterExpr {
  return FilterExprSchema.parse(input);
}
