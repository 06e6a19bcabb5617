import { UnsupportedFilterError } from "../authz/errors.js";
import { describeFilter, type FilterExpr } from "./expr.js";
import { hasTemplates } from "./template.js";

/**
 * Converts a filter into a storage backend's native filter representation. Backends that cannot
 * express part of a filter throw `UnsupportedFilterError` from `translate`.
 */
export interface FilterTranslator<TNative> {
  readonly name: string;
  translate(expr: FilterExpr): TNative;
  supports?(expr: FilterExpr): boolean;
}

export function translatorSupports<TNative>(
  translator: FilterTranslator<TNative>,
  expr: FilterExpr,
): boolean {
  if (translator.supports) return translator.supports(expr);
  try {
    translator.translate(expr);
    return true;
  } catch (err) {
    if (err instanceof UnsupportedFilterError) return false;
    throw err;
  }
}

/** The in-memory backend evaluates filter expressions directly. */
export const identityTranslator: FilterTranslator<FilterExpr> = {
  name: "memory",
  translate(expr) {
    if (hasTemplates(expr)) {
      throw new UnsupportedFilterError(
        "UNRESOLVED_TEMPLATE",
        `Filter still references request values: ${describeFilter(expr)}`,
      );
    }
    return expr;
  },
};
