import { evaluateFilter, type RecordLike } from "../filter/evaluate.js";
import type { FilterExpr } from "../filter/expr.js";
import { identityTranslator } from "../filter/translate.js";
import { createStorageLogger } from "../observability/logger.js";
import type { StorageFilterExecutor } from "./types.js";

export type MemoryQuery = {
  filters: FilterExpr[];
  limit?: number;
  offset?: number;
};

export interface MemoryExecutor<TRecord extends RecordLike>
  extends StorageFilterExecutor<MemoryQuery, TRecord> {
  query(opts?: { limit?: number; offset?: number }): MemoryQuery;
  insert(...records: TRecord[]): void;
  reset(records?: Iterable<TRecord>): void;
  size(): number;
}

/**
 * In-process executor over an array of records. A record matches a query when every filter
 * evaluates to true; records the filter cannot decide (missing fields) are excluded.
 */
export function createMemoryExecutor<TRecord extends RecordLike>(
  seed: Iterable<TRecord> = [],
): MemoryExecutor<TRecord> {
  const log = createStorageLogger();
  let rows: TRecord[] = [...seed];

  return {
    translator: identityTranslator,
    query(opts = {}) {
      return { filters: [], limit: opts.limit, offset: opts.offset };
    },
    applyFilter(query, filter) {
      return { ...query, filters: [...query.filters, identityTranslator.translate(filter)] };
    },
    async fetch(query) {
      const matched = rows.filter((row) =>
        query.filters.every((filter) => evaluateFilter(filter, row) === true),
      );
      const start = Math.max(0, query.offset ?? 0);
      const end = query.limit != null ? start + Math.max(0, query.limit) : undefined;
      const page = matched.slice(start, end);
      log.debug(
        { filters: query.filters.length, matched: matched.length, returned: page.length },
        "Memory executor fetch",
      );
      return page;
    },
    insert(...records) {
      rows.push(...records);
    },
    reset(records = []) {
      rows = [...records];
    },
    size() {
      return rows.length;
    },
  };
}
