import type { FilterExpr } from "../filter/expr.js";
import type { RecordLike } from "../filter/evaluate.js";
import type { FilterTranslator } from "../filter/translate.js";

/**
 * Storage collaborator. The engine never runs queries itself: it hands filters to `applyFilter`
 * and reads candidate records back through `fetch`.
 */
export interface StorageFilterExecutor<TQuery, TRecord extends RecordLike> {
  /** Translator for the backend's native filter form; decides what can be pushed down. */
  readonly translator?: FilterTranslator<unknown>;
  applyFilter(query: TQuery, filter: FilterExpr): TQuery | Promise<TQuery>;
  fetch(query: TQuery): Promise<TRecord[]>;
}

