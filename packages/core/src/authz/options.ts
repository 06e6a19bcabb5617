import type { FilterTranslator } from "../filter/translate.js";
import { createAuthzLogger, type Logger } from "../observability/logger.js";
import type { ContextProvider } from "./context.js";
import type { ForbiddenReadMode } from "./types.js";

export type ManualTimeoutMode = "forbid" | "defer";
export type UnknownConditionMode = "defer" | "recheck";
export type CheckErrorMode = "forbid" | "throw";

export type EngineOptions = {
  /** Default timeout for manual checks; a check's own `timeoutMs` wins. */
  checkTimeoutMs?: number;
  manualTimeout?: ManualTimeoutMode;
  /**
   * How a policy condition that is not known before data is fetched is treated. `defer` keeps
   * filter-capable conditions in the storage filter, `recheck` resolves every such condition per
   * record.
   */
  unknownCondition?: UnknownConditionMode;
  onCheckError?: CheckErrorMode;
  recheckConcurrency?: number;
  forbiddenRead?: ForbiddenReadMode;
  /** Filters this translator cannot express become pending and are resolved by recheck. */
  translator?: FilterTranslator<unknown>;
  contextProvider?: ContextProvider;
  logger?: Logger;
  logDecisions?: boolean;
};

export type ResolvedEngineOptions = {
  checkTimeoutMs: number;
  manualTimeout: ManualTimeoutMode;
  unknownCondition: UnknownConditionMode;
  onCheckError: CheckErrorMode;
  recheckConcurrency: number;
  forbiddenRead: ForbiddenReadMode;
  translator?: FilterTranslator<unknown>;
  contextProvider?: ContextProvider;
  logger: Logger;
  logDecisions: boolean;
};

export const DEFAULT_CHECK_TIMEOUT_MS = 5_000;
export const DEFAULT_RECHECK_CONCURRENCY = 8;

export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  return {
    checkTimeoutMs: options.checkTimeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS,
    manualTimeout: options.manualTimeout ?? "forbid",
    unknownCondition: options.unknownCondition ?? "defer",
    onCheckError: options.onCheckError ?? "forbid",
    recheckConcurrency: Math.max(1, options.recheckConcurrency ?? DEFAULT_RECHECK_CONCURRENCY),
    forbiddenRead: options.forbiddenRead ?? "filter",
    translator: options.translator,
    contextProvider: options.contextProvider,
    logger: options.logger ?? createAuthzLogger(),
    logDecisions: options.logDecisions ?? true,
  };
}
