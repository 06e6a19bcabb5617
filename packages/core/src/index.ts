export * from "./filter/expr.js";
export {
  evaluateFilter,
  truthAnd,
  truthNot,
  truthOr,
  type RecordLike,
  type Truth,
} from "./filter/evaluate.js";
export { simplify } from "./filter/simplify.js";
export { hasTemplates, readPath, resolveTemplates, type TemplateScope } from "./filter/template.js";
export {
  identityTranslator,
  translatorSupports,
  type FilterTranslator,
} from "./filter/translate.js";
export {
  createPrismaWhereTranslator,
  type PrismaWhere,
  type PrismaTranslatorOptions,
} from "./filter/prisma.js";
export { FilterExprSchema, parseFilter } from "./filter/schema.js";

export * from "./authz/types.js";
export * from "./authz/errors.js";
export * from "./authz/checks.js";
export * from "./authz/policy.js";
export { definePolicySet, computePolicySetHash, assertMatchesAction } from "./authz/compile.js";
export { buildCheckInput, materializedRecord, type ContextProvider } from "./authz/context.js";
export {
  DEFAULT_CHECK_TIMEOUT_MS,
  DEFAULT_RECHECK_CONCURRENCY,
  resolveEngineOptions,
  type CheckErrorMode,
  type EngineOptions,
  type ManualTimeoutMode,
  type UnknownConditionMode,
} from "./authz/options.js";
export { authorize, filterFor, verdictFilter } from "./authz/engine.js";
export {
  recheck,
  type RecheckDenial,
  type RecheckDenialReason,
  type RecheckResult,
} from "./authz/recheck.js";
export {
  authorizeRead,
  authorizeWrite,
  type ReadParams,
  type ReadResult,
  type WriteParams,
} from "./authz/apply.js";
export { createPolicyRegistry, registryKey, type PolicyRegistry } from "./authz/registry.js";
export {
  createPolicyEngine,
  type PolicyEngine,
  type PolicyEngineOptions,
} from "./authz/policy-engine.js";
export {
  cachedAuthorize,
  createVerdictCache,
  verdictCacheKey,
  type VerdictCache,
} from "./authz/cache.js";
export { logDecision, type DecisionEvent } from "./authz/decisionLog.js";
export { necessaryFilter, residualToFilter, pendingAtoms } from "./authz/residual.js";

export type { StorageFilterExecutor } from "./storage/types.js";
export { createMemoryExecutor, type MemoryExecutor, type MemoryQuery } from "./storage/memory.js";

export { loadEngineConfig, toEngineOptions, type EngineConfig } from "./config/config.js";
export {
  createBaseLogger,
  createChildLogger,
  logger,
  type Logger,
  type LoggerConfig,
} from "./observability/logger.js";
