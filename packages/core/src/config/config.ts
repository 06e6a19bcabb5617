import { z } from "zod";
import type { EngineOptions } from "../authz/options.js";

const EnvSchema = z.object({
  POLICY_CHECK_TIMEOUT_MS: z
    .string()
    .default("5000")
    .transform((v) => Number(v))
    .pipe(z.number().int().positive()),
  POLICY_MANUAL_TIMEOUT: z.enum(["forbid", "defer"]).default("forbid"),
  POLICY_UNKNOWN_CONDITION: z.enum(["defer", "recheck"]).default("defer"),
  POLICY_ON_CHECK_ERROR: z.enum(["forbid", "throw"]).default("forbid"),
  POLICY_FORBIDDEN_READ: z.enum(["filter", "error"]).default("filter"),
  POLICY_RECHECK_CONCURRENCY: z
    .string()
    .default("8")
    .transform((v) => Number(v))
    .pipe(z.number().int().positive()),
  POLICY_LOG_DECISIONS: z
    .string()
    .optional()
    .transform((v) => (v == null ? true : v === "true")),
});

export type EngineConfig = z.infer<typeof EnvSchema>;

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw new Error(`Invalid environment: ${msg}`);
  }
  return parsed.data;
}

export function toEngineOptions(config: EngineConfig): EngineOptions {
  return {
    checkTimeoutMs: config.POLICY_CHECK_TIMEOUT_MS,
    manualTimeout: config.POLICY_MANUAL_TIMEOUT,
    unknownCondition: config.POLICY_UNKNOWN_CONDITION,
    onCheckError: config.POLICY_ON_CHECK_ERROR,
    forbiddenRead: config.POLICY_FORBIDDEN_READ,
    recheckConcurrency: config.POLICY_RECHECK_CONCURRENCY,
    logDecisions: config.POLICY_LOG_DECISIONS,
  };
}
