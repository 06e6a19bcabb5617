import pino, { type Logger } from "pino";
import { trace } from "@opentelemetry/api";

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  redact?: string[];
}

export function createBaseLogger(config: LoggerConfig = {}): Logger {
  const {
    level = process.env.LOG_LEVEL || "info",
    pretty = process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development",
    redact = ["password", "token", "secret", "authorization", "cookie"],
  } = config;

  const transport = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      })
    : undefined;

  return pino(
    {
      level,
      redact,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      mixin() {
        const span = trace.getActiveSpan();
        if (span) {
          const spanContext = span.spanContext();
          return {
            traceId: spanContext.traceId,
            spanId: spanContext.spanId,
          };
        }
        return {};
      },
    },
    transport,
  );
}

export const logger = createBaseLogger();

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export function createAuthzLogger() {
  return createChildLogger({ component: "authz" });
}

export function createRecheckLogger() {
  return createChildLogger({ component: "recheck" });
}

export function createStorageLogger() {
  return createChildLogger({ component: "storage" });
}

export type { Logger };
