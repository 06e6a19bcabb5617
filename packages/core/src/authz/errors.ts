export type PolicyErrorKind = "CONFIG" | "CHECK" | "UNSUPPORTED_FILTER" | "FORBIDDEN";

export type CheckFailureReason = "ERROR" | "TIMEOUT" | "CANCELLED";

export interface PolicyErrorOptions {
  kind: PolicyErrorKind;
  code: string;
  message?: string;
  details?: unknown;
  cause?: unknown;
}

export class PolicyError extends Error {
  readonly kind: PolicyErrorKind;
  readonly code: string;
  readonly details?: unknown;

  constructor(opts: PolicyErrorOptions) {
    super(opts.message ?? opts.code, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "PolicyError";
    this.kind = opts.kind;
    this.code = opts.code;
    this.details = opts.details;
  }
}

/** A malformed policy definition or a request routed to the wrong policy set. Raised at setup. */
export class ConfigError extends PolicyError {
  constructor(code: string, message?: string, details?: unknown) {
    super({ kind: "CONFIG", code, message, details });
    this.name = "ConfigError";
  }
}

export class CheckEvaluationError extends PolicyError {
  readonly reason: CheckFailureReason;
  readonly checkId: string;

  constructor(opts: {
    checkId: string;
    reason: CheckFailureReason;
    message?: string;
    cause?: unknown;
  }) {
    super({
      kind: "CHECK",
      code: `CHECK_${opts.reason}`,
      message: opts.message ?? `Check ${opts.checkId} failed (${opts.reason.toLowerCase()})`,
      details: { checkId: opts.checkId },
      cause: opts.cause,
    });
    this.name = "CheckEvaluationError";
    this.reason = opts.reason;
    this.checkId = opts.checkId;
  }

  static from(checkId: string, err: unknown): CheckEvaluationError {
    if (err instanceof CheckEvaluationError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new CheckEvaluationError({
      checkId,
      reason: "ERROR",
      message: `Check ${checkId} raised: ${message}`,
      cause: err,
    });
  }
}

/** The filter cannot be expressed for the target storage backend. */
export class UnsupportedFilterError extends PolicyError {
  constructor(code: string, message?: string, details?: unknown) {
    super({ kind: "UNSUPPORTED_FILTER", code, message, details });
    this.name = "UnsupportedFilterError";
  }
}

export class ForbiddenError extends PolicyError {
  constructor(code: string, message?: string, details?: unknown) {
    super({ kind: "FORBIDDEN", code, message: message ?? "Not allowed", details });
    this.name = "ForbiddenError";
  }
}
