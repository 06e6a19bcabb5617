import { evaluateFilter } from "../filter/evaluate.js";
import type { FilterExpr } from "../filter/expr.js";
import { simplify } from "../filter/simplify.js";
import { resolveTemplates } from "../filter/template.js";
import { CheckEvaluationError, UnsupportedFilterError } from "./errors.js";
import type { Check, CheckInput, FilterCheck, ManualCheck } from "./types.js";

export type CheckPhase = "strict" | "recheck";

export type CheckEvaluationOptions = {
  phase: CheckPhase;
  timeoutMs: number;
  /** What a manual timeout means during the strict phase. Recheck timeouts always fail. */
  manualTimeout: "forbid" | "defer";
  supportsFilter?: (expr: FilterExpr) => boolean;
  signal?: AbortSignal;
};

export type CheckOutcome =
  | { status: "known"; value: boolean }
  | { status: "filter"; expr: FilterExpr }
  | { status: "pending"; filter?: FilterExpr }
  | { status: "failed"; error: CheckEvaluationError };

export async function evaluateCheck(
  check: Check,
  input: CheckInput,
  opts: CheckEvaluationOptions,
): Promise<CheckOutcome> {
  switch (check.kind) {
    case "simple":
      try {
        const value = check.evaluate(input);
        return value === "unknown" ? { status: "pending" } : { status: "known", value };
      } catch (err) {
        return { status: "failed", error: CheckEvaluationError.from(check.id, err) };
      }
    case "filter":
      return evaluateFilterCheck(check, input, opts);
    case "manual":
      return evaluateManualCheck(check, input, opts);
  }
}

function evaluateFilterCheck(
  check: FilterCheck,
  input: CheckInput,
  opts: CheckEvaluationOptions,
): CheckOutcome {
  try {
    if (check.strict) {
      const shortcut = check.strict(input);
      if (shortcut !== "unknown") return { status: "known", value: shortcut };
    }
    let raw: FilterExpr;
    try {
      raw = check.filter(input);
    } catch (err) {
      if (err instanceof UnsupportedFilterError) return { status: "pending" };
      throw err;
    }
    const expr = simplify(
      resolveTemplates(raw, {
        actor: input.actor,
        context: input.context,
        arguments: input.arguments,
      }),
    );
    if (expr.op === "const") return { status: "known", value: expr.value };
    if (input.record) {
      const value = evaluateFilter(expr, input.record);
      if (value !== "unknown") return { status: "known", value };
    }
    if (opts.phase === "recheck") return { status: "pending", filter: expr };
    if (opts.supportsFilter && !opts.supportsFilter(expr)) {
      return { status: "pending", filter: expr };
    }
    return { status: "filter", expr };
  } catch (err) {
    return { status: "failed", error: CheckEvaluationError.from(check.id, err) };
  }
}

async function evaluateManualCheck(
  check: ManualCheck,
  input: CheckInput,
  opts: CheckEvaluationOptions,
): Promise<CheckOutcome> {
  if (check.requiresRecord && !input.record) return { status: "pending" };
  try {
    const timeoutMs = check.timeoutMs ?? opts.timeoutMs;
    const value = await runWithTimeout(check, input, timeoutMs, opts.signal);
    return { status: "known", value };
  } catch (err) {
    const error = CheckEvaluationError.from(check.id, err);
    if (error.reason === "TIMEOUT" && opts.phase === "strict" && opts.manualTimeout === "defer") {
      return { status: "pending" };
    }
    return { status: "failed", error };
  }
}

async function runWithTimeout(
  check: ManualCheck,
  input: CheckInput,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<boolean> {
  if (parent?.aborted) {
    throw new CheckEvaluationError({ checkId: check.id, reason: "CANCELLED" });
  }
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    // Reject before aborting so the check's own abort handling cannot settle the race first.
    timer = setTimeout(() => {
      reject(
        new CheckEvaluationError({
          checkId: check.id,
          reason: "TIMEOUT",
          message: `Check ${check.id} timed out after ${timeoutMs}ms`,
        }),
      );
      controller.abort();
    }, timeoutMs);
    if (parent) {
      onAbort = () => {
        reject(new CheckEvaluationError({ checkId: check.id, reason: "CANCELLED" }));
        controller.abort();
      };
      parent.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    const result = await Promise.race([
      Promise.resolve().then(() => check.run(input, { signal: controller.signal })),
      guard,
    ]);
    if (typeof result !== "boolean") {
      throw new CheckEvaluationError({
        checkId: check.id,
        reason: "ERROR",
        message: `Check ${check.id} returned ${typeof result}, expected boolean`,
      });
    }
    return result;
  } finally {
    if (timer) clearTimeout(timer);
    if (parent && onAbort) parent.removeEventListener("abort", onAbort);
  }
}
