import type { FilterExpr } from "../filter/expr.js";
import type { RecordLike, Truth } from "../filter/evaluate.js";

export type Actor = Readonly<Record<string, unknown>>;

export type ActionType = "read" | "create" | "update" | "destroy" | "action";

export type ActionRef = {
  resource: string;
  name: string;
  type: ActionType;
};

export type Subject =
  | { kind: "query"; query?: unknown }
  | { kind: "changeset"; data: RecordLike; record?: RecordLike };

export type AuthorizationRequest = {
  actor: Actor | null;
  action: ActionRef;
  subject: Subject;
  context?: Readonly<Record<string, unknown>>;
  arguments?: Readonly<Record<string, unknown>>;
  /** Cancels in-flight manual checks; a cancelled check fails closed. */
  signal?: AbortSignal;
};

/** What a check sees. `record` is present once data is materialized. */
export type CheckInput = {
  actor: Actor | null;
  action: ActionRef;
  subject: Subject;
  context: Readonly<Record<string, unknown>>;
  arguments: Readonly<Record<string, unknown>>;
  record?: RecordLike;
};

type CheckBase = {
  readonly id: string;
  readonly description: string;
};

export type SimpleCheck = CheckBase & {
  readonly kind: "simple";
  evaluate(input: CheckInput): Truth;
};

export type FilterCheck = CheckBase & {
  readonly kind: "filter";
  /** May reference `actor(...)`, `context(...)` and `arg(...)`; resolved by the engine. */
  filter(input: CheckInput): FilterExpr;
  /** Optional shortcut answering without building the filter. */
  strict?(input: CheckInput): Truth;
  /** The filter before template resolution, when it does not depend on the input. */
  readonly template?: FilterExpr;
};

export type ManualCheck = CheckBase & {
  readonly kind: "manual";
  /** When true the check only runs against a materialized record. */
  readonly requiresRecord: boolean;
  readonly timeoutMs?: number;
  run(input: CheckInput, opts: { signal: AbortSignal }): boolean | Promise<boolean>;
};

export type Check = SimpleCheck | FilterCheck | ManualCheck;

export type CheckKind = Check["kind"];

export type AccessType = "authorize_if" | "forbid_if" | "authorize_unless" | "forbid_unless";

export type PolicyRule = {
  readonly access: AccessType;
  readonly check: Check;
};

export type Policy = {
  readonly description: string;
  readonly condition: readonly Check[];
  readonly rules: readonly PolicyRule[];
};

export type ForbiddenReadMode = "filter" | "error";

export type PolicySetDefinition = {
  id?: string;
  resource: string;
  action: string;
  policies: Policy[];
  /** Data scope applied to every read through this set; does not affect the verdict. */
  baseFilter?: FilterExpr;
  forbiddenRead?: ForbiddenReadMode;
};

export type PolicySet = {
  readonly id: string;
  readonly hash: string;
  readonly resource: string;
  readonly action: string;
  readonly policies: readonly Policy[];
  readonly baseFilter?: FilterExpr;
  readonly forbiddenRead?: ForbiddenReadMode;
};

export type ForbiddenReason =
  | "NO_POLICIES"
  | "NO_AUTHORIZING_POLICY"
  | "FORBID_CHECK"
  | "CHECK_ERROR";

export type PendingAtom = {
  readonly check: Check;
  readonly policy: string;
  readonly role: AccessType | "condition";
  /** Resolved filter, when the check produced one the backend cannot run. */
  readonly filter?: FilterExpr;
};

/** Boolean structure over the parts of a decision that are still open. */
export type Residual =
  | { kind: "const"; value: boolean }
  | { kind: "filter"; expr: FilterExpr }
  | { kind: "pending"; atom: PendingAtom }
  | { kind: "and"; args: Residual[] }
  | { kind: "or"; args: Residual[] }
  | { kind: "not"; arg: Residual };

export type Verdict =
  | { kind: "authorized" }
  | { kind: "forbidden"; reason: ForbiddenReason; policy?: string; check?: string }
  | { kind: "filterRequired"; filter: FilterExpr }
  | { kind: "undecided"; residual: Residual; prefilter: FilterExpr };

export type VerdictKind = Verdict["kind"];
