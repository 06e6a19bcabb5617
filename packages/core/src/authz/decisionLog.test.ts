import { describe, it, expect, vi } from "vitest";

// Mock the logger before importing anything that uses it
const mockLogger = {
  info: vi.fn(),
};

vi.mock("../observability/logger.js", () => ({
  createAuthzLogger: () => mockLogger,
}));

import { actorIdOf, logDecision } from "./decisionLog.js";

describe("authz/decisionLog", () => {
  it("emits a JSON line with expected fields", () => {
    mockLogger.info.mockClear();

    logDecision({
      verdict: "forbidden",
      reason: "FORBID_CHECK",
      policySetId: "post:read",
      resource: "post",
      action: "read",
      actorId: "u1",
    });

    expect(mockLogger.info).toHaveBeenCalledOnce();
    const [logData, logMessage] = mockLogger.info.mock.calls[0] ?? [];
    expect(logData).toEqual({
      kind: "authz_decision",
      verdict: "forbidden",
      reason: "FORBID_CHECK",
      policySetId: "post:read",
      resource: "post",
      action: "read",
      actorId: "u1",
    });
    expect(logMessage).toBe("Authorization decision");
  });

  it("writes to an explicit logger when given one", () => {
    const own = { info: vi.fn() };
    mockLogger.info.mockClear();
    logDecision(
      { verdict: "authorized", policySetId: "post:read", resource: "post", action: "read" },
      // Only `info` is used.
      own as unknown as Parameters<typeof logDecision>[1],
    );
    expect(own.info).toHaveBeenCalledOnce();
    expect(mockLogger.info).not.toHaveBeenCalled();
  });

  it("derives actor ids from string and numeric ids", () => {
    expect(actorIdOf({ id: "u1" })).toBe("u1");
    expect(actorIdOf({ id: 7 })).toBe("7");
    expect(actorIdOf({ name: "x" })).toBeUndefined();
    expect(actorIdOf(null)).toBeUndefined();
  });
});
