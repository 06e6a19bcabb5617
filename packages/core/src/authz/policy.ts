import type { AccessType, Check, Policy, PolicyRule } from "./types.js";

export const authorizeIf = (check: Check): PolicyRule => rule("authorize_if", check);
export const forbidIf = (check: Check): PolicyRule => rule("forbid_if", check);
export const authorizeUnless = (check: Check): PolicyRule => rule("authorize_unless", check);
export const forbidUnless = (check: Check): PolicyRule => rule("forbid_unless", check);

function rule(access: AccessType, check: Check): PolicyRule {
  return Object.freeze({ access, check });
}

export function policy(opts: {
  description: string;
  condition?: Check | Check[];
  rules: PolicyRule[];
}): Policy {
  const condition = opts.condition === undefined ? [] : [opts.condition].flat();
  return Object.freeze({
    description: opts.description,
    condition: Object.freeze([...condition]),
    rules: Object.freeze([...opts.rules]),
  });
}

export function isAuthorizeRule(access: AccessType): boolean {
  return access === "authorize_if" || access === "authorize_unless";
}

/** `*_unless` rules fire when their check is false. */
export function isNegated(access: AccessType): boolean {
  return access === "authorize_unless" || access === "forbid_unless";
}
