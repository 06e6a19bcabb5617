import { definePolicySet } from "./compile.js";
import { ConfigError } from "./errors.js";
import type { ActionRef, PolicySet } from "./types.js";

export type PolicyRegistry = {
  get(resource: string, action: string): PolicySet | undefined;
  /** The registered set for an action, or an empty set that forbids everything. */
  resolve(action: ActionRef): PolicySet;
  keys(): string[];
};

export const registryKey = (resource: string, action: string) => `${resource}:${action}`;

export function createPolicyRegistry(sets: Iterable<PolicySet>): PolicyRegistry {
  const byKey = new Map<string, PolicySet>();
  for (const set of sets) {
    const key = registryKey(set.resource, set.action);
    const existing = byKey.get(key);
    if (existing) {
      throw new ConfigError(
        "DUPLICATE_POLICY_SET",
        `Policy sets ${existing.id} and ${set.id} both govern ${key}`,
      );
    }
    byKey.set(key, set);
  }

  const empty = new Map<string, PolicySet>();

  return {
    get(resource, action) {
      return byKey.get(registryKey(resource, action));
    },
    resolve(action) {
      const key = registryKey(action.resource, action.name);
      const found = byKey.get(key);
      if (found) return found;
      let fallback = empty.get(key);
      if (!fallback) {
        fallback = definePolicySet({
          resource: action.resource,
          action: action.name,
          policies: [],
        });
        empty.set(key, fallback);
      }
      return fallback;
    },
    keys() {
      return [...byKey.keys()];
    },
  };
}
