import { createHash } from "node:crypto";

function deepSortUnknown(obj: unknown, seen: WeakSet<object>): unknown {
  if (obj === null || typeof obj !== "object") return obj;
  if (obj instanceof Date) return Number.isNaN(obj.getTime()) ? null : obj.toISOString();
  if (Array.isArray(obj)) return obj.map((x) => deepSortUnknown(x, seen));
  if (seen.has(obj)) return null;
  seen.add(obj);
  const keys = Object.keys(obj).sort();
  const out: Record<string, unknown> = {};
  for (const k of keys) out[k] = deepSortUnknown(Reflect.get(obj, k), seen);
  seen.delete(obj);
  return out;
}

export function canonicalStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(deepSortUnknown(obj, seen)) ?? "null";
}

export function canonicalHash(obj: unknown): string {
  return createHash("sha256").update(canonicalStringify(obj)).digest("hex");
}
