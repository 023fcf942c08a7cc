import crypto from "crypto";
import stringify from "fast-json-stable-stringify";

export function stableHash(input: unknown): string {
  const payload = typeof input === "string" ? input : stringify(input);
  return crypto.createHash("sha1").update(payload).digest("hex");
}

/**
 * Builds a two-segment cache key from structured request data, e.g.
 * `hashedKey("http", [method, url])` for a memoized request.
 * Object key order does not affect the hash.
 */
export function hashedKey(namespace: string, parts: unknown[]): [string, string] {
  return [namespace, stableHash(parts)];
}
