import { CallOptionsInput } from "../config/schema";
import { CacheValue, Entry } from "../types";
import { DirCache } from "./dirCache";
import { ProducerError } from "./errors";
import { CacheKey } from "./keyEncoder";

/**
 * Async counterpart of `getOrInsertWith`. The cache stays synchronous: the
 * lookup and the insert are separate calls around the awaited producer, so two
 * overlapping misses on one key may both produce and the later write wins.
 */
export async function memoize(
  cache: DirCache,
  key: CacheKey,
  produce: () => Promise<CacheValue>,
  overrides?: CallOptionsInput
): Promise<Entry> {
  const cached = cache.get(key, overrides);
  if (cached) {
    return cached;
  }
  let value: CacheValue;
  try {
    value = await produce();
  } catch (err) {
    throw new ProducerError(err);
  }
  return cache.insert(key, value, overrides);
}

/**
 * `memoize` for JSON payloads, e.g. API responses. A result `JSON.stringify`
 * cannot encode (such as `undefined`) fails as a `ProducerError`.
 */
export async function memoizeJson<T>(
  cache: DirCache,
  key: CacheKey,
  produce: () => Promise<T>,
  overrides?: CallOptionsInput
): Promise<T> {
  const entry = await memoize(
    cache,
    key,
    async () => {
      const result = await produce();
      const json: string | undefined = JSON.stringify(result);
      if (json === undefined) {
        throw new TypeError(`Cannot cache result of type ${typeof result} as JSON`);
      }
      return json;
    },
    overrides
  );
  return JSON.parse(entry.value.toString("utf8")) as T;
}
