import path from "path";
import { KeyError } from "./errors";

export type CacheKey = string | readonly string[];

export interface EncodedKey {
  segments: readonly string[];
  /** `/`-joined form, as shown in logs and the CLI. */
  relativePath: string;
  /** Absolute key directory under the cache base directory. */
  directory: string;
}

export const RESERVED_PREFIX = "dir-cache-";

const SEPARATORS = /[\\/]/;
const DRIVE_PREFIX = /^[A-Za-z]:/;

export function describeKey(key: CacheKey): string {
  return typeof key === "string" ? key : key.join("/");
}

function checkSegment(raw: string, segment: string) {
  if (segment.length === 0) {
    throw new KeyError(raw, "empty path segment");
  }
  if (segment === "." || segment === "..") {
    throw new KeyError(raw, `relative segment "${segment}" is not allowed`);
  }
  if (SEPARATORS.test(segment)) {
    throw new KeyError(raw, `segment "${segment}" contains a path separator`);
  }
  if (segment.includes("\0")) {
    throw new KeyError(raw, "segment contains a NUL byte");
  }
  if (DRIVE_PREFIX.test(segment)) {
    throw new KeyError(raw, `segment "${segment}" looks like a drive prefix`);
  }
  if (segment.startsWith(RESERVED_PREFIX)) {
    throw new KeyError(raw, `segment "${segment}" uses the reserved prefix ${RESERVED_PREFIX}`);
  }
}

function splitKey(key: CacheKey): string[] {
  return typeof key === "string" ? key.split("/") : [...key];
}

/**
 * Validates a caller key and maps it to a directory below `baseDir`.
 *
 * Nothing is coerced: a key that would need normalizing to be safe is
 * rejected outright. The final containment check runs against the resolved
 * paths, independent of the per-segment rules.
 */
export function encodeKey(key: CacheKey, baseDir: string): EncodedKey {
  const raw = describeKey(key);
  if (raw.length === 0) {
    throw new KeyError(raw, "key is empty");
  }
  if (path.posix.isAbsolute(raw) || path.win32.isAbsolute(raw)) {
    throw new KeyError(raw, "key is an absolute path");
  }

  const segments = splitKey(key);
  for (const segment of segments) {
    checkSegment(raw, segment);
  }

  const relativePath = segments.join("/");
  const expectedLength =
    segments.reduce((sum, segment) => sum + segment.length, 0) + segments.length - 1;
  const normalized = path.posix.normalize(relativePath);
  if (
    relativePath.length !== raw.length ||
    expectedLength !== raw.length ||
    normalized.length !== raw.length
  ) {
    throw new KeyError(raw, "key text does not match its parsed segments");
  }

  const root = path.resolve(baseDir);
  const directory = path.resolve(root, ...segments);
  const relative = path.relative(root, directory);
  if (
    relative.length === 0 ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new KeyError(raw, "key resolves outside the cache directory");
  }

  return { segments, relativePath, directory };
}
