export class DirCacheError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

export class KeyError extends DirCacheError {
  constructor(
    public readonly key: string,
    public readonly reason: string
  ) {
    super(`Rejected cache key ${JSON.stringify(key)}: ${reason}`);
  }
}

export type ManifestErrorReason = "malformed" | "unsupportedVersion";

export class ManifestError extends DirCacheError {
  constructor(
    public readonly reason: ManifestErrorReason,
    message: string,
    public readonly path?: string
  ) {
    super(path ? `${message} (${path})` : message);
  }
}

export type StoreErrorKind = "io" | "codec";

export class StoreError extends DirCacheError {
  constructor(
    public readonly kind: StoreErrorKind,
    public readonly operation: string,
    public readonly path: string,
    cause?: unknown
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Failed to ${operation} ${path}${detail}`, cause);
  }
}

export class CacheOpenError extends DirCacheError {
  constructor(public readonly path: string, message: string) {
    super(message);
  }
}

/**
 * Raised by `getOrInsertWith` when the caller's producer throws. The caller's
 * own error is kept on `cause` so it can be told apart from cache failures.
 */
export class ProducerError<E = unknown> extends DirCacheError {
  constructor(public readonly cause: E) {
    super(`Value producer failed${cause instanceof Error ? `: ${cause.message}` : ""}`, cause);
  }
}

// fs errors can come from another realm (e.g. Jest's sandbox), where
// `instanceof Error` is false.
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string";
}
