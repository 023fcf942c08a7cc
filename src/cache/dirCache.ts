import path from "path";
import {
  CacheOptions,
  CacheOptionsInput,
  CallOptionsInput,
  parseCacheOptions,
  parseCallOptions,
} from "../config/schema";
import { CacheValue, Clock, Entry, GenerationInfo, WritePolicy } from "../types";
import { logger } from "../utils/logger";
import { compressionCodec } from "./codec";
import { CacheOpenError, ProducerError } from "./errors";
import { GenerationStore } from "./generationStore";
import { CacheKey, EncodedKey, encodeKey } from "./keyEncoder";
import { ByteStorage, NodeFileStorage } from "./storage";

const log = logger.child("cache");

export interface DirCacheDeps {
  storage?: ByteStorage;
  clock?: Clock;
}

function writePolicy(options: Pick<CacheOptions, "generations" | "compression">): WritePolicy {
  return {
    generationsEnabled: options.generations.enabled,
    maxGenerations: options.generations.max,
    compression: compressionCodec(options.compression),
  };
}

export function toBuffer(value: CacheValue): Buffer {
  if (typeof value === "string") return Buffer.from(value, "utf8");
  return Buffer.isBuffer(value) ? value : Buffer.from(value);
}

/**
 * Map-like cache over a directory tree. Every call validates its key and
 * reads what it needs from disk; nothing is remembered between calls.
 *
 * All operations block on synchronous file I/O. Callers with async producers
 * should fetch first and `insert` afterwards (see `memoize`).
 */
export class DirCache {
  private readonly store: GenerationStore;
  private readonly policy: WritePolicy;
  private readonly clock: Clock;

  private constructor(
    private readonly resolved: CacheOptions,
    storage: ByteStorage,
    clock: Clock
  ) {
    this.clock = clock;
    this.store = new GenerationStore(storage, clock);
    this.policy = writePolicy(resolved);
  }

  static open(options: CacheOptionsInput, deps: DirCacheDeps = {}): DirCache {
    const parsed = parseCacheOptions(options);
    const resolved = { ...parsed, baseDir: path.resolve(parsed.baseDir) };
    const storage = deps.storage ?? new NodeFileStorage();
    const kind = storage.kind(resolved.baseDir);
    if (resolved.dirOpen === "onlyIfExists" && kind === "missing") {
      throw new CacheOpenError(resolved.baseDir, `Cache directory ${resolved.baseDir} does not exist`);
    }
    if (kind === "file") {
      throw new CacheOpenError(resolved.baseDir, `Cache path ${resolved.baseDir} is not a directory`);
    }
    if (kind === "missing") {
      storage.createDir(resolved.baseDir);
    }
    log.debug("opened cache", {
      baseDir: resolved.baseDir,
      generations: resolved.generations,
      compression: resolved.compression,
      maxAgeMs: resolved.maxAgeMs,
    });
    return new DirCache(resolved, storage, deps.clock ?? Date.now);
  }

  get options(): CacheOptions {
    return this.resolved;
  }

  get baseDir() {
    return this.resolved.baseDir;
  }

  encode(key: CacheKey): EncodedKey {
    return encodeKey(key, this.resolved.baseDir);
  }

  isExpired(writtenAt: number, maxAgeMs = this.resolved.maxAgeMs) {
    return maxAgeMs !== undefined && this.clock() - writtenAt > maxAgeMs;
  }

  /**
   * Merges per-call overrides over the options given to `open`. Overrides go
   * through the same schema, so a bad value throws before any disk access.
   */
  resolveCall(overrides?: CallOptionsInput): { maxAgeMs?: number; policy: WritePolicy } {
    if (!overrides) {
      return { maxAgeMs: this.resolved.maxAgeMs, policy: this.policy };
    }
    const parsed = parseCallOptions(overrides);
    return {
      maxAgeMs: parsed.maxAgeMs ?? this.resolved.maxAgeMs,
      policy: writePolicy({
        generations: parsed.generations ?? this.resolved.generations,
        compression: parsed.compression ?? this.resolved.compression,
      }),
    };
  }

  get(key: CacheKey, overrides?: CallOptionsInput): Entry | undefined {
    const encoded = this.encode(key);
    const { maxAgeMs } = this.resolveCall(overrides);
    const current = this.store.readCurrent(encoded.directory);
    if (!current) {
      log.debug("miss", { key: encoded.relativePath });
      return undefined;
    }
    if (this.isExpired(current.entry.writtenAt, maxAgeMs)) {
      log.debug("expired", { key: encoded.relativePath, writtenAt: current.entry.writtenAt });
      return undefined;
    }
    log.debug("hit", { key: encoded.relativePath });
    return current.entry;
  }

  insert(key: CacheKey, value: CacheValue, overrides?: CallOptionsInput): Entry {
    const encoded = this.encode(key);
    const { policy } = this.resolveCall(overrides);
    return this.store.write(encoded.directory, toBuffer(value), policy);
  }

  remove(key: CacheKey): boolean {
    const encoded = this.encode(key);
    return this.store.remove(encoded.directory);
  }

  /**
   * Returns the cached entry, or calls `produce` once and stores its result.
   * A throwing producer surfaces as `ProducerError` and leaves disk untouched.
   */
  getOrInsertWith(
    key: CacheKey,
    produce: () => CacheValue,
    overrides?: CallOptionsInput
  ): Entry {
    const existing = this.get(key, overrides);
    if (existing) return existing;
    let value: CacheValue;
    try {
      value = produce();
    } catch (err) {
      throw new ProducerError(err);
    }
    return this.insert(key, value, overrides);
  }

  history(key: CacheKey): GenerationInfo[] {
    const encoded = this.encode(key);
    return this.store.listGenerations(encoded.directory);
  }

  getGeneration(key: CacheKey, generation: number): Buffer | undefined {
    const encoded = this.encode(key);
    return this.store.readGeneration(encoded.directory, generation);
  }
}
