export { DirCache, toBuffer } from "./cache/dirCache";
export type { DirCacheDeps } from "./cache/dirCache";
export { GenerationStore } from "./cache/generationStore";
export { encodeKey, describeKey, RESERVED_PREFIX } from "./cache/keyEncoder";
export {
  MANIFEST_FILE,
  MANIFEST_VERSION,
  createManifest,
  generationCount,
  generationFileName,
  lastWrite,
  parseManifest,
  serializeManifest,
} from "./cache/manifest";
export { NodeFileStorage } from "./cache/storage";
export type { ByteStorage, DirEntry, PathKind } from "./cache/storage";
export { codecFor, compressionCodec } from "./cache/codec";
export type { Codec, CompressionKind } from "./cache/codec";
export { memoize, memoizeJson } from "./cache/memoize";
export {
  CacheOpenError,
  DirCacheError,
  KeyError,
  ManifestError,
  ProducerError,
  StoreError,
} from "./cache/errors";
export {
  cacheOptionsSchema,
  callOptionsSchema,
  loadConfig,
  parseCacheOptions,
  parseCallOptions,
} from "./config/schema";
export type {
  CacheOptions,
  CacheOptionsInput,
  CallOptions,
  CallOptionsInput,
  LoadedConfig,
} from "./config/schema";
export { hashedKey, stableHash } from "./utils/hashing";
export { Logger, logger } from "./utils/logger";
export * from "./types";
