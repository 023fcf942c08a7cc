import type { Codec } from "./cache/codec";
import type { Encoding, Manifest } from "./cache/manifest";

export type { CacheKey, EncodedKey } from "./cache/keyEncoder";
export type { Encoding, GenerationRecord, Manifest } from "./cache/manifest";

export interface Entry {
  value: Buffer;
  /** Unix epoch milliseconds of the write that produced this value. */
  writtenAt: number;
}

export interface CurrentEntry {
  entry: Entry;
  manifest: Manifest;
}

export interface GenerationInfo {
  generation: number;
  writtenAt: number;
  encoding: Encoding;
  path: string;
}

export interface WritePolicy {
  generationsEnabled: boolean;
  maxGenerations: number;
  /** Applied to the value leaving generation 0. Omit to keep history plain. */
  compression?: Codec;
}

export type CacheValue = Buffer | Uint8Array | string;

export type Clock = () => number;
