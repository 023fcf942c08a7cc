import path from "path";
import { Clock, CurrentEntry, Entry, GenerationInfo, WritePolicy } from "../types";
import { logger } from "../utils/logger";
import { Codec, codecFor } from "./codec";
import { ManifestError, StoreError } from "./errors";
import {
  MANIFEST_FILE,
  Manifest,
  MANIFEST_VERSION,
  createManifest,
  generationCount,
  generationFileName,
  isCacheFileName,
  lastWrite,
  parseGenerationFileName,
  parseManifest,
  serializeManifest,
} from "./manifest";
import { ByteStorage } from "./storage";

const log = logger.child("generations");

function generationPath(dir: string, generation: number) {
  return path.join(dir, generationFileName(generation));
}

function manifestPath(dir: string) {
  return path.join(dir, MANIFEST_FILE);
}

/**
 * Owns every file inside a validated key directory: the manifest and the
 * numbered generation files. Nothing else in the directory is touched.
 */
export class GenerationStore {
  constructor(
    private readonly storage: ByteStorage,
    private readonly clock: Clock = Date.now
  ) {}

  /** Strict read: a corrupt manifest throws `ManifestError`. */
  readManifest(dir: string): Manifest | undefined {
    const file = manifestPath(dir);
    const raw = this.storage.read(file);
    if (raw === undefined) return undefined;
    return parseManifest(raw.toString("utf8"), file);
  }

  readCurrent(dir: string): CurrentEntry | undefined {
    let manifest: Manifest | undefined;
    try {
      manifest = this.readManifest(dir);
    } catch (err) {
      if (!(err instanceof ManifestError)) throw err;
      log.warn("ignoring corrupt manifest", { dir, reason: err.message });
      return undefined;
    }
    if (!manifest) return undefined;
    const value = this.storage.read(generationPath(dir, 0));
    if (value === undefined) return undefined;
    return { entry: { value, writtenAt: lastWrite(manifest) }, manifest };
  }

  write(dir: string, value: Buffer, policy: WritePolicy): Entry {
    this.storage.createDir(dir);
    const now = this.clock();
    const previous = this.manifestForWrite(dir);
    const keepHistory = policy.generationsEnabled && policy.maxGenerations > 0;
    const hasCurrent =
      previous !== undefined && this.storage.kind(generationPath(dir, 0)) === "file";

    let manifest: Manifest;
    if (keepHistory && previous && hasCurrent) {
      manifest = this.rotate(dir, previous, value, policy, now);
    } else {
      this.storage.write(generationPath(dir, 0), value);
      manifest = createManifest(now);
    }
    this.storage.write(manifestPath(dir), Buffer.from(serializeManifest(manifest), "utf8"));
    log.debug("wrote value", { dir, bytes: value.length, history: generationCount(manifest) });
    return { value, writtenAt: now };
  }

  readGeneration(dir: string, generation: number): Buffer | undefined {
    if (!Number.isInteger(generation) || generation < 0) {
      throw new RangeError(`Generation must be a non-negative integer, got ${generation}`);
    }
    const manifest = this.readManifest(dir);
    if (!manifest || generation > generationCount(manifest)) return undefined;
    const file = generationPath(dir, generation);
    const raw = this.storage.read(file);
    if (raw === undefined) return undefined;
    const { encoding } = manifest.generations[generation];
    if (encoding === "plain") return raw;
    try {
      return codecFor(encoding).decompress(raw);
    } catch (err) {
      throw new StoreError("codec", `decompress (${encoding})`, file, err);
    }
  }

  listGenerations(dir: string): GenerationInfo[] {
    const manifest = this.readManifest(dir);
    if (!manifest) return [];
    return manifest.generations.map((record, generation) => ({
      generation,
      writtenAt: record.writtenAt,
      encoding: record.encoding,
      path: generationPath(dir, generation),
    }));
  }

  /** Deletes the manifest and generation files, then the directory if it is left empty. */
  remove(dir: string): boolean {
    if (this.storage.kind(dir) !== "dir") return false;
    let removed = false;
    for (const entry of this.storage.list(dir)) {
      if (!entry.isFile || !isCacheFileName(entry.name)) continue;
      removed = this.storage.remove(path.join(dir, entry.name)) || removed;
    }
    const dirRemoved = this.storage.removeDirIfEmpty(dir);
    log.debug("removed entry", { dir, removed, dirRemoved });
    return removed;
  }

  private manifestForWrite(dir: string): Manifest | undefined {
    try {
      return this.readManifest(dir);
    } catch (err) {
      if (!(err instanceof ManifestError)) throw err;
      log.warn("regenerating entry with corrupt manifest", { dir, reason: err.message });
      this.discardHistory(dir);
      return undefined;
    }
  }

  // History listed by a corrupt manifest cannot be trusted; generation 0 is
  // overwritten by the caller.
  private discardHistory(dir: string) {
    for (const entry of this.storage.list(dir)) {
      const generation = entry.isFile ? parseGenerationFileName(entry.name) : undefined;
      if (generation !== undefined && generation > 0) {
        this.storage.remove(path.join(dir, entry.name));
      }
    }
  }

  // Order: drop generations pushed past the cap (oldest first), shift the
  // surviving history up one slot, retire generation 0, then write the new
  // value. No rename ever lands on a file that has not moved yet.
  private rotate(
    dir: string,
    previous: Manifest,
    value: Buffer,
    policy: WritePolicy,
    now: number
  ): Manifest {
    const max = policy.maxGenerations;
    const count = generationCount(previous);

    for (let generation = count; generation >= max; generation--) {
      this.storage.remove(generationPath(dir, generation));
    }

    const survivors = this.survivingHistory(dir, Math.min(count, max - 1));
    // survivors[i] lands in slot i + 2. Files behind a gap move down first,
    // nearest first; then the unbroken run starting at slot 1 shifts up,
    // oldest first.
    const gap = survivors.findIndex((generation, i) => generation !== i + 1);
    const run = gap === -1 ? survivors.length : gap;
    for (let i = run; i < survivors.length; i++) {
      if (survivors[i] !== i + 2) {
        this.storage.rename(generationPath(dir, survivors[i]), generationPath(dir, i + 2));
      }
    }
    for (let i = run - 1; i >= 0; i--) {
      this.storage.rename(generationPath(dir, survivors[i]), generationPath(dir, i + 2));
    }

    this.retireLive(dir, policy.compression);
    this.storage.write(generationPath(dir, 0), value);

    return {
      version: MANIFEST_VERSION,
      generations: [
        { writtenAt: now, encoding: "plain" },
        {
          writtenAt: previous.generations[0].writtenAt,
          encoding: policy.compression?.encoding ?? "plain",
        },
        ...survivors.map((generation) => previous.generations[generation]),
      ],
    };
  }

  // History files can go missing after an interrupted rotation or a manual
  // delete; those slots are dropped and the rest compacted.
  private survivingHistory(dir: string, upTo: number): number[] {
    const survivors: number[] = [];
    for (let generation = 1; generation <= upTo; generation++) {
      if (this.storage.kind(generationPath(dir, generation)) === "file") {
        survivors.push(generation);
      } else {
        log.warn("history file missing, compacting", { dir, generation });
      }
    }
    return survivors;
  }

  private retireLive(dir: string, codec: Codec | undefined) {
    const live = generationPath(dir, 0);
    const target = generationPath(dir, 1);
    if (!codec || codec.encoding === "plain") {
      this.storage.rename(live, target);
      return;
    }
    const data = this.storage.read(live);
    if (data === undefined) {
      throw new StoreError("io", "read", live);
    }
    let encoded: Buffer;
    try {
      encoded = codec.compress(data);
    } catch (err) {
      throw new StoreError("codec", `compress (${codec.encoding})`, live, err);
    }
    this.storage.write(target, encoded);
  }
}
