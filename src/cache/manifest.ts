import { ManifestError } from "./errors";

export const MANIFEST_VERSION = 1;
export const MANIFEST_FILE = "dir-cache-generation-manifest.txt";
export const GENERATION_FILE_PREFIX = "dir-cache-generation-";

export const encodings = ["plain", "gzip", "deflate", "brotli"] as const;
export type Encoding = (typeof encodings)[number];

export interface GenerationRecord {
  /** Unix epoch milliseconds. */
  writtenAt: number;
  encoding: Encoding;
}

export interface Manifest {
  version: typeof MANIFEST_VERSION;
  /** Index 0 is the live value, index N the oldest retained generation. */
  generations: GenerationRecord[];
}

export function generationFileName(generation: number) {
  return `${GENERATION_FILE_PREFIX}${generation}`;
}

const GENERATION_FILE = /^dir-cache-generation-(0|[1-9]\d*)$/;

/** Generation number for a `dir-cache-generation-<n>` name, undefined for anything else. */
export function parseGenerationFileName(name: string): number | undefined {
  const match = GENERATION_FILE.exec(name);
  return match ? Number(match[1]) : undefined;
}

export function isCacheFileName(name: string) {
  return name === MANIFEST_FILE || parseGenerationFileName(name) !== undefined;
}

export function createManifest(writtenAt: number): Manifest {
  return { version: MANIFEST_VERSION, generations: [{ writtenAt, encoding: "plain" }] };
}

export function generationCount(manifest: Manifest) {
  return manifest.generations.length - 1;
}

export function lastWrite(manifest: Manifest) {
  return manifest.generations[0].writtenAt;
}

function isEncoding(value: string): value is Encoding {
  return (encodings as readonly string[]).includes(value);
}

function parseInteger(field: string, what: string, source?: string): number {
  if (!/^\d+$/.test(field)) {
    throw new ManifestError("malformed", `Manifest ${what} is not a non-negative integer: "${field}"`, source);
  }
  const value = Number(field);
  if (!Number.isSafeInteger(value)) {
    throw new ManifestError("malformed", `Manifest ${what} is out of range: "${field}"`, source);
  }
  return value;
}

export function parseManifest(text: string, source?: string): Manifest {
  const lines = text.split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  if (lines.length < 3) {
    throw new ManifestError("malformed", `Manifest has ${lines.length} lines, expected at least 3`, source);
  }

  const version = parseInteger(lines[0], "version", source);
  if (version !== MANIFEST_VERSION) {
    throw new ManifestError(
      "unsupportedVersion",
      `Manifest version ${version} is not supported, expected ${MANIFEST_VERSION}`,
      source
    );
  }

  const count = parseInteger(lines[1], "generation count", source);
  const records = lines.slice(2);
  if (records.length !== count + 1) {
    throw new ManifestError(
      "malformed",
      `Manifest declares ${count} generations but lists ${records.length - 1}`,
      source
    );
  }

  const generations = records.map((line, index): GenerationRecord => {
    const fields = line.split(",");
    if (fields.length !== 2) {
      throw new ManifestError("malformed", `Generation ${index} has ${fields.length} fields, expected 2`, source);
    }
    const [writtenAtField, encoding] = fields;
    const writtenAt = parseInteger(writtenAtField, `timestamp of generation ${index}`, source);
    if (!isEncoding(encoding)) {
      throw new ManifestError("malformed", `Generation ${index} has unknown encoding "${encoding}"`, source);
    }
    if (index === 0 && encoding !== "plain") {
      throw new ManifestError("malformed", `Live generation must be plain, found "${encoding}"`, source);
    }
    return { writtenAt, encoding };
  });

  return { version: MANIFEST_VERSION, generations };
}

export function serializeManifest(manifest: Manifest): string {
  const lines = [
    String(manifest.version),
    String(generationCount(manifest)),
    ...manifest.generations.map((record) => `${record.writtenAt},${record.encoding}`),
  ];
  return `${lines.join("\n")}\n`;
}
