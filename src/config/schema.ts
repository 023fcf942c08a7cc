import fs from "fs";
import path from "path";
import { z } from "zod";
import YAML from "yaml";

export const compressionKinds = ["none", "gzip", "deflate", "brotli"] as const;
export type CompressionSetting = (typeof compressionKinds)[number];

const generationDefaults = {
  enabled: false,
  max: 1,
} as const;

export const cacheOptionsSchema = z.object({
  baseDir: z.string().min(1),
  dirOpen: z.enum(["createIfMissing", "onlyIfExists"]).default("createIfMissing"),
  maxAgeMs: z.number().int().positive().optional(),
  generations: z
    .object({
      enabled: z.boolean().default(generationDefaults.enabled),
      max: z.number().int().positive().default(generationDefaults.max),
    })
    .default(generationDefaults),
  compression: z.enum(compressionKinds).default("none"),
});

export type CacheOptionsInput = z.input<typeof cacheOptionsSchema>;
export type CacheOptions = z.infer<typeof cacheOptionsSchema>;

/** Options a single call may override; absent fields keep the cache's own. */
export const callOptionsSchema = cacheOptionsSchema
  .pick({ maxAgeMs: true, generations: true, compression: true })
  .partial();

export type CallOptionsInput = z.input<typeof callOptionsSchema>;
export type CallOptions = z.infer<typeof callOptionsSchema>;

export interface LoadedConfig extends CacheOptions {
  configPath: string;
}

function readConfigFile(filePath: string): unknown {
  const data = fs.readFileSync(filePath, "utf8");
  if (filePath.endsWith(".yaml") || filePath.endsWith(".yml")) {
    return YAML.parse(data);
  }
  return JSON.parse(data);
}

export function parseCacheOptions(raw: unknown): CacheOptions {
  return cacheOptionsSchema.parse(raw);
}

export function parseCallOptions(raw: unknown): CallOptions {
  return callOptionsSchema.parse(raw);
}

/** Relative `baseDir` values resolve against the config file's directory. */
export function loadConfig(configPath: string): LoadedConfig {
  const absolutePath = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);
  const parsed = parseCacheOptions(readConfigFile(absolutePath));
  return {
    ...parsed,
    baseDir: path.isAbsolute(parsed.baseDir)
      ? parsed.baseDir
      : path.join(path.dirname(absolutePath), parsed.baseDir),
    configPath: absolutePath,
  };
}
