import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import fs from "fs";
import path from "path";
import { createTempDir, removeTempDir } from "../test-helpers";
import { loadConfig, parseCacheOptions, parseCallOptions } from "./schema";

describe("parseCacheOptions", () => {
  it("fills defaults", () => {
    expect(parseCacheOptions({ baseDir: "cache" })).toEqual({
      baseDir: "cache",
      dirOpen: "createIfMissing",
      generations: { enabled: false, max: 1 },
      compression: "none",
    });
  });

  it("rejects invalid values", () => {
    expect(() => parseCacheOptions({ baseDir: "" })).toThrow();
    expect(() => parseCacheOptions({ baseDir: "c", maxAgeMs: -1 })).toThrow();
    expect(() => parseCacheOptions({ baseDir: "c", compression: "lz4" })).toThrow();
  });
});

describe("parseCallOptions", () => {
  it("keeps only the fields given", () => {
    expect(parseCallOptions({})).toEqual({});
    expect(parseCallOptions({ compression: "brotli" })).toEqual({ compression: "brotli" });
    expect(parseCallOptions({ generations: { max: 3 } })).toEqual({
      generations: { enabled: false, max: 3 },
    });
  });

  it("rejects invalid values", () => {
    expect(() => parseCallOptions({ maxAgeMs: 0 })).toThrow();
    expect(() => parseCallOptions({ compression: "zip" })).toThrow();
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir("config");
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it("reads YAML and resolves baseDir next to the file", () => {
    const file = path.join(dir, "cache.yaml");
    fs.writeFileSync(
      file,
      [
        "baseDir: responses",
        "maxAgeMs: 60000",
        "generations:",
        "  enabled: true",
        "  max: 4",
        "compression: gzip",
        "",
      ].join("\n")
    );
    expect(loadConfig(file)).toEqual({
      baseDir: path.join(dir, "responses"),
      dirOpen: "createIfMissing",
      maxAgeMs: 60000,
      generations: { enabled: true, max: 4 },
      compression: "gzip",
      configPath: file,
    });
  });

  it("reads JSON and keeps absolute directories", () => {
    const file = path.join(dir, "cache.json");
    fs.writeFileSync(file, JSON.stringify({ baseDir: "/var/cache/app", dirOpen: "onlyIfExists" }));
    const config = loadConfig(file);
    expect(config.baseDir).toBe("/var/cache/app");
    expect(config.dirOpen).toBe("onlyIfExists");
  });
});
