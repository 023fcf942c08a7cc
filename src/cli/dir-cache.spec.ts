import { afterEach, beforeEach, describe, expect, it, jest } from "@jest/globals";
import fs from "fs";
import path from "path";
import { createTempDir, removeTempDir } from "../test-helpers";
import { buildProgram, resolveOptions } from "./dir-cache";

describe("dir-cache CLI", () => {
  let root: string;
  let baseDir: string;
  let stdout: string[];

  beforeEach(() => {
    root = createTempDir("cli");
    baseDir = path.join(root, "cache");
    stdout = [];
    jest.spyOn(process.stdout, "write").mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    jest.spyOn(process.stderr, "write").mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    removeTempDir(root);
  });

  const run = (...args: string[]) => buildProgram().parseAsync(args, { from: "user" });

  it("stores a file and prints it back", async () => {
    const input = path.join(root, "body.json");
    fs.writeFileSync(input, '{"id":42}');
    await run("--dir", baseDir, "put", "users/42", "--file", input);
    await run("--dir", baseDir, "get", "users/42");
    expect(stdout.join("")).toBe('{"id":42}');
  });

  it("lists and shows history", async () => {
    const input = path.join(root, "body.txt");
    for (const body of ["one", "two"]) {
      fs.writeFileSync(input, body);
      await run("--dir", baseDir, "--generations", "2", "--compression", "gzip", "put", "k", "-f", input);
    }
    await run("--dir", baseDir, "history", "k");
    const lines = stdout.join("").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0].split("\t")[2]).toBe("plain");
    expect(lines[1].split("\t")[2]).toBe("gzip");
    expect(lines[1].split("\t")[3]).toBe(path.join(baseDir, "k", "dir-cache-generation-1"));

    stdout.length = 0;
    await run("--dir", baseDir, "show", "k", "1");
    expect(stdout.join("")).toBe("one");
  });

  it("sets a failing exit code on a miss", async () => {
    await run("--dir", baseDir, "get", "absent");
    expect(stdout).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it("removes keys", async () => {
    const input = path.join(root, "body.txt");
    fs.writeFileSync(input, "x");
    await run("--dir", baseDir, "put", "k", "-f", input);
    await run("--dir", baseDir, "rm", "k");
    expect(fs.existsSync(path.join(baseDir, "k"))).toBe(false);
  });
});

describe("resolveOptions", () => {
  it("requires a directory or config", () => {
    expect(() => resolveOptions({})).toThrow("Pass --dir <path> or --config <file>");
  });

  it("lets flags override the config file", () => {
    const dir = createTempDir("cli-config");
    try {
      const file = path.join(dir, "cache.yaml");
      fs.writeFileSync(file, "baseDir: data\nmaxAgeMs: 10\ncompression: brotli\n");
      const options = resolveOptions({ config: file, maxAge: 99, generations: 3 });
      expect(options.baseDir).toBe(path.join(dir, "data"));
      expect(options.maxAgeMs).toBe(99);
      expect(options.generations).toEqual({ enabled: true, max: 3 });
      expect(options.compression).toBe("brotli");
    } finally {
      removeTempDir(dir);
    }
  });
});
