#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import fs from "fs";
import { DirCache } from "../cache/dirCache";
import {
  CacheOptionsInput,
  CompressionSetting,
  compressionKinds,
  loadConfig,
} from "../config/schema";
import { logger } from "../utils/logger";

interface GlobalOptions {
  dir?: string;
  config?: string;
  maxAge?: number;
  generations?: number;
  compression?: CompressionSetting;
  verbose?: boolean;
}

function positiveInt(value: string) {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function compressionSetting(value: string): CompressionSetting {
  const match = compressionKinds.find((kind) => kind === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${compressionKinds.join(", ")}.`);
  }
  return match;
}

export function resolveOptions(opts: GlobalOptions): CacheOptionsInput {
  let base: CacheOptionsInput;
  if (opts.config) {
    base = loadConfig(opts.config);
  } else if (opts.dir) {
    base = { baseDir: opts.dir };
  } else {
    throw new Error("Pass --dir <path> or --config <file>");
  }
  return {
    ...base,
    baseDir: opts.dir ?? base.baseDir,
    maxAgeMs: opts.maxAge ?? base.maxAgeMs,
    generations:
      opts.generations !== undefined
        ? { enabled: true, max: opts.generations }
        : base.generations,
    compression: opts.compression ?? base.compression,
  };
}

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

function openCache(program: Command) {
  const opts = program.opts<GlobalOptions>();
  if (opts.verbose) {
    logger.setLevel("debug");
  }
  return DirCache.open(resolveOptions(opts));
}

function generationIndex(value: string) {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a generation number (0 is the live value).");
  }
  return parsed;
}

export function buildProgram() {
  const program = new Command();
  program
    .name("dir-cache")
    .description("Inspect and edit a dir-cache directory")
    .option("-d, --dir <path>", "Cache base directory")
    .option("-c, --config <file>", "YAML or JSON cache config")
    .option("--max-age <ms>", "Treat entries older than this as missing", positiveInt)
    .option("--generations <n>", "Keep this many previous values per key", positiveInt)
    .option("--compression <kind>", `Encoding for history (${compressionKinds.join(", ")})`, compressionSetting)
    .option("-v, --verbose", "Log cache operations", false);
  program.showHelpAfterError();

  program
    .command("get <key>")
    .description("Print the current value for a key")
    .action((key: string) => {
      const entry = openCache(program).get(key);
      if (!entry) {
        logger.error("no value", { key });
        process.exitCode = 1;
        return;
      }
      process.stdout.write(entry.value);
    });

  program
    .command("put <key>")
    .description("Store a value read from --file or stdin")
    .option("-f, --file <path>", "Read the value from a file")
    .action(async (key: string, cmd: { file?: string }) => {
      const cache = openCache(program);
      const value = cmd.file ? fs.readFileSync(cmd.file) : await readStdin();
      const entry = cache.insert(key, value);
      logger.info("stored", { key, bytes: entry.value.length });
    });

  program
    .command("rm <key>")
    .description("Remove a key and its history")
    .action((key: string) => {
      const removed = openCache(program).remove(key);
      logger.info(removed ? "removed" : "nothing to remove", { key });
    });

  program
    .command("history <key>")
    .description("List stored generations for a key")
    .action((key: string) => {
      for (const info of openCache(program).history(key)) {
        process.stdout.write(
          `${info.generation}\t${new Date(info.writtenAt).toISOString()}\t${info.encoding}\t${info.path}\n`
        );
      }
    });

  program
    .command("show <key> <generation>")
    .description("Print one generation of a key, decompressed")
    .action((key: string, generation: string) => {
      const value = openCache(program).getGeneration(key, generationIndex(generation));
      if (!value) {
        logger.error("no such generation", { key, generation });
        process.exitCode = 1;
        return;
      }
      process.stdout.write(value);
    });

  return program;
}

async function main() {
  await buildProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((err) => {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
