import fs from "fs";
import os from "os";
import path from "path";
import { StoreError } from "./cache/errors";
import { ByteStorage, DirEntry, PathKind } from "./cache/storage";

export function createTempDir(prefix: string) {
  return fs.mkdtempSync(path.join(os.tmpdir(), `dir-cache-${prefix}-`));
}

export function removeTempDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Lists every file below `root` as `/`-separated relative paths, sorted. */
export function listTree(root: string): string[] {
  const files: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else {
        files.push(path.relative(root, full).split(path.sep).join("/"));
      }
    }
  };
  walk(root);
  return files.sort();
}

export class ManualClock {
  constructor(public now = 1_700_000_000_000) {}

  advance(ms: number) {
    this.now += ms;
  }

  readonly read = () => this.now;
}

type Operation = "read" | "write" | "remove" | "rename" | "createDir" | "list";

/**
 * In-memory `ByteStorage` with a call log and one-shot failure injection,
 * for exercising error paths without touching disk.
 */
export class MemoryStorage implements ByteStorage {
  readonly files = new Map<string, Buffer>();
  readonly dirs = new Set<string>();
  readonly calls: string[] = [];
  private failures = new Map<Operation, string>();

  failNext(operation: Operation, pathSuffix: string) {
    this.failures.set(operation, pathSuffix);
  }

  private check(operation: Operation, target: string) {
    this.calls.push(`${operation} ${path.basename(target)}`);
    const suffix = this.failures.get(operation);
    if (suffix !== undefined && target.endsWith(suffix)) {
      this.failures.delete(operation);
      throw new StoreError("io", operation, target, new Error("injected failure"));
    }
  }

  kind(target: string): PathKind {
    if (this.files.has(target)) return "file";
    if (this.dirs.has(target)) return "dir";
    return "missing";
  }

  read(target: string): Buffer | undefined {
    this.check("read", target);
    return this.files.get(target);
  }

  write(target: string, data: Buffer) {
    this.check("write", target);
    this.files.set(target, Buffer.from(data));
  }

  remove(target: string): boolean {
    this.check("remove", target);
    return this.files.delete(target);
  }

  rename(from: string, to: string) {
    this.check("rename", from);
    const data = this.files.get(from);
    if (data === undefined) {
      throw new StoreError("io", "rename", from, new Error("ENOENT"));
    }
    this.files.delete(from);
    this.files.set(to, data);
  }

  createDir(target: string) {
    this.check("createDir", target);
    let current = target;
    while (!this.dirs.has(current) && path.dirname(current) !== current) {
      this.dirs.add(current);
      current = path.dirname(current);
    }
  }

  list(target: string): DirEntry[] {
    this.check("list", target);
    const entries: DirEntry[] = [];
    for (const file of this.files.keys()) {
      if (path.dirname(file) === target) entries.push({ name: path.basename(file), isFile: true });
    }
    for (const dir of this.dirs) {
      if (path.dirname(dir) === target) entries.push({ name: path.basename(dir), isFile: false });
    }
    return entries;
  }

  removeDirIfEmpty(target: string): boolean {
    if (!this.dirs.has(target) || this.list(target).length > 0) return false;
    this.dirs.delete(target);
    return true;
  }
}
