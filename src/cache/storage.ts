import fs from "fs";
import { StoreError, isErrnoException } from "./errors";

export type PathKind = "missing" | "file" | "dir" | "other";

export interface DirEntry {
  name: string;
  isFile: boolean;
}

/**
 * Synchronous byte-level file access. Each call is expected to be atomic
 * enough on its own; nothing spans calls.
 */
export interface ByteStorage {
  kind(target: string): PathKind;
  /** Returns undefined when the file does not exist. */
  read(target: string): Buffer | undefined;
  write(target: string, data: Buffer): void;
  /** Returns false when there was nothing to remove. */
  remove(target: string): boolean;
  rename(from: string, to: string): void;
  createDir(target: string): void;
  list(target: string): DirEntry[];
  /** Returns true when the directory was removed. */
  removeDirIfEmpty(target: string): boolean;
}

function ioError(operation: string, target: string, err: unknown) {
  return new StoreError("io", operation, target, err);
}

export class NodeFileStorage implements ByteStorage {
  kind(target: string): PathKind {
    try {
      const stats = fs.lstatSync(target);
      if (stats.isFile()) return "file";
      if (stats.isDirectory()) return "dir";
      return "other";
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return "missing";
      }
      throw ioError("stat", target, err);
    }
  }

  read(target: string): Buffer | undefined {
    try {
      return fs.readFileSync(target);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return undefined;
      }
      throw ioError("read", target, err);
    }
  }

  write(target: string, data: Buffer) {
    try {
      fs.writeFileSync(target, data);
    } catch (err) {
      throw ioError("write", target, err);
    }
  }

  remove(target: string): boolean {
    try {
      fs.unlinkSync(target);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return false;
      }
      throw ioError("remove", target, err);
    }
  }

  rename(from: string, to: string) {
    try {
      fs.renameSync(from, to);
    } catch (err) {
      if (isErrnoException(err) && err.code === "EXDEV") {
        this.copyThenRemove(from, to);
        return;
      }
      throw ioError("rename", `${from} -> ${to}`, err);
    }
  }

  private copyThenRemove(from: string, to: string) {
    try {
      fs.copyFileSync(from, to);
      fs.unlinkSync(from);
    } catch (err) {
      throw ioError("copy", `${from} -> ${to}`, err);
    }
  }

  createDir(target: string) {
    try {
      fs.mkdirSync(target, { recursive: true });
    } catch (err) {
      throw ioError("create directory", target, err);
    }
  }

  list(target: string): DirEntry[] {
    try {
      return fs
        .readdirSync(target, { withFileTypes: true })
        .map((entry) => ({ name: entry.name, isFile: entry.isFile() }));
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return [];
      }
      throw ioError("list", target, err);
    }
  }

  removeDirIfEmpty(target: string): boolean {
    try {
      fs.rmdirSync(target);
      return true;
    } catch (err) {
      if (isErrnoException(err) && ["ENOENT", "ENOTEMPTY", "EEXIST"].includes(err.code ?? "")) {
        return false;
      }
      throw ioError("remove directory", target, err);
    }
  }
}
