/**
 * Local filesystem storage backend.
 */
import {
  copyFile,
  mkdir,
  readdir,
  readFile,
  rename,
  rm,
  stat,
  unlink,
  writeFile,
} from "node:fs/promises";
import type { Dirent } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { StorageBackend } from "./backend.js";

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/** Regular files, plus symlinks that point at one. Linked directories are not followed. */
async function isFileEntry(entry: Dirent, full: string): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return (await stat(full)).isFile();
  } catch (err) {
    const code = errorCode(err);
    // dangling or looping link
    if (code === "ENOENT" || code === "ELOOP") return false;
    throw err;
  }
}

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string = process.cwd()) {
    this.basePath = resolve(basePath);
  }

  private resolve(path: string): string {
    return resolve(this.basePath, path);
  }

  async write(path: string, data: Uint8Array | string): Promise<void> {
    const fullPath = this.resolve(path);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, data);
  }

  async read(path: string): Promise<Uint8Array> {
    const buf = await readFile(this.resolve(path));
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  async list(dir: string): Promise<string[]> {
    const root = this.resolve(dir);
    if (!(await this.isDirectory(root))) return [];

    const paths: string[] = [];
    const walk = async (current: string): Promise<void> => {
      const entries = await readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(current, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (await isFileEntry(entry, full)) {
          paths.push(full);
        }
      }
    };

    await walk(root);
    return paths.sort();
  }

  async listFiles(dir: string): Promise<string[]> {
    const root = this.resolve(dir);
    if (!(await this.isDirectory(root))) return [];

    const entries = await readdir(root, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
      const full = join(root, entry.name);
      if (await isFileEntry(entry, full)) files.push(full);
    }
    return files.sort();
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(this.resolve(path));
      return true;
    } catch {
      return false;
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    try {
      const s = await stat(this.resolve(path));
      return s.isDirectory();
    } catch {
      return false;
    }
  }

  async mkdir(path: string): Promise<void> {
    await mkdir(this.resolve(path), { recursive: true });
  }

  async delete(path: string): Promise<void> {
    await unlink(this.resolve(path));
  }

  async deleteTree(path: string): Promise<void> {
    await rm(this.resolve(path), { recursive: true, force: true });
  }

  async move(from: string, to: string): Promise<void> {
    const source = this.resolve(from);
    const target = this.resolve(to);
    if (await this.exists(target)) {
      throw new Error(`Destination already exists: ${target}`);
    }
    await mkdir(dirname(target), { recursive: true });
    try {
      await rename(source, target);
    } catch (err) {
      // rename cannot cross filesystems (workspace on tmpfs, output on disk)
      if (errorCode(err) !== "EXDEV") throw err;
      await copyFile(source, target);
      await unlink(source);
    }
  }
}
