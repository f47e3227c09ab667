/**
 * Shared test fixtures: in-memory storage, fake extractor, zip builder.
 */
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, posix } from "node:path";
import { strToU8, zipSync } from "fflate";

import type { Logger } from "../src/core/log.js";
import type { Extractor } from "../src/extractors/backend.js";
import type { StorageBackend } from "../src/storage/backend.js";

// ---------------------------------------------------------------------------
// In-memory storage
// ---------------------------------------------------------------------------

function norm(path: string): string {
  return posix.resolve("/", path);
}

export class MemoryStorage implements StorageBackend {
  readonly files = new Map<string, Uint8Array>();
  readonly dirs = new Set<string>(["/"]);
  /** Paths whose deletion fails, to exercise warning paths. */
  readonly undeletable = new Set<string>();
  /** Paths whose move fails. */
  readonly unmovable = new Set<string>();

  private addParents(path: string): void {
    let dir = posix.dirname(path);
    while (!this.dirs.has(dir)) {
      this.dirs.add(dir);
      dir = posix.dirname(dir);
    }
  }

  async write(path: string, data: Uint8Array | string): Promise<void> {
    const p = norm(path);
    this.addParents(p);
    this.files.set(p, typeof data === "string" ? strToU8(data) : data);
  }

  async read(path: string): Promise<Uint8Array> {
    const data = this.files.get(norm(path));
    if (!data) throw new Error(`ENOENT: ${path}`);
    return data;
  }

  async list(dir: string): Promise<string[]> {
    const prefix = norm(dir) === "/" ? "/" : `${norm(dir)}/`;
    return [...this.files.keys()].filter((p) => p.startsWith(prefix)).sort();
  }

  async listFiles(dir: string): Promise<string[]> {
    const d = norm(dir);
    return [...this.files.keys()].filter((p) => posix.dirname(p) === d).sort();
  }

  async exists(path: string): Promise<boolean> {
    const p = norm(path);
    return this.files.has(p) || this.dirs.has(p);
  }

  async isDirectory(path: string): Promise<boolean> {
    return this.dirs.has(norm(path));
  }

  async mkdir(path: string): Promise<void> {
    const p = norm(path);
    this.dirs.add(p);
    this.addParents(p);
  }

  async delete(path: string): Promise<void> {
    const p = norm(path);
    if (this.undeletable.has(p)) throw new Error(`EPERM: ${path}`);
    if (!this.files.delete(p)) throw new Error(`ENOENT: ${path}`);
  }

  async deleteTree(path: string): Promise<void> {
    const p = norm(path);
    const prefix = `${p}/`;
    for (const key of [...this.files.keys()]) {
      if (key === p || key.startsWith(prefix)) this.files.delete(key);
    }
    for (const dir of [...this.dirs]) {
      if (dir === p || dir.startsWith(prefix)) this.dirs.delete(dir);
    }
  }

  async move(from: string, to: string): Promise<void> {
    const src = norm(from);
    const dst = norm(to);
    if (this.unmovable.has(src)) throw new Error(`EACCES: ${from}`);
    const data = this.files.get(src);
    if (!data) throw new Error(`ENOENT: ${from}`);
    if (await this.exists(dst)) throw new Error(`Destination already exists: ${to}`);
    this.files.delete(src);
    this.addParents(dst);
    this.files.set(dst, data);
  }

  text(path: string): string | undefined {
    const data = this.files.get(norm(path));
    return data ? new TextDecoder().decode(data) : undefined;
  }
}

// ---------------------------------------------------------------------------
// Fake extractor
// ---------------------------------------------------------------------------

/** Archive basename → entries it unpacks to (relative path → content). */
export type ArchiveCatalog = Record<string, Record<string, string>>;

export interface ExtractCall {
  archivePath: string;
  targetDir: string;
}

/**
 * Writes catalog entries into the target directory of the storage.
 * Names listed in `failing` return false without writing anything.
 */
export class FakeExtractor implements Extractor {
  readonly calls: ExtractCall[] = [];
  readonly failing = new Set<string>();

  constructor(
    private storage: MemoryStorage,
    private catalog: ArchiveCatalog,
  ) {}

  async extract(archivePath: string, targetDir: string): Promise<boolean> {
    this.calls.push({ archivePath, targetDir });
    const name = posix.basename(archivePath);
    if (this.failing.has(name)) return false;
    const entries = this.catalog[name];
    if (!entries) return false;
    await this.storage.mkdir(targetDir);
    for (const [rel, content] of Object.entries(entries)) {
      await this.storage.write(posix.join(targetDir, rel), content);
    }
    return true;
  }

  extractedNames(): string[] {
    return this.calls.map((c) => posix.basename(c.archivePath));
  }
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

export class RecordingLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`INFO ${message}`);
  }
  warn(message: string): void {
    this.lines.push(`WARNING ${message}`);
  }
  error(message: string): void {
    this.lines.push(`ERROR ${message}`);
  }

  matching(level: "INFO" | "WARNING" | "ERROR"): string[] {
    return this.lines.filter((l) => l.startsWith(`${level} `));
  }
}

// ---------------------------------------------------------------------------
// Zip builder + temp dir helpers
// ---------------------------------------------------------------------------

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const zipFiles: Record<string, Uint8Array> = {};
  for (const [name, data] of Object.entries(files)) {
    zipFiles[name] = typeof data === "string" ? strToU8(data) : data;
  }
  return zipSync(zipFiles);
}

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "nested-unpack-test-"));
}
