/**
 * Recursive resolver – extracts core archives found in a workspace until a
 * scan turns up nothing left to extract.
 */
import { dirname, join } from "node:path";

import type { Extractor } from "../extractors/backend.js";
import type { StorageBackend } from "../storage/backend.js";
import { destinationName, isCore } from "./classify.js";
import type { Logger } from "./log.js";
import type { NestingMode, ResolveResult } from "./types.js";

export const DEFAULT_MAX_PASSES = 64;

/** Directory created next to a nested archive in `in-place` mode. */
export function inPlaceTarget(archivePath: string): string {
  return join(dirname(archivePath), `${destinationName(archivePath)}.unpacked`);
}

export class RecursiveResolver {
  private storage: StorageBackend;
  private extractor: Extractor;
  private logger: Logger;
  private nested: NestingMode;
  private maxPasses: number;

  constructor(opts: {
    storage: StorageBackend;
    extractor: Extractor;
    logger: Logger;
    nested?: NestingMode;
    maxPasses?: number;
  }) {
    this.storage = opts.storage;
    this.extractor = opts.extractor;
    this.logger = opts.logger;
    this.nested = opts.nested ?? "in-place";
    this.maxPasses = opts.maxPasses ?? DEFAULT_MAX_PASSES;
  }

  /** Every core archive under `workspaceDir`, sorted. */
  async scan(workspaceDir: string): Promise<string[]> {
    const files = await this.storage.list(workspaceDir);
    return files.filter((f) => isCore(f));
  }

  async resolve(
    workspaceDir: string,
    destinationDir: string,
  ): Promise<ResolveResult> {
    const result: ResolveResult = {
      scans: 0,
      extracted: 0,
      failed: 0,
      stuck: [],
      exhausted: false,
    };
    // Candidates that could not be deleted are never queued again
    const stuck = new Set<string>();

    while (true) {
      const found = await this.scan(workspaceDir);
      result.scans++;
      const worklist = found.filter((p) => !stuck.has(p));
      if (worklist.length === 0) break;

      if (result.scans > this.maxPasses) {
        this.logger.warn(
          `Stopping after ${this.maxPasses} passes with ${worklist.length} archive(s) left in ${workspaceDir}`,
        );
        result.exhausted = true;
        break;
      }

      for (const candidate of worklist) {
        const target =
          this.nested === "in-place" ? inPlaceTarget(candidate) : destinationDir;

        if (await this.extractor.extract(candidate, target)) {
          result.extracted++;
        } else {
          result.failed++;
        }

        try {
          await this.storage.delete(candidate);
        } catch (err) {
          this.logger.warn(`Could not delete archive ${candidate}: ${String(err)}`);
          stuck.add(candidate);
        }
      }
    }

    result.stuck = [...stuck].sort();
    return result;
  }
}
