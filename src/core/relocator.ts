/**
 * Payload relocator – moves leftover payload out of the workspace.
 */
import { basename, extname, join } from "node:path";

import type { StorageBackend } from "../storage/backend.js";
import { isCore, isSplitSegment } from "./classify.js";
import type { Logger } from "./log.js";
import type { RelocateResult } from "./types.js";

export class PayloadRelocator {
  private storage: StorageBackend;
  private logger: Logger;

  constructor(opts: { storage: StorageBackend; logger: Logger }) {
    this.storage = opts.storage;
    this.logger = opts.logger;
  }

  /**
   * Move every file under `workspaceDir` that is neither a split segment nor
   * a core archive directly into `destinationDir`. Subdirectories are not
   * kept; a name already present in the destination gets a ` (n)` suffix.
   */
  async relocate(
    workspaceDir: string,
    destinationDir: string,
  ): Promise<RelocateResult> {
    const result: RelocateResult = {
      moved: 0,
      skippedSegments: 0,
      skippedArchives: 0,
      failed: 0,
    };

    await this.storage.mkdir(destinationDir);
    const files = await this.storage.list(workspaceDir);

    for (const file of files) {
      if (isSplitSegment(file)) {
        result.skippedSegments++;
        continue;
      }
      if (isCore(file)) {
        this.logger.info(`Skipping core archive: ${file}`);
        result.skippedArchives++;
        continue;
      }

      try {
        const target = await this.freeTarget(destinationDir, basename(file));
        this.logger.info(`Moving file: ${file} to ${destinationDir}`);
        await this.storage.move(file, target);
        result.moved++;
      } catch (err) {
        this.logger.error(`Could not move ${file}: ${String(err)}`);
        result.failed++;
      }
    }

    return result;
  }

  private async freeTarget(dir: string, name: string): Promise<string> {
    const first = join(dir, name);
    if (!(await this.storage.exists(first))) return first;

    const ext = extname(name);
    const stem = name.slice(0, name.length - ext.length);
    for (let n = 2; ; n++) {
      const candidate = join(dir, `${stem} (${n})${ext}`);
      if (!(await this.storage.exists(candidate))) return candidate;
    }
  }
}
