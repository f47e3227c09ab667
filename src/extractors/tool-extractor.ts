/**
 * Single-archive extractor: dispatches to a tool by archive format.
 */
import { basename } from "node:path";

import { archiveFormat } from "../core/classify.js";
import type { Logger } from "../core/log.js";
import type { ArchiveFormat } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import type { ArchiveTool, Extractor } from "./backend.js";

export type ToolSet = Record<ArchiveFormat, ArchiveTool>;

export class ToolExtractor implements Extractor {
  private tools: ToolSet;
  private storage: StorageBackend;
  private logger: Logger;

  constructor(opts: { tools: ToolSet; storage: StorageBackend; logger: Logger }) {
    this.tools = opts.tools;
    this.storage = opts.storage;
    this.logger = opts.logger;
  }

  toolFor(archivePath: string): ArchiveTool {
    return this.tools[archiveFormat(archivePath)];
  }

  async extract(archivePath: string, targetDir: string): Promise<boolean> {
    const tool = this.toolFor(archivePath);
    this.logger.info(`Extracting ${archivePath} ...`);
    try {
      await this.storage.mkdir(targetDir);
      await tool.extract(archivePath, targetDir);
      return true;
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error(
        `Extraction failed for ${basename(archivePath)} (${tool.name}): ${detail}`,
      );
      return false;
    }
  }
}
