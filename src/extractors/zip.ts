/**
 * In-process zip extraction with fflate.
 */
import { unzipSync } from "fflate";
import { isAbsolute, join, posix, relative, sep } from "node:path";

import { ExtractionFailedException } from "../core/exceptions.js";
import type { StorageBackend } from "../storage/backend.js";
import type { ArchiveTool } from "./backend.js";

export class FflateZipTool implements ArchiveTool {
  readonly name = "fflate";
  private storage: StorageBackend;

  constructor(storage: StorageBackend) {
    this.storage = storage;
  }

  async extract(archivePath: string, targetDir: string): Promise<void> {
    let files: Record<string, Uint8Array>;
    try {
      const zipData = await this.storage.read(archivePath);
      files = unzipSync(zipData);
    } catch (err) {
      throw new ExtractionFailedException(archivePath, String(err));
    }

    for (const [name, data] of Object.entries(files)) {
      // Skip directories (empty data with trailing /)
      if (name.endsWith("/") && data.length === 0) continue;

      const normalised = posix.normalize(name.replace(/\\/g, "/"));
      const outPath = join(targetDir, normalised);
      const rel = relative(targetDir, outPath);
      if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
        throw new ExtractionFailedException(
          archivePath,
          `entry escapes target directory: ${name}`,
        );
      }
      await this.storage.write(outPath, data);
    }
  }
}
