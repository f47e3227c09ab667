/**
 * Batch orchestrator – runs extract → resolve → relocate for every top-level
 * archive in a source directory, one destination folder per archive.
 */
import { basename, isAbsolute, join, relative, resolve, sep } from "node:path";

import type { Extractor } from "../extractors/backend.js";
import type { StorageBackend } from "../storage/backend.js";
import { destinationName, isCore } from "./classify.js";
import { ArchiveProcessingError, ConfigurationError } from "./exceptions.js";
import type { Logger } from "./log.js";
import type { PayloadRelocator } from "./relocator.js";
import type { RecursiveResolver } from "./resolver.js";
import type { ArchiveReport, RunOptions, RunResult } from "./types.js";

/** True when `child` is `parent` or lies below it. */
function isWithin(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export class BatchOrchestrator {
  private storage: StorageBackend;
  private extractor: Extractor;
  private resolver: RecursiveResolver;
  private relocator: PayloadRelocator;
  private logger: Logger;

  constructor(opts: {
    storage: StorageBackend;
    extractor: Extractor;
    resolver: RecursiveResolver;
    relocator: PayloadRelocator;
    logger: Logger;
  }) {
    this.storage = opts.storage;
    this.extractor = opts.extractor;
    this.resolver = opts.resolver;
    this.relocator = opts.relocator;
    this.logger = opts.logger;
  }

  /** Core archives directly inside `sourceDir`, sorted. */
  async discover(sourceDir: string): Promise<string[]> {
    const files = await this.storage.listFiles(sourceDir);
    return files.filter((f) => isCore(f));
  }

  async run(options: RunOptions): Promise<RunResult> {
    await this.validate(options);
    const { sourceDir, destinationRoot, maxCount } = options;

    await this.storage.mkdir(destinationRoot);

    const result: RunResult = {
      processed: 0,
      skipped: 0,
      failed: 0,
      archives: [],
      errors: [],
    };

    for (const archivePath of await this.discover(sourceDir)) {
      if (maxCount > 0 && result.processed >= maxCount) {
        this.logger.info(`Reached the limit of ${maxCount} files to process.`);
        break;
      }

      const name = basename(archivePath);
      const destination = join(destinationRoot, destinationName(archivePath));
      const report: ArchiveReport = { name, destination, status: "skipped" };
      result.archives.push(report);

      if (await this.storage.exists(destination)) {
        this.logger.info(`Skipping ${name}, already processed (folder exists).`);
        result.skipped++;
        continue;
      }

      this.logger.info(`Processing ${name} ...`);
      try {
        const ok = options.flat
          ? await this.extractFlat(archivePath, destination)
          : await this.extractNested(archivePath, destination, options.workspaceDir, report);
        report.status = ok ? "processed" : "failed";
      } catch (err) {
        const error = new ArchiveProcessingError(`${name}: ${String(err)}`);
        this.logger.error(error.message);
        result.errors.push(error.message);
        report.status = "failed";
      }

      if (report.status === "processed") {
        result.processed++;
      } else {
        result.failed++;
      }
    }

    this.logger.info(
      `Done. Processed ${result.processed} archives (${result.skipped} skipped, ${result.failed} failed).`,
    );
    return result;
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async validate(options: RunOptions): Promise<void> {
    const { sourceDir, destinationRoot, workspaceDir } = options;
    if (!(await this.storage.isDirectory(sourceDir))) {
      throw new ConfigurationError(`Source folder does not exist: ${sourceDir}`);
    }
    // The workspace is wiped before every archive
    if (isWithin(workspaceDir, sourceDir)) {
      throw new ConfigurationError(
        `Workspace ${workspaceDir} must not contain the source folder`,
      );
    }
    if (isWithin(workspaceDir, destinationRoot)) {
      throw new ConfigurationError(
        `Workspace ${workspaceDir} must not contain the output folder`,
      );
    }
    // A destination folder could land on the workspace
    if (isWithin(destinationRoot, workspaceDir)) {
      throw new ConfigurationError(
        `Workspace ${workspaceDir} must not be inside the output folder`,
      );
    }
    if (!Number.isInteger(options.maxCount) || options.maxCount < 0) {
      throw new ConfigurationError(`Invalid archive limit: ${options.maxCount}`);
    }
  }

  /** Extract straight into the destination, without a workspace. */
  private async extractFlat(
    archivePath: string,
    destination: string,
  ): Promise<boolean> {
    const ok = await this.extractor.extract(archivePath, destination);
    if (!ok) await this.storage.deleteTree(destination);
    return ok;
  }

  private async extractNested(
    archivePath: string,
    destination: string,
    workspaceDir: string,
    report: ArchiveReport,
  ): Promise<boolean> {
    await this.storage.deleteTree(workspaceDir);
    await this.storage.mkdir(workspaceDir);
    await this.storage.mkdir(destination);

    try {
      if (!(await this.extractor.extract(archivePath, workspaceDir))) {
        // Nothing reached the destination yet; drop it so a re-run retries
        await this.storage.deleteTree(destination);
        return false;
      }

      report.resolve = await this.resolver.resolve(workspaceDir, destination);
      report.relocate = await this.relocator.relocate(workspaceDir, destination);
      return true;
    } finally {
      await this.cleanWorkspace(workspaceDir);
    }
  }

  private async cleanWorkspace(workspaceDir: string): Promise<void> {
    try {
      await this.storage.deleteTree(workspaceDir);
    } catch (err) {
      this.logger.warn(`Could not clean workspace ${workspaceDir}: ${String(err)}`);
    }
  }
}
