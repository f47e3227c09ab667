/**
 * nested-unpack – extract multi-part and nested archives into clean
 * per-archive folders.
 */
import { parseConfig } from "./config.js";
import { consoleLogger, type Logger } from "./core/log.js";
import { BatchOrchestrator } from "./core/orchestrator.js";
import { PayloadRelocator } from "./core/relocator.js";
import { RecursiveResolver } from "./core/resolver.js";
import type { NestingMode, RunOptions, RunResult } from "./core/types.js";
import type { Extractor } from "./extractors/backend.js";
import type { StorageBackend } from "./storage/backend.js";

export {
  archiveFormat,
  archiveRole,
  describeArchive,
  destinationName,
  familyKey,
  isCore,
  isSplitSegment,
} from "./core/classify.js";
export {
  ArchiveProcessingError,
  ConfigurationError,
  ExtractionFailedException,
} from "./core/exceptions.js";
export type * from "./core/types.js";
export type { Logger } from "./core/log.js";
export type { StorageBackend } from "./storage/backend.js";
export type { ArchiveTool, Extractor } from "./extractors/backend.js";
export { DiskStorage } from "./storage/disk.js";
export { CommandTool } from "./extractors/command.js";
export { FflateZipTool } from "./extractors/zip.js";
export { ToolExtractor } from "./extractors/tool-extractor.js";
export { RecursiveResolver, PayloadRelocator, BatchOrchestrator };

export interface NestedUnpackOptions {
  logger?: Logger;
  nested?: NestingMode;
  maxPasses?: number;
}

export class NestedUnpack {
  private storage: StorageBackend;
  private orchestrator: BatchOrchestrator;

  constructor(
    storage: StorageBackend,
    extractor: Extractor,
    options: NestedUnpackOptions = {},
  ) {
    const logger = options.logger ?? consoleLogger;
    this.storage = storage;
    this.orchestrator = new BatchOrchestrator({
      storage,
      extractor,
      logger,
      resolver: new RecursiveResolver({
        storage,
        extractor,
        logger,
        nested: options.nested,
        maxPasses: options.maxPasses,
      }),
      relocator: new PayloadRelocator({ storage, logger }),
    });
  }

  /** Construct from a configuration object (validates with Zod). */
  static fromConfig(config: unknown, logger: Logger = consoleLogger): NestedUnpack {
    const parsed = parseConfig(config, logger);
    return new NestedUnpack(parsed.storage, parsed.extractor, {
      logger,
      nested: parsed.config.resolver.nested,
      maxPasses: parsed.config.resolver.maxPasses,
    });
  }

  /** Process every top-level archive in `options.sourceDir`. */
  async run(options: RunOptions): Promise<RunResult> {
    return this.orchestrator.run(options);
  }

  // Expose for tests
  get _storage(): StorageBackend {
    return this.storage;
  }
}
