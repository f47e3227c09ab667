/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";

import { ConfigurationError } from "./core/exceptions.js";
import type { Logger } from "./core/log.js";
import { DEFAULT_MAX_PASSES } from "./core/resolver.js";
import type { RunOptions } from "./core/types.js";
import type { Extractor } from "./extractors/backend.js";
import { CommandTool } from "./extractors/command.js";
import { ToolExtractor } from "./extractors/tool-extractor.js";
import { FflateZipTool } from "./extractors/zip.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";

export const DEFAULT_WORKSPACE = "/tmp/unpack_folder";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.object({
  provider: z.enum(["disk"]).default("disk"),
  config: z
    .object({ basePath: z.string().min(1).optional() })
    .default({}),
});

const ToolsConfigSchema = z.object({
  zip: z
    .object({
      engine: z.enum(["fflate", "command"]).default("fflate"),
      command: z.string().min(1).default("unzip"),
    })
    .default({}),
  rar: z.object({ command: z.string().min(1).default("unrar") }).default({}),
  sevenZip: z.object({ command: z.string().min(1).default("7z") }).default({}),
});

const ResolverConfigSchema = z.object({
  nested: z.enum(["flatten", "in-place"]).default("in-place"),
  maxPasses: z.number().int().positive().default(DEFAULT_MAX_PASSES),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  resolver: ResolverConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;

/** CLI-facing run options; numbers may arrive as strings. */
export const RunOptionsSchema = z.object({
  folder: z.string({ required_error: "--folder is required" }).min(1),
  output: z.string({ required_error: "--output is required" }).min(1),
  tmpDir: z.string().min(1).default(DEFAULT_WORKSPACE),
  numFiles: z
    .union([z.number(), z.string().trim().regex(/^\d+$/, "must be a non-negative integer")])
    .pipe(z.coerce.number().int().min(0))
    .default(0),
  flat: z.boolean().default(false),
});

function describeIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

/** Validate a raw config object, raising ConfigurationError on bad input. */
export function loadConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseRunOptions(raw: Record<string, unknown>): RunOptions {
  const parsed = RunOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(describeIssues(parsed.error));
  }
  const { folder, output, tmpDir, numFiles, flat } = parsed.data;
  return {
    sourceDir: folder,
    destinationRoot: output,
    workspaceDir: tmpDir,
    maxCount: numFiles,
    flat,
  };
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function buildStorage(config: Config["storage"]): StorageBackend {
  switch (config.provider) {
    case "disk":
      return new DiskStorage(config.config.basePath);
    default:
      throw new ConfigurationError(`Unknown storage provider: ${String(config.provider)}`);
  }
}

export function buildExtractor(
  tools: ToolsConfig,
  storage: StorageBackend,
  logger: Logger,
): Extractor {
  return new ToolExtractor({
    tools: {
      zip:
        tools.zip.engine === "fflate"
          ? new FflateZipTool(storage)
          : CommandTool.forFormat("zip", { command: tools.zip.command }),
      rar: CommandTool.forFormat("rar", { command: tools.rar.command }),
      sevenZip: CommandTool.forFormat("sevenZip", { command: tools.sevenZip.command }),
    },
    storage,
    logger,
  });
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function parseConfig(
  raw: unknown,
  logger: Logger,
): { config: Config; storage: StorageBackend; extractor: Extractor } {
  const config = loadConfig(raw);
  const storage = buildStorage(config.storage);
  const extractor = buildExtractor(config.tools, storage, logger);
  return { config, storage, extractor };
}
