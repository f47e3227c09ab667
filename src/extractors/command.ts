/**
 * Out-of-process extraction through unzip, unrar and 7z.
 */
import {
  spawn as defaultSpawn,
  type ChildProcess,
  type SpawnOptions,
} from "node:child_process";

import { ExtractionFailedException } from "../core/exceptions.js";
import type { ArchiveFormat } from "../core/types.js";
import type { ArchiveTool } from "./backend.js";

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

/** Builds the argument vector for one invocation. */
export type ArgsBuilder = (archivePath: string, targetDir: string) => string[];

const STDERR_TAIL = 2000;

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

export interface CommandPreset {
  command: string;
  args: ArgsBuilder;
}

export const COMMAND_PRESETS: Record<ArchiveFormat, CommandPreset> = {
  zip: {
    command: "unzip",
    args: (archive, target) => ["-o", archive, "-d", target],
  },
  rar: {
    // unrar treats the destination as a directory only with a trailing slash
    command: "unrar",
    args: (archive, target) => [
      "x",
      "-o+",
      archive,
      target.endsWith("/") ? target : `${target}/`,
    ],
  },
  sevenZip: {
    command: "7z",
    args: (archive, target) => ["x", "-y", `-o${target}`, archive],
  },
};

// ---------------------------------------------------------------------------
// Tool
// ---------------------------------------------------------------------------

export class CommandTool implements ArchiveTool {
  readonly name: string;
  private command: string;
  private buildArgs: ArgsBuilder;
  private spawn: SpawnFunction;

  constructor(opts: {
    command: string;
    args: ArgsBuilder;
    spawn?: SpawnFunction;
  }) {
    this.name = opts.command;
    this.command = opts.command;
    this.buildArgs = opts.args;
    this.spawn = opts.spawn ?? defaultSpawn;
  }

  /** Tool for a format, optionally running a different binary. */
  static forFormat(
    format: ArchiveFormat,
    opts: { command?: string; spawn?: SpawnFunction } = {},
  ): CommandTool {
    const preset = COMMAND_PRESETS[format];
    return new CommandTool({
      command: opts.command ?? preset.command,
      args: preset.args,
      spawn: opts.spawn,
    });
  }

  async extract(archivePath: string, targetDir: string): Promise<void> {
    const args = this.buildArgs(archivePath, targetDir);
    const child: ChildProcess = this.spawn(this.command, args, {
      stdio: ["ignore", "ignore", "pipe"],
    });

    let stderr = "";
    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL);
    });

    await new Promise<void>((resolve, reject) => {
      child.once("error", (err: Error) => {
        reject(
          new ExtractionFailedException(
            archivePath,
            `could not run ${this.command}: ${err.message}`,
          ),
        );
      });
      child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          resolve();
          return;
        }
        const status =
          code !== null ? `exit code ${code}` : `signal ${signal ?? "unknown"}`;
        const detail = stderr.trim();
        reject(
          new ExtractionFailedException(
            archivePath,
            `${this.command} failed with ${status}${detail ? `: ${detail}` : ""}`,
          ),
        );
      });
    });
  }
}
