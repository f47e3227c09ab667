#!/usr/bin/env node
/**
 * CLI entrypoint for nested-unpack.
 *
 * Usage:
 *   nested-unpack --folder ~/downloads --output ~/library
 *   nested-unpack -f ~/downloads -o ~/library -n 5 --nested in-place
 */
import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";

import { parseRunOptions } from "./config.js";
import { ConfigurationError } from "./core/exceptions.js";
import { NestedUnpack } from "./index.js";

const USAGE = `
nested-unpack — unpack zip/rar/7z (including multi-part and nested) archives

Usage:
  nested-unpack --folder <dir> --output <dir> [options]

Options:
  -f, --folder <dir>       Folder containing the archives (required)
  -o, --output <dir>       Output folder, one subfolder per archive (required)
  -t, --tmp_dir <dir>      Scratch folder, wiped per archive (default: /tmp/unpack_folder)
  -n, --num_files <n>      Number of archives to process, 0 = no limit (default: 0)
      --flat               Extract one level only, straight into the output folder
      --nested <mode>      flatten | in-place  (default: in-place)
  -c, --config <file>      JSON configuration file (tools, resolver)
  -h, --help               Show this help
`.trim();

async function loadConfigFile(path: string | undefined): Promise<Record<string, unknown>> {
  if (!path) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${String(err)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`);
  }
  return { ...parsed };
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      folder: { type: "string", short: "f" },
      output: { type: "string", short: "o" },
      tmp_dir: { type: "string", short: "t" },
      num_files: { type: "string", short: "n" },
      flat: { type: "boolean", default: false },
      nested: { type: "string" },
      config: { type: "string", short: "c" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const options = parseRunOptions({
    folder: values.folder,
    output: values.output,
    tmpDir: values.tmp_dir,
    numFiles: values.num_files,
    flat: values.flat,
  });

  const fileConfig = await loadConfigFile(values.config);
  const resolver: Record<string, unknown> =
    typeof fileConfig.resolver === "object" && fileConfig.resolver !== null
      ? { ...fileConfig.resolver }
      : {};
  if (values.nested) resolver.nested = values.nested;

  const unpacker = NestedUnpack.fromConfig({ ...fileConfig, resolver });
  const result = await unpacker.run(options);

  console.log(`\nExtraction complete:`);
  console.log(`  Archives processed: ${result.processed}`);
  console.log(`  Archives skipped:   ${result.skipped}`);
  console.log(`  Archives failed:    ${result.failed}`);
  if (result.errors.length > 0) {
    console.log(`  Errors: ${JSON.stringify(result.errors)}`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`${err.message}\n\n${USAGE}`);
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
});
