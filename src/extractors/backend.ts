/**
 * Extraction interfaces.
 */

/**
 * Extracts one archive into a directory. Reports failure as `false`
 * instead of throwing; the caller decides whether to continue.
 */
export interface Extractor {
  extract(archivePath: string, targetDir: string): Promise<boolean>;
}

/**
 * A single decompression capability. Throws `ExtractionFailedException`
 * when the archive cannot be unpacked.
 */
export interface ArchiveTool {
  readonly name: string;
  extract(archivePath: string, targetDir: string): Promise<void>;
}
