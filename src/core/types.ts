/**
 * Unpack pipeline types.
 */

/** How a filename participates in an archive family. */
export type ArchiveRole = "core" | "segment" | "non-archive";

/** Which tool family handles an archive. */
export type ArchiveFormat = "zip" | "rar" | "sevenZip";

/** A path together with the properties derived from its filename. */
export interface ArchiveEntry {
  path: string;
  familyKey: string;
  role: ArchiveRole;
}

/** Where the resolver extracts nested archives. */
export type NestingMode = "flatten" | "in-place";

/** Result returned from RecursiveResolver.resolve(). */
export interface ResolveResult {
  scans: number;
  extracted: number;
  failed: number;
  stuck: string[];
  exhausted: boolean;
}

/** Result returned from PayloadRelocator.relocate(). */
export interface RelocateResult {
  moved: number;
  skippedSegments: number;
  skippedArchives: number;
  failed: number;
}

export type ArchiveStatus = "processed" | "skipped" | "failed";

/** Per top-level archive outcome. */
export interface ArchiveReport {
  name: string;
  destination: string;
  status: ArchiveStatus;
  resolve?: ResolveResult;
  relocate?: RelocateResult;
}

/** Options for BatchOrchestrator.run(). */
export interface RunOptions {
  sourceDir: string;
  destinationRoot: string;
  workspaceDir: string;
  maxCount: number;
  flat: boolean;
}

/** Result returned from run(). */
export interface RunResult {
  processed: number;
  skipped: number;
  failed: number;
  archives: ArchiveReport[];
  errors: string[];
}
