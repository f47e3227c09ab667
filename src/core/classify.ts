/**
 * Filename classification: core entry points, split segments, family keys.
 *
 * Everything here is pure and works on the last path segment only, so a role
 * can be re-derived from a path at any point.
 */
import { basename } from "node:path";
import type { ArchiveEntry, ArchiveFormat, ArchiveRole } from "./types.js";

const CORE_SUFFIX = /\.(rar|zip|7z)$/i;
const SEVEN_ZIP_FIRST_PART = /\.7z\.001$/i;

/** `.r00` `.001` `.z01` `.7z.002` */
const SPLIT_SEGMENT = /\.r\d+$|\.\d{3}$|\.z\d{2}$|\.7z\.\d{3}$/i;

/** Longest match first so `.7z.001` is not reduced to `.7z`. */
const FAMILY_SUFFIX = /(\.7z\.\d{3}|\.(rar|zip|7z)|\.r\d+|\.z\d{2}|\.\d{3})$/i;

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

/**
 * True when the file is the single entry point of an archive family:
 * a plain `.rar`, `.zip` or `.7z`, or the first part of a split 7z (`.7z.001`).
 */
export function isCore(path: string): boolean {
  const name = basename(path);
  return CORE_SUFFIX.test(name) || SEVEN_ZIP_FIRST_PART.test(name);
}

/** True for split-archive parts that must never be copied into output. */
export function isSplitSegment(filename: string): boolean {
  return SPLIT_SEGMENT.test(basename(filename));
}

export function archiveRole(path: string): ArchiveRole {
  if (isCore(path)) return "core";
  if (isSplitSegment(path)) return "segment";
  return "non-archive";
}

/** Base name shared by every part of one archive family. */
export function familyKey(path: string): string {
  const name = basename(path);
  const stripped = name.replace(FAMILY_SUFFIX, "");
  return stripped.length > 0 ? stripped : name;
}

export function describeArchive(path: string): ArchiveEntry {
  return { path, familyKey: familyKey(path), role: archiveRole(path) };
}

/**
 * Destination folder name for a top-level archive: the filename without its
 * final extension (`movie.7z.001` keeps `movie.7z`).
 */
export function destinationName(path: string): string {
  const name = basename(path);
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

/** Tool family used to extract the archive. */
export function archiveFormat(path: string): ArchiveFormat {
  const name = basename(path).toLowerCase();
  if (name.endsWith(".zip")) return "zip";
  if (name.endsWith(".rar")) return "rar";
  return "sevenZip";
}
