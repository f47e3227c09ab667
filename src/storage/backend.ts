/**
 * Abstract filesystem backend used by the unpack pipeline.
 *
 * Paths are plain filesystem paths; implementations resolve relative paths
 * against their own base directory.
 */
export interface StorageBackend {
  /** Write data to the given path, creating parent directories. */
  write(path: string, data: Uint8Array | string): Promise<void>;

  /** Read the whole file at the given path. */
  read(path: string): Promise<Uint8Array>;

  /** List every file below `dir`, recursively, as sorted full paths. */
  list(dir: string): Promise<string[]>;

  /** List the files directly inside `dir` (no directories), sorted. */
  listFiles(dir: string): Promise<string[]>;

  /** Check if a file or directory exists at the path. */
  exists(path: string): Promise<boolean>;

  /** True when the path exists and is a directory. */
  isDirectory(path: string): Promise<boolean>;

  /** Create a directory and its parents. */
  mkdir(path: string): Promise<void>;

  /** Delete a single file. Throws when the file cannot be removed. */
  delete(path: string): Promise<void>;

  /** Remove a directory tree. Missing paths are not an error. */
  deleteTree(path: string): Promise<void>;

  /** Move a file, replacing nothing: `to` must not exist. */
  move(from: string, to: string): Promise<void>;
}
