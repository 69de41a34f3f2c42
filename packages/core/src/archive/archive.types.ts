import type { ArchiveFormat } from '../platform/platform';

/**
 * A compressed bundle on disk. Archives are write-once: a rewrite produces
 * a new file that replaces this one by rename.
 */
export interface Archive {
  readonly path: string;
  readonly fileName: string;
  readonly format: ArchiveFormat;
  /** Size in bytes, read from disk on first call and cached */
  size(): Promise<number>;
}

/**
 * Format-specific reading and writing. Member paths always use `/`.
 */
export interface ArchiveCodec {
  readonly format: ArchiveFormat;
  /**
   * Entries to pass to `write` for a directory: every file recursively for
   * zip, the sorted top-level names for tar.gz.
   */
  collectEntries(rootDir: string): Promise<string[]>;
  write(rootDir: string, entries: string[], outputPath: string): Promise<void>;
  /** Extracts everything under `destDir`, rejecting members that escape it. */
  extract(archivePath: string, destDir: string): Promise<void>;
  /** File members (directories excluded) in archive order. */
  list(archivePath: string): Promise<string[]>;
}
