import type { Archive } from '../archive/archive.types';

export type InjectPlatformArchivesOptions = {
  /** Directory holding the `{platform}.{ext}` archives to inject */
  platformArchivesDir: string;
  releaseArchives: Archive[];
  /** Worker pool bound (default 2) */
  concurrency?: number;
  /** Parent directory for per-archive scratch dirs (default: OS temp dir) */
  scratchBaseDir?: string;
};

export type InjectionFailure = {
  archive: Archive;
  /** ArchiveExtractError or ArchiveRewriteError */
  error: Error;
};

export type InjectionResult = {
  /** True when there was nothing to inject and no archive was touched */
  skipped: boolean;
  skipReason?: string;
  platformArchives: Archive[];
  injected: Archive[];
  failed: InjectionFailure[];
};
