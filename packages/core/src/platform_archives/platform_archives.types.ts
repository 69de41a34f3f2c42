import type { Archive } from '../archive/archive.types';
import type { PlatformName, PlatformTarget } from '../platform/platform';

export type BuildPlatformArchivesOptions = {
  /** Holds one `{platform}/` subdirectory of built binaries per target */
  platformsDir: string;
  /** Where `{platform}.{ext}` files go; defaults to `platformsDir` */
  outputDir?: string;
  /** Targets to package; defaults to every known target */
  platforms?: readonly PlatformTarget[];
  /** Worker pool bound (default 2) */
  concurrency?: number;
};

export type PlatformSkip = {
  platform: PlatformName;
  reason: string;
};

export type PlatformFailure = {
  platform: PlatformName;
  error: Error;
};

export type PlatformArchiveBuildResult = {
  /** In target order */
  created: Archive[];
  skipped: PlatformSkip[];
  failed: PlatformFailure[];
};
