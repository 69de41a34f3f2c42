export {
  buildPlatformArchives,
  listPlatformArchives,
  describeArchives,
  formatSize,
  DEFAULT_CONCURRENCY,
} from './platform_archive_builder';
export type {
  BuildPlatformArchivesOptions,
  PlatformArchiveBuildResult,
  PlatformSkip,
  PlatformFailure,
} from './platform_archives.types';
