export {
  PLATFORM_TARGETS,
  getPlatformTarget,
  archiveFormatForOs,
  archiveExtension,
  platformArchiveFileName,
  detectArchiveFormat,
} from './platform';
export type {
  ArchiveFormat,
  PlatformOs,
  PlatformArch,
  PlatformName,
  PlatformTarget,
} from './platform';
