export { injectPlatformArchives, findReleaseArchives, PLATFORMS_MEMBER_DIR } from './release_archive_injector';
export type { InjectPlatformArchivesOptions, InjectionFailure, InjectionResult } from './injector.types';
