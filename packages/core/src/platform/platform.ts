/**
 * Build targets known to the release pipeline.
 */

export type ArchiveFormat = 'zip' | 'tar.gz';

export type PlatformOs = 'linux' | 'windows' | 'darwin';

export type PlatformArch = 'amd64' | 'arm64';

export type PlatformName = 'linux-amd64' | 'linux-arm64' | 'windows-amd64' | 'darwin-amd64';

export type PlatformTarget = Readonly<{
  name: PlatformName;
  os: PlatformOs;
  arch: PlatformArch;
  format: ArchiveFormat;
}>;

function target(name: PlatformName, os: PlatformOs, arch: PlatformArch): PlatformTarget {
  return Object.freeze({
    name,
    os,
    arch,
    format: archiveFormatForOs(os),
  });
}

/**
 * Windows-family targets ship as zip, everything else as tar.gz.
 */
export function archiveFormatForOs(os: PlatformOs): ArchiveFormat {
  return os === 'windows' ? 'zip' : 'tar.gz';
}

export const PLATFORM_TARGETS: readonly PlatformTarget[] = Object.freeze([
  target('linux-amd64', 'linux', 'amd64'),
  target('linux-arm64', 'linux', 'arm64'),
  target('windows-amd64', 'windows', 'amd64'),
  target('darwin-amd64', 'darwin', 'amd64'),
]);

export function getPlatformTarget(name: string): PlatformTarget | undefined {
  return PLATFORM_TARGETS.find(t => t.name === name);
}

export function archiveExtension(format: ArchiveFormat): string {
  return format === 'zip' ? '.zip' : '.tar.gz';
}

/**
 * `{platform}.zip` or `{platform}.tar.gz`
 */
export function platformArchiveFileName(platform: PlatformTarget): string {
  return `${platform.name}${archiveExtension(platform.format)}`;
}

/**
 * Format of an archive file judged by its name, or null when it is neither.
 */
export function detectArchiveFormat(fileName: string): ArchiveFormat | null {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) return 'tar.gz';
  if (lower.endsWith('.zip')) return 'zip';
  return null;
}
