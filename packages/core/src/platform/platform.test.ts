import {
  PLATFORM_TARGETS,
  getPlatformTarget,
  platformArchiveFileName,
  detectArchiveFormat,
} from './platform';

describe('Platform targets', () => {
  it('should enumerate the four supported targets in build order', () => {
    expect(PLATFORM_TARGETS.map(t => t.name)).toEqual([
      'linux-amd64',
      'linux-arm64',
      'windows-amd64',
      'darwin-amd64',
    ]);
  });

  it('should use zip for windows and tar.gz otherwise', () => {
    expect(getPlatformTarget('windows-amd64')?.format).toBe('zip');
    expect(getPlatformTarget('linux-arm64')?.format).toBe('tar.gz');
    expect(getPlatformTarget('darwin-amd64')?.format).toBe('tar.gz');
  });

  it('should name platform archives after the platform', () => {
    const windows = getPlatformTarget('windows-amd64');
    const linux = getPlatformTarget('linux-amd64');

    expect(windows && platformArchiveFileName(windows)).toBe('windows-amd64.zip');
    expect(linux && platformArchiveFileName(linux)).toBe('linux-amd64.tar.gz');
  });

  it('should return undefined for unknown platforms', () => {
    expect(getPlatformTarget('solaris-sparc')).toBeUndefined();
  });

  it('should detect archive formats from file names', () => {
    expect(detectArchiveFormat('tool_1.0.0_linux_amd64.tar.gz')).toBe('tar.gz');
    expect(detectArchiveFormat('tool_1.0.0_windows_amd64.ZIP')).toBe('zip');
    expect(detectArchiveFormat('checksums.txt')).toBeNull();
  });
});
