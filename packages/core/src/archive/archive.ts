import { promises as fs } from 'fs';
import * as path from 'path';
import type { ArchiveFormat } from '../platform/platform';
import { detectArchiveFormat } from '../platform/platform';
import type { Archive, ArchiveCodec } from './archive.types';
import { zipCodec } from './zip_codec';
import { tarGzCodec } from './tar_codec';
import { ArchiveExtractError, ArchiveWriteError } from '../errors';
import { replaceFileAtomic } from '../utils/fs_helpers';

class FileArchive implements Archive {
  readonly fileName: string;
  private cachedSize: number | null = null;

  constructor(readonly path: string, readonly format: ArchiveFormat) {
    this.fileName = path.split(/[\\/]/).pop() ?? path;
  }

  async size(): Promise<number> {
    if (this.cachedSize === null) {
      this.cachedSize = (await fs.stat(this.path)).size;
    }
    return this.cachedSize;
  }

  toJSON(): { path: string; format: ArchiveFormat } {
    return { path: this.path, format: this.format };
  }
}

export function getCodec(format: ArchiveFormat): ArchiveCodec {
  return format === 'zip' ? zipCodec : tarGzCodec;
}

/**
 * Wraps an archive path. The format comes from the extension unless given.
 *
 * @throws Error when the extension is not a supported archive format
 */
export function openArchive(archivePath: string, format?: ArchiveFormat): Archive {
  const resolved = format ?? detectArchiveFormat(archivePath);
  if (!resolved) {
    throw new Error(`Unsupported archive format: ${archivePath}`);
  }
  return new FileArchive(archivePath, resolved);
}

/**
 * Archives the contents of `rootDir` into `outputPath`. The archive is
 * written to a temp sibling and renamed into place, so a failure never
 * leaves a partial file at `outputPath`.
 *
 * @throws ArchiveWriteError
 */
export async function createArchiveFromDirectory(
  rootDir: string,
  outputPath: string,
  format: ArchiveFormat
): Promise<Archive> {
  const codec = getCodec(format);
  try {
    const entries = await codec.collectEntries(rootDir);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await replaceFileAtomic(outputPath, tempPath => codec.write(rootDir, entries, tempPath));
  } catch (error) {
    throw new ArchiveWriteError(outputPath, error);
  }
  return new FileArchive(outputPath, format);
}

/**
 * @throws ArchiveExtractError
 */
export async function extractArchive(archive: Archive, destDir: string): Promise<void> {
  try {
    await fs.mkdir(destDir, { recursive: true });
    await getCodec(archive.format).extract(archive.path, destDir);
  } catch (error) {
    throw new ArchiveExtractError(archive.path, error);
  }
}

export async function listArchiveMembers(archive: Archive): Promise<string[]> {
  return getCodec(archive.format).list(archive.path);
}
