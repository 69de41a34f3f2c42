import { create, extract, list } from 'tar';
import type { ArchiveCodec } from './archive.types';
import { readDirSorted } from '../utils/fs_helpers';

export const tarGzCodec: ArchiveCodec = {
  format: 'tar.gz',

  async collectEntries(rootDir: string): Promise<string[]> {
    return (await readDirSorted(rootDir)) ?? [];
  },

  async write(rootDir: string, entries: string[], outputPath: string): Promise<void> {
    await create({ gzip: true, file: outputPath, cwd: rootDir, portable: true }, entries);
  },

  async extract(archivePath: string, destDir: string): Promise<void> {
    // strict turns tar's ".." and absolute-path warnings into errors
    await extract({ file: archivePath, cwd: destDir, strict: true });
  },

  async list(archivePath: string): Promise<string[]> {
    const members: string[] = [];
    await list({
      file: archivePath,
      onReadEntry: (entry) => {
        if (entry.type === 'File' || entry.type === 'OldFile') {
          members.push(entry.path);
        }
      },
    });
    return members;
  },
};
