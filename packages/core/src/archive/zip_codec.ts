import { createWriteStream, promises as fs } from 'fs';
import * as path from 'path';
import { pipeline } from 'stream/promises';
import fg from 'fast-glob';
import JSZip from 'jszip';
import type { ArchiveCodec } from './archive.types';
import { resolveInside } from '../utils/fs_helpers';

function toMemberPath(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

export const zipCodec: ArchiveCodec = {
  format: 'zip',

  async collectEntries(rootDir: string): Promise<string[]> {
    const files = await fg('**/*', { cwd: rootDir, onlyFiles: true, dot: true, followSymbolicLinks: false });
    return files.sort();
  },

  async write(rootDir: string, entries: string[], outputPath: string): Promise<void> {
    const zip = new JSZip();

    for (const entry of entries) {
      const absolute = path.join(rootDir, entry);
      const [data, stat] = await Promise.all([fs.readFile(absolute), fs.stat(absolute)]);
      zip.file(toMemberPath(entry), data, {
        date: stat.mtime,
        unixPermissions: stat.mode,
      });
    }

    await pipeline(
      zip.generateNodeStream({
        type: 'nodebuffer',
        streamFiles: true,
        compression: 'DEFLATE',
        compressionOptions: { level: 9 },
        platform: 'UNIX',
      }),
      createWriteStream(outputPath)
    );
  },

  async extract(archivePath: string, destDir: string): Promise<void> {
    const zip = await JSZip.loadAsync(await fs.readFile(archivePath));

    for (const entry of Object.values(zip.files)) {
      const target = resolveInside(destDir, entry.name);
      if (entry.dir) {
        await fs.mkdir(target, { recursive: true });
        continue;
      }
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, await entry.async('nodebuffer'));
      if (typeof entry.unixPermissions === 'number') {
        await fs.chmod(target, entry.unixPermissions & 0o777);
      }
    }
  },

  async list(archivePath: string): Promise<string[]> {
    const zip = await JSZip.loadAsync(await fs.readFile(archivePath));
    return Object.values(zip.files)
      .filter(entry => !entry.dir)
      .map(entry => entry.name);
  },
};
