import { createHash } from 'crypto';
import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import { writeFileAtomic } from '../utils/fs_helpers';

export type ChecksumEntry = {
  fileName: string;
  sha256: string;
};

export type ChecksumMismatch = {
  fileName: string;
  expected: string;
  /** null when the file is missing */
  actual: string | null;
};

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export function checksumsFileName(product: string, versionNumber: string): string {
  return `${product}_${versionNumber}_checksums.txt`;
}

/**
 * Renders `<hex>  <filename>` lines sorted by file name, the layout
 * `sha256sum -c` accepts.
 */
export function formatChecksums(entries: ChecksumEntry[]): string {
  return [...entries]
    .sort((a, b) => a.fileName.localeCompare(b.fileName))
    .map(entry => `${entry.sha256}  ${entry.fileName}\n`)
    .join('');
}

export function parseChecksums(content: string): ChecksumEntry[] {
  const entries: ChecksumEntry[] = [];
  for (const line of content.split('\n')) {
    const match = /^([0-9a-f]{64})\s+\*?(.+)$/i.exec(line.trim());
    if (match?.[1] && match[2]) {
      entries.push({ sha256: match[1].toLowerCase(), fileName: match[2] });
    }
  }
  return entries;
}

/**
 * Hashes every file and writes the checksums file next to them.
 */
export async function writeChecksumsFile(outputPath: string, files: string[]): Promise<ChecksumEntry[]> {
  const entries: ChecksumEntry[] = [];
  for (const file of files) {
    entries.push({ fileName: path.basename(file), sha256: await sha256File(file) });
  }
  await writeFileAtomic(outputPath, formatChecksums(entries));
  return entries;
}

/**
 * Re-hashes every file listed in a checksums file, resolved against the
 * file's own directory. Returns the entries that do not match.
 */
export async function verifyChecksumsFile(checksumsPath: string): Promise<ChecksumMismatch[]> {
  const dir = path.dirname(checksumsPath);
  const entries = parseChecksums(await fs.readFile(checksumsPath, 'utf8'));
  const mismatches: ChecksumMismatch[] = [];

  for (const entry of entries) {
    let actual: string | null;
    try {
      actual = await sha256File(path.join(dir, entry.fileName));
    } catch {
      actual = null;
    }
    if (actual !== entry.sha256) {
      mismatches.push({ fileName: entry.fileName, expected: entry.sha256, actual });
    }
  }
  return mismatches;
}
