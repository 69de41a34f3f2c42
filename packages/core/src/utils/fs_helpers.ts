import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { randomBytes } from 'crypto';

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Sorted entry names of a directory, or null when it does not exist.
 */
export async function readDirSorted(dir: string): Promise<string[] | null> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Hidden sibling path used for write-then-rename. Same directory, so the
 * final rename never crosses filesystems.
 */
export function tempSiblingPath(target: string): string {
  const suffix = randomBytes(6).toString('hex');
  return path.join(path.dirname(target), `.${path.basename(target)}.${suffix}.tmp`);
}

/**
 * Runs `write` against a temp sibling of `target` and renames it into place.
 * The temp file is removed when `write` throws; `target` is never left
 * half-written.
 */
export async function replaceFileAtomic(
  target: string,
  write: (tempPath: string) => Promise<void>
): Promise<void> {
  const tempPath = tempSiblingPath(target);
  try {
    await write(tempPath);
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function writeFileAtomic(target: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await replaceFileAtomic(target, tempPath => fs.writeFile(tempPath, content));
}

/**
 * Resolves an archive member path under `root`, rejecting absolute paths
 * and `..` segments that would escape it.
 */
export function resolveInside(root: string, memberPath: string): string {
  const normalizedRoot = path.resolve(root);
  const resolved = path.resolve(normalizedRoot, memberPath);
  if (resolved !== normalizedRoot && !resolved.startsWith(normalizedRoot + path.sep)) {
    throw new Error(`Archive entry escapes extraction root: ${memberPath}`);
  }
  return resolved;
}

/**
 * True when `candidate` is `target` itself or one of its parent directories.
 */
export function containsPath(candidate: string, target: string): boolean {
  const relative = path.relative(path.resolve(candidate), path.resolve(target));
  return relative === '' || (relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative));
}

/**
 * Creates an exclusively owned temporary directory for `fn` and removes it
 * on every exit path.
 */
export async function withScratchDir<T>(
  prefix: string,
  fn: (scratchDir: string) => Promise<T>,
  baseDir: string = os.tmpdir()
): Promise<T> {
  await fs.mkdir(baseDir, { recursive: true });
  const scratchDir = await fs.mkdtemp(path.join(baseDir, prefix));
  try {
    return await fn(scratchDir);
  } finally {
    await fs.rm(scratchDir, { recursive: true, force: true });
  }
}
