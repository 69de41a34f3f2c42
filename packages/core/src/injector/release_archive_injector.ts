import * as path from 'path';
import { promises as fs } from 'fs';
import pLimit from 'p-limit';
import type { Archive } from '../archive/archive.types';
import type { InjectPlatformArchivesOptions, InjectionFailure, InjectionResult } from './injector.types';
import { extractArchive, getCodec, openArchive } from '../archive/archive';
import { detectArchiveFormat } from '../platform/platform';
import { listPlatformArchives, DEFAULT_CONCURRENCY } from '../platform_archives/platform_archive_builder';
import { ArchiveRewriteError } from '../errors';
import { isDirectory, readDirSorted, replaceFileAtomic, withScratchDir } from '../utils/fs_helpers';
import { createLogger } from '../logger';

const logger = createLogger('[Injector] ');

/** Directory inside every release archive that receives the platform archives. */
export const PLATFORMS_MEMBER_DIR = 'platforms';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Release archives (`{product}_*.tar.gz` / `{product}_*.zip`) directly
 * under `distDir`, sorted by name.
 */
export async function findReleaseArchives(distDir: string, product: string): Promise<Archive[]> {
  const pattern = new RegExp(`^${escapeRegExp(product)}_.+\\.(tar\\.gz|zip)$`);
  const archives: Archive[] = [];
  for (const name of (await readDirSorted(distDir)) ?? []) {
    const format = detectArchiveFormat(name);
    if (!format || !pattern.test(name)) continue;
    const fullPath = path.join(distDir, name);
    if ((await fs.stat(fullPath)).isFile()) {
      archives.push(openArchive(fullPath, format));
    }
  }
  return archives;
}

async function assertMembersPresent(archivePath: string, format: Archive['format'], expected: string[]): Promise<void> {
  const members = new Set(await getCodec(format).list(archivePath));
  const missing = expected.filter(member => !members.has(member));
  if (missing.length > 0) {
    throw new Error(`rewritten archive is missing ${missing.join(', ')}`);
  }
}

/**
 * Rebuilds one release archive with `platforms/` added. Runs in its own
 * scratch directory; the original is replaced only after the new archive
 * has been written and checked.
 */
async function injectInto(release: Archive, platformArchives: Archive[], scratchBaseDir?: string): Promise<void> {
  await withScratchDir('relpack-inject-', async (scratchDir) => {
    await extractArchive(release, scratchDir);

    try {
      const platformsRoot = path.join(scratchDir, PLATFORMS_MEMBER_DIR);
      await fs.mkdir(platformsRoot, { recursive: true });
      for (const platformArchive of platformArchives) {
        await fs.copyFile(platformArchive.path, path.join(platformsRoot, platformArchive.fileName));
      }

      const codec = getCodec(release.format);
      const entries = await codec.collectEntries(scratchDir);
      const expected = platformArchives.map(a => `${PLATFORMS_MEMBER_DIR}/${a.fileName}`);

      await replaceFileAtomic(release.path, async (tempPath) => {
        await codec.write(scratchDir, entries, tempPath);
        await assertMembersPresent(tempPath, release.format, expected);
      });
    } catch (error) {
      throw new ArchiveRewriteError(release.path, error);
    }
  }, scratchBaseDir);
}

/**
 * Embeds every platform archive under `platforms/` in each release archive.
 *
 * Best effort: a failing archive is reported in `failed` and left exactly
 * as it was, the others are still processed. Re-running overwrites the
 * `platforms/` members in place.
 */
export async function injectPlatformArchives(options: InjectPlatformArchivesOptions): Promise<InjectionResult> {
  const { platformArchivesDir, releaseArchives } = options;

  if (!(await isDirectory(platformArchivesDir))) {
    logger.warn(`Platform archives directory not found, skipping injection: ${platformArchivesDir}`);
    return { skipped: true, skipReason: 'platform archives directory not found', platformArchives: [], injected: [], failed: [] };
  }

  const platformArchives = await listPlatformArchives(platformArchivesDir);
  if (platformArchives.length === 0) {
    logger.warn(`No platform archives in ${platformArchivesDir}, skipping injection`);
    return { skipped: true, skipReason: 'no platform archives', platformArchives, injected: [], failed: [] };
  }

  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY));
  const outcomes = await Promise.all(
    releaseArchives.map(release => limit(async (): Promise<InjectionFailure | null> => {
      try {
        await injectInto(release, platformArchives, options.scratchBaseDir);
        logger.info(`Injected ${platformArchives.length} platform archive(s) into ${release.fileName}`);
        return null;
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        logger.warn(`Injection failed for ${release.fileName}: ${failure.message}`);
        return { archive: release, error: failure };
      }
    }))
  );

  const result: InjectionResult = { skipped: false, platformArchives, injected: [], failed: [] };
  outcomes.forEach((failure, index) => {
    const release = releaseArchives[index];
    if (failure) result.failed.push(failure);
    else if (release) result.injected.push(openArchive(release.path, release.format));
  });
  return result;
}
