import * as path from 'path';
import { promises as fs } from 'fs';
import pLimit from 'p-limit';
import type { Archive } from '../archive/archive.types';
import type { PlatformTarget } from '../platform/platform';
import type {
  BuildPlatformArchivesOptions,
  PlatformArchiveBuildResult,
  PlatformFailure,
  PlatformSkip,
} from './platform_archives.types';
import { PLATFORM_TARGETS, platformArchiveFileName, detectArchiveFormat } from '../platform/platform';
import { createArchiveFromDirectory, openArchive } from '../archive/archive';
import { MissingInputDirectoryError, NoPlatformArchivesError } from '../errors';
import { isDirectory, readDirSorted } from '../utils/fs_helpers';
import { createLogger } from '../logger';

const logger = createLogger('[PlatformArchives] ');

export const DEFAULT_CONCURRENCY = 2;

type PlatformOutcome =
  | { kind: 'created'; archive: Archive }
  | { kind: 'skipped'; skip: PlatformSkip }
  | { kind: 'failed'; failure: PlatformFailure };

async function buildOne(platformsDir: string, outputDir: string, target: PlatformTarget): Promise<PlatformOutcome> {
  const sourceDir = path.join(platformsDir, target.name);
  const outputPath = path.join(outputDir, platformArchiveFileName(target));

  try {
    const entries = await readDirSorted(sourceDir);
    if (entries === null) {
      logger.warn(`Platform directory not found, skipping: ${sourceDir}`);
      return { kind: 'skipped', skip: { platform: target.name, reason: 'directory not found' } };
    }
    if (entries.length === 0) {
      logger.warn(`Platform directory is empty, skipping: ${sourceDir}`);
      return { kind: 'skipped', skip: { platform: target.name, reason: 'directory is empty' } };
    }

    const archive = await createArchiveFromDirectory(sourceDir, outputPath, target.format);
    logger.info(`Created ${path.basename(outputPath)}`);
    return { kind: 'created', archive };
  } catch (error) {
    // Unreadable directories land here too; siblings keep going
    const failure = error instanceof Error ? error : new Error(String(error));
    logger.warn(`Failed to create archive for ${target.name}: ${failure.message}`);
    return { kind: 'failed', failure: { platform: target.name, error: failure } };
  }
}

/**
 * Packages each `{platformsDir}/{platform}/` directory into a
 * `{platform}.zip` (Windows) or `{platform}.tar.gz` archive.
 *
 * Per-platform problems are collected in the result; only a missing input
 * directory or an empty result throws.
 *
 * @throws MissingInputDirectoryError when `platformsDir` does not exist
 * @throws NoPlatformArchivesError when no archive was created
 */
export async function buildPlatformArchives(
  options: BuildPlatformArchivesOptions
): Promise<PlatformArchiveBuildResult> {
  const { platformsDir } = options;
  const outputDir = options.outputDir ?? platformsDir;
  const targets = options.platforms ?? PLATFORM_TARGETS;

  if (!(await isDirectory(platformsDir))) {
    throw new MissingInputDirectoryError(platformsDir);
  }
  await fs.mkdir(outputDir, { recursive: true });

  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY));
  const outcomes = await Promise.all(
    targets.map(target => limit(() => buildOne(platformsDir, outputDir, target)))
  );

  const result: PlatformArchiveBuildResult = { created: [], skipped: [], failed: [] };
  for (const outcome of outcomes) {
    if (outcome.kind === 'created') result.created.push(outcome.archive);
    else if (outcome.kind === 'skipped') result.skipped.push(outcome.skip);
    else result.failed.push(outcome.failure);
  }

  if (result.created.length === 0) {
    throw new NoPlatformArchivesError(platformsDir, [
      ...result.skipped.map(s => s.platform),
      ...result.failed.map(f => f.platform),
    ]);
  }

  logger.info(`Created ${result.created.length} platform archive(s) in ${outputDir}`);
  return result;
}

/**
 * Existing platform archives (`*.zip`, `*.tar.gz`) directly under `dir`,
 * sorted by name. Missing directory yields an empty list.
 */
export async function listPlatformArchives(dir: string): Promise<Archive[]> {
  const names = (await readDirSorted(dir)) ?? [];
  const archives: Archive[] = [];
  for (const name of names) {
    const format = detectArchiveFormat(name);
    if (!format) continue;
    const fullPath = path.join(dir, name);
    if ((await fs.stat(fullPath)).isFile()) {
      archives.push(openArchive(fullPath, format));
    }
  }
  return archives;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * One `name (size)` line per archive, for summaries.
 */
export async function describeArchives(archives: Archive[]): Promise<string[]> {
  return Promise.all(archives.map(async a => `${a.fileName} (${formatSize(await a.size())})`));
}
