import * as path from 'path';
import { PlatformArchives } from '@relpack/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ArchivesCommandOptions extends BaseCommandOptions {
  concurrency?: number;
}

export type ArchivesSummary = {
  platformsDir: string;
  outputDir: string;
  created: string[];
  skipped: PlatformArchives.PlatformSkip[];
  failed: Array<{ platform: string; error: string }>;
};

/**
 * `relpack archives [platformsDir] [outputDir]`: packages per-platform
 * binary directories without running a release.
 */
export class ArchivesCommand extends BaseCommand<ArchivesCommandOptions> {

  async executeArchives(
    platformsDirArg: string | undefined,
    outputDirArg: string | undefined,
    options: ArchivesCommandOptions
  ): Promise<void> {
    const reporter = this.createReporter(options);

    try {
      const config = await this.dependencyService.getReleaseConfig();
      const platformsDir = platformsDirArg ? path.resolve(platformsDirArg) : config.platformsDir;
      const outputDir = outputDirArg
        ? path.resolve(outputDirArg)
        : (platformsDirArg ? platformsDir : config.platformArchivesDir);

      reporter.debug(`Packaging ${platformsDir} into ${outputDir}`);
      const result = await PlatformArchives.buildPlatformArchives({
        platformsDir,
        outputDir,
        concurrency: options.concurrency ?? config.concurrency,
      });

      result.skipped.forEach(skip => reporter.warn(`Skipped ${skip.platform}: ${skip.reason}`));
      result.failed.forEach(failure => reporter.error(`Archive for ${failure.platform} failed: ${failure.error.message}`));
      (await PlatformArchives.describeArchives(result.created)).forEach(line => reporter.line(`  ${line}`));

      const summary: ArchivesSummary = {
        platformsDir,
        outputDir,
        created: result.created.map(archive => archive.fileName),
        skipped: result.skipped,
        failed: result.failed.map(failure => ({ platform: failure.platform, error: failure.error.message })),
      };
      this.handleSuccess(summary, options, `Created ${summary.created.length} platform archive(s) in ${outputDir}`);
    } catch (error) {
      // MissingInputDirectoryError or NoPlatformArchivesError
      return this.handleError(this.errorMessage(error), options, error);
    }
  }
}
