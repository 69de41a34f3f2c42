import * as path from 'path';
import { Errors, Injector } from '@relpack/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface InjectCommandOptions extends BaseCommandOptions {
  distDir?: string;
  platformArchivesDir?: string;
}

export type InjectSummary = {
  distDir: string;
  skipped: boolean;
  skipReason?: string;
  platformArchives: string[];
  injected: string[];
  failed: Array<{ archive: string; error: string }>;
};

/**
 * `relpack inject`: adds the platform archives to every release archive
 * already in the dist directory.
 */
export class InjectCommand extends BaseCommand<InjectCommandOptions> {

  async executeInject(options: InjectCommandOptions): Promise<void> {
    const reporter = this.createReporter(options);

    let summary: InjectSummary;
    let policy: string;
    try {
      const config = await this.dependencyService.getReleaseConfig();
      const distDir = options.distDir ? path.resolve(options.distDir) : config.distDir;
      const platformArchivesDir = options.platformArchivesDir
        ? path.resolve(options.platformArchivesDir)
        : config.platformArchivesDir;
      policy = config.injectionFailurePolicy;

      const releaseArchives = await Injector.findReleaseArchives(distDir, config.product);
      if (releaseArchives.length === 0) {
        throw new Errors.NoReleaseArchivesError(distDir, config.product);
      }

      const result = await Injector.injectPlatformArchives({
        platformArchivesDir,
        releaseArchives,
        concurrency: config.concurrency,
      });

      summary = {
        distDir,
        skipped: result.skipped,
        platformArchives: result.platformArchives.map(archive => archive.fileName),
        injected: result.injected.map(archive => archive.fileName),
        failed: result.failed.map(failure => ({ archive: failure.archive.fileName, error: failure.error.message })),
      };
      if (result.skipReason) summary.skipReason = result.skipReason;
    } catch (error) {
      return this.handleError(this.errorMessage(error), options, error);
    }

    if (summary.skipped) {
      reporter.warn(`Injection skipped: ${summary.skipReason ?? 'nothing to inject'}`);
      return this.handleSuccess(summary, options, 'Nothing injected');
    }

    summary.failed.forEach(failure => reporter.error(`${failure.archive}: ${failure.error}`));
    summary.injected.forEach(name => reporter.line(`  ${name}`));

    if (summary.failed.length > 0 && policy === 'fail-run') {
      return this.handleError(
        `Injection failed for ${summary.failed.length} of ${summary.failed.length + summary.injected.length} archive(s)`,
        options,
        undefined,
        1,
        summary
      );
    }

    this.handleSuccess(
      summary,
      options,
      `Injected ${summary.platformArchives.length} platform archive(s) into ${summary.injected.length} release archive(s)`
    );
  }
}
