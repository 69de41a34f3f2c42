import * as path from 'path';
import { Version } from '@relpack/core';
import type { Config, ReleaseNotes } from '@relpack/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface NotesGenerateOptions extends BaseCommandOptions {
  version?: string;
  output?: string;
  filename?: string;
}

export interface NotesCheckOptions extends BaseCommandOptions {
  strict?: boolean;
  warnOnly?: boolean;
}

export type NotesListMissingOptions = BaseCommandOptions;

/**
 * `relpack notes ...`: release-notes aggregation and CI checks.
 */
export class NotesCommand extends BaseCommand {

  // ═══════════════════════════════════════════════════════════════════════
  // GENERATE
  // ═══════════════════════════════════════════════════════════════════════

  async executeGenerate(options: NotesGenerateOptions): Promise<void> {
    const reporter = this.createReporter(options);

    try {
      const config = await this.dependencyService.getReleaseConfig();
      const aggregator = await this.dependencyService.getReleaseNotesAggregator();
      const outputDir = options.output ? path.resolve(options.output) : config.projectRoot;
      const filename = options.filename ?? config.releaseNotesOutput;

      const document = await aggregator.aggregate(options.version ? [options.version] : undefined);
      document.warnings.forEach(warning => reporter.warn(warning));
      if (options.version && document.versions.length === 0) {
        reporter.warn(`No release notes for ${Version.toNumeric(options.version)}`);
      }

      const written = await aggregator.writeDocument(document, outputDir, filename);
      this.handleSuccess(
        { path: written, versions: document.versions, warnings: document.warnings },
        options,
        `Generated: ${written} (${document.versions.length} version(s))`
      );
    } catch (error) {
      return this.handleError(`Failed to generate release notes: ${this.errorMessage(error)}`, options, error);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // CHECK
  // ═══════════════════════════════════════════════════════════════════════

  async executeCheck(options: NotesCheckOptions): Promise<void> {
    const reporter = this.createReporter(options);

    let report: ReleaseNotes.CompletenessReport;
    try {
      const config = await this.dependencyService.getReleaseConfig();
      const aggregator = await this.dependencyService.getReleaseNotesAggregator();
      const git = await this.dependencyService.getGitModule();

      report = await aggregator.check({
        knownTags: await git.listTags('v*'),
        mode: this.resolveMode(options, config.completeness),
      });
    } catch (error) {
      return this.handleError(`Release notes check failed: ${this.errorMessage(error)}`, options, error);
    }

    const label = report.mode === 'strict' ? 'Error' : 'Warning';
    if (report.missing.length > 0) {
      reporter.warn(`${label}: Missing release notes for ${report.missing.length} version(s):`);
      report.missing.forEach(version => reporter.warn(`  - ${version} (tag: ${Version.toTag(version)})`));
    }
    if (report.invalid.length > 0) {
      reporter.warn(`${label}: Invalid release notes for ${report.invalid.length} version(s):`);
      report.invalid.forEach(entry => entry.errors.forEach(error =>
        reporter.warn(`  - ${entry.version}: ${error.field}: ${error.message}`)));
    }

    const data = {
      mode: report.mode,
      passed: report.passed,
      missing: report.missing,
      invalid: report.invalid,
    };

    if (!report.passed) {
      return this.handleError(report.error?.message ?? 'Release notes are incomplete', options, report.error, 1, data);
    }

    const clean = report.missing.length === 0 && report.invalid.length === 0;
    this.handleSuccess(data, options, clean ? 'All release tags have valid release notes' : 'Release notes check passed with warnings');
  }

  private resolveMode(options: NotesCheckOptions, configured: Config.CompletenessMode): Config.CompletenessMode {
    if (options.strict) return 'strict';
    if (options.warnOnly) return 'warn-only';
    return configured;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // LIST MISSING
  // ═══════════════════════════════════════════════════════════════════════

  async executeListMissing(options: NotesListMissingOptions): Promise<void> {
    const reporter = this.createReporter(options);

    try {
      const aggregator = await this.dependencyService.getReleaseNotesAggregator();
      const git = await this.dependencyService.getGitModule();
      const missing = await aggregator.listMissing(await git.listTags('v*'));

      reporter.line('Versions without release notes JSON:');
      if (missing.length === 0) {
        reporter.line('  (none - all versions have JSON files)');
      } else {
        missing.forEach(entry => reporter.line(`  ${entry.version}`));
      }

      if (options.json) {
        this.handleSuccess(missing, options);
      }
    } catch (error) {
      return this.handleError(`Failed to list missing release notes: ${this.errorMessage(error)}`, options, error);
    }
  }
}
