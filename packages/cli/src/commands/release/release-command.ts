import * as path from 'path';
import type { Pipeline } from '@relpack/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export type ReleaseCommandOptions = BaseCommandOptions;

/**
 * JSON view of a pipeline run.
 */
export type ReleaseSummary = {
  version: string;
  status: Pipeline.PipelineStatus;
  failedStage?: Pipeline.PipelineStage;
  error?: string;
  tagCleanup: Pipeline.TagCleanup;
  releaseArchives: string[];
  platformArchives: string[];
  checksumsFile?: string;
  notesFile?: string;
  warnings: string[];
  stages: Pipeline.StageOutcome[];
};

export function toReleaseSummary(result: Pipeline.PipelineRunResult): ReleaseSummary {
  const summary: ReleaseSummary = {
    version: result.version?.tag ?? result.input,
    status: result.status,
    tagCleanup: result.tagCleanup,
    releaseArchives: result.releaseArchives.map(archive => archive.fileName),
    platformArchives: result.platformArchives.map(archive => archive.fileName),
    warnings: result.stages.flatMap(outcome => outcome.warnings),
    stages: result.stages,
  };
  if (result.failedStage) summary.failedStage = result.failedStage;
  if (result.error) summary.error = result.error.message;
  if (result.checksumsFile) summary.checksumsFile = result.checksumsFile;
  if (result.notesFile) summary.notesFile = result.notesFile;
  return summary;
}

/**
 * `relpack release <version>`: runs the whole release pipeline.
 */
export class ReleaseCommand extends BaseCommand<ReleaseCommandOptions> {

  async executeRelease(version: string, options: ReleaseCommandOptions): Promise<void> {
    const reporter = this.createReporter(options);

    let result: Pipeline.PipelineRunResult;
    try {
      const pipeline = await this.dependencyService.getReleasePipeline(reporter.pipelineObserver());
      result = await pipeline.run(version);
    } catch (error) {
      return this.handleError(`Release failed: ${this.errorMessage(error)}`, options, error);
    }

    const summary = toReleaseSummary(result);

    if (result.tagCleanup.state === 'failed') {
      reporter.warn(`Tag ${summary.version} was not removed; delete it with: git tag -d ${summary.version}`);
    }

    if (result.status !== 'success') {
      return this.handleError(
        `Release ${summary.version} ${result.status}: ${summary.error ?? 'unknown error'}`,
        options,
        result.error,
        1,
        summary
      );
    }

    reporter.header(`Release ${summary.version}`);
    summary.releaseArchives.forEach(name => reporter.keyValue('archive', name));
    if (summary.checksumsFile) reporter.keyValue('checksums', path.basename(summary.checksumsFile));
    if (summary.notesFile) reporter.keyValue('notes', path.basename(summary.notesFile));
    if (summary.warnings.length > 0) reporter.keyValue('warnings', summary.warnings.length);

    this.handleSuccess(summary, options, `Release ${summary.version} complete`);
  }
}
