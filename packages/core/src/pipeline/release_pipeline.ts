import * as path from 'path';
import { promises as fs } from 'fs';
import type { Archive } from '../archive/archive.types';
import type { ExecCommand } from '../exec/exec.types';
import type { IGitModule } from '../git/types';
import type { ReleaseConfig } from '../config_manager/config_manager.types';
import type { ReleaseNotesStore } from '../release_notes/store/release_notes_store';
import type { Version } from '../version';
import type {
  IReleasePipeline,
  PipelineEvent,
  PipelineObserver,
  PipelineRunResult,
  PipelineStage,
  ReleasePipelineDependencies,
  StageOutcome,
} from './pipeline.types';
import {
  ConfigValidationError,
  ExternalToolFailureError,
  InjectionFailedError,
  MissingBuildConfigError,
  MissingInputDirectoryError,
  NoPlatformArchivesError,
  NoReleaseArchivesError,
  NotARepositoryError,
  PipelineStageError,
  describeCause,
} from '../errors';
import { validateVersion } from '../version';
import { runChecked } from '../exec/exec';
import { expandHome, locateTool, probeCommand } from '../tool_locator/tool_locator';
import { buildPlatformArchives, describeArchives } from '../platform_archives/platform_archive_builder';
import { findReleaseArchives, injectPlatformArchives } from '../injector/release_archive_injector';
import { checksumsFileName, writeChecksumsFile } from '../checksum/checksum';
import { ReleaseNotesAggregator } from '../release_notes/release_notes_aggregator';
import { containsPath, pathExists, writeFileAtomic } from '../utils/fs_helpers';
import { updateVersionFiles } from './version_files';
import { releaseNotesFileName, renderReleaseNotesFile } from './release_notes_file';
import { createLogger } from '../logger';

const logger = createLogger('[Pipeline] ');

const SHORT_COMMIT_LENGTH = 7;

/**
 * Handle passed to each stage body for non-fatal findings.
 */
type StageContext = {
  warn(message: string): void;
};

/**
 * Turns a version into a checksummed, publishable set of artifacts in
 * `distDir`.
 *
 * Stages run strictly in sequence and the run halts at the first fatal
 * failure. The temporary build tag is removed whether the build succeeds
 * or fails; if removal itself fails the run result says so.
 */
export class ReleasePipeline implements IReleasePipeline {
  private readonly config: ReleaseConfig;
  private readonly git: IGitModule;
  private readonly execCommand: ExecCommand;
  private readonly notesStore: ReleaseNotesStore;
  private readonly observer: PipelineObserver | undefined;
  private readonly now: () => Date;
  private readonly scratchBaseDir: string | undefined;

  constructor(deps: ReleasePipelineDependencies) {
    this.config = deps.config;
    this.git = deps.git;
    this.execCommand = deps.execCommand;
    this.notesStore = deps.notesStore;
    this.observer = deps.observer;
    this.now = deps.now ?? (() => new Date());
    this.scratchBaseDir = deps.scratchBaseDir;
  }

  async run(versionInput: string): Promise<PipelineRunResult> {
    const result: PipelineRunResult = {
      input: versionInput,
      version: null,
      status: 'success',
      tagCreated: false,
      tagCleanup: { state: 'not-created' },
      updatedVersionFiles: [],
      platformArchives: [],
      releaseArchives: [],
      stages: [],
      startedAt: this.now().toISOString(),
      completedAt: '',
    };

    try {
      const version = await this.stage(result, 'VersionValidated', async () => validateVersion(versionInput));
      result.version = version;
      logger.info(`Creating release ${version.tag}`);

      const buildTool = await this.stage(result, 'DependenciesChecked', () => this.checkDependencies());
      result.buildTool = buildTool;

      result.updatedVersionFiles = await this.stage(result, 'VersionFilesUpdated', ctx =>
        this.updateVersionFiles(version, ctx));

      await this.stage(result, 'TaggedForBuild', ctx => this.tagForBuild(version, result, ctx));

      let built = false;
      try {
        await this.stage(result, 'BuildInvoked', () => this.invokeBuild(buildTool));
        built = true;
      } finally {
        await this.stage(result, built ? 'TagRemoved' : 'TagRemovedOnFailure', ctx =>
          this.removeBuildTag(version, result, ctx));
      }

      result.platformArchives = await this.stage(result, 'PlatformArchivesBuilt', ctx =>
        this.buildPlatformArchives(ctx));

      await this.stage(result, 'ArchivesInjected', ctx => this.injectArchives(result, ctx));

      await this.stage(result, 'OutputsVerified', () => this.verifyOutputs(version, result));

      result.notesFile = await this.stage(result, 'NotesGenerated', () => this.generateNotes(version, result));
    } catch (error) {
      if (!(error instanceof PipelineStageError)) throw error;
      const failed = result.stages.find(outcome => outcome.status === 'failed');
      result.error = error;
      if (failed) {
        result.failedStage = failed.stage;
        result.status = `failed-at-${failed.stage}`;
      }
    }

    result.completedAt = this.now().toISOString();
    if (result.status === 'success') {
      logger.info(`Release ${result.version?.tag ?? versionInput} ready in ${this.config.distDir}`);
    } else {
      logger.error(result.error?.message ?? `Release failed (${result.status})`);
    }
    this.emit({ type: 'pipeline:completed', result });
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STAGE RUNNER
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Runs one stage body, records its outcome and reports it. Any error
   * thrown by the body becomes a PipelineStageError.
   */
  private async stage<T>(
    result: PipelineRunResult,
    stage: PipelineStage,
    body: (ctx: StageContext) => Promise<T>
  ): Promise<T> {
    const startedAt = this.now();
    const warnings: string[] = [];
    const ctx: StageContext = {
      warn: (message) => {
        warnings.push(message);
        logger.warn(message);
        this.emit({ type: 'stage:warning', stage, message });
      },
    };

    this.emit({ type: 'stage:started', stage });

    const record = (outcome: Pick<StageOutcome, 'status' | 'error'>): void => {
      const entry: StageOutcome = {
        stage,
        warnings,
        startedAt: startedAt.toISOString(),
        durationMs: this.now().getTime() - startedAt.getTime(),
        ...outcome,
      };
      result.stages.push(entry);
      this.emit({ type: 'stage:completed', outcome: entry });
    };

    try {
      const value = await body(ctx);
      record({ status: warnings.length > 0 ? 'warning' : 'ok' });
      return value;
    } catch (error) {
      record({ status: 'failed', error: describeCause(error) });
      throw new PipelineStageError(stage, error);
    }
  }

  private emit(event: PipelineEvent): void {
    if (!this.observer) return;
    try {
      this.observer(event);
    } catch (error) {
      logger.warn(`Pipeline observer threw: ${describeCause(error)}`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // STAGES
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * @returns the located build tool, with `~` expanded
   */
  private async checkDependencies(): Promise<string> {
    const { projectRoot, build } = this.config;

    if (!(await this.git.isInsideRepository())) {
      throw new NotARepositoryError(projectRoot);
    }

    const candidate = await locateTool(
      build.candidates[0] ?? 'build tool',
      build.candidates,
      probeCommand(this.execCommand)
    );

    if (build.configFile !== null) {
      const configPath = path.resolve(projectRoot, build.configFile);
      if (!(await pathExists(configPath))) {
        throw new MissingBuildConfigError(configPath);
      }
    }

    return expandHome(candidate);
  }

  private async updateVersionFiles(version: Version, ctx: StageContext): Promise<string[]> {
    const updates = await updateVersionFiles(this.config.projectRoot, this.config.versionFiles, version.tag);
    const updated: string[] = [];
    for (const update of updates) {
      if (update.status === 'missing') {
        ctx.warn(`Version file not found, skipping: ${update.path}`);
      } else if (update.status === 'no-match') {
        ctx.warn(`Version pattern did not match in ${update.path}`);
      } else if (update.status === 'updated') {
        logger.info(`Updated version in ${update.path}`);
        updated.push(update.path);
      }
    }

    const hook = this.config.versionFilesCommand;
    if (hook) {
      const args = hook.args.map(arg => arg.split('{version}').join(version.tag));
      try {
        await runChecked(this.execCommand, hook.command, args, {
          cwd: this.config.projectRoot,
          timeout: hook.timeoutMs,
        });
        logger.info(`Ran ${hook.command} ${args.join(' ')}`);
      } catch (error) {
        if (!(error instanceof ExternalToolFailureError)) throw error;
        ctx.warn(`Version files command failed: ${error.message}`);
      }
    }
    return updated;
  }

  private async tagForBuild(version: Version, result: PipelineRunResult, ctx: StageContext): Promise<void> {
    const { distDir, projectRoot } = this.config;
    if (containsPath(distDir, projectRoot)) {
      throw new ConfigValidationError('distDir', [{
        field: 'distDir',
        message: `refusing to clean ${distDir}, it contains the project root`,
        value: distDir,
      }]);
    }

    if (await this.git.tagExists(version.tag)) {
      ctx.warn(`Tag ${version.tag} already exists, deleting it before the build`);
      await this.git.deleteTag(version.tag);
    }

    await fs.rm(distDir, { recursive: true, force: true });

    await this.git.createTag(version.tag);
    result.tagCreated = true;
    logger.info(`Created temporary tag ${version.tag}`);
  }

  private async invokeBuild(buildTool: string): Promise<void> {
    const { build, projectRoot } = this.config;
    logger.info(`Running ${buildTool} ${build.args.join(' ')}`);
    await runChecked(this.execCommand, buildTool, build.args, {
      cwd: projectRoot,
      timeout: build.timeoutMs,
    });
  }

  /**
   * Never throws: a failed deletion is recorded in `tagCleanup` so the run
   * result shows the tag is still there.
   */
  private async removeBuildTag(version: Version, result: PipelineRunResult, ctx: StageContext): Promise<void> {
    if (!result.tagCreated) return;
    try {
      await this.git.deleteTag(version.tag);
      result.tagCleanup = { state: 'removed' };
      logger.info(`Removed temporary tag ${version.tag}`);
    } catch (error) {
      const message = describeCause(error);
      result.tagCleanup = { state: 'failed', error: message };
      ctx.warn(`Failed to remove tag ${version.tag}, delete it manually: ${message}`);
    }
  }

  private async buildPlatformArchives(ctx: StageContext): Promise<Archive[]> {
    const { platformBuild, projectRoot } = this.config;

    if (platformBuild) {
      const outcome = await this.execCommand(platformBuild.command, platformBuild.args, {
        cwd: projectRoot,
        timeout: platformBuild.timeoutMs,
      });
      if (outcome.timedOut || outcome.exitCode !== 0) {
        const failure = new ExternalToolFailureError(
          platformBuild.command,
          outcome.exitCode,
          outcome.stderr,
          outcome.timedOut ?? false
        );
        ctx.warn(`Platform build had issues, continuing: ${failure.message}`);
      }
    }

    try {
      const built = await buildPlatformArchives({
        platformsDir: this.config.platformsDir,
        outputDir: this.config.platformArchivesDir,
        concurrency: this.config.concurrency,
      });
      built.skipped.forEach(skip => ctx.warn(`Skipped ${skip.platform}: ${skip.reason}`));
      built.failed.forEach(failure => ctx.warn(`Archive for ${failure.platform} failed: ${failure.error.message}`));
      return built.created;
    } catch (error) {
      if (error instanceof NoPlatformArchivesError || error instanceof MissingInputDirectoryError) {
        ctx.warn(error.message);
        return [];
      }
      throw error;
    }
  }

  private async injectArchives(result: PipelineRunResult, ctx: StageContext): Promise<void> {
    const releaseArchives = await findReleaseArchives(this.config.distDir, this.config.product);
    result.releaseArchives = releaseArchives;

    const injection = await injectPlatformArchives({
      platformArchivesDir: this.config.platformArchivesDir,
      releaseArchives,
      concurrency: this.config.concurrency,
      ...(this.scratchBaseDir ? { scratchBaseDir: this.scratchBaseDir } : {}),
    });
    result.injection = injection;

    if (injection.skipped) {
      ctx.warn(`Injection skipped: ${injection.skipReason ?? 'nothing to inject'}`);
      return;
    }

    const [firstFailure] = injection.failed;
    if (!firstFailure) return;

    const names = injection.failed.map(failure => failure.archive.fileName);
    if (this.config.injectionFailurePolicy === 'fail-run') {
      throw new InjectionFailedError(names, firstFailure.error);
    }
    injection.failed.forEach(failure =>
      ctx.warn(`Injection failed for ${failure.archive.fileName}, left unchanged: ${failure.error.message}`));
  }

  private async verifyOutputs(version: Version, result: PipelineRunResult): Promise<void> {
    const { distDir, product } = this.config;

    // Re-open: injection replaced the files
    const releaseArchives = await findReleaseArchives(distDir, product);
    if (releaseArchives.length === 0) {
      throw new NoReleaseArchivesError(distDir, product);
    }
    result.releaseArchives = releaseArchives;

    const checksumsPath = path.join(distDir, checksumsFileName(product, version.number));
    await writeChecksumsFile(checksumsPath, releaseArchives.map(archive => archive.path));
    result.checksumsFile = checksumsPath;

    logger.info(`Release archives: ${releaseArchives.length}`);
    logger.info(`Platform archives: ${result.platformArchives.length}`);
    for (const line of await describeArchives(releaseArchives)) {
      logger.info(`  ${line}`);
    }
  }

  /**
   * @returns path of `RELEASE_NOTES_{version}.md`
   */
  private async generateNotes(version: Version, result: PipelineRunResult): Promise<string> {
    const aggregator = new ReleaseNotesAggregator({
      store: this.notesStore,
      product: this.config.product,
      now: this.now,
    });
    const record = await aggregator.load(version.number);
    const checksumsName = result.checksumsFile ? path.basename(result.checksumsFile) : undefined;

    const markdown = renderReleaseNotesFile({
      product: this.config.product,
      version,
      record,
      artifacts: await describeArchives(result.releaseArchives),
      ...(checksumsName ? { checksumsFileName: checksumsName } : {}),
      buildInfo: {
        builtAt: this.now(),
        commit: await this.shortCommit(),
      },
    });

    const notesPath = path.join(this.config.distDir, releaseNotesFileName(version));
    await writeFileAtomic(notesPath, markdown);
    logger.info(`Release notes created: ${notesPath}`);
    return notesPath;
  }

  private async shortCommit(): Promise<string> {
    try {
      return (await this.git.getCommitHash()).slice(0, SHORT_COMMIT_LENGTH);
    } catch (error) {
      logger.warn(`Could not read commit hash: ${describeCause(error)}`);
      return 'unknown';
    }
  }
}
