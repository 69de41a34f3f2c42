/**
 * Filesystem-backed ReleasePipeline wiring
 *
 * - createReleasePipeline(): real git, real processes and the project's
 *   release-notes directory, for the CLI and DI containers
 */
import type { ReleaseConfig } from '../../config_manager/config_manager.types';
import type { ExecCommand } from '../../exec/exec.types';
import type { IReleasePipeline, PipelineObserver } from '../pipeline.types';
import { ReleasePipeline } from '../release_pipeline';
import { createExecCommand } from '../../exec/exec';
import { LocalGitModule } from '../../git/local';
import { FsReleaseNotesStore } from '../../release_notes/store/fs';

export type CreateReleasePipelineOptions = {
  config: ReleaseConfig;
  observer?: PipelineObserver;
  /** Defaults to a spawn-based runner rooted at `config.projectRoot` */
  execCommand?: ExecCommand;
};

export function createReleasePipeline(options: CreateReleasePipelineOptions): IReleasePipeline {
  const { config } = options;
  const execCommand = options.execCommand ?? createExecCommand({ defaultCwd: config.projectRoot });
  return new ReleasePipeline({
    config,
    git: new LocalGitModule({ repoRoot: config.projectRoot, execCommand, timeout: config.git.timeoutMs }),
    execCommand,
    notesStore: new FsReleaseNotesStore(config.releaseNotesDir),
    ...(options.observer ? { observer: options.observer } : {}),
  });
}
