import type { Archive } from '../archive/archive.types';
import type { ExecCommand } from '../exec/exec.types';
import type { IGitModule } from '../git/types';
import type { InjectionResult } from '../injector/injector.types';
import type { ReleaseConfig } from '../config_manager/config_manager.types';
import type { ReleaseNotesStore } from '../release_notes/store/release_notes_store';
import type { PipelineStageError } from '../errors';
import type { Version } from '../version';

// ============================================================================
// Stages
// ============================================================================

/**
 * Pipeline stages, in execution order. Exactly one of `TagRemoved` and
 * `TagRemovedOnFailure` runs, depending on the build outcome.
 */
export const PIPELINE_STAGES = [
  'VersionValidated',
  'DependenciesChecked',
  'VersionFilesUpdated',
  'TaggedForBuild',
  'BuildInvoked',
  'TagRemoved',
  'TagRemovedOnFailure',
  'PlatformArchivesBuilt',
  'ArchivesInjected',
  'OutputsVerified',
  'NotesGenerated',
] as const;

export type PipelineStage = typeof PIPELINE_STAGES[number];

export type StageStatus = 'ok' | 'warning' | 'failed';

export type StageOutcome = {
  stage: PipelineStage;
  status: StageStatus;
  /** Warnings raised while the stage ran */
  warnings: string[];
  /** Set when the stage failed */
  error?: string;
  startedAt: string;
  durationMs: number;
};

export type PipelineStatus = 'success' | `failed-at-${PipelineStage}`;

/**
 * What happened to the temporary build tag.
 * - not-created: the run stopped before tagging
 * - removed: deleted after the build
 * - failed: deletion failed and the tag is still in the repository
 */
export type TagCleanupState = 'not-created' | 'removed' | 'failed';

export type TagCleanup = {
  state: TagCleanupState;
  error?: string;
};

// ============================================================================
// Result
// ============================================================================

export type PipelineRunResult = {
  /** Raw version argument */
  input: string;
  /** Set once the version validated */
  version: Version | null;
  status: PipelineStatus;
  failedStage?: PipelineStage;
  error?: PipelineStageError;
  tagCreated: boolean;
  tagCleanup: TagCleanup;
  /** Build tool command that was located */
  buildTool?: string;
  /** Version files rewritten, project-relative */
  updatedVersionFiles: string[];
  platformArchives: Archive[];
  releaseArchives: Archive[];
  injection?: InjectionResult;
  checksumsFile?: string;
  notesFile?: string;
  stages: StageOutcome[];
  startedAt: string;
  completedAt: string;
};

// ============================================================================
// Observer & Dependencies
// ============================================================================

export type PipelineEvent =
  | { type: 'stage:started'; stage: PipelineStage }
  | { type: 'stage:warning'; stage: PipelineStage; message: string }
  | { type: 'stage:completed'; outcome: StageOutcome }
  | { type: 'pipeline:completed'; result: PipelineRunResult };

export type PipelineObserver = (event: PipelineEvent) => void;

export type ReleasePipelineDependencies = {
  config: ReleaseConfig;
  git: IGitModule;
  /** Runs the build tool, the platform build and the tool probes */
  execCommand: ExecCommand;
  /** Record used for `RELEASE_NOTES_{version}.md`, when one exists */
  notesStore: ReleaseNotesStore;
  observer?: PipelineObserver;
  /** Clock for stage timing and build info */
  now?: () => Date;
  /** Parent directory for injection scratch dirs (default: OS temp dir) */
  scratchBaseDir?: string;
};

export interface IReleasePipeline {
  run(versionInput: string): Promise<PipelineRunResult>;
}
