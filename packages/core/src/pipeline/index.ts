export { ReleasePipeline } from './release_pipeline';
export { updateVersionFiles, applyVersionRule } from './version_files';
export type { VersionFileUpdate } from './version_files';
export { renderReleaseNotesFile, releaseNotesFileName, formatBuildDate } from './release_notes_file';
export type { BuildInfo, ReleaseNotesFileInput } from './release_notes_file';
export { PIPELINE_STAGES } from './pipeline.types';
export type {
  IReleasePipeline,
  PipelineEvent,
  PipelineObserver,
  PipelineRunResult,
  PipelineStage,
  PipelineStatus,
  ReleasePipelineDependencies,
  StageOutcome,
  StageStatus,
  TagCleanup,
  TagCleanupState,
} from './pipeline.types';
