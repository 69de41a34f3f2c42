export {
  RelpackError,
  InvalidVersionFormatError,
  MissingInputDirectoryError,
  NoPlatformArchivesError,
  ArchiveWriteError,
  ArchiveExtractError,
  ArchiveRewriteError,
  RecordValidationError,
  MissingRecordsError,
  ExternalToolFailureError,
  ToolNotFoundError,
  ConfigValidationError,
  MissingBuildConfigError,
  NotARepositoryError,
  InjectionFailedError,
  NoReleaseArchivesError,
  PipelineStageError,
  describeCause,
} from './errors';
export type { ValidationError } from './errors';
