/**
 * Error taxonomy for relpack core.
 *
 * Per-item failures (one platform, one release archive, one record) are
 * collected into batch results; run-level preconditions are thrown.
 */

/**
 * Base class for every relpack error. `code` is stable and safe to match on.
 */
export class RelpackError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidVersionFormatError extends RelpackError {
  constructor(public readonly input: string) {
    super(
      `Invalid version format: "${input}". Expected vMAJOR.MINOR.PATCH or vMAJOR.MINOR.PATCH-SNAPSHOT (e.g. v1.2.3)`,
      'INVALID_VERSION_FORMAT'
    );
  }
}

export class MissingInputDirectoryError extends RelpackError {
  constructor(public readonly directory: string) {
    super(`Input directory not found: ${directory}`, 'MISSING_INPUT_DIRECTORY');
  }
}

export class NoPlatformArchivesError extends RelpackError {
  constructor(public readonly platformsDir: string, public readonly skipped: string[]) {
    super(
      `No platform archives created from ${platformsDir} (skipped: ${skipped.join(', ') || 'none'})`,
      'NO_PLATFORM_ARCHIVES'
    );
  }
}

export class ArchiveWriteError extends RelpackError {
  constructor(public readonly archivePath: string, public override cause?: unknown) {
    super(`Failed to write archive ${archivePath}: ${describeCause(cause)}`, 'ARCHIVE_WRITE_FAILURE');
  }
}

export class ArchiveExtractError extends RelpackError {
  constructor(public readonly archivePath: string, public override cause?: unknown) {
    super(`Failed to extract archive ${archivePath}: ${describeCause(cause)}`, 'ARCHIVE_EXTRACT_FAILURE');
  }
}

export class ArchiveRewriteError extends RelpackError {
  constructor(public readonly archivePath: string, public override cause?: unknown) {
    super(
      `Failed to rewrite archive ${archivePath}: ${describeCause(cause)} (original left unchanged)`,
      'ARCHIVE_REWRITE_FAILURE'
    );
  }
}

/**
 * Field-level problem found in a release-note record.
 */
export interface ValidationError {
  field: string;
  message: string;
  value: unknown;
}

export class RecordValidationError extends RelpackError {
  constructor(public readonly version: string, public readonly errors: ValidationError[]) {
    super(
      `Release notes for ${version} failed validation: ${errors.map(e => e.message).join('; ')}`,
      'RECORD_VALIDATION_ERROR'
    );
  }
}

export class MissingRecordsError extends RelpackError {
  constructor(public readonly versions: string[]) {
    super(
      `Missing release notes for ${versions.length} version(s): ${versions.join(', ')}`,
      'MISSING_RECORDS'
    );
  }
}

export class ExternalToolFailureError extends RelpackError {
  constructor(
    public readonly tool: string,
    public readonly exitCode: number,
    public readonly stderr: string = '',
    public readonly timedOut: boolean = false
  ) {
    super(
      timedOut
        ? `${tool} timed out`
        : `${tool} failed with exit code ${exitCode}${stderr ? `: ${stderr.trim()}` : ''}`,
      'EXTERNAL_TOOL_FAILURE'
    );
  }
}

export class ToolNotFoundError extends RelpackError {
  constructor(public readonly tool: string, public readonly candidates: string[]) {
    super(
      `${tool} not found. Tried: ${candidates.join(', ') || '(no candidates)'}`,
      'TOOL_NOT_FOUND'
    );
  }
}

export class ConfigValidationError extends RelpackError {
  constructor(public readonly configPath: string, public readonly errors: ValidationError[]) {
    super(
      `Invalid configuration in ${configPath}: ${errors.map(e => `${e.field}: ${e.message}`).join(', ')}`,
      'CONFIG_VALIDATION_ERROR'
    );
  }
}

export class MissingBuildConfigError extends RelpackError {
  constructor(public readonly configPath: string) {
    super(`Build configuration not found: ${configPath}`, 'MISSING_BUILD_CONFIG');
  }
}

export class NotARepositoryError extends RelpackError {
  constructor(public readonly directory: string) {
    super(`Not inside a git repository: ${directory}`, 'NOT_A_REPOSITORY');
  }
}

export class InjectionFailedError extends RelpackError {
  constructor(public readonly archives: string[], public override cause?: unknown) {
    super(
      `Platform archive injection failed for ${archives.join(', ')}: ${describeCause(cause)}`,
      'INJECTION_FAILED'
    );
  }
}

export class NoReleaseArchivesError extends RelpackError {
  constructor(public readonly distDir: string, public readonly product: string) {
    super(`No release archives (${product}_*.tar.gz, ${product}_*.zip) found in ${distDir}`, 'NO_RELEASE_ARCHIVES');
  }
}

export class PipelineStageError extends RelpackError {
  constructor(public readonly stage: string, public override cause?: unknown) {
    super(`Release pipeline failed at ${stage}: ${describeCause(cause)}`, 'PIPELINE_STAGE_FAILED');
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
