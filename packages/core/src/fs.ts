/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem or
 * process access. Use @relpack/core/memory for in-memory alternatives.
 */

// ConfigStore + ConfigManager Factory
export {
  FsConfigStore,
  // Factory with explicit projectRoot (for DI containers)
  createConfigManager,
} from './config_store/fs';

// ReleaseNotesStore
export { FsReleaseNotesStore, SCHEMA_FILE_NAME } from './release_notes/store/fs';

// LocalGitModule (CLI-based, uses execCommand for git operations)
export { LocalGitModule } from './git/local';
export type { IGitModule, GitModuleDependencies } from './git';

// Process execution
export { createExecCommand } from './exec';
export type { ExecCommand, ExecCommandFactoryOptions } from './exec';

// ReleasePipeline wired to git, processes and release-notes directory
export { createReleasePipeline } from './pipeline/fs';
export type { CreateReleasePipelineOptions } from './pipeline/fs';
