/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for tests and for embedding the pipeline pieces in other tools.
 */

// ConfigStore
export { MemoryConfigStore } from './config_store/memory';

// ReleaseNotesStore
export { MemoryReleaseNotesStore } from './release_notes/store/memory';

// GitModule
export { MemoryGitModule } from './git/memory';
export type { MemoryTag } from './git/memory';
