/**
 * Git operations used by the release pipeline.
 *
 * @module git
 */

export { LocalGitModule } from './local';
export { MemoryGitModule } from './memory';

export type {
  IGitModule,
  GitModuleDependencies,
  ExecOptions,
  ExecResult,
} from './types';

export {
  GitError,
  GitCommandError,
  TagNotFoundError,
  TagAlreadyExistsError,
} from './errors';
