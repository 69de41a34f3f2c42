/**
 * Type definitions for the git module
 */

import type { ExecCommand } from '../exec/exec.types';

export type { ExecOptions, ExecResult } from '../exec/exec.types';

/**
 * Dependencies required by LocalGitModule
 */
export type GitModuleDependencies = {
  /** Path to the Git repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
  /** Timeout applied to every git invocation, in milliseconds */
  timeout?: number;
};

/**
 * Git operations needed to cut a release: repository detection, the
 * temporary build tag and the commit recorded in build info.
 */
export interface IGitModule {
  getRepoRoot(): Promise<string>;
  isInsideRepository(): Promise<boolean>;
  /** Tags matching `pattern`, newest version first */
  listTags(pattern?: string): Promise<string[]>;
  tagExists(tag: string): Promise<boolean>;
  /** @throws TagAlreadyExistsError */
  createTag(tag: string, message?: string): Promise<void>;
  /** @throws TagNotFoundError */
  deleteTag(tag: string): Promise<void>;
  getCommitHash(ref?: string): Promise<string>;
}
