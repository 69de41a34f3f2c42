/**
 * LocalGitModule - git CLI operations through an injected execCommand
 *
 * @module git/local
 */

import type { GitModuleDependencies, IGitModule, ExecOptions, ExecResult } from '../types';
import type { ExecCommand } from '../../exec/exec.types';
import { GitCommandError, TagAlreadyExistsError, TagNotFoundError } from '../errors';
import { createLogger } from '../../logger';

const logger = createLogger('[GitModule] ');

export class LocalGitModule implements IGitModule {
  private repoRoot: string;
  private readonly execCommand: ExecCommand;
  private readonly timeout: number | undefined;

  constructor(dependencies: GitModuleDependencies) {
    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot || '';
    this.timeout = dependencies.timeout;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Ensures that repoRoot is set, auto-detecting it if necessary
   *
   * @throws GitCommandError if not in a Git repository
   */
  private async ensureRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel'], this.withTimeout({}));
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr, 'git rev-parse --show-toplevel');
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  private withTimeout(options: ExecOptions): ExecOptions {
    return this.timeout === undefined ? options : { timeout: this.timeout, ...options };
  }

  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd || await this.ensureRepoRoot();
    const result = await this.execCommand('git', args, this.withTimeout({ ...options, cwd }));
    if (result.timedOut) {
      throw new GitCommandError(`git ${args[0] ?? ''} timed out`, result.stderr, `git ${args.join(' ')}`);
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return await this.ensureRepoRoot();
  }

  async isInsideRepository(): Promise<boolean> {
    const result = await this.execCommand(
      'git',
      ['rev-parse', '--is-inside-work-tree'],
      this.withTimeout({ cwd: this.repoRoot || process.cwd() })
    );
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  /**
   * Get commit hash for a given reference (branch, tag, HEAD, etc.)
   *
   * @throws GitCommandError if ref does not exist
   */
  async getCommitHash(ref: string = 'HEAD'): Promise<string> {
    const result = await this.execGit(['rev-parse', ref]);

    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to get commit hash for ref "${ref}"`, result.stderr, `git rev-parse ${ref}`);
    }

    const hash = result.stdout.trim();
    logger.debug(`Got commit hash for ${ref}: ${hash.substring(0, 8)}...`);
    return hash;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TAGS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Lists tags matching a glob, sorted by version descending.
   *
   * @example
   * await git.listTags('v*');
   * // => ["v1.10.0", "v1.9.2", "v1.9.1"]
   */
  async listTags(pattern: string = 'v*'): Promise<string[]> {
    const result = await this.execGit(['tag', '-l', pattern, '--sort=-v:refname']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to list tags', result.stderr, `git tag -l ${pattern}`);
    }

    return result.stdout
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }

  async tagExists(tag: string): Promise<boolean> {
    const result = await this.execGit(['rev-parse', '-q', '--verify', `refs/tags/${tag}`]);
    return result.exitCode === 0;
  }

  /**
   * Creates a lightweight tag, or an annotated one when `message` is given.
   *
   * @throws TagAlreadyExistsError
   * @throws GitCommandError
   */
  async createTag(tag: string, message?: string): Promise<void> {
    if (await this.tagExists(tag)) {
      throw new TagAlreadyExistsError(tag);
    }

    const args = message ? ['tag', '-a', tag, '-m', message] : ['tag', tag];
    const result = await this.execGit(args);

    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to create tag ${tag}`, result.stderr, `git ${args.join(' ')}`);
    }
    logger.debug(`Created tag ${tag}`);
  }

  /**
   * @throws TagNotFoundError
   * @throws GitCommandError
   */
  async deleteTag(tag: string): Promise<void> {
    if (!(await this.tagExists(tag))) {
      throw new TagNotFoundError(tag);
    }

    const result = await this.execGit(['tag', '-d', tag]);

    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to delete tag ${tag}`, result.stderr, `git tag -d ${tag}`);
    }
    logger.debug(`Deleted tag ${tag}`);
  }
}
