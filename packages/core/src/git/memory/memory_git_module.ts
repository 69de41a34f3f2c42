/**
 * MemoryGitModule - In-memory Git implementation for tests
 *
 * Test Helpers:
 * - setTags(tags): Seed existing tags
 * - setHead(hash): Set the commit HEAD resolves to
 * - setInsideRepository(flag): Simulate running outside a repository
 * - failNextDelete(error): Make the next deleteTag call throw
 *
 * @module git/memory
 */

import type { IGitModule } from '../types';
import { GitCommandError, TagAlreadyExistsError, TagNotFoundError } from '../errors';
import { compareVersionNumbers, toNumeric } from '../../version';

export type MemoryTag = {
  name: string;
  commit: string;
  message?: string;
};

interface MemoryGitState {
  repoRoot: string;
  insideRepository: boolean;
  head: string;
  tags: Map<string, MemoryTag>;
  pendingDeleteFailure: Error | null;
}

export class MemoryGitModule implements IGitModule {
  private state: MemoryGitState;
  /** Ordered log of mutating calls, for assertions */
  readonly operations: string[] = [];

  constructor(repoRoot: string = '/test/repo') {
    this.state = {
      repoRoot,
      insideRepository: true,
      head: '0000000000000000000000000000000000000001',
      tags: new Map(),
      pendingDeleteFailure: null,
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setTags(tags: string[]): void {
    this.state.tags = new Map(tags.map(name => [name, { name, commit: this.state.head }]));
  }

  setHead(hash: string): void {
    this.state.head = hash;
  }

  setInsideRepository(inside: boolean): void {
    this.state.insideRepository = inside;
  }

  failNextDelete(error: Error = new GitCommandError('Failed to delete tag', 'simulated failure')): void {
    this.state.pendingDeleteFailure = error;
  }

  getTag(name: string): MemoryTag | undefined {
    return this.state.tags.get(name);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // IGitModule
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    if (!this.state.insideRepository) {
      throw new GitCommandError('Not in a Git repository');
    }
    return this.state.repoRoot;
  }

  async isInsideRepository(): Promise<boolean> {
    return this.state.insideRepository;
  }

  async listTags(pattern: string = 'v*'): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    return [...this.state.tags.keys()]
      .filter(name => matcher.test(name))
      .sort((a, b) => compareVersionNumbers(toNumeric(b), toNumeric(a)));
  }

  async tagExists(tag: string): Promise<boolean> {
    return this.state.tags.has(tag);
  }

  async createTag(tag: string, message?: string): Promise<void> {
    if (this.state.tags.has(tag)) {
      throw new TagAlreadyExistsError(tag);
    }
    this.state.tags.set(tag, { name: tag, commit: this.state.head, ...(message ? { message } : {}) });
    this.operations.push(`createTag ${tag}`);
  }

  async deleteTag(tag: string): Promise<void> {
    const failure = this.state.pendingDeleteFailure;
    if (failure) {
      this.state.pendingDeleteFailure = null;
      throw failure;
    }
    if (!this.state.tags.delete(tag)) {
      throw new TagNotFoundError(tag);
    }
    this.operations.push(`deleteTag ${tag}`);
  }

  async getCommitHash(ref: string = 'HEAD'): Promise<string> {
    if (ref === 'HEAD') return this.state.head;
    const tag = this.state.tags.get(ref);
    if (!tag) {
      throw new GitCommandError(`Failed to get commit hash for ref "${ref}"`);
    }
    return tag.commit;
  }
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}
