import { RelpackError } from '../errors/errors';

/**
 * Base class for git failures. Part of the relpack error taxonomy, so the
 * pipeline and the CLI can match on `code` like any other error.
 */
export class GitError extends RelpackError {
  constructor(message: string, code: string = 'GIT_ERROR') {
    super(message, code);
  }
}

/**
 * A git invocation exited non-zero or timed out.
 */
export class GitCommandError extends GitError {
  constructor(
    message: string,
    public readonly stderr: string = '',
    public readonly command?: string
  ) {
    super(message, 'GIT_COMMAND_FAILED');
  }
}

export class TagNotFoundError extends GitError {
  constructor(public readonly tag: string) {
    super(`Tag not found: ${tag}`, 'TAG_NOT_FOUND');
  }
}

export class TagAlreadyExistsError extends GitError {
  constructor(public readonly tag: string) {
    super(`Tag already exists: ${tag}`, 'TAG_ALREADY_EXISTS');
  }
}
