/**
 * Custom Error Classes for GitModule
 *
 * Typed exceptions for the git operations that feed the validators.
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string | undefined) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when a ref (branch, tag, hash, range end) cannot be resolved
 */
export class RefNotFoundError extends GitError {
  public readonly ref: string;

  constructor(ref: string) {
    super(`Ref not found: ${ref}`);
    this.name = 'RefNotFoundError';
    this.ref = ref;
    Object.setPrototypeOf(this, RefNotFoundError.prototype);
  }
}
