/**
 * GitModule - Commit history access for the validators
 *
 * Reads commits and identities through an injected `execCommand`, so the
 * class itself never spawns processes. Output is parsed into the
 * `CommitRecord` value type consumed by the Signoff module.
 *
 * @module git_module
 */

import type {
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  CommitAuthor,
} from './types';
import type { CommitRecord } from '../signoff';
import { GitCommandError, RefNotFoundError } from './errors';
import { createLogger } from '../logger/logger';

const logger = createLogger('[GitModule] ');

// ASCII unit / record separators never appear in commit metadata
const FIELD_SEP = '\x1f';
const RECORD_SEP = '\x1e';
const RECORD_FORMAT = ['%H', '%an', '%ae', '%P', '%B'].join('%x1f') + '%x1e';

/**
 * Splits "a..b" or "a...b" into its ends. A bare ref yields no base.
 */
export function parseRange(range: string): { base?: string; head: string } {
  const match = /^(.*?)\.{2,3}(.*)$/.exec(range);
  if (!match) {
    return { head: range };
  }
  const base = match[1] || undefined;
  const head = match[2] || 'HEAD';
  return base ? { base, head } : { head };
}

/**
 * Parses `git log` output produced with RECORD_FORMAT.
 */
export function parseCommitRecords(stdout: string): CommitRecord[] {
  return stdout
    .split(RECORD_SEP)
    .map(chunk => chunk.replace(/^\n+/, ''))
    .filter(chunk => chunk.trim() !== '')
    .map(chunk => {
      const [identifier, authorName, authorEmail, parents, ...messageParts] = chunk.split(FIELD_SEP);
      if (identifier === undefined || authorName === undefined || authorEmail === undefined || parents === undefined) {
        throw new GitCommandError('Invalid git log output format', chunk);
      }
      return {
        identifier,
        authorName,
        authorEmail,
        parents: parents.trim() ? parents.trim().split(' ') : [],
        message: messageParts.join(FIELD_SEP).trimEnd(),
      };
    });
}

/**
 * GitModule class providing the read-only Git operations the CLI needs
 *
 * All operations are async and use dependency injection for testability.
 * Errors are transformed into typed exceptions for better handling.
 */
export class GitModule {
  private repoRoot: string;
  private execCommand: ExecCommand;

  /**
   * @throws Error if execCommand is not provided
   */
  constructor(dependencies: GitModuleDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for GitModule');
    }

    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot || '';
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
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel']);
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr);
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd || await this.ensureRepoRoot();
    logger.debug(`git ${args.join(' ')}`);
    return this.execCommand('git', args, { ...options, cwd });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Returns the absolute path to the current Git repository root
   *
   * @throws GitCommandError if not in a Git repository
   */
  async getRepoRoot(): Promise<string> {
    return await this.ensureRepoRoot();
  }

  /**
   * Checks that a ref resolves to a commit
   *
   * @example
   * await gitModule.resolveRef('origin/main'); // => true
   */
  async resolveRef(ref: string): Promise<boolean> {
    const result = await this.execGit(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
    return result.exitCode === 0;
  }

  /**
   * Finds the most recent common ancestor of two refs
   *
   * @throws RefNotFoundError if either ref does not exist
   * @throws GitCommandError if the refs share no history
   */
  async getMergeBase(refA: string, refB: string): Promise<string> {
    for (const ref of [refA, refB]) {
      if (!(await this.resolveRef(ref))) {
        throw new RefNotFoundError(ref);
      }
    }

    const result = await this.execGit(['merge-base', refA, refB]);

    if (result.exitCode !== 0) {
      throw new GitCommandError(
        `Failed to find merge base between ${refA} and ${refB}`,
        result.stderr
      );
    }

    return result.stdout.trim();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // COMMITS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Reads every commit in a range, oldest first
   *
   * @param range - "base..head", or a single ref for its whole history
   * @returns Commit records in chronological order
   * @throws RefNotFoundError if an end of the range does not exist
   * @throws GitCommandError if git log fails
   *
   * @example
   * const commits = await gitModule.getCommitRecords('origin/main..HEAD');
   * // => [{ identifier: 'a1b2c3...', authorName: 'Jane Doe', ... }]
   */
  async getCommitRecords(range: string): Promise<CommitRecord[]> {
    const { base, head } = parseRange(range);
    for (const ref of base ? [base, head] : [head]) {
      if (!(await this.resolveRef(ref))) {
        throw new RefNotFoundError(ref);
      }
    }

    const result = await this.execGit(['log', '--reverse', `--format=${RECORD_FORMAT}`, range, '--']);

    if (result.exitCode !== 0) {
      throw new GitCommandError(`Failed to read commits for ${range}`, result.stderr);
    }

    const records = parseCommitRecords(result.stdout);
    logger.debug(`Read ${records.length} commit(s) for ${range}`);
    return records;
  }

  /**
   * Returns the identity git would record as author of the next commit
   * (used by commit-msg hooks, where the commit does not exist yet)
   *
   * @throws GitCommandError if no identity is configured
   *
   * @example
   * await gitModule.getAuthorIdentity(); // => { name: 'Jane Doe', email: 'jane@example.com' }
   */
  async getAuthorIdentity(): Promise<CommitAuthor> {
    const result = await this.execGit(['var', 'GIT_AUTHOR_IDENT']);

    if (result.exitCode !== 0) {
      throw new GitCommandError('Failed to read author identity', result.stderr);
    }

    // "Jane Doe <jane@example.com> 1700000000 +0100"
    const match = /^(.*?)\s*<([^>]*)>/.exec(result.stdout.trim());
    if (!match || match[1] === undefined || match[2] === undefined) {
      throw new GitCommandError('Invalid GIT_AUTHOR_IDENT output', result.stdout);
    }

    return { name: match[1], email: match[2] };
  }
}
