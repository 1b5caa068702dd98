/**
 * GitModule - Commit source for the validators
 *
 * @module git
 */

export { GitModule, parseCommitRecords, parseRange } from './git_module';
export { createExecCommand } from './exec_command';

export type {
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  CommitAuthor,
} from './types';

export {
  GitError,
  GitCommandError,
  RefNotFoundError,
} from './errors';
