/**
 * Type Definitions for GitModule
 *
 * These types define the contracts for Git operations,
 * dependencies, and data structures used throughout the module.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by GitModule
 *
 * This module uses dependency injection to allow testing with mocks
 * and support different execution environments.
 */
export type GitModuleDependencies = {
  /** Path to the Git repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
};

/**
 * Commit author identity
 */
export type CommitAuthor = {
  /** Author name */
  name: string;
  /** Author email */
  email: string;
};
