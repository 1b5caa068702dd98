/**
 * Type Definitions for the Signoff module
 *
 * Value types flowing through the DCO sign-off validator. Every type here is
 * immutable once built: records come from version control, results are the
 * validator's only output.
 */

/**
 * A commit as read from version control history (or, in commit-msg hook
 * mode, the message that is about to be committed).
 */
export type CommitRecord = {
  /** Commit hash, or a placeholder such as "pending" in hook mode */
  readonly identifier: string;
  /** Full commit message, subject included */
  readonly message: string;
  /** Author name as recorded by git */
  readonly authorName: string;
  /** Author email as recorded by git */
  readonly authorEmail: string;
  /** Parent hashes; more than one marks a merge commit */
  readonly parents?: readonly string[];
};

/**
 * Identity parsed from a `Signed-off-by:` (or `Co-authored-by:`) trailer.
 */
export type SignoffLine = {
  readonly name: string;
  readonly email: string;
};

/**
 * Policy switches for the validator.
 *
 * All flags are explicit so a policy can be logged, diffed and tested on its
 * own. See {@link DEFAULT_MATCH_POLICY} for the defaults.
 */
export type MatchPolicy = {
  /** Compare trailer and author emails ignoring case (default: true) */
  readonly caseInsensitiveEmail: boolean;
  /** Pass merge commits without looking for trailers (default: true) */
  readonly allowMergeCommitsWithoutSignoff: boolean;
  /**
   * Require a trailer naming the commit author (default: true).
   * When false any well-formed trailer is accepted, which suits squash
   * merges carrying several contributors.
   */
  readonly requireExactAuthorMatch: boolean;
  /**
   * Under exact matching, also accept a sign-off from any identity listed
   * in a `Co-authored-by:` trailer of the same commit (default: false).
   */
  readonly acceptCoAuthorSignoffs: boolean;
};

/**
 * `pull-request`: every commit a PR introduces, must be non-empty.
 * `commit-msg`: a single pending message from a commit-msg hook.
 */
export type ValidationMode = 'pull-request' | 'commit-msg';

export type FailureCode = 'NO_SIGNOFF' | 'AUTHOR_MISMATCH';

export type Exemption = 'merge-commit';

/**
 * Outcome for a single commit.
 */
export type ValidationResult = {
  readonly commitIdentifier: string;
  readonly passed: boolean;
  /** Human readable diagnostic, present on failure */
  readonly reason?: string;
  readonly code?: FailureCode;
  /** Set when the commit passed without inspection */
  readonly exemption?: Exemption;
  /** Well-formed sign-off trailers, in message order */
  readonly signoffs: readonly SignoffLine[];
  /** Lines that looked like a sign-off trailer but were not well formed */
  readonly malformedTrailers: readonly string[];
};

export type SignoffSummary = {
  total: number;
  passed: number;
  failed: number;
  exempted: number;
};

/**
 * Result of scanning a message for one trailer key.
 */
export type TrailerScan = {
  signoffs: SignoffLine[];
  malformed: string[];
};
