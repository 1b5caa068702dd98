/**
 * Signoff Validator - DCO sign-off checks over commit records
 *
 * Pure functions: no I/O, no logging, no hidden state. Reading history and
 * rendering results belong to the caller.
 *
 * @module signoff/signoff_validator
 */

import type {
  CommitRecord,
  MatchPolicy,
  SignoffLine,
  SignoffSummary,
  ValidationMode,
  ValidationResult,
} from './signoff.types';
import { InvalidInputError } from './errors';
import { formatIdentity, identitiesMatch, resolveMatchPolicy } from './match_policy';
import { parseCoAuthors, parseSignoffLines } from './trailer_parser';
import { isMergeCommit } from './commit_message';

export const NO_SIGNOFF_REASON = 'no DCO sign-off found';
export const AUTHOR_MISMATCH_REASON = 'sign-off does not match commit author';

/**
 * Checks every commit for a DCO sign-off.
 *
 * The merge exemption is evaluated first and short-circuits the author
 * match: a merge commit passes under `allowMergeCommitsWithoutSignoff`
 * whatever `requireExactAuthorMatch` says.
 *
 * @param commits - Commits in chronological order
 * @param policy - Partial policy, merged over the defaults
 * @param mode - Input contract to enforce (default: 'pull-request')
 * @returns One result per commit, in input order
 * @throws InvalidInputError if the list is empty in pull-request mode, or
 *   does not hold exactly one message in commit-msg mode
 *
 * @example
 * validate([{ identifier: 'abc123', message: 'Fix bug\n\nSigned-off-by: Jane Doe <jane@example.com>', authorName: 'Jane Doe', authorEmail: 'jane@example.com' }])
 * // => [{ commitIdentifier: 'abc123', passed: true, signoffs: [...], malformedTrailers: [] }]
 */
export function validate(
  commits: readonly CommitRecord[],
  policy: Partial<MatchPolicy> = {},
  mode: ValidationMode = 'pull-request'
): ValidationResult[] {
  assertInputFitsMode(commits, mode);

  const resolved = resolveMatchPolicy(policy);
  return commits.map(commit => validateCommit(commit, resolved));
}

/**
 * Checks a single commit against a complete policy.
 */
export function validateCommit(commit: CommitRecord, policy: MatchPolicy): ValidationResult {
  const { signoffs, malformed } = parseSignoffLines(commit.message);
  const base = {
    commitIdentifier: commit.identifier,
    signoffs,
    malformedTrailers: malformed,
  };

  if (policy.allowMergeCommitsWithoutSignoff && isMergeCommit(commit)) {
    return { ...base, passed: true, exemption: 'merge-commit' };
  }

  if (signoffs.length === 0) {
    return { ...base, passed: false, code: 'NO_SIGNOFF', reason: NO_SIGNOFF_REASON };
  }

  if (policy.requireExactAuthorMatch) {
    const accepted = acceptedIdentities(commit, policy);
    const matched = signoffs.some(signoff =>
      accepted.some(identity => identitiesMatch(signoff, identity, policy))
    );

    if (!matched) {
      return {
        ...base,
        passed: false,
        code: 'AUTHOR_MISMATCH',
        reason: describeMismatch(accepted, signoffs),
      };
    }
  }

  return { ...base, passed: true };
}

/**
 * Aggregates results for the reporting layer.
 */
export function summarizeResults(results: readonly ValidationResult[]): SignoffSummary {
  const passed = results.filter(r => r.passed).length;
  return {
    total: results.length,
    passed,
    failed: results.length - passed,
    exempted: results.filter(r => r.exemption !== undefined).length,
  };
}

function assertInputFitsMode(commits: readonly CommitRecord[], mode: ValidationMode): void {
  if (mode === 'pull-request' && commits.length === 0) {
    throw new InvalidInputError(
      'No commits to validate: the pull request range is empty',
      mode,
      0
    );
  }
  if (mode === 'commit-msg' && commits.length !== 1) {
    throw new InvalidInputError(
      `commit-msg mode expects exactly one commit message, got ${commits.length}`,
      mode,
      commits.length
    );
  }
}

function acceptedIdentities(commit: CommitRecord, policy: MatchPolicy): SignoffLine[] {
  const author: SignoffLine = { name: commit.authorName, email: commit.authorEmail };
  return policy.acceptCoAuthorSignoffs
    ? [author, ...parseCoAuthors(commit.message)]
    : [author];
}

function describeMismatch(expected: SignoffLine[], found: readonly SignoffLine[]): string {
  const quote = (identity: SignoffLine) => `"${formatIdentity(identity)}"`;
  return `${AUTHOR_MISMATCH_REASON}: expected ${expected.map(quote).join(' or ')}, found ${found.map(quote).join(', ')}`;
}
