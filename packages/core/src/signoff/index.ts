/**
 * Signoff Module - DCO sign-off validation
 *
 * @module signoff
 * @example
 * ```typescript
 * import { Signoff } from '@dcoguard/core';
 *
 * const results = Signoff.validate(commits, { caseInsensitiveEmail: false });
 * const summary = Signoff.summarizeResults(results);
 * if (summary.failed > 0) process.exitCode = 1;
 * ```
 */

export {
  validate,
  validateCommit,
  summarizeResults,
  NO_SIGNOFF_REASON,
  AUTHOR_MISMATCH_REASON,
} from './signoff_validator';
export {
  DEFAULT_MATCH_POLICY,
  resolveMatchPolicy,
  identitiesMatch,
  formatIdentity,
} from './match_policy';
export {
  parseSignoffLines,
  parseCoAuthors,
  parseIdentity,
  scanTrailers,
  SIGNOFF_KEY,
  CO_AUTHOR_KEY,
} from './trailer_parser';
export { isMergeCommit, cleanCommitMessage, getSubject } from './commit_message';
export { SignoffError, InvalidInputError } from './errors';

export type {
  CommitRecord,
  SignoffLine,
  MatchPolicy,
  ValidationMode,
  ValidationResult,
  FailureCode,
  Exemption,
  SignoffSummary,
  TrailerScan,
} from './signoff.types';
