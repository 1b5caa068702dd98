import type { MatchPolicy, SignoffLine } from './signoff.types';

export const DEFAULT_MATCH_POLICY: MatchPolicy = Object.freeze({
  caseInsensitiveEmail: true,
  allowMergeCommitsWithoutSignoff: true,
  requireExactAuthorMatch: true,
  acceptCoAuthorSignoffs: false,
});

/**
 * Builds a complete policy from a partial one. Fields left `undefined`
 * keep their default.
 *
 * @example
 * resolveMatchPolicy({ requireExactAuthorMatch: false })
 * // => { caseInsensitiveEmail: true, allowMergeCommitsWithoutSignoff: true, requireExactAuthorMatch: false, acceptCoAuthorSignoffs: false }
 */
export function resolveMatchPolicy(partial: Partial<MatchPolicy> = {}): MatchPolicy {
  return {
    caseInsensitiveEmail: partial.caseInsensitiveEmail ?? DEFAULT_MATCH_POLICY.caseInsensitiveEmail,
    allowMergeCommitsWithoutSignoff: partial.allowMergeCommitsWithoutSignoff ?? DEFAULT_MATCH_POLICY.allowMergeCommitsWithoutSignoff,
    requireExactAuthorMatch: partial.requireExactAuthorMatch ?? DEFAULT_MATCH_POLICY.requireExactAuthorMatch,
    acceptCoAuthorSignoffs: partial.acceptCoAuthorSignoffs ?? DEFAULT_MATCH_POLICY.acceptCoAuthorSignoffs,
  };
}

/**
 * Compares two identities. Names must be equal after trimming; emails
 * are compared per `caseInsensitiveEmail`.
 */
export function identitiesMatch(a: SignoffLine, b: SignoffLine, policy: MatchPolicy): boolean {
  if (a.name.trim() !== b.name.trim()) {
    return false;
  }

  const emailA = a.email.trim();
  const emailB = b.email.trim();

  return policy.caseInsensitiveEmail
    ? emailA.toLowerCase() === emailB.toLowerCase()
    : emailA === emailB;
}

export function formatIdentity(identity: SignoffLine): string {
  return `${identity.name} <${identity.email}>`;
}
