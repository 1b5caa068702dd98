/**
 * Unit Tests for the Signoff validator
 *
 * Pure functions, so no mocks: every test builds CommitRecords inline.
 */

import {
  validate,
  validateCommit,
  summarizeResults,
  NO_SIGNOFF_REASON,
} from './signoff_validator';
import { DEFAULT_MATCH_POLICY, resolveMatchPolicy } from './match_policy';
import { InvalidInputError } from './errors';
import type { CommitRecord } from './signoff.types';

function commit(overrides: Partial<CommitRecord> = {}): CommitRecord {
  return {
    identifier: 'abc123',
    message: 'Fix bug\n\nSigned-off-by: Jane Doe <jane@example.com>',
    authorName: 'Jane Doe',
    authorEmail: 'jane@example.com',
    ...overrides,
  };
}

describe('Signoff validator', () => {
  describe('validate - sign-off presence', () => {
    it('[EARS-S1] WHEN the trailer equals the author identity, THE SYSTEM SHALL pass the commit', () => {
      const [result] = validate([commit()]);

      expect(result).toEqual({
        commitIdentifier: 'abc123',
        passed: true,
        signoffs: [{ name: 'Jane Doe', email: 'jane@example.com' }],
        malformedTrailers: [],
      });
    });

    it('[EARS-S2] WHEN the message has no trailer, THE SYSTEM SHALL fail with the no-signoff reason', () => {
      const [result] = validate([commit({ message: 'Fix bug' })]);

      expect(result?.passed).toBe(false);
      expect(result?.code).toBe('NO_SIGNOFF');
      expect(result?.reason).toBe('no DCO sign-off found');
      expect(result?.reason).toBe(NO_SIGNOFF_REASON);
    });

    it('[EARS-S3] WHEN the message is empty, THE SYSTEM SHALL fail without throwing', () => {
      const [result] = validate([commit({ message: '' })]);

      expect(result?.passed).toBe(false);
      expect(result?.code).toBe('NO_SIGNOFF');
    });

    it('[EARS-S4] WHEN the trailer is indented or has trailing spaces, THE SYSTEM SHALL accept it', () => {
      const [result] = validate([
        commit({ message: 'Fix bug\n\n   Signed-off-by: Jane Doe <jane@example.com>   ' }),
      ]);

      expect(result?.passed).toBe(true);
    });

    it('[EARS-S5] WHEN only malformed trailers exist, THE SYSTEM SHALL report them and fail with no-signoff', () => {
      const [result] = validate([
        commit({
          message: 'Fix bug\n\nSigned-off-by: Jane Doe jane@example.com\nSigned-off-by: <jane@example.com>',
        }),
      ]);

      expect(result?.passed).toBe(false);
      expect(result?.code).toBe('NO_SIGNOFF');
      expect(result?.malformedTrailers).toEqual([
        'Signed-off-by: Jane Doe jane@example.com',
        'Signed-off-by: <jane@example.com>',
      ]);
    });
  });

  describe('validate - author matching', () => {
    it('[EARS-S6] WHEN the trailer names someone else, THE SYSTEM SHALL fail with a diagnostic holding both identities', () => {
      const [result] = validate([
        commit({ message: 'Fix bug\n\nSigned-off-by: John Roe <john@example.com>' }),
      ]);

      expect(result?.passed).toBe(false);
      expect(result?.code).toBe('AUTHOR_MISMATCH');
      expect(result?.reason).toBe(
        'sign-off does not match commit author: expected "Jane Doe <jane@example.com>", found "John Roe <john@example.com>"'
      );
    });

    it('[EARS-S7] WHEN emails differ only in case and matching is case-insensitive, THE SYSTEM SHALL pass', () => {
      const [result] = validate([
        commit({ message: 'Fix bug\n\nSigned-off-by: Jane Doe <Jane@Example.com>' }),
      ]);

      expect(result?.passed).toBe(true);
    });

    it('[EARS-S8] WHEN emails differ only in case and matching is case-sensitive, THE SYSTEM SHALL fail', () => {
      const [result] = validate(
        [commit({ message: 'Fix bug\n\nSigned-off-by: Jane Doe <Jane@Example.com>' })],
        { caseInsensitiveEmail: false }
      );

      expect(result?.passed).toBe(false);
      expect(result?.code).toBe('AUTHOR_MISMATCH');
    });

    it('[EARS-S9] WHEN one of several trailers matches the author, THE SYSTEM SHALL pass', () => {
      const [result] = validate([
        commit({
          message: [
            'Pair on parser',
            '',
            'Signed-off-by: John Roe <john@example.com>',
            'Signed-off-by: Jane Doe <jane@example.com>',
          ].join('\n'),
        }),
      ]);

      expect(result?.passed).toBe(true);
      expect(result?.signoffs).toHaveLength(2);
    });

    it('[EARS-S10] WHEN exact matching is disabled, THE SYSTEM SHALL accept any well-formed trailer', () => {
      const [result] = validate(
        [commit({ message: 'Squash\n\nSigned-off-by: John Roe <john@example.com>' })],
        { requireExactAuthorMatch: false }
      );

      expect(result?.passed).toBe(true);
    });

    it('[EARS-S11] WHEN exact matching is disabled and no trailer exists, THE SYSTEM SHALL still fail', () => {
      const [result] = validate([commit({ message: 'Squash' })], { requireExactAuthorMatch: false });

      expect(result?.code).toBe('NO_SIGNOFF');
    });

    it('[EARS-S12] WHEN the name differs but the email matches, THE SYSTEM SHALL fail', () => {
      const [result] = validate([
        commit({ message: 'Fix\n\nSigned-off-by: J. Doe <jane@example.com>' }),
      ]);

      expect(result?.code).toBe('AUTHOR_MISMATCH');
    });
  });

  describe('validate - co-authors', () => {
    const message = [
      'Joint work',
      '',
      'Co-authored-by: John Roe <john@example.com>',
      'Signed-off-by: John Roe <john@example.com>',
    ].join('\n');

    it('[EARS-S13] WHEN co-author sign-offs are not accepted, THE SYSTEM SHALL fail a co-author-only sign-off', () => {
      const [result] = validate([commit({ message })]);

      expect(result?.code).toBe('AUTHOR_MISMATCH');
    });

    it('[EARS-S14] WHEN co-author sign-offs are accepted, THE SYSTEM SHALL pass a co-author sign-off', () => {
      const [result] = validate([commit({ message })], { acceptCoAuthorSignoffs: true });

      expect(result?.passed).toBe(true);
    });

    it('[EARS-S15] WHEN accepting co-authors and nothing matches, THE SYSTEM SHALL list every accepted identity', () => {
      const [result] = validate(
        [commit({ message: 'Joint\n\nCo-authored-by: John Roe <john@example.com>\nSigned-off-by: Max Poe <max@example.com>' })],
        { acceptCoAuthorSignoffs: true }
      );

      expect(result?.reason).toBe(
        'sign-off does not match commit author: expected "Jane Doe <jane@example.com>" or "John Roe <john@example.com>", found "Max Poe <max@example.com>"'
      );
    });
  });

  describe('validate - merge commits', () => {
    it('[EARS-S16] WHEN the subject matches the merge heuristic, THE SYSTEM SHALL pass without a trailer', () => {
      const [result] = validate([commit({ message: "Merge branch 'main' into feature" })]);

      expect(result?.passed).toBe(true);
      expect(result?.exemption).toBe('merge-commit');
    });

    it('[EARS-S16] WHEN a single-parent commit only looks like a merge, THE SYSTEM SHALL require a sign-off', () => {
      const results = validate([
        commit({ identifier: 'a', message: 'Merge tagging helpers into one module', parents: ['p0'] }),
        commit({ identifier: 'b', message: 'Merge branching logic for retries', parents: ['p0'] }),
        commit({ identifier: 'c', message: "Merge branch 'x' into y", parents: ['p0'] }),
      ]);

      expect(results.map(r => [r.commitIdentifier, r.passed, r.code])).toEqual([
        ['a', false, 'NO_SIGNOFF'],
        ['b', false, 'NO_SIGNOFF'],
        ['c', false, 'NO_SIGNOFF'],
      ]);
      expect(results.every(r => r.exemption === undefined)).toBe(true);
    });

    it('[EARS-S17] WHEN the commit has two parents, THE SYSTEM SHALL treat it as a merge', () => {
      const [result] = validate([commit({ message: 'Sync', parents: ['p1', 'p2'] })]);

      expect(result?.exemption).toBe('merge-commit');
    });

    it('[EARS-S18] WHEN the exemption is disabled, THE SYSTEM SHALL check the merge like any commit', () => {
      const [result] = validate(
        [commit({ message: 'Merge pull request #12 from fork/topic' })],
        { allowMergeCommitsWithoutSignoff: false }
      );

      expect(result?.passed).toBe(false);
      expect(result?.code).toBe('NO_SIGNOFF');
    });

    it('[EARS-S19] WHEN a merge carries a mismatching trailer, THE SYSTEM SHALL apply the exemption first', () => {
      const [result] = validate([
        commit({ message: "Merge branch 'x'\n\nSigned-off-by: John Roe <john@example.com>" }),
      ]);

      expect(result?.passed).toBe(true);
      expect(result?.exemption).toBe('merge-commit');
    });
  });

  describe('validate - input contract', () => {
    it('[EARS-S20] WHEN pull-request mode receives no commits, THE SYSTEM SHALL throw InvalidInputError', () => {
      expect(() => validate([])).toThrow(InvalidInputError);
    });

    it('[EARS-S21] WHEN commit-msg mode receives two commits, THE SYSTEM SHALL throw InvalidInputError', () => {
      expect(() => validate([commit(), commit()], {}, 'commit-msg')).toThrow(
        'commit-msg mode expects exactly one commit message, got 2'
      );
    });

    it('[EARS-S22] WHEN commit-msg mode receives one message, THE SYSTEM SHALL validate it', () => {
      const results = validate([commit({ identifier: 'pending' })], {}, 'commit-msg');

      expect(results).toHaveLength(1);
      expect(results[0]?.commitIdentifier).toBe('pending');
    });
  });

  describe('validate - ordering and purity', () => {
    const commits = [
      commit({ identifier: 'c1' }),
      commit({ identifier: 'c2', message: 'No trailer' }),
      commit({ identifier: 'c3' }),
    ];

    it('[EARS-S23] THE SYSTEM SHALL return one result per commit in input order', () => {
      const results = validate(commits);

      expect(results.map(r => r.commitIdentifier)).toEqual(['c1', 'c2', 'c3']);
      expect(results.map(r => r.passed)).toEqual([true, false, true]);
    });

    it('[EARS-S24] THE SYSTEM SHALL return identical results for identical inputs', () => {
      expect(validate(commits)).toEqual(validate(commits));
    });
  });

  describe('validateCommit', () => {
    it('should take a complete policy', () => {
      const result = validateCommit(commit(), DEFAULT_MATCH_POLICY);
      expect(result.passed).toBe(true);
    });
  });

  describe('summarizeResults', () => {
    it('should count passed, failed and exempted commits', () => {
      const policy = resolveMatchPolicy();
      const results = [
        validateCommit(commit({ identifier: 'a' }), policy),
        validateCommit(commit({ identifier: 'b', message: 'nope' }), policy),
        validateCommit(commit({ identifier: 'c', message: "Merge tag 'v1.0'" }), policy),
      ];

      expect(summarizeResults(results)).toEqual({ total: 3, passed: 2, failed: 1, exempted: 1 });
    });

    it('should summarise an empty list as zero', () => {
      expect(summarizeResults([])).toEqual({ total: 0, passed: 0, failed: 0, exempted: 0 });
    });
  });
});
