import type { CommitRecord } from './signoff.types';
import { splitLines } from './trailer_parser';

// Subjects git and hosting providers generate, e.g. "Merge branch 'x'",
// "Merge pull request #1 from ...", "Merge 1a2b3c4 into 5d6e7f8"
const MERGE_SUBJECT_PATTERN =
  /^Merge (?:(?:branch|branches|remote-tracking branch|remote-tracking branches|tag|commit) '|pull request #\d|[0-9a-f]{7,40} into )/;

const SCISSORS_LINE = '# ------------------------ >8 ------------------------';

/**
 * First non-blank line of a message.
 */
export function getSubject(message: string): string {
  return splitLines(message).find(line => line.trim() !== '')?.trim() ?? '';
}

/**
 * A commit is a merge when it has more than one parent. The subject is only
 * consulted when parents are unknown, as for a pending hook message.
 */
export function isMergeCommit(commit: Pick<CommitRecord, 'message' | 'parents'>): boolean {
  if (commit.parents !== undefined) {
    return commit.parents.length > 1;
  }
  return MERGE_SUBJECT_PATTERN.test(getSubject(commit.message));
}

/**
 * Strips what git would strip from a message file passed to a commit-msg
 * hook: `#` comment lines and everything below the `--verbose` scissors line.
 */
export function cleanCommitMessage(raw: string): string {
  const kept: string[] = [];

  for (const line of splitLines(raw)) {
    if (line === SCISSORS_LINE) {
      break;
    }
    if (line.startsWith('#')) {
      continue;
    }
    kept.push(line);
  }

  return kept.join('\n').trim();
}
