/**
 * Trailer parsing for commit messages.
 *
 * Recognises `Signed-off-by: Name <email>` and `Co-authored-by: Name <email>`
 * lines anywhere in a message. A line that carries the key but not a name
 * token followed by a bracketed email is reported as malformed and otherwise
 * ignored.
 *
 * @module signoff/trailer_parser
 */

import type { SignoffLine, TrailerScan } from './signoff.types';

export const SIGNOFF_KEY = 'Signed-off-by';
export const CO_AUTHOR_KEY = 'Co-authored-by';

// Name: at least one non-space character, no angle brackets.
// Email: bracketed, no whitespace, exactly one "@" with text on both sides.
const IDENTITY_PATTERN = /^([^<>]*[^<>\s])\s*<([^<>\s@]+@[^<>\s@]+)>$/;

type ScanOptions = {
  /** Match the key regardless of case (git itself only writes one spelling) */
  ignoreKeyCase?: boolean;
};

export function splitLines(message: string): string[] {
  return message.split(/\r?\n/);
}

/**
 * Parses "Name <email>" into an identity, or returns null.
 *
 * @example
 * parseIdentity('Jane Doe <jane@example.com>') // { name: 'Jane Doe', email: 'jane@example.com' }
 * parseIdentity('Jane Doe jane@example.com')   // null
 */
export function parseIdentity(value: string): SignoffLine | null {
  const match = IDENTITY_PATTERN.exec(value.trim());
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }
  return { name: match[1].trim(), email: match[2] };
}

/**
 * Scans every line of a message for `<key>:` trailers.
 */
export function scanTrailers(message: string, key: string, options: ScanOptions = {}): TrailerScan {
  const prefix = `${key}:`;
  const comparablePrefix = options.ignoreKeyCase ? prefix.toLowerCase() : prefix;
  const result: TrailerScan = { signoffs: [], malformed: [] };

  for (const rawLine of splitLines(message)) {
    const line = rawLine.trim();
    const head = line.slice(0, prefix.length);
    if ((options.ignoreKeyCase ? head.toLowerCase() : head) !== comparablePrefix) {
      continue;
    }

    const identity = parseIdentity(line.slice(prefix.length));
    if (identity) {
      result.signoffs.push(identity);
    } else {
      result.malformed.push(line);
    }
  }

  return result;
}

/**
 * Collects `Signed-off-by:` trailers. The key is case-sensitive, as written
 * by `git commit -s`.
 */
export function parseSignoffLines(message: string): TrailerScan {
  return scanTrailers(message, SIGNOFF_KEY);
}

/**
 * Collects `Co-authored-by:` identities. Hosting providers spell the key
 * with varying case, so it is matched case-insensitively.
 */
export function parseCoAuthors(message: string): SignoffLine[] {
  return scanTrailers(message, CO_AUTHOR_KEY, { ignoreKeyCase: true }).signoffs;
}
