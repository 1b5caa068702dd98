/**
 * SPDX header rendering, detection and insertion on plain strings.
 *
 * @module headers/header_template
 */

import type { HeaderPolicy } from './headers.types';

const HASH_COMMENT_EXTENSIONS = ['.py', '.sh', '.bash', '.yml', '.yaml', '.toml', '.rb', '.pl', '.r'];
const SLASH_COMMENT_EXTENSIONS = [
  '.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs',
  '.go', '.rs', '.java', '.kt', '.scala', '.swift', '.cs',
  '.c', '.h', '.cc', '.cpp', '.hpp',
];

export const DEFAULT_COMMENT_PREFIXES: Record<string, string> = Object.freeze({
  ...Object.fromEntries(HASH_COMMENT_EXTENSIONS.map(ext => [ext, '#'])),
  ...Object.fromEntries(SLASH_COMMENT_EXTENSIONS.map(ext => [ext, '//'])),
});

export const DEFAULT_HEADER_POLICY: HeaderPolicy = Object.freeze({
  licenseId: 'Apache-2.0',
  searchLines: 5,
  commentPrefixes: DEFAULT_COMMENT_PREFIXES,
});

export function resolveHeaderPolicy(partial: Partial<HeaderPolicy> = {}): HeaderPolicy {
  const policy: HeaderPolicy = {
    licenseId: partial.licenseId ?? DEFAULT_HEADER_POLICY.licenseId,
    searchLines: partial.searchLines ?? DEFAULT_HEADER_POLICY.searchLines,
    commentPrefixes: { ...DEFAULT_COMMENT_PREFIXES, ...partial.commentPrefixes },
  };
  if (partial.copyrightNotice !== undefined) {
    policy.copyrightNotice = partial.copyrightNotice;
  }
  return policy;
}

/**
 * Lower-cased extension including the dot, or '' when there is none.
 */
export function extensionOf(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot).toLowerCase() : '';
}

/**
 * Required header lines for a file, or null when its extension has no
 * configured comment prefix.
 *
 * @example
 * renderHeaderLines('tool.py', resolveHeaderPolicy({ copyrightNotice: '(C) 2025, Example contributors.' }))
 * // => ['# SPDX-License-Identifier: Apache-2.0', '# Copyright (C) 2025, Example contributors.']
 */
export function renderHeaderLines(filePath: string, policy: HeaderPolicy): string[] | null {
  const prefix = policy.commentPrefixes[extensionOf(filePath)];
  if (!prefix) {
    return null;
  }

  const lines = [`${prefix} SPDX-License-Identifier: ${policy.licenseId}`];
  if (policy.copyrightNotice) {
    lines.push(`${prefix} Copyright ${policy.copyrightNotice}`);
  }
  return lines;
}

/**
 * True when every required line appears, as a whole line, within the first
 * `searchLines` lines.
 *
 * The window always covers a shebang plus the header itself, so whatever
 * insertHeader writes is found again.
 */
export function hasRequiredHeader(content: string, headerLines: string[], searchLines: number): boolean {
  const depth = Math.max(searchLines, headerLines.length + 1);
  const leading = content.split(/\r?\n/).slice(0, depth).map(line => line.trimEnd());
  return headerLines.every(header => leading.includes(header));
}

/**
 * Puts the header at the top, followed by a blank line. A `#!` shebang
 * stays on the first line. New lines use the file's own line ending.
 */
export function insertHeader(content: string, headerLines: string[]): string {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const lines = content.split(/\r?\n/);
  const first = lines[0];

  if (first !== undefined && first.startsWith('#!')) {
    return [first, ...headerLines, '', ...lines.slice(1)].join(eol);
  }
  return [...headerLines, '', content].join(eol);
}
