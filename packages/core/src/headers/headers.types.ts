import type { FileLister } from '../file_lister';
import type { Logger } from '../logger';

/**
 * What a compliant file header looks like.
 */
export interface HeaderPolicy {
  /** SPDX license identifier (default: 'Apache-2.0') */
  licenseId: string;
  /**
   * Copyright notice rendered as `Copyright <notice>` on the line after the
   * SPDX identifier, e.g. "(C) 2025, Example contributors.". Omitted when
   * undefined.
   */
  copyrightNotice?: string;
  /** How many leading lines may hold the header (default: 5) */
  searchLines: number;
  /** Comment prefix by file extension, lower-case with leading dot */
  commentPrefixes: Record<string, string>;
}

export interface HeaderModuleDependencies {
  fileLister: FileLister;
  /** Defaults to a "[HeaderModule] " console logger */
  logger?: Logger;
}

export interface HeaderSelection {
  /** Files or glob patterns, relative to the project root */
  patterns: string[];
  /** Glob patterns to leave out */
  exclude?: string[];
}

export interface HeaderFileError {
  filePath: string;
  message: string;
}

export interface HeaderCheckReport {
  /** Files inspected, in path order */
  checked: string[];
  /** Files lacking at least one required line */
  missing: string[];
  /** Files whose extension has no known comment syntax */
  skipped: string[];
  /** Files that could not be read */
  errors: HeaderFileError[];
}

export interface HeaderFixReport {
  /** Files that received a header */
  modified: string[];
  skipped: string[];
  errors: HeaderFileError[];
}

export interface IHeaderModule {
  check(selection: HeaderSelection, policy?: Partial<HeaderPolicy>): Promise<HeaderCheckReport>;
  fix(selection: HeaderSelection, policy?: Partial<HeaderPolicy>): Promise<HeaderFixReport>;
}
