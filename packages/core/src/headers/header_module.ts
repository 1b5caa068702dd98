import picomatch from 'picomatch';
import type { FileLister } from '../file_lister';
import { createLogger } from '../logger';
import { errorMessage } from '../utils/error_utils';
import type { Logger } from '../logger';
import type {
  HeaderCheckReport,
  HeaderFileError,
  HeaderFixReport,
  HeaderModuleDependencies,
  HeaderPolicy,
  HeaderSelection,
  IHeaderModule,
} from './headers.types';
import {
  hasRequiredHeader,
  insertHeader,
  renderHeaderLines,
  resolveHeaderPolicy,
} from './header_template';

const GLOB_CHARS = /[*?[\]{}!]/;

/**
 * HeaderModule - SPDX header checks and fixes over a FileLister
 *
 * Plain paths are taken as given (pre-commit passes the staged files);
 * anything with glob syntax is expanded through the lister. Exclusions
 * apply to both.
 *
 * @example
 * ```typescript
 * const headers = new HeaderModule({ fileLister: new FsFileLister({ cwd: repoRoot }) });
 * const report = await headers.check({ patterns: ['**\/*.py'] }, { copyrightNotice: '(C) 2025, Example contributors.' });
 * if (report.missing.length > 0) { ... }
 * ```
 */
export class HeaderModule implements IHeaderModule {
  private readonly fileLister: FileLister;
  private readonly logger: Logger;

  constructor(dependencies: HeaderModuleDependencies) {
    this.fileLister = dependencies.fileLister;
    this.logger = dependencies.logger ?? createLogger('[HeaderModule] ');
  }

  async check(selection: HeaderSelection, policy: Partial<HeaderPolicy> = {}): Promise<HeaderCheckReport> {
    const resolved = resolveHeaderPolicy(policy);
    const report: HeaderCheckReport = { checked: [], missing: [], skipped: [], errors: [] };

    for (const filePath of await this.resolveFiles(selection)) {
      const headerLines = renderHeaderLines(filePath, resolved);
      if (!headerLines) {
        report.skipped.push(filePath);
        continue;
      }

      report.checked.push(filePath);
      try {
        const content = await this.fileLister.read(filePath);
        if (!hasRequiredHeader(content, headerLines, resolved.searchLines)) {
          report.missing.push(filePath);
        }
      } catch (error) {
        report.errors.push(this.toFileError(filePath, error));
      }
    }

    this.logger.debug(
      `Checked ${report.checked.length} file(s): ${report.missing.length} missing, ${report.errors.length} unreadable`
    );
    return report;
  }

  async fix(selection: HeaderSelection, policy: Partial<HeaderPolicy> = {}): Promise<HeaderFixReport> {
    const resolved = resolveHeaderPolicy(policy);
    const report: HeaderFixReport = { modified: [], skipped: [], errors: [] };

    for (const filePath of await this.resolveFiles(selection)) {
      const headerLines = renderHeaderLines(filePath, resolved);
      if (!headerLines) {
        report.skipped.push(filePath);
        continue;
      }

      try {
        const content = await this.fileLister.read(filePath);
        if (hasRequiredHeader(content, headerLines, resolved.searchLines)) {
          continue;
        }
        await this.fileLister.write(filePath, insertHeader(content, headerLines));
        report.modified.push(filePath);
      } catch (error) {
        report.errors.push(this.toFileError(filePath, error));
      }
    }

    this.logger.debug(`Added headers to ${report.modified.length} file(s)`);
    return report;
  }

  private async resolveFiles(selection: HeaderSelection): Promise<string[]> {
    const globs = selection.patterns.filter(p => GLOB_CHARS.test(p));
    const plain = selection.patterns.filter(p => !GLOB_CHARS.test(p));

    const excluded = selection.exclude?.length ? picomatch(selection.exclude, { dot: true }) : null;
    const files = new Set(excluded ? plain.filter(p => !excluded(p)) : plain);
    if (globs.length > 0) {
      const listOptions = selection.exclude ? { ignore: selection.exclude } : {};
      for (const filePath of await this.fileLister.list(globs, listOptions)) {
        files.add(filePath);
      }
    }

    return Array.from(files).sort();
  }

  private toFileError(filePath: string, error: unknown): HeaderFileError {
    return { filePath, message: errorMessage(error) };
  }
}
