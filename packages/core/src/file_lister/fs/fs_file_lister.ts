/**
 * FsFileLister - Filesystem-based FileLister implementation
 *
 * Uses fast-glob for pattern matching and fs/promises for file operations.
 * Used by the CLI against the working tree.
 *
 * @module file_lister/fs/fs_file_lister
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileLister, FileListOptions, FsFileListerOptions } from '../file_lister';
import { FileListerError } from '../file_lister';
import { errorCode, errorMessage } from '../../utils/error_utils';

/**
 * Filesystem-based FileLister implementation.
 *
 * Paths are relative to `cwd`; traversal ("..") and absolute paths are
 * rejected so a caller cannot escape the project root.
 *
 * @example
 * ```typescript
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 * const files = await lister.list(['**\/*.py'], { ignore: ['.venv/**'] });
 * ```
 */
export class FsFileLister implements FileLister {
  private readonly cwd: string;

  constructor(options: FsFileListerOptions) {
    this.cwd = options.cwd;
  }

  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    for (const pattern of patterns) {
      this.validatePath(pattern, 'pattern');
    }

    const files = await fg(patterns, {
      cwd: this.cwd,
      ignore: options?.ignore ?? [],
      onlyFiles: true,
      dot: true,
    });

    return files.sort();
  }

  async exists(filePath: string): Promise<boolean> {
    this.validatePath(filePath);

    try {
      await fs.access(path.join(this.cwd, filePath));
      return true;
    } catch {
      return false;
    }
  }

  async read(filePath: string): Promise<string> {
    this.validatePath(filePath);

    try {
      return await fs.readFile(path.join(this.cwd, filePath), 'utf-8');
    } catch (err: unknown) {
      const code = errorCode(err);
      if (code === 'ENOENT') {
        throw new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
      }
      if (code === 'EACCES') {
        throw new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
      }
      throw new FileListerError(`Read error: ${errorMessage(err)}`, 'READ_ERROR', filePath);
    }
  }

  async write(filePath: string, content: string): Promise<void> {
    this.validatePath(filePath);

    try {
      await fs.writeFile(path.join(this.cwd, filePath), content, 'utf-8');
    } catch (err: unknown) {
      if (errorCode(err) === 'EACCES') {
        throw new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
      }
      throw new FileListerError(`Write error: ${errorMessage(err)}`, 'WRITE_ERROR', filePath);
    }
  }

  private validatePath(filePath: string, kind: 'path' | 'pattern' = 'path'): void {
    if (filePath.split(/[\\/]/).includes('..')) {
      throw new FileListerError(
        `Invalid ${kind}: path traversal not allowed: ${filePath}`,
        'INVALID_PATH',
        filePath
      );
    }
    if (path.isAbsolute(filePath)) {
      throw new FileListerError(
        `Invalid ${kind}: absolute paths not allowed: ${filePath}`,
        'INVALID_PATH',
        filePath
      );
    }
  }
}
