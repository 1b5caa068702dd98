/**
 * MemoryFileLister - In-memory FileLister for testing
 *
 * Simulates filesystem operations using a Map.
 *
 * @module file_lister/memory/memory_file_lister
 */

import picomatch from 'picomatch';
import type { FileLister, FileListOptions, MemoryFileListerOptions } from '../file_lister';
import { FileListerError } from '../file_lister';

/**
 * In-memory FileLister for testing.
 *
 * @example
 * ```typescript
 * const lister = new MemoryFileLister({
 *   files: { 'src/main.py': 'print(1)', 'README.md': '# Project' }
 * });
 *
 * const files = await lister.list(['**\/*.py']); // ['src/main.py']
 * ```
 */
export class MemoryFileLister implements FileLister {
  private readonly files: Map<string, string>;
  private readonly unreadable = new Set<string>();

  constructor(options: MemoryFileListerOptions = {}) {
    if (options.files instanceof Map) {
      this.files = new Map(options.files);
    } else if (options.files) {
      this.files = new Map(Object.entries(options.files));
    } else {
      this.files = new Map();
    }
  }

  async list(patterns: string[], options?: FileListOptions): Promise<string[]> {
    const isMatch = picomatch(patterns, { dot: true });
    const ignore = options?.ignore?.length ? picomatch(options.ignore, { dot: true }) : null;

    return Array.from(this.files.keys())
      .filter(filePath => isMatch(filePath) && !(ignore && ignore(filePath)))
      .sort();
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async read(filePath: string): Promise<string> {
    if (this.unreadable.has(filePath)) {
      throw new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
    }
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new FileListerError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
    }
    return content;
  }

  async write(filePath: string, content: string): Promise<void> {
    if (this.unreadable.has(filePath)) {
      throw new FileListerError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
    }
    this.files.set(filePath, content);
  }

  // ============================================
  // Testing utilities
  // ============================================

  addFile(filePath: string, content: string): void {
    this.files.set(filePath, content);
  }

  /**
   * Makes read() and write() fail with PERMISSION_DENIED for a path.
   */
  denyAccess(filePath: string): void {
    this.unreadable.add(filePath);
  }

  getFile(filePath: string): string | undefined {
    return this.files.get(filePath);
  }

  listPaths(): string[] {
    return Array.from(this.files.keys());
  }
}
