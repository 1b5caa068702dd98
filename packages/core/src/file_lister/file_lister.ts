/**
 * FileLister Interface
 *
 * Abstracts file listing, reading and writing so the header checker works
 * the same against the working tree and against in-memory fixtures.
 *
 * @module file_lister
 */

/**
 * Error codes for FileLister operations.
 */
export type FileListerErrorCode =
  | 'FILE_NOT_FOUND'
  | 'READ_ERROR'
  | 'WRITE_ERROR'
  | 'PERMISSION_DENIED'
  | 'INVALID_PATH';

/**
 * Error thrown when file operations fail.
 */
export class FileListerError extends Error {
  constructor(
    message: string,
    public readonly code: FileListerErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'FileListerError';
    Object.setPrototypeOf(this, FileListerError.prototype);
  }
}

/**
 * Options for file listing.
 */
export interface FileListOptions {
  /** Glob patterns to ignore (e.g., ['node_modules/**']) */
  ignore?: string[];
}

/**
 * Options for FsFileLister.
 */
export interface FsFileListerOptions {
  /** Base directory for all operations */
  cwd: string;
}

/**
 * Options for MemoryFileLister.
 */
export interface MemoryFileListerOptions {
  /** Map of filePath -> content */
  files?: Map<string, string> | Record<string, string>;
}

/**
 * Interface for listing, reading and writing files relative to a root.
 *
 * @example
 * ```typescript
 * // Filesystem backend (CLI)
 * const lister = new FsFileLister({ cwd: '/path/to/project' });
 *
 * // Memory backend (testing)
 * const lister = new MemoryFileLister({ files: { 'src/main.py': 'print(1)' } });
 *
 * const files = await lister.list(['**\/*.py']);
 * const content = await lister.read('src/main.py');
 * ```
 */
export interface FileLister {
  /**
   * Lists files matching glob patterns, sorted.
   * @returns File paths relative to the root
   */
  list(patterns: string[], options?: FileListOptions): Promise<string[]>;

  exists(filePath: string): Promise<boolean>;

  /**
   * Reads file content as UTF-8.
   * @throws FileListerError if the file doesn't exist or can't be read
   */
  read(filePath: string): Promise<string>;

  /**
   * Replaces file content.
   * @throws FileListerError if the file can't be written
   */
  write(filePath: string, content: string): Promise<void>;
}
