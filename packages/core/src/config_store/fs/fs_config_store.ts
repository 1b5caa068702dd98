/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads `.dcoguard.yml` with js-yaml. Also provides the static project root
 * lookup used by the CLI.
 */

import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { ConfigStore } from '../config_store';
import { ConfigValidationError } from '../../config_manager/errors';
import { errorCode, errorMessage } from '../../utils/error_utils';

export const CONFIG_FILE_NAME = '.dcoguard.yml';

/**
 * Filesystem-based ConfigStore implementation.
 *
 * A missing file is not an error (defaults apply); an unreadable or
 * unparseable one is.
 *
 * @example
 * ```typescript
 * const store = FsConfigStore.forProject('/path/to/project');
 * const raw = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly source: string;

  constructor(configPath: string) {
    this.source = configPath;
  }

  static forProject(projectRootPath: string): FsConfigStore {
    return new FsConfigStore(path.join(projectRootPath, CONFIG_FILE_NAME));
  }

  /**
   * [EARS-CS1] Returns the parsed document for a valid file
   * [EARS-CS2] Returns null for a missing file
   * [EARS-CS3] Throws ConfigValidationError for invalid YAML
   */
  async loadConfig(): Promise<unknown | null> {
    let content: string;
    try {
      content = await fs.readFile(this.source, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new ConfigValidationError(this.source, [
        `cannot read file: ${errorMessage(error)}`,
      ]);
    }

    try {
      // An empty file parses to undefined: treat like a missing one
      return yaml.load(content) ?? null;
    } catch (error) {
      const reason = error instanceof yaml.YAMLException ? error.reason : errorMessage(error);
      throw new ConfigValidationError(this.source, [`invalid YAML: ${reason}`]);
    }
  }

  /**
   * Finds the project root by searching upwards for a .git entry.
   *
   * @returns The absolute project root, or null outside a repository
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);

    while (true) {
      if (existsSync(path.join(currentPath, '.git'))) {
        return currentPath;
      }
      const parent = path.dirname(currentPath);
      if (parent === currentPath) {
        return null;
      }
      currentPath = parent;
    }
  }
}
