/**
 * Common command option interfaces for the dcoguard CLI
 */

import type { BaseCommandOptions } from '../interfaces/command';

/**
 * Options shared by commands that read `.dcoguard.yml`
 */
export interface ConfigCommandOptions extends BaseCommandOptions {
  /** Explicit config file path (default: `.dcoguard.yml` at the repository root) */
  config?: string;
}
