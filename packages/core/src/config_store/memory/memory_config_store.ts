/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Holds an already parsed document, so ConfigManager can be tested without
 * touching the filesystem.
 */

import type { ConfigStore } from '../config_store';

/**
 * @example
 * ```typescript
 * const store = new MemoryConfigStore({ signoff: { caseInsensitiveEmail: false } });
 * const manager = new ConfigManager(store);
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  readonly source = 'memory';
  private config: unknown | null;

  constructor(config: unknown | null = null) {
    this.config = config;
  }

  async loadConfig(): Promise<unknown | null> {
    return this.config;
  }

  setConfig(config: unknown | null): void {
    this.config = config;
  }
}
