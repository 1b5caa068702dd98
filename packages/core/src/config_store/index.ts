/**
 * ConfigStore - Configuration persistence abstraction
 *
 * @example
 * ```typescript
 * import { Config } from '@dcoguard/core';
 *
 * const store = Config.FsConfigStore.forProject(repoRoot);
 * const manager = new Config.ConfigManager(store);
 * ```
 */

export type { ConfigStore } from './config_store';
export { FsConfigStore, CONFIG_FILE_NAME } from './fs/fs_config_store';
export { MemoryConfigStore } from './memory/memory_config_store';
