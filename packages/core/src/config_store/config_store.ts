/**
 * ConfigStore Interface
 *
 * Abstraction for reading the project configuration document. Stores only
 * load and parse; schema validation and defaults live in ConfigManager.
 *
 * Implementations:
 * - FsConfigStore: `.dcoguard.yml` on disk
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /** Where the document comes from, for diagnostics */
  readonly source: string;

  /**
   * Load the parsed configuration document
   *
   * @returns The parsed document, or null when there is none
   * @throws ConfigValidationError when the document exists but cannot be parsed
   */
  loadConfig(): Promise<unknown | null>;
}
