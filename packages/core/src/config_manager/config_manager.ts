/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to `.dcoguard.yml`. Loading goes through the
 * ConfigStore abstraction; this class validates the document against
 * CONFIG_SCHEMA and resolves settings with precedence
 * defaults < file < overrides (CLI flags).
 */

import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { ConfigStore } from '../config_store/config_store';
import { resolveMatchPolicy } from '../signoff/match_policy';
import { resolveHeaderPolicy } from '../headers/header_template';
import { CONFIG_SCHEMA } from './config_schema';
import { ConfigValidationError } from './errors';
import type {
  IConfigManager,
  DcoGuardConfig,
  SignoffConfig,
  HeadersConfig,
  ResolvedSignoffSettings,
  ResolvedHeaderSettings,
} from './config_manager.types';

export const DEFAULT_HEADER_INCLUDE: readonly string[] = Object.freeze(['**/*']);
export const DEFAULT_HEADER_EXCLUDE: readonly string[] = Object.freeze(['node_modules/**', '.git/**', 'dist/**']);

let configValidator: ValidateFunction<DcoGuardConfig> | null = null;

function getConfigValidator(): ValidateFunction<DcoGuardConfig> {
  if (!configValidator) {
    const ajv = new Ajv({ allErrors: true });
    configValidator = ajv.compile<DcoGuardConfig>(CONFIG_SCHEMA);
  }
  return configValidator;
}

/**
 * Turns an Ajv error into a one-line issue such as
 * `/signoff/caseInsensitiveEmail: must be boolean`.
 */
export function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath || '(root)';
  if (error.keyword === 'additionalProperties') {
    return `${location}: unknown property "${String(error.params['additionalProperty'])}"`;
  }
  return `${location}: ${error.message ?? 'invalid value'}`;
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * const manager = new ConfigManager(FsConfigStore.forProject(repoRoot));
 * const { policy } = await manager.getSignoffSettings({ caseInsensitiveEmail: false });
 *
 * // Test usage
 * const manager = new ConfigManager(new MemoryConfigStore({ headers: { licenseId: 'MIT' } }));
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load and validate the configuration document
   *
   * @returns The validated config, or null when there is no file
   * @throws ConfigValidationError when the document violates the schema
   */
  async loadConfig(): Promise<DcoGuardConfig | null> {
    const raw = await this.configStore.loadConfig();
    if (raw === null) {
      return null;
    }

    const validate = getConfigValidator();
    if (!validate(raw)) {
      const issues = (validate.errors ?? []).map(formatSchemaError);
      throw new ConfigValidationError(this.configStore.source, issues);
    }
    return raw;
  }

  /**
   * Match policy and empty-range handling for the signoff command.
   * Override fields left undefined do not mask the file's values.
   */
  async getSignoffSettings(overrides: SignoffConfig = {}): Promise<ResolvedSignoffSettings> {
    const file = (await this.loadConfig())?.signoff ?? {};

    return {
      policy: resolveMatchPolicy({
        caseInsensitiveEmail: overrides.caseInsensitiveEmail ?? file.caseInsensitiveEmail,
        allowMergeCommitsWithoutSignoff:
          overrides.allowMergeCommitsWithoutSignoff ?? file.allowMergeCommitsWithoutSignoff,
        requireExactAuthorMatch: overrides.requireExactAuthorMatch ?? file.requireExactAuthorMatch,
        acceptCoAuthorSignoffs: overrides.acceptCoAuthorSignoffs ?? file.acceptCoAuthorSignoffs,
      }),
      allowEmptyRange: overrides.allowEmptyRange ?? file.allowEmptyRange ?? false,
    };
  }

  /**
   * Header policy and file selection for the headers command.
   * Comment prefixes are merged key by key over the defaults.
   */
  async getHeaderSettings(overrides: HeadersConfig = {}): Promise<ResolvedHeaderSettings> {
    const file = (await this.loadConfig())?.headers ?? {};

    const copyrightNotice = overrides.copyrightNotice ?? file.copyrightNotice;
    const policy = resolveHeaderPolicy({
      licenseId: overrides.licenseId ?? file.licenseId,
      searchLines: overrides.searchLines ?? file.searchLines,
      commentPrefixes: { ...file.commentPrefixes, ...overrides.commentPrefixes },
      ...(copyrightNotice !== undefined ? { copyrightNotice } : {}),
    });

    return {
      policy,
      include: [...(overrides.include ?? file.include ?? DEFAULT_HEADER_INCLUDE)],
      exclude: [...(overrides.exclude ?? file.exclude ?? DEFAULT_HEADER_EXCLUDE)],
    };
  }
}
