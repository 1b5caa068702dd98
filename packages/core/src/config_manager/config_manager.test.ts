import { ConfigManager, DEFAULT_HEADER_EXCLUDE } from './index';
import { ConfigValidationError } from './errors';
import { MemoryConfigStore } from '../config_store/memory/memory_config_store';
import { DEFAULT_MATCH_POLICY } from '../signoff/match_policy';
import { DEFAULT_COMMENT_PREFIXES } from '../headers/header_template';

describe('ConfigManager', () => {
  let store: MemoryConfigStore;
  let configManager: ConfigManager;

  beforeEach(() => {
    store = new MemoryConfigStore();
    configManager = new ConfigManager(store);
  });

  describe('loadConfig', () => {
    it('[EARS-C1] WHEN the store holds a valid document, THE SYSTEM SHALL return it', async () => {
      store.setConfig({ signoff: { caseInsensitiveEmail: false }, headers: { searchLines: 3 } });

      expect(await configManager.loadConfig()).toEqual({
        signoff: { caseInsensitiveEmail: false },
        headers: { searchLines: 3 },
      });
    });

    it('[EARS-C2] WHEN the store has no document, THE SYSTEM SHALL return null', async () => {
      expect(await configManager.loadConfig()).toBeNull();
    });

    it('[EARS-C3] WHEN a field has the wrong type, THE SYSTEM SHALL throw ConfigValidationError naming the field', async () => {
      store.setConfig({ signoff: { caseInsensitiveEmail: 'yes' } });

      await expect(configManager.loadConfig()).rejects.toThrow(
        'Invalid configuration in memory: /signoff/caseInsensitiveEmail: must be boolean'
      );
    });

    it('[EARS-C4] WHEN the document has an unknown key, THE SYSTEM SHALL report it as unknown property', async () => {
      store.setConfig({ signof: {} });

      const error = await configManager.loadConfig().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toEqual(['(root): unknown property "signof"']);
      }
    });

    it('[EARS-C5] WHEN the document is not an object, THE SYSTEM SHALL reject it', async () => {
      store.setConfig('just a string');

      await expect(configManager.loadConfig()).rejects.toThrow(
        'Invalid configuration in memory: (root): must be object'
      );
    });

    it('[EARS-C6] WHEN several fields are invalid, THE SYSTEM SHALL list every issue', async () => {
      store.setConfig({ headers: { searchLines: 0, licenseId: 'not a license!' } });

      const error = await configManager.loadConfig().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues).toContain('/headers/searchLines: must be >= 1');
      }
    });
  });

  describe('getSignoffSettings', () => {
    it('[EARS-C7] WHEN there is no file and no override, THE SYSTEM SHALL return the defaults', async () => {
      expect(await configManager.getSignoffSettings()).toEqual({
        policy: { ...DEFAULT_MATCH_POLICY },
        allowEmptyRange: false,
      });
    });

    it('[EARS-C8] WHEN file and overrides both set a field, THE SYSTEM SHALL prefer the override', async () => {
      store.setConfig({
        signoff: { caseInsensitiveEmail: false, requireExactAuthorMatch: false, allowEmptyRange: true },
      });

      const settings = await configManager.getSignoffSettings({ caseInsensitiveEmail: true });

      expect(settings).toEqual({
        policy: {
          caseInsensitiveEmail: true,
          allowMergeCommitsWithoutSignoff: true,
          requireExactAuthorMatch: false,
          acceptCoAuthorSignoffs: false,
        },
        allowEmptyRange: true,
      });
    });

    it('[EARS-C9] WHEN an override field is undefined, THE SYSTEM SHALL keep the file value', async () => {
      store.setConfig({ signoff: { acceptCoAuthorSignoffs: true } });

      const settings = await configManager.getSignoffSettings({ acceptCoAuthorSignoffs: undefined });

      expect(settings.policy.acceptCoAuthorSignoffs).toBe(true);
    });
  });

  describe('getHeaderSettings', () => {
    it('[EARS-C10] WHEN there is no file and no override, THE SYSTEM SHALL return the defaults', async () => {
      const settings = await configManager.getHeaderSettings();

      expect(settings).toEqual({
        policy: { licenseId: 'Apache-2.0', searchLines: 5, commentPrefixes: { ...DEFAULT_COMMENT_PREFIXES } },
        include: ['**/*'],
        exclude: [...DEFAULT_HEADER_EXCLUDE],
      });
    });

    it('[EARS-C11] WHEN file and overrides are combined, THE SYSTEM SHALL apply defaults < file < overrides', async () => {
      store.setConfig({
        headers: {
          licenseId: 'MIT',
          copyrightNotice: '(C) 2025, Example contributors.',
          commentPrefixes: { '.sql': '--' },
          include: ['src/**/*.ts'],
        },
      });

      const settings = await configManager.getHeaderSettings({
        licenseId: 'BSD-3-Clause',
        commentPrefixes: { '.lua': '--' },
      });

      expect(settings.policy.licenseId).toBe('BSD-3-Clause');
      expect(settings.policy.copyrightNotice).toBe('(C) 2025, Example contributors.');
      expect(settings.policy.commentPrefixes['.sql']).toBe('--');
      expect(settings.policy.commentPrefixes['.lua']).toBe('--');
      expect(settings.policy.commentPrefixes['.py']).toBe('#');
      expect(settings.include).toEqual(['src/**/*.ts']);
      expect(settings.exclude).toEqual(['node_modules/**', '.git/**', 'dist/**']);
    });

    it('[EARS-C12] WHEN no copyright notice is configured, THE SYSTEM SHALL leave it out of the policy', async () => {
      const settings = await configManager.getHeaderSettings({ copyrightNotice: undefined });

      expect(settings.policy).not.toHaveProperty('copyrightNotice');
    });
  });
});
