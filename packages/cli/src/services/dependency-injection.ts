import * as path from 'path';
import { Config, ConfigStore, FileLister, Git, Headers } from '@dcoguard/core';

/**
 * Dependency Injection Service for the dcoguard CLI
 *
 * Creates and caches the core modules the commands need, wired to the
 * local repository.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private projectRoot: string | null = null;
  private gitModule: Git.GitModule | null = null;
  private headerModule: Headers.HeaderModule | null = null;
  private configManagers = new Map<string, Config.ConfigManager>();

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Repository root (nearest directory with .git), or the working
   * directory when run outside a repository
   */
  async getProjectRoot(): Promise<string> {
    if (!this.projectRoot) {
      this.projectRoot = ConfigStore.FsConfigStore.findProjectRoot() ?? process.cwd();
    }
    return this.projectRoot;
  }

  /**
   * Creates and returns GitModule
   */
  async getGitModule(): Promise<Git.GitModule> {
    if (this.gitModule) {
      return this.gitModule;
    }

    const projectRoot = await this.getProjectRoot();
    this.gitModule = new Git.GitModule({
      repoRoot: projectRoot,
      execCommand: Git.createExecCommand(projectRoot)
    });
    return this.gitModule;
  }

  /**
   * Returns the ConfigManager for an explicit config path, or for
   * `.dcoguard.yml` at the project root
   */
  async getConfigManager(configPath?: string): Promise<Config.ConfigManager> {
    const store = configPath
      ? new ConfigStore.FsConfigStore(path.resolve(configPath))
      : ConfigStore.FsConfigStore.forProject(await this.getProjectRoot());

    const cached = this.configManagers.get(store.source);
    if (cached) {
      return cached;
    }

    const configManager = new Config.ConfigManager(store);
    this.configManagers.set(store.source, configManager);
    return configManager;
  }

  /**
   * Creates and returns HeaderModule. File paths are taken relative to the
   * working directory, the way pre-commit passes them.
   */
  async getHeaderModule(): Promise<Headers.HeaderModule> {
    if (this.headerModule) {
      return this.headerModule;
    }

    this.headerModule = new Headers.HeaderModule({
      fileLister: new FileLister.FsFileLister({ cwd: process.cwd() })
    });
    return this.headerModule;
  }

  /**
   * Drops the singleton (tests)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }
}
