import type { MatchPolicy } from '../signoff';
import type { HeaderPolicy } from '../headers';

/**
 * dcoguard Configuration Types
 *
 * Shape of `.dcoguard.yml` at the repository root. Every field is optional;
 * anything left out falls back to the module defaults.
 */

export interface SignoffConfig extends Partial<MatchPolicy> {
  /**
   * Pass (with a warning) when a pull request range holds no commits,
   * instead of failing (default: false)
   */
  allowEmptyRange?: boolean;
}

export interface HeadersConfig extends Partial<HeaderPolicy> {
  /** Glob patterns checked when the CLI receives no files */
  include?: string[];
  /** Glob patterns never checked */
  exclude?: string[];
}

export interface DcoGuardConfig {
  signoff?: SignoffConfig;
  headers?: HeadersConfig;
}

/**
 * Signoff settings after merging defaults, file and overrides.
 */
export interface ResolvedSignoffSettings {
  policy: MatchPolicy;
  allowEmptyRange: boolean;
}

/**
 * Header settings after merging defaults, file and overrides.
 */
export interface ResolvedHeaderSettings {
  policy: HeaderPolicy;
  include: string[];
  exclude: string[];
}

export interface IConfigManager {
  loadConfig(): Promise<DcoGuardConfig | null>;
  getSignoffSettings(overrides?: SignoffConfig): Promise<ResolvedSignoffSettings>;
  getHeaderSettings(overrides?: HeadersConfig): Promise<ResolvedHeaderSettings>;
}
