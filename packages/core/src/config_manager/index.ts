export { ConfigManager, formatSchemaError, DEFAULT_HEADER_INCLUDE, DEFAULT_HEADER_EXCLUDE } from './config_manager';
export { CONFIG_SCHEMA } from './config_schema';
export { ConfigValidationError } from './errors';
export type {
  IConfigManager,
  DcoGuardConfig,
  SignoffConfig,
  HeadersConfig,
  ResolvedSignoffSettings,
  ResolvedHeaderSettings,
} from './config_manager.types';
