export { log } from './logger.js';
export { VitetagsError, InvalidConfigError } from './errors.js';
export {
  DEFAULT_APP_NAME,
  DEFAULT_STATIC_ROOT,
  DEFAULT_APP_CONFIG,
  LEGACY_SETTINGS,
  appConfigSchema,
  parseSettings,
  resolveAppConfig,
  readLegacySettings,
  findConfigFile,
  loadConfigFile,
  loadSettings,
} from './config-loader.js';
export type { LegacySettings } from './config-loader.js';
export { parseEnvFile, parseEnvLine, loadEnvFiles } from './env-loader.js';
export type { LoadEnvFilesOptions } from './env-loader.js';
export { defineConfig } from './types.js';
export type {
  DevServerProtocol,
  AppConfigInput,
  AppConfig,
  VitetagsSettings,
  SettingsEnv,
  TagAttributes,
  Diagnostic,
} from './types.js';
