import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import type { AppConfig, AppConfigInput, SettingsEnv, VitetagsSettings } from './types.js';
import { InvalidConfigError } from './errors.js';
import { log } from './logger.js';

/**
 * Configuration file names in order of priority
 */
const CONFIG_FILES = [
  'vitetags.config.ts',
  'vitetags.config.js',
  'vitetags.config.mjs',
  'vitetags.config.cjs',
] as const;

export const DEFAULT_APP_NAME = 'default';

export const DEFAULT_STATIC_ROOT = 'dist';

/**
 * Default values of every application setting
 */
export const DEFAULT_APP_CONFIG: Omit<AppConfig, 'manifestPath'> = {
  devMode: false,
  devServerProtocol: 'http',
  devServerHost: 'localhost',
  devServerPort: 5173,
  staticUrlPrefix: '',
  legacyPolyfillsMotif: 'legacy-polyfills',
  wsClientUrl: '@vite/client',
  reactRefreshUrl: '@react-refresh',
};

// ─── Schemas ─────────────────────────────────────────────────────────────────

export const appConfigSchema = z
  .object({
    devMode: z.boolean().optional(),
    devServerProtocol: z.enum(['http', 'https']).optional(),
    devServerHost: z.string().min(1).optional(),
    devServerPort: z.number().int().min(1).max(65535).optional(),
    staticUrlPrefix: z.string().optional(),
    // An empty path (e.g. `VITETAGS_MANIFEST_PATH=` in a .env file) means unset
    manifestPath: z.preprocess(
      (value) => (value === '' ? undefined : value),
      z.string().min(1).optional(),
    ),
    legacyPolyfillsMotif: z.string().min(1).optional(),
    wsClientUrl: z.string().min(1).optional(),
    reactRefreshUrl: z.string().min(1).optional(),
  })
  .strict();

const settingsSchema = z
  .object({
    apps: z.record(z.string(), appConfigSchema).optional(),
    root: z.string().optional(),
    staticRoot: z.string().optional(),
    staticUrl: z.string().optional(),
  })
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate a settings object from any source
 */
export function parseSettings(raw: unknown, source = 'settings'): VitetagsSettings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(source, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate one application's settings and fill in defaults
 */
export function resolveAppConfig(input: AppConfigInput, appName: string = DEFAULT_APP_NAME): AppConfig {
  const result = appConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigError(`apps["${appName}"]`, formatIssues(result.error));
  }
  const data = result.data;
  return Object.freeze({
    devMode: data.devMode ?? DEFAULT_APP_CONFIG.devMode,
    devServerProtocol: data.devServerProtocol ?? DEFAULT_APP_CONFIG.devServerProtocol,
    devServerHost: data.devServerHost ?? DEFAULT_APP_CONFIG.devServerHost,
    devServerPort: data.devServerPort ?? DEFAULT_APP_CONFIG.devServerPort,
    staticUrlPrefix: data.staticUrlPrefix ?? DEFAULT_APP_CONFIG.staticUrlPrefix,
    manifestPath: data.manifestPath,
    legacyPolyfillsMotif: data.legacyPolyfillsMotif ?? DEFAULT_APP_CONFIG.legacyPolyfillsMotif,
    wsClientUrl: data.wsClientUrl ?? DEFAULT_APP_CONFIG.wsClientUrl,
    reactRefreshUrl: data.reactRefreshUrl ?? DEFAULT_APP_CONFIG.reactRefreshUrl,
  });
}

// ─── Legacy flat settings ────────────────────────────────────────────────────

/**
 * Deprecated single-application environment keys and the field each one maps to.
 * VITETAGS_ASSETS_PATH is retired: it is still recognized, but maps to nothing.
 */
export const LEGACY_SETTINGS: Readonly<Record<string, keyof AppConfigInput | null>> = {
  VITETAGS_DEV_MODE: 'devMode',
  VITETAGS_DEV_SERVER_PROTOCOL: 'devServerProtocol',
  VITETAGS_DEV_SERVER_HOST: 'devServerHost',
  VITETAGS_DEV_SERVER_PORT: 'devServerPort',
  VITETAGS_STATIC_URL_PREFIX: 'staticUrlPrefix',
  VITETAGS_MANIFEST_PATH: 'manifestPath',
  VITETAGS_LEGACY_POLYFILLS_MOTIF: 'legacyPolyfillsMotif',
  VITETAGS_WS_CLIENT_URL: 'wsClientUrl',
  VITETAGS_REACT_REFRESH_URL: 'reactRefreshUrl',
  VITETAGS_ASSETS_PATH: null,
};

const TRUTHY = new Set(['true', '1', 'yes', 'on']);
const FALSY = new Set(['false', '0', 'no', 'off', '']);

function coerceLegacyValue(key: string, field: keyof AppConfigInput, raw: string): unknown {
  if (field === 'devMode') {
    const normalized = raw.trim().toLowerCase();
    if (TRUTHY.has(normalized)) return true;
    if (FALSY.has(normalized)) return false;
    throw new InvalidConfigError(key, [`expected a boolean, got "${raw}"`]);
  }
  if (field === 'devServerPort') {
    const port = Number(raw.trim());
    if (!Number.isInteger(port)) {
      throw new InvalidConfigError(key, [`expected an integer port, got "${raw}"`]);
    }
    return port;
  }
  return raw;
}

export interface LegacySettings {
  /** Legacy keys present in the source, in declaration order */
  keys: string[];
  /** Application settings mapped one-to-one from those keys */
  config: AppConfigInput;
}

/**
 * Collect the deprecated flat keys present in `env`.
 */
export function readLegacySettings(env: SettingsEnv): LegacySettings {
  const keys: string[] = [];
  const config: Record<string, unknown> = {};

  for (const [key, field] of Object.entries(LEGACY_SETTINGS)) {
    const raw = env[key];
    if (raw === undefined) continue;
    keys.push(key);
    if (field) config[field] = coerceLegacyValue(key, field, raw);
  }

  const result = appConfigSchema.safeParse(config);
  if (!result.success) {
    throw new InvalidConfigError('legacy VITETAGS_* settings', formatIssues(result.error));
  }
  return { keys, config: result.data };
}

// ─── Config file ─────────────────────────────────────────────────────────────

/**
 * Find the configuration file in the project directory
 */
export function findConfigFile(root: string = process.cwd()): string | null {
  for (const fileName of CONFIG_FILES) {
    const filePath = join(root, fileName);
    if (existsSync(filePath)) {
      return filePath;
    }
  }
  return null;
}

/**
 * Load and validate a configuration file
 */
export async function loadConfigFile(configPath: string): Promise<VitetagsSettings> {
  try {
    const fileUrl = pathToFileURL(configPath).href;
    const configModule: { default?: unknown } = await import(fileUrl);

    let config: unknown = configModule.default ?? configModule;

    // A config may export a (possibly async) factory
    if (typeof config === 'function') {
      config = await config();
    }

    return parseSettings(config, configPath);
  } catch (error) {
    log.error(`Failed to load config from ${configPath}: ${error}`);
    throw error;
  }
}

/**
 * Load vitetags settings from the project
 *
 * @example
 * ```typescript
 * const settings = await loadSettings();
 * const settings = await loadSettings({ root: '/path/to/project' });
 * ```
 */
export async function loadSettings(options: {
  root?: string;
  configFile?: string;
  /** Suppress config loading log messages (default: true). */
  silent?: boolean;
} = {}): Promise<VitetagsSettings> {
  const root = resolve(options.root || process.cwd());
  const silent = options.silent ?? true;

  const configPath = options.configFile ? resolve(root, options.configFile) : findConfigFile(root);

  let settings: VitetagsSettings = {};

  if (configPath) {
    if (!silent) log.info(`Loading config from ${configPath}`);
    settings = await loadConfigFile(configPath);
  } else {
    if (!silent) log.info('No config file found, using defaults');
  }

  return { ...settings, root: settings.root ? resolve(root, settings.root) : root };
}
