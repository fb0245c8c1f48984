/**
 * Scheme the Vite dev server answers on
 */
export type DevServerProtocol = 'http' | 'https';

/**
 * Per-application settings as written by the user. Every field is optional.
 */
export type AppConfigInput = {
  /** Serve assets from the Vite dev server when it is reachable (default: false) */
  devMode?: boolean;
  /** Dev server protocol (default: 'http') */
  devServerProtocol?: DevServerProtocol;
  /** Dev server hostname (default: 'localhost') */
  devServerHost?: string;
  /** Dev server port (default: 5173) */
  devServerPort?: number;
  /** Prefix joined in front of every asset path (default: '') */
  staticUrlPrefix?: string;
  /**
   * Local path or http(s) URL of the Vite manifest.
   * Defaults to `{root}/{staticRoot}/{staticUrlPrefix}/manifest.json`.
   */
  manifestPath?: string;
  /** Substring identifying the @vitejs/plugin-legacy polyfills chunk (default: 'legacy-polyfills') */
  legacyPolyfillsMotif?: string;
  /** Dev server path of the HMR client (default: '@vite/client') */
  wsClientUrl?: string;
  /** Dev server path of the React refresh runtime (default: '@react-refresh') */
  reactRefreshUrl?: string;
};

/**
 * Fully resolved, immutable settings of one application.
 */
export type AppConfig = Readonly<
  Required<Omit<AppConfigInput, 'manifestPath'>> & { manifestPath?: string }
>;

/**
 * Top-level settings, usually the default export of vitetags.config.ts
 */
export type VitetagsSettings = {
  /** Applications keyed by name. The one named 'default' is used when callers name none. */
  apps?: Record<string, AppConfigInput>;
  /** Project root used to resolve relative paths (default: process.cwd()) */
  root?: string;
  /** Directory the static build is collected into, relative to root (default: 'dist') */
  staticRoot?: string;
  /** Public URL the static directory is served from, e.g. '/static/' */
  staticUrl?: string;
};

/**
 * Environment-style key/value source for the legacy flat settings.
 */
export type SettingsEnv = Record<string, string | undefined>;

/**
 * HTML attributes for a generated tag. `true` renders a bare attribute,
 * `false` drops it.
 */
export type TagAttributes = Record<string, string | boolean>;

/**
 * A non-fatal problem reported by the startup health check
 */
export interface Diagnostic {
  /** Stable identifier, e.g. 'vitetags.W001' */
  code: string;
  level: 'warn' | 'error';
  appName: string;
  message: string;
  hint: string;
}

/**
 * Helper to define settings with type safety
 */
export function defineConfig(settings: VitetagsSettings): VitetagsSettings {
  return settings;
}
