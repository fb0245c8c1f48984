import {
  DEFAULT_APP_NAME,
  DEFAULT_STATIC_ROOT,
  LEGACY_SETTINGS,
  log,
  readLegacySettings,
  resolveAppConfig,
} from "vitetags-shared";
import type {
  AppConfig,
  Diagnostic,
  SettingsEnv,
  TagAttributes,
  VitetagsSettings,
} from "vitetags-shared";
import { AppClient } from "./app-client.js";
import { DevServerProbe } from "./dev-probe.js";
import { AppConfigNotFoundError } from "./errors.js";
import { resolveManifestPath } from "./manifest.js";
import {
  createHttpFetcher,
  createHttpProbe,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_PROBE_TIMEOUT_MS,
} from "./transport.js";
import type { FetchTextFn, ProbeFn } from "./transport.js";
import { createStaticUrlResolver } from "./urls.js";
import type { StaticUrlResolver } from "./urls.js";

// ─── Settings layering ───────────────────────────────────────────────────────

export interface ResolvedApp {
  config: AppConfig;
  /** The setting a user edits to move this app's manifest */
  manifestPathSetting: string;
}

function structuredSetting(appName: string): string {
  return `apps["${appName}"].manifestPath`;
}

/**
 * Build the per-app configs, first source wins:
 * 1. `settings.apps`
 * 2. legacy VITETAGS_* keys in `env`, as a single "default" app
 * 3. a "default" app with every default
 *
 * Legacy keys next to `settings.apps` are ignored with a deprecation warning.
 */
export function resolveAppConfigs(
  settings: VitetagsSettings,
  env: SettingsEnv,
): Map<string, ResolvedApp> {
  const configs = new Map<string, ResolvedApp>();

  for (const [appName, input] of Object.entries(settings.apps ?? {})) {
    configs.set(appName, {
      config: resolveAppConfig(input, appName),
      manifestPathSetting: structuredSetting(appName),
    });
  }

  const legacyKeys = Object.keys(LEGACY_SETTINGS).filter((key) => env[key] !== undefined);
  if (legacyKeys.length > 0) {
    if (settings.apps !== undefined) {
      log.warn(
        `[deprecated] You're mixing the "apps" setting with these legacy settings: ` +
          `[${legacyKeys.join(", ")}]. They are ignored since "apps" is configured; ` +
          `please remove them.`,
      );
    } else {
      const legacy = readLegacySettings(env);
      log.warn(
        `[deprecated] The settings [${legacy.keys.join(", ")}] will be removed in a future ` +
          `release. Please move them to vitetags.config.ts as { apps: { default: { ... } } }.`,
      );
      configs.set(DEFAULT_APP_NAME, {
        config: resolveAppConfig(legacy.config, DEFAULT_APP_NAME),
        manifestPathSetting: "VITETAGS_MANIFEST_PATH",
      });
    }
  }

  if (configs.size === 0) {
    configs.set(DEFAULT_APP_NAME, {
      config: resolveAppConfig({}, DEFAULT_APP_NAME),
      manifestPathSetting: structuredSetting(DEFAULT_APP_NAME),
    });
  }
  return configs;
}

// ─── Registry ────────────────────────────────────────────────────────────────

export interface AssetRegistryOptions {
  settings?: VitetagsSettings;
  /** Source of the legacy flat settings (default: process.env) */
  env?: SettingsEnv;
  /** Dev server liveness check (default: HTTP GET expecting 404) */
  probe?: ProbeFn;
  /** Remote manifest download (default: HTTP GET) */
  fetchText?: FetchTextFn;
  /** Host URL rewriting; defaults to joining `settings.staticUrl` when set */
  resolveStaticUrl?: StaticUrlResolver;
  probeTimeoutMs?: number;
  fetchTimeoutMs?: number;
}

export interface GenerateOptions {
  /** Application name (default: 'default') */
  app?: string;
  /** Extra attributes, merged over the tag's defaults */
  attrs?: TagAttributes;
}

/**
 * Routes tag generation to the right app. Apps are built once, by the
 * first `initialize()` call, and kept for the life of the registry.
 *
 * @example
 * ```typescript
 * const registry = new AssetRegistry({ settings: await loadSettings() });
 * const head = await registry.generateAsset('src/main.ts');
 * ```
 */
export class AssetRegistry {
  private readonly apps = new Map<string, AppClient>();
  private initialization: Promise<void> | undefined;

  constructor(private readonly options: AssetRegistryOptions = {}) {}

  /**
   * Build every app client. Concurrent and repeated calls share the first
   * call's promise.
   */
  initialize(): Promise<void> {
    this.initialization ??= this.registerApps();
    return this.initialization;
  }

  private async registerApps(): Promise<void> {
    const settings = this.options.settings ?? {};
    const root = settings.root ?? process.cwd();
    const staticRoot = settings.staticRoot ?? DEFAULT_STATIC_ROOT;
    const probe = new DevServerProbe(
      this.options.probe ?? createHttpProbe(this.options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS),
    );
    const fetchText =
      this.options.fetchText ??
      createHttpFetcher(this.options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS);
    const resolveStaticUrl =
      this.options.resolveStaticUrl ??
      (settings.staticUrl ? createStaticUrlResolver(settings.staticUrl) : undefined);

    const configs = resolveAppConfigs(settings, this.options.env ?? process.env);
    const clients = await Promise.all(
      [...configs].map(([appName, { config, manifestPathSetting }]) =>
        AppClient.create(config, {
          appName,
          manifestPath: resolveManifestPath(config, root, staticRoot),
          manifestPathSetting,
          probe,
          fetchText,
          resolveStaticUrl,
        }),
      ),
    );
    for (const client of clients) {
      this.apps.set(client.appName, client);
    }
  }

  async appNames(): Promise<string[]> {
    await this.initialize();
    return [...this.apps.keys()];
  }

  async getApp(appName: string = DEFAULT_APP_NAME): Promise<AppClient> {
    await this.initialize();
    const client = this.apps.get(appName);
    if (!client) throw new AppConfigNotFoundError(appName, [...this.apps.keys()]);
    return client;
  }

  /**
   * Startup health check over every app's manifest. Never rejects: settings
   * errors become an error diagnostic of their own.
   */
  async check(): Promise<Diagnostic[]> {
    try {
      await this.initialize();
    } catch (error) {
      return [
        {
          code: "vitetags.E001",
          level: "error",
          appName: "*",
          message: error instanceof Error ? error.message : String(error),
          hint: "Fix the vitetags settings (vitetags.config.ts or VITETAGS_* variables).",
        },
      ];
    }
    const results = await Promise.all([...this.apps.values()].map((client) => client.check()));
    return results.flat();
  }

  async generateAsset(assetPath: string, options: GenerateOptions = {}): Promise<string> {
    return (await this.getApp(options.app)).generateAsset(assetPath, options.attrs);
  }

  async preloadAsset(assetPath: string, options: { app?: string } = {}): Promise<string> {
    return (await this.getApp(options.app)).preloadAsset(assetPath);
  }

  async generateAssetUrl(assetPath: string, options: { app?: string } = {}): Promise<string> {
    return (await this.getApp(options.app)).generateAssetUrl(assetPath);
  }

  async generateLegacyPolyfills(options: GenerateOptions = {}): Promise<string> {
    return (await this.getApp(options.app)).generateLegacyPolyfills(options.attrs);
  }

  async generateLegacyAsset(assetPath: string, options: GenerateOptions = {}): Promise<string> {
    return (await this.getApp(options.app)).generateLegacyAsset(assetPath, options.attrs);
  }

  async generateWsClient(options: GenerateOptions = {}): Promise<string> {
    return (await this.getApp(options.app)).generateWsClient(options.attrs);
  }

  async generateReactRefreshUrl(options: GenerateOptions = {}): Promise<string> {
    return (await this.getApp(options.app)).generateReactRefreshUrl(options.attrs);
  }
}
