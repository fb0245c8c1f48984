import type { AppConfig, Diagnostic, TagAttributes } from "vitetags-shared";
import { AssetNotFoundError, ManifestCycleError } from "./errors.js";
import { DevServerProbe, devServerOrigin } from "./dev-probe.js";
import { ManifestResolver } from "./manifest.js";
import type { ManifestEntry } from "./manifest.js";
import {
  mergeAttributes,
  preload,
  reactRefreshPreamble,
  script,
  stylesheet,
  stylesheetPreload,
} from "./tags.js";
import type { Tag } from "./tags.js";
import type { FetchTextFn } from "./transport.js";
import { joinUrlPath } from "./urls.js";
import type { StaticUrlResolver } from "./urls.js";

const DEV_SCRIPT_ATTRS: TagAttributes = { type: "module" };

const MODULE_SCRIPT_ATTRS: TagAttributes = { type: "module", crossorigin: true };

const LEGACY_SCRIPT_ATTRS: TagAttributes = { nomodule: true, crossorigin: true };

const MODULE_PRELOAD_ATTRS: TagAttributes = {
  rel: "modulepreload",
  as: "script",
  crossorigin: "anonymous",
};

export interface AppClientOptions {
  appName: string;
  manifestPath: string;
  probe: DevServerProbe;
  fetchText: FetchTextFn;
  /** Setting named in manifest hints */
  manifestPathSetting?: string;
  /** Host capability rewriting prefixed asset paths to public URLs */
  resolveStaticUrl?: StaticUrlResolver;
}

/**
 * Generates tags and URLs for one Vite app. Each call asks the probe
 * whether the dev server is live and picks the dev server or the manifest
 * accordingly.
 */
export class AppClient {
  readonly appName: string;
  readonly manifest: ManifestResolver;
  private readonly probe: DevServerProbe;
  private readonly resolveStaticUrl?: StaticUrlResolver;

  constructor(
    readonly config: AppConfig,
    options: AppClientOptions,
  ) {
    this.appName = options.appName;
    this.probe = options.probe;
    this.resolveStaticUrl = options.resolveStaticUrl;
    this.manifest = new ManifestResolver(config, {
      appName: options.appName,
      manifestPath: options.manifestPath,
      fetchText: options.fetchText,
      manifestPathSetting: options.manifestPathSetting,
    });
  }

  /**
   * Build a client and load its manifest, unless the dev server is live
   * right now.
   */
  static async create(config: AppConfig, options: AppClientOptions): Promise<AppClient> {
    const client = new AppClient(config, options);
    await client.manifest.load(await client.isServing());
    return client;
  }

  isServing(): Promise<boolean> {
    return this.probe.isServing(this.config);
  }

  check(): Promise<Diagnostic[]> {
    return this.manifest.check();
  }

  // ─── URLs ──────────────────────────────────────────────────────────────────

  /** URL of `assetPath` on the Vite dev server. */
  devServerUrl(assetPath: string): string {
    return new URL(joinUrlPath(this.config.staticUrlPrefix, assetPath), devServerOrigin(this.config))
      .href;
  }

  /** URL of a built file, after the host's static URL rewriting. */
  productionUrl(file: string): string {
    const prefixed = joinUrlPath(this.config.staticUrlPrefix, file);
    return this.resolveStaticUrl ? this.resolveStaticUrl(prefixed) : prefixed;
  }

  // ─── Tags ──────────────────────────────────────────────────────────────────

  /**
   * Script tag for a JS/TS entry. In production this also emits stylesheet
   * links for its CSS (transitively through imports) and modulepreload
   * links for its direct imports.
   */
  async generateAsset(assetPath: string, attrs: TagAttributes = {}): Promise<string> {
    if (await this.isServing()) {
      return script(this.devServerUrl(assetPath), mergeAttributes(DEV_SCRIPT_ATTRS, attrs));
    }

    const entry = this.manifest.get(assetPath);
    const tags: Tag[] = this.cssTagsOf(assetPath, stylesheet);
    tags.push(
      script(this.productionUrl(entry.file), mergeAttributes(MODULE_SCRIPT_ATTRS, attrs)),
    );
    tags.push(...this.importPreloadsOf(entry));
    return tags.join("\n");
  }

  /**
   * Preload links for an entry, its CSS and its direct imports. Empty while
   * the dev server is live, since nothing is built yet.
   */
  async preloadAsset(assetPath: string): Promise<string> {
    if (await this.isServing()) return "";

    const entry = this.manifest.get(assetPath);
    const tags: Tag[] = [preload(this.productionUrl(entry.file), MODULE_PRELOAD_ATTRS)];
    tags.push(...this.cssTagsOf(assetPath, stylesheetPreload));
    tags.push(...this.importPreloadsOf(entry));
    return tags.join("\n");
  }

  /** URL of one asset, without any of its dependencies. */
  async generateAssetUrl(assetPath: string): Promise<string> {
    if (await this.isServing()) return this.devServerUrl(assetPath);
    return this.productionUrl(this.manifest.get(assetPath).file);
  }

  /**
   * Script tag for the @vitejs/plugin-legacy polyfills. Place it at the end
   * of <body>, before any legacy asset.
   */
  async generateLegacyPolyfills(attrs: TagAttributes = {}): Promise<string> {
    if (await this.isServing()) return "";

    const entry = this.manifest.legacyPolyfillsEntry;
    if (!entry) {
      const state = this.manifest.state;
      throw new AssetNotFoundError(
        this.config.legacyPolyfillsMotif,
        this.appName,
        this.manifest.manifestPath,
        {
          message:
            `Vite legacy polyfills (motif "${this.config.legacyPolyfillsMotif}") not found ` +
            `for app "${this.appName}" in manifest at ${this.manifest.manifestPath}`,
          cause: state.status === "failed" ? state.error : undefined,
        },
      );
    }
    return script(this.productionUrl(entry.file), mergeAttributes(LEGACY_SCRIPT_ATTRS, attrs));
  }

  /** nomodule script tag for a `-legacy` chunk. Empty in dev. */
  async generateLegacyAsset(assetPath: string, attrs: TagAttributes = {}): Promise<string> {
    if (await this.isServing()) return "";
    const entry = this.manifest.get(assetPath);
    return script(this.productionUrl(entry.file), mergeAttributes(LEGACY_SCRIPT_ATTRS, attrs));
  }

  /** Vite HMR client script. Empty in production. */
  async generateWsClient(attrs: TagAttributes = {}): Promise<string> {
    if (!(await this.isServing())) return "";
    return script(
      this.devServerUrl(this.config.wsClientUrl),
      mergeAttributes(DEV_SCRIPT_ATTRS, attrs),
    );
  }

  /** React refresh preamble for @vitejs/plugin-react. Empty in production. */
  async generateReactRefreshUrl(attrs: TagAttributes = {}): Promise<string> {
    if (!(await this.isServing())) return "";
    return reactRefreshPreamble(
      this.devServerUrl(this.config.reactRefreshUrl),
      mergeAttributes(DEV_SCRIPT_ATTRS, attrs),
    );
  }

  // ─── Dependency walk ───────────────────────────────────────────────────────

  private importPreloadsOf(entry: ManifestEntry): Tag[] {
    return entry.imports.map((dep) =>
      preload(this.productionUrl(this.manifest.get(dep).file), MODULE_PRELOAD_ATTRS),
    );
  }

  /**
   * CSS tags for `assetPath` and everything it imports, depth-first in
   * import order, each stylesheet once at its first encounter.
   */
  private cssTagsOf(assetPath: string, render: (url: string) => Tag): Tag[] {
    return this.collectCss(assetPath, render, new Set<string>(), []);
  }

  private collectCss(
    assetPath: string,
    render: (url: string) => Tag,
    seen: Set<string>,
    visiting: string[],
  ): Tag[] {
    const loopStart = visiting.indexOf(assetPath);
    if (loopStart !== -1) {
      throw new ManifestCycleError(this.appName, this.manifest.manifestPath, [
        ...visiting.slice(loopStart),
        assetPath,
      ]);
    }

    const entry = this.manifest.get(assetPath);
    const tags: Tag[] = [];

    visiting.push(assetPath);
    for (const dep of entry.imports) {
      tags.push(...this.collectCss(dep, render, seen, visiting));
    }
    visiting.pop();

    for (const cssPath of entry.css) {
      if (seen.has(cssPath)) continue;
      seen.add(cssPath);
      tags.push(render(this.productionUrl(cssPath)));
    }
    return tags;
  }
}
