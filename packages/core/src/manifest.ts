import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { log } from "vitetags-shared";
import type { AppConfig, Diagnostic } from "vitetags-shared";
import { AssetNotFoundError, ManifestParseError } from "./errors.js";
import type { FetchTextFn } from "./transport.js";
import { isRemoteUrl } from "./urls.js";

// ─── Entry model ─────────────────────────────────────────────────────────────

/**
 * One chunk of a Vite `manifest.json`. Fields Vite adds beyond these
 * (`name`, `assets`, `isLegacy`, ...) are stripped on purpose: nothing here
 * reads them, and newer Vite releases keep adding more.
 */
export const manifestEntrySchema = z.object({
  file: z.string(),
  src: z.string().optional(),
  isEntry: z.boolean().default(false),
  isDynamicEntry: z.boolean().default(false),
  css: z.array(z.string()).default([]),
  imports: z.array(z.string()).default([]),
  dynamicImports: z.array(z.string()).default([]),
});

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

const manifestSchema = z.record(z.string(), manifestEntrySchema);

export interface ParsedManifest {
  entries: ReadonlyMap<string, ManifestEntry>;
  /** Last entry whose key contains the legacy polyfills motif */
  legacyPolyfillsEntry?: ManifestEntry;
}

/**
 * Decode manifest text. Throws the raw JSON or schema error; callers wrap it.
 */
export function parseManifest(content: string, legacyPolyfillsMotif: string): ParsedManifest {
  const data = manifestSchema.parse(JSON.parse(content));
  const entries = new Map<string, ManifestEntry>();
  let legacyPolyfillsEntry: ManifestEntry | undefined;

  for (const [key, entry] of Object.entries(data)) {
    entries.set(key, entry);
    if (key.includes(legacyPolyfillsMotif)) legacyPolyfillsEntry = entry;
  }

  return { entries, legacyPolyfillsEntry };
}

/**
 * Where an app's manifest lives: the configured path (relative to root) or
 * URL, else `{root}/{staticRoot}/{staticUrlPrefix}/manifest.json`.
 */
export function resolveManifestPath(
  config: AppConfig,
  root: string,
  staticRoot: string,
): string {
  if (config.manifestPath) {
    return isRemoteUrl(config.manifestPath)
      ? config.manifestPath
      : path.resolve(root, config.manifestPath);
  }
  return path.resolve(root, staticRoot, config.staticUrlPrefix, "manifest.json");
}

// ─── Resolver ────────────────────────────────────────────────────────────────

export type ManifestState =
  | { status: "pending" }
  /** The dev server was live at load time; the manifest is never needed. */
  | { status: "skipped" }
  | { status: "loaded"; manifest: ParsedManifest }
  | { status: "failed"; error: ManifestParseError };

export interface ManifestResolverOptions {
  appName: string;
  manifestPath: string;
  fetchText: FetchTextFn;
  /** Setting named in hints (default: `apps["<appName>"].manifestPath`) */
  manifestPathSetting?: string;
}

/**
 * Lookup table over one app's manifest. Loaded once; a load failure is kept
 * in `state` rather than thrown, so that a missing manifest never stops the
 * process from starting. `check()` and `get()` report it instead.
 */
export class ManifestResolver {
  readonly appName: string;
  readonly manifestPath: string;
  readonly manifestPathSetting: string;
  private readonly fetchText: FetchTextFn;
  private current: ManifestState = { status: "pending" };

  constructor(
    private readonly config: AppConfig,
    options: ManifestResolverOptions,
  ) {
    this.appName = options.appName;
    this.manifestPath = options.manifestPath;
    this.manifestPathSetting =
      options.manifestPathSetting ?? `apps["${options.appName}"].manifestPath`;
    this.fetchText = options.fetchText;
  }

  get state(): ManifestState {
    return this.current;
  }

  async load(devServing: boolean): Promise<void> {
    if (devServing) {
      this.current = { status: "skipped" };
      return;
    }
    try {
      this.current = { status: "loaded", manifest: await this.read() };
    } catch (error) {
      if (!(error instanceof ManifestParseError)) throw error;
      this.current = { status: "failed", error };
    }
  }

  get legacyPolyfillsEntry(): ManifestEntry | undefined {
    return this.current.status === "loaded"
      ? this.current.manifest.legacyPolyfillsEntry
      : undefined;
  }

  get(assetPath: string): ManifestEntry {
    const state = this.current;
    const entry = state.status === "loaded" ? state.manifest.entries.get(assetPath) : undefined;
    if (!entry) {
      throw new AssetNotFoundError(assetPath, this.appName, this.manifestPath, {
        cause: state.status === "failed" ? state.error : undefined,
      });
    }
    return entry;
  }

  /**
   * Parse the manifest again and report failures as diagnostics.
   */
  async check(): Promise<Diagnostic[]> {
    if (this.current.status === "skipped") return [];
    try {
      await this.read();
      return [];
    } catch (error) {
      if (!(error instanceof ManifestParseError)) throw error;
      return [
        {
          code: "vitetags.W001",
          level: "warn",
          appName: this.appName,
          message: error.message,
          hint:
            `Make sure you have built a manifest file, and that ` +
            `${this.manifestPathSetting} points to the correct location.`,
        },
      ];
    }
  }

  /**
   * Read and decode the manifest. Every failure surfaces as a ManifestParseError.
   */
  async read(): Promise<ParsedManifest> {
    let content: string;
    try {
      content = await this.readContent();
    } catch (error) {
      throw new ManifestParseError(this.appName, this.manifestPath, describe(error), {
        cause: error,
      });
    }

    try {
      return parseManifest(content, this.config.legacyPolyfillsMotif);
    } catch (error) {
      const reason = error instanceof z.ZodError ? formatZodError(error) : describe(error);
      throw new ManifestParseError(this.appName, this.manifestPath, reason, { cause: error });
    }
  }

  private async readContent(): Promise<string> {
    try {
      return await readFile(this.manifestPath, "utf-8");
    } catch (fileError) {
      if (!isRemoteUrl(this.manifestPath)) throw fileError;
      log.info(`Manifest for app "${this.appName}" is not on disk, fetching ${this.manifestPath}`);
      return this.fetchText(this.manifestPath);
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.map(String).join(".") || "manifest"}: ${issue.message}`)
    .join("; ");
}
