import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { InvalidConfigError, log } from "vitetags-shared";
import type { SettingsEnv, VitetagsSettings } from "vitetags-shared";
import { AssetRegistry, resolveAppConfigs } from "../registry.js";
import { AppConfigNotFoundError, AssetNotFoundError } from "../errors.js";

const MANIFESTS: Record<string, object> = {
  "https://cdn.test/web.json": {
    "main.js": { file: "main.abc123.js" },
  },
  "https://cdn.test/admin.json": {
    "main.js": { file: "admin-main.789.js" },
  },
};

function makeRegistry(settings: VitetagsSettings, env: SettingsEnv = {}, serving = false) {
  const probe = vi.fn(async (_url: string) => serving);
  const fetchText = vi.fn(async (url: string) => JSON.stringify(MANIFESTS[url] ?? {}));
  const registry = new AssetRegistry({ settings, env, probe, fetchText });
  return { registry, probe, fetchText };
}

let warn: MockInstance<(msg: string) => void>;

beforeEach(() => {
  warn = vi.spyOn(log, "warn").mockImplementation(() => {});
  vi.spyOn(log, "info").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Settings layering ───────────────────────────────────────────────────────

describe("resolveAppConfigs", () => {
  it("falls back to a default app with every default", () => {
    const configs = resolveAppConfigs({}, {});
    expect([...configs.keys()]).toEqual(["default"]);
    expect(configs.get("default")?.config.devServerPort).toBe(5173);
    expect(warn).not.toHaveBeenCalled();
  });

  it("maps legacy keys onto the default app with a deprecation warning", () => {
    const configs = resolveAppConfigs(
      {},
      { VITETAGS_DEV_SERVER_PORT: "3000", VITETAGS_DEV_MODE: "1" },
    );

    expect(configs.get("default")?.config.devServerPort).toBe(3000);
    expect(configs.get("default")?.config.devMode).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toContain(
      "[deprecated] The settings [VITETAGS_DEV_MODE, VITETAGS_DEV_SERVER_PORT] will be removed",
    );
  });

  it("ignores legacy keys next to structured apps", () => {
    const configs = resolveAppConfigs(
      { apps: { web: { devServerPort: 4000 } } },
      { VITETAGS_DEV_SERVER_PORT: "3000" },
    );

    expect([...configs.keys()]).toEqual(["web"]);
    expect(configs.get("web")?.config.devServerPort).toBe(4000);
    expect(warn.mock.calls[0]?.[0]).toContain(
      'mixing the "apps" setting with these legacy settings: [VITETAGS_DEV_SERVER_PORT]',
    );
  });

  it("still registers a default app when apps is empty", () => {
    const configs = resolveAppConfigs({ apps: {} }, { VITETAGS_DEV_MODE: "true" });
    expect([...configs.keys()]).toEqual(["default"]);
    expect(configs.get("default")?.config.devMode).toBe(false);
    expect(warn.mock.calls[0]?.[0]).toContain("mixing");
  });

  it("records which setting moves each app's manifest", () => {
    expect(resolveAppConfigs({ apps: { web: {} } }, {}).get("web")?.manifestPathSetting).toBe(
      'apps["web"].manifestPath',
    );
    expect(
      resolveAppConfigs({}, { VITETAGS_DEV_MODE: "1" }).get("default")?.manifestPathSetting,
    ).toBe("VITETAGS_MANIFEST_PATH");
  });

  it("counts the retired assets path key as legacy", () => {
    resolveAppConfigs({}, { VITETAGS_ASSETS_PATH: "/srv/assets" });
    expect(warn.mock.calls[0]?.[0]).toContain("[VITETAGS_ASSETS_PATH]");
  });
});

// ─── Registry ────────────────────────────────────────────────────────────────

describe("AssetRegistry", () => {
  it("reports a missing default manifest at the default location", async () => {
    const { registry } = makeRegistry({ root: "/srv/app" });

    expect(await registry.appNames()).toEqual(["default"]);
    const diagnostics = await registry.check();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.code).toBe("vitetags.W001");
    expect(diagnostics[0]?.appName).toBe("default");
    expect(diagnostics[0]?.message).toContain(path.resolve("/srv/app", "dist", "manifest.json"));
  });

  it("falls back to the default location for an empty legacy manifest path", async () => {
    const { registry } = makeRegistry({ root: "/srv/app" }, { VITETAGS_MANIFEST_PATH: "" });

    const diagnostics = await registry.check();
    expect(diagnostics.map((d) => d.code)).toEqual(["vitetags.W001"]);
    expect(diagnostics[0]?.message).toContain(path.resolve("/srv/app", "dist", "manifest.json"));
    expect(diagnostics[0]?.hint).toContain("VITETAGS_MANIFEST_PATH");
    await expect(registry.generateAsset("main.js")).rejects.toThrow(AssetNotFoundError);
  });

  it("routes calls to the named app", async () => {
    const { registry } = makeRegistry({
      apps: {
        default: { manifestPath: "https://cdn.test/web.json" },
        admin: { manifestPath: "https://cdn.test/admin.json" },
      },
    });

    expect(await registry.generateAssetUrl("main.js")).toBe("main.abc123.js");
    expect(await registry.generateAssetUrl("main.js", { app: "admin" })).toBe("admin-main.789.js");
    expect(await registry.check()).toEqual([]);
  });

  it("rejects unknown app names", async () => {
    const { registry } = makeRegistry({ apps: { web: { manifestPath: "https://cdn.test/web.json" } } });

    await expect(registry.generateAsset("main.js")).rejects.toThrow(AppConfigNotFoundError);
    await expect(registry.generateAsset("main.js", { app: "nope" })).rejects.toThrow(
      'Cannot find app "nope" in vitetags settings (configured: web)',
    );
  });

  it("initializes once for concurrent callers", async () => {
    const { registry, fetchText } = makeRegistry({
      apps: { default: { manifestPath: "https://cdn.test/web.json" } },
    });

    expect(registry.initialize()).toBe(registry.initialize());
    await Promise.all([
      registry.generateAsset("main.js"),
      registry.preloadAsset("main.js"),
      registry.generateAssetUrl("main.js"),
    ]);
    expect(fetchText).toHaveBeenCalledTimes(1);
  });

  it("serves a legacy-configured app from the dev server", async () => {
    const { registry, probe } = makeRegistry(
      {},
      { VITETAGS_DEV_MODE: "true", VITETAGS_DEV_SERVER_PORT: "3000" },
      true,
    );

    expect(await registry.generateAsset("src/main.ts", { attrs: { async: true } })).toBe(
      '<script type="module" async src="http://localhost:3000/src/main.ts"></script>',
    );
    expect(probe).toHaveBeenCalledWith("http://localhost:3000/");
  });

  it("rewrites production URLs under staticUrl", async () => {
    const { registry } = makeRegistry({
      staticUrl: "/static/",
      apps: { default: { manifestPath: "https://cdn.test/web.json" } },
    });
    expect(await registry.generateAssetUrl("main.js")).toBe("/static/main.abc123.js");
  });

  it("turns invalid settings into an error diagnostic", async () => {
    const { registry } = makeRegistry({ apps: { web: { devServerPort: 0 } } });

    const diagnostics = await registry.check();
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.code).toBe("vitetags.E001");
    expect(diagnostics[0]?.level).toBe("error");
    expect(diagnostics[0]?.message).toContain('apps["web"]');
    await expect(registry.generateAsset("main.js", { app: "web" })).rejects.toThrow(
      InvalidConfigError,
    );
  });
});
