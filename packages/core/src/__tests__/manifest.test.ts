import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { log, resolveAppConfig } from "vitetags-shared";
import { ManifestResolver, parseManifest, resolveManifestPath } from "../manifest.js";
import { AssetNotFoundError, ManifestParseError } from "../errors.js";

const MANIFEST = {
  "main.js": {
    file: "assets/main.abc123.js",
    src: "main.js",
    isEntry: true,
    imports: ["lib.js"],
    css: ["assets/main.css"],
    name: "main",
    assets: ["assets/logo.svg"],
  },
  "lib.js": { file: "assets/lib.def456.js", css: ["assets/lib.css"] },
};

// ─── parseManifest ───────────────────────────────────────────────────────────

describe("parseManifest", () => {
  it("fills defaults and drops fields outside the entry model", () => {
    const { entries } = parseManifest(JSON.stringify(MANIFEST), "legacy-polyfills");
    expect(entries.get("main.js")).toEqual({
      file: "assets/main.abc123.js",
      src: "main.js",
      isEntry: true,
      isDynamicEntry: false,
      css: ["assets/main.css"],
      imports: ["lib.js"],
      dynamicImports: [],
    });
    expect(entries.get("lib.js")).toEqual({
      file: "assets/lib.def456.js",
      isEntry: false,
      isDynamicEntry: false,
      css: ["assets/lib.css"],
      imports: [],
      dynamicImports: [],
    });
  });

  it("has no legacy polyfills entry when no key matches", () => {
    expect(parseManifest(JSON.stringify(MANIFEST), "legacy-polyfills").legacyPolyfillsEntry).toBeUndefined();
  });

  it("keeps the last key containing the motif", () => {
    const content = JSON.stringify({
      "vite/legacy-polyfills": { file: "assets/polyfills-a.js" },
      "main.js": { file: "assets/main.js" },
      "vite/legacy-polyfills-legacy": { file: "assets/polyfills-b.js" },
    });
    expect(parseManifest(content, "legacy-polyfills").legacyPolyfillsEntry?.file).toBe(
      "assets/polyfills-b.js",
    );
  });

  it("rejects entries without a file", () => {
    expect(() => parseManifest('{"main.js": {"src": "main.js"}}', "legacy-polyfills")).toThrow(z.ZodError);
  });

  it("rejects malformed JSON", () => {
    expect(() => parseManifest("{ not json", "legacy-polyfills")).toThrow(SyntaxError);
  });
});

// ─── resolveManifestPath ─────────────────────────────────────────────────────

describe("resolveManifestPath", () => {
  it("defaults to manifest.json below the static root and prefix", () => {
    expect(resolveManifestPath(resolveAppConfig({}), "/srv/app", "dist")).toBe(
      path.resolve("/srv/app", "dist", "manifest.json"),
    );
    expect(resolveManifestPath(resolveAppConfig({ staticUrlPrefix: "bundler" }), "/srv/app", "dist")).toBe(
      path.resolve("/srv/app", "dist", "bundler", "manifest.json"),
    );
  });

  it("resolves a relative manifestPath against the root", () => {
    const config = resolveAppConfig({ manifestPath: "build/.vite/manifest.json" });
    expect(resolveManifestPath(config, "/srv/app", "dist")).toBe(
      path.resolve("/srv/app", "build/.vite/manifest.json"),
    );
  });

  it("keeps remote manifest URLs verbatim", () => {
    const config = resolveAppConfig({ manifestPath: "https://cdn.test/manifest.json" });
    expect(resolveManifestPath(config, "/srv/app", "dist")).toBe("https://cdn.test/manifest.json");
  });
});

// ─── ManifestResolver ────────────────────────────────────────────────────────

describe("ManifestResolver", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vitetags-manifest-"));
    vi.spyOn(log, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function makeResolver(manifestPath: string, fetchText = vi.fn(async (_url: string) => "{}")) {
    const resolver = new ManifestResolver(resolveAppConfig({}), {
      appName: "default",
      manifestPath,
      fetchText,
    });
    return { resolver, fetchText };
  }

  function writeManifest(content: string): string {
    const file = path.join(dir, "manifest.json");
    fs.writeFileSync(file, content);
    return file;
  }

  it("returns the exact entry stored under a key", async () => {
    const { resolver } = makeResolver(writeManifest(JSON.stringify(MANIFEST)));
    await resolver.load(false);

    expect(resolver.state.status).toBe("loaded");
    expect(resolver.get("lib.js").file).toBe("assets/lib.def456.js");
  });

  it("throws AssetNotFoundError naming a missing path", async () => {
    const file = writeManifest(JSON.stringify(MANIFEST));
    const { resolver } = makeResolver(file);
    await resolver.load(false);

    expect(() => resolver.get("missing.js")).toThrow(AssetNotFoundError);
    expect(() => resolver.get("missing.js")).toThrow(
      `Cannot find missing.js for app "default" in Vite manifest at ${file}`,
    );
  });

  it("skips parsing while the dev server is live", async () => {
    const { resolver, fetchText } = makeResolver("https://cdn.test/manifest.json");
    await resolver.load(true);

    expect(resolver.state).toEqual({ status: "skipped" });
    expect(fetchText).not.toHaveBeenCalled();
    expect(() => resolver.get("main.js")).toThrow(AssetNotFoundError);
    expect(await resolver.check()).toEqual([]);
  });

  it("stores a load failure instead of throwing it", async () => {
    const { resolver, fetchText } = makeResolver(path.join(dir, "nope.json"));
    await resolver.load(false);

    const state = resolver.state;
    expect(state.status).toBe("failed");
    expect(fetchText).not.toHaveBeenCalled();

    let caught: unknown;
    try {
      resolver.get("main.js");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(AssetNotFoundError);
    expect(caught instanceof AssetNotFoundError && caught.cause).toBeInstanceOf(ManifestParseError);
  });

  it("wraps malformed JSON in a ManifestParseError naming app and path", async () => {
    const file = writeManifest("{ not json");
    const { resolver } = makeResolver(file);

    await expect(resolver.read()).rejects.toThrow(ManifestParseError);
    await expect(resolver.read()).rejects.toThrow(`Cannot read Vite manifest for app "default" at ${file}`);
  });

  it("names the offending key when an entry has no file", async () => {
    const { resolver } = makeResolver(writeManifest('{"main.js": {"css": []}}'));
    await expect(resolver.read()).rejects.toThrow("main.js.file: Required");
  });

  it("fetches remote manifests that are not on disk", async () => {
    const fetchText = vi.fn(async (_url: string) => JSON.stringify(MANIFEST));
    const { resolver } = makeResolver("https://cdn.test/manifest.json", fetchText);
    await resolver.load(false);

    expect(fetchText).toHaveBeenCalledWith("https://cdn.test/manifest.json");
    expect(resolver.get("main.js").file).toBe("assets/main.abc123.js");
  });

  it("wraps fetch failures", async () => {
    const fetchText = vi.fn(async (_url: string): Promise<string> => {
      throw new Error("GET https://cdn.test/manifest.json timed out after 10000 ms");
    });
    const { resolver } = makeResolver("https://cdn.test/manifest.json", fetchText);

    await expect(resolver.read()).rejects.toThrow("timed out after 10000 ms");
    await expect(resolver.read()).rejects.toThrow(ManifestParseError);
  });

  it("check re-reads the manifest and reports problems as diagnostics", async () => {
    const file = writeManifest(JSON.stringify(MANIFEST));
    const { resolver } = makeResolver(file);
    await resolver.load(false);
    expect(await resolver.check()).toEqual([]);

    fs.rmSync(file);
    const diagnostics = await resolver.check();

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe("vitetags.W001");
    expect(diagnostics[0].level).toBe("warn");
    expect(diagnostics[0].appName).toBe("default");
    expect(diagnostics[0].message).toContain(file);
    expect(diagnostics[0].hint).toContain('apps["default"].manifestPath');
    // The table loaded earlier stays in place
    expect(resolver.get("main.js").file).toBe("assets/main.abc123.js");
  });

  it("names the configured setting in the hint", async () => {
    const resolver = new ManifestResolver(resolveAppConfig({}), {
      appName: "default",
      manifestPath: path.join(os.tmpdir(), "vitetags-missing", "manifest.json"),
      fetchText: async () => "{}",
      manifestPathSetting: "VITETAGS_MANIFEST_PATH",
    });

    const diagnostics = await resolver.check();
    expect(diagnostics[0]?.hint).toBe(
      "Make sure you have built a manifest file, and that VITETAGS_MANIFEST_PATH " +
        "points to the correct location.",
    );
  });
});
