import type { AssetRegistry } from 'vitetags-core';
import type { TagAttributes } from 'vitetags-shared';

export interface TagsOptions {
  app?: string;
  attr?: TagAttributes;
  preload?: boolean;
  legacy?: boolean;
}

/**
 * `vitetags tags <path>`: the tags for one entry, as a template would
 * render them.
 */
export function tagsCommand(
  registry: AssetRegistry,
  assetPath: string,
  options: TagsOptions = {},
): Promise<string> {
  const { app, attr: attrs } = options;
  if (options.preload) return registry.preloadAsset(assetPath, { app });
  if (options.legacy) return registry.generateLegacyAsset(assetPath, { app, attrs });
  return registry.generateAsset(assetPath, { app, attrs });
}

export function urlCommand(
  registry: AssetRegistry,
  assetPath: string,
  options: { app?: string } = {},
): Promise<string> {
  return registry.generateAssetUrl(assetPath, options);
}

export function polyfillsCommand(
  registry: AssetRegistry,
  options: { app?: string; attr?: TagAttributes } = {},
): Promise<string> {
  return registry.generateLegacyPolyfills({ app: options.app, attrs: options.attr });
}

/**
 * Vite client plus React refresh preamble. Empty unless the dev server is
 * live.
 */
export async function hmrCommand(
  registry: AssetRegistry,
  options: { app?: string } = {},
): Promise<string> {
  const tags = await Promise.all([
    registry.generateWsClient(options),
    registry.generateReactRefreshUrl(options),
  ]);
  return tags.filter(Boolean).join('\n');
}
