import path from 'node:path';
import { AssetRegistry } from 'vitetags-core';
import type { AssetRegistryOptions } from 'vitetags-core';
import { loadEnvFiles, loadSettings, log } from 'vitetags-shared';
import type { SettingsEnv } from 'vitetags-shared';

/** Options every command accepts */
export type CommonOptions = {
  app?: string;
  config?: string;
  root?: string;
  mode: string;
  silent?: boolean;
  color: boolean;
};

/**
 * Load .env files and settings for the project at `options.root`, then
 * build the registry the commands render with.
 */
export async function createRegistry(
  options: CommonOptions,
  {
    env = process.env,
    verbose = false,
    ...registryOptions
  }: Omit<AssetRegistryOptions, 'settings'> & { env?: SettingsEnv; verbose?: boolean } = {},
): Promise<AssetRegistry> {
  const root = path.resolve(options.root ?? process.cwd());

  const envFiles = loadEnvFiles({ root, mode: options.mode }, env);
  if (verbose) {
    for (const file of envFiles) log.info(`Loaded ${path.relative(root, file)}`);
  }

  const settings = await loadSettings({ root, configFile: options.config, silent: !verbose });
  return new AssetRegistry({ ...registryOptions, settings, env });
}
