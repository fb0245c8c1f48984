#!/usr/bin/env node
import { Command, Option } from 'commander';
import { log } from 'vitetags-shared';
import type { AssetRegistry } from 'vitetags-core';
import { checkCommand } from './commands/check.js';
import { hmrCommand, polyfillsCommand, tagsCommand, urlCommand } from './commands/tags.js';
import type { TagsOptions } from './commands/tags.js';
import { collectAttr } from './utils/attrs.js';
import { createRegistry } from './utils/context.js';
import type { CommonOptions } from './utils/context.js';
import { getVersion, isSilent, printBanner, useColor } from './utils/reporter.js';

const program = new Command();

program
  .name('vitetags')
  .description('Render script and link tags for Vite builds and dev servers')
  .version(getVersion())
  .option('--app <name>', 'Application to render for (default: "default")')
  .option('-c, --config <path>', 'Path to config file')
  .option('--root <dir>', 'Project root (default: current directory)')
  .option('--mode <mode>', 'Mode selecting the .env.[mode] files', 'production')
  .option('--silent', 'Suppress banner and timing output')
  .option('--no-color', 'Disable colored output');

/**
 * Build the registry from the global options and print whatever `render`
 * returns. Failures are logged and exit with code 1.
 */
async function run(render: (registry: AssetRegistry, common: CommonOptions) => Promise<string>) {
  const common = program.opts<CommonOptions>();
  try {
    const registry = await createRegistry(common);
    const output = await render(registry, common);
    if (output) console.log(output);
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

program
  .command('check')
  .description('Check that every app has a readable manifest')
  .action(async () => {
    const common = program.opts<CommonOptions>();
    const silent = isSilent(process.argv, process.env);
    const color = useColor(process.argv, process.env);

    if (!silent) {
      printBanner({ silent, color });
    }

    try {
      const registry = await createRegistry(common, { verbose: !silent });
      process.exitCode = await checkCommand(registry, { silent, color });
    } catch (error) {
      log.error(`Check failed: ${error}`);
      process.exit(1);
    }
  });

program
  .command('tags <path>')
  .description('Print the tags for an entry: CSS, script and modulepreloads')
  .addOption(new Option('--preload', 'Print preload links instead').conflicts('legacy'))
  .option('--legacy', 'Print a nomodule script for a -legacy chunk')
  .option('--attr <name=value>', 'Extra attribute, repeatable; bare name for a boolean', collectAttr)
  .action(async (assetPath: string, options: TagsOptions) => {
    await run((registry, common) => tagsCommand(registry, assetPath, { ...options, app: common.app }));
  });

program
  .command('url <path>')
  .description('Print the URL of one asset')
  .action(async (assetPath: string) => {
    await run((registry, common) => urlCommand(registry, assetPath, { app: common.app }));
  });

program
  .command('polyfills')
  .description('Print the @vitejs/plugin-legacy polyfills script')
  .option('--attr <name=value>', 'Extra attribute, repeatable; bare name for a boolean', collectAttr)
  .action(async (options: Pick<TagsOptions, 'attr'>) => {
    await run((registry, common) => polyfillsCommand(registry, { ...options, app: common.app }));
  });

program
  .command('hmr')
  .description('Print the Vite client and React refresh tags (dev server only)')
  .action(async () => {
    await run((registry, common) => hmrCommand(registry, { app: common.app }));
  });

program.parseAsync().catch((error: unknown) => {
  log.error(String(error));
  process.exit(1);
});
