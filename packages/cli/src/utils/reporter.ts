import { performance } from 'node:perf_hooks';
import { readFileSync, existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import pc from 'picocolors';

/**
 * Start a high-precision timer. Returns a function that returns elapsed milliseconds.
 */
export function startTimer(): () => number {
  const start = performance.now();
  return () => performance.now() - start;
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)} ms`;
  }
  return `${(ms / 1000).toFixed(2)} s`;
}

/**
 * Get package version from the CLI's package.json
 */
export function getVersion(): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));

  // src/utils/reporter.ts and dist/utils/reporter.js both sit two levels down
  const pkgPath = join(currentDir, '../../package.json');
  if (!existsSync(pkgPath)) return '?';

  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (
      typeof pkg === 'object' && pkg !== null &&
      'name' in pkg && pkg.name === 'vitetags-cli' &&
      'version' in pkg && typeof pkg.version === 'string'
    ) {
      return pkg.version;
    }
  } catch {
    // Unreadable package.json: report an unknown version
  }
  return '?';
}

/**
 * Check if silent mode is enabled via flag or environment variable
 */
export function isSilent(argv: string[], env: NodeJS.ProcessEnv): boolean {
  return argv.includes('--silent') || env.VITETAGS_SILENT === '1';
}

/**
 * Check if colors should be used
 */
export function useColor(argv: string[], env: NodeJS.ProcessEnv): boolean {
  if (argv.includes('--no-color')) {
    return false;
  }

  // https://no-color.org
  if (env.NO_COLOR !== undefined) {
    return false;
  }

  if (env.FORCE_COLOR !== undefined) {
    return true;
  }

  // Default to picocolors' detection (checks TTY)
  return pc.isColorSupported;
}

/**
 * Detect if the terminal supports Unicode characters.
 */
export function supportsUnicode(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (platform !== 'win32') return true;

  // Modern Windows terminals support Unicode
  return Boolean(
    env.WT_SESSION ||
    env.TERM_PROGRAM === 'vscode' ||
    env.TERM === 'xterm-256color',
  );
}

/**
 * Print the banner with package name and version
 */
export function printBanner(opts: {
  name?: string;
  version?: string;
  color?: boolean;
  silent?: boolean;
}): void {
  if (opts.silent) return;

  const name = opts.name || 'vitetags';
  const version = opts.version || getVersion();
  const color = opts.color ?? true;

  if (color) {
    console.log(`${pc.bold(name)} ${pc.dim(`v${version}`)}`);
  } else {
    console.log(`${name} v${version}`);
  }
}

/**
 * Print completion message with elapsed time
 */
export function printDone(opts: {
  what: string;
  elapsedMs: number;
  color?: boolean;
  silent?: boolean;
}): void {
  if (opts.silent) return;

  const message = `${opts.what} in ${formatDuration(opts.elapsedMs)}`;
  const color = opts.color ?? true;

  if (color) {
    console.log(pc.dim(message));
  } else {
    console.log(message);
  }
}
