import fs from 'node:fs';
import path from 'node:path';
import type { SettingsEnv } from './types.js';
import { log } from './logger.js';

function unquote(value: string, quote: '"' | "'"): string | null {
  if (!value.startsWith(quote)) return null;
  const close = value.indexOf(quote, 1);
  return close === -1 ? null : value.slice(1, close);
}

/**
 * Parse one line of a .env file. Returns null for blanks, comments and
 * lines without an `=`.
 */
export function parseEnvLine(rawLine: string): [string, string] | null {
  const line = rawLine.trim();
  if (!line || line.startsWith('#')) return null;

  const body = line.startsWith('export ') ? line.slice(7).trim() : line;
  const eq = body.indexOf('=');
  if (eq === -1) return null;

  const key = body.slice(0, eq).trim();
  if (!key) return null;

  const rest = body.slice(eq + 1);
  const quoted = unquote(rest, '"') ?? unquote(rest, "'");
  if (quoted !== null) return [key, quoted];

  const comment = rest.indexOf(' #');
  return [key, (comment === -1 ? rest : rest.slice(0, comment)).trim()];
}

/**
 * Parse the contents of a .env file into a key→value map.
 * Later duplicates win.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const entry = parseEnvLine(line);
    if (entry) result[entry[0]] = entry[1];
  }
  return result;
}

export interface LoadEnvFilesOptions {
  root: string;
  /** Selects the .env.[mode] files, e.g. 'development' or 'production'. */
  mode: string;
  /** Directory containing .env files, relative to root. Defaults to root. */
  dir?: string;
}

/**
 * Load .env files into `target` (process.env by default), lowest priority first:
 * .env, .env.local, .env.[mode], .env.[mode].local.
 *
 * Keys already present in `target` before loading are never overwritten,
 * so shell variables win over every file. Returns the files that were read.
 */
export function loadEnvFiles(opts: LoadEnvFilesOptions, target: SettingsEnv = process.env): string[] {
  const envDir = opts.dir ? path.resolve(opts.root, opts.dir) : opts.root;
  const preset = new Set(Object.keys(target).filter((key) => target[key] !== undefined));
  const loadedFiles: string[] = [];

  for (const name of ['.env', '.env.local', `.env.${opts.mode}`, `.env.${opts.mode}.local`]) {
    const filePath = path.join(envDir, name);
    if (!fs.existsSync(filePath)) continue;

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      log.warn(`[env] Could not read ${name}: ${error}`);
      continue;
    }

    for (const [key, value] of Object.entries(parseEnvFile(content))) {
      if (preset.has(key)) continue;
      target[key] = value;
    }
    loadedFiles.push(filePath);
  }

  return loadedFiles;
}
