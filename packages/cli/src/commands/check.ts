import pc from 'picocolors';
import type { AssetRegistry } from 'vitetags-core';
import type { Diagnostic } from 'vitetags-shared';
import { getVersion, printDone, startTimer, supportsUnicode } from '../utils/reporter.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface CheckReport {
  /** Registered apps; empty when the settings could not be loaded */
  appNames: string[];
  diagnostics: Diagnostic[];
}

export interface CheckOptions {
  silent: boolean;
  color: boolean;
}

interface RenderOptions {
  version: string;
  color: boolean;
  unicode: boolean;
}

// ─── Diagnosis ────────────────────────────────────────────────────────────────

/**
 * Run the registry's health check. Never rejects: settings errors come back
 * as an app-less error diagnostic.
 */
export async function collectReport(registry: AssetRegistry): Promise<CheckReport> {
  const diagnostics = await registry.check();
  const settingsBroken = diagnostics.some((d) => d.appName === '*');
  return {
    appNames: settingsBroken ? [] : await registry.appNames(),
    diagnostics,
  };
}

// ─── Rendering ────────────────────────────────────────────────────────────────

export function renderReport(report: CheckReport, opts: RenderOptions): string[] {
  const { color, unicode, version } = opts;
  const icons = {
    ok: unicode ? '\u2713' : '+',
    warn: '!',
    error: unicode ? '\u2717' : 'x',
  };
  const plain = (text: string) => text;
  const paint = {
    ok: color ? pc.green : plain,
    warn: color ? pc.yellow : plain,
    error: color ? pc.red : plain,
    bold: color ? pc.bold : plain,
    dim: color ? pc.dim : plain,
  };

  const lines: string[] = [];

  // Header
  if (color) {
    lines.push(`  ${pc.bold(pc.green('VITETAGS'))} ${pc.green(`v${version}`)}  ${pc.dim('check')}`);
  } else {
    lines.push(`  VITETAGS v${version}  check`);
  }

  if (report.appNames.length > 0) {
    lines.push('');
    lines.push(`  ${paint.bold('Apps')}`);
    for (const appName of report.appNames) {
      const own = report.diagnostics.filter((d) => d.appName === appName);
      const level = own.some((d) => d.level === 'error') ? 'error' : own.length ? 'warn' : 'ok';
      lines.push(`  ${paint[level](icons[level])}  ${appName}`);
    }
  }

  lines.push('');
  lines.push(`  ${paint.bold('Diagnostics')}`);
  if (report.diagnostics.length === 0) {
    lines.push(`  ${paint.ok(icons.ok)}  No problems found`);
  }
  for (const d of report.diagnostics) {
    const scope = d.appName === '*' ? '' : ` ${d.appName}:`;
    lines.push(`  ${paint[d.level](icons[d.level])}  ${d.code}${scope} ${d.message}`);
    lines.push(`     ${paint.dim(d.hint)}`);
  }

  return lines;
}

/**
 * `vitetags check`. Resolves to the process exit code: 1 when any
 * diagnostic was produced.
 */
export async function checkCommand(registry: AssetRegistry, options: CheckOptions): Promise<number> {
  const stop = startTimer();
  const report = await collectReport(registry);

  if (!options.silent) {
    const lines = renderReport(report, {
      version: getVersion(),
      color: options.color,
      unicode: supportsUnicode(),
    });
    console.log('');
    console.log(lines.join('\n'));
    console.log('');
    printDone({
      what: `checked ${report.appNames.length} app(s)`,
      elapsedMs: stop(),
      color: options.color,
    });
  }

  return report.diagnostics.length > 0 ? 1 : 0;
}
