import { InvalidArgumentError } from 'commander';
import type { TagAttributes } from 'vitetags-shared';

/**
 * Parse one `--attr` value: `name=value`, or a bare `name` for a boolean
 * attribute. Only the first `=` separates; the value may contain more.
 */
export function parseAttr(raw: string): [string, string | boolean] {
  const eq = raw.indexOf('=');
  const name = (eq === -1 ? raw : raw.slice(0, eq)).trim();
  if (!name) {
    throw new InvalidArgumentError(`Expected name=value or name, got "${raw}".`);
  }
  return [name, eq === -1 ? true : raw.slice(eq + 1)];
}

/**
 * commander collector for the repeatable `--attr` option
 */
export function collectAttr(raw: string, previous: TagAttributes = {}): TagAttributes {
  const [name, value] = parseAttr(raw);
  return { ...previous, [name]: value };
}
