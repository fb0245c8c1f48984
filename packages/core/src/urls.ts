const ABSOLUTE_URL = /^[a-z][a-z\d+\-.]*:/i;

/** Maps a prefixed asset path to its public URL (hashing storage, CDN, ...). */
export type StaticUrlResolver = (path: string) => string;

/**
 * Join `path` onto `base` the way a browser resolves a relative reference
 * against a directory: absolute paths and URLs are kept as they are.
 */
export function joinUrlPath(base: string, path: string): string {
  if (!base) return path;
  if (ABSOLUTE_URL.test(path)) return path;

  const prefix = base.endsWith("/") ? base : `${base}/`;
  if (ABSOLUTE_URL.test(prefix)) return new URL(path, prefix).href;
  if (path.startsWith("/")) return path;
  return `${prefix}${path}`;
}

export function isRemoteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/** Resolver serving every asset below one public base URL. */
export function createStaticUrlResolver(staticUrl: string): StaticUrlResolver {
  return (path) => joinUrlPath(staticUrl, path);
}
