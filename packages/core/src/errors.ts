import { VitetagsError } from "vitetags-shared";

/** The manifest could not be read, fetched or decoded. */
export class ManifestParseError extends VitetagsError {
  readonly appName: string;
  readonly manifestPath: string;

  constructor(
    appName: string,
    manifestPath: string,
    reason: string,
    options: { cause?: unknown } = {},
  ) {
    super(
      `Cannot read Vite manifest for app "${appName}" at ${manifestPath}: ${reason}`,
      options,
    );
    this.appName = appName;
    this.manifestPath = manifestPath;
  }
}

/** Manifest import edges form a cycle. */
export class ManifestCycleError extends ManifestParseError {
  readonly cycle: string[];

  constructor(appName: string, manifestPath: string, cycle: string[]) {
    super(appName, manifestPath, `import cycle ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}

export class AssetNotFoundError extends VitetagsError {
  readonly path: string;
  readonly appName: string;
  readonly manifestPath: string;

  constructor(
    path: string,
    appName: string,
    manifestPath: string,
    options: { cause?: unknown; message?: string } = {},
  ) {
    let message =
      options.message ??
      `Cannot find ${path} for app "${appName}" in Vite manifest at ${manifestPath}`;
    if (options.cause instanceof Error) {
      message += ` (${options.cause.message})`;
    }
    super(message, { cause: options.cause });
    this.path = path;
    this.appName = appName;
    this.manifestPath = manifestPath;
  }
}

export class AppConfigNotFoundError extends VitetagsError {
  readonly appName: string;

  constructor(appName: string, known: string[]) {
    super(
      `Cannot find app "${appName}" in vitetags settings (configured: ${known.join(", ") || "none"})`,
    );
    this.appName = appName;
  }
}

export class InvalidTagAttributeError extends VitetagsError {
  readonly attribute: string;

  constructor(attribute: string) {
    super(`Invalid HTML attribute name: ${JSON.stringify(attribute)}`);
    this.attribute = attribute;
  }
}
