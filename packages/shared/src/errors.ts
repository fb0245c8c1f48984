/**
 * Base class for every error raised by vitetags packages.
 */
export class VitetagsError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
  }
}

/** Settings failed validation. */
export class InvalidConfigError extends VitetagsError {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Config validation error in ${source}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
