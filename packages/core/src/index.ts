export { AssetRegistry, resolveAppConfigs } from "./registry.js";
export type { AssetRegistryOptions, GenerateOptions, ResolvedApp } from "./registry.js";
export { AppClient } from "./app-client.js";
export type { AppClientOptions } from "./app-client.js";
export {
  ManifestResolver,
  manifestEntrySchema,
  parseManifest,
  resolveManifestPath,
} from "./manifest.js";
export type { ManifestEntry, ManifestState, ParsedManifest } from "./manifest.js";
export { DevServerProbe, devServerOrigin } from "./dev-probe.js";
export {
  httpGet,
  createHttpProbe,
  createHttpFetcher,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_FETCH_TIMEOUT_MS,
} from "./transport.js";
export type { ProbeFn, FetchTextFn, HttpTextResponse } from "./transport.js";
export { joinUrlPath, isRemoteUrl, createStaticUrlResolver } from "./urls.js";
export type { StaticUrlResolver } from "./urls.js";
export {
  script,
  stylesheet,
  stylesheetPreload,
  preload,
  reactRefreshPreamble,
  mergeAttributes,
  renderAttributes,
  escapeAttribute,
} from "./tags.js";
export type { Tag } from "./tags.js";
export {
  ManifestParseError,
  ManifestCycleError,
  AssetNotFoundError,
  AppConfigNotFoundError,
  InvalidTagAttributeError,
} from "./errors.js";
