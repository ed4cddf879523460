export { VERSION } from "./version.js";
export * from "./errors.js";

export {
  loadSettings,
  settingsFromEnv,
  normalizeServer,
  apiVersionOf,
  type Credentials,
  type LoadSettingsInput,
  type RawSettings,
  type Settings,
} from "./config/config.js";
export { readGitSettings } from "./config/git-config.js";
export { logger, setLogLevel } from "./observability/logger.js";

export {
  Transport,
  ACCEPT_CONTENT,
  ACCEPT_JSON,
  type HttpMethod,
  type QueryParams,
  type RequestOptions,
  type TransportOptions,
  type TransportResponse,
} from "./http/transport.js";
export { parseLinkHeader } from "./http/link-header.js";

export { ResourceClient, type Download, type ListOptions, type ResourceClientOptions } from "./resources/client.js";
export { ResourceCursor, type Page } from "./resources/cursor.js";
export { CATALOG, isResourceType, type ResourceType } from "./resources/catalog.js";
export type { Filters, FilterValue } from "./resources/filters.js";

export * from "./models/index.js";

export {
  Selector,
  type PatchFilter,
  type Selection,
  type SelectionCriteria,
  type SelectionSource,
} from "./selector/selector.js";
export { resolveIds } from "./selector/lookup.js";

export { ApplyEngine, summarizeReport, type ApplyEngineOptions } from "./apply/engine.js";
export { serverContent, type ContentFormat } from "./apply/content.js";
export { GitApplier, type GitApplierOptions } from "./apply/git-applier.js";
export { hashDiff, hashContent, extractDiff } from "./apply/hash.js";
export { PatchLifecycle, type PatchState } from "./apply/state.js";
export type * from "./apply/types.js";

export { buildProgram, runCli } from "./cli/program.js";
export type { CliDeps, CliIO } from "./cli/context.js";
