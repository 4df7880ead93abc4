export { archive, blockingArchive } from "./archive";
export type { ArchiveRuntime } from "./archive";
export { PageArchive } from "./page-archive";
export type {
  ArchiveFailure,
  DiscoveryResult,
  DocumentKind,
  FailedResource,
  FailureKind,
  FetchMode,
  FetchedResource,
  Page,
  Reference,
  ReferenceKind,
  ReferenceSite,
  Resource,
  ResourceMap
} from "./types";
export type { ArchiveOptions, ResolvedArchiveOptions } from "./options";
export { DEFAULT_TIMEOUT_MS, resolveArchiveOptions } from "./options";
export { ArchiveError, RootFetchFailedError, UnsupportedOptionError } from "./errors";
export { MIMETYPE_FALLBACK, resourceMimetype, sniffMimetype } from "./mimetype";
export { discoverReferences } from "./discover";
export { fetchAll, fetchResource } from "./fetcher";
export { embedDocument, embedStylesheet, toDataUri } from "./embed";
export { createLogger, LOG_LEVEL_ENV } from "./logger";
export type { Logger } from "./logger";
export type {
  ProxyConfig,
  ProxyCredentials,
  ProxyScheme,
  Transport,
  TransportConfig,
  TransportResponse
} from "@web-archive/transport";
export { createGotTransport } from "@web-archive/transport";
