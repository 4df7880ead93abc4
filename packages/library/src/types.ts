export type ReferenceKind = "image" | "stylesheet" | "script";

export type DocumentKind = "html" | "css";

/**
 * Where a reference sits in its document text. Offsets are string indices
 * covering the whole attribute (`src="a.png"`), the whole `url(...)` token,
 * or the quoted string of an `@import "a.css"` rule.
 */
export type ReferenceSite =
  | { type: "attribute"; name: string; start: number; end: number }
  | { type: "css-url"; quote: string; start: number; end: number }
  | { type: "css-string"; quote: string; start: number; end: number };

export type Reference = {
  /** The value exactly as written in the source. */
  raw: string;
  resolvedUrl: string;
  kind: ReferenceKind;
  site: ReferenceSite;
};

export type FailureKind = "resource-fetch-failed" | "unresolvable-reference";

export type ArchiveFailure = {
  url: string;
  reason: string;
  kind: FailureKind;
};

export type DiscoveryResult = {
  references: Reference[];
  failures: ArchiveFailure[];
};

export type FetchedResource = {
  status: "fetched";
  url: string;
  bytes: Uint8Array;
  mimetype: string;
};

export type FailedResource = {
  status: "failed";
  url: string;
  reason: string;
};

export type Resource = FetchedResource | FailedResource;

export type ResourceMap = Map<string, Resource>;

export type Page = {
  /** Final URL of the document, used as the base for relative references. */
  url: string;
  html: string;
};

export type FetchMode = "concurrent" | "sequential";
