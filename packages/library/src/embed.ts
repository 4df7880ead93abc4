import { MIMETYPE_FALLBACK } from "./mimetype";
import type { FetchedResource, Reference, ReferenceKind, ReferenceSite, Resource } from "./types";
import { bytesToBase64, decodeText, encodeText } from "./utils";

export type EmbedContext = {
  resources: ReadonlyMap<string, Resource>;
  failedPlaceholder?: string;
  /** Data URIs of stylesheets whose own references are already inlined. */
  stylesheets?: ReadonlyMap<string, string>;
};

// Text formats carry no signature; browsers ignore stylesheets typed as octet-stream.
const TEXT_MIMETYPES: Partial<Record<ReferenceKind, string>> = {
  stylesheet: "text/css",
  script: "text/javascript"
};

const CSS_UNQUOTED_UNSAFE = /[\s'"()\\]/;

export const effectiveMimetype = (resource: FetchedResource, kind: ReferenceKind) =>
  resource.mimetype === MIMETYPE_FALLBACK
    ? (TEXT_MIMETYPES[kind] ?? resource.mimetype)
    : resource.mimetype;

export const toDataUri = (mimetype: string, bytes: Uint8Array) =>
  `data:${mimetype};base64,${bytesToBase64(bytes)}`;

const escapeAttribute = (value: string) => value.replace(/&/g, "&amp;").replace(/"/g, "&quot;");

const renderCssString = (quote: string, value: string) => {
  const escaped = value.replace(/\\/g, "\\\\").replaceAll(quote, `\\${quote}`);
  return `${quote}${escaped}${quote}`;
};

const renderCssUrl = (quote: string, value: string) =>
  !quote && !CSS_UNQUOTED_UNSAFE.test(value)
    ? `url(${value})`
    : `url(${renderCssString(quote || '"', value)})`;

const renderSite = (site: ReferenceSite, value: string) => {
  switch (site.type) {
    case "attribute":
      return `${site.name}="${escapeAttribute(value)}"`;
    case "css-url":
      return renderCssUrl(site.quote, value);
    case "css-string":
      return renderCssString(site.quote, value);
  }
};

/**
 * Replaces each reference's site with `valueFor(reference)`, working from
 * the original offsets so text between sites is copied untouched. A `null`
 * value leaves that occurrence as it was.
 */
export const rewriteReferences = (
  text: string,
  references: Reference[],
  valueFor: (reference: Reference) => string | null
) => {
  const ordered = [...references].sort((a, b) => a.site.start - b.site.start);
  let output = "";
  let lastIndex = 0;

  for (const reference of ordered) {
    const value = valueFor(reference);
    if (value === null) {
      continue;
    }
    output += text.slice(lastIndex, reference.site.start);
    output += renderSite(reference.site, value);
    lastIndex = reference.site.end;
  }
  output += text.slice(lastIndex);

  return output;
};

const embedValue = (reference: Reference, context: EmbedContext) => {
  const resource = context.resources.get(reference.resolvedUrl);
  if (!resource) {
    return null;
  }
  if (resource.status === "failed") {
    return context.failedPlaceholder ?? null;
  }
  if (reference.kind === "stylesheet") {
    const stylesheet = context.stylesheets?.get(reference.resolvedUrl);
    if (stylesheet) {
      return stylesheet;
    }
  }
  return toDataUri(effectiveMimetype(resource, reference.kind), resource.bytes);
};

export const embedDocument = (text: string, references: Reference[], context: EmbedContext) =>
  rewriteReferences(text, references, (reference) => embedValue(reference, context));

/**
 * Inlines a fetched stylesheet's own references, then returns the result as
 * a data URI. Nested stylesheets keep their raw bytes.
 */
export const embedStylesheet = (
  resource: FetchedResource,
  references: Reference[],
  context: EmbedContext
) => {
  const cssText = embedDocument(decodeText(resource.bytes), references, {
    resources: context.resources,
    failedPlaceholder: context.failedPlaceholder
  });
  return toDataUri(effectiveMimetype(resource, "stylesheet"), encodeText(cssText));
};
