import type { ArchiveFailure, DiscoveryResult, Reference, ReferenceKind, ReferenceSite } from "./types";
import { resolveReferenceUrl, shouldSkipValue } from "./url";

const URL_PATTERN = /url\(\s*(?:"([^"]*)"|'([^']*)'|([^'")\s]+))\s*\)/gi;
const IMPORT_STRING_PATTERN = /@import\s*(?:"([^"]*)"|'([^']*)')/gi;
const IMPORT_PREFIX = /@import\s*$/i;
const IMPORT_LOOKBEHIND = 16;

type Token = {
  raw: string;
  kind: ReferenceKind;
  site: ReferenceSite;
};

const quoteOf = (match: RegExpMatchArray) => {
  if (match[1] !== undefined) {
    return '"';
  }
  return match[2] !== undefined ? "'" : "";
};

const valueOf = (match: RegExpMatchArray) => match[1] ?? match[2] ?? match[3] ?? "";

const urlTokens = (cssText: string, offset: number): Token[] =>
  Array.from(cssText.matchAll(URL_PATTERN), (match): Token => {
    const index = match.index ?? 0;
    const preceding = cssText.slice(Math.max(0, index - IMPORT_LOOKBEHIND), index);
    return {
      raw: valueOf(match).trim(),
      kind: IMPORT_PREFIX.test(preceding) ? "stylesheet" : "image",
      site: {
        type: "css-url",
        quote: quoteOf(match),
        start: offset + index,
        end: offset + index + match[0].length
      }
    };
  });

// `@import "theme.css";` names a stylesheet without url(); the site is the string token.
const importStringTokens = (cssText: string, offset: number): Token[] =>
  Array.from(cssText.matchAll(IMPORT_STRING_PATTERN), (match): Token => {
    const value = valueOf(match);
    const end = (match.index ?? 0) + match[0].length;
    return {
      raw: value.trim(),
      kind: "stylesheet",
      site: {
        type: "css-string",
        quote: quoteOf(match),
        start: offset + end - value.length - 2,
        end: offset + end
      }
    };
  });

/**
 * Finds every `url(...)` token and every string-form `@import` in `cssText`,
 * in source order. `offset` shifts the reported sites, for CSS embedded in a
 * larger document such as a `<style>` element.
 */
export const extractCssReferences = (
  cssText: string,
  baseUrl: string,
  offset = 0
): DiscoveryResult => {
  const references: Reference[] = [];
  const failures: ArchiveFailure[] = [];
  const tokens = [...urlTokens(cssText, offset), ...importStringTokens(cssText, offset)].sort(
    (a, b) => a.site.start - b.site.start
  );

  for (const token of tokens) {
    if (shouldSkipValue(token.raw)) {
      continue;
    }
    const resolved = resolveReferenceUrl(token.raw, baseUrl);
    if (!resolved.ok) {
      failures.push({ url: token.raw, reason: resolved.reason, kind: "unresolvable-reference" });
      continue;
    }
    references.push({ ...token, resolvedUrl: resolved.url });
  }

  return { references, failures };
};
