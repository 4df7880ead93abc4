import * as cheerio from "cheerio";
import { isText, type Element } from "domhandler";

import { extractCssReferences } from "./css-references";
import type { ArchiveFailure, DiscoveryResult, Reference, ReferenceKind } from "./types";
import { resolveReferenceUrl, shouldSkipValue } from "./url";

type Candidate = {
  attribute: string;
  kind: ReferenceKind;
};

const RESOURCE_SELECTOR = "img[src], link[href], script[src], style";
const ATTRIBUTE_PATTERN = /^([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|(\S+))$/;

const relTokens = (value: string | undefined) =>
  (value ?? "").toLowerCase().split(/\s+/).filter(Boolean);

const candidateFor = (element: Element): Candidate | null => {
  switch (element.name) {
    case "img":
      return { attribute: "src", kind: "image" };
    case "script":
      return { attribute: "src", kind: "script" };
    case "link": {
      const rel = relTokens(element.attribs.rel);
      if (rel.includes("stylesheet")) {
        return { attribute: "href", kind: "stylesheet" };
      }
      if (rel.includes("icon")) {
        return { attribute: "href", kind: "image" };
      }
      return null;
    }
    default:
      return null;
  }
};

const resolveDocumentBase = ($: cheerio.CheerioAPI, pageUrl: string) => {
  const href = $("base[href]").first().attr("href");
  if (!href) {
    return pageUrl;
  }
  const resolved = resolveReferenceUrl(href, pageUrl);
  return resolved.ok ? resolved.url : pageUrl;
};

/**
 * Finds `img`, stylesheet/icon `link` and `script` references, plus `url()`
 * tokens inside `<style>` elements, in document order. Sites point into the
 * original `html` string, so rewriting never re-serializes the document.
 */
export const extractHtmlReferences = (html: string, pageUrl: string): DiscoveryResult => {
  const $ = cheerio.load(html, { sourceCodeLocationInfo: true });
  const baseUrl = resolveDocumentBase($, pageUrl);
  const references: Reference[] = [];
  const failures: ArchiveFailure[] = [];

  for (const element of $(RESOURCE_SELECTOR).toArray()) {
    if (element.name === "style") {
      for (const child of element.children) {
        if (!isText(child) || !child.sourceCodeLocation) {
          continue;
        }
        const { startOffset, endOffset } = child.sourceCodeLocation;
        const inline = extractCssReferences(html.slice(startOffset, endOffset), baseUrl, startOffset);
        references.push(...inline.references);
        failures.push(...inline.failures);
      }
      continue;
    }

    const candidate = candidateFor(element);
    if (!candidate) {
      continue;
    }
    const value = element.attribs[candidate.attribute];
    const location = element.sourceCodeLocation?.attrs?.[candidate.attribute];
    if (value === undefined || !location || shouldSkipValue(value)) {
      continue;
    }

    const resolved = resolveReferenceUrl(value, baseUrl);
    if (!resolved.ok) {
      failures.push({ url: value, reason: resolved.reason, kind: "unresolvable-reference" });
      continue;
    }

    const source = html.slice(location.startOffset, location.endOffset);
    const parts = ATTRIBUTE_PATTERN.exec(source);
    references.push({
      raw: parts ? parts[2] ?? parts[3] ?? parts[4] ?? "" : value,
      resolvedUrl: resolved.url,
      kind: candidate.kind,
      site: {
        type: "attribute",
        name: parts ? parts[1] : candidate.attribute,
        start: location.startOffset,
        end: location.endOffset
      }
    });
  }

  return { references, failures };
};
