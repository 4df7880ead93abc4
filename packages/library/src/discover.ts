import { extractCssReferences } from "./css-references";
import { extractHtmlReferences } from "./html-references";
import type { DiscoveryResult, DocumentKind } from "./types";

export const discoverReferences = (
  text: string,
  kind: DocumentKind,
  baseUrl: string
): DiscoveryResult =>
  kind === "html" ? extractHtmlReferences(text, baseUrl) : extractCssReferences(text, baseUrl);
