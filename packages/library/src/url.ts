const SKIPPED_PREFIXES = ["data:", "blob:", "mailto:", "tel:", "javascript:", "about:", "#"];

const FETCHABLE_PROTOCOLS = new Set(["http:", "https:"]);

export type ResolvedReferenceUrl = { ok: true; url: string } | { ok: false; reason: string };

/** Values that never need a fetch: empty, inline, fragment-only or non-network. */
export const shouldSkipValue = (value: string) => {
  const trimmed = value.trim().toLowerCase();
  return !trimmed || SKIPPED_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
};

export const resolveReferenceUrl = (value: string, baseUrl: string): ResolvedReferenceUrl => {
  let resolved: URL;
  try {
    resolved = new URL(value.trim(), baseUrl);
  } catch {
    return { ok: false, reason: `Cannot resolve "${value}" against ${baseUrl}` };
  }
  if (!FETCHABLE_PROTOCOLS.has(resolved.protocol)) {
    return { ok: false, reason: `Unsupported protocol ${resolved.protocol}` };
  }
  return { ok: true, url: resolved.toString() };
};
