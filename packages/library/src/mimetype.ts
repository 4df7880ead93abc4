export const MIMETYPE_FALLBACK = "application/octet-stream";

/** Upper bound on the bytes any rule looks at. */
export const SNIFF_PREFIX_LENGTH = 512;

type SignatureRule = {
  mimetype: string;
  matches: (prefix: Uint8Array) => boolean;
};

const WILDCARD = "?";

// `?` matches any byte; every other character is matched by its char code.
const magic = (pattern: string, mimetype: string): SignatureRule => {
  const expected = Array.from(pattern, (char) => (char === WILDCARD ? null : char.charCodeAt(0)));
  return {
    mimetype,
    matches: (prefix) =>
      prefix.length >= expected.length &&
      expected.every((byte, index) => byte === null || prefix[index] === byte)
  };
};

const toLatin1 = (prefix: Uint8Array) => String.fromCharCode(...prefix);

const withoutBom = (prefix: Uint8Array) => toLatin1(prefix).replace(/^\xEF\xBB\xBF/, "");

// Whitespace, comments, processing instructions and doctypes ahead of the root element.
const LEADING_MARKUP = /^(?:\s+|<!--[\s\S]*?-->|<\?[\s\S]*?\?>|<!DOCTYPE[^>[]*(?:\[[\s\S]*?\])?\s*>)/i;
const SVG_DOCTYPE = /^<!DOCTYPE\s+svg\b/i;

const isSvgMarkup = (prefix: Uint8Array) => {
  let text = withoutBom(prefix);
  for (let match = LEADING_MARKUP.exec(text); match; match = LEADING_MARKUP.exec(text)) {
    if (SVG_DOCTYPE.test(text)) {
      return true;
    }
    text = text.slice(match[0].length);
  }
  return text.startsWith("<svg");
};

const isXmlPrologue = (prefix: Uint8Array) => withoutBom(prefix).trimStart().startsWith("<?xml");

const SIGNATURES: SignatureRule[] = [
  // Image
  magic("GIF87a", "image/gif"),
  magic("GIF89a", "image/gif"),
  magic("\xFF\xD8\xFF", "image/jpeg"),
  magic("\x89PNG\r\n\x1A\n", "image/png"),
  magic("<svg", "image/svg+xml"),
  magic("RIFF????WEBP", "image/webp"),
  magic("\x00\x00\x01\x00", "image/x-icon"),
  // Audio
  magic("ID3", "audio/mpeg"),
  magic("\xFF\x0E", "audio/mpeg"),
  magic("\xFF\x0F", "audio/mpeg"),
  magic("OggS", "audio/ogg"),
  magic("RIFF????WAVE", "audio/wav"),
  magic("fLaC", "audio/x-flac"),
  // Video
  magic("RIFF????AVI ", "video/avi"),
  magic("????ftyp", "video/mp4"),
  magic("\x00\x00\x01\x0B", "video/mpeg"),
  magic("????moov", "video/quicktime"),
  magic("\x1A\x45\xDF\xA3", "video/webm"),
  // Fonts
  magic("wOFF", "font/woff"),
  magic("wOF2", "font/woff2"),
  magic("\x00\x01\x00\x00", "font/ttf"),
  magic("OTTO", "font/otf"),
  // Documents
  magic("%PDF-", "application/pdf"),
  // Markup last: svg behind a prologue, doctype or comment, then any other xml.
  { mimetype: "image/svg+xml", matches: isSvgMarkup },
  { mimetype: "application/xml", matches: isXmlPrologue }
];

const EXTENSION_FALLBACKS: Record<string, string> = {
  ".svg": "image/svg+xml"
};

export const sniffMimetype = (bytes: Uint8Array): string => {
  const prefix = bytes.subarray(0, SNIFF_PREFIX_LENGTH);
  for (const rule of SIGNATURES) {
    if (rule.matches(prefix)) {
      return rule.mimetype;
    }
  }
  return MIMETYPE_FALLBACK;
};

/**
 * Sniffs `bytes`, and only when no signature matches looks at the extension
 * of the URL path. Response headers are never consulted.
 */
export const resourceMimetype = (bytes: Uint8Array, url: string): string => {
  const sniffed = sniffMimetype(bytes);
  if (sniffed !== MIMETYPE_FALLBACK) {
    return sniffed;
  }
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return sniffed;
  }
  const extension = Object.keys(EXTENSION_FALLBACKS).find((candidate) =>
    pathname.endsWith(candidate)
  );
  return extension ? EXTENSION_FALLBACKS[extension] : sniffed;
};
