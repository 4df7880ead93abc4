export const bytesToBase64 = (bytes: Uint8Array) =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");

const CHARSET_PARAMETER = /;\s*charset\s*=\s*"?([^";\s]+)"?/i;

export const charsetOf = (contentType: string | undefined) =>
  contentType ? CHARSET_PARAMETER.exec(contentType)?.[1] : undefined;

const createDecoder = (charset: string) => {
  try {
    return new TextDecoder(charset);
  } catch (error) {
    // Unknown labels throw a RangeError; anything else is unexpected.
    if (error instanceof RangeError) {
      return new TextDecoder("utf-8");
    }
    throw error;
  }
};

// Invalid sequences decode to U+FFFD; a leading BOM is dropped.
export const decodeText = (bytes: Uint8Array, charset = "utf-8") =>
  createDecoder(charset).decode(bytes);

export const encodeText = (text: string) => new TextEncoder().encode(text);
