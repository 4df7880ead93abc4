import type { ProxyConfig, ProxyScheme, TransportConfig } from "@web-archive/transport";

import { UnsupportedOptionError } from "./errors";

export type ArchiveOptions = {
  /** Reject invalid or mismatched TLS certificates. Default: `true`. */
  verifyTls?: boolean;
  proxy?: ProxyConfig;
  /** Per-request timeout. Default: 30 seconds. */
  timeoutMs?: number;
  userAgent?: string;
  /** Written in place of references whose fetch failed. Unset keeps them as they were. */
  failedPlaceholder?: string;
};

export type ResolvedArchiveOptions = {
  verifyTls: boolean;
  proxy?: ProxyConfig;
  timeoutMs: number;
  userAgent?: string;
  failedPlaceholder?: string;
};

export const DEFAULT_TIMEOUT_MS = 30_000;

const OPTION_KEYS = ["verifyTls", "proxy", "timeoutMs", "userAgent", "failedPlaceholder"];
const PROXY_KEYS = ["scheme", "host", "port", "credentials"];
const CREDENTIAL_KEYS = ["username", "password"];
const PROXY_SCHEMES: ProxyScheme[] = ["http", "https", "socks"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isProxyScheme = (value: unknown): value is ProxyScheme =>
  PROXY_SCHEMES.some((scheme) => scheme === value);

const rejectUnknownKeys = (input: Record<string, unknown>, allowed: string[], prefix = "") => {
  for (const key of Object.keys(input)) {
    if (!allowed.includes(key)) {
      throw new UnsupportedOptionError(`${prefix}${key}`);
    }
  }
};

const optionalString = (input: Record<string, unknown>, key: string, prefix = "") => {
  const value = input[key];
  if (value === undefined || typeof value === "string") {
    return value;
  }
  throw new UnsupportedOptionError(`${prefix}${key}`, "must be a string");
};

const optionalBoolean = (input: Record<string, unknown>, key: string) => {
  const value = input[key];
  if (value === undefined || typeof value === "boolean") {
    return value;
  }
  throw new UnsupportedOptionError(key, "must be a boolean");
};

const optionalTimeout = (input: Record<string, unknown>, key: string) => {
  const value = input[key];
  if (value === undefined) {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return value;
  }
  throw new UnsupportedOptionError(key, "must be a positive number");
};

const parseProxy = (value: unknown): ProxyConfig => {
  if (!isRecord(value)) {
    throw new UnsupportedOptionError("proxy", "must be an object");
  }
  rejectUnknownKeys(value, PROXY_KEYS, "proxy.");

  const { scheme, host, port, credentials } = value;
  if (!isProxyScheme(scheme)) {
    throw new UnsupportedOptionError("proxy.scheme", `must be one of ${PROXY_SCHEMES.join(", ")}`);
  }
  if (typeof host !== "string" || !host) {
    throw new UnsupportedOptionError("proxy.host", "must be a non-empty string");
  }
  if (typeof port !== "number" || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new UnsupportedOptionError("proxy.port", "must be an integer between 1 and 65535");
  }

  const proxy: ProxyConfig = { scheme, host, port };
  if (credentials !== undefined) {
    if (!isRecord(credentials)) {
      throw new UnsupportedOptionError("proxy.credentials", "must be an object");
    }
    rejectUnknownKeys(credentials, CREDENTIAL_KEYS, "proxy.credentials.");
    const username = optionalString(credentials, "username", "proxy.credentials.");
    const password = optionalString(credentials, "password", "proxy.credentials.");
    proxy.credentials = { username: username ?? "", password: password ?? "" };
  }
  return proxy;
};

/**
 * Validates caller-supplied options and fills in defaults. Unknown keys and
 * ill-typed values throw `UnsupportedOptionError` instead of being ignored.
 */
export const resolveArchiveOptions = (input: unknown = {}): ResolvedArchiveOptions => {
  if (!isRecord(input)) {
    throw new UnsupportedOptionError("options", "must be an object");
  }
  rejectUnknownKeys(input, OPTION_KEYS);

  return {
    verifyTls: optionalBoolean(input, "verifyTls") ?? true,
    proxy: input.proxy === undefined ? undefined : parseProxy(input.proxy),
    timeoutMs: optionalTimeout(input, "timeoutMs") ?? DEFAULT_TIMEOUT_MS,
    userAgent: optionalString(input, "userAgent"),
    failedPlaceholder: optionalString(input, "failedPlaceholder")
  };
};

export const toTransportConfig = (options: ResolvedArchiveOptions): TransportConfig => ({
  verifyTls: options.verifyTls,
  proxy: options.proxy,
  timeoutMs: options.timeoutMs,
  userAgent: options.userAgent
});
