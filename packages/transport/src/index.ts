import got, { RequestError, type Agents } from "got";

import { createProxyAgents, toProxyUrl } from "./proxy";
import type { Transport, TransportConfig, TransportResponse } from "./types";

export type {
  ProxyConfig,
  ProxyCredentials,
  ProxyScheme,
  Transport,
  TransportConfig,
  TransportResponse
} from "./types";
export { toProxyUrl } from "./proxy";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const normalizeHeaders = (headers: Record<string, string | string[] | undefined>) => {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[key.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return normalized;
};

export const describeTransportError = (error: unknown) => {
  if (error instanceof RequestError) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

/**
 * Creates a got-backed transport. Proxy agents are created lazily and
 * reused for every request sharing the same proxy and TLS settings.
 */
export const createGotTransport = (): Transport => {
  const agentCache = new Map<string, Agents>();

  const agentsFor = (config: TransportConfig): Agents => {
    if (!config.proxy) {
      return {};
    }
    const key = `${toProxyUrl(config.proxy)}|${config.verifyTls}`;
    const cached = agentCache.get(key);
    if (cached) {
      return cached;
    }
    const agents = createProxyAgents(config.proxy, config.verifyTls);
    agentCache.set(key, agents);
    return agents;
  };

  return {
    async get(url: string, config: TransportConfig): Promise<TransportResponse> {
      const response = await got(url, {
        headers: {
          "user-agent": config.userAgent ?? DEFAULT_USER_AGENT,
          accept: "*/*"
        },
        agent: agentsFor(config),
        https: { rejectUnauthorized: config.verifyTls },
        followRedirect: true,
        throwHttpErrors: false,
        retry: { limit: 0 },
        timeout: { request: config.timeoutMs },
        responseType: "buffer"
      });

      return {
        url: response.url,
        status: response.statusCode,
        statusText: response.statusMessage,
        headers: normalizeHeaders(response.headers),
        body: new Uint8Array(response.body)
      };
    }
  };
};
