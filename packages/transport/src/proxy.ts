import { HttpProxyAgent, HttpsProxyAgent } from "hpagent";
import { SocksProxyAgent } from "socks-proxy-agent";
import type { Agents } from "got";

import type { ProxyConfig } from "./types";

export const toProxyUrl = (proxy: ProxyConfig) => {
  const protocol = proxy.scheme === "socks" ? "socks5" : proxy.scheme;
  const auth = proxy.credentials
    ? `${encodeURIComponent(proxy.credentials.username)}:${encodeURIComponent(
        proxy.credentials.password
      )}@`
    : "";
  return `${protocol}://${auth}${proxy.host}:${proxy.port}`;
};

export const createProxyAgents = (proxy: ProxyConfig, verifyTls: boolean): Agents => {
  const proxyUrl = toProxyUrl(proxy);
  if (proxy.scheme === "socks") {
    const agent = new SocksProxyAgent(proxyUrl, { keepAlive: true });
    return { http: agent, https: agent };
  }
  return {
    http: new HttpProxyAgent({ proxy: proxyUrl, keepAlive: true }),
    https: new HttpsProxyAgent({
      proxy: proxyUrl,
      keepAlive: true,
      rejectUnauthorized: verifyTls
    })
  };
};
