export type ProxyScheme = "http" | "https" | "socks";

export type ProxyCredentials = {
  username: string;
  password: string;
};

export type ProxyConfig = {
  scheme: ProxyScheme;
  host: string;
  port: number;
  credentials?: ProxyCredentials;
};

export type TransportConfig = {
  verifyTls: boolean;
  proxy?: ProxyConfig;
  timeoutMs: number;
  userAgent?: string;
};

export type TransportResponse = {
  /** Final URL after redirects. */
  url: string;
  status: number;
  statusText?: string;
  headers: Record<string, string>;
  body: Uint8Array;
};

export interface Transport {
  get(url: string, config: TransportConfig): Promise<TransportResponse>;
}
