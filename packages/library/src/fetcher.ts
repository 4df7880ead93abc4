import {
  describeTransportError,
  type Transport,
  type TransportConfig
} from "@web-archive/transport";

import type { Logger } from "./logger";
import { resourceMimetype } from "./mimetype";
import type { FetchMode, Resource, ResourceMap } from "./types";

type FetchContext = {
  transport: Transport;
  config: TransportConfig;
  logger: Logger;
};

type FetchAllInput = FetchContext & {
  urls: Iterable<string>;
  mode: FetchMode;
};

const isSuccessStatus = (status: number) => status >= 200 && status < 300;

/** Fetches one URL. Every failure is returned as a `failed` resource, never thrown. */
export const fetchResource = async (url: string, context: FetchContext): Promise<Resource> => {
  const { transport, config, logger } = context;
  logger.debug({ url }, "fetching resource");

  let reason: string;
  try {
    const response = await transport.get(url, config);
    if (isSuccessStatus(response.status)) {
      return {
        status: "fetched",
        url,
        bytes: response.body,
        mimetype: resourceMimetype(response.body, url)
      };
    }
    const statusText = response.statusText ? ` ${response.statusText}` : "";
    reason = `HTTP ${response.status}${statusText}`;
  } catch (error) {
    reason = describeTransportError(error);
  }

  logger.warn({ url, reason }, "resource fetch failed");
  return { status: "failed", url, reason };
};

/**
 * Fetches each distinct URL once. The returned map follows the order of
 * first appearance in `urls`, whichever mode completes first.
 */
export const fetchAll = async (input: FetchAllInput): Promise<ResourceMap> => {
  const { urls, mode, ...context } = input;
  const unique = [...new Set(urls)];

  let resources: Resource[];
  if (mode === "concurrent") {
    resources = await Promise.all(unique.map((url) => fetchResource(url, context)));
  } else {
    resources = [];
    for (const url of unique) {
      resources.push(await fetchResource(url, context));
    }
  }

  return new Map<string, Resource>(resources.map((resource) => [resource.url, resource]));
};
