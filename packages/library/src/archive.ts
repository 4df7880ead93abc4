import {
  createGotTransport,
  describeTransportError,
  type Transport,
  type TransportConfig,
  type TransportResponse
} from "@web-archive/transport";

import { discoverReferences } from "./discover";
import { RootFetchFailedError } from "./errors";
import { fetchAll } from "./fetcher";
import { getDefaultLogger, type Logger } from "./logger";
import { resolveArchiveOptions, toTransportConfig, type ArchiveOptions } from "./options";
import { PageArchive } from "./page-archive";
import type { ArchiveFailure, FetchMode, Page, Reference } from "./types";
import { charsetOf, decodeText } from "./utils";

export type ArchiveRuntime = {
  transport?: Transport;
  logger?: Logger;
};

const fetchPage = async (
  url: string,
  transport: Transport,
  config: TransportConfig
): Promise<Page> => {
  let rootUrl: URL;
  try {
    rootUrl = new URL(url);
  } catch (error) {
    throw new RootFetchFailedError(url, "invalid URL", { cause: error });
  }
  if (rootUrl.protocol !== "http:" && rootUrl.protocol !== "https:") {
    throw new RootFetchFailedError(url, `unsupported protocol ${rootUrl.protocol}`);
  }

  const href = rootUrl.toString();
  let response: TransportResponse;
  try {
    response = await transport.get(href, config);
  } catch (error) {
    throw new RootFetchFailedError(href, describeTransportError(error), { cause: error });
  }
  if (response.status < 200 || response.status >= 300) {
    const statusText = response.statusText ? ` ${response.statusText}` : "";
    throw new RootFetchFailedError(href, `HTTP ${response.status}${statusText}`, {
      status: response.status
    });
  }

  return {
    url: response.url || href,
    html: decodeText(response.body, charsetOf(response.headers["content-type"]))
  };
};

const runArchive = async (
  url: string,
  options: ArchiveOptions | undefined,
  runtime: ArchiveRuntime | undefined,
  mode: FetchMode
) => {
  const resolved = resolveArchiveOptions(options);
  const logger = runtime?.logger ?? getDefaultLogger();
  const context = {
    transport: runtime?.transport ?? createGotTransport(),
    config: toTransportConfig(resolved),
    logger
  };

  const page = await fetchPage(url, context.transport, context.config);
  const discovered = discoverReferences(page.html, "html", page.url);
  const failures: ArchiveFailure[] = [...discovered.failures];
  const resources = await fetchAll({
    ...context,
    urls: discovered.references.map((reference) => reference.resolvedUrl),
    mode
  });

  // One level only: references found inside stylesheets are fetched but never scanned.
  const stylesheetReferences = new Map<string, Reference[]>();
  for (const reference of discovered.references) {
    const resource = resources.get(reference.resolvedUrl);
    if (
      reference.kind !== "stylesheet" ||
      resource?.status !== "fetched" ||
      stylesheetReferences.has(resource.url)
    ) {
      continue;
    }
    const nested = discoverReferences(decodeText(resource.bytes), "css", resource.url);
    stylesheetReferences.set(resource.url, nested.references);
    failures.push(...nested.failures);
  }

  const nestedUrls = [...stylesheetReferences.values()]
    .flat()
    .map((reference) => reference.resolvedUrl)
    .filter((resourceUrl) => !resources.has(resourceUrl));
  for (const [resourceUrl, resource] of await fetchAll({ ...context, urls: nestedUrls, mode })) {
    resources.set(resourceUrl, resource);
  }

  for (const resource of resources.values()) {
    if (resource.status === "failed") {
      failures.push({ url: resource.url, reason: resource.reason, kind: "resource-fetch-failed" });
    }
  }

  logger.info(
    { url: page.url, mode, resources: resources.size, failures: failures.length },
    "archived page"
  );

  return new PageArchive({
    page,
    references: discovered.references,
    stylesheetReferences,
    resources,
    failures,
    failedPlaceholder: resolved.failedPlaceholder
  });
};

/**
 * Fetches `url` and every resource it references, all resources of a wave
 * in parallel. Rejects with `RootFetchFailedError` or
 * `UnsupportedOptionError`; any other failure is recorded on the archive.
 */
export const archive = (url: string, options?: ArchiveOptions, runtime?: ArchiveRuntime) =>
  runArchive(url, options, runtime, "concurrent");

/** Same as `archive`, but waits for each fetch to finish before starting the next. */
export const blockingArchive = (url: string, options?: ArchiveOptions, runtime?: ArchiveRuntime) =>
  runArchive(url, options, runtime, "sequential");
