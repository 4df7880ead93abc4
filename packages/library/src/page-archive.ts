import { embedDocument, embedStylesheet } from "./embed";
import type { ArchiveFailure, Page, Reference, Resource, ResourceMap } from "./types";

type PageArchiveInit = {
  page: Page;
  references: Reference[];
  /** Each fetched stylesheet's own references, keyed by its resolved URL. */
  stylesheetReferences: Map<string, Reference[]>;
  resources: ResourceMap;
  failures: ArchiveFailure[];
  failedPlaceholder?: string;
};

/**
 * A fetched page with every resource it needs. Nothing here performs I/O:
 * `embedResources` can be called any number of times.
 */
export class PageArchive {
  readonly page: Page;
  private readonly pageReferences: Reference[];
  private readonly stylesheetReferences: Map<string, Reference[]>;
  private readonly resourceMap: ResourceMap;
  private readonly failureList: ArchiveFailure[];
  private readonly failedPlaceholder?: string;
  private embedded?: string;

  constructor(init: PageArchiveInit) {
    this.page = init.page;
    this.pageReferences = init.references;
    this.stylesheetReferences = init.stylesheetReferences;
    this.resourceMap = init.resources;
    this.failureList = init.failures;
    this.failedPlaceholder = init.failedPlaceholder;
  }

  references(): Reference[] {
    return [...this.pageReferences];
  }

  resources(): ReadonlyMap<string, Resource> {
    return this.resourceMap;
  }

  failures(): ArchiveFailure[] {
    return [...this.failureList];
  }

  embedResources(): string {
    if (this.embedded !== undefined) {
      return this.embedded;
    }

    const context = {
      resources: this.resourceMap,
      failedPlaceholder: this.failedPlaceholder
    };
    const stylesheets = new Map<string, string>();
    for (const [url, references] of this.stylesheetReferences) {
      const resource = this.resourceMap.get(url);
      if (resource?.status === "fetched") {
        stylesheets.set(url, embedStylesheet(resource, references, context));
      }
    }

    this.embedded = embedDocument(this.page.html, this.pageReferences, {
      ...context,
      stylesheets
    });
    return this.embedded;
  }
}
