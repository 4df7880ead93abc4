export class ArchiveError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The root document could not be fetched; no partial archive exists. */
export class RootFetchFailedError extends ArchiveError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, reason: string, options?: ErrorOptions & { status?: number }) {
    super(`Failed to fetch ${url}: ${reason}`, options);
    this.url = url;
    this.status = options?.status;
  }
}

export class UnsupportedOptionError extends ArchiveError {
  readonly option: string;

  constructor(option: string, reason = "is not a recognized option") {
    super(`Archive option "${option}" ${reason}`);
    this.option = option;
  }
}
