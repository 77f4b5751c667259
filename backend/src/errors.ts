/** Base class so the entry point can tell updater failures from programming errors. */
export class UpdaterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport-level failure fetching one of the feeds (network, timeout, non-2xx). */
export class FeedFetchError extends UpdaterError {
  readonly feed: string;
  readonly url: string;

  constructor(feed: string, url: string, reason: string, options?: { cause?: unknown }) {
    super(`Downloading ${feed} feed failed: ${reason}`, options);
    this.feed = feed;
    this.url = url;
  }
}

/** Feed document or field that does not have the expected shape. */
export class DataFormatError extends UpdaterError {
  readonly sensorId: number | null;
  readonly field: string | null;

  constructor(message: string, details: { sensorId?: number; field?: string } = {}) {
    super(message);
    this.sensorId = details.sensorId ?? null;
    this.field = details.field ?? null;
  }
}

export class ConfigError extends UpdaterError {}
