export class ArchiveFetcherError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The archive location could not be listed. Eviction for it is suspended. */
export class ListingError extends ArchiveFetcherError {
  constructor(
    readonly location: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to list archive location ${location}`, options);
  }
}

/** A bundle could not be read or its documents could not be written. */
export class IngestionError extends ArchiveFetcherError {
  constructor(
    readonly jobId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MalformedArchiveError extends IngestionError {}

/** Invalid settings. Raised at construction or startup, never mid-cycle. */
export class ConfigurationError extends ArchiveFetcherError {}

/** Best-effort cleanup failed. Logged, never propagated. */
export class HousekeepingError extends ArchiveFetcherError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
