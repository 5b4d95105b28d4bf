/**
 * Base class for the failures a sync run knows how to report.
 */
export class SyncError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed configuration. Always fatal. */
export class ConfigError extends SyncError {
}

export class DirectoryError extends SyncError {
  readonly group?: string;

  constructor(message: string, options?: ErrorOptions & { group?: string }) {
    super(message, options);
    this.group = options?.group;
  }
}

export interface ApiErrorDetails extends ErrorOptions {
  method?: string;
  url?: string;
  status?: number;
}

/**
 * A failed call to the hosting service, or a team it does not know about.
 */
export class ApiError extends SyncError {
  readonly method?: string;
  readonly url?: string;
  readonly status?: number;

  constructor(message: string, details: ApiErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.method = details.method;
    this.url = details.url;
    this.status = details.status;
  }
}
