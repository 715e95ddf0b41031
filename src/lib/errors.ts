export class ScrapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScrapeError";
  }
}

/** Network failure, timeout, or non-2xx response. */
export class FetchError extends ScrapeError {
  constructor(
    public readonly url: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

export class TableNotFoundError extends ScrapeError {
  constructor(public readonly selector: string) {
    super(`No element matches ${selector}`);
    this.name = "TableNotFoundError";
  }
}

/** Table was found but its header cannot be used as column names. */
export class TableParseError extends ScrapeError {
  constructor(message: string) {
    super(message);
    this.name = "TableParseError";
  }
}

export class WriteError extends ScrapeError {
  constructor(
    public readonly destination: string,
    options?: { cause?: unknown }
  ) {
    const reason =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Failed to write ${destination}: ${reason}`, options);
    this.name = "WriteError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
