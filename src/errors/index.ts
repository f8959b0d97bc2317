export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class AuthenticationError extends Error {
  constructor(
    message: string,
    public status?: number,
  ) {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class TraktError extends Error {
  constructor(
    message: string,
    public status?: number,
    public endpoint?: string,
  ) {
    super(message);
    this.name = "TraktError";
  }
}

/** A history item that could not be turned into a usable entry. */
export class MalformedEntryError extends Error {
  constructor(
    message: string,
    public index: number,
    public entryId?: number,
  ) {
    super(message);
    this.name = "MalformedEntryError";
  }
}

/** Errors that end the whole run instead of a single media type. */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof ConfigurationError || error instanceof AuthenticationError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
