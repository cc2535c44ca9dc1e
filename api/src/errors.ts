/**
 * Raised when a source table is missing, lacks a required column, or has a row
 * that cannot be joined at all. Loading stops; nothing partial is cached.
 */
export class SourceSchemaError extends Error {
  readonly statusCode = 503;
  readonly code = 'SOURCE_UNAVAILABLE';

  constructor(
    readonly table: string,
    readonly column: string | null,
    message: string,
  ) {
    super(message);
    this.name = 'SourceSchemaError';
  }
}

export class SourceUnavailableError extends Error {
  readonly statusCode = 503;
  readonly code = 'SOURCE_UNAVAILABLE';

  constructor(
    readonly location: string,
    options?: { cause?: unknown },
  ) {
    super(`Source database ${location} could not be opened`, options);
    this.name = 'SourceUnavailableError';
  }
}

export function isSourceError(error: unknown): error is SourceSchemaError | SourceUnavailableError {
  return error instanceof SourceSchemaError || error instanceof SourceUnavailableError;
}
