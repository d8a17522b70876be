export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
  }
}

export function notFound(message = 'not found'): HttpError {
  return new HttpError(404, message);
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, message, details);
}

/** The backing store could not be opened or its table could not be created. */
export class StorageUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}

/** The ingestion source is missing, unreadable, or has the wrong header. */
export class SourceReadError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceReadError';
    this.source = source;
  }
}

/** A record failed required-field validation. */
export class ConstraintViolationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConstraintViolationError';
    this.issues = issues;
  }
}

type PgDatabaseError = Error & { code: string; detail?: string };

export function isPgError(error: unknown): error is PgDatabaseError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
