/** Raised when the database cannot be opened. */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/** Raised when the tables cannot be created. */
export class SchemaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SchemaError';
  }
}

/** Returned (never thrown) when a vacancy insert fails. */
export class WriteError extends Error {
  readonly record: unknown;

  constructor(message: string, record: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WriteError';
    this.record = record;
  }
}

export class ReadError extends Error {
  readonly query: string;

  constructor(query: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Query ${query} failed: ${reason}`, options);
    this.name = 'ReadError';
    this.query = query;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
