// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/** Job or search parameters rejected before any work is scheduled. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  constructor(
    message: string,
    public readonly entityId?: number | string,
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** The relational source or the search engine could not be reached. */
export class SourceUnavailableError extends Error {
  constructor(
    message: string,
    public readonly source: 'mysql' | 'elasticsearch',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

/** One item failed to denormalize or write; counted, never fatal to a batch job. */
export class ItemIndexError extends Error {
  constructor(
    message: string,
    public readonly publicationId: number,
  ) {
    super(message);
    this.name = 'ItemIndexError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
