export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(resource: string, id?: string) {
    super(id ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Raised by the store when an allocate/release races another writer:
 * the asset's allocation state moved on since the caller's snapshot.
 */
export class ConflictError extends Error {
  public statusCode = 409;
  public currentVersion?: number;
  public expectedVersion?: number;

  constructor(message: string, currentVersion?: number, expectedVersion?: number) {
    super(message);
    this.name = 'ConflictError';
    this.currentVersion = currentVersion;
    this.expectedVersion = expectedVersion;
  }
}
