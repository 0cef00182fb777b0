/**
 * Base error class for all operator errors.
 */
export class OperatorError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OperatorError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * A create lost the race against another writer. Callers re-read and adopt
 * the existing object.
 */
export class AlreadyExistsError extends OperatorError {
  public readonly kind: string;
  public readonly objectName: string;

  constructor(kind: string, objectName: string, options?: { cause?: unknown }) {
    super(`${kind} ${objectName} already exists`, 'ALREADY_EXISTS', false, options);
    this.name = 'AlreadyExistsError';
    this.kind = kind;
    this.objectName = objectName;
  }
}

/**
 * Any object store failure other than not-found or already-exists.
 * Conflicts, throttling, server errors and transport failures are retryable.
 */
export class StoreError extends OperatorError {
  public readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, 'STORE_ERROR', isRetryableStatus(statusCode), options);
    this.name = 'StoreError';
    this.statusCode = statusCode;
  }
}

/**
 * A resource or configuration value failed schema validation.
 */
export class ValidationError extends OperatorError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(message, 'INVALID_SPEC', false, options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

function isRetryableStatus(statusCode: number | undefined): boolean {
  if (statusCode === undefined) return true;
  return statusCode === 409 || statusCode === 429 || statusCode >= 500;
}
