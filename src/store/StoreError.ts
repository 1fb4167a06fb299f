export type StoreErrorCode = 'not_found' | 'invalid_record';

/**
 * Record store failure with a machine-readable code.
 */
export class StoreError extends Error {
  public readonly code: StoreErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: StoreErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StoreError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreError);
    }
  }
}
