/**
 * Record Store Errors
 *
 * Load and update failures carry a `reason` discriminant so callers can
 * branch without matching on message text.
 */

export type LoadErrorReason = 'NotFound' | 'MalformedSchema';

export type UpdateErrorReason = 'NotFound' | 'InvalidTransition' | 'AmbiguousKey';

/**
 * Raised when a dataset cannot be turned into a record store
 */
export class LoadError extends Error {
  /** Why the load failed */
  readonly reason: LoadErrorReason;
  /** Where the data was read from (file path or label) */
  readonly source: string;
  /** Missing columns or per-row problems */
  readonly details: string[];

  constructor(reason: LoadErrorReason, source: string, message: string, details: string[] = []) {
    super(message);
    this.name = 'LoadError';
    this.reason = reason;
    this.source = source;
    this.details = details;
  }
}

/**
 * Raised (or returned) when a status mutation is rejected
 */
export class UpdateError extends Error {
  readonly reason: UpdateErrorReason;
  readonly licenseNo: string;

  constructor(reason: UpdateErrorReason, licenseNo: string, message: string) {
    super(message);
    this.name = 'UpdateError';
    this.reason = reason;
    this.licenseNo = licenseNo;
  }
}

export function isLoadError(error: unknown): error is LoadError {
  return error instanceof LoadError;
}
