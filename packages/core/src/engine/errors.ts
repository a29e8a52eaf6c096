/**
 * Raised when the enforcement engine fails while answering a query.
 * A `false` answer is a denial, not an error.
 */
export class EnforcementError extends Error {
  readonly statusCode = 500;

  constructor(
    message: string,
    public readonly subject: string,
    public readonly object: string,
    public readonly action: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'EnforcementError';
    Object.setPrototypeOf(this, EnforcementError.prototype);
  }
}
