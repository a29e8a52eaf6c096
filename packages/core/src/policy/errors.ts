/**
 * Policy parsing errors
 */
export class PolicyParseError extends Error {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>,
    public readonly source?: string,
  ) {
    super(message);
    this.name = 'PolicyParseError';
    Object.setPrototypeOf(this, PolicyParseError.prototype);
  }
}
