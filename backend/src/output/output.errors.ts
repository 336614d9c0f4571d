/**
 * Raised when the output files could not be published. The previous
 * outputs, if any, are left in place.
 */
export class OutputWriteError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(originalError ? `${message}: ${originalError.message}` : message);
    this.name = 'OutputWriteError';
  }
}
