/**
 * Base error for everything the service raises on purpose.
 * Controllers translate it into a 400; anything else bubbles to Nest.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly cause?: unknown;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.cause = cause;
  }
}
