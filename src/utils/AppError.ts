/**
 * Machine-readable failure categories surfaced in batch outcomes
 */
export type ErrorCode = 'MALFORMED_RECORD' | 'INVALID_CONFIG' | 'RENDER_ERROR' | 'INTERNAL';

/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: ErrorCode, isOperational = true) {
    super(message);
    this.code = code;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static malformedRecord(message: string): AppError {
    return new AppError(message, 'MALFORMED_RECORD');
  }

  static invalidConfig(message: string): AppError {
    return new AppError(message, 'INVALID_CONFIG');
  }

  static render(message = 'Scene could not be rendered'): AppError {
    return new AppError(message, 'RENDER_ERROR');
  }

  static internal(message = 'Internal error'): AppError {
    return new AppError(message, 'INTERNAL', false);
  }

  /**
   * Wraps anything thrown by a collaborator into an AppError of the given code.
   */
  static from(error: unknown, code: ErrorCode): AppError {
    if (error instanceof AppError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new AppError(message, code, code !== 'INTERNAL');
  }
}

export default AppError;
