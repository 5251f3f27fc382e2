/**
 * Error codes raised by the matcher and its loaders
 */
export type AppErrorCode = 'INVALID_CONFIG' | 'INVALID_INPUT' | 'NOT_FOUND' | 'INTERNAL';

/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly exitCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: AppErrorCode, exitCode = 1, isOperational = true) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.exitCode = exitCode;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static invalidConfig(message: string): AppError {
    return new AppError(message, 'INVALID_CONFIG', 2);
  }

  static invalidInput(message: string): AppError {
    return new AppError(message, 'INVALID_INPUT', 3);
  }

  static notFound(message = 'File not found'): AppError {
    return new AppError(message, 'NOT_FOUND', 4);
  }

  static internal(message = 'Internal error'): AppError {
    return new AppError(message, 'INTERNAL', 1, false);
  }
}

export default AppError;
