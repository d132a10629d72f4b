/**
 * Base error class for every error raised by the repository layer.
 * Carries a stable error code, the phase the error belongs to, and
 * structured details describing the offending declaration or value.
 */
export class RepositoryError extends Error {
  /**
   * Stable error code (e.g., 'ConfigurationError', 'UnsupportedOperation')
   */
  public readonly code: string;

  /**
   * Repository method the error was raised for, if any
   */
  public readonly methodName?: string;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    code: string;
    message: string;
    methodName?: string;
    details?: Record<string, unknown>;
  }) {
    super(options.message);
    this.name = 'RepositoryError';
    this.code = options.code;
    this.methodName = options.methodName;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    let result = `[${this.code}] ${this.message}`;
    if (this.methodName) {
      result += ` (method ${this.methodName})`;
    }
    return result;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      methodName: this.methodName,
      details: this.details,
    };
  }
}
