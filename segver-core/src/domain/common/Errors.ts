/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * A caller passed a value the operation cannot accept (blank version, empty list, ...).
 */
export class InvalidArgumentError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, details);
  }
}

/**
 * Configuration error.
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}
