/**
 * Base Error Class
 *
 * Foundation for all cache-subsystem errors.
 */

export interface CacheErrorOptions {
  cause?: Error;
  isOperational?: boolean;
  context?: Record<string, unknown>;
}

export class CacheError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(code: string, message: string, options: CacheErrorOptions = {}) {
    super(message);
    this.name = 'CacheError';
    this.code = code;
    this.isOperational = options.isOperational ?? true;
    this.timestamp = new Date();
    this.context = options.context;

    if (options.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

export function isCacheError(error: unknown): error is CacheError {
  return error instanceof CacheError;
}
