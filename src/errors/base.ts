/**
 * Base error class for all faults raised by this library.
 *
 * Malformed protocol input never ends up here: it is classified into an
 * invalid message instead. These errors signal misuse of the API itself.
 */
export class JsonRpcEnvelopeError extends Error {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'JsonRpcEnvelopeError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, JsonRpcEnvelopeError.prototype);
  }

  toString(options?: { includeStack?: boolean }): string {
    let str = `${this.name}: ${this.message}`;
    for (const [key, value] of Object.entries(this.context)) {
      str += ` [${key}=${typeof value === 'string' ? value : JSON.stringify(value)}]`;
    }
    if (options?.includeStack && this.stack) {
      str += `\n${this.stack}`;
    }
    return str;
  }
}

/**
 * Thrown when a builder receives a value the type system cannot rule out,
 * such as a fractional id or error code
 */
export class ConstructionError extends JsonRpcEnvelopeError {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConstructionError';
    Object.setPrototypeOf(this, ConstructionError.prototype);
  }
}

/**
 * Error class for invalid validator configuration
 */
export class ConfigurationError extends JsonRpcEnvelopeError {
  constructor(message: string, context: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
