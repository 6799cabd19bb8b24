/**
 * Custom Application Errors
 * Domain-specific error classes for the bot's conversation and download flow.
 */

import { Messages } from "./messages.js";

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or invalid process configuration. Fatal at startup.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message);
  }
}

/**
 * User input that cannot be accepted (e.g. a link without an http(s) scheme).
 * The message is shown to the user as is.
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message);
  }
}

/**
 * A format was chosen but the session no longer holds the link it belongs to.
 */
export class LostContextError extends AppError {
  constructor() {
    super(Messages.lostContext);
  }
}

/**
 * Media download failure. `message` is the human-readable cause shown to the user.
 */
export class FetchError extends AppError {
  constructor(cause: string, originalError?: unknown) {
    super(cause);
    if (originalError instanceof Error && originalError.stack) {
      this.stack = originalError.stack;
    }
  }
}
