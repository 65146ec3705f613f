/**
 * Error types for recipe lookup
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all recipe lookup errors
 */
export abstract class RecipeFindError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when options are combined in a way that is not allowed
 */
export class UsageError extends RecipeFindError {
  readonly code = "E_USAGE";
}

/**
 * Thrown when a regex or glob pattern cannot be compiled
 */
export class PatternCompileError extends RecipeFindError {
  readonly code = "E_PATTERN";

  constructor(
    public readonly pattern: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid pattern "${pattern}": ${reason}`, options);
  }
}

/**
 * Thrown when recipe metadata cannot be loaded or a scope cannot be resolved
 */
export class MetadataUnavailableError extends RecipeFindError {
  readonly code = "E_METADATA";
}
