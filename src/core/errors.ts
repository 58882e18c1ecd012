/**
 * Base error class for all application errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Error thrown when an image or a stored mask cannot be decoded.
 * The error message includes the format name for easy identification.
 */
export class DecoderError extends AppError {
  constructor(format: string, detail: string) {
    super(`[${format}] ${detail}`, 'DECODER_ERROR');
    this.name = 'DecoderError';
  }
}

/**
 * Error thrown when a mask or the completion ledger cannot be written or read.
 * Persistence failures are never swallowed: they end the session.
 */
export class PersistenceError extends AppError {
  constructor(
    detail: string,
    public readonly path?: string
  ) {
    super(path ? `${detail}: ${path}` : detail, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
  }
}

/**
 * Error thrown when a session operation is used in an invalid state
 * (e.g., dispatching input while no image is open).
 */
export class SessionError extends AppError {
  constructor(detail: string) {
    super(detail, 'SESSION_ERROR');
    this.name = 'SessionError';
  }
}

/**
 * Error thrown when invalid arguments or input are passed in
 * (e.g., malformed input event, non-positive zoom factor, bad CLI option).
 */
export class ValidationError extends AppError {
  constructor(detail: string) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the input event stream fails before it ends normally
 * (e.g., a read error on the replay file or stdin).
 */
export class InputError extends AppError {
  constructor(detail: string) {
    super(detail, 'INPUT_ERROR');
    this.name = 'InputError';
  }
}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
