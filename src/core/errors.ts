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
 * Error thrown when invalid arguments are passed to a pipeline function
 * (e.g., a degenerate remap range, non-positive frame dimensions,
 * non-finite tonemap parameters).
 */
export class ValidationError extends AppError {
  constructor(detail: string) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when synthesizing or encoding a frame fails.
 */
export class RenderError extends AppError {
  constructor(detail: string) {
    super(detail, 'RENDER_ERROR');
    this.name = 'RenderError';
  }
}

/**
 * Error thrown when writing a rendered frame to disk fails
 * (e.g., permission denied, disk full).
 */
export class SaveError extends AppError {
  constructor(path: string, detail: string) {
    super(`Failed to save ${path}: ${detail}`, 'SAVE_ERROR');
    this.name = 'SaveError';
  }
}

/**
 * Normalize an unknown thrown value into an AppError, keeping AppError
 * instances untouched and wrapping everything else with the given factory.
 */
export function toAppError(err: unknown, wrap: (detail: string) => AppError): AppError {
  if (err instanceof AppError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return wrap(detail);
}
