// Path: src/utils/error.ts
// Error handling utilities - consolidate common error extraction patterns

/**
 * Error codes raised by the resolver. Anything carrying one of these is fatal
 * to the run unless a failure policy says otherwise.
 */
export type ResolverErrorCode =
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_UNREADABLE'
  | 'COMMAND_FAILED'
  | 'COMMAND_TIMEOUT'
  | 'OUTPUT_WRITE_FAILED'
  | 'INVALID_CONFIG';

/**
 * Extract error message from unknown error type.
 * Safely handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Read the `code` property Node attaches to system errors (ENOENT, EACCES, ...).
 */
export function getErrnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Standardized error with code and metadata.
 */
export class ResolverError extends Error {
  readonly code: ResolverErrorCode;
  readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    code: ResolverErrorCode,
    options?: {
      cause?: Error;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'ResolverError';
    this.code = code;
    this.metadata = options?.metadata;

    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

export function isResolverError(err: unknown): err is ResolverError {
  return err instanceof ResolverError;
}

/**
 * Wrap an unknown error into a ResolverError.
 * An error that already is a ResolverError is returned unchanged.
 */
export function wrapError(
  err: unknown,
  code: ResolverErrorCode,
  metadata?: Record<string, unknown>
): ResolverError {
  if (isResolverError(err)) {
    return err;
  }
  const message = extractErrorMessage(err);
  const cause = err instanceof Error ? err : undefined;

  return new ResolverError(message, code, { cause, metadata });
}
