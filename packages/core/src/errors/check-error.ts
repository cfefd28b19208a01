/**
 * Check Error Types
 *
 * Errors raised while loading rules or reconciling matches.
 */

export type CheckErrorCode =
  | 'RESOURCE_LOAD_FAILED'
  | 'BITEXT_RULES_LOAD_FAILED'
  | 'DUPLICATE_RULE'
  | 'UNKNOWN_RULE'
  | 'INVALID_MATCH'
  | 'INVALID_OPTIONS'
  | 'SENTENCE_ALIGNMENT_FAILED'
  | 'READER_FAILED'
  | 'UNKNOWN';

export interface CheckErrorDetails {
  /** Error code for programmatic handling */
  code: CheckErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class CheckError extends Error {
  readonly code: CheckErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: CheckErrorDetails) {
    super(details.message);
    this.name = 'CheckError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, CheckError);
  }

  /**
   * Format error as a short report for the command line
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.cause instanceof Error) {
      parts.push(`Caused by: ${this.cause.message}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as CheckError
 */
export function wrapError(
  error: unknown,
  defaultCode: CheckErrorCode = 'UNKNOWN',
  context?: Record<string, unknown>
): CheckError {
  if (error instanceof CheckError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new CheckError({
    code: defaultCode,
    message,
    cause,
    context,
  });
}
