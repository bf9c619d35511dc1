/**
 * Error type for grid sources
 * Every message carries a suggested next step for the user
 */

export type SourceErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'UNSUPPORTED_FORMAT'
  | 'SHEET_NOT_FOUND'
  | 'NOT_CONNECTED';

export interface SourceErrorDetails {
  /** Error code for programmatic handling */
  code: SourceErrorCode;
  /** Human-readable message */
  message: string;
  /** Source ID that raised the error */
  sourceId?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class SourceError extends Error {
  readonly code: SourceErrorCode;
  readonly sourceId?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SourceErrorDetails) {
    super(details.message);
    this.name = 'SourceError';
    this.code = details.code;
    this.sourceId = details.sourceId;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace(this, SourceError);
  }

  /**
   * Format error for terminal output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.sourceId) {
      parts.push(`Source: ${this.sourceId}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  /**
   * Convert to JSON for structured logs
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      sourceId: this.sourceId,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
