/**
 * Reconciliation Error Types
 *
 * Only problems with the run as a whole are errors. Unreadable cells and
 * unmatched names are recorded on the affected result instead.
 */

export type ReconciliationErrorCode =
  | 'INVALID_OPTIONS'
  | 'INVALID_COLUMN'
  | 'COLUMN_OUT_OF_RANGE';

export interface ReconciliationErrorDetails {
  code: ReconciliationErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ReconciliationError extends Error {
  readonly code: ReconciliationErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReconciliationErrorDetails) {
    super(details.message);
    this.name = 'ReconciliationError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for terminal output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
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
