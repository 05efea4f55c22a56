/**
 * Error type raised by the field transformer and its helpers.
 * Messages name the offending input so callers can fix it without a debugger.
 */

export type TransformerErrorCode =
  | 'INVALID_DIRECTION'
  | 'UNKNOWN_FIELD'
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_FLAG'
  | 'CONVERSION_FAILED'
  | 'CONFIGURATION_ERROR';

export interface TransformerErrorDetails {
  /** Error code for programmatic handling */
  code: TransformerErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class TransformerError extends Error {
  readonly code: TransformerErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: TransformerErrorDetails) {
    super(details.message);
    this.name = 'TransformerError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, TransformerError);
  }

  /**
   * Format the error as a short multi-line message
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

