/**
 * Structured errors raised by the layout and constraint parsers.
 */

/**
 * Error codes for all fatal conditions
 */
export enum LayoutErrorCode {
  // Layout input
  LAYOUT_INPUT_MISSING = 'LAYOUT_INPUT_MISSING',
  LAYOUT_NOT_PARSED = 'LAYOUT_NOT_PARSED',
  REGION_NOT_FOUND = 'REGION_NOT_FOUND',

  // Embedded constraint specs
  EMBEDDED_CONSTRAINT_UNRECOGNIZED = 'EMBEDDED_CONSTRAINT_UNRECOGNIZED',

  // Canonical constraint strings
  CONSTRAINT_PAIR_INCOMPLETE = 'CONSTRAINT_PAIR_INCOMPLETE',
  CONSTRAINT_NAME_UNKNOWN = 'CONSTRAINT_NAME_UNKNOWN',
  CONSTRAINT_VALUE_INVALID = 'CONSTRAINT_VALUE_INVALID',
  ANCHOR_VALUE_UNKNOWN = 'ANCHOR_VALUE_UNKNOWN',
  FILL_VALUE_UNKNOWN = 'FILL_VALUE_UNKNOWN',
}

/**
 * What was being parsed when the error occurred
 */
export interface LayoutErrorContext {
  /** Offending embedded token or constraint string */
  input?: string;
  /** Constraint mnemonic involved */
  name?: string;
  /** Constraint value involved */
  value?: string;
  /** Region being created or placed */
  region?: string;
  /** Offset of the offending token in the layout string */
  offset?: number;
}

export class LayoutError extends Error {
  public readonly code: LayoutErrorCode;
  public readonly context: LayoutErrorContext;

  constructor(
    code: LayoutErrorCode,
    message: string,
    options: { context?: LayoutErrorContext; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LayoutError';
    this.code = code;
    this.context = { ...options.context };

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LayoutError);
    }
  }

  /**
   * Copy of this error with extra context merged in, keeping code and message
   */
  withContext(context: LayoutErrorContext): LayoutError {
    return new LayoutError(this.code, this.message, {
      context: { ...this.context, ...context },
      cause: this,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export function isLayoutError(value: unknown): value is LayoutError {
  return value instanceof LayoutError;
}
