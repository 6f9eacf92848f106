/**
 * Errors raised by the hypothesis engine
 *
 * Callers branch on `code`; `context` holds the offending values.
 */

export enum ErrorCode {
  // Distribution parameters and numerical routines
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  CONVERGENCE_FAILURE = 'CONVERGENCE_FAILURE',

  // Samples and contingency tables
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
  DEGENERATE_TABLE = 'DEGENERATE_TABLE',

  // Text that could not be parsed into numbers
  INVALID_INPUT = 'INVALID_INPUT',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * @example
 * ```typescript
 * throw new HypothesisError(
 *   ErrorCode.INSUFFICIENT_DATA,
 *   'Each sample needs at least 2 observations',
 *   { sample: 'sample1', actualCount: 1, minimumRequired: 2 }
 * );
 * ```
 */
export class HypothesisError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HypothesisError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HypothesisError);
    }
  }

  /**
   * `HypothesisError [CODE]: message`, followed by the context as JSON when present
   */
  override toString(): string {
    const parts = [`${this.name} [${this.code}]: ${this.message}`];
    if (this.context) parts.push(`Context: ${JSON.stringify(this.context)}`);
    return parts.join(' ');
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }
}

export function isHypothesisError(error: unknown): error is HypothesisError {
  return error instanceof HypothesisError;
}

/**
 * Turn anything caught into a HypothesisError. Engine errors pass through
 * unchanged; an Error keeps its stack in the context.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): HypothesisError {
  if (isHypothesisError(error)) return error;

  if (error instanceof Error) {
    return new HypothesisError(code, error.message, { originalStack: error.stack });
  }
  return new HypothesisError(code, String(error), { originalError: error });
}
