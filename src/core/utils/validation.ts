/**
 * Parameter checks shared by the distributions and the power module.
 * Each throws INVALID_PARAMETER naming the offending argument; nothing
 * is clamped.
 */

import { HypothesisError, ErrorCode } from '../errors';

export function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new HypothesisError(ErrorCode.INVALID_PARAMETER, `${name} must be a finite number`, {
      [name]: value,
    });
  }
}

/**
 * Degrees of freedom and other scale-like parameters: finite and > 0
 */
export function requirePositive(name: string, value: number): void {
  requireFinite(name, value);
  if (value <= 0) {
    throw new HypothesisError(ErrorCode.INVALID_PARAMETER, `${name} must be positive`, {
      [name]: value,
    });
  }
}

/**
 * Probabilities for quantile functions: 0 <= p <= 1
 */
export function requireProbability(name: string, value: number): void {
  requireFinite(name, value);
  if (value < 0 || value > 1) {
    throw new HypothesisError(ErrorCode.INVALID_PARAMETER, `${name} must lie in [0, 1]`, {
      [name]: value,
    });
  }
}

/**
 * Significance levels and target powers: 0 < p < 1
 */
export function requireOpenUnitInterval(name: string, value: number): void {
  requireFinite(name, value);
  if (value <= 0 || value >= 1) {
    throw new HypothesisError(ErrorCode.INVALID_PARAMETER, `${name} must lie strictly between 0 and 1`, {
      [name]: value,
    });
  }
}
