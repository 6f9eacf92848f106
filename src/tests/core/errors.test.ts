import { describe, it, expect } from 'vitest';
import { HypothesisError, ErrorCode, isHypothesisError, wrapError } from '../../core/errors';
import { tTest } from '../../hypothesis/parametric';
import { captureError } from '../utilities/captureError';

describe('HypothesisError', () => {
  it('should carry a code, a message and optional context', () => {
    const bare = new HypothesisError(ErrorCode.CONVERGENCE_FAILURE, 'Quantile search stalled');
    const withContext = new HypothesisError(ErrorCode.INSUFFICIENT_DATA, 'sample2 is too short', {
      sample: 'sample2',
      actualCount: 1,
    });

    expect(bare).toBeInstanceOf(Error);
    expect(bare.name).toBe('HypothesisError');
    expect(bare.code).toBe(ErrorCode.CONVERGENCE_FAILURE);
    expect(bare.message).toBe('Quantile search stalled');
    expect(bare.context).toBeUndefined();
    expect(withContext.context).toEqual({ sample: 'sample2', actualCount: 1 });
  });

  it('should keep a stack that names the error class', () => {
    expect(new HypothesisError(ErrorCode.INTERNAL_ERROR, 'x').stack).toContain('HypothesisError');
  });

  it('should be what the tests throw for bad data', () => {
    const error = captureError(() => tTest([3], [4, 5]));
    expect(isHypothesisError(error)).toBe(true);
    expect(error.is(ErrorCode.INSUFFICIENT_DATA)).toBe(true);
  });

  describe('toString', () => {
    it('should print the code and message', () => {
      expect(new HypothesisError(ErrorCode.INVALID_INPUT, 'Not a number').toString()).toBe(
        'HypothesisError [INVALID_INPUT]: Not a number'
      );
    });

    it('should append the context as JSON', () => {
      const error = new HypothesisError(ErrorCode.DEGENERATE_TABLE, 'Empty row', {
        emptyRow: 0,
        emptyColumn: null,
      });

      expect(error.toString()).toBe(
        'HypothesisError [DEGENERATE_TABLE]: Empty row Context: {"emptyRow":0,"emptyColumn":null}'
      );
    });
  });

  it('should match its own code', () => {
    const error = new HypothesisError(ErrorCode.DEGENERATE_TABLE, 'Empty column');
    expect(error.is(ErrorCode.DEGENERATE_TABLE)).toBe(true);
    expect(error.is(ErrorCode.INVALID_PARAMETER)).toBe(false);
  });
});

describe('isHypothesisError', () => {
  it('should reject plain errors and look-alikes', () => {
    expect(isHypothesisError(new Error('plain'))).toBe(false);
    expect(isHypothesisError({ name: 'HypothesisError', code: 'INVALID_INPUT' })).toBe(false);
    expect(isHypothesisError(null)).toBe(false);
    expect(isHypothesisError('INVALID_INPUT')).toBe(false);
  });
});

describe('wrapError', () => {
  it('should pass a HypothesisError through', () => {
    const original = new HypothesisError(ErrorCode.INVALID_PARAMETER, 'df must be positive');
    expect(wrapError(original)).toBe(original);
  });

  it('should wrap an Error as INTERNAL_ERROR, keeping its stack', () => {
    const original = new TypeError('Cannot read properties of undefined');
    const wrapped = wrapError(original);

    expect(wrapped.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('Cannot read properties of undefined');
    expect(wrapped.context).toEqual({ originalStack: original.stack });
  });

  it('should stringify thrown non-errors', () => {
    const wrapped = wrapError(42);

    expect(wrapped.message).toBe('42');
    expect(wrapped.context).toEqual({ originalError: 42 });
  });

  it('should take a code for the wrapped error', () => {
    const wrapped = wrapError(new SyntaxError('Unexpected token'), ErrorCode.INVALID_INPUT);
    expect(wrapped.code).toBe(ErrorCode.INVALID_INPUT);
  });
});
