import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig, configFromEnv } from '../../core/config';
import { ErrorCode } from '../../core/errors';
import { captureError } from '../utilities/captureError';

describe('EngineConfig', () => {
  describe('DEFAULT_CONFIG', () => {
    it('should carry the documented defaults', () => {
      expect(DEFAULT_CONFIG).toEqual({
        alpha: 0.05,
        maxIterations: 10000,
        quantileTolerance: 1e-12,
        quantileMaxIterations: 200,
        noncentralMaxIterations: 1000,
        noncentralTolerance: 1e-12,
        sampleSizeMaxIterations: 200,
        mannWhitneyExactThreshold: 20,
      });
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    });
  });

  describe('resolveConfig', () => {
    it('should return the defaults without overrides', () => {
      expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should merge overrides onto the defaults', () => {
      const config = resolveConfig({ alpha: 0.01, maxIterations: 500 });
      expect(config.alpha).toBe(0.01);
      expect(config.maxIterations).toBe(500);
      expect(config.quantileTolerance).toBe(DEFAULT_CONFIG.quantileTolerance);
    });

    it('should reject alpha outside (0, 1)', () => {
      const error = captureError(() => resolveConfig({ alpha: 1.5 }));
      expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
      expect(error.message).toBe('Invalid engine configuration');
    });

    it('should reject non-integer iteration caps', () => {
      const error = captureError(() => resolveConfig({ noncentralMaxIterations: 2.5 }));
      expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
      expect(error.context?.issues).toEqual([
        'noncentralMaxIterations: Expected integer, received float',
      ]);
    });

    it('should cap the exact Mann-Whitney threshold', () => {
      expect(resolveConfig({ mannWhitneyExactThreshold: 50 }).mannWhitneyExactThreshold).toBe(50);
      const error = captureError(() => resolveConfig({ mannWhitneyExactThreshold: 51 }));
      expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
    });
  });

  describe('configFromEnv', () => {
    it('should return no overrides for an empty environment', () => {
      expect(configFromEnv({})).toEqual({});
    });

    it('should read the recognised variables', () => {
      expect(
        configFromEnv({
          HYPOTHESIS_ALPHA: '0.01',
          HYPOTHESIS_MAX_ITERATIONS: '5000',
          HYPOTHESIS_EXACT_THRESHOLD: '10',
          UNRELATED: 'ignored',
        })
      ).toEqual({ alpha: 0.01, maxIterations: 5000, mannWhitneyExactThreshold: 10 });
    });

    it('should treat blank variables as unset', () => {
      expect(configFromEnv({ HYPOTHESIS_ALPHA: '', HYPOTHESIS_EXACT_THRESHOLD: '  ' })).toEqual({});
    });

    it('should reject a non-numeric value', () => {
      const error = captureError(() => configFromEnv({ HYPOTHESIS_ALPHA: 'high' }));
      expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    });
  });
});
