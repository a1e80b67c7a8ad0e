/**
 * Engine config + environment parsing tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../../common/errors.js';
import { parseEnv } from '../../../config/env.js';
import {
  DEFAULT_RISK_CONFIG,
  buildRiskConfigFromEnv,
  validateRiskConfig,
} from '../config/market_risk.config.js';

describe('validateRiskConfig', () => {
  it('should accept the defaults', () => {
    expect(validateRiskConfig(DEFAULT_RISK_CONFIG)).toEqual(DEFAULT_RISK_CONFIG);
  });

  it('should accept weights within the 0.01 tolerance', () => {
    const cfg = {
      ...DEFAULT_RISK_CONFIG,
      weights: { ...DEFAULT_RISK_CONFIG.weights, positioning: 0.105 },
    };
    expect(validateRiskConfig(cfg).weights.positioning).toBe(0.105);
  });

  it('should reject weights that do not sum to 1', () => {
    const cfg = {
      ...DEFAULT_RISK_CONFIG,
      weights: { ...DEFAULT_RISK_CONFIG.weights, recession: 0.5 },
    };
    expect(() => validateRiskConfig(cfg)).toThrow(ConfigError);
    expect(() => validateRiskConfig(cfg)).toThrow('got 1.200');
  });

  it('should reject red <= yellow', () => {
    const cfg = {
      ...DEFAULT_RISK_CONFIG,
      tiers: { yellowThreshold: 7, redThreshold: 7 },
    };
    expect(() => validateRiskConfig(cfg)).toThrow('redThreshold (7) must be greater than yellowThreshold (7)');
  });

  it('should reject negative weights and unknown dimensions', () => {
    const negative = {
      ...DEFAULT_RISK_CONFIG,
      weights: { ...DEFAULT_RISK_CONFIG.weights, credit: -0.25, recession: 0.8 },
    };
    const unknown = {
      ...DEFAULT_RISK_CONFIG,
      weights: { ...DEFAULT_RISK_CONFIG.weights, sentiment: 0 },
    };
    expect(() => validateRiskConfig(negative)).toThrow(ConfigError);
    expect(() => validateRiskConfig(unknown)).toThrow(ConfigError);
  });

  it('should carry every violation in details', () => {
    try {
      validateRiskConfig({
        ...DEFAULT_RISK_CONFIG,
        weights: { ...DEFAULT_RISK_CONFIG.weights, recession: 0.5 },
        tiers: { yellowThreshold: 8, redThreshold: 6 },
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('CONFIG_INVALID');
        expect(err.details).toHaveLength(2);
      }
    }
  });
});

describe('environment', () => {
  it('should default every setting', () => {
    const env = parseEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(8001);
    expect(env.MONGO_URL).toBeUndefined();
    expect(buildRiskConfigFromEnv(env)).toEqual(DEFAULT_RISK_CONFIG);
  });

  it('should coerce numeric strings', () => {
    const env = parseEnv({ PORT: '9000', RISK_YELLOW_THRESHOLD: '6', RISK_RAPID_CHANGE_PERIODS: '8' });
    const cfg = buildRiskConfigFromEnv(env);

    expect(env.PORT).toBe(9000);
    expect(cfg.tiers.yellowThreshold).toBe(6);
    expect(cfg.alerts.rapidChangePeriods).toBe(8);
  });

  it('should throw ConfigError on invalid values', () => {
    expect(() => parseEnv({ PORT: 'abc' })).toThrow(ConfigError);
    expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow('LOG_LEVEL');
  });

  it('should fail the engine config when env weights drift', () => {
    const env = parseEnv({ RISK_WEIGHT_CREDIT: '0.5' });
    expect(() => buildRiskConfigFromEnv(env)).toThrow(ConfigError);
  });
});
