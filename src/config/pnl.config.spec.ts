import { ConfigValidationError, DEFAULT_PNL_CONFIG, validatePnlConfig } from './pnl.config';

describe('validatePnlConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(validatePnlConfig({})).toEqual(DEFAULT_PNL_CONFIG);
  });

  it('should coerce string values', () => {
    const config = validatePnlConfig({
      PORT: '8080',
      PNL_PRICE_TOLERANCE: '0.05',
      PNL_QUOTE_CURRENCY: 'EUR',
      PNL_VERBOSE: 'true',
      NODE_ENV: 'test',
    });

    expect(config).toEqual({
      nodeEnv: 'test',
      port: 8080,
      priceTolerance: 0.05,
      quoteCurrency: 'EUR',
      verbose: true,
    });
  });

  it('should reject a tolerance above 1', () => {
    expect(() => validatePnlConfig({ PNL_PRICE_TOLERANCE: '1.5' })).toThrow(ConfigValidationError);
    expect(() => validatePnlConfig({ PNL_PRICE_TOLERANCE: '1.5' })).toThrow('PNL_PRICE_TOLERANCE');
  });

  it('should reject a negative tolerance', () => {
    expect(() => validatePnlConfig({ PNL_PRICE_TOLERANCE: '-0.1' })).toThrow(ConfigValidationError);
  });

  it('should list every failing variable', () => {
    let caught: unknown;
    try {
      validatePnlConfig({ PNL_VERBOSE: 'yes', NODE_ENV: 'staging' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.name).toBe('ConfigValidationError');
      expect(caught.issues.map((issue) => issue.path.join('.')).sort()).toEqual(['NODE_ENV', 'PNL_VERBOSE']);
      expect(caught.message).toContain('Configuration validation failed');
    }
  });
});
