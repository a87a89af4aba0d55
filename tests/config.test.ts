import { describe, expect, it } from 'vitest';
import { loadConfig, maskSecrets, validateConfig } from '../src/lib/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      credentials: { authToken: undefined, ct0: undefined },
      request: { timeoutMs: 30_000, maxAttempts: 3, baseDelayMs: 1_000, maxDelayMs: 30_000 },
      logging: { level: 'warn' },
    });
    expect(validateConfig(config)).toEqual({ valid: true, errors: [] });
  });

  it('reads credentials and request settings from the environment', () => {
    const config = loadConfig({
      AUTH_TOKEN: ' test-auth-token ',
      CT0: 'test-csrf-token',
      TWEETWRIGHT_TIMEOUT_MS: '5000',
      TWEETWRIGHT_MAX_ATTEMPTS: '5',
      TWEETWRIGHT_BASE_DELAY_MS: '200',
      TWEETWRIGHT_MAX_DELAY_MS: '4000',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.credentials).toEqual({ authToken: 'test-auth-token', ct0: 'test-csrf-token' });
    expect(config.request).toEqual({ timeoutMs: 5000, maxAttempts: 5, baseDelayMs: 200, maxDelayMs: 4000 });
    expect(config.logging.level).toBe('debug');
    expect(validateConfig(config, { requireCredentials: true }).valid).toBe(true);
  });

  it('falls back to warn for an unknown log level', () => {
    expect(loadConfig({ LOG_LEVEL: 'loud' }).logging.level).toBe('warn');
  });
});

describe('validateConfig', () => {
  it('requires credentials only when asked', () => {
    const config = loadConfig({ CT0: '   ' });
    expect(validateConfig(config).valid).toBe(true);
    expect(validateConfig(config, { requireCredentials: true }).errors).toEqual([
      'AUTH_TOKEN is required',
      'CT0 is required',
    ]);
  });

  it('reports every invalid request setting', () => {
    const config = loadConfig({
      TWEETWRIGHT_TIMEOUT_MS: 'abc',
      TWEETWRIGHT_MAX_ATTEMPTS: '11',
      TWEETWRIGHT_BASE_DELAY_MS: '-1',
      TWEETWRIGHT_MAX_DELAY_MS: '1.5',
    });

    expect(validateConfig(config)).toEqual({
      valid: false,
      errors: [
        'TWEETWRIGHT_TIMEOUT_MS must be a positive integer',
        'TWEETWRIGHT_MAX_ATTEMPTS must be between 1 and 10',
        'TWEETWRIGHT_BASE_DELAY_MS must be a non-negative integer',
        'TWEETWRIGHT_MAX_DELAY_MS must be an integer no smaller than the base delay',
      ],
    });
  });

  it('rejects a max delay below the base delay', () => {
    const config = loadConfig({ TWEETWRIGHT_BASE_DELAY_MS: '5000', TWEETWRIGHT_MAX_DELAY_MS: '1000' });
    expect(validateConfig(config).errors).toEqual([
      'TWEETWRIGHT_MAX_DELAY_MS must be an integer no smaller than the base delay',
    ]);
  });
});

describe('maskSecrets', () => {
  it('keeps only the last four characters of each token', () => {
    const masked = maskSecrets(loadConfig({ AUTH_TOKEN: 'test-auth-token', CT0: 'test-csrf-token' }));
    expect(masked.credentials).toEqual({ authToken: '***oken', ct0: '***oken' });
  });
});
