import { describe, expect, it } from 'vitest';
import { CredentialContext } from '../src/lib/credentials.js';
import { InvalidCredentialsError } from '../src/lib/errors.js';
import { TWITTER_WEB_BEARER } from '../src/lib/twitter-client-constants.js';

describe('CredentialContext', () => {
  it('derives cookie and csrf headers from the two tokens', () => {
    const context = new CredentialContext('test-auth-token', 'test-csrf-token');
    const headers = context.headers();

    expect(headers.cookie).toBe('auth_token=test-auth-token; ct0=test-csrf-token');
    expect(headers['x-csrf-token']).toBe('test-csrf-token');
    expect(headers.authorization).toBe(TWITTER_WEB_BEARER);
    expect(headers['x-twitter-auth-type']).toBe('OAuth2Session');
    expect(headers.origin).toBe('https://x.com');
  });

  it('trims surrounding whitespace', () => {
    const context = CredentialContext.fromCookies({ authToken: '  test-auth-token\n', ct0: 'test-csrf-token ' });
    expect(context.authToken).toBe('test-auth-token');
    expect(context.csrfToken).toBe('test-csrf-token');
  });

  it('returns a fresh header object on every call', () => {
    const context = new CredentialContext('test-auth-token', 'test-csrf-token');
    const first = context.headers();
    first['x-extra'] = 'leak';
    expect(context.headers()['x-extra']).toBeUndefined();
  });

  it('is frozen after construction', () => {
    const context = new CredentialContext('test-auth-token', 'test-csrf-token');
    expect(Object.isFrozen(context)).toBe(true);
  });

  it('uses a custom user agent when given', () => {
    const context = new CredentialContext('test-auth-token', 'test-csrf-token', { userAgent: 'test-agent' });
    expect(context.headers()['user-agent']).toBe('test-agent');
  });

  it('rejects empty tokens', () => {
    expect(() => new CredentialContext('   ', 'test-csrf-token')).toThrow(InvalidCredentialsError);
    expect(() => new CredentialContext('test-auth-token', '')).toThrow('ct0 is empty');
  });

  it('rejects tokens that are too short', () => {
    expect(() => new CredentialContext('short', 'test-csrf-token')).toThrow(
      'auth_token must be between 8 and 512 characters',
    );
  });

  it('rejects characters that cannot appear in a cookie value', () => {
    expect(() => new CredentialContext('test auth token', 'test-csrf-token')).toThrow(
      'auth_token contains characters that cannot appear in a cookie value',
    );
    expect(() => new CredentialContext('test-auth-token', 'test;csrf=token')).toThrow(InvalidCredentialsError);
  });
});
