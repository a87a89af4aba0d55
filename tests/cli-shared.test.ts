import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createCliContext, createClientOrExit, detectMime } from '../src/cli/shared.js';
import { ServerError } from '../src/lib/errors.js';
import { jsonResponse, mockFetch } from './helpers.js';

const credentials = { AUTH_TOKEN: 'test-auth-token', CT0: 'test-csrf-token', LOG_LEVEL: 'silent' };

describe('cli shared', () => {
  const originalHome = process.env.HOME;
  let tempHome: string;

  beforeEach(() => {
    tempHome = mkdtempSync(join(tmpdir(), 'tweetwright-home-'));
    process.env.HOME = tempHome;
  });

  afterEach(() => {
    process.env.HOME = originalHome;
    rmSync(tempHome, { recursive: true, force: true });
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('prefers --auth-token/--ct0 over the environment', async () => {
    const ctx = createCliContext([], { AUTH_TOKEN: 'env-auth-token', CT0: 'env-csrf-token' });
    const resolved = await ctx.resolveCredentialsFromOptions({ authToken: 'flag-auth-token', ct0: 'flag-csrf-token' });

    expect(resolved).toEqual({
      cookies: { authToken: 'flag-auth-token', ct0: 'flag-csrf-token', source: 'flags' },
      warnings: [],
    });
  });

  it('falls back to the environment when only one flag is given', async () => {
    const ctx = createCliContext([], { AUTH_TOKEN: 'env-auth-token', CT0: 'env-csrf-token' });
    const resolved = await ctx.resolveCredentialsFromOptions({ authToken: 'flag-auth-token' });

    expect(resolved.cookies).toEqual({ authToken: 'env-auth-token', ct0: 'env-csrf-token', source: 'env' });
    expect(resolved.warnings).toEqual(['Both --auth-token and --ct0 are needed; falling back to AUTH_TOKEN/CT0']);
  });

  it('reports missing credentials', async () => {
    const ctx = createCliContext([], {});
    const resolved = await ctx.resolveCredentialsFromOptions({});

    expect(resolved.cookies).toEqual({ authToken: null, ct0: null, source: null });
    expect(resolved.warnings).toHaveLength(1);
  });

  it('uses timeout and attempts from the config file when no flag is set', () => {
    const configDir = join(tempHome, '.config', 'tweetwright');
    mkdirSync(configDir, { recursive: true });
    writeFileSync(join(configDir, 'config.json5'), '{ timeoutMs: 5000, maxAttempts: 2, /* comment */ }', 'utf8');

    const ctx = createCliContext([], { TWEETWRIGHT_TIMEOUT_MS: '9000' });

    expect(ctx.config).toEqual({ timeoutMs: 5000, maxAttempts: 2 });
    expect(ctx.resolveTimeoutFromOptions({})).toBe(5000);
    expect(ctx.resolveTimeoutFromOptions({ timeout: '1500' })).toBe(1500);
    expect(ctx.resolveMaxAttemptsFromOptions({})).toBe(2);
  });

  it('falls back to the environment for the timeout', () => {
    const ctx = createCliContext([], { TWEETWRIGHT_TIMEOUT_MS: '9000' });
    expect(ctx.resolveTimeoutFromOptions({ timeout: 'soon' })).toBe(9000);
    expect(ctx.resolveMaxAttemptsFromOptions({})).toBeUndefined();
  });

  it('refuses to build a client from an invalid environment', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
    const ctx = createCliContext(['--plain'], { ...credentials, TWEETWRIGHT_TIMEOUT_MS: 'abc' });

    expect(ctx.configErrors).toEqual(['TWEETWRIGHT_TIMEOUT_MS must be a positive integer']);
    await expect(createClientOrExit(ctx, {})).rejects.toThrow('exit 1');
    expect(errorSpy.mock.calls.map((call) => String(call[0]))).toEqual([
      '[err] Configuration invalid: TWEETWRIGHT_TIMEOUT_MS must be a positive integer',
    ]);
  });

  it('passes the retry settings from the environment to the client', async () => {
    const fetchMock = mockFetch(
      jsonResponse({ errors: [{ message: 'Over capacity' }] }, { status: 503 }),
      jsonResponse({ errors: [{ message: 'Over capacity' }] }, { status: 503 }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const ctx = createCliContext([], {
      ...credentials,
      TWEETWRIGHT_MAX_ATTEMPTS: '2',
      TWEETWRIGHT_BASE_DELAY_MS: '0',
      TWEETWRIGHT_MAX_DELAY_MS: '0',
    });

    const client = await createClientOrExit(ctx, {});

    await expect(client.getTweet('1')).rejects.toBeInstanceOf(ServerError);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('plain argv switches prefixes to text', () => {
    const ctx = createCliContext(['--plain'], {});
    expect(ctx.p('ok')).toBe('[ok] ');
    expect(ctx.l('schedule')).toBe('scheduled: ');
  });

  it('extracts tweet ids from status URLs', () => {
    const ctx = createCliContext([], {});
    expect(ctx.extractTweetId('https://x.com/someone/status/12345')).toBe('12345');
  });

  it('rejects mixing a video with other media', () => {
    const dir = mkdtempSync(join(tmpdir(), 'tweetwright-media-'));
    try {
      writeFileSync(join(dir, 'clip.mp4'), 'not really a video');
      writeFileSync(join(dir, 'pic.png'), 'not really an image');
      const ctx = createCliContext([], {});

      expect(() => ctx.loadMedia({ media: [join(dir, 'clip.mp4'), join(dir, 'pic.png')], alts: [] })).toThrow(
        'Video cannot be combined with other media',
      );
      const [single] = ctx.loadMedia({ media: [join(dir, 'pic.png')], alts: ['a picture'] });
      expect(single?.mime).toBe('image/png');
      expect(single?.alt).toBe('a picture');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('detectMime', () => {
  it('maps known extensions', () => {
    expect(detectMime('photo.JPG')).toBe('image/jpeg');
    expect(detectMime('clip.mov')).toBe('video/quicktime');
    expect(detectMime('notes.txt')).toBeNull();
  });
});
