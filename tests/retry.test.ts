import { describe, expect, it, vi } from 'vitest';
import {
  AuthError,
  NetworkError,
  OperationCancelledError,
  OperationFailedError,
  RateLimitError,
  ServerError,
  TwitterClientError,
} from '../src/lib/errors.js';
import { silentLogger } from '../src/lib/logger.js';
import { calculateDelay, RetryGovernor, type RetryPolicy } from '../src/lib/retry.js';
import { recordingLogger } from './helpers.js';

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 };

function makeGovernor(overrides: Partial<RetryPolicy> = {}, logger = silentLogger) {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const governor = new RetryGovernor({ ...policy, ...overrides }, { logger, random: () => 0.5, sleep });
  return { governor, sleep };
}

describe('calculateDelay', () => {
  it('keeps equal jitter inside [exp/2, exp]', () => {
    expect(calculateDelay(0, policy, () => 0)).toBe(50);
    expect(calculateDelay(0, policy, () => 0.999)).toBe(100);
    expect(calculateDelay(2, policy, () => 0.5)).toBe(300);
  });

  it('caps growth at maxDelayMs', () => {
    expect(calculateDelay(10, policy, () => 0)).toBe(500);
    expect(calculateDelay(10, policy, () => 0.5)).toBe(750);
  });
});

describe('RetryGovernor', () => {
  it('retries rate limits and server errors with growing delays', async () => {
    const { governor, sleep } = makeGovernor({ maxAttempts: 4 });
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitError('HTTP 429'))
      .mockRejectedValueOnce(new ServerError('HTTP 503'))
      .mockResolvedValueOnce('done');

    await expect(governor.run(operation, { name: 'Followers' })).resolves.toBe('done');

    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([75, 150]);
  });

  it('honours a server retry hint over the computed backoff', async () => {
    const { governor, sleep } = makeGovernor();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitError('HTTP 429', { retryAfterMs: 5000 }))
      .mockResolvedValueOnce('ok');

    await governor.run(operation, { name: 'Op' });

    expect(sleep).toHaveBeenCalledWith(5000, undefined);
  });

  it('does not retry terminal errors', async () => {
    const { governor, sleep } = makeGovernor();
    const operation = vi.fn(async () => {
      throw new AuthError('HTTP 401');
    });

    await expect(governor.run(operation, { name: 'Op' })).rejects.toBeInstanceOf(AuthError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('wraps the last retryable error once attempts run out', async () => {
    const { logger, entries } = recordingLogger();
    const { governor, sleep } = makeGovernor({}, logger);
    const operation = vi.fn(async () => {
      throw new NetworkError('Network error: fetch failed');
    });

    const error = await governor.run(operation, { name: 'CreateTweet' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OperationFailedError);
    expect(error instanceof OperationFailedError && error.message).toBe(
      'CreateTweet failed after 3 attempts: Network error: fetch failed',
    );
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(entries.filter((entry) => entry.event === 'retry_attempt')).toHaveLength(2);
    expect(entries.at(-1)?.event).toBe('max_attempts_exceeded');
  });

  it('makes exactly one attempt when maxAttempts is 1', async () => {
    const { governor } = makeGovernor({ maxAttempts: 1 });
    const operation = vi.fn(async () => {
      throw new ServerError('HTTP 500');
    });

    await expect(governor.run(operation, { name: 'Op' })).rejects.toBeInstanceOf(OperationFailedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('classifies unexpected exceptions as terminal', async () => {
    const { governor } = makeGovernor();
    const operation = vi.fn(async () => {
      throw new RangeError('broken');
    });

    const error = await governor.run(operation, { name: 'Op' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TwitterClientError);
    expect(error instanceof Error && error.message).toBe('broken');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('stops before the next attempt once the signal is aborted', async () => {
    const controller = new AbortController();
    const { governor } = makeGovernor();
    const operation = vi.fn(async () => {
      controller.abort();
      throw new ServerError('HTTP 502');
    });

    await expect(governor.run(operation, { name: 'Op', signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('clamps maxAttempts to at least one', () => {
    const { governor } = makeGovernor({ maxAttempts: 0 });
    expect(governor.policy.maxAttempts).toBe(1);
  });
});
