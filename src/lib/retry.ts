/**
 * Rate & retry governor: the one place that decides what is safe to retry.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  isRetryable,
  OperationCancelledError,
  OperationFailedError,
  RateLimitError,
  TwitterClientError,
} from './errors.js';
import type { Logger } from './logger.js';

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Base delay in milliseconds */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (caps exponential growth, not server hints) */
  maxDelayMs: number;
}

export interface RetryState {
  attempt: number;
  elapsedDelayMs: number;
  lastError?: TwitterClientError;
}

export interface GovernorOptions {
  logger: Logger;
  /** Returns a value in [0, 1). */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Delay before the retry following `attempt` (0-based).
 * Equal jitter keeps each delay inside [exp/2, exp), so delays grow strictly until the cap.
 */
export function calculateDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exp = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  return Math.round(exp / 2 + random() * (exp / 2));
}

export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new OperationCancelledError('Operation cancelled while waiting to retry', { cause: error });
    }
    throw error;
  }
}

function toClassified(error: unknown): TwitterClientError {
  if (error instanceof TwitterClientError) {
    return error;
  }
  // Anything unclassified is a bug in a lower layer; surface it as terminal.
  const message = error instanceof Error ? error.message : String(error);
  return new TwitterClientError(message, { cause: error });
}

export class RetryGovernor {
  readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(policy: RetryPolicy, options: GovernorOptions) {
    this.policy = { ...policy, maxAttempts: Math.max(1, Math.floor(policy.maxAttempts)) };
    this.logger = options.logger;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? abortableSleep;
  }

  delayFor(attempt: number, error: TwitterClientError): number {
    if (error instanceof RateLimitError && error.retryAfterMs !== null) {
      return error.retryAfterMs;
    }
    return calculateDelay(attempt, this.policy, this.random);
  }

  /**
   * Run one logical operation. `operation` receives the 0-based attempt number
   * and must throw already-classified errors.
   */
  async run<T>(
    operation: (attempt: number) => Promise<T>,
    options: { name: string; signal?: AbortSignal },
  ): Promise<T> {
    const { name, signal } = options;
    const state: RetryState = { attempt: 0, elapsedDelayMs: 0 };

    for (; state.attempt < this.policy.maxAttempts; state.attempt++) {
      if (signal?.aborted) {
        throw new OperationCancelledError(`${name} cancelled`);
      }

      try {
        return await operation(state.attempt);
      } catch (error) {
        const classified = toClassified(error);
        state.lastError = classified;

        if (!isRetryable(classified)) {
          throw classified;
        }

        const attemptsRemaining = this.policy.maxAttempts - state.attempt - 1;
        if (attemptsRemaining === 0) {
          break;
        }

        const delayMs = this.delayFor(state.attempt, classified);
        this.logger.warn('retry', 'retry_attempt', {
          operation: name,
          attempt: state.attempt + 1,
          maxAttempts: this.policy.maxAttempts,
          attemptsRemaining,
          delayMs,
          error: classified.name,
          message: classified.message,
        });

        await this.sleep(delayMs, signal);
        state.elapsedDelayMs += delayMs;
      }
    }

    const lastError = state.lastError ?? new TwitterClientError(`${name} made no attempts`);
    this.logger.error('retry', 'max_attempts_exceeded', lastError, {
      operation: name,
      totalAttempts: this.policy.maxAttempts,
      elapsedDelayMs: state.elapsedDelayMs,
    });
    throw new OperationFailedError(name, this.policy.maxAttempts, lastError);
  }
}
