// ABOUTME: In-process tweet scheduling on timers; nothing survives the process.
// ABOUTME: Each handle settles exactly once: posted, failed or cancelled.

import { randomUUID } from 'node:crypto';
import { OperationCancelledError } from './errors.js';
import type { Logger } from './logger.js';
import type { PostTweetOptions, TweetData } from './twitter-client-types.js';

// setTimeout overflows past 2^31-1 ms (~24.8 days); longer waits are chained.
const MAX_TIMER_MS = 2 ** 31 - 1;

export type ScheduledTweetStatus = 'pending' | 'posting' | 'posted' | 'failed' | 'cancelled';

export interface ScheduledTweetHandle {
  readonly id: string;
  readonly text: string;
  readonly at: Date;
  readonly status: ScheduledTweetStatus;
  /** Resolves with the posted tweet; rejects when posting fails or the handle is cancelled. */
  readonly result: Promise<TweetData>;
  /** False once posting has started. */
  cancel(): boolean;
}

export interface TweetSchedulerOptions {
  logger: Logger;
  now?: () => number;
}

export type ScheduledPostOptions = Omit<PostTweetOptions, 'signal'>;

export type PostFunction = (text: string, options: ScheduledPostOptions) => Promise<TweetData>;

class ScheduledTweet implements ScheduledTweetHandle {
  readonly id = randomUUID();
  readonly result: Promise<TweetData>;
  status: ScheduledTweetStatus = 'pending';
  timer: NodeJS.Timeout | undefined;
  private resolveResult: (tweet: TweetData) => void = () => undefined;
  private rejectResult: (error: Error) => void = () => undefined;

  constructor(
    readonly text: string,
    readonly at: Date,
    readonly options: ScheduledPostOptions,
    private readonly onCancel: (handle: ScheduledTweet) => void,
  ) {
    this.result = new Promise<TweetData>((resolve, reject) => {
      this.resolveResult = resolve;
      this.rejectResult = reject;
    });
  }

  cancel(): boolean {
    if (this.status !== 'pending') {
      return false;
    }
    this.settle('cancelled');
    clearTimeout(this.timer);
    this.rejectResult(new OperationCancelledError(`Scheduled tweet ${this.id} was cancelled`));
    this.onCancel(this);
    return true;
  }

  settle(status: ScheduledTweetStatus, outcome?: { tweet?: TweetData; error?: Error }): void {
    this.status = status;
    if (outcome?.tweet) {
      this.resolveResult(outcome.tweet);
    } else if (outcome?.error) {
      this.rejectResult(outcome.error);
    }
  }
}

export class TweetScheduler {
  private readonly handles = new Map<string, ScheduledTweet>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly post: PostFunction,
    options: TweetSchedulerOptions,
  ) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  schedule(text: string, at: Date, options: ScheduledPostOptions = {}): ScheduledTweetHandle {
    const handle = new ScheduledTweet(text, at, options, (cancelled) => {
      this.handles.delete(cancelled.id);
      this.logger.info('scheduler', 'scheduled_tweet_cancelled', { id: cancelled.id });
    });
    // Failures are reported here so a caller that never reads `result` sees no unhandled rejection.
    handle.result.catch((error: unknown) => {
      if (error instanceof OperationCancelledError) {
        return;
      }
      const failure = error instanceof Error ? error : new Error(String(error));
      this.logger.error('scheduler', 'scheduled_tweet_failed', failure, { id: handle.id });
    });

    this.handles.set(handle.id, handle);
    this.arm(handle);
    this.logger.info('scheduler', 'tweet_scheduled', { id: handle.id, at: at.toISOString() });
    return handle;
  }

  pending(): ScheduledTweetHandle[] {
    return [...this.handles.values()].filter((handle) => handle.status === 'pending');
  }

  /** Cancel every pending handle; returns how many were cancelled. */
  cancelAll(): number {
    let cancelled = 0;
    for (const handle of [...this.handles.values()]) {
      if (handle.cancel()) {
        cancelled += 1;
      }
    }
    return cancelled;
  }

  private arm(handle: ScheduledTweet): void {
    const remaining = handle.at.getTime() - this.now();
    if (remaining > MAX_TIMER_MS) {
      handle.timer = setTimeout(() => this.arm(handle), MAX_TIMER_MS);
      return;
    }
    handle.timer = setTimeout(() => {
      void this.fire(handle);
    }, Math.max(0, remaining));
  }

  private async fire(handle: ScheduledTweet): Promise<void> {
    if (handle.status !== 'pending') {
      return;
    }
    handle.status = 'posting';
    try {
      const tweet = await this.post(handle.text, handle.options);
      handle.settle('posted', { tweet });
      this.logger.info('scheduler', 'scheduled_tweet_posted', { id: handle.id, tweetId: tweet.id });
    } catch (error) {
      handle.settle('failed', { error: error instanceof Error ? error : new Error(String(error)) });
    } finally {
      this.handles.delete(handle.id);
    }
  }
}
