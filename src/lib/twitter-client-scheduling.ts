import { ValidationError } from './errors.js';
import { type ScheduledPostOptions, type ScheduledTweetHandle, TweetScheduler } from './scheduler.js';
import { validateTweetText } from './tweet-text.js';
import { type AbstractConstructor, type Mixin, parseTweetId, type TwitterClientBase } from './twitter-client-base.js';
import type { TwitterClientPostingMethods } from './twitter-client-posting.js';

export interface TwitterClientSchedulingMethods {
  scheduleTweet(text: string, at: Date | string | number, options?: ScheduledPostOptions): ScheduledTweetHandle;
  scheduledTweets(): ScheduledTweetHandle[];
  cancelScheduledTweets(): number;
}

function toDate(at: Date | string | number): Date {
  const date = at instanceof Date ? new Date(at.getTime()) : new Date(at);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid schedule time: ${String(at)}`);
  }
  return date;
}

export function withScheduling<TBase extends AbstractConstructor<TwitterClientBase & TwitterClientPostingMethods>>(
  Base: TBase,
): Mixin<TBase, TwitterClientSchedulingMethods> {
  abstract class TwitterClientScheduling extends Base {
    private readonly scheduler = new TweetScheduler((text, options) => this.postTweet(text, options), {
      logger: this.logger,
      now: this.now,
    });

    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Post `text` at `at` from this process. Everything postTweet would reject
     * locally is rejected now, not when the timer fires.
     */
    scheduleTweet(text: string, at: Date | string | number, options: ScheduledPostOptions = {}): ScheduledTweetHandle {
      validateTweetText(text, { hasMedia: (options.mediaIds ?? []).length > 0 });
      if (options.replyTo) {
        parseTweetId(options.replyTo);
      }
      if (options.quoteTweetId) {
        parseTweetId(options.quoteTweetId);
      }
      const when = toDate(at);
      if (when.getTime() <= this.now()) {
        throw new ValidationError(`Scheduled time ${when.toISOString()} is not in the future`);
      }
      return this.scheduler.schedule(text, when, options);
    }

    scheduledTweets(): ScheduledTweetHandle[] {
      return this.scheduler.pending();
    }

    cancelScheduledTweets(): number {
      return this.scheduler.cancelAll();
    }
  }

  return TwitterClientScheduling;
}
