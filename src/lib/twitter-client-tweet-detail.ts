import { NotFoundError } from './errors.js';
import { readNonEmptyString, readPath } from './json.js';
import { type AbstractConstructor, type Mixin, parseTweetId, type TwitterClientBase } from './twitter-client-base.js';
import { ALREADY_FAVORITED_CODE, ALREADY_RETWEETED_CODE } from './twitter-client-constants.js';
import { buildTimelineFeatures } from './twitter-client-features.js';
import type { CallOptions, EngagementResult, RetweetResult, TweetData, TweetMetrics } from './twitter-client-types.js';
import { normalizeMetrics, normalizeTweet } from './twitter-client-utils.js';

export interface TwitterClientTweetDetailMethods {
  getTweet(tweetId: string, options?: CallOptions): Promise<TweetData>;
  getMetrics(tweetId: string, options?: CallOptions): Promise<TweetMetrics>;
  like(tweetId: string, options?: CallOptions): Promise<EngagementResult>;
  unlike(tweetId: string, options?: CallOptions): Promise<EngagementResult>;
  retweet(tweetId: string, options?: CallOptions): Promise<RetweetResult>;
  unretweet(tweetId: string, options?: CallOptions): Promise<RetweetResult>;
}

export function withTweetDetails<TBase extends AbstractConstructor<TwitterClientBase>>(
  Base: TBase,
): Mixin<TBase, TwitterClientTweetDetailMethods> {
  abstract class TwitterClientTweetDetails extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    async getTweet(tweetId: string, options: CallOptions = {}): Promise<TweetData> {
      return normalizeTweet(await this.fetchTweetResult(tweetId, 'getTweet', options.signal));
    }

    /**
     * Public counters of one tweet. Deleted, withheld or missing tweets raise NotFoundError.
     */
    async getMetrics(tweetId: string, options: CallOptions = {}): Promise<TweetMetrics> {
      return normalizeMetrics(await this.fetchTweetResult(tweetId, 'getMetrics', options.signal));
    }

    async like(tweetId: string, options: CallOptions = {}): Promise<EngagementResult> {
      const id = parseTweetId(tweetId);
      const response = await this.graphqlPost('FavoriteTweet', { tweet_id: id }, undefined, {
        name: 'like',
        signal: options.signal,
        acceptErrorCodes: [ALREADY_FAVORITED_CODE],
      });
      return { tweetId: id, liked: true, alreadyInState: response.acceptedErrors.length > 0 };
    }

    async unlike(tweetId: string, options: CallOptions = {}): Promise<EngagementResult> {
      const id = parseTweetId(tweetId);
      await this.graphqlPost('UnfavoriteTweet', { tweet_id: id }, undefined, {
        name: 'unlike',
        signal: options.signal,
      });
      return { tweetId: id, liked: false, alreadyInState: false };
    }

    async retweet(tweetId: string, options: CallOptions = {}): Promise<RetweetResult> {
      const id = parseTweetId(tweetId);
      const response = await this.graphqlPost('CreateRetweet', { tweet_id: id, dark_request: false }, undefined, {
        name: 'retweet',
        signal: options.signal,
        acceptErrorCodes: [ALREADY_RETWEETED_CODE],
      });
      const alreadyInState = response.acceptedErrors.length > 0;
      return {
        tweetId: id,
        retweeted: true,
        alreadyInState,
        retweetId: readNonEmptyString(response.body, 'data', 'create_retweet', 'retweet_results', 'result', 'rest_id'),
      };
    }

    /**
     * Undo a retweet of `tweetId` (the source tweet, not the retweet). The
     * response names the source tweet only when a retweet was actually removed.
     */
    async unretweet(tweetId: string, options: CallOptions = {}): Promise<RetweetResult> {
      const id = parseTweetId(tweetId);
      const response = await this.graphqlPost('DeleteRetweet', { source_tweet_id: id, dark_request: false }, undefined, {
        name: 'unretweet',
        signal: options.signal,
      });
      const source = readPath(response.body, 'data', 'unretweet', 'source_tweet_results', 'result');
      return { tweetId: id, retweeted: false, alreadyInState: source === undefined };
    }

    private async fetchTweetResult(tweetId: string, name: string, signal?: AbortSignal): Promise<unknown> {
      const id = parseTweetId(tweetId);
      const response = await this.graphqlGet(
        'TweetResultByRestId',
        { tweetId: id, withCommunity: false, includePromotedContent: false, withVoice: false },
        buildTimelineFeatures(),
        { name, signal },
      );
      const result = readPath(response.body, 'data', 'tweetResult', 'result');
      if (result === undefined) {
        throw new NotFoundError(`Tweet ${id} not found`);
      }
      return result;
    }
  }

  return TwitterClientTweetDetails;
}
