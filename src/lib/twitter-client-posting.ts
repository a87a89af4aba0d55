import { ClientError, NotFoundError, UnexpectedShapeError } from './errors.js';
import { readPath } from './json.js';
import type { RawResponse } from './transport.js';
import { validateTweetText } from './tweet-text.js';
import {
  type AbstractConstructor,
  type Mixin,
  parseTweetId,
  type TwitterClientBase,
} from './twitter-client-base.js';
import {
  AUTOMATION_SUSPECTED_CODE,
  TWITTER_API_BASE,
  TWITTER_STATUS_UPDATE_URL,
} from './twitter-client-constants.js';
import { buildTweetCreateFeatures } from './twitter-client-features.js';
import type { CallOptions, PostTweetOptions, TweetData } from './twitter-client-types.js';
import { normalizeLegacyTweet, normalizeTweet } from './twitter-client-utils.js';

const COMPOSE_REFERER = 'https://x.com/compose/post';

export interface TwitterClientPostingMethods {
  postTweet(text: string, options?: PostTweetOptions): Promise<TweetData>;
  reply(text: string, replyToTweetId: string, options?: Omit<PostTweetOptions, 'replyTo'>): Promise<TweetData>;
  deleteTweet(tweetId: string, options?: CallOptions): Promise<void>;
}

interface StatusUpdateInput {
  text: string;
  inReplyToTweetId?: string;
  mediaIds?: string[];
  quoteTweetId?: string;
}

export function withPosting<TBase extends AbstractConstructor<TwitterClientBase>>(
  Base: TBase,
): Mixin<TBase, TwitterClientPostingMethods> {
  abstract class TwitterClientPosting extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    /**
     * Post a new tweet. Text is checked locally first, so an over-long tweet never reaches the network.
     */
    async postTweet(text: string, options: PostTweetOptions = {}): Promise<TweetData> {
      const mediaIds = options.mediaIds ?? [];
      validateTweetText(text, { hasMedia: mediaIds.length > 0 });
      const replyTo = options.replyTo ? parseTweetId(options.replyTo) : undefined;
      const quoteTweetId = options.quoteTweetId ? parseTweetId(options.quoteTweetId) : undefined;

      const variables: Record<string, unknown> = {
        tweet_text: text,
        dark_request: false,
        media: {
          media_entities: mediaIds.map((id) => ({ media_id: id, tagged_users: [] })),
          possibly_sensitive: false,
        },
        semantic_annotation_ids: [],
      };
      if (replyTo) {
        variables.reply = { in_reply_to_tweet_id: replyTo, exclude_reply_user_ids: [] };
      }
      if (quoteTweetId) {
        variables.attachment_url = `https://x.com/i/web/status/${quoteTweetId}`;
      }

      try {
        const tweet = await this.createTweet(variables, options.signal);
        this.logger.info('posting', 'tweet_posted', { tweetId: tweet.id, replyTo, quoteTweetId });
        return tweet;
      } catch (error) {
        if (error instanceof ClientError && error.codes.includes(AUTOMATION_SUSPECTED_CODE)) {
          this.logger.warn('posting', 'status_update_fallback', { code: AUTOMATION_SUSPECTED_CODE });
          return this.postStatusUpdate({ text, inReplyToTweetId: replyTo, mediaIds, quoteTweetId }, options.signal);
        }
        throw error;
      }
    }

    /**
     * Reply to an existing tweet
     */
    async reply(
      text: string,
      replyToTweetId: string,
      options: Omit<PostTweetOptions, 'replyTo'> = {},
    ): Promise<TweetData> {
      return this.postTweet(text, { ...options, replyTo: replyToTweetId });
    }

    async deleteTweet(tweetId: string, options: CallOptions = {}): Promise<void> {
      const id = parseTweetId(tweetId);
      await this.graphqlPost(
        'DeleteTweet',
        { tweet_id: id, dark_request: false },
        undefined,
        { name: 'deleteTweet', signal: options.signal, referer: `https://x.com/i/status/${id}` },
      );
      this.logger.info('posting', 'tweet_deleted', { tweetId: id });
    }

    private async createTweet(variables: Record<string, unknown>, signal?: AbortSignal): Promise<TweetData> {
      const features = buildTweetCreateFeatures();
      let response: RawResponse;
      try {
        response = await this.graphqlPost('CreateTweet', variables, features, {
          name: 'postTweet',
          signal,
          referer: COMPOSE_REFERER,
        });
      } catch (error) {
        // A stale operation path 404s; the generic endpoint takes the queryId from the payload.
        if (!(error instanceof NotFoundError) || error.codes.length > 0) {
          throw error;
        }
        this.logger.warn('posting', 'create_tweet_generic_endpoint', { queryId: this.queryIds.CreateTweet });
        response = await this.graphqlPost('CreateTweet', variables, features, {
          name: 'postTweet',
          signal,
          referer: COMPOSE_REFERER,
          url: TWITTER_API_BASE,
        });
      }

      const result = readPath(response.body, 'data', 'create_tweet', 'tweet_results', 'result');
      if (result === undefined) {
        throw new UnexpectedShapeError('Tweet created but no result returned');
      }
      return normalizeTweet(result);
    }

    private async postStatusUpdate(input: StatusUpdateInput, signal?: AbortSignal): Promise<TweetData> {
      const form: Record<string, string> = { status: input.text };
      if (input.inReplyToTweetId) {
        form.in_reply_to_status_id = input.inReplyToTweetId;
        form.auto_populate_reply_metadata = 'true';
      }
      if (input.mediaIds && input.mediaIds.length > 0) {
        form.media_ids = input.mediaIds.join(',');
      }
      if (input.quoteTweetId) {
        form.attachment_url = `https://x.com/i/web/status/${input.quoteTweetId}`;
      }

      const response = await this.restPost(TWITTER_STATUS_UPDATE_URL, form, { name: 'postTweet', signal });
      return normalizeLegacyTweet(response.body);
    }
  }

  return TwitterClientPosting;
}
