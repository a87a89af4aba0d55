import { ValidationError } from './errors.js';
import { readPath } from './json.js';
import { paginate } from './pagination.js';
import {
  type AbstractConstructor,
  type Mixin,
  parseTweetId,
  parseUserTarget,
  type TwitterClientBase,
} from './twitter-client-base.js';
import { DEFAULT_PAGE_SIZE } from './twitter-client-constants.js';
import { buildTimelineFeatures } from './twitter-client-features.js';
import type { CallOptions, ListOptions, TweetData, TwitterUser } from './twitter-client-types.js';
import { parseTweetsFromInstructions, parseUsersFromInstructions } from './twitter-client-utils.js';

const MAX_PAGE_SIZE = 100;

export interface TwitterClientUserMethods {
  getUser(handleOrId: string, options?: CallOptions): Promise<TwitterUser>;
  getFollowers(user: string, options?: ListOptions): AsyncIterable<TwitterUser>;
  getFollowing(user: string, options?: ListOptions): AsyncIterable<TwitterUser>;
  getLikers(tweetId: string, options?: ListOptions): AsyncIterable<TwitterUser>;
  getBlockedUsers(options?: ListOptions): AsyncIterable<TwitterUser>;
  getMutedUsers(options?: ListOptions): AsyncIterable<TwitterUser>;
  getUserTweets(user: string, options?: ListOptions): AsyncIterable<TweetData>;
}

// Account lists of the signed-in user: operation, extra variables, path to the instructions.
const VIEWER_LISTS = {
  BlockedAccountsAll: {
    name: 'getBlockedUsers',
    variables: { withSafetyModeUserFields: false },
    path: ['data', 'viewer', 'timeline', 'timeline', 'instructions'],
  },
  MutedAccounts: {
    name: 'getMutedUsers',
    variables: {},
    path: ['data', 'viewer', 'muting_timeline', 'timeline', 'instructions'],
  },
} as const;

function pageSizeOf(options: ListOptions): number {
  const size = options.pageSize ?? DEFAULT_PAGE_SIZE;
  if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
    throw new ValidationError(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
  return size;
}

export function withUsers<TBase extends AbstractConstructor<TwitterClientBase>>(
  Base: TBase,
): Mixin<TBase, TwitterClientUserMethods> {
  abstract class TwitterClientUsers extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    async getUser(handleOrId: string, options: CallOptions = {}): Promise<TwitterUser> {
      return this.fetchUser(parseUserTarget(handleOrId), options.signal);
    }

    /**
     * Accounts following `user`, newest first. Arguments are checked up front;
     * the handle lookup and first page happen on the first `next()`.
     */
    getFollowers(user: string, options: ListOptions = {}): AsyncIterable<TwitterUser> {
      parseUserTarget(user);
      return this.userConnections('Followers', user, pageSizeOf(options), options);
    }

    getFollowing(user: string, options: ListOptions = {}): AsyncIterable<TwitterUser> {
      parseUserTarget(user);
      return this.userConnections('Following', user, pageSizeOf(options), options);
    }

    getLikers(tweetId: string, options: ListOptions = {}): AsyncIterable<TwitterUser> {
      const id = parseTweetId(tweetId);
      const pageSize = pageSizeOf(options);
      return paginate(
        async ({ cursor, pageSize: count }) => {
          const variables: Record<string, unknown> = { tweetId: id, count, includePromotedContent: false };
          if (cursor) {
            variables.cursor = cursor;
          }
          const response = await this.graphqlGet('Favoriters', variables, buildTimelineFeatures(), {
            name: 'getLikers',
            signal: options.signal,
          });
          const instructions = readPath(response.body, 'data', 'favoriters_timeline', 'timeline', 'instructions');
          const { users, nextCursor } = parseUsersFromInstructions(instructions);
          return { items: users, nextCursor };
        },
        { pageSize, limit: options.limit, keyOf: (user) => user.id, logger: this.logger, label: 'getLikers' },
      );
    }

    getBlockedUsers(options: ListOptions = {}): AsyncIterable<TwitterUser> {
      return this.viewerList('BlockedAccountsAll', pageSizeOf(options), options);
    }

    getMutedUsers(options: ListOptions = {}): AsyncIterable<TwitterUser> {
      return this.viewerList('MutedAccounts', pageSizeOf(options), options);
    }

    /** Tweets and retweets on a user's profile timeline, newest first. */
    getUserTweets(user: string, options: ListOptions = {}): AsyncIterable<TweetData> {
      parseUserTarget(user);
      return this.userTweets(user, pageSizeOf(options), options);
    }

    private viewerList(
      operation: keyof typeof VIEWER_LISTS,
      pageSize: number,
      options: ListOptions,
    ): AsyncIterable<TwitterUser> {
      const list = VIEWER_LISTS[operation];
      return paginate(
        async ({ cursor, pageSize: count }) => {
          const variables: Record<string, unknown> = { count, includePromotedContent: false, ...list.variables };
          if (cursor) {
            variables.cursor = cursor;
          }
          const response = await this.graphqlGet(operation, variables, buildTimelineFeatures(), {
            name: list.name,
            signal: options.signal,
          });
          const { users, nextCursor } = parseUsersFromInstructions(readPath(response.body, ...list.path));
          return { items: users, nextCursor };
        },
        { pageSize, limit: options.limit, keyOf: (user) => user.id, logger: this.logger, label: list.name },
      );
    }

    private async *userTweets(user: string, pageSize: number, options: ListOptions): AsyncGenerator<TweetData, void> {
      const userId = await this.resolveUserId(user, options.signal);

      yield* paginate(
        async ({ cursor, pageSize: count }) => {
          const variables: Record<string, unknown> = {
            userId,
            count,
            includePromotedContent: false,
            withQuickPromoteEligibilityTweetFields: false,
            withVoice: true,
            withV2Timeline: true,
          };
          if (cursor) {
            variables.cursor = cursor;
          }
          const response = await this.graphqlGet('UserTweets', variables, buildTimelineFeatures(), {
            name: 'getUserTweets',
            signal: options.signal,
          });
          const result = readPath(response.body, 'data', 'user', 'result');
          const instructions =
            readPath(result, 'timeline_v2', 'timeline', 'instructions') ??
            readPath(result, 'timeline', 'timeline', 'instructions');
          const { tweets, nextCursor } = parseTweetsFromInstructions(instructions);
          return { items: tweets, nextCursor };
        },
        { pageSize, limit: options.limit, keyOf: (tweet) => tweet.id, logger: this.logger, label: 'getUserTweets' },
      );
    }

    private async *userConnections(
      operation: 'Followers' | 'Following',
      user: string,
      pageSize: number,
      options: ListOptions,
    ): AsyncGenerator<TwitterUser, void> {
      const userId = await this.resolveUserId(user, options.signal);
      const name = operation === 'Followers' ? 'getFollowers' : 'getFollowing';

      yield* paginate(
        async ({ cursor, pageSize: count }) => {
          const variables: Record<string, unknown> = { userId, count, includePromotedContent: false };
          if (cursor) {
            variables.cursor = cursor;
          }
          const response = await this.graphqlGet(operation, variables, buildTimelineFeatures(), {
            name,
            signal: options.signal,
          });
          const instructions = readPath(response.body, 'data', 'user', 'result', 'timeline', 'timeline', 'instructions');
          const { users, nextCursor } = parseUsersFromInstructions(instructions);
          return { items: users, nextCursor };
        },
        { pageSize, limit: options.limit, keyOf: (entry) => entry.id, logger: this.logger, label: name },
      );
    }
  }

  return TwitterClientUsers;
}
