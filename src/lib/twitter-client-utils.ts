// ABOUTME: Response normalizer: maps upstream payloads onto stable domain objects.
// ABOUTME: Required fields missing -> UnexpectedShapeError; optional ones -> undefined or 0.

import { NotFoundError, UnexpectedShapeError } from './errors.js';
import {
  asArray,
  asRecord,
  type JsonRecord,
  readBoolean,
  readNonEmptyString,
  readNumber,
  readPath,
  readString,
} from './json.js';
import type { TweetData, TweetMetrics, TwitterUser } from './twitter-client-types.js';

const UNAVAILABLE_TWEET_TYPES = new Set(['TweetTombstone', 'TweetUnavailable']);

/** Unwrap `TweetWithVisibilityResults`; undefined for tombstones and non-objects. */
export function unwrapTweetResult(raw: unknown): JsonRecord | undefined {
  const record = asRecord(raw);
  if (!record) {
    return undefined;
  }
  const typename = readString(record, '__typename');
  if (typename === 'TweetWithVisibilityResults') {
    return unwrapTweetResult(record.tweet);
  }
  if (typename && UNAVAILABLE_TWEET_TYPES.has(typename)) {
    return undefined;
  }
  return record;
}

function firstText(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
}

function expandUrls(text: string, legacy: unknown): string {
  let expanded = text;
  for (const url of asArray(readPath(legacy, 'entities', 'urls'))) {
    const short = readString(url, 'url');
    const full = readString(url, 'expanded_url');
    if (short && full) {
      expanded = expanded.split(short).join(full);
    }
  }
  for (const media of asArray(readPath(legacy, 'extended_entities', 'media'))) {
    const short = readString(media, 'url');
    if (short) {
      expanded = expanded.split(short).join('');
    }
  }
  return expanded.trim();
}

function mediaUrls(legacy: unknown): string[] | undefined {
  const urls = asArray(readPath(legacy, 'extended_entities', 'media'))
    .map((media) => readString(media, 'media_url_https'))
    .filter((url): url is string => typeof url === 'string');
  return urls.length > 0 ? urls : undefined;
}

function tweetFromParts(id: string, legacy: unknown, text: string, author: TweetData['author'], views: unknown): TweetData {
  return {
    id,
    text,
    author,
    createdAt: readString(legacy, 'created_at'),
    conversationId: readString(legacy, 'conversation_id_str'),
    inReplyToStatusId: readString(legacy, 'in_reply_to_status_id_str'),
    quotedTweetId: readString(legacy, 'quoted_status_id_str'),
    lang: readString(legacy, 'lang'),
    replyCount: readNumber(legacy, 'reply_count') ?? 0,
    retweetCount: readNumber(legacy, 'retweet_count') ?? 0,
    likeCount: readNumber(legacy, 'favorite_count') ?? 0,
    quoteCount: readNumber(legacy, 'quote_count') ?? 0,
    bookmarkCount: readNumber(legacy, 'bookmark_count') ?? 0,
    viewCount: readNumber(views, 'count'),
    mediaUrls: mediaUrls(legacy),
  };
}

/** GraphQL `tweet_results.result` -> TweetData */
export function normalizeTweet(raw: unknown): TweetData {
  const tweet = unwrapTweetResult(raw);
  if (!tweet) {
    throw new NotFoundError('Tweet is unavailable');
  }
  const legacy = tweet.legacy;
  const id = readNonEmptyString(tweet, 'rest_id') ?? readNonEmptyString(legacy, 'id_str');
  if (!id) {
    throw new UnexpectedShapeError('Tweet payload is missing rest_id');
  }

  const user = readPath(tweet, 'core', 'user_results', 'result');
  const noteText = firstText(
    readString(tweet, 'note_tweet', 'note_tweet_results', 'result', 'text'),
    readString(tweet, 'note_tweet', 'note_tweet_results', 'result', 'richtext', 'text'),
  );
  const text = noteText ?? expandUrls(readString(legacy, 'full_text') ?? '', legacy);

  return tweetFromParts(
    id,
    legacy,
    text,
    {
      id: readNonEmptyString(user, 'rest_id'),
      username: readString(user, 'core', 'screen_name') ?? readString(user, 'legacy', 'screen_name') ?? '',
      name: readString(user, 'core', 'name') ?? readString(user, 'legacy', 'name') ?? '',
    },
    tweet.views,
  );
}

/** REST 1.1 status object (statuses/update.json) -> TweetData */
export function normalizeLegacyTweet(raw: unknown): TweetData {
  const id = readNonEmptyString(raw, 'id_str');
  if (!id) {
    throw new UnexpectedShapeError('Status payload is missing id_str');
  }
  const text = readString(raw, 'full_text') ?? readString(raw, 'text') ?? '';
  const user = readPath(raw, 'user');
  return tweetFromParts(
    id,
    raw,
    expandUrls(text, raw),
    {
      id: readNonEmptyString(user, 'id_str'),
      username: readString(user, 'screen_name') ?? '',
      name: readString(user, 'name') ?? '',
    },
    undefined,
  );
}

/** GraphQL `user_results.result` -> TwitterUser */
export function normalizeUser(raw: unknown): TwitterUser {
  const user = asRecord(raw);
  if (!user || readString(user, '__typename') === 'UserUnavailable') {
    throw new NotFoundError('User is unavailable');
  }
  const id = readNonEmptyString(user, 'rest_id');
  if (!id) {
    throw new UnexpectedShapeError('User payload is missing rest_id');
  }
  const legacy = user.legacy;

  return {
    id,
    username: readString(user, 'core', 'screen_name') ?? readString(legacy, 'screen_name') ?? '',
    name: readString(user, 'core', 'name') ?? readString(legacy, 'name') ?? '',
    description: readString(legacy, 'description') ?? readString(user, 'profile_bio', 'description'),
    location: readString(user, 'location', 'location') ?? readString(legacy, 'location'),
    followersCount: readNumber(legacy, 'followers_count'),
    followingCount: readNumber(legacy, 'friends_count'),
    tweetCount: readNumber(legacy, 'statuses_count'),
    isBlueVerified: readBoolean(user, 'is_blue_verified'),
    isProtected: readBoolean(user, 'privacy', 'protected') ?? readBoolean(legacy, 'protected'),
    profileImageUrl: readString(user, 'avatar', 'image_url') ?? readString(legacy, 'profile_image_url_https'),
    createdAt: readString(user, 'core', 'created_at') ?? readString(legacy, 'created_at'),
    following: readBoolean(user, 'relationship_perspectives', 'following') ?? readBoolean(legacy, 'following'),
    followedBy: readBoolean(user, 'relationship_perspectives', 'followed_by') ?? readBoolean(legacy, 'followed_by'),
  };
}

/** REST 1.1 user object (friendships/blocks/mutes) -> TwitterUser */
export function normalizeLegacyUser(raw: unknown): TwitterUser {
  const id = readNonEmptyString(raw, 'id_str');
  if (!id) {
    throw new UnexpectedShapeError('User payload is missing id_str');
  }
  return {
    id,
    username: readString(raw, 'screen_name') ?? '',
    name: readString(raw, 'name') ?? '',
    description: readString(raw, 'description'),
    location: readString(raw, 'location'),
    followersCount: readNumber(raw, 'followers_count'),
    followingCount: readNumber(raw, 'friends_count'),
    tweetCount: readNumber(raw, 'statuses_count'),
    isBlueVerified: readBoolean(raw, 'ext_is_blue_verified'),
    isProtected: readBoolean(raw, 'protected'),
    profileImageUrl: readString(raw, 'profile_image_url_https'),
    createdAt: readString(raw, 'created_at'),
    following: readBoolean(raw, 'following'),
    followedBy: readBoolean(raw, 'followed_by'),
  };
}

export function normalizeMetrics(raw: unknown): TweetMetrics {
  const tweet = normalizeTweet(raw);
  return {
    tweetId: tweet.id,
    likeCount: tweet.likeCount,
    retweetCount: tweet.retweetCount,
    replyCount: tweet.replyCount,
    quoteCount: tweet.quoteCount,
    bookmarkCount: tweet.bookmarkCount,
    viewCount: tweet.viewCount,
  };
}

interface DomainByKind {
  tweet: TweetData;
  legacyTweet: TweetData;
  user: TwitterUser;
  legacyUser: TwitterUser;
  metrics: TweetMetrics;
}

export type NormalizerKind = keyof DomainByKind;

const NORMALIZERS: { [K in NormalizerKind]: (raw: unknown) => DomainByKind[K] } = {
  tweet: normalizeTweet,
  legacyTweet: normalizeLegacyTweet,
  user: normalizeUser,
  legacyUser: normalizeLegacyUser,
  metrics: normalizeMetrics,
};

export function normalize<K extends NormalizerKind>(kind: K, raw: unknown): DomainByKind[K] {
  const normalizer: (raw: unknown) => DomainByKind[K] = NORMALIZERS[kind];
  return normalizer(raw);
}

export interface TimelineEntries {
  /** `itemContent` objects in document order, modules flattened. */
  items: JsonRecord[];
  bottomCursor?: string;
}

function cursorOf(content: unknown): { type?: string; value?: string } {
  return {
    type: readString(content, 'cursorType') ?? readString(content, 'itemContent', 'cursorType'),
    value: readNonEmptyString(content, 'value') ?? readNonEmptyString(content, 'itemContent', 'value'),
  };
}

export function readTimelineEntries(instructions: unknown): TimelineEntries {
  const items: JsonRecord[] = [];
  let bottomCursor: string | undefined;

  for (const instruction of asArray(instructions)) {
    const single = readPath(instruction, 'entry');
    const entries = single ? [single] : asArray(readPath(instruction, 'entries'));

    for (const entry of entries) {
      const content = readPath(entry, 'content');
      const cursor = cursorOf(content);
      if (cursor.type === 'Bottom') {
        if (cursor.value) {
          bottomCursor = cursor.value;
        }
        continue;
      }
      if (cursor.type) {
        continue;
      }

      const itemContent = asRecord(readPath(content, 'itemContent'));
      if (itemContent) {
        items.push(itemContent);
      }
      for (const moduleItem of asArray(readPath(content, 'items'))) {
        const nested = asRecord(readPath(moduleItem, 'item', 'itemContent'));
        if (nested) {
          items.push(nested);
        }
      }
    }
  }

  return { items, bottomCursor };
}

export function parseUsersFromInstructions(instructions: unknown): { users: TwitterUser[]; nextCursor?: string } {
  const { items, bottomCursor } = readTimelineEntries(instructions);
  const users: TwitterUser[] = [];
  for (const item of items) {
    const result = readPath(item, 'user_results', 'result');
    if (result === undefined || readString(result, '__typename') === 'UserUnavailable') {
      continue;
    }
    users.push(normalizeUser(result));
  }
  return { users, nextCursor: bottomCursor };
}

/** Tweets of a timeline page; tombstoned and withheld entries are dropped. */
export function parseTweetsFromInstructions(instructions: unknown): { tweets: TweetData[]; nextCursor?: string } {
  const { items, bottomCursor } = readTimelineEntries(instructions);
  const tweets: TweetData[] = [];
  for (const item of items) {
    const result = readPath(item, 'tweet_results', 'result');
    if (unwrapTweetResult(result) === undefined) {
      continue;
    }
    tweets.push(normalizeTweet(result));
  }
  return { tweets, nextCursor: bottomCursor };
}
