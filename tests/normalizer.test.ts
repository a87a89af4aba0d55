import { describe, expect, it } from 'vitest';
import { NotFoundError, UnexpectedShapeError } from '../src/lib/errors.js';
import {
  normalize,
  normalizeLegacyTweet,
  normalizeLegacyUser,
  normalizeMetrics,
  normalizeTweet,
  normalizeUser,
  parseUsersFromInstructions,
} from '../src/lib/twitter-client-utils.js';
import { legacyUser, rawTweet, rawUser, userInstructions } from './fixtures.js';

describe('normalizeTweet', () => {
  it('maps the GraphQL tweet result', () => {
    expect(normalizeTweet(rawTweet('100'))).toEqual({
      id: '100',
      text: 'Tweet 100',
      author: { id: '42', username: 'author', name: 'Name author' },
      createdAt: 'Tue Oct 01 12:00:00 +0000 2024',
      conversationId: '100',
      inReplyToStatusId: undefined,
      quotedTweetId: undefined,
      lang: 'en',
      replyCount: 3,
      retweetCount: 5,
      likeCount: 21,
      quoteCount: 2,
      bookmarkCount: 7,
      viewCount: 9001,
      mediaUrls: undefined,
    });
  });

  it('unwraps visibility wrappers', () => {
    const wrapped = { __typename: 'TweetWithVisibilityResults', tweet: rawTweet('101') };
    expect(normalizeTweet(wrapped).id).toBe('101');
  });

  it('prefers note tweet text for long posts', () => {
    const tweet = rawTweet('102', {
      note_tweet: { note_tweet_results: { result: { text: 'A much longer note text' } } },
    });
    expect(normalizeTweet(tweet).text).toBe('A much longer note text');
  });

  it('expands t.co links and drops media links from the text', () => {
    const tweet = rawTweet('103', {
      legacy: {
        full_text: 'Read https://t.co/abc https://t.co/pic',
        entities: { urls: [{ url: 'https://t.co/abc', expanded_url: 'https://example.com/post' }] },
        extended_entities: { media: [{ url: 'https://t.co/pic', media_url_https: 'https://pbs.twimg.com/media/x.jpg' }] },
      },
    });

    const normalized = normalizeTweet(tweet);

    expect(normalized.text).toBe('Read https://example.com/post');
    expect(normalized.mediaUrls).toEqual(['https://pbs.twimg.com/media/x.jpg']);
  });

  it('defaults missing counters to zero and views to undefined', () => {
    const tweet = { rest_id: '104', legacy: { full_text: 'bare' } };
    const normalized = normalizeTweet(tweet);
    expect(normalized.likeCount).toBe(0);
    expect(normalized.bookmarkCount).toBe(0);
    expect(normalized.viewCount).toBeUndefined();
    expect(normalized.author).toEqual({ id: undefined, username: '', name: '' });
  });

  it('reports tombstones as not found', () => {
    expect(() => normalizeTweet({ __typename: 'TweetTombstone', tombstone: {} })).toThrow(NotFoundError);
  });

  it('rejects a tweet without an id', () => {
    expect(() => normalizeTweet({ legacy: { full_text: 'no id' } })).toThrow(UnexpectedShapeError);
  });
});

describe('normalizeMetrics', () => {
  it('keeps only the counters', () => {
    expect(normalizeMetrics(rawTweet('200'))).toEqual({
      tweetId: '200',
      likeCount: 21,
      retweetCount: 5,
      replyCount: 3,
      quoteCount: 2,
      bookmarkCount: 7,
      viewCount: 9001,
    });
  });

  it('is reachable through normalize()', () => {
    expect(normalize('metrics', rawTweet('201')).tweetId).toBe('201');
  });
});

describe('user normalizers', () => {
  it('maps a GraphQL user result', () => {
    const user = normalizeUser(rawUser('7', 'someone', { relationship_perspectives: { following: true } }));
    expect(user).toMatchObject({
      id: '7',
      username: 'someone',
      name: 'Name someone',
      description: 'Bio of someone',
      followersCount: 1200,
      followingCount: 80,
      tweetCount: 512,
      isBlueVerified: false,
      following: true,
      createdAt: 'Mon Jan 01 00:00:00 +0000 2018',
    });
  });

  it('falls back to legacy screen names', () => {
    const user = normalizeUser({ rest_id: '8', legacy: { screen_name: 'oldstyle', name: 'Old Style' } });
    expect(user.username).toBe('oldstyle');
    expect(user.name).toBe('Old Style');
  });

  it('reports unavailable users as not found', () => {
    expect(() => normalizeUser({ __typename: 'UserUnavailable' })).toThrow(NotFoundError);
    expect(() => normalizeUser(undefined)).toThrow('User is unavailable');
  });

  it('maps a REST user object', () => {
    expect(normalizeLegacyUser(legacyUser('9', 'resty'))).toMatchObject({
      id: '9',
      username: 'resty',
      followersCount: 10,
      followingCount: 20,
      tweetCount: 30,
      following: true,
    });
    expect(() => normalizeLegacyUser({ screen_name: 'noid' })).toThrow('User payload is missing id_str');
  });
});

describe('normalizeLegacyTweet', () => {
  it('maps a statuses/update.json response', () => {
    const tweet = normalizeLegacyTweet({
      id_str: '300',
      text: 'posted via REST',
      favorite_count: 0,
      user: { id_str: '42', screen_name: 'author', name: 'Author' },
    });
    expect(tweet.id).toBe('300');
    expect(tweet.text).toBe('posted via REST');
    expect(tweet.author).toEqual({ id: '42', username: 'author', name: 'Author' });
    expect(tweet.viewCount).toBeUndefined();
  });
});

describe('parseUsersFromInstructions', () => {
  it('collects users and the bottom cursor', () => {
    const result = parseUsersFromInstructions(
      userInstructions(
        [
          { id: '1', screenName: 'one' },
          { id: '2', screenName: 'two' },
        ],
        'next-page',
      ),
    );
    expect(result.users.map((user) => user.username)).toEqual(['one', 'two']);
    expect(result.nextCursor).toBe('next-page');
  });

  it('skips unavailable users and handles missing instructions', () => {
    const instructions = [
      {
        type: 'TimelineAddEntries',
        entries: [{ content: { itemContent: { user_results: { result: { __typename: 'UserUnavailable' } } } } }],
      },
    ];
    expect(parseUsersFromInstructions(instructions)).toEqual({ users: [], nextCursor: undefined });
    expect(parseUsersFromInstructions(undefined)).toEqual({ users: [], nextCursor: undefined });
  });
});
