/**
 * MCP tool definitions and handlers
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ValidationError } from '../lib/errors.js';
import { collect } from '../lib/pagination.js';
import type { TwitterClient } from '../lib/twitter-client.js';

/**
 * Tool handler function type
 */
type ToolHandler = (client: TwitterClient, args: Record<string, unknown>) => Promise<unknown>;

const DEFAULT_LIST_COUNT = 20;
const MAX_LIST_COUNT = 1000;

function stringArg(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${key} must be a non-empty string`);
  }
  return value;
}

function optionalStringArg(args: Record<string, unknown>, key: string): string | undefined {
  return args[key] === undefined ? undefined : stringArg(args, key);
}

function countArg(args: Record<string, unknown>): number {
  const value = args.count;
  if (value === undefined) {
    return DEFAULT_LIST_COUNT;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > MAX_LIST_COUNT) {
    throw new ValidationError(`count must be an integer between 1 and ${MAX_LIST_COUNT}`);
  }
  return value;
}

const userProperty = { type: 'string', description: 'Numeric user ID or @handle' };
const tweetIdProperty = { type: 'string', description: 'Tweet ID or status URL' };
const countProperty = {
  type: 'number',
  description: `Maximum number of users to return (default: ${DEFAULT_LIST_COUNT})`,
  default: DEFAULT_LIST_COUNT,
};

const tweetCountProperty = {
  ...countProperty,
  description: `Maximum number of tweets to return (default: ${DEFAULT_LIST_COUNT})`,
};

function userTool(name: string, description: string): Tool {
  return {
    name,
    description,
    inputSchema: { type: 'object', properties: { user: userProperty }, required: ['user'] },
  };
}

/**
 * All available MCP tools
 */
export const tools: Tool[] = [
  // ============ POSTING ============
  {
    name: 'post_tweet',
    description: 'Post a tweet, optionally as a reply or quote. Text is limited to 280 weighted characters.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Tweet text' },
        reply_to: { type: 'string', description: 'Tweet ID or URL to reply to' },
        quote_tweet_id: { type: 'string', description: 'Tweet ID or URL to quote' },
      },
      required: ['text'],
    },
  },
  {
    name: 'delete_tweet',
    description: 'Delete one of your tweets.',
    inputSchema: { type: 'object', properties: { tweet_id: tweetIdProperty }, required: ['tweet_id'] },
  },
  {
    name: 'schedule_tweet',
    description: 'Post a tweet at a future time. Scheduling lives in this server process only.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Tweet text' },
        at: { type: 'string', description: 'ISO 8601 timestamp in the future' },
      },
      required: ['text', 'at'],
    },
  },
  {
    name: 'cancel_scheduled_tweets',
    description: 'Cancel every tweet scheduled by this server that has not been posted yet.',
    inputSchema: { type: 'object', properties: {} },
  },

  // ============ RELATIONSHIPS ============
  userTool('follow_user', 'Follow a user. Following an account you already follow is not an error.'),
  userTool('unfollow_user', 'Unfollow a user.'),
  userTool('block_user', 'Block a user.'),
  userTool('unblock_user', 'Unblock a user.'),
  userTool('mute_user', 'Mute a user.'),
  userTool('unmute_user', 'Unmute a user.'),

  // ============ READ OPERATIONS ============
  {
    name: 'get_followers',
    description: 'List accounts that follow a user.',
    inputSchema: { type: 'object', properties: { user: userProperty, count: countProperty }, required: ['user'] },
  },
  {
    name: 'get_following',
    description: 'List accounts a user follows.',
    inputSchema: { type: 'object', properties: { user: userProperty, count: countProperty }, required: ['user'] },
  },
  {
    name: 'get_likers',
    description: 'List accounts that liked a tweet.',
    inputSchema: {
      type: 'object',
      properties: { tweet_id: tweetIdProperty, count: countProperty },
      required: ['tweet_id'],
    },
  },
  {
    name: 'get_metrics',
    description: 'Get like, retweet, reply, quote, bookmark and view counts for a tweet.',
    inputSchema: { type: 'object', properties: { tweet_id: tweetIdProperty }, required: ['tweet_id'] },
  },
  {
    name: 'get_tweet',
    description: 'Get a single tweet by its ID. Returns tweet content, author, counters, and media.',
    inputSchema: { type: 'object', properties: { tweet_id: tweetIdProperty }, required: ['tweet_id'] },
  },
  userTool('get_user', 'Get a user profile by numeric ID or @handle.'),
  {
    name: 'get_user_tweets',
    description: "List a user's recent tweets, newest first.",
    inputSchema: {
      type: 'object',
      properties: { user: userProperty, count: tweetCountProperty },
      required: ['user'],
    },
  },
  {
    name: 'get_blocked_users',
    description: 'List accounts the signed-in user has blocked.',
    inputSchema: { type: 'object', properties: { count: countProperty } },
  },
  {
    name: 'get_muted_users',
    description: 'List accounts the signed-in user has muted.',
    inputSchema: { type: 'object', properties: { count: countProperty } },
  },

  // ============ ENGAGEMENT ============
  {
    name: 'like_tweet',
    description: 'Like a tweet.',
    inputSchema: { type: 'object', properties: { tweet_id: tweetIdProperty }, required: ['tweet_id'] },
  },
  {
    name: 'unlike_tweet',
    description: 'Remove a like from a tweet.',
    inputSchema: { type: 'object', properties: { tweet_id: tweetIdProperty }, required: ['tweet_id'] },
  },
  {
    name: 'retweet',
    description: 'Retweet a tweet. Retweeting twice is not an error.',
    inputSchema: { type: 'object', properties: { tweet_id: tweetIdProperty }, required: ['tweet_id'] },
  },
  {
    name: 'unretweet',
    description: 'Undo your retweet of a tweet (pass the original tweet ID).',
    inputSchema: { type: 'object', properties: { tweet_id: tweetIdProperty }, required: ['tweet_id'] },
  },
];

/**
 * Tool handler implementations
 */
export const toolHandlers: Record<string, ToolHandler> = {
  // ============ POSTING ============
  async post_tweet(client, args) {
    return client.postTweet(stringArg(args, 'text'), {
      replyTo: optionalStringArg(args, 'reply_to'),
      quoteTweetId: optionalStringArg(args, 'quote_tweet_id'),
    });
  },

  async delete_tweet(client, args) {
    const tweetId = stringArg(args, 'tweet_id');
    await client.deleteTweet(tweetId);
    return { deleted: true, tweetId };
  },

  async schedule_tweet(client, args) {
    const handle = client.scheduleTweet(stringArg(args, 'text'), stringArg(args, 'at'));
    return { id: handle.id, at: handle.at.toISOString(), status: handle.status };
  },

  async cancel_scheduled_tweets(client) {
    return { cancelled: client.cancelScheduledTweets() };
  },

  // ============ RELATIONSHIPS ============
  async follow_user(client, args) {
    return client.follow(stringArg(args, 'user'));
  },

  async unfollow_user(client, args) {
    return client.unfollow(stringArg(args, 'user'));
  },

  async block_user(client, args) {
    return client.block(stringArg(args, 'user'));
  },

  async unblock_user(client, args) {
    return client.unblock(stringArg(args, 'user'));
  },

  async mute_user(client, args) {
    return client.mute(stringArg(args, 'user'));
  },

  async unmute_user(client, args) {
    return client.unmute(stringArg(args, 'user'));
  },

  // ============ READ OPERATIONS ============
  async get_followers(client, args) {
    return collect(client.getFollowers(stringArg(args, 'user'), { limit: countArg(args) }));
  },

  async get_following(client, args) {
    return collect(client.getFollowing(stringArg(args, 'user'), { limit: countArg(args) }));
  },

  async get_likers(client, args) {
    return collect(client.getLikers(stringArg(args, 'tweet_id'), { limit: countArg(args) }));
  },

  async get_metrics(client, args) {
    return client.getMetrics(stringArg(args, 'tweet_id'));
  },

  async get_tweet(client, args) {
    return client.getTweet(stringArg(args, 'tweet_id'));
  },

  async get_user(client, args) {
    return client.getUser(stringArg(args, 'user'));
  },

  async get_user_tweets(client, args) {
    return collect(client.getUserTweets(stringArg(args, 'user'), { limit: countArg(args) }));
  },

  async get_blocked_users(client, args) {
    return collect(client.getBlockedUsers({ limit: countArg(args) }));
  },

  async get_muted_users(client, args) {
    return collect(client.getMutedUsers({ limit: countArg(args) }));
  },

  // ============ ENGAGEMENT ============
  async like_tweet(client, args) {
    return client.like(stringArg(args, 'tweet_id'));
  },

  async unlike_tweet(client, args) {
    return client.unlike(stringArg(args, 'tweet_id'));
  },

  async retweet(client, args) {
    return client.retweet(stringArg(args, 'tweet_id'));
  },

  async unretweet(client, args) {
    return client.unretweet(stringArg(args, 'tweet_id'));
  },
};
