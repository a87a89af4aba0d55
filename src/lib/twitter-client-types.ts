import type { Logger } from './logger.js';
import type { OperationName } from './twitter-client-constants.js';

export interface TweetAuthor {
  id?: string;
  username: string;
  name: string;
}

export interface TweetData {
  id: string;
  text: string;
  author: TweetAuthor;
  createdAt?: string;
  conversationId?: string;
  inReplyToStatusId?: string;
  quotedTweetId?: string;
  lang?: string;
  replyCount: number;
  retweetCount: number;
  likeCount: number;
  quoteCount: number;
  bookmarkCount: number;
  viewCount?: number;
  mediaUrls?: string[];
}

export interface TwitterUser {
  id: string;
  username: string;
  name: string;
  description?: string;
  location?: string;
  followersCount?: number;
  followingCount?: number;
  tweetCount?: number;
  isBlueVerified?: boolean;
  isProtected?: boolean;
  profileImageUrl?: string;
  createdAt?: string;
  following?: boolean;
  followedBy?: boolean;
}

export interface TweetMetrics {
  tweetId: string;
  likeCount: number;
  retweetCount: number;
  replyCount: number;
  quoteCount: number;
  bookmarkCount: number;
  // Absent when the tweet predates view counting or views are hidden.
  viewCount?: number;
}

export type RelationKind = 'follow' | 'block' | 'mute';

export interface FollowRelationship {
  userId: string;
  relation: RelationKind;
  /** Whether the relation holds after the call. */
  active: boolean;
  /** The target was already in the requested state; nothing changed upstream. */
  alreadyInState: boolean;
  user?: TwitterUser;
}

export interface EngagementResult {
  tweetId: string;
  liked: boolean;
  alreadyInState: boolean;
}

export interface RetweetResult {
  tweetId: string;
  retweeted: boolean;
  alreadyInState: boolean;
  /** Id of the retweet itself; only known when one was just created. */
  retweetId?: string;
}

export interface BulkFailure {
  target: string;
  error: Error;
}

export interface BulkResult {
  succeeded: FollowRelationship[];
  failed: BulkFailure[];
  /** Targets not attempted because the session was rejected part-way. */
  skipped: string[];
}

export interface PostTweetOptions {
  mediaIds?: string[];
  replyTo?: string;
  quoteTweetId?: string;
  signal?: AbortSignal;
}

export interface ListOptions {
  limit?: number;
  pageSize?: number;
  signal?: AbortSignal;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface UploadMediaInput {
  data: Uint8Array;
  mimeType: string;
  alt?: string;
  signal?: AbortSignal;
}

export interface UploadMediaResult {
  mediaId: string;
  /** Set for video and GIF uploads that went through server-side processing. */
  processingState?: string;
}

export interface TwitterClientOptions {
  authToken: string;
  csrfToken: string;
  userAgent?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  logger?: Logger;
  fetch?: typeof fetch;
  queryIds?: Partial<Record<OperationName, string>>;
  /** Clock for schedule validation; defaults to Date.now. */
  now?: () => number;
  /** Jitter source for backoff; defaults to Math.random. */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}
