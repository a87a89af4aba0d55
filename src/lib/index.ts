export { type Config, type ConfigValidationResult, loadConfig, maskSecrets, validateConfig } from './config.js';
export { CredentialContext, type TwitterCookies } from './credentials.js';
export {
  type ApiErrorEntry,
  AuthError,
  ClientError,
  InvalidCredentialsError,
  isRetryable,
  NetworkError,
  NotFoundError,
  OperationCancelledError,
  OperationFailedError,
  RateLimitError,
  ServerError,
  TwitterClientError,
  UnexpectedShapeError,
  ValidationError,
} from './errors.js';
export { createLogger, type Logger, type LogLevel, silentLogger } from './logger.js';
export { collect, paginate, type Page, type PageFetcher, type PaginateOptions } from './pagination.js';
export { calculateDelay, RetryGovernor, type RetryPolicy } from './retry.js';
export type { ScheduledPostOptions, ScheduledTweetHandle, ScheduledTweetStatus } from './scheduler.js';
export { validateTweetText, weightedLength } from './tweet-text.js';
export {
  type BulkResult,
  type EngagementResult,
  type FollowRelationship,
  type ListOptions,
  type PostTweetOptions,
  type RetweetResult,
  type TweetData,
  type TweetMetrics,
  TwitterClient,
  type TwitterClientOptions,
  type TwitterUser,
  type UploadMediaInput,
  type UploadMediaResult,
} from './twitter-client.js';
export { parseTweetId, parseUserTarget } from './twitter-client-base.js';
export { normalize, type NormalizerKind } from './twitter-client-utils.js';
