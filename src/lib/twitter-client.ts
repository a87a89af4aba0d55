import type { AbstractConstructor } from './twitter-client-base.js';
import { TwitterClientBase } from './twitter-client-base.js';
import { type TwitterClientFriendshipMethods, withFriendships } from './twitter-client-friendships.js';
import { type TwitterClientMediaMethods, withMedia } from './twitter-client-media.js';
import { type TwitterClientPostingMethods, withPosting } from './twitter-client-posting.js';
import { type TwitterClientSchedulingMethods, withScheduling } from './twitter-client-scheduling.js';
import { type TwitterClientTweetDetailMethods, withTweetDetails } from './twitter-client-tweet-detail.js';
import { type TwitterClientUserMethods, withUsers } from './twitter-client-users.js';

type TwitterClientInstance = TwitterClientBase &
  TwitterClientFriendshipMethods &
  TwitterClientMediaMethods &
  TwitterClientPostingMethods &
  TwitterClientSchedulingMethods &
  TwitterClientTweetDetailMethods &
  TwitterClientUserMethods;

const MixedTwitterClient = withUsers(
  withFriendships(withTweetDetails(withScheduling(withPosting(withMedia(TwitterClientBase))))),
) as AbstractConstructor<TwitterClientInstance>;

export class TwitterClient extends MixedTwitterClient {}

export type {
  BulkResult,
  EngagementResult,
  FollowRelationship,
  ListOptions,
  PostTweetOptions,
  RetweetResult,
  TweetData,
  TweetMetrics,
  TwitterClientOptions,
  TwitterUser,
  UploadMediaInput,
  UploadMediaResult,
} from './twitter-client-types.js';
