import { AuthError } from './errors.js';
import type { AbstractConstructor, Mixin, TwitterClientBase } from './twitter-client-base.js';
import { ALREADY_REQUESTED_FOLLOW_CODE, NOT_MUTING_CODE } from './twitter-client-constants.js';
import type { BulkResult, CallOptions, FollowRelationship, RelationKind } from './twitter-client-types.js';
import { normalizeLegacyUser } from './twitter-client-utils.js';

export interface TwitterClientFriendshipMethods {
  follow(user: string, options?: CallOptions): Promise<FollowRelationship>;
  unfollow(user: string, options?: CallOptions): Promise<FollowRelationship>;
  block(user: string, options?: CallOptions): Promise<FollowRelationship>;
  unblock(user: string, options?: CallOptions): Promise<FollowRelationship>;
  mute(user: string, options?: CallOptions): Promise<FollowRelationship>;
  unmute(user: string, options?: CallOptions): Promise<FollowRelationship>;
  followMany(users: readonly string[], options?: CallOptions): Promise<BulkResult>;
  unfollowMany(users: readonly string[], options?: CallOptions): Promise<BulkResult>;
  blockMany(users: readonly string[], options?: CallOptions): Promise<BulkResult>;
  muteMany(users: readonly string[], options?: CallOptions): Promise<BulkResult>;
}

interface RelationEndpoint {
  name: string;
  path: string;
  relation: RelationKind;
  active: boolean;
  acceptErrorCodes?: readonly number[];
}

const ENDPOINTS = {
  follow: {
    name: 'follow',
    path: 'friendships/create.json',
    relation: 'follow',
    active: true,
    acceptErrorCodes: [ALREADY_REQUESTED_FOLLOW_CODE],
  },
  unfollow: { name: 'unfollow', path: 'friendships/destroy.json', relation: 'follow', active: false },
  block: { name: 'block', path: 'blocks/create.json', relation: 'block', active: true },
  unblock: { name: 'unblock', path: 'blocks/destroy.json', relation: 'block', active: false },
  mute: { name: 'mute', path: 'mutes/users/create.json', relation: 'mute', active: true },
  unmute: {
    name: 'unmute',
    path: 'mutes/users/destroy.json',
    relation: 'mute',
    active: false,
    acceptErrorCodes: [NOT_MUTING_CODE],
  },
} satisfies Record<string, RelationEndpoint>;

type RelationAction = keyof typeof ENDPOINTS;

// Extra user fields the web client asks for on every friendship write.
const FRIENDSHIP_FORM: Record<string, string> = {
  include_profile_interstitial_type: '1',
  include_blocking: '1',
  include_blocked_by: '1',
  include_followed_by: '1',
  include_want_retweets: '1',
  include_mute_edge: '1',
  include_can_dm: '1',
  include_can_media_tag: '1',
  include_ext_is_blue_verified: '1',
  skip_status: '1',
};

export function withFriendships<TBase extends AbstractConstructor<TwitterClientBase>>(
  Base: TBase,
): Mixin<TBase, TwitterClientFriendshipMethods> {
  abstract class TwitterClientFriendships extends Base {
    // biome-ignore lint/complexity/noUselessConstructor lint/suspicious/noExplicitAny: TS mixin constructor requirement.
    constructor(...args: any[]) {
      super(...args);
    }

    follow(user: string, options: CallOptions = {}): Promise<FollowRelationship> {
      return this.applyRelation('follow', user, options.signal);
    }

    unfollow(user: string, options: CallOptions = {}): Promise<FollowRelationship> {
      return this.applyRelation('unfollow', user, options.signal);
    }

    block(user: string, options: CallOptions = {}): Promise<FollowRelationship> {
      return this.applyRelation('block', user, options.signal);
    }

    unblock(user: string, options: CallOptions = {}): Promise<FollowRelationship> {
      return this.applyRelation('unblock', user, options.signal);
    }

    mute(user: string, options: CallOptions = {}): Promise<FollowRelationship> {
      return this.applyRelation('mute', user, options.signal);
    }

    unmute(user: string, options: CallOptions = {}): Promise<FollowRelationship> {
      return this.applyRelation('unmute', user, options.signal);
    }

    followMany(users: readonly string[], options: CallOptions = {}): Promise<BulkResult> {
      return this.applyMany('follow', users, options.signal);
    }

    unfollowMany(users: readonly string[], options: CallOptions = {}): Promise<BulkResult> {
      return this.applyMany('unfollow', users, options.signal);
    }

    blockMany(users: readonly string[], options: CallOptions = {}): Promise<BulkResult> {
      return this.applyMany('block', users, options.signal);
    }

    muteMany(users: readonly string[], options: CallOptions = {}): Promise<BulkResult> {
      return this.applyMany('mute', users, options.signal);
    }

    private async applyRelation(
      action: RelationAction,
      user: string,
      signal?: AbortSignal,
    ): Promise<FollowRelationship> {
      const endpoint: RelationEndpoint = ENDPOINTS[action];
      const userId = await this.resolveUserId(user, signal);
      const response = await this.restPost(
        endpoint.path,
        { ...FRIENDSHIP_FORM, user_id: userId },
        { name: endpoint.name, signal, acceptErrorCodes: endpoint.acceptErrorCodes },
      );

      const alreadyInState = response.acceptedErrors.length > 0;
      this.logger.info('friendships', `${endpoint.name}_applied`, { userId, alreadyInState });
      return {
        userId,
        relation: endpoint.relation,
        active: endpoint.active,
        alreadyInState,
        user: alreadyInState ? undefined : normalizeLegacyUser(response.body),
      };
    }

    /**
     * Targets run one after another. Failures are collected per target; an
     * AuthError means the session is gone, so the rest are skipped.
     */
    private async applyMany(action: RelationAction, users: readonly string[], signal?: AbortSignal): Promise<BulkResult> {
      const result: BulkResult = { succeeded: [], failed: [], skipped: [] };

      for (const [index, target] of users.entries()) {
        try {
          result.succeeded.push(await this.applyRelation(action, target, signal));
        } catch (error) {
          const failure = error instanceof Error ? error : new Error(String(error));
          result.failed.push({ target, error: failure });
          if (error instanceof AuthError || signal?.aborted) {
            result.skipped.push(...users.slice(index + 1));
            this.logger.warn('friendships', 'bulk_aborted', {
              action,
              reason: failure.name,
              skipped: result.skipped.length,
            });
            break;
          }
        }
      }

      this.logger.info('friendships', 'bulk_completed', {
        action,
        succeeded: result.succeeded.length,
        failed: result.failed.length,
        skipped: result.skipped.length,
      });
      return result;
    }
  }

  return TwitterClientFriendships;
}
