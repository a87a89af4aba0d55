import { CredentialContext } from './credentials.js';
import { NotFoundError, ValidationError } from './errors.js';
import { readPath } from './json.js';
import { createLogger, type Logger } from './logger.js';
import { abortableSleep, RetryGovernor } from './retry.js';
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_QUERY_IDS,
  DEFAULT_TIMEOUT_MS,
  type OperationName,
  TWITTER_API_BASE,
  TWITTER_REST_BASE,
} from './twitter-client-constants.js';
import { buildUserFeatures } from './twitter-client-features.js';
import type { TwitterClientOptions, TwitterUser } from './twitter-client-types.js';
import { normalizeUser } from './twitter-client-utils.js';
import { type RawResponse, type RequestSpec, Transport } from './transport.js';

// biome-ignore lint/suspicious/noExplicitAny: TS mixin constructors must accept any[].
export type AbstractConstructor<T = object> = abstract new (...args: any[]) => T;

export type Mixin<TBase extends AbstractConstructor<TwitterClientBase>, TMethods> = TBase &
  AbstractConstructor<TMethods>;

export interface RequestOptions {
  /** Operation name used in logs and in OperationFailedError messages. */
  name: string;
  signal?: AbortSignal;
}

export interface GraphqlPostOptions extends RequestOptions {
  referer?: string;
  acceptErrorCodes?: readonly number[];
  url?: string;
}

export type UserTarget = { kind: 'id'; id: string } | { kind: 'screenName'; screenName: string };

const SCREEN_NAME = /^[A-Za-z0-9_]{1,15}$/;
const NUMERIC_ID = /^\d+$/;

/**
 * Accepts a numeric user id, `@handle` or a bare handle.
 * Digits-only input is taken as an id; prefix it with `@` to force a handle.
 */
export function parseUserTarget(input: string): UserTarget {
  const trimmed = input.trim();
  if (NUMERIC_ID.test(trimmed)) {
    return { kind: 'id', id: trimmed };
  }
  const handle = trimmed.startsWith('@') ? trimmed.slice(1) : trimmed;
  if (SCREEN_NAME.test(handle)) {
    return { kind: 'screenName', screenName: handle };
  }
  throw new ValidationError(`Not a user id or @handle: "${input}"`);
}

const TWEET_URL = /^https?:\/\/(?:www\.|mobile\.)?(?:x|twitter)\.com\/(?:[^/]+|i(?:\/web)?)\/status(?:es)?\/(\d+)/i;

/** Accepts a numeric tweet id or a status URL. */
export function parseTweetId(input: string): string {
  const trimmed = input.trim();
  if (NUMERIC_ID.test(trimmed)) {
    return trimmed;
  }
  const match = TWEET_URL.exec(trimmed);
  if (match?.[1]) {
    return match[1];
  }
  throw new ValidationError(`Not a tweet id or status URL: "${input}"`);
}

export abstract class TwitterClientBase {
  protected readonly credentials: CredentialContext;
  protected readonly transport: Transport;
  protected readonly governor: RetryGovernor;
  protected readonly logger: Logger;
  protected readonly queryIds: Record<OperationName, string>;
  protected readonly now: () => number;
  protected readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: TwitterClientOptions) {
    this.credentials = new CredentialContext(options.authToken, options.csrfToken, { userAgent: options.userAgent });
    this.logger = options.logger ?? createLogger();
    this.now = options.now ?? Date.now;
    this.transport = new Transport({
      credentials: this.credentials,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      fetch: options.fetch,
      logger: this.logger,
      now: this.now,
    });
    this.governor = new RetryGovernor(
      {
        maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
        baseDelayMs: options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
        maxDelayMs: options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS,
      },
      { logger: this.logger, random: options.random, sleep: options.sleep },
    );
    this.sleep = options.sleep ?? abortableSleep;
    this.queryIds = { ...DEFAULT_QUERY_IDS, ...options.queryIds };
  }

  /** One logical call: the governor retries transient failures of the transport. */
  protected request(spec: RequestSpec, options: RequestOptions): Promise<RawResponse> {
    return this.governor.run(() => this.transport.send(spec, options.signal), {
      name: options.name,
      signal: options.signal,
    });
  }

  protected graphqlGet(
    operation: OperationName,
    variables: Record<string, unknown>,
    features: Record<string, boolean> | undefined,
    options: RequestOptions,
  ): Promise<RawResponse> {
    const query: Record<string, string> = { variables: JSON.stringify(variables) };
    if (features) {
      query.features = JSON.stringify(features);
    }
    return this.request(
      {
        method: 'GET',
        url: `${TWITTER_API_BASE}/${this.queryIds[operation]}/${operation}`,
        query,
        mutating: false,
      },
      options,
    );
  }

  protected graphqlPost(
    operation: OperationName,
    variables: Record<string, unknown>,
    features: Record<string, boolean> | undefined,
    options: GraphqlPostOptions,
  ): Promise<RawResponse> {
    const queryId = this.queryIds[operation];
    const payload: Record<string, unknown> = { variables, queryId };
    if (features) {
      payload.features = features;
    }
    return this.request(
      {
        method: 'POST',
        url: options.url ?? `${TWITTER_API_BASE}/${queryId}/${operation}`,
        body: { kind: 'json', value: payload },
        mutating: true,
        headers: options.referer ? { referer: options.referer } : undefined,
        acceptErrorCodes: options.acceptErrorCodes,
      },
      options,
    );
  }

  protected restPost(
    path: string,
    form: Record<string, string>,
    options: RequestOptions & { acceptErrorCodes?: readonly number[] },
  ): Promise<RawResponse> {
    return this.request(
      {
        method: 'POST',
        url: path.startsWith('https://') ? path : `${TWITTER_REST_BASE}/${path}`,
        body: { kind: 'form', value: form },
        mutating: true,
        acceptErrorCodes: options.acceptErrorCodes,
      },
      options,
    );
  }

  protected async fetchUser(target: UserTarget, signal?: AbortSignal): Promise<TwitterUser> {
    const response =
      target.kind === 'screenName'
        ? await this.graphqlGet(
            'UserByScreenName',
            { screen_name: target.screenName, withSafetyModeUserFields: true },
            buildUserFeatures(),
            { name: 'UserByScreenName', signal },
          )
        : await this.graphqlGet(
            'UserByRestId',
            { userId: target.id, withSafetyModeUserFields: true },
            buildUserFeatures(),
            { name: 'UserByRestId', signal },
          );

    const result = readPath(response.body, 'data', 'user', 'result');
    if (result === undefined) {
      const label = target.kind === 'screenName' ? `@${target.screenName}` : target.id;
      throw new NotFoundError(`User ${label} not found`);
    }
    return normalizeUser(result);
  }

  /** Numeric ids pass through untouched; handles cost one lookup. */
  protected async resolveUserId(input: string, signal?: AbortSignal): Promise<string> {
    const target = parseUserTarget(input);
    if (target.kind === 'id') {
      return target.id;
    }
    const user = await this.fetchUser(target, signal);
    return user.id;
  }
}
