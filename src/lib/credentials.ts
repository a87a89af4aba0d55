// ABOUTME: Immutable session credentials and the header set derived from them.

import { DEFAULT_USER_AGENT, TWITTER_ORIGIN, TWITTER_WEB_BEARER } from './twitter-client-constants.js';
import { InvalidCredentialsError } from './errors.js';

export interface TwitterCookies {
  authToken: string;
  ct0: string;
}

const COOKIE_VALUE = /^[A-Za-z0-9_%-]+$/;
const MIN_LENGTH = 8;
const MAX_LENGTH = 512;

function checkToken(label: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidCredentialsError(`${label} is empty`);
  }
  if (trimmed.length < MIN_LENGTH || trimmed.length > MAX_LENGTH) {
    throw new InvalidCredentialsError(`${label} must be between ${MIN_LENGTH} and ${MAX_LENGTH} characters`);
  }
  if (!COOKIE_VALUE.test(trimmed)) {
    throw new InvalidCredentialsError(`${label} contains characters that cannot appear in a cookie value`);
  }
  return trimmed;
}

export class CredentialContext {
  readonly authToken: string;
  readonly csrfToken: string;
  readonly userAgent: string;
  readonly language: string;

  constructor(authToken: string, csrfToken: string, options: { userAgent?: string; language?: string } = {}) {
    this.authToken = checkToken('auth_token', authToken);
    this.csrfToken = checkToken('ct0', csrfToken);
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.language = options.language ?? 'en';
    Object.freeze(this);
  }

  static fromCookies(cookies: TwitterCookies, options: { userAgent?: string } = {}): CredentialContext {
    return new CredentialContext(cookies.authToken, cookies.ct0, options);
  }

  get cookieHeader(): string {
    return `auth_token=${this.authToken}; ct0=${this.csrfToken}`;
  }

  /**
   * Headers every request carries. A fresh object per call, so per-request
   * additions never leak into another in-flight request.
   */
  headers(): Record<string, string> {
    return {
      accept: '*/*',
      'accept-language': `${this.language}-US,${this.language};q=0.9`,
      authorization: TWITTER_WEB_BEARER,
      cookie: this.cookieHeader,
      'x-csrf-token': this.csrfToken,
      'x-twitter-auth-type': 'OAuth2Session',
      'x-twitter-active-user': 'yes',
      'x-twitter-client-language': this.language,
      'user-agent': this.userAgent,
      origin: TWITTER_ORIGIN,
      referer: `${TWITTER_ORIGIN}/`,
    };
  }
}
