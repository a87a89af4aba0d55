export const TWITTER_ORIGIN = 'https://x.com';
export const TWITTER_API_BASE = 'https://x.com/i/api/graphql';
export const TWITTER_REST_BASE = 'https://x.com/i/api/1.1';
export const TWITTER_STATUS_UPDATE_URL = `${TWITTER_REST_BASE}/statuses/update.json`;
export const TWITTER_UPLOAD_URL = 'https://upload.x.com/i/media/upload.json';
export const TWITTER_MEDIA_METADATA_URL = `${TWITTER_REST_BASE}/media/metadata/create.json`;

// Public bearer of the x.com web client; the session itself is carried by the cookies.
export const TWITTER_WEB_BEARER =
  'Bearer AAAAAAAAAAAAAAAAAAAAANRILgAAAAAAnNwIzUejRCOuH5E6I8xnZz4puTs%3D1Zv7ttfk8LF81IUq16cHjhLTvJu4FA33AGWWjCpTnA';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1_000;
export const DEFAULT_MAX_DELAY_MS = 30_000;
export const DEFAULT_PAGE_SIZE = 50;

export const MAX_TWEET_LENGTH = 280;

// Query IDs rotate; callers can override any of them through TwitterClientOptions.queryIds.
export const DEFAULT_QUERY_IDS = {
  CreateTweet: 'TAJw1rBsjAtdNgTdlo2oeg',
  DeleteTweet: 'VaenaVgh5q5ih7kvyVjgtg',
  FavoriteTweet: 'lI07N6Otwv1PhnEgXILM7A',
  UnfavoriteTweet: 'ZYKSe-w7KEslx3JhSIk5LA',
  TweetResultByRestId: 'Xl5pC_lBk_gcO2ItU39DQw',
  UserByScreenName: 'k5XapwcSikNsEsILW5FvgA',
  UserByRestId: 'tD8zKvQzwY3kdx5yz6YmOw',
  Followers: 'Uc7ZOJrxsJAzMVCcaxis8Q',
  Following: 'PiHWpObvX9tbClrUl6rL9g',
  Favoriters: 'mDc_nU8xGv0cLRWtTaIEug',
  CreateRetweet: 'ojPdsZsimiJrUGLR1sjUtA',
  DeleteRetweet: 'iQtK4dl5hBmXewYZuEOKVw',
  UserTweets: 'eS7LO5Jy3xgmd3dbL044EA',
  BlockedAccountsAll: 'EDuJJnhTxj5gMtDd6iifiA',
  MutedAccounts: '7gmS7e2n-S0uFC1TqweqGA',
} as const;

export type OperationName = keyof typeof DEFAULT_QUERY_IDS;

// Upstream error codes that mean the target is already in the requested state.
export const ALREADY_REQUESTED_FOLLOW_CODE = 160;
export const NOT_MUTING_CODE = 272;
export const ALREADY_FAVORITED_CODE = 139;
export const ALREADY_RETWEETED_CODE = 327;
export const AUTOMATION_SUSPECTED_CODE = 226;
