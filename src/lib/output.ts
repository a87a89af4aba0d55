export type OutputConfig = {
  plain: boolean;
  emoji: boolean;
  color: boolean;
};

type Glyph = { emoji: string; text: string; plain: string };

export type StatusKind = 'ok' | 'warn' | 'err' | 'info';
export type LabelKind = 'url' | 'date' | 'schedule' | 'user' | 'userId';

const STATUS: Record<StatusKind, Glyph> = {
  ok: { emoji: '✅', text: 'OK:', plain: '[ok]' },
  warn: { emoji: '⚠️', text: 'Warning:', plain: '[warn]' },
  err: { emoji: '❌', text: 'Error:', plain: '[err]' },
  info: { emoji: 'ℹ️', text: 'Info:', plain: '[info]' },
};

const LABELS: Record<LabelKind, Glyph> = {
  url: { emoji: '🔗', text: 'URL:', plain: 'url:' },
  date: { emoji: '📅', text: 'Date:', plain: 'date:' },
  schedule: { emoji: '⏰', text: 'Scheduled:', plain: 'scheduled:' },
  user: { emoji: '🙋', text: 'User:', plain: 'user:' },
  userId: { emoji: '🪪', text: 'User ID:', plain: 'user_id:' },
};

const COUNTERS = {
  likes: { emoji: '❤️', text: 'Likes', plain: 'likes:' },
  retweets: { emoji: '🔁', text: 'Retweets', plain: 'retweets:' },
  replies: { emoji: '💬', text: 'Replies', plain: 'replies:' },
  quotes: { emoji: '💭', text: 'Quotes', plain: 'quotes:' },
  bookmarks: { emoji: '🔖', text: 'Bookmarks', plain: 'bookmarks:' },
  views: { emoji: '👀', text: 'Views', plain: 'views:' },
} satisfies Record<string, Glyph>;

function glyphFor(glyph: Glyph, cfg: OutputConfig): string {
  if (cfg.plain) return glyph.plain;
  return cfg.emoji ? glyph.emoji : glyph.text;
}

function colorByDefault(env: NodeJS.ProcessEnv, isTty: boolean): boolean {
  return isTty && !Object.hasOwn(env, 'NO_COLOR') && env.TERM !== 'dumb';
}

export function resolveOutputConfigFromArgv(argv: string[], env: NodeJS.ProcessEnv, isTty: boolean): OutputConfig {
  const plain = argv.includes('--plain');
  return {
    plain,
    emoji: !plain && !argv.includes('--no-emoji'),
    color: !plain && !argv.includes('--no-color') && colorByDefault(env, isTty),
  };
}

/** Same rules as the argv variant, from commander's parsed `--no-emoji`/`--no-color`. */
export function resolveOutputConfigFromCommander(
  opts: { plain?: boolean; emoji?: boolean; color?: boolean },
  env: NodeJS.ProcessEnv,
  isTty: boolean,
): OutputConfig {
  const plain = Boolean(opts.plain);
  return {
    plain,
    emoji: !plain && (opts.emoji ?? true),
    color: !plain && (opts.color ?? true) && colorByDefault(env, isTty),
  };
}

export function statusPrefix(kind: StatusKind, cfg: OutputConfig): string {
  return `${glyphFor(STATUS[kind], cfg)} `;
}

export function labelPrefix(kind: LabelKind, cfg: OutputConfig): string {
  return `${glyphFor(LABELS[kind], cfg)} `;
}

function formatCounters(
  counters: Array<[keyof typeof COUNTERS, number | string]>,
  cfg: OutputConfig,
): string {
  return counters.map(([kind, value]) => `${glyphFor(COUNTERS[kind], cfg)} ${value}`).join('  ');
}

export function formatStatsLine(
  stats: { likeCount?: number | null; retweetCount?: number | null; replyCount?: number | null },
  cfg: OutputConfig,
): string {
  return formatCounters(
    [
      ['likes', stats.likeCount ?? 0],
      ['retweets', stats.retweetCount ?? 0],
      ['replies', stats.replyCount ?? 0],
    ],
    cfg,
  );
}

export function formatMetricsLine(
  metrics: { quoteCount: number; bookmarkCount: number; viewCount?: number },
  cfg: OutputConfig,
): string {
  return formatCounters(
    [
      ['quotes', metrics.quoteCount],
      ['bookmarks', metrics.bookmarkCount],
      ['views', metrics.viewCount ?? 'n/a'],
    ],
    cfg,
  );
}

export function formatTweetUrl(tweetId: string): string {
  return `https://x.com/i/status/${tweetId}`;
}

export function formatTweetUrlLine(tweetId: string, cfg: OutputConfig): string {
  return `${labelPrefix('url', cfg)}${formatTweetUrl(tweetId)}`;
}

export function formatUserLine(user: { username: string; name: string; followersCount?: number }): string {
  const followers = user.followersCount === undefined ? '' : ` · ${user.followersCount.toLocaleString('en-US')} followers`;
  return `@${user.username} (${user.name})${followers}`;
}
