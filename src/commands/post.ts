import type { Command } from 'commander';
import {
  type CliContext,
  createClientOrExit,
  errorMessage,
  failAndExit,
  type GlobalOptions,
  type MediaSpec,
} from '../cli/shared.js';
import { formatTweetUrlLine } from '../lib/output.js';
import type { TwitterClient } from '../lib/twitter-client.js';
import type { TweetData } from '../lib/twitter-client-types.js';

function loadMediaOrExit(ctx: CliContext, opts: GlobalOptions): MediaSpec[] {
  try {
    return ctx.loadMedia({ media: opts.media ?? [], alts: opts.alt ?? [] });
  } catch (error) {
    console.error(`${ctx.p('err')}${errorMessage(error)}`);
    process.exit(1);
  }
}

async function uploadMediaOrExit(
  client: TwitterClient,
  media: MediaSpec[],
  ctx: CliContext,
): Promise<string[] | undefined> {
  if (media.length === 0) {
    return undefined;
  }

  const uploaded: string[] = [];
  for (const item of media) {
    try {
      const res = await client.uploadMedia({ data: item.buffer, mimeType: item.mime, alt: item.alt });
      uploaded.push(res.mediaId);
    } catch (error) {
      failAndExit(ctx, `Media upload failed for ${item.path}`, error);
    }
  }
  return uploaded;
}

function parseWhen(value: string): Date | null {
  // "+15m", "+2h" and "+1d" are relative to now; anything else goes through Date.
  const relative = /^\+(\d+)([smhd])$/.exec(value.trim());
  if (relative) {
    const amount = Number(relative[1]);
    const unitMs = { s: 1_000, m: 60_000, h: 3_600_000, d: 86_400_000 }[relative[2] ?? 's'] ?? 1_000;
    return new Date(Date.now() + amount * unitMs);
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function registerPostCommands(program: Command, ctx: CliContext): void {
  program
    .command('tweet')
    .description('Post a new tweet')
    .argument('<text>', 'Tweet text')
    .option('--quote <tweet-id-or-url>', 'Quote tweet: embed the given tweet')
    .action(async (text: string, cmdOpts: { quote?: string }) => {
      const opts = program.opts<GlobalOptions>();
      const media = loadMediaOrExit(ctx, opts);
      const client = await createClientOrExit(ctx, opts);
      const mediaIds = await uploadMediaOrExit(client, media, ctx);

      let tweet: TweetData;
      try {
        const quoteTweetId = cmdOpts.quote ? ctx.extractTweetId(cmdOpts.quote) : undefined;
        if (quoteTweetId) {
          console.error(`${ctx.p('info')}Quoting tweet: ${quoteTweetId}`);
        }
        tweet = await client.postTweet(text, { mediaIds, quoteTweetId });
      } catch (error) {
        failAndExit(ctx, 'Failed to post tweet', error);
      }

      console.log(`${ctx.p('ok')}${cmdOpts.quote ? 'Quote tweet' : 'Tweet'} posted successfully!`);
      console.log(formatTweetUrlLine(tweet.id, ctx.getOutput()));
    });

  program
    .command('reply')
    .description('Reply to an existing tweet')
    .argument('<tweet-id-or-url>', 'Tweet ID or URL to reply to')
    .argument('<text>', 'Reply text')
    .action(async (tweetIdOrUrl: string, text: string) => {
      const opts = program.opts<GlobalOptions>();
      const media = loadMediaOrExit(ctx, opts);

      let tweetId: string;
      try {
        tweetId = ctx.extractTweetId(tweetIdOrUrl);
      } catch (error) {
        failAndExit(ctx, 'Invalid tweet', error);
      }

      const client = await createClientOrExit(ctx, opts);
      console.error(`${ctx.p('info')}Replying to tweet: ${tweetId}`);
      const mediaIds = await uploadMediaOrExit(client, media, ctx);

      let tweet: TweetData;
      try {
        tweet = await client.reply(text, tweetId, { mediaIds });
      } catch (error) {
        failAndExit(ctx, 'Failed to post reply', error);
      }

      console.log(`${ctx.p('ok')}Reply posted successfully!`);
      console.log(formatTweetUrlLine(tweet.id, ctx.getOutput()));
    });

  program
    .command('schedule')
    .description('Post a tweet later; the process stays alive until it is posted')
    .argument('<when>', 'ISO timestamp or relative offset such as +15m, +2h, +1d')
    .argument('<text>', 'Tweet text')
    .action(async (when: string, text: string) => {
      const opts = program.opts<GlobalOptions>();
      const at = parseWhen(when);
      if (!at) {
        console.error(`${ctx.p('err')}Invalid time: ${when}`);
        process.exit(1);
      }

      const client = await createClientOrExit(ctx, opts);

      let tweet: TweetData;
      try {
        const handle = client.scheduleTweet(text, at);
        console.error(`${ctx.l('schedule')}${handle.at.toISOString()} (${handle.id})`);
        tweet = await handle.result;
      } catch (error) {
        failAndExit(ctx, 'Scheduled tweet failed', error);
      }

      console.log(`${ctx.p('ok')}Scheduled tweet posted!`);
      console.log(formatTweetUrlLine(tweet.id, ctx.getOutput()));
    });
}
