import type { Command } from 'commander';
import { type CliContext, createClientOrExit, failAndExit, type GlobalOptions } from '../cli/shared.js';
import { formatMetricsLine, formatStatsLine, formatTweetUrlLine } from '../lib/output.js';
import type { TweetData, TweetMetrics } from '../lib/twitter-client-types.js';

export function registerReadCommands(program: Command, ctx: CliContext): void {
  program
    .command('read')
    .description('Read a single tweet')
    .argument('<tweet-id-or-url>', 'Tweet ID or URL')
    .option('--json', 'Output as JSON')
    .action(async (tweetIdOrUrl: string, cmdOpts: { json?: boolean }) => {
      const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());

      let tweet: TweetData;
      try {
        tweet = await client.getTweet(ctx.extractTweetId(tweetIdOrUrl));
      } catch (error) {
        failAndExit(ctx, 'Failed to read tweet', error);
      }

      if (cmdOpts.json) {
        console.log(JSON.stringify(tweet, null, 2));
        return;
      }
      const output = ctx.getOutput();
      console.log(`@${tweet.author.username} (${tweet.author.name}):`);
      console.log(tweet.text);
      for (const url of tweet.mediaUrls ?? []) {
        console.log(`  ${url}`);
      }
      if (tweet.createdAt) {
        console.log(`${ctx.l('date')}${tweet.createdAt}`);
      }
      console.log(formatStatsLine(tweet, output));
      console.log(formatTweetUrlLine(tweet.id, output));
    });

  program
    .command('metrics')
    .description('Show engagement counters for a tweet')
    .argument('<tweet-id-or-url>', 'Tweet ID or URL')
    .option('--json', 'Output as JSON')
    .action(async (tweetIdOrUrl: string, cmdOpts: { json?: boolean }) => {
      const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());

      let metrics: TweetMetrics;
      try {
        metrics = await client.getMetrics(ctx.extractTweetId(tweetIdOrUrl));
      } catch (error) {
        failAndExit(ctx, 'Failed to fetch metrics', error);
      }

      if (cmdOpts.json) {
        console.log(JSON.stringify(metrics, null, 2));
        return;
      }
      const output = ctx.getOutput();
      console.log(formatStatsLine(metrics, output));
      console.log(formatMetricsLine(metrics, output));
      console.log(formatTweetUrlLine(metrics.tweetId, output));
    });
}
