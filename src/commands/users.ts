import type { Command } from 'commander';
import { type CliContext, createClientOrExit, failAndExit, type GlobalOptions } from '../cli/shared.js';
import { collect } from '../lib/pagination.js';
import { formatStatsLine, formatTweetUrlLine, formatUserLine } from '../lib/output.js';
import type { TweetData, TwitterUser } from '../lib/twitter-client-types.js';

type ListCommandOptions = { count?: string; json?: boolean };

const SEPARATOR = '──────────────────────────────────────────────────';

function parseCountOrExit(ctx: CliContext, raw: string | undefined): number {
  const count = Number(raw ?? '20');
  if (!Number.isInteger(count) || count <= 0) {
    console.error(`${ctx.p('err')}--count must be a positive number`);
    process.exit(1);
  }
  return count;
}

function printUsers(ctx: CliContext, users: TwitterUser[], json: boolean): void {
  if (json) {
    console.log(JSON.stringify(users, null, 2));
    return;
  }
  if (users.length === 0) {
    console.log('No users found.');
    return;
  }
  for (const user of users) {
    console.log(formatUserLine(user));
    if (user.description) {
      console.log(`  ${user.description.slice(0, 100)}${user.description.length > 100 ? '...' : ''}`);
    }
    console.log(`  ${ctx.l('userId')}${user.id}`);
    console.log(SEPARATOR);
  }
}

function printTweets(ctx: CliContext, tweets: TweetData[], json: boolean): void {
  if (json) {
    console.log(JSON.stringify(tweets, null, 2));
    return;
  }
  if (tweets.length === 0) {
    console.log('No tweets found.');
    return;
  }
  const output = ctx.getOutput();
  for (const tweet of tweets) {
    console.log(`@${tweet.author.username}: ${tweet.text}`);
    if (tweet.createdAt) {
      console.log(`${ctx.l('date')}${tweet.createdAt}`);
    }
    console.log(formatStatsLine(tweet, output));
    console.log(formatTweetUrlLine(tweet.id, output));
    console.log(SEPARATOR);
  }
}

export function registerUserCommands(program: Command, ctx: CliContext): void {
  const listCommands = [
    { name: 'followers', description: 'List accounts that follow a user', label: 'followers' },
    { name: 'following', description: 'List accounts a user follows', label: 'following' },
  ] as const;

  for (const list of listCommands) {
    program
      .command(list.name)
      .description(list.description)
      .argument('<user>', 'User ID or @handle')
      .option('-n, --count <number>', 'Number of users to fetch', '20')
      .option('--json', 'Output as JSON')
      .action(async (user: string, cmdOpts: ListCommandOptions) => {
        const count = parseCountOrExit(ctx, cmdOpts.count);
        const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());

        let users: TwitterUser[];
        try {
          const sequence =
            list.name === 'followers'
              ? client.getFollowers(user, { limit: count })
              : client.getFollowing(user, { limit: count });
          users = await collect(sequence);
        } catch (error) {
          failAndExit(ctx, `Failed to fetch ${list.label}`, error);
        }
        printUsers(ctx, users, Boolean(cmdOpts.json));
      });
  }

  const viewerLists = [
    { name: 'blocked', description: 'List accounts you have blocked', label: 'blocked accounts' },
    { name: 'muted', description: 'List accounts you have muted', label: 'muted accounts' },
  ] as const;

  for (const list of viewerLists) {
    program
      .command(list.name)
      .description(list.description)
      .option('-n, --count <number>', 'Number of users to fetch', '20')
      .option('--json', 'Output as JSON')
      .action(async (cmdOpts: ListCommandOptions) => {
        const count = parseCountOrExit(ctx, cmdOpts.count);
        const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());

        let users: TwitterUser[];
        try {
          const sequence =
            list.name === 'blocked' ? client.getBlockedUsers({ limit: count }) : client.getMutedUsers({ limit: count });
          users = await collect(sequence);
        } catch (error) {
          failAndExit(ctx, `Failed to fetch ${list.label}`, error);
        }
        printUsers(ctx, users, Boolean(cmdOpts.json));
      });
  }

  program
    .command('tweets')
    .description("List a user's recent tweets")
    .argument('<user>', 'User ID or @handle')
    .option('-n, --count <number>', 'Number of tweets to fetch', '20')
    .option('--json', 'Output as JSON')
    .action(async (user: string, cmdOpts: ListCommandOptions) => {
      const count = parseCountOrExit(ctx, cmdOpts.count);
      const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());

      let tweets: TweetData[];
      try {
        tweets = await collect(client.getUserTweets(user, { limit: count }));
      } catch (error) {
        failAndExit(ctx, 'Failed to fetch tweets', error);
      }
      printTweets(ctx, tweets, Boolean(cmdOpts.json));
    });

  program
    .command('likers')
    .description('List accounts that liked a tweet')
    .argument('<tweet-id-or-url>', 'Tweet ID or URL')
    .option('-n, --count <number>', 'Number of users to fetch', '20')
    .option('--json', 'Output as JSON')
    .action(async (tweetIdOrUrl: string, cmdOpts: ListCommandOptions) => {
      const count = parseCountOrExit(ctx, cmdOpts.count);
      const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());

      let users: TwitterUser[];
      try {
        users = await collect(client.getLikers(ctx.extractTweetId(tweetIdOrUrl), { limit: count }));
      } catch (error) {
        failAndExit(ctx, 'Failed to fetch likers', error);
      }
      printUsers(ctx, users, Boolean(cmdOpts.json));
    });

  program
    .command('user')
    .description('Show a user profile')
    .argument('<user>', 'User ID or @handle')
    .option('--json', 'Output as JSON')
    .action(async (handleOrId: string, cmdOpts: { json?: boolean }) => {
      const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());

      let user: TwitterUser;
      try {
        user = await client.getUser(handleOrId);
      } catch (error) {
        failAndExit(ctx, 'Failed to fetch user', error);
      }

      if (cmdOpts.json) {
        console.log(JSON.stringify(user, null, 2));
        return;
      }
      console.log(`${ctx.l('user')}${formatUserLine(user)}`);
      console.log(`${ctx.l('userId')}${user.id}`);
      if (user.description) {
        console.log(user.description);
      }
      if (user.followingCount !== undefined) {
        console.log(`${ctx.p('info')}${user.followingCount.toLocaleString('en-US')} following`);
      }
      if (user.createdAt) {
        console.log(`${ctx.l('date')}${user.createdAt}`);
      }
    });
}
