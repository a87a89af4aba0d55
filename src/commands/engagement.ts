import type { Command } from 'commander';
import { type CliContext, createClientOrExit, errorMessage, type GlobalOptions } from '../cli/shared.js';
import type { TwitterClient } from '../lib/twitter-client.js';

const ENGAGEMENT_VERBS = ['like', 'unlike', 'retweet', 'unretweet'] as const;
type EngagementVerb = (typeof ENGAGEMENT_VERBS)[number];

const VERBS: Record<EngagementVerb, { description: string; done: string; unchanged: string }> = {
  like: { description: 'Like tweets', done: 'Liked', unchanged: 'already liked' },
  unlike: { description: 'Unlike tweets', done: 'Unliked', unchanged: 'not liked' },
  retweet: { description: 'Retweet tweets', done: 'Retweeted', unchanged: 'already retweeted' },
  unretweet: { description: 'Undo retweets', done: 'Unretweeted', unchanged: 'was not retweeted' },
};

function apply(client: TwitterClient, verb: EngagementVerb, tweetId: string) {
  switch (verb) {
    case 'like':
      return client.like(tweetId);
    case 'unlike':
      return client.unlike(tweetId);
    case 'retweet':
      return client.retweet(tweetId);
    case 'unretweet':
      return client.unretweet(tweetId);
  }
}

export function registerEngagementCommands(program: Command, ctx: CliContext): void {
  for (const verb of ENGAGEMENT_VERBS) {
    const copy = VERBS[verb];
    program
      .command(verb)
      .description(copy.description)
      .argument('<tweet-id-or-url...>', 'Tweet IDs or URLs')
      .action(async (tweetIdOrUrls: string[]) => {
        const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());
        let failures = 0;

        for (const input of tweetIdOrUrls) {
          try {
            const result = await apply(client, verb, ctx.extractTweetId(input));
            const note = result.alreadyInState ? ` (${copy.unchanged})` : '';
            console.log(`${ctx.p('ok')}${copy.done} tweet ${result.tweetId}${note}`);
          } catch (error) {
            failures += 1;
            console.error(`${ctx.p('err')}Failed to ${verb} tweet ${input}: ${errorMessage(error)}`);
          }
        }

        if (failures > 0) {
          process.exit(1);
        }
      });
  }
}
