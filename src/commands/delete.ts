import type { Command } from 'commander';
import { type CliContext, createClientOrExit, errorMessage, type GlobalOptions } from '../cli/shared.js';

export function registerDeleteCommand(program: Command, ctx: CliContext): void {
  program
    .command('delete')
    .description('Delete a tweet')
    .argument('<tweet-id-or-url...>', 'Tweet IDs or URLs to delete')
    .option('--json', 'Output results as JSON')
    .action(async (tweetIdOrUrls: string[], cmdOpts: { json?: boolean }) => {
      const opts = program.opts<GlobalOptions>();
      const jsonOutput = Boolean(cmdOpts.json);
      const client = await createClientOrExit(ctx, opts);
      const results: Array<{ tweetId: string; success: boolean; error?: string }> = [];

      for (const input of tweetIdOrUrls) {
        try {
          const tweetId = ctx.extractTweetId(input);
          await client.deleteTweet(tweetId);
          results.push({ tweetId, success: true });
          if (!jsonOutput) {
            console.log(`${ctx.p('ok')}Deleted tweet ${tweetId}`);
          }
        } catch (error) {
          results.push({ tweetId: input, success: false, error: errorMessage(error) });
          if (!jsonOutput) {
            console.error(`${ctx.p('err')}Failed to delete tweet ${input}: ${errorMessage(error)}`);
          }
        }
      }

      if (jsonOutput) {
        console.log(JSON.stringify(results.length === 1 ? results[0] : results, null, 2));
      }

      const failures = results.filter((r) => !r.success).length;
      if (failures > 0) {
        process.exit(1);
      }
    });
}
