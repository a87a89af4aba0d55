import type { Command } from 'commander';
import { type CliContext, createClientOrExit, errorMessage, type GlobalOptions } from '../cli/shared.js';
import type { TwitterClient } from '../lib/twitter-client.js';
import type { BulkResult, FollowRelationship } from '../lib/twitter-client-types.js';

type BulkVerb = 'follow' | 'unfollow' | 'block' | 'mute';
type SingleVerb = 'unblock' | 'unmute';

const PAST_TENSE: Record<BulkVerb | SingleVerb, string> = {
  follow: 'Followed',
  unfollow: 'Unfollowed',
  block: 'Blocked',
  unblock: 'Unblocked',
  mute: 'Muted',
  unmute: 'Unmuted',
};

function runBulk(client: TwitterClient, verb: BulkVerb, users: string[]): Promise<BulkResult> {
  switch (verb) {
    case 'follow':
      return client.followMany(users);
    case 'unfollow':
      return client.unfollowMany(users);
    case 'block':
      return client.blockMany(users);
    case 'mute':
      return client.muteMany(users);
  }
}

function runSingle(client: TwitterClient, verb: SingleVerb, user: string): Promise<FollowRelationship> {
  return verb === 'unblock' ? client.unblock(user) : client.unmute(user);
}

function describeTarget(target: string, relationship: FollowRelationship): string {
  const handle = relationship.user ? `@${relationship.user.username}` : target;
  return relationship.alreadyInState ? `${handle} (no change)` : handle;
}

function printBulk(ctx: CliContext, verb: BulkVerb, result: BulkResult, json: boolean): void {
  if (json) {
    console.log(
      JSON.stringify(
        {
          succeeded: result.succeeded,
          failed: result.failed.map((failure) => ({ target: failure.target, error: failure.error.message })),
          skipped: result.skipped,
        },
        null,
        2,
      ),
    );
    return;
  }
  for (const relationship of result.succeeded) {
    console.log(`${ctx.p('ok')}${PAST_TENSE[verb]} ${describeTarget(relationship.userId, relationship)}`);
  }
  for (const failure of result.failed) {
    console.error(`${ctx.p('err')}Failed to ${verb} ${failure.target}: ${failure.error.message}`);
  }
  if (result.skipped.length > 0) {
    console.error(`${ctx.p('warn')}Skipped after auth failure: ${result.skipped.join(', ')}`);
  }
}

export function registerRelationshipCommands(program: Command, ctx: CliContext): void {
  const bulkVerbs: Array<[BulkVerb, string]> = [
    ['follow', 'Follow users'],
    ['unfollow', 'Unfollow users'],
    ['block', 'Block users'],
    ['mute', 'Mute users'],
  ];

  for (const [verb, description] of bulkVerbs) {
    program
      .command(verb)
      .description(description)
      .argument('<user...>', 'User IDs or @handles')
      .option('--json', 'Output results as JSON')
      .action(async (users: string[], cmdOpts: { json?: boolean }) => {
        const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());
        const result = await runBulk(client, verb, users);
        printBulk(ctx, verb, result, Boolean(cmdOpts.json));
        if (result.failed.length > 0 || result.skipped.length > 0) {
          process.exit(1);
        }
      });
  }

  const singleVerbs: Array<[SingleVerb, string]> = [
    ['unblock', 'Unblock users'],
    ['unmute', 'Unmute users'],
  ];

  for (const [verb, description] of singleVerbs) {
    program
      .command(verb)
      .description(description)
      .argument('<user...>', 'User IDs or @handles')
      .action(async (users: string[]) => {
        const client = await createClientOrExit(ctx, program.opts<GlobalOptions>());
        let failures = 0;

        for (const user of users) {
          try {
            const relationship = await runSingle(client, verb, user);
            console.log(`${ctx.p('ok')}${PAST_TENSE[verb]} ${describeTarget(user, relationship)}`);
          } catch (error) {
            failures += 1;
            console.error(`${ctx.p('err')}Failed to ${verb} ${user}: ${errorMessage(error)}`);
          }
        }

        if (failures > 0) {
          process.exit(1);
        }
      });
  }
}
