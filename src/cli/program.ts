import { Command } from 'commander';
import { registerDeleteCommand } from '../commands/delete.js';
import { registerEngagementCommands } from '../commands/engagement.js';
import { registerPostCommands } from '../commands/post.js';
import { registerReadCommands } from '../commands/read.js';
import { registerRelationshipCommands } from '../commands/relationships.js';
import { registerUserCommands } from '../commands/users.js';
import type { CliContext, GlobalOptions } from './shared.js';

export const CLI_VERSION = '0.1.0';

/** Commands refused under --read-only. */
export const WRITE_COMMANDS = new Set([
  'tweet',
  'reply',
  'schedule',
  'delete',
  'follow',
  'unfollow',
  'block',
  'unblock',
  'mute',
  'unmute',
  'like',
  'unlike',
  'retweet',
  'unretweet',
]);

const collectValues = (value: string, previous: string[] = []) => {
  previous.push(value);
  return previous;
};

export function createProgram(ctx: CliContext): Command {
  const program = new Command();
  const { colors } = ctx;

  program.addHelpText(
    'beforeAll',
    () => `${colors.banner('tweetwright')} ${colors.subtitle('· post, follow and measure on X from the terminal')}`,
  );

  program
    .name('tweetwright')
    .description('Cookie-authenticated client for the X web API')
    .version(CLI_VERSION);

  const formatExample = (command: string, description: string) =>
    `${colors.command(`  ${command}`)}\n${colors.muted(`    ${description}`)}`;

  program.addHelpText(
    'afterAll',
    () =>
      `\n${colors.section('Examples')}\n${[
        formatExample('tweetwright tweet "hello"', 'Post a tweet'),
        formatExample('tweetwright schedule +2h "later"', 'Post in two hours from this process'),
        formatExample('tweetwright followers @someone -n 100', 'First 100 followers'),
        formatExample('tweetwright --read-only metrics 1234567890', 'Counters, with writes disabled'),
      ].join('\n\n')}`,
  );

  program
    .option('--auth-token <token>', 'auth_token cookie (or set AUTH_TOKEN)')
    .option('--ct0 <token>', 'ct0 cookie (or set CT0)')
    .option('--media <path>', 'Attach media file (repeatable, up to 4 images or 1 video)', collectValues, [])
    .option('--alt <text>', 'Alt text for the corresponding --media (repeatable)', collectValues, [])
    .option('--timeout <ms>', 'Request timeout in milliseconds')
    .option('--max-attempts <n>', 'Attempts per request, including the first')
    .option('--read-only', 'Refuse commands that change account state')
    .option('--plain', 'Plain output (stable, no emoji, no color)')
    .option('--no-emoji', 'Disable emoji output')
    .option('--no-color', 'Disable ANSI colors (or set NO_COLOR)');

  program.hook('preAction', (_thisCommand, actionCommand) => {
    ctx.applyOutputFromCommand(actionCommand);
    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    if (opts.readOnly && WRITE_COMMANDS.has(actionCommand.name())) {
      console.error(`${ctx.p('err')}${actionCommand.name()} changes account state and is disabled by --read-only`);
      process.exit(1);
    }
  });

  registerPostCommands(program, ctx);
  registerDeleteCommand(program, ctx);
  registerEngagementCommands(program, ctx);
  registerRelationshipCommands(program, ctx);
  registerUserCommands(program, ctx);
  registerReadCommands(program, ctx);

  return program;
}
