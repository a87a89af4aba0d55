#!/usr/bin/env node
/**
 * tweetwright - post, schedule, follow and read metrics on X with browser session cookies
 *
 * Usage:
 *   tweetwright tweet "Hello world!"
 *   tweetwright reply <tweet-id-or-url> "This is a reply"
 *   tweetwright follow @someone 12345
 *   tweetwright metrics <tweet-id-or-url>
 */

import { createProgram } from './cli/program.js';
import { createCliContext, errorMessage } from './cli/shared.js';

const rawArgs = process.argv.slice(2);
const normalizedArgs = rawArgs[0] === '--' ? rawArgs.slice(1) : rawArgs;

const ctx = createCliContext(normalizedArgs);
const program = createProgram(ctx);

program.parseAsync(['node', 'tweetwright', ...normalizedArgs]).catch((error: unknown) => {
  console.error(`${ctx.p('err')}${errorMessage(error)}`);
  process.exit(1);
});
