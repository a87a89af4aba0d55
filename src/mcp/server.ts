// ABOUTME: MCP server wiring: tool list and tool calls against one lazily built client.
// ABOUTME: Failures come back as isError results, never as protocol errors.

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { loadConfig, validateConfig } from '../lib/config.js';
import { TwitterClientError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { TwitterClient } from '../lib/twitter-client.js';
import { toolHandlers, tools } from './tools.js';

export const SERVER_NAME = 'tweetwright-mcp';

/**
 * Create and configure the MCP server. `clientFactory` is called once, on the first tool call.
 */
export function createServer(clientFactory: () => TwitterClient = createClientFromEnv): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  let cachedClient: TwitterClient | null = null;
  const getTwitterClient = (): TwitterClient => {
    cachedClient ??= clientFactory();
    return cachedClient;
  };

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = toolHandlers[name];
    if (!handler) {
      return {
        content: [{ type: 'text', text: `Unknown tool: ${name}` }],
        isError: true,
      };
    }

    try {
      const result = await handler(getTwitterClient(), args ?? {});
      return {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const kind = error instanceof TwitterClientError ? `${error.name}: ` : 'Error: ';
      return {
        content: [{ type: 'text', text: `${kind}${message}` }],
        isError: true,
      };
    }
  });

  return server;
}

export function createClientFromEnv(): TwitterClient {
  const config = loadConfig();
  const validation = validateConfig(config, { requireCredentials: true });
  const { authToken, ct0 } = config.credentials;
  if (!validation.valid || !authToken || !ct0) {
    throw new Error(`Configuration invalid: ${validation.errors.join('; ')}`);
  }

  return new TwitterClient({
    authToken,
    csrfToken: ct0,
    ...config.request,
    logger: createLogger({ level: config.logging.level }),
  });
}
