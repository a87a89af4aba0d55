import { vi } from 'vitest';
import type { LogEntry, Logger } from '../src/lib/logger.js';
import { createLogger, silentLogger } from '../src/lib/logger.js';
import { TwitterClient, type TwitterClientOptions } from '../src/lib/twitter-client.js';

export const testCookies = { authToken: 'test-auth-token', ct0: 'test-csrf-token' };

export function jsonResponse(body: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { 'content-type': 'application/json', ...init.headers },
  });
}

export type FetchMock = ReturnType<typeof mockFetch>;

/** A fetch stand-in answering with the queued responses in order. */
export function mockFetch(...responses: Response[]) {
  const queue = [...responses];
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (!next) {
      throw new Error('Unexpected fetch call');
    }
    return next;
  });
}

export function requestUrl(fetchMock: FetchMock, call = 0): string {
  const input = fetchMock.mock.calls[call]?.[0];
  if (input === undefined) {
    throw new Error(`No fetch call #${call}`);
  }
  return typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
}

export function requestInit(fetchMock: FetchMock, call = 0): RequestInit {
  const init = fetchMock.mock.calls[call]?.[1];
  if (!init) {
    throw new Error(`No fetch init for call #${call}`);
  }
  return init;
}

export function requestHeaders(fetchMock: FetchMock, call = 0): Record<string, string | readonly string[]> {
  const headers = requestInit(fetchMock, call).headers;
  return headers && !Array.isArray(headers) && !(headers instanceof Headers) ? headers : {};
}

export function jsonBody(fetchMock: FetchMock, call = 0): unknown {
  const body = requestInit(fetchMock, call).body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

export function formBody(fetchMock: FetchMock, call = 0): Record<string, string> {
  const body = requestInit(fetchMock, call).body;
  return typeof body === 'string' ? Object.fromEntries(new URLSearchParams(body)) : {};
}

/** Logger collecting parsed entries instead of writing them. */
export function recordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    level: 'debug',
    write: (line) => {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

export const noSleep = async (): Promise<void> => {};

export function makeClient(fetchMock: FetchMock, overrides: Partial<TwitterClientOptions> = {}): TwitterClient {
  return new TwitterClient({
    authToken: testCookies.authToken,
    csrfToken: testCookies.ct0,
    fetch: fetchMock,
    logger: silentLogger,
    sleep: noSleep,
    random: () => 0.5,
    ...overrides,
  });
}

/** Parsed `variables` query parameter of a GraphQL GET. */
export function graphqlVariables(fetchMock: FetchMock, call = 0): unknown {
  const variables = new URL(requestUrl(fetchMock, call)).searchParams.get('variables');
  return variables === null ? undefined : JSON.parse(variables);
}
