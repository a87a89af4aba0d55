// ABOUTME: Single HTTP call with credentials attached, per-call timeout and failure classification.
// ABOUTME: Retry decisions are not made here; see retry.ts.

import type { CredentialContext } from './credentials.js';
import {
  type ApiErrorEntry,
  AuthError,
  classifyFailure,
  NetworkError,
  OperationCancelledError,
  UnexpectedShapeError,
} from './errors.js';
import type { Logger } from './logger.js';
import { hasData, readApiErrors } from './json.js';

export type RequestBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'form'; value: Record<string, string> }
  | { kind: 'multipart'; value: FormData };

export interface RequestSpec {
  readonly method: 'GET' | 'POST';
  readonly url: string;
  readonly query?: Readonly<Record<string, string>>;
  readonly body?: RequestBody;
  readonly mutating: boolean;
  readonly headers?: Readonly<Record<string, string>>;
  /** Upstream error codes meaning "already in that state"; returned instead of thrown. */
  readonly acceptErrorCodes?: readonly number[];
}

export interface RawResponse {
  status: number;
  headers: Headers;
  body: unknown;
  errors: ApiErrorEntry[];
  acceptedErrors: ApiErrorEntry[];
}

export interface TransportOptions {
  credentials: CredentialContext;
  timeoutMs: number;
  fetch?: typeof fetch;
  logger: Logger;
  now?: () => number;
}

export function buildUrl(spec: Pick<RequestSpec, 'url' | 'query'>): string {
  if (!spec.query || Object.keys(spec.query).length === 0) {
    return spec.url;
  }
  const params = new URLSearchParams(spec.query);
  return `${spec.url}${spec.url.includes('?') ? '&' : '?'}${params.toString()}`;
}

/**
 * Milliseconds to wait according to `retry-after` (seconds) or
 * `x-rate-limit-reset` (epoch seconds); null when neither is usable.
 */
export function parseRetryAfter(headers: Headers, now: number): number | null {
  const retryAfter = headers.get('retry-after');
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.ceil(seconds * 1000);
    }
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) {
      return Math.max(0, date - now);
    }
  }

  const reset = headers.get('x-rate-limit-reset');
  if (reset) {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds) && epochSeconds > 0) {
      return Math.max(0, epochSeconds * 1000 - now) + 1000;
    }
  }
  return null;
}

// Body streams from a fetch stand-in are not tied to the request signal.
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

export class Transport {
  private readonly credentials: CredentialContext;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: TransportOptions) {
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  private buildInit(spec: RequestSpec): RequestInit {
    const headers: Record<string, string> = { ...this.credentials.headers(), ...spec.headers };
    if (spec.mutating && headers['x-csrf-token'] !== this.credentials.csrfToken) {
      throw new AuthError('Mutating requests must carry the session csrf token');
    }

    const init: RequestInit = { method: spec.method, headers };
    const body = spec.body;
    if (!body) {
      return init;
    }
    switch (body.kind) {
      case 'json':
        headers['content-type'] = 'application/json';
        init.body = JSON.stringify(body.value);
        break;
      case 'form':
        headers['content-type'] = 'application/x-www-form-urlencoded';
        init.body = new URLSearchParams(body.value).toString();
        break;
      case 'multipart':
        // fetch sets the multipart boundary itself.
        init.body = body.value;
        break;
    }
    return init;
  }

  /**
   * Fetch and read the whole body under one timer and one abort listener;
   * a body that stalls after the headers arrive times out like a hung request.
   */
  private async exchange(
    url: string,
    init: RequestInit,
    signal?: AbortSignal,
  ): Promise<{ response: Response; text: string }> {
    if (signal?.aborted) {
      throw new OperationCancelledError('Request cancelled before it was sent');
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timeoutId = this.timeoutMs > 0 ? setTimeout(() => controller.abort(), this.timeoutMs) : undefined;

    let phase: 'fetch' | 'body' = 'fetch';
    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      phase = 'body';
      const text = await untilAborted(response.text(), controller.signal);
      return { response, text };
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Request cancelled', { cause: error });
      }
      if (controller.signal.aborted) {
        throw new NetworkError(`Request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(
        phase === 'body' ? `Failed to read response body: ${message}` : `Network error: ${message}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  async send(spec: RequestSpec, signal?: AbortSignal): Promise<RawResponse> {
    const url = buildUrl(spec);
    const init = this.buildInit(spec);

    this.logger.debug('transport', 'request', { method: spec.method, url: spec.url, mutating: spec.mutating });
    const { response, text } = await this.exchange(url, init, signal);

    let body: unknown;
    let parsed = true;
    try {
      body = text.length > 0 ? JSON.parse(text) : {};
    } catch {
      parsed = false;
      body = undefined;
    }

    const errors = parsed ? readApiErrors(body) : [];
    const accepted = spec.acceptErrorCodes ?? [];
    const acceptedErrors = errors.filter((error) => typeof error.code === 'number' && accepted.includes(error.code));
    const blocking = errors.filter((error) => !acceptedErrors.includes(error));

    if (acceptedErrors.length > 0 && blocking.length === 0) {
      this.logger.info('transport', 'already_in_state', {
        url: spec.url,
        codes: acceptedErrors.map((error) => error.code),
      });
      return { status: response.status, headers: response.headers, body, errors, acceptedErrors };
    }

    if (!response.ok) {
      throw classifyFailure({
        status: response.status,
        errors: blocking,
        retryAfterMs: parseRetryAfter(response.headers, this.now()),
        bodySnippet: text,
      });
    }

    if (!parsed) {
      throw new UnexpectedShapeError(`Expected JSON from ${spec.url}, got: ${text.slice(0, 200)}`, {
        status: response.status,
      });
    }

    if (blocking.length > 0) {
      if (!hasData(body)) {
        throw classifyFailure({
          status: response.status,
          errors: blocking,
          retryAfterMs: parseRetryAfter(response.headers, this.now()),
        });
      }
      this.logger.warn('transport', 'non_blocking_errors', {
        url: spec.url,
        errors: blocking.map((error) => error.message),
      });
    }

    return {
      status: response.status,
      headers: response.headers,
      body,
      errors,
      acceptedErrors,
    };
  }
}
