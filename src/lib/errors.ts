// ABOUTME: Error taxonomy for the request engine.
// ABOUTME: Every public operation rejects with exactly one of these classes.

export interface ApiErrorEntry {
  message: string;
  code?: number;
}

interface ErrorParams {
  status?: number;
  codes?: number[];
  cause?: unknown;
}

export class TwitterClientError extends Error {
  readonly retryable: boolean = false;
  readonly status?: number;
  readonly codes: readonly number[];

  constructor(message: string, params: ErrorParams = {}) {
    super(message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = this.constructor.name;
    if (params.status !== undefined) {
      this.status = params.status;
    }
    this.codes = params.codes ?? [];
  }
}

/** Credentials were empty or could not possibly be cookie values. */
export class InvalidCredentialsError extends TwitterClientError {}

/** Caller input breaks a known platform rule. Raised before any request is made. */
export class ValidationError extends TwitterClientError {}

export class NetworkError extends TwitterClientError {
  override readonly retryable = true;
}

export class RateLimitError extends TwitterClientError {
  override readonly retryable = true;
  readonly retryAfterMs: number | null;

  constructor(message: string, params: ErrorParams & { retryAfterMs?: number | null } = {}) {
    super(message, params);
    this.retryAfterMs = params.retryAfterMs ?? null;
  }
}

export class ServerError extends TwitterClientError {
  override readonly retryable = true;
}

/** The session was rejected: re-extract auth_token and ct0 from the browser. */
export class AuthError extends TwitterClientError {}

export class ClientError extends TwitterClientError {}

export class NotFoundError extends ClientError {}

/** A field the domain object cannot do without was absent from the upstream payload. */
export class UnexpectedShapeError extends ClientError {}

export class OperationCancelledError extends TwitterClientError {}

export class OperationFailedError extends TwitterClientError {
  readonly attempts: number;
  readonly lastError: TwitterClientError;

  constructor(operation: string, attempts: number, lastError: TwitterClientError) {
    super(`${operation} failed after ${attempts} attempts: ${lastError.message}`, {
      status: lastError.status,
      codes: [...lastError.codes],
      cause: lastError,
    });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export function isRetryable(error: unknown): error is NetworkError | RateLimitError | ServerError {
  return error instanceof TwitterClientError && error.retryable;
}

const AUTH_CODES = new Set([32, 89, 215, 353]);
const NOT_FOUND_CODES = new Set([8, 34, 50, 63, 144, 421]);
const RATE_LIMIT_CODES = new Set([88]);
const SERVER_CODES = new Set([130, 131]);
// 403s that reject one request, not the session: status too long, duplicate, automation suspected.
const REQUEST_REJECTED_CODES = new Set([186, 187, 226]);

export function formatApiErrors(errors: ApiErrorEntry[]): string {
  return errors
    .map((error) => (typeof error.code === 'number' ? `${error.message} (${error.code})` : error.message))
    .join(', ');
}

/**
 * Map an upstream failure onto the taxonomy. Error codes win over the HTTP
 * status where they are more specific (a 403 carrying code 144 is a missing
 * tweet, not a dead session). Any other 403 is an account-level refusal
 * (suspended, locked, csrf) unless it names a single rejected request.
 */
export function classifyFailure(params: {
  status: number;
  errors: ApiErrorEntry[];
  retryAfterMs?: number | null;
  bodySnippet?: string;
}): TwitterClientError {
  const { status, errors } = params;
  const codes = errors.map((error) => error.code).filter((code): code is number => typeof code === 'number');
  const detail = errors.length > 0 ? formatApiErrors(errors) : (params.bodySnippet ?? '').slice(0, 200);
  const message = status >= 200 && status < 300 ? detail : `HTTP ${status}${detail ? `: ${detail}` : ''}`;
  const base = { status, codes };

  if (status === 429 || codes.some((code) => RATE_LIMIT_CODES.has(code))) {
    return new RateLimitError(message, { ...base, retryAfterMs: params.retryAfterMs ?? null });
  }
  if (codes.some((code) => AUTH_CODES.has(code))) {
    return new AuthError(message, base);
  }
  if (status === 404 || codes.some((code) => NOT_FOUND_CODES.has(code))) {
    return new NotFoundError(message, base);
  }
  if (status >= 500 || codes.some((code) => SERVER_CODES.has(code))) {
    return new ServerError(message, base);
  }
  if (status === 401) {
    return new AuthError(message, base);
  }
  if (status === 403 && !codes.some((code) => REQUEST_REJECTED_CODES.has(code))) {
    return new AuthError(message, base);
  }
  return new ClientError(message, base);
}
