/**
 * Environment configuration for the client, CLI and MCP server
 */

import { config as loadDotenv } from 'dotenv';
import { type LogLevel, parseLogLevel } from './logger.js';
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
} from './twitter-client-constants.js';

export interface Config {
  credentials: {
    authToken?: string;
    ct0?: string;
  };
  request: {
    timeoutMs: number;
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  logging: {
    level: LogLevel | 'silent';
  };
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

const MAX_ATTEMPTS_LIMIT = 10;

/**
 * Parse integer from environment variable with optional default
 */
function parseIntOrDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : Number.NaN;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read configuration from `env`. With the default environment a `.env` file
 * in the working directory is loaded first; variables already set win.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (env === process.env) {
    loadDotenv();
  }

  return {
    credentials: {
      authToken: nonEmpty(env.AUTH_TOKEN),
      ct0: nonEmpty(env.CT0),
    },
    request: {
      timeoutMs: parseIntOrDefault(env.TWEETWRIGHT_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
      maxAttempts: parseIntOrDefault(env.TWEETWRIGHT_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
      baseDelayMs: parseIntOrDefault(env.TWEETWRIGHT_BASE_DELAY_MS, DEFAULT_BASE_DELAY_MS),
      maxDelayMs: parseIntOrDefault(env.TWEETWRIGHT_MAX_DELAY_MS, DEFAULT_MAX_DELAY_MS),
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
    },
  };
}

/**
 * Validate configuration values. Missing credentials are reported only when
 * `requireCredentials` is set, since read-only help output needs none.
 */
export function validateConfig(config: Config, options: { requireCredentials?: boolean } = {}): ConfigValidationResult {
  const errors: string[] = [];
  const { request } = config;

  if (options.requireCredentials) {
    if (!config.credentials.authToken) {
      errors.push('AUTH_TOKEN is required');
    }
    if (!config.credentials.ct0) {
      errors.push('CT0 is required');
    }
  }

  if (!Number.isInteger(request.timeoutMs) || request.timeoutMs < 1) {
    errors.push('TWEETWRIGHT_TIMEOUT_MS must be a positive integer');
  }
  if (!Number.isInteger(request.maxAttempts) || request.maxAttempts < 1 || request.maxAttempts > MAX_ATTEMPTS_LIMIT) {
    errors.push(`TWEETWRIGHT_MAX_ATTEMPTS must be between 1 and ${MAX_ATTEMPTS_LIMIT}`);
  }
  if (!Number.isInteger(request.baseDelayMs) || request.baseDelayMs < 0) {
    errors.push('TWEETWRIGHT_BASE_DELAY_MS must be a non-negative integer');
  }
  if (!Number.isInteger(request.maxDelayMs) || request.maxDelayMs < request.baseDelayMs) {
    errors.push('TWEETWRIGHT_MAX_DELAY_MS must be an integer no smaller than the base delay');
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Copy of the config safe to log: tokens reduced to their last four characters.
 */
export function maskSecrets(config: Config): Config {
  const mask = (value: string | undefined) => (value ? `***${value.slice(-4)}` : undefined);
  return {
    ...config,
    credentials: {
      authToken: mask(config.credentials.authToken),
      ct0: mask(config.credentials.ct0),
    },
  };
}
