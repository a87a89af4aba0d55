import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { Command } from 'commander';
import JSON5 from 'json5';
import kleur from 'kleur';
import { type Config, loadConfig, validateConfig } from '../lib/config.js';
import { TwitterClientError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';
import {
  type LabelKind,
  labelPrefix,
  type OutputConfig,
  resolveOutputConfigFromArgv,
  resolveOutputConfigFromCommander,
  type StatusKind,
  statusPrefix,
} from '../lib/output.js';
import { parseTweetId } from '../lib/twitter-client-base.js';
import { TwitterClient } from '../lib/twitter-client.js';

export type GlobalOptions = {
  authToken?: string;
  ct0?: string;
  timeout?: string;
  maxAttempts?: string;
  media?: string[];
  alt?: string[];
  plain?: boolean;
  emoji?: boolean;
  color?: boolean;
  readOnly?: boolean;
};

export type MediaSpec = { path: string; alt?: string; mime: string; buffer: Buffer };

export type CredentialSource = 'flags' | 'env';

export type ResolvedCredentials = {
  cookies: { authToken: string | null; ct0: string | null; source: CredentialSource | null };
  warnings: string[];
};

export type FileConfig = {
  timeoutMs?: number;
  maxAttempts?: number;
};

type Styler = (text: string) => string;

export type CliColors = {
  banner: Styler;
  subtitle: Styler;
  section: Styler;
  command: Styler;
  muted: Styler;
  accent: Styler;
};

export type CliContext = {
  isTty: boolean;
  config: FileConfig;
  /** Settings read from the environment; file config and flags override the request values. */
  envConfig: Config;
  /** Problems with `envConfig`; a client is never built while any remain. */
  configErrors: string[];
  colors: CliColors;
  getOutput: () => OutputConfig;
  applyOutputFromCommand: (command: Command) => void;
  p: (kind: StatusKind) => string;
  l: (kind: LabelKind) => string;
  resolveTimeoutFromOptions: (options: GlobalOptions) => number | undefined;
  resolveMaxAttemptsFromOptions: (options: GlobalOptions) => number | undefined;
  resolveCredentialsFromOptions: (options: GlobalOptions) => Promise<ResolvedCredentials>;
  loadMedia: (opts: { media: string[]; alts: string[] }) => MediaSpec[];
  extractTweetId: (input: string) => string;
  createLogger: () => Logger;
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readConfigFile(path: string, warn: (message: string) => void): FileConfig {
  if (!existsSync(path)) return {};
  try {
    const parsed: unknown = JSON5.parse(readFileSync(path, 'utf8'));
    if (!parsed || typeof parsed !== 'object') return {};
    const config: FileConfig = {};
    if ('timeoutMs' in parsed && typeof parsed.timeoutMs === 'number') config.timeoutMs = parsed.timeoutMs;
    if ('maxAttempts' in parsed && typeof parsed.maxAttempts === 'number') config.maxAttempts = parsed.maxAttempts;
    return config;
  } catch (error) {
    warn(`Failed to parse config at ${path}: ${errorMessage(error)}`);
    return {};
  }
}

/** `~/.config/tweetwright/config.json5`, overridden by `./.tweetwrightrc.json5`. */
export function loadFileConfig(warn: (message: string) => void = () => undefined): FileConfig {
  const globalPath = join(homedir(), '.config', 'tweetwright', 'config.json5');
  const localPath = join(process.cwd(), '.tweetwrightrc.json5');
  return { ...readConfigFile(globalPath, warn), ...readConfigFile(localPath, warn) };
}

function firstPositiveInteger(...values: Array<string | number | undefined>): number | undefined {
  for (const value of values) {
    if (value === undefined || value === '') continue;
    const parsed = typeof value === 'number' ? value : Number(value);
    if (Number.isInteger(parsed) && parsed > 0) return parsed;
  }
  return undefined;
}

export function detectMime(path: string): string | null {
  const ext = path.toLowerCase();
  if (ext.endsWith('.jpg') || ext.endsWith('.jpeg')) return 'image/jpeg';
  if (ext.endsWith('.png')) return 'image/png';
  if (ext.endsWith('.webp')) return 'image/webp';
  if (ext.endsWith('.gif')) return 'image/gif';
  if (ext.endsWith('.mp4') || ext.endsWith('.m4v')) return 'video/mp4';
  if (ext.endsWith('.mov')) return 'video/quicktime';
  return null;
}

export function createCliContext(argv: string[], env: NodeJS.ProcessEnv = process.env): CliContext {
  const isTty = Boolean(process.stdout.isTTY);
  let output = resolveOutputConfigFromArgv(argv, env, isTty);
  kleur.enabled = output.color;

  const p = (kind: StatusKind) => statusPrefix(kind, output);
  const l = (kind: LabelKind) => labelPrefix(kind, output);
  const wrap = (styler: Styler) => (text: string) => (isTty ? styler(text) : text);

  const colors: CliColors = {
    banner: wrap((t) => kleur.bold().blue(t)),
    subtitle: wrap((t) => kleur.dim(t)),
    section: wrap((t) => kleur.bold().white(t)),
    command: wrap((t) => kleur.bold().cyan(t)),
    muted: wrap((t) => kleur.gray(t)),
    accent: wrap((t) => kleur.green(t)),
  };

  const envConfig: Config = loadConfig(env);
  const config = loadFileConfig((message) => console.error(colors.muted(`${p('warn')}${message}`)));

  return {
    isTty,
    config,
    envConfig,
    configErrors: validateConfig(envConfig).errors,
    colors,
    getOutput: () => output,
    applyOutputFromCommand(command) {
      output = resolveOutputConfigFromCommander(command.optsWithGlobals<GlobalOptions>(), env, isTty);
      kleur.enabled = output.color;
    },
    p,
    l,
    resolveTimeoutFromOptions: (options) =>
      firstPositiveInteger(options.timeout, config.timeoutMs, env.TWEETWRIGHT_TIMEOUT_MS),
    resolveMaxAttemptsFromOptions: (options) =>
      firstPositiveInteger(options.maxAttempts, config.maxAttempts, env.TWEETWRIGHT_MAX_ATTEMPTS),
    async resolveCredentialsFromOptions(options) {
      const warnings: string[] = [];
      const flagToken = options.authToken?.trim() || null;
      const flagCt0 = options.ct0?.trim() || null;
      if (flagToken && flagCt0) {
        return { cookies: { authToken: flagToken, ct0: flagCt0, source: 'flags' }, warnings };
      }
      if (flagToken || flagCt0) {
        warnings.push('Both --auth-token and --ct0 are needed; falling back to AUTH_TOKEN/CT0');
      }
      const { authToken, ct0 } = envConfig.credentials;
      if (authToken && ct0) {
        return { cookies: { authToken, ct0, source: 'env' }, warnings };
      }
      warnings.push('Set AUTH_TOKEN and CT0 (or pass --auth-token and --ct0) from a logged-in x.com session');
      return { cookies: { authToken: authToken ?? null, ct0: ct0 ?? null, source: null }, warnings };
    },
    loadMedia(opts) {
      if (opts.media.length === 0) return [];
      const specs: MediaSpec[] = [];
      for (const [index, path] of opts.media.entries()) {
        const mime = detectMime(path);
        if (!mime) {
          throw new Error(`Unsupported media type for ${path}. Supported: jpg, jpeg, png, webp, gif, mp4, mov`);
        }
        specs.push({ path, mime, buffer: readFileSync(path), alt: opts.alts[index] });
      }

      const videoCount = specs.filter((m) => m.mime.startsWith('video/')).length;
      if (videoCount > 1) throw new Error('Only one video can be attached');
      if (videoCount === 1 && specs.length > 1) throw new Error('Video cannot be combined with other media');
      if (specs.length > 4) throw new Error('Maximum 4 media attachments');
      return specs;
    },
    extractTweetId: (input) => parseTweetId(input),
    createLogger: () => createLogger({ level: envConfig.logging.level }),
  };
}

/**
 * Resolve credentials and build a client, or print why not and exit 1.
 */
export async function createClientOrExit(ctx: CliContext, opts: GlobalOptions): Promise<TwitterClient> {
  if (ctx.configErrors.length > 0) {
    console.error(`${ctx.p('err')}Configuration invalid: ${ctx.configErrors.join('; ')}`);
    process.exit(1);
  }

  const { cookies, warnings } = await ctx.resolveCredentialsFromOptions(opts);
  if (!cookies.authToken || !cookies.ct0) {
    for (const warning of warnings) {
      console.error(`${ctx.p('warn')}${warning}`);
    }
    console.error(`${ctx.p('err')}Missing required credentials`);
    process.exit(1);
  }

  try {
    return new TwitterClient({
      authToken: cookies.authToken,
      csrfToken: cookies.ct0,
      ...ctx.envConfig.request,
      timeoutMs: ctx.resolveTimeoutFromOptions(opts) ?? ctx.envConfig.request.timeoutMs,
      maxAttempts: ctx.resolveMaxAttemptsFromOptions(opts) ?? ctx.envConfig.request.maxAttempts,
      logger: ctx.createLogger(),
    });
  } catch (error) {
    console.error(`${ctx.p('err')}${errorMessage(error)}`);
    process.exit(1);
  }
}

/** Print `prefix: message` with the error class for classified failures, then exit 1. */
export function failAndExit(ctx: CliContext, prefix: string, error: unknown): never {
  const kind = error instanceof TwitterClientError ? ` [${error.name}]` : '';
  console.error(`${ctx.p('err')}${prefix}: ${errorMessage(error)}${kind}`);
  process.exit(1);
}
