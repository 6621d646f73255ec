/**
 * Telegram Bot Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '@tunegrab/core';
import { LOG_LEVELS } from '@tunegrab/utils';

const here = dirname(fileURLToPath(import.meta.url));
export const repoRoot = resolve(here, '../../..');

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function flag(fallback: boolean) {
  return z.string().optional().transform((value, ctx) => {
    const normalised = value?.trim().toLowerCase() ?? '';
    if (normalised === '') return fallback;
    if (TRUE_VALUES.has(normalised)) return true;
    if (FALSE_VALUES.has(normalised)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected true or false, got "${value}"` });
    return z.NEVER;
  });
}

const count = (fallback: number, min = 1) => z.coerce.number().int().min(min).default(fallback);

const optionalPath = z.string().optional().transform((value) => value?.trim() || undefined);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_OWNER_ID: z.coerce.number().int().positive(),

  // Features
  AUTO_CLEAR: flag(true),
  PROGRESS_MESSAGES: flag(true),
  RECENT_DOWNLOADS: flag(true),

  // Limits and timings
  HISTORY_LIMIT: count(10),
  CLEAR_LOG_LIMIT: count(200),
  PROGRESS_INTERVAL_MS: count(1500, 0),
  OPERATION_TIMEOUT_MS: count(900000, 0),
  RETRY_MAX_ATTEMPTS: count(3),
  RETRY_INITIAL_DELAY_MS: count(1000, 0),
  RETRY_MAX_DELAY_MS: count(30000, 0),
  SEARCH_LIMIT: z.coerce.number().int().min(1).max(20).default(8),
  ALBUM_TRACK_LIMIT: count(50),
  ACCOUNT_HISTORY_LIMIT: count(10),
  LIKED_SONGS_LIMIT: count(15),
  RECOMMENDATIONS_LIMIT: count(8),

  BOT_CREDIT: z.string().default(''),

  // Storage paths (relative to the repository root)
  STORAGE_TEMP: z.string().default('./storage/tmp'),
  STORAGE_LIBRARY: z.string().default('./storage/library'),
  HISTORY_FILE: z.string().default('./storage/history.jsonl'),

  // Binary paths
  YTDLP_PATH: z.string().default('yt-dlp'),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),

  // Credentials
  YTDLP_COOKIES_FILE: optionalPath,
  YTMUSIC_HEADERS_FILE: optionalPath,

  // Audio
  AUDIO_FORMAT: z.enum(['m4a', 'mp3', 'opus', 'flac', 'aac', 'wav']).default('m4a'),
  PRESERVE_EXTENSIONS: z.string().default('opus'),
});

export type Env = Record<string, string | undefined>;

/**
 * Load `.env` from the repository root into process.env
 */
export function loadEnvFile(): void {
  dotenvConfig({ path: resolve(repoRoot, '.env') });
}

function resolvePath(root: string, path: string): string {
  return isAbsolute(path) ? path : resolve(root, path);
}

function buildConfig(env: z.infer<typeof envSchema>, root: string) {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,

    botToken: env.TELEGRAM_BOT_TOKEN,
    ownerId: env.TELEGRAM_OWNER_ID,

    features: {
      autoClear: env.AUTO_CLEAR,
      progressMessages: env.PROGRESS_MESSAGES,
      recentDownloads: env.RECENT_DOWNLOADS,
    },

    limits: {
      history: env.HISTORY_LIMIT,
      clearLog: env.CLEAR_LOG_LIMIT,
      search: env.SEARCH_LIMIT,
      albumTracks: env.ALBUM_TRACK_LIMIT,
      accountHistory: env.ACCOUNT_HISTORY_LIMIT,
      likedSongs: env.LIKED_SONGS_LIMIT,
      recommendations: env.RECOMMENDATIONS_LIMIT,
    },

    timing: {
      progressIntervalMs: env.PROGRESS_INTERVAL_MS,
      operationTimeoutMs: env.OPERATION_TIMEOUT_MS,
    },

    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      initialDelay: env.RETRY_INITIAL_DELAY_MS,
      maxDelay: Math.max(env.RETRY_MAX_DELAY_MS, env.RETRY_INITIAL_DELAY_MS),
      backoffMultiplier: 2,
    },

    credit: env.BOT_CREDIT,

    storage: {
      temp: resolvePath(root, env.STORAGE_TEMP),
      library: resolvePath(root, env.STORAGE_LIBRARY),
      historyFile: resolvePath(root, env.HISTORY_FILE),
    },

    binaries: {
      ytdlp: env.YTDLP_PATH,
      ffmpeg: env.FFMPEG_PATH,
      ffprobe: env.FFPROBE_PATH,
    },

    credentials: {
      cookiesFile: env.YTDLP_COOKIES_FILE ? resolvePath(root, env.YTDLP_COOKIES_FILE) : null,
      catalogHeadersFile: env.YTMUSIC_HEADERS_FILE ? resolvePath(root, env.YTMUSIC_HEADERS_FILE) : null,
    },

    audio: {
      format: env.AUDIO_FORMAT,
      preserveExtensions: env.PRESERVE_EXTENSIONS
        .split(',')
        .map((ext) => ext.trim().toLowerCase().replace(/^\./, ''))
        .filter(Boolean),
    },
  };
}

export type BotConfig = Readonly<ReturnType<typeof buildConfig>>;

/**
 * Validate `env` into a frozen config. Throws ConfigError listing every bad key.
 */
export function loadConfig(env: Env = process.env, root: string = repoRoot): BotConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration:\n${issues.join('\n')}`, { issues });
  }
  return Object.freeze(buildConfig(parsed.data, root));
}
