/**
 * Configuration for the Whale Watcher
 *
 * Read once at startup from the environment (and .env via dotenv).
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';
import type { SchedulerConfig } from './core/scheduler.js';
import { logger, splitList, type LogLevel } from './utils/index.js';

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_TRACKED_CATEGORIES = [
  'politics',
  'geopolitics',
  'finance',
  'crypto',
  'elections',
  'tech',
  'culture',
  'world',
  'breaking',
];

// =============================================================================
// SCHEMA
// =============================================================================

/** Treat `KEY=` in .env as unset so defaults still apply. */
function unsetIfBlank<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(value => (value === '' ? undefined : value), schema);
}

const optionalString = z
  .string()
  .optional()
  .transform(value => value?.trim() || undefined);

const envSchema = z.object({
  // Whale detection
  WHALE_THRESHOLD: unsetIfBlank(z.coerce.number().positive().default(10_000)),
  SEEN_REGISTRY_LIMIT: unsetIfBlank(z.coerce.number().int().nonnegative().default(0)),

  // AI quota (about 1000 calls a month)
  MAX_AI_CALLS_PER_DAY: unsetIfBlank(z.coerce.number().int().nonnegative().default(13)),
  MIN_SECONDS_BETWEEN_AI_CALLS: unsetIfBlank(z.coerce.number().nonnegative().default(30)),
  BURST_COUNT: unsetIfBlank(z.coerce.number().int().nonnegative().optional()),
  DIVERSITY_HISTORY_WINDOW: unsetIfBlank(z.coerce.number().int().nonnegative().default(20)),
  CANDIDATE_COOLDOWN_HOURS: unsetIfBlank(z.coerce.number().nonnegative().default(6)),

  // Loop
  TICK_INTERVAL_SECONDS: unsetIfBlank(z.coerce.number().positive().default(60)),
  EXTERNAL_TIMEOUT_SECONDS: unsetIfBlank(z.coerce.number().positive().default(30)),
  TIMEZONE: unsetIfBlank(z.string().default('America/New_York')),
  STATE_FILE: unsetIfBlank(z.string().default('data/watcher-state.json')),

  // Market data
  EXPIRY_WINDOW_HOURS: unsetIfBlank(z.coerce.number().positive().default(24)),
  TRACKED_CATEGORIES: optionalString,

  // Destinations
  DISCORD_WEBHOOK_URLS: optionalString,
  DISCORD_WEBHOOK_URL: optionalString,
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_IDS: optionalString,
  TELEGRAM_CHAT_ID: optionalString,

  // Operator bot
  DISCORD_BOT_TOKEN: optionalString,
  DISCORD_CLIENT_ID: optionalString,
  DISCORD_GUILD_ID: optionalString,

  // Analysis
  ANALYSIS_MODEL: unsetIfBlank(z.string().default('claude-haiku-4-5')),
  ANALYSIS_MAX_TURNS: unsetIfBlank(z.coerce.number().int().positive().default(4)),

  LOG_LEVEL: unsetIfBlank(z.enum(['debug', 'info', 'warn', 'error']).default('info')),
});

// =============================================================================
// CONFIG
// =============================================================================

export interface WatcherConfig extends SchedulerConfig {
  tickIntervalMs: number;
  stateFile: string;
  expiryWindowHours: number;
  trackedCategories: string[];
  discordWebhookUrls: string[];
  telegramBotToken?: string;
  telegramChatIds: string[];
  discordBotToken?: string;
  discordClientId?: string;
  discordGuildId?: string;
  analysisModel: string;
  analysisMaxTurns: number;
  logLevel: LogLevel;
}

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse and validate the environment. Throws ConfigurationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<WatcherConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const e = parsed.data;

  if (!isValidTimezone(e.TIMEZONE)) {
    throw new ConfigurationError('Invalid configuration', [`TIMEZONE: unknown timezone "${e.TIMEZONE}"`]);
  }

  let burstCount = e.BURST_COUNT ?? e.MAX_AI_CALLS_PER_DAY;
  if (burstCount > e.MAX_AI_CALLS_PER_DAY) {
    logger.warn(`BURST_COUNT ${burstCount} exceeds MAX_AI_CALLS_PER_DAY, clamped to ${e.MAX_AI_CALLS_PER_DAY}`);
    burstCount = e.MAX_AI_CALLS_PER_DAY;
  }

  const trackedCategories = splitList(e.TRACKED_CATEGORIES).map(c => c.toLowerCase());

  return Object.freeze({
    timezone: e.TIMEZONE,
    whaleThreshold: e.WHALE_THRESHOLD,
    maxDailyCalls: e.MAX_AI_CALLS_PER_DAY,
    minSecondsBetweenCalls: e.MIN_SECONDS_BETWEEN_AI_CALLS,
    burstCount,
    diversityWindow: e.DIVERSITY_HISTORY_WINDOW,
    seenRegistryLimit: e.SEEN_REGISTRY_LIMIT,
    candidateCooldownMs: e.CANDIDATE_COOLDOWN_HOURS * 60 * 60 * 1000,
    externalTimeoutMs: e.EXTERNAL_TIMEOUT_SECONDS * 1000,

    tickIntervalMs: e.TICK_INTERVAL_SECONDS * 1000,
    stateFile: e.STATE_FILE,
    expiryWindowHours: e.EXPIRY_WINDOW_HOURS,
    trackedCategories: trackedCategories.length > 0 ? trackedCategories : DEFAULT_TRACKED_CATEGORIES,

    // Legacy single-value variables are used only when the list form is unset
    discordWebhookUrls: splitList(e.DISCORD_WEBHOOK_URLS ?? e.DISCORD_WEBHOOK_URL),
    telegramBotToken: e.TELEGRAM_BOT_TOKEN,
    telegramChatIds: splitList(e.TELEGRAM_CHAT_IDS ?? e.TELEGRAM_CHAT_ID),
    discordBotToken: e.DISCORD_BOT_TOKEN,
    discordClientId: e.DISCORD_CLIENT_ID,
    discordGuildId: e.DISCORD_GUILD_ID,

    analysisModel: e.ANALYSIS_MODEL,
    analysisMaxTurns: e.ANALYSIS_MAX_TURNS,
    logLevel: e.LOG_LEVEL,
  });
}

// =============================================================================
// VALIDATION
// =============================================================================

export function validateConfig(config: WatcherConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  const hasTelegram = Boolean(config.telegramBotToken) && config.telegramChatIds.length > 0;
  if (config.discordWebhookUrls.length === 0 && !hasTelegram) {
    errors.push('Set DISCORD_WEBHOOK_URLS, or TELEGRAM_BOT_TOKEN with TELEGRAM_CHAT_IDS');
  }

  if (config.telegramChatIds.length > 0 && !config.telegramBotToken) {
    errors.push('TELEGRAM_CHAT_IDS is set but TELEGRAM_BOT_TOKEN is missing');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
