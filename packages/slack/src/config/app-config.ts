/**
 * Application configuration
 *
 * Parsed once at startup from the environment and handed to every component
 * constructor. Nothing below the bootstrap reads process.env directly.
 */

import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { logger } from '@threadsage/shared';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Defaults and hard limits for the numeric settings
const DEFAULT_CONTEXT_MIN = 50;
const DEFAULT_CONTEXT_MAX = 250;
const CONTEXT_MIN_CEILING = 1000;
const CONTEXT_MAX_CEILING = 10000;
const DEFAULT_QA_TIMEOUT_SECONDS = 500;
const QA_TIMEOUT_CEILING = 3600; // 1 hour
const DEFAULT_EXTRACT_TIMEOUT_SECONDS = 30;
const DEFAULT_MAX_HISTORY_PAGES = 10;
const DEFAULT_MAX_PAYLOAD_BYTES = 200000;

export interface SlackCredentials {
  botToken?: string;
  appToken?: string;
  signingSecret?: string;
}

export interface AppConfig {
  botName: string;
  slack: SlackCredentials;
  qa: {
    apiUrl?: string;
    apiToken?: string;
    timeoutMs: number;
  };
  context: {
    min: number;
    max: number;
    extractTimeoutMs: number;
    maxHistoryPages: number;
  };
  maxPayloadBytes: number;
  modelOverride?: string;
  defaultAssistants: readonly string[];
  databasePath: string;
  promptsDir: string;
}

const envSchema = z.object({
  BOT_NAME: z.string().trim().min(1).default('ThreadSage'),
  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_APP_TOKEN: z.string().optional(),
  SLACK_SIGNING_SECRET: z.string().optional(),
  QA_API_URL: z.string().url().optional(),
  QA_API_TOKEN: z.string().optional(),
  QA_TIMEOUT_SECONDS: z.string().optional(),
  CONTEXT_MIN: z.string().optional(),
  CONTEXT_MAX: z.string().optional(),
  EXTRACT_TIMEOUT_SECONDS: z.string().optional(),
  MAX_HISTORY_PAGES: z.string().optional(),
  MAX_PAYLOAD_BYTES: z.string().optional(),
  MODEL_OVERRIDE: z.string().optional(),
  DEFAULT_ASSISTANTS: z.string().optional(),
  DATABASE_PATH: z.string().optional(),
  PROMPTS_DIR: z.string().optional(),
});

export type AppEnv = Record<string, string | undefined>;

function parseInteger(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return /^-?\d+$/.test(raw.trim()) ? Number(raw.trim()) : Number.NaN;
}

/**
 * Read CONTEXT_MIN / CONTEXT_MAX, clamping them to sane ranges.
 * Non-numeric input falls back to both defaults.
 */
export function resolveContextLimits(minRaw?: string, maxRaw?: string): { min: number; max: number } {
  const minParsed = parseInteger(minRaw);
  const maxParsed = parseInteger(maxRaw);

  if (Number.isNaN(minParsed) || Number.isNaN(maxParsed)) {
    logger.error(
      `Invalid context values (min='${minRaw}', max='${maxRaw}'), must be numbers. Using defaults (${DEFAULT_CONTEXT_MIN}, ${DEFAULT_CONTEXT_MAX}).`
    );
    return { min: DEFAULT_CONTEXT_MIN, max: DEFAULT_CONTEXT_MAX };
  }

  let min = minParsed ?? DEFAULT_CONTEXT_MIN;
  let max = maxParsed ?? DEFAULT_CONTEXT_MAX;

  if (min <= 0) {
    logger.warn(`Invalid min context value ${min}, must be positive. Using default ${DEFAULT_CONTEXT_MIN}.`);
    min = DEFAULT_CONTEXT_MIN;
  }
  if (min > CONTEXT_MIN_CEILING) {
    logger.warn(`Min context value ${min} too large, capping at ${CONTEXT_MIN_CEILING}.`);
    min = CONTEXT_MIN_CEILING;
  }
  if (max <= 0) {
    logger.warn(`Invalid max context value ${max}, must be positive. Using default ${DEFAULT_CONTEXT_MAX}.`);
    max = DEFAULT_CONTEXT_MAX;
  }
  if (max > CONTEXT_MAX_CEILING) {
    logger.warn(`Max context value ${max} too large, capping at ${CONTEXT_MAX_CEILING}.`);
    max = CONTEXT_MAX_CEILING;
  }
  if (max < min) {
    logger.warn(`Max context ${max} is less than min context ${min}, setting max to min.`);
    max = min;
  }

  return { min, max };
}

/**
 * Positive integer setting with a default and an optional ceiling
 */
function resolvePositive(name: string, raw: string | undefined, fallback: number, ceiling?: number): number {
  const parsed = parseInteger(raw);
  if (parsed === undefined) return fallback;
  if (Number.isNaN(parsed)) {
    logger.error(`Invalid ${name} value '${raw}', must be a number. Using default ${fallback}.`);
    return fallback;
  }
  if (parsed <= 0) {
    logger.warn(`Invalid ${name} value ${parsed}, must be positive. Using default ${fallback}.`);
    return fallback;
  }
  if (ceiling !== undefined && parsed > ceiling) {
    logger.warn(`${name} value ${parsed} too large, capping at ${ceiling}.`);
    return ceiling;
  }
  return parsed;
}

function resolveModelOverride(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!trimmed) {
    logger.warn('MODEL_OVERRIDE is set but empty, ignoring');
    return undefined;
  }
  logger.info(`Using model override: ${trimmed}`);
  return trimmed;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the immutable application config from an environment map
 */
export function loadAppConfig(env: AppEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.parse(env);
  const limits = resolveContextLimits(parsed.CONTEXT_MIN, parsed.CONTEXT_MAX);

  const defaultAssistants = Array.from(
    new Set(
      (parsed.DEFAULT_ASSISTANTS ?? '')
        .split(',')
        .map((name) => name.trim())
        .filter(Boolean)
    )
  );

  const config: AppConfig = {
    botName: parsed.BOT_NAME,
    slack: {
      botToken: parsed.SLACK_BOT_TOKEN,
      appToken: parsed.SLACK_APP_TOKEN,
      signingSecret: parsed.SLACK_SIGNING_SECRET,
    },
    qa: {
      apiUrl: parsed.QA_API_URL?.replace(/\/+$/, ''),
      apiToken: parsed.QA_API_TOKEN,
      timeoutMs:
        resolvePositive('QA_TIMEOUT_SECONDS', parsed.QA_TIMEOUT_SECONDS, DEFAULT_QA_TIMEOUT_SECONDS, QA_TIMEOUT_CEILING) *
        1000,
    },
    context: {
      min: limits.min,
      max: limits.max,
      extractTimeoutMs:
        resolvePositive('EXTRACT_TIMEOUT_SECONDS', parsed.EXTRACT_TIMEOUT_SECONDS, DEFAULT_EXTRACT_TIMEOUT_SECONDS) *
        1000,
      maxHistoryPages: resolvePositive('MAX_HISTORY_PAGES', parsed.MAX_HISTORY_PAGES, DEFAULT_MAX_HISTORY_PAGES),
    },
    maxPayloadBytes: resolvePositive('MAX_PAYLOAD_BYTES', parsed.MAX_PAYLOAD_BYTES, DEFAULT_MAX_PAYLOAD_BYTES),
    modelOverride: resolveModelOverride(parsed.MODEL_OVERRIDE),
    defaultAssistants,
    databasePath: parsed.DATABASE_PATH || './data/threadsage.db',
    promptsDir: parsed.PROMPTS_DIR || resolve(__dirname, '../../prompts'),
  };

  return deepFreeze(config);
}

/**
 * Slash command registered for the bot, e.g. `/threadsage-ask`
 */
export function slashCommand(botName: string, verb: 'ask' | 'config'): string {
  const slug = botName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `/${slug || 'bot'}-${verb}`;
}
