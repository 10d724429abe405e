import path from 'node:path';
import type { AppConfig } from './types';

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new Error(`Environment variable ${name} is required`);
  }
  return value;
}

function parsePositiveNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Builds the process configuration once at startup. Throws when the Telegram
 * credentials are missing.
 */
export function loadConfig(env: Env, projectRoot = process.cwd()): AppConfig {
  const config: AppConfig = {
    telegram: {
      botToken: requireEnv(env, 'TELEGRAM_BOT_TOKEN'),
      chatId: requireEnv(env, 'TELEGRAM_CHAT_ID'),
    },
    source: {
      apiUrl: (env.SOURCE_API_URL ?? 'https://api.hel.fi/respa/v1').replace(/\/+$/, ''),
      resourceId: env.RESOURCE_ID ?? 'axwzr3i57yba',
      lookaheadDays: parsePositiveNumber(env.LOOKAHEAD_DAYS, 14),
      timeoutMs: parsePositiveNumber(env.FETCH_TIMEOUT_MS, 30_000),
      attempts: Math.max(1, Math.floor(parsePositiveNumber(env.FETCH_ATTEMPTS, 3))),
    },
    pollIntervalMs: parsePositiveNumber(env.POLL_INTERVAL_SECONDS, 600) * 1000,
    storageFile: path.resolve(projectRoot, env.STORAGE_FILE ?? path.join('data', 'availability.json')),
    timeZone: env.TIME_ZONE ?? 'Europe/Helsinki',
  };

  return Object.freeze(config);
}
