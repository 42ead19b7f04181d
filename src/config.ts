/**
 * Configuration for the drive streamer
 */

import path from 'path';
import { LogLevel, isLogLevel } from './domain/interfaces/ILogger';

export interface Config {
  PORT: number;
  // Bytes requested per remote fetch; upstream needs a 4 KiB multiple that divides 1 MiB
  TRANSFER_UNIT: number;
  // Shared bot pool instead of one client per caller
  MULTI_CLIENT: boolean;
  POOL_SIZE: number;
  // Dedicated clients unused for this long are disconnected
  CLIENT_IDLE_TIMEOUT: number;
  // Shared clients that failed to connect are retried after this long
  CLIENT_RETRY_DELAY: number;
  BOT_TOKENS: readonly string[];
  API_ID: number;
  API_HASH: string;
  // Session used in dedicated mode when the caller carries no identity
  SESSION: string;
  CHANNEL_ID: string;
  DATABASE_URL: string;
  CACHE_TTL: number;
  CACHE_MAX_ENTRIES: number;
  LOG_LEVEL: LogLevel;
  // Runtime directory for log files
  RUNTIME_DIR: string;
}

const KIB = 1024;
export const MAX_TRANSFER_UNIT = 1024 * KIB;

function toInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function toList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Builds the configuration from an environment map
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const transferUnit = toInt(env.TRANSFER_UNIT, MAX_TRANSFER_UNIT);
  if (transferUnit % (4 * KIB) !== 0 || MAX_TRANSFER_UNIT % transferUnit !== 0) {
    throw new Error(
      `TRANSFER_UNIT must be a multiple of ${4 * KIB} that divides ${MAX_TRANSFER_UNIT}, got ${transferUnit}`
    );
  }

  const logLevel = env.LOG_LEVEL ?? 'info';

  return {
    PORT: toInt(env.PORT, 3000),
    TRANSFER_UNIT: transferUnit,
    MULTI_CLIENT: env.MULTI_CLIENT === 'true',
    POOL_SIZE: toInt(env.POOL_SIZE, 8),
    CLIENT_IDLE_TIMEOUT: toInt(env.CLIENT_IDLE_TIMEOUT, 15 * 60 * 1000),
    CLIENT_RETRY_DELAY: toInt(env.CLIENT_RETRY_DELAY, 30 * 1000),
    BOT_TOKENS: toList(env.BOT_TOKENS),
    API_ID: toInt(env.API_ID, 0),
    API_HASH: env.API_HASH ?? '',
    SESSION: env.SESSION ?? '',
    CHANNEL_ID: env.CHANNEL_ID ?? '',
    DATABASE_URL: env.DATABASE_URL ?? 'postgres://localhost:5432/drive',
    CACHE_TTL: toInt(env.CACHE_TTL, 10 * 60 * 1000),
    CACHE_MAX_ENTRIES: toInt(env.CACHE_MAX_ENTRIES, 10_000),
    LOG_LEVEL: isLogLevel(logLevel) ? logLevel : 'info',
    RUNTIME_DIR: env.RUNTIME_DIR || path.join(process.cwd(), '.runtime')
  };
}

const config: Config = parseConfig(process.env);

export default config;
