// src/config/index.ts

import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';

// Load environment variables
dotenv.config();

export interface Config {
  // Bitquery
  BITQUERY_API_KEY?: string;
  BITQUERY_API_URL: string;
  BITQUERY_TIMEOUT_MS: number;

  // Server
  PORT: number;
  CORS_ORIGIN: string;

  // Analysis
  RECENT_PHISHY_LIMIT: number;
  PUMPFUN_MAX_AGE_HOURS: number;
  HOLDER_STATS_WINDOW_HOURS: number;
  AI_AGENT_ADDRESSES: string[];

  // Logging
  LOG_LEVEL: string;
  LOG_TO_FILE: boolean;
}

type Env = Record<string, string | undefined>;

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function parsePositive(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    BITQUERY_API_KEY: env.BITQUERY_API_KEY?.trim() || undefined,
    BITQUERY_API_URL: env.BITQUERY_API_URL || 'https://streaming.bitquery.io/graphql',
    BITQUERY_TIMEOUT_MS: parsePositive(env.BITQUERY_TIMEOUT_MS, 120000),

    PORT: parseInt(env.PORT || '8080'),
    CORS_ORIGIN: env.CORS_ORIGIN || '*',

    RECENT_PHISHY_LIMIT: parsePositive(env.RECENT_PHISHY_LIMIT, 100),
    PUMPFUN_MAX_AGE_HOURS: parsePositive(env.PUMPFUN_MAX_AGE_HOURS, 8),
    HOLDER_STATS_WINDOW_HOURS: parsePositive(env.HOLDER_STATS_WINDOW_HOURS, 6),
    AI_AGENT_ADDRESSES: parseList(env.AI_AGENT_ADDRESSES),

    LOG_LEVEL: env.LOG_LEVEL || 'info',
    LOG_TO_FILE: env.LOG_TO_FILE === 'true',
  };
}

export const config: Config = loadConfig();

/**
 * Every upstream query needs the key, so a missing key fails the request
 * before anything goes over the wire.
 */
export function requireApiKey(cfg: Pick<Config, 'BITQUERY_API_KEY'> = config): string {
  if (!cfg.BITQUERY_API_KEY) {
    throw new ConfigurationError(
      'Bitquery API key not found. Set BITQUERY_API_KEY in the environment or in a .env file.'
    );
  }
  return cfg.BITQUERY_API_KEY;
}
