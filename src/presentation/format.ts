// src/presentation/format.ts
import { FOUR_MEME_CONSTANTS } from '../constants/pumpfun-constants';
import { TokenType } from '../types';

const FOUR_MEME_UNIT = Math.pow(10, FOUR_MEME_CONSTANTS.TOKEN_DECIMALS);

function compact(value: number, suffix: string = ''): string {
  if (value >= 1_000_000_000) return `${(value / 1_000_000_000).toFixed(2)}B${suffix}`;
  if (value >= 1_000_000) return `${(value / 1_000_000).toFixed(2)}M${suffix}`;
  if (value >= 1_000) return `${(value / 1_000).toFixed(2)}K${suffix}`;
  return value.toLocaleString('en-US', { maximumFractionDigits: 4 });
}

function formatMagnitude(value: number, tokenType: TokenType): string {
  // Pump.fun amounts arrive decimal-adjusted; BSC amounts are in wei-style base units
  if (tokenType === 'pumpfun' || value >= FOUR_MEME_UNIT) {
    return compact(tokenType === 'pumpfun' ? value : value / FOUR_MEME_UNIT);
  }

  if (value >= 1_000_000) return `${(value / 1_000_000).toFixed(2)}M (raw)`;
  if (value >= 1_000) return `${(value / 1_000).toFixed(2)}K (raw)`;
  return value.toLocaleString('en-US', { maximumFractionDigits: 2 });
}

export function formatAmount(value: number | null | undefined, tokenType: TokenType): string {
  if (value === null || value === undefined || value === 0 || !Number.isFinite(value)) return '0';

  const formatted = formatMagnitude(Math.abs(value), tokenType);
  return value < 0 ? `-${formatted}` : formatted;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS UTC`; absent times read "N/A" and unparseable
 * ones are shown as received.
 */
export function formatTimestamp(ts: string | null | undefined): string {
  if (ts === null || ts === undefined || ts === '') return 'N/A';

  const date = new Date(ts);
  if (Number.isNaN(date.getTime())) return ts;

  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

export function formatSol(value: number): string {
  return `${value.toFixed(2)} SOL`;
}
