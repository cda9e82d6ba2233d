// src/services/token-holder-analytics-service.ts
// Holder concentration checks and the top-10 holder table for Pump.fun tokens

import { GraphQLClient, parseAmount, unwrapRoot } from '../integrations/bitquery-client';
import { PUMPFUN_HOLDER_SNAPSHOT, PUMPFUN_HOLDER_TRADE_STATS } from '../integrations/bitquery-queries';
import { PumpFunHolderSnapshotData, PumpFunHolderTradeStatsData } from '../integrations/types';
import { ANALYSIS_THRESHOLDS, PUMP_FUN_CONSTANTS } from '../constants/pumpfun-constants';
import { HolderAnalysis, TopHolder } from '../types';
import { logger, shortAddress } from '../utils/logger';

export interface HolderBalance {
  address: string;
  amount: number;
}

export interface HolderSnapshot {
  totalSupply: number;
  burnedAmount: number;
  holders: HolderBalance[];
  creatorAmount: number;
}

export interface HolderTradeStats {
  trades: number;
  tokens: number;
}

export interface HolderContext {
  creator: string;
  bondingCurve?: string;
  aiAgents: ReadonlySet<string>;
}

export interface HolderReport {
  analysis: HolderAnalysis;
  topHolders: TopHolder[];
}

function percentOf(amount: number, supply: number): number {
  return supply > 0 ? (amount / supply) * 100 : 0;
}

/**
 * Pure part of the analysis. The bonding curve is shown in the top-10
 * table but is not a holder for the concentration checks.
 */
export function analyzeHolders(
  snapshot: HolderSnapshot,
  context: HolderContext,
  stats: ReadonlyMap<string, HolderTradeStats> = new Map()
): HolderReport {
  const circulatingSupply = Math.max(0, snapshot.totalSupply - snapshot.burnedAmount);
  const ranked = snapshot.holders
    .filter(holder => holder.amount > 0)
    .sort((a, b) => b.amount - a.amount);

  const topHolders: TopHolder[] = ranked
    .slice(0, ANALYSIS_THRESHOLDS.TOP_HOLDERS)
    .map(holder => ({
      address: holder.address,
      amount: holder.amount,
      percent: percentOf(holder.amount, circulatingSupply),
      pumpTokensCount: stats.get(holder.address)?.tokens ?? 0,
      trades6h: stats.get(holder.address)?.trades ?? 0,
      isBondingCurve: holder.address === context.bondingCurve,
      isAiAgent: context.aiAgents.has(holder.address),
    }));

  const realHolders = ranked.filter(holder => holder.address !== context.bondingCurve);
  const top10Amount = realHolders
    .slice(0, ANALYSIS_THRESHOLDS.TOP_HOLDERS)
    .reduce((sum, holder) => sum + holder.amount, 0);

  const creatorPercent = percentOf(snapshot.creatorAmount, circulatingSupply);
  const top10Percent = percentOf(top10Amount, circulatingSupply);
  const largeHolder = realHolders.find(holder =>
    holder.address !== context.creator &&
    percentOf(holder.amount, circulatingSupply) >= ANALYSIS_THRESHOLDS.MAX_HOLDER_PERCENT
  );

  return {
    analysis: {
      totalSupply: snapshot.totalSupply,
      burnedAmount: snapshot.burnedAmount,
      circulatingSupply,
      creatorPercent,
      creatorCheckPassed: creatorPercent < ANALYSIS_THRESHOLDS.MAX_CREATOR_PERCENT,
      otherHoldersCheckPassed: largeHolder === undefined,
      top10Percent,
      top10CheckPassed: top10Percent < ANALYSIS_THRESHOLDS.MAX_TOP10_PERCENT,
    },
    topHolders,
  };
}

export class TokenHolderAnalyticsService {
  constructor(
    private readonly client: GraphQLClient,
    private readonly statsWindowHours: number = 6
  ) {}

  async fetchHolderSnapshot(mint: string, creator: string, signal?: AbortSignal): Promise<HolderSnapshot> {
    const data = await this.client.query<PumpFunHolderSnapshotData>(
      PUMPFUN_HOLDER_SNAPSHOT,
      // One extra row so the curve can sit in the list without pushing out a holder
      { token: mint, creator, limit: ANALYSIS_THRESHOLDS.TOP_HOLDERS + 1 },
      signal
    );

    const root = unwrapRoot(data.Solana);
    const supply = root?.supply?.[0];
    const minted = parseAmount(supply?.minted);

    return {
      totalSupply: minted > 0 ? minted : PUMP_FUN_CONSTANTS.TOTAL_SUPPLY,
      burnedAmount: Math.abs(parseAmount(supply?.burned)),
      holders: (root?.holders ?? []).map(row => ({
        address: row.BalanceUpdate.Account.Token.Owner,
        amount: parseAmount(row.BalanceUpdate.Holding),
      })),
      creatorAmount: parseAmount(root?.creator?.[0]?.BalanceUpdate.Holding),
    };
  }

  async fetchHolderTradeStats(
    addresses: string[],
    signal?: AbortSignal,
    now: number = Date.now()
  ): Promise<Map<string, HolderTradeStats>> {
    const stats = new Map<string, HolderTradeStats>();
    if (addresses.length === 0) return stats;

    const since = new Date(now - this.statsWindowHours * 60 * 60 * 1000).toISOString();
    const data = await this.client.query<PumpFunHolderTradeStatsData>(
      PUMPFUN_HOLDER_TRADE_STATS,
      { holders: addresses, since, program: PUMP_FUN_CONSTANTS.PUMP_FUN_PROGRAM },
      signal
    );

    for (const row of unwrapRoot(data.Solana)?.DEXTradeByTokens ?? []) {
      stats.set(row.Trade.Account.Token.Owner, {
        trades: parseAmount(row.trades),
        tokens: parseAmount(row.tokens),
      });
    }
    return stats;
  }

  async getHolderReport(mint: string, context: HolderContext, signal?: AbortSignal): Promise<HolderReport> {
    logger.info(`Analyzing holders for ${shortAddress(mint)}`);

    const snapshot = await this.fetchHolderSnapshot(mint, context.creator, signal);
    const stats = await this.fetchHolderTradeStats(
      snapshot.holders.map(holder => holder.address),
      signal
    );

    const report = analyzeHolders(snapshot, context, stats);
    logger.info('Holder analysis complete', {
      creatorPercent: report.analysis.creatorPercent.toFixed(2),
      top10Percent: report.analysis.top10Percent.toFixed(2),
    });
    return report;
  }
}
