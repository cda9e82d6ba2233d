// src/presentation/api-response.ts
// Wire shapes for the JSON API. Field names are snake_case on the wire.

import {
  AggregateTotals,
  ClassificationResult,
  HolderAnalysis,
  PhishyCheckResult,
  RecentPhishyEntry,
  RiskCheck,
  TokenMetadata,
  TokenType,
  TopHolder,
} from '../types';
import { ErrorKind, PhishyCheckError, errorMessage } from '../utils/errors';

export interface PhishyAddressBody {
  address: string;
  first_transfer_time: string | null;
  first_buy_time: string | null;
  total_transferred: number;
  total_bought: number;
  transferred_without_buy: number;
  reason: string | null;
}

export interface TotalsBody {
  total_transferred: number;
  total_bought: number;
  total_without_buy: number;
}

export interface TokenMetadataBody {
  name?: string;
  symbol?: string;
  uri?: string;
  image?: string;
  description?: string;
  twitter?: string;
  telegram?: string;
  website?: string;
  is_mayhem_mode: boolean;
  creator?: string;
  created_at: string;
}

export interface HolderAnalysisBody {
  total_supply: number;
  burned_amount: number;
  circulating_supply: number;
  creator_percent: number;
  creator_check_passed: boolean;
  other_holders_check_passed: boolean;
  top10_percent: number;
  top10_check_passed: boolean;
}

export interface TopHolderBody {
  address: string;
  amount: number;
  percent: number;
  pump_tokens_count: number;
  trades_6h: number;
  is_bonding_curve: boolean;
  is_ai_agent: boolean;
}

export interface CheckDataBody {
  total_addresses: number;
  phishy_count: number;
  normal_count: number;
  phishy_addresses: PhishyAddressBody[];
  totals: TotalsBody | null;
  risk_score: number;
  failed_checks: RiskCheck[];
  bonding_curve?: string;
  liquidity_sol?: number;
  token_metadata?: TokenMetadataBody;
  holder_analysis?: HolderAnalysisBody;
  top_holders?: TopHolderBody[];
}

export interface CheckResponseBody {
  success: true;
  phishy: boolean;
  token_address: string;
  token_type: TokenType;
  data: CheckDataBody;
}

export interface RecentEntryBody {
  token_address: string;
  token_type: TokenType;
  phishy_count: number;
  timestamp: string;
  totals: TotalsBody;
}

export interface ErrorResponseBody {
  success: false;
  error: string;
  error_type?: ErrorKind;
}

function toPhishyAddress(result: ClassificationResult): PhishyAddressBody {
  return {
    address: result.address,
    first_transfer_time: result.firstTransferTime,
    first_buy_time: result.firstBuyTime,
    total_transferred: result.totalTransferred,
    total_bought: result.totalBought,
    transferred_without_buy: result.transferredWithoutBuy,
    reason: result.reason,
  };
}

function toTotals(totals: AggregateTotals): TotalsBody {
  return {
    total_transferred: totals.totalTransferred,
    total_bought: totals.totalBought,
    total_without_buy: totals.totalWithoutBuy,
  };
}

function toMetadata(metadata: TokenMetadata): TokenMetadataBody {
  return {
    name: metadata.name,
    symbol: metadata.symbol,
    uri: metadata.uri,
    image: metadata.image,
    description: metadata.description,
    twitter: metadata.twitter,
    telegram: metadata.telegram,
    website: metadata.website,
    is_mayhem_mode: metadata.isMayhemMode,
    creator: metadata.creator,
    created_at: metadata.createdAt,
  };
}

function toHolderAnalysis(analysis: HolderAnalysis): HolderAnalysisBody {
  return {
    total_supply: analysis.totalSupply,
    burned_amount: analysis.burnedAmount,
    circulating_supply: analysis.circulatingSupply,
    creator_percent: analysis.creatorPercent,
    creator_check_passed: analysis.creatorCheckPassed,
    other_holders_check_passed: analysis.otherHoldersCheckPassed,
    top10_percent: analysis.top10Percent,
    top10_check_passed: analysis.top10CheckPassed,
  };
}

function toTopHolder(holder: TopHolder): TopHolderBody {
  return {
    address: holder.address,
    amount: holder.amount,
    percent: holder.percent,
    pump_tokens_count: holder.pumpTokensCount,
    trades_6h: holder.trades6h,
    is_bonding_curve: holder.isBondingCurve,
    is_ai_agent: holder.isAiAgent,
  };
}

export function toCheckResponse(result: PhishyCheckResult): CheckResponseBody {
  const { phishy, normal } = result.classification;

  const data: CheckDataBody = {
    total_addresses: result.totalAddresses,
    phishy_count: phishy.length,
    normal_count: normal.length,
    phishy_addresses: phishy.map(toPhishyAddress),
    // Totals only mean something when there is at least one phishy address
    totals: phishy.length > 0 ? toTotals(result.totals) : null,
    risk_score: result.risk.score,
    failed_checks: result.risk.failedChecks,
  };

  if (result.tokenType === 'pumpfun') {
    data.bonding_curve = result.bondingCurve;
    data.liquidity_sol = result.liquiditySol;
    data.token_metadata = toMetadata(result.metadata);
    data.holder_analysis = result.holderAnalysis && toHolderAnalysis(result.holderAnalysis);
    data.top_holders = result.topHolders.map(toTopHolder);
  }

  return {
    success: true,
    phishy: phishy.length > 0,
    token_address: result.tokenAddress,
    token_type: result.tokenType,
    data,
  };
}

export function toRecentEntry(result: PhishyCheckResult, timestamp: Date = new Date()): RecentPhishyEntry {
  return {
    tokenAddress: result.tokenAddress,
    tokenType: result.tokenType,
    phishyCount: result.classification.phishy.length,
    timestamp: timestamp.toISOString(),
    totals: result.totals,
  };
}

export function toRecentEntryBody(entry: RecentPhishyEntry): RecentEntryBody {
  return {
    token_address: entry.tokenAddress,
    token_type: entry.tokenType,
    phishy_count: entry.phishyCount,
    timestamp: entry.timestamp,
    totals: toTotals(entry.totals),
  };
}

/**
 * Info conditions carry `error_type` so the page can render them as
 * notices rather than failures.
 */
export function toErrorResponse(error: unknown): ErrorResponseBody {
  if (error instanceof PhishyCheckError && error.kind === 'info') {
    return { success: false, error: error.message, error_type: 'info' };
  }
  if (error instanceof PhishyCheckError) {
    return { success: false, error: error.message };
  }
  return { success: false, error: `An unexpected error occurred: ${errorMessage(error)}` };
}
