// src/types/index.ts - Domain types shared by the fetchers, analysis and presentation

export type TokenType = 'pumpfun' | 'fourmeme';

export const TOKEN_TYPE_LABELS: Record<TokenType, string> = {
  pumpfun: 'Pump.fun (Solana)',
  fourmeme: 'Four.Meme (BSC)',
};

export interface TransferRecord {
  address: string;
  firstTransferTime: string | null;
  totalTransferred: number;
}

export interface BuyRecord {
  address: string;
  firstBuyTime?: string;
  totalBought: number;
}

export const PHISHY_REASONS = {
  NEVER_BOUGHT: 'Never bought the token',
  TRANSFER_BEFORE_BUY: 'Transfer occurred before first buy',
} as const;

export type PhishyReason = typeof PHISHY_REASONS[keyof typeof PHISHY_REASONS];

export interface ClassificationResult {
  address: string;
  firstTransferTime: string | null;
  firstBuyTime: string | null;
  totalTransferred: number;
  totalBought: number;
  transferredWithoutBuy: number;
  isPhishy: boolean;
  reason: PhishyReason | null;
}

export interface Classification {
  phishy: ClassificationResult[];
  normal: ClassificationResult[];
}

export interface AggregateTotals {
  totalTransferred: number;
  totalBought: number;
  totalWithoutBuy: number;
}

export interface HolderAnalysis {
  totalSupply: number;
  burnedAmount: number;
  circulatingSupply: number;
  creatorPercent: number;
  creatorCheckPassed: boolean;
  otherHoldersCheckPassed: boolean;
  top10Percent: number;
  top10CheckPassed: boolean;
}

export interface TopHolder {
  address: string;
  amount: number;
  percent: number;
  pumpTokensCount: number;
  trades6h: number;
  isBondingCurve: boolean;
  isAiAgent: boolean;
}

export type RiskCheck = 'low_liquidity' | 'phishy_addresses' | 'creator_holding' | 'large_holder' | 'top10_concentration';

export interface RiskAssessment {
  score: number;
  failedChecks: RiskCheck[];
  evaluatedChecks: number;
}

export interface TokenCreation {
  mint: string;
  createdAt: string;
  creator?: string;
  name?: string;
  symbol?: string;
  uri?: string;
  isMayhemMode: boolean;
}

export interface TokenMetadata {
  name?: string;
  symbol?: string;
  uri?: string;
  image?: string;
  description?: string;
  twitter?: string;
  telegram?: string;
  website?: string;
  isMayhemMode: boolean;
  creator?: string;
  createdAt: string;
}

export interface BondingCurveInfo {
  address: string;
  liquiditySol?: number;
  discovered: boolean;
}

interface PhishyCheckResultBase {
  tokenAddress: string;
  totalAddresses: number;
  classification: Classification;
  totals: AggregateTotals;
  risk: RiskAssessment;
}

export interface FourMemeCheckResult extends PhishyCheckResultBase {
  tokenType: 'fourmeme';
}

export interface PumpFunCheckResult extends PhishyCheckResultBase {
  tokenType: 'pumpfun';
  bondingCurve: string;
  liquiditySol?: number;
  metadata: TokenMetadata;
  holderAnalysis?: HolderAnalysis;
  topHolders: TopHolder[];
}

export type PhishyCheckResult = FourMemeCheckResult | PumpFunCheckResult;

export interface RecentPhishyEntry {
  tokenAddress: string;
  tokenType: TokenType;
  phishyCount: number;
  timestamp: string;
  totals: AggregateTotals;
}
