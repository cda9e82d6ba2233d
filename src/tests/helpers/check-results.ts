// Ready-made check results for presentation tests
import { classifyAddresses } from '../../analysis/phishy-classifier';
import { aggregateTotals, computeRiskScore } from '../../analysis/aggregator';
import { BuyRecord, FourMemeCheckResult, PumpFunCheckResult } from '../../types';
import { ATA_PROGRAM, BSC_TOKEN, SOL_MINT, TOKEN_PROGRAM } from './fake-bitquery';

export const PHISHY_WALLET = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
export const NORMAL_WALLET = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';

export function fourMemeResult(withPhishy: boolean = true): FourMemeCheckResult {
  const transfers = [
    { address: NORMAL_WALLET, firstTransferTime: '2026-10-19T10:00:00Z', totalTransferred: 2e21 },
    ...(withPhishy
      ? [{ address: PHISHY_WALLET, firstTransferTime: '2026-10-19T10:05:00Z', totalTransferred: 3e21 }]
      : []),
  ];
  const buys = new Map<string, BuyRecord>([
    [NORMAL_WALLET, { address: NORMAL_WALLET, firstBuyTime: '2026-10-19T09:00:00Z', totalBought: 2e21 }],
  ]);
  const classification = classifyAddresses(transfers, buys);

  return {
    tokenType: 'fourmeme',
    tokenAddress: BSC_TOKEN,
    totalAddresses: transfers.length,
    classification,
    totals: aggregateTotals(classification.phishy),
    risk: computeRiskScore({ phishyCount: classification.phishy.length }),
  };
}

export function pumpFunResult(): PumpFunCheckResult {
  const transfers = [
    { address: TOKEN_PROGRAM, firstTransferTime: '2026-10-19T10:30:00Z', totalTransferred: 1_500_000 },
  ];
  const classification = classifyAddresses(transfers, new Map());
  const holderAnalysis = {
    totalSupply: 1_000_000_000,
    burnedAmount: 0,
    circulatingSupply: 1_000_000_000,
    creatorPercent: 2,
    creatorCheckPassed: true,
    otherHoldersCheckPassed: true,
    top10Percent: 5,
    top10CheckPassed: true,
  };

  return {
    tokenType: 'pumpfun',
    tokenAddress: SOL_MINT,
    totalAddresses: 1,
    classification,
    totals: aggregateTotals(classification.phishy),
    risk: computeRiskScore({ liquiditySol: 42.5, phishyCount: 1, holderAnalysis }),
    bondingCurve: ATA_PROGRAM,
    liquiditySol: 42.5,
    metadata: {
      name: 'Test Coin',
      symbol: 'TEST',
      isMayhemMode: false,
      creator: 'CreatorWallet',
      createdAt: '2026-10-19T10:00:00Z',
    },
    holderAnalysis,
    topHolders: [{
      address: ATA_PROGRAM,
      amount: 800_000_000,
      percent: 80,
      pumpTokensCount: 0,
      trades6h: 0,
      isBondingCurve: true,
      isAiAgent: false,
    }],
  };
}
