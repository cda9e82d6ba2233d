// src/analysis/aggregator.ts
import { ANALYSIS_THRESHOLDS } from '../constants/pumpfun-constants';
import {
  AggregateTotals,
  ClassificationResult,
  HolderAnalysis,
  RiskAssessment,
  RiskCheck,
} from '../types';

export function aggregateTotals(phishy: readonly ClassificationResult[]): AggregateTotals {
  return phishy.reduce<AggregateTotals>(
    (totals, result) => ({
      totalTransferred: totals.totalTransferred + result.totalTransferred,
      totalBought: totals.totalBought + result.totalBought,
      totalWithoutBuy: totals.totalWithoutBuy + result.transferredWithoutBuy,
    }),
    { totalTransferred: 0, totalBought: 0, totalWithoutBuy: 0 }
  );
}

export interface RiskInputs {
  liquiditySol?: number;
  phishyCount: number;
  holderAnalysis?: Pick<HolderAnalysis, 'creatorCheckPassed' | 'otherHoldersCheckPassed' | 'top10CheckPassed'>;
}

/**
 * 100 minus 20 per failed check, floored at 0. A check whose input is
 * missing is left out rather than counted as failed.
 */
export function computeRiskScore(inputs: RiskInputs): RiskAssessment {
  const checks: Array<[RiskCheck, boolean | undefined]> = [
    ['low_liquidity', inputs.liquiditySol === undefined ? undefined : inputs.liquiditySol < ANALYSIS_THRESHOLDS.MIN_LIQUIDITY_SOL],
    ['phishy_addresses', inputs.phishyCount > 0],
    ['creator_holding', inputs.holderAnalysis && !inputs.holderAnalysis.creatorCheckPassed],
    ['large_holder', inputs.holderAnalysis && !inputs.holderAnalysis.otherHoldersCheckPassed],
    ['top10_concentration', inputs.holderAnalysis && !inputs.holderAnalysis.top10CheckPassed],
  ];

  const evaluated = checks.filter(([, failed]) => failed !== undefined);
  const failedChecks = evaluated.filter(([, failed]) => failed === true).map(([check]) => check);

  return {
    score: Math.max(0, 100 - ANALYSIS_THRESHOLDS.RISK_PENALTY_PER_CHECK * failedChecks.length),
    failedChecks,
    evaluatedChecks: evaluated.length,
  };
}
