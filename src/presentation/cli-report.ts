// src/presentation/cli-report.ts
import chalk from 'chalk';
import { ClassificationResult, PhishyCheckResult, PumpFunCheckResult, TOKEN_TYPE_LABELS, TokenType } from '../types';
import { formatAmount, formatPercent, formatSol, formatTimestamp } from './format';
import { shortAddress } from '../utils/logger';

const RULE = '='.repeat(60);
const THIN_RULE = '-'.repeat(60);

function passFail(paint: chalk.Chalk, passed: boolean): string {
  return passed ? paint.green('PASS') : paint.red('FAIL');
}

function renderPhishyAddress(
  paint: chalk.Chalk,
  result: ClassificationResult,
  index: number,
  tokenType: TokenType
): string[] {
  const lines = [
    `${index + 1}. Address: ${paint.white(result.address)}`,
    `   First Transfer: ${formatTimestamp(result.firstTransferTime)}`,
    `   First Buy: ${formatTimestamp(result.firstBuyTime)}`,
    `   Total Transferred: ${formatAmount(result.totalTransferred, tokenType)}`,
    `   Total Bought: ${formatAmount(result.totalBought, tokenType)}`,
  ];
  if (result.transferredWithoutBuy > 0) {
    lines.push(paint.yellow(`   Transferred Without Buy: ${formatAmount(result.transferredWithoutBuy, tokenType)}`));
  }
  lines.push(`   Reason: ${result.reason ?? ''}`, '');
  return lines;
}

function renderPumpFunDetails(paint: chalk.Chalk, result: PumpFunCheckResult): string[] {
  const lines: string[] = ['', paint.cyan.bold('TOKEN DETAILS'), THIN_RULE];
  const { metadata } = result;

  if (metadata.name || metadata.symbol) {
    lines.push(`Name: ${metadata.name ?? 'Unknown'} (${metadata.symbol ?? '?'})`);
  }
  lines.push(`Created: ${formatTimestamp(metadata.createdAt)}`);
  if (metadata.creator) lines.push(`Creator: ${metadata.creator}`);
  if (metadata.isMayhemMode) lines.push(paint.magenta('Mayhem mode: enabled'));
  if (result.liquiditySol !== undefined) lines.push(`Liquidity: ${formatSol(result.liquiditySol)}`);

  const analysis = result.holderAnalysis;
  if (analysis) {
    lines.push(
      '',
      paint.cyan.bold('HOLDER ANALYSIS'),
      THIN_RULE,
      `Circulating Supply: ${formatAmount(analysis.circulatingSupply, 'pumpfun')} (burned ${formatAmount(analysis.burnedAmount, 'pumpfun')})`,
      `Creator Holding: ${formatPercent(analysis.creatorPercent)} ${passFail(paint, analysis.creatorCheckPassed)}`,
      `Holders Above 5%: ${passFail(paint, analysis.otherHoldersCheckPassed)}`,
      `Top 10 Holders: ${formatPercent(analysis.top10Percent)} ${passFail(paint, analysis.top10CheckPassed)}`
    );
  }

  if (result.topHolders.length > 0) {
    lines.push('', paint.cyan.bold('TOP HOLDERS'), THIN_RULE);
    result.topHolders.forEach((holder, index) => {
      const tags = [
        holder.isBondingCurve ? 'bonding curve' : undefined,
        holder.isAiAgent ? 'AI agent' : undefined,
      ].filter((tag): tag is string => tag !== undefined);

      lines.push(
        `${String(index + 1).padStart(2)}. ${shortAddress(holder.address).padEnd(13)} ` +
        `${formatAmount(holder.amount, 'pumpfun').padStart(9)} ${formatPercent(holder.percent).padStart(7)} ` +
        `trades(6h)=${holder.trades6h} pump_tokens=${holder.pumpTokensCount}` +
        (tags.length > 0 ? paint.gray(` [${tags.join(', ')}]`) : '')
      );
    });
  }

  return lines;
}

/**
 * Human-readable report for the terminal, one entry per line.
 */
export function renderCliReport(result: PhishyCheckResult, paint: chalk.Chalk = chalk): string[] {
  const { phishy, normal } = result.classification;
  const lines: string[] = [
    RULE,
    `Checking token: ${result.tokenAddress}`,
    `Token Type: ${TOKEN_TYPE_LABELS[result.tokenType]}`,
  ];
  if (result.tokenType === 'pumpfun') lines.push(`Bonding Curve: ${result.bondingCurve}`);

  lines.push(
    RULE,
    '',
    paint.bold('RESULTS'),
    RULE,
    `Total addresses that received transfers: ${result.totalAddresses}`,
    `Addresses with phishy behavior: ${phishy.length}`,
    `Addresses with normal behavior: ${normal.length}`,
    ''
  );

  if (phishy.length === 0) {
    lines.push(paint.green('✅ Token appears to be safe (no phishy behavior detected)'));
  } else {
    lines.push(
      paint.red.bold('⚠️  TOKEN IS PHISHY! ⚠️'),
      `Found ${phishy.length} address(es) with suspicious behavior:`,
      ''
    );
    phishy.forEach((entry, index) => {
      lines.push(...renderPhishyAddress(paint, entry, index, result.tokenType));
    });

    lines.push(
      THIN_RULE,
      'SUMMARY OF PHISHY BEHAVIOR:',
      THIN_RULE,
      `Total Amount Transferred to Phishy Addresses: ${formatAmount(result.totals.totalTransferred, result.tokenType)}`,
      `Total Amount Bought by Phishy Addresses: ${formatAmount(result.totals.totalBought, result.tokenType)}`,
      `Total Amount Transferred WITHOUT Purchase: ${formatAmount(result.totals.totalWithoutBuy, result.tokenType)}`
    );
  }

  if (result.tokenType === 'pumpfun') {
    lines.push(...renderPumpFunDetails(paint, result));
  }

  const { score, failedChecks } = result.risk;
  const scoreColor = score >= 80 ? paint.green : score >= 60 ? paint.yellow : paint.red;
  lines.push(
    '',
    `Risk Score: ${scoreColor(`${score}/100`)}` +
      (failedChecks.length > 0 ? ` (failed: ${failedChecks.join(', ')})` : ''),
    RULE
  );

  return lines;
}
