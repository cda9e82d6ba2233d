// src/analysis/phishy-classifier.ts
import {
  BuyRecord,
  Classification,
  ClassificationResult,
  PHISHY_REASONS,
  TransferRecord,
} from '../types';

/**
 * True when `first` is strictly earlier than `second`. Timestamps are
 * compared as instants; if either one does not parse, the raw strings are
 * compared instead.
 */
export function isEarlier(first: string, second: string): boolean {
  const firstMs = Date.parse(first);
  const secondMs = Date.parse(second);

  if (Number.isNaN(firstMs) || Number.isNaN(secondMs)) {
    return first < second;
  }

  return firstMs < secondMs;
}

export function classifyAddress(transfer: TransferRecord, buy: BuyRecord | undefined): ClassificationResult {
  const totalBought = buy?.totalBought ?? 0;
  const base = {
    address: transfer.address,
    firstTransferTime: transfer.firstTransferTime,
    firstBuyTime: buy?.firstBuyTime ?? null,
    totalTransferred: transfer.totalTransferred,
    totalBought,
    transferredWithoutBuy: transfer.totalTransferred - totalBought,
  };

  if (!buy || buy.firstBuyTime === undefined) {
    return { ...base, isPhishy: true, reason: PHISHY_REASONS.NEVER_BOUGHT };
  }

  // Without a transfer time the two events cannot be ordered
  if (transfer.firstTransferTime !== null && isEarlier(transfer.firstTransferTime, buy.firstBuyTime)) {
    return { ...base, isPhishy: true, reason: PHISHY_REASONS.TRANSFER_BEFORE_BUY };
  }

  return { ...base, isPhishy: false, reason: null };
}

/**
 * Splits every transfer receiver into phishy and normal, keeping the
 * upstream order within each partition.
 */
export function classifyAddresses(
  transfers: readonly TransferRecord[],
  buys: ReadonlyMap<string, BuyRecord>
): Classification {
  const classification: Classification = { phishy: [], normal: [] };

  for (const transfer of transfers) {
    const result = classifyAddress(transfer, buys.get(transfer.address));
    if (result.isPhishy) {
      classification.phishy.push(result);
    } else {
      classification.normal.push(result);
    }
  }

  return classification;
}
