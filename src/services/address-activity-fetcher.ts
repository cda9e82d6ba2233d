// src/services/address-activity-fetcher.ts
import { GraphQLClient, parseAmount, unwrapRoot } from '../integrations/bitquery-client';
import {
  FOURMEME_FIRST_BUYS,
  FOURMEME_FIRST_TRANSFERS,
  PUMPFUN_FIRST_BUYS,
  PUMPFUN_FIRST_TRANSFERS,
} from '../integrations/bitquery-queries';
import {
  FourMemeBuysData,
  FourMemeTransfersData,
  PumpFunBuysData,
  PumpFunTransfersData,
} from '../integrations/types';
import { ANALYSIS_THRESHOLDS, FOUR_MEME_CONSTANTS, PUMP_FUN_CONSTANTS } from '../constants/pumpfun-constants';
import { BuyRecord, TokenType, TransferRecord } from '../types';
import { logger, shortAddress } from '../utils/logger';
import { NoTransferDataError } from '../utils/errors';

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface TransferFetchOptions extends FetchOptions {
  bondingCurve?: string;
}

export interface AddressActivity {
  transfers: TransferRecord[];
  buys: Map<string, BuyRecord>;
}

export class AddressActivityFetcher {
  constructor(private readonly client: GraphQLClient) {}

  /**
   * Query 1: first transfer into each receiving address, capped at the
   * upstream page limit.
   */
  async getFirstTransfers(
    token: string,
    tokenType: TokenType,
    options: TransferFetchOptions = {}
  ): Promise<TransferRecord[]> {
    logger.info(`Fetching first transfers for ${tokenType} token ${shortAddress(token)}`);

    if (tokenType === 'pumpfun') {
      const data = await this.client.query<PumpFunTransfersData>(
        PUMPFUN_FIRST_TRANSFERS,
        {
          token,
          bonding_curve: options.bondingCurve,
          excluded: PUMP_FUN_CONSTANTS.EXCLUDED_RECEIVERS,
          limit: ANALYSIS_THRESHOLDS.MAX_ADDRESSES,
        },
        options.signal
      );

      const rows = unwrapRoot(data.Solana)?.Transfers ?? [];
      return rows.map(row => ({
        address: row.Transfer.Receiver.Token.Owner,
        firstTransferTime: row.Block.first_transfer ?? null,
        totalTransferred: parseAmount(row.total_transferred_amount),
      }));
    }

    const data = await this.client.query<FourMemeTransfersData>(
      FOURMEME_FIRST_TRANSFERS,
      {
        token,
        excluded: FOUR_MEME_CONSTANTS.EXCLUDED_RECEIVERS,
        limit: ANALYSIS_THRESHOLDS.MAX_ADDRESSES,
      },
      options.signal
    );

    const rows = unwrapRoot(data.EVM)?.Transfers ?? [];
    return rows.map(row => ({
      address: row.Transfer.Receiver,
      firstTransferTime: row.Block.first_transfer ?? null,
      totalTransferred: parseAmount(row.total_transferred_amount),
    }));
  }

  /**
   * Query 2: first buy and total bought, restricted to the given addresses.
   * Addresses absent from the result never bought.
   */
  async getFirstBuys(
    token: string,
    tokenType: TokenType,
    addresses: string[],
    options: FetchOptions = {}
  ): Promise<Map<string, BuyRecord>> {
    const buys = new Map<string, BuyRecord>();
    if (addresses.length === 0) return buys;

    logger.info(`Fetching first buys for ${addresses.length} addresses`);

    // EVM addresses may come back in a different case than they were sent
    const normalize = (address: string): string => tokenType === 'fourmeme' ? address.toLowerCase() : address;
    const wanted = new Map(addresses.map((address): [string, string] => [normalize(address), address]));

    const addBuy = (buyer: string, firstBuy: string | null | undefined, amount: number): void => {
      const address = wanted.get(normalize(buyer));
      if (address === undefined) return;
      buys.set(address, {
        address,
        firstBuyTime: firstBuy ?? undefined,
        totalBought: amount,
      });
    };

    if (tokenType === 'pumpfun') {
      const data = await this.client.query<PumpFunBuysData>(
        PUMPFUN_FIRST_BUYS,
        { token, buyersList: addresses },
        options.signal
      );
      for (const row of unwrapRoot(data.Solana)?.DEXTradeByTokens ?? []) {
        addBuy(row.Trade.Account.Token.Owner, row.Block.first_buy, parseAmount(row.total_bought_amount));
      }
      return buys;
    }

    const data = await this.client.query<FourMemeBuysData>(
      FOURMEME_FIRST_BUYS,
      { token, buyersList: addresses },
      options.signal
    );
    for (const row of unwrapRoot(data.EVM)?.DEXTradeByTokens ?? []) {
      addBuy(row.Trade.Buyer, row.Block.first_buy, parseAmount(row.total_bought_amount));
    }
    return buys;
  }

  /**
   * Query 2 takes Query 1's output, so the two always run in sequence.
   */
  async fetchAddressActivity(
    token: string,
    tokenType: TokenType,
    options: TransferFetchOptions = {}
  ): Promise<AddressActivity> {
    const transfers = await this.getFirstTransfers(token, tokenType, options);

    if (transfers.length === 0) {
      throw new NoTransferDataError();
    }

    logger.info(`Found ${transfers.length} addresses that received transfers`);

    const buys = await this.getFirstBuys(
      token,
      tokenType,
      transfers.map(transfer => transfer.address),
      { signal: options.signal }
    );

    logger.info(`Found buy records for ${buys.size} addresses`);

    return { transfers, buys };
  }
}
