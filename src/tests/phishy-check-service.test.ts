import { CheckConfig, PhishyCheckService } from '../analysis/phishy-check-service';
import { GraphQLClient } from '../integrations/bitquery-client';
import {
  CheckCancelledError,
  ConfigurationError,
  InvalidInputError,
  NoTransferDataError,
  TokenTooOldError,
  UpstreamApiError,
} from '../utils/errors';
import {
  ATA_PROGRAM,
  BSC_TOKEN,
  SOL_MINT,
  TOKEN_PROGRAM,
  evmBuys,
  evmTransfers,
  fakeBitquery,
  pumpCreation,
  pumpPool,
  solanaBuys,
  solanaTransfers,
} from './helpers/fake-bitquery';

const NOW = Date.parse('2026-10-19T12:00:00Z');
const CREATOR = 'CreatorWallet';

const testConfig: CheckConfig = {
  BITQUERY_API_KEY: 'test-secret',
  PUMPFUN_MAX_AGE_HOURS: 8,
  HOLDER_STATS_WINDOW_HOURS: 6,
  AI_AGENT_ADDRESSES: [],
};

function serviceWith(client: GraphQLClient, config: CheckConfig = testConfig) {
  const createClient = jest.fn(() => client);
  const service = new PhishyCheckService({ config, createClient, now: () => NOW });
  return { service, createClient };
}

const fourMemeResponses = {
  FourMemeFirstTransfers: evmTransfers([
    ['0xa', '2026-10-19T10:00:00Z', '100'],
    ['0xb', '2026-10-19T10:05:00Z', '50'],
    ['0xc', '2026-10-19T10:10:00Z', '30'],
  ]),
  FourMemeFirstBuys: evmBuys([
    ['0xb', '2026-10-19T10:00:00Z', '50'],
    ['0xc', '2026-10-19T10:20:00Z', '10'],
  ]),
};

function pumpFunResponses(createdAt: string) {
  return {
    PumpFunCreation: pumpCreation(createdAt, 'SignerWallet', [
      { Name: 'name', Value: { string: 'Test Coin' } },
      { Name: 'creator', Value: { address: CREATOR } },
    ]),
    PumpFunPool: pumpPool(ATA_PROGRAM, '500000000', '42.5'),
    PumpFunFirstTransfers: solanaTransfers([[TOKEN_PROGRAM, '2026-10-19T10:30:00Z', '1500']]),
    PumpFunFirstBuys: solanaBuys([]),
    PumpFunHolderSnapshot: {
      Solana: {
        supply: [{ minted: '1000000000', burned: '0' }],
        holders: [
          { BalanceUpdate: { Account: { Token: { Owner: ATA_PROGRAM } }, Holding: '800000000' } },
          { BalanceUpdate: { Account: { Token: { Owner: TOKEN_PROGRAM } }, Holding: '30000000' } },
          { BalanceUpdate: { Account: { Token: { Owner: CREATOR } }, Holding: '20000000' } },
        ],
        creator: [{ BalanceUpdate: { Holding: '20000000' } }],
      },
    },
    PumpFunHolderTradeStats: { Solana: { DEXTradeByTokens: [] } },
  };
}

describe('PhishyCheckService', () => {
  describe('input checks', () => {
    test('should reject an invalid address before creating a client', async () => {
      const { client } = fakeBitquery({});
      const { service, createClient } = serviceWith(client);

      await expect(service.checkToken({ tokenAddress: 'nope' })).rejects.toThrow(InvalidInputError);
      expect(createClient).not.toHaveBeenCalled();
    });

    test('should reject an invalid bonding curve for a Pump.fun token', async () => {
      const { client } = fakeBitquery({});
      const { service, createClient } = serviceWith(client);

      await expect(service.checkToken({ tokenAddress: SOL_MINT, bondingCurve: 'not-a-curve' }))
        .rejects.toThrow('Invalid bonding curve address format. Expected a Solana address.');
      expect(createClient).not.toHaveBeenCalled();
    });

    test('should require the API key before any query', async () => {
      const { client, query } = fakeBitquery(fourMemeResponses);
      const { service, createClient } = serviceWith(client, { ...testConfig, BITQUERY_API_KEY: undefined });

      await expect(service.checkToken({ tokenAddress: BSC_TOKEN })).rejects.toThrow(ConfigurationError);
      expect(createClient).not.toHaveBeenCalled();
      expect(query).not.toHaveBeenCalled();
    });

    test('should not start a check that was already cancelled', async () => {
      const { client, query } = fakeBitquery(fourMemeResponses);
      const { service } = serviceWith(client);
      const controller = new AbortController();
      controller.abort();

      await expect(service.checkToken({ tokenAddress: BSC_TOKEN, signal: controller.signal }))
        .rejects.toThrow(CheckCancelledError);
      expect(query).not.toHaveBeenCalled();
    });
  });

  describe('Four.Meme', () => {
    test('should classify, total and score the receivers', async () => {
      const { client, calledQueries } = fakeBitquery(fourMemeResponses);
      const { service, createClient } = serviceWith(client);

      const result = await service.checkToken({ tokenAddress: BSC_TOKEN });

      expect(createClient).toHaveBeenCalledWith('test-secret');
      expect(calledQueries()).toEqual(['FourMemeFirstTransfers', 'FourMemeFirstBuys']);
      expect(result.tokenType).toBe('fourmeme');
      expect(result.totalAddresses).toBe(3);
      expect(result.classification.phishy.map(r => r.address)).toEqual(['0xa', '0xc']);
      expect(result.classification.normal.map(r => r.address)).toEqual(['0xb']);
      expect(result.totals).toEqual({ totalTransferred: 130, totalBought: 10, totalWithoutBuy: 120 });
      expect(result.risk).toEqual({ score: 80, failedChecks: ['phishy_addresses'], evaluatedChecks: 1 });
    });

    test('should ignore a bonding curve argument', async () => {
      const { client } = fakeBitquery(fourMemeResponses);
      const { service } = serviceWith(client);

      await expect(service.checkToken({ tokenAddress: BSC_TOKEN, bondingCurve: 'whatever' }))
        .resolves.toMatchObject({ tokenType: 'fourmeme' });
    });

    test('should pass informational conditions through', async () => {
      const { client } = fakeBitquery({ FourMemeFirstTransfers: evmTransfers([]) });
      const { service } = serviceWith(client);

      await expect(service.checkToken({ tokenAddress: BSC_TOKEN })).rejects.toThrow(NoTransferDataError);
    });

    test('should fail the whole check on an upstream error', async () => {
      const { client } = fakeBitquery({
        FourMemeFirstTransfers: new UpstreamApiError('bitquery request failed with HTTP 503', 503),
      });
      const { service } = serviceWith(client);

      await expect(service.checkToken({ tokenAddress: BSC_TOKEN }))
        .rejects.toThrow('bitquery request failed with HTTP 503');
    });

    test('should report a check aborted mid-flight as cancelled', async () => {
      const controller = new AbortController();
      const { client } = fakeBitquery({
        FourMemeFirstTransfers: () => {
          controller.abort();
          throw new Error('socket hang up');
        },
      });
      const { service } = serviceWith(client);

      await expect(service.checkToken({ tokenAddress: BSC_TOKEN, signal: controller.signal }))
        .rejects.toThrow(CheckCancelledError);
    });
  });

  describe('Pump.fun', () => {
    test('should combine classification, liquidity and holder checks', async () => {
      const { client, query } = fakeBitquery(pumpFunResponses('2026-10-19T10:00:00Z'));
      const { service } = serviceWith(client);

      const result = await service.checkToken({ tokenAddress: SOL_MINT });

      if (result.tokenType !== 'pumpfun') throw new Error('expected a Pump.fun result');
      expect(result.bondingCurve).toBe(ATA_PROGRAM);
      expect(result.liquiditySol).toBe(42.5);
      expect(result.metadata.name).toBe('Test Coin');
      expect(result.metadata.creator).toBe(CREATOR);
      expect(result.classification.phishy.map(r => r.address)).toEqual([TOKEN_PROGRAM]);
      expect(result.holderAnalysis?.creatorPercent).toBeCloseTo(2);
      expect(result.holderAnalysis?.top10Percent).toBeCloseTo(5);
      expect(result.topHolders[0]).toMatchObject({ address: ATA_PROGRAM, isBondingCurve: true });
      expect(result.risk).toEqual({ score: 80, failedChecks: ['phishy_addresses'], evaluatedChecks: 5 });

      const transferCall = query.mock.calls.find(call => call[0].name === 'PumpFunFirstTransfers');
      expect(transferCall?.[1].bonding_curve).toBe(ATA_PROGRAM);
    });

    test('should stop before fetching transfers for an old token', async () => {
      const { client, calledQueries } = fakeBitquery(pumpFunResponses('2026-10-19T02:00:00Z'));
      const { service } = serviceWith(client);

      await expect(service.checkToken({ tokenAddress: SOL_MINT })).rejects.toThrow(TokenTooOldError);
      expect(calledQueries()).not.toContain('PumpFunFirstTransfers');
    });
  });
});
