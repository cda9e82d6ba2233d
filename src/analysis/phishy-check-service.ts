// src/analysis/phishy-check-service.ts
import { BitqueryClient, GraphQLClient } from '../integrations/bitquery-client';
import { AddressActivityFetcher } from '../services/address-activity-fetcher';
import { BondingCurveResolver, assertWithinAgeWindow } from '../services/bonding-curve-resolver';
import { HolderReport, TokenHolderAnalyticsService } from '../services/token-holder-analytics-service';
import { TokenMetadataFetcher } from '../utils/token-metadata-fetcher';
import { AddressValidator } from '../utils/address-validator';
import { CheckCancelledError, InvalidInputError, PhishyCheckError } from '../utils/errors';
import { logger, shortAddress } from '../utils/logger';
import { Config, config as defaultConfig, requireApiKey } from '../config';
import { classifyAddresses } from './phishy-classifier';
import { aggregateTotals, computeRiskScore } from './aggregator';
import { FourMemeCheckResult, PhishyCheckResult, PumpFunCheckResult, TOKEN_TYPE_LABELS } from '../types';

export interface CheckRequest {
  tokenAddress: unknown;
  bondingCurve?: unknown;
  signal?: AbortSignal;
}

export type CheckConfig = Pick<
  Config,
  'BITQUERY_API_KEY' | 'PUMPFUN_MAX_AGE_HOURS' | 'HOLDER_STATS_WINDOW_HOURS' | 'AI_AGENT_ADDRESSES'
>;

export interface PhishyCheckDependencies {
  config?: CheckConfig;
  /** Builds the upstream client once the API key is known */
  createClient?: (apiKey: string) => GraphQLClient;
  metadataFetcher?: TokenMetadataFetcher;
  now?: () => number;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CheckCancelledError();
}

function parseBondingCurve(input: unknown): string | undefined {
  if (input === undefined || input === null) return undefined;
  if (typeof input !== 'string') {
    throw new InvalidInputError('Bonding curve must be a Solana address');
  }

  const address = input.trim();
  if (address.length === 0) return undefined;
  if (!AddressValidator.isValidSolanaAddress(address)) {
    throw new InvalidInputError('Invalid bonding curve address format. Expected a Solana address.');
  }
  return address;
}

/**
 * Runs one token through fetch, classification and scoring. Either the
 * whole result comes back or the check fails; there are no partial results.
 */
export class PhishyCheckService {
  private readonly config: CheckConfig;
  private readonly createClient: (apiKey: string) => GraphQLClient;
  private readonly metadataFetcher: TokenMetadataFetcher;
  private readonly now: () => number;

  constructor(deps: PhishyCheckDependencies = {}) {
    this.config = deps.config ?? defaultConfig;
    this.createClient = deps.createClient ?? (apiKey => new BitqueryClient(apiKey));
    this.metadataFetcher = deps.metadataFetcher ?? new TokenMetadataFetcher();
    this.now = deps.now ?? Date.now;
  }

  async checkToken(request: CheckRequest): Promise<PhishyCheckResult> {
    const { address, tokenType } = AddressValidator.parseTokenAddress(request.tokenAddress);
    const override = tokenType === 'pumpfun' ? parseBondingCurve(request.bondingCurve) : undefined;
    const apiKey = requireApiKey(this.config);
    const { signal } = request;

    throwIfAborted(signal);
    logger.info(`Checking ${TOKEN_TYPE_LABELS[tokenType]} token ${shortAddress(address)}`);

    const client = this.createClient(apiKey);
    const startedAt = this.now();

    try {
      const result = tokenType === 'pumpfun'
        ? await this.checkPumpFun(client, address, override, signal)
        : await this.checkFourMeme(client, address, signal);

      throwIfAborted(signal);
      logger.info(`Check finished for ${shortAddress(address)}`, {
        phishy: result.classification.phishy.length,
        normal: result.classification.normal.length,
        score: result.risk.score,
        ms: this.now() - startedAt,
      });
      return result;
    } catch (error) {
      // Aborted sub-requests surface as whatever the library threw
      if (signal?.aborted && !(error instanceof CheckCancelledError)) {
        throw new CheckCancelledError();
      }
      if (!(error instanceof PhishyCheckError)) {
        logger.error(`Unexpected failure checking ${shortAddress(address)}`, { error: String(error) });
      }
      throw error;
    }
  }

  private async checkFourMeme(
    client: GraphQLClient,
    token: string,
    signal?: AbortSignal
  ): Promise<FourMemeCheckResult> {
    const activity = await new AddressActivityFetcher(client).fetchAddressActivity(token, 'fourmeme', { signal });
    const classification = classifyAddresses(activity.transfers, activity.buys);

    return {
      tokenType: 'fourmeme',
      tokenAddress: token,
      totalAddresses: activity.transfers.length,
      classification,
      totals: aggregateTotals(classification.phishy),
      risk: computeRiskScore({ phishyCount: classification.phishy.length }),
    };
  }

  private async checkPumpFun(
    client: GraphQLClient,
    mint: string,
    override: string | undefined,
    signal?: AbortSignal
  ): Promise<PumpFunCheckResult> {
    const resolver = new BondingCurveResolver(client);
    const holders = new TokenHolderAnalyticsService(client, this.config.HOLDER_STATS_WINDOW_HOURS);

    const [creation, curve] = await Promise.all([
      resolver.getTokenCreation(mint, signal),
      resolver.resolveBondingCurve(mint, { override, signal }),
    ]);
    assertWithinAgeWindow(creation, this.config.PUMPFUN_MAX_AGE_HOURS, this.now());
    throwIfAborted(signal);

    const creator = creation.creator;
    const holderReport: Promise<HolderReport | undefined> = creator
      ? holders.getHolderReport(mint, {
        creator,
        bondingCurve: curve.address,
        aiAgents: new Set(this.config.AI_AGENT_ADDRESSES),
      }, signal)
      : Promise.resolve(undefined);

    const [activity, report, metadata] = await Promise.all([
      new AddressActivityFetcher(client).fetchAddressActivity(mint, 'pumpfun', {
        bondingCurve: curve.address,
        signal,
      }),
      holderReport,
      this.metadataFetcher.fetchTokenMetadata(creation, signal),
    ]);

    const classification = classifyAddresses(activity.transfers, activity.buys);

    return {
      tokenType: 'pumpfun',
      tokenAddress: mint,
      totalAddresses: activity.transfers.length,
      classification,
      totals: aggregateTotals(classification.phishy),
      risk: computeRiskScore({
        liquiditySol: curve.liquiditySol,
        phishyCount: classification.phishy.length,
        holderAnalysis: report?.analysis,
      }),
      bondingCurve: curve.address,
      liquiditySol: curve.liquiditySol,
      metadata,
      holderAnalysis: report?.analysis,
      topHolders: report?.topHolders ?? [],
    };
  }
}
