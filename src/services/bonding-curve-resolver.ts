// src/services/bonding-curve-resolver.ts
import { PublicKey } from '@solana/web3.js';
import { GraphQLClient, parseAmount, unwrapRoot } from '../integrations/bitquery-client';
import { PUMPFUN_CREATION, PUMPFUN_POOL } from '../integrations/bitquery-queries';
import { InstructionArgument, PumpFunCreationData, PumpFunPoolData } from '../integrations/types';
import { PUMP_FUN_CONSTANTS } from '../constants/pumpfun-constants';
import { BondingCurveInfo, TokenCreation } from '../types';
import { logger, shortAddress } from '../utils/logger';
import { BondingCurveNotFoundError, TokenTooOldError } from '../utils/errors';

const pumpProgram = new PublicKey(PUMP_FUN_CONSTANTS.PUMP_FUN_PROGRAM);

/**
 * Derive bonding curve address for a token
 */
export function deriveBondingCurveAddress(mint: string): string {
  const [bondingCurve] = PublicKey.findProgramAddressSync(
    [
      Buffer.from(PUMP_FUN_CONSTANTS.BONDING_CURVE_SEED),
      new PublicKey(mint).toBuffer()
    ],
    pumpProgram
  );
  return bondingCurve.toBase58();
}

export function assertWithinAgeWindow(
  creation: TokenCreation | null,
  maxAgeHours: number,
  now: number = Date.now()
): asserts creation is TokenCreation {
  if (!creation) {
    throw new TokenTooOldError(
      `No Pump.fun creation found for this token in the last ${maxAgeHours} hours. ` +
      `Only tokens created within the last ${maxAgeHours} hours can be checked.`
    );
  }

  const createdAt = Date.parse(creation.createdAt);
  if (Number.isNaN(createdAt)) return;

  const ageHours = (now - createdAt) / (60 * 60 * 1000);
  if (ageHours > maxAgeHours) {
    throw new TokenTooOldError(
      `Token was created ${ageHours.toFixed(1)} hours ago. ` +
      `Only tokens created within the last ${maxAgeHours} hours can be checked.`
    );
  }
}

function argumentValue(args: InstructionArgument[], name: string): InstructionArgument['Value'] {
  return args.find(arg => arg.Name === name)?.Value ?? null;
}

export interface ResolveOptions {
  override?: string;
  signal?: AbortSignal;
}

export class BondingCurveResolver {
  constructor(private readonly client: GraphQLClient) {}

  /**
   * The curve is the market address of the token's Pump.fun pool. A pool
   * with no base tokens left has migrated off the curve.
   */
  async resolveBondingCurve(mint: string, options: ResolveOptions = {}): Promise<BondingCurveInfo> {
    const data = await this.client.query<PumpFunPoolData>(
      PUMPFUN_POOL,
      { token: mint, program: PUMP_FUN_CONSTANTS.PUMP_FUN_PROGRAM },
      options.signal
    );

    const pool = unwrapRoot(data.Solana)?.DEXPools?.[0];

    if (!pool) {
      if (options.override) {
        logger.warn(`No Pump.fun pool found for ${shortAddress(mint)}, using supplied bonding curve`);
        return { address: options.override, discovered: false };
      }
      throw new BondingCurveNotFoundError(
        'Could not find a Pump.fun bonding curve for this token. It may not be a Pump.fun token.'
      );
    }

    if (parseAmount(pool.Pool.Base.PostAmount) <= 0) {
      throw new BondingCurveNotFoundError(
        'This token has completed its bonding curve and migrated. Only tokens still on the curve can be checked.'
      );
    }

    const address = pool.Pool.Market.MarketAddress;
    const derived = deriveBondingCurveAddress(mint);
    if (address !== derived) {
      logger.warn('Pool market differs from derived bonding curve', {
        market: address,
        derived,
      });
    }

    const liquiditySol = parseAmount(pool.Pool.Quote.PostAmount);
    logger.info(`Bonding curve ${shortAddress(address)} holds ${liquiditySol.toFixed(2)} SOL`);

    return { address, liquiditySol, discovered: true };
  }

  async getTokenCreation(mint: string, signal?: AbortSignal): Promise<TokenCreation | null> {
    const data = await this.client.query<PumpFunCreationData>(
      PUMPFUN_CREATION,
      { token: mint, program: PUMP_FUN_CONSTANTS.PUMP_FUN_PROGRAM },
      signal
    );

    const row = unwrapRoot(data.Solana)?.Instructions?.[0];
    if (!row) return null;

    const args = row.Instruction.Program.Arguments ?? [];

    return {
      mint,
      createdAt: row.Block.Time,
      creator: argumentValue(args, 'creator')?.address ?? row.Transaction.Signer,
      name: argumentValue(args, 'name')?.string,
      symbol: argumentValue(args, 'symbol')?.string,
      uri: argumentValue(args, 'uri')?.string,
      isMayhemMode: argumentValue(args, 'is_mayhem_mode')?.bool === true,
    };
  }
}
