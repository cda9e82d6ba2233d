// src/integrations/types.ts - Raw Bitquery response shapes

export interface GraphQLError {
  message: string;
  path?: Array<string | number>;
}

export interface GraphQLResponse<T> {
  data?: T | null;
  errors?: GraphQLError[];
}

// Bitquery returns aggregates and amounts as strings; some fields may be null
export type BitqueryAmount = string | number | null | undefined;

// The chain root ("EVM" / "Solana") is either an object or a one-element list
export type ChainRoot<T> = T | T[] | null | undefined;

export interface EvmTransferRow {
  Transfer: { Receiver: string };
  Block: { first_transfer?: string | null };
  total_transferred_amount?: BitqueryAmount;
}

export interface EvmBuyRow {
  Trade: { Buyer: string };
  Block: { first_buy?: string | null };
  total_bought_amount?: BitqueryAmount;
}

export interface SolanaTokenOwner {
  Token: { Owner: string };
}

export interface SolanaTransferRow {
  Transfer: { Receiver: SolanaTokenOwner };
  Block: { first_transfer?: string | null };
  total_transferred_amount?: BitqueryAmount;
}

export interface SolanaBuyRow {
  Trade: { Account: SolanaTokenOwner };
  Block: { first_buy?: string | null };
  total_bought_amount?: BitqueryAmount;
}

export interface FourMemeTransfersData {
  EVM: ChainRoot<{ Transfers?: EvmTransferRow[] | null }>;
}

export interface FourMemeBuysData {
  EVM: ChainRoot<{ DEXTradeByTokens?: EvmBuyRow[] | null }>;
}

export interface PumpFunTransfersData {
  Solana: ChainRoot<{ Transfers?: SolanaTransferRow[] | null }>;
}

export interface PumpFunBuysData {
  Solana: ChainRoot<{ DEXTradeByTokens?: SolanaBuyRow[] | null }>;
}

export interface DexPoolRow {
  Block: { Time: string };
  Pool: {
    Market: { MarketAddress: string };
    Base: { PostAmount: BitqueryAmount };
    Quote: { PostAmount: BitqueryAmount };
  };
}

export interface PumpFunPoolData {
  Solana: ChainRoot<{ DEXPools?: DexPoolRow[] | null }>;
}

export interface InstructionArgumentValue {
  string?: string;
  bool?: boolean;
  address?: string;
}

export interface InstructionArgument {
  Name: string;
  Value: InstructionArgumentValue | null;
}

export interface CreationInstructionRow {
  Block: { Time: string };
  Transaction: { Signer: string };
  Instruction: {
    Program: {
      Method: string;
      Arguments?: InstructionArgument[] | null;
    };
  };
}

export interface PumpFunCreationData {
  Solana: ChainRoot<{ Instructions?: CreationInstructionRow[] | null }>;
}

export interface SupplyRow {
  minted?: BitqueryAmount;
  burned?: BitqueryAmount;
}

export interface HolderBalanceRow {
  BalanceUpdate: {
    Account: SolanaTokenOwner;
    Holding: BitqueryAmount;
  };
}

export interface CreatorBalanceRow {
  BalanceUpdate: {
    Holding: BitqueryAmount;
  };
}

export interface PumpFunHolderSnapshotData {
  Solana: ChainRoot<{
    supply?: SupplyRow[] | null;
    holders?: HolderBalanceRow[] | null;
    creator?: CreatorBalanceRow[] | null;
  }>;
}

export interface HolderTradeStatsRow {
  Trade: { Account: SolanaTokenOwner };
  trades?: BitqueryAmount;
  tokens?: BitqueryAmount;
}

export interface PumpFunHolderTradeStatsData {
  Solana: ChainRoot<{ DEXTradeByTokens?: HolderTradeStatsRow[] | null }>;
}
