// src/integrations/bitquery-queries.ts
// GraphQL documents for the Bitquery streaming API (v2).

export interface BitqueryQuery {
  name: string;
  text: string;
}

// Query 1 (BSC): first transfer of the token into each receiver
export const FOURMEME_FIRST_TRANSFERS: BitqueryQuery = {
  name: 'FourMemeFirstTransfers',
  text: `
    query FourMemeFirstTransfers($token: String, $excluded: [String!], $limit: Int) {
      EVM(network: bsc, dataset: realtime) {
        Transfers(
          limit: { count: $limit }
          orderBy: { ascendingByField: "Block_first_transfer" }
          where: {
            TransactionStatus: { Success: true }
            Transfer: {
              Receiver: { notIn: $excluded }
              Currency: { SmartContract: { is: $token } }
            }
          }
        ) {
          Transfer {
            Receiver
          }
          Block {
            first_transfer: Time(minimum: Block_Time)
          }
          total_transferred_amount: sum(of: Transfer_Amount)
        }
      }
    }
  `,
};

// Query 2 (BSC): first DEX buy for each address in the list
export const FOURMEME_FIRST_BUYS: BitqueryQuery = {
  name: 'FourMemeFirstBuys',
  text: `
    query FourMemeFirstBuys($token: String!, $buyersList: [String!]) {
      EVM(network: bsc, dataset: realtime) {
        DEXTradeByTokens(
          orderBy: { descendingByField: "Block_first_buy" }
          where: {
            Trade: {
              Currency: { SmartContract: { is: $token } }
              Side: { Type: { is: buy } }
              Buyer: { in: $buyersList }
            }
            TransactionStatus: { Success: true }
          }
        ) {
          Trade {
            Buyer
          }
          Block {
            first_buy: Time(minimum: Block_Time)
          }
          total_bought_amount: sum(of: Trade_Amount)
        }
      }
    }
  `,
};

// Query 1 (Solana): receivers are token-account owners; the bonding curve is excluded
export const PUMPFUN_FIRST_TRANSFERS: BitqueryQuery = {
  name: 'PumpFunFirstTransfers',
  text: `
    query PumpFunFirstTransfers($token: String, $bonding_curve: String, $excluded: [String!], $limit: Int) {
      Solana {
        Transfers(
          limit: { count: $limit }
          orderBy: { ascendingByField: "Block_first_transfer" }
          where: {
            Transfer: {
              Receiver: { Token: { Owner: { not: $bonding_curve, notIn: $excluded } } }
              Currency: { MintAddress: { is: $token } }
            }
            Transaction: { Result: { Success: true } }
          }
        ) {
          Transfer {
            Receiver {
              Token {
                Owner
              }
            }
          }
          Block {
            first_transfer: Time(minimum: Block_Time)
          }
          total_transferred_amount: sum(of: Transfer_Amount)
        }
      }
    }
  `,
};

// Query 2 (Solana)
export const PUMPFUN_FIRST_BUYS: BitqueryQuery = {
  name: 'PumpFunFirstBuys',
  text: `
    query PumpFunFirstBuys($token: String!, $buyersList: [String!]) {
      Solana {
        DEXTradeByTokens(
          orderBy: { ascendingByField: "Block_first_buy" }
          where: {
            Trade: {
              Account: { Token: { Owner: { in: $buyersList } } }
              Currency: { MintAddress: { is: $token } }
              Side: { Type: { is: buy } }
            }
            Transaction: { Result: { Success: true } }
          }
        ) {
          Trade {
            Account {
              Token {
                Owner
              }
            }
          }
          Block {
            first_buy: Time(minimum: Block_Time)
          }
          total_bought_amount: sum(of: Trade_Amount)
        }
      }
    }
  `,
};

// Latest state of the Pump.fun pool for the mint; the market address is the bonding curve
export const PUMPFUN_POOL: BitqueryQuery = {
  name: 'PumpFunPool',
  text: `
    query PumpFunPool($token: String!, $program: String!) {
      Solana {
        DEXPools(
          limit: { count: 1 }
          orderBy: { descending: Block_Slot }
          where: {
            Pool: {
              Market: { BaseCurrency: { MintAddress: { is: $token } } }
              Dex: { ProgramAddress: { is: $program } }
            }
            Transaction: { Result: { Success: true } }
          }
        ) {
          Block {
            Time
          }
          Pool {
            Market {
              MarketAddress
            }
            Base {
              PostAmount
            }
            Quote {
              PostAmount
            }
          }
        }
      }
    }
  `,
};

// The create / create_v2 instruction carries name, symbol, uri, creator and the mayhem flag
export const PUMPFUN_CREATION: BitqueryQuery = {
  name: 'PumpFunCreation',
  text: `
    query PumpFunCreation($token: String!, $program: String!) {
      Solana {
        Instructions(
          limit: { count: 1 }
          orderBy: { ascending: Block_Time }
          where: {
            Instruction: {
              Program: { Address: { is: $program }, Method: { in: ["create", "create_v2"] } }
              Accounts: { includes: { Address: { is: $token } } }
            }
            Transaction: { Result: { Success: true } }
          }
        ) {
          Block {
            Time
          }
          Transaction {
            Signer
          }
          Instruction {
            Program {
              Method
              Arguments {
                Name
                Value {
                  ... on Solana_ABI_String_Value_Arg {
                    string
                  }
                  ... on Solana_ABI_Boolean_Value_Arg {
                    bool
                  }
                  ... on Solana_ABI_Address_Value_Arg {
                    address
                  }
                }
              }
            }
          }
        }
      }
    }
  `,
};

// Supply, largest holders and the creator's balance in one round trip
export const PUMPFUN_HOLDER_SNAPSHOT: BitqueryQuery = {
  name: 'PumpFunHolderSnapshot',
  text: `
    query PumpFunHolderSnapshot($token: String!, $creator: String!, $limit: Int!) {
      Solana {
        supply: TokenSupplyUpdates(
          where: { TokenSupplyUpdate: { Currency: { MintAddress: { is: $token } } } }
        ) {
          minted: sum(of: TokenSupplyUpdate_Amount, if: { TokenSupplyUpdate: { Amount: { gt: "0" } } })
          burned: sum(of: TokenSupplyUpdate_Amount, if: { TokenSupplyUpdate: { Amount: { lt: "0" } } })
        }
        holders: BalanceUpdates(
          limit: { count: $limit }
          orderBy: { descendingByField: "BalanceUpdate_Holding_maximum" }
          where: {
            BalanceUpdate: { Currency: { MintAddress: { is: $token } } }
            Transaction: { Result: { Success: true } }
          }
        ) {
          BalanceUpdate {
            Account {
              Token {
                Owner
              }
            }
            Holding: PostBalance(maximum: Block_Slot)
          }
        }
        creator: BalanceUpdates(
          where: {
            BalanceUpdate: {
              Account: { Token: { Owner: { is: $creator } } }
              Currency: { MintAddress: { is: $token } }
            }
            Transaction: { Result: { Success: true } }
          }
        ) {
          BalanceUpdate {
            Holding: PostBalance(maximum: Block_Slot)
          }
        }
      }
    }
  `,
};

// Per-holder Pump.fun activity over the stats window
export const PUMPFUN_HOLDER_TRADE_STATS: BitqueryQuery = {
  name: 'PumpFunHolderTradeStats',
  text: `
    query PumpFunHolderTradeStats($holders: [String!], $since: DateTime, $program: String!) {
      Solana {
        DEXTradeByTokens(
          where: {
            Trade: {
              Account: { Token: { Owner: { in: $holders } } }
              Dex: { ProgramAddress: { is: $program } }
            }
            Block: { Time: { since: $since } }
            Transaction: { Result: { Success: true } }
          }
        ) {
          Trade {
            Account {
              Token {
                Owner
              }
            }
          }
          trades: count
          tokens: count(distinct: Trade_Currency_MintAddress)
        }
      }
    }
  `,
};
