// src/constants/pumpfun-constants.ts

export const PUMP_FUN_CONSTANTS = {
  PUMP_FUN_PROGRAM: '6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P',
  BONDING_CURVE_SEED: 'bonding-curve',
  TOTAL_SUPPLY: 1_000_000_000,

  // Token accounts that receive transfers as part of normal curve operation
  EXCLUDED_RECEIVERS: [
    '8psNvWTrdNTiVRNzAgsou9kETXNJm2SXZyaKuJraVRtf',
    'AkTgH1uW6J6j6QHmFNGzZuZwwXaHQsPCpHUriED28tRj',
  ],
} as const;

export const FOUR_MEME_CONSTANTS = {
  TOKEN_DECIMALS: 18,

  // Four.Meme token manager contracts
  EXCLUDED_RECEIVERS: [
    '0x5c952063c7fc8610ffdb798152d69f0b9550762b',
    '0x757eba15a64468e6535532fcF093Cef90e226F85',
  ],
} as const;

export const ANALYSIS_THRESHOLDS = {
  MAX_ADDRESSES: 1000,
  MIN_LIQUIDITY_SOL: 10,
  MAX_CREATOR_PERCENT: 5,
  MAX_HOLDER_PERCENT: 5,
  MAX_TOP10_PERCENT: 70,
  TOP_HOLDERS: 10,
  RISK_PENALTY_PER_CHECK: 20,
} as const;
