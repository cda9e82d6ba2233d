// src/utils/address-validator.ts
import { PublicKey } from '@solana/web3.js';
import { TokenType } from '../types';
import { InvalidInputError } from './errors';

const BASE58_REGEX = /^[1-9A-HJ-NP-Za-km-z]+$/;
const BSC_ADDRESS_REGEX = /^0x[0-9a-fA-F]{40}$/;

export class AddressValidator {
  /**
   * Validates if a string is a valid Solana address
   */
  static isValidSolanaAddress(address: string): boolean {
    if (!address || address.startsWith('0x')) {
      return false;
    }

    // Check length (should be 32-44 characters for base58)
    if (address.length < 32 || address.length > 44) {
      return false;
    }

    // Solana uses base58, no 0, O, I, or l
    if (!BASE58_REGEX.test(address)) {
      return false;
    }

    // Try to create a PublicKey object - this is the definitive test
    try {
      new PublicKey(address);
      return true;
    } catch {
      return false;
    }
  }

  static isValidBscAddress(address: string): boolean {
    return BSC_ADDRESS_REGEX.test(address);
  }

  static detectTokenType(address: string): TokenType | null {
    if (this.isValidBscAddress(address)) return 'fourmeme';
    if (this.isValidSolanaAddress(address)) return 'pumpfun';
    return null;
  }

  /**
   * Trims the input and resolves its token type, or throws before any
   * network call is made.
   */
  static parseTokenAddress(input: unknown): { address: string; tokenType: TokenType } {
    if (typeof input !== 'string' || input.trim().length === 0) {
      throw new InvalidInputError('Token address is required');
    }

    const address = input.trim();
    const tokenType = this.detectTokenType(address);

    if (!tokenType) {
      throw new InvalidInputError(
        'Invalid token address format. BSC addresses should start with 0x and be 42 characters. ' +
        'Solana addresses should be 32-44 base58 characters.'
      );
    }

    return { address, tokenType };
  }
}
