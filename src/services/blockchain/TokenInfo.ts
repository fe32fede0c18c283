'use strict';

import { ethers } from 'ethers';
import { ChainType } from '../../config/chains';
import { getTokenByAddress } from '../../config/tokens';
import { TokenInfo as TokenMetadata } from '../../types/dex.types';
import { TokenMetadataError } from '../../types/errors';
import { logger } from '../utils/Logger';
import { RetryConfig, parseErrorMessage, withRetry } from '../utils/ErrorHandler';

const ERC20_ABI = [
  'function decimals() external view returns (uint8)',
  'function symbol() external view returns (string)',
  'function name() external view returns (string)',
];

/**
 * ERC-20 metadata fetcher with caching.
 * A failed lookup raises TokenMetadataError; decimals are never defaulted.
 */
export class TokenInfo {
  private runner: ethers.ContractRunner;
  private chain: ChainType;
  private retry: RetryConfig;
  private cache: Map<string, TokenMetadata> = new Map();

  constructor(runner: ethers.ContractRunner, chain: ChainType, retry: RetryConfig) {
    this.runner = runner;
    this.chain = chain;
    this.retry = retry;
  }

  /**
   * Get full token metadata with caching
   */
  async getMetadata(tokenAddress: string): Promise<TokenMetadata> {
    const normalized = tokenAddress.toLowerCase();

    // Check cache first
    const cached = this.cache.get(normalized);
    if (cached) {
      return cached;
    }

    const known = getTokenByAddress(this.chain, tokenAddress);
    if (known) {
      const metadata = { ...known, address: normalized };
      this.cache.set(normalized, metadata);
      return metadata;
    }

    const contract = new ethers.Contract(tokenAddress, ERC20_ABI, this.runner);

    try {
      const [decimals, symbol, name] = await withRetry(
        () => Promise.all([
          contract.decimals(),
          contract.symbol(),
          contract.name(),
        ]),
        this.retry,
        `metadata for ${tokenAddress}`
      );

      const metadata: TokenMetadata = {
        address: normalized,
        decimals: Number(decimals),
        symbol: String(symbol),
        name: String(name),
      };

      this.cache.set(normalized, metadata);
      logger.debug(`Token ${metadata.symbol} on ${this.chain} has ${metadata.decimals} decimals`);

      return metadata;
    } catch (error) {
      throw new TokenMetadataError(tokenAddress, parseErrorMessage(error));
    }
  }
}

export default TokenInfo;
