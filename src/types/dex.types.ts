/**
 * DEX-related type definitions
 */

import { ChainType } from '../config/chains';

export interface TokenInfo {
  address: string;
  symbol: string;
  name: string;
  decimals: number;
}

export interface PoolConfig {
  chain: ChainType;
  lpAddress: string;
  routerAddress: string;
  stableToken: TokenInfo;
  otherToken: TokenInfo;
}

/**
 * Reserves read from chain, already normalized to token decimals
 */
export interface PoolReserveReading {
  chain: ChainType;
  poolAddress: string;
  stable: number;
  other: number;
  blockTimestamp: number;
}
