/**
 * Pool configurations for both chains
 */

import { EnvironmentConfig } from './environment';
import { ChainType } from './chains';

/**
 * Uniswap V2 style LP fee, taken from the input amount
 */
export const LP_FEE_RATE = 0.003;

/**
 * Round cap used when MAX_ROUNDS is not configured
 */
export const DEFAULT_MAX_ROUNDS = 10;

export interface PoolAddresses {
  chain: ChainType;
  lpAddress: string;
  routerAddress: string;
  stableTokenAddress: string;
  otherTokenAddress: string;
}

/**
 * Get pool addresses for a chain from the environment
 */
export function getPoolAddresses(chain: ChainType, config: EnvironmentConfig): PoolAddresses {
  switch (chain) {
    case 'eth':
      return {
        chain,
        lpAddress: config.ETH_LP_ADDRESS,
        routerAddress: config.ETH_ROUTER_ADDRESS,
        stableTokenAddress: config.ETH_USDC_ADDRESS,
        otherTokenAddress: config.ETH_ZERC_ADDRESS,
      };
    case 'pol':
      return {
        chain,
        lpAddress: config.POL_LP_ADDRESS,
        routerAddress: config.POL_ROUTER_ADDRESS,
        stableTokenAddress: config.POL_USDC_ADDRESS,
        otherTokenAddress: config.POL_ZERC_ADDRESS,
      };
  }
}
