/**
 * Blockchain network configurations for the two arbitrage legs
 */

import { EnvironmentConfig } from './environment';

export type ChainType = 'eth' | 'pol';

export const CHAIN_TYPES: readonly ChainType[] = ['eth', 'pol'];

export interface ChainConfig {
  type: ChainType;
  chainId: number;
  name: string;
  rpcUrl: string;
}

/**
 * Ethereum Mainnet Configuration
 */
export const ETHEREUM_MAINNET: Omit<ChainConfig, 'rpcUrl'> = {
  type: 'eth',
  chainId: 1,
  name: 'Ethereum Mainnet',
};

/**
 * Polygon PoS Configuration
 */
export const POLYGON_MAINNET: Omit<ChainConfig, 'rpcUrl'> = {
  type: 'pol',
  chainId: 137,
  name: 'Polygon PoS',
};

/**
 * Get chain configuration, with the RPC endpoint taken from the environment
 */
export function getChainConfig(chain: ChainType, config: EnvironmentConfig): ChainConfig {
  switch (chain) {
    case 'eth':
      return { ...ETHEREUM_MAINNET, rpcUrl: config.ETH_RPC_URL };
    case 'pol':
      return { ...POLYGON_MAINNET, rpcUrl: config.POL_RPC_URL };
  }
}
