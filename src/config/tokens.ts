/**
 * Token configurations for the USDC/ZERC pools
 */

import { TokenInfo } from '../types/dex.types';
import { ChainType } from './chains';

/**
 * USD Coin (USDC) on Ethereum mainnet
 */
export const USDC_ETHEREUM: TokenInfo = {
  address: '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
  symbol: 'USDC',
  name: 'USD Coin',
  decimals: 6,
};

/**
 * Native USD Coin (USDC) on Polygon PoS
 */
export const USDC_POLYGON: TokenInfo = {
  address: '0x3c499c542cEF5E3811e1192ce70d8cC03d5c3359',
  symbol: 'USDC',
  name: 'USD Coin',
  decimals: 6,
};

/**
 * Tokens whose metadata never needs an RPC round trip
 */
export const KNOWN_TOKENS: Record<ChainType, TokenInfo[]> = {
  eth: [USDC_ETHEREUM],
  pol: [USDC_POLYGON],
};

/**
 * Get known token info by address
 */
export function getTokenByAddress(chain: ChainType, address: string): TokenInfo | undefined {
  return KNOWN_TOKENS[chain].find(
    (token) => token.address.toLowerCase() === address.toLowerCase()
  );
}
