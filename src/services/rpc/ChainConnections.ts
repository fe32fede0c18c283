/**
 * Owns one JSON-RPC provider per chain.
 */

import { ethers } from 'ethers';
import { ChainConfig, ChainType } from '../../config/chains';
import { RpcConnectionError } from '../../types/errors';
import { logger } from '../utils/Logger';
import { RetryConfig, isRecoverableError, parseErrorMessage, withRetry } from '../utils/ErrorHandler';

export type ProviderFactory = (chain: ChainConfig) => ethers.JsonRpcProvider;

export const createJsonRpcProvider: ProviderFactory = (chain) =>
  new ethers.JsonRpcProvider(chain.rpcUrl, chain.chainId, { staticNetwork: true });

export class ChainConnections {
  private readonly chains: Map<ChainType, ChainConfig> = new Map();
  private readonly providers: Map<ChainType, ethers.JsonRpcProvider> = new Map();
  private readonly retry: RetryConfig;
  private readonly factory: ProviderFactory;

  constructor(
    chains: ChainConfig[],
    retry: Pick<RetryConfig, 'maxAttempts' | 'delayMs'>,
    factory: ProviderFactory = createJsonRpcProvider
  ) {
    for (const chain of chains) {
      this.chains.set(chain.type, chain);
    }
    this.retry = { ...retry, retryIf: isRecoverableError };
    this.factory = factory;
  }

  /**
   * Create a provider per chain and check each endpoint serves the expected chain id
   */
  async connect(): Promise<void> {
    await Promise.all(
      [...this.chains.values()].map(async (chain) => {
        const provider = this.factory(chain);
        this.providers.set(chain.type, provider);
        await this.verify(chain, provider);
      })
    );
  }

  private async verify(chain: ChainConfig, provider: ethers.JsonRpcProvider): Promise<void> {
    let chainIdHex: unknown;
    try {
      chainIdHex = await withRetry(
        () => provider.send('eth_chainId', []),
        this.retry,
        `${chain.name} chain id check`
      );
    } catch (error) {
      throw new RpcConnectionError(chain.rpcUrl, parseErrorMessage(error));
    }

    if (typeof chainIdHex !== 'string') {
      throw new RpcConnectionError(chain.rpcUrl, `unexpected eth_chainId response ${String(chainIdHex)}`);
    }

    const chainId = Number(BigInt(chainIdHex));
    if (chainId !== chain.chainId) {
      throw new RpcConnectionError(
        chain.rpcUrl,
        `expected chain id ${chain.chainId}, endpoint reports ${chainId}`
      );
    }

    logger.info(`Connected to ${chain.name}`, { chainId });
  }

  /**
   * Provider for a chain; connect() must have been called first
   */
  get(chain: ChainType): ethers.JsonRpcProvider {
    const provider = this.providers.get(chain);
    if (!provider) {
      throw new Error(`No connection for chain "${chain}", call connect() first`);
    }
    return provider;
  }

  /**
   * Tear down all providers
   */
  destroy(): void {
    for (const provider of this.providers.values()) {
      provider.destroy();
    }
    this.providers.clear();
  }
}

export default ChainConnections;
