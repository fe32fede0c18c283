/**
 * Unit tests for ChainConnections
 */

import { ethers } from 'ethers';
import { ChainConnections, ProviderFactory } from '../../src/services/rpc/ChainConnections';
import { ChainConfig, ETHEREUM_MAINNET, POLYGON_MAINNET } from '../../src/config/chains';
import { RpcConnectionError } from '../../src/types/errors';

/**
 * Answers eth_chainId locally; nothing leaves the process
 */
class StubRpcProvider extends ethers.JsonRpcProvider {
  destroyCalled = false;

  constructor(chain: ChainConfig, private readonly reply: () => Promise<unknown>) {
    super(chain.rpcUrl, chain.chainId, { staticNetwork: true });
  }

  async send(method: string, params: Array<unknown> | Record<string, unknown>): Promise<unknown> {
    if (method === 'eth_chainId') {
      return this.reply();
    }
    throw new Error(`unexpected ${method} ${JSON.stringify(params)}`);
  }

  destroy(): void {
    this.destroyCalled = true;
    super.destroy();
  }
}

describe('ChainConnections', () => {
  const chains: ChainConfig[] = [
    { ...ETHEREUM_MAINNET, rpcUrl: 'http://eth.rpc.test' },
    { ...POLYGON_MAINNET, rpcUrl: 'http://pol.rpc.test' },
  ];
  const retry = { maxAttempts: 2, delayMs: 0 };

  function factoryFor(replies: Record<string, () => Promise<unknown>>) {
    const created: StubRpcProvider[] = [];
    const factory: ProviderFactory = (chain) => {
      const provider = new StubRpcProvider(chain, replies[chain.type]);
      created.push(provider);
      return provider;
    };
    return { factory, created };
  }

  it('should connect when every endpoint serves the expected chain', async () => {
    const { factory, created } = factoryFor({
      eth: async () => '0x1',
      pol: async () => '0x89',
    });
    const connections = new ChainConnections(chains, retry, factory);

    await connections.connect();

    expect(connections.get('eth')).toBe(created[0]);
    expect(connections.get('pol')).toBe(created[1]);
    connections.destroy();
  });

  it('should reject an endpoint serving another chain', async () => {
    const { factory } = factoryFor({
      eth: async () => '0x1',
      pol: async () => '0x1',
    });
    const connections = new ChainConnections(chains, retry, factory);

    const error = await connections.connect().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RpcConnectionError);
    expect(error).toHaveProperty('url', 'http://pol.rpc.test');
    expect(error).toHaveProperty(
      'message',
      "Couldn't connect to rpc http://pol.rpc.test: expected chain id 137, endpoint reports 1"
    );
    connections.destroy();
  });

  it('should retry an unreachable endpoint before giving up', async () => {
    let attempts = 0;
    const { factory } = factoryFor({
      eth: async () => '0x1',
      pol: async () => {
        attempts++;
        throw Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
      },
    });
    const connections = new ChainConnections(chains, retry, factory);

    await expect(connections.connect()).rejects.toThrow(RpcConnectionError);
    expect(attempts).toBe(2);
    connections.destroy();
  });

  it('should require connect() before get()', () => {
    const connections = new ChainConnections(chains, retry);

    expect(() => connections.get('eth')).toThrow('No connection for chain "eth"');
  });

  it('should destroy every provider it created', async () => {
    const { factory, created } = factoryFor({
      eth: async () => '0x1',
      pol: async () => '0x89',
    });
    const connections = new ChainConnections(chains, retry, factory);

    await connections.connect();
    connections.destroy();

    expect(created.every((provider) => provider.destroyCalled)).toBe(true);
    expect(created.every((provider) => provider.destroyed)).toBe(true);
    expect(() => connections.get('eth')).toThrow('call connect() first');
  });
});
