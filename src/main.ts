#!/usr/bin/env node
/**
 * Main entry point: read both pools and size the cross-chain arbitrage
 */

import { getConfig } from './config/environment';
import { CHAIN_TYPES, ChainType, getChainConfig } from './config/chains';
import { getPoolAddresses } from './config/pools';
import { ChainConnections } from './services/rpc/ChainConnections';
import { TokenInfo } from './services/blockchain/TokenInfo';
import { ReserveFetcher } from './services/blockchain/ReserveFetcher';
import { ArbitrageScanner } from './services/arbitrage/ArbitrageScanner';
import { RetryConfig, isRecoverableError } from './services/utils/ErrorHandler';
import { logger, logServiceError, logServiceStart } from './services/utils/Logger';
import { formatDuration } from './services/utils/PriceFormatter';
import { PoolConfig } from './types/dex.types';

async function buildFetcher(
  chain: ChainType,
  connections: ChainConnections,
  retry: RetryConfig
): Promise<ReserveFetcher> {
  const config = getConfig();
  const addresses = getPoolAddresses(chain, config);
  const provider = connections.get(chain);
  const tokenInfo = new TokenInfo(provider, chain, retry);

  const [stableToken, otherToken] = await Promise.all([
    tokenInfo.getMetadata(addresses.stableTokenAddress),
    tokenInfo.getMetadata(addresses.otherTokenAddress),
  ]);

  const pool: PoolConfig = {
    chain,
    lpAddress: addresses.lpAddress,
    routerAddress: addresses.routerAddress,
    stableToken,
    otherToken,
  };

  logger.info(`${chain} pool ${pool.lpAddress}: ${stableToken.symbol}/${otherToken.symbol}`, {
    router: pool.routerAddress,
    decimals: [stableToken.decimals, otherToken.decimals],
  });

  return new ReserveFetcher(provider, pool, retry);
}

async function main(): Promise<void> {
  const startedAt = Date.now();
  const config = getConfig();
  const retry: RetryConfig = {
    maxAttempts: config.RPC_RETRY_ATTEMPTS,
    delayMs: config.RPC_RETRY_DELAY_MS,
    retryIf: isRecoverableError,
  };

  logServiceStart('Cross-chain LP arbitrage', {
    mode: config.SIMULATION_MODE,
    maxRounds: config.MAX_ROUNDS,
    minPriceDiffPercent: config.MIN_PRICE_DIFF_PERCENT,
  });

  const connections = new ChainConnections(
    CHAIN_TYPES.map((chain) => getChainConfig(chain, config)),
    retry
  );

  try {
    await connections.connect();

    const [ethFetcher, polFetcher] = await Promise.all([
      buildFetcher('eth', connections, retry),
      buildFetcher('pol', connections, retry),
    ]);

    const scanner = new ArbitrageScanner(ethFetcher, polFetcher, {
      maxRounds: config.MAX_ROUNDS,
      minPriceDiffPercent: config.MIN_PRICE_DIFF_PERCENT,
    });

    const report = config.SIMULATION_MODE === 'single-round'
      ? await scanner.scanOnce()
      : await scanner.simulateRounds();

    logger.info(`Done in ${formatDuration(Date.now() - startedAt)}`, {
      status: report.status,
      rounds: report.simulation.rounds.length,
      profit: report.simulation.totals.profit,
    });
  } finally {
    connections.destroy();
  }
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logServiceError('Cross-chain LP arbitrage', err);
  process.exitCode = 1;
});
