'use strict';

import { ethers } from 'ethers';
import { PoolConfig, PoolReserveReading } from '../../types/dex.types';
import { PoolTokenMismatchError } from '../../types/errors';
import { logReserves } from '../utils/Logger';
import { RetryConfig, withRetry } from '../utils/ErrorHandler';

const UNISWAP_V2_PAIR_ABI = [
  'function getReserves() external view returns (uint112 reserve0, uint112 reserve1, uint32 blockTimestampLast)',
  'function token0() external view returns (address)',
  'function token1() external view returns (address)',
];

/**
 * Source of decimal-normalized reserves for one pool
 */
export interface ReserveProvider {
  readonly pool: PoolConfig;
  fetchPoolReserves(): Promise<PoolReserveReading>;
}

/**
 * Reads a Uniswap V2 pair and orders its reserves as (stable, other)
 */
export class ReserveFetcher implements ReserveProvider {
  readonly pool: PoolConfig;
  private contract: ethers.Contract;
  private retry: RetryConfig;

  constructor(runner: ethers.ContractRunner, pool: PoolConfig, retry: RetryConfig) {
    this.pool = pool;
    this.retry = retry;
    this.contract = new ethers.Contract(pool.lpAddress, UNISWAP_V2_PAIR_ABI, runner);
  }

  /**
   * Fetch current reserves; RPC failures are retried per the retry policy, then propagated
   */
  async fetchPoolReserves(): Promise<PoolReserveReading> {
    const { lpAddress, stableToken, otherToken } = this.pool;

    const [[reserve0, reserve1, timestamp], token0, token1] = await withRetry(
      () => Promise.all([
        this.contract.getReserves(),
        this.contract.token0(),
        this.contract.token1(),
      ]),
      this.retry,
      `getReserves on ${this.pool.chain}:${lpAddress}`
    );

    const t0 = String(token0).toLowerCase();
    const t1 = String(token1).toLowerCase();
    const stable = stableToken.address.toLowerCase();
    const other = otherToken.address.toLowerCase();

    let stableRaw: bigint;
    let otherRaw: bigint;
    if (t0 === stable && t1 === other) {
      stableRaw = BigInt(reserve0);
      otherRaw = BigInt(reserve1);
    } else if (t0 === other && t1 === stable) {
      stableRaw = BigInt(reserve1);
      otherRaw = BigInt(reserve0);
    } else {
      throw new PoolTokenMismatchError(lpAddress, [stable, other], [t0, t1]);
    }

    const reading: PoolReserveReading = {
      chain: this.pool.chain,
      poolAddress: lpAddress,
      stable: Number(ethers.formatUnits(stableRaw, stableToken.decimals)),
      other: Number(ethers.formatUnits(otherRaw, otherToken.decimals)),
      blockTimestamp: Number(timestamp),
    };

    logReserves(reading);
    return reading;
  }
}

export default ReserveFetcher;
