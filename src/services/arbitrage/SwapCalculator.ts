'use strict';

import { LP_FEE_RATE } from '../../config/pools';
import {
  ArbitrageDirection,
  PoolReserves,
  SwapResult,
  ZERO_SWAP_RESULT,
} from '../../types/arbitrage.types';
import { InvalidReserveError } from '../../types/errors';

/**
 * Price gaps below this (in percent) are treated as rounding noise
 */
export const MIN_RELATIVE_PRICE_DIFF_PERCENT = 0.001;

function requirePositive(label: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidReserveError(label, value);
  }
}

/**
 * Swap Calculator Service
 * Constant product (x*y=k) math on decimal-normalized reserves
 */
export class SwapCalculator {
  /**
   * Calculate swap output using constant product formula, fee taken from the input
   * Formula: amountOut = amountIn * (1 - fee) * reserveOut / (reserveIn + amountIn * (1 - fee))
   */
  static swapOutput(
    amountIn: number,
    reserveIn: number,
    reserveOut: number,
    feeRate: number = LP_FEE_RATE
  ): number {
    requirePositive('reserveIn', reserveIn);
    requirePositive('reserveOut', reserveOut);
    if (!(amountIn >= 0) || !Number.isFinite(amountIn)) {
      throw new RangeError(`amountIn must be a non-negative finite number, got ${amountIn}`);
    }
    if (!(feeRate >= 0 && feeRate < 1)) {
      throw new RangeError(`feeRate must be in [0, 1), got ${feeRate}`);
    }

    const effectiveIn = amountIn * (1 - feeRate);
    return (effectiveIn * reserveOut) / (reserveIn + effectiveIn);
  }

  /**
   * Closed-form stable input on the source pool for the two-leg round trip.
   * Fee-free; may be zero or negative when the source pool is not the cheaper one.
   */
  static optimalInput(
    sourceStable: number,
    sourceOther: number,
    targetStable: number,
    targetOther: number
  ): number {
    const ratioSource = sourceStable / sourceOther;
    const ratioTarget = targetStable / targetOther;
    const gamma = Math.sqrt(ratioTarget / ratioSource);

    return (sourceStable * (gamma - 1)) / (gamma + 1);
  }

  /**
   * Quoted price of the other asset in stable units
   */
  static price(stableReserve: number, otherReserve: number): number {
    requirePositive('otherReserve', otherReserve);
    return stableReserve / otherReserve;
  }

  /**
   * Relative price gap in percent, measured against the lower price
   */
  static priceDifferencePercent(priceA: number, priceB: number): number {
    return (Math.abs(priceA - priceB) / Math.min(priceA, priceB)) * 100;
  }

  /**
   * Size and evaluate one buy-low / sell-high round between two pools.
   * Returns ZERO_SWAP_RESULT when there is nothing worth trading.
   */
  static evaluateRound(poolA: PoolReserves, poolB: PoolReserves): SwapResult {
    requirePositive('poolA.stable', poolA.stable);
    requirePositive('poolB.stable', poolB.stable);
    const priceA = this.price(poolA.stable, poolA.other);
    const priceB = this.price(poolB.stable, poolB.other);

    if (this.priceDifferencePercent(priceA, priceB) < MIN_RELATIVE_PRICE_DIFF_PERCENT) {
      return ZERO_SWAP_RESULT;
    }

    // Buy where the token is cheap, sell where it is expensive
    const [source, target, direction]: [PoolReserves, PoolReserves, ArbitrageDirection] =
      priceA < priceB
        ? [poolA, poolB, ArbitrageDirection.BUY_A_SELL_B]
        : [poolB, poolA, ArbitrageDirection.BUY_B_SELL_A];

    const amount = this.optimalInput(source.stable, source.other, target.stable, target.other);
    if (!(amount > 0)) {
      return ZERO_SWAP_RESULT;
    }

    const bridged = this.swapOutput(amount, source.stable, source.other, LP_FEE_RATE);
    const received = this.swapOutput(bridged, target.other, target.stable, LP_FEE_RATE);

    // The closed form ignores fees, so the fee-inclusive legs get the final say
    const profit = received - amount;
    if (!(profit > 0)) {
      return ZERO_SWAP_RESULT;
    }

    return {
      inputAmount: amount,
      bridgedAmount: bridged,
      outputAmount: received,
      profit,
      direction,
    };
  }
}

export default SwapCalculator;
