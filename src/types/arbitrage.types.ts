/**
 * Arbitrage sizing and simulation type definitions
 */

/**
 * Decimal-normalized reserves of one pool
 */
export interface PoolReserves {
  stable: number; // Stable asset (USDC) reserve
  other: number; // Traded token (ZERC) reserve
}

/**
 * Reserves of both pools at one point in time
 */
export interface ReserveSnapshot {
  readonly poolA: Readonly<PoolReserves>;
  readonly poolB: Readonly<PoolReserves>;
}

export enum ArbitrageDirection {
  BUY_A_SELL_B = 'BUY_A_SELL_B', // Buy the token on pool A, sell it on pool B
  BUY_B_SELL_A = 'BUY_B_SELL_A', // Buy the token on pool B, sell it on pool A
}

export interface SwapResult {
  readonly inputAmount: number; // Stable asset spent on the buy side
  readonly bridgedAmount: number; // Token moved between the pools
  readonly outputAmount: number; // Stable asset received on the sell side
  readonly profit: number;
  readonly direction: ArbitrageDirection | null;
}

export interface SimulationTotals {
  inputAmount: number;
  bridgedAmount: number;
  outputAmount: number;
  profit: number;
}

export enum SimulationStopReason {
  OPPORTUNITY_EXHAUSTED = 'OPPORTUNITY_EXHAUSTED',
  NO_PROFITABLE_TRADE = 'NO_PROFITABLE_TRADE',
  ROUND_CAP_REACHED = 'ROUND_CAP_REACHED',
}

export interface SimulationResult {
  rounds: SwapResult[];
  totals: SimulationTotals;
  finalSnapshot: ReserveSnapshot;
  stopReason: SimulationStopReason;
}

/**
 * "No opportunity" sentinel, distinct from a failure
 */
export const ZERO_SWAP_RESULT: SwapResult = Object.freeze({
  inputAmount: 0,
  bridgedAmount: 0,
  outputAmount: 0,
  profit: 0,
  direction: null,
});

export function isZeroResult(result: SwapResult): boolean {
  return result.direction === null && result.profit === 0;
}
