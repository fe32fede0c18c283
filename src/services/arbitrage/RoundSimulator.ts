'use strict';

import {
  ArbitrageDirection,
  PoolReserves,
  ReserveSnapshot,
  SimulationResult,
  SimulationStopReason,
  SimulationTotals,
  SwapResult,
} from '../../types/arbitrage.types';
import { InvalidReserveError } from '../../types/errors';
import { SwapCalculator } from './SwapCalculator';

export { DEFAULT_MAX_ROUNDS } from '../../config/pools';

export type RoundListener = (index: number, result: SwapResult, snapshotAfter: ReserveSnapshot) => void;

function freezePool(pool: Readonly<PoolReserves>): Readonly<PoolReserves> {
  return Object.freeze({ stable: pool.stable, other: pool.other });
}

/**
 * Copy a snapshot so later rounds never alias caller-owned objects
 */
export function createSnapshot(
  poolA: Readonly<PoolReserves>,
  poolB: Readonly<PoolReserves>
): ReserveSnapshot {
  return Object.freeze({ poolA: freezePool(poolA), poolB: freezePool(poolB) });
}

function validateSnapshot(snapshot: ReserveSnapshot): void {
  const entries: Array<[string, number]> = [
    ['poolA.stable', snapshot.poolA.stable],
    ['poolA.other', snapshot.poolA.other],
    ['poolB.stable', snapshot.poolB.stable],
    ['poolB.other', snapshot.poolB.other],
  ];

  for (const [label, value] of entries) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidReserveError(label, value);
    }
  }
}

/**
 * Price gap between the two pools of a snapshot, in percent
 */
export function snapshotPriceDifference(snapshot: ReserveSnapshot): number {
  return SwapCalculator.priceDifferencePercent(
    SwapCalculator.price(snapshot.poolA.stable, snapshot.poolA.other),
    SwapCalculator.price(snapshot.poolB.stable, snapshot.poolB.other)
  );
}

/**
 * Reserves after a round has been traded through both pools.
 * Source pool: stable in, token out. Target pool: token in, stable out.
 */
export function applyRound(snapshot: ReserveSnapshot, result: SwapResult): ReserveSnapshot {
  if (result.direction === null) {
    return snapshot;
  }

  const buyOnA = result.direction === ArbitrageDirection.BUY_A_SELL_B;
  const source = buyOnA ? snapshot.poolA : snapshot.poolB;
  const target = buyOnA ? snapshot.poolB : snapshot.poolA;

  const nextSource: PoolReserves = {
    stable: source.stable + result.inputAmount,
    other: source.other - result.bridgedAmount,
  };
  const nextTarget: PoolReserves = {
    stable: target.stable - result.outputAmount,
    other: target.other + result.bridgedAmount,
  };

  const next = buyOnA
    ? createSnapshot(nextSource, nextTarget)
    : createSnapshot(nextTarget, nextSource);

  // Draining a pool to zero means the inputs or the model are wrong
  validateSnapshot(next);
  return next;
}

function emptyTotals(): SimulationTotals {
  return { inputAmount: 0, bridgedAmount: 0, outputAmount: 0, profit: 0 };
}

/**
 * Round Simulator
 * Repeats the arbitrage against an evolving copy of both pools until the gap closes
 */
export class RoundSimulator {
  /**
   * Run up to maxRounds rounds, stopping early once the price gap falls below
   * minPriceDiffPercent or no round is profitable after fees.
   */
  static simulate(
    initialSnapshot: ReserveSnapshot,
    maxRounds: number,
    minPriceDiffPercent: number,
    onRound?: RoundListener
  ): SimulationResult {
    if (!Number.isInteger(maxRounds) || maxRounds < 0) {
      throw new RangeError(`maxRounds must be a non-negative integer, got ${maxRounds}`);
    }
    if (!Number.isFinite(minPriceDiffPercent) || minPriceDiffPercent < 0) {
      throw new RangeError(`minPriceDiffPercent must be a non-negative number, got ${minPriceDiffPercent}`);
    }

    validateSnapshot(initialSnapshot);

    let snapshot = createSnapshot(initialSnapshot.poolA, initialSnapshot.poolB);
    const rounds: SwapResult[] = [];
    const totals = emptyTotals();
    let stopReason = SimulationStopReason.ROUND_CAP_REACHED;

    for (let index = 0; index < maxRounds; index++) {
      if (snapshotPriceDifference(snapshot) < minPriceDiffPercent) {
        stopReason = SimulationStopReason.OPPORTUNITY_EXHAUSTED;
        break;
      }

      const result = SwapCalculator.evaluateRound(snapshot.poolA, snapshot.poolB);
      if (!(result.profit > 0)) {
        stopReason = SimulationStopReason.NO_PROFITABLE_TRADE;
        break;
      }

      snapshot = applyRound(snapshot, result);
      rounds.push(result);
      totals.inputAmount += result.inputAmount;
      totals.bridgedAmount += result.bridgedAmount;
      totals.outputAmount += result.outputAmount;
      totals.profit += result.profit;

      if (onRound) {
        onRound(index, result, snapshot);
      }
    }

    return {
      rounds,
      totals,
      finalSnapshot: snapshot,
      stopReason,
    };
  }
}

export default RoundSimulator;
