'use strict';

import { logger, logRound, logSimulation } from '../utils/Logger';
import { formatPercentage, formatTokenAmount, formatUSD } from '../utils/PriceFormatter';
import { ReserveProvider } from '../blockchain/ReserveFetcher';
import { SwapCalculator } from './SwapCalculator';
import { RoundSimulator, createSnapshot, snapshotPriceDifference } from './RoundSimulator';
import {
  ArbitrageDirection,
  ReserveSnapshot,
  SimulationResult,
  SimulationStopReason,
  SwapResult,
} from '../../types/arbitrage.types';
import { PoolReserveReading } from '../../types/dex.types';

export type ScanStatus = 'opportunity' | 'no-opportunity';

export interface ScanReport {
  status: ScanStatus;
  readings: [PoolReserveReading, PoolReserveReading];
  snapshot: ReserveSnapshot;
  priceDifferencePercent: number;
  simulation: SimulationResult;
}

export interface ScannerOptions {
  maxRounds: number;
  minPriceDiffPercent: number;
}

/**
 * Arbitrage Scanner Service
 * Reads both pools, runs the sizing math and reports the outcome.
 * Errors (RPC, invalid reserves) propagate; "nothing to do" comes back as a report.
 */
export class ArbitrageScanner {
  private readonly poolA: ReserveProvider;
  private readonly poolB: ReserveProvider;
  private readonly options: ScannerOptions;

  constructor(poolA: ReserveProvider, poolB: ReserveProvider, options: ScannerOptions) {
    this.poolA = poolA;
    this.poolB = poolB;
    this.options = options;
  }

  /**
   * Fetch both pools in parallel and build a snapshot
   */
  async readSnapshot(): Promise<{ readings: [PoolReserveReading, PoolReserveReading]; snapshot: ReserveSnapshot }> {
    const [readingA, readingB] = await Promise.all([
      this.poolA.fetchPoolReserves(),
      this.poolB.fetchPoolReserves(),
    ]);

    const snapshot = createSnapshot(
      { stable: readingA.stable, other: readingA.other },
      { stable: readingB.stable, other: readingB.other }
    );

    return { readings: [readingA, readingB], snapshot };
  }

  /**
   * Evaluate a single round on live reserves
   */
  async scanOnce(): Promise<ScanReport> {
    const { readings, snapshot } = await this.readSnapshot();

    // One round, no gap threshold: same result as SwapCalculator.evaluateRound
    const simulation = RoundSimulator.simulate(snapshot, 1, 0);
    return this.report(readings, snapshot, simulation);
  }

  /**
   * Simulate repeated rounds on live reserves until the gap closes
   */
  async simulateRounds(): Promise<ScanReport> {
    const { readings, snapshot } = await this.readSnapshot();

    const simulation = RoundSimulator.simulate(
      snapshot,
      this.options.maxRounds,
      this.options.minPriceDiffPercent,
      logRound
    );

    return this.report(readings, snapshot, simulation);
  }

  private report(
    readings: [PoolReserveReading, PoolReserveReading],
    snapshot: ReserveSnapshot,
    simulation: SimulationResult
  ): ScanReport {
    const priceDifferencePercent = snapshotPriceDifference(snapshot);
    const status: ScanStatus = simulation.rounds.length > 0 ? 'opportunity' : 'no-opportunity';

    logger.info(
      `Price gap ${readings[0].chain}/${readings[1].chain}: ${formatPercentage(priceDifferencePercent, 4)}`,
      {
        [`${readings[0].chain}Price`]: SwapCalculator.price(snapshot.poolA.stable, snapshot.poolA.other),
        [`${readings[1].chain}Price`]: SwapCalculator.price(snapshot.poolB.stable, snapshot.poolB.other),
      }
    );

    if (status === 'no-opportunity') {
      logger.info(`No arbitrage currently available (${describeStop(simulation.stopReason)})`);
    } else {
      const first = simulation.rounds[0];
      logger.info(
        `Arbitrage available: ${describeDirection(first, readings)}, ` +
        `${simulation.rounds.length} round(s), total profit ${formatUSD(simulation.totals.profit)} ` +
        `on ${formatTokenAmount(simulation.totals.inputAmount, 2)} USDC in`
      );
      logSimulation(simulation);
    }

    return {
      status,
      readings,
      snapshot,
      priceDifferencePercent,
      simulation,
    };
  }
}

function describeDirection(result: SwapResult, readings: [PoolReserveReading, PoolReserveReading]): string {
  const [a, b] = readings;
  return result.direction === ArbitrageDirection.BUY_A_SELL_B
    ? `buy on ${a.chain}, sell on ${b.chain}`
    : `buy on ${b.chain}, sell on ${a.chain}`;
}

function describeStop(reason: SimulationStopReason): string {
  switch (reason) {
    case SimulationStopReason.OPPORTUNITY_EXHAUSTED:
      return 'price gap below threshold';
    case SimulationStopReason.NO_PROFITABLE_TRADE:
      return 'no trade is profitable after fees';
    case SimulationStopReason.ROUND_CAP_REACHED:
      return 'round cap reached';
  }
}

export default ArbitrageScanner;
