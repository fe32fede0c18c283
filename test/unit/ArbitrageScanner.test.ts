/**
 * Unit tests for ArbitrageScanner
 */

import { ArbitrageScanner } from '../../src/services/arbitrage/ArbitrageScanner';
import { ReserveProvider } from '../../src/services/blockchain/ReserveFetcher';
import { SwapCalculator } from '../../src/services/arbitrage/SwapCalculator';
import { ChainType } from '../../src/config/chains';
import { ArbitrageDirection, SimulationStopReason } from '../../src/types/arbitrage.types';
import { PoolConfig, PoolReserveReading } from '../../src/types/dex.types';
import { InvalidReserveError, RpcConnectionError } from '../../src/types/errors';

class FakeReserveProvider implements ReserveProvider {
  readonly pool: PoolConfig;
  calls = 0;

  constructor(chain: ChainType, private readonly reserves: { stable: number; other: number } | Error) {
    this.pool = {
      chain,
      lpAddress: `0x${'1'.repeat(40)}`,
      routerAddress: `0x${'2'.repeat(40)}`,
      stableToken: { address: `0x${'3'.repeat(40)}`, symbol: 'USDC', name: 'USD Coin', decimals: 6 },
      otherToken: { address: `0x${'4'.repeat(40)}`, symbol: 'ZERC', name: 'ZERC', decimals: 18 },
    };
  }

  async fetchPoolReserves(): Promise<PoolReserveReading> {
    this.calls++;
    if (this.reserves instanceof Error) {
      throw this.reserves;
    }
    return {
      chain: this.pool.chain,
      poolAddress: this.pool.lpAddress,
      stable: this.reserves.stable,
      other: this.reserves.other,
      blockTimestamp: 1_700_000_000,
    };
  }
}

describe('ArbitrageScanner', () => {
  const options = { maxRounds: 10, minPriceDiffPercent: 0.5 };

  describe('scanOnce', () => {
    it('should report a single-round opportunity', async () => {
      const eth = new FakeReserveProvider('eth', { stable: 1_000_000, other: 500_000 });
      const pol = new FakeReserveProvider('pol', { stable: 1_000_000, other: 250_000 });
      const scanner = new ArbitrageScanner(eth, pol, options);

      const report = await scanner.scanOnce();
      const direct = SwapCalculator.evaluateRound(
        { stable: 1_000_000, other: 500_000 },
        { stable: 1_000_000, other: 250_000 }
      );

      expect(report.status).toBe('opportunity');
      expect(report.simulation.rounds).toEqual([direct]);
      expect(report.simulation.rounds[0].direction).toBe(ArbitrageDirection.BUY_A_SELL_B);
      expect(report.priceDifferencePercent).toBe(100);
      expect(report.simulation.totals.profit).toBeCloseTo(53993.628181, 5);
      expect(eth.calls).toBe(1);
      expect(pol.calls).toBe(1);
    });

    it('should report no opportunity for equal prices', async () => {
      const eth = new FakeReserveProvider('eth', { stable: 100_000, other: 50_000 });
      const pol = new FakeReserveProvider('pol', { stable: 100_000, other: 50_000 });
      const scanner = new ArbitrageScanner(eth, pol, options);

      const report = await scanner.scanOnce();

      expect(report.status).toBe('no-opportunity');
      expect(report.simulation.rounds).toEqual([]);
      expect(report.simulation.stopReason).toBe(SimulationStopReason.NO_PROFITABLE_TRADE);
      expect(report.simulation.totals.profit).toBe(0);
    });
  });

  describe('simulateRounds', () => {
    it('should run rounds until the gap closes', async () => {
      const eth = new FakeReserveProvider('eth', { stable: 1_000_000, other: 500_000 });
      const pol = new FakeReserveProvider('pol', { stable: 1_000_000, other: 250_000 });
      const scanner = new ArbitrageScanner(eth, pol, options);

      const report = await scanner.simulateRounds();

      expect(report.status).toBe('opportunity');
      expect(report.simulation.rounds).toHaveLength(3);
      expect(report.simulation.stopReason).toBe(SimulationStopReason.OPPORTUNITY_EXHAUSTED);
      expect(report.readings.map((reading) => reading.chain)).toEqual(['eth', 'pol']);
    });

    it('should honour the configured round cap', async () => {
      const eth = new FakeReserveProvider('eth', { stable: 1_000_000, other: 500_000 });
      const pol = new FakeReserveProvider('pol', { stable: 1_000_000, other: 250_000 });
      const scanner = new ArbitrageScanner(eth, pol, { maxRounds: 1, minPriceDiffPercent: 0.5 });

      const report = await scanner.simulateRounds();

      expect(report.simulation.rounds).toHaveLength(1);
      expect(report.simulation.stopReason).toBe(SimulationStopReason.ROUND_CAP_REACHED);
    });

    it('should fail on an empty pool instead of reporting no opportunity', async () => {
      const eth = new FakeReserveProvider('eth', { stable: 1_000_000, other: 0 });
      const pol = new FakeReserveProvider('pol', { stable: 1_000_000, other: 250_000 });
      const scanner = new ArbitrageScanner(eth, pol, options);

      await expect(scanner.simulateRounds()).rejects.toThrow(InvalidReserveError);
    });

    it('should propagate reserve provider failures', async () => {
      const eth = new FakeReserveProvider('eth', { stable: 1_000_000, other: 500_000 });
      const pol = new FakeReserveProvider('pol', new RpcConnectionError('http://rpc.test', 'unreachable'));
      const scanner = new ArbitrageScanner(eth, pol, options);

      await expect(scanner.simulateRounds()).rejects.toThrow(RpcConnectionError);
    });
  });
});
