/**
 * Run the round simulator on fixed mock reserves, no RPC needed
 *
 * Usage: npm run simulate:mock -- [maxRounds] [minPriceDiffPercent]
 */

import { RoundSimulator, createSnapshot, snapshotPriceDifference } from '../src/services/arbitrage/RoundSimulator';
import { SwapCalculator } from '../src/services/arbitrage/SwapCalculator';
import { formatPercentage, formatTokenAmount, formatUSD } from '../src/services/utils/PriceFormatter';

function main() {
  const maxRounds = Number(process.argv[2] ?? 10);
  const minPriceDiffPercent = Number(process.argv[3] ?? 0.5);

  // ZERC at $2.00 on Ethereum, $4.00 on Polygon
  const snapshot = createSnapshot(
    { stable: 1_000_000, other: 500_000 },
    { stable: 1_000_000, other: 250_000 }
  );

  console.log('🔧 Simulating arbitrage on mock reserves...\n');
  console.log(`Pool A price: ${SwapCalculator.price(snapshot.poolA.stable, snapshot.poolA.other)}`);
  console.log(`Pool B price: ${SwapCalculator.price(snapshot.poolB.stable, snapshot.poolB.other)}`);
  console.log(`Gap: ${formatPercentage(snapshotPriceDifference(snapshot))}\n`);

  const result = RoundSimulator.simulate(snapshot, maxRounds, minPriceDiffPercent, (index, round, after) => {
    console.log(`Round ${index + 1} (${round.direction})`);
    console.log(`  In:      ${formatTokenAmount(round.inputAmount, 2)} USDC`);
    console.log(`  Bridged: ${formatTokenAmount(round.bridgedAmount, 2)} ZERC`);
    console.log(`  Out:     ${formatTokenAmount(round.outputAmount, 2)} USDC`);
    console.log(`  Profit:  ${formatUSD(round.profit)}`);
    console.log(`  Gap now: ${formatPercentage(snapshotPriceDifference(after), 4)}\n`);
  });

  console.log(`Stopped: ${result.stopReason} after ${result.rounds.length} round(s)`);
  console.log(`Total profit: ${formatUSD(result.totals.profit)}`);
  console.log('\n✨ Simulation complete!\n');
}

try {
  main();
} catch (error) {
  console.error('❌ Error:', error);
  process.exit(1);
}
