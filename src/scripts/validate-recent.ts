/**
 * Replay the last N days of finals through the engine and print accuracy.
 * Usage: npx tsx src/scripts/validate-recent.ts [days]
 * Default: 7 days
 */
import { bootstrap } from '../app.js';
import { isEngineError } from '../errors.js';

const pct = (x: number | null) => (x === null ? '   -  ' : `${(x * 100).toFixed(1)}%`);

const arg = process.argv[2];
const days = arg ? parseInt(arg, 10) : 7;
if (!Number.isInteger(days) || days < 1) {
  console.error(`Invalid day count: ${arg}`);
  process.exit(1);
}

const { validator, feed, today } = await bootstrap();
const games = await feed.fetchCompletedGames(days, today());
console.log(`Found ${games.length} completed games in the last ${days} days`);

try {
  const report = validator.validate(games);
  console.log(`\n=== Validation (line ${report.line}) ===`);
  console.log(`  Games evaluated:     ${report.evaluatedGames}/${report.totalGames}`);
  console.log(`  Win/Loss accuracy:   ${pct(report.winLossAccuracy)}`);
  console.log(`  Over/Under accuracy: ${pct(report.overUnderAccuracy)}`);
  console.log(`  Both correct:        ${pct(report.bothCorrectRate)}`);
  console.log(`  Either correct:      ${pct(report.eitherCorrectRate)}`);

  console.log('\n  By confidence tier:');
  for (const [tier, acc] of Object.entries(report.byConfidenceTier)) {
    console.log(
      `    ${tier.padEnd(6)} ${String(acc.games).padStart(3)} games  W/L ${pct(acc.winLossAccuracy)}  O/U ${pct(acc.overUnderAccuracy)}`,
    );
  }

  for (const s of report.skipped) {
    console.log(`  Skipped ${s.game.awayTeam} @ ${s.game.homeTeam}: ${s.error.message}`);
  }
} catch (err) {
  if (!isEngineError(err)) throw err;
  console.error(`  ${err.code}: ${err.message}`);
  process.exit(1);
}

console.log('\nDone!');
process.exit(0);
