/**
 * List team aliases whose canonical name has no row in the latest season.
 * Usage: npx tsx scripts/check-aliases.ts
 */
import { config } from '../src/config.js';
import { TeamNameResolver } from '../src/pipeline/team-names.js';
import { TeamStatsStore } from '../src/stats/team-stats-store.js';

const resolver = TeamNameResolver.fromFile(config.TEAM_ALIASES_PATH);
const stats = new TeamStatsStore();
await stats.load(config.TEAM_STATS_PATH);

const season = stats.latestSeason();
const known = new Set(stats.teams(season));
const dangling = resolver.entries().filter(([, canonical]) => !known.has(canonical));

console.log(`Aliases (${resolver.size}), season ${season}, teams ${known.size}`);
for (const [alias, canonical] of dangling) {
  console.log(`  ${alias} -> ${canonical} (no stats row)`);
}
process.exitCode = dangling.length ? 1 : 0;
