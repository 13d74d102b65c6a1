/**
 * Run one refresh cycle and print the EV report.
 * Usage: FEED_TOKEN=... npx tsx src/scripts/refresh.ts [league] [pollSport]
 * Defaults: LEAGUE / POLL_SPORT from the environment (nhl).
 */
import { config } from '../config.js';
import { leagueFeedKey, leagueIdFor } from '../leagues.js';
import { staticTokenProvider } from '../fetchers/token-provider.js';
import { probToAmerican } from '../pipeline/fair-probability.js';
import { loadReferenceDirectories } from '../pipeline/reference-store.js';
import { createAppState, runRefreshCycle } from '../pipeline/refresh-cycle.js';
import { buildOddsSnapshot, writeOddsSnapshot } from '../snapshots/odds-snapshot.js';

const league = process.argv[2] ?? config.LEAGUE;
const sport = process.argv[3] ?? config.POLL_SPORT;
const leagueId = leagueIdFor(league);
if (leagueId === null) {
  console.error(`Unknown league: ${league}`);
  process.exit(1);
}

const directories = loadReferenceDirectories(config.REFERENCE_DIR);
console.log(`Loaded ${directories.marketSources.size} market sources, ${directories.teams.size} teams`);

const result = await runRefreshCycle(createAppState(directories), {
  tokenProvider: staticTokenProvider(config.FEED_TOKEN),
  leagueId,
  sport,
});

if (!result.ok) {
  console.error(`Refresh failed (${result.error.source}): ${result.error.message}`);
  process.exit(1);
}

const { state } = result;
writeOddsSnapshot(config.SNAPSHOT_PATH, buildOddsSnapshot({ [league]: state.events }, directories));
console.log(`Wrote ${state.events.size} events for ${leagueFeedKey(leagueId)} to ${config.SNAPSHOT_PATH}`);

const report = state.report;
if (report) {
  console.log('\n=== Results ===');
  for (const row of report.valid) {
    const fair = row.fairProbability ?? 0;
    const fairAmerican = probToAmerican(fair);
    console.log(
      `  #${row.rank} ${row.team.padEnd(5)} odds ${row.realOdds} payout ${row.payout.toFixed(2)} ` +
        `fair ${(fair * 100).toFixed(1)}% (${fairAmerican > 0 ? '+' : ''}${fairAmerican}) EV ${row.expectedValue.toFixed(2)}`,
    );
  }
  if (report.missing.length > 0) {
    console.log(`\n${report.missing.length} teams missing market odds:`);
    for (const row of report.missing) console.log(`  #${row.rank} ${row.team}`);
  }
  if (report.unresolved.length > 0) {
    console.log(`\nUnresolved poll labels: ${report.unresolved.map((e) => e.label).join(', ')}`);
  }
}

process.exit(0);
