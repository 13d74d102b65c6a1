/**
 * Rebuild the market-source and team directory files from the odds feed.
 * Usage: npx tsx src/scripts/sync-reference.ts [dir]
 */
import { config } from '../config.js';
import { fetchReferenceDirectories, saveReferenceDirectories } from '../pipeline/reference-store.js';

const dir = process.argv[2] ?? config.REFERENCE_DIR;

const result = await fetchReferenceDirectories();
if (!result.ok) {
  console.error(`Reference fetch failed: ${result.error.message}`);
  process.exit(1);
}

const directories = result.value;
saveReferenceDirectories(dir, directories);
console.log(`Saved ${directories.marketSources.size} market sources and ${directories.teams.size} teams to ${dir}`);
process.exit(0);
