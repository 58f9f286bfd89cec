import 'dotenv/config';
import { loadConfig } from '../src/lib/config.js';
import { SnapshotStore, writeJson } from '../src/lib/dataLoader.js';
import { buildLedger } from '../src/lib/ledger.js';
import { RunReport } from '../src/lib/runReport.js';

async function main() {
  const config = loadConfig();
  const report = new RunReport();
  const snapshots = SnapshotStore.fromDirectory(config.snapshotDir, report);
  console.log(`Classifying ${snapshots.seasons().length} season(s) from ${config.snapshotDir}`);

  const { games, seasons } = buildLedger(snapshots.snapshots(), report, {
    operator: config.operator,
  });
  writeJson(config.historyFile, games);
  console.log(`Wrote ${games.length} games across ${seasons.length} season(s) to ${config.historyFile}`);
  for (const s of seasons) {
    const champion = Object.entries(s.finalRanks).find(([, rank]) => rank === 1)?.[0];
    console.log(`  ${s.season}: ${s.standings.length} teams, champion ${champion ?? 'undecided'}`);
  }

  report.print();
  if (report.hasFailures) process.exitCode = 1;
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
