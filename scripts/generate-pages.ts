import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig } from '../src/lib/config.js';
import { loadHeadToHead, loadIdentityConfig, loadLedger, SnapshotStore } from '../src/lib/dataLoader.js';
import { buildHeadToHead } from '../src/lib/headToHead.js';
import { mergeIdentities } from '../src/lib/identity.js';
import { summarizeSeasons } from '../src/lib/ledger.js';
import { buildPageData, renderPages } from '../src/lib/pages.js';
import { upcomingWeek } from '../src/lib/preview.js';
import { RunReport } from '../src/lib/runReport.js';

async function main() {
  const config = loadConfig();
  const report = new RunReport();
  const identities = loadIdentityConfig(config.identitiesFile);

  const games = loadLedger(config, report);
  const stored = loadHeadToHead(config.h2hFile);
  if (!stored) console.warn(`${config.h2hFile} not found; building head-to-head records in memory`);
  const store = mergeIdentities(stored ?? buildHeadToHead(games), identities);

  const snapshots = SnapshotStore.fromDirectory(config.snapshotDir, report);
  const upcoming = upcomingWeek(snapshots, games, config.operator);
  if (upcoming) console.log(`Previewing week ${upcoming.week} of ${upcoming.season}`);

  const data = buildPageData(games, summarizeSeasons(games), store, identities, new Date(), upcoming);
  fs.mkdirSync(config.webDir, { recursive: true });
  for (const [file, html] of Object.entries(renderPages(data))) {
    const out = path.join(config.webDir, file);
    fs.writeFileSync(out, html, 'utf-8');
    console.log(`Wrote ${out}`);
  }
  report.print();
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
