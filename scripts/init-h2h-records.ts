import 'dotenv/config';
import { loadConfig } from '../src/lib/config.js';
import { loadLedger, writeJson } from '../src/lib/dataLoader.js';
import { buildHeadToHead } from '../src/lib/headToHead.js';
import { RunReport } from '../src/lib/runReport.js';

async function main() {
  const config = loadConfig();
  const report = new RunReport();
  const games = loadLedger(config, report);
  const store = buildHeadToHead(games);
  writeJson(config.h2hFile, store);
  console.log(
    `Wrote ${Object.keys(store).length} head-to-head records from ${games.length} games to ${config.h2hFile}`
  );
  report.print();
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
