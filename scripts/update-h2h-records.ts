import 'dotenv/config';
import fs from 'node:fs';
import { z } from 'zod';
import type { GameRecord } from '../types/index.js';
import { loadConfig } from '../src/lib/config.js';
import {
  loadHeadToHead,
  loadLedgerFromJSON,
  SnapshotStore,
  writeJson,
} from '../src/lib/dataLoader.js';
import { applyGames, buildHeadToHead } from '../src/lib/headToHead.js';
import { buildLedger } from '../src/lib/ledger.js';
import { RunReport } from '../src/lib/runReport.js';
import { compareGameRefs } from '../src/lib/standings.js';

const ArgsSchema = z.object({
  season: z.coerce.number().int(),
  week: z.coerce.number().int().positive(),
});

function parseArgs(argv: string[]) {
  const opts: Record<string, string> = {};
  for (const a of argv) {
    const [k, v] = a.split('=');
    if (k === '--season' && v !== undefined) opts.season = v;
    if (k === '--week' && v !== undefined) opts.week = v;
  }
  const parsed = ArgsSchema.safeParse(opts);
  if (!parsed.success) {
    throw new Error('Usage: update-h2h-records --season=<year> --week=<n>');
  }
  return parsed.data;
}

/**
 * Folds one completed week into the stored ledger and head-to-head records
 * without rebuilding every season.
 */
async function main() {
  const { season, week } = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const report = new RunReport();

  const snapshots = SnapshotStore.fromDirectory(config.snapshotDir, report);
  const snapshot = snapshots.snapshot(season);
  if (!snapshot) {
    report.warn('MissingSeasonData', `No snapshot for season ${season}; nothing to update`, {
      season,
    });
    report.print();
    process.exitCode = 1;
    return;
  }
  if (!snapshots.getWeekMatchups(season, week).length) {
    report.warn('MissingSeasonData', `Season ${season} has no matchups for week ${week}`, {
      season,
      week,
    });
    report.print();
    process.exitCode = 1;
    return;
  }

  // Classification needs the whole season so far; only the target week is kept
  const { games: seasonGames } = buildLedger([snapshot], report, { operator: config.operator });
  const weekGames = seasonGames.filter(g => g.week === week);

  const ledger: GameRecord[] = fs.existsSync(config.historyFile)
    ? loadLedgerFromJSON(config.historyFile)
    : [];
  const prior = ledger.filter(g => !(g.season === season && g.week === week));
  const updated = [...prior, ...weekGames].sort(compareGameRefs);

  let store = loadHeadToHead(config.h2hFile);
  if (!store) {
    report.warn(
      'MissingPriorIncrementalState',
      `${config.h2hFile} not found; starting from the stored ledger`
    );
    store = buildHeadToHead(prior);
  }
  const next = applyGames(store, weekGames, report);

  writeJson(config.historyFile, updated);
  writeJson(config.h2hFile, next);
  console.log(
    `Applied ${weekGames.length} game(s) from ${season} week ${week}; ${Object.keys(next).length} pair records stored`
  );
  report.print();
  if (report.hasFailures) process.exitCode = 1;
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
