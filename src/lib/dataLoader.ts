import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type {
  GameRecord,
  HeadToHeadStore,
  IdentityConfig,
  LeagueSeasonSettings,
  RawMatchup,
  SeasonSnapshot,
} from '../../types/index.js';
import { KEY_SEPARATOR } from './headToHead.js';
import { createIdentityConfig, EMPTY_IDENTITY_CONFIG } from './identity.js';
import { dedupeGames } from './ledger.js';
import { ConfigError, RunReport } from './runReport.js';
import { decideWinner } from './standings.js';

export const idify = (s: string) =>
  s
    .toLowerCase()
    .replace(/&/g, 'and')
    .replace(/[.']/g, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '');

// --- snapshot schemas -------------------------------------------------------

// Manager names end up inside head-to-head store keys
const ManagerNameSchema = z
  .string()
  .refine(s => !s.includes(KEY_SEPARATOR), `Manager name may not contain "${KEY_SEPARATOR}"`);

const RawTeamSchema = z.object({
  teamKey: z.string(),
  name: z.string().optional(),
  points: z.number().nonnegative(),
  managers: z.array(z.object({ nickname: ManagerNameSchema })),
});

const RawMatchupSchema = z.object({
  teams: z.tuple([RawTeamSchema, RawTeamSchema]),
  isTied: z.boolean().default(false),
  winnerTeamKey: z.string().nullable().default(null),
  isPlayoffs: z.boolean().optional(),
  isConsolation: z.boolean().default(false),
});

const SettingsSchema = z.object({
  playoffStartWeek: z.number().int().positive(),
  numPlayoffTeams: z.number().int().positive(),
});

export const SnapshotSchema = z.object({
  season: z.number().int(),
  settings: SettingsSchema.optional(),
  weeks: z.record(z.string().regex(/^\d+$/), z.array(RawMatchupSchema)).default({}),
});

// --- artifact schemas -------------------------------------------------------

const GameTypeSchema = z.enum(['regular', 'QF', 'SF', '1st', '3rd', 'consolation']);
const GameRefSchema = z.object({ season: z.number().int(), week: z.number().int() });

const GameRecordSchema = z.object({
  season: z.number().int(),
  week: z.number().int(),
  gameType: GameTypeSchema,
  team1Manager: ManagerNameSchema,
  team2Manager: ManagerNameSchema,
  team1Score: z.number().nonnegative(),
  team2Score: z.number().nonnegative(),
  winnerManager: z.string().nullable(),
});

const HistoryEntrySchema = z.object({
  winner: z.string(),
  gameType: z.enum(['regular', 'QF', 'SF', '1st', '3rd']),
  season: z.number().int(),
  week: z.number().int(),
});

const HeadToHeadRecordSchema = z.object({
  managerA: z.string(),
  managerB: z.string(),
  regularWinsA: z.number().int().nonnegative(),
  regularWinsB: z.number().int().nonnegative(),
  playoffWinsA: z.number().int().nonnegative(),
  playoffWinsB: z.number().int().nonnegative(),
  regularHistory: z.array(HistoryEntrySchema),
  playoffHistory: z.array(HistoryEntrySchema),
  tiedGames: z.array(GameRefSchema),
  currentStreak: z.object({
    holder: z.string().nullable(),
    length: z.number().int().nonnegative(),
    start: GameRefSchema.nullable(),
  }),
  longestStreak: z.object({
    holder: z.string().nullable(),
    length: z.number().int().nonnegative(),
    start: GameRefSchema.nullable(),
    end: GameRefSchema.nullable(),
  }),
  lastGame: GameRefSchema,
});

const IdentityFileSchema = z.object({
  version: z.number().int().positive().default(1),
  aliases: z.record(ManagerNameSchema, ManagerNameSchema).default({}),
  hidden: z.array(ManagerNameSchema).default([]),
  excludedSeasons: z.array(z.number().int()).default([]),
});

const CsvRowSchema = z.object({
  season: z.coerce.number().int(),
  week: z.coerce.number().int(),
  gameType: z.enum(['regular', 'QF', 'SF', '1st', '3rd', 'consolation']),
  team1Manager: z.string().min(1).pipe(ManagerNameSchema),
  team2Manager: z.string().min(1).pipe(ManagerNameSchema),
  team1Score: z.coerce.number().nonnegative(),
  team2Score: z.coerce.number().nonnegative(),
});

function describeIssues(error: z.ZodError, context: string): string {
  return error.issues
    .map(issue => `[${context}] ${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

export function writeJson(file: string, data: unknown) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}

// --- snapshot store ---------------------------------------------------------

/**
 * Read-only view over the cached season snapshots (one JSON file per season).
 * Files that fail validation are reported as missing season data.
 */
export class SnapshotStore {
  private readonly bySeason = new Map<number, SeasonSnapshot>();

  constructor(snapshots: SeasonSnapshot[] = []) {
    for (const s of snapshots) this.bySeason.set(s.season, s);
  }

  static fromDirectory(dir: string, report: RunReport): SnapshotStore {
    if (!fs.existsSync(dir)) {
      console.warn(`Snapshot directory not found: ${dir}`);
      return new SnapshotStore();
    }
    const snapshots: SeasonSnapshot[] = [];
    for (const file of fs.readdirSync(dir).filter(f => f.endsWith('.json')).sort()) {
      const full = path.join(dir, file);
      let json: unknown;
      try {
        json = readJson(full);
      } catch (err) {
        report.warn('MissingSeasonData', `${file} is not valid JSON: ${String(err)}; skipped`);
        continue;
      }
      const parsed = SnapshotSchema.safeParse(json);
      if (!parsed.success) {
        report.warn('MissingSeasonData', `${describeIssues(parsed.error, file)}; skipped`);
        continue;
      }
      snapshots.push(parsed.data);
    }
    return new SnapshotStore(snapshots);
  }

  seasons(): number[] {
    return Array.from(this.bySeason.keys()).sort((a, b) => a - b);
  }

  snapshots(): SeasonSnapshot[] {
    return this.seasons().flatMap(s => {
      const snap = this.bySeason.get(s);
      return snap ? [snap] : [];
    });
  }

  snapshot(season: number): SeasonSnapshot | undefined {
    return this.bySeason.get(season);
  }

  getSeasonSettings(season: number): LeagueSeasonSettings | undefined {
    return this.bySeason.get(season)?.settings;
  }

  getWeekMatchups(season: number, week: number): RawMatchup[] {
    return this.bySeason.get(season)?.weeks[String(week)] ?? [];
  }
}

// --- ledger and head-to-head artifacts --------------------------------------

export function loadLedgerFromJSON(file: string): GameRecord[] {
  const parsed = z.array(GameRecordSchema).safeParse(readJson(file));
  if (!parsed.success) throw new Error(describeIssues(parsed.error, path.basename(file)));
  return parsed.data;
}

/**
 * Imports a ledger exported as CSV. Winners are recomputed from scores and
 * repeated games are dropped, so a CSV import obeys the same invariants as a
 * ledger built from snapshots.
 */
export function loadLedgerFromCSV(file: string, report: RunReport): GameRecord[] {
  const rows: unknown[] = parse(fs.readFileSync(file, 'utf-8'), {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  const games: GameRecord[] = rows.map((row, i) => {
    const parsed = CsvRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(describeIssues(parsed.error, `${path.basename(file)} row ${i + 2}`));
    }
    const r = parsed.data;
    return { ...r, winnerManager: decideWinner(r) };
  });
  return dedupeGames(games, report);
}

export function loadLedger(
  options: { historyFile: string; historyCsvFile: string; useCsv: boolean },
  report: RunReport
): GameRecord[] {
  if (options.useCsv) return loadLedgerFromCSV(options.historyCsvFile, report);
  return loadLedgerFromJSON(options.historyFile);
}

export function loadHeadToHead(file: string): HeadToHeadStore | undefined {
  if (!fs.existsSync(file)) return undefined;
  const parsed = z.record(z.string(), HeadToHeadRecordSchema).safeParse(readJson(file));
  if (!parsed.success) throw new Error(describeIssues(parsed.error, path.basename(file)));
  return parsed.data;
}

export function loadIdentityConfig(file: string): IdentityConfig {
  if (!fs.existsSync(file)) return EMPTY_IDENTITY_CONFIG;
  let json: unknown;
  try {
    json = readJson(file);
  } catch (err) {
    throw new ConfigError(`${path.basename(file)} is not valid JSON: ${String(err)}`);
  }
  const parsed = IdentityFileSchema.safeParse(json);
  if (!parsed.success) throw new ConfigError(describeIssues(parsed.error, path.basename(file)));
  return createIdentityConfig(parsed.data);
}
