import type {
  GameRecord,
  HeadToHeadRecord,
  HeadToHeadStore,
  HistoryEntry,
  Identity,
  IdentityConfig,
} from '../../types/index.js';
import {
  eventsOf,
  KEY_SEPARATOR,
  orderPair,
  pairKey,
  replayStreaks,
  sortStore,
} from './headToHead.js';
import { ConfigError } from './runReport.js';
import { compareGameRefs } from './standings.js';

export interface IdentityConfigInput {
  version?: number;
  aliases?: Record<Identity, Identity>;
  hidden?: Identity[];
  excludedSeasons?: number[];
}

/**
 * Builds the frozen identity configuration handed to every aggregation step.
 * Alias chains are allowed; cycles are rejected.
 */
export function createIdentityConfig(input: IdentityConfigInput = {}): IdentityConfig {
  const aliases = { ...(input.aliases ?? {}) };
  const named = [...Object.entries(aliases).flat(), ...(input.hidden ?? [])];
  const clash = named.find(n => n.includes(KEY_SEPARATOR));
  if (clash !== undefined) {
    throw new ConfigError(`Manager name "${clash}" may not contain "${KEY_SEPARATOR}"`);
  }
  for (const start of Object.keys(aliases)) {
    const seen = new Set<Identity>([start]);
    let cur = aliases[start];
    while (cur !== undefined && Object.hasOwn(aliases, cur)) {
      if (seen.has(cur)) {
        throw new ConfigError(`Alias cycle detected: ${[...seen, cur].join(' -> ')}`);
      }
      seen.add(cur);
      cur = aliases[cur];
    }
  }
  return Object.freeze({
    version: input.version ?? 1,
    aliases: Object.freeze(aliases),
    hidden: Object.freeze([...(input.hidden ?? [])]),
    excludedSeasons: Object.freeze([...(input.excludedSeasons ?? [])]),
  });
}

export const EMPTY_IDENTITY_CONFIG = createIdentityConfig();

export function resolveIdentity(name: Identity, config: IdentityConfig): Identity {
  let cur = name;
  while (Object.hasOwn(config.aliases, cur)) cur = config.aliases[cur];
  return cur;
}

export function isHidden(name: Identity, config: IdentityConfig): boolean {
  const lower = name.toLowerCase();
  return config.hidden.some(h => h.toLowerCase() === lower);
}

/**
 * Maps every game onto canonical identities for aggregation. The stored
 * ledger is not modified; games an alias played against its own canonical
 * identity are dropped.
 */
export function resolveLedger(games: GameRecord[], config: IdentityConfig): GameRecord[] {
  const out: GameRecord[] = [];
  for (const g of games) {
    const team1Manager = resolveIdentity(g.team1Manager, config);
    const team2Manager = resolveIdentity(g.team2Manager, config);
    if (team1Manager === team2Manager) continue;
    out.push({
      ...g,
      team1Manager,
      team2Manager,
      winnerManager: g.winnerManager === null ? null : resolveIdentity(g.winnerManager, config),
    });
  }
  return out;
}

function relabel(record: HeadToHeadRecord, config: IdentityConfig): HeadToHeadRecord {
  const rename = (n: Identity) => resolveIdentity(n, config);
  const renameNullable = (n: Identity | null) => (n === null ? null : rename(n));
  const renameEntry = (e: HistoryEntry): HistoryEntry => ({ ...e, winner: rename(e.winner) });
  const a = rename(record.managerA);
  const b = rename(record.managerB);
  const [managerA, managerB] = orderPair(a, b);
  const flipped = managerA !== a;
  return {
    managerA,
    managerB,
    regularWinsA: flipped ? record.regularWinsB : record.regularWinsA,
    regularWinsB: flipped ? record.regularWinsA : record.regularWinsB,
    playoffWinsA: flipped ? record.playoffWinsB : record.playoffWinsA,
    playoffWinsB: flipped ? record.playoffWinsA : record.playoffWinsB,
    regularHistory: record.regularHistory.map(renameEntry),
    playoffHistory: record.playoffHistory.map(renameEntry),
    tiedGames: record.tiedGames.map(ref => ({ ...ref })),
    currentStreak: { ...record.currentStreak, holder: renameNullable(record.currentStreak.holder) },
    longestStreak: { ...record.longestStreak, holder: renameNullable(record.longestStreak.holder) },
    lastGame: { ...record.lastGame },
  };
}

/**
 * Folds records that now describe the same pair. Counters add up; streaks
 * cannot be added, so they come from replaying the merged history.
 */
function combine(records: HeadToHeadRecord[]): HeadToHeadRecord {
  const byRef = <T extends { season: number; week: number }>(list: T[]) =>
    list.sort(compareGameRefs);
  const sum = (pick: (r: HeadToHeadRecord) => number) =>
    records.reduce((acc, r) => acc + pick(r), 0);
  const [first] = records;

  const merged: HeadToHeadRecord = {
    managerA: first.managerA,
    managerB: first.managerB,
    regularWinsA: sum(r => r.regularWinsA),
    regularWinsB: sum(r => r.regularWinsB),
    playoffWinsA: sum(r => r.playoffWinsA),
    playoffWinsB: sum(r => r.playoffWinsB),
    regularHistory: byRef(records.flatMap(r => r.regularHistory)),
    playoffHistory: byRef(records.flatMap(r => r.playoffHistory)),
    tiedGames: byRef(records.flatMap(r => r.tiedGames)),
    currentStreak: first.currentStreak,
    longestStreak: first.longestStreak,
    lastGame: records.map(r => r.lastGame).reduce((a, b) => (compareGameRefs(a, b) >= 0 ? a : b)),
  };
  const { currentStreak, longestStreak } = replayStreaks(eventsOf(merged));
  merged.currentStreak = currentStreak;
  merged.longestStreak = longestStreak;
  return merged;
}

/**
 * Rewrites a head-to-head store onto canonical identities. Returns a new
 * store; running it again with the same configuration changes nothing.
 */
export function mergeIdentities(store: HeadToHeadStore, config: IdentityConfig): HeadToHeadStore {
  const groups = new Map<string, HeadToHeadRecord[]>();
  for (const record of Object.values(store)) {
    const a = resolveIdentity(record.managerA, config);
    const b = resolveIdentity(record.managerB, config);
    if (a === b) continue;
    const untouched = a === record.managerA && b === record.managerB;
    const key = pairKey(a, b);
    const list = groups.get(key) ?? [];
    list.push(untouched ? record : relabel(record, config));
    groups.set(key, list);
  }

  const out: HeadToHeadStore = {};
  for (const [key, list] of groups) out[key] = list.length === 1 ? list[0] : combine(list);
  return sortStore(out);
}
