import type {
  CurrentStreak,
  GameRecord,
  GameRef,
  GameType,
  HeadToHeadRecord,
  HeadToHeadStore,
  HistoryEntry,
  HistoryGameType,
  Identity,
  LongestStreak,
  PlayoffGameType,
} from '../../types/index.js';
import { PLAYOFF_GAME_TYPES } from '../../types/index.js';
import { RunReport } from './runReport.js';
import { compareGameRefs } from './standings.js';

export const KEY_SEPARATOR = '::';

export function orderPair(x: Identity, y: Identity): [Identity, Identity] {
  return x < y ? [x, y] : [y, x];
}

export function pairKey(x: Identity, y: Identity): string {
  return orderPair(x, y).join(KEY_SEPARATOR);
}

export function isPlayoffGame(t: GameType): t is PlayoffGameType {
  return PLAYOFF_GAME_TYPES.some(p => p === t);
}

/** One step of a pair's chronology: a decided game or a tie. */
export type ReplayEvent =
  | { kind: 'win'; entry: HistoryEntry }
  | { kind: 'tie'; ref: GameRef };

const refOf = (e: ReplayEvent): GameRef =>
  e.kind === 'win' ? { season: e.entry.season, week: e.entry.week } : e.ref;

function toEvent(g: GameRecord): ReplayEvent | null {
  if (g.gameType === 'consolation') return null;
  if (g.winnerManager === null) return { kind: 'tie', ref: { season: g.season, week: g.week } };
  const gameType: HistoryGameType = isPlayoffGame(g.gameType) ? g.gameType : 'regular';
  return {
    kind: 'win',
    entry: { winner: g.winnerManager, gameType, season: g.season, week: g.week },
  };
}

export function eventsOf(record: HeadToHeadRecord): ReplayEvent[] {
  const events: ReplayEvent[] = [
    ...record.regularHistory.map((entry): ReplayEvent => ({ kind: 'win', entry })),
    ...record.playoffHistory.map((entry): ReplayEvent => ({ kind: 'win', entry })),
    ...record.tiedGames.map((ref): ReplayEvent => ({ kind: 'tie', ref })),
  ];
  return events.sort((a, b) => compareGameRefs(refOf(a), refOf(b)));
}

const noStreak = (): CurrentStreak => ({ holder: null, length: 0, start: null });
const noLongest = (): LongestStreak => ({ holder: null, length: 0, start: null, end: null });

function emptyRecord(x: Identity, y: Identity, first: GameRef): HeadToHeadRecord {
  const [managerA, managerB] = orderPair(x, y);
  return {
    managerA,
    managerB,
    regularWinsA: 0,
    regularWinsB: 0,
    playoffWinsA: 0,
    playoffWinsB: 0,
    regularHistory: [],
    playoffHistory: [],
    tiedGames: [],
    currentStreak: noStreak(),
    longestStreak: noLongest(),
    lastGame: { ...first },
  };
}

interface StreakState {
  currentStreak: CurrentStreak;
  longestStreak: LongestStreak;
}

/**
 * Advances streak state by one event. A tie clears the current streak; a
 * longest streak is only replaced by a strictly longer run.
 */
function advanceStreaks(state: StreakState, event: ReplayEvent) {
  if (event.kind === 'tie') {
    state.currentStreak = noStreak();
    return;
  }
  const { winner } = event.entry;
  const ref = refOf(event);
  const cur = state.currentStreak;
  state.currentStreak =
    cur.holder === winner
      ? { holder: winner, length: cur.length + 1, start: cur.start }
      : { holder: winner, length: 1, start: ref };
  if (state.currentStreak.length > state.longestStreak.length) {
    state.longestStreak = {
      holder: winner,
      length: state.currentStreak.length,
      start: state.currentStreak.start,
      end: ref,
    };
  }
}

/** Replays an ordered event list from scratch and returns the streak fields only. */
export function replayStreaks(events: ReplayEvent[]): StreakState {
  const state: StreakState = { currentStreak: noStreak(), longestStreak: noLongest() };
  for (const e of events) advanceStreaks(state, e);
  return state;
}

function applyEvent(record: HeadToHeadRecord, event: ReplayEvent) {
  if (event.kind === 'win') {
    const { entry } = event;
    const sideA = entry.winner === record.managerA;
    if (entry.gameType === 'regular') {
      if (sideA) record.regularWinsA++;
      else record.regularWinsB++;
      record.regularHistory.push(entry);
    } else {
      if (sideA) record.playoffWinsA++;
      else record.playoffWinsB++;
      record.playoffHistory.push(entry);
    }
  } else {
    record.tiedGames.push(event.ref);
  }
  advanceStreaks(record, event);
  record.lastGame = refOf(event);
}

/** Builds one pair's record from its chronological events. */
export function replayPair(x: Identity, y: Identity, events: ReplayEvent[]): HeadToHeadRecord {
  const ordered = [...events].sort((a, b) => compareGameRefs(refOf(a), refOf(b)));
  const first = ordered[0];
  const record = emptyRecord(x, y, first ? refOf(first) : { season: 0, week: 0 });
  for (const e of ordered) applyEvent(record, e);
  return record;
}

function cloneRecord(r: HeadToHeadRecord): HeadToHeadRecord {
  return structuredClone(r);
}

export function sortStore(store: HeadToHeadStore): HeadToHeadStore {
  const out: HeadToHeadStore = {};
  for (const key of Object.keys(store).sort()) out[key] = store[key];
  return out;
}

function counts(g: GameRecord): boolean {
  return g.gameType !== 'consolation' && g.team1Manager !== g.team2Manager;
}

/**
 * Full rebuild: every pair's games replayed in (season, week) order.
 * Pairs that only ever met in consolation games get no record.
 */
export function buildHeadToHead(games: GameRecord[]): HeadToHeadStore {
  const byPair = new Map<string, { x: Identity; y: Identity; events: ReplayEvent[] }>();
  for (const g of games) {
    if (!counts(g)) continue;
    const event = toEvent(g);
    if (!event) continue;
    const key = pairKey(g.team1Manager, g.team2Manager);
    const bucket = byPair.get(key) ?? { x: g.team1Manager, y: g.team2Manager, events: [] };
    bucket.events.push(event);
    byPair.set(key, bucket);
  }
  const store: HeadToHeadStore = {};
  for (const [key, { x, y, events }] of byPair) store[key] = replayPair(x, y, events);
  return sortStore(store);
}

/**
 * Incremental update with newly completed games, starting from the stored
 * streak state. The input store is left untouched; the result matches a
 * full rebuild over the cumulative games.
 */
export function applyGames(
  store: HeadToHeadStore,
  games: GameRecord[],
  report: RunReport
): HeadToHeadStore {
  const next: HeadToHeadStore = { ...store };
  const ordered = [...games].sort(compareGameRefs);

  for (const g of ordered) {
    if (!counts(g)) continue;
    const event = toEvent(g);
    if (!event) continue;
    const key = pairKey(g.team1Manager, g.team2Manager);
    const where = { season: g.season, week: g.week };
    const existing = next[key];

    if (!existing) {
      report.warn(
        'MissingPriorIncrementalState',
        `First meeting of ${g.team1Manager} and ${g.team2Manager}`,
        where
      );
      next[key] = replayPair(g.team1Manager, g.team2Manager, [event]);
      continue;
    }

    if (compareGameRefs(where, existing.lastGame) > 0) {
      const updated = cloneRecord(existing);
      applyEvent(updated, event);
      next[key] = updated;
      continue;
    }

    const events = eventsOf(existing);
    if (events.some(e => compareGameRefs(refOf(e), where) === 0)) {
      report.warn(
        'DuplicateMatchup',
        `${g.team1Manager} vs ${g.team2Manager} is already recorded; skipped`,
        where
      );
      continue;
    }
    report.warn(
      'OutOfOrderIncrementalGame',
      `${g.team1Manager} vs ${g.team2Manager} predates the stored last game; pair replayed`,
      where
    );
    next[key] = replayPair(existing.managerA, existing.managerB, [...events, event]);
  }

  return sortStore(next);
}

export function findHeadToHead(
  store: HeadToHeadStore,
  x: Identity,
  y: Identity
): HeadToHeadRecord | undefined {
  const record = store[pairKey(x, y)];
  if (!record) return undefined;
  const [a, b] = orderPair(x, y);
  return record.managerA === a && record.managerB === b ? record : undefined;
}

export interface PairPerspective {
  manager: Identity;
  opponent: Identity;
  regularWins: number;
  regularLosses: number;
  playoffWins: number;
  playoffLosses: number;
  ties: number;
}

export function perspective(record: HeadToHeadRecord, manager: Identity): PairPerspective {
  const isA = record.managerA === manager;
  return {
    manager,
    opponent: isA ? record.managerB : record.managerA,
    regularWins: isA ? record.regularWinsA : record.regularWinsB,
    regularLosses: isA ? record.regularWinsB : record.regularWinsA,
    playoffWins: isA ? record.playoffWinsA : record.playoffWinsB,
    playoffLosses: isA ? record.playoffWinsB : record.playoffWinsA,
    ties: record.tiedGames.length,
  };
}
