import type { GameRecord, Identity, IdentityConfig } from '../../types/index.js';
import { isHidden, resolveLedger } from './identity.js';
import { decideWinner } from './standings.js';

export const ACCOLADE_KINDS = [
  'topPoints',
  'highestScoringLoss',
  'lowestScoringWin',
  'smallestMarginOfDefeat',
  'blowoutWin',
] as const;

export type AccoladeKind = (typeof ACCOLADE_KINDS)[number];

// Higher is better for these; the rest are won by the lowest value
const MAXIMIZED: ReadonlySet<AccoladeKind> = new Set([
  'topPoints',
  'highestScoringLoss',
  'blowoutWin',
]);

export interface AccoladeInstance {
  kind: AccoladeKind;
  manager: Identity;
  opponent: Identity;
  /** Score for point accolades, margin for margin accolades. */
  value: number;
  season: number;
  week: number;
}

export interface ManagerAccolades {
  manager: Identity;
  counts: Record<AccoladeKind, number>;
  altWins: number;
  altLosses: number;
  altPct: number;
  stdev: number | null;
}

export interface AccoladeBoard {
  managers: ManagerAccolades[];
  records: Partial<Record<AccoladeKind, AccoladeInstance>>;
}

export interface SeasonAccolades extends AccoladeBoard {
  season: number;
}

export interface AccoladeReport {
  seasons: SeasonAccolades[];
  allTime: AccoladeBoard;
}

interface WeeklyScore {
  manager: Identity;
  opponent: Identity;
  score: number;
  won: boolean | null;
}

const round2 = (n: number) => Number(n.toFixed(2));

/** Sample standard deviation; null below two values. */
export function sampleStdev(values: number[]): number | null {
  if (values.length < 2) return null;
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (values.length - 1);
  return round2(Math.sqrt(variance));
}

function weeklyScores(games: GameRecord[]): WeeklyScore[] {
  const out: WeeklyScore[] = [];
  for (const g of games) {
    const winner = decideWinner(g);
    out.push(
      {
        manager: g.team1Manager,
        opponent: g.team2Manager,
        score: g.team1Score,
        won: winner === null ? null : winner === g.team1Manager,
      },
      {
        manager: g.team2Manager,
        opponent: g.team1Manager,
        score: g.team2Score,
        won: winner === null ? null : winner === g.team2Manager,
      }
    );
  }
  return out.sort(
    (a, b) => b.score - a.score || (a.manager < b.manager ? -1 : a.manager > b.manager ? 1 : 0)
  );
}

function better(kind: AccoladeKind, candidate: AccoladeInstance, current?: AccoladeInstance) {
  if (!current) return true;
  return MAXIMIZED.has(kind) ? candidate.value > current.value : candidate.value < current.value;
}

/** Picks one week's accolade winners. Ties go to the first game found. */
export function weeklyAccolades(season: number, week: number, games: GameRecord[]) {
  const scores = weeklyScores(games);
  const found: Partial<Record<AccoladeKind, AccoladeInstance>> = {};
  const offer = (kind: AccoladeKind, manager: Identity, opponent: Identity, value: number) => {
    const candidate = { kind, manager, opponent, value: round2(value), season, week };
    if (better(kind, candidate, found[kind])) found[kind] = candidate;
  };

  const [top] = scores;
  if (top) offer('topPoints', top.manager, top.opponent, top.score);
  for (const s of scores) {
    if (s.won === false) offer('highestScoringLoss', s.manager, s.opponent, s.score);
    if (s.won === true) offer('lowestScoringWin', s.manager, s.opponent, s.score);
  }
  for (const g of games) {
    const winner = decideWinner(g);
    if (winner === null) continue;
    const loser = winner === g.team1Manager ? g.team2Manager : g.team1Manager;
    const margin = Math.abs(g.team1Score - g.team2Score);
    offer('smallestMarginOfDefeat', loser, winner, margin);
    offer('blowoutWin', winner, loser, margin);
  }

  const half = Math.floor(scores.length / 2);
  return {
    instances: ACCOLADE_KINDS.flatMap(k => {
      const hit = found[k];
      return hit ? [hit] : [];
    }),
    altWinners: scores.slice(0, half).map(s => s.manager),
    altLosers: scores.slice(half).map(s => s.manager),
    scores: scores.map(s => ({ manager: s.manager, score: s.score })),
  };
}

class BoardBuilder {
  private readonly rows = new Map<Identity, ManagerAccolades>();
  private readonly scores = new Map<Identity, number[]>();
  readonly records: Partial<Record<AccoladeKind, AccoladeInstance>> = {};

  constructor(private readonly config: IdentityConfig) {}

  private row(manager: Identity) {
    let r = this.rows.get(manager);
    if (!r) {
      r = {
        manager,
        counts: {
          topPoints: 0,
          highestScoringLoss: 0,
          lowestScoringWin: 0,
          smallestMarginOfDefeat: 0,
          blowoutWin: 0,
        },
        altWins: 0,
        altLosses: 0,
        altPct: 0,
        stdev: null,
      };
      this.rows.set(manager, r);
    }
    return r;
  }

  add(week: ReturnType<typeof weeklyAccolades>) {
    for (const i of week.instances) {
      if (isHidden(i.manager, this.config)) continue;
      this.row(i.manager).counts[i.kind]++;
      if (better(i.kind, i, this.records[i.kind])) this.records[i.kind] = i;
    }
    for (const m of week.altWinners) this.row(m).altWins++;
    for (const m of week.altLosers) this.row(m).altLosses++;
    for (const { manager, score } of week.scores) {
      const list = this.scores.get(manager) ?? [];
      list.push(score);
      this.scores.set(manager, list);
    }
  }

  build(): AccoladeBoard {
    const managers = Array.from(this.rows.values())
      .filter(r => !isHidden(r.manager, this.config))
      .map(r => {
        const played = r.altWins + r.altLosses;
        return {
          ...r,
          altPct: played ? Number((r.altWins / played).toFixed(3)) : 0,
          stdev: sampleStdev(this.scores.get(r.manager) ?? []),
        };
      })
      .sort((a, b) => b.altPct - a.altPct || (a.manager < b.manager ? -1 : 1));
    return { managers, records: { ...this.records } };
  }
}

/**
 * Weekly accolades, alternative-universe records (every score in the top
 * half of its week is a win) and score volatility over regular-season
 * games, per season and all-time.
 */
export function computeAccolades(games: GameRecord[], config: IdentityConfig): AccoladeReport {
  const excluded = new Set(config.excludedSeasons);
  const regular = resolveLedger(
    games.filter(g => g.gameType === 'regular' && !excluded.has(g.season)),
    config
  );

  const weeks = new Map<number, Map<number, GameRecord[]>>();
  for (const g of regular) {
    const bySeason = weeks.get(g.season) ?? new Map<number, GameRecord[]>();
    const list = bySeason.get(g.week) ?? [];
    list.push(g);
    bySeason.set(g.week, list);
    weeks.set(g.season, bySeason);
  }

  const allTime = new BoardBuilder(config);
  const seasons: SeasonAccolades[] = [];
  for (const season of Array.from(weeks.keys()).sort((a, b) => a - b)) {
    const board = new BoardBuilder(config);
    const bySeason = weeks.get(season) ?? new Map<number, GameRecord[]>();
    for (const week of Array.from(bySeason.keys()).sort((a, b) => a - b)) {
      const result = weeklyAccolades(season, week, bySeason.get(week) ?? []);
      board.add(result);
      allTime.add(result);
    }
    seasons.push({ season, ...board.build() });
  }
  return { seasons, allTime: allTime.build() };
}
