import type {
  GameRecord,
  HeadToHeadStore,
  Identity,
  IdentityConfig,
  SeasonSummary,
} from '../../types/index.js';
import { isPlayoffGame, perspective } from './headToHead.js';
import { isHidden, resolveIdentity, resolveLedger } from './identity.js';
import { compareGameRefs, decideWinner, formatGameRef } from './standings.js';

export interface RecordLine {
  wins: number;
  losses: number;
  ties: number;
  pct: number;
}

export interface AllTimeRecord {
  manager: Identity;
  regular: RecordLine;
  playoff: RecordLine;
}

const emptyLine = (): RecordLine => ({ wins: 0, losses: 0, ties: 0, pct: 0 });

function finishLine(line: RecordLine) {
  const played = line.wins + line.losses + line.ties;
  line.pct = played ? Number((line.wins / played).toFixed(3)) : 0;
}

const byName = (a: Identity, b: Identity) => (a < b ? -1 : a > b ? 1 : 0);

function visibleGames(games: GameRecord[], config: IdentityConfig): GameRecord[] {
  const excluded = new Set(config.excludedSeasons);
  return resolveLedger(
    games.filter(g => !excluded.has(g.season)),
    config
  );
}

/** Career W-L-T per manager, regular season and playoffs kept apart. */
export function allTimeRecords(games: GameRecord[], config: IdentityConfig): AllTimeRecord[] {
  const rows = new Map<Identity, AllTimeRecord>();
  const row = (manager: Identity) => {
    let r = rows.get(manager);
    if (!r) {
      r = { manager, regular: emptyLine(), playoff: emptyLine() };
      rows.set(manager, r);
    }
    return r;
  };

  for (const g of visibleGames(games, config)) {
    if (g.gameType === 'consolation') continue;
    const pick = (r: AllTimeRecord) => (isPlayoffGame(g.gameType) ? r.playoff : r.regular);
    const one = pick(row(g.team1Manager));
    const two = pick(row(g.team2Manager));
    if (g.winnerManager === null) {
      one.ties++;
      two.ties++;
    } else if (g.winnerManager === g.team1Manager) {
      one.wins++;
      two.losses++;
    } else {
      two.wins++;
      one.losses++;
    }
  }

  const out = Array.from(rows.values()).filter(r => !isHidden(r.manager, config));
  for (const r of out) {
    finishLine(r.regular);
    finishLine(r.playoff);
  }
  return out.sort((a, b) => b.regular.pct - a.regular.pct || byName(a.manager, b.manager));
}

export interface FinalStandingRow {
  manager: Identity;
  finishes: Record<number, number>;
  averageFinish: number;
  finishCounts: Record<number, number>;
  seasonsPlayed: number;
}

export interface SeasonFinishSummary {
  season: number;
  teams: number;
  champion: Identity | null;
  scoringChamp: { manager: Identity; pointsFor: number } | null;
}

export interface FinalStandingsLeaderboard {
  managers: FinalStandingRow[];
  seasons: SeasonFinishSummary[];
}

/**
 * Career finishing positions from each season's final ranks. When an alias
 * and its canonical manager both appear in one season the better finish
 * counts.
 */
export function finalStandingsLeaderboard(
  seasons: SeasonSummary[],
  config: IdentityConfig
): FinalStandingsLeaderboard {
  const excluded = new Set(config.excludedSeasons);
  const finishes = new Map<Identity, Record<number, number>>();
  const summaries: SeasonFinishSummary[] = [];

  for (const s of [...seasons].sort((a, b) => a.season - b.season)) {
    if (excluded.has(s.season)) continue;
    let champion: Identity | null = null;
    for (const [name, rank] of Object.entries(s.finalRanks)) {
      const manager = resolveIdentity(name, config);
      const byManager = finishes.get(manager) ?? {};
      const prior = byManager[s.season];
      byManager[s.season] = prior === undefined ? rank : Math.min(prior, rank);
      finishes.set(manager, byManager);
      if (rank === 1) champion = manager;
    }
    const top = [...s.standings].sort(
      (a, b) => b.pointsFor - a.pointsFor || byName(a.manager, b.manager)
    )[0];
    summaries.push({
      season: s.season,
      teams: s.standings.length,
      champion,
      scoringChamp: top
        ? { manager: resolveIdentity(top.manager, config), pointsFor: top.pointsFor }
        : null,
    });
  }

  const managers: FinalStandingRow[] = [];
  for (const [manager, bySeason] of finishes) {
    if (isHidden(manager, config)) continue;
    const ranks = Object.values(bySeason);
    const finishCounts: Record<number, number> = {};
    for (const r of ranks) finishCounts[r] = (finishCounts[r] ?? 0) + 1;
    managers.push({
      manager,
      finishes: bySeason,
      averageFinish: Number((ranks.reduce((a, b) => a + b, 0) / ranks.length).toFixed(2)),
      finishCounts,
      seasonsPlayed: ranks.length,
    });
  }
  managers.sort((a, b) => a.averageFinish - b.averageFinish || byName(a.manager, b.manager));
  return { managers, seasons: summaries };
}

export interface StreakRow {
  winner: Identity;
  loser: Identity;
  length: number;
  active: boolean;
  range: string;
}

/** Longest run per pair, longest first. Equal lengths keep store order. */
export function streakLeaderboard(store: HeadToHeadStore, config: IdentityConfig): StreakRow[] {
  const rows: StreakRow[] = [];
  for (const r of Object.values(store)) {
    if (isHidden(r.managerA, config) || isHidden(r.managerB, config)) continue;
    const { holder, length, start, end } = r.longestStreak;
    if (holder === null || start === null || end === null || length === 0) continue;
    const cur = r.currentStreak;
    rows.push({
      winner: holder,
      loser: holder === r.managerA ? r.managerB : r.managerA,
      length,
      active:
        cur.holder === holder &&
        cur.length === length &&
        cur.start !== null &&
        compareGameRefs(cur.start, start) === 0,
      range: `${formatGameRef(start)} - ${formatGameRef(end)}`,
    });
  }
  return rows.sort((a, b) => b.length - a.length);
}

export interface MatchupLine {
  manager: Identity;
  opponent: Identity;
  wins: number;
  losses: number;
  pct: number;
}

export interface HeadToHeadLeaderboards {
  regularWinPct: MatchupLine[];
  mostRegularWins: MatchupLine[];
  mostPlayoffWins: MatchupLine[];
}

export const MIN_WINS_FOR_PCT = 3;

const line = (manager: Identity, opponent: Identity, wins: number, losses: number): MatchupLine => ({
  manager,
  opponent,
  wins,
  losses,
  pct: wins + losses ? Number((wins / (wins + losses)).toFixed(3)) : 0,
});

/** Pair dominance boards, each pair listed from both sides. */
export function h2hLeaderboards(
  store: HeadToHeadStore,
  config: IdentityConfig
): HeadToHeadLeaderboards {
  const regular: MatchupLine[] = [];
  const playoff: MatchupLine[] = [];
  for (const r of Object.values(store)) {
    if (isHidden(r.managerA, config) || isHidden(r.managerB, config)) continue;
    for (const manager of [r.managerA, r.managerB]) {
      const p = perspective(r, manager);
      regular.push(line(manager, p.opponent, p.regularWins, p.regularLosses));
      playoff.push(line(manager, p.opponent, p.playoffWins, p.playoffLosses));
    }
  }
  return {
    regularWinPct: regular
      .filter(m => m.wins >= MIN_WINS_FOR_PCT)
      .sort((a, b) => b.pct - a.pct || b.wins - a.wins),
    mostRegularWins: regular.filter(m => m.wins > 0).sort((a, b) => b.wins - a.wins),
    mostPlayoffWins: playoff.filter(m => m.wins > 0).sort((a, b) => b.wins - a.wins),
  };
}

export interface LeagueSummary {
  seasons: number;
  games: number;
  managers: number;
  totalPoints: number;
  ties: number;
}

export function leagueSummary(games: GameRecord[], config: IdentityConfig): LeagueSummary {
  const visible = visibleGames(games, config);
  const managers = new Set<Identity>();
  let totalPoints = 0;
  let ties = 0;
  for (const g of visible) {
    managers.add(g.team1Manager);
    managers.add(g.team2Manager);
    totalPoints += g.team1Score + g.team2Score;
    if (decideWinner(g) === null) ties++;
  }
  return {
    seasons: new Set(visible.map(g => g.season)).size,
    games: visible.length,
    managers: Array.from(managers).filter(m => !isHidden(m, config)).length,
    totalPoints: Number(totalPoints.toFixed(2)),
    ties,
  };
}
