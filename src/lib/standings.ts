import type { GameRef, GameType, Identity, StandingRow } from '../../types/index.js';

export interface ScoredGame {
  team1Manager: Identity;
  team2Manager: Identity;
  team1Score: number;
  team2Score: number;
}

export interface PlacedGame {
  gameType: GameType;
  team1Manager: Identity;
  team2Manager: Identity;
  winnerManager: Identity | null;
}

/**
 * The only winner rule in the codebase: higher score wins, equal scores tie.
 * Upstream winner flags are never consulted here.
 */
export function decideWinner(g: ScoredGame): Identity | null {
  if (g.team1Score > g.team2Score) return g.team1Manager;
  if (g.team2Score > g.team1Score) return g.team2Manager;
  return null;
}

export function loserOf(g: PlacedGame): Identity | null {
  if (g.winnerManager === null) return null;
  return g.winnerManager === g.team1Manager ? g.team2Manager : g.team1Manager;
}

export function compareGameRefs(a: GameRef, b: GameRef): number {
  return a.season - b.season || a.week - b.week;
}

export function formatGameRef(ref: GameRef): string {
  return `Wk${ref.week}'${String(ref.season).slice(-2)}`;
}

/**
 * Ranks managers by wins desc, points for desc, then name so equal records
 * always come out in the same order.
 */
export function computeStandings(games: ScoredGame[]): StandingRow[] {
  const rows = new Map<Identity, Omit<StandingRow, 'rank'>>();
  const ensure = (manager: Identity) => {
    let row = rows.get(manager);
    if (!row) {
      row = { manager, wins: 0, losses: 0, ties: 0, pointsFor: 0 };
      rows.set(manager, row);
    }
    return row;
  };

  for (const g of games) {
    const r1 = ensure(g.team1Manager);
    const r2 = ensure(g.team2Manager);
    r1.pointsFor += g.team1Score;
    r2.pointsFor += g.team2Score;
    const winner = decideWinner(g);
    if (winner === null) {
      r1.ties++;
      r2.ties++;
    } else if (winner === g.team1Manager) {
      r1.wins++;
      r2.losses++;
    } else {
      r2.wins++;
      r1.losses++;
    }
  }

  return Array.from(rows.values())
    .sort(
      (a, b) =>
        b.wins - a.wins ||
        b.pointsFor - a.pointsFor ||
        (a.manager < b.manager ? -1 : a.manager > b.manager ? 1 : 0)
    )
    .map((row, i) => ({ ...row, pointsFor: Number(row.pointsFor.toFixed(2)), rank: i + 1 }));
}

export function rankMap(standings: StandingRow[]): Map<Identity, number> {
  return new Map(standings.map(s => [s.manager, s.rank]));
}

/**
 * Final season placement. Placement games decide 1-4, QF losers take 5th and
 * 6th in regular-season order, everyone else keeps their regular-season rank.
 */
export function computeFinalRanks(
  games: PlacedGame[],
  standings: StandingRow[]
): Record<Identity, number> {
  const regRank = rankMap(standings);
  const byRegRank = (a: Identity, b: Identity) =>
    (regRank.get(a) ?? Number.MAX_SAFE_INTEGER) - (regRank.get(b) ?? Number.MAX_SAFE_INTEGER);

  const finals: Record<Identity, number> = {};
  const qfLosers: Identity[] = [];

  const place = (g: PlacedGame, top: number) => {
    const loser = loserOf(g);
    const [first, second] =
      g.winnerManager !== null && loser !== null
        ? [g.winnerManager, loser]
        : [g.team1Manager, g.team2Manager].sort(byRegRank);
    finals[first] = top;
    finals[second] = top + 1;
  };

  // A tied QF is lost by whoever does not show up in the SF round, or failing
  // that by the worse seed
  const semifinalists = new Set(
    games.filter(g => g.gameType === 'SF').flatMap(g => [g.team1Manager, g.team2Manager])
  );
  const tiedQfLoser = (g: PlacedGame): Identity => {
    const [better, worse] = [g.team1Manager, g.team2Manager].sort(byRegRank);
    if (semifinalists.has(better) !== semifinalists.has(worse)) {
      return semifinalists.has(better) ? worse : better;
    }
    return worse;
  };

  for (const g of games) {
    if (g.gameType === '1st') place(g, 1);
    else if (g.gameType === '3rd') place(g, 3);
    else if (g.gameType === 'QF') qfLosers.push(loserOf(g) ?? tiedQfLoser(g));
  }

  qfLosers.sort(byRegRank).forEach((manager, i) => {
    finals[manager] = 5 + i;
  });

  const out: Record<Identity, number> = {};
  for (const s of standings) out[s.manager] = finals[s.manager] ?? s.rank;
  return out;
}
