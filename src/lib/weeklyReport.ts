import type { GameRecord, Identity, IdentityConfig } from '../../types/index.js';
import { weeklyAccolades, type AccoladeInstance } from './accolades.js';
import { isHidden, resolveLedger } from './identity.js';
import { computeStandings } from './standings.js';

export interface ReportAccolade extends AccoladeInstance {
  /** Times this manager has won this accolade so far this season, this week included. */
  seasonCount: number;
}

export interface ReportRow {
  manager: Identity;
  altRank: number;
  // Rank changes since the previous week, positive when moving up
  altDelta: number | null;
  altWins: number;
  altLosses: number;
  altResult: 'W' | 'L' | null;
  pointsFor: number;
  weeklyScore: number | null;
  realRank: number;
  realDelta: number | null;
  realWins: number;
  realLosses: number;
  realTies: number;
  realResult: 'W' | 'L' | 'T' | null;
}

export interface WeeklyReport {
  season: number;
  week: number;
  accolades: ReportAccolade[];
  rows: ReportRow[];
}

type WeekResult = ReturnType<typeof weeklyAccolades>;

interface AltRow {
  manager: Identity;
  wins: number;
  losses: number;
  pointsFor: number;
  rank: number;
}

function altStandings(results: WeekResult[]): Map<Identity, AltRow> {
  const rows = new Map<Identity, Omit<AltRow, 'rank'>>();
  const row = (manager: Identity) => {
    let r = rows.get(manager);
    if (!r) {
      r = { manager, wins: 0, losses: 0, pointsFor: 0 };
      rows.set(manager, r);
    }
    return r;
  };
  for (const week of results) {
    for (const m of week.altWinners) row(m).wins++;
    for (const m of week.altLosers) row(m).losses++;
    for (const { manager, score } of week.scores) row(manager).pointsFor += score;
  }
  const ranked = Array.from(rows.values())
    .sort(
      (a, b) =>
        b.wins - a.wins ||
        b.pointsFor - a.pointsFor ||
        (a.manager < b.manager ? -1 : a.manager > b.manager ? 1 : 0)
    )
    .map((r, i) => ({ ...r, pointsFor: Number(r.pointsFor.toFixed(2)), rank: i + 1 }));
  return new Map(ranked.map(r => [r.manager, r]));
}

function latestWeek(games: GameRecord[]): { season: number; week: number } | undefined {
  let latest: { season: number; week: number } | undefined;
  for (const g of games) {
    if (!latest || g.season > latest.season || (g.season === latest.season && g.week > latest.week)) {
      latest = { season: g.season, week: g.week };
    }
  }
  return latest;
}

const change = (prev: number | undefined, now: number) => (prev === undefined ? null : prev - now);

/**
 * One regular-season week in review: its accolades with season-to-date
 * counts, and the alternative-universe table (top half of the week's scores
 * win) beside the real standings, each with movement since the week before.
 * Defaults to the latest regular-season week in the ledger.
 */
export function buildWeeklyReport(
  games: GameRecord[],
  config: IdentityConfig,
  at?: { season: number; week: number }
): WeeklyReport | undefined {
  const excluded = new Set(config.excludedSeasons);
  const regular = resolveLedger(
    games.filter(g => g.gameType === 'regular' && !excluded.has(g.season)),
    config
  );
  const target = at ?? latestWeek(regular);
  if (!target) return undefined;
  const { season, week } = target;

  const seasonGames = regular.filter(g => g.season === season && g.week <= week);
  const weekGames = seasonGames.filter(g => g.week === week);
  if (!weekGames.length) return undefined;

  const weeks = Array.from(new Set(seasonGames.map(g => g.week))).sort((a, b) => a - b);
  const results = weeks.map(w => weeklyAccolades(season, w, seasonGames.filter(g => g.week === w)));
  const current = weeklyAccolades(season, week, weekGames);

  const counts = new Map<string, number>();
  for (const r of results) {
    for (const i of r.instances) {
      const key = `${i.kind}:${i.manager}`;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  const accolades = current.instances
    .filter(i => !isHidden(i.manager, config))
    .map(i => ({ ...i, seasonCount: counts.get(`${i.kind}:${i.manager}`) ?? 0 }));

  const alt = altStandings(results);
  const prevAlt = altStandings(results.slice(0, -1));
  const real = new Map(computeStandings(seasonGames).map(s => [s.manager, s]));
  const prevReal = new Map(
    computeStandings(seasonGames.filter(g => g.week < week)).map(s => [s.manager, s])
  );

  const scores = new Map(current.scores.map(s => [s.manager, s.score]));
  const altWinners = new Set(current.altWinners);
  const altLosers = new Set(current.altLosers);
  const realResult = (manager: Identity): ReportRow['realResult'] => {
    const g = weekGames.find(x => x.team1Manager === manager || x.team2Manager === manager);
    if (!g) return null;
    if (g.winnerManager === null) return 'T';
    return g.winnerManager === manager ? 'W' : 'L';
  };

  const rows = Array.from(alt.values()).flatMap((a): ReportRow[] => {
    const r = real.get(a.manager);
    if (!r || isHidden(a.manager, config)) return [];
    return [
      {
        manager: a.manager,
        altRank: a.rank,
        altDelta: change(prevAlt.get(a.manager)?.rank, a.rank),
        altWins: a.wins,
        altLosses: a.losses,
        altResult: altWinners.has(a.manager) ? 'W' : altLosers.has(a.manager) ? 'L' : null,
        pointsFor: a.pointsFor,
        weeklyScore: scores.get(a.manager) ?? null,
        realRank: r.rank,
        realDelta: change(prevReal.get(a.manager)?.rank, r.rank),
        realWins: r.wins,
        realLosses: r.losses,
        realTies: r.ties,
        realResult: realResult(a.manager),
      },
    ];
  });

  return { season, week, accolades, rows };
}
