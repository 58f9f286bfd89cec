import type {
  GameRecord,
  HeadToHeadRecord,
  HeadToHeadStore,
  HistoryEntry,
  Identity,
  IdentityConfig,
  RawMatchup,
} from '../../types/index.js';
import { primaryManager } from './classifier.js';
import type { SnapshotStore } from './dataLoader.js';
import { eventsOf, findHeadToHead, perspective } from './headToHead.js';
import { resolveIdentity, resolveLedger } from './identity.js';
import { computeStandings, formatGameRef } from './standings.js';

export interface UpcomingWeek {
  season: number;
  week: number;
  matchups: RawMatchup[];
  operator?: Identity;
}

export interface PreviewTeam {
  manager: Identity;
  /** Regular-season rank going into the week; null before a first game. */
  rank: number | null;
  record: string;
}

export interface PlayoffWins {
  manager: Identity;
  games: string[];
}

export interface PreviewLine {
  higher: PreviewTeam;
  lower: PreviewTeam;
  // Records are read from the higher seed's side; null when the pair never met
  regular: string | null;
  playoff: string | null;
  ties: number;
  streak: string | null;
  playoffWins: PlayoffWins[];
}

export interface WeekPreview {
  season: number;
  week: number;
  lines: PreviewLine[];
}

/** `Wk3'22` for regular games, `SF'21` for playoff games. */
export function historyLabel(entry: Pick<HistoryEntry, 'gameType' | 'season' | 'week'>): string {
  if (entry.gameType === 'regular') return formatGameRef(entry);
  return `${entry.gameType}'${String(entry.season).slice(-2)}`;
}

function streakLine(record: HeadToHeadRecord): string | null {
  const { holder, length } = record.currentStreak;
  if (holder === null || length === 0) return null;
  const games = eventsOf(record)
    .slice(-length)
    .flatMap(e => (e.kind === 'win' ? [historyLabel(e.entry)] : []));
  return `${holder} W${length} (${games.join(', ')})`;
}

const seedOf = (t: PreviewTeam) => t.rank ?? Number.MAX_SAFE_INTEGER;

/**
 * Finds the first week of the latest snapshot season that the ledger has no
 * games for yet, provided the snapshot already schedules it.
 */
export function upcomingWeek(
  snapshots: SnapshotStore,
  games: GameRecord[],
  operator?: Identity
): UpcomingWeek | undefined {
  const seasons = snapshots.seasons();
  const season = seasons[seasons.length - 1];
  if (season === undefined) return undefined;
  const played = games.filter(g => g.season === season).map(g => g.week);
  const week = Math.max(0, ...played) + 1;
  const matchups = snapshots.getWeekMatchups(season, week);
  return matchups.length ? { season, week, matchups, operator } : undefined;
}

/**
 * Previews the coming week: each matchup seeded by the standings so far,
 * with the pair's history read from the higher seed's side. Lines are
 * ordered by the better seed in each game.
 */
export function buildPreview(
  upcoming: UpcomingWeek,
  games: GameRecord[],
  store: HeadToHeadStore,
  config: IdentityConfig
): WeekPreview {
  const { season, week } = upcoming;
  const standings = computeStandings(
    resolveLedger(
      games.filter(g => g.season === season && g.gameType === 'regular' && g.week < week),
      config
    )
  );
  const rows = new Map(standings.map(s => [s.manager, s]));

  const teamOf = (manager: Identity): PreviewTeam => {
    const row = rows.get(manager);
    if (!row) return { manager, rank: null, record: '0-0' };
    const record = `${row.wins}-${row.losses}${row.ties ? `-${row.ties}` : ''}`;
    return { manager, rank: row.rank, record };
  };

  const lines = upcoming.matchups.map((raw): PreviewLine => {
    const [a, b] = raw.teams.map(t =>
      teamOf(resolveIdentity(primaryManager(t, upcoming.operator), config))
    );
    const [higher, lower] = seedOf(b) < seedOf(a) ? [b, a] : [a, b];
    const record = findHeadToHead(store, higher.manager, lower.manager);
    if (!record) {
      return { higher, lower, regular: null, playoff: null, ties: 0, streak: null, playoffWins: [] };
    }
    const view = perspective(record, higher.manager);
    const playoffWins = [higher, lower].flatMap(t => {
      const won = record.playoffHistory.filter(e => e.winner === t.manager).map(historyLabel);
      return won.length ? [{ manager: t.manager, games: won }] : [];
    });
    return {
      higher,
      lower,
      regular: `${view.regularWins}-${view.regularLosses}`,
      playoff: `${view.playoffWins}-${view.playoffLosses}`,
      ties: view.ties,
      streak: streakLine(record),
      playoffWins,
    };
  });

  return { season, week, lines: lines.sort((x, y) => seedOf(x.higher) - seedOf(y.higher)) };
}
