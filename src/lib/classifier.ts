import type {
  ClassifiedMatchup,
  GameType,
  Identity,
  LeagueSeasonSettings,
  PlayoffGameType,
  RawMatchup,
  RawTeam,
  SeasonSnapshot,
  StandingRow,
} from '../../types/index.js';
import { DataIntegrityError, RunReport } from './runReport.js';
import { computeStandings, decideWinner, rankMap } from './standings.js';

export interface ClassifyOptions {
  /** Nickname of the league operator, who co-manages several teams. */
  operator?: Identity;
}

export interface ClassifiedSeason {
  season: number;
  settings: LeagueSeasonSettings;
  standings: StandingRow[];
  byeSeeds: Identity[];
  matchups: ClassifiedMatchup[];
}

/**
 * Picks the manager of record for a team. With co-managers the operator is
 * passed over in favour of the first other manager listed.
 */
export function primaryManager(team: RawTeam, operator?: Identity): Identity {
  const [first] = team.managers;
  if (!first) {
    throw new DataIntegrityError(`Team ${team.teamKey} has no managers`);
  }
  if (team.managers.length === 1) return first.nickname;
  const other = team.managers.find(m => m.nickname !== operator);
  return (other ?? first).nickname;
}

export function sortedWeeks(snapshot: SeasonSnapshot): number[] {
  return Object.keys(snapshot.weeks)
    .map(Number)
    .filter(w => Number.isInteger(w))
    .sort((a, b) => a - b);
}

interface ResolvedMatchup {
  week: number;
  raw: RawMatchup;
  team1Manager: Identity;
  team2Manager: Identity;
  team1Score: number;
  team2Score: number;
}

function resolveMatchup(week: number, raw: RawMatchup, operator?: Identity): ResolvedMatchup {
  const [t1, t2] = raw.teams;
  return {
    week,
    raw,
    team1Manager: primaryManager(t1, operator),
    team2Manager: primaryManager(t2, operator),
    team1Score: t1.points,
    team2Score: t2.points,
  };
}

function reportedWinner(m: ResolvedMatchup): Identity | null | undefined {
  if (m.raw.isTied) return null;
  const [t1, t2] = m.raw.teams;
  if (m.raw.winnerTeamKey === t1.teamKey) return m.team1Manager;
  if (m.raw.winnerTeamKey === t2.teamKey) return m.team2Manager;
  return undefined;
}

/**
 * Who goes through when a bracket game ends level on score: the team the
 * source names as winner, otherwise the better regular-season seed.
 */
function tiebreakWinner(m: ResolvedMatchup, seeds: ReadonlyMap<Identity, number>): Identity {
  const [t1, t2] = m.raw.teams;
  if (m.raw.winnerTeamKey === t1.teamKey) return m.team1Manager;
  if (m.raw.winnerTeamKey === t2.teamKey) return m.team2Manager;
  const seed1 = seeds.get(m.team1Manager) ?? Number.MAX_SAFE_INTEGER;
  const seed2 = seeds.get(m.team2Manager) ?? Number.MAX_SAFE_INTEGER;
  return seed2 < seed1 ? m.team2Manager : m.team1Manager;
}

const bothIn = (set: ReadonlySet<Identity>, m: ResolvedMatchup) =>
  set.has(m.team1Manager) && set.has(m.team2Manager);

/**
 * Tracks bracket progress through the playoff weeks. Each round only sees the
 * winners and losers recorded by the rounds before it.
 */
class Bracket {
  private readonly qfWinners = new Set<Identity>();
  private readonly sfWinners = new Set<Identity>();
  private readonly sfLosers = new Set<Identity>();
  private readonly byes: ReadonlySet<Identity>;
  private readonly field: ReadonlySet<Identity>;
  private readonly wide: boolean;

  constructor(
    private readonly settings: LeagueSeasonSettings,
    standings: StandingRow[],
    byeSeeds: Identity[]
  ) {
    this.byes = new Set(byeSeeds);
    this.field = new Set(standings.slice(0, settings.numPlayoffTeams).map(s => s.manager));
    this.wide = settings.numPlayoffTeams >= 6;
  }

  /** Returns the bracket role, or null when the matchup fits no role. */
  classify(m: ResolvedMatchup, advanced: Identity): PlayoffGameType | null {
    const offset = m.week - this.settings.playoffStartWeek;
    const eliminated = advanced === m.team1Manager ? m.team2Manager : m.team1Manager;

    if (this.wide && offset === 0) {
      if (!bothIn(this.field, m)) return null;
      if (this.byes.has(m.team1Manager) || this.byes.has(m.team2Manager)) return null;
      this.qfWinners.add(advanced);
      return 'QF';
    }

    const sfOffset = this.wide ? 1 : 0;
    if (offset === sfOffset) {
      const eligible = this.wide ? new Set([...this.qfWinners, ...this.byes]) : this.field;
      if (!bothIn(eligible, m)) return null;
      this.sfWinners.add(advanced);
      this.sfLosers.add(eliminated);
      return 'SF';
    }

    if (offset === sfOffset + 1) {
      if (bothIn(this.sfWinners, m)) return '1st';
      if (bothIn(this.sfLosers, m)) return '3rd';
    }
    return null;
  }
}

/**
 * Assigns a game type to every matchup of one season. Pure apart from the
 * warnings it records; a team without managers throws DataIntegrityError.
 */
export function classifySeason(
  snapshot: SeasonSnapshot,
  settings: LeagueSeasonSettings,
  report: RunReport,
  options: ClassifyOptions = {}
): ClassifiedSeason {
  const { season } = snapshot;
  const resolved: ResolvedMatchup[] = [];
  try {
    for (const week of sortedWeeks(snapshot)) {
      for (const raw of snapshot.weeks[String(week)] ?? []) {
        resolved.push(resolveMatchup(week, raw, options.operator));
      }
    }
  } catch (err) {
    if (err instanceof DataIntegrityError) throw new DataIntegrityError(err.message, season);
    throw err;
  }

  const standings = computeStandings(resolved.filter(m => m.week < settings.playoffStartWeek));
  const byeSeeds = settings.numPlayoffTeams >= 6 ? standings.slice(0, 2).map(s => s.manager) : [];
  const bracket = new Bracket(settings, standings, byeSeeds);
  const seeds = rankMap(standings);

  const matchups = resolved.map((m): ClassifiedMatchup => {
    const winner = decideWinner(m);
    let bracketWinner = winner;
    let gameType: GameType = 'regular';
    if (m.raw.isConsolation) {
      gameType = 'consolation';
    } else if (m.week >= settings.playoffStartWeek) {
      const advanced = winner ?? tiebreakWinner(m, seeds);
      const role = bracket.classify(m, advanced);
      const where = { season, week: m.week };
      if (role === null) {
        report.warn(
          'UnresolvedBracketSlot',
          `${m.team1Manager} vs ${m.team2Manager} fits no bracket slot; treated as consolation`,
          where
        );
      } else {
        bracketWinner = advanced;
        if (m.raw.isPlayoffs === false) {
          report.warn(
            'PlayoffFlagMismatch',
            `${m.team1Manager} vs ${m.team2Manager} placed as ${role} but the source marks it a regular game`,
            where
          );
        }
      }
      gameType = role ?? 'consolation';
    }
    return {
      season,
      week: m.week,
      gameType,
      team1Manager: m.team1Manager,
      team2Manager: m.team2Manager,
      team1Score: m.team1Score,
      team2Score: m.team2Score,
      bracketWinner,
      reportedWinner: reportedWinner(m),
    };
  });

  return { season, settings, standings, byeSeeds, matchups };
}
