import type {
  ClassifiedMatchup,
  GameRecord,
  SeasonSnapshot,
  SeasonSummary,
} from '../../types/index.js';
import { classifySeason, type ClassifiedSeason, type ClassifyOptions } from './classifier.js';
import { pairKey } from './headToHead.js';
import { DataIntegrityError, RunReport } from './runReport.js';
import { computeFinalRanks, computeStandings, decideWinner } from './standings.js';

export interface HistoricalLedger {
  games: GameRecord[];
  seasons: SeasonSummary[];
}

function toGameRecord(m: ClassifiedMatchup, report: RunReport): GameRecord {
  const winnerManager = decideWinner(m);
  const where = { season: m.season, week: m.week };
  const label = `${m.team1Manager} ${m.team1Score} - ${m.team2Score} ${m.team2Manager}`;
  if (winnerManager === null && m.bracketWinner !== null) {
    // The game stays a tie in the ledger; the tiebreak only moved the bracket on
    report.warn('BracketTiebreak', `${label}: tied ${m.gameType}, ${m.bracketWinner} advanced`, where);
  } else if (m.reportedWinner !== undefined && m.reportedWinner !== winnerManager) {
    report.warn(
      'InconsistentWinner',
      `${label}: source reported ${m.reportedWinner ?? 'tie'}, scores say ${winnerManager ?? 'tie'}`,
      where
    );
  }
  return {
    season: m.season,
    week: m.week,
    gameType: m.gameType,
    team1Manager: m.team1Manager,
    team2Manager: m.team2Manager,
    team1Score: m.team1Score,
    team2Score: m.team2Score,
    winnerManager,
  };
}

export function gameKey(g: Pick<GameRecord, 'season' | 'week' | 'team1Manager' | 'team2Manager'>) {
  return `${g.season}:${g.week}:${pairKey(g.team1Manager, g.team2Manager)}`;
}

/**
 * Drops repeated (season, week, pair) games, keeping the first. Used by the
 * builder and by CSV imports.
 */
export function dedupeGames(games: GameRecord[], report: RunReport): GameRecord[] {
  const seen = new Set<string>();
  const out: GameRecord[] = [];
  for (const g of games) {
    const key = gameKey(g);
    if (seen.has(key)) {
      report.warn(
        'DuplicateMatchup',
        `${g.team1Manager} vs ${g.team2Manager} appears more than once; keeping the first`,
        { season: g.season, week: g.week }
      );
      continue;
    }
    seen.add(key);
    out.push(g);
  }
  return out;
}

/**
 * Classifies every season and flattens the results into one chronological
 * list of GameRecords. Seasons with missing data are skipped, seasons with
 * broken data are recorded as failures; neither stops the others.
 */
export function buildLedger(
  snapshots: SeasonSnapshot[],
  report: RunReport,
  options: ClassifyOptions = {}
): HistoricalLedger {
  const games: GameRecord[] = [];
  const seasons: SeasonSummary[] = [];

  for (const snapshot of [...snapshots].sort((a, b) => a.season - b.season)) {
    const { season, settings } = snapshot;
    if (!settings || Object.keys(snapshot.weeks).length === 0) {
      report.warn(
        'MissingSeasonData',
        `Season ${season} has no ${settings ? 'weekly matchups' : 'league settings'}; skipped`,
        { season }
      );
      continue;
    }

    let classified: ClassifiedSeason;
    try {
      classified = classifySeason(snapshot, settings, report, options);
    } catch (err) {
      if (err instanceof DataIntegrityError) {
        report.fail(season, err.message);
        continue;
      }
      throw err;
    }

    const records = dedupeGames(
      classified.matchups.map(m => toGameRecord(m, report)),
      report
    );
    games.push(...records);
    seasons.push({
      season,
      settings,
      standings: classified.standings,
      finalRanks: computeFinalRanks(records, classified.standings),
    });
  }

  return { games, seasons };
}

/** Reconstructs per-season summaries from a stored ledger (e.g. a CSV import). */
export function summarizeSeasons(games: GameRecord[]): SeasonSummary[] {
  const bySeason = new Map<number, GameRecord[]>();
  for (const g of games) {
    const list = bySeason.get(g.season) ?? [];
    list.push(g);
    bySeason.set(g.season, list);
  }
  return Array.from(bySeason.entries())
    .sort(([a], [b]) => a - b)
    .map(([season, list]) => {
      const regular = list.filter(g => g.gameType === 'regular');
      const playoffWeeks = list.filter(g => g.gameType !== 'regular').map(g => g.week);
      const standings = computeStandings(regular);
      return {
        season,
        settings: {
          playoffStartWeek: playoffWeeks.length
            ? Math.min(...playoffWeeks)
            : Math.max(0, ...list.map(g => g.week)) + 1,
          numPlayoffTeams: list.some(g => g.gameType === 'QF') ? 6 : 4,
        },
        standings,
        finalRanks: computeFinalRanks(list, standings),
      };
    });
}
