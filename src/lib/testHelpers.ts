import type { GameRecord, GameType, RawMatchup, RawTeam, SeasonSnapshot } from '../../types/index.js';
import { decideWinner } from './standings.js';

// Fixture builders shared by the test suites

export function team(name: string, points: number, ...coManagers: string[]): RawTeam {
  return {
    teamKey: `t.${name.toLowerCase()}`,
    name: `${name}'s Team`,
    points,
    managers: [name, ...coManagers].map(nickname => ({ nickname })),
  };
}

export function matchup(
  a: RawTeam,
  b: RawTeam,
  flags: Partial<Pick<RawMatchup, 'isPlayoffs' | 'isConsolation' | 'winnerTeamKey' | 'isTied'>> = {}
): RawMatchup {
  const tied = a.points === b.points;
  return {
    teams: [a, b],
    isTied: flags.isTied ?? tied,
    winnerTeamKey:
      flags.winnerTeamKey !== undefined
        ? flags.winnerTeamKey
        : tied
          ? null
          : a.points > b.points
            ? a.teamKey
            : b.teamKey,
    isPlayoffs: flags.isPlayoffs,
    isConsolation: flags.isConsolation ?? false,
  };
}

/** Shorthand: `m('Ann', 120, 'Ben', 100)`. */
export function m(
  a: string,
  pa: number,
  b: string,
  pb: number,
  flags: Parameters<typeof matchup>[2] = {}
): RawMatchup {
  return matchup(team(a, pa), team(b, pb), flags);
}

export function game(
  season: number,
  week: number,
  a: string,
  pa: number,
  b: string,
  pb: number,
  gameType: GameType = 'regular'
): GameRecord {
  const scored = { team1Manager: a, team2Manager: b, team1Score: pa, team2Score: pb };
  return { season, week, gameType, ...scored, winnerManager: decideWinner(scored) };
}

/**
 * Eight managers, playoffs from week 14 with six teams. Regular season ends
 * Ann, Ben, Cal, Dee, Eve, Fay, Gus, Hal. Ann and Ben take byes; Cal and Eve
 * win their quarterfinals, Ann and Cal reach the final.
 */
export function eightTeamSeason(season = 2022): SeasonSnapshot {
  return {
    season,
    settings: { playoffStartWeek: 14, numPlayoffTeams: 6 },
    weeks: {
      '11': [
        m('Ann', 130, 'Hal', 60),
        m('Ben', 120, 'Gus', 70),
        m('Cal', 110, 'Fay', 80),
        m('Dee', 100, 'Eve', 90),
      ],
      '12': [
        m('Ann', 130, 'Gus', 70),
        m('Ben', 120, 'Hal', 60),
        m('Eve', 95, 'Cal', 85),
        m('Fay', 105, 'Dee', 75),
      ],
      '13': [
        m('Ann', 130, 'Hal', 60),
        m('Ben', 120, 'Gus', 70),
        m('Cal', 110, 'Eve', 90),
        m('Dee', 100, 'Fay', 80),
      ],
      '14': [
        m('Cal', 101, 'Fay', 99, { isPlayoffs: true }),
        m('Dee', 88, 'Eve', 92, { isPlayoffs: true }),
        m('Gus', 77, 'Hal', 66, { isPlayoffs: true, isConsolation: true }),
      ],
      '15': [
        m('Ann', 140, 'Eve', 100, { isPlayoffs: true }),
        m('Ben', 90, 'Cal', 95, { isPlayoffs: true }),
        m('Dee', 80, 'Fay', 85, { isPlayoffs: true }),
      ],
      '16': [
        m('Ann', 111, 'Cal', 109, { isPlayoffs: true }),
        m('Ben', 97, 'Eve', 103, { isPlayoffs: true }),
        m('Fay', 70, 'Gus', 72, { isPlayoffs: true, isConsolation: true }),
      ],
    },
  };
}
