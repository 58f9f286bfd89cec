import { describe, it, expect } from 'vitest';
import type { SeasonSnapshot } from '../../types/index.js';
import { classifySeason, primaryManager } from './classifier.js';
import { DataIntegrityError, RunReport } from './runReport.js';
import { eightTeamSeason, m, matchup, team } from './testHelpers.js';

const roles = (snapshot: SeasonSnapshot, report = new RunReport()) => {
  const settings = snapshot.settings ?? { playoffStartWeek: 99, numPlayoffTeams: 0 };
  return classifySeason(snapshot, settings, report).matchups.map(
    g => `${g.week} ${g.team1Manager}-${g.team2Manager} ${g.gameType}`
  );
};

describe('Playoff Classifier', () => {
  describe('primaryManager', () => {
    it('should return the only manager', () => {
      expect(primaryManager(team('Ann', 100))).toBe('Ann');
    });

    it('should skip the operator among co-managers', () => {
      expect(primaryManager(team('Op', 100, 'Ann'), 'Op')).toBe('Ann');
      expect(primaryManager(team('Ann', 100, 'Op'), 'Op')).toBe('Ann');
    });

    it('should fall back to the first listed when every co-manager is the operator', () => {
      expect(primaryManager(team('Op', 100, 'Op'), 'Op')).toBe('Op');
    });

    it('should take the first listed co-manager without an operator', () => {
      expect(primaryManager(team('Ann', 100, 'Ben'))).toBe('Ann');
    });

    it('should throw for a team with no managers', () => {
      expect(() => primaryManager({ teamKey: 't.9', points: 10, managers: [] })).toThrow(
        DataIntegrityError
      );
    });
  });

  describe('six-team bracket with byes', () => {
    it('should seed byes from the regular season and walk the bracket', () => {
      const report = new RunReport();
      const classified = classifySeason(
        eightTeamSeason(),
        { playoffStartWeek: 14, numPlayoffTeams: 6 },
        report
      );
      expect(classified.standings.map(s => s.manager)).toEqual([
        'Ann',
        'Ben',
        'Cal',
        'Dee',
        'Eve',
        'Fay',
        'Gus',
        'Hal',
      ]);
      expect(classified.byeSeeds).toEqual(['Ann', 'Ben']);
      expect(roles(eightTeamSeason()).filter(r => Number(r.split(' ')[0]) >= 14)).toEqual([
        '14 Cal-Fay QF',
        '14 Dee-Eve QF',
        '14 Gus-Hal consolation',
        '15 Ann-Eve SF',
        '15 Ben-Cal SF',
        '15 Dee-Fay consolation',
        '16 Ann-Cal 1st',
        '16 Ben-Eve 3rd',
        '16 Fay-Gus consolation',
      ]);
    });

    it('should report a playoff-week game that fits no slot', () => {
      const report = new RunReport();
      roles(eightTeamSeason(), report);
      expect(report.count('UnresolvedBracketSlot')).toBe(1);
      expect(report.warnings[0]).toMatchObject({
        kind: 'UnresolvedBracketSlot',
        season: 2022,
        week: 15,
      });
    });

    it('should keep every SF participant within QF winners and bye seeds', () => {
      const classified = classifySeason(
        eightTeamSeason(),
        { playoffStartWeek: 14, numPlayoffTeams: 6 },
        new RunReport()
      );
      const sf = classified.matchups.filter(g => g.gameType === 'SF');
      const participants = new Set(sf.flatMap(g => [g.team1Manager, g.team2Manager]));
      expect([...participants].sort()).toEqual(['Ann', 'Ben', 'Cal', 'Eve']);
    });

    it('should advance the source tiebreak winner from a tied semifinal', () => {
      const snapshot = eightTeamSeason();
      snapshot.weeks['15'] = [
        m('Ann', 140, 'Eve', 100, { isPlayoffs: true }),
        m('Ben', 95, 'Cal', 95, { isPlayoffs: true, winnerTeamKey: 't.cal' }),
        m('Dee', 80, 'Fay', 85, { isPlayoffs: true }),
      ];
      const report = new RunReport();
      const classified = classifySeason(
        snapshot,
        { playoffStartWeek: 14, numPlayoffTeams: 6 },
        report
      );
      expect(roles(snapshot).filter(r => r.startsWith('16 '))).toEqual([
        '16 Ann-Cal 1st',
        '16 Ben-Eve 3rd',
        '16 Fay-Gus consolation',
      ]);
      const tied = classified.matchups.find(g => g.week === 15 && g.team1Manager === 'Ben');
      expect(tied).toMatchObject({ gameType: 'SF', bracketWinner: 'Cal', reportedWinner: null });
      expect(report.count('UnresolvedBracketSlot')).toBe(1);
    });

    it('should advance the better seed from a tied quarterfinal without a source winner', () => {
      const snapshot = eightTeamSeason();
      snapshot.weeks['14'] = [
        m('Cal', 100, 'Fay', 100, { isPlayoffs: true }),
        m('Dee', 88, 'Eve', 92, { isPlayoffs: true }),
      ];
      const classified = classifySeason(
        snapshot,
        { playoffStartWeek: 14, numPlayoffTeams: 6 },
        new RunReport()
      );
      expect(classified.matchups.find(g => g.week === 14 && g.team1Manager === 'Cal')).toMatchObject({
        gameType: 'QF',
        bracketWinner: 'Cal',
      });
      expect(roles(snapshot).filter(r => r.startsWith('15 '))).toEqual([
        '15 Ann-Eve SF',
        '15 Ben-Cal SF',
        '15 Dee-Fay consolation',
      ]);
    });

    it('should leave a tied regular-season game without a bracket winner', () => {
      const snapshot = eightTeamSeason();
      snapshot.weeks['11'] = [m('Ann', 100, 'Hal', 100, { winnerTeamKey: 't.hal' })];
      const classified = classifySeason(
        snapshot,
        { playoffStartWeek: 14, numPlayoffTeams: 6 },
        new RunReport()
      );
      expect(classified.matchups[0]).toMatchObject({ gameType: 'regular', bracketWinner: null });
    });

    it('should warn when a bracket game is flagged as a regular game by the source', () => {
      const snapshot = eightTeamSeason();
      snapshot.weeks['14'] = [
        m('Cal', 101, 'Fay', 99, { isPlayoffs: false }),
        m('Dee', 88, 'Eve', 92, { isPlayoffs: true }),
      ];
      const report = new RunReport();
      expect(roles(snapshot, report).filter(r => r.startsWith('14 '))).toEqual([
        '14 Cal-Fay QF',
        '14 Dee-Eve QF',
      ]);
      expect(report.warnings.filter(w => w.kind === 'PlayoffFlagMismatch')).toEqual([
        {
          kind: 'PlayoffFlagMismatch',
          level: 'warn',
          season: 2022,
          week: 14,
          message: 'Cal vs Fay placed as QF but the source marks it a regular game',
        },
      ]);
    });

    it('should not warn about the playoff flag when the source leaves it out', () => {
      const snapshot = eightTeamSeason();
      snapshot.weeks['14'] = [m('Cal', 101, 'Fay', 99), m('Dee', 88, 'Eve', 92)];
      const report = new RunReport();
      roles(snapshot, report);
      expect(report.count('PlayoffFlagMismatch')).toBe(0);
    });

    it('should not let a bye seed play in the QF round', () => {
      const snapshot = eightTeamSeason();
      snapshot.weeks['14'] = [
        m('Ann', 100, 'Cal', 90, { isPlayoffs: true }),
        m('Dee', 88, 'Eve', 92, { isPlayoffs: true }),
      ];
      expect(roles(snapshot).filter(r => r.startsWith('14 '))).toEqual([
        '14 Ann-Cal consolation',
        '14 Dee-Eve QF',
      ]);
    });
  });

  describe('four-team bracket', () => {
    const season: SeasonSnapshot = {
      season: 2019,
      settings: { playoffStartWeek: 3, numPlayoffTeams: 4 },
      weeks: {
        '1': [m('Ann', 100, 'Ben', 90), m('Cal', 80, 'Dee', 70), m('Eve', 60, 'Fay', 50)],
        '2': [m('Ann', 100, 'Cal', 90), m('Ben', 80, 'Eve', 70), m('Dee', 60, 'Fay', 50)],
        '3': [m('Ann', 100, 'Dee', 110), m('Ben', 95, 'Cal', 85), m('Eve', 60, 'Fay', 61)],
        '4': [m('Dee', 120, 'Ben', 100), m('Ann', 90, 'Cal', 91), m('Eve', 50, 'Fay', 40)],
      },
    };

    it('should start with semifinals among the top four', () => {
      expect(roles(season).filter(r => !r.endsWith('regular'))).toEqual([
        '3 Ann-Dee SF',
        '3 Ben-Cal SF',
        '3 Eve-Fay consolation',
        '4 Dee-Ben 1st',
        '4 Ann-Cal 3rd',
        '4 Eve-Fay consolation',
      ]);
    });

    it('should leave weeks before the playoffs regular', () => {
      expect(roles(season).filter(r => Number(r.split(' ')[0]) < 3).every(r => r.endsWith('regular'))).toBe(
        true
      );
    });
  });

  it('should let the source consolation flag take precedence', () => {
    const snapshot = eightTeamSeason();
    snapshot.weeks['14'] = [
      m('Cal', 101, 'Fay', 99, { isPlayoffs: true, isConsolation: true }),
      m('Dee', 88, 'Eve', 92, { isPlayoffs: true }),
    ];
    const report = new RunReport();
    const out = roles(snapshot, report).filter(r => r.startsWith('14 '));
    expect(out).toEqual(['14 Cal-Fay consolation', '14 Dee-Eve QF']);
  });

  it('should assign exactly one game type to every matchup', () => {
    const snapshot = eightTeamSeason();
    const total = Object.values(snapshot.weeks).reduce((acc, list) => acc + list.length, 0);
    expect(roles(snapshot)).toHaveLength(total);
  });

  it('should resolve co-managed teams through the operator rule', () => {
    const snapshot: SeasonSnapshot = {
      season: 2018,
      settings: { playoffStartWeek: 5, numPlayoffTeams: 4 },
      weeks: { '1': [matchup(team('Op', 100, 'Ann'), team('Ben', 90))] },
    };
    const classified = classifySeason(
      snapshot,
      { playoffStartWeek: 5, numPlayoffTeams: 4 },
      new RunReport(),
      { operator: 'Op' }
    );
    expect(classified.matchups[0]).toMatchObject({
      team1Manager: 'Ann',
      team2Manager: 'Ben',
      gameType: 'regular',
    });
  });

  it('should raise a season-tagged DataIntegrityError for a team without managers', () => {
    const snapshot: SeasonSnapshot = {
      season: 2017,
      settings: { playoffStartWeek: 5, numPlayoffTeams: 4 },
      weeks: {
        '1': [matchup({ teamKey: 't.x', points: 10, managers: [] }, team('Ben', 20))],
      },
    };
    let caught: unknown;
    try {
      classifySeason(snapshot, { playoffStartWeek: 5, numPlayoffTeams: 4 }, new RunReport());
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DataIntegrityError);
    expect(caught).toMatchObject({ season: 2017 });
  });
});
