import { describe, it, expect } from 'vitest';
import { createIdentityConfig, EMPTY_IDENTITY_CONFIG } from './identity.js';
import { game } from './testHelpers.js';
import { buildWeeklyReport } from './weeklyReport.js';

const games = [
  game(2019, 13, 'Ann', 50, 'Ben', 40),
  game(2020, 1, 'Cal', 120.5, 'Ben', 80),
  game(2020, 1, 'Ann', 100, 'Dee', 99),
  game(2020, 2, 'Ann', 90, 'Ben', 95),
  game(2020, 2, 'Cal', 70, 'Dee', 75),
  game(2020, 14, 'Ann', 150, 'Cal', 10, 'SF'),
];

describe('Weekly Report', () => {
  it('should default to the latest regular-season week', () => {
    const report = buildWeeklyReport(games, EMPTY_IDENTITY_CONFIG);
    expect(report?.season).toBe(2020);
    expect(report?.week).toBe(2);
  });

  it('should set the alternative universe beside the real standings', () => {
    const report = buildWeeklyReport(games, EMPTY_IDENTITY_CONFIG);
    expect(report?.rows).toEqual([
      {
        manager: 'Ann',
        altRank: 1,
        altDelta: 1,
        altWins: 2,
        altLosses: 0,
        altResult: 'W',
        pointsFor: 190,
        weeklyScore: 90,
        realRank: 2,
        realDelta: 0,
        realWins: 1,
        realLosses: 1,
        realTies: 0,
        realResult: 'L',
      },
      {
        manager: 'Cal',
        altRank: 2,
        altDelta: -1,
        altWins: 1,
        altLosses: 1,
        altResult: 'L',
        pointsFor: 190.5,
        weeklyScore: 70,
        realRank: 1,
        realDelta: 0,
        realWins: 1,
        realLosses: 1,
        realTies: 0,
        realResult: 'L',
      },
      {
        manager: 'Ben',
        altRank: 3,
        altDelta: 1,
        altWins: 1,
        altLosses: 1,
        altResult: 'W',
        pointsFor: 175,
        weeklyScore: 95,
        realRank: 3,
        realDelta: 1,
        realWins: 1,
        realLosses: 1,
        realTies: 0,
        realResult: 'W',
      },
      {
        manager: 'Dee',
        altRank: 4,
        altDelta: -1,
        altWins: 0,
        altLosses: 2,
        altResult: 'L',
        pointsFor: 174,
        weeklyScore: 75,
        realRank: 4,
        realDelta: -1,
        realWins: 1,
        realLosses: 1,
        realTies: 0,
        realResult: 'W',
      },
    ]);
  });

  it("should list the week's accolades with season-to-date counts", () => {
    const report = buildWeeklyReport(games, EMPTY_IDENTITY_CONFIG);
    const at = { season: 2020, week: 2, seasonCount: 1 };
    expect(report?.accolades).toEqual([
      { kind: 'topPoints', manager: 'Ben', opponent: 'Ann', value: 95, ...at },
      { kind: 'highestScoringLoss', manager: 'Ann', opponent: 'Ben', value: 90, ...at },
      { kind: 'lowestScoringWin', manager: 'Dee', opponent: 'Cal', value: 75, ...at },
      { kind: 'smallestMarginOfDefeat', manager: 'Ann', opponent: 'Ben', value: 5, ...at },
      { kind: 'blowoutWin', manager: 'Ben', opponent: 'Ann', value: 5, ...at },
    ]);
  });

  it('should count repeat accolade winners across the season', () => {
    const report = buildWeeklyReport(
      [game(2020, 1, 'Ann', 120, 'Ben', 80), game(2020, 2, 'Ann', 110, 'Ben', 100)],
      EMPTY_IDENTITY_CONFIG
    );
    expect(report?.accolades.map(a => `${a.kind}:${a.manager}:${a.seasonCount}`)).toEqual([
      'topPoints:Ann:2',
      'highestScoringLoss:Ben:2',
      'lowestScoringWin:Ann:2',
      'smallestMarginOfDefeat:Ben:2',
      'blowoutWin:Ann:2',
    ]);
  });

  it('should show no movement for the first week of a season', () => {
    const report = buildWeeklyReport(games, EMPTY_IDENTITY_CONFIG, { season: 2020, week: 1 });
    expect(report?.rows.map(r => [r.manager, r.altRank, r.altDelta, r.realDelta])).toEqual([
      ['Cal', 1, null, null],
      ['Ann', 2, null, null],
      ['Dee', 3, null, null],
      ['Ben', 4, null, null],
    ]);
  });

  it('should keep hidden managers out of the rows and accolades but not the ranks', () => {
    const report = buildWeeklyReport(games, createIdentityConfig({ hidden: ['Dee'] }));
    expect(report?.rows.map(r => `${r.altRank} ${r.manager}`)).toEqual(['1 Ann', '2 Cal', '3 Ben']);
    expect(report?.accolades.map(a => a.kind)).toEqual([
      'topPoints',
      'highestScoringLoss',
      'smallestMarginOfDefeat',
      'blowoutWin',
    ]);
  });

  it('should return undefined for a week without games', () => {
    expect(buildWeeklyReport(games, EMPTY_IDENTITY_CONFIG, { season: 2020, week: 5 })).toBeUndefined();
    expect(buildWeeklyReport([], EMPTY_IDENTITY_CONFIG)).toBeUndefined();
  });
});
